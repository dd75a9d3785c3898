import { vi } from "vitest";
import type { ListEntry, ListSnapshot, ServiceId } from "@/sync/types";
import { IntervalRateLimiter, type Clock } from "@/sync/policy/rate-limiter";
import { RequestPolicy } from "@/sync/policy/retry";

export function entry(overrides: Partial<ListEntry> = {}): ListEntry {
  return {
    externalKey: "1",
    ids: { mal: 1 },
    title: "Test Show",
    status: "watching",
    progress: 0,
    score: null,
    updatedAt: null,
    rewatched: 0,
    notes: null,
    ...overrides,
  };
}

export function snapshot(service: ServiceId, entries: ListEntry[]): ListSnapshot {
  return { service, fetchedAt: 0, entries };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/** A clock whose sleeps return at once and are recorded. */
export function fakeClock(start = 0): Clock & { sleeps: number[] } {
  let now = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
  };
}

export function instantPolicy(service: ServiceId, maxAttempts = 3): RequestPolicy {
  const clock = fakeClock();
  const retry = { maxAttempts, baseDelayMs: 10, maxDelayMs: 100 };
  return new RequestPolicy(service, new IntervalRateLimiter(0, clock), retry, clock);
}

export function stubFetch() {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** URL, headers and body of the nth request a stubbed fetch received. */
export function sentRequest(fetchMock: ReturnType<typeof stubFetch>, index = 0) {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`fetch was not called ${index + 1} times`);
  const [input, init] = call;
  return {
    url: String(input),
    method: init?.method ?? "GET",
    headers: new Headers(init?.headers),
    body:
      typeof init?.body === "string" ? init.body : init?.body instanceof URLSearchParams ? init.body.toString() : "",
  };
}
