import { describe, it, expect, vi } from "vitest";
import { SyncOrchestrator } from "@/sync";
import { abortableSleep, runScheduled } from "@/sync/run-loop";
import { checkConfig, type ConfigCheck } from "@/sync/config/env";
import type { ListSnapshot, ServiceId, TokenRecord } from "@/sync/types";
import { ok, type ServiceResult } from "@/sync/types/result";
import type { RunStateSnapshot } from "@/sync/run-state";
import { snapshot } from "../helpers";

const NOW = Date.parse("2024-05-01T00:00:00Z");

function emptyRuntime() {
  const client = (service: ServiceId) => ({
    service,
    fetchSnapshot: async (): Promise<ServiceResult<ListSnapshot>> => ok(snapshot(service, [])),
    applyUpdate: async (): Promise<ServiceResult<void>> => ok(undefined),
  });
  return {
    auth: {
      ensureToken: async (): Promise<TokenRecord> => ({ accessToken: "test-token", expiresAt: null }),
      reauthenticate: async (): Promise<TokenRecord> => ({ accessToken: "test-token", expiresAt: null }),
      getStates: () => ({ anilist: "authenticated", mal: "authenticated" }) as const,
    },
    clients: { anilist: client("anilist"), mal: client("mal") },
    settings: { mode: "bidirectional", compareScores: true, dryRun: false } as const,
  };
}

const validConfig = checkConfig({
  ANILIST_CLIENT_ID: "test-anilist-client",
  ANILIST_CLIENT_SECRET: "test-secret",
  ANILIST_USERNAME: "tester",
  MAL_CLIENT_ID: "test-mal-client",
  MAL_CLIENT_SECRET: "test-secret",
});

/** A sleep that returns at once, records what the state looked like, and stops the loop after `cycles` waits. */
function countedSleep(controller: AbortController, orchestrator: SyncOrchestrator, cycles: number) {
  const seen: RunStateSnapshot[] = [];
  const sleep = vi.fn(async (_ms: number, _signal: AbortSignal) => {
    seen.push(orchestrator.state.snapshot());
    if (seen.length >= cycles) controller.abort();
  });
  return { sleep, seen };
}

describe("runScheduled", () => {
  it("waits the sync interval between cycles and stops on shutdown", async () => {
    const controller = new AbortController();
    const orchestrator = new SyncOrchestrator({
      createRuntime: emptyRuntime,
      loadConfig: () => validConfig,
      now: () => NOW,
    });
    const { sleep, seen } = countedSleep(controller, orchestrator, 2);
    const intervalMs = vi.fn(() => 60_000);

    await runScheduled(orchestrator, {
      intervalMs,
      configRetryMs: 5_000,
      signal: controller.signal,
      now: () => NOW,
      sleep,
    });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([60_000, 60_000]);
    expect(intervalMs).toHaveBeenCalledTimes(2);
    expect(seen[0]).toMatchObject({
      phase: "sleeping",
      running: false,
      nextSyncAt: "2024-05-01T00:01:00.000Z",
      syncCount: 1,
    });
    expect(orchestrator.state.snapshot()).toMatchObject({ phase: "idle", nextSyncAt: null, syncCount: 2 });
  });

  it("retries sooner while the configuration is invalid", async () => {
    const controller = new AbortController();
    const orchestrator = new SyncOrchestrator({
      createRuntime: emptyRuntime,
      loadConfig: () => ({ valid: false, problems: ["MAL_CLIENT_ID: MAL_CLIENT_ID is required"] }),
      now: () => NOW,
    });
    const { sleep } = countedSleep(controller, orchestrator, 3);

    await runScheduled(orchestrator, {
      intervalMs: () => 60_000,
      configRetryMs: 5_000,
      signal: controller.signal,
      now: () => NOW,
      sleep,
    });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5_000, 5_000, 5_000]);
    expect(orchestrator.state.snapshot().syncCount).toBe(0);
  });

  it("keeps retrying when the configuration file cannot be read", async () => {
    const controller = new AbortController();
    const loadConfig = vi.fn((): ConfigCheck => {
      throw Object.assign(new Error("EACCES: permission denied, open '.env'"), { code: "EACCES" });
    });
    const orchestrator = new SyncOrchestrator({ createRuntime: emptyRuntime, loadConfig, now: () => NOW });
    const { sleep } = countedSleep(controller, orchestrator, 2);

    await runScheduled(orchestrator, {
      intervalMs: () => 60_000,
      configRetryMs: 5_000,
      signal: controller.signal,
      now: () => NOW,
      sleep,
    });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5_000, 5_000]);
    expect(loadConfig).toHaveBeenCalledTimes(2);
    expect(orchestrator.state.snapshot()).toMatchObject({
      configValid: false,
      configProblems: ["Configuration could not be read: EACCES: permission denied, open '.env'"],
      lastReport: { outcome: "aborted", abortReason: "config-invalid" },
    });
  });

  it("goes back to sleeping after a cycle triggered between scheduled runs", async () => {
    const controller = new AbortController();
    const orchestrator = new SyncOrchestrator({
      createRuntime: emptyRuntime,
      loadConfig: () => validConfig,
      now: () => NOW,
    });
    const seen: RunStateSnapshot[] = [];
    const sleep = vi.fn(async (_ms: number, _signal: AbortSignal) => {
      expect(orchestrator.trigger()).toBe("started");
      await orchestrator.runCycle();
      seen.push(orchestrator.state.snapshot());
      controller.abort();
    });

    await runScheduled(orchestrator, {
      intervalMs: () => 60_000,
      configRetryMs: 5_000,
      signal: controller.signal,
      now: () => NOW,
      sleep,
    });

    expect(seen[0]).toMatchObject({
      phase: "sleeping",
      running: false,
      nextSyncAt: "2024-05-01T00:01:00.000Z",
      syncCount: 2,
    });
  });

  it("does not start when shutdown was already requested", async () => {
    const controller = new AbortController();
    controller.abort();
    const orchestrator = new SyncOrchestrator({ createRuntime: emptyRuntime, loadConfig: () => validConfig });
    const sleep = vi.fn(async () => undefined);

    await runScheduled(orchestrator, {
      intervalMs: () => 60_000,
      configRetryMs: 5_000,
      signal: controller.signal,
      sleep,
    });

    expect(sleep).not.toHaveBeenCalled();
    expect(orchestrator.state.snapshot().syncCount).toBe(0);
  });
});

describe("abortableSleep", () => {
  it("returns early when the signal fires", async () => {
    const controller = new AbortController();
    const started = Date.now();

    const waiting = abortableSleep(60_000, controller.signal);
    controller.abort();
    await waiting;

    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("returns once the time is up", async () => {
    await expect(abortableSleep(1, new AbortController().signal)).resolves.toBeUndefined();
  });
});
