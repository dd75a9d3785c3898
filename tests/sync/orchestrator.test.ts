import { describe, it, expect, vi } from "vitest";
import { SyncOrchestrator } from "@/sync";
import type { SyncRuntime, SyncSettings } from "@/sync/runtime";
import type { TokenAuthority } from "@/sync/auth/orchestrator";
import { checkConfig, type ConfigCheck, type SyncEnv } from "@/sync/config/env";
import type { ListEntry, ListServiceClient, ListSnapshot, ServiceId, TokenRecord, WriteOptions } from "@/sync/types";
import { err, ok, type ServiceResult } from "@/sync/types/result";
import { AuthTimeoutError, ManualReauthRequiredError, PersistenceError } from "@/sync/errors";
import { entry, snapshot } from "../helpers";

const validConfig = checkConfig({
  ANILIST_CLIENT_ID: "test-anilist-client",
  ANILIST_CLIENT_SECRET: "test-secret",
  ANILIST_USERNAME: "tester",
  MAL_CLIENT_ID: "test-mal-client",
  MAL_CLIENT_SECRET: "test-secret",
});

function fakeClient(service: ServiceId, entries: ListEntry[]) {
  return {
    service,
    fetchSnapshot: vi.fn(
      async (_accessToken: string): Promise<ServiceResult<ListSnapshot>> => ok(snapshot(service, entries))
    ),
    applyUpdate: vi.fn(
      async (_accessToken: string, _entry: ListEntry, _options: WriteOptions): Promise<ServiceResult<void>> =>
        ok(undefined)
    ),
  } satisfies ListServiceClient;
}

function fakeAuth() {
  return {
    ensureToken: vi.fn(
      async (service: ServiceId): Promise<TokenRecord> => ({ accessToken: `${service}-token`, expiresAt: null })
    ),
    reauthenticate: vi.fn(
      async (service: ServiceId): Promise<TokenRecord> => ({ accessToken: `${service}-renewed`, expiresAt: null })
    ),
    getStates: vi.fn(() => ({ anilist: "authenticated", mal: "authenticated" }) as const),
  } satisfies TokenAuthority;
}

const progressed = (progress: number, updatedAt: number, key = "1") =>
  entry({
    externalKey: key,
    ids: { anilist: Number(key) * 100, mal: Number(key) },
    progress,
    updatedAt,
    title: `Show ${key}`,
  });

/** AniList ahead of MyAnimeList on every key, so each key becomes one write to MyAnimeList. */
interface SetupOptions {
  settings?: Partial<SyncSettings>;
  loadConfig?: () => ConfigCheck;
}

function setup(keys: string[] = ["1"], options: SetupOptions = {}) {
  const anilist = fakeClient("anilist", keys.map((key) => progressed(5, 2000, key)));
  const mal = fakeClient(
    "mal",
    keys.map((key) =>
      entry({ externalKey: key, ids: { mal: Number(key) }, progress: 2, updatedAt: 1000, title: `Show ${key}` })
    )
  );
  const auth = fakeAuth();
  const runtime: SyncRuntime = {
    auth,
    clients: { anilist, mal },
    settings: { mode: "bidirectional", compareScores: true, dryRun: false, ...options.settings },
  };
  const createRuntime = vi.fn((_env: SyncEnv) => runtime);
  const controller = new AbortController();
  const orchestrator = new SyncOrchestrator({
    createRuntime,
    loadConfig: options.loadConfig ?? (() => validConfig),
    signal: controller.signal,
    now: () => Date.parse("2024-05-01T00:00:00Z"),
  });
  return { orchestrator, anilist, mal, auth, createRuntime, controller };
}

/** Keys 1 and 3 are newer on AniList and key 2 on MyAnimeList, so writes go MyAnimeList, AniList, MyAnimeList. */
function setupMixed() {
  const context = setup();
  const older = (key: string) =>
    entry({ externalKey: key, ids: { mal: Number(key) }, progress: 2, updatedAt: 1000, title: `Show ${key}` });
  context.anilist.fetchSnapshot.mockResolvedValueOnce(
    ok(snapshot("anilist", [progressed(5, 2000, "1"), progressed(2, 1000, "2"), progressed(5, 2000, "3")]))
  );
  context.mal.fetchSnapshot.mockResolvedValueOnce(
    ok(
      snapshot("mal", [
        older("1"),
        entry({ externalKey: "2", ids: { mal: 2 }, progress: 6, updatedAt: 3000, title: "Show 2" }),
        older("3"),
      ])
    )
  );
  return context;
}

describe("SyncOrchestrator.runCycle", () => {
  it("writes the newer side and reports success", async () => {
    const { orchestrator, mal } = setup();

    const report = await orchestrator.runCycle();

    expect(report).toMatchObject({
      outcome: "success",
      mode: "bidirectional",
      dryRun: false,
      startedAt: "2024-05-01T00:00:00.000Z",
      counts: { noop: 0, updated: 1, failed: 0, skipped: 0 },
      failures: [],
    });
    expect(report.abortReason).toBeUndefined();
    expect(mal.applyUpdate).toHaveBeenCalledWith("mal-token", progressed(5, 2000), { writeScore: true });
  });

  it("aborts without touching any service while the configuration is invalid", async () => {
    const { orchestrator, auth, createRuntime } = setup(["1"], {
      loadConfig: () => ({ valid: false, problems: ["MAL_CLIENT_ID: MAL_CLIENT_ID is required"] }),
    });

    const report = await orchestrator.runCycle();

    expect(report.outcome).toBe("aborted");
    expect(report.abortReason).toBe("config-invalid");
    expect(report.message).toContain("MAL_CLIENT_ID is required");
    expect(createRuntime).not.toHaveBeenCalled();
    expect(auth.ensureToken).not.toHaveBeenCalled();
    expect(orchestrator.state.snapshot()).toMatchObject({
      configValid: false,
      configProblems: ["MAL_CLIENT_ID: MAL_CLIENT_ID is required"],
      syncCount: 0,
      lastSyncAt: null,
    });
  });

  it("aborts with no writes when a token needs manual re-authorization", async () => {
    const { orchestrator, auth, anilist, mal } = setup();
    auth.ensureToken.mockRejectedValueOnce(new ManualReauthRequiredError("anilist"));

    const report = await orchestrator.runCycle();

    expect(report).toMatchObject({ outcome: "aborted", abortReason: "manual-reauth-required" });
    expect(anilist.fetchSnapshot).not.toHaveBeenCalled();
    expect(mal.applyUpdate).not.toHaveBeenCalled();
  });

  it("names token persistence failures", async () => {
    const { orchestrator, auth } = setup();
    auth.ensureToken.mockRejectedValueOnce(new PersistenceError("disk full"));

    expect((await orchestrator.runCycle()).abortReason).toBe("token-persistence");
  });

  it("re-authorizes once and retries a fetch the service refused", async () => {
    const { orchestrator, auth, mal } = setup();
    mal.fetchSnapshot.mockResolvedValueOnce(err({ type: "AuthFailure", status: 401, message: "HTTP 401" }));

    const report = await orchestrator.runCycle();

    expect(report.outcome).toBe("success");
    expect(auth.reauthenticate).toHaveBeenCalledTimes(1);
    expect(auth.reauthenticate).toHaveBeenCalledWith("mal");
    expect(mal.fetchSnapshot.mock.calls.map(([token]) => token)).toEqual(["mal-token", "mal-renewed"]);
    expect(mal.applyUpdate.mock.calls[0]?.[0]).toBe("mal-renewed");
  });

  it("aborts when the fetch is refused again after re-authorization", async () => {
    const { orchestrator, mal } = setup();
    mal.fetchSnapshot.mockResolvedValue(err({ type: "AuthFailure", status: 401, message: "HTTP 401" }));

    const report = await orchestrator.runCycle();

    expect(report).toMatchObject({
      outcome: "aborted",
      abortReason: "auth-failed",
      message: "MyAnimeList list could not be fetched: HTTP 401",
    });
  });

  it("aborts on any other fetch failure without writing", async () => {
    const { orchestrator, anilist, mal } = setup();
    anilist.fetchSnapshot.mockResolvedValueOnce(err({ type: "TransientFailure", message: "HTTP 503" }));

    const report = await orchestrator.runCycle();

    expect(report).toMatchObject({ outcome: "aborted", abortReason: "fetch-failed" });
    expect(mal.fetchSnapshot).not.toHaveBeenCalled();
    expect(mal.applyUpdate).not.toHaveBeenCalled();
  });

  it("retries a write once after re-authorization", async () => {
    const { orchestrator, auth, mal } = setup();
    mal.applyUpdate.mockResolvedValueOnce(err({ type: "AuthFailure", status: 401, message: "HTTP 401" }));

    const report = await orchestrator.runCycle();

    expect(report.outcome).toBe("success");
    expect(report.counts.updated).toBe(1);
    expect(auth.reauthenticate).toHaveBeenCalledWith("mal");
    expect(mal.applyUpdate.mock.calls.map(([token]) => token)).toEqual(["mal-token", "mal-renewed"]);
  });

  it("keeps writing to the other service when re-authorization fails mid-cycle", async () => {
    const { orchestrator, auth, anilist, mal } = setupMixed();
    mal.applyUpdate.mockResolvedValueOnce(err({ type: "AuthFailure", status: 401, message: "HTTP 401" }));
    auth.reauthenticate.mockRejectedValueOnce(new AuthTimeoutError("mal", 300_000));

    const report = await orchestrator.runCycle();

    expect(report.outcome).toBe("partial-failure");
    expect(report.counts).toEqual({ noop: 0, updated: 1, failed: 1, skipped: 1 });
    expect(report.failures).toEqual([
      { key: "1", title: "Show 1", target: "mal", error: "MyAnimeList authorization was not completed within 300s" },
    ]);
    expect(anilist.applyUpdate).toHaveBeenCalledTimes(1);
    expect(anilist.applyUpdate.mock.calls[0]?.[1].externalKey).toBe("2");
    expect(mal.applyUpdate).toHaveBeenCalledTimes(1);
    expect(auth.reauthenticate).toHaveBeenCalledTimes(1);
  });

  it("stops writing to a service whose write is refused again after re-authorization", async () => {
    const { orchestrator, auth, anilist, mal } = setupMixed();
    mal.applyUpdate.mockResolvedValue(err({ type: "AuthFailure", status: 401, message: "HTTP 401" }));

    const report = await orchestrator.runCycle();

    expect(report.outcome).toBe("partial-failure");
    expect(report.counts).toEqual({ noop: 0, updated: 1, failed: 1, skipped: 1 });
    expect(report.failures).toEqual([{ key: "1", title: "Show 1", target: "mal", error: "HTTP 401" }]);
    expect(auth.reauthenticate).toHaveBeenCalledTimes(1);
    expect(mal.applyUpdate.mock.calls.map(([token]) => token)).toEqual(["mal-token", "mal-renewed"]);
    expect(anilist.applyUpdate).toHaveBeenCalledTimes(1);
  });

  it("aborts as an internal error when the runtime cannot be built", async () => {
    const orchestrator = new SyncOrchestrator({
      createRuntime: () => {
        throw new Error("token file is not valid JSON");
      },
      loadConfig: () => validConfig,
    });

    const report = await orchestrator.runCycle();

    expect(report).toMatchObject({
      outcome: "aborted",
      abortReason: "internal-error",
      message: "token file is not valid JSON",
    });
    expect(orchestrator.state.snapshot()).toMatchObject({
      phase: "idle",
      auth: { anilist: "unauthenticated", mal: "unauthenticated" },
    });
  });

  it("keeps going after a rejected write and reports a partial failure", async () => {
    const { orchestrator, mal } = setup(["1", "2"]);
    mal.applyUpdate.mockResolvedValueOnce(err({ type: "RejectedFailure", message: "HTTP 400: bad score" }));

    const report = await orchestrator.runCycle();

    expect(report.outcome).toBe("partial-failure");
    expect(report.counts).toEqual({ noop: 0, updated: 1, failed: 1, skipped: 0 });
    expect(report.failures).toEqual([{ key: "1", title: "Show 1", target: "mal", error: "HTTP 400: bad score" }]);
  });

  it("counts unmatched entries as skipped", async () => {
    const { orchestrator, anilist } = setup();
    anilist.fetchSnapshot.mockResolvedValueOnce(
      ok(
        snapshot("anilist", [progressed(5, 2000), entry({ externalKey: null, ids: { anilist: 9 }, title: "Unmapped" })])
      )
    );

    const report = await orchestrator.runCycle();

    expect(report.counts).toEqual({ noop: 0, updated: 1, failed: 0, skipped: 1 });
  });

  it("logs instead of writing in a dry run", async () => {
    const { orchestrator, mal } = setup(["1"], { settings: { dryRun: true } });

    const report = await orchestrator.runCycle();

    expect(report).toMatchObject({ outcome: "success", dryRun: true, counts: { updated: 1 } });
    expect(mal.applyUpdate).not.toHaveBeenCalled();
  });

  it("stops between writes on shutdown and skips the rest", async () => {
    const { orchestrator, mal, controller } = setup(["1", "2", "3"]);
    mal.applyUpdate.mockImplementationOnce(async () => {
      controller.abort();
      return ok(undefined);
    });

    const report = await orchestrator.runCycle();

    expect(report).toMatchObject({
      outcome: "aborted",
      abortReason: "shutdown",
      counts: { noop: 0, updated: 1, failed: 0, skipped: 2 },
    });
    expect(mal.applyUpdate).toHaveBeenCalledTimes(1);
  });

  it("hands a second caller the cycle already in flight", async () => {
    const { orchestrator, anilist } = setup();

    const first = orchestrator.runCycle();
    const second = orchestrator.runCycle();

    expect(second).toBe(first);
    expect(orchestrator.running).toBe(true);
    await first;
    expect(orchestrator.running).toBe(false);
    expect(anilist.fetchSnapshot).toHaveBeenCalledTimes(1);
  });

  it("reuses the runtime while the configuration is unchanged", async () => {
    const { orchestrator, createRuntime } = setup();

    await orchestrator.runCycle();
    await orchestrator.runCycle();

    expect(createRuntime).toHaveBeenCalledTimes(1);
  });

  it("lets command-line overrides win over configured settings", async () => {
    const { anilist, mal } = setup();
    const orchestrator = new SyncOrchestrator({
      createRuntime: () => ({
        auth: fakeAuth(),
        clients: { anilist, mal },
        settings: { mode: "bidirectional", compareScores: true, dryRun: false },
      }),
      loadConfig: () => validConfig,
      overrides: { mode: "mal-to-anilist" },
    });

    const report = await orchestrator.runCycle();

    // AniList holds the newer entry, but MyAnimeList is the only source in this mode
    expect(report).toMatchObject({ mode: "mal-to-anilist", counts: { updated: 1 } });
    expect(anilist.applyUpdate).toHaveBeenCalledTimes(1);
    expect(mal.applyUpdate).not.toHaveBeenCalled();
  });

  it("records progress in the run state", async () => {
    const { orchestrator } = setup();

    const report = await orchestrator.runCycle();

    expect(orchestrator.state.snapshot()).toEqual({
      configValid: true,
      configProblems: [],
      phase: "idle",
      running: false,
      lastReport: report,
      lastSyncAt: report.completedAt,
      syncCount: 1,
      nextSyncAt: null,
      auth: { anilist: "authenticated", mal: "authenticated" },
    });
  });
});

describe("SyncOrchestrator.trigger", () => {
  it("starts a cycle, then reports it is already running", async () => {
    const { orchestrator } = setup();

    expect(orchestrator.trigger()).toBe("started");
    expect(orchestrator.trigger()).toBe("already-running");
    const report = await orchestrator.runCycle();
    expect(report.outcome).toBe("success");
    expect(orchestrator.state.snapshot().syncCount).toBe(1);
  });
});
