import { randomUUID } from "crypto";
import type {
  AbortReason,
  CyclePhase,
  EntryFailure,
  ListSnapshot,
  ServiceId,
  SyncMode,
  SyncReport,
  UpdateDecision,
} from "@/sync/types";
import { SERVICE_NAMES } from "@/sync/types";
import type { ServiceResult } from "@/sync/types/result";
import { checkConfig, type ConfigCheck, type SyncEnv } from "@/sync/config/env";
import type { RuntimeFactory, SyncRuntime, SyncSettings } from "@/sync/runtime";
import { RunState } from "@/sync/run-state";
import { resolve } from "@/sync/resolver/resolve";
import {
  AuthorizationDeniedError,
  AuthTimeoutError,
  ConfigInvalidError,
  ManualReauthRequiredError,
  PersistenceError,
  StateMismatchError,
  TokenExchangeError,
} from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";

const log = createChildLogger("sync-engine");

export interface SyncOrchestratorOptions {
  createRuntime: RuntimeFactory;
  /** Re-read on every cycle so configuration edits are picked up. */
  loadConfig?: () => ConfigCheck;
  /** Command-line values that win over the configuration. */
  overrides?: Partial<SyncSettings>;
  state?: RunState;
  /** Process shutdown. */
  signal?: AbortSignal;
  now?: () => number;
}

export type TriggerStatus = "started" | "already-running";

/** Ends the cycle early with a reason the report can carry. */
class CycleAbort extends Error {
  constructor(public readonly reason: AbortReason, message: string) {
    super(message);
    this.name = "CycleAbort";
  }
}

interface Cycle {
  runId: string;
  startedAt: string;
  mode: SyncMode | null;
  dryRun: boolean;
  counts: SyncReport["counts"];
  failures: EntryFailure[];
  /** Updates not yet attempted; they count as skipped if the cycle ends early. */
  pending: number;
}

/**
 * Runs sync cycles: tokens → snapshots → decisions → writes → report.
 * At most one cycle runs at a time; a second request while one is in flight
 * gets the same report.
 */
export class SyncOrchestrator {
  readonly state: RunState;
  private inFlight: Promise<SyncReport> | null = null;
  private phase: CyclePhase = "idle";
  private runtime: { key: string; value: SyncRuntime } | null = null;
  private readonly loadConfig: () => ConfigCheck;
  private readonly now: () => number;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.state = options.state ?? new RunState();
    this.loadConfig = options.loadConfig ?? (() => checkConfig());
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  runCycle(): Promise<SyncReport> {
    if (this.inFlight) {
      log.info("Sync already in progress, joining the running cycle");
      return this.inFlight;
    }
    const run = this.executeCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  /** Start a cycle in the background unless one is already running. */
  trigger(): TriggerStatus {
    if (this.inFlight) return "already-running";
    this.runCycle().catch((error) => {
      log.error("Triggered sync failed", { error: errorMessage(error) });
    });
    return "started";
  }

  private enter(phase: CyclePhase): void {
    this.phase = phase;
    this.state.setPhase(phase);
    log.debug("Cycle phase", { phase });
  }

  private async executeCycle(): Promise<SyncReport> {
    const cycle: Cycle = {
      runId: randomUUID(),
      startedAt: new Date(this.now()).toISOString(),
      mode: null,
      dryRun: false,
      counts: { noop: 0, updated: 0, failed: 0, skipped: 0 },
      failures: [],
      pending: 0,
    };

    const check = this.readConfig();
    this.state.setConfig(check);
    if (!check.valid) {
      const message = new ConfigInvalidError(check.problems).message;
      log.error("Sync paused until the configuration is fixed", { problems: check.problems });
      return this.finish(cycle, { reason: "config-invalid", message });
    }

    let runtime: SyncRuntime | null = null;
    try {
      runtime = this.runtimeFor(check.env);
      const settings: SyncSettings = { ...runtime.settings, ...this.options.overrides };
      cycle.mode = settings.mode;
      cycle.dryRun = settings.dryRun;

      log.info("Starting sync cycle", { runId: cycle.runId, mode: settings.mode, dryRun: settings.dryRun });
      await this.runPhases(cycle, runtime, settings);
      return this.finish(cycle);
    } catch (error) {
      const reason = error instanceof CycleAbort ? error.reason : abortReasonFor(error, this.phase);
      log.error("Sync cycle aborted", { runId: cycle.runId, reason, error: errorMessage(error) });
      cycle.counts.skipped += cycle.pending;
      cycle.pending = 0;
      return this.finish(cycle, { reason, message: errorMessage(error) });
    } finally {
      if (runtime) this.state.setAuth(runtime.auth.getStates());
    }
  }

  /** A configuration source that cannot be read counts as invalid, so the loop retries it on the short interval. */
  private readConfig(): ConfigCheck {
    try {
      return this.loadConfig();
    } catch (error) {
      return { valid: false, problems: [`Configuration could not be read: ${errorMessage(error)}`] };
    }
  }

  private async runPhases(cycle: Cycle, runtime: SyncRuntime, settings: SyncSettings): Promise<void> {
    if (this.options.signal?.aborted) {
      throw new CycleAbort("shutdown", "Shutdown requested before the cycle started");
    }

    this.enter("fetching-tokens");
    const tokens: Record<ServiceId, string> = {
      anilist: (await runtime.auth.ensureToken("anilist")).accessToken,
      mal: (await runtime.auth.ensureToken("mal")).accessToken,
    };

    this.enter("fetching-snapshots");
    const anilist = await this.fetchSnapshot(runtime, tokens, "anilist");
    const mal = await this.fetchSnapshot(runtime, tokens, "mal");

    this.enter("resolving");
    const decisions = resolve(anilist, mal, { mode: settings.mode, compareScores: settings.compareScores });
    const updates: UpdateDecision[] = [];
    for (const decision of decisions) {
      if (decision.kind === "noop") {
        cycle.counts.noop += 1;
      } else if (decision.kind === "unresolvable") {
        cycle.counts.skipped += 1;
        log.warn("Skipping entry that cannot be matched", {
          key: decision.key,
          title: decision.title,
          reason: decision.reason,
        });
      } else {
        updates.push(decision);
      }
    }
    log.info("Decisions resolved", { updates: updates.length, noop: cycle.counts.noop, skipped: cycle.counts.skipped });

    this.enter("applying-writes");
    cycle.pending = updates.length;
    // Services whose authorization was lost mid-cycle; their remaining writes are skipped
    const lostAuth = new Map<ServiceId, string>();
    for (const decision of updates) {
      // Shutdown lets the write in progress finish, then stops here
      if (this.options.signal?.aborted) {
        throw new CycleAbort("shutdown", `Shutdown requested with ${cycle.pending} update(s) not applied`);
      }
      cycle.pending -= 1;

      const lostReason = lostAuth.get(decision.target);
      if (lostReason !== undefined) {
        cycle.counts.skipped += 1;
        log.warn(`Skipping ${SERVICE_NAMES[decision.target]} write without authorization`, {
          title: decision.title,
          error: lostReason,
        });
        continue;
      }

      if (settings.dryRun) {
        log.info(`[dry run] Would update ${SERVICE_NAMES[decision.target]}`, {
          title: decision.title,
          status: decision.entry.status,
          progress: decision.entry.progress,
          score: decision.entry.score,
        });
        cycle.counts.updated += 1;
        continue;
      }

      let result: ServiceResult<void>;
      try {
        result = await this.applyUpdate(runtime, tokens, decision, settings.compareScores);
      } catch (error) {
        recordFailure(cycle, decision, errorMessage(error));
        if (!isReauthFailure(error)) throw error;
        lostAuth.set(decision.target, errorMessage(error));
        log.error(`${SERVICE_NAMES[decision.target]} re-authorization failed; its remaining writes are skipped`, {
          title: decision.title,
          error: errorMessage(error),
        });
        continue;
      }

      if (result.ok) {
        cycle.counts.updated += 1;
        log.info(`Updated ${SERVICE_NAMES[decision.target]} entry`, { title: decision.title });
      } else {
        recordFailure(cycle, decision, result.error.message);
        if (result.error.type === "AuthFailure") lostAuth.set(decision.target, result.error.message);
        log.error(`Failed to update ${SERVICE_NAMES[decision.target]} entry`, {
          title: decision.title,
          failure: result.error.type,
          error: result.error.message,
        });
      }
    }
  }

  /** One fetch, plus exactly one re-authorization and retry when the service refuses the token. */
  private async fetchSnapshot(
    runtime: SyncRuntime,
    tokens: Record<ServiceId, string>,
    service: ServiceId
  ): Promise<ListSnapshot> {
    const client = runtime.clients[service];
    let result = await client.fetchSnapshot(tokens[service]);
    if (!result.ok && result.error.type === "AuthFailure") {
      tokens[service] = (await runtime.auth.reauthenticate(service)).accessToken;
      result = await client.fetchSnapshot(tokens[service]);
    }
    if (!result.ok) {
      const reason = result.error.type === "AuthFailure" ? "auth-failed" : "fetch-failed";
      throw new CycleAbort(reason, `${SERVICE_NAMES[service]} list could not be fetched: ${result.error.message}`);
    }
    return result.value;
  }

  private async applyUpdate(
    runtime: SyncRuntime,
    tokens: Record<ServiceId, string>,
    decision: UpdateDecision,
    writeScore: boolean
  ): Promise<ServiceResult<void>> {
    const client = runtime.clients[decision.target];
    const result = await client.applyUpdate(tokens[decision.target], decision.entry, { writeScore });
    if (result.ok || result.error.type !== "AuthFailure") {
      return result;
    }
    tokens[decision.target] = (await runtime.auth.reauthenticate(decision.target)).accessToken;
    return client.applyUpdate(tokens[decision.target], decision.entry, { writeScore });
  }

  /** Reuse the runtime while the configuration is unchanged, so rate limits and auth state carry over. */
  private runtimeFor(env: SyncEnv): SyncRuntime {
    const key = JSON.stringify(env);
    if (this.runtime?.key !== key) {
      this.runtime = { key, value: this.options.createRuntime(env) };
    }
    return this.runtime.value;
  }

  private finish(cycle: Cycle, abort?: { reason: AbortReason; message: string }): SyncReport {
    this.enter("reporting");
    const report = buildReport(cycle, new Date(this.now()).toISOString(), abort);
    this.state.recordReport(report);

    const fields = { runId: report.runId, outcome: report.outcome, counts: report.counts };
    if (report.outcome === "success") {
      log.info("Sync cycle complete", fields);
    } else {
      log.warn("Sync cycle finished with problems", { ...fields, abortReason: report.abortReason });
    }

    this.phase = "idle";
    this.state.settle();
    return report;
  }
}

function recordFailure(cycle: Cycle, decision: UpdateDecision, error: string): void {
  cycle.counts.failed += 1;
  cycle.failures.push({ key: decision.key, title: decision.title, target: decision.target, error });
}

function isReauthFailure(error: unknown): boolean {
  return (
    error instanceof ManualReauthRequiredError ||
    error instanceof AuthTimeoutError ||
    error instanceof StateMismatchError ||
    error instanceof AuthorizationDeniedError ||
    error instanceof TokenExchangeError
  );
}

function abortReasonFor(error: unknown, phase: CyclePhase): AbortReason {
  if (error instanceof ManualReauthRequiredError) return "manual-reauth-required";
  if (error instanceof PersistenceError) return "token-persistence";
  if (isReauthFailure(error)) return "auth-failed";
  return phase === "fetching-tokens" ? "auth-failed" : "internal-error";
}

function buildReport(cycle: Cycle, completedAt: string, abort?: { reason: AbortReason; message: string }): SyncReport {
  const outcome = abort ? "aborted" : cycle.counts.failed > 0 ? "partial-failure" : "success";
  return {
    runId: cycle.runId,
    startedAt: cycle.startedAt,
    completedAt,
    mode: cycle.mode,
    dryRun: cycle.dryRun,
    outcome,
    ...(abort ? { abortReason: abort.reason, message: abort.message } : {}),
    counts: { ...cycle.counts },
    failures: [...cycle.failures],
  };
}
