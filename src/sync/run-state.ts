import type { AuthState, CyclePhase, ServiceId, SyncReport } from "@/sync/types";
import type { ConfigCheck } from "@/sync/config/env";

export interface RunStateSnapshot {
  configValid: boolean;
  configProblems: string[];
  phase: CyclePhase;
  running: boolean;
  lastReport: SyncReport | null;
  /** Completion time of the last cycle that got past configuration. */
  lastSyncAt: string | null;
  syncCount: number;
  nextSyncAt: string | null;
  auth: Record<ServiceId, AuthState>;
}

/**
 * Process-wide view of the sync loop. Only the orchestrator and the run loop
 * write to it; everyone else reads copies through `snapshot()`.
 */
export class RunState {
  private configValid = false;
  private configProblems: string[] = [];
  private phase: CyclePhase = "idle";
  private lastReport: SyncReport | null = null;
  private lastSyncAt: string | null = null;
  private syncCount = 0;
  private nextSyncAt: string | null = null;
  private auth: Record<ServiceId, AuthState> = { anilist: "unauthenticated", mal: "unauthenticated" };

  setConfig(check: ConfigCheck): void {
    this.configValid = check.valid;
    this.configProblems = check.valid ? [] : [...check.problems];
  }

  setPhase(phase: CyclePhase): void {
    this.phase = phase;
  }

  /** End of a cycle: back to sleeping if the run loop has the next sync booked, otherwise idle. */
  settle(): void {
    this.phase = this.nextSyncAt === null ? "idle" : "sleeping";
  }

  setAuth(states: Record<ServiceId, AuthState>): void {
    this.auth = { ...states };
  }

  setNextSync(at: number | null): void {
    this.nextSyncAt = at === null ? null : new Date(at).toISOString();
  }

  recordReport(report: SyncReport): void {
    this.lastReport = report;
    if (report.abortReason !== "config-invalid") {
      this.lastSyncAt = report.completedAt;
      this.syncCount += 1;
    }
  }

  snapshot(): RunStateSnapshot {
    return structuredClone({
      configValid: this.configValid,
      configProblems: this.configProblems,
      phase: this.phase,
      running: this.phase !== "idle" && this.phase !== "sleeping",
      lastReport: this.lastReport,
      lastSyncAt: this.lastSyncAt,
      syncCount: this.syncCount,
      nextSyncAt: this.nextSyncAt,
      auth: this.auth,
    });
  }
}
