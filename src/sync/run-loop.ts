import { setTimeout as sleep } from "timers/promises";
import type { SyncOrchestrator } from "@/sync";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("run-loop");

export interface ScheduleOptions {
  /** Wait after a cycle that got past configuration; read again after every cycle. */
  intervalMs: () => number;
  /** Wait after a cycle stopped by invalid configuration. */
  configRetryMs: number;
  signal: AbortSignal;
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/** Resolves when the time is up or the signal fires, whichever comes first. */
export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
}

/**
 * Scheduled mode: run a cycle, sleep, repeat until shutdown. No outcome ends
 * the loop; failed and aborted cycles are reported and retried on schedule.
 */
export async function runScheduled(orchestrator: SyncOrchestrator, options: ScheduleOptions): Promise<void> {
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? abortableSleep;
  const { state } = orchestrator;

  while (!options.signal.aborted) {
    const report = await orchestrator.runCycle();
    if (options.signal.aborted) break;

    const delayMs = report.abortReason === "config-invalid" ? options.configRetryMs : options.intervalMs();
    state.setPhase("sleeping");
    state.setNextSync(now() + delayMs);
    log.info("Next sync scheduled", {
      outcome: report.outcome,
      inSeconds: Math.round(delayMs / 1000),
    });
    await wait(delayMs, options.signal);
    state.setNextSync(null);
  }

  state.setNextSync(null);
  state.setPhase("idle");
  log.info("Scheduler stopped");
}
