import type { ServiceId } from "@/sync/types";
import { SERVICE_NAMES } from "@/sync/types";
import type { ServiceResult } from "@/sync/types/result";
import { createChildLogger } from "@/sync/logger";
import { systemClock, type Clock, type RateLimiter } from "./rate-limiter";

const log = createChildLogger("request-policy");

export interface RetryOptions {
  /** Total tries, first attempt included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** base × 2^attempt, or the server's Retry-After when that is longer; never more than the cap. */
export function backoffDelay(attempt: number, options: RetryOptions, retryAfterMs?: number): number {
  const wanted = Math.max(options.baseDelayMs * 2 ** attempt, retryAfterMs ?? 0);
  return Math.min(wanted, options.maxDelayMs);
}

/**
 * Paces and retries calls against one service. Only transient failures are
 * retried; every other failure goes straight back to the caller, which decides
 * about re-authorization or recording the entry as failed.
 */
export class RequestPolicy {
  constructor(
    private readonly service: ServiceId,
    private readonly limiter: RateLimiter,
    private readonly retry: RetryOptions,
    private readonly clock: Clock = systemClock
  ) {}

  async execute<T>(label: string, operation: () => Promise<ServiceResult<T>>): Promise<ServiceResult<T>> {
    for (let attempt = 0; ; attempt++) {
      await this.limiter.acquire();
      const result = await operation();
      if (result.ok || result.error.type !== "TransientFailure") {
        return result;
      }

      if (attempt + 1 >= this.retry.maxAttempts) {
        log.warn(`${SERVICE_NAMES[this.service]} ${label} still failing, giving up`, {
          attempts: attempt + 1,
          error: result.error.message,
        });
        return result;
      }

      const delayMs = backoffDelay(attempt, this.retry, result.error.retryAfterMs);
      log.warn(`${SERVICE_NAMES[this.service]} ${label} failed, retrying`, {
        attempt: attempt + 1,
        delayMs,
        error: result.error.message,
      });
      await this.clock.sleep(delayMs);
    }
  }
}
