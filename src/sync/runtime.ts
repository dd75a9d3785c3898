import path from "path";
import type { ListServiceClient, ServiceId, SyncMode } from "@/sync/types";
import type { SyncEnv } from "@/sync/config/env";
import { TokenStore } from "@/sync/auth/token-store";
import { createAuthProviders } from "@/sync/auth/providers";
import { FastifyCallbackListener } from "@/sync/auth/callback-listener";
import { AuthOrchestrator, type AuthPrompt, type TokenAuthority } from "@/sync/auth/orchestrator";
import { IntervalRateLimiter } from "@/sync/policy/rate-limiter";
import { RequestPolicy, type RetryOptions } from "@/sync/policy/retry";
import { AniListClient } from "@/sync/anilist/client";
import { MalClient } from "@/sync/mal/client";

export interface SyncSettings {
  mode: SyncMode;
  compareScores: boolean;
  dryRun: boolean;
}

/** Everything one cycle talks to, built from a validated configuration. */
export interface SyncRuntime {
  auth: TokenAuthority;
  clients: Record<ServiceId, ListServiceClient>;
  settings: SyncSettings;
}

export type RuntimeFactory = (env: SyncEnv) => SyncRuntime;

export interface RuntimeOptions {
  prompt?: AuthPrompt;
  /** Aborts a pending authorization wait on shutdown. */
  signal?: AbortSignal;
}

export function createTokenStore(env: SyncEnv): TokenStore {
  return new TokenStore(path.resolve(env.SYNC_TOKEN_FILE), {
    expiryMarginMs: env.TOKEN_EXPIRY_MARGIN_SECONDS * 1000,
  });
}

export function createAuthOrchestrator(env: SyncEnv, options: RuntimeOptions = {}): AuthOrchestrator {
  return new AuthOrchestrator({
    store: createTokenStore(env),
    providers: createAuthProviders(env),
    listener: new FastifyCallbackListener(env.OAUTH_PORT),
    timeoutMs: env.OAUTH_TIMEOUT_SECONDS * 1000,
    prompt: options.prompt,
    signal: options.signal,
  });
}

export function createRuntime(env: SyncEnv, options: RuntimeOptions = {}): SyncRuntime {
  const retry: RetryOptions = {
    maxAttempts: env.RETRY_MAX_ATTEMPTS,
    baseDelayMs: env.RETRY_BASE_DELAY_MS,
    maxDelayMs: env.RETRY_MAX_DELAY_MS,
  };

  return {
    auth: createAuthOrchestrator(env, options),
    clients: {
      anilist: new AniListClient({
        userName: env.ANILIST_USERNAME,
        policy: new RequestPolicy("anilist", new IntervalRateLimiter(env.ANILIST_MIN_REQUEST_INTERVAL_MS), retry),
      }),
      mal: new MalClient({
        policy: new RequestPolicy("mal", new IntervalRateLimiter(env.MAL_MIN_REQUEST_INTERVAL_MS), retry),
      }),
    },
    settings: {
      mode: env.SYNC_MODE,
      compareScores: env.SYNC_SCORES,
      dryRun: env.SYNC_DRY_RUN,
    },
  };
}
