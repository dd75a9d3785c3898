import { randomBytes } from "crypto";
import type { AuthState, ServiceId, TokenRecord } from "@/sync/types";
import { SERVICE_NAMES } from "@/sync/types";
import type { TokenStore } from "./token-store";
import type { AuthProvider, TokenGrant } from "./providers";
import { CallbackTimeoutError, type CallbackListener } from "./callback-listener";
import { planTokenAction } from "./token-plan";
import {
  AuthorizationDeniedError,
  AuthTimeoutError,
  ManualReauthRequiredError,
  StateMismatchError,
  TokenExchangeError,
} from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";

const log = createChildLogger("auth");

/** Shows the user where to go; the default just logs the URL. */
export type AuthPrompt = (service: ServiceId, url: string) => void;

/** The part of authentication the sync cycle depends on. */
export interface TokenAuthority {
  ensureToken(service: ServiceId): Promise<TokenRecord>;
  reauthenticate(service: ServiceId): Promise<TokenRecord>;
  getStates(): Record<ServiceId, AuthState>;
}

export interface AuthOrchestratorOptions {
  store: TokenStore;
  providers: Record<ServiceId, AuthProvider>;
  listener: CallbackListener;
  timeoutMs: number;
  prompt?: AuthPrompt;
  now?: () => number;
  signal?: AbortSignal;
}

const defaultPrompt: AuthPrompt = (service, url) => {
  log.info(`Open this URL to authorize ${SERVICE_NAMES[service]}`, { url });
};

export class AuthOrchestrator implements TokenAuthority {
  private readonly states: Record<ServiceId, AuthState> = {
    anilist: "unauthenticated",
    mal: "unauthenticated",
  };
  // Both services share the callback port, so authorization flows run one at a time
  private flow: Promise<unknown> = Promise.resolve();
  private readonly prompt: AuthPrompt;
  private readonly now: () => number;

  constructor(private readonly options: AuthOrchestratorOptions) {
    this.prompt = options.prompt ?? defaultPrompt;
    this.now = options.now ?? Date.now;
  }

  getState(service: ServiceId): AuthState {
    return this.states[service];
  }

  getStates(): Record<ServiceId, AuthState> {
    return { ...this.states };
  }

  /** Run the browser authorization-code flow and store the resulting token. */
  authenticate(service: ServiceId): Promise<TokenRecord> {
    const run = this.flow.then(
      () => this.runAuthorization(service),
      () => this.runAuthorization(service)
    );
    this.flow = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Exchange the refresh token for a new access token. For a provider without
   * refresh support this returns the stored record untouched, stale or not.
   */
  async refresh(service: ServiceId): Promise<TokenRecord | undefined> {
    const provider = this.options.providers[service];
    const record = (await this.options.store.load())[service];
    if (!provider.canRefresh || !record?.refreshToken) {
      return record;
    }

    log.info(`Refreshing ${SERVICE_NAMES[service]} access token...`);
    const grant = await provider.refresh(record.refreshToken);
    // Providers that do not rotate refresh tokens leave it out of the response
    const refreshed = this.toRecord(grant, record.refreshToken);
    await this.options.store.update(service, refreshed);
    this.states[service] = "authenticated";
    log.info(`${SERVICE_NAMES[service]} access token refreshed`);
    return refreshed;
  }

  /** After a live call was refused, the credential is treated as revoked: drop it and authorize again. */
  async reauthenticate(service: ServiceId): Promise<TokenRecord> {
    log.warn(`${SERVICE_NAMES[service]} rejected the stored credential, re-authorizing`);
    this.states[service] = "revoked";
    await this.options.store.update(service, null);
    this.states[service] = "unauthenticated";
    return this.authenticate(service);
  }

  /** Resolve a usable token for the service, authorizing or refreshing when that is possible. */
  async ensureToken(service: ServiceId): Promise<TokenRecord> {
    const provider = this.options.providers[service];
    const record = (await this.options.store.load())[service];
    const expired = record ? this.options.store.isExpired(record, this.now()) : false;
    const plan = planTokenAction(record, expired, provider.canRefresh);

    switch (plan.action) {
      case "use":
        this.states[service] = "authenticated";
        return plan.record;
      case "authenticate":
        log.info(`No ${SERVICE_NAMES[service]} token stored, starting authorization`);
        return this.authenticate(service);
      case "refresh":
        this.states[service] = "expired";
        return this.refreshOrAuthenticate(service);
      case "manual":
        this.states[service] = "expired";
        throw new ManualReauthRequiredError(service);
    }
  }

  private async refreshOrAuthenticate(service: ServiceId): Promise<TokenRecord> {
    try {
      const refreshed = await this.refresh(service);
      if (refreshed) return refreshed;
    } catch (error) {
      // Only a refused grant sends the user back through authorization
      if (!(error instanceof TokenExchangeError)) throw error;
      log.warn(`${SERVICE_NAMES[service]} token refresh failed, falling back to authorization`, {
        error: errorMessage(error),
      });
    }
    return this.authenticate(service);
  }

  private async runAuthorization(service: ServiceId): Promise<TokenRecord> {
    const provider = this.options.providers[service];
    const state = randomBytes(32).toString("base64url");
    const codeVerifier = provider.usesPkce ? randomBytes(64).toString("base64url") : undefined;
    const url = provider.authorizationUrl({ state, codeVerifier });

    this.states[service] = "awaiting-user-grant";
    log.info(`Starting ${SERVICE_NAMES[service]} authorization`);

    try {
      const callback = await this.options.listener.waitForCallback({
        timeoutMs: this.options.timeoutMs,
        onListening: () => this.prompt(service, url),
        signal: this.options.signal,
      });

      if (callback.state !== state) {
        throw new StateMismatchError(service);
      }
      if (callback.error || !callback.code) {
        throw new AuthorizationDeniedError(service, callback.error ?? "no authorization code in callback");
      }

      const grant = await provider.exchangeCode(callback.code, codeVerifier);
      const record = this.toRecord(grant);
      await this.options.store.update(service, record);
      this.states[service] = "authenticated";
      log.info(`${SERVICE_NAMES[service]} authorization complete`);
      return record;
    } catch (error) {
      this.states[service] = "unauthenticated";
      if (error instanceof CallbackTimeoutError) {
        throw new AuthTimeoutError(service, error.timeoutMs);
      }
      throw error;
    }
  }

  private toRecord(grant: TokenGrant, previousRefreshToken?: string): TokenRecord {
    const refreshToken = grant.refreshToken ?? previousRefreshToken;
    return {
      accessToken: grant.accessToken,
      ...(refreshToken ? { refreshToken } : {}),
      expiresAt: grant.expiresInSeconds ? this.now() + grant.expiresInSeconds * 1000 : null,
    };
  }
}

