import type { ServiceId } from "@/sync/types";
import { SERVICE_NAMES } from "@/sync/types";

export class ConfigInvalidError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Configuration is invalid:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
    this.name = "ConfigInvalidError";
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class AuthTimeoutError extends Error {
  constructor(public readonly service: ServiceId, timeoutMs: number) {
    super(`${SERVICE_NAMES[service]} authorization was not completed within ${Math.round(timeoutMs / 1000)}s`);
    this.name = "AuthTimeoutError";
  }
}

export class StateMismatchError extends Error {
  constructor(public readonly service: ServiceId) {
    super(`${SERVICE_NAMES[service]} authorization callback carried an unexpected state value`);
    this.name = "StateMismatchError";
  }
}

export class AuthorizationDeniedError extends Error {
  constructor(public readonly service: ServiceId, reason: string) {
    super(`${SERVICE_NAMES[service]} authorization was not granted: ${reason}`);
    this.name = "AuthorizationDeniedError";
  }
}

export class TokenExchangeError extends Error {
  constructor(
    public readonly service: ServiceId,
    public readonly status: number,
    detail: string
  ) {
    super(`${SERVICE_NAMES[service]} token request failed: ${status} ${detail}`.trim());
    this.name = "TokenExchangeError";
  }
}

/** Expired credential that cannot be refreshed automatically. */
export class ManualReauthRequiredError extends Error {
  constructor(public readonly service: ServiceId) {
    super(`${SERVICE_NAMES[service]} token has expired; run \`anime-sync auth --service ${service}\``);
    this.name = "ManualReauthRequiredError";
  }
}
