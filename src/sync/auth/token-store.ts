import { randomUUID } from "crypto";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import type { ServiceId, TokenMap, TokenRecord } from "@/sync/types";
import { SERVICES } from "@/sync/types";
import { tokenFileSchema, type TokenFile } from "@/sync/types/api";
import { PersistenceError } from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";

const log = createChildLogger("token-store");

const DEFAULT_EXPIRY_MARGIN_MS = 5 * 60 * 1000;

/**
 * On-disk credential records, one per service.
 *
 * Every operation goes through a single queue, so a refresh writing its record
 * can never interleave with a save coming from another trigger. Writes land in
 * a temporary file first and are renamed over the real one.
 */
export class TokenStore {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly expiryMarginMs: number;

  constructor(
    private readonly filePath: string,
    options?: { expiryMarginMs?: number }
  ) {
    this.expiryMarginMs = options?.expiryMarginMs ?? DEFAULT_EXPIRY_MARGIN_MS;
  }

  get path(): string {
    return this.filePath;
  }

  load(): Promise<TokenMap> {
    return this.exclusive(() => this.read());
  }

  save(tokens: TokenMap): Promise<void> {
    return this.exclusive(() => this.write(tokens));
  }

  /** Replace (or with null, remove) one service's record. */
  update(service: ServiceId, record: TokenRecord | null): Promise<TokenMap> {
    return this.exclusive(async () => {
      const tokens = await this.read();
      if (record) {
        tokens[service] = record;
      } else {
        delete tokens[service];
      }
      await this.write(tokens);
      return tokens;
    });
  }

  /** Expired means within the safety margin of `expiresAt`, not only past it. */
  isExpired(record: TokenRecord, now: number = Date.now()): boolean {
    if (record.expiresAt === null) return false;
    return now >= record.expiresAt - this.expiryMarginMs;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async read(): Promise<TokenMap> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return {};
      log.warn("Token file could not be read, starting without tokens", {
        file: this.filePath,
        error: errorMessage(error),
      });
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log.warn("Token file is not valid JSON, starting without tokens", {
        file: this.filePath,
        error: errorMessage(error),
      });
      return {};
    }

    const parsed = tokenFileSchema.safeParse(json);
    if (!parsed.success) {
      log.warn("Token file has an unexpected shape, starting without tokens", {
        file: this.filePath,
        issues: parsed.error.issues.map((i) => i.message),
      });
      return {};
    }
    return fromFile(parsed.data);
  }

  private async write(tokens: TokenMap): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmp = path.join(dir, `.${path.basename(this.filePath)}.${randomUUID()}.tmp`);
    const body = `${JSON.stringify(toFile(tokens), null, 2)}\n`;

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmp, body, { encoding: "utf8", mode: 0o600 });
      await rename(tmp, this.filePath);
    } catch (error) {
      await rm(tmp, { force: true });
      throw new PersistenceError(`Could not persist tokens to ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    log.debug("Tokens saved", { file: this.filePath, services: Object.keys(tokens) });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function fromFile(file: TokenFile): TokenMap {
  const tokens: TokenMap = {};
  for (const service of SERVICES) {
    const stored = file.tokens[service];
    if (!stored) continue;
    tokens[service] = {
      accessToken: stored.accessToken,
      ...(stored.refreshToken ? { refreshToken: stored.refreshToken } : {}),
      expiresAt: stored.expiresAt === null ? null : Date.parse(stored.expiresAt),
    };
  }
  return tokens;
}

function toFile(tokens: TokenMap): TokenFile {
  const file: TokenFile = { tokens: {} };
  for (const service of SERVICES) {
    const record = tokens[service];
    if (!record) continue;
    file.tokens[service] = {
      accessToken: record.accessToken,
      ...(record.refreshToken ? { refreshToken: record.refreshToken } : {}),
      expiresAt: record.expiresAt === null ? null : new Date(record.expiresAt).toISOString(),
    };
  }
  return file;
}
