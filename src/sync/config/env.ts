import { existsSync, readFileSync } from "fs";
import path from "path";
import { parse } from "dotenv";
import { z } from "zod";
import { LOG_LEVELS } from "@/sync/logger";
import { SYNC_MODES } from "@/sync/types";

// Values shipped in .env.example that mean "not filled in yet"
const PLACEHOLDER = /^YOUR_[A-Z_]+_HERE$/;

const credential = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`)
    .refine((v) => !PLACEHOLDER.test(v), `${name} still holds the placeholder value`);

const integer = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

const envSchema = z.object({
  ANILIST_CLIENT_ID: credential("ANILIST_CLIENT_ID"),
  ANILIST_CLIENT_SECRET: credential("ANILIST_CLIENT_SECRET"),
  ANILIST_USERNAME: credential("ANILIST_USERNAME"),
  MAL_CLIENT_ID: credential("MAL_CLIENT_ID"),
  MAL_CLIENT_SECRET: credential("MAL_CLIENT_SECRET"),

  OAUTH_PORT: integer(18080),
  OAUTH_REDIRECT_URI: z.string().url().optional(),
  OAUTH_TIMEOUT_SECONDS: integer(300),

  SYNC_MODE: z.enum(SYNC_MODES).default("bidirectional"),
  SYNC_SCORES: flag("true"),
  SYNC_DRY_RUN: flag("false"),
  SYNC_INTERVAL_MINUTES: z.coerce.number().int().min(1).default(360),
  SYNC_CONFIG_RETRY_SECONDS: z.coerce.number().int().min(1).default(60),
  SYNC_TOKEN_FILE: z.string().default("data/tokens.json"),
  SYNC_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  TOKEN_EXPIRY_MARGIN_SECONDS: integer(300),

  ANILIST_MIN_REQUEST_INTERVAL_MS: integer(700),
  MAL_MIN_REQUEST_INTERVAL_MS: integer(500),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(4),
  RETRY_BASE_DELAY_MS: integer(1000),
  RETRY_MAX_DELAY_MS: integer(30000),

  WEB_UI_HOST: z.string().default("0.0.0.0"),
  WEB_UI_PORT: integer(8080),
});

export type SyncEnv = z.infer<typeof envSchema>;

export type ConfigCheck =
  | { valid: true; env: SyncEnv }
  | { valid: false; problems: string[] };

export function defaultEnvFile(): string {
  return path.resolve(process.cwd(), ".env");
}

/**
 * Merge the .env file (if any) under the process environment. The file is read
 * on every call so a running service notices edits on its next revalidation.
 */
export function readEnvSource(
  envFile: string = defaultEnvFile(),
  processEnv: NodeJS.ProcessEnv = process.env
): Record<string, string | undefined> {
  const fromFile = existsSync(envFile) ? parse(readFileSync(envFile)) : {};
  return { ...fromFile, ...processEnv };
}

export function checkConfig(source: Record<string, string | undefined> = readEnvSource()): ConfigCheck {
  // Empty strings count as unset so defaults apply
  const cleaned = Object.fromEntries(Object.entries(source).filter(([, v]) => v !== undefined && v !== ""));
  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    return {
      valid: false,
      problems: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    };
  }
  return { valid: true, env: result.data };
}

export function redirectUri(env: SyncEnv): string {
  return env.OAUTH_REDIRECT_URI ?? `http://localhost:${env.OAUTH_PORT}/callback`;
}
