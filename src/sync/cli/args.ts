import { z } from "zod";
import { SERVICES, SYNC_MODES, type ServiceId, type SyncMode } from "@/sync/types";
import { LOG_LEVELS, type LogLevel } from "@/sync/logger";

export type CliCommand =
  | { command: "auth"; services: ServiceId[] }
  | {
      command: "run";
      once: boolean;
      dryRun: boolean;
      webUi: boolean;
      mode?: SyncMode;
      intervalMinutes?: number;
      port?: number;
      host?: string;
      logLevel?: LogLevel;
    }
  | { command: "status" }
  | { command: "help" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `Usage: anime-sync <command> [options]

Commands:
  auth     Authorize AniList and/or MyAnimeList
           --service anilist|mal|both
  run      Sync the two lists (scheduled by default)
           --once                run a single cycle and exit
           --mode <mode>         ${SYNC_MODES.join(" | ")}
           --dry-run             decide but do not write
           --interval <minutes>  time between scheduled cycles
           --no-web-ui           do not start the status page
           --port <n>            status page port
           --host <h>            status page host
           --log-level <level>   ${LOG_LEVELS.join(" | ")}
  status   Check stored tokens`;

const BOOLEAN_FLAGS = new Set(["--once", "--dry-run", "--no-web-ui", "--help", "-h"]);

const serviceFlag = z.enum(["anilist", "mal", "both"]);
const positiveInt = z.coerce.number().int().positive();

/** Split argv into the command name and its flags; `--flag value` and `--flag=value` both work. */
function tokenize(argv: string[]): { command: string | undefined; flags: Map<string, string | true> } {
  const flags = new Map<string, string | true>();
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (!arg.startsWith("-")) {
      if (command !== undefined) throw new CliUsageError(`Unexpected argument: ${arg}`);
      command = arg;
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq > 0) {
      flags.set(arg.slice(0, eq), arg.slice(eq + 1));
    } else if (BOOLEAN_FLAGS.has(arg)) {
      flags.set(arg, true);
    } else {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new CliUsageError(`${arg} needs a value`);
      }
      flags.set(arg, value);
      i++;
    }
  }
  return { command, flags };
}

function pick<T>(
  flags: Map<string, string | true>,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined {
  const raw = flags.get(name);
  flags.delete(name);
  if (raw === undefined) return undefined;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CliUsageError(`Invalid value for ${name}: ${String(raw)}`);
  }
  return parsed.data;
}

function take(flags: Map<string, string | true>, name: string): boolean {
  const present = flags.has(name);
  flags.delete(name);
  return present;
}

function rejectLeftovers(flags: Map<string, string | true>): void {
  const [unknown] = flags.keys();
  if (unknown !== undefined) throw new CliUsageError(`Unknown option: ${unknown}`);
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { command, flags } = tokenize(argv);
  if (take(flags, "--help") || take(flags, "-h") || command === "help") {
    return { command: "help" };
  }

  switch (command ?? "run") {
    case "auth": {
      const service = pick(flags, "--service", serviceFlag);
      rejectLeftovers(flags);
      const services: ServiceId[] = service === undefined ? [] : service === "both" ? [...SERVICES] : [service];
      return { command: "auth", services };
    }
    case "run": {
      const parsed: CliCommand = {
        command: "run",
        once: take(flags, "--once"),
        dryRun: take(flags, "--dry-run"),
        webUi: !take(flags, "--no-web-ui"),
        mode: pick(flags, "--mode", z.enum(SYNC_MODES)),
        intervalMinutes: pick(flags, "--interval", positiveInt),
        port: pick(flags, "--port", positiveInt),
        host: pick(flags, "--host", z.string().min(1)),
        logLevel: pick(flags, "--log-level", z.enum(LOG_LEVELS)),
      };
      rejectLeftovers(flags);
      return parsed;
    }
    case "status":
      rejectLeftovers(flags);
      return { command: "status" };
    default:
      throw new CliUsageError(`Unknown command: ${command ?? ""}`);
  }
}
