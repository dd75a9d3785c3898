import type { FastifyInstance } from "fastify";
import { SyncOrchestrator } from "@/sync";
import type { SyncSettings } from "@/sync/runtime";
import { createRuntime } from "@/sync/runtime";
import { runScheduled } from "@/sync/run-loop";
import { startMonitor } from "@/sync/monitor/server";
import { checkConfig } from "@/sync/config/env";
import { createChildLogger, errorMessage, setLogLevel } from "@/sync/logger";
import { CliUsageError, USAGE, parseCliArgs, type CliCommand } from "./args";
import { runInteractiveAuth, runStatusCheck } from "./interactive";

const log = createChildLogger("cli");

const DEFAULT_INTERVAL_MINUTES = 360;
const DEFAULT_CONFIG_RETRY_SECONDS = 60;
const DEFAULT_WEB_UI = { host: "0.0.0.0", port: 8080 };

type RunCommand = Extract<CliCommand, { command: "run" }>;

/** SIGINT/SIGTERM abort the returned signal; a second signal exits at once. */
function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.warn(`Received ${signal} again, exiting now`);
      process.exit(130);
    }
    log.info(`Received ${signal}, finishing the current step and shutting down...`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return controller.signal;
}

async function run(cli: RunCommand): Promise<number> {
  const initial = checkConfig();
  setLogLevel(cli.logLevel ?? (initial.valid ? initial.env.SYNC_LOG_LEVEL : "info"));

  const signal = shutdownSignal();
  const overrides: Partial<SyncSettings> = {
    ...(cli.mode ? { mode: cli.mode } : {}),
    ...(cli.dryRun ? { dryRun: true } : {}),
  };
  const orchestrator = new SyncOrchestrator({
    createRuntime: (env) => createRuntime(env, { signal }),
    overrides,
    signal,
  });

  if (cli.once) {
    // Headless single cycle: print the report, exit non-zero unless it fully succeeded
    const report = await orchestrator.runCycle();
    console.log(JSON.stringify(report, null, 2));
    return report.outcome === "success" ? 0 : 1;
  }

  let monitor: FastifyInstance | null = null;
  if (cli.webUi) {
    monitor = await startMonitor(orchestrator, {
      host: cli.host ?? (initial.valid ? initial.env.WEB_UI_HOST : DEFAULT_WEB_UI.host),
      port: cli.port ?? (initial.valid ? initial.env.WEB_UI_PORT : DEFAULT_WEB_UI.port),
    });
  }

  try {
    await runScheduled(orchestrator, {
      intervalMs: () => {
        const current = checkConfig();
        const configured = current.valid ? current.env.SYNC_INTERVAL_MINUTES : DEFAULT_INTERVAL_MINUTES;
        const minutes = cli.intervalMinutes ?? configured;
        return minutes * 60_000;
      },
      configRetryMs: (initial.valid ? initial.env.SYNC_CONFIG_RETRY_SECONDS : DEFAULT_CONFIG_RETRY_SECONDS) * 1000,
      signal,
    });
  } finally {
    await monitor?.close();
  }
  return 0;
}

async function main(): Promise<number> {
  let cli: CliCommand;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error;
    console.error(`${error.message}\n\n${USAGE}`);
    return 2;
  }

  switch (cli.command) {
    case "help":
      console.log(USAGE);
      return 0;
    case "auth":
      return runInteractiveAuth(cli.services);
    case "status":
      return runStatusCheck();
    case "run":
      return run(cli);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("anime-sync failed:", errorMessage(err));
    process.exit(1);
  });
