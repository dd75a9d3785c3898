import { readFileSync } from "fs";
import Fastify, { type FastifyInstance } from "fastify";
import type { RunStateSnapshot } from "@/sync/run-state";
import type { TriggerStatus } from "@/sync";
import type { TriggerResponse } from "@/sync/types/api";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("monitor");

/** The slice of the orchestrator the monitor may touch: read state, request a cycle. */
export interface MonitorSource {
  readonly state: { snapshot(): RunStateSnapshot };
  trigger(): TriggerStatus;
}

const DASHBOARD = readFileSync(new URL("./dashboard.html", import.meta.url), "utf8");

export function buildMonitorApp(source: MonitorSource): FastifyInstance {
  const app = Fastify({ logger: false, forceCloseConnections: true });

  app.get("/", async (_request, reply) => {
    return reply.type("text/html").send(DASHBOARD);
  });

  app.get("/api/status", async () => source.state.snapshot());

  // Start a cycle unless one is already running
  app.post("/api/sync/trigger", async (_request, reply) => {
    const status = source.trigger();
    log.info("Sync triggered via web UI", { status });
    const body: TriggerResponse = { status };
    return reply.code(202).send(body);
  });

  return app;
}

export async function startMonitor(
  source: MonitorSource,
  options: { host: string; port: number }
): Promise<FastifyInstance> {
  const app = buildMonitorApp(source);
  await app.listen({ host: options.host, port: options.port });
  log.info(`Web UI listening on http://${options.host}:${options.port}`);
  return app;
}
