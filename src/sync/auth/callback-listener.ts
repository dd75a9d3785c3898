import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("oauth-callback");

export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
}

export interface WaitOptions {
  timeoutMs: number;
  /** Called once the listener accepts connections. */
  onListening?: () => void;
  signal?: AbortSignal;
}

/** Thrown by a listener when no callback arrived in time; the orchestrator wraps it per service. */
export class CallbackTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`No authorization callback within ${timeoutMs}ms`);
    this.name = "CallbackTimeoutError";
  }
}

export interface CallbackListener {
  waitForCallback(options: WaitOptions): Promise<CallbackParams>;
}

const callbackQuerySchema = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

const DONE_PAGE = `<!doctype html>
<html>
<head><title>Authorization received</title></head>
<body>
  <h1>Authorization received</h1>
  <p>You can close this window and return to the terminal.</p>
</body>
</html>`;

/** The one-route app behind the listener; exposed separately so it can be exercised with inject(). */
export function buildCallbackApp(onCallback: (params: CallbackParams) => void): FastifyInstance {
  const app = Fastify({ logger: false, forceCloseConnections: true });

  app.get("/callback", async (request, reply) => {
    const parsed = callbackQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).type("text/plain").send("Malformed callback");
    }
    const { code, state, error, error_description } = parsed.data;
    onCallback({
      ...(code ? { code } : {}),
      ...(state ? { state } : {}),
      ...(error ? { error: error_description ?? error } : {}),
    });
    return reply.type("text/html").send(DONE_PAGE);
  });

  return app;
}

/** Short-lived listener bound to the redirect URI's port; serves exactly one callback. */
export class FastifyCallbackListener implements CallbackListener {
  constructor(
    private readonly port: number,
    private readonly host = "0.0.0.0"
  ) {}

  async waitForCallback({ timeoutMs, onListening, signal }: WaitOptions): Promise<CallbackParams> {
    let resolveCallback: (params: CallbackParams) => void = () => undefined;
    const received = new Promise<CallbackParams>((resolve) => {
      resolveCallback = resolve;
    });

    const app = buildCallbackApp((params) => resolveCallback(params));
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    try {
      await app.listen({ port: this.port, host: this.host });
      log.debug("Waiting for authorization callback", { port: this.port });
      onListening?.();

      const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new CallbackTimeoutError(timeoutMs)), timeoutMs);
        onAbort = () => reject(new CallbackTimeoutError(timeoutMs));
        if (signal?.aborted) onAbort();
        signal?.addEventListener("abort", onAbort, { once: true });
      });

      return await Promise.race([received, expired]);
    } finally {
      clearTimeout(timer);
      if (onAbort) signal?.removeEventListener("abort", onAbort);
      await app.close();
    }
  }
}
