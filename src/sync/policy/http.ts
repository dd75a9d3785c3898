import type { z } from "zod";
import { err, ok, type ServiceFailure, type ServiceResult } from "@/sync/types/result";
import { errorMessage } from "@/sync/logger";

export type RequestKind = "read" | "write";

const REQUEST_TIMEOUT_MS = 30_000;

export interface HttpReply {
  status: number;
  ok: boolean;
  /** Parsed JSON body, or null when the body was empty or not JSON. */
  body: unknown;
  text: string;
  retryAfterMs?: number;
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header || header.trim() === "") return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

export function classifyStatus(
  status: number,
  kind: RequestKind,
  message: string,
  retryAfterMs?: number
): ServiceFailure {
  if (status === 401 || status === 403) {
    return { type: "AuthFailure", status, message };
  }
  if (status === 408 || status === 429 || status >= 500) {
    return retryAfterMs === undefined
      ? { type: "TransientFailure", message }
      : { type: "TransientFailure", message, retryAfterMs };
  }
  if (kind === "write" && status >= 400) {
    return { type: "RejectedFailure", message };
  }
  return { type: "ProtocolFailure", message };
}

export function failureFor(reply: HttpReply, kind: RequestKind): ServiceFailure {
  const detail = reply.text.trim().slice(0, 200);
  const message = detail ? `HTTP ${reply.status}: ${detail}` : `HTTP ${reply.status}`;
  return classifyStatus(reply.status, kind, message, reply.retryAfterMs);
}

/** Send one request. Only a failure to get any response at all comes back as an error here. */
export async function sendRequest(url: string, init: RequestInit): Promise<ServiceResult<HttpReply>> {
  let response: Response;
  let text: string;
  try {
    response = await fetch(url, { ...init, signal: init.signal ?? AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    text = await response.text();
  } catch (error) {
    return err({ type: "TransientFailure", message: `Network error: ${errorMessage(error)}` });
  }

  const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
  return ok({
    status: response.status,
    ok: response.ok,
    body: parseJson(text),
    text,
    ...(retryAfterMs === undefined ? {} : { retryAfterMs }),
  });
}

export function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  what: string
): ServiceResult<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    const message = `Unexpected ${what} response${where}: ${issue?.message ?? "invalid"}`;
    return err({ type: "ProtocolFailure", message });
  }
  return ok(parsed.data);
}

function parseJson(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return null;
  }
}
