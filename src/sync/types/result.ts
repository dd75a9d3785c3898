export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** How a call against a list service went wrong; drives the retry and re-auth decisions. */
export type ServiceFailure =
  | { type: "AuthFailure"; status: number; message: string }
  | { type: "TransientFailure"; message: string; retryAfterMs?: number }
  | { type: "ProtocolFailure"; message: string }
  | { type: "RejectedFailure"; message: string };

export type ServiceResult<T> = Result<T, ServiceFailure>;
