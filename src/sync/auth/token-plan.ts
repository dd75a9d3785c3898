import type { TokenRecord } from "@/sync/types";

export type TokenPlan =
  | { action: "use"; record: TokenRecord }
  | { action: "authenticate" }
  | { action: "refresh"; record: TokenRecord }
  | { action: "manual"; record: TokenRecord };

/**
 * What to do with a service's stored credential before a cycle may use it.
 * A missing record can be fixed by authorizing now; an expired one only by
 * refreshing, and only when the provider can refresh and we hold a refresh token.
 */
export function planTokenAction(
  record: TokenRecord | undefined,
  expired: boolean,
  canRefresh: boolean
): TokenPlan {
  if (!record) return { action: "authenticate" };
  if (!expired) return { action: "use", record };
  if (canRefresh && record.refreshToken) return { action: "refresh", record };
  return { action: "manual", record };
}
