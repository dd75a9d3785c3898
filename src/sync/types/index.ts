import type { ServiceResult } from "./result";

export const SERVICES = ["anilist", "mal"] as const;
export type ServiceId = (typeof SERVICES)[number];

export const SERVICE_NAMES: Record<ServiceId, string> = {
  anilist: "AniList",
  mal: "MyAnimeList",
};

export const SYNC_MODES = ["anilist-to-mal", "mal-to-anilist", "bidirectional"] as const;
export type SyncMode = (typeof SYNC_MODES)[number];

export type WatchStatus = "watching" | "completed" | "planned" | "dropped" | "paused";

export interface ListEntry {
  /** Cross-service correlation key (the MyAnimeList anime id); null when the title is unmapped. */
  externalKey: string | null;
  /** Native ids known for this title, per service. */
  ids: Partial<Record<ServiceId, number>>;
  title: string;
  status: WatchStatus;
  progress: number;
  /** Canonical 0–100 score, null when unscored. */
  score: number | null;
  /** Last mutation on the owning service, epoch ms. */
  updatedAt: number | null;
  /** Completed rewatches. */
  rewatched: number;
  /** Free-text notes; null and "" both mean none. */
  notes: string | null;
}

export interface ListSnapshot {
  service: ServiceId;
  fetchedAt: number;
  entries: ListEntry[];
}

export type SyncDecision =
  | { kind: "noop"; key: string; title: string }
  | { kind: "update"; key: string; title: string; target: ServiceId; entry: ListEntry }
  | { kind: "unresolvable"; key: string; title: string; service: ServiceId; reason: string };

export type UpdateDecision = Extract<SyncDecision, { kind: "update" }>;

export interface WriteOptions {
  /** When false the target's score is left as it is. */
  writeScore: boolean;
}

/** What the sync cycle needs from a list service. */
export interface ListServiceClient {
  readonly service: ServiceId;
  fetchSnapshot(accessToken: string): Promise<ServiceResult<ListSnapshot>>;
  applyUpdate(accessToken: string, entry: ListEntry, options: WriteOptions): Promise<ServiceResult<void>>;
}

export interface TokenRecord {
  accessToken: string;
  refreshToken?: string;
  /** Absolute expiry, epoch ms; null when the provider did not say. */
  expiresAt: number | null;
}

export type TokenMap = Partial<Record<ServiceId, TokenRecord>>;

export type AuthState = "unauthenticated" | "awaiting-user-grant" | "authenticated" | "expired" | "revoked";

export type CyclePhase =
  | "idle"
  | "fetching-tokens"
  | "fetching-snapshots"
  | "resolving"
  | "applying-writes"
  | "reporting"
  | "sleeping";

export type CycleOutcome = "success" | "partial-failure" | "aborted";

export type AbortReason =
  | "config-invalid"
  | "manual-reauth-required"
  | "auth-failed"
  | "token-persistence"
  | "fetch-failed"
  | "shutdown"
  | "internal-error";

export interface EntryFailure {
  key: string;
  title: string;
  target: ServiceId;
  error: string;
}

export interface SyncReport {
  runId: string;
  startedAt: string;
  completedAt: string;
  mode: SyncMode | null;
  dryRun: boolean;
  outcome: CycleOutcome;
  abortReason?: AbortReason;
  message?: string;
  counts: {
    noop: number;
    updated: number;
    failed: number;
    skipped: number;
  };
  failures: EntryFailure[];
}
