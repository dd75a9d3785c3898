import type { ListEntry, WatchStatus } from "@/sync/types";
import { normalizeScore } from "@/sync/resolver/score";
import type { AniListEntryResponse, AniListStatus } from "./types";

const STATUS_FROM_ANILIST: Record<AniListStatus, WatchStatus> = {
  CURRENT: "watching",
  REPEATING: "watching",
  PLANNING: "planned",
  COMPLETED: "completed",
  DROPPED: "dropped",
  PAUSED: "paused",
};

const STATUS_TO_ANILIST: Record<WatchStatus, AniListStatus> = {
  watching: "CURRENT",
  planned: "PLANNING",
  completed: "COMPLETED",
  dropped: "DROPPED",
  paused: "PAUSED",
};

export function toAniListStatus(status: WatchStatus): AniListStatus {
  return STATUS_TO_ANILIST[status];
}

export function mapAniListEntry(raw: AniListEntryResponse): ListEntry {
  const { media } = raw;
  return {
    externalKey: media.idMal ? String(media.idMal) : null,
    ids: media.idMal ? { anilist: media.id, mal: media.idMal } : { anilist: media.id },
    title: media.title.romaji || media.title.english || media.title.native || `AniList #${media.id}`,
    status: STATUS_FROM_ANILIST[raw.status],
    progress: raw.progress ?? 0,
    score: normalizeScore(raw.score, "point100"),
    updatedAt: raw.updatedAt ? raw.updatedAt * 1000 : null,
    rewatched: raw.repeat ?? 0,
    notes: raw.notes || null,
  };
}
