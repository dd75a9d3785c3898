import type { ListEntry, WatchStatus } from "@/sync/types";
import { normalizeScore, toServiceScale } from "@/sync/resolver/score";
import type { MalListItem, MalStatus } from "./types";

const STATUS_FROM_MAL: Record<MalStatus, WatchStatus> = {
  watching: "watching",
  completed: "completed",
  on_hold: "paused",
  dropped: "dropped",
  plan_to_watch: "planned",
};

const STATUS_TO_MAL: Record<WatchStatus, MalStatus> = {
  watching: "watching",
  completed: "completed",
  paused: "on_hold",
  dropped: "dropped",
  planned: "plan_to_watch",
};

export function mapMalItem(raw: MalListItem): ListEntry {
  const updatedAt = raw.list_status.updated_at ? Date.parse(raw.list_status.updated_at) : NaN;
  return {
    externalKey: String(raw.node.id),
    ids: { mal: raw.node.id },
    title: raw.node.title,
    status: STATUS_FROM_MAL[raw.list_status.status],
    progress: raw.list_status.num_episodes_watched,
    score: normalizeScore(raw.list_status.score, "point10"),
    updatedAt: Number.isNaN(updatedAt) ? null : updatedAt,
    rewatched: raw.list_status.num_times_rewatched ?? 0,
    notes: raw.list_status.comments || null,
  };
}

/** Form fields for PATCH /anime/{id}/my_list_status. */
export function toMalListStatusForm(entry: ListEntry, writeScore: boolean): URLSearchParams {
  const form = new URLSearchParams({
    status: STATUS_TO_MAL[entry.status],
    num_watched_episodes: String(entry.progress),
    num_times_rewatched: String(entry.rewatched),
    // An empty value clears the comments on MyAnimeList
    comments: entry.notes ?? "",
  });
  if (writeScore) {
    form.set("score", String(toServiceScale(entry.score, "point10") ?? 0));
  }
  return form;
}
