import type { ListEntry, ListSnapshot, ServiceId, SyncDecision, SyncMode } from "@/sync/types";
import { SERVICE_NAMES } from "@/sync/types";
import { scoresEquivalent } from "./score";

export interface ResolveOptions {
  mode: SyncMode;
  /** When false, scores never cause an update. */
  compareScores: boolean;
}

interface IndexedSnapshot {
  service: ServiceId;
  byKey: Map<string, ListEntry>;
  duplicates: Set<string>;
  unmapped: ListEntry[];
}

/**
 * Work out, title by title, what each service needs written so both lists
 * converge. Pure: the result depends only on the two snapshots and options,
 * and comes back ordered by correlation key.
 */
export function resolve(a: ListSnapshot, b: ListSnapshot, options: ResolveOptions): SyncDecision[] {
  if (a.service === b.service) {
    throw new Error(`Cannot resolve two snapshots of the same service (${a.service})`);
  }

  const left = indexSnapshot(a);
  const right = indexSnapshot(b);
  const decisions: SyncDecision[] = [];

  for (const side of [left, right]) {
    for (const entry of side.unmapped) {
      decisions.push({
        kind: "unresolvable",
        key: `${side.service}:${entry.ids[side.service] ?? entry.title}`,
        title: entry.title,
        service: side.service,
        reason: `${SERVICE_NAMES[side.service]} entry has no cross-service id`,
      });
    }
  }

  const keys = new Set([...left.byKey.keys(), ...right.byKey.keys()]);
  for (const key of keys) {
    const duplicatedIn = [left, right].find((side) => side.duplicates.has(key));
    if (duplicatedIn) {
      decisions.push({
        kind: "unresolvable",
        key,
        title: (left.byKey.get(key) ?? right.byKey.get(key))?.title ?? key,
        service: duplicatedIn.service,
        reason: `key appears more than once in the ${SERVICE_NAMES[duplicatedIn.service]} list`,
      });
      continue;
    }
    decisions.push(decide(key, left, right, options));
  }

  return decisions.sort((x, y) => x.key.localeCompare(y.key, "en", { numeric: true }));
}

export function entriesEquivalent(x: ListEntry, y: ListEntry, compareScores: boolean): boolean {
  return (
    x.status === y.status &&
    x.progress === y.progress &&
    x.rewatched === y.rewatched &&
    (x.notes ?? "") === (y.notes ?? "") &&
    (!compareScores || scoresEquivalent(x.score, y.score))
  );
}

/** Whether the mode lets data flow out of `from` into the other service. */
export function canPush(from: ServiceId, mode: SyncMode): boolean {
  switch (mode) {
    case "bidirectional":
      return true;
    case "anilist-to-mal":
      return from === "anilist";
    case "mal-to-anilist":
      return from === "mal";
  }
}

function decide(key: string, left: IndexedSnapshot, right: IndexedSnapshot, options: ResolveOptions): SyncDecision {
  const l = left.byKey.get(key);
  const r = right.byKey.get(key);

  if (l && r) {
    if (entriesEquivalent(l, r, options.compareScores)) {
      return { kind: "noop", key, title: l.title };
    }
    const winner =
      options.mode === "bidirectional" ? newer(l, r) : canPush(left.service, options.mode) ? "left" : "right";
    if (winner === "left") return update(key, l, r, right.service);
    if (winner === "right") return update(key, r, l, left.service);
    return { kind: "noop", key, title: l.title };
  }

  // Present on one side only: only a writable destination gets the entry
  if (l) {
    return canPush(left.service, options.mode)
      ? update(key, l, undefined, right.service)
      : { kind: "noop", key, title: l.title };
  }
  if (r) {
    return canPush(right.service, options.mode)
      ? update(key, r, undefined, left.service)
      : { kind: "noop", key, title: r.title };
  }
  return { kind: "noop", key, title: key };
}

/**
 * Strictly later `updatedAt` wins; a tie has no winner. When either side lacks
 * a timestamp, strictly higher progress wins instead.
 */
function newer(l: ListEntry, r: ListEntry): "left" | "right" | null {
  if (l.updatedAt !== null && r.updatedAt !== null) {
    if (l.updatedAt > r.updatedAt) return "left";
    if (r.updatedAt > l.updatedAt) return "right";
    return null;
  }
  if (l.progress > r.progress) return "left";
  if (r.progress > l.progress) return "right";
  return null;
}

function update(key: string, source: ListEntry, counterpart: ListEntry | undefined, target: ServiceId): SyncDecision {
  return {
    kind: "update",
    key,
    title: source.title,
    target,
    entry: {
      ...source,
      ids: { ...counterpart?.ids, ...source.ids },
    },
  };
}

function indexSnapshot(snapshot: ListSnapshot): IndexedSnapshot {
  const byKey = new Map<string, ListEntry>();
  const duplicates = new Set<string>();
  const unmapped: ListEntry[] = [];

  for (const entry of snapshot.entries) {
    if (entry.externalKey === null) {
      unmapped.push(entry);
    } else if (byKey.has(entry.externalKey)) {
      duplicates.add(entry.externalKey);
    } else {
      byKey.set(entry.externalKey, entry);
    }
  }

  return { service: snapshot.service, byKey, duplicates, unmapped };
}
