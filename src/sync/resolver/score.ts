/**
 * Scores are compared on one canonical 0–100 scale. AniList stores 0–100
 * already; MyAnimeList stores whole points 0–10. Zero means "no score" on both.
 *
 * Because MyAnimeList cannot hold anything finer than ten canonical points,
 * equality is decided per ten-point bucket: MAL 7 ≡ AniList 70–79. Canonical
 * 1–19 all land in bucket 1 (MAL has no non-zero score below 1), and 100 is
 * its own bucket.
 */

export type ScoreScale = "point100" | "point10";

const SCALE_FACTOR: Record<ScoreScale, number> = { point100: 1, point10: 10 };

/** Raw service score → canonical 0–100, or null when unscored. */
export function normalizeScore(raw: number | null | undefined, scale: ScoreScale): number | null {
  if (raw === null || raw === undefined || !Number.isFinite(raw) || raw <= 0) {
    return null;
  }
  return Math.min(100, raw * SCALE_FACTOR[scale]);
}

export function scoreBucket(score: number): number {
  return Math.max(1, Math.floor(score / 10));
}

/** Canonical 0–100 → the raw value a service accepts; null stays null. */
export function toServiceScale(score: number | null, scale: ScoreScale): number | null {
  if (score === null) return null;
  return scale === "point10" ? scoreBucket(score) : Math.round(score);
}

export function scoresEquivalent(a: number | null, b: number | null): boolean {
  if (a === null || b === null) return a === b;
  return scoreBucket(a) === scoreBucket(b);
}
