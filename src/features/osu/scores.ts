/**
 * tidewatch — src/features/osu/scores.ts
 * WHAT: Normalizes osu! best scores into stored snapshots and diffs two snapshots.
 * WHY: Snapshots are compared every cycle; storing only the fields the embed needs keeps
 *      comparisons stable across unrelated API additions.
 * FLOWS:
 *  - normalizeScores(apiScores) → TrackedScore[] (index = position in the top list)
 *  - diffScores(previous, fresh) → ScoreUpdate[] (new | changed), fresh order
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import type { ApiScore } from "./api.js";
import { OSU_MODES } from "./modes.js";

export const trackedScoreSchema = z.object({
  /** 0-based position in the player's top list */
  index: z.number().int(),
  beatmap: z.object({
    id: z.number(),
    version: z.string(),
    difficultyRating: z.number(),
    ar: z.number(),
    cs: z.number(),
    accuracy: z.number(),
    drain: z.number(),
    url: z.string(),
    bpm: z.number().nullable(),
    countCircles: z.number(),
    countSliders: z.number(),
    countSpinners: z.number(),
  }),
  mode: z.enum(OSU_MODES),
  createdAt: z.string(),
  score: z.number(),
  pp: z.number().nullable(),
  /** 0..1 */
  accuracy: z.number(),
  maxCombo: z.number(),
  /** Mod acronyms joined ("HDDT"), or "NM" */
  mods: z.string(),
  rank: z.string(),
  statistics: z.object({
    geki: z.number(),
    katu: z.number(),
    c300: z.number(),
    c100: z.number(),
    c50: z.number(),
    miss: z.number(),
  }),
  user: z.object({ username: z.string(), avatarUrl: z.string() }),
  beatmapset: z.object({
    id: z.number(),
    title: z.string(),
    artist: z.string(),
    cover: z.string(),
    creatorId: z.number(),
    creator: z.string(),
    status: z.string(),
  }),
});
export type TrackedScore = z.infer<typeof trackedScoreSchema>;

/** Stored snapshots are read back through this */
export const snapshotSchema = z.array(trackedScoreSchema);

export type ScoreUpdate =
  | { kind: "new"; score: TrackedScore }
  | {
      kind: "changed";
      score: TrackedScore;
      oldPp: number | null;
      oldIndex: number;
      oldAccuracy: number;
    };

export function normalizeScores(scores: readonly ApiScore[]): TrackedScore[] {
  return scores.map((s, index) => ({
    index,
    beatmap: {
      id: s.beatmap.id,
      version: s.beatmap.version,
      difficultyRating: s.beatmap.difficulty_rating,
      ar: s.beatmap.ar,
      cs: s.beatmap.cs,
      accuracy: s.beatmap.accuracy,
      drain: s.beatmap.drain,
      url: s.beatmap.url,
      bpm: s.beatmap.bpm,
      countCircles: s.beatmap.count_circles,
      countSliders: s.beatmap.count_sliders,
      countSpinners: s.beatmap.count_spinners,
    },
    mode: s.mode,
    createdAt: s.created_at,
    score: s.score,
    pp: s.pp,
    accuracy: s.accuracy,
    maxCombo: s.max_combo,
    mods: s.mods.length > 0 ? s.mods.join("") : "NM",
    rank: s.rank,
    statistics: {
      geki: s.statistics.count_geki ?? 0,
      katu: s.statistics.count_katu ?? 0,
      c300: s.statistics.count_300 ?? 0,
      c100: s.statistics.count_100 ?? 0,
      c50: s.statistics.count_50 ?? 0,
      miss: s.statistics.count_miss ?? 0,
    },
    user: { username: s.user.username, avatarUrl: s.user.avatar_url },
    beatmapset: {
      id: s.beatmapset.id,
      title: s.beatmapset.title,
      artist: s.beatmapset.artist,
      cover: s.beatmapset.covers.cover,
      creatorId: s.beatmapset.user_id,
      creator: s.beatmapset.creator,
      status: s.beatmapset.status,
    },
  }));
}

/**
 * Scores on the same beatmap with the same play date are unchanged and dropped.
 * Same beatmap with a different date is a changed play; anything else is new.
 */
export function diffScores(
  previous: readonly TrackedScore[],
  fresh: readonly TrackedScore[]
): ScoreUpdate[] {
  const byBeatmap = new Map<number, TrackedScore>();
  for (const score of previous) {
    byBeatmap.set(score.beatmap.id, score);
  }

  const updates: ScoreUpdate[] = [];
  for (const score of fresh) {
    const old = byBeatmap.get(score.beatmap.id);
    if (!old) {
      updates.push({ kind: "new", score });
      continue;
    }
    if (old.createdAt === score.createdAt) continue;
    updates.push({
      kind: "changed",
      score,
      oldPp: old.pp,
      oldIndex: old.index,
      oldAccuracy: old.accuracy,
    });
  }
  return updates;
}

/**
 * Snapshot equality for "did anything change since last cycle".
 */
export function sameSnapshot(a: readonly TrackedScore[], b: readonly TrackedScore[]): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}
