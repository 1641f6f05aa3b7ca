import type { CandidateMode, DocumentRecord, FusedResult, ModeCandidateList } from "./types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const DEFAULT_RRF_K = 60;

export const DEFAULT_TEMPORAL_HALF_LIFE_DAYS = 30;

export interface FusionOptions {
  rrfK?: number;
  temporalRelevance?: number;
  halfLifeDays?: number;
  /** Maximum number of fused results; everything when omitted. */
  limit?: number;
  now?: () => number;
}

/**
 * Score multiplier in `[1 - t, 1]`: `1 - t * (1 - 2^(-age / halfLife))`.
 * Records without a parseable `updatedAt` and future timestamps keep their score.
 */
export const temporalDecayMultiplier = (
  updatedAt: string | null,
  temporalRelevance: number,
  halfLifeDays: number,
  nowMs: number
): number => {
  if (temporalRelevance <= 0 || !updatedAt) {
    return 1;
  }
  const timestamp = Date.parse(updatedAt);
  if (Number.isNaN(timestamp)) {
    return 1;
  }
  const ageDays = Math.max(0, nowMs - timestamp) / MS_PER_DAY;
  const decayed = 1 - Math.pow(2, -ageDays / halfLifeDays);
  return 1 - Math.min(1, temporalRelevance) * decayed;
};

type Accumulator = {
  documentId: string;
  document: DocumentRecord;
  modeRanks: Partial<Record<CandidateMode, number>>;
};

const FUSED_MODES: readonly CandidateMode[] = ["dense", "sparse"];

export const reciprocalRankScore = (modeRanks: Partial<Record<CandidateMode, number>>, rrfK: number): number =>
  FUSED_MODES.reduce((score, mode) => {
    const rank = modeRanks[mode];
    return rank === undefined ? score : score + 1 / (rrfK + rank);
  }, 0);

/**
 * Reciprocal rank fusion over per-mode ranked lists, optionally decayed by
 * record age. Ordering is by final score, then `documentId`, so the result
 * does not depend on list or map iteration order.
 */
export const fuseRankedLists = (lists: ModeCandidateList[], options: FusionOptions = {}): FusedResult[] => {
  const rrfK = options.rrfK ?? DEFAULT_RRF_K;
  const temporalRelevance = options.temporalRelevance ?? 0;
  const halfLifeDays = options.halfLifeDays ?? DEFAULT_TEMPORAL_HALF_LIFE_DAYS;
  const nowMs = (options.now ?? Date.now)();

  const byDocument = new Map<string, Accumulator>();
  for (const list of lists) {
    for (const candidate of list.candidates) {
      const entry = byDocument.get(candidate.documentId) ?? {
        documentId: candidate.documentId,
        document: candidate.document,
        modeRanks: {}
      };
      // A document counts once per mode, at its best rank.
      const previousRank = entry.modeRanks[list.mode];
      entry.modeRanks[list.mode] = previousRank === undefined ? candidate.rank : Math.min(previousRank, candidate.rank);
      byDocument.set(candidate.documentId, entry);
    }
  }

  const fused = [...byDocument.values()]
    .map((entry) => {
      const rrfScore = reciprocalRankScore(entry.modeRanks, rrfK);
      return {
        documentId: entry.documentId,
        document: entry.document,
        modeRanks: entry.modeRanks,
        fusedScore:
          temporalRelevance > 0
            ? rrfScore * temporalDecayMultiplier(entry.document.updatedAt, temporalRelevance, halfLifeDays, nowMs)
            : rrfScore
      };
    })
    .sort(
      (a, b) =>
        b.fusedScore - a.fusedScore || (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0)
    );

  const limited = options.limit === undefined ? fused : fused.slice(0, Math.max(0, options.limit));
  return limited.map((entry, index) => ({ ...entry, rank: index + 1 }));
};
