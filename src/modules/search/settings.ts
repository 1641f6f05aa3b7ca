import { config, type Config } from "../../config/index.js";
import type { SearchSettings } from "./types.js";

export const resolveSearchSettings = (source: Config = config): SearchSettings => ({
  rrfK: source.SEARCH_RRF_K,
  temporalHalfLifeDays: source.SEARCH_TEMPORAL_HALF_LIFE_DAYS,
  minScoreThreshold: source.SEARCH_MIN_SCORE_THRESHOLD,
  defaultTopK: source.SEARCH_DEFAULT_TOP_K,
  maxTopK: source.SEARCH_MAX_TOP_K,
  candidateTopK: source.SEARCH_CANDIDATE_TOP_K,
  rerankTopN: source.SEARCH_RERANK_TOP_N,
  filterFields: source.SEARCH_FILTER_FIELDS,
  callTimeoutMs: source.SEARCH_CALL_TIMEOUT_MS,
  generationTimeoutMs: source.SEARCH_GENERATION_TIMEOUT_MS
});
