import { InvalidSearchRequestError, type InvalidRequestIssue } from "./errors.js";
import { MATCH_ALL, parseFilter } from "./filter.js";
import type { FilterExpression, RetrievalMode, SearchRequest, SearchSettings } from "./types.js";

/** Caller-facing request before validation; `filter` is the raw `{ must, should }` body. */
export interface SearchRequestInput {
  query: string;
  filter?: unknown;
  retrievalMode?: RetrievalMode;
  generateAnswer?: boolean;
  rerank?: boolean;
  temporalRelevance?: number;
  topK?: number;
}

/**
 * Validates a request before any stage runs. All issues are reported
 * together in one {@link InvalidSearchRequestError}.
 */
export const normalizeSearchRequest = (input: SearchRequestInput, settings: SearchSettings): SearchRequest => {
  const issues: InvalidRequestIssue[] = [];

  const query = input.query.trim();
  if (query.length === 0) {
    issues.push({ path: ["query"], message: "query must not be empty" });
  }

  const topK = input.topK ?? settings.defaultTopK;
  if (!Number.isInteger(topK) || topK < 1 || topK > settings.maxTopK) {
    issues.push({ path: ["limit"], message: `limit must be an integer between 1 and ${settings.maxTopK}` });
  }

  const temporalRelevance = input.temporalRelevance ?? 0;
  if (!Number.isFinite(temporalRelevance) || temporalRelevance < 0 || temporalRelevance > 1) {
    issues.push({ path: ["temporal_relevance"], message: "temporal_relevance must be between 0 and 1" });
  }

  let filter: FilterExpression = MATCH_ALL;
  try {
    filter = parseFilter(input.filter, settings.filterFields);
  } catch (error) {
    if (!(error instanceof InvalidSearchRequestError)) {
      throw error;
    }
    issues.push(...error.issues);
  }

  if (issues.length > 0) {
    throw new InvalidSearchRequestError(issues);
  }

  return {
    query,
    filter,
    retrievalMode: input.retrievalMode ?? "hybrid",
    generateAnswer: input.generateAnswer ?? true,
    rerank: input.rerank ?? true,
    temporalRelevance,
    topK
  };
};
