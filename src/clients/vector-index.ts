export type IndexScalar = string | number | boolean;

export type IndexFieldCondition = {
  key: string;
  match: { value: IndexScalar };
};

export type IndexFilter = {
  must?: IndexCondition[];
  should?: IndexCondition[];
};

export type IndexCondition = IndexFieldCondition | IndexFilter;

export type IndexSparseVector = {
  indices: number[];
  values: number[];
};

export type IndexQueryRequest = {
  query: number[] | IndexSparseVector;
  using: string;
  limit: number;
  filter?: IndexFilter;
};

export type IndexPoint = {
  id: string | number;
  score: number;
  payload: Record<string, unknown>;
};

/**
 * The read surface the search pipeline needs from a Qdrant-compatible index.
 * `query` stops with the signal's reason once it aborts.
 */
export interface VectorIndexClient {
  query(collection: string, request: IndexQueryRequest, signal?: AbortSignal): Promise<IndexPoint[]>;
  collectionExists(collection: string): Promise<boolean>;
  listCollections(): Promise<string[]>;
}

const matchesCondition = (payload: Record<string, unknown>, condition: IndexCondition): boolean =>
  "key" in condition ? payload[condition.key] === condition.match.value : matchesIndexFilter(payload, condition);

/** Evaluates a filter with the index's semantics: every `must`, and at least one `should` when present. */
export const matchesIndexFilter = (payload: Record<string, unknown>, filter: IndexFilter | undefined): boolean => {
  if (!filter) {
    return true;
  }
  const must = filter.must ?? [];
  const should = filter.should ?? [];
  return (
    must.every((condition) => matchesCondition(payload, condition)) &&
    (should.length === 0 || should.some((condition) => matchesCondition(payload, condition)))
  );
};
