export type MetadataValue = string | number | boolean;

export type DocumentRecord = {
  id: string;
  embeddableText: string;
  displayText: string;
  sourceTable: string | null;
  metadata: Record<string, MetadataValue>;
  updatedAt: string | null;
};

export type RetrievalMode = "dense" | "sparse" | "hybrid";

export type CandidateMode = Exclude<RetrievalMode, "hybrid">;

export type FilterExpression =
  | { kind: "match_all" }
  | { kind: "equals"; key: string; value: MetadataValue }
  | { kind: "and"; clauses: FilterExpression[] }
  | { kind: "or"; clauses: FilterExpression[] };

export type SearchRequest = {
  query: string;
  filter: FilterExpression;
  retrievalMode: RetrievalMode;
  generateAnswer: boolean;
  rerank: boolean;
  temporalRelevance: number;
  topK: number;
};

export type SparseVector = {
  indices: number[];
  values: number[];
};

export type QueryVectors = {
  dense: number[] | null;
  sparse: SparseVector | null;
};

export type ScoredCandidate = {
  documentId: string;
  rawScore: number;
  mode: CandidateMode;
  rank: number;
  document: DocumentRecord;
};

export type ModeCandidateList = {
  mode: CandidateMode;
  candidates: ScoredCandidate[];
};

export type FusedResult = {
  documentId: string;
  fusedScore: number;
  rank: number;
  document: DocumentRecord;
  modeRanks: Partial<Record<CandidateMode, number>>;
  rerankScore?: number;
};

export type Citation = {
  marker: number;
  documentId: string;
};

export type AnswerResponse = {
  completion: string | null;
  citations: Citation[];
  results: FusedResult[];
  fallbackTriggered: boolean;
};

export type PipelineStage =
  | "received"
  | "embedding"
  | "retrieving"
  | "fusing"
  | "reranking"
  | "synthesizing"
  | "done"
  | "errored";

export interface SearchSettings {
  rrfK: number;
  temporalHalfLifeDays: number;
  minScoreThreshold: number;
  defaultTopK: number;
  maxTopK: number;
  candidateTopK: number;
  rerankTopN: number;
  filterFields: readonly string[];
  callTimeoutMs: number;
  generationTimeoutMs: number;
}
