import { getQdrantClient } from "../../clients/qdrant.js";
import type { IndexPoint, IndexQueryRequest, VectorIndexClient } from "../../clients/vector-index.js";
import { config } from "../../config/index.js";
import { logWarn } from "../../observability/logger.js";
import { recordSearchOutcome } from "../../observability/metrics.js";
import { callWithPolicy } from "./call-policy.js";
import { RetrievalUnavailableError, SearchCancelledError, describeError } from "./errors.js";
import { matchesFilter, toQdrantFilter } from "./filter.js";
import type {
  CandidateMode,
  DocumentRecord,
  FilterExpression,
  MetadataValue,
  ModeCandidateList,
  QueryVectors,
  RetrievalMode,
  ScoredCandidate
} from "./types.js";

export interface RetrieveCandidatesInput {
  collection: string;
  vectors: QueryVectors;
  mode: RetrievalMode;
  filter: FilterExpression;
  topK: number;
  signal?: AbortSignal;
  requestId?: string;
}

export interface RetrieveCandidatesResult {
  lists: ModeCandidateList[];
  degradedModes: CandidateMode[];
}

export interface CandidateRetrieverDependencies {
  getIndexClient?: () => Promise<VectorIndexClient>;
  denseVectorName?: string;
  sparseVectorName?: string;
  timeoutMs?: number;
  logWarn?: typeof logWarn;
  recordSearchOutcome?: typeof recordSearchOutcome;
}

const defaultIndexClient = async (): Promise<VectorIndexClient> => (await getQdrantClient()).client;

const resolveDependencies = (dependencies?: CandidateRetrieverDependencies) => ({
  getIndexClient: dependencies?.getIndexClient ?? defaultIndexClient,
  denseVectorName: dependencies?.denseVectorName ?? config.QDRANT_DENSE_VECTOR,
  sparseVectorName: dependencies?.sparseVectorName ?? config.QDRANT_SPARSE_VECTOR,
  timeoutMs: dependencies?.timeoutMs ?? config.SEARCH_CALL_TIMEOUT_MS,
  logWarn: dependencies?.logWarn ?? logWarn,
  recordSearchOutcome: dependencies?.recordSearchOutcome ?? recordSearchOutcome
});

type ResolvedDependencies = ReturnType<typeof resolveDependencies>;

const TEXT_PAYLOAD_KEYS = new Set(["embeddable_text", "summary_text"]);

const readString = (payload: Record<string, unknown>, key: string): string | null => {
  const value = payload[key];
  return typeof value === "string" && value.trim().length > 0 ? value : null;
};

const isMetadataValue = (value: unknown): value is MetadataValue =>
  typeof value === "string" || typeof value === "boolean" || (typeof value === "number" && Number.isFinite(value));

/** Maps an index point onto a record; points without embeddable text are not records. */
export const toDocumentRecord = (point: IndexPoint): DocumentRecord | null => {
  const { payload } = point;
  const embeddableText = readString(payload, "embeddable_text") ?? readString(payload, "summary_text");
  if (!embeddableText) {
    return null;
  }

  const metadata: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!TEXT_PAYLOAD_KEYS.has(key) && isMetadataValue(value)) {
      metadata[key] = value;
    }
  }

  return {
    id: readString(payload, "document_id") ?? readString(payload, "id") ?? String(point.id),
    embeddableText,
    displayText: readString(payload, "summary_text") ?? embeddableText,
    sourceTable: readString(payload, "table_name"),
    metadata,
    updatedAt: readString(payload, "updated_at")
  };
};

export const compareCandidates = (a: { rawScore: number; documentId: string }, b: { rawScore: number; documentId: string }): number =>
  b.rawScore - a.rawScore || (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0);

/** Sorts, de-duplicates by document and assigns 1-based ranks. */
export const rankCandidates = (
  mode: CandidateMode,
  scored: Array<{ document: DocumentRecord; rawScore: number }>,
  topK: number
): ScoredCandidate[] => {
  const seen = new Set<string>();
  return scored
    .map(({ document, rawScore }) => ({ documentId: document.id, rawScore, document }))
    .sort(compareCandidates)
    .filter((candidate) => {
      if (seen.has(candidate.documentId)) {
        return false;
      }
      seen.add(candidate.documentId);
      return true;
    })
    .slice(0, Math.max(0, topK))
    .map((candidate, index) => ({ ...candidate, mode, rank: index + 1 }));
};

const planModes = (mode: RetrievalMode, vectors: QueryVectors): Array<{ mode: CandidateMode; query: IndexQueryRequest["query"] }> => {
  const planned: Array<{ mode: CandidateMode; query: IndexQueryRequest["query"] }> = [];
  if ((mode === "dense" || mode === "hybrid") && vectors.dense) {
    planned.push({ mode: "dense", query: vectors.dense });
  }
  if ((mode === "sparse" || mode === "hybrid") && vectors.sparse) {
    planned.push({ mode: "sparse", query: vectors.sparse });
  }
  return planned;
};

const queryMode = async (
  input: RetrieveCandidatesInput,
  planned: { mode: CandidateMode; query: IndexQueryRequest["query"] },
  resolved: ResolvedDependencies
): Promise<ModeCandidateList> => {
  const client = await resolved.getIndexClient();
  const points = await callWithPolicy(
    (attemptSignal) =>
      client.query(
        input.collection,
        {
          query: planned.query,
          using: planned.mode === "dense" ? resolved.denseVectorName : resolved.sparseVectorName,
          limit: input.topK,
          filter: toQdrantFilter(input.filter)
        },
        attemptSignal
      ),
    { label: `retrieve.${planned.mode}`, timeoutMs: resolved.timeoutMs, signal: input.signal }
  );

  const scored: Array<{ document: DocumentRecord; rawScore: number }> = [];
  for (const point of points) {
    const document = toDocumentRecord(point);
    // The index applies the filter too; this keeps a lenient index from leaking records.
    if (document && matchesFilter(point.payload, input.filter)) {
      scored.push({ document, rawScore: point.score });
    }
  }

  return { mode: planned.mode, candidates: rankCandidates(planned.mode, scored, input.topK) };
};

/**
 * Runs every active mode concurrently under the same hard filter. In hybrid
 * mode a single failing mode degrades the request; otherwise any failure
 * surfaces as {@link RetrievalUnavailableError}.
 */
export const retrieveCandidates = async (
  input: RetrieveCandidatesInput,
  dependencies?: CandidateRetrieverDependencies
): Promise<RetrieveCandidatesResult> => {
  const resolved = resolveDependencies(dependencies);
  const planned = planModes(input.mode, input.vectors);
  if (planned.length === 0) {
    return { lists: [], degradedModes: [] };
  }

  const settled = await Promise.allSettled(planned.map((entry) => queryMode(input, entry, resolved)));

  const lists: ModeCandidateList[] = [];
  const failures: Array<{ mode: CandidateMode; reason: unknown }> = [];
  settled.forEach((outcome, index) => {
    if (outcome.status === "fulfilled") {
      lists.push(outcome.value);
    } else {
      failures.push({ mode: planned[index].mode, reason: outcome.reason });
    }
  });

  if (input.signal?.aborted || failures.some((failure) => failure.reason instanceof SearchCancelledError)) {
    throw new SearchCancelledError();
  }

  if (failures.length === 0) {
    return { lists, degradedModes: [] };
  }

  if (lists.length === 0 || input.mode !== "hybrid") {
    const [first] = failures;
    throw new RetrievalUnavailableError(`Vector index unavailable: ${describeError(first.reason)}`, { cause: first.reason });
  }

  const degradedModes = failures.map((failure) => failure.mode);
  resolved.recordSearchOutcome("retrieve_degraded");
  resolved.logWarn(
    "search.retrieve.degraded",
    { requestId: input.requestId ?? null, collection: input.collection },
    {
      failed_modes: degradedModes,
      remaining_modes: lists.map((list) => list.mode),
      errors: failures.map((failure) => describeError(failure.reason))
    }
  );

  return { lists, degradedModes };
};
