import { randomUUID } from "node:crypto";
import { isPostgresConfigured } from "../../clients/postgres.js";
import { createScopedLogger, type ScopedLogger } from "../../observability/logger.js";
import {
  recordErrorRate,
  recordSearchLatency,
  recordSearchOutcome,
  recordStageLatency,
  TIMED_PIPELINE_STAGES,
  type PipelineStageName
} from "../../observability/metrics.js";
import type { SearchAuditRepositoryPort, SearchEventStatus } from "../audit/search-audit-repository.js";
import { streamAnswer } from "./answer-synthesizer.js";
import { callWithPolicy } from "./call-policy.js";
import { retrieveCandidates, type RetrieveCandidatesInput, type RetrieveCandidatesResult } from "./candidate-retriever.js";
import { Bm25SparseEmbedder, createDenseEmbedder, type DenseEmbedder, type SparseEmbedder } from "./embedder.js";
import {
  RetrievalUnavailableError,
  SearchCancelledError,
  SearchError,
  describeError,
  throwIfCancelled
} from "./errors.js";
import { listFilterKeys } from "./filter.js";
import { fuseRankedLists } from "./fusion.js";
import { createGenerator, type Generator } from "./generator.js";
import { createReranker, rerankSafely, type Reranker } from "./reranker.js";
import { normalizeSearchRequest, type SearchRequestInput } from "./search-request.js";
import { resolveSearchSettings } from "./settings.js";
import type {
  AnswerResponse,
  Citation,
  FusedResult,
  PipelineStage,
  QueryVectors,
  SearchRequest,
  SearchSettings
} from "./types.js";

export type SearchStreamEvent =
  | { type: "stage"; stage: PipelineStage }
  | { type: "results"; results: FusedResult[] }
  | { type: "token"; token: string }
  | { type: "complete"; response: AnswerResponse };

export interface SearchInvocation {
  collection: string;
  input: SearchRequestInput;
  signal?: AbortSignal;
  requestId?: string;
}

export interface SearchOrchestratorDependencies {
  settings: SearchSettings;
  denseEmbedder: DenseEmbedder;
  sparseEmbedder: SparseEmbedder | null;
  reranker: Reranker;
  generator: Generator;
  retrieve: (input: RetrieveCandidatesInput) => Promise<RetrieveCandidatesResult>;
  /** `null` disables the audit trail. */
  auditRepository: SearchAuditRepositoryPort | null;
  now: () => number;
}

type PipelineState = {
  requestId: string;
  collection: string;
  startedAt: number;
  stage: PipelineStage;
  request: SearchRequest | null;
  logger: ScopedLogger;
};

const isTimedStage = (stage: PipelineStage): stage is PipelineStageName =>
  TIMED_PIPELINE_STAGES.some((timed) => timed === stage);

/**
 * Runs one search request through its stages. `streamSearch` yields stage
 * transitions, the ranked results, provisional answer tokens and a final
 * `complete` event; `search` is the drained form of the same generator.
 */
export class SearchOrchestrator {
  private readonly dependencies: Partial<SearchOrchestratorDependencies>;

  constructor(dependencies?: Partial<SearchOrchestratorDependencies>) {
    this.dependencies = { ...dependencies };
  }

  private async ensureDependencies(): Promise<SearchOrchestratorDependencies> {
    if (!this.dependencies.settings) {
      this.dependencies.settings = resolveSearchSettings();
    }
    const settings = this.dependencies.settings;

    if (!this.dependencies.denseEmbedder) {
      this.dependencies.denseEmbedder = createDenseEmbedder();
    }

    if (this.dependencies.sparseEmbedder === undefined) {
      this.dependencies.sparseEmbedder = new Bm25SparseEmbedder();
    }

    if (!this.dependencies.reranker) {
      this.dependencies.reranker = createReranker();
    }

    if (!this.dependencies.generator) {
      this.dependencies.generator = createGenerator();
    }

    if (!this.dependencies.retrieve) {
      this.dependencies.retrieve = (input) => retrieveCandidates(input, { timeoutMs: settings.callTimeoutMs });
    }

    if (!this.dependencies.now) {
      this.dependencies.now = Date.now;
    }

    if (this.dependencies.auditRepository === undefined) {
      if (isPostgresConfigured()) {
        const module = await import("../audit/search-audit-repository.js");
        this.dependencies.auditRepository = new module.SearchAuditRepository();
      } else {
        this.dependencies.auditRepository = null;
      }
    }

    return {
      settings,
      denseEmbedder: this.dependencies.denseEmbedder,
      sparseEmbedder: this.dependencies.sparseEmbedder,
      reranker: this.dependencies.reranker,
      generator: this.dependencies.generator,
      retrieve: this.dependencies.retrieve,
      auditRepository: this.dependencies.auditRepository,
      now: this.dependencies.now
    };
  }

  async *streamSearch(invocation: SearchInvocation): AsyncGenerator<SearchStreamEvent, void, void> {
    const dependencies = await this.ensureDependencies();
    const { settings } = dependencies;
    const signal = invocation.signal ?? new AbortController().signal;
    const requestId = invocation.requestId ?? randomUUID();
    const state: PipelineState = {
      requestId,
      collection: invocation.collection,
      startedAt: dependencies.now(),
      stage: "received",
      request: null,
      logger: createScopedLogger({ requestId, collection: invocation.collection })
    };
    let stageStartedAt = state.startedAt;

    const enterStage = (stage: PipelineStage, fields: Record<string, unknown> = {}): SearchStreamEvent => {
      const now = dependencies.now();
      if (isTimedStage(state.stage)) {
        recordStageLatency(state.stage, now - stageStartedAt);
      }
      state.stage = stage;
      stageStartedAt = now;
      state.logger.trace("search.orchestrator.stage", { stage, ...fields });
      return { type: "stage", stage };
    };

    yield enterStage("received");

    try {
      const request = normalizeSearchRequest(invocation.input, settings);
      state.request = request;
      state.logger.info("search.start", {
        retrieval_mode: request.retrievalMode,
        top_k: request.topK,
        rerank: request.rerank,
        generate_answer: request.generateAnswer,
        temporal_relevance: request.temporalRelevance,
        filter_keys: listFilterKeys(request.filter)
      });
      throwIfCancelled(signal);

      yield enterStage("embedding");
      const vectors = await this.embedQuery(request, signal, dependencies, state.logger);

      yield enterStage("retrieving");
      const retrieval = await dependencies.retrieve({
        collection: invocation.collection,
        vectors,
        mode: request.retrievalMode,
        filter: request.filter,
        topK: Math.max(settings.candidateTopK, request.topK),
        signal,
        requestId
      });
      throwIfCancelled(signal);

      yield enterStage("fusing", {
        candidate_counts: Object.fromEntries(retrieval.lists.map((list) => [list.mode, list.candidates.length])),
        degraded_modes: retrieval.degradedModes
      });
      const fused = fuseRankedLists(retrieval.lists, {
        rrfK: settings.rrfK,
        temporalRelevance: request.temporalRelevance,
        halfLifeDays: settings.temporalHalfLifeDays,
        limit: request.rerank ? Math.max(request.topK, settings.rerankTopN) : request.topK,
        now: dependencies.now
      });

      let ranked = fused;
      if (request.rerank && fused.length > 1) {
        yield enterStage("reranking", { reranker: dependencies.reranker.name });
        ranked = await rerankSafely({
          query: request.query,
          results: fused,
          reranker: dependencies.reranker,
          topN: settings.rerankTopN,
          signal,
          requestId,
          collection: invocation.collection
        });
      }
      const results = ranked.slice(0, request.topK);
      yield { type: "results", results };

      let completion: string | null = null;
      let citations: Citation[] = [];
      let fallbackTriggered = false;

      if (request.generateAnswer) {
        yield enterStage("synthesizing", { evidence_count: results.length });
        const answer = streamAnswer({
          query: request.query,
          evidence: results,
          minScoreThreshold: settings.minScoreThreshold,
          generator: dependencies.generator,
          timeoutMs: settings.generationTimeoutMs,
          signal,
          requestId,
          collection: invocation.collection
        });
        for await (const event of answer) {
          if (event.type === "token") {
            yield { type: "token", token: event.token };
            continue;
          }
          completion = event.outcome.completion;
          citations = event.outcome.citations;
          fallbackTriggered = event.outcome.fallbackTriggered;
        }
      } else {
        recordSearchOutcome("results_only");
      }

      yield enterStage("done");
      const durationMs = dependencies.now() - state.startedAt;
      recordSearchLatency(durationMs);
      state.logger.info("search.complete", {
        result_count: results.length,
        citation_count: citations.length,
        fallback_triggered: fallbackTriggered,
        latency_ms: durationMs
      });
      await this.recordAudit(dependencies, state, "completed", {
        fallbackTriggered: request.generateAnswer ? fallbackTriggered : null,
        resultCount: results.length,
        errorCode: null
      });

      yield { type: "complete", response: { completion, citations, results, fallbackTriggered } };
    } catch (error) {
      const failure = signal.aborted && !(error instanceof SearchError) ? new SearchCancelledError() : error;
      const failedStage = state.stage;

      if (failure instanceof SearchCancelledError) {
        state.logger.info("search.cancelled", { failed_stage: failedStage });
      } else if (failure instanceof SearchError && failure.code === "invalid_request") {
        recordErrorRate("search_invalid_request");
        state.logger.warn("search.rejected", { error: failure.message });
      } else {
        recordErrorRate(failure instanceof SearchError ? `search_${failure.code}` : "search_internal");
        state.logger.error("search.failed", {
          failed_stage: failedStage,
          error_name: failure instanceof Error ? failure.name : "unknown",
          error: describeError(failure)
        });
      }

      await this.recordAudit(dependencies, state, failure instanceof SearchCancelledError ? "cancelled" : "errored", {
        fallbackTriggered: null,
        resultCount: 0,
        errorCode: failure instanceof SearchError ? failure.code : "internal"
      });

      yield enterStage("errored", { failed_stage: failedStage });
      throw failure;
    }
  }

  async search(invocation: SearchInvocation): Promise<AnswerResponse> {
    for await (const event of this.streamSearch(invocation)) {
      if (event.type === "complete") {
        return event.response;
      }
    }
    throw new Error("Search stream ended without a response.");
  }

  /** Hybrid requests fall back to whichever query vector could be computed. */
  private async embedQuery(
    request: SearchRequest,
    signal: AbortSignal,
    dependencies: SearchOrchestratorDependencies,
    logger: ScopedLogger
  ): Promise<QueryVectors> {
    const wantsDense = request.retrievalMode !== "sparse";
    const wantsSparse = request.retrievalMode !== "dense" && dependencies.sparseEmbedder !== null;
    const sparse = wantsSparse ? (dependencies.sparseEmbedder?.embed(request.query) ?? null) : null;

    if (!wantsDense) {
      return { dense: null, sparse };
    }

    const { denseEmbedder, settings } = dependencies;
    try {
      const dense = await callWithPolicy((attemptSignal) => denseEmbedder.embed(request.query, attemptSignal), {
        label: `embed.${denseEmbedder.name}`,
        timeoutMs: settings.callTimeoutMs,
        signal
      });
      return { dense, sparse };
    } catch (error) {
      if (error instanceof SearchCancelledError) {
        throw error;
      }
      if (request.retrievalMode === "hybrid" && sparse) {
        recordSearchOutcome("embed_degraded");
        logger.warn("search.embed.degraded", {
          embedder: denseEmbedder.name,
          remaining_modes: ["sparse"],
          error: describeError(error)
        });
        return { dense: null, sparse };
      }
      throw new RetrievalUnavailableError(`Embedding service unavailable: ${describeError(error)}`, { cause: error });
    }
  }

  private async recordAudit(
    dependencies: SearchOrchestratorDependencies,
    state: PipelineState,
    status: SearchEventStatus,
    outcome: { fallbackTriggered: boolean | null; resultCount: number; errorCode: string | null }
  ): Promise<void> {
    if (!dependencies.auditRepository) {
      return;
    }
    try {
      await dependencies.auditRepository.appendSearchEvent({
        requestId: state.requestId,
        collection: state.collection,
        query: state.request?.query ?? "",
        retrievalMode: state.request?.retrievalMode ?? "unknown",
        status,
        durationMs: dependencies.now() - state.startedAt,
        ...outcome
      });
    } catch (error) {
      recordErrorRate("search_audit");
      state.logger.warn("search.audit.failed", { status, error: describeError(error) });
    }
  }
}
