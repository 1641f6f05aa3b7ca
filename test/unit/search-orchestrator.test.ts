import { describe, expect, it } from "vitest";
import { REFUSAL_COMPLETION } from "../../src/modules/search/answer-synthesizer.js";
import { retrieveCandidates } from "../../src/modules/search/candidate-retriever.js";
import { Bm25SparseEmbedder } from "../../src/modules/search/embedder.js";
import {
  GenerationUnavailableError,
  InvalidSearchRequestError,
  RetrievalUnavailableError,
  SearchCancelledError
} from "../../src/modules/search/errors.js";
import { LexicalReranker } from "../../src/modules/search/reranker.js";
import {
  SearchOrchestrator,
  type SearchOrchestratorDependencies,
  type SearchStreamEvent
} from "../../src/modules/search/search-orchestrator.js";
import type { SearchRequestInput } from "../../src/modules/search/search-request.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";
import {
  InMemorySearchAuditRepository,
  createStaffIndex,
  ScriptedGenerator,
  StaticDenseEmbedder,
  testSettings
} from "../../tests/helpers/search-fixtures.js";

const NOW = Date.parse("2024-03-31T00:00:00.000Z");

const QUESTION = "Which employee has the highest hourly rate?";

const EMPLOYEES_FILTER = { must: [{ key: "table_name", match: { value: "employees" } }] };

const createOrchestrator = (overrides: Partial<SearchOrchestratorDependencies> = {}): SearchOrchestrator => {
  const index = createStaffIndex();
  return new SearchOrchestrator({
    settings: testSettings,
    denseEmbedder: new StaticDenseEmbedder([1, 0]),
    sparseEmbedder: new Bm25SparseEmbedder(),
    reranker: new LexicalReranker(),
    generator: new ScriptedGenerator([{ tokens: ["Frank has the highest rate at 30.0 USD/hour [[1]]"] }]),
    retrieve: (input) =>
      retrieveCandidates(input, {
        getIndexClient: async () => index,
        denseVectorName: "dense",
        sparseVectorName: "sparse",
        timeoutMs: 1000
      }),
    auditRepository: null,
    now: () => NOW,
    ...overrides
  });
};

const frankQuery = (overrides: Partial<SearchRequestInput> = {}): SearchRequestInput => ({
  query: QUESTION,
  filter: EMPLOYEES_FILTER,
  ...overrides
});

const describeEvent = (event: SearchStreamEvent): string => (event.type === "stage" ? `stage:${event.stage}` : event.type);

describe("modules/search/search-orchestrator", () => {
  it("answers with a grounded citation and emits every stage in order", async () => {
    const orchestrator = createOrchestrator();
    const events: SearchStreamEvent[] = [];

    for await (const event of orchestrator.streamSearch({ collection: "staff", input: frankQuery(), requestId: "req-1" })) {
      events.push(event);
    }

    expect(events.map(describeEvent)).toEqual([
      "stage:received",
      "stage:embedding",
      "stage:retrieving",
      "stage:fusing",
      "stage:reranking",
      "results",
      "stage:synthesizing",
      "token",
      "stage:done",
      "complete"
    ]);

    const complete = events[events.length - 1];
    expect(complete.type).toBe("complete");
    if (complete.type === "complete") {
      expect(complete.response.completion).toBe("Frank has the highest rate at 30.0 USD/hour [[1]]");
      expect(complete.response.citations).toEqual([{ marker: 1, documentId: "frank" }]);
      expect(complete.response.fallbackTriggered).toBe(false);
      expect(complete.response.results.map((result) => result.documentId)).toEqual(["frank", "grace", "henry"]);
      expect(complete.response.results[0].modeRanks).toEqual({ dense: 1, sparse: 1 });
    }
  });

  it("refuses with empty results when the filter matches nothing", async () => {
    const generator = new ScriptedGenerator([{ tokens: ["unused [[1]]"] }]);
    const orchestrator = createOrchestrator({ generator });

    const response = await orchestrator.search({
      collection: "staff",
      input: frankQuery({ filter: { must: [{ key: "table_name", match: { value: "departments" } }] } })
    });

    expect(response).toEqual({ completion: REFUSAL_COMPLETION, citations: [], results: [], fallbackTriggered: true });
    expect(generator.requests).toHaveLength(0);
  });

  it("refuses a keyword search whose terms appear in no document", async () => {
    const generator = new ScriptedGenerator([{ tokens: ["Zebras live in Africa [[1]]"] }]);
    const orchestrator = createOrchestrator({ generator });

    const response = await orchestrator.search({
      collection: "staff",
      input: { query: "zebra giraffe", retrievalMode: "sparse" }
    });

    expect(response).toEqual({ completion: REFUSAL_COMPLETION, citations: [], results: [], fallbackTriggered: true });
    expect(generator.requests).toHaveLength(0);
  });

  it("returns ranked results without an answer when generation is off", async () => {
    const generator = new ScriptedGenerator([{ tokens: ["unused [[1]]"] }]);
    const orchestrator = createOrchestrator({ generator });

    const response = await orchestrator.search({
      collection: "staff",
      input: frankQuery({ generateAnswer: false, rerank: false, topK: 2 })
    });

    expect(response.completion).toBeNull();
    expect(response.citations).toEqual([]);
    expect(response.fallbackTriggered).toBe(false);
    expect(response.results.map((result) => [result.documentId, result.rank])).toEqual([
      ["frank", 1],
      ["grace", 2]
    ]);
    expect(generator.requests).toHaveLength(0);
    expect(getMetricsSnapshot().outcomes).toEqual({ results_only: 1 });
  });

  it("falls back to sparse retrieval when dense embedding fails", async () => {
    const orchestrator = createOrchestrator({
      denseEmbedder: new StaticDenseEmbedder(async () => {
        throw Object.assign(new Error("embedding model not found"), { status: 404 });
      })
    });

    const response = await orchestrator.search({ collection: "staff", input: frankQuery() });

    expect(response.results.map((result) => result.documentId)).toEqual(["frank", "grace", "henry"]);
    expect(response.results[0].modeRanks).toEqual({ sparse: 1 });
    expect(response.fallbackTriggered).toBe(false);
    expect(getMetricsSnapshot().outcomes).toEqual(expect.objectContaining({ embed_degraded: 1 }));
  });

  it("fails a dense-only request when embedding fails", async () => {
    const orchestrator = createOrchestrator({
      denseEmbedder: new StaticDenseEmbedder(async () => {
        throw Object.assign(new Error("embedding model not found"), { status: 404 });
      })
    });

    const outcome = orchestrator.search({ collection: "staff", input: frankQuery({ retrievalMode: "dense" }) });

    await expect(outcome).rejects.toBeInstanceOf(RetrievalUnavailableError);
    await expect(outcome).rejects.toThrow("Embedding service unavailable: embedding model not found");
  });

  it("audits completed searches", async () => {
    const auditRepository = new InMemorySearchAuditRepository();
    const orchestrator = createOrchestrator({ auditRepository });

    await orchestrator.search({ collection: "staff", input: frankQuery(), requestId: "req-1" });

    expect(auditRepository.events).toEqual([
      {
        id: 1,
        createdAt: new Date(0),
        requestId: "req-1",
        collection: "staff",
        query: QUESTION,
        retrievalMode: "hybrid",
        status: "completed",
        fallbackTriggered: false,
        resultCount: 3,
        errorCode: null,
        durationMs: 0
      }
    ]);
  });

  it("rejects an invalid request before any stage runs and audits it", async () => {
    const auditRepository = new InMemorySearchAuditRepository();
    const denseEmbedder = new StaticDenseEmbedder([1, 0]);
    const orchestrator = createOrchestrator({ auditRepository, denseEmbedder });
    const events: SearchStreamEvent[] = [];
    let caught: unknown;

    try {
      for await (const event of orchestrator.streamSearch({ collection: "staff", input: { query: " " }, requestId: "req-2" })) {
        events.push(event);
      }
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidSearchRequestError);
    expect(events.map(describeEvent)).toEqual(["stage:received", "stage:errored"]);
    expect(denseEmbedder.calls).toEqual([]);
    expect(auditRepository.events[0]).toEqual(
      expect.objectContaining({
        requestId: "req-2",
        query: "",
        retrievalMode: "unknown",
        status: "errored",
        fallbackTriggered: null,
        resultCount: 0,
        errorCode: "invalid_request"
      })
    );
  });

  it("stops a cancelled search and audits the cancellation", async () => {
    const auditRepository = new InMemorySearchAuditRepository();
    const orchestrator = createOrchestrator({ auditRepository });
    const controller = new AbortController();
    controller.abort();

    await expect(
      orchestrator.search({ collection: "staff", input: frankQuery(), signal: controller.signal })
    ).rejects.toBeInstanceOf(SearchCancelledError);
    expect(auditRepository.events[0]).toEqual(
      expect.objectContaining({ status: "cancelled", errorCode: "cancelled", query: QUESTION })
    );
  });

  it("surfaces generation failures", async () => {
    const auditRepository = new InMemorySearchAuditRepository();
    const orchestrator = createOrchestrator({
      auditRepository,
      generator: new ScriptedGenerator([{ error: Object.assign(new Error("invalid api key"), { status: 401 }) }])
    });

    await expect(orchestrator.search({ collection: "staff", input: frankQuery() })).rejects.toBeInstanceOf(
      GenerationUnavailableError
    );
    expect(auditRepository.events[0]).toEqual(
      expect.objectContaining({ status: "errored", errorCode: "generation_unavailable" })
    );
  });

  it("keeps serving when the audit store fails", async () => {
    const orchestrator = createOrchestrator({
      auditRepository: {
        appendSearchEvent: async () => {
          throw new Error("relation search_events does not exist");
        },
        listByCollection: async () => []
      }
    });

    const response = await orchestrator.search({ collection: "staff", input: frankQuery() });

    expect(response.citations).toEqual([{ marker: 1, documentId: "frank" }]);
    expect(getMetricsSnapshot().error_rates).toEqual({ search_audit: 1 });
  });
});
