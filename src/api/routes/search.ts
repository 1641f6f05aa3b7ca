import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { InvalidSearchRequestError, SearchCancelledError, SearchError } from "../../modules/search/errors.js";
import { SearchOrchestrator } from "../../modules/search/search-orchestrator.js";
import { normalizeSearchRequest, type SearchRequestInput } from "../../modules/search/search-request.js";
import { resolveSearchSettings } from "../../modules/search/settings.js";
import type { AnswerResponse, FusedResult, RetrievalMode, SearchSettings } from "../../modules/search/types.js";
import { logError, logInfo } from "../../observability/logger.js";
import { recordErrorRate, recordStreamDuration } from "../../observability/metrics.js";

const RETRIEVAL_STRATEGIES = {
  hybrid: "hybrid",
  dense: "dense",
  sparse: "sparse",
  keyword: "sparse",
  neural: "dense"
} as const satisfies Record<string, RetrievalMode>;

const searchBodySchema = z.object({
  query: z.string({ required_error: "query is required" }),
  retrieval_strategy: z.enum(["hybrid", "dense", "sparse", "keyword", "neural"]).optional(),
  generate_answer: z.boolean().optional(),
  expand_query: z.boolean().optional(),
  interpret_filters: z.boolean().optional(),
  rerank: z.boolean().optional(),
  temporal_relevance: z.number().optional(),
  limit: z.number().int().optional(),
  filter: z.unknown().optional()
});

const basicSearchQuerySchema = z.object({
  query: z.string({ required_error: "query is required" }),
  limit: z.coerce.number().int().optional()
});

const collectionParamsSchema = z.object({
  collection: z.string().trim().min(1, "collection is required")
});

type SearchBody = z.infer<typeof searchBodySchema>;

type ValidationDetail = { type: string; loc: Array<string | number>; msg: string };

const toValidationError = (error: z.ZodError, location: string): { detail: ValidationDetail[] } => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: [location, ...issue.path],
    msg: issue.message
  }))
});

const toSearchErrorBody = (error: unknown): { statusCode: number; body: Record<string, unknown> } => {
  if (error instanceof InvalidSearchRequestError) {
    return {
      statusCode: error.statusCode,
      body: {
        detail: error.issues.map((issue) => ({ type: "value_error", loc: ["body", ...issue.path], msg: issue.message })),
        code: error.code
      }
    };
  }
  if (error instanceof SearchError) {
    return { statusCode: error.statusCode, body: { detail: error.message, code: error.code } };
  }
  return { statusCode: 500, body: { detail: "Search failed unexpectedly.", code: "internal" } };
};

export const serializeResult = (result: FusedResult) => ({
  id: result.documentId,
  score: result.fusedScore,
  payload: {
    ...result.document.metadata,
    embeddable_text: result.document.embeddableText,
    summary_text: result.document.displayText,
    table_name: result.document.sourceTable,
    updated_at: result.document.updatedAt
  }
});

const serializeCitations = (response: Pick<AnswerResponse, "citations">) =>
  response.citations.map((citation) => ({ marker: citation.marker, document_id: citation.documentId }));

export const serializeAnswer = (response: AnswerResponse) => ({
  completion: response.completion,
  results: response.results.map(serializeResult),
  citations: serializeCitations(response),
  fallback_triggered: response.fallbackTriggered
});

const toSearchInput = (body: SearchBody): SearchRequestInput => ({
  query: body.query,
  filter: body.filter,
  retrievalMode: body.retrieval_strategy ? RETRIEVAL_STRATEGIES[body.retrieval_strategy] : undefined,
  generateAnswer: body.generate_answer,
  rerank: body.rerank,
  temporalRelevance: body.temporal_relevance,
  topK: body.limit
});

const writeSseFrame = (reply: FastifyReply, event: string, data: string): void => {
  reply.raw.write(`event: ${event}\n`);
  for (const line of data.split(/\r?\n/)) {
    reply.raw.write(`data: ${line}\n`);
  }
  reply.raw.write("\n");
};

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

const buildSseCorsHeaders = (request: FastifyRequest): Record<string, string> => {
  const origin = request.headers.origin;
  if (typeof origin !== "string" || origin.trim().length === 0) {
    return {};
  }

  return {
    "Access-Control-Allow-Origin": origin,
    Vary: "Origin"
  };
};

/** Aborts the returned signal when the client goes away before the response is written. */
const abortOnDisconnect = (reply: FastifyReply): AbortController => {
  const controller = new AbortController();
  reply.raw.on("close", () => {
    if (!reply.raw.writableEnded) {
      controller.abort(new SearchCancelledError("Client disconnected."));
    }
  });
  return controller;
};

const logUnsupportedToggles = (requestId: string, collection: string, body: SearchBody): void => {
  if (body.expand_query || body.interpret_filters) {
    logInfo(
      "search.http.unsupported_option",
      { requestId, collection },
      { expand_query: body.expand_query ?? false, interpret_filters: body.interpret_filters ?? false }
    );
  }
};

export type SearchRunner = Pick<SearchOrchestrator, "search" | "streamSearch">;

export interface SearchRoutesDependencies {
  createOrchestrator?: () => SearchRunner;
  settings?: SearchSettings;
}

export async function registerSearchRoutes(app: FastifyInstance, dependencies?: SearchRoutesDependencies): Promise<void> {
  const createOrchestrator = dependencies?.createOrchestrator ?? (() => new SearchOrchestrator());
  let orchestrator: SearchRunner | null = null;
  const getOrchestrator = (): SearchRunner => {
    if (!orchestrator) {
      orchestrator = createOrchestrator();
    }
    return orchestrator;
  };
  const getSettings = (): SearchSettings => dependencies?.settings ?? resolveSearchSettings();

  const runSearch = async (
    request: FastifyRequest,
    reply: FastifyReply,
    collection: string,
    input: SearchRequestInput
  ): Promise<void> => {
    const requestId = resolveRequestId(request);
    const controller = abortOnDisconnect(reply);
    try {
      const response = await getOrchestrator().search({ collection, input, signal: controller.signal, requestId });
      reply.send(serializeAnswer(response));
    } catch (error) {
      const { statusCode, body } = toSearchErrorBody(error);
      if (statusCode === 500) {
        logError("search.http.unhandled", { requestId, collection }, { error: error instanceof Error ? error.message : String(error) });
      }
      reply.code(statusCode).send(body);
    }
  };

  app.post("/collections/:collection/search", async (request, reply) => {
    const params = collectionParamsSchema.safeParse(request.params);
    if (!params.success) {
      recordErrorRate("validation_422");
      return reply.code(422).send(toValidationError(params.error, "path"));
    }
    const parsed = searchBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      return reply.code(422).send(toValidationError(parsed.error, "body"));
    }

    logUnsupportedToggles(resolveRequestId(request), params.data.collection, parsed.data);
    await runSearch(request, reply, params.data.collection, toSearchInput(parsed.data));
    return reply;
  });

  app.get("/collections/:collection/search", async (request, reply) => {
    const params = collectionParamsSchema.safeParse(request.params);
    if (!params.success) {
      recordErrorRate("validation_422");
      return reply.code(422).send(toValidationError(params.error, "path"));
    }
    const parsed = basicSearchQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      return reply.code(422).send(toValidationError(parsed.error, "query"));
    }

    await runSearch(request, reply, params.data.collection, { query: parsed.data.query, topK: parsed.data.limit });
    return reply;
  });

  app.post("/collections/:collection/search/stream", async (request, reply) => {
    const params = collectionParamsSchema.safeParse(request.params);
    if (!params.success) {
      recordErrorRate("validation_422");
      return reply.code(422).send(toValidationError(params.error, "path"));
    }
    const parsed = searchBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      return reply.code(422).send(toValidationError(parsed.error, "body"));
    }

    const collection = params.data.collection;
    const requestId = resolveRequestId(request);
    const input = toSearchInput(parsed.data);
    try {
      normalizeSearchRequest(input, getSettings());
    } catch (error) {
      const { statusCode, body } = toSearchErrorBody(error);
      return reply.code(statusCode).send(body);
    }
    logUnsupportedToggles(requestId, collection, parsed.data);

    const streamStartedAt = Date.now();
    logInfo("search.stream.start", { requestId, collection }, { route: request.routeOptions.url });

    reply.hijack();
    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
      ...buildSseCorsHeaders(request)
    });

    const controller = abortOnDisconnect(reply);
    const isClosed = (): boolean => controller.signal.aborted;

    writeSseFrame(reply, "start", "[START]");

    try {
      for await (const event of getOrchestrator().streamSearch({ collection, input, signal: controller.signal, requestId })) {
        if (isClosed()) {
          continue;
        }
        if (event.type === "results") {
          writeSseFrame(reply, "results", JSON.stringify(event.results.map(serializeResult)));
        } else if (event.type === "token") {
          writeSseFrame(reply, "token", event.token);
        } else if (event.type === "complete") {
          writeSseFrame(
            reply,
            "end",
            JSON.stringify({
              status: "[END]",
              completion: event.response.completion,
              citations: serializeCitations(event.response),
              fallback_triggered: event.response.fallbackTriggered
            })
          );
        }
      }
    } catch (error) {
      if (!isClosed()) {
        const { statusCode, body } = toSearchErrorBody(error);
        recordErrorRate("search_stream_exception");
        writeSseFrame(reply, "error", JSON.stringify({ ...body, status: statusCode }));
      }
    } finally {
      const streamDurationMs = Date.now() - streamStartedAt;
      recordStreamDuration(streamDurationMs);
      logInfo(
        "search.stream.complete",
        { requestId, collection },
        { stream_duration_ms: streamDurationMs, closed_by_client: isClosed() }
      );
      if (!isClosed()) {
        reply.raw.end();
      }
    }
  });
}
