import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { isTruthyFlag, readTraceModeEnv } from "./flags.js";
import { logDebug, logInfo, logTrace } from "./logger.js";

export type RequestTraceMode = "off" | "debug" | "trace";

type TraceFields = Record<string, unknown>;

const TRACED_HEADERS = [
  "origin",
  "host",
  "user-agent",
  "accept",
  "content-type",
  "content-length",
  "x-request-id"
] as const;

const MAX_TRACED_KEYS = 20;

const startedAt = new WeakMap<FastifyRequest, number>();

export const resolveRequestTraceMode = (): RequestTraceMode => {
  const explicit = readTraceModeEnv();
  if (explicit === "off" || explicit === "debug" || explicit === "trace") {
    return explicit;
  }
  return isTruthyFlag(process.env.BACKEND_REQUEST_TRACE) ? "debug" : "off";
};

/** Describes a body by shape only; search queries never reach the logs. */
export const summarizeBody = (body: unknown): TraceFields | null => {
  if (body === undefined) {
    return null;
  }
  if (body === null) {
    return { type: "null" };
  }
  if (typeof body === "string" || Array.isArray(body)) {
    return { type: Array.isArray(body) ? "array" : "string", length: body.length };
  }
  if (typeof body === "object") {
    const keys = Object.keys(body);
    return { type: "object", key_count: keys.length, keys: keys.slice(0, MAX_TRACED_KEYS) };
  }
  return { type: typeof body };
};

const tracedHeaders = (request: FastifyRequest): TraceFields =>
  Object.fromEntries(TRACED_HEADERS.map((name) => [name, request.headers[name] ?? null]));

const collectionParam = (request: FastifyRequest): string | null => {
  const params = request.params;
  if (params && typeof params === "object" && "collection" in params && typeof params.collection === "string") {
    return params.collection;
  }
  return null;
};

const payloadShape = (payload: unknown): TraceFields | null => {
  if (typeof payload === "string") {
    return { type: "string", length: payload.length };
  }
  return payload && typeof payload === "object" ? { type: "object" } : null;
};

const createTracer = (mode: Exclude<RequestTraceMode, "off">) => {
  const log = mode === "trace" ? logTrace : logDebug;

  return (request: FastifyRequest, reply: FastifyReply, event: string, fields: TraceFields = {}): void => {
    const route = request.routeOptions?.url;
    log(
      event,
      { requestId: request.id, collection: collectionParam(request) },
      {
        method: request.method,
        url: request.url,
        route: typeof route === "string" ? route : null,
        status_code: reply.statusCode || null,
        ...fields
      }
    );
  };
};

export const registerRequestTraceHooks = (app: FastifyInstance, mode: RequestTraceMode = resolveRequestTraceMode()): void => {
  if (mode === "off") {
    return;
  }

  const trace = createTracer(mode);
  logInfo("http.trace.enabled", {}, { mode, backend_log_level: process.env.BACKEND_LOG_LEVEL ?? process.env.LOG_LEVEL ?? "info" });

  app.addHook("onRequest", async (request, reply) => {
    startedAt.set(request, Date.now());
    trace(request, reply, "http.request.start", { query: request.query ?? null, headers: tracedHeaders(request) });
  });

  if (mode === "trace") {
    app.addHook("preValidation", async (request, reply) => {
      trace(request, reply, "http.request.pre_validation", { body: summarizeBody(request.body) });
    });
    app.addHook("preHandler", async (request, reply) => {
      trace(request, reply, "http.request.pre_handler", { params: request.params ?? null });
    });
    app.addHook("onSend", async (request, reply, payload) => {
      trace(request, reply, "http.response.on_send", { payload: payloadShape(payload) });
      return payload;
    });
  }

  app.addHook("onError", async (request, reply, error) => {
    trace(request, reply, "http.request.error", { error_name: error.name, error_message: error.message });
  });

  app.addHook("onResponse", async (request, reply) => {
    trace(request, reply, "http.request.complete", {
      duration_ms: Date.now() - (startedAt.get(request) ?? Date.now())
    });
  });
};
