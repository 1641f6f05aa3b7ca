import type { FastifyInstance } from "fastify";

export const TIMED_PIPELINE_STAGES = ["embedding", "retrieving", "fusing", "reranking", "synthesizing"] as const;

export type PipelineStageName = (typeof TIMED_PIPELINE_STAGES)[number];

type LatencyKey = "request" | "stream" | "search" | `stage:${PipelineStageName}`;

interface LatencyWindow {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

export interface LatencySnapshot {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

export interface GenerationUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

const latencies = new Map<LatencyKey, LatencyWindow>();
const usage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
let outcomes: Record<string, number> = {};
let errorRates: Record<string, number> = {};

const requestStartedAt = new WeakMap<object, number>();

const observe = (key: LatencyKey, durationMs: number): void => {
  // Negative or non-finite samples (clock skew, NaN) count as zero.
  const sample = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  const window = latencies.get(key);
  if (!window) {
    latencies.set(key, { count: 1, totalMs: sample, minMs: sample, maxMs: sample });
    return;
  }
  window.count += 1;
  window.totalMs += sample;
  window.minMs = Math.min(window.minMs, sample);
  window.maxMs = Math.max(window.maxMs, sample);
};

const round2 = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const snapshotOf = (key: LatencyKey): LatencySnapshot => {
  const window = latencies.get(key);
  if (!window) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: window.count,
    avgMs: round2(window.totalMs / window.count),
    minMs: round2(window.minMs),
    maxMs: round2(window.maxMs)
  };
};

const increment = (counters: Record<string, number>, key: string): void => {
  counters[key] = (counters[key] ?? 0) + 1;
};

export const recordRequestLatency = (durationMs: number): void => observe("request", durationMs);
export const recordStreamDuration = (durationMs: number): void => observe("stream", durationMs);
export const recordSearchLatency = (durationMs: number): void => observe("search", durationMs);
export const recordStageLatency = (stage: PipelineStageName, durationMs: number): void =>
  observe(`stage:${stage}`, durationMs);

export const recordGenerationUsage = (reported: GenerationUsage): void => {
  usage.promptTokens += reported.promptTokens ?? 0;
  usage.completionTokens += reported.completionTokens ?? 0;
  usage.totalTokens += reported.totalTokens ?? 0;
};

/** Counts search outcomes such as `grounded`, `refused`, `results_only` or `rerank_degraded`. */
export const recordSearchOutcome = (key: string): void => increment(outcomes, key);

export const recordErrorRate = (key: string): void => increment(errorRates, key);

export const getMetricsSnapshot = () => ({
  request_latency: snapshotOf("request"),
  stream_duration: snapshotOf("stream"),
  search_latency: snapshotOf("search"),
  stage_latency: Object.fromEntries(TIMED_PIPELINE_STAGES.map((stage) => [stage, snapshotOf(`stage:${stage}`)])),
  generation_usage: { ...usage },
  outcomes: { ...outcomes },
  error_rates: { ...errorRates }
});

export const resetMetrics = (): void => {
  latencies.clear();
  usage.promptTokens = 0;
  usage.completionTokens = 0;
  usage.totalTokens = 0;
  outcomes = {};
  errorRates = {};
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

/** Echoes the request id as `x-request-id` and records latency plus `http_<status>` error counts. */
export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request, reply) => {
    requestStartedAt.set(request, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    recordRequestLatency(Date.now() - (requestStartedAt.get(request) ?? Date.now()));
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
