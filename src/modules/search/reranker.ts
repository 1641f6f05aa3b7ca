import { z } from "zod";
import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { logInfo, logWarn } from "../../observability/logger.js";
import { recordSearchOutcome } from "../../observability/metrics.js";
import {
  RERANKER_SYSTEM_PROMPT,
  buildRerankerUserPrompt,
  type RerankerPromptCandidate
} from "../../prompts/index.js";
import { callWithPolicy } from "./call-policy.js";
import { SearchCancelledError, describeError } from "./errors.js";
import { tokenize } from "./sparse-encoder.js";
import type { FusedResult } from "./types.js";

export interface Reranker {
  readonly name: string;
  /** Must return a permutation of `results`. */
  rerank(query: string, results: FusedResult[], signal: AbortSignal): Promise<FusedResult[]>;
}

export class RerankerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RerankerError";
  }
}

/** Scores each result by the share of distinct query terms its text contains; ties keep fused order. */
export class LexicalReranker implements Reranker {
  readonly name = "lexical";

  async rerank(query: string, results: FusedResult[]): Promise<FusedResult[]> {
    const queryTerms = [...new Set(tokenize(query))];
    if (queryTerms.length === 0) {
      return results;
    }

    return results
      .map((result) => {
        const terms = new Set(tokenize(`${result.document.embeddableText} ${result.document.displayText}`));
        const covered = queryTerms.filter((term) => terms.has(term)).length;
        return { ...result, rerankScore: covered / queryTerms.length };
      })
      .sort((a, b) => b.rerankScore - a.rerankScore || a.rank - b.rank);
  }
}

const rerankResponseSchema = z.object({
  selected_ids: z.array(z.string()).default([])
});

export type RerankCompletionRequest = {
  model: string;
  system: string;
  user: string;
};

export const requestOpenAIRerankCompletion = async (
  request: RerankCompletionRequest,
  signal: AbortSignal
): Promise<string | null> => {
  const { client } = await getOpenAIClient();
  const response = await client.chat.completions.create(
    {
      model: request.model,
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.user }
      ]
    },
    { signal }
  );
  return response.choices[0]?.message?.content ?? null;
};

export interface OpenAIRerankerOptions {
  model?: string;
  timeoutMs?: number;
  requestCompletion?: (request: RerankCompletionRequest, signal: AbortSignal) => Promise<string | null>;
}

const dedupe = <T>(values: T[]): T[] => [...new Set(values)];

/** Listwise LLM judgment. Ids the model leaves out keep their fused order after the ones it picked. */
export class OpenAIReranker implements Reranker {
  readonly name = "openai";

  private readonly model: string;

  private readonly timeoutMs: number;

  private readonly requestCompletion: (request: RerankCompletionRequest, signal: AbortSignal) => Promise<string | null>;

  constructor(options: OpenAIRerankerOptions = {}) {
    this.model = options.model ?? config.OPENAI_RERANK_MODEL;
    this.timeoutMs = options.timeoutMs ?? config.SEARCH_CALL_TIMEOUT_MS;
    this.requestCompletion = options.requestCompletion ?? requestOpenAIRerankCompletion;
  }

  async rerank(query: string, results: FusedResult[], signal: AbortSignal): Promise<FusedResult[]> {
    const promptCandidates: RerankerPromptCandidate[] = results.map((result, index) => ({
      tempId: `cand_${index + 1}`,
      result
    }));
    const byTempId = new Map(promptCandidates.map((candidate) => [candidate.tempId, candidate.result]));

    const content = await callWithPolicy(
      (attemptSignal) =>
        this.requestCompletion(
          {
            model: this.model,
            system: RERANKER_SYSTEM_PROMPT,
            user: buildRerankerUserPrompt({ query, candidates: promptCandidates })
          },
          attemptSignal
        ),
      { label: "rerank.openai", timeoutMs: this.timeoutMs, signal }
    );

    if (!content || content.trim().length === 0) {
      throw new RerankerError("Reranker returned empty content.");
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid json";
      throw new RerankerError(`Reranker returned invalid JSON: ${message}`);
    }

    const parsed = rerankResponseSchema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new RerankerError("Reranker JSON schema validation failed.");
    }

    const selected: FusedResult[] = [];
    for (const id of dedupe(parsed.data.selected_ids)) {
      const result = byTempId.get(id);
      if (result) {
        selected.push(result);
      }
    }

    const ordered = dedupe([...selected, ...results]);
    return ordered.map((result, index) => ({ ...result, rerankScore: (ordered.length - index) / ordered.length }));
  }
}

export const createReranker = (provider: typeof config.RERANK_PROVIDER = config.RERANK_PROVIDER): Reranker =>
  provider === "openai" ? new OpenAIReranker() : new LexicalReranker();

const isPermutationOf = (candidate: FusedResult[], original: FusedResult[]): boolean => {
  if (candidate.length !== original.length) {
    return false;
  }
  const expected = new Set(original.map((result) => result.documentId));
  const seen = new Set<string>();
  for (const result of candidate) {
    if (!expected.has(result.documentId) || seen.has(result.documentId)) {
      return false;
    }
    seen.add(result.documentId);
  }
  return true;
};

export interface RerankSafelyInput {
  query: string;
  results: FusedResult[];
  reranker: Reranker;
  /** Only the first `topN` results are reordered; the rest follow unchanged. */
  topN: number;
  signal: AbortSignal;
  requestId?: string;
  collection?: string;
}

export interface RerankDependencies {
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordSearchOutcome?: typeof recordSearchOutcome;
}

const resolveDependencies = (dependencies?: RerankDependencies) => ({
  now: dependencies?.now ?? Date.now,
  logInfo: dependencies?.logInfo ?? logInfo,
  logWarn: dependencies?.logWarn ?? logWarn,
  recordSearchOutcome: dependencies?.recordSearchOutcome ?? recordSearchOutcome
});

/**
 * Reorders the head of the fused list. Any reranker failure, or output that is
 * not a permutation of its input, leaves the fused order untouched.
 */
export const rerankSafely = async (input: RerankSafelyInput, dependencies?: RerankDependencies): Promise<FusedResult[]> => {
  const resolved = resolveDependencies(dependencies);
  const head = input.results.slice(0, Math.max(0, input.topN));
  const tail = input.results.slice(head.length);
  if (head.length <= 1) {
    return input.results;
  }

  const startedAt = resolved.now();
  const context = { requestId: input.requestId ?? null, collection: input.collection ?? null };
  try {
    const reordered = await input.reranker.rerank(input.query, head, input.signal);
    if (!isPermutationOf(reordered, head)) {
      throw new RerankerError("Reranker output is not a permutation of its input.");
    }
    resolved.logInfo("search.rerank.complete", context, {
      reranker: input.reranker.name,
      candidate_count: head.length,
      latency_ms: resolved.now() - startedAt
    });
    return [...reordered, ...tail];
  } catch (error) {
    if (input.signal.aborted || error instanceof SearchCancelledError) {
      throw new SearchCancelledError();
    }
    resolved.recordSearchOutcome("rerank_degraded");
    resolved.logWarn("search.rerank.degraded", context, {
      reranker: input.reranker.name,
      candidate_count: head.length,
      error: describeError(error)
    });
    return input.results;
  }
};
