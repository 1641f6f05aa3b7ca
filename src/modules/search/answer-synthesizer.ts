import { logInfo, logWarn } from "../../observability/logger.js";
import { recordGenerationUsage, recordSearchOutcome } from "../../observability/metrics.js";
import { ANSWER_SYSTEM_PROMPT, REFUSAL_COMPLETION, buildAnswerUserPrompt } from "../../prompts/index.js";
import { CallTimeoutError, isTransientFailure } from "./call-policy.js";
import { GenerationUnavailableError, SearchCancelledError, describeError } from "./errors.js";
import type { GenerationMessage, Generator } from "./generator.js";
import type { Citation, FusedResult } from "./types.js";

export { REFUSAL_COMPLETION };

const CITATION_MARKER_PATTERN = /\[\[(\d+)\]\]/g;

const GENERATION_ATTEMPTS = 2;

export type RefusalReason = "no_evidence" | "below_threshold" | "ungrounded";

export type SynthesisOutcome =
  | { state: "grounded"; completion: string; citations: Citation[]; fallbackTriggered: false }
  | { state: "refused"; completion: string; citations: []; fallbackTriggered: true; reason: RefusalReason };

export type SynthesisEvent =
  | { type: "token"; token: string }
  | { type: "complete"; outcome: SynthesisOutcome };

export interface SynthesizeInput {
  query: string;
  evidence: FusedResult[];
  minScoreThreshold: number;
  generator: Generator;
  timeoutMs: number;
  signal: AbortSignal;
  requestId?: string;
  collection?: string;
}

export interface SynthesizerDependencies {
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordGenerationUsage?: typeof recordGenerationUsage;
  recordSearchOutcome?: typeof recordSearchOutcome;
}

const resolveDependencies = (dependencies?: SynthesizerDependencies) => ({
  now: dependencies?.now ?? Date.now,
  logInfo: dependencies?.logInfo ?? logInfo,
  logWarn: dependencies?.logWarn ?? logWarn,
  recordGenerationUsage: dependencies?.recordGenerationUsage ?? recordGenerationUsage,
  recordSearchOutcome: dependencies?.recordSearchOutcome ?? recordSearchOutcome
});

export const refuse = (reason: RefusalReason): SynthesisOutcome => ({
  state: "refused",
  completion: REFUSAL_COMPLETION,
  citations: [],
  fallbackTriggered: true,
  reason
});

/** Every `[[n]]` marker in order of appearance, duplicates included. */
export const extractCitationMarkers = (text: string): number[] =>
  [...text.matchAll(CITATION_MARKER_PATTERN)].map((match) => Number.parseInt(match[1], 10));

/**
 * Grounded only when the text carries at least one marker and every marker
 * points at an evidence position in `[1, evidence.length]`.
 */
export const validateGrounding = (text: string, evidence: FusedResult[]): SynthesisOutcome => {
  const markers = extractCitationMarkers(text);
  if (markers.length === 0 || markers.some((marker) => marker < 1 || marker > evidence.length)) {
    return refuse("ungrounded");
  }

  const citations: Citation[] = [];
  const seen = new Set<number>();
  for (const marker of markers) {
    if (!seen.has(marker)) {
      seen.add(marker);
      citations.push({ marker, documentId: evidence[marker - 1].documentId });
    }
  }
  return { state: "grounded", completion: text.trim(), citations, fallbackTriggered: false };
};

/** Returns the refusal reason when evidence cannot support an answer at all. */
export const checkEvidence = (evidence: FusedResult[], minScoreThreshold: number): RefusalReason | null => {
  if (evidence.length === 0) {
    return "no_evidence";
  }
  return evidence[0].fusedScore < minScoreThreshold ? "below_threshold" : null;
};

export const buildAnswerMessages = (query: string, evidence: FusedResult[]): GenerationMessage[] => [
  { role: "system", content: ANSWER_SYSTEM_PROMPT },
  { role: "user", content: buildAnswerUserPrompt({ query, evidence }) }
];

/**
 * Yields the answer's tokens, then exactly one `complete` event carrying the
 * outcome. Tokens are held back until the whole answer has passed citation
 * validation, so a refused answer yields no tokens at all. A refusal on the
 * evidence never calls the generator. A transient generation failure is
 * retried once; partial text from the failed attempt is discarded.
 */
export async function* streamAnswer(
  input: SynthesizeInput,
  dependencies?: SynthesizerDependencies
): AsyncGenerator<SynthesisEvent, SynthesisOutcome, void> {
  const resolved = resolveDependencies(dependencies);
  const context = { requestId: input.requestId ?? null, collection: input.collection ?? null };

  const refusal = checkEvidence(input.evidence, input.minScoreThreshold);
  if (refusal) {
    const outcome = refuse(refusal);
    resolved.recordSearchOutcome("refused");
    resolved.logInfo("search.answer.refused", context, {
      reason: refusal,
      evidence_count: input.evidence.length,
      top_score: input.evidence[0]?.fusedScore ?? null,
      min_score_threshold: input.minScoreThreshold
    });
    yield { type: "complete", outcome };
    return outcome;
  }

  const messages = buildAnswerMessages(input.query, input.evidence);
  const startedAt = resolved.now();
  let tokens: string[] = [];

  for (let attempt = 1; attempt <= GENERATION_ATTEMPTS; attempt += 1) {
    if (input.signal.aborted) {
      throw new SearchCancelledError();
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(input.signal.reason);
    input.signal.addEventListener("abort", forwardAbort, { once: true });
    const timeoutHandle = setTimeout(
      () => controller.abort(new CallTimeoutError(`generation.${input.generator.name}`, input.timeoutMs)),
      input.timeoutMs
    );

    try {
      for await (const chunk of input.generator.generate(messages, controller.signal)) {
        if (controller.signal.aborted) {
          throw controller.signal.reason ?? new CallTimeoutError(`generation.${input.generator.name}`, input.timeoutMs);
        }
        if (chunk.type === "usage") {
          resolved.recordGenerationUsage(chunk.usage);
          continue;
        }
        tokens.push(chunk.token);
      }
      break;
    } catch (error) {
      if (input.signal.aborted || error instanceof SearchCancelledError) {
        throw new SearchCancelledError();
      }
      const retryable = attempt < GENERATION_ATTEMPTS && isTransientFailure(error);
      resolved.logWarn("search.answer.generation_failed", context, {
        generator: input.generator.name,
        attempt,
        tokens_received: tokens.length,
        will_retry: retryable,
        error: describeError(error)
      });
      if (!retryable) {
        throw new GenerationUnavailableError(`Answer generation failed: ${describeError(error)}`, { cause: error });
      }
      tokens = [];
    } finally {
      clearTimeout(timeoutHandle);
      input.signal.removeEventListener("abort", forwardAbort);
    }
  }

  const text = tokens.join("");
  const outcome = validateGrounding(text, input.evidence);
  resolved.recordSearchOutcome(outcome.state === "grounded" ? "grounded" : "refused");
  const fields = {
    generator: input.generator.name,
    evidence_count: input.evidence.length,
    citation_count: outcome.citations.length,
    latency_ms: resolved.now() - startedAt
  };
  if (outcome.state === "grounded") {
    resolved.logInfo("search.answer.grounded", context, fields);
    for (const token of tokens) {
      yield { type: "token", token };
    }
  } else {
    resolved.logWarn("search.answer.ungrounded", context, { ...fields, completion_length: text.length });
  }

  yield { type: "complete", outcome };
  return outcome;
}

/** Drained form of {@link streamAnswer}. */
export const synthesizeAnswer = async (
  input: SynthesizeInput,
  dependencies?: SynthesizerDependencies
): Promise<SynthesisOutcome> => {
  const stream = streamAnswer(input, dependencies);
  while (true) {
    const next = await stream.next();
    if (next.done) {
      return next.value;
    }
  }
};
