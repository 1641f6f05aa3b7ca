import { describe, expect, it, vi } from "vitest";
import {
  REFUSAL_COMPLETION,
  buildAnswerMessages,
  extractCitationMarkers,
  streamAnswer,
  synthesizeAnswer,
  validateGrounding,
  type SynthesisEvent,
  type SynthesizeInput
} from "../../src/modules/search/answer-synthesizer.js";
import { GenerationUnavailableError, SearchCancelledError } from "../../src/modules/search/errors.js";
import type { Generator } from "../../src/modules/search/generator.js";
import type { FusedResult } from "../../src/modules/search/types.js";
import {
  HangingGenerator,
  ScriptedGenerator,
  makeDocument,
  makeFused
} from "../../tests/helpers/search-fixtures.js";

const frankEvidence = (): FusedResult[] => [
  makeFused("employees:frank", 1, {
    document: makeDocument("employees:frank", {
      embeddableText: "Frank - Senior Developer - rate: 30.0 USD/hour",
      displayText: "Frank - Senior Developer - rate: 30.0 USD/hour"
    })
  })
];

const makeInput = (generator: Generator, overrides: Partial<SynthesizeInput> = {}): SynthesizeInput => ({
  query: "Which employee has the highest hourly rate?",
  evidence: frankEvidence(),
  minScoreThreshold: 0.01,
  generator,
  timeoutMs: 1000,
  signal: new AbortController().signal,
  requestId: "req-1",
  collection: "staff",
  ...overrides
});

const quietDependencies = () => ({
  now: () => 0,
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  recordGenerationUsage: vi.fn(),
  recordSearchOutcome: vi.fn()
});

const collect = async (stream: AsyncGenerator<SynthesisEvent, unknown, void>): Promise<SynthesisEvent[]> => {
  const events: SynthesisEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
};

describe("modules/search/answer-synthesizer", () => {
  it("streams tokens and completes with a grounded answer", async () => {
    const generator = new ScriptedGenerator([{ tokens: ["Frank has the highest rate ", "at 30.0 USD/hour [[1]]"] }]);
    const dependencies = quietDependencies();

    const events = await collect(streamAnswer(makeInput(generator), dependencies));

    expect(events).toEqual([
      { type: "token", token: "Frank has the highest rate " },
      { type: "token", token: "at 30.0 USD/hour [[1]]" },
      {
        type: "complete",
        outcome: {
          state: "grounded",
          completion: "Frank has the highest rate at 30.0 USD/hour [[1]]",
          citations: [{ marker: 1, documentId: "employees:frank" }],
          fallbackTriggered: false
        }
      }
    ]);
    expect(dependencies.recordGenerationUsage).toHaveBeenCalledWith({
      promptTokens: 10,
      completionTokens: 5,
      totalTokens: 15
    });
    expect(dependencies.recordSearchOutcome).toHaveBeenCalledWith("grounded");
    expect(dependencies.logInfo).toHaveBeenCalledWith(
      "search.answer.grounded",
      { requestId: "req-1", collection: "staff" },
      { generator: "scripted", evidence_count: 1, citation_count: 1, latency_ms: 0 }
    );
  });

  it("sends the numbered evidence to the generator", async () => {
    const generator = new ScriptedGenerator([{ tokens: ["Frank [[1]]"] }]);

    await synthesizeAnswer(makeInput(generator), quietDependencies());

    const [system, user] = generator.requests[0];
    expect(system.role).toBe("system");
    expect(user.content).toContain("Result 1\nsource: employees");
    expect(user.content).toContain("Frank - Senior Developer - rate: 30.0 USD/hour");
    expect(user.content.endsWith("Question:\nWhich employee has the highest hourly rate?")).toBe(true);
  });

  it("refuses an answer without citation markers", async () => {
    const generator = new ScriptedGenerator([{ tokens: ["Frank earns the most."] }]);
    const dependencies = quietDependencies();

    const outcome = await synthesizeAnswer(makeInput(generator), dependencies);

    expect(outcome).toEqual({
      state: "refused",
      completion: REFUSAL_COMPLETION,
      citations: [],
      fallbackTriggered: true,
      reason: "ungrounded"
    });
    expect(dependencies.recordSearchOutcome).toHaveBeenCalledWith("refused");
    expect(dependencies.logWarn).toHaveBeenCalledWith(
      "search.answer.ungrounded",
      { requestId: "req-1", collection: "staff" },
      expect.objectContaining({ citation_count: 0, completion_length: 21 })
    );
  });

  it("yields no tokens before refusing an uncited answer", async () => {
    const generator = new ScriptedGenerator([{ tokens: ["Frank earns ", "the most."] }]);

    const events = await collect(streamAnswer(makeInput(generator), quietDependencies()));

    expect(events).toEqual([
      {
        type: "complete",
        outcome: {
          state: "refused",
          completion: REFUSAL_COMPLETION,
          citations: [],
          fallbackTriggered: true,
          reason: "ungrounded"
        }
      }
    ]);
  });

  it("refuses an answer citing a result that does not exist", async () => {
    const outOfRange = await synthesizeAnswer(
      makeInput(new ScriptedGenerator([{ tokens: ["Frank [[1]] and Grace [[2]]"] }])),
      quietDependencies()
    );
    const zero = await synthesizeAnswer(makeInput(new ScriptedGenerator([{ tokens: ["Frank [[0]]"] }])), quietDependencies());

    expect(outOfRange.fallbackTriggered).toBe(true);
    expect(outOfRange.completion).toBe(REFUSAL_COMPLETION);
    expect(zero.fallbackTriggered).toBe(true);
  });

  it("refuses without calling the generator when there is no evidence", async () => {
    const generator = new ScriptedGenerator([{ tokens: ["unused [[1]]"] }]);
    const dependencies = quietDependencies();

    const events = await collect(streamAnswer(makeInput(generator, { evidence: [] }), dependencies));

    expect(events).toEqual([
      {
        type: "complete",
        outcome: {
          state: "refused",
          completion: REFUSAL_COMPLETION,
          citations: [],
          fallbackTriggered: true,
          reason: "no_evidence"
        }
      }
    ]);
    expect(generator.requests).toHaveLength(0);
    expect(dependencies.logInfo).toHaveBeenCalledWith(
      "search.answer.refused",
      { requestId: "req-1", collection: "staff" },
      { reason: "no_evidence", evidence_count: 0, top_score: null, min_score_threshold: 0.01 }
    );
  });

  it("refuses when the best evidence scores below the threshold", async () => {
    const generator = new ScriptedGenerator([{ tokens: ["unused [[1]]"] }]);
    const evidence = [makeFused("employees:frank", 1, { fusedScore: 0.005 })];

    const outcome = await synthesizeAnswer(makeInput(generator, { evidence }), quietDependencies());

    expect(outcome).toEqual(expect.objectContaining({ state: "refused", reason: "below_threshold" }));
    expect(generator.requests).toHaveLength(0);
  });

  it("retries a generation that failed before its first token", async () => {
    const generator = new ScriptedGenerator([{ error: new Error("connection reset") }, { tokens: ["Frank [[1]]"] }]);
    const dependencies = quietDependencies();

    const outcome = await synthesizeAnswer(makeInput(generator), dependencies);

    expect(outcome.state).toBe("grounded");
    expect(generator.requests).toHaveLength(2);
    expect(dependencies.logWarn).toHaveBeenCalledWith(
      "search.answer.generation_failed",
      { requestId: "req-1", collection: "staff" },
      { generator: "scripted", attempt: 1, tokens_received: 0, will_retry: true, error: "connection reset" }
    );
  });

  it("retries a stream that broke mid-answer and drops its partial text", async () => {
    const generator = new ScriptedGenerator([
      { tokens: ["Frank "], error: new Error("stream reset"), errorAfterTokens: true },
      { tokens: ["Grace ", "[[1]]"] }
    ]);
    const dependencies = quietDependencies();

    const events = await collect(streamAnswer(makeInput(generator), dependencies));

    expect(events).toEqual([
      { type: "token", token: "Grace " },
      { type: "token", token: "[[1]]" },
      {
        type: "complete",
        outcome: {
          state: "grounded",
          completion: "Grace [[1]]",
          citations: [{ marker: 1, documentId: "employees:frank" }],
          fallbackTriggered: false
        }
      }
    ]);
    expect(generator.requests).toHaveLength(2);
    expect(dependencies.logWarn).toHaveBeenCalledWith(
      "search.answer.generation_failed",
      { requestId: "req-1", collection: "staff" },
      { generator: "scripted", attempt: 1, tokens_received: 1, will_retry: true, error: "stream reset" }
    );
  });

  it("fails once the retried stream breaks too, without yielding partial text", async () => {
    const generator = new ScriptedGenerator([
      { tokens: ["Frank "], error: new Error("stream reset"), errorAfterTokens: true }
    ]);

    const events: SynthesisEvent[] = [];
    let caught: unknown;
    try {
      for await (const event of streamAnswer(makeInput(generator), quietDependencies())) {
        events.push(event);
      }
    } catch (error) {
      caught = error;
    }

    expect(events).toEqual([]);
    expect(caught).toBeInstanceOf(GenerationUnavailableError);
    expect(caught).toEqual(expect.objectContaining({ message: "Answer generation failed: stream reset", statusCode: 502 }));
    expect(generator.requests).toHaveLength(2);
  });

  it("does not retry rejected requests", async () => {
    const unauthorized = Object.assign(new Error("invalid api key"), { status: 401 });
    const generator = new ScriptedGenerator([{ error: unauthorized }, { tokens: ["Frank [[1]]"] }]);

    await expect(synthesizeAnswer(makeInput(generator), quietDependencies())).rejects.toBeInstanceOf(
      GenerationUnavailableError
    );
    expect(generator.requests).toHaveLength(1);
  });

  it("gives up after the generation times out twice", async () => {
    await expect(
      synthesizeAnswer(makeInput(new HangingGenerator(), { timeoutMs: 10 }), quietDependencies())
    ).rejects.toThrow("Answer generation failed: generation.hanging timed out after 10ms");
  });

  it("stops when the caller cancels", async () => {
    const controller = new AbortController();
    const outcome = synthesizeAnswer(makeInput(new HangingGenerator(), { signal: controller.signal }), quietDependencies());
    setTimeout(() => controller.abort(), 5);

    await expect(outcome).rejects.toBeInstanceOf(SearchCancelledError);
  });

  it("extracts markers in order and de-duplicates citations", () => {
    const evidence = [makeFused("a", 1), makeFused("b", 2)];

    expect(extractCitationMarkers("x [[2]] y [[1]][[2]] [3] [[ 1 ]]")).toEqual([2, 1, 2]);
    expect(validateGrounding("  A [[2]] B [[1]] C [[2]]  ", evidence)).toEqual({
      state: "grounded",
      completion: "A [[2]] B [[1]] C [[2]]",
      citations: [
        { marker: 2, documentId: "b" },
        { marker: 1, documentId: "a" }
      ],
      fallbackTriggered: false
    });
  });

  it("builds a system and a user message", () => {
    const messages = buildAnswerMessages("atlas status", [makeFused("projects:atlas", 1)]);

    expect(messages.map((message) => message.role)).toEqual(["system", "user"]);
    expect(messages[0].content).toContain(REFUSAL_COMPLETION);
    expect(messages[1].content).toContain("Result 1");
  });

  it("instructs list mode and preferring higher-scored results", () => {
    const [system] = buildAnswerMessages("list senior developers", [makeFused("employees:frank", 1)]);

    expect(system.content).toContain("When results disagree, prefer the one with the higher score");
    expect(system.content).toContain("When the question asks to find, list or show items matching constraints, switch to list mode:");
    expect(system.content).toContain('start with "Matches found: N (Partial: M)"');
    expect(system.content).toContain('labelled "Match:"');
    expect(system.content).toContain('or "Partial:"');
  });
});
