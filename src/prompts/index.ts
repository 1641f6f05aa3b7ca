import type { FusedResult } from "../modules/search/types.js";

export const REFUSAL_COMPLETION = "No relevant information found in this collection.";

export const ANSWER_SYSTEM_PROMPT = [
  "You answer questions about a search collection using only the numbered results you are given.",
  "Do not use outside knowledge.",
  "After every sentence or clause that relies on a result, cite it with its number in double square brackets, for example [[1]] or [[2]][[3]].",
  "Cite only result numbers that appear in the context, one number per bracket pair, never ranges and never links.",
  "Start directly with the answer, keep it concise and use markdown lists or tables when they help.",
  "If a result only partially answers the question, answer the supported part and say what is missing.",
  "A higher score means a result is more related, but check every constraint against the result's own fields and content.",
  "When results disagree, prefer the one with the higher score and mention the conflict briefly.",
  "When the question asks to find, list or show items matching constraints, switch to list mode:",
  'start with "Matches found: N (Partial: M)", then write one bullet per item labelled "Match:" when the results satisfy every constraint',
  'or "Partial:" when some constraint is missing or uncertain, naming those constraints;',
  "each bullet gives a short identifier, a brief justification and its citation.",
  `If none of the results is relevant, reply with exactly: "${REFUSAL_COMPLETION}"`
].join(" ");

const describeMetadata = (result: FusedResult): string => {
  const entries = Object.entries(result.document.metadata)
    .filter(([key]) => key !== "updated_at" && key !== "table_name")
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}=${String(value)}`);
  return entries.length > 0 ? entries.join(", ") : "(none)";
};

/** Numbers evidence 1..N in final rank order; the numbers are the valid citation markers. */
export const buildAnswerContextBlock = (evidence: FusedResult[]): string =>
  evidence
    .map((result, index) =>
      [
        `Result ${index + 1}`,
        `source: ${result.document.sourceTable ?? "unknown"}`,
        `updated_at: ${result.document.updatedAt ?? "unknown"}`,
        `score: ${result.fusedScore.toFixed(6)}`,
        `fields: ${describeMetadata(result)}`,
        "content:",
        result.document.embeddableText
      ].join("\n")
    )
    .join("\n\n");

export const buildAnswerUserPrompt = (input: { query: string; evidence: FusedResult[] }): string =>
  [
    "Context results:",
    buildAnswerContextBlock(input.evidence),
    "",
    "Question:",
    input.query
  ].join("\n");

export type RerankerPromptCandidate = {
  tempId: string;
  result: FusedResult;
};

export const RERANKER_SYSTEM_PROMPT = [
  "You are a search result reranker.",
  "Order the candidate results from most to least useful for answering the user's query.",
  "Return only valid JSON with a `selected_ids` array containing candidate IDs in best-to-worst order.",
  "Use only candidate IDs that were provided.",
  "Do not include any explanation or extra keys."
].join(" ");

export const buildRerankerUserPrompt = (input: {
  query: string;
  candidates: RerankerPromptCandidate[];
}): string => {
  const candidateLines = input.candidates.map(({ tempId, result }, index) =>
    [
      `Candidate ${index + 1} (${tempId})`,
      `source: ${result.document.sourceTable ?? "unknown"}`,
      `fused_score: ${result.fusedScore.toFixed(6)}`,
      "text:",
      result.document.embeddableText
    ].join("\n")
  );

  return [
    "User query:",
    input.query,
    "",
    `Order all ${input.candidates.length} candidates.`,
    "Return JSON exactly like:",
    '{"selected_ids":["cand_2","cand_1"]}',
    "",
    "Candidates:",
    ...candidateLines
  ].join("\n");
};
