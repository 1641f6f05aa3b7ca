import type { SparseVector } from "./types.js";

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "does", "for", "from", "has", "have",
  "how", "in", "is", "it", "its", "of", "on", "or", "that", "the", "this", "to", "was",
  "what", "when", "where", "which", "who", "with"
]);

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export interface DocumentEncodingOptions {
  k1?: number;
  b?: number;
  averageDocumentLength?: number;
}

export const tokenize = (text: string): string[] =>
  text
    .normalize("NFKC")
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0 && !STOPWORDS.has(token));

/** Stable 32-bit FNV-1a hash of a term, used as its sparse dimension. */
export const termIndex = (term: string): number => {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(term, "utf8")) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
};

const toSparseVector = (weights: Map<number, number>): SparseVector => {
  const indices = [...weights.keys()].sort((a, b) => a - b);
  return {
    indices,
    values: indices.map((index) => weights.get(index) ?? 0)
  };
};

const countTerms = (tokens: string[]): Map<number, number> => {
  const counts = new Map<number, number>();
  for (const token of tokens) {
    const index = termIndex(token);
    counts.set(index, (counts.get(index) ?? 0) + 1);
  }
  return counts;
};

/** Query side: every distinct term weighs 1. Returns null when no term survives tokenization. */
export const encodeSparseQuery = (text: string): SparseVector | null => {
  const counts = countTerms([...new Set(tokenize(text))]);
  if (counts.size === 0) {
    return null;
  }
  return toSparseVector(new Map([...counts.keys()].map((index) => [index, 1])));
};

/** Document side: BM25 term-frequency saturation with length normalisation. */
export const encodeSparseDocument = (text: string, options: DocumentEncodingOptions = {}): SparseVector | null => {
  const k1 = options.k1 ?? 1.2;
  const b = options.b ?? 0.75;
  const averageDocumentLength = options.averageDocumentLength ?? 256;
  const tokens = tokenize(text);
  if (tokens.length === 0) {
    return null;
  }

  const lengthNorm = 1 - b + b * (tokens.length / averageDocumentLength);
  const weights = new Map<number, number>();
  for (const [index, frequency] of countTerms(tokens)) {
    weights.set(index, (frequency * (k1 + 1)) / (frequency + k1 * lengthNorm));
  }
  return toSparseVector(weights);
};

export const sparseDotProduct = (a: SparseVector, b: SparseVector): number => {
  const weights = new Map<number, number>();
  a.indices.forEach((index, position) => {
    weights.set(index, (weights.get(index) ?? 0) + (a.values[position] ?? 0));
  });

  let score = 0;
  b.indices.forEach((index, position) => {
    score += (weights.get(index) ?? 0) * (b.values[position] ?? 0);
  });
  return score;
};
