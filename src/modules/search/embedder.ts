import { z } from "zod";
import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { encodeSparseQuery } from "./sparse-encoder.js";
import type { SparseVector } from "./types.js";

export interface DenseEmbedder {
  readonly name: string;
  embed(text: string, signal: AbortSignal): Promise<number[]>;
}

export interface SparseEmbedder {
  readonly name: string;
  embed(text: string): SparseVector | null;
}

export class EmbeddingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingError";
  }
}

const assertVector = (vector: unknown, source: string): number[] => {
  if (Array.isArray(vector) && vector.length > 0 && vector.every((value): value is number => typeof value === "number")) {
    return vector;
  }
  throw new EmbeddingError(`${source} response missing vector payload.`);
};

export type EmbeddingRequest = {
  model: string;
  input: string;
};

export const requestOpenAIEmbedding = async (request: EmbeddingRequest, signal: AbortSignal): Promise<unknown> => {
  const { client } = await getOpenAIClient();
  const response = await client.embeddings.create(request, { signal });
  return response.data[0]?.embedding;
};

export interface OpenAIDenseEmbedderOptions {
  model?: string;
  requestEmbedding?: (request: EmbeddingRequest, signal: AbortSignal) => Promise<unknown>;
}

export class OpenAIDenseEmbedder implements DenseEmbedder {
  readonly name = "openai";

  private readonly model: string;

  private readonly requestEmbedding: (request: EmbeddingRequest, signal: AbortSignal) => Promise<unknown>;

  constructor(options: OpenAIDenseEmbedderOptions = {}) {
    this.model = options.model ?? config.OPENAI_EMBEDDING_MODEL;
    this.requestEmbedding = options.requestEmbedding ?? requestOpenAIEmbedding;
  }

  async embed(text: string, signal: AbortSignal): Promise<number[]> {
    const embedding = await this.requestEmbedding({ model: this.model, input: text }, signal);
    return assertVector(embedding, "Embedding");
  }
}

const text2VecResponseSchema = z.object({
  vector: z.array(z.number())
});

export interface Text2VecDenseEmbedderOptions {
  baseUrl?: string;
  fetchFn?: typeof fetch;
}

/** Talks to a local text2vec-transformers inference container (`POST /vectors`). */
export class Text2VecDenseEmbedder implements DenseEmbedder {
  readonly name = "text2vec";

  private readonly baseUrl: string;

  private readonly fetchFn: typeof fetch;

  constructor(options: Text2VecDenseEmbedderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.TEXT2VEC_INFERENCE_URL).replace(/\/+$/, "");
    this.fetchFn = options.fetchFn ?? fetch;
  }

  private async post(path: string, text: string, signal: AbortSignal): Promise<number[]> {
    const response = await this.fetchFn(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ text }),
      signal
    });
    if (!response.ok) {
      throw new EmbeddingError(`text2vec request failed (${response.status})`);
    }
    const parsed = text2VecResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingError("text2vec response missing vector payload.");
    }
    return assertVector(parsed.data.vector, "text2vec");
  }

  async embed(text: string, signal: AbortSignal): Promise<number[]> {
    try {
      return await this.post("/vectors", text, signal);
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      // Some inference images only serve the trailing-slash route.
      return this.post("/vectors/", text, signal);
    }
  }
}

export class Bm25SparseEmbedder implements SparseEmbedder {
  readonly name = "bm25";

  embed(text: string): SparseVector | null {
    return encodeSparseQuery(text);
  }
}

export const createDenseEmbedder = (provider: typeof config.EMBEDDING_PROVIDER = config.EMBEDDING_PROVIDER): DenseEmbedder =>
  provider === "text2vec" ? new Text2VecDenseEmbedder() : new OpenAIDenseEmbedder();
