import { z } from "zod";
import { OpenAIConfigurationError } from "../../clients/openai.js";
import { config } from "../../config/index.js";

const OPENAI_CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";

export type GenerationMessage = {
  role: "system" | "user";
  content: string;
};

export type GenerationUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

export type GenerationChunk =
  | { type: "token"; token: string }
  | { type: "usage"; usage: GenerationUsage };

/** A text generation backend. Implementations must stop when `signal` aborts. */
export interface Generator {
  readonly name: string;
  generate(messages: GenerationMessage[], signal: AbortSignal): AsyncGenerator<GenerationChunk, void, void>;
}

export class GenerationRequestError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "GenerationRequestError";
    this.status = status;
  }
}

const openAIStreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).nullish()
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional()
    })
    .nullish()
});

/** Splits an SSE byte stream into the payloads of its `data:` lines. */
export async function* readSseData(body: NonNullable<Response["body"]>): AsyncGenerator<string, void, void> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const chunk = await reader.read();
      if (chunk.done) {
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const rawLine of lines) {
        const line = rawLine.trim();
        if (line.startsWith("data:")) {
          yield line.slice(5).trim();
        }
      }
    }

    const rest = buffer.trim();
    if (rest.startsWith("data:")) {
      yield rest.slice(5).trim();
    }
  } finally {
    reader.releaseLock();
  }
}

export interface OpenAIStreamingGeneratorOptions {
  model?: string;
  apiKey?: string;
  url?: string;
  fetchFn?: typeof fetch;
}

export class OpenAIStreamingGenerator implements Generator {
  readonly name = "openai";

  private readonly model: string;

  private readonly apiKey: string | undefined;

  private readonly url: string;

  private readonly fetchFn: typeof fetch;

  constructor(options: OpenAIStreamingGeneratorOptions = {}) {
    this.model = options.model ?? config.OPENAI_MODEL;
    this.apiKey = options.apiKey ?? config.OPENAI_API_KEY;
    this.url = options.url ?? OPENAI_CHAT_COMPLETIONS_URL;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async *generate(messages: GenerationMessage[], signal: AbortSignal): AsyncGenerator<GenerationChunk, void, void> {
    if (!this.apiKey) {
      throw new OpenAIConfigurationError("OPENAI_API_KEY is missing for streaming.");
    }

    const response = await this.fetchFn(this.url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({
        model: this.model,
        stream: true,
        temperature: 0,
        stream_options: {
          include_usage: true
        },
        messages
      }),
      signal
    });

    if (!response.ok) {
      const details = await response.text();
      throw new GenerationRequestError(`OpenAI streaming request failed (${response.status}): ${details}`, response.status);
    }

    if (!response.body) {
      throw new GenerationRequestError("OpenAI response body is missing.");
    }

    for await (const payload of readSseData(response.body)) {
      if (payload === "[DONE]") {
        return;
      }

      let json: unknown;
      try {
        json = JSON.parse(payload);
      } catch {
        continue;
      }

      const parsed = openAIStreamChunkSchema.safeParse(json);
      if (!parsed.success) {
        continue;
      }

      const token = parsed.data.choices?.[0]?.delta?.content ?? "";
      if (token.length > 0) {
        yield { type: "token", token };
      }

      const usage = parsed.data.usage;
      if (usage) {
        yield {
          type: "usage",
          usage: {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens
          }
        };
      }
    }
  }
}

const ollamaChatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional()
});

export interface OllamaGeneratorOptions {
  baseUrl?: string;
  model?: string;
  fetchFn?: typeof fetch;
}

/** Local Ollama chat endpoint; answers arrive in one piece. */
export class OllamaGenerator implements Generator {
  readonly name = "ollama";

  private readonly baseUrl: string;

  private readonly model: string;

  private readonly fetchFn: typeof fetch;

  constructor(options: OllamaGeneratorOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.OLLAMA_BASE_URL).replace(/\/+$/, "");
    this.model = options.model ?? config.OLLAMA_MODEL;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async *generate(messages: GenerationMessage[], signal: AbortSignal): AsyncGenerator<GenerationChunk, void, void> {
    const response = await this.fetchFn(`${this.baseUrl}/api/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        messages,
        stream: false,
        options: { temperature: 0 }
      }),
      signal
    });

    if (!response.ok) {
      const details = await response.text();
      throw new GenerationRequestError(`Ollama request failed (${response.status}): ${details}`, response.status);
    }

    const parsed = ollamaChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GenerationRequestError("Ollama response missing message content.");
    }

    if (parsed.data.message.content.length > 0) {
      yield { type: "token", token: parsed.data.message.content };
    }
    const promptTokens = parsed.data.prompt_eval_count;
    const completionTokens = parsed.data.eval_count;
    yield {
      type: "usage",
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: (promptTokens ?? 0) + (completionTokens ?? 0)
      }
    };
  }
}

export const createGenerator = (provider: typeof config.GENERATION_PROVIDER = config.GENERATION_PROVIDER): Generator =>
  provider === "ollama" ? new OllamaGenerator() : new OpenAIStreamingGenerator();
