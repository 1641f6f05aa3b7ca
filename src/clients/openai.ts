import OpenAI from "openai";
import { config } from "../config/index.js";
import { probeHealth, type HealthCheckedClient } from "./health.js";

export interface OpenAISingleton extends HealthCheckedClient {
  client: OpenAI;
}

const HEALTH_TIMEOUT_MS = 7000;

let singleton: OpenAISingleton | null = null;

export class OpenAIConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OpenAIConfigurationError";
  }
}

/** True when any configured provider routes through the OpenAI API. */
export const isOpenAIRequired = (): boolean =>
  config.EMBEDDING_PROVIDER === "openai" ||
  config.GENERATION_PROVIDER === "openai" ||
  config.RERANK_PROVIDER === "openai";

const createSingleton = (): OpenAISingleton => {
  if (!config.OPENAI_API_KEY) {
    throw new OpenAIConfigurationError("OPENAI_API_KEY is missing.");
  }

  // Retries and per-call timeouts are owned by the search call policy.
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: 0,
    timeout: HEALTH_TIMEOUT_MS
  });
  console.info("[clients/openai] initialized singleton");

  return {
    client,
    healthCheck: () =>
      probeHealth(async () => {
        const controller = new AbortController();
        const timeoutHandle = setTimeout(() => controller.abort(), HEALTH_TIMEOUT_MS);
        try {
          await client.models.retrieve(config.OPENAI_MODEL, { signal: controller.signal });
        } finally {
          clearTimeout(timeoutHandle);
        }
      })
  };
};

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  singleton ??= createSingleton();
  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  console.info("[clients/openai] shutdown complete");
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
