import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { createLocalVectorStoreClient } from "./local-vector-store.js";
import { probeHealth, retryStartup, type HealthCheckedClient } from "./health.js";
import type { VectorIndexClient } from "./vector-index.js";

export interface QdrantSingleton extends HealthCheckedClient {
  client: VectorIndexClient;
}

export class QdrantConfigurationError extends Error {
  constructor(message = "QDRANT_URL is required outside local mode.") {
    super(message);
    this.name = "QdrantConfigurationError";
  }
}

const REQUEST_TIMEOUT_MS = 5000;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

/** Narrows the REST client to the read surface used by retrieval. */
export function toVectorIndexClient(client: QdrantClient): VectorIndexClient {
  return {
    async query(collection, request, signal) {
      // The REST client takes no signal per call; an aborted attempt is not sent.
      signal?.throwIfAborted();
      const response = await client.query(collection, {
        query: request.query,
        using: request.using,
        filter: request.filter,
        limit: request.limit,
        with_payload: true
      });
      return response.points.map((point) => ({
        id: point.id,
        score: point.score,
        payload: point.payload ?? {}
      }));
    },
    async collectionExists(collection) {
      const response = await client.collectionExists(collection);
      return response.exists;
    },
    async listCollections() {
      const response = await client.getCollections();
      return response.collections.map((collection) => collection.name);
    }
  };
}

const connectLocal = (): QdrantSingleton => {
  const localClient = createLocalVectorStoreClient();
  console.info("[clients/qdrant] initialized singleton (local file vector store)");
  return {
    client: localClient,
    healthCheck: () =>
      probeHealth(async () => {
        await localClient.listCollections();
        return "local file vector store";
      })
  };
};

async function connect(): Promise<QdrantSingleton> {
  // Local mode without QDRANT_URL reads the file-backed store instead of a server.
  if (!config.QDRANT_URL) {
    if (config.APP_MODE !== "local") {
      throw new QdrantConfigurationError();
    }
    return connectLocal();
  }

  const rest = new QdrantClient({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY || undefined,
    timeout: REQUEST_TIMEOUT_MS
  });

  await retryStartup(() => rest.getCollections(), { attempts: 3, baseDelayMs: 250 });
  console.info("[clients/qdrant] initialized singleton");

  return {
    client: toVectorIndexClient(rest),
    healthCheck: () =>
      probeHealth(async () => {
        const { exists } = await rest.collectionExists(config.QDRANT_COLLECTION);
        return exists ? undefined : `collection ${config.QDRANT_COLLECTION} not created yet`;
      })
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  initPromise ??= connect().catch((error: unknown) => {
    initPromise = null;
    throw error;
  });
  singleton = await initPromise;
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  console.info("[clients/qdrant] shutdown complete");
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
