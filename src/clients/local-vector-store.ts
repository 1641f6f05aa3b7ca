import fs from "node:fs/promises";
import path from "node:path";
import { config } from "../config/index.js";
import { sparseDotProduct } from "../modules/search/sparse-encoder.js";
import {
  matchesIndexFilter,
  type IndexFilter,
  type IndexPoint,
  type IndexQueryRequest,
  type IndexSparseVector,
  type VectorIndexClient
} from "./vector-index.js";

export type StoredVector = number[] | IndexSparseVector;

export type StoredPoint = {
  id: string;
  vectors: Record<string, StoredVector>;
  payload: Record<string, unknown>;
};

export type StoreShape = {
  collections: Record<string, StoredPoint[]>;
};

const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";

export function resolveStorePath(configured: string | undefined = config.LOCAL_VECTOR_STORE_FILE): string {
  const relative = configured && configured.length > 0 ? configured : DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative)
    ? relative
    : path.resolve(process.cwd(), relative);
}

function cosineSimilarity(a: number[], b: number[]): number | null {
  if (a.length === 0 || a.length !== b.length) {
    return null;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return null;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Like a sparse index, only points sharing at least one dimension with the query are hits. */
function sparseOverlapScore(query: IndexSparseVector, stored: IndexSparseVector): number | null {
  const queryIndices = new Set(query.indices);
  if (!stored.indices.some((index) => queryIndices.has(index))) {
    return null;
  }
  return sparseDotProduct(query, stored);
}

const isDenseVector = (vector: StoredVector): vector is number[] => Array.isArray(vector);

/**
 * Dense vectors score by cosine similarity, sparse ones by dot product over shared
 * dimensions. `null` means the point is not a hit for this vector at all.
 */
function scoreVector(stored: StoredVector, query: IndexQueryRequest["query"]): number | null {
  if (isDenseVector(stored)) {
    return isDenseVector(query) ? cosineSimilarity(stored, query) : null;
  }
  return isDenseVector(query) ? null : sparseOverlapScore(query, stored);
}

async function readStore(filePath: string, signal?: AbortSignal): Promise<StoreShape> {
  try {
    const raw = await fs.readFile(filePath, { encoding: "utf8", signal });
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && "collections" in parsed) {
      const { collections } = parsed;
      if (typeof collections === "object" && collections !== null) {
        return { collections: Object.fromEntries(Object.entries(collections).filter(([, points]) => Array.isArray(points))) };
      }
    }
    return { collections: {} };
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { collections: {} };
    }
    throw error;
  }
}

async function writeStore(filePath: string, store: StoreShape): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(store, null, 2), "utf8");
}

export interface LocalVectorStoreClient extends VectorIndexClient {
  upsert(collection: string, points: StoredPoint[]): Promise<{ status: "ok"; count: number }>;
  delete(collection: string, filter?: IndexFilter): Promise<{ status: "ok" }>;
}

export interface LocalVectorStoreOptions {
  filePath?: string;
  /** Keeps the store in memory instead of a JSON file. */
  store?: StoreShape;
}

export function createLocalVectorStoreClient(options: LocalVectorStoreOptions = {}): LocalVectorStoreClient {
  const memory = options.store;
  const filePath = options.filePath ?? resolveStorePath();
  const load = async (signal?: AbortSignal): Promise<StoreShape> => memory ?? readStore(filePath, signal);
  const save = async (store: StoreShape): Promise<void> => {
    if (!memory) {
      await writeStore(filePath, store);
    }
  };

  return {
    async listCollections() {
      const store = await load();
      return Object.keys(store.collections);
    },

    async collectionExists(name) {
      const store = await load();
      return Array.isArray(store.collections[name]);
    },

    async query(collection, request, signal) {
      signal?.throwIfAborted();
      const store = await load(signal);
      signal?.throwIfAborted();
      const points = store.collections[collection];
      if (!points) {
        throw new Error(`Collection ${collection} not found`);
      }

      const scored: IndexPoint[] = [];
      for (const point of points) {
        const stored = point.vectors[request.using];
        if (!stored || !matchesIndexFilter(point.payload, request.filter)) {
          continue;
        }
        const score = scoreVector(stored, request.query);
        if (score === null) {
          continue;
        }
        scored.push({ id: point.id, score, payload: point.payload });
      }

      return scored
        .sort((a, b) => b.score - a.score || String(a.id).localeCompare(String(b.id)))
        .slice(0, Math.max(1, request.limit));
    },

    async upsert(collection, incoming) {
      const store = await load();
      const current = store.collections[collection] ?? [];
      const byId = new Map(current.map((point) => [point.id, point]));

      for (const point of incoming) {
        byId.set(point.id, point);
      }

      store.collections[collection] = Array.from(byId.values());
      await save(store);
      return { status: "ok", count: incoming.length };
    },

    async delete(collection, filter) {
      const store = await load();
      const current = store.collections[collection] ?? [];
      store.collections[collection] = filter
        ? current.filter((point) => !matchesIndexFilter(point.payload, filter))
        : [];
      await save(store);
      return { status: "ok" };
    }
  };
}
