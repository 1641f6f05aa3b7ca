import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createLocalVectorStoreClient, type LocalVectorStoreClient, type StoredPoint } from "../clients/local-vector-store.js";
import { config } from "../config/index.js";
import { createDenseEmbedder, type DenseEmbedder } from "../modules/search/embedder.js";
import { encodeSparseDocument } from "../modules/search/sparse-encoder.js";

export const defaultDocumentsFile = path.resolve(process.cwd(), "data/demo-documents.json");

const demoDocumentSchema = z.object({
  document_id: z.string().min(1),
  table_name: z.string().min(1),
  embeddable_text: z.string().min(1),
  summary_text: z.string().optional(),
  updated_at: z.string().nullable().optional(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).default({})
});

const demoDocumentsSchema = z.array(demoDocumentSchema);

export type DemoDocument = z.infer<typeof demoDocumentSchema>;

export interface SeedLocalIndexOptions {
  documentsFile?: string;
  collection?: string;
  embedder?: DenseEmbedder;
  store?: LocalVectorStoreClient;
  denseVectorName?: string;
  sparseVectorName?: string;
}

export const buildStoredPoint = (
  document: DemoDocument,
  dense: number[],
  vectorNames: { dense: string; sparse: string }
): StoredPoint => {
  const vectors: StoredPoint["vectors"] = { [vectorNames.dense]: dense };
  const sparse = encodeSparseDocument(document.embeddable_text);
  if (sparse) {
    vectors[vectorNames.sparse] = sparse;
  }

  return {
    id: document.document_id,
    vectors,
    payload: {
      ...document.metadata,
      document_id: document.document_id,
      table_name: document.table_name,
      embeddable_text: document.embeddable_text,
      summary_text: document.summary_text ?? document.embeddable_text,
      updated_at: document.updated_at ?? null
    }
  };
};

/** Embeds the demo corpus and writes it into the file-backed local index. */
export async function seedLocalIndex(options: SeedLocalIndexOptions = {}): Promise<number> {
  const raw = await readFile(options.documentsFile ?? defaultDocumentsFile, "utf8");
  const documents = demoDocumentsSchema.parse(JSON.parse(raw));
  const embedder = options.embedder ?? createDenseEmbedder();
  const store = options.store ?? createLocalVectorStoreClient();
  const vectorNames = {
    dense: options.denseVectorName ?? config.QDRANT_DENSE_VECTOR,
    sparse: options.sparseVectorName ?? config.QDRANT_SPARSE_VECTOR
  };

  const points: StoredPoint[] = [];
  for (const document of documents) {
    const dense = await embedder.embed(document.embeddable_text, AbortSignal.timeout(config.SEARCH_CALL_TIMEOUT_MS));
    points.push(buildStoredPoint(document, dense, vectorNames));
  }

  const { count } = await store.upsert(options.collection ?? config.QDRANT_COLLECTION, points);
  return count;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  seedLocalIndex()
    .then((count) => console.log(`Seeded ${count} documents into ${config.QDRANT_COLLECTION}.`))
    .catch((error: unknown) => {
      console.error("Seeding failed", error);
      process.exitCode = 1;
    });
}
