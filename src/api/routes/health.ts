import type { FastifyInstance } from "fastify";
import { config } from "../../config/index.js";

/** Liveness only; dependency checks live under /infra/health. */
export async function registerHealthRoute(app: FastifyInstance): Promise<void> {
  app.get("/health", async () => ({
    status: "ok",
    mode: config.APP_MODE,
    collection: config.QDRANT_COLLECTION
  }));
}
