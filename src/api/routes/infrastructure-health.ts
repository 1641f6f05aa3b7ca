import type { FastifyInstance } from "fastify";
import type { HealthCheckedClient, HealthReport } from "../../clients/health.js";

/** Clients the configuration does not need report "disabled" instead of being probed. */
type ClientHealth = HealthReport | { status: "disabled" };

const probeIfEnabled = async (
  enabled: boolean,
  getClient: () => Promise<HealthCheckedClient>
): Promise<ClientHealth> => (enabled ? (await getClient()).healthCheck() : { status: "disabled" });

export async function registerInfrastructureHealthRoute(app: FastifyInstance): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const [openai, postgres, qdrant] = await Promise.all([
        import("../../clients/openai.js"),
        import("../../clients/postgres.js"),
        import("../../clients/qdrant.js")
      ]);

      const [postgresHealth, openaiHealth, qdrantHealth] = await Promise.all([
        probeIfEnabled(postgres.isPostgresConfigured(), postgres.getPostgresClient),
        probeIfEnabled(openai.isOpenAIRequired(), openai.getOpenAIClient),
        probeIfEnabled(true, qdrant.getQdrantClient)
      ]);

      const degraded = [postgresHealth, openaiHealth, qdrantHealth].some((health) => health.status === "error");
      reply.code(degraded ? 503 : 200);
      return {
        status: degraded ? "error" : "ok",
        clients: { postgres: postgresHealth, openai: openaiHealth, qdrant: qdrantHealth }
      };
    } catch (error) {
      // Client construction failed (missing configuration, unreachable server at startup).
      reply.code(503);
      return { status: "error", detail: error instanceof Error ? error.message : "unknown error" };
    }
  });
}
