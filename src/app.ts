import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { buildCorsOptions } from "./api/cors.js";
import { registerHealthRoute } from "./api/routes/health.js";
import { registerApiRoutes, type ApiRoutesDependencies } from "./api/routes/index.js";
import { registerInfrastructureHealthRoute } from "./api/routes/infrastructure-health.js";
import { registerClientLifecycle } from "./clients/lifecycle.js";
import { config } from "./config/index.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";
import { registerRequestTraceHooks } from "./observability/request-tracing.js";

export interface BuildAppOptions {
  apiDependencies?: ApiRoutesDependencies;
  /** Off in tests that stub the search routes without any infrastructure. */
  registerInfrastructureHealth?: boolean;
  logger?: boolean;
}

export async function buildApp({
  apiDependencies,
  registerInfrastructureHealth = true,
  logger = true
}: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger });
  await app.register(cors, buildCorsOptions(config.FRONTEND_ORIGIN));

  // Hooks first so every route below is measured and traced.
  registerRequestMetricsHooks(app);
  registerRequestTraceHooks(app);
  registerClientLifecycle(app, { enableBootstrap: config.ENABLE_INFRA_BOOTSTRAP });

  await registerHealthRoute(app);
  await registerMetricsRoutes(app);
  if (registerInfrastructureHealth) {
    await registerInfrastructureHealthRoute(app);
  }
  await registerApiRoutes(app, apiDependencies);

  return app;
}
