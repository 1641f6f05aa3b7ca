import type { FastifyInstance } from "fastify";
import { registerSearchRoutes, type SearchRoutesDependencies } from "./search.js";

export interface ApiRoutesDependencies {
  search?: SearchRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerSearchRoutes(app, dependencies?.search);
}
