import type { FastifyInstance } from "fastify";
import type { HealthCheckedClient } from "./health.js";

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
  isOpenAIRequired: () => boolean;
  getPostgresClient: () => Promise<HealthCheckedClient>;
  shutdownPostgresClient: () => Promise<void>;
  isPostgresConfigured: () => boolean;
  getQdrantClient: () => Promise<HealthCheckedClient>;
  shutdownQdrantClient: () => Promise<void>;
}

export interface ClientLifecycleOptions {
  enableBootstrap?: boolean;
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

type ClientName = "qdrant" | "openai" | "postgres";

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

let processHooksRegistered = false;

async function importClientModules(): Promise<ClientLifecycleModules> {
  const [openai, postgres, qdrant] = await Promise.all([
    import("./openai.js"),
    import("./postgres.js"),
    import("./qdrant.js")
  ]);

  return {
    getOpenAIClient: openai.getOpenAIClient,
    shutdownOpenAIClient: openai.shutdownOpenAIClient,
    isOpenAIRequired: openai.isOpenAIRequired,
    getPostgresClient: postgres.getPostgresClient,
    shutdownPostgresClient: postgres.shutdownPostgresClient,
    isPostgresConfigured: postgres.isPostgresConfigured,
    getQdrantClient: qdrant.getQdrantClient,
    shutdownQdrantClient: qdrant.shutdownQdrantClient
  };
}

/** Qdrant is always needed; the generator and audit clients only when configured. */
function requiredClients(modules: ClientLifecycleModules): Array<[ClientName, () => Promise<HealthCheckedClient>]> {
  const required: Array<[ClientName, () => Promise<HealthCheckedClient>]> = [["qdrant", modules.getQdrantClient]];
  if (modules.isOpenAIRequired()) {
    required.push(["openai", modules.getOpenAIClient]);
  }
  if (modules.isPostgresConfigured()) {
    required.push(["postgres", modules.getPostgresClient]);
  }
  return required;
}

async function assertHealthy(name: ClientName, getClient: () => Promise<HealthCheckedClient>): Promise<void> {
  const client = await getClient();
  const report = await client.healthCheck();
  if (report.status === "error") {
    throw new Error(`${name} health check failed: ${report.details ?? "unknown error"}`);
  }
}

async function shutdownClients(source: string, modules: ClientLifecycleModules): Promise<void> {
  console.info(`[lifecycle/${source}] shutting down infrastructure clients`);
  await Promise.allSettled([
    modules.shutdownQdrantClient(),
    modules.shutdownOpenAIClient(),
    modules.shutdownPostgresClient()
  ]);
}

export function registerClientLifecycle(app: FastifyInstance, options: ClientLifecycleOptions = {}): void {
  const enableBootstrap = options.enableBootstrap ?? process.env.ENABLE_INFRA_BOOTSTRAP === "true";
  if (!enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }

  const loadClientModules = options.loadClientModules ?? importClientModules;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const required = requiredClients(await loadClientModules());
    await Promise.all(required.map(([name, getClient]) => assertHealthy(name, getClient)));
    app.log.info({ checked: required.length }, "Infrastructure singletons initialized and health checked");
  });

  app.addHook("onClose", async () => {
    await shutdownClients("onClose", await loadClientModules());
  });

  if ((options.registerProcessSignals ?? true) && !processHooksRegistered) {
    processHooksRegistered = true;
    for (const signal of SHUTDOWN_SIGNALS) {
      process.once(signal, async () => {
        console.info(`[lifecycle/process] received ${signal}`);
        await shutdownClients("process", await loadClientModules());
        exit(0);
      });
    }
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
