import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { logError } from "./observability/logger.js";
import { runStartupChecks } from "./startup/startup-checks.js";

const DEFAULT_PORT = 3000;

export function resolvePort(rawPort: string | undefined): number {
  const port = Number(rawPort);
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}

export async function bootstrap(): Promise<void> {
  await runStartupChecks();

  const app = await buildApp();
  await app.listen({ host: process.env.HOST?.trim() || "0.0.0.0", port: resolvePort(process.env.PORT) });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    logError("server.startup_failed", {}, { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  });
}
