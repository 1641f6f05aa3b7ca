import { Pool, type PoolClient } from "pg";
import { config } from "../config/index.js";
import { probeHealth, retryStartup, type HealthCheckedClient } from "./health.js";

export interface PostgresSingleton extends HealthCheckedClient {
  pool: Pool;
}

export class PostgresConfigurationError extends Error {
  constructor(message = "POSTGRES_URL is not configured.") {
    super(message);
    this.name = "PostgresConfigurationError";
  }
}

const CONNECT_TIMEOUT_MS = 5000;

let singleton: PostgresSingleton | null = null;
let initPromise: Promise<PostgresSingleton> | null = null;

/** The audit trail is optional; without a connection string nothing touches Postgres. */
export const isPostgresConfigured = (): boolean => Boolean(config.POSTGRES_URL);

async function connect(): Promise<PostgresSingleton> {
  if (!config.POSTGRES_URL) {
    throw new PostgresConfigurationError();
  }

  const pool = new Pool({
    connectionString: config.POSTGRES_URL,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });
  const ping = async (): Promise<void> => {
    await pool.query("SELECT 1");
  };

  await retryStartup(ping, { attempts: 3, baseDelayMs: 250 });
  console.info("[clients/postgres] initialized singleton");

  return { pool, healthCheck: () => probeHealth(ping) };
}

export async function getPostgresClient(): Promise<PostgresSingleton> {
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

export async function shutdownPostgresClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  const { pool } = singleton;
  singleton = null;
  initPromise = null;
  await pool.end();
  console.info("[clients/postgres] shutdown complete");
}

/** Runs `operation` inside BEGIN/COMMIT on a dedicated connection, rolling back on failure. */
export async function withTransaction<T>(operation: (client: PoolClient) => Promise<T>): Promise<T> {
  const { pool } = await getPostgresClient();
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await operation(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export function resetPostgresClientForTests(): void {
  singleton = null;
  initPromise = null;
}
