import type { readdir } from "node:fs/promises";
import { getPostgresClient } from "../clients/postgres.js";
import { CREATE_LEDGER_SQL, defaultMigrationsDir, isEntrypoint, listMigrationFiles } from "./ledger.js";

export interface CheckMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: typeof readdir;
  getPostgresClientFn?: typeof getPostgresClient;
}

export async function assertMigrationsCurrent({
  migrationsDir = defaultMigrationsDir,
  readdirFn,
  getPostgresClientFn = getPostgresClient
}: CheckMigrationsDependencies = {}): Promise<void> {
  const files = await listMigrationFiles(migrationsDir, readdirFn);
  if (files.length === 0) {
    return;
  }

  const { pool } = await getPostgresClientFn();
  await pool.query(CREATE_LEDGER_SQL);
  const { rows } = await pool.query<{ filename: string }>("SELECT filename FROM schema_migrations");

  const applied = new Set(rows.map((row) => row.filename));
  const pending = files.filter((file) => !applied.has(file));
  if (pending.length > 0) {
    throw new Error(`Pending migrations detected: ${pending.join(", ")}. Run npm run migrate.`);
  }
}

if (isEntrypoint(import.meta.url)) {
  assertMigrationsCurrent()
    .then(() => console.info("Migrations are up to date."))
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
