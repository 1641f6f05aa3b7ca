import { readdir } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const defaultMigrationsDir = path.resolve(process.cwd(), "migrations");

export const CREATE_LEDGER_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

/** Migration files apply in lexical order, so names carry a zero-padded sequence prefix. */
export async function listMigrationFiles(migrationsDir: string, readdirFn: typeof readdir = readdir): Promise<string[]> {
  const entries = await readdirFn(migrationsDir);
  return entries.filter((name) => name.endsWith(".sql")).sort();
}

export const isEntrypoint = (moduleUrl: string): boolean => process.argv[1] === fileURLToPath(moduleUrl);
