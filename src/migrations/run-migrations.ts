import { readFile, type readdir } from "node:fs/promises";
import path from "node:path";
import { withTransaction } from "../clients/postgres.js";
import { CREATE_LEDGER_SQL, defaultMigrationsDir, isEntrypoint, listMigrationFiles } from "./ledger.js";

export { defaultMigrationsDir };

export interface RunMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: typeof readdir;
  readFileFn?: typeof readFile;
  withTransactionFn?: typeof withTransaction;
}

const BYTE_ORDER_MARK = /^\uFEFF/;

/** Applies pending migrations, each with its ledger row in one transaction. Returns the applied filenames. */
export async function runMigrations({
  migrationsDir = defaultMigrationsDir,
  readdirFn,
  readFileFn = readFile,
  withTransactionFn = withTransaction
}: RunMigrationsDependencies = {}): Promise<string[]> {
  const filenames = await listMigrationFiles(migrationsDir, readdirFn);
  if (filenames.length === 0) {
    return [];
  }

  await withTransactionFn(async (client) => {
    await client.query(CREATE_LEDGER_SQL);
  });

  const applied: string[] = [];
  for (const filename of filenames) {
    const didApply = await withTransactionFn(async (client) => {
      const { rows } = await client.query<{ exists: boolean }>(
        "SELECT EXISTS(SELECT 1 FROM schema_migrations WHERE filename = $1) AS exists",
        [filename]
      );
      if (rows[0]?.exists) {
        return false;
      }

      const sql = await readFileFn(path.join(migrationsDir, filename), "utf8");
      await client.query(sql.replace(BYTE_ORDER_MARK, ""));
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
      return true;
    });

    if (didApply) {
      applied.push(filename);
    }
  }

  return applied;
}

if (isEntrypoint(import.meta.url)) {
  runMigrations()
    .then((applied) =>
      console.info(applied.length === 0 ? "No pending migrations." : `Applied migrations: ${applied.join(", ")}`)
    )
    .catch((error: unknown) => {
      console.error("Migration failed", error);
      process.exitCode = 1;
    });
}
