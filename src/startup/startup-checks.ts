import { isPostgresConfigured } from "../clients/postgres.js";
import { config } from "../config/index.js";
import { assertMigrationsCurrent } from "../migrations/check-migrations.js";

export interface StartupCheckDependencies {
  enabled?: boolean;
  isPostgresConfigured?: () => boolean;
  assertMigrationsCurrent?: () => Promise<void>;
}

/** Only the audit store has a schema, so there is nothing to check without Postgres. */
export async function runStartupChecks(dependencies: StartupCheckDependencies = {}): Promise<void> {
  const enabled = dependencies.enabled ?? config.RUN_STARTUP_CHECKS;
  if (!enabled || !(dependencies.isPostgresConfigured ?? isPostgresConfigured)()) {
    return;
  }

  await (dependencies.assertMigrationsCurrent ?? assertMigrationsCurrent)();
}
