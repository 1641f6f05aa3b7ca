import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    // Client singletons and metrics are module state, so files run one at a time.
    fileParallelism: false,
    pool: "threads",
    poolOptions: { threads: { singleThread: true } },
    restoreMocks: true,
    clearMocks: true,
    mockReset: true,
    unstubEnvs: true,
    coverage: {
      provider: "v8",
      all: true,
      include: ["src/**/*.ts"],
      exclude: ["src/**/types.ts"],
      reporter: ["text", "json-summary"]
    }
  }
});
