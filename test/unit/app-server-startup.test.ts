import { beforeEach, describe, expect, it, vi } from "vitest";
import { runStartupChecks } from "../../src/startup/startup-checks.js";

describe("api/cors.ts", () => {
  it("buildAllowedFrontendOrigins returns defaults and localhost aliases", async () => {
    const { buildAllowedFrontendOrigins } = await import("../../src/api/cors.js");

    expect(buildAllowedFrontendOrigins(undefined)).toEqual(["http://localhost:5173", "http://127.0.0.1:5173"]);
    expect(buildAllowedFrontendOrigins("http://localhost:3000, invalid-url, http://localhost:3000")).toEqual([
      "http://localhost:3000",
      "invalid-url",
      "http://127.0.0.1:3000"
    ]);
    expect(buildAllowedFrontendOrigins("https://search.example.com,")).toEqual(["https://search.example.com"]);
  });
});

describe("app.ts", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  it("buildApp wires cors, hooks, lifecycle and routes with optional infra-health skip", async () => {
    const app = {
      register: vi.fn().mockResolvedValue(undefined)
    };
    const fastifyFactory = vi.fn(() => app);
    const corsPlugin = Symbol("cors");
    const registerClientLifecycle = vi.fn();
    const registerHealthRoute = vi.fn().mockResolvedValue(undefined);
    const registerInfrastructureHealthRoute = vi.fn().mockResolvedValue(undefined);
    const registerApiRoutes = vi.fn().mockResolvedValue(undefined);
    const registerMetricsRoutes = vi.fn().mockResolvedValue(undefined);
    const registerRequestMetricsHooks = vi.fn();
    const registerRequestTraceHooks = vi.fn();

    vi.doMock("fastify", () => ({ default: fastifyFactory }));
    vi.doMock("@fastify/cors", () => ({ default: corsPlugin }));
    vi.doMock("../../src/clients/lifecycle.js", () => ({ registerClientLifecycle }));
    vi.doMock("../../src/api/routes/health.js", () => ({ registerHealthRoute }));
    vi.doMock("../../src/api/routes/infrastructure-health.js", () => ({ registerInfrastructureHealthRoute }));
    vi.doMock("../../src/api/routes/index.js", () => ({ registerApiRoutes }));
    vi.doMock("../../src/observability/metrics.js", () => ({ registerMetricsRoutes, registerRequestMetricsHooks }));
    vi.doMock("../../src/observability/request-tracing.js", () => ({ registerRequestTraceHooks }));

    vi.stubEnv("FRONTEND_ORIGIN", "http://localhost:9999");
    vi.stubEnv("ENABLE_INFRA_BOOTSTRAP", "true");
    const { buildApp } = await import("../../src/app.js");

    const apiDependencies = { search: { createOrchestrator: vi.fn() } };
    const built = await buildApp({ apiDependencies, registerInfrastructureHealth: false });

    expect(built).toBe(app);
    expect(fastifyFactory).toHaveBeenCalledWith({ logger: true });
    expect(app.register).toHaveBeenCalledWith(corsPlugin, {
      origin: ["http://localhost:9999", "http://127.0.0.1:9999"],
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Request-Id"],
      exposedHeaders: ["X-Request-Id"]
    });
    expect(registerRequestMetricsHooks).toHaveBeenCalledWith(app);
    expect(registerRequestTraceHooks).toHaveBeenCalledWith(app);
    expect(registerClientLifecycle).toHaveBeenCalledWith(app, { enableBootstrap: true });
    expect(registerHealthRoute).toHaveBeenCalledWith(app);
    expect(registerMetricsRoutes).toHaveBeenCalledWith(app);
    expect(registerInfrastructureHealthRoute).not.toHaveBeenCalled();
    expect(registerApiRoutes).toHaveBeenCalledWith(app, apiDependencies);
  });
});

describe("startup-checks.ts", () => {
  it("skips the migration check when disabled", async () => {
    const assertMigrationsCurrent = vi.fn().mockResolvedValue(undefined);

    await runStartupChecks({ enabled: false, isPostgresConfigured: () => true, assertMigrationsCurrent });

    expect(assertMigrationsCurrent).not.toHaveBeenCalled();
  });

  it("skips the migration check without an audit database", async () => {
    const assertMigrationsCurrent = vi.fn().mockResolvedValue(undefined);

    await runStartupChecks({ enabled: true, isPostgresConfigured: () => false, assertMigrationsCurrent });

    expect(assertMigrationsCurrent).not.toHaveBeenCalled();
  });

  it("runs the migration check when enabled and propagates its failure", async () => {
    const assertMigrationsCurrent = vi
      .fn()
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error("Pending migrations detected: 001_search_events.sql. Run npm run migrate."));

    await runStartupChecks({ enabled: true, isPostgresConfigured: () => true, assertMigrationsCurrent });
    await expect(
      runStartupChecks({ enabled: true, isPostgresConfigured: () => true, assertMigrationsCurrent })
    ).rejects.toThrow("Pending migrations detected: 001_search_events.sql");

    expect(assertMigrationsCurrent).toHaveBeenCalledTimes(2);
  });
});

describe("server.ts", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  it("resolvePort returns defaults for invalid inputs", async () => {
    vi.doMock("../../src/startup/startup-checks.js", () => ({ runStartupChecks: vi.fn() }));
    vi.doMock("../../src/app.js", () => ({ buildApp: vi.fn() }));
    const { resolvePort } = await import("../../src/server.js");

    expect(resolvePort(undefined)).toBe(3000);
    expect(resolvePort("")).toBe(3000);
    expect(resolvePort("0")).toBe(3000);
    expect(resolvePort("-1")).toBe(3000);
    expect(resolvePort("abc")).toBe(3000);
    expect(resolvePort("4321")).toBe(4321);
  });

  it("bootstrap runs startup checks and listens on parsed port", async () => {
    const runStartupChecksMock = vi.fn().mockResolvedValue(undefined);
    const listen = vi.fn().mockResolvedValue(undefined);
    const buildApp = vi.fn().mockResolvedValue({ listen });

    vi.doMock("../../src/startup/startup-checks.js", () => ({ runStartupChecks: runStartupChecksMock }));
    vi.doMock("../../src/app.js", () => ({ buildApp }));

    vi.stubEnv("PORT", "4567");
    vi.stubEnv("HOST", "");
    const { bootstrap } = await import("../../src/server.js");
    await bootstrap();

    expect(runStartupChecksMock).toHaveBeenCalledTimes(1);
    expect(buildApp).toHaveBeenCalledTimes(1);
    expect(listen).toHaveBeenCalledWith({ host: "0.0.0.0", port: 4567 });
  });
});
