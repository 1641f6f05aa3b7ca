import { describe, expect, it, vi } from "vitest";
import { CallTimeoutError, callWithPolicy, isTransientFailure } from "../../src/modules/search/call-policy.js";
import { SearchCancelledError } from "../../src/modules/search/errors.js";

const withStatus = (message: string, status: number): Error => Object.assign(new Error(message), { status });

describe("modules/search/call-policy", () => {
  it("retries a transient failure once", async () => {
    const failure = new Error("socket hang up");
    const operation = vi.fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(failure)
      .mockResolvedValueOnce("ok");
    const onRetry = vi.fn();

    await expect(
      callWithPolicy(operation, { label: "embed.test", timeoutMs: 1000, retryDelayMs: 0, onRetry })
    ).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(failure, 1);
  });

  it("does not retry client errors", async () => {
    const failure = withStatus("bad request", 400);
    const operation = vi.fn<(signal: AbortSignal) => Promise<string>>().mockRejectedValue(failure);

    await expect(callWithPolicy(operation, { label: "embed.test", timeoutMs: 1000, retryDelayMs: 0 })).rejects.toBe(
      failure
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("surfaces the last error once retries are spent", async () => {
    const operation = vi.fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(withStatus("unavailable", 503))
      .mockRejectedValueOnce(withStatus("still unavailable", 503));

    await expect(
      callWithPolicy(operation, { label: "retrieve.dense", timeoutMs: 1000, retryDelayMs: 0 })
    ).rejects.toThrow("still unavailable");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("times out a hanging attempt", async () => {
    const operation = vi.fn<(signal: AbortSignal) => Promise<string>>(() => new Promise<string>(() => undefined));

    const outcome = callWithPolicy(operation, { label: "retrieve.sparse", timeoutMs: 10, retries: 0 });

    await expect(outcome).rejects.toBeInstanceOf(CallTimeoutError);
    await expect(outcome).rejects.toThrow("retrieve.sparse timed out after 10ms");
  });

  it("passes an abortable signal to the operation", async () => {
    let seen: AbortSignal | undefined;
    const operation = vi.fn(async (signal: AbortSignal) => {
      seen = signal;
      return 1;
    });

    await callWithPolicy(operation, { label: "embed.test", timeoutMs: 1000 });

    expect(seen).toBeInstanceOf(AbortSignal);
    expect(seen?.aborted).toBe(false);
  });

  it("never starts when the caller already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => "ok");

    await expect(
      callWithPolicy(operation, { label: "embed.test", timeoutMs: 1000, signal: controller.signal })
    ).rejects.toBeInstanceOf(SearchCancelledError);
    expect(operation).not.toHaveBeenCalled();
  });

  it("stops a running attempt when the caller cancels", async () => {
    const controller = new AbortController();
    const operation = vi.fn(() => new Promise<string>(() => undefined));

    const outcome = callWithPolicy(operation, { label: "embed.test", timeoutMs: 1000, signal: controller.signal });
    controller.abort();

    await expect(outcome).rejects.toBeInstanceOf(SearchCancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("classifies transient failures by status", () => {
    expect(isTransientFailure(new Error("network"))).toBe(true);
    expect(isTransientFailure(withStatus("server", 500))).toBe(true);
    expect(isTransientFailure(withStatus("timeout", 408))).toBe(true);
    expect(isTransientFailure(withStatus("rate limited", 429))).toBe(true);
    expect(isTransientFailure(withStatus("unauthorized", 401))).toBe(false);
    expect(isTransientFailure(withStatus("not found", 404))).toBe(false);
  });
});
