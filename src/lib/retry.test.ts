import { describe, expect, it } from "vitest";
import {
  PermanentProviderError,
  RetryPolicy,
  TransientProviderError,
  providerErrorForStatus,
  sleep,
  toProviderError,
  withTimeout,
} from "./retry";

describe("RetryPolicy", () => {
  const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 800, factor: 2, maxDelayMs: 1000 });

  it("backs off exponentially up to the cap", () => {
    expect(policy.delayFor(1)).toBe(800);
    expect(policy.delayFor(2)).toBe(1000);
    expect(new RetryPolicy({ maxAttempts: 3, baseDelayMs: 800, factor: 2, maxDelayMs: 15000 }).delayFor(3)).toBe(3200);
  });

  it("allows attempts up to maxAttempts", () => {
    expect(policy.shouldRetry(1)).toBe(true);
    expect(policy.shouldRetry(2)).toBe(true);
    expect(policy.shouldRetry(3)).toBe(false);
  });

  it("rejects a non-positive attempt count", () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, baseDelayMs: 1, factor: 2, maxDelayMs: 1 })).toThrow(RangeError);
  });
});

describe("provider errors", () => {
  it.each([408, 429, 500, 503])("treats %i as transient", (status) => {
    expect(providerErrorForStatus("census", status, "")).toBeInstanceOf(TransientProviderError);
  });

  it.each([400, 401, 404])("treats %i as permanent", (status) => {
    const err = providerErrorForStatus("census", status, "Bad Request");
    expect(err).toBeInstanceOf(PermanentProviderError);
    expect(err.status).toBe(status);
  });

  it("wraps network failures as transient", () => {
    const err = toProviderError("mapbox", new TypeError("fetch failed"));
    expect(err).toBeInstanceOf(TransientProviderError);
    expect(err.message).toBe("mapbox request failed (TypeError: fetch failed)");
  });

  it("passes provider errors through", () => {
    const permanent = new PermanentProviderError("nope", 400);
    expect(toProviderError("census", permanent)).toBe(permanent);
  });
});

describe("sleep", () => {
  it("returns early when aborted", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe("withTimeout", () => {
  it("rejects when the promise does not settle in time", async () => {
    const never = new Promise<void>(() => undefined);
    await expect(withTimeout(never, 10, "Writing cache")).rejects.toThrow("Writing cache (timed out after 10ms)");
  });

  it("resolves with the value otherwise", async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, "x")).resolves.toBe(7);
  });
});
