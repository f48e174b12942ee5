import { describe, expect, it, vi } from "vitest";
import type { BatchResult } from "./checkpoint";
import { CheckpointCoordinator } from "./checkpoint";
import { MemoryGeocodeCache } from "./geocodeCache";
import type { GeocodeCacheEntry, GeocodeRequest, GeocodeRequestBatch } from "./types";

const T0 = "2026-01-01T00:00:00.000Z";

function req(key: string): GeocodeRequest {
  return { address_key: key, street: "1 MAIN STREET", city: "MIAMI", state: "FL", zip: "33101" };
}

function entry(key: string, status: "resolved" | "failed"): GeocodeCacheEntry {
  return {
    address_key: key,
    latitude: status === "resolved" ? 25.77 : null,
    longitude: status === "resolved" ? -80.19 : null,
    status,
    failure_reason: status === "resolved" ? null : "not_found",
    provider: "census",
    attempts: 1,
    last_updated: T0,
  };
}

function result(batch: GeocodeRequestBatch, entries: GeocodeCacheEntry[]): BatchResult {
  return { batch, provider: "census", entries, providerRequests: 1, attempts: 1, validationFailures: [] };
}

describe("CheckpointCoordinator", () => {
  it("marks new keys pending without downgrading resolved ones", async () => {
    const cache = new MemoryGeocodeCache([entry("A", "resolved")]);
    const coordinator = new CheckpointCoordinator(cache, { totalAddresses: 2 });

    await coordinator.begin({ lane: "bulk", index: 1, requests: [req("A"), req("B")] }, "census");

    expect((await cache.lookup("A"))?.status).toBe("resolved");
    expect(await cache.lookup("B")).toMatchObject({ status: "pending", provider: "census", attempts: 0 });
  });

  it("persists each batch and folds it into the tally", async () => {
    const cache = new MemoryGeocodeCache();
    const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const coordinator = new CheckpointCoordinator(cache, { totalAddresses: 3, progressEvery: 2, logger });

    const first = { lane: "bulk" as const, index: 1, requests: [req("A")] };
    const second = { lane: "bulk" as const, index: 2, requests: [req("B"), req("C")] };

    await coordinator.commit(result(first, [entry("A", "resolved")]));
    expect(logger.log).not.toHaveBeenCalled();

    await coordinator.commit(result(second, [entry("B", "resolved"), entry("C", "failed")]));

    expect(cache.size).toBe(3);
    expect(logger.log).toHaveBeenCalledTimes(1);
    expect(logger.log).toHaveBeenCalledWith("   ... 3/3 geocoded (2 resolved, 1 failed, 2 batches)");
    expect(coordinator.summary()).toMatchObject({
      batchesCommitted: 2,
      addressesCommitted: 3,
      resolved: 2,
      providerRequests: 2,
    });
    expect(coordinator.summary().failed.not_found).toBe(1);
  });

  it("hands out copies of the tally", async () => {
    const coordinator = new CheckpointCoordinator(new MemoryGeocodeCache(), { totalAddresses: 1 });
    const snapshot = coordinator.summary();
    snapshot.failed.not_found = 99;
    expect(coordinator.summary().failed.not_found).toBe(0);
  });
});
