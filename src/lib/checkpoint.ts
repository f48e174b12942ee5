import type { GeocodeCacheStore } from "./geocodeCache";
import type { ValidationResult } from "./validation";
import type { FailureReason, GeocodeCacheEntry, GeocodeRequestBatch, Logger } from "./types";

export type BatchResult = {
  batch: GeocodeRequestBatch;
  provider: string;
  entries: GeocodeCacheEntry[];
  providerRequests: number;
  attempts: number;
  validationFailures: ValidationResult[];
};

export type GeocodeTally = {
  batchesCommitted: number;
  addressesCommitted: number;
  resolved: number;
  failed: Record<FailureReason, number>;
  providerRequests: number;
  validationFailures: ValidationResult[];
};

export function emptyTally(): GeocodeTally {
  return {
    batchesCommitted: 0,
    addressesCommitted: 0,
    resolved: 0,
    failed: {
      not_found: 0,
      out_of_bounds: 0,
      no_bounds: 0,
      rejected_by_provider: 0,
      retries_exhausted: 0,
      cancelled: 0,
    },
    providerRequests: 0,
    validationFailures: [],
  };
}

/**
 * Persists each finished batch to the cache before the worker slot that ran it
 * takes another batch. An interrupted run loses at most the batches in flight;
 * the next run recomputes the miss set, so no resume token is kept.
 */
export class CheckpointCoordinator {
  private readonly tally = emptyTally();

  constructor(
    private readonly store: GeocodeCacheStore,
    private readonly options: { totalAddresses: number; progressEvery?: number; logger?: Logger },
  ) {}

  private get logger(): Logger {
    return this.options.logger ?? console;
  }

  /** Mark the batch's keys as in flight. Existing failed/resolved entries are never downgraded. */
  async begin(batch: GeocodeRequestBatch, provider: string): Promise<void> {
    const now = new Date().toISOString();
    await this.store.upsertMany(
      batch.requests.map((r) => ({
        address_key: r.address_key,
        latitude: null,
        longitude: null,
        status: "pending" as const,
        failure_reason: null,
        provider,
        attempts: 0,
        last_updated: now,
      })),
    );
  }

  async commit(result: BatchResult): Promise<void> {
    await this.store.upsertMany(result.entries);
    this.fold(result);

    const t = this.tally;
    const every = this.options.progressEvery ?? 100;
    const crossed = Math.floor(t.addressesCommitted / every) > Math.floor((t.addressesCommitted - result.entries.length) / every);
    if (crossed || t.addressesCommitted === this.options.totalAddresses) {
      const failed = Object.values(t.failed).reduce((a, b) => a + b, 0);
      this.logger.log(
        `   ... ${t.addressesCommitted}/${this.options.totalAddresses} geocoded (${t.resolved} resolved, ${failed} failed, ${t.batchesCommitted} batches)`,
      );
    }
  }

  private fold(result: BatchResult) {
    const t = this.tally;
    t.batchesCommitted++;
    t.addressesCommitted += result.entries.length;
    t.providerRequests += result.providerRequests;
    t.validationFailures.push(...result.validationFailures);
    for (const e of result.entries) {
      if (e.status === "resolved") t.resolved++;
      else if (e.failure_reason) t.failed[e.failure_reason]++;
    }
  }

  summary(): GeocodeTally {
    return {
      ...this.tally,
      failed: { ...this.tally.failed },
      validationFailures: [...this.tally.validationFailures],
    };
  }
}
