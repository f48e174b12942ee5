import pLimit from "p-limit";
import type { BatchResult, CheckpointCoordinator } from "./checkpoint";
import { PermanentProviderError, RetryPolicy, sleep, toProviderError } from "./retry";
import { getStateBounds, validateCoordinates } from "./validation";
import type { GeocodeOutcome, GeocodeProvider } from "./providers/types";
import type { ValidationResult } from "./validation";
import type { FailureReason, GeocodeCacheEntry, GeocodeRequest, GeocodeRequestBatch, Lane, Logger } from "./types";

export type LaneSettings = {
  batchSize: number;
  concurrency: number;
};

export type RouterLane = LaneSettings & { provider: GeocodeProvider };

export type RouterOptions = {
  fast?: RouterLane;
  bulk: RouterLane;
  fastLaneMaxAddresses: number;
  retry: RetryPolicy;
  logger?: Logger;
};

export type DispatchResult = {
  lane: Lane | null;
  batches: number;
  committed: number;
  notDispatched: number; // addresses in batches never sent, recorded as cancelled
  cancelled: boolean;
};

/**
 * Fast lane for small pending sets (daily deltas), bulk lane for backfills.
 * Depends only on the pending count and whether a fast provider exists.
 */
export function selectLane(pendingCount: number, fastLaneMaxAddresses: number, fastAvailable: boolean): Lane {
  return fastAvailable && pendingCount <= fastLaneMaxAddresses ? "fast" : "bulk";
}

export function createBatches(requests: readonly GeocodeRequest[], lane: Lane, batchSize: number): GeocodeRequestBatch[] {
  const size = Math.max(1, Math.floor(batchSize));
  const batches: GeocodeRequestBatch[] = [];
  for (let i = 0; i < requests.length; i += size) {
    batches.push({ lane, index: batches.length + 1, requests: requests.slice(i, i + size) });
  }
  return batches;
}

type TaskOutcome =
  | { status: "committed" }
  | { status: "not_dispatched"; addresses: number }
  | { status: "fatal"; error: unknown };

export class GeocodeRouter {
  constructor(private readonly options: RouterOptions) {}

  private get logger(): Logger {
    return this.options.logger ?? console;
  }

  private entry(
    r: GeocodeRequest,
    provider: string,
    attempts: number,
    result: { latitude: number; longitude: number } | { failure: FailureReason },
  ): GeocodeCacheEntry {
    const resolved = "latitude" in result;
    return {
      address_key: r.address_key,
      latitude: resolved ? result.latitude : null,
      longitude: resolved ? result.longitude : null,
      status: resolved ? "resolved" : "failed",
      failure_reason: resolved ? null : result.failure,
      provider,
      attempts,
      last_updated: new Date().toISOString(),
    };
  }

  /**
   * Geocode one batch with the retry policy. Only transient per-address errors
   * and transient whole-call failures are retried; the batch never throws.
   */
  async runBatch(batch: GeocodeRequestBatch, provider: GeocodeProvider, signal?: AbortSignal): Promise<BatchResult> {
    const { retry } = this.options;
    const entries: GeocodeCacheEntry[] = [];
    const validationFailures: ValidationResult[] = [];
    let pending: readonly GeocodeRequest[] = batch.requests;
    let providerRequests = 0;
    let attempt = 0;

    const failAll = (reqs: readonly GeocodeRequest[], reason: FailureReason) => {
      for (const r of reqs) entries.push(this.entry(r, provider.name, attempt, { failure: reason }));
    };

    while (pending.length > 0) {
      attempt++;

      let outcomes: Map<string, GeocodeOutcome>;
      try {
        const res = await provider.geocodeBatch(pending);
        providerRequests += res.requests;
        outcomes = res.outcomes;
      } catch (e) {
        providerRequests++;
        const err = toProviderError(provider.name, e);
        if (err instanceof PermanentProviderError) {
          this.logger.warn(`⚠️  ${batch.lane} batch ${batch.index}: ${err.message}`);
          failAll(pending, "rejected_by_provider");
          break;
        }
        const failed: GeocodeOutcome = { kind: "error", transient: true, message: err.message };
        outcomes = new Map(pending.map((r): [string, GeocodeOutcome] => [r.address_key, failed]));
      }

      const again: GeocodeRequest[] = [];
      for (const r of pending) {
        const outcome: GeocodeOutcome = outcomes.get(r.address_key) ?? {
          kind: "error",
          transient: true,
          message: "no outcome returned",
        };
        switch (outcome.kind) {
          case "match": {
            const validation = validateCoordinates(outcome.latitude, outcome.longitude, r.state);
            if (validation.isValid) {
              entries.push(this.entry(r, provider.name, attempt, outcome));
            } else {
              const reason: FailureReason = getStateBounds(r.state) ? "out_of_bounds" : "no_bounds";
              validationFailures.push({ ...validation, metrics: { address_key: r.address_key } });
              this.logger.warn(`⚠️  Geocode validation failed for "${r.address_key}":`, validation.errors);
              entries.push(this.entry(r, provider.name, attempt, { failure: reason }));
            }
            break;
          }
          case "not_found":
            entries.push(this.entry(r, provider.name, attempt, { failure: "not_found" }));
            break;
          case "error":
            if (outcome.transient) again.push(r);
            else entries.push(this.entry(r, provider.name, attempt, { failure: "rejected_by_provider" }));
            break;
        }
      }

      pending = again;
      if (pending.length === 0) break;

      if (!retry.shouldRetry(attempt)) {
        failAll(pending, "retries_exhausted");
        break;
      }
      if (!signal?.aborted) await sleep(retry.delayFor(attempt), signal);
      if (signal?.aborted) {
        failAll(pending, "cancelled");
        break;
      }
    }

    return { batch, provider: provider.name, entries, providerRequests, attempts: attempt, validationFailures };
  }

  private cancelledResult(batch: GeocodeRequestBatch, provider: string): BatchResult {
    return {
      batch,
      provider,
      entries: batch.requests.map((r) => this.entry(r, provider, 0, { failure: "cancelled" })),
      providerRequests: 0,
      attempts: 0,
      validationFailures: [],
    };
  }

  /**
   * Geocode every request on a bounded pool. Each batch is committed through the
   * coordinator before its slot is released. After cancellation no new batch is
   * sent (its keys are recorded as cancelled); after a persistence failure nothing
   * more is written. Batches already running finish first.
   */
  async dispatch(
    requests: readonly GeocodeRequest[],
    coordinator: CheckpointCoordinator,
    signal?: AbortSignal,
  ): Promise<DispatchResult> {
    if (requests.length === 0) {
      return { lane: null, batches: 0, committed: 0, notDispatched: 0, cancelled: signal?.aborted ?? false };
    }

    const { fast, bulk, fastLaneMaxAddresses } = this.options;
    const lane = selectLane(requests.length, fastLaneMaxAddresses, fast !== undefined);
    const settings = lane === "fast" && fast ? fast : bulk;
    const batches = createBatches(requests, lane, settings.batchSize);
    const limit = pLimit(Math.max(1, settings.concurrency));

    const icon = lane === "fast" ? "⚡" : "🐢";
    this.logger.log(
      `${icon} ${lane.toUpperCase()} LANE (${settings.provider.name}): ${requests.length} addresses in ${batches.length} batches, ${settings.concurrency} workers`,
    );

    let halted = false;
    const outcomes = await Promise.all(
      batches.map((batch) =>
        limit(async (): Promise<TaskOutcome> => {
          if (halted) return { status: "not_dispatched", addresses: batch.requests.length };
          try {
            if (signal?.aborted) {
              await coordinator.commit(this.cancelledResult(batch, settings.provider.name));
              return { status: "not_dispatched", addresses: batch.requests.length };
            }
            await coordinator.begin(batch, settings.provider.name);
            const result = await this.runBatch(batch, settings.provider, signal);
            await coordinator.commit(result);
            return { status: "committed" };
          } catch (error) {
            halted = true;
            return { status: "fatal", error };
          }
        }),
      ),
    );

    const fatal = outcomes.find((o) => o.status === "fatal");
    if (fatal && fatal.status === "fatal") throw fatal.error;

    let committed = 0;
    let notDispatched = 0;
    for (const o of outcomes) {
      if (o.status === "committed") committed++;
      else if (o.status === "not_dispatched") notDispatched += o.addresses;
    }

    return { lane, batches: batches.length, committed, notDispatched, cancelled: signal?.aborted ?? false };
  }
}
