import { aggregateLicenses } from "./aggregate";
import type { AggregateInput } from "./aggregate";
import { normalizeAddress } from "./address";
import { CheckpointCoordinator, emptyTally } from "./checkpoint";
import { classifyLocations } from "./classify";
import type { ClassificationRule } from "./classify";
import type { PipelineConfig } from "./config";
import { findCacheMisses } from "./geocodeCache";
import type { GeocodeCacheStore } from "./geocodeCache";
import { CensusBatchProvider } from "./providers/census";
import { MapboxProvider } from "./providers/mapbox";
import { RetryPolicy } from "./retry";
import { GeocodeRouter } from "./router";
import type { AggregateSink } from "./sink";
import type { ValidationResult } from "./validation";
import type {
  AddressType,
  EnrichedLocation,
  FailureReason,
  GeocodeRequest,
  Lane,
  LicenseRecord,
  Logger,
  NormalizedAddress,
  RejectionReason,
} from "./types";

export type RunSummary = {
  started_at: string;
  finished_at: string | null;
  records_in: number;
  accepted: number;
  rejected: Record<RejectionReason, number>;
  locations: number;
  by_address_type: Record<AddressType, number>;
  by_rule: Record<ClassificationRule, number>;
  cache_hits: number;
  skipped_permanent_failures: number;
  geocode_requested: number;
  geocode_resolved: number;
  geocode_failed: Record<FailureReason, number>;
  provider_requests: number;
  lane: Lane | null;
  batches_committed: number;
  not_dispatched: number;
  cancelled: boolean;
  errors: string[];
};

export type PipelineDeps = {
  cache: GeocodeCacheStore;
  config: PipelineConfig;
  // Without a router nothing is geocoded; cache misses come back as "missing"
  router?: GeocodeRouter;
  sink?: AggregateSink;
  signal?: AbortSignal;
  logger?: Logger;
  retryFailed?: boolean;
};

export type PipelineResult = {
  locations: EnrichedLocation[];
  summary: RunSummary;
  validationFailures: ValidationResult[];
};

/** A persistence failure stopped the run. `summary` holds what was done before it. */
export class PipelineError extends Error {
  constructor(
    message: string,
    readonly summary: RunSummary,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

export function emptySummary(): RunSummary {
  const tally = emptyTally();
  return {
    started_at: new Date().toISOString(),
    finished_at: null,
    records_in: 0,
    accepted: 0,
    rejected: { po_box: 0, unparsable: 0 },
    locations: 0,
    by_address_type: { Commercial: 0, Residential: 0 },
    by_rule: { commercial_keyword: 0, residential_unit: 0, density: 0, default: 0 },
    cache_hits: 0,
    skipped_permanent_failures: 0,
    geocode_requested: 0,
    geocode_resolved: 0,
    geocode_failed: tally.failed,
    provider_requests: 0,
    lane: null,
    batches_committed: 0,
    not_dispatched: 0,
    cancelled: false,
    errors: [],
  };
}

/**
 * Router from config. The fast lane (Mapbox) exists only when an access token
 * is supplied; otherwise every run goes to the Census batch geocoder.
 */
export function createGeocodeRouter(
  config: PipelineConfig,
  options: { mapboxToken?: string; logger?: Logger } = {},
): GeocodeRouter {
  const { geocoding } = config;
  return new GeocodeRouter({
    fast: options.mapboxToken
      ? {
          provider: new MapboxProvider({ accessToken: options.mapboxToken, timeoutMs: geocoding.fast.requestTimeoutMs }),
          batchSize: geocoding.fast.batchSize,
          concurrency: geocoding.fast.concurrency,
        }
      : undefined,
    bulk: {
      provider: new CensusBatchProvider({ timeoutMs: geocoding.bulk.requestTimeoutMs }),
      batchSize: geocoding.bulk.batchSize,
      concurrency: geocoding.bulk.concurrency,
    },
    fastLaneMaxAddresses: geocoding.fastLaneMaxAddresses,
    retry: new RetryPolicy(geocoding.retry),
    logger: options.logger,
  });
}

function describeInput(input: LicenseRecord["address"]) {
  if (typeof input === "string") return input;
  return [input.street, input.unit, input.city, input.state, input.zip].filter(Boolean).join(", ");
}

/**
 * Normalize → aggregate → classify → geocode cache misses → enrich.
 *
 * Only keys the cache cannot answer reach a provider, so re-running on
 * unchanged input makes no provider calls.
 */
export async function runPipeline(records: Iterable<LicenseRecord>, deps: PipelineDeps): Promise<PipelineResult> {
  const logger = deps.logger ?? console;
  const summary = emptySummary();

  // 1) normalize
  const accepted: AggregateInput[] = [];
  const addressByKey = new Map<string, NormalizedAddress>();
  for (const record of records) {
    summary.records_in++;
    const result = normalizeAddress(record.address);
    if (!result.ok) {
      summary.rejected[result.rejection.reason]++;
      if (result.rejection.reason === "unparsable") {
        logger.warn(`⚠️  Skipping unparsable address "${describeInput(record.address)}": ${result.rejection.detail}`);
      }
      continue;
    }
    summary.accepted++;
    accepted.push({ address: result.address, category: record.category });
    if (!addressByKey.has(result.address.address_key)) {
      addressByKey.set(result.address.address_key, result.address);
    }
  }
  logger.log(
    `📄 ${summary.records_in} records: ${summary.accepted} accepted, ${summary.rejected.po_box} PO boxes, ${summary.rejected.unparsable} unparsable`,
  );

  // 2) aggregate + classify
  const { locations: classified, byRule } = classifyLocations(aggregateLicenses(accepted), deps.config.classification);
  summary.locations = classified.length;
  summary.by_rule = byRule;
  for (const loc of classified) summary.by_address_type[loc.address_type]++;
  logger.log(
    `🏠 ${classified.length} locations: ${summary.by_address_type.Commercial} commercial, ${summary.by_address_type.Residential} residential`,
  );

  // 3) geocode what the cache cannot answer
  let validationFailures: ValidationResult[] = [];
  try {
    const diff = await findCacheMisses(
      deps.cache,
      classified.map((l) => l.address_key),
      { retryFailed: deps.retryFailed },
    );
    summary.cache_hits = diff.hits;
    summary.skipped_permanent_failures = diff.skippedPermanentFailures;
    summary.geocode_requested = diff.misses.length;
    logger.log(
      `🗺️  Geocode cache: ${diff.hits} hits, ${diff.skippedPermanentFailures} known failures, ${diff.misses.length} to geocode`,
    );

    if (deps.router && diff.misses.length > 0) {
      const requests: GeocodeRequest[] = [];
      for (const key of diff.misses) {
        const a = addressByKey.get(key);
        if (a) requests.push({ address_key: key, street: a.street_clean, city: a.city_clean, state: a.state, zip: a.zip });
      }

      const coordinator = new CheckpointCoordinator(deps.cache, {
        totalAddresses: requests.length,
        progressEvery: deps.config.geocoding.progressEvery,
        logger,
      });

      try {
        const dispatched = await deps.router.dispatch(requests, coordinator, deps.signal);
        summary.lane = dispatched.lane;
        summary.not_dispatched = dispatched.notDispatched;
        summary.cancelled = dispatched.cancelled;
      } finally {
        const tally = coordinator.summary();
        summary.geocode_resolved = tally.resolved;
        summary.geocode_failed = tally.failed;
        summary.provider_requests = tally.providerRequests;
        summary.batches_committed = tally.batchesCommitted;
        validationFailures = tally.validationFailures;
      }
    } else if (diff.misses.length > 0) {
      logger.warn(`⚠️  No geocoder configured, ${diff.misses.length} locations left without coordinates`);
    }

    if (deps.signal?.aborted) summary.cancelled = true;
  } catch (err) {
    summary.errors.push(err instanceof Error ? err.message : String(err));
    summary.finished_at = new Date().toISOString();
    throw new PipelineError("Geocoding stopped: the geocode cache could not be written", summary, { cause: err });
  }

  // 4) enrich from the cache
  const locations: EnrichedLocation[] = [];
  for (const loc of classified) {
    const entry = await deps.cache.lookup(loc.address_key);
    locations.push({
      ...loc,
      latitude: entry?.status === "resolved" ? entry.latitude : null,
      longitude: entry?.status === "resolved" ? entry.longitude : null,
      geocode_status: entry?.status ?? "missing",
    });
  }

  // 5) write
  if (deps.sink) {
    try {
      await deps.sink.write(locations);
    } catch (err) {
      summary.errors.push(err instanceof Error ? err.message : String(err));
      summary.finished_at = new Date().toISOString();
      throw new PipelineError("Could not write the enriched locations", summary, { cause: err });
    }
  }

  summary.finished_at = new Date().toISOString();
  const failed = Object.values(summary.geocode_failed).reduce((a, b) => a + b, 0);
  logger.log(
    `✅ Geocoded ${summary.geocode_resolved}/${summary.geocode_requested} (${failed} failed, ${summary.provider_requests} provider requests)${summary.cancelled ? " [cancelled]" : ""}`,
  );

  return { locations, summary, validationFailures };
}
