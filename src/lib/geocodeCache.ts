import { promises as fs } from "node:fs";
import path from "node:path";
import { CachePersistenceError } from "./errors";
import { withTimeout } from "./retry";
import type { FailureReason, GeocodeCacheEntry, GeocodeStatus } from "./types";

export interface GeocodeCacheStore {
  lookup(addressKey: string): Promise<GeocodeCacheEntry | undefined>;
  /** Returns the entry actually stored, which is the existing one when `entry` would downgrade it. */
  upsert(entry: GeocodeCacheEntry): Promise<GeocodeCacheEntry>;
  upsertMany(entries: readonly GeocodeCacheEntry[]): Promise<GeocodeCacheEntry[]>;
}

const STATUS_RANK: Record<GeocodeStatus, number> = {
  pending: 0,
  failed: 1,
  resolved: 2,
};

// Failures a later run would only reproduce
export const PERMANENT_FAILURES: ReadonlySet<FailureReason> = new Set<FailureReason>([
  "not_found",
  "out_of_bounds",
  "no_bounds",
  "rejected_by_provider",
]);

/**
 * Monotonic upsert: a write never lowers the status of an existing entry
 * (pending < failed < resolved). Equal or better status replaces it.
 */
export function mergeCacheEntry(existing: GeocodeCacheEntry | undefined, incoming: GeocodeCacheEntry): GeocodeCacheEntry {
  if (!existing) return incoming;
  if (STATUS_RANK[incoming.status] < STATUS_RANK[existing.status]) return existing;
  return incoming;
}

export function needsGeocoding(entry: GeocodeCacheEntry | undefined, retryFailed = false): boolean {
  if (!entry) return true;
  switch (entry.status) {
    case "resolved":
      return false;
    case "pending":
      return true;
    case "failed":
      return retryFailed || entry.failure_reason === null || !PERMANENT_FAILURES.has(entry.failure_reason);
  }
}

export type CacheDiff = {
  misses: string[];
  hits: number;
  skippedPermanentFailures: number;
};

/** Keys that still need a provider call, given what the store already holds. */
export async function findCacheMisses(
  store: GeocodeCacheStore,
  keys: Iterable<string>,
  options: { retryFailed?: boolean } = {},
): Promise<CacheDiff> {
  const diff: CacheDiff = { misses: [], hits: 0, skippedPermanentFailures: 0 };

  for (const key of new Set(keys)) {
    const entry = await store.lookup(key);
    if (needsGeocoding(entry, options.retryFailed)) {
      diff.misses.push(key);
    } else if (entry?.status === "resolved") {
      diff.hits++;
    } else {
      diff.skippedPermanentFailures++;
    }
  }

  return diff;
}

export class MemoryGeocodeCache implements GeocodeCacheStore {
  protected readonly entries: Map<string, GeocodeCacheEntry>;

  constructor(initial: Iterable<GeocodeCacheEntry> = []) {
    this.entries = new Map();
    for (const e of initial) this.entries.set(e.address_key, e);
  }

  get size() {
    return this.entries.size;
  }

  async lookup(addressKey: string) {
    return this.entries.get(addressKey);
  }

  async upsert(entry: GeocodeCacheEntry) {
    const [stored] = await this.upsertMany([entry]);
    return stored;
  }

  async upsertMany(entries: readonly GeocodeCacheEntry[]) {
    return this.mergeAll(entries).stored;
  }

  protected mergeAll(entries: readonly GeocodeCacheEntry[]) {
    let changed = false;
    const stored = entries.map((entry) => {
      const current = this.entries.get(entry.address_key);
      const next = mergeCacheEntry(current, entry);
      if (next !== current) {
        this.entries.set(entry.address_key, next);
        changed = true;
      }
      return next;
    });
    return { stored, changed };
  }

  snapshot(): Record<string, GeocodeCacheEntry> {
    const keys = [...this.entries.keys()].sort();
    const out: Record<string, GeocodeCacheEntry> = {};
    for (const k of keys) {
      const entry = this.entries.get(k);
      if (entry) out[k] = entry;
    }
    return out;
  }
}

const FAILURE_REASONS = new Set<unknown>([...PERMANENT_FAILURES, "retries_exhausted", "cancelled"]);

function isCacheEntry(v: unknown): v is GeocodeCacheEntry {
  if (typeof v !== "object" || v === null) return false;
  const e: Record<string, unknown> = { ...v };
  const coord = (x: unknown) => x === null || typeof x === "number";
  return (
    typeof e.address_key === "string" &&
    coord(e.latitude) &&
    coord(e.longitude) &&
    (e.status === "pending" || e.status === "failed" || e.status === "resolved") &&
    (e.failure_reason === null || FAILURE_REASONS.has(e.failure_reason)) &&
    (e.provider === null || typeof e.provider === "string") &&
    typeof e.attempts === "number" &&
    typeof e.last_updated === "string"
  );
}

/**
 * Geocode cache persisted as one JSON file keyed by address key.
 *
 * Every write goes through a single promise chain and replaces the file via
 * temp file + rename, so concurrent batches never interleave partial writes.
 */
export class JsonFileGeocodeCache extends MemoryGeocodeCache {
  private writeChain: Promise<void> = Promise.resolve();
  private writeSeq = 0;

  private constructor(
    readonly filePath: string,
    initial: GeocodeCacheEntry[],
    private readonly writeTimeoutMs: number,
  ) {
    super(initial);
  }

  static async open(filePath: string, options: { writeTimeoutMs?: number } = {}): Promise<JsonFileGeocodeCache> {
    let text: string | null = null;
    try {
      text = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
        throw new CachePersistenceError(`Could not read geocode cache ${filePath}`, { cause: err });
      }
    }

    const entries: GeocodeCacheEntry[] = [];
    if (text) {
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch (err) {
        throw new CachePersistenceError(`Geocode cache ${filePath} is not valid JSON`, { cause: err });
      }
      if (typeof data !== "object" || data === null || Array.isArray(data)) {
        throw new CachePersistenceError(`Geocode cache ${filePath} must be a JSON object`);
      }
      for (const [key, value] of Object.entries(data)) {
        if (!isCacheEntry(value) || value.address_key !== key) {
          throw new CachePersistenceError(`Geocode cache ${filePath} has a malformed entry for '${key}'`);
        }
        entries.push(value);
      }
    }

    return new JsonFileGeocodeCache(filePath, entries, options.writeTimeoutMs ?? 30_000);
  }

  override async upsertMany(entries: readonly GeocodeCacheEntry[]) {
    const { stored, changed } = this.mergeAll(entries);
    if (changed) await this.flush();
    return stored;
  }

  private async writeFile() {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.${++this.writeSeq}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(this.snapshot(), null, 2), "utf8");
    await fs.rename(tmp, this.filePath);
  }

  private flush(): Promise<void> {
    const write = this.writeChain.then(() => this.writeFile());
    // The next write waits for this one to settle, even after the caller has timed out
    this.writeChain = write.catch(() => undefined);
    return withTimeout(write, this.writeTimeoutMs, `Writing geocode cache ${this.filePath}`).catch((err: unknown) => {
      throw new CachePersistenceError(`Could not write geocode cache ${this.filePath}`, { cause: err });
    });
  }
}
