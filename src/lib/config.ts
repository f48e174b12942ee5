import { promises as fs } from "node:fs";
import defaults from "../../config/pipeline.json";
import type { ClassificationPolicy } from "./classify";
import { ConfigError } from "./errors";
import type { RetryPolicyOptions } from "./retry";

export type LaneConfig = {
  batchSize: number;
  concurrency: number;
  requestTimeoutMs: number;
};

export type PipelineConfig = {
  classification: ClassificationPolicy;
  geocoding: {
    fastLaneMaxAddresses: number;
    fast: LaneConfig;
    bulk: LaneConfig;
    retry: RetryPolicyOptions;
    cacheWriteTimeoutMs: number;
    progressEvery: number;
  };
};

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Objects merge key by key; arrays and scalars in `override` replace the base value. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    out[key] = deepMerge(base[key], value);
  }
  return out;
}

class Reader {
  constructor(private readonly source: string) {}

  fail(path: string, expected: string): never {
    throw new ConfigError(`${this.source}: '${path}' must be ${expected}`);
  }

  object(v: unknown, path: string): Record<string, unknown> {
    return isPlainObject(v) ? v : this.fail(path, "an object");
  }

  number(obj: Record<string, unknown>, key: string, path: string, opts: { min?: number; integer?: boolean } = {}): number {
    const v = obj[key];
    const where = `${path}.${key}`;
    if (typeof v !== "number" || !Number.isFinite(v)) return this.fail(where, "a number");
    if (opts.integer && !Number.isInteger(v)) return this.fail(where, "an integer");
    if (opts.min !== undefined && v < opts.min) return this.fail(where, `>= ${opts.min}`);
    return v;
  }

  strings(obj: Record<string, unknown>, key: string, path: string): string[] {
    const v = obj[key];
    if (!Array.isArray(v)) return this.fail(`${path}.${key}`, "an array of strings");
    return v.map((s) => (typeof s === "string" && s.trim() ? s.trim().toUpperCase() : this.fail(`${path}.${key}`, "an array of strings")));
  }

  pattern(obj: Record<string, unknown>, key: string, path: string): string {
    const v = obj[key];
    if (typeof v !== "string") return this.fail(`${path}.${key}`, "a string");
    try {
      new RegExp(v);
    } catch {
      return this.fail(`${path}.${key}`, "a valid regular expression");
    }
    return v;
  }
}

/** Validate a raw config object. Unknown keys are ignored. */
export function parsePipelineConfig(raw: unknown, source = "pipeline config"): PipelineConfig {
  const r = new Reader(source);
  const root = r.object(raw, "");
  const cls = r.object(root.classification, "classification");
  const geo = r.object(root.geocoding, "geocoding");

  const lane = (name: "fast" | "bulk"): LaneConfig => {
    const path = `geocoding.${name}`;
    const l = r.object(geo[name], path);
    return {
      batchSize: r.number(l, "batchSize", path, { min: 1, integer: true }),
      concurrency: r.number(l, "concurrency", path, { min: 1, integer: true }),
      requestTimeoutMs: r.number(l, "requestTimeoutMs", path, { min: 1 }),
    };
  };

  const retry = r.object(geo.retry, "geocoding.retry");

  return {
    classification: {
      commercialKeywords: r.strings(cls, "commercialKeywords", "classification"),
      residentialUnitDesignators: r.strings(cls, "residentialUnitDesignators", "classification"),
      residentialUnitNumberPattern: r.pattern(cls, "residentialUnitNumberPattern", "classification"),
      residentialMaxLicenses: r.number(cls, "residentialMaxLicenses", "classification", { min: 0, integer: true }),
      densityThreshold: r.number(cls, "densityThreshold", "classification", { min: 0, integer: true }),
    },
    geocoding: {
      fastLaneMaxAddresses: r.number(geo, "fastLaneMaxAddresses", "geocoding", { min: 0, integer: true }),
      fast: lane("fast"),
      bulk: lane("bulk"),
      retry: {
        maxAttempts: r.number(retry, "maxAttempts", "geocoding.retry", { min: 1, integer: true }),
        baseDelayMs: r.number(retry, "baseDelayMs", "geocoding.retry", { min: 0 }),
        factor: r.number(retry, "factor", "geocoding.retry", { min: 1 }),
        maxDelayMs: r.number(retry, "maxDelayMs", "geocoding.retry", { min: 0 }),
      },
      cacheWriteTimeoutMs: r.number(geo, "cacheWriteTimeoutMs", "geocoding", { min: 1 }),
      progressEvery: r.number(geo, "progressEvery", "geocoding", { min: 1, integer: true }),
    },
  };
}

/**
 * Defaults from config/pipeline.json, deep-merged with an optional override
 * file (`overridePath`, else the PIPELINE_CONFIG environment variable).
 */
export async function loadPipelineConfig(overridePath = process.env.PIPELINE_CONFIG): Promise<PipelineConfig> {
  if (!overridePath) return parsePipelineConfig(defaults, "config/pipeline.json");

  let text: string;
  try {
    text = await fs.readFile(overridePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Could not read config override ${overridePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let override: unknown;
  try {
    override = JSON.parse(text);
  } catch {
    throw new ConfigError(`Config override ${overridePath} is not valid JSON`);
  }
  if (!isPlainObject(override)) throw new ConfigError(`Config override ${overridePath} must be a JSON object`);

  return parsePipelineConfig(deepMerge(defaults, override), overridePath);
}

export function mapboxTokenFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const token = env.MAPBOX_ACCESS_TOKEN?.trim();
  return token ? token : undefined;
}
