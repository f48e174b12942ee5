import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import defaults from "../../config/pipeline.json";
import { deepMerge, loadPipelineConfig, mapboxTokenFromEnv, parsePipelineConfig } from "./config";
import { ConfigError } from "./errors";

describe("parsePipelineConfig", () => {
  it("accepts the shipped defaults", () => {
    const config = parsePipelineConfig(defaults);
    expect(config.geocoding.fastLaneMaxAddresses).toBe(3000);
    expect(config.geocoding.bulk).toEqual({ batchSize: 5000, concurrency: 4, requestTimeoutMs: 300000 });
    expect(config.classification.densityThreshold).toBe(2);
  });

  it("names the offending setting", () => {
    const broken = deepMerge(defaults, { geocoding: { fast: { concurrency: 0 } } });
    expect(() => parsePipelineConfig(broken, "override.json")).toThrow(
      new ConfigError("override.json: 'geocoding.fast.concurrency' must be >= 1"),
    );
  });

  it("rejects an invalid unit number pattern", () => {
    const broken = deepMerge(defaults, { classification: { residentialUnitNumberPattern: "([0-9" } });
    expect(() => parsePipelineConfig(broken)).toThrow("must be a valid regular expression");
  });
});

describe("deepMerge", () => {
  it("merges objects and replaces arrays", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] }, d: 1 });
  });
});

describe("loadPipelineConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-config-"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("uses the defaults without an override", async () => {
    vi.stubEnv("PIPELINE_CONFIG", "");
    expect(await loadPipelineConfig()).toEqual(parsePipelineConfig(defaults));
  });

  it("deep-merges the override named by PIPELINE_CONFIG", async () => {
    const file = path.join(dir, "override.json");
    await fs.writeFile(file, JSON.stringify({ geocoding: { fast: { concurrency: 2 } } }), "utf8");
    vi.stubEnv("PIPELINE_CONFIG", file);

    const config = await loadPipelineConfig();

    expect(config.geocoding.fast).toEqual({ batchSize: 25, concurrency: 2, requestTimeoutMs: 10000 });
    expect(config.geocoding.bulk.batchSize).toBe(5000);
  });

  it("fails on a missing or malformed override", async () => {
    await expect(loadPipelineConfig(path.join(dir, "nope.json"))).rejects.toBeInstanceOf(ConfigError);

    const file = path.join(dir, "bad.json");
    await fs.writeFile(file, "[1, 2]", "utf8");
    await expect(loadPipelineConfig(file)).rejects.toThrow(`Config override ${file} must be a JSON object`);
  });
});

describe("mapboxTokenFromEnv", () => {
  it("reads a trimmed, non-empty token", () => {
    expect(mapboxTokenFromEnv({ MAPBOX_ACCESS_TOKEN: " test-token " })).toBe("test-token");
    expect(mapboxTokenFromEnv({ MAPBOX_ACCESS_TOKEN: "  " })).toBeUndefined();
    expect(mapboxTokenFromEnv({})).toBeUndefined();
  });
});
