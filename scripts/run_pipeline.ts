import { promises as fs } from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { loadPipelineConfig, mapboxTokenFromEnv } from "../src/lib/config";
import { JsonFileGeocodeCache } from "../src/lib/geocodeCache";
import { toLicenseRecord } from "../src/lib/licenses";
import type { LicenseRow } from "../src/lib/licenses";
import { PipelineError, createGeocodeRouter, runPipeline } from "../src/lib/pipeline";
import { CsvAggregateSink } from "../src/lib/sink";
import type { LicenseRecord } from "../src/lib/types";
import { withErrorHandling, writeValidationReport } from "../src/lib/validation";

// Usage: npm run pipeline -- <STATE> [--retry-failed]
const args = process.argv.slice(2);
const STATE = (args.find((a) => !a.startsWith("--")) ?? "").toUpperCase();
const RETRY_FAILED = args.includes("--retry-failed");

if (!/^[A-Z]{2}$/.test(STATE)) {
  console.log("Usage: npm run pipeline -- <STATE> [--retry-failed]");
  console.log("Example: npm run pipeline -- FL");
  process.exit(1);
}

const INPUT_CSV = path.join("input", "licenses", `licenses_${STATE}.csv`);
const OUTPUT_CSV = path.join("output", `locations_${STATE}.csv`);
const SUMMARY_PATH = path.join("output", `run_summary_${STATE}.json`);
const VALIDATION_REPORT = path.join("output", `geocode_validation_${STATE}.json`);
// Shared by every state: the same key never needs geocoding twice
const CACHE_PATH = path.join("cache", "geocode_cache.json");

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readString(row: Record<string, unknown>, key: keyof LicenseRow): string | undefined {
  const v = row[key];
  return typeof v === "string" ? v : undefined;
}

async function readLicenseRows(p: string): Promise<LicenseRow[]> {
  const csvText = await fs.readFile(p, "utf8");
  const rows: unknown = parse(csvText, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (!Array.isArray(rows)) throw new Error(`${p} did not parse into rows`);

  return rows.filter(isRecord).map((r) => ({
    license_type: readString(r, "license_type"),
    category: readString(r, "category"),
    address_line_1: readString(r, "address_line_1"),
    address_line_2: readString(r, "address_line_2"),
    city: readString(r, "city"),
    state: readString(r, "state"),
    zip: readString(r, "zip"),
  }));
}

async function writeJson(p: string, data: unknown) {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, JSON.stringify(data, null, 2), "utf8");
}

async function main() {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("⚠️  Interrupted: finishing in-flight batches, no new ones will start");
    controller.abort();
  });

  const result = await withErrorHandling(async () => {
    const config = await loadPipelineConfig();
    const mapboxToken = mapboxTokenFromEnv();
    if (!mapboxToken) {
      console.log("ℹ️  MAPBOX_ACCESS_TOKEN not set: fast lane disabled, using the Census batch geocoder");
    }

    const rows = await readLicenseRows(INPUT_CSV);
    console.log(`📄 Loaded ${rows.length} license rows from ${INPUT_CSV}`);

    const records: LicenseRecord[] = [];
    let unmapped = 0;
    for (const row of rows) {
      const mapped = toLicenseRecord(row, STATE);
      if (mapped.ok) records.push(mapped.record);
      else unmapped++;
    }
    if (unmapped > 0) console.warn(`⚠️  ${unmapped} rows with an unmapped license type skipped`);

    const cache = await JsonFileGeocodeCache.open(CACHE_PATH, {
      writeTimeoutMs: config.geocoding.cacheWriteTimeoutMs,
    });
    console.log(`🗺️  Geocode cache: ${cache.size} entries in ${CACHE_PATH}`);

    const run = await runPipeline(records, {
      cache,
      config,
      router: createGeocodeRouter(config, { mapboxToken }),
      sink: new CsvAggregateSink(OUTPUT_CSV),
      signal: controller.signal,
      retryFailed: RETRY_FAILED,
    }).catch(async (err: unknown) => {
      // Keep what was committed before the failure visible
      if (err instanceof PipelineError) {
        await writeJson(SUMMARY_PATH, { state: STATE, unmapped_license_type: unmapped, ...err.summary });
      }
      throw err;
    });

    const { summary, validationFailures } = run;
    await writeJson(SUMMARY_PATH, { state: STATE, unmapped_license_type: unmapped, ...summary });
    if (validationFailures.length > 0) {
      await writeValidationReport(VALIDATION_REPORT, validationFailures, `Geocode bounds ${STATE}`, {
        passedOmitted: summary.geocode_resolved,
      });
    }

    console.log(`✅ Wrote ${run.locations.length} locations to ${OUTPUT_CSV}`);
    console.log(`📊 Run summary: ${SUMMARY_PATH}`);
    if (summary.cancelled) {
      console.warn("⚠️  Run was cancelled: re-run to geocode the remaining addresses");
    }

    return summary;
  }, `Pipeline ${STATE}`);

  if (!result.success) {
    console.error("❌ Pipeline failed:", result.errors);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("❌ run_pipeline failed:", err);
  process.exit(1);
});
