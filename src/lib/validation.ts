import { promises as fs } from "node:fs";
import path from "node:path";
import booleanPointInPolygon from "@turf/boolean-point-in-polygon";
import { point as turfPoint, polygon as turfPolygon } from "@turf/helpers";
import stateBounds from "../../data/state_bounds.json";
import type { Logger } from "./types";

// Shared validation utilities for the geocoding pipeline

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  metrics?: Record<string, number | string>;
}

export interface ProcessingResult<T> {
  success: boolean;
  data?: T;
  errors: string[];
  warnings: string[];
}

export type StateBounds = {
  lat_min: number;
  lat_max: number;
  lon_min: number;
  lon_max: number;
};

const STATE_BOUNDS = new Map<string, StateBounds>(Object.entries(stateBounds));

// Box polygons are built once per state
const boxCache = new Map<string, ReturnType<typeof turfPolygon>>();

function stateBox(state: string) {
  const cached = boxCache.get(state);
  if (cached) return cached;

  const b = STATE_BOUNDS.get(state);
  if (!b) return null;

  const box = turfPolygon([
    [
      [b.lon_min, b.lat_min],
      [b.lon_max, b.lat_min],
      [b.lon_max, b.lat_max],
      [b.lon_min, b.lat_max],
      [b.lon_min, b.lat_min],
    ],
  ]);
  boxCache.set(state, box);
  return box;
}

export function getStateBounds(state: string): StateBounds | undefined {
  return STATE_BOUNDS.get(state);
}

/**
 * Check that a geocoded coordinate lies inside the declared state's bounding box.
 * Points on the box edge count as inside.
 */
export function validateCoordinates(lat: number | null, lon: number | null, state: string): ValidationResult {
  const result: ValidationResult = {
    isValid: true,
    errors: [],
    warnings: [],
  };

  if (lat === null || lon === null) {
    result.isValid = false;
    result.errors.push("Missing latitude or longitude");
    return result;
  }

  if (!Number.isFinite(lat) || !Number.isFinite(lon) || Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    result.isValid = false;
    result.errors.push("Invalid latitude or longitude values");
    return result;
  }

  const box = stateBox(state);
  if (!box) {
    result.isValid = false;
    result.errors.push(`No bounding box for state '${state}'`);
    return result;
  }

  if (!booleanPointInPolygon(turfPoint([lon, lat]), box)) {
    result.isValid = false;
    result.errors.push(`Coordinates outside ${state} bounds: ${lat}, ${lon}`);
  }

  return result;
}

/**
 * Structured error handling wrapper for async functions
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: string,
  logger: Logger = console,
): Promise<ProcessingResult<T>> {
  try {
    const data = await operation();
    return {
      success: true,
      data,
      errors: [],
      warnings: [],
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`❌ ${context} failed:`, errorMessage);

    return {
      success: false,
      errors: [`${context}: ${errorMessage}`],
      warnings: [],
    };
  }
}

/**
 * Write validation report to file
 */
export async function writeValidationReport(
  reportPath: string,
  results: ValidationResult[],
  context: string,
  // `passedOmitted` counts passing checks the caller did not keep in `results`
  options: { passedOmitted?: number; logger?: Logger } = {},
): Promise<void> {
  const { passedOmitted = 0, logger = console } = options;
  const summary = {
    timestamp: new Date().toISOString(),
    context,
    total_checks: results.length + passedOmitted,
    passed: results.filter((r) => r.isValid).length + passedOmitted,
    failed: results.filter((r) => !r.isValid).length,
    total_errors: results.reduce((sum, r) => sum + r.errors.length, 0),
    total_warnings: results.reduce((sum, r) => sum + r.warnings.length, 0),
    details: results.filter((r) => !r.isValid || r.warnings.length > 0),
  };

  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, JSON.stringify(summary, null, 2), "utf8");

  logger.log(`📊 Validation report written to ${reportPath}`);
  logger.log(`   ✅ ${summary.passed}/${summary.total_checks} checks passed`);
  if (summary.failed > 0) {
    logger.log(`   ❌ ${summary.failed} checks failed`);
  }
  if (summary.total_warnings > 0) {
    logger.log(`   ⚠️  ${summary.total_warnings} warnings`);
  }
}
