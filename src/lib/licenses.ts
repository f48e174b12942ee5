import licenseCodes from "../../data/license_codes.json";
import { LICENSE_CATEGORIES } from "./types";
import type { LicenseCategory, LicenseRecord } from "./types";

// Canonical input CSV row
export type LicenseRow = {
  license_type?: string;
  category?: string;
  address_line_1?: string;
  address_line_2?: string;
  city?: string;
  state?: string;
  zip?: string;
};

const CODE_TABLES = new Map<string, Map<string, string>>(
  Object.entries(licenseCodes).map(([state, table]) => [state, new Map(Object.entries(table))]),
);

export function isLicenseCategory(v: string): v is LicenseCategory {
  return LICENSE_CATEGORIES.some((c) => c === v);
}

/** Board code / license subtype → category, per state. Unknown codes give null. */
export function categoryForCode(state: string, code: string): LicenseCategory | null {
  const mapped = CODE_TABLES.get(state.trim().toUpperCase())?.get(code.trim().toUpperCase());
  return mapped && isLicenseCategory(mapped) ? mapped : null;
}

export type RowMapping = { ok: true; record: LicenseRecord } | { ok: false; reason: "unmapped_license_type" };

/**
 * An explicit `category` column wins; otherwise `license_type` goes through the
 * code table of the row's state (or `defaultState` when the row has none).
 */
export function toLicenseRecord(row: LicenseRow, defaultState: string): RowMapping {
  const state = row.state?.trim() || defaultState;
  const explicit = row.category?.trim().toLowerCase() ?? "";
  const category = isLicenseCategory(explicit) ? explicit : categoryForCode(state, row.license_type ?? "");
  if (!category) return { ok: false, reason: "unmapped_license_type" };

  return {
    ok: true,
    record: {
      category,
      address: {
        street: row.address_line_1 ?? "",
        unit: row.address_line_2 || null,
        city: row.city || null,
        state,
        zip: row.zip || null,
      },
    },
  };
}
