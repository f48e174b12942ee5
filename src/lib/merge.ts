import type { OutputColumn } from "./sink";
import { LICENSE_CATEGORIES } from "./types";

export type CsvRow = Record<string, string | undefined>;

export type StateRows = {
  state: string;
  rows: CsvRow[];
};

export type MergedRow = Record<OutputColumn, string>;

const COUNT_COLUMNS = new Set<string>(LICENSE_CATEGORIES.map((c) => `count_${c}`));

function cell(row: CsvRow, col: OutputColumn) {
  const v = row[col]?.trim() ?? "";
  return v === "" && COUNT_COLUMNS.has(col) ? "0" : v;
}

function byStateThenKey(a: MergedRow, b: MergedRow) {
  if (a.state !== b.state) return a.state < b.state ? -1 : 1;
  return a.address_key < b.address_key ? -1 : a.address_key > b.address_key ? 1 : 0;
}

/**
 * Combine per-state location rows into one national set. Count columns a
 * state's file lacks are filled with `0`, other missing columns stay blank.
 * A key seen in an earlier set wins.
 */
export function mergeStateRows(sets: readonly StateRows[]): { rows: MergedRow[]; duplicates: string[] } {
  const byKey = new Map<string, MergedRow>();
  const duplicates: string[] = [];

  for (const { state, rows } of sets) {
    for (const row of rows) {
      const key = row.address_key?.trim();
      if (!key) continue;
      if (byKey.has(key)) {
        duplicates.push(key);
        continue;
      }

      byKey.set(key, {
        address_key: key,
        address_clean: cell(row, "address_clean"),
        city_clean: cell(row, "city_clean"),
        state: cell(row, "state") || state,
        zip_clean: cell(row, "zip_clean"),
        address_type: cell(row, "address_type"),
        total_licenses: cell(row, "total_licenses"),
        count_barber: cell(row, "count_barber"),
        count_cosmetologist: cell(row, "count_cosmetologist"),
        count_salon: cell(row, "count_salon"),
        count_barbershop: cell(row, "count_barbershop"),
        count_owner: cell(row, "count_owner"),
        count_school: cell(row, "count_school"),
        lat: cell(row, "lat"),
        lon: cell(row, "lon"),
        geocode_status: cell(row, "geocode_status"),
      });
    }
  }

  return { rows: [...byKey.values()].sort(byStateThenKey), duplicates };
}
