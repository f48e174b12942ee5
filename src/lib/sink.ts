import { promises as fs } from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import { SinkPersistenceError } from "./errors";
import { LICENSE_CATEGORIES } from "./types";
import type { EnrichedLocation } from "./types";

export interface AggregateSink {
  write(locations: readonly EnrichedLocation[]): Promise<void>;
}

export const OUTPUT_COLUMNS = [
  "address_key",
  "address_clean",
  "city_clean",
  "state",
  "zip_clean",
  "address_type",
  "total_licenses",
  ...LICENSE_CATEGORIES.map((c) => `count_${c}` as const),
  "lat",
  "lon",
  "geocode_status",
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];
export type OutputRow = Record<OutputColumn, string | number>;

export function toOutputRow(loc: EnrichedLocation): OutputRow {
  return {
    address_key: loc.address_key,
    address_clean: loc.address_clean,
    city_clean: loc.city_clean,
    state: loc.state,
    zip_clean: loc.zip_clean,
    address_type: loc.address_type,
    total_licenses: loc.total_licenses,
    count_barber: loc.counts_by_category.barber,
    count_cosmetologist: loc.counts_by_category.cosmetologist,
    count_salon: loc.counts_by_category.salon,
    count_barbershop: loc.counts_by_category.barbershop,
    count_owner: loc.counts_by_category.owner,
    count_school: loc.counts_by_category.school,
    lat: loc.latitude ?? "",
    lon: loc.longitude ?? "",
    geocode_status: loc.geocode_status,
  };
}

export function locationsToCsv(locations: readonly EnrichedLocation[]): string {
  return stringify(locations.map(toOutputRow), { header: true, columns: [...OUTPUT_COLUMNS] });
}

/** Writes the enriched locations as one CSV file, replacing any previous output. */
export class CsvAggregateSink implements AggregateSink {
  constructor(readonly filePath: string) {}

  async write(locations: readonly EnrichedLocation[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, locationsToCsv(locations), "utf8");
    } catch (err) {
      throw new SinkPersistenceError(`Could not write locations to ${this.filePath}`, { cause: err });
    }
  }
}

/** Keeps the last written set in memory. */
export class MemoryAggregateSink implements AggregateSink {
  written: EnrichedLocation[] = [];

  async write(locations: readonly EnrichedLocation[]): Promise<void> {
    this.written = [...locations];
  }
}
