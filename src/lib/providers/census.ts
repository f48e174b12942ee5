import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { providerErrorForStatus, toProviderError } from "../retry";
import type { GeocodeRequest } from "../types";
import type { GeocodeOutcome, GeocodeProvider, ProviderResponse } from "./types";

const CENSUS_BATCH_URL = "https://geocoding.geo.census.gov/geocoder/locations/addressbatch";

export type CensusOptions = {
  timeoutMs: number;
  endpoint?: string;
  benchmark?: string;
};

/** CSV upload body: `id,street,city,state,zip`, no header. The id is the row index. */
export function buildCensusBatchCsv(requests: readonly GeocodeRequest[]): string {
  return stringify(requests.map((r, i) => [String(i), r.street, r.city, r.state, r.zip]));
}

/**
 * Parse the batch response. Rows look like
 * `"0","123 MAIN ST, MIAMI, FL, 33101","Match","Exact","...","-80.19,25.77","123","L"`
 * and arrive in no particular order. Rows for ids we did not send are ignored.
 */
export function parseCensusBatchResponse(text: string, requests: readonly GeocodeRequest[]): Map<string, GeocodeOutcome> {
  const rows: unknown = parse(text, {
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    trim: true,
  });

  const outcomes = new Map<string, GeocodeOutcome>();
  if (!Array.isArray(rows)) return outcomes;

  for (const row of rows) {
    if (!Array.isArray(row) || row.length < 3) continue;
    const [id, , matchFlag, , , coords]: unknown[] = row;
    const index = Number(id);
    if (!Number.isInteger(index) || index < 0 || index >= requests.length) continue;
    const key = requests[index].address_key;

    if (matchFlag !== "Match" || typeof coords !== "string") {
      // "No_Match" and "Tie" (ambiguous) are both a definitive no
      outcomes.set(key, { kind: "not_found" });
      continue;
    }

    const [lon, lat] = coords.split(",").map((c) => Number(c.trim()));
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      outcomes.set(key, { kind: "not_found" });
      continue;
    }
    outcomes.set(key, { kind: "match", latitude: lat, longitude: lon });
  }

  return outcomes;
}

/**
 * Bulk lane: US Census Bureau batch geocoder. One multipart upload per batch
 * (the endpoint takes up to 10k rows; smaller chunks avoid server timeouts).
 */
export class CensusBatchProvider implements GeocodeProvider {
  readonly name = "census";

  constructor(private readonly options: CensusOptions) {}

  async geocodeBatch(requests: readonly GeocodeRequest[]): Promise<ProviderResponse> {
    const form = new FormData();
    form.append("addressFile", new Blob([buildCensusBatchCsv(requests)], { type: "text/csv" }), "batch.csv");
    form.append("benchmark", this.options.benchmark ?? "Public_AR_Current");

    let text: string;
    try {
      const res = await fetch(this.options.endpoint ?? CENSUS_BATCH_URL, {
        method: "POST",
        body: form,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      if (!res.ok) throw providerErrorForStatus(this.name, res.status, res.statusText);
      text = await res.text();
    } catch (e) {
      throw toProviderError(this.name, e);
    }

    const outcomes = parseCensusBatchResponse(text, requests);
    for (const r of requests) {
      if (!outcomes.has(r.address_key)) {
        outcomes.set(r.address_key, { kind: "error", transient: true, message: "missing from census response" });
      }
    }
    return { outcomes, requests: 1 };
  }
}
