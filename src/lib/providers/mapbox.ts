import { PermanentProviderError, isRetryableStatus, toProviderError } from "../retry";
import type { GeocodeRequest } from "../types";
import { oneLineQuery } from "./types";
import type { GeocodeOutcome, GeocodeProvider, ProviderResponse } from "./types";

const MAPBOX_ENDPOINT = "https://api.mapbox.com/geocoding/v5/mapbox.places";

export type MapboxOptions = {
  accessToken: string;
  timeoutMs: number;
  endpoint?: string;
};

type MapboxFeature = { center: [number, number] };

function firstFeature(data: unknown): MapboxFeature | null {
  if (typeof data !== "object" || data === null || !("features" in data)) return null;
  const { features } = data;
  if (!Array.isArray(features) || features.length === 0) return null;

  const f: unknown = features[0];
  if (typeof f !== "object" || f === null || !("center" in f)) return null;
  const { center } = f;
  if (!Array.isArray(center) || center.length < 2) return null;

  const [lon, lat]: unknown[] = center;
  if (typeof lon !== "number" || typeof lat !== "number") return null;
  return { center: [lon, lat] };
}

/**
 * Fast lane: Mapbox forward geocoding, one request per address.
 * Low latency per call, suited to small daily deltas.
 */
export class MapboxProvider implements GeocodeProvider {
  readonly name = "mapbox";
  private readonly endpoint: string;

  constructor(private readonly options: MapboxOptions) {
    this.endpoint = options.endpoint ?? MAPBOX_ENDPOINT;
  }

  private url(r: GeocodeRequest) {
    const url = new URL(`${this.endpoint}/${encodeURIComponent(oneLineQuery(r))}.json`);
    url.searchParams.set("access_token", this.options.accessToken);
    url.searchParams.set("country", "us");
    url.searchParams.set("types", "address,poi");
    url.searchParams.set("limit", "1");
    return url.toString();
  }

  private async geocodeOne(r: GeocodeRequest): Promise<GeocodeOutcome> {
    let res: Response;
    try {
      res = await fetch(this.url(r), { signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (e) {
      return { kind: "error", transient: true, message: toProviderError(this.name, e).message };
    }

    if (res.status === 401 || res.status === 403) {
      // Bad or revoked token: every other address in the batch would fail the same way
      throw new PermanentProviderError(`mapbox rejected the access token (${res.status})`, res.status);
    }
    if (!res.ok) {
      if (isRetryableStatus(res.status)) {
        return { kind: "error", transient: true, message: `mapbox responded ${res.status}` };
      }
      return { kind: "not_found" };
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (e) {
      return { kind: "error", transient: true, message: `mapbox returned invalid JSON (${String(e)})` };
    }

    const feature = firstFeature(data);
    if (!feature) return { kind: "not_found" };
    const [longitude, latitude] = feature.center;
    return { kind: "match", latitude, longitude };
  }

  async geocodeBatch(requests: readonly GeocodeRequest[]): Promise<ProviderResponse> {
    const outcomes = new Map<string, GeocodeOutcome>();
    for (const r of requests) {
      outcomes.set(r.address_key, await this.geocodeOne(r));
    }
    return { outcomes, requests: requests.length };
  }
}
