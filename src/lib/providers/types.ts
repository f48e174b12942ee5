import type { GeocodeRequest } from "../types";

export type GeocodeOutcome =
  | { kind: "match"; latitude: number; longitude: number }
  | { kind: "not_found" }
  | { kind: "error"; transient: boolean; message: string };

export type ProviderResponse = {
  outcomes: Map<string, GeocodeOutcome>; // keyed by address_key
  requests: number; // HTTP calls made
};

/**
 * One geocoding backend. A call that fails as a whole throws
 * `TransientProviderError` or `PermanentProviderError`; per-address problems
 * come back as `error` outcomes.
 */
export interface GeocodeProvider {
  readonly name: string;
  geocodeBatch(requests: readonly GeocodeRequest[]): Promise<ProviderResponse>;
}

export function oneLineQuery(r: GeocodeRequest) {
  return `${r.street}, ${r.city}, ${r.state} ${r.zip}`.trim();
}
