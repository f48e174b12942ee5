// Shared types for the address resolution & geocoding engine

export const LICENSE_CATEGORIES = [
  "barber",
  "cosmetologist",
  "salon",
  "barbershop",
  "owner",
  "school",
] as const;

export type LicenseCategory = (typeof LICENSE_CATEGORIES)[number];

export type CategoryCounts = Record<LicenseCategory, number>;

export type AddressType = "Commercial" | "Residential";

export type RawAddressInput = {
  street: string;
  unit?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
};

export type LicenseRecord = {
  category: LicenseCategory;
  // Either separate fields or a single one-line address ("123 Main St, Miami, FL 33101")
  address: RawAddressInput | string;
};

export type NormalizedAddress = {
  street_clean: string;
  unit: string;
  city_clean: string;
  state: string;
  zip: string;
  address_key: string;
};

export type RejectionReason = "po_box" | "unparsable";

export type Rejection = {
  reason: RejectionReason;
  input: string;
  detail: string;
};

export type NormalizeResult =
  | { ok: true; address: NormalizedAddress }
  | { ok: false; rejection: Rejection };

export type LocationAggregate = {
  address_key: string;
  address_clean: string; // street line including the unit
  unit: string;
  city_clean: string;
  state: string;
  zip_clean: string;
  address_type: AddressType | null; // null until classified
  total_licenses: number;
  counts_by_category: CategoryCounts;
};

export type ClassifiedLocation = LocationAggregate & { address_type: AddressType };

export type GeocodeStatus = "pending" | "failed" | "resolved";

export type FailureReason =
  | "not_found"
  | "out_of_bounds"
  | "no_bounds"
  | "rejected_by_provider"
  | "retries_exhausted"
  | "cancelled";

export type GeocodeCacheEntry = {
  address_key: string;
  latitude: number | null;
  longitude: number | null;
  status: GeocodeStatus;
  failure_reason: FailureReason | null;
  provider: string | null;
  attempts: number;
  last_updated: string; // ISO timestamp
};

export type GeocodeRequest = {
  address_key: string;
  street: string;
  city: string;
  state: string;
  zip: string;
};

export type Lane = "fast" | "bulk";

export type GeocodeRequestBatch = {
  lane: Lane;
  index: number; // 1-based, for progress logs
  requests: GeocodeRequest[];
};

export type EnrichedLocation = ClassifiedLocation & {
  latitude: number | null;
  longitude: number | null;
  geocode_status: GeocodeStatus | "missing";
};

export type Logger = Pick<Console, "log" | "warn" | "error">;
