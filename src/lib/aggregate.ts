import { addressClean } from "./address";
import { LICENSE_CATEGORIES } from "./types";
import type { CategoryCounts, LicenseCategory, LocationAggregate, NormalizedAddress } from "./types";

export type AggregateInput = {
  address: NormalizedAddress;
  category: LicenseCategory;
};

export function emptyCounts(): CategoryCounts {
  return { barber: 0, cosmetologist: 0, salon: 0, barbershop: 0, owner: 0, school: 0 };
}

function createAggregate(a: NormalizedAddress): LocationAggregate {
  return {
    address_key: a.address_key,
    address_clean: addressClean(a),
    unit: a.unit,
    city_clean: a.city_clean,
    state: a.state,
    zip_clean: a.zip,
    address_type: null,
    total_licenses: 0,
    counts_by_category: emptyCounts(),
  };
}

function byKey(a: LocationAggregate, b: LocationAggregate) {
  return a.address_key < b.address_key ? -1 : a.address_key > b.address_key ? 1 : 0;
}

/**
 * One aggregate per address key with license counts summed per category.
 * Output is sorted by key, so any ordering of `entries` gives the same result.
 */
export function aggregateLicenses(entries: Iterable<AggregateInput>): LocationAggregate[] {
  const byAddress = new Map<string, LocationAggregate>();

  for (const { address, category } of entries) {
    let agg = byAddress.get(address.address_key);
    if (!agg) {
      agg = createAggregate(address);
      byAddress.set(address.address_key, agg);
    }
    agg.total_licenses++;
    agg.counts_by_category[category]++;
  }

  return [...byAddress.values()].sort(byKey);
}

/**
 * Merge two partial aggregate sets (e.g. from separately ingested sources).
 * Counts are summed per key; classification is cleared since totals changed.
 */
export function mergeAggregates(
  a: readonly LocationAggregate[],
  b: readonly LocationAggregate[],
): LocationAggregate[] {
  const merged = new Map<string, LocationAggregate>();

  for (const agg of [...a, ...b]) {
    const existing = merged.get(agg.address_key);
    if (!existing) {
      merged.set(agg.address_key, {
        ...agg,
        address_type: null,
        counts_by_category: { ...agg.counts_by_category },
      });
      continue;
    }
    existing.total_licenses += agg.total_licenses;
    for (const c of LICENSE_CATEGORIES) {
      existing.counts_by_category[c] += agg.counts_by_category[c];
    }
  }

  return [...merged.values()].sort(byKey);
}
