import type { AddressType, ClassifiedLocation, LocationAggregate } from "./types";

export type ClassificationPolicy = {
  commercialKeywords: string[];
  residentialUnitDesignators: string[];
  residentialUnitNumberPattern: string;
  residentialMaxLicenses: number;
  densityThreshold: number;
};

export type ClassificationRule = "commercial_keyword" | "residential_unit" | "density" | "default";

export type Classification = {
  address_type: AddressType;
  rule: ClassificationRule;
};

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function hasKeyword(text: string, keywords: string[]) {
  return keywords.some((kw) => new RegExp(`(?:^|\\s)${escapeRegExp(kw.toUpperCase())}S?(?:\\s|$)`).test(text));
}

function hasResidentialUnit(unit: string, policy: ClassificationPolicy) {
  const numberPattern = new RegExp(policy.residentialUnitNumberPattern);
  const tokens = unit.split(" ").filter(Boolean);
  for (let i = 0; i < tokens.length - 1; i++) {
    if (policy.residentialUnitDesignators.includes(tokens[i]) && numberPattern.test(tokens[i + 1])) {
      return true;
    }
  }
  return false;
}

/**
 * Commercial/Residential decision, first matching rule wins:
 * keyword, residential unit with a single license, density, default.
 * Keyword evidence outranks density so a one-chair studio salon stays Commercial.
 */
export function classifyLocation(agg: LocationAggregate, policy: ClassificationPolicy): Classification {
  const text = `${agg.address_clean} ${agg.unit}`.toUpperCase();

  if (hasKeyword(text, policy.commercialKeywords)) {
    return { address_type: "Commercial", rule: "commercial_keyword" };
  }

  if (agg.total_licenses <= policy.residentialMaxLicenses && hasResidentialUnit(agg.unit, policy)) {
    return { address_type: "Residential", rule: "residential_unit" };
  }

  if (agg.total_licenses > policy.densityThreshold) {
    return { address_type: "Commercial", rule: "density" };
  }

  return { address_type: "Residential", rule: "default" };
}

export function classifyLocations(
  aggregates: readonly LocationAggregate[],
  policy: ClassificationPolicy,
): { locations: ClassifiedLocation[]; byRule: Record<ClassificationRule, number> } {
  const byRule: Record<ClassificationRule, number> = {
    commercial_keyword: 0,
    residential_unit: 0,
    density: 0,
    default: 0,
  };

  const locations = aggregates.map((agg) => {
    const { address_type, rule } = classifyLocation(agg, policy);
    byRule[rule]++;
    return { ...agg, address_type };
  });

  return { locations, byRule };
}
