import abbreviations from "../../data/address_abbreviations.json";
import stateBounds from "../../data/state_bounds.json";
import type { NormalizeResult, NormalizedAddress, RawAddressInput, Rejection } from "./types";

const STREET_SUFFIXES = new Map<string, string>(Object.entries(abbreviations.street_suffixes));
const DIRECTIONALS = new Map<string, string>(Object.entries(abbreviations.directionals));
const UNIT_DESIGNATORS = new Map<string, string>(Object.entries(abbreviations.unit_designators));
const CITY_PREFIXES = new Map<string, string>(Object.entries(abbreviations.city_prefixes));

// Both abbreviated and spelled-out suffixes mark the end of a street name
const SUFFIX_WORDS = new Set<string>([...STREET_SUFFIXES.keys(), ...STREET_SUFFIXES.values()]);

export const KNOWN_STATES = new Set(Object.keys(stateBounds));

const PO_BOX_PATTERN = /\b(?:P\s*\.?\s*O\s*\.?\s*BOX|POST\s+OFFICE\s+BOX|POBOX)(?=\s|\d|#|$)/;

const HOUSE_NUMBER = /^\d+[A-Z]?(?:-[A-Z0-9]+)?$/;
const UNIT_ID = /^(?:[A-Z]?\d+[A-Z]?|[A-Z])(?:-[A-Z0-9]+)?$/;

const STATE_ZIP_TAIL = /[,\s]+([A-Z]{2})[,\s]*(\d{5})(?:[-\s]?\d{4})?\s*$/;
const STATE_TAIL = /[,\s]+([A-Z]{2})\s*$/;

function normalizeWhitespace(s: string) {
  return s.replace(/\s+/g, " ").trim();
}

/**
 * Upper-case and drop punctuation except `#`, `-` and (optionally) commas.
 * Periods and apostrophes are removed outright so "P.O." and "O'Neil" stay single tokens.
 */
function cleanText(s: string, keepCommas = false) {
  const upper = s.toUpperCase().replace(/[.']/g, "");
  const pattern = keepCommas ? /[^A-Z0-9#,\- ]+/g : /[^A-Z0-9#\- ]+/g;
  return normalizeWhitespace(upper.replace(pattern, " "));
}

function tokenize(s: string): string[] {
  return cleanText(s).replace(/#/g, " # ").split(" ").filter(Boolean);
}

function cleanZip(zip: string | null | undefined) {
  const digits = String(zip ?? "").replace(/\D/g, "");
  if (digits.length >= 5) return digits.slice(0, 5);
  // Spreadsheet exports drop leading zeros from New England zips
  if (digits.length >= 3) return digits.padStart(5, "0");
  return "";
}

function cleanCity(tokens: string[]) {
  const out = [...tokens];
  if (out.length > 1) {
    const expanded = CITY_PREFIXES.get(out[0]);
    if (expanded) out[0] = expanded;
  }
  return out.join(" ");
}

function isDesignatorAt(tokens: string[], i: number) {
  return UNIT_DESIGNATORS.has(tokens[i]) && i + 1 < tokens.length && UNIT_ID.test(tokens[i + 1]);
}

function formatUnit(designator: string, id: string) {
  const canonical = UNIT_DESIGNATORS.get(designator) ?? designator;
  return canonical === "#" ? `#${id}` : `${canonical} ${id}`;
}

function expandStreet(tokens: string[]): string[] {
  const last = tokens.length - 1;
  return tokens.map((t, i) => {
    // Only after the first token: "ST JOHNS AVE" keeps its leading ST
    if (i > 0) {
      const suffix = STREET_SUFFIXES.get(t);
      if (suffix) return suffix;
    }
    if (tokens.length > 1 && (i === 0 || i === last)) {
      const dir = DIRECTIONALS.get(t);
      if (dir) return dir;
    }
    return t;
  });
}

function sameRun(seq: string[], a: number, b: number, len: number) {
  for (let k = 0; k < len; k++) {
    if (seq[a + k] !== seq[b + k]) return false;
  }
  return true;
}

/**
 * Collapse parsing artifacts that repeat the street:
 * "123 MAIN STREET MAIN STREET", "123 MAIN STREET 123 MAIN STREET",
 * "123 MAIN STREET STREET" and "123 BISCAYNE BOULEVARD BISCAYNE".
 * `seq` is the house number followed by the expanded street tokens.
 */
export function collapseGhostTokens(seq: string[]): string[] {
  const out = [...seq];

  let changed = true;
  while (changed) {
    changed = false;

    for (let i = 1; i < out.length; i++) {
      if (out[i] === out[i - 1] && SUFFIX_WORDS.has(out[i])) {
        out.splice(i, 1);
        changed = true;
        break;
      }
    }
    if (changed) continue;

    outer: for (const start of [0, 1]) {
      for (let len = Math.floor((out.length - start) / 2); len >= 2; len--) {
        if (sameRun(out, start, start + len, len)) {
          out.splice(start + len, len);
          changed = true;
          break outer;
        }
      }
    }
  }

  // Street-name tokens echoed after the suffix
  let suffixAt = -1;
  for (let i = out.length - 1; i >= 2; i--) {
    if (SUFFIX_WORDS.has(out[i])) {
      suffixAt = i;
      break;
    }
  }
  if (suffixAt > 0) {
    const name = out.slice(1, suffixAt);
    let trailing = out.slice(suffixAt + 1);
    const lastTrailing = trailing[trailing.length - 1];
    const postDirectional = lastTrailing !== undefined && [...DIRECTIONALS.values()].includes(lastTrailing);
    if (postDirectional) trailing = trailing.slice(0, -1);
    if (trailing.length > 0 && trailing.length <= name.length && sameRun([...name, ...trailing], 0, name.length, trailing.length)) {
      out.splice(suffixAt + 1, trailing.length);
    }
  }

  return out;
}

type ParsedLine = {
  houseNumber: string;
  street: string[];
  units: string[];
  city: string[];
};

/**
 * Split a tokenized street line into house number, street name, unit and (when the
 * city is not known from another field) the trailing city tokens.
 */
function parseStreetLine(input: string[], needCity: boolean): ParsedLine | string {
  let tokens = [...input];
  const units: string[] = [];

  // Floating suite in front of the house number: "STE 400 123 MAIN ST"
  while (tokens.length >= 3 && isDesignatorAt(tokens, 0)) {
    units.push(formatUnit(tokens[0], tokens[1]));
    tokens = tokens.slice(2);
  }

  // Dangling designator without an identifier
  while (tokens.length > 0 && UNIT_DESIGNATORS.has(tokens[tokens.length - 1])) {
    tokens = tokens.slice(0, -1);
  }

  if (tokens.length === 0 || !HOUSE_NUMBER.test(tokens[0])) {
    return "missing house number";
  }

  const houseNumber = tokens[0];
  let street: string[] = [];
  let rest: string[] = [];

  let designatorAt = -1;
  for (let j = 2; j < tokens.length; j++) {
    if (isDesignatorAt(tokens, j)) {
      designatorAt = j;
      break;
    }
  }

  if (designatorAt > 0) {
    street = tokens.slice(1, designatorAt);
    units.push(formatUnit(tokens[designatorAt], tokens[designatorAt + 1]));
    rest = tokens.slice(designatorAt + 2);
    while (isDesignatorAt(rest, 0)) {
      units.push(formatUnit(rest[0], rest[1]));
      rest = rest.slice(2);
    }
  } else if (needCity) {
    // No unit to anchor on: the street ends at its last suffix, the rest is the city
    let suffixAt = -1;
    for (let i = tokens.length - 2; i >= 2; i--) {
      // "MAIN ST ST PETERSBURG": the second ST opens the city
      const opensCity =
        i > 2 && CITY_PREFIXES.has(tokens[i]) && SUFFIX_WORDS.has(tokens[i - 1]) && !SUFFIX_WORDS.has(tokens[i + 1]);
      if (SUFFIX_WORDS.has(tokens[i]) && !opensCity) {
        suffixAt = i;
        break;
      }
    }
    if (suffixAt < 0) return "cannot separate street from city";

    let end = suffixAt + 1;
    // Abbreviated post-directional only; "WEST PALM BEACH" stays a city
    if (end < tokens.length - 1 && DIRECTIONALS.has(tokens[end])) end++;
    street = tokens.slice(1, end);
    rest = tokens.slice(end);
  } else {
    street = tokens.slice(1);
  }

  if (street.length === 0) return "missing street name";

  let city: string[] = [];
  if (needCity) {
    city = rest;
    if (city.length === 0) return "missing city";
  } else if (rest.length > 0) {
    const expandedRest = expandStreet(rest);
    const expandedStreet = expandStreet(street);
    const echoesStreet = sameRun([...expandedStreet, ...expandedRest], 0, expandedStreet.length, expandedRest.length);
    if (!(expandedRest.length <= expandedStreet.length && echoesStreet)) {
      units.push(rest.join(" "));
    }
  }

  return { houseNumber, street, units, city };
}

function isUnitSegment(segment: string) {
  const tokens = tokenize(segment);
  return tokens.length >= 2 && isDesignatorAt(tokens, 0);
}

function reject(reason: Rejection["reason"], input: string, detail: string): NormalizeResult {
  return { ok: false, rejection: { reason, input, detail } };
}

function buildAddress(
  parsed: ParsedLine,
  cityTokens: string[],
  state: string,
  zip: string,
): NormalizedAddress {
  const seq = collapseGhostTokens([parsed.houseNumber, ...expandStreet(parsed.street)]);
  const street_clean = keyPart(seq.join(" "));
  const unit = keyPart(parsed.units.join(" "));
  const city_clean = keyPart(cleanCity(cityTokens));

  return {
    street_clean,
    unit,
    city_clean,
    state,
    zip,
    address_key: addressKey({ street_clean, unit, city_clean, state, zip }),
  };
}

function keyPart(part: string) {
  return normalizeWhitespace(part.toUpperCase().replace(/[^A-Z0-9# ]+/g, " "));
}

export function addressKey(a: Omit<NormalizedAddress, "address_key">): string {
  return [a.street_clean, a.unit, a.city_clean, a.state, a.zip].map(keyPart).join("|");
}

function normalizeOneLine(raw: string): NormalizeResult {
  const text = cleanText(raw, true);

  const withZip = text.match(STATE_ZIP_TAIL);
  const tail = withZip ?? text.match(STATE_TAIL);
  if (!tail || tail.index === undefined) return reject("unparsable", raw, "missing state");

  const state = tail[1];
  const zip = withZip ? withZip[2] : "";
  if (!KNOWN_STATES.has(state)) return reject("unparsable", raw, `unknown state '${state}'`);

  const segments = text
    .slice(0, tail.index)
    .split(",")
    .map((s) => normalizeWhitespace(s))
    .filter(Boolean);
  if (segments.length === 0) return reject("unparsable", raw, "missing street");

  let lineTokens: string[];
  let cityTokens: string[] = [];
  let needCity = true;

  if (segments.length > 1) {
    const [first, ...others] = segments;
    const unitSegments = others.filter(isUnitSegment);
    const plain = others.filter((s) => !isUnitSegment(s));
    if (plain.length > 0) {
      const citySegment = plain[plain.length - 1];
      cityTokens = tokenize(citySegment);
      needCity = false;
      lineTokens = tokenize([first, ...plain.slice(0, -1), ...unitSegments].join(" "));
    } else {
      // Only unit segments after the street: the city must sit on the street line
      lineTokens = tokenize([first, ...unitSegments].join(" "));
    }
  } else {
    lineTokens = tokenize(segments[0]);
  }

  const parsed = parseStreetLine(lineTokens, needCity);
  if (typeof parsed === "string") return reject("unparsable", raw, parsed);

  return { ok: true, address: buildAddress(parsed, needCity ? parsed.city : cityTokens, state, zip) };
}

function normalizeFields(input: RawAddressInput): NormalizeResult {
  const raw = [input.street, input.unit, input.city, input.state, input.zip]
    .map((p) => normalizeWhitespace(String(p ?? "")))
    .filter(Boolean)
    .join(", ");

  const cityTokens = tokenize(input.city ?? "");
  const state = cleanText(input.state ?? "").replace(/[^A-Z]/g, "");

  // Without a separate city and state the fields are really one line
  if (cityTokens.length === 0 || !state) return normalizeOneLine(raw);
  if (!KNOWN_STATES.has(state)) return reject("unparsable", raw, `unknown state '${state}'`);

  const streetTokens = tokenize(input.street);
  const unitTokens = tokenize(input.unit ?? "");
  const extraUnits: string[] = [];

  let lineTokens: string[];
  const streetHasNumber = streetTokens.length > 0 && HOUSE_NUMBER.test(streetTokens[0]);
  if (unitTokens.length > 0 && !streetHasNumber && HOUSE_NUMBER.test(unitTokens[0])) {
    // Lines swapped at the source: "STE 400" / "123 MAIN ST"
    lineTokens = [...unitTokens, ...streetTokens];
  } else if (unitTokens.length === 1 && UNIT_ID.test(unitTokens[0])) {
    extraUnits.push(`#${unitTokens[0]}`);
    lineTokens = streetTokens;
  } else {
    lineTokens = [...streetTokens, ...unitTokens];
  }

  const parsed = parseStreetLine(lineTokens, false);
  if (typeof parsed === "string") return reject("unparsable", raw, parsed);
  parsed.units.push(...extraUnits);

  return { ok: true, address: buildAddress(parsed, cityTokens, state, cleanZip(input.zip)) };
}

/**
 * Canonicalize a raw address into a deduplication-safe `NormalizedAddress`.
 *
 * PO boxes are rejected before any parsing. Addresses without a house number,
 * street name, city or a known state are rejected as `unparsable`.
 */
export function normalizeAddress(input: RawAddressInput | string): NormalizeResult {
  const fields = typeof input === "string" ? [input] : [input.street, input.unit, input.city];
  const joined = fields.map((f) => String(f ?? "")).join(" ").toUpperCase();
  const rawText = typeof input === "string" ? input : normalizeWhitespace(fields.filter(Boolean).join(", "));

  if (PO_BOX_PATTERN.test(joined)) {
    return reject("po_box", rawText, "PO box is not a physical location");
  }

  return typeof input === "string" ? normalizeOneLine(input) : normalizeFields(input);
}

/** Street line with the unit appended, as stored on aggregates. */
export function addressClean(a: Pick<NormalizedAddress, "street_clean" | "unit">) {
  return a.unit ? `${a.street_clean} ${a.unit}` : a.street_clean;
}
