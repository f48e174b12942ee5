import { promises as fs } from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { mergeStateRows } from "../src/lib/merge";
import type { CsvRow, StateRows } from "../src/lib/merge";
import { OUTPUT_COLUMNS } from "../src/lib/sink";
import { withErrorHandling } from "../src/lib/validation";

const OUTPUT_DIR = "output";
const OUTPUT_MERGED = path.join(OUTPUT_DIR, "locations_usa.csv");
const STATE_FILE = /^locations_([A-Z]{2})\.csv$/;

function toCsvRow(v: unknown): CsvRow | null {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return null;
  const row: CsvRow = {};
  for (const [k, value] of Object.entries(v)) {
    if (typeof value === "string") row[k] = value;
  }
  return row;
}

// States from the command line, else every locations_<STATE>.csv in output/
async function resolveStates(argv: string[]): Promise<string[]> {
  if (argv.length > 0) return argv.map((s) => s.toUpperCase());
  const files = await fs.readdir(OUTPUT_DIR);
  return files
    .map((f) => STATE_FILE.exec(f)?.[1])
    .filter((s): s is string => s !== undefined)
    .sort();
}

async function loadStates(states: string[]): Promise<StateRows[]> {
  const sets: StateRows[] = [];

  for (const state of states) {
    const p = path.join(OUTPUT_DIR, `locations_${state}.csv`);
    try {
      const csvText = await fs.readFile(p, "utf8");
      const parsed: unknown = parse(csvText, { columns: true, skip_empty_lines: true, trim: true });
      const rows = Array.isArray(parsed) ? parsed.map(toCsvRow).filter((r): r is CsvRow => r !== null) : [];
      console.log(`📄 Loaded ${rows.length} locations from ${state}`);
      sets.push({ state, rows });
    } catch (error) {
      console.warn(`⚠️  Could not load ${p}:`, error instanceof Error ? error.message : error);
    }
  }

  return sets;
}

async function main() {
  const result = await withErrorHandling(async () => {
    const states = await resolveStates(process.argv.slice(2));
    if (states.length === 0) throw new Error(`No locations_<STATE>.csv files in ${OUTPUT_DIR}/`);
    console.log(`🔗 Merging states: ${states.join(", ")}`);

    const sets = await loadStates(states);
    const { rows, duplicates } = mergeStateRows(sets);
    if (rows.length === 0) throw new Error("No location files found or all were empty");

    if (duplicates.length > 0) {
      console.warn(`⚠️  ${duplicates.length} address keys appeared in more than one file; the first was kept`);
    }

    await fs.writeFile(OUTPUT_MERGED, stringify(rows, { header: true, columns: [...OUTPUT_COLUMNS] }), "utf8");

    console.log(`✅ Merged ${rows.length} locations from ${sets.length} states`);
    console.log(`📄 Output: ${OUTPUT_MERGED}`);

    return { totalLocations: rows.length, statesMerged: sets.length, duplicates: duplicates.length };
  }, "State merge");

  if (!result.success) {
    console.error("❌ State merge failed:", result.errors);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("❌ merge_states failed:", err);
  process.exit(1);
});
