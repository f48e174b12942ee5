import { describe, expect, it } from "vitest";
import { mergeStateRows } from "./merge";

describe("mergeStateRows", () => {
  it("combines states, zero-fills absent counts and sorts by state then key", () => {
    const { rows, duplicates } = mergeStateRows([
      {
        state: "TX",
        rows: [{ address_key: "9 ELM STREET||AUSTIN|TX|78701", state: "TX", total_licenses: "1", count_barber: "1" }],
      },
      {
        state: "FL",
        rows: [
          { address_key: "2 OAK ROAD||MIAMI|FL|33101", total_licenses: "3", count_salon: "3", lat: "25.7", lon: "-80.2" },
          { address_key: "1 OAK ROAD||MIAMI|FL|33101", total_licenses: "1", count_school: "1" },
        ],
      },
    ]);

    expect(duplicates).toEqual([]);
    expect(rows.map((r) => r.address_key)).toEqual([
      "1 OAK ROAD||MIAMI|FL|33101",
      "2 OAK ROAD||MIAMI|FL|33101",
      "9 ELM STREET||AUSTIN|TX|78701",
    ]);
    expect(rows[1]).toMatchObject({
      state: "FL",
      count_barber: "0",
      count_salon: "3",
      count_school: "0",
      lat: "25.7",
      geocode_status: "",
    });
    expect(rows[2].count_barber).toBe("1");
  });

  it("keeps the first row for a repeated key", () => {
    const row = { address_key: "K", total_licenses: "1" };
    const { rows, duplicates } = mergeStateRows([
      { state: "FL", rows: [row] },
      { state: "FL", rows: [{ ...row, total_licenses: "5" }] },
    ]);
    expect(rows).toHaveLength(1);
    expect(rows[0].total_licenses).toBe("1");
    expect(duplicates).toEqual(["K"]);
  });
});
