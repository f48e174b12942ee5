import { afterEach, describe, expect, it, vi } from "vitest";
import { PermanentProviderError, TransientProviderError } from "../retry";
import type { GeocodeRequest } from "../types";
import { CensusBatchProvider, buildCensusBatchCsv, parseCensusBatchResponse } from "./census";

const requests: GeocodeRequest[] = [
  { address_key: "K0", street: "123 MAIN STREET", city: "MIAMI", state: "FL", zip: "33101" },
  { address_key: "K1", street: "9 NOWHERE LANE", city: "MIAMI", state: "FL", zip: "33101" },
];

const RESPONSE = [
  `"1","9 NOWHERE LANE, MIAMI, FL, 33101","No_Match"`,
  `"0","123 MAIN STREET, MIAMI, FL, 33101","Match","Exact","123 MAIN ST, MIAMI, FL, 33101","-80.19,25.77","123456","L"`,
  `"7","STRAY ROW","Match","Exact","X","-80.0,25.0","1","L"`,
].join("\n");

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("buildCensusBatchCsv", () => {
  it("writes id,street,city,state,zip rows without a header", () => {
    expect(buildCensusBatchCsv(requests)).toBe("0,123 MAIN STREET,MIAMI,FL,33101\n1,9 NOWHERE LANE,MIAMI,FL,33101\n");
  });
});

describe("parseCensusBatchResponse", () => {
  it("maps rows back to address keys by id", () => {
    const outcomes = parseCensusBatchResponse(RESPONSE, requests);

    expect(outcomes.get("K0")).toEqual({ kind: "match", latitude: 25.77, longitude: -80.19 });
    expect(outcomes.get("K1")).toEqual({ kind: "not_found" });
    expect(outcomes.size).toBe(2);
  });

  it("treats a tie as not found", () => {
    const outcomes = parseCensusBatchResponse(`"0","123 MAIN STREET, MIAMI, FL, 33101","Tie"`, requests);
    expect(outcomes.get("K0")).toEqual({ kind: "not_found" });
  });
});

describe("CensusBatchProvider", () => {
  const provider = new CensusBatchProvider({ timeoutMs: 1000, endpoint: "https://census.test/addressbatch" });

  it("uploads the batch as one multipart request", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(RESPONSE));
    vi.stubGlobal("fetch", fetchMock);

    const res = await provider.geocodeBatch(requests);

    expect(res.requests).toBe(1);
    expect(res.outcomes.get("K0")).toEqual({ kind: "match", latitude: 25.77, longitude: -80.19 });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://census.test/addressbatch");
    expect(init?.method).toBe("POST");
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) expect(body.get("benchmark")).toBe("Public_AR_Current");
  });

  it("marks ids missing from the response as transient errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(`"0","123 MAIN STREET, MIAMI, FL, 33101","No_Match"`)),
    );

    const res = await provider.geocodeBatch(requests);

    expect(res.outcomes.get("K0")).toEqual({ kind: "not_found" });
    expect(res.outcomes.get("K1")).toEqual({ kind: "error", transient: true, message: "missing from census response" });
  });

  it("throws by status class", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("busy", { status: 503, statusText: "Service Unavailable" })));
    await expect(provider.geocodeBatch(requests)).rejects.toBeInstanceOf(TransientProviderError);

    vi.stubGlobal("fetch", vi.fn(async () => new Response("bad", { status: 400, statusText: "Bad Request" })));
    await expect(provider.geocodeBatch(requests)).rejects.toBeInstanceOf(PermanentProviderError);
  });

  it("treats a network failure as transient", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );
    await expect(provider.geocodeBatch(requests)).rejects.toThrow("census request failed (TypeError: fetch failed)");
  });
});
