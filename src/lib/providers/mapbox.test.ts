import { afterEach, describe, expect, it, vi } from "vitest";
import { PermanentProviderError } from "../retry";
import type { GeocodeRequest } from "../types";
import { MapboxProvider } from "./mapbox";

const request: GeocodeRequest = {
  address_key: "123 MAIN STREET|SUITE 400|MIAMI|FL|33101",
  street: "123 MAIN STREET",
  city: "MIAMI",
  state: "FL",
  zip: "33101",
};

const provider = new MapboxProvider({ accessToken: "test-token", timeoutMs: 1000, endpoint: "https://mapbox.test/places" });

function json(data: unknown, init?: ResponseInit) {
  return new Response(JSON.stringify(data), init);
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("MapboxProvider", () => {
  it("requests one address at a time and reads center as lon,lat", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      json({ features: [{ center: [-80.19, 25.77] }] }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const res = await provider.geocodeBatch([request, { ...request, address_key: "other" }]);

    expect(res.requests).toBe(2);
    expect(res.outcomes.get(request.address_key)).toEqual({ kind: "match", latitude: 25.77, longitude: -80.19 });
    expect(fetchMock).toHaveBeenCalledTimes(2);

    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.origin + url.pathname).toBe(
      `https://mapbox.test/places/${encodeURIComponent("123 MAIN STREET, MIAMI, FL 33101")}.json`,
    );
    expect(url.searchParams.get("access_token")).toBe("test-token");
    expect(url.searchParams.get("country")).toBe("us");
    expect(url.searchParams.get("limit")).toBe("1");
  });

  it("returns not_found when there are no features", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => json({ features: [] })));
    const res = await provider.geocodeBatch([request]);
    expect(res.outcomes.get(request.address_key)).toEqual({ kind: "not_found" });
  });

  it("reports rate limiting and network failures as transient", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => json({ message: "slow down" }, { status: 429 })));
    expect((await provider.geocodeBatch([request])).outcomes.get(request.address_key)).toEqual({
      kind: "error",
      transient: true,
      message: "mapbox responded 429",
    });

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );
    expect((await provider.geocodeBatch([request])).outcomes.get(request.address_key)).toEqual({
      kind: "error",
      transient: true,
      message: "mapbox request failed (TypeError: fetch failed)",
    });
  });

  it("treats other client errors as not found", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => json({ message: "bad query" }, { status: 422 })));
    expect((await provider.geocodeBatch([request])).outcomes.get(request.address_key)).toEqual({ kind: "not_found" });
  });

  it("throws on a rejected token", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => json({ message: "Not Authorized" }, { status: 401 })));
    await expect(provider.geocodeBatch([request])).rejects.toBeInstanceOf(PermanentProviderError);
  });
});
