import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import type { Server } from "http";
import { createApp } from "../server/app";
import { ankleBoots, sequinDress, slipDress, velvetDress, winterParka } from "./fixtures/catalog";

let httpServer: Server;
let baseUrl: string;

beforeAll(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});

  ({ httpServer } = await createApp([velvetDress, winterParka, slipDress, ankleBoots, sequinDress]));
  await new Promise<void>(resolve => httpServer.listen(0, "127.0.0.1", resolve));
  const address = httpServer.address();
  if (address === null || typeof address === "string") {
    throw new Error("Test server is not listening on a TCP port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => httpServer.close(err => (err ? reject(err) : resolve())));
  vi.restoreAllMocks();
});

async function postSearch(body: unknown) {
  return fetch(`${baseUrl}/api/shop/search`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("POST /api/shop/search", () => {
  it("ranks, filters by the parsed constraints and presents results", async () => {
    const res = await postSearch({ query: "winter wedding guest dress under $150", limit: 8 });
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.success).toBe(true);
    expect(body.unfilteredCount).toBe(5);
    expect(body.count).toBe(2);
    expect(body.constraints).toEqual({ budgetMax: 150, categories: ["dress"] });
    expect(body.results.map((r: { title: string }) => r.title)).toEqual(["Velvet Midi Dress", "Satin Slip Dress"]);
    expect(body.results[0]).toEqual({
      title: "Velvet Midi Dress",
      brand: "Maison",
      price: "$138.00",
      category: "dress",
      rating: "4.6",
      numReviews: 212,
      description: "Evening dress for winter weddings",
      matchedTerms: ["dress", "guest", "wedding", "winter"],
      score: 4.5,
    });
    expect(body.results[1].price).toBe("$89.50");
  });

  it("applies the limit before constraint filtering", async () => {
    const res = await postSearch({ query: "winter wedding guest dress under $150", limit: 1 });
    const body = await res.json();

    expect(body.unfilteredCount).toBe(1);
    expect(body.results.map((r: { title: string }) => r.title)).toEqual(["Velvet Midi Dress"]);
  });

  it("returns an empty list for a query without tokens", async () => {
    const res = await postSearch({ query: "" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      query: "",
      count: 0,
      unfilteredCount: 0,
      constraints: {},
      results: [],
    });
  });

  it("rejects a request without a query", async () => {
    const res = await postSearch({ limit: 5 });
    expect(res.status).toBe(400);

    const body = await res.json();
    expect(body.success).toBe(false);
    expect(body.error).toBe("Invalid search request");
    expect(body.details).toContain("query");
  });

  it("rejects an out-of-range limit", async () => {
    const res = await postSearch({ query: "dress", limit: 0 });
    expect(res.status).toBe(400);
  });

  it("answers malformed JSON with 400", async () => {
    const res = await fetch(`${baseUrl}/api/shop/search`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{ not json",
    });
    expect(res.status).toBe(400);
  });
});

describe("GET /api/shop/constraints", () => {
  it("returns the parsed constraints", async () => {
    const res = await fetch(`${baseUrl}/api/shop/constraints?query=${encodeURIComponent("navy coat 80 max")}`);
    expect(await res.json()).toEqual({
      success: true,
      query: "navy coat 80 max",
      constraints: { budgetMax: 80, colors: ["navy"], categories: ["outerwear"] },
    });
  });
});

describe("GET /healthz", () => {
  it("reports the catalog size", async () => {
    const res = await fetch(`${baseUrl}/healthz`);
    const body = await res.json();

    expect(body.status).toBe("healthy");
    expect(body.catalogSize).toBe(5);
  });
});
