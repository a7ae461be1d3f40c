import { describe, it, expect } from "vitest";
import type { SearchableItem } from "@shared/schema";
import { searchCatalog, searchableTokens } from "../server/search/ranking";
import { tokenize } from "../server/search/tokenizer";
import { ankleBoots, slipDress, testCatalog, velvetDress, winterParka } from "./fixtures/catalog";

describe("searchCatalog", () => {
  it("scores matches with a title boost and orders by score", () => {
    const results = searchCatalog("winter wedding guest dress", testCatalog);

    expect(results.map(r => r.item.title)).toEqual([
      "Velvet Midi Dress",
      "Satin Slip Dress",
      "Winter Parka",
      "Leather Boots",
    ]);
    expect(results.map(r => r.score)).toEqual([4.5, 3.5, 1.5, 1]);
    expect(results[0].matchedTerms).toEqual(["dress", "guest", "wedding", "winter"]);
  });

  it("returns the catalog objects themselves", () => {
    const results = searchCatalog("winter wedding guest dress", testCatalog);

    expect(results[0].item).toBe(velvetDress);
    expect(results[1].item).toBe(slipDress);
    expect(results[2].item).toBe(winterParka);
    expect(results[3].item).toBe(ankleBoots);
  });

  it("returns nothing for a query without tokens", () => {
    expect(searchCatalog("", testCatalog)).toEqual([]);
    expect(searchCatalog("?! --", testCatalog)).toEqual([]);
  });

  it("excludes items without any matching token", () => {
    const results = searchCatalog("parka", testCatalog);
    expect(results).toHaveLength(1);
    expect(results[0].item).toBe(winterParka);
  });

  it("counts a repeated query token once", () => {
    const results = searchCatalog("parka parka PARKA", testCatalog);
    expect(results[0].score).toBe(1.5);
    expect(results[0].matchedTerms).toEqual(["parka"]);
  });

  it("caps the result count at topK", () => {
    expect(searchCatalog("winter wedding guest dress", testCatalog, 2).map(r => r.item)).toEqual([
      velvetDress,
      slipDress,
    ]);
    expect(searchCatalog("winter wedding guest dress", testCatalog, 100)).toHaveLength(4);
  });

  it("returns nothing when topK is zero or negative", () => {
    expect(searchCatalog("dress", testCatalog, 0)).toEqual([]);
    expect(searchCatalog("dress", testCatalog, -3)).toEqual([]);
  });

  it("breaks score ties by rating, then by price with unpriced items last", () => {
    const lowRating: SearchableItem = { title: "Scarf", rating: 4.0, price_usd: 50 };
    const pricey: SearchableItem = { title: "Scarf", rating: 4.5, price_usd: 80 };
    const cheap: SearchableItem = { title: "Scarf", rating: 4.5, price_usd: 40 };
    const unpriced: SearchableItem = { title: "Scarf", rating: 4.5 };
    const unrated: SearchableItem = { title: "Scarf", price_usd: 10 };

    const results = searchCatalog("scarf", [lowRating, pricey, cheap, unpriced, unrated]);

    expect(results.map(r => r.item)).toEqual([cheap, pricey, unpriced, lowRating, unrated]);
    expect(results[0].item).toBe(cheap);
    expect(results[4].item).toBe(unrated);
  });

  it("tolerates records missing optional fields", () => {
    const bare: SearchableItem = { title: "Plain Tee" };
    const results = searchCatalog("tee", [bare]);

    expect(results).toEqual([{ item: bare, score: 1.5, matchedTerms: ["tee"] }]);
  });

  it("matches tokens from style tags and colors", () => {
    expect(searchableTokens(velvetDress)).toEqual(
      new Set([
        "velvet", "midi", "dress", "evening", "for", "winter", "weddings",
        "maison", "formal", "wedding", "guest", "burgundy",
      ]),
    );
    expect(searchCatalog("burgundy", testCatalog).map(r => r.item)).toEqual([velvetDress]);
  });

  it("only reports matched terms that appear in the query", () => {
    const queries = ["winter dress", "Evening slip!", "navy parka under $150", "boots brown leather"];

    for (const query of queries) {
      const queryTokens = new Set(tokenize(query));
      const results = searchCatalog(query, testCatalog);

      for (const result of results) {
        expect(result.matchedTerms.length).toBeGreaterThan(0);
        for (const term of result.matchedTerms) {
          expect(queryTokens.has(term)).toBe(true);
          expect(searchableTokens(result.item).has(term)).toBe(true);
        }
      }
    }
  });
});
