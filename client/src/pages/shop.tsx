import { useState, type FormEvent } from "react";
import { useMutation } from "@tanstack/react-query";
import { Search, Loader2 } from "lucide-react";
import type { ShopSearchRequest, ShopSearchResponse } from "@shared/schema";
import { apiRequest } from "@/lib/queryClient";
import { ResultCard } from "@/components/ResultCard";
import { ConstraintChips } from "@/components/ConstraintChips";

export const DEFAULT_QUERY = "winter wedding guest dress under $150";
const MIN_RESULTS = 3;
const MAX_RESULTS = 12;
const DEFAULT_RESULTS = 8;

async function searchShop(body: ShopSearchRequest): Promise<ShopSearchResponse> {
  const res = await apiRequest("POST", "/api/shop/search", body);
  const data: ShopSearchResponse = await res.json();
  return data;
}

export default function ShopSearch() {
  const [query, setQuery] = useState(DEFAULT_QUERY);
  const [topK, setTopK] = useState(DEFAULT_RESULTS);

  const search = useMutation({ mutationFn: searchShop });

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    search.mutate({ query, limit: topK });
  };

  const data = search.data;

  return (
    <div className="page">
      <h1>Shopping Assistant (Fashion)</h1>

      <form onSubmit={handleSubmit} className="search-form">
        <label htmlFor="query">What are you shopping for?</label>
        <input
          id="query"
          type="text"
          value={query}
          onChange={(e) => setQuery(e.target.value)}
          data-testid="input-search"
        />

        <label htmlFor="top-k">Number of results: {topK}</label>
        <input
          id="top-k"
          type="range"
          min={MIN_RESULTS}
          max={MAX_RESULTS}
          value={topK}
          onChange={(e) => setTopK(Number(e.target.value))}
          data-testid="input-top-k"
        />

        <button type="submit" disabled={search.isPending} data-testid="button-search">
          {search.isPending ? <Loader2 className="icon spin" /> : <Search className="icon" />}
          Search catalog
        </button>
      </form>

      {search.error && (
        <div className="notice error" data-testid="text-error">
          {search.error.message}
        </div>
      )}

      {data && (
        <>
          <ConstraintChips constraints={data.constraints} />
          {data.results.length === 0 ? (
            <div className="notice warning" data-testid="text-no-results">
              No matches found.
            </div>
          ) : (
            <section>
              <h2>Results</h2>
              {data.results.map((result, index) => (
                <ResultCard key={`${result.title}-${index}`} result={result} index={index} />
              ))}
            </section>
          )}
        </>
      )}
    </div>
  );
}
