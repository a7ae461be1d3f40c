import type { ResultView } from "@shared/schema";

export function ResultCard({ result, index }: { result: ResultView; index: number }) {
  return (
    <div className="card" data-testid={`card-result-${index}`}>
      <p>
        <strong data-testid={`text-result-title-${index}`}>{result.title}</strong>
        <br />
        <em>{result.brand}</em> — <strong data-testid={`text-result-price-${index}`}>{result.price}</strong>
      </p>
      <p className="caption" data-testid={`text-result-meta-${index}`}>
        Category: {result.category} • Rating: {result.rating} ({result.numReviews} reviews)
      </p>
      <p>{result.description}</p>
      <p className="caption" data-testid={`text-result-terms-${index}`}>
        Matched terms: {result.matchedTerms.join(", ")}
      </p>
    </div>
  );
}
