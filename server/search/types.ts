import type { Constraints, ResultView } from '@shared/schema';

export interface SearchOutcome {
  query: string;
  constraints: Constraints;
  unfilteredCount: number;
  results: ResultView[];
}
