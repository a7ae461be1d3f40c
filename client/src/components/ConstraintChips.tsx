import type { Constraints } from "@shared/schema";

export function ConstraintChips({ constraints }: { constraints: Constraints }) {
  const chips: string[] = [];
  if (constraints.budgetMax !== undefined) chips.push(`Under $${constraints.budgetMax}`);
  for (const category of constraints.categories ?? []) chips.push(category);
  for (const color of constraints.colors ?? []) chips.push(color);

  if (chips.length === 0) return null;

  return (
    <div className="chips" data-testid="list-constraints">
      {chips.map((chip, i) => (
        <span key={`${i}-${chip}`} className="chip">{chip}</span>
      ))}
    </div>
  );
}
