import { err, ok, UnsupportedSyntaxError } from "@kubeql/shared";
import type { Clause, Comparator, Result } from "@kubeql/shared";

export const RESOURCE_KINDS = ["pod", "deployment", "service"] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export function toResourceKind(name: string): ResourceKind | null {
  const lower = name.toLowerCase();
  return RESOURCE_KINDS.find((kind) => kind === lower) ?? null;
}

/**
 * Resource kinds named by the clauses, in display order (pod, deployment,
 * service). An unknown kind is an error rather than an empty row.
 */
export function resourceKinds(
  clauses: readonly Clause[],
): Result<ResourceKind[], UnsupportedSyntaxError> {
  const seen = new Set<ResourceKind>();
  for (const clause of clauses) {
    const kind = toResourceKind(clause.resourceKind);
    if (kind === null) {
      return err(
        new UnsupportedSyntaxError(
          `resource kind "${clause.resourceKind}" (expected one of ${RESOURCE_KINDS.join(", ")})`,
        ),
      );
    }
    seen.add(kind);
  }
  return ok(RESOURCE_KINDS.filter((kind) => seen.has(kind)));
}

export function clausesForKind(
  clauses: readonly Clause[],
  kind: ResourceKind,
): Clause[] {
  return clauses.filter((clause) => toResourceKind(clause.resourceKind) === kind);
}

const SELECTOR_OPERATORS: Partial<Record<Comparator, string>> = {
  "=": "=",
  "==": "==",
  "!=": "!=",
  "<>": "!=",
};

export function renderTerm(
  clause: Clause,
): Result<string, UnsupportedSyntaxError> {
  const operator = SELECTOR_OPERATORS[clause.comparator];
  if (operator === undefined) {
    return err(
      new UnsupportedSyntaxError(
        `comparator ${clause.comparator} in a field selector (use =, == or !=)`,
      ),
    );
  }
  return ok(`${clause.fieldPath1}.${clause.fieldPath2}${operator}${clause.literal}`);
}

/**
 * Renders one kind's clauses as Kubernetes field selectors. Terms of a
 * selector are ANDed by the API server, so every OR starts a new selector and
 * the caller unions the results.
 */
export function toFieldSelectors(
  clauses: readonly Clause[],
): Result<string[], UnsupportedSyntaxError> {
  const groups: string[][] = [];
  let current: string[] = [];

  for (const clause of clauses) {
    const term = renderTerm(clause);
    if (!term.ok) return term;
    if (clause.chainOp === "OR" && current.length > 0) {
      groups.push(current);
      current = [];
    }
    current.push(term.value);
  }
  if (current.length > 0) groups.push(current);

  return ok(groups.map((terms) => terms.join(",")));
}
