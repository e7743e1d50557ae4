// Operators joining a clause to the previous clause of its chain
export type LogicalOperator = "AND" | "OR";

// Comparison operators as the SQL grammar reports them. The planner keeps
// whatever the expression carried; the selector renderer decides what a
// cluster backend can express.
export type Comparator =
  | "="
  | "=="
  | "!="
  | "<>"
  | "<"
  | "<="
  | ">"
  | ">="
  | "LIKE"
  | "NOT LIKE";

export const COMPARATORS: readonly Comparator[] = [
  "=",
  "==",
  "!=",
  "<>",
  "<",
  "<=",
  ">",
  ">=",
  "LIKE",
  "NOT LIKE",
];

export interface Clause {
  /** `null` iff this clause heads its chain. */
  chainOp: LogicalOperator | null;
  resourceKind: string;
  fieldPath1: string;
  fieldPath2: string;
  comparator: Comparator;
  literal: string;
}

// Intermediate results of folding a WHERE tree
export type Value =
  | { kind: "stringList"; segments: string[] }
  | { kind: "stringScalar"; value: string }
  | { kind: "clause"; clause: Clause }
  | { kind: "clauseChain"; clauses: Clause[] };

export type ValueKind = Value["kind"];

export interface QueryPlan {
  readonly namespaces: readonly string[];
  readonly contexts: readonly string[];
  readonly clauses: readonly Readonly<Clause>[];
}
