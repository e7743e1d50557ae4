/**
 * Statement shapes the translator consumes. The SQL grammar library's output
 * is adapted into these in `parser.ts`, so everything downstream is independent
 * of that library's node layout.
 */

export type LiteralKind =
  | "singleQuotedString"
  | "doubleQuotedString"
  | "number"
  | "boolean"
  | "null";

export type Expr =
  | { type: "compoundIdentifier"; segments: string[] }
  | { type: "identifier"; name: string }
  | { type: "binaryOp"; left: Expr; operator: string; right: Expr }
  | { type: "literal"; literalKind: LiteralKind; value: string }
  | { type: "other"; nodeKind: string };

export type SelectItem =
  | { type: "expr"; expr: Expr }
  | { type: "aliasedExpr"; expr: Expr; alias: string }
  | { type: "wildcard" }
  | { type: "qualifiedWildcard"; qualifier: string };

export type TableFactor =
  | { type: "table"; name: string }
  | { type: "derived" }
  | { type: "tableFunction"; name: string }
  | { type: "nestedJoin" }
  | { type: "unnest" };

export interface TableRef {
  factor: TableFactor;
  alias: string | null;
  args: Expr[] | null;
  hints: string[];
  joins: string[];
}

export interface SelectStatement {
  type: "select";
  projection: SelectItem[];
  from: TableRef[];
  where: Expr | null;
}

export type SqlStatement =
  | SelectStatement
  | { type: "setOperation"; operator: string }
  | { type: "other"; statementKind: string };

export function compoundIdentifier(...segments: string[]): Expr {
  return { type: "compoundIdentifier", segments };
}

export function stringLiteral(value: string): Expr {
  return { type: "literal", literalKind: "singleQuotedString", value };
}

export function binaryOp(left: Expr, operator: string, right: Expr): Expr {
  return { type: "binaryOp", left, operator, right };
}

export function plainTable(name: string): TableRef {
  return {
    factor: { type: "table", name },
    alias: null,
    args: null,
    hints: [],
    joins: [],
  };
}
