import { UnsupportedSyntaxError } from "@kubeql/shared";
import type { SelectItem, SqlStatement, TableRef } from "../sql/ast.js";

// Each rejected shape gets its own feature name so callers can say exactly
// what to remove from the query.

export function checkStatement(
  statement: SqlStatement,
): UnsupportedSyntaxError | null {
  switch (statement.type) {
    case "select":
      return null;
    case "setOperation":
      return new UnsupportedSyntaxError(
        `set operation ${statement.operator}`,
      );
    case "other":
      return new UnsupportedSyntaxError(
        `${statement.statementKind} statement (only SELECT queries are accepted)`,
      );
  }
}

export function checkSelectItem(item: SelectItem): UnsupportedSyntaxError | null {
  switch (item.type) {
    case "expr":
      return null;
    case "aliasedExpr":
      return new UnsupportedSyntaxError("aliased projection");
    case "wildcard":
      return new UnsupportedSyntaxError("wildcard projection");
    case "qualifiedWildcard":
      return new UnsupportedSyntaxError("qualified wildcard projection");
  }
}

export function checkTableRef(ref: TableRef): UnsupportedSyntaxError | null {
  if (ref.joins.length > 0) {
    return new UnsupportedSyntaxError("join");
  }

  switch (ref.factor.type) {
    case "table":
      break;
    case "derived":
      return new UnsupportedSyntaxError("derived table");
    case "tableFunction":
      return new UnsupportedSyntaxError("table function");
    case "nestedJoin":
      return new UnsupportedSyntaxError("nested join");
    case "unnest":
      return new UnsupportedSyntaxError("UNNEST");
  }

  if (ref.alias !== null) {
    return new UnsupportedSyntaxError("table alias");
  }
  if (ref.args !== null && ref.args.length > 0) {
    return new UnsupportedSyntaxError("table arguments");
  }
  if (ref.hints.length > 0) {
    return new UnsupportedSyntaxError("table hints");
  }
  return null;
}
