import {
  createLogger,
  err,
  ok,
  MissingClauseError,
  UnsupportedSyntaxError,
} from "@kubeql/shared";
import type {
  Clause,
  QueryPlan,
  Result,
  TranslationError,
} from "@kubeql/shared";
import type { Expr, SqlStatement } from "../sql/ast.js";
import { unescapeHyphens } from "../sql/escape.js";
import { checkSelectItem, checkStatement, checkTableRef } from "./guard.js";
import { ExpressionPlanner } from "./planner.js";

type ExtractResult<T> = Result<T, TranslationError>;

function renderName(expr: Expr): string | null {
  switch (expr.type) {
    case "identifier":
      return expr.name;
    case "compoundIdentifier":
      return expr.segments.join(".");
    case "literal":
      return expr.literalKind === "singleQuotedString" ||
        expr.literalKind === "doubleQuotedString"
        ? expr.value
        : null;
    default:
      return null;
  }
}

/**
 * Splits a SELECT statement into its three clause groups: projections name
 * namespaces, tables name contexts, and the WHERE tree folds into field
 * selector clauses.
 */
export class ClauseExtractor {
  private logger = createLogger("clause-extractor");
  private planner = new ExpressionPlanner();

  extract(statement: SqlStatement): ExtractResult<QueryPlan> {
    const unsupported = checkStatement(statement);
    if (unsupported) return err(unsupported);
    if (statement.type !== "select") {
      return err(new UnsupportedSyntaxError(`${statement.type} statement`));
    }

    // SELECT ...
    if (statement.projection.length === 0) {
      return err(new MissingClauseError("projection"));
    }
    const namespaces: string[] = [];
    for (const item of statement.projection) {
      const rejected = checkSelectItem(item);
      if (rejected) return err(rejected);
      if (item.type !== "expr") continue;

      const name = renderName(item.expr);
      if (name === null) {
        return err(
          new UnsupportedSyntaxError(`${item.expr.type} in SELECT list`),
        );
      }
      namespaces.push(unescapeHyphens(name));
    }

    // FROM ...
    if (statement.from.length === 0) {
      return err(new MissingClauseError("from"));
    }
    const contexts: string[] = [];
    for (const ref of statement.from) {
      const rejected = checkTableRef(ref);
      if (rejected) return err(rejected);
      if (ref.factor.type === "table") {
        contexts.push(unescapeHyphens(ref.factor.name));
      }
    }

    // WHERE
    if (statement.where === null) {
      return err(new MissingClauseError("where"));
    }
    const clauses = this.extractClauses(statement.where);
    if (!clauses.ok) return clauses;

    this.logger.debug(
      `Plan: ${namespaces.length} namespaces, ${contexts.length} contexts, ${clauses.value.length} clauses`,
    );
    return ok(
      Object.freeze({
        namespaces: Object.freeze(namespaces),
        contexts: Object.freeze(contexts),
        clauses: Object.freeze(clauses.value.map((c) => Object.freeze(c))),
      }),
    );
  }

  private extractClauses(where: Expr): ExtractResult<Clause[]> {
    const folded = this.planner.fold(where);
    if (!folded.ok) return folded;

    const value = folded.value;
    switch (value.kind) {
      case "clause":
        return ok([value.clause]);
      case "clauseChain":
        return ok(value.clauses);
      default:
        return err(
          new UnsupportedSyntaxError(
            `WHERE must compare resource fields with literals, got a ${value.kind}`,
          ),
        );
    }
  }
}

export function extractPlan(statement: SqlStatement): ExtractResult<QueryPlan> {
  return new ClauseExtractor().extract(statement);
}
