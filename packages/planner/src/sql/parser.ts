import pkg from "node-sql-parser";
import {
  createLogger,
  DEFAULT_DIALECT,
  err,
  ok,
  MissingClauseError,
  SqlSyntaxError,
  UnsupportedSyntaxError,
} from "@kubeql/shared";
import type { Result, SqlDialect, TranslationError } from "@kubeql/shared";
import type {
  Expr,
  LiteralKind,
  SelectItem,
  SqlStatement,
  TableFactor,
  TableRef,
} from "./ast.js";
import { escapeHyphens } from "./escape.js";

const { Parser } = pkg;

export interface ParseOptions {
  dialect?: SqlDialect;
}

type Node = Record<string, unknown>;

const logger = createLogger("sql-parser");
const parser = new Parser();

function isNode(value: unknown): value is Node {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Identifiers arrive either as plain strings or, depending on dialect and
// library version, wrapped as `{ expr: { type: "default", value } }`.
function identText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (!isNode(value)) return null;
  if (typeof value.value === "string") return value.value;
  if ("expr" in value) return identText(value.expr);
  return null;
}

function nodeKind(node: unknown): string {
  if (isNode(node) && typeof node.type === "string") return node.type;
  return typeof node;
}

const LITERAL_KINDS: Record<string, LiteralKind> = {
  single_quote_string: "singleQuotedString",
  string: "singleQuotedString",
  double_quote_string: "doubleQuotedString",
  number: "number",
  bool: "boolean",
  boolean: "boolean",
  null: "null",
};

export function adaptExpr(node: unknown): Expr {
  if (!isNode(node)) {
    return { type: "other", nodeKind: nodeKind(node) };
  }

  switch (node.type) {
    case "column_ref": {
      // Some grammars hand back `schema.table` as one dotted segment
      const segments = [node.db, node.schema, node.table, node.column]
        .map(identText)
        .filter((s): s is string => s !== null)
        .flatMap((s) => s.split("."))
        .filter((s) => s !== "");
      if (segments.length === 1) {
        return { type: "identifier", name: segments[0] };
      }
      return { type: "compoundIdentifier", segments };
    }

    case "binary_expr":
      return {
        type: "binaryOp",
        left: adaptExpr(node.left),
        operator: String(node.operator).toUpperCase(),
        right: adaptExpr(node.right),
      };

    default: {
      const literalKind =
        typeof node.type === "string" ? LITERAL_KINDS[node.type] : undefined;
      if (literalKind) {
        return {
          type: "literal",
          literalKind,
          value: node.value === null ? "NULL" : String(node.value),
        };
      }
      return { type: "other", nodeKind: nodeKind(node) };
    }
  }
}

function isStar(node: unknown): boolean {
  return (
    isNode(node) &&
    node.type === "column_ref" &&
    identText(node.column) === "*"
  );
}

export function adaptSelectItem(item: unknown): SelectItem {
  if (item === "*") return { type: "wildcard" };
  if (!isNode(item)) {
    return { type: "expr", expr: adaptExpr(item) };
  }

  const target = item.expr;
  if (isStar(target) && isNode(target)) {
    const qualifier = identText(target.table);
    return qualifier
      ? { type: "qualifiedWildcard", qualifier }
      : { type: "wildcard" };
  }

  const expr = adaptExpr(target);
  const alias = identText(item.as);
  return alias ? { type: "aliasedExpr", expr, alias } : { type: "expr", expr };
}

function adaptFactor(item: Node): TableFactor {
  if (item.type === "unnest") return { type: "unnest" };

  const expr = item.expr;
  if (isNode(expr)) {
    if ("ast" in expr) return { type: "derived" };
    if (expr.type === "function") {
      return { type: "tableFunction", name: identText(expr.name) ?? "function" };
    }
    if (Array.isArray(expr.tables)) return { type: "nestedJoin" };
  }

  const table = identText(item.table);
  if (table === null) return { type: "derived" };
  const db = identText(item.db);
  return { type: "table", name: db ? `${db}.${table}` : table };
}

function adaptHints(item: Node): string[] {
  const hints: string[] = [];
  for (const key of ["table_hint", "index_hint", "hints"]) {
    const value = item[key];
    if (Array.isArray(value)) {
      hints.push(...value.map((h) => nodeKind(h)));
    } else if (value !== undefined && value !== null) {
      hints.push(nodeKind(value));
    }
  }
  return hints;
}

export function adaptFrom(from: unknown): TableRef[] {
  if (from === null || from === undefined) return [];
  const items = Array.isArray(from) ? from : [from];
  const refs: TableRef[] = [];

  for (const item of items) {
    if (!isNode(item)) continue;

    // The library lists joined tables flat; they belong to the preceding ref
    const join = typeof item.join === "string" ? item.join : null;
    const previous = refs[refs.length - 1];
    if (join !== null && previous) {
      previous.joins.push(join);
      continue;
    }

    refs.push({
      factor: adaptFactor(item),
      alias: identText(item.as),
      args: null,
      hints: adaptHints(item),
      joins: join === null ? [] : [join],
    });
  }

  return refs;
}

export function adaptStatement(node: unknown): SqlStatement {
  if (!isNode(node) || node.type !== "select") {
    return { type: "other", statementKind: nodeKind(node) };
  }
  const setOp = node.set_op;
  if (node._next || typeof setOp === "string") {
    return {
      type: "setOperation",
      operator: typeof setOp === "string" ? setOp.toUpperCase() : "UNION",
    };
  }

  const columns = node.columns;
  const projection =
    columns === "*"
      ? [adaptSelectItem("*")]
      : Array.isArray(columns)
        ? columns.map(adaptSelectItem)
        : [];

  return {
    type: "select",
    projection,
    from: adaptFrom(node.from),
    where:
      node.where === null || node.where === undefined
        ? null
        : adaptExpr(node.where),
  };
}

/**
 * Escapes the raw query, runs the SQL grammar over it and adapts the single
 * resulting statement.
 */
export function parseStatement(
  sql: string,
  options: ParseOptions = {},
): Result<SqlStatement, TranslationError> {
  const text = escapeHyphens(sql).trim();
  if (text === "") {
    return err(new MissingClauseError("statement"));
  }

  let ast: unknown;
  try {
    ast = parser.astify(text, { database: options.dialect ?? DEFAULT_DIALECT });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    logger.debug(`Parse failed: ${message}`);
    return err(new SqlSyntaxError(message, { cause: e }));
  }

  const statements = Array.isArray(ast) ? ast : [ast];
  if (statements.length === 0) {
    return err(new MissingClauseError("statement"));
  }
  if (statements.length > 1) {
    return err(new UnsupportedSyntaxError("multiple statements"));
  }

  return ok(adaptStatement(statements[0]));
}
