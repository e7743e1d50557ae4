import { unwrap } from "@kubeql/shared";
import type { QueryPlan, Result, TranslationError } from "@kubeql/shared";
import { extractPlan } from "./query/extractor.js";
import { parseStatement } from "./sql/parser.js";
import type { ParseOptions } from "./sql/parser.js";

export type TranslateOptions = ParseOptions;

/** Translates one SQL sentence into a query plan. Pure and synchronous. */
export function translate(
  sql: string,
  options: TranslateOptions = {},
): Result<QueryPlan, TranslationError> {
  const statement = parseStatement(sql, options);
  if (!statement.ok) return statement;
  return extractPlan(statement.value);
}

export function translateOrThrow(
  sql: string,
  options: TranslateOptions = {},
): QueryPlan {
  return unwrap(translate(sql, options));
}
