export { translate, translateOrThrow, type TranslateOptions } from "./translate.js";
export {
  ClauseExtractor,
  extractPlan,
} from "./query/extractor.js";
export { ExpressionPlanner, foldExpression } from "./query/planner.js";
export { checkSelectItem, checkStatement, checkTableRef } from "./query/guard.js";
export { parseStatement, type ParseOptions } from "./sql/parser.js";
export { escapeHyphens, unescapeHyphens } from "./sql/escape.js";
export type {
  Expr,
  LiteralKind,
  SelectItem,
  SelectStatement,
  SqlStatement,
  TableFactor,
  TableRef,
} from "./sql/ast.js";
export {
  binaryOp,
  compoundIdentifier,
  plainTable,
  stringLiteral,
} from "./sql/ast.js";
