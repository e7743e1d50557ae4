import {
  createLogger,
  err,
  ok,
  ArityError,
  COMPARATORS,
  TypeMismatchError,
  UnsupportedSyntaxError,
} from "@kubeql/shared";
import type {
  Clause,
  Comparator,
  LogicalOperator,
  Result,
  TranslationError,
  Value,
} from "@kubeql/shared";
import type { Expr } from "../sql/ast.js";
import { unescapeHyphens } from "../sql/escape.js";

type FoldResult = Result<Value, TranslationError>;

function isComparator(operator: string): operator is Comparator {
  return (COMPARATORS as readonly string[]).includes(operator);
}

function isLogicalOperator(operator: string): operator is LogicalOperator {
  return operator === "AND" || operator === "OR";
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}

/**
 * Folds a WHERE expression tree bottom-up into a single `Value`. A legal tree
 * folds to either one clause or a left-associative clause chain; every other
 * shape surfaces as an error value.
 */
export class ExpressionPlanner {
  private logger = createLogger("expression-planner");

  fold(expr: Expr): FoldResult {
    switch (expr.type) {
      case "compoundIdentifier":
        return ok({ kind: "stringList", segments: [...expr.segments] });

      case "identifier":
        return ok({ kind: "stringList", segments: [expr.name] });

      case "literal":
        if (
          expr.literalKind === "singleQuotedString" ||
          expr.literalKind === "doubleQuotedString"
        ) {
          return ok({ kind: "stringScalar", value: expr.value });
        }
        return err(new UnsupportedSyntaxError(`${expr.literalKind} literal`));

      case "binaryOp": {
        const left = this.fold(expr.left);
        if (!left.ok) return left;
        const right = this.fold(expr.right);
        if (!right.ok) return right;
        return this.combine(left.value, expr.operator, right.value);
      }

      case "other":
        return err(new UnsupportedSyntaxError(`${expr.nodeKind} expression`));

      default:
        return assertNever(expr);
    }
  }

  private combine(left: Value, operator: string, right: Value): FoldResult {
    switch (left.kind) {
      case "stringList":
        if (right.kind === "stringScalar") {
          return this.buildClause(left.segments, operator, right.value);
        }
        break;

      case "clause":
        if (right.kind === "clause") {
          return this.chain([left.clause], operator, right.clause);
        }
        break;

      case "clauseChain":
        if (right.kind === "clause") {
          return this.chain(left.clauses, operator, right.clause);
        }
        break;

      case "stringScalar":
        break;

      default:
        return assertNever(left);
    }

    return err(new TypeMismatchError(left.kind, right.kind));
  }

  private buildClause(
    segments: string[],
    operator: string,
    literal: string,
  ): FoldResult {
    if (segments.length !== 3) {
      return err(new ArityError(segments));
    }
    if (!isComparator(operator)) {
      return err(new UnsupportedSyntaxError(`comparison operator ${operator}`));
    }

    const [resourceKind, fieldPath1, fieldPath2] = segments;
    return ok({
      kind: "clause",
      clause: {
        chainOp: null,
        resourceKind,
        fieldPath1,
        fieldPath2,
        comparator: operator,
        literal: unescapeHyphens(literal),
      },
    });
  }

  // The operator is stored on the appended clause, never on the chain head
  private chain(head: Clause[], operator: string, next: Clause): FoldResult {
    if (!isLogicalOperator(operator)) {
      return err(
        new UnsupportedSyntaxError(`${operator} between two comparisons`),
      );
    }

    const clauses = [...head, { ...next, chainOp: operator }];
    this.logger.debug(`Chained clause #${clauses.length} with ${operator}`);
    return ok({ kind: "clauseChain", clauses });
  }
}

export function foldExpression(expr: Expr): FoldResult {
  return new ExpressionPlanner().fold(expr);
}
