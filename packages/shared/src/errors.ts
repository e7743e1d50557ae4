export type ErrorCode =
  | "UNSUPPORTED_SYNTAX"
  | "MISSING_CLAUSE"
  | "TYPE_MISMATCH"
  | "ARITY"
  | "SQL_SYNTAX"
  | "CONFIG"
  | "CONTEXT_NOT_FOUND"
  | "CLUSTER_REQUEST";

export abstract class KubeqlError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A grammar shape outside the accepted SELECT/FROM/WHERE subset. */
export class UnsupportedSyntaxError extends KubeqlError {
  readonly code = "UNSUPPORTED_SYNTAX";

  constructor(readonly feature: string) {
    super(`Unsupported: ${feature}`);
  }
}

export type RequiredClause = "statement" | "projection" | "from" | "where";

const MISSING_CLAUSE_MESSAGES: Record<RequiredClause, string> = {
  statement: "A SELECT statement is required",
  projection: "SELECT list is required to name the namespace(s)",
  from: "FROM list is required to name the context(s)",
  where: "WHERE required to build field selectors",
};

export class MissingClauseError extends KubeqlError {
  readonly code = "MISSING_CLAUSE";

  constructor(readonly clause: RequiredClause) {
    super(MISSING_CLAUSE_MESSAGES[clause]);
  }
}

export class TypeMismatchError extends KubeqlError {
  readonly code = "TYPE_MISMATCH";

  constructor(
    readonly leftKind: string,
    readonly rightKind: string,
  ) {
    super(`Type mismatch: cannot combine ${leftKind} with ${rightKind}`);
  }
}

export class ArityError extends KubeqlError {
  readonly code = "ARITY";

  constructor(readonly segments: readonly string[]) {
    super(
      `three-segment identifier required (e.g. pod.status.phase), got "${segments.join(".")}"`,
    );
  }
}

export class SqlSyntaxError extends KubeqlError {
  readonly code = "SQL_SYNTAX";

  constructor(message: string, options?: { cause?: unknown }) {
    super(`SQL syntax error: ${message}`, options);
  }
}

export class ConfigError extends KubeqlError {
  readonly code = "CONFIG";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ContextNotFoundError extends KubeqlError {
  readonly code = "CONTEXT_NOT_FOUND";

  constructor(readonly names: readonly string[]) {
    super(`Context not found in kubeconfig: ${names.join(", ")}`);
  }
}

export class ClusterRequestError extends KubeqlError {
  readonly code = "CLUSTER_REQUEST";

  constructor(
    readonly target: { context: string; namespace: string; kind: string },
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Listing ${target.kind} in ${target.context}/${target.namespace} failed: ${reason}`,
      { cause },
    );
  }
}

export type TranslationError =
  | UnsupportedSyntaxError
  | MissingClauseError
  | TypeMismatchError
  | ArityError
  | SqlSyntaxError;
