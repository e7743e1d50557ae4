import { describe, it, expect } from "vitest";
import {
  ArityError,
  MissingClauseError,
  SqlSyntaxError,
  SQL_DIALECTS,
  UnsupportedSyntaxError,
} from "@kubeql/shared";
import {
  adaptExpr,
  adaptFrom,
  adaptSelectItem,
  adaptStatement,
  parseStatement,
} from "../sql/parser.js";
import { escapeHyphens, unescapeHyphens } from "../sql/escape.js";
import { translate, translateOrThrow } from "../translate.js";

describe("hyphen escaping", () => {
  it.each(["kube-system", "prod-cluster-01", "default", "a-b-c-1"])(
    "round-trips %s",
    (name) => {
      const escaped = escapeHyphens(name);
      expect(escaped).not.toContain("-");
      expect(unescapeHyphens(escaped)).toBe(name);
    },
  );

  it("cannot tell a literal underscore from an escaped hyphen", () => {
    expect(unescapeHyphens(escapeHyphens("my_app"))).toBe("my-app");
  });
});

describe("AST adaptation", () => {
  it("reads column references with string or wrapped segments", () => {
    expect(
      adaptExpr({ type: "column_ref", db: "pod", table: "status", column: "phase" }),
    ).toEqual({ type: "compoundIdentifier", segments: ["pod", "status", "phase"] });
    expect(
      adaptExpr({
        type: "column_ref",
        schema: "pod",
        table: "status",
        column: { expr: { type: "default", value: "phase" } },
      }),
    ).toEqual({ type: "compoundIdentifier", segments: ["pod", "status", "phase"] });
    expect(
      adaptExpr({ type: "column_ref", table: "pod.status", column: "phase" }),
    ).toEqual({ type: "compoundIdentifier", segments: ["pod", "status", "phase"] });
  });

  it("reads an unqualified column as a bare identifier", () => {
    expect(adaptExpr({ type: "column_ref", table: null, column: "testing" })).toEqual({
      type: "identifier",
      name: "testing",
    });
  });

  it("reads binary expressions and literals", () => {
    expect(
      adaptExpr({
        type: "binary_expr",
        operator: "and",
        left: { type: "single_quote_string", value: "a" },
        right: { type: "number", value: 3 },
      }),
    ).toEqual({
      type: "binaryOp",
      operator: "AND",
      left: { type: "literal", literalKind: "singleQuotedString", value: "a" },
      right: { type: "literal", literalKind: "number", value: "3" },
    });
    expect(adaptExpr({ type: "null", value: null })).toEqual({
      type: "literal",
      literalKind: "null",
      value: "NULL",
    });
  });

  it("keeps unknown nodes by kind", () => {
    expect(adaptExpr({ type: "function", name: "lower" })).toEqual({
      type: "other",
      nodeKind: "function",
    });
  });

  it("reads wildcards, aliases and plain projections", () => {
    expect(adaptSelectItem("*")).toEqual({ type: "wildcard" });
    expect(
      adaptSelectItem({ expr: { type: "column_ref", table: null, column: "*" }, as: null }),
    ).toEqual({ type: "wildcard" });
    expect(
      adaptSelectItem({ expr: { type: "column_ref", table: "t", column: "*" }, as: null }),
    ).toEqual({ type: "qualifiedWildcard", qualifier: "t" });
    expect(
      adaptSelectItem({ expr: { type: "column_ref", table: null, column: "a" }, as: "ns" }),
    ).toEqual({
      type: "aliasedExpr",
      expr: { type: "identifier", name: "a" },
      alias: "ns",
    });
    expect(
      adaptSelectItem({ expr: { type: "column_ref", table: null, column: "a" }, as: null }),
    ).toEqual({ type: "expr", expr: { type: "identifier", name: "a" } });
  });

  it("attaches joined tables to the preceding reference", () => {
    const refs = adaptFrom([
      { db: null, table: "c1", as: null },
      { db: null, table: "c2", as: null, join: "INNER JOIN", on: {} },
      { db: "prod", table: "c3", as: "x" },
    ]);
    expect(refs).toEqual([
      {
        factor: { type: "table", name: "c1" },
        alias: null,
        args: null,
        hints: [],
        joins: ["INNER JOIN"],
      },
      {
        factor: { type: "table", name: "prod.c3" },
        alias: "x",
        args: null,
        hints: [],
        joins: [],
      },
    ]);
  });

  it("recognises derived tables and table functions", () => {
    const [derived, fn] = adaptFrom([
      { expr: { ast: { type: "select" } }, as: "d" },
      { expr: { type: "function", name: "generate" }, as: null },
    ]);
    expect(derived.factor).toEqual({ type: "derived" });
    expect(fn.factor).toEqual({ type: "tableFunction", name: "generate" });
  });

  it("classifies statements", () => {
    expect(adaptStatement({ type: "delete" })).toEqual({
      type: "other",
      statementKind: "delete",
    });
    expect(
      adaptStatement({ type: "select", columns: [], from: [], where: null, set_op: "union", _next: {} }),
    ).toEqual({ type: "setOperation", operator: "UNION" });
    expect(
      adaptStatement({ type: "select", columns: "*", from: null, where: null }),
    ).toEqual({ type: "select", projection: [{ type: "wildcard" }], from: [], where: null });
  });
});

describe("parseStatement", () => {
  it("treats blank input as a missing statement", () => {
    const result = parseStatement("   ");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(MissingClauseError);
  });

  it("reports grammar failures as syntax errors", () => {
    const result = parseStatement("SELECT FROM WHERE");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SqlSyntaxError);
  });
});

describe("translate", () => {
  it("translates a single comparison across hyphenated names", () => {
    const plan = translateOrThrow(
      "SELECT kube-system FROM prod-cluster WHERE pod.status.phase = 'Running'",
    );
    expect(plan).toEqual({
      namespaces: ["kube-system"],
      contexts: ["prod-cluster"],
      clauses: [
        {
          chainOp: null,
          resourceKind: "pod",
          fieldPath1: "status",
          fieldPath2: "phase",
          comparator: "=",
          literal: "Running",
        },
      ],
    });
  });

  it("translates several namespaces, contexts and chained clauses", () => {
    const plan = translateOrThrow(
      "SELECT a, b FROM c1, c2 WHERE deployment.metadata.name = 'x' AND pod.status.phase = 'Running'",
    );
    expect(plan.namespaces).toEqual(["a", "b"]);
    expect(plan.contexts).toEqual(["c1", "c2"]);
    expect(plan.clauses.map((c) => [c.chainOp, c.resourceKind, c.literal])).toEqual([
      [null, "deployment", "x"],
      ["AND", "pod", "Running"],
    ]);
  });

  it("preserves chain order for AND followed by OR", () => {
    const plan = translateOrThrow(
      "SELECT ns FROM ctx WHERE pod.status.phase = 'Running' AND pod.spec.nodeName = 'node-1' OR service.metadata.name = 'hello-minikube'",
    );
    expect(plan.clauses.map((c) => c.chainOp)).toEqual([null, "AND", "OR"]);
    expect(plan.clauses.map((c) => c.literal)).toEqual(["Running", "node-1", "hello-minikube"]);
  });

  it("rejects a wildcard projection", () => {
    const result = translate("SELECT * FROM c WHERE pod.status.phase = 'Running'");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnsupportedSyntaxError);
    expect(result.error).toMatchObject({ feature: "wildcard projection" });
  });

  it("rejects a two-segment identifier", () => {
    const result = translate("SELECT a FROM c WHERE pod.status = 'x'");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ArityError);
  });

  it("requires a WHERE clause", () => {
    const result = translate("SELECT a FROM c");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ code: "MISSING_CLAUSE", clause: "where" });
  });

  it("throws from translateOrThrow", () => {
    expect(() => translateOrThrow("SELECT a FROM c")).toThrow(MissingClauseError);
  });
});

describe("translate through the default grammar", () => {
  it("accepts default as a namespace", () => {
    expect(
      translateOrThrow("SELECT default FROM prod-cluster WHERE pod.status.phase = 'Running'"),
    ).toEqual({
      namespaces: ["default"],
      contexts: ["prod-cluster"],
      clauses: [
        {
          chainOp: null,
          resourceKind: "pod",
          fieldPath1: "status",
          fieldPath2: "phase",
          comparator: "=",
          literal: "Running",
        },
      ],
    });
  });

  it("rejects a four-segment identifier by arity", () => {
    const result = translate("SELECT a FROM c WHERE pod.status.phase.extra = 'x'");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ArityError);
  });

  it("reads a double-quoted literal as a scalar", () => {
    const plan = translateOrThrow('SELECT a FROM c WHERE pod.status.phase = "Running"');
    expect(plan.clauses.map((c) => c.literal)).toEqual(["Running"]);
  });

  it("rejects an aliased projection", () => {
    const result = translate("SELECT a AS b FROM c WHERE pod.status.phase = 'Running'");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ feature: "aliased projection" });
  });

  it("rejects a join", () => {
    const result = translate(
      "SELECT a FROM c1 JOIN c2 ON c1.x = c2.y WHERE pod.status.phase = 'Running'",
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ feature: "join" });
  });
});

describe.each(SQL_DIALECTS)("%s grammar", (dialect) => {
  it("translates a single comparison", () => {
    const plan = translateOrThrow(
      "SELECT default FROM prod-cluster WHERE pod.status.phase = 'Running'",
      { dialect },
    );
    expect(plan.namespaces).toEqual(["default"]);
    expect(plan.contexts).toEqual(["prod-cluster"]);
    expect(plan.clauses).toHaveLength(1);
  });

  it("chains comparisons across several namespaces and contexts", () => {
    const plan = translateOrThrow(
      "SELECT a, b FROM c1, c2 WHERE deployment.metadata.name = 'x' AND pod.status.phase = 'Running'",
      { dialect },
    );
    expect(plan.namespaces).toEqual(["a", "b"]);
    expect(plan.contexts).toEqual(["c1", "c2"]);
    expect(plan.clauses.map((c) => c.chainOp)).toEqual([null, "AND"]);
  });

  it("rejects a wildcard projection", () => {
    const result = translate("SELECT * FROM c WHERE pod.status.phase = 'Running'", { dialect });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ feature: "wildcard projection" });
  });

  it.each(["pod.status", "pod.status.phase.extra"])("rejects %s by arity", (field) => {
    const result = translate(`SELECT a FROM c WHERE ${field} = 'x'`, { dialect });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ArityError);
  });
});
