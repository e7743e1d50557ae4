import chalk from 'chalk';
import Table from 'cli-table3';
import type { ResourceKind, ResultSet } from '@kubeql/cluster';

export const CORNER_HEADER = 'KIND / CONTEXT';
export const EMPTY_CELL = '-';

export interface PrintOptions {
  color: boolean;
}

export interface ContextColumn {
  context: string;
  /** One entry per namespace, in plan order. */
  cells: string[];
}

export interface KindRow {
  kind: ResourceKind;
  columns: ContextColumn[];
}

/** Lays results out as one row per kind and one column per context. */
export function buildRows(result: ResultSet): KindRow[] {
  return result.kinds.map((kind) => ({
    kind,
    columns: result.contexts.map((context) => ({
      context,
      cells: result.namespaces.map((namespace) => {
        const names = result.cells
          .filter((c) => c.kind === kind && c.context === context && c.namespace === namespace)
          .flatMap((c) => c.names);
        return names.length > 0 ? names.join('\n') : EMPTY_CELL;
      }),
    })),
  }));
}

function plainStyle() {
  return { head: [], border: [] };
}

function renderNamespaces(namespaces: readonly string[], column: ContextColumn, options: PrintOptions): string {
  const table = new Table({
    head: namespaces.map((ns) => (options.color ? chalk.yellow(ns) : ns)),
    style: plainStyle(),
  });
  table.push(column.cells);
  return table.toString();
}

export function renderTable(result: ResultSet, options: PrintOptions): string {
  const paint = (text: string) => (options.color ? chalk.cyan(text) : text);
  const table = new Table({
    head: [paint(CORNER_HEADER), ...result.contexts.map(paint)],
    style: plainStyle(),
  });

  for (const row of buildRows(result)) {
    table.push([
      paint(row.kind),
      ...row.columns.map((column) => renderNamespaces(result.namespaces, column, options)),
    ]);
  }

  return table.toString();
}

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
