import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ContextNotFoundError,
  MissingClauseError,
  UnsupportedSyntaxError,
  parseConfig,
} from '@kubeql/shared';
import type { ListTarget, ResourceLister } from '@kubeql/cluster';
import { readQuery, runQuery } from '../commands/query.js';
import { planCommand } from '../commands/plan.js';
import { formatContexts } from '../commands/contexts.js';

const QUERY = "SELECT kube-system FROM prod-cluster WHERE pod.status.phase = 'Running'";

/** Answers every request from a fixed table and records the selectors it saw. */
class StaticLister implements ResourceLister {
  selectors: string[] = [];

  constructor(private readonly names: Record<string, string[]>) {}

  async list(target: ListTarget, fieldSelector: string): Promise<string[]> {
    this.selectors.push(fieldSelector);
    return this.names[`${target.context}/${target.namespace}/${target.kind}`] ?? [];
  }
}

describe('runQuery', () => {
  it('prints the result set as JSON', async () => {
    const lister = new StaticLister({ 'prod-cluster/kube-system/pod': ['etcd', 'coredns'] });
    const config = parseConfig({ output: { format: 'json' } });

    const output = await runQuery(QUERY, config, { contexts: ['prod-cluster'], lister });

    expect(lister.selectors).toEqual(['status.phase=Running']);
    expect(JSON.parse(output)).toEqual({
      contexts: ['prod-cluster'],
      namespaces: ['kube-system'],
      kinds: ['pod'],
      cells: [
        { context: 'prod-cluster', namespace: 'kube-system', kind: 'pod', names: ['coredns', 'etcd'] },
      ],
    });
  });

  it('prints a table by default', async () => {
    const lister = new StaticLister({ 'prod-cluster/kube-system/pod': ['etcd'] });
    const config = parseConfig({ output: { color: false } });

    const output = await runQuery(QUERY, config, { contexts: ['prod-cluster'], lister });

    expect(output).toContain('prod-cluster');
    expect(output).toContain('etcd');
  });

  it('rejects contexts missing from the kubeconfig before listing', async () => {
    const lister = new StaticLister({});
    const run = runQuery(QUERY, parseConfig({}), { contexts: ['minikube'], lister });

    await expect(run).rejects.toBeInstanceOf(ContextNotFoundError);
    expect(lister.selectors).toEqual([]);
  });

  it('surfaces translation errors', async () => {
    const lister = new StaticLister({});
    const run = runQuery(
      "SELECT * FROM prod-cluster WHERE pod.status.phase = 'Running'",
      parseConfig({}),
      { contexts: ['prod-cluster'], lister },
    );

    await expect(run).rejects.toBeInstanceOf(UnsupportedSyntaxError);
  });
});

describe('planCommand', () => {
  it('prints the plan without contacting a cluster', () => {
    expect(JSON.parse(planCommand(QUERY, parseConfig({})))).toEqual({
      namespaces: ['kube-system'],
      contexts: ['prod-cluster'],
      clauses: [
        {
          chainOp: null,
          resourceKind: 'pod',
          fieldPath1: 'status',
          fieldPath2: 'phase',
          comparator: '=',
          literal: 'Running',
        },
      ],
    });
  });
});

describe('formatContexts', () => {
  it('marks the current context', () => {
    expect(formatContexts(['minikube', 'staging'], 'staging')).toBe('  minikube\n* staging');
  });

  it('marks nothing without a current context', () => {
    expect(formatContexts(['minikube'], null)).toBe('  minikube');
  });
});

describe('readQuery', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'kubeql-query-'));
    writeFileSync(join(dir, 'query.sql'), QUERY);
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('prefers the file', () => {
    expect(readQuery(undefined, join(dir, 'query.sql'))).toBe(QUERY);
  });

  it('returns the argument', () => {
    expect(readQuery('SELECT a FROM b', undefined)).toBe('SELECT a FROM b');
  });

  it('requires a statement', () => {
    expect(() => readQuery('  ', undefined)).toThrow(MissingClauseError);
    expect(() => readQuery(undefined, undefined)).toThrow(MissingClauseError);
  });
});
