import { readFileSync } from 'node:fs';
import { createLogger, unwrap, MissingClauseError } from '@kubeql/shared';
import type { Config } from '@kubeql/shared';
import { translate } from '@kubeql/planner';
import {
  KubernetesResourceLister,
  QueryExecutor,
  listContextNames,
  loadKubeConfig,
  validateContexts,
} from '@kubeql/cluster';
import type { ResourceLister } from '@kubeql/cluster';
import { renderJson, renderTable } from '../printer.js';

const logger = createLogger('cli');

export interface ClusterAccess {
  /** Context names known to the kubeconfig. */
  contexts: string[];
  lister: ResourceLister;
}

/** The query comes from the positional argument or from --file. */
export function readQuery(sql: string | undefined, file: string | undefined): string {
  if (file) {
    return readFileSync(file, 'utf-8');
  }
  if (sql === undefined || sql.trim() === '') {
    throw new MissingClauseError('statement');
  }
  return sql;
}

export function connect(config: Config): ClusterAccess {
  const kubeConfig = unwrap(loadKubeConfig(config.kubeconfig.path));
  return {
    contexts: listContextNames(kubeConfig),
    lister: new KubernetesResourceLister(kubeConfig, {
      maxAttempts: config.cluster.maxAttempts,
      baseDelayMs: config.cluster.retryDelayMs,
    }),
  };
}

export async function runQuery(sql: string, config: Config, cluster: ClusterAccess): Promise<string> {
  const plan = unwrap(translate(sql, { dialect: config.parser.dialect }));
  unwrap(validateContexts(cluster.contexts, plan.contexts));
  logger.info(`Querying ${plan.contexts.join(', ')} for ${plan.namespaces.join(', ')}`);

  const result = await new QueryExecutor(cluster.lister).execute(plan);
  return config.output.format === 'json'
    ? renderJson(result)
    : renderTable(result, { color: config.output.color });
}

export async function queryCommand(sql: string, config: Config): Promise<void> {
  console.log(await runQuery(sql, config, connect(config)));
}
