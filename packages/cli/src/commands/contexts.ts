import { unwrap } from '@kubeql/shared';
import type { Config } from '@kubeql/shared';
import { listContextNames, loadKubeConfig } from '@kubeql/cluster';

export function formatContexts(names: readonly string[], current: string | null): string {
  return names.map((name) => `${name === current ? '*' : ' '} ${name}`).join('\n');
}

export function contextsCommand(config: Config): string {
  const kubeConfig = unwrap(loadKubeConfig(config.kubeconfig.path));
  return formatContexts(listContextNames(kubeConfig), kubeConfig.getCurrentContext() || null);
}
