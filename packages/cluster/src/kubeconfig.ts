import { KubeConfig } from "@kubernetes/client-node";
import {
  createLogger,
  err,
  ok,
  ConfigError,
  ContextNotFoundError,
} from "@kubeql/shared";
import type { Result } from "@kubeql/shared";

const logger = createLogger("kubeconfig");

/**
 * Reads a kubeconfig from `path`, or from the default locations (KUBECONFIG,
 * ~/.kube/config, in-cluster) when no path is given.
 */
export function loadKubeConfig(path?: string): Result<KubeConfig, ConfigError> {
  const kubeConfig = new KubeConfig();
  try {
    if (path) {
      kubeConfig.loadFromFile(path);
    } else {
      kubeConfig.loadFromDefault();
    }
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return err(
      new ConfigError(
        `Failed to read kubeconfig${path ? ` ${path}` : ""}: ${reason}`,
        { cause: e },
      ),
    );
  }

  logger.debug(
    `Loaded kubeconfig with ${kubeConfig.getContexts().length} contexts`,
  );
  return ok(kubeConfig);
}

export function listContextNames(kubeConfig: KubeConfig): string[] {
  return kubeConfig.getContexts().map((context) => context.name);
}

// Every missing context is reported, not just the first
export function validateContexts(
  known: readonly string[],
  requested: readonly string[],
): Result<void, ContextNotFoundError> {
  const knownSet = new Set(known);
  const missing = requested.filter((name) => !knownSet.has(name));
  if (missing.length > 0) {
    return err(new ContextNotFoundError(missing));
  }
  return ok(undefined);
}
