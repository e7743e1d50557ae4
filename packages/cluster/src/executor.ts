import {
  AppsV1Api,
  CoreV1Api,
  KubeConfig,
} from "@kubernetes/client-node";
import type { V1ObjectMeta } from "@kubernetes/client-node";
import {
  createLogger,
  retry,
  ClusterRequestError,
  KubeqlError,
} from "@kubeql/shared";
import type { QueryPlan, RetryOptions } from "@kubeql/shared";
import {
  clausesForKind,
  resourceKinds,
  toFieldSelectors,
  type ResourceKind,
} from "./selector.js";

export interface ListTarget {
  context: string;
  namespace: string;
  kind: ResourceKind;
}

export interface ResourceLister {
  /** Names of the resources matching one field selector. */
  list(target: ListTarget, fieldSelector: string): Promise<string[]>;
}

export interface ResultCell extends ListTarget {
  names: string[];
}

export interface ResultSet {
  contexts: readonly string[];
  namespaces: readonly string[];
  kinds: ResourceKind[];
  cells: ResultCell[];
}

function namesOf(items: Array<{ metadata?: V1ObjectMeta }>): string[] {
  return items.flatMap((item) =>
    item.metadata?.name ? [item.metadata.name] : [],
  );
}

// 4xx answers other than 429 will not change on a second attempt
function isRetryable(error: Error): boolean {
  if (!("code" in error) || typeof error.code !== "number") return true;
  return error.code === 429 || error.code >= 500;
}

interface ContextClients {
  core: CoreV1Api;
  apps: AppsV1Api;
}

/**
 * Lists resources through the Kubernetes API, one client pair per kubeconfig
 * context.
 */
export class KubernetesResourceLister implements ResourceLister {
  private logger = createLogger("kube-lister");
  private clients = new Map<string, ContextClients>();
  private kubeConfig: KubeConfig;
  private retryOptions: Partial<RetryOptions>;

  constructor(kubeConfig: KubeConfig, retryOptions: Partial<RetryOptions> = {}) {
    this.kubeConfig = kubeConfig;
    this.retryOptions = retryOptions;
  }

  async list(target: ListTarget, fieldSelector: string): Promise<string[]> {
    const { core, apps } = this.clientsFor(target.context);
    const request = { namespace: target.namespace, fieldSelector };

    return retry(
      async (): Promise<string[]> => {
        switch (target.kind) {
          case "pod":
            return namesOf((await core.listNamespacedPod(request)).items);
          case "service":
            return namesOf((await core.listNamespacedService(request)).items);
          case "deployment":
            return namesOf((await apps.listNamespacedDeployment(request)).items);
        }
      },
      {
        ...this.retryOptions,
        shouldRetry: isRetryable,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            `List ${target.kind} in ${target.context}/${target.namespace} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${error.message}`,
          );
        },
      },
    );
  }

  private clientsFor(context: string): ContextClients {
    const cached = this.clients.get(context);
    if (cached) return cached;

    const scoped = new KubeConfig();
    scoped.loadFromOptions({
      clusters: this.kubeConfig.getClusters(),
      users: this.kubeConfig.getUsers(),
      contexts: this.kubeConfig.getContexts(),
      currentContext: context,
    });
    const clients = {
      core: scoped.makeApiClient(CoreV1Api),
      apps: scoped.makeApiClient(AppsV1Api),
    };
    this.clients.set(context, clients);
    return clients;
  }
}

/**
 * Runs a query plan: one list request per context, namespace, resource kind
 * and OR-group, all in flight at once.
 */
export class QueryExecutor {
  private logger = createLogger("query-executor");
  private lister: ResourceLister;

  constructor(lister: ResourceLister) {
    this.lister = lister;
  }

  async execute(plan: QueryPlan): Promise<ResultSet> {
    const kinds = resourceKinds(plan.clauses);
    if (!kinds.ok) throw kinds.error;

    const selectors = new Map<ResourceKind, string[]>();
    for (const kind of kinds.value) {
      const rendered = toFieldSelectors(clausesForKind(plan.clauses, kind));
      if (!rendered.ok) throw rendered.error;
      selectors.set(kind, rendered.value);
    }

    const targets: ListTarget[] = [];
    for (const context of plan.contexts) {
      for (const namespace of plan.namespaces) {
        for (const kind of kinds.value) {
          targets.push({ context, namespace, kind });
        }
      }
    }

    this.logger.info(
      `Executing ${targets.length} targets across ${plan.contexts.length} contexts`,
    );
    const cells = await Promise.all(
      targets.map((target) => this.fetchCell(target, selectors.get(target.kind) ?? [])),
    );

    return {
      contexts: plan.contexts,
      namespaces: plan.namespaces,
      kinds: kinds.value,
      cells,
    };
  }

  private async fetchCell(
    target: ListTarget,
    fieldSelectors: string[],
  ): Promise<ResultCell> {
    const names = new Set<string>();
    for (const fieldSelector of fieldSelectors) {
      this.logger.debug(
        `List ${target.kind} in ${target.context}/${target.namespace} where ${fieldSelector}`,
      );
      let found: string[];
      try {
        found = await this.lister.list(target, fieldSelector);
      } catch (e) {
        if (e instanceof KubeqlError) throw e;
        throw new ClusterRequestError(target, e);
      }
      for (const name of found) names.add(name);
    }
    return { ...target, names: [...names].sort() };
  }
}
