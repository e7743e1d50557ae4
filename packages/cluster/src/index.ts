export {
  loadKubeConfig,
  listContextNames,
  validateContexts,
} from "./kubeconfig.js";
export {
  RESOURCE_KINDS,
  clausesForKind,
  renderTerm,
  resourceKinds,
  toFieldSelectors,
  toResourceKind,
  type ResourceKind,
} from "./selector.js";
export {
  KubernetesResourceLister,
  QueryExecutor,
  type ListTarget,
  type ResourceLister,
  type ResultCell,
  type ResultSet,
} from "./executor.js";
