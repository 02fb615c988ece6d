/**
 * Envoy configuration builders.
 */

export {
  tlsInspector,
  httpConnectionManager,
  XDS_CLUSTER_NAME,
  ListenerFilter,
  NetworkFilter,
  ConfigValue,
} from './listener';
export {
  cluster,
  edsServiceName,
  lbPolicy,
  HEALTH_CHECK_HOST,
  HEALTH_CHECK_DEFAULTS,
  EnvoyCluster,
  EnvoyHealthCheck,
  ClusterOptions,
  LbPolicy,
} from './cluster';
export { buildConfigDocument, toYaml, ConfigDocument, ConfigDocumentOptions } from './config-document';
