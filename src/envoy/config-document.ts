/**
 * Assembly of the Envoy configuration document emitted for a set of backends.
 */

import * as yaml from 'js-yaml';
import { BackendDescriptor } from '../core/types';
import { cluster, ClusterOptions, EnvoyCluster } from './cluster';
import { httpConnectionManager, ListenerFilter, NetworkFilter, tlsInspector } from './listener';

/**
 * Options for building a configuration document.
 */
export interface ConfigDocumentOptions extends ClusterOptions {
  /**
   * RDS route configuration name and HTTP stat prefix (default: 'ingress_http').
   */
  routeName?: string;

  /**
   * Access log file path (default: '/dev/stdout').
   */
  accessLogPath?: string;
}

/**
 * Envoy configuration for a set of backends.
 */
export interface ConfigDocument {
  clusters: EnvoyCluster[];
  listener_filters: ListenerFilter[];
  network_filters: NetworkFilter[];
}

/**
 * Builds the configuration document for `backends`, keeping their order.
 */
export function buildConfigDocument(backends: BackendDescriptor[], options: ConfigDocumentOptions = {}): ConfigDocument {
  const {
    routeName = 'ingress_http',
    accessLogPath = '/dev/stdout',
    ...clusterOptions
  } = options;

  return {
    clusters: backends.map(backend => cluster(backend, clusterOptions)),
    listener_filters: [tlsInspector()],
    network_filters: [httpConnectionManager(routeName, accessLogPath)],
  };
}

/**
 * Serializes a configuration document to YAML.
 */
export function toYaml(document: ConfigDocument): string {
  return yaml.dump(document, {
    indent: 2,
    lineWidth: -1, // No line wrapping
    noRefs: true,
    sortKeys: false,
    quotingType: '"',
    forceQuotes: false,
  });
}
