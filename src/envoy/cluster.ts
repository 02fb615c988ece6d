/**
 * Envoy cluster builder for Kubernetes backends.
 */

import { clustername } from '../core/clustername';
import { BackendDescriptor, HealthCheck, isLoadBalancerStrategy, LoadBalancerStrategy } from '../core/types';
import { XDS_CLUSTER_NAME } from './listener';

/**
 * Host header sent with every active health check request.
 */
export const HEALTH_CHECK_HOST = 'kenvoy-envoy-healthcheck';

/**
 * Defaults applied to health check fields that are missing or zero.
 */
export const HEALTH_CHECK_DEFAULTS = {
  timeoutSeconds: 2,
  intervalSeconds: 10,
  unhealthyThresholdCount: 3,
  healthyThresholdCount: 2,
  path: '/',
} as const;

/**
 * Envoy load balancing policies.
 */
export type LbPolicy = 'ROUND_ROBIN' | 'LEAST_REQUEST' | 'RING_HASH' | 'MAGLEV' | 'RANDOM';

const LB_POLICIES: { [strategy in LoadBalancerStrategy]: LbPolicy } = {
  RoundRobin: 'ROUND_ROBIN',
  WeightedLeastRequest: 'LEAST_REQUEST',
  RingHash: 'RING_HASH',
  Maglev: 'MAGLEV',
  Random: 'RANDOM',
};

/**
 * Active HTTP health check of an Envoy cluster.
 */
export interface EnvoyHealthCheck {
  timeout: string;
  interval: string;
  unhealthy_threshold: number;
  healthy_threshold: number;
  http_health_check: {
    path: string;
    host: string;
  };
}

/**
 * An Envoy cluster whose endpoints are discovered over EDS.
 */
export interface EnvoyCluster {
  name: string;
  type: 'EDS';
  eds_cluster_config: {
    eds_config: {
      api_config_source: {
        api_type: 'GRPC';
        grpc_services: Array<{ envoy_grpc: { cluster_name: string } }>;
      };
    };
    service_name: string;
  };
  connect_timeout: string;
  lb_policy: LbPolicy;
  health_checks?: EnvoyHealthCheck[];
}

/**
 * Options for building a cluster.
 */
export interface ClusterOptions {
  /**
   * Upstream connect timeout in seconds (default: 0.25).
   */
  connectTimeoutSeconds?: number;
}

/**
 * Maps a backend's load balancer strategy to an Envoy policy.
 * Missing and unknown strategies balance round robin.
 */
export function lbPolicy(strategy: string | undefined): LbPolicy {
  if (strategy !== undefined && isLoadBalancerStrategy(strategy)) {
    return LB_POLICIES[strategy];
  }
  return 'ROUND_ROBIN';
}

/**
 * Builds the Envoy cluster for a backend.
 * @param backend The backend to expose
 * @param options Cluster options
 * @returns Cluster named by {@link clustername}
 */
export function cluster(backend: BackendDescriptor, options: ClusterOptions = {}): EnvoyCluster {
  const { connectTimeoutSeconds = 0.25 } = options;

  const result: EnvoyCluster = {
    name: clustername(backend),
    type: 'EDS',
    eds_cluster_config: {
      eds_config: {
        api_config_source: {
          api_type: 'GRPC',
          grpc_services: [{ envoy_grpc: { cluster_name: XDS_CLUSTER_NAME } }],
        },
      },
      service_name: edsServiceName(backend),
    },
    connect_timeout: `${connectTimeoutSeconds}s`,
    lb_policy: lbPolicy(backend.loadBalancerStrategy),
  };

  if (backend.healthCheck) {
    result.health_checks = [healthCheck(backend.healthCheck)];
  }

  return result;
}

/**
 * Name under which the backend's endpoints are published over EDS.
 */
export function edsServiceName(backend: BackendDescriptor): string {
  const base = `${backend.namespace}/${backend.name}`;
  return backend.servicePortName ? `${base}/${backend.servicePortName}` : base;
}

function healthCheck(hc: HealthCheck): EnvoyHealthCheck {
  return {
    timeout: `${orDefault(hc.timeoutSeconds, HEALTH_CHECK_DEFAULTS.timeoutSeconds)}s`,
    interval: `${orDefault(hc.intervalSeconds, HEALTH_CHECK_DEFAULTS.intervalSeconds)}s`,
    unhealthy_threshold: orDefault(hc.unhealthyThresholdCount, HEALTH_CHECK_DEFAULTS.unhealthyThresholdCount),
    healthy_threshold: orDefault(hc.healthyThresholdCount, HEALTH_CHECK_DEFAULTS.healthyThresholdCount),
    http_health_check: {
      path: hc.path || HEALTH_CHECK_DEFAULTS.path,
      host: HEALTH_CHECK_HOST,
    },
  };
}

function orDefault(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}
