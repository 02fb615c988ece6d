/**
 * Core types for kenvoy backends.
 */

/**
 * Health check parameters attached to a backend.
 * Zero or missing numeric values fall back to the proxy defaults.
 */
export interface HealthCheck {
  /**
   * HTTP path probed by the proxy.
   */
  path?: string;

  /**
   * Seconds between two probes.
   */
  intervalSeconds?: number;

  /**
   * Seconds to wait for a probe response.
   */
  timeoutSeconds?: number;

  /**
   * Failed probes before an endpoint is marked unhealthy.
   */
  unhealthyThresholdCount?: number;

  /**
   * Successful probes before an endpoint is marked healthy again.
   */
  healthyThresholdCount?: number;
}

/**
 * Load balancer strategies understood by the cluster builder.
 */
export const LOAD_BALANCER_STRATEGIES = ['RoundRobin', 'WeightedLeastRequest', 'RingHash', 'Maglev', 'Random'] as const;

export type LoadBalancerStrategy = typeof LOAD_BALANCER_STRATEGIES[number];

/**
 * Returns true when `strategy` names a supported load balancer strategy.
 */
export function isLoadBalancerStrategy(strategy: string): strategy is LoadBalancerStrategy {
  return LOAD_BALANCER_STRATEGIES.some(known => known === strategy);
}

/**
 * A backend service port as seen by the proxy.
 *
 * `namespace`, `name` and `port` identify the backend. The remaining fields
 * are configuration and only influence the fingerprint of its cluster name.
 */
export interface BackendDescriptor {
  /**
   * Kubernetes namespace of the service.
   */
  namespace: string;

  /**
   * Kubernetes name of the service.
   */
  name: string;

  /**
   * Service port number the proxy connects to.
   */
  port: number;

  /**
   * Name of the service port, used for endpoint discovery when present.
   */
  servicePortName?: string;

  /**
   * Load balancer strategy. Unknown values are carried into the fingerprint
   * but balance round robin.
   */
  loadBalancerStrategy?: string;

  /**
   * Active health checking for the backend's endpoints.
   */
  healthCheck?: HealthCheck;
}
