/**
 * Tests for the cluster builder.
 */

import { cluster, edsServiceName, lbPolicy } from '../../src/envoy/cluster';

describe('cluster', () => {
  it('should build an EDS cluster named after the backend', () => {
    expect(cluster({ namespace: 'default', name: 'kuard', port: 443, servicePortName: 'https' })).toEqual({
      name: 'default/kuard/443/da39a3ee5e',
      type: 'EDS',
      eds_cluster_config: {
        eds_config: {
          api_config_source: {
            api_type: 'GRPC',
            grpc_services: [{ envoy_grpc: { cluster_name: 'kenvoy' } }],
          },
        },
        service_name: 'default/kuard/https',
      },
      connect_timeout: '0.25s',
      lb_policy: 'ROUND_ROBIN',
    });
  });

  it('should honour the connect timeout option', () => {
    const result = cluster({ namespace: 'default', name: 'kuard', port: 80 }, { connectTimeoutSeconds: 1 });
    expect(result.connect_timeout).toBe('1s');
  });

  it('should add a health check with defaults for missing fields', () => {
    const result = cluster({
      namespace: 'default',
      name: 'backend',
      port: 80,
      healthCheck: { path: '/healthz', intervalSeconds: 5 },
    });
    expect(result.health_checks).toEqual([
      {
        timeout: '2s',
        interval: '5s',
        unhealthy_threshold: 3,
        healthy_threshold: 2,
        http_health_check: {
          path: '/healthz',
          host: 'kenvoy-envoy-healthcheck',
        },
      },
    ]);
  });

  it('should use the default path for an empty health check', () => {
    const result = cluster({ namespace: 'default', name: 'backend', port: 80, healthCheck: {} });
    expect(result.health_checks?.[0].http_health_check.path).toBe('/');
    expect(result.health_checks?.[0].timeout).toBe('2s');
    expect(result.health_checks?.[0].interval).toBe('10s');
  });

  it('should omit health checks when none is configured', () => {
    expect(cluster({ namespace: 'default', name: 'backend', port: 80 }).health_checks).toBeUndefined();
  });

  it('should map the load balancer strategy', () => {
    const result = cluster({ namespace: 'default', name: 'backend', port: 80, loadBalancerStrategy: 'Maglev' });
    expect(result.lb_policy).toBe('MAGLEV');
    expect(result.name).toBe('default/backend/80/e0fe482120');
  });
});

describe('lbPolicy', () => {
  it.each([
    ['RoundRobin', 'ROUND_ROBIN'],
    ['WeightedLeastRequest', 'LEAST_REQUEST'],
    ['RingHash', 'RING_HASH'],
    ['Maglev', 'MAGLEV'],
    ['Random', 'RANDOM'],
    ['Cookie', 'ROUND_ROBIN'],
    ['toString', 'ROUND_ROBIN'],
  ])('should map %s to %s', (strategy, want) => {
    expect(lbPolicy(strategy)).toBe(want);
  });

  it('should balance round robin without a strategy', () => {
    expect(lbPolicy(undefined)).toBe('ROUND_ROBIN');
  });
});

describe('edsServiceName', () => {
  it('should leave out a missing service port name', () => {
    expect(edsServiceName({ namespace: 'default', name: 'kuard', port: 80 })).toBe('default/kuard');
  });
});
