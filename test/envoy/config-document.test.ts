/**
 * Tests for configuration document assembly.
 */

import * as yaml from 'js-yaml';
import { buildConfigDocument, toYaml } from '../../src/envoy/config-document';
import { BackendDescriptor } from '../../src/core/types';

describe('buildConfigDocument', () => {
  const backends: BackendDescriptor[] = [
    { namespace: 'default', name: 'backend', port: 80 },
    { namespace: 'default', name: 'backend', port: 80, loadBalancerStrategy: 'Maglev' },
  ];

  it('should build one cluster per backend in order', () => {
    const document = buildConfigDocument(backends);
    expect(document.clusters.map(c => c.name)).toEqual([
      'default/backend/80/da39a3ee5e',
      'default/backend/80/e0fe482120',
    ]);
  });

  it('should use default route and access log', () => {
    const document = buildConfigDocument([]);
    expect(document.clusters).toEqual([]);
    expect(document.listener_filters).toEqual([{ name: 'envoy.listener.tls_inspector', config: {} }]);
    expect(document.network_filters[0].config.stat_prefix).toBe('ingress_http');
    expect(document.network_filters[0].config.access_log).toEqual([
      { name: 'envoy.file_access_log', config: { path: '/dev/stdout' } },
    ]);
  });

  it('should pass options through', () => {
    const document = buildConfigDocument(backends, {
      routeName: 'ingress_https',
      accessLogPath: '/var/log/envoy.log',
      connectTimeoutSeconds: 2,
    });
    expect(document.network_filters[0].config.stat_prefix).toBe('ingress_https');
    expect(document.network_filters[0].config.access_log).toEqual([
      { name: 'envoy.file_access_log', config: { path: '/var/log/envoy.log' } },
    ]);
    expect(document.clusters.map(c => c.connect_timeout)).toEqual(['2s', '2s']);
  });
});

describe('toYaml', () => {
  it('should write clusters first', () => {
    const output = toYaml(buildConfigDocument([{ namespace: 'default', name: 'backend', port: 80 }]));
    expect(output.startsWith('clusters:\n  - name: default/backend/80/da39a3ee5e\n')).toBe(true);
  });

  it('should produce YAML that loads back into the same document', () => {
    const document = buildConfigDocument([
      { namespace: 'default', name: 'backend', port: 80, healthCheck: { path: '/healthz' } },
    ]);
    expect(yaml.load(toYaml(document))).toEqual(document);
  });
});
