/**
 * Tests for backends file loading.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadBackendsFile, parseBackends } from '../../src/config/backends-file';

const BACKENDS_YAML = `
backends:
  - namespace: default
    name: backend
    port: 80
  - namespace: default
    name: backend
    port: 80
    servicePortName: http
    loadBalancerStrategy: Maglev
    healthCheck:
      path: /healthz
      intervalSeconds: 5
      timeoutSeconds: 30
      unhealthyThresholdCount: 3
      healthyThresholdCount: 1
`;

describe('parseBackends', () => {
  it('should parse backends from YAML', () => {
    const { backends, warnings } = parseBackends(BACKENDS_YAML);
    expect(warnings).toEqual([]);
    expect(backends).toEqual([
      { namespace: 'default', name: 'backend', port: 80 },
      {
        namespace: 'default',
        name: 'backend',
        port: 80,
        servicePortName: 'http',
        loadBalancerStrategy: 'Maglev',
        healthCheck: {
          path: '/healthz',
          intervalSeconds: 5,
          timeoutSeconds: 30,
          unhealthyThresholdCount: 3,
          healthyThresholdCount: 1,
        },
      },
    ]);
  });

  it('should return warnings for accepted backends', () => {
    const { backends, warnings } = parseBackends('backends:\n  - {namespace: a, name: b, port: 1, loadBalancerStrategy: Sticky}\n');
    expect(backends).toHaveLength(1);
    expect(warnings.map(w => w.code)).toEqual(['UNKNOWN_LB_STRATEGY']);
  });

  it('should list every error in the thrown message', () => {
    expect(() => parseBackends('backends:\n  - {namespace: a, port: 0}\n', 'test.yaml')).toThrow(
      'Invalid test.yaml: Validation failed with 2 error(s) and 0 warning(s)\n' +
      '  - backends[0].name: Name must be a non-empty string\n' +
      '  - backends[0].port: Port must be an integer between 1 and 65535'
    );
  });

  it('should report the root for an empty document', () => {
    expect(() => parseBackends('', 'empty.yaml')).toThrow(
      '  - <root>: Document must be a mapping with a "backends" list'
    );
  });

  it('should wrap YAML syntax errors', () => {
    expect(() => parseBackends('backends: [', 'broken.yaml')).toThrow(/^Failed to parse broken\.yaml: /);
  });
});

describe('loadBackendsFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kenvoy-backends-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load backends from disk', async () => {
    const file = path.join(tempDir, 'backends.yaml');
    fs.writeFileSync(file, BACKENDS_YAML);

    const { backends } = await loadBackendsFile(file);
    expect(backends).toHaveLength(2);
  });

  it('should reject a missing file', async () => {
    const file = path.join(tempDir, 'missing.yaml');
    await expect(loadBackendsFile(file)).rejects.toThrow(`Backends file not found: ${file}`);
  });
});
