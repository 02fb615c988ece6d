/**
 * Envoy cluster names for Kubernetes backends.
 */

import { BackendDescriptor, HealthCheck } from './types';
import { contentHash, FINGERPRINT_ALGORITHM, FINGERPRINT_LENGTH } from './digest';
import { hashname } from './hashname';

/**
 * Budget for the `namespace/name` part of a cluster name.
 */
export const IDENTITY_MAX_LENGTH = 30;

/**
 * Upper bound on any name produced by {@link clustername}, published for
 * consumers that size storage or validate names from elsewhere. Nothing here
 * enforces it: identity (at most 31) + port (at most 5) + fingerprint (10) +
 * two separators always stay below it.
 */
export const MAX_CLUSTER_NAME_LENGTH = 60;

/**
 * Returns the Envoy cluster name for a backend.
 *
 * The name has the form `<namespace>/<name>/<port>/<fingerprint>`. Namespace
 * and name are shortened by {@link hashname} when they exceed
 * {@link IDENTITY_MAX_LENGTH}. The fingerprint is a short digest of the
 * backend's load balancer and health check settings, so two backends that
 * only differ in those settings keep their prefix but get distinct names.
 *
 * @example
 * clustername({ namespace: 'default', name: 'backend', port: 80 });
 * // 'default/backend/80/da39a3ee5e'
 */
export function clustername(backend: BackendDescriptor): string {
  const identity = hashname(IDENTITY_MAX_LENGTH, backend.namespace, backend.name);
  return `${identity}/${backend.port}/${fingerprint(backend)}`;
}

/**
 * Short digest of the non-identity configuration of a backend.
 */
export function fingerprint(backend: BackendDescriptor): string {
  return contentHash(FINGERPRINT_ALGORITHM, canonicalConfig(backend)).substring(0, FINGERPRINT_LENGTH);
}

/**
 * Renders the configuration fields of a backend in a fixed order.
 *
 * Each field present is written as `label=value`, and fields are joined with
 * `;`, in this order: `lb`, `timeout`, `interval`, `unhealthy`, `healthy`,
 * `path`. Numeric fields are written only when positive, strings only when
 * non-empty, and `\` and `;` inside strings are escaped with `\`. A backend
 * without settings renders as the empty string, as does an empty health check.
 * Durations are written as `30s`, `1m30s` or `1h0m0s`.
 *
 * @example
 * // 'lb=Maglev;timeout=30s;interval=5s;unhealthy=3;healthy=1;path=/healthz'
 */
export function canonicalConfig(backend: BackendDescriptor): string {
  const fields: string[] = [];
  if (backend.loadBalancerStrategy) {
    fields.push(`lb=${escapeValue(backend.loadBalancerStrategy)}`);
  }
  const hc: HealthCheck | undefined = backend.healthCheck;
  if (hc) {
    if (isPositive(hc.timeoutSeconds)) {
      fields.push(`timeout=${formatDuration(hc.timeoutSeconds)}`);
    }
    if (isPositive(hc.intervalSeconds)) {
      fields.push(`interval=${formatDuration(hc.intervalSeconds)}`);
    }
    if (isPositive(hc.unhealthyThresholdCount)) {
      fields.push(`unhealthy=${hc.unhealthyThresholdCount}`);
    }
    if (isPositive(hc.healthyThresholdCount)) {
      fields.push(`healthy=${hc.healthyThresholdCount}`);
    }
    if (hc.path) {
      fields.push(`path=${escapeValue(hc.path)}`);
    }
  }
  return fields.join(';');
}

/**
 * Formats seconds as an hour/minute/second duration.
 * Fractional values are written as plain seconds, e.g. `0.5s`.
 */
export function formatDuration(seconds: number): string {
  if (!Number.isInteger(seconds)) {
    return `${seconds}s`;
  }
  if (seconds === 0) {
    return '0s';
  }
  const sign = seconds < 0 ? '-' : '';
  const abs = Math.abs(seconds);
  const h = Math.floor(abs / 3600);
  const m = Math.floor((abs % 3600) / 60);
  const s = abs % 60;
  if (h > 0) {
    return `${sign}${h}h${m}m${s}s`;
  }
  if (m > 0) {
    return `${sign}${m}m${s}s`;
  }
  return `${sign}${s}s`;
}

function escapeValue(value: string): string {
  return value.replace(/[\\;]/g, c => `\\${c}`);
}

function isPositive(value: number | undefined): value is number {
  return value !== undefined && value > 0;
}
