/**
 * Structural validation of backend descriptors read from configuration.
 */

import { clustername } from '../core/clustername';
import { BackendDescriptor, HealthCheck, isLoadBalancerStrategy } from '../core/types';

/**
 * Validation issue severity levels.
 */
export type ValidationSeverity = 'error' | 'warning';

/**
 * Represents a validation error or warning.
 */
export interface ValidationError {
  /**
   * Human-readable error message.
   */
  message: string;

  /**
   * Path to the offending value, e.g. `backends[2].port`.
   */
  path: string;

  /**
   * Severity level of the validation issue.
   */
  severity: ValidationSeverity;

  /**
   * Error code for programmatic handling.
   */
  code: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /**
   * Whether validation passed (no errors).
   */
  isValid: boolean;

  /**
   * All errors and warnings found.
   */
  errors: ValidationError[];

  errorCount: number;
  warningCount: number;

  /**
   * Summary message describing the validation result.
   */
  summary: string;
}

/**
 * Validation result carrying the backends that passed validation.
 */
export interface BackendsValidationResult extends ValidationResult {
  backends: BackendDescriptor[];
}

const HEALTH_CHECK_COUNTERS = [
  'intervalSeconds',
  'timeoutSeconds',
  'unhealthyThresholdCount',
  'healthyThresholdCount',
] as const;

// DNS-1123 label, as Kubernetes requires for namespaces and service names.
const DNS_LABEL_REGEX = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const DNS_LABEL_MAX_LENGTH = 63;

/**
 * Validator for backend descriptors and backends documents.
 */
export class Validator {
  /**
   * Validates a parsed backends document of the form `{ backends: [...] }`.
   * Duplicate cluster names across backends are reported as errors.
   * @param document The parsed document
   * @returns Validation result with the accepted backends
   */
  public static validateBackendsDocument(document: unknown): BackendsValidationResult {
    const errors: ValidationError[] = [];
    const backends: BackendDescriptor[] = [];

    if (!isRecord(document)) {
      errors.push(this.createError('Document must be a mapping with a "backends" list', '', 'error', 'INVALID_DOCUMENT'));
      return { ...this.createValidationResult(errors), backends };
    }

    const entries = document.backends;
    if (!Array.isArray(entries)) {
      errors.push(this.createError('Document must contain a "backends" list', 'backends', 'error', 'MISSING_BACKENDS'));
      return { ...this.createValidationResult(errors), backends };
    }

    const seen = new Map<string, string>();
    entries.forEach((entry: unknown, index: number) => {
      const path = `backends[${index}]`;
      const backend = this.parseBackend(entry, path, errors);
      if (!backend) {
        return;
      }

      const name = clustername(backend);
      const previous = seen.get(name);
      if (previous !== undefined) {
        errors.push(this.createError(
          `Cluster name '${name}' is already used by ${previous}`,
          path,
          'error',
          'DUPLICATE_CLUSTER_NAME'
        ));
        return;
      }
      seen.set(name, path);
      backends.push(backend);
    });

    const result = this.createValidationResult(errors);
    return { ...result, backends: result.isValid ? backends : [] };
  }

  /**
   * Validates a single backend descriptor.
   * @param value The candidate descriptor
   * @param path Path reported in errors
   */
  public static validateBackendDescriptor(value: unknown, path: string = 'backend'): ValidationResult {
    const errors: ValidationError[] = [];
    this.parseBackend(value, path, errors);
    return this.createValidationResult(errors);
  }

  /**
   * Creates a validation error object.
   */
  public static createError(
    message: string,
    path: string,
    severity: ValidationSeverity,
    code: string
  ): ValidationError {
    return { message, path, severity, code };
  }

  /**
   * Checks a backend entry and returns it as a descriptor when it has no errors.
   * Warnings are collected but do not reject the entry.
   */
  private static parseBackend(value: unknown, path: string, errors: ValidationError[]): BackendDescriptor | undefined {
    if (!isRecord(value)) {
      errors.push(this.createError('Backend must be a mapping', path, 'error', 'INVALID_BACKEND'));
      return undefined;
    }

    const before = errors.filter(e => e.severity === 'error').length;
    const { namespace, name, port, servicePortName, loadBalancerStrategy, healthCheck } = value;

    if (typeof namespace !== 'string' || namespace === '') {
      errors.push(this.createError('Namespace must be a non-empty string', `${path}.namespace`, 'error', 'INVALID_NAMESPACE'));
    } else if (!isDnsLabel(namespace)) {
      errors.push(this.createError(
        `Invalid namespace '${namespace}'. Namespaces must be valid DNS-1123 labels.`,
        `${path}.namespace`,
        'error',
        'INVALID_NAMESPACE'
      ));
    }

    if (typeof name !== 'string' || name === '') {
      errors.push(this.createError('Name must be a non-empty string', `${path}.name`, 'error', 'INVALID_NAME'));
    } else if (!isDnsLabel(name)) {
      errors.push(this.createError(
        `Invalid name '${name}'. Names must be valid DNS-1123 labels.`,
        `${path}.name`,
        'error',
        'INVALID_NAME'
      ));
    }

    if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
      errors.push(this.createError('Port must be an integer between 1 and 65535', `${path}.port`, 'error', 'INVALID_PORT'));
    }

    if (servicePortName !== undefined && typeof servicePortName !== 'string') {
      errors.push(this.createError('Service port name must be a string', `${path}.servicePortName`, 'error', 'INVALID_SERVICE_PORT_NAME'));
    }

    if (loadBalancerStrategy !== undefined) {
      if (typeof loadBalancerStrategy !== 'string') {
        errors.push(this.createError(
          'Load balancer strategy must be a string',
          `${path}.loadBalancerStrategy`,
          'error',
          'INVALID_LB_STRATEGY'
        ));
      } else if (loadBalancerStrategy !== '' && !isLoadBalancerStrategy(loadBalancerStrategy)) {
        errors.push(this.createError(
          `Unknown load balancer strategy '${loadBalancerStrategy}', falling back to RoundRobin`,
          `${path}.loadBalancerStrategy`,
          'warning',
          'UNKNOWN_LB_STRATEGY'
        ));
      }
    }

    const hc = healthCheck === undefined ? undefined : this.parseHealthCheck(healthCheck, `${path}.healthCheck`, errors);

    const after = errors.filter(e => e.severity === 'error').length;
    if (after > before || typeof namespace !== 'string' || typeof name !== 'string' || typeof port !== 'number') {
      return undefined;
    }

    const backend: BackendDescriptor = { namespace, name, port };
    if (typeof servicePortName === 'string') {
      backend.servicePortName = servicePortName;
    }
    if (typeof loadBalancerStrategy === 'string') {
      backend.loadBalancerStrategy = loadBalancerStrategy;
    }
    if (hc) {
      backend.healthCheck = hc;
    }
    return backend;
  }

  private static parseHealthCheck(value: unknown, path: string, errors: ValidationError[]): HealthCheck | undefined {
    if (!isRecord(value)) {
      errors.push(this.createError('Health check must be a mapping', path, 'error', 'INVALID_HEALTH_CHECK'));
      return undefined;
    }

    const hc: HealthCheck = {};

    if (value.path !== undefined) {
      if (typeof value.path === 'string') {
        hc.path = value.path;
      } else {
        errors.push(this.createError('Health check path must be a string', `${path}.path`, 'error', 'INVALID_HEALTH_CHECK_PATH'));
      }
    }

    for (const field of HEALTH_CHECK_COUNTERS) {
      const counter = value[field];
      if (counter === undefined) {
        continue;
      }
      if (typeof counter === 'number' && Number.isInteger(counter) && counter >= 0) {
        hc[field] = counter;
      } else {
        errors.push(this.createError(
          `Health check ${field} must be a non-negative integer`,
          `${path}.${field}`,
          'error',
          'INVALID_HEALTH_CHECK_FIELD'
        ));
      }
    }

    return hc;
  }

  /**
   * Creates a validation result from a list of errors.
   */
  private static createValidationResult(errors: ValidationError[]): ValidationResult {
    const errorCount = errors.filter(e => e.severity === 'error').length;
    const warningCount = errors.filter(e => e.severity === 'warning').length;

    const isValid = errorCount === 0;

    let summary: string;
    if (isValid) {
      if (warningCount > 0) {
        summary = `Validation passed with ${warningCount} warning(s)`;
      } else {
        summary = 'Validation passed successfully';
      }
    } else {
      summary = `Validation failed with ${errorCount} error(s) and ${warningCount} warning(s)`;
    }

    return {
      isValid,
      errors,
      errorCount,
      warningCount,
      summary
    };
  }
}

function isDnsLabel(value: string): boolean {
  return value.length <= DNS_LABEL_MAX_LENGTH && DNS_LABEL_REGEX.test(value);
}

function isRecord(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
