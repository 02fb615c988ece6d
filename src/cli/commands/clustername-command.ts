/**
 * Clustername command: prints the Envoy cluster name of a single backend.
 */

import { Argv, ArgumentsCamelCase } from 'yargs';
import { BaseCommand } from './base-command';
import { clustername } from '../../core/clustername';
import { BackendDescriptor, HealthCheck } from '../../core/types';
import { Validator } from '../../config/validator';

interface ClusternameArgs {
  namespace?: string;
  name?: string;
  port?: number;
  lbStrategy?: string;
  healthCheckPath?: string;
  healthCheckInterval?: number;
  healthCheckTimeout?: number;
  unhealthyThreshold?: number;
  healthyThreshold?: number;
}

/**
 * Command to compute the cluster name of a backend from flags.
 */
export class ClusternameCommand extends BaseCommand {
  public readonly name = 'clustername';
  public readonly description = 'Print the Envoy cluster name of a backend';

  public configure(yargs: Argv): Argv {
    return yargs
      .option('namespace', {
        alias: 'n',
        type: 'string',
        description: 'Namespace of the service',
      })
      .option('name', {
        type: 'string',
        description: 'Name of the service',
      })
      .option('port', {
        alias: 'p',
        type: 'number',
        description: 'Service port number',
      })
      .option('lb-strategy', {
        type: 'string',
        description: 'Load balancer strategy (RoundRobin, WeightedLeastRequest, RingHash, Maglev, Random)',
      })
      .option('health-check-path', {
        type: 'string',
        description: 'Health check HTTP path',
      })
      .option('health-check-interval', {
        type: 'number',
        description: 'Health check interval in seconds',
      })
      .option('health-check-timeout', {
        type: 'number',
        description: 'Health check timeout in seconds',
      })
      .option('unhealthy-threshold', {
        type: 'number',
        description: 'Failed checks before an endpoint is unhealthy',
      })
      .option('healthy-threshold', {
        type: 'number',
        description: 'Passed checks before an endpoint is healthy',
      })
      .example('$0 clustername -n default --name backend -p 80', 'Print the name of default/backend:80')
      .example('$0 clustername -n default --name backend -p 80 --lb-strategy Maglev', 'Include a load balancer strategy');
  }

  public async execute(args: ArgumentsCamelCase<ClusternameArgs>): Promise<void> {
    this.validateArgs(args, ['namespace', 'name', 'port']);

    const backend = this.toBackend(args);
    const result = Validator.validateBackendDescriptor(backend, 'backend');
    for (const issue of result.errors.filter(e => e.severity === 'warning')) {
      this.logWarning(issue.message);
    }
    if (!result.isValid) {
      const problems = result.errors
        .filter(e => e.severity === 'error')
        .map(e => `${e.path}: ${e.message}`)
        .join('; ');
      this.logError(result.summary);
      throw new Error(`Invalid backend: ${problems}`);
    }

    console.log(clustername(backend));
  }

  /**
   * Builds a backend descriptor from parsed flags.
   * A health check is attached as soon as one of its flags is given.
   */
  private toBackend(args: ArgumentsCamelCase<ClusternameArgs>): BackendDescriptor {
    const backend: BackendDescriptor = {
      namespace: args.namespace ?? '',
      name: args.name ?? '',
      port: args.port ?? 0,
    };

    if (args.lbStrategy !== undefined) {
      backend.loadBalancerStrategy = args.lbStrategy;
    }

    const healthCheck: HealthCheck = {};
    if (args.healthCheckPath !== undefined) healthCheck.path = args.healthCheckPath;
    if (args.healthCheckInterval !== undefined) healthCheck.intervalSeconds = args.healthCheckInterval;
    if (args.healthCheckTimeout !== undefined) healthCheck.timeoutSeconds = args.healthCheckTimeout;
    if (args.unhealthyThreshold !== undefined) healthCheck.unhealthyThresholdCount = args.unhealthyThreshold;
    if (args.healthyThreshold !== undefined) healthCheck.healthyThresholdCount = args.healthyThreshold;

    if (Object.keys(healthCheck).length > 0) {
      backend.healthCheck = healthCheck;
    }

    return backend;
  }
}
