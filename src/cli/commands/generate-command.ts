/**
 * Generate command for Envoy configuration output.
 */

import { Argv, ArgumentsCamelCase } from 'yargs';
import { BaseCommand } from './base-command';
import * as fs from 'fs';
import * as path from 'path';
import { loadBackendsFile } from '../../config/backends-file';
import { buildConfigDocument, toYaml } from '../../envoy/config-document';

interface GenerateArgs {
  file?: string;
  output?: string;
  route?: string;
  accessLog?: string;
  quiet?: boolean;
}

/**
 * Command to generate Envoy clusters and filters from a backends file.
 */
export class GenerateCommand extends BaseCommand {
  public readonly name = 'generate';
  public readonly description = 'Generate Envoy configuration from a backends file';

  public configure(yargs: Argv): Argv {
    return yargs
      .option('file', {
        alias: 'f',
        type: 'string',
        description: 'Path to the YAML backends file',
      })
      .option('output', {
        alias: 'o',
        type: 'string',
        description: 'Output file for the generated YAML (default: stdout)',
      })
      .option('route', {
        type: 'string',
        default: 'ingress_http',
        description: 'RDS route configuration name',
      })
      .option('access-log', {
        type: 'string',
        default: '/dev/stdout',
        description: 'Access log path of the HTTP connection manager',
      })
      .option('quiet', {
        alias: 'q',
        type: 'boolean',
        default: false,
        description: 'Suppress output messages',
      })
      .example('$0 generate -f backends.yaml', 'Print Envoy configuration to stdout')
      .example('$0 generate -f backends.yaml -o envoy.yaml', 'Write Envoy configuration to a file');
  }

  public async execute(args: ArgumentsCamelCase<GenerateArgs>): Promise<void> {
    this.validateArgs(args, ['file']);
    const file = args.file ?? '';
    // status messages would corrupt YAML written to stdout
    const verbose = !args.quiet && args.output !== undefined;

    if (verbose) {
      this.logInfo(`Reading backends from ${file}...`);
    }

    try {
      const { backends, warnings } = await loadBackendsFile(file);
      for (const warning of warnings) {
        this.logWarning(`${warning.path}: ${warning.message}`);
      }

      const document = buildConfigDocument(backends, {
        routeName: args.route ?? 'ingress_http',
        accessLogPath: args.accessLog ?? '/dev/stdout',
      });
      const output = toYaml(document);

      if (args.output === undefined) {
        process.stdout.write(output);
        return;
      }

      const outputPath = path.resolve(args.output);
      await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.promises.writeFile(outputPath, output, 'utf8');

      if (verbose) {
        this.logSuccess(`Generated ${document.clusters.length} cluster(s)`);
        this.logInfo(`Output written to: ${outputPath}`);
      }
    } catch (error) {
      this.logError(`Generation failed: ${error instanceof Error ? error.message : error}`);
      throw error;
    }
  }
}
