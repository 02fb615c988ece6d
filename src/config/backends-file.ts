/**
 * Loading of backend descriptors from a YAML backends file.
 *
 * A backends file looks like:
 *
 * ```yaml
 * backends:
 *   - namespace: default
 *     name: backend
 *     port: 80
 *     loadBalancerStrategy: Maglev
 *     healthCheck:
 *       path: /healthz
 *       intervalSeconds: 5
 * ```
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { BackendDescriptor } from '../core/types';
import { ValidationError, Validator } from './validator';

/**
 * Backends accepted from a file, with any warnings raised while validating them.
 */
export interface LoadedBackends {
  backends: BackendDescriptor[];
  warnings: ValidationError[];
}

/**
 * Parses and validates the YAML content of a backends file.
 * @param content YAML text
 * @param source Name of the content's origin, used in error messages
 * @returns The accepted backends and validation warnings
 */
export function parseBackends(content: string, source: string = 'backends file'): LoadedBackends {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new Error(`Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = Validator.validateBackendsDocument(document);
  if (!result.isValid) {
    const details = result.errors
      .filter(e => e.severity === 'error')
      .map(e => `  - ${e.path || '<root>'}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid ${source}: ${result.summary}\n${details}`);
  }

  return {
    backends: result.backends,
    warnings: result.errors.filter(e => e.severity === 'warning'),
  };
}

/**
 * Reads a backends file from disk.
 * @param filePath Path to the YAML file
 */
export async function loadBackendsFile(filePath: string): Promise<LoadedBackends> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Backends file not found: ${filePath}`);
  }
  const content = await fs.promises.readFile(filePath, 'utf8');
  return parseBackends(content, filePath);
}
