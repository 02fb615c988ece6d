/**
 * Configuration loading and validation.
 */

export { parseBackends, loadBackendsFile, LoadedBackends } from './backends-file';
export {
  Validator,
  ValidationError,
  ValidationResult,
  ValidationSeverity,
  BackendsValidationResult,
} from './validator';
