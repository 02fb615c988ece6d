/**
 * Core exports for kenvoy.
 */

export { truncate } from './truncate';
export { hashname } from './hashname';
export {
  clustername,
  fingerprint,
  canonicalConfig,
  formatDuration,
  IDENTITY_MAX_LENGTH,
  MAX_CLUSTER_NAME_LENGTH,
} from './clustername';
export {
  contentHash,
  NAME_DIGEST_ALGORITHM,
  FINGERPRINT_ALGORITHM,
  SHORT_DIGEST_LENGTH,
  FINGERPRINT_LENGTH,
} from './digest';
export * from './types';
