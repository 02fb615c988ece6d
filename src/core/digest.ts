/**
 * Content digests used to disambiguate generated names.
 *
 * Generated names are compared byte for byte by the proxy between two
 * configuration pushes. Changing either algorithm below renames every
 * cluster previously emitted.
 */

import { createHash } from 'crypto';

/**
 * Algorithm behind the digest appended to truncated name segments.
 */
export const NAME_DIGEST_ALGORITHM = 'sha256';

/**
 * Algorithm behind the configuration fingerprint of a cluster name.
 */
export const FINGERPRINT_ALGORITHM = 'sha1';

/**
 * Number of digest characters appended to a truncated segment.
 */
export const SHORT_DIGEST_LENGTH = 6;

/**
 * Number of digest characters in a configuration fingerprint.
 */
export const FINGERPRINT_LENGTH = 10;

/**
 * Returns the lowercase hex digest of the UTF-8 bytes of `input`.
 */
export function contentHash(algorithm: string, input: string): string {
  return createHash(algorithm).update(input, 'utf8').digest('hex');
}
