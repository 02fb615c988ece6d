/**
 * Bounded joining of name segments.
 */

import { contentHash, NAME_DIGEST_ALGORITHM, SHORT_DIGEST_LENGTH } from './digest';
import { truncate } from './truncate';

/**
 * Joins `segments` with `/` into a name of about `maxLength` characters.
 *
 * A single segment that does not fit is cut and suffixed with as much of its
 * digest as the limit allows.
 *
 * Several segments are returned joined as they are while the result is
 * shorter than `maxLength`. Otherwise every segment longer than an equal share
 * of the limit is cut to that share and suffixed with a short digest of the
 * whole joined name. Shares are not redistributed, so the bound is only exact
 * when the separators fit in what the segments leave unused.
 *
 * @example
 * hashname(99, 'alpha', 'beta', 'gamma'); // 'alpha/beta/gamma'
 * hashname(19, 'gammagamma', 'betabeta'); // 'ga-edf159/betabeta'
 */
export function hashname(maxLength: number, ...segments: string[]): string {
  if (segments.length === 0) {
    return '';
  }

  if (segments.length === 1) {
    const [segment] = segments;
    return truncate(maxLength, segment, contentHash(NAME_DIGEST_ALGORITHM, segment));
  }

  const joined = segments.join('/');
  if (joined.length < maxLength) {
    return joined;
  }

  const digest = contentHash(NAME_DIGEST_ALGORITHM, joined).substring(0, SHORT_DIGEST_LENGTH);
  const share = Math.floor(maxLength / segments.length);
  return segments.map(segment => truncate(share, segment, digest)).join('/');
}
