/**
 * Length-bounded truncation of a single name token.
 */

/**
 * Truncates `text` to at most `maxLength` UTF-16 code units.
 *
 * Text that already fits is returned untouched. Otherwise the text is cut and
 * joined to `suffix` with a hyphen. When not even the suffix fits, as much of
 * the suffix as possible is returned and the text is dropped. Cuts never split
 * a surrogate pair, so the result can come out one unit shorter.
 *
 * @example
 * truncate(6, 'quijibo', 'a8c5'); // 'q-a8c5'
 * truncate(4, 'quijibo', 'a8c5'); // 'a8c5'
 */
export function truncate(maxLength: number, text: string, suffix: string): string {
  if (text.length <= maxLength) {
    return text;
  }
  if (maxLength <= suffix.length) {
    return head(suffix, maxLength);
  }
  return `${head(text, maxLength - suffix.length - 1)}-${suffix}`;
}

function head(text: string, length: number): string {
  const cut = text.substring(0, Math.max(length, 0));
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.substring(0, cut.length - 1) : cut;
}
