/**
 * Text normalizer
 * Canonical form for message text before it is written anywhere
 */

const BULLET = '•';
const TAB_WIDTH = '    ';

// `\s` plus NEL and the information separators U+001C..U+001F
const EDGE_WHITESPACE = /^[\s\u0085\x1c-\x1f]+|[\s\u0085\x1c-\x1f]+$/g;

/**
 * Strip leading and trailing whitespace, including characters that
 * `String.prototype.trim` keeps (U+0085, U+001C..U+001F)
 */
export function trimWhitespace(input: string): string {
  return input.replace(EDGE_WHITESPACE, '');
}

/**
 * Clean and normalize raw message text.
 *
 * Applied in order: NFKC, line endings, tab and bullet spacing, non-breaking
 * spaces, trailing quote runs, blank-line runs, outer whitespace.
 * The result has no leading or trailing whitespace and never contains three
 * consecutive line feeds. `cleanText(cleanText(s)) === cleanText(s)`.
 */
export function cleanText(input: string | null | undefined): string {
  if (input == null) return '';

  let s = input.normalize('NFKC');

  s = s.replace(/\r\n?/g, '\n');

  s = s.replaceAll(`\t${BULLET}`, BULLET).replaceAll('\t', TAB_WIDTH);
  // A bullet keeps exactly one space after it, however many followed.
  s = s.replace(new RegExp(`${BULLET} {2,}`, 'g'), `${BULLET} `);

  s = s.replaceAll('\u00A0', ' ');

  s = trimWhitespace(s).replace(/""+$/, '"');

  s = s.replace(/\n{3,}/g, '\n\n');

  return trimWhitespace(s);
}
