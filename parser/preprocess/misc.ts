/**
 * Miscellaneous text normalization run before tokenization:
 * comment removal, newline canonicalization, whitespace cleanup,
 * backslash line continuation, tab expansion and blank-run compression.
 */

import { debugLog } from '../debug-log.js';

// Non-greedy so two comments on a page do not swallow the text between them.
const COMMENT = /\[!--[\s\S]*?--\]/g;
const WHITESPACE_LINE = /^\s+$/gm;
const LINE_CONTINUATION = /\\\n/g;
// Runs of three or more newlines, with only whitespace on the lines between them.
// The indentation of the line after the run is left alone.
const BLANK_RUN = /\n(?:[ \t]*\n){2,}/g;
const LEADING_NEWLINES = /^\n+/;
const TRAILING_NEWLINES = /\n+$/;

/**
 * Replaces matches until the text stops changing. Matches are
 * re-searched from the start, since a replacement can form new ones.
 */
function replaceUntilStable(text: string, pattern: RegExp, replacement: string): string {
  let current = text;
  while (true) {
    const next = current.replace(pattern, replacement);
    if (next === current) return current;
    current = next;
  }
}

export function substituteMisc(text: string): string {
  debugLog('preprocess', 'misc substitutions', { length: text.length });

  let result = text.replace(COMMENT, '');

  result = result.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  result = replaceUntilStable(result, WHITESPACE_LINE, '');
  result = result.replace(LINE_CONTINUATION, '');
  result = result.replace(/\t/g, '    ');
  result = replaceUntilStable(result, BLANK_RUN, '\n\n');

  return result.replace(LEADING_NEWLINES, '').replace(TRAILING_NEWLINES, '');
}
