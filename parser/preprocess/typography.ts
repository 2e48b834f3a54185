/**
 * Typographic substitutions: paired quote marks, French angle quotes and ellipses.
 */

import { debugLog } from '../debug-log.js';

interface SurroundRule {
  pattern: RegExp;
  open: string;
  close: string;
}

const DOUBLE_QUOTES: SurroundRule = { pattern: /``(.*?)''/g, open: '“', close: '”' };
const LOW_DOUBLE_QUOTES: SurroundRule = { pattern: /,,(.*?)''/g, open: '„', close: '”' };
const SINGLE_QUOTES: SurroundRule = { pattern: /`(.*?)'/g, open: '‘', close: '’' };

// A leading run of '>' is a quote marker and is kept; any other '>>' is an angle quote.
const RIGHT_ANGLE = /(^[ \t]*>+)|>>/gm;
const ELLIPSIS = /\.\.\.|\. \. \./g;

function surround(text: string, rule: SurroundRule): string {
  return text.replace(rule.pattern, (_match, inner: string) => rule.open + inner + rule.close);
}

export function substituteTypography(text: string): string {
  debugLog('preprocess', 'typography substitutions', { length: text.length });

  let result = surround(text, DOUBLE_QUOTES);
  result = surround(result, LOW_DOUBLE_QUOTES);
  result = surround(result, SINGLE_QUOTES);

  result = result.replace(/<</g, '«');
  result = result.replace(RIGHT_ANGLE, (_match, quotePrefix: string | undefined) => quotePrefix ?? '»');

  return result.replace(ELLIPSIS, '…');
}
