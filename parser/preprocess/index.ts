/**
 * Text-level substitution pass run before tokenization.
 *
 * Order: include expansion (when a resolver is given), miscellaneous
 * normalization, `{$name}` variables, then typography.
 */

import { debugLog } from '../debug-log.js';
import { expandIncludes } from './include.js';
import type { IncludeFailure, IncludeOptions, IncludeResolver, PageRef } from './include.js';
import { substituteMisc } from './misc.js';
import { substituteTypography } from './typography.js';
import { substituteVariables } from './variables.js';

export interface PreprocessOptions extends IncludeOptions {
  /** Enables include expansion; without it include markers are left for the parser */
  includeResolver?: IncludeResolver;

  /** Values for `{$name}` markers in the top-level text */
  variables?: Record<string, string>;

  /** Apply typographic substitutions (default: true) */
  typography?: boolean;
}

export interface PreprocessResult {
  text: string;
  pagesIncluded: PageRef[];
  includeFailures: IncludeFailure[];
}

/** Runs every substitution and reports which pages were included. */
export function preprocessWithReport(text: string, options?: PreprocessOptions): PreprocessResult {
  let result = text;
  let pagesIncluded: PageRef[] = [];
  let includeFailures: IncludeFailure[] = [];

  if (options?.includeResolver) {
    const expansion = expandIncludes(result, options.includeResolver, options);
    result = expansion.text;
    pagesIncluded = expansion.pagesIncluded;
    includeFailures = expansion.failures;
  }

  result = substituteMisc(result);

  if (options?.variables) {
    result = substituteVariables(result, options.variables);
  }

  if (options?.typography ?? true) {
    result = substituteTypography(result);
  }

  debugLog('preprocess', 'done', {
    inputLength: text.length,
    outputLength: result.length,
    pagesIncluded: pagesIncluded.length
  });

  return { text: result, pagesIncluded, includeFailures };
}

export function preprocess(text: string, options?: PreprocessOptions): string {
  return preprocessWithReport(text, options).text;
}

export {
  defaultPlaceholder,
  expandIncludes,
  formatPageRef,
  pageKey,
  parseIncludeMarker,
  parsePageRef,
  DEFAULT_MAX_INCLUDE_DEPTH
} from './include.js';
export type {
  IncludeExpansion,
  IncludeFailure,
  IncludeFailureReason,
  IncludeOptions,
  IncludeRef,
  IncludeResolver,
  PageRef
} from './include.js';
export { substituteMisc } from './misc.js';
export { substituteTypography } from './typography.js';
export { substituteVariables } from './variables.js';
