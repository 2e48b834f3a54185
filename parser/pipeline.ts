import type { DocumentNode } from './ast-types.js';
import { parse } from './core-parser.js';
import { debugLog } from './debug-log.js';
import type { ParseDiagnostic, ParseOptions } from './parser-interfaces.js';
import type { IncludeFailure, PageRef } from './preprocess/include.js';
import { type PreprocessOptions, preprocessWithReport } from './preprocess/index.js';
import type { TokenizationResult } from './scanner/tokenize.js';
import { tokenize } from './scanner/tokenize.js';

export interface WikitextOptions extends PreprocessOptions, ParseOptions {}

export interface WikitextResult {
  /** Text after substitution; every span in the tree and tokens points into it */
  text: string;
  tokens: TokenizationResult;
  document: DocumentNode;
  diagnostics: ParseDiagnostic[];
  pagesIncluded: PageRef[];
  includeFailures: IncludeFailure[];
}

/**
 * preprocess → tokenize → parse in one call.
 */
export function parseWikitext(text: string, options?: WikitextOptions): WikitextResult {
  const preprocessed = preprocessWithReport(text, options);
  const tokens = tokenize(preprocessed.text);
  const outcome = parse(tokens, {
    enableParentLinking: options?.enableParentLinking,
    maxNestingDepth: options?.maxNestingDepth
  });

  debugLog('parse', 'pipeline done', {
    tokens: tokens.tokens.length,
    blocks: outcome.document.children.length,
    diagnostics: outcome.diagnostics.length
  });

  return {
    text: preprocessed.text,
    tokens,
    document: outcome.document,
    diagnostics: outcome.diagnostics,
    pagesIncluded: preprocessed.pagesIncluded,
    includeFailures: preprocessed.includeFailures
  };
}
