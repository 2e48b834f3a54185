import { createScanner } from './scanner.js';
import { SyntaxKind, TokenFlags } from './token-types.js';

/**
 * A token with its span and exact source slice. Tokens are never modified
 * after the scanner emits them.
 */
export interface ExtractedToken {
  readonly kind: SyntaxKind;
  readonly flags: TokenFlags;
  readonly pos: number;
  readonly end: number;
  readonly text: string;
}

/** The ordered token sequence for one input; the last token is always InputEnd. */
export interface TokenizationResult {
  readonly source: string;
  readonly tokens: readonly ExtractedToken[];
}

/**
 * Scan all tokens from the source text
 */
export function tokenize(text: string): TokenizationResult {
  const scanner = createScanner();
  scanner.initText(text);

  const tokens: ExtractedToken[] = [];
  while (true) {
    scanner.scan();
    tokens.push({
      kind: scanner.token,
      flags: scanner.tokenFlags,
      pos: scanner.tokenStart,
      end: scanner.offsetNext,
      text: scanner.tokenText
    });
    if (scanner.token === SyntaxKind.InputEnd) break;
  }

  return { source: text, tokens };
}
