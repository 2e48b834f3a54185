/**
 * Parser Utilities
 * Helper functions for common parsing operations
 */

import type { PositionMapper, SourcePosition } from './parser-interfaces.js';
import { SyntaxKind, TokenFlags } from './scanner/token-types.js';
import type { ExtractedToken } from './scanner/tokenize.js';

/**
 * Read position over an extracted token stream. The stream always ends with
 * InputEnd, and the cursor never moves past it.
 */
export interface TokenCursor {
  readonly tokens: readonly ExtractedToken[];
  index: number;
}

export function createTokenCursor(tokens: readonly ExtractedToken[]): TokenCursor {
  return { tokens, index: 0 };
}

export function currentToken(cursor: TokenCursor): ExtractedToken {
  return tokenAt(cursor, cursor.index);
}

export function peekToken(cursor: TokenCursor, offset = 1): ExtractedToken {
  return tokenAt(cursor, cursor.index + offset);
}

/** Token at an absolute index; indexes past the end give the final InputEnd. */
export function tokenAt(cursor: TokenCursor, index: number): ExtractedToken {
  const { tokens } = cursor;
  const token = tokens[Math.min(index, tokens.length - 1)];
  if (token) return token;
  // An empty stream still behaves as if it held InputEnd
  return { kind: SyntaxKind.InputEnd, flags: TokenFlags.None, pos: 0, end: 0, text: '' };
}

export function advance(cursor: TokenCursor): ExtractedToken {
  const token = currentToken(cursor);
  if (token.kind !== SyntaxKind.InputEnd) cursor.index++;
  return token;
}

/**
 * Skips spaces and tabs
 */
export function skipTrivia(cursor: TokenCursor): void {
  while (currentToken(cursor).kind === SyntaxKind.Whitespace) {
    cursor.index++;
  }
}

/**
 * Consumes the current token when it is of `kind`
 */
export function parseOptional(cursor: TokenCursor, kind: SyntaxKind): boolean {
  if (currentToken(cursor).kind === kind) {
    advance(cursor);
    return true;
  }
  return false;
}

/**
 * Line break, paragraph break or end of input
 */
export function isLineEnd(token: ExtractedToken): boolean {
  return token.kind === SyntaxKind.LineBreak ||
    token.kind === SyntaxKind.ParagraphBreak ||
    token.kind === SyntaxKind.InputEnd;
}

/**
 * Checks if the token is at line start
 */
export function isAtLineStart(token: ExtractedToken): boolean {
  return !!(token.flags & TokenFlags.IsAtLineStart);
}

/**
 * Index of the first token at or after `from` matching `predicate` before
 * the end of the line, or -1
 */
export function findOnLine(
  cursor: TokenCursor,
  from: number,
  predicate: (token: ExtractedToken) => boolean
): number {
  for (let i = from; i < cursor.tokens.length; i++) {
    const token = tokenAt(cursor, i);
    if (predicate(token)) return i;
    if (isLineEnd(token)) return -1;
  }
  return -1;
}

/**
 * Converts a page name into its URL slug: lowercase, with runs of other
 * characters collapsed to single dashes. A leading underscore and the
 * category separator ':' are kept.
 */
export function normalizePageName(name: string): string {
  let text = name.trim().toLowerCase();
  while (text.startsWith('/')) text = text.slice(1);
  const hidden = text.startsWith('_');

  const slug = text
    .split(':')
    .map(part => part.replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, ''))
    .filter(part => part.length > 0)
    .join(':');

  return hidden ? '_' + slug : slug;
}

/**
 * Offsets at which each line starts
 */
export function computeLineStarts(text: string): number[] {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) lineStarts.push(i + 1);
  }
  return lineStarts;
}

/**
 * Maps an offset to a 1-based line and column using precomputed line starts
 */
export function offsetToPosition(lineStarts: readonly number[], offset: number): SourcePosition {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((lineStarts[mid] ?? 0) <= offset) low = mid;
    else high = mid - 1;
  }
  return { line: low + 1, column: offset - (lineStarts[low] ?? 0) + 1 };
}

export function createPositionMapper(text: string, lineStarts: number[] = computeLineStarts(text)): PositionMapper {
  return {
    offsetToPosition: offset => offsetToPosition(lineStarts, Math.max(0, Math.min(offset, text.length))),
    positionToOffset(line, column) {
      const start = lineStarts[Math.max(0, Math.min(line, lineStarts.length) - 1)] ?? 0;
      return Math.min(start + Math.max(0, column - 1), text.length);
    },
    getLineStarts: () => lineStarts,
    getLineCount: () => lineStarts.length
  };
}
