import { describe, expect, test } from 'vitest';

import {
  advance,
  computeLineStarts,
  createPositionMapper,
  createTokenCursor,
  currentToken,
  findOnLine,
  normalizePageName,
  offsetToPosition,
  parseOptional,
  peekToken,
  skipTrivia,
  tokenAt
} from '../parser-utils.js';
import { SyntaxKind, TokenFlags } from '../scanner/token-types.js';
import { tokenize } from '../scanner/tokenize.js';

describe('normalizePageName', () => {
  test('lowercases and joins words with dashes', () => {
    expect(normalizePageName('Some Page')).toBe('some-page');
  });

  test('drops leading slashes and stray punctuation', () => {
    expect(normalizePageName(' /Foo  Bar! ')).toBe('foo-bar');
  });

  test('keeps the category separator', () => {
    expect(normalizePageName('Category:My Page')).toBe('category:my-page');
  });

  test('keeps a leading underscore', () => {
    expect(normalizePageName('_Hidden page')).toBe('_hidden-page');
  });
});

describe('Positions', () => {
  test('line starts', () => {
    expect(computeLineStarts('ab\ncd')).toEqual([0, 3]);
    expect(computeLineStarts('')).toEqual([0]);
  });

  test('offsets map to 1-based lines and columns', () => {
    const lineStarts = computeLineStarts('ab\ncd');
    expect(offsetToPosition(lineStarts, 0)).toEqual({ line: 1, column: 1 });
    expect(offsetToPosition(lineStarts, 3)).toEqual({ line: 2, column: 1 });
    expect(offsetToPosition(lineStarts, 4)).toEqual({ line: 2, column: 2 });
  });

  test('position mapper', () => {
    const mapper = createPositionMapper('ab\ncd');
    expect(mapper.positionToOffset(2, 2)).toBe(4);
    expect(mapper.positionToOffset(9, 1)).toBe(3);
    expect(mapper.offsetToPosition(99)).toEqual({ line: 2, column: 3 });
    expect(mapper.getLineStarts()).toEqual([0, 3]);
    expect(mapper.getLineCount()).toBe(2);
  });
});

describe('Token cursor', () => {
  test('moves over the stream and stops at InputEnd', () => {
    const cursor = createTokenCursor(tokenize('a b').tokens);
    expect(peekToken(cursor).kind).toBe(SyntaxKind.Whitespace);

    advance(cursor);
    skipTrivia(cursor);
    expect(currentToken(cursor).text).toBe('b');
    expect(parseOptional(cursor, SyntaxKind.Whitespace)).toBe(false);
    expect(parseOptional(cursor, SyntaxKind.Identifier)).toBe(true);

    expect(advance(cursor).kind).toBe(SyntaxKind.InputEnd);
    expect(advance(cursor).kind).toBe(SyntaxKind.InputEnd);
    expect(cursor.index).toBe(3);
  });

  test('indexes outside the stream', () => {
    const cursor = createTokenCursor(tokenize('a b').tokens);
    expect(tokenAt(cursor, 100)).toMatchObject({ kind: SyntaxKind.InputEnd, pos: 3, end: 3 });
    expect(tokenAt(cursor, -1)).toEqual({ kind: SyntaxKind.InputEnd, flags: TokenFlags.None, pos: 0, end: 0, text: '' });
    expect(currentToken(createTokenCursor([])).kind).toBe(SyntaxKind.InputEnd);
  });

  test('findOnLine stops at the end of the line', () => {
    const cursor = createTokenCursor(tokenize('a\nb').tokens);
    const isIdentifier = (kind: SyntaxKind) => kind === SyntaxKind.Identifier;
    expect(findOnLine(cursor, 0, token => isIdentifier(token.kind))).toBe(0);
    expect(findOnLine(cursor, 1, token => isIdentifier(token.kind))).toBe(-1);
  });
});
