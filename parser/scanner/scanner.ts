/**
 * Wikitext scanner with closure-based state.
 *
 * Every call to scan() either consumes at least one character or emits InputEnd,
 * and consecutive tokens are contiguous, so the token spans cover the input exactly.
 * Nothing is ever rejected: characters that match no rule become String or Other tokens.
 */

import { isDebugEnabled } from '../debug-log.js';
import {
  CharacterCodes,
  isAsciiAlphaNumeric,
  isDelimiterCharacter,
  isLineBreak,
  isWhiteSpace,
  isWhiteSpaceSingleLine
} from './character-codes.js';
import { SyntaxKind, TokenFlags, tokenKindName } from './token-types.js';

export interface Scanner {
  /** Initialize scanner text and reset all state. */
  initText(text: string): void;

  /** Advances to the next token and updates all public token fields. */
  scan(): void;

  /** Fill a diagnostics state object. */
  fillDebugState(state: ScannerDebugState): void;

  /** Current token type. */
  readonly token: SyntaxKind;

  /** Current token text, always the exact source slice. */
  readonly tokenText: string;

  /** Contextual and delimiter flags of the current token. */
  readonly tokenFlags: TokenFlags;

  /** Offset where the current token starts. */
  readonly tokenStart: number;

  /** Where the next token will start (offset into the source). */
  readonly offsetNext: number;
}

/**
 * Debug state interface for zero-allocation diagnostics
 */
export interface ScannerDebugState {
  /** Current absolute position (index) in the source. */
  pos: number;

  /** Current 1-based line number. */
  line: number;

  /** Current 1-based column number. */
  column: number;

  /** True when only whitespace precedes pos on its line. */
  atLineStart: boolean;

  /** True when there was a line break immediately before the current token. */
  precedingLineBreak: boolean;

  currentToken: SyntaxKind;
  currentTokenText: string;
  currentTokenFlags: TokenFlags;
  nextOffset: number;
}

/** Context flags that affect token emission. */
const enum ContextFlags {
  None = 0,

  /** Only whitespace (or a quote prefix) so far on the current line. */
  AtLineStart = 1 << 0,

  /** The previous token was a line or paragraph break. */
  PrecedingLineBreak = 1 << 1,

  /** A quote prefix was already scanned on this line. */
  AfterQuote = 1 << 2,
}

interface FixedToken {
  text: string;
  kind: SyntaxKind;
  provisional: boolean;
}

function fixed(text: string, kind: SyntaxKind, provisional = false): FixedToken {
  return { text, kind, provisional };
}

/**
 * Fixed-text rules, bucketed by first character and ordered longest first
 * so the first hit in a bucket is the maximal munch.
 */
const FIXED_TOKENS: ReadonlyMap<number, readonly FixedToken[]> = buildFixedTable([
  fixed('[[[*', SyntaxKind.LeftLinkSpecial),
  fixed('[[[', SyntaxKind.LeftLink),
  fixed('[[/==]]', SyntaxKind.JustifyAlignClose),
  fixed('[[/>]]', SyntaxKind.RightAlignClose),
  fixed('[[/<]]', SyntaxKind.LeftAlignClose),
  fixed('[[/=]]', SyntaxKind.CenterAlignClose),
  fixed('[[==]]', SyntaxKind.JustifyAlignOpen),
  fixed('[[>]]', SyntaxKind.RightAlignOpen),
  fixed('[[<]]', SyntaxKind.LeftAlignOpen),
  fixed('[[=]]', SyntaxKind.CenterAlignOpen),
  fixed('[[/', SyntaxKind.LeftBlockEnd),
  fixed('[[*', SyntaxKind.LeftBlockSpecial),
  fixed('[[#', SyntaxKind.LeftAnchor),
  fixed('[[', SyntaxKind.LeftBlock),
  fixed('[!--', SyntaxKind.LeftComment),
  fixed('[#', SyntaxKind.LeftBracketAnchor),
  fixed('[*', SyntaxKind.LeftBracketSpecial),
  fixed('[', SyntaxKind.LeftBracket),

  fixed(']]]', SyntaxKind.RightLink),
  fixed(']]', SyntaxKind.RightBlock),
  fixed(']', SyntaxKind.RightBracket),

  fixed('--]', SyntaxKind.RightComment),
  fixed('---', SyntaxKind.TripleDash),
  fixed('--', SyntaxKind.DoubleDash, true),

  fixed('||~', SyntaxKind.TableColumnTitle),
  fixed('||', SyntaxKind.TableColumn),
  fixed('|', SyntaxKind.Pipe),

  fixed('**', SyntaxKind.Bold, true),
  fixed('//', SyntaxKind.Italics, true),
  fixed('__', SyntaxKind.Underline, true),
  fixed('_', SyntaxKind.Underscore),
  fixed('^^', SyntaxKind.Superscript, true),
  fixed(',,', SyntaxKind.Subscript, true),
  fixed('##', SyntaxKind.Color, true),

  fixed('{{', SyntaxKind.LeftMonospace),
  fixed('}}', SyntaxKind.RightMonospace),
  fixed('@@', SyntaxKind.Raw),
  fixed('@<', SyntaxKind.LeftRaw),
  fixed('>@', SyntaxKind.RightRaw),

  fixed('=', SyntaxKind.Equals),
]);

function buildFixedTable(tokens: FixedToken[]): Map<number, FixedToken[]> {
  const table = new Map<number, FixedToken[]>();
  for (const entry of tokens) {
    const first = entry.text.charCodeAt(0);
    const bucket = table.get(first);
    if (bucket) bucket.push(entry);
    else table.set(first, [entry]);
  }
  for (const bucket of table.values()) {
    bucket.sort((a, b) => b.text.length - a.text.length);
  }
  return table;
}

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)+/y;
const URL_PATTERN = /[A-Za-z][A-Za-z0-9+.-]*:\/\/[^\s|\[\]"<>{}]+/y;
const URL_TRAILING_PUNCTUATION = '.,;:!?)\'';

/**
 * Scanner implementation with closure-based architecture
 */
export function createScanner(): Scanner {
  // Scanner state - encapsulated within closure
  let source = '';
  let pos = 0;
  let end = 0;
  let contextFlags: ContextFlags = ContextFlags.AtLineStart;
  let scanDebug = false;

  // Public token fields
  let token: SyntaxKind = SyntaxKind.Unknown;
  let tokenText = '';
  let tokenFlags: TokenFlags = TokenFlags.None;
  let tokenStart = 0;
  let offsetNext = 0;

  function initText(text: string): void {
    source = text;
    pos = 0;
    end = text.length;
    contextFlags = ContextFlags.AtLineStart;
    scanDebug = isDebugEnabled('scan');

    token = SyntaxKind.Unknown;
    tokenText = '';
    tokenFlags = TokenFlags.None;
    tokenStart = 0;
    offsetNext = 0;
  }

  function emitToken(kind: SyntaxKind, start: number, endPos: number, flags: TokenFlags = TokenFlags.None): void {
    token = kind;
    tokenText = source.substring(start, endPos);
    tokenStart = start;
    offsetNext = endPos;
    tokenFlags = flags;

    // Add context-based flags
    if (contextFlags & ContextFlags.PrecedingLineBreak) {
      tokenFlags |= TokenFlags.PrecedingLineBreak;
    }
    if (contextFlags & ContextFlags.AtLineStart) {
      tokenFlags |= TokenFlags.IsAtLineStart;
    }

    pos = endPos;

    // Update line context for the next token
    if (kind === SyntaxKind.LineBreak || kind === SyntaxKind.ParagraphBreak) {
      contextFlags = ContextFlags.AtLineStart | ContextFlags.PrecedingLineBreak;
    } else if (kind === SyntaxKind.Quote) {
      // A quote prefix keeps the line-start context for the content after it
      contextFlags = ContextFlags.AtLineStart | ContextFlags.AfterQuote;
    } else if (kind === SyntaxKind.Whitespace && (contextFlags & ContextFlags.AtLineStart)) {
      contextFlags &= ContextFlags.AtLineStart | ContextFlags.AfterQuote;
    } else {
      contextFlags = ContextFlags.None;
    }

    if (scanDebug) {
      console.log('[SCAN] emit', { kind: tokenKindName(kind), start, end: endPos, text: tokenText, flags: tokenFlags });
    }
  }

  function charAt(at: number): number {
    return at < end ? source.charCodeAt(at) : -1;
  }

  function countRun(start: number, ch: number): number {
    let p = start;
    while (p < end && source.charCodeAt(p) === ch) p++;
    return p - start;
  }

  /** True when only spaces or tabs remain between `from` and the end of the line. */
  function isRestOfLineBlank(from: number): boolean {
    let p = from;
    while (p < end) {
      const ch = source.charCodeAt(p);
      if (isLineBreak(ch)) return true;
      if (!isWhiteSpaceSingleLine(ch)) return false;
      p++;
    }
    return true;
  }

  function skipLineBreak(at: number): number {
    if (source.charCodeAt(at) === CharacterCodes.carriageReturn &&
      charAt(at + 1) === CharacterCodes.lineFeed) {
      return at + 2;
    }
    return at + 1;
  }

  function matchesAt(at: number, text: string): boolean {
    if (at + text.length > end) return false;
    for (let i = 0; i < text.length; i++) {
      if (source.charCodeAt(at + i) !== text.charCodeAt(i)) return false;
    }
    return true;
  }

  function computeFlankingFlags(start: number, endPos: number): TokenFlags {
    let flags = TokenFlags.Provisional;
    const next = charAt(endPos);
    const prev = start > 0 ? source.charCodeAt(start - 1) : -1;
    if (next >= 0 && !isWhiteSpace(next)) flags |= TokenFlags.CanOpen;
    if (prev >= 0 && !isWhiteSpace(prev)) flags |= TokenFlags.CanClose;
    return flags;
  }

  function scanNewline(start: number): void {
    let p = skipLineBreak(start);
    let blank = false;

    // Absorb following whitespace-only lines into a paragraph break
    while (true) {
      let q = p;
      while (q < end && isWhiteSpaceSingleLine(source.charCodeAt(q))) q++;
      if (q < end && isLineBreak(source.charCodeAt(q))) {
        p = skipLineBreak(q);
        blank = true;
      } else {
        break;
      }
    }

    if (blank) emitToken(SyntaxKind.ParagraphBreak, start, p);
    else emitToken(SyntaxKind.LineBreak, start, p);
  }

  function scanWhitespace(start: number): void {
    let p = start + 1;
    while (p < end && isWhiteSpaceSingleLine(source.charCodeAt(p))) p++;
    emitToken(SyntaxKind.Whitespace, start, p);
  }

  /**
   * Constructs recognized only when nothing but indentation precedes them on the line.
   */
  function tryScanLineStart(start: number, ch: number): boolean {
    switch (ch) {
      case CharacterCodes.plus: {
        const run = countRun(start, CharacterCodes.plus);
        if (run > 6) return false;
        let p = start + run;
        if (charAt(p) === CharacterCodes.asterisk) p++;
        if (!isWhiteSpaceSingleLine(charAt(p))) return false;
        emitToken(SyntaxKind.Heading, start, p);
        return true;
      }

      case CharacterCodes.asterisk:
      case CharacterCodes.hash:
        if (!isWhiteSpaceSingleLine(charAt(start + 1))) return false;
        emitToken(ch === CharacterCodes.asterisk ? SyntaxKind.ListBullet : SyntaxKind.ListNumbered, start, start + 1);
        return true;

      case CharacterCodes.greaterThan: {
        // Only the first run on a line is a quote marker; '>@' stays a raw closer
        if (contextFlags & ContextFlags.AfterQuote) return false;
        const run = countRun(start, CharacterCodes.greaterThan);
        if (run === 1 && charAt(start + 1) === CharacterCodes.at) return false;
        emitToken(SyntaxKind.Quote, start, start + run);
        return true;
      }

      case CharacterCodes.minus: {
        const run = countRun(start, CharacterCodes.minus);
        if (run < 4 || !isRestOfLineBlank(start + run)) return false;
        emitToken(SyntaxKind.HorizontalRule, start, start + run);
        return true;
      }

      case CharacterCodes.tilde: {
        const run = countRun(start, CharacterCodes.tilde);
        if (run < 4) return false;
        let p = start + run;
        let kind = SyntaxKind.ClearFloatNeutral;
        switch (charAt(p)) {
          case CharacterCodes.lessThan: kind = SyntaxKind.ClearFloatLeft; p++; break;
          case CharacterCodes.greaterThan: kind = SyntaxKind.ClearFloatRight; p++; break;
          case CharacterCodes.equals: kind = SyntaxKind.ClearFloatCenter; p++; break;
        }
        if (!isRestOfLineBlank(p)) return false;
        emitToken(kind, start, p);
        return true;
      }
    }
    return false;
  }

  function tryScanFixed(start: number, ch: number): boolean {
    // In a run of four or more '[', the surplus leading brackets are plain
    // brackets so the final three open a link.
    if (ch === CharacterCodes.openBracket && countRun(start, ch) >= 4) {
      emitToken(SyntaxKind.LeftBracket, start, start + 1);
      return true;
    }

    const bucket = FIXED_TOKENS.get(ch);
    if (!bucket) return false;

    for (const entry of bucket) {
      if (!matchesAt(start, entry.text)) continue;
      const endPos = start + entry.text.length;
      emitToken(entry.kind, start, endPos, entry.provisional ? computeFlankingFlags(start, endPos) : TokenFlags.None);
      return true;
    }
    return false;
  }

  function matchPattern(pattern: RegExp, start: number): number {
    pattern.lastIndex = start;
    const match = pattern.exec(source);
    return match ? start + match[0].length : -1;
  }

  function scanWord(start: number): void {
    const emailEnd = matchPattern(EMAIL_PATTERN, start);
    if (emailEnd > 0) {
      emitToken(SyntaxKind.Email, start, emailEnd);
      return;
    }

    let urlEnd = matchPattern(URL_PATTERN, start);
    if (urlEnd > 0) {
      const schemeEnd = source.indexOf('://', start) + 3;
      while (urlEnd > schemeEnd + 1 && URL_TRAILING_PUNCTUATION.includes(source.charAt(urlEnd - 1))) {
        urlEnd--;
      }
      emitToken(SyntaxKind.Url, start, urlEnd);
      return;
    }

    let p = start + 1;
    while (p < end && isAsciiAlphaNumeric(source.charCodeAt(p))) p++;
    emitToken(SyntaxKind.Identifier, start, p);
  }

  function scanTextRun(start: number): void {
    let p = start + 1;
    while (p < end) {
      const ch = source.charCodeAt(p);
      if (isWhiteSpace(ch) || isAsciiAlphaNumeric(ch) || isDelimiterCharacter(ch)) break;
      p++;
    }
    emitToken(SyntaxKind.String, start, p);
  }

  function scanImpl(): void {
    if (pos >= end) {
      emitToken(SyntaxKind.InputEnd, end, end);
      return;
    }

    const start = pos;
    const ch = source.charCodeAt(start);

    if (isLineBreak(ch)) {
      scanNewline(start);
      return;
    }

    if (isWhiteSpaceSingleLine(ch)) {
      scanWhitespace(start);
      return;
    }

    if ((contextFlags & ContextFlags.AtLineStart) && tryScanLineStart(start, ch)) {
      return;
    }

    if (tryScanFixed(start, ch)) {
      return;
    }

    if (isAsciiAlphaNumeric(ch)) {
      scanWord(start);
      return;
    }

    if (isDelimiterCharacter(ch)) {
      emitToken(SyntaxKind.Other, start, start + 1);
      return;
    }

    scanTextRun(start);
  }

  function scan(): void {
    const posBefore = pos;
    scanImpl();

    // Safety net: a non-final token must consume input
    if (token !== SyntaxKind.InputEnd && pos === posBefore) {
      emitToken(SyntaxKind.Other, posBefore, posBefore + 1);
    }
  }

  function fillDebugState(state: ScannerDebugState): void {
    let line = 1;
    let lineStart = 0;
    for (let i = 0; i < pos && i < end; i++) {
      if (source.charCodeAt(i) === CharacterCodes.lineFeed) {
        line++;
        lineStart = i + 1;
      }
    }

    state.pos = pos;
    state.line = line;
    state.column = pos - lineStart + 1;
    state.atLineStart = !!(contextFlags & ContextFlags.AtLineStart);
    state.precedingLineBreak = !!(tokenFlags & TokenFlags.PrecedingLineBreak);
    state.currentToken = token;
    state.currentTokenText = tokenText;
    state.currentTokenFlags = tokenFlags;
    state.nextOffset = offsetNext;
  }

  // Return the scanner interface object
  const scanner: Scanner = {
    initText,
    scan,
    fillDebugState,

    get token() { return token; },
    get tokenText() { return tokenText; },
    get tokenFlags() { return tokenFlags; },
    get tokenStart() { return tokenStart; },
    get offsetNext() { return offsetNext; }
  };

  return scanner;
}
