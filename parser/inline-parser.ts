/**
 * Inline content: formatting spans, links, raw text and inline blocks.
 *
 * Open spans live on an explicit stack. Provisional delimiters are resolved
 * against it as they arrive: a delimiter that can close an open span of its
 * kind closes it, otherwise one that can open starts a new span. Anything
 * that cannot take part in a construct is kept as literal text, and adjacent
 * literal text merges into a single text node.
 */

import {
  createAnchorNode,
  createColorNode,
  createEmailNode,
  createFootnoteNode,
  createFormattingNode,
  createInlineContainerNode,
  createLineBreakNode,
  createLinkNode,
  createRawNode,
  createSizeNode,
  createTextNode
} from './ast-factory.js';
import {
  type ColorNode,
  type FootnoteNode,
  type FormattingKind,
  type FormattingNode,
  type InlineContainerNode,
  type InlineNode,
  type LinkType,
  type SizeNode,
  type TextNode,
  NodeFlags,
  NodeKind
} from './ast-types.js';
import {
  type BlockHead,
  type BlockRuleMatch,
  createPlaceholderFromHead,
  createUnrecognizedFromHead,
  findBlockRule,
  parseBlockArguments,
  readBlockHead
} from './block-rules.js';
import { type DiagnosticContext, ParseErrorCode } from './parser-interfaces.js';
import { type TokenCursor, currentToken, isLineEnd, normalizePageName, tokenAt } from './parser-utils.js';
import { SyntaxKind, TokenFlags } from './scanner/token-types.js';
import type { ExtractedToken } from './scanner/tokenize.js';

/**
 * What the inline parser needs from the block level
 */
export interface InlineContext {
  readonly source: string;
  readonly cursor: TokenCursor;
  readonly maxNestingDepth: number;

  report(code: ParseErrorCode, pos: number, end: number, subject: string, context?: DiagnosticContext): void;

  /** True when the token at `index` closes an explicit block that is open on the block stack */
  isBlockBoundaryAt(index: number): boolean;

  /** True when no further explicit block may open */
  isBlockNestingFull(): boolean;

  /** Footnotes are numbered from 1 in document order */
  nextFootnoteIndex(): number;
}

/**
 * Why parseLine() stopped:
 * - line-end: at a line break, paragraph break or end of input
 * - delimiter: at a token matching the caller's stop predicate
 * - boundary: at the closer of an open explicit block
 */
export type InlineStop = 'line-end' | 'delimiter' | 'boundary';

export interface InlineLineResult {
  stop: InlineStop;
  /** The line ended with a forced line break (` _`) */
  forcedBreak: boolean;
}

export interface InlineContent {
  children: InlineNode[];
  /** End of the last child, or the start position when there is none */
  end: number;
}

type SpanNode = FormattingNode | ColorNode | InlineContainerNode | SizeNode | FootnoteNode;

interface OpenSpan {
  node: SpanNode;
  /** Token kind of a delimiter closer, or the block name for `[[/name]]` */
  closer: SyntaxKind | string;
  subject: string;
  openerPos: number;
  openerEnd: number;
  stripLineBreaks: boolean;
}

const DELIMITER_KINDS: ReadonlyMap<SyntaxKind, FormattingKind> = new Map([
  [SyntaxKind.Bold, NodeKind.Bold],
  [SyntaxKind.Italics, NodeKind.Italic],
  [SyntaxKind.Underline, NodeKind.Underline],
  [SyntaxKind.Superscript, NodeKind.Superscript],
  [SyntaxKind.Subscript, NodeKind.Subscript],
  [SyntaxKind.DoubleDash, NodeKind.Strikethrough],
]);

const URL_TARGET = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;

function canOpen(token: ExtractedToken): boolean {
  return !!(token.flags & TokenFlags.CanOpen);
}

function canClose(token: ExtractedToken): boolean {
  return !!(token.flags & TokenFlags.CanClose);
}

function isAlignToken(kind: SyntaxKind): boolean {
  return kind >= SyntaxKind.RightAlignOpen && kind <= SyntaxKind.JustifyAlignClose;
}

function isAlignCloser(kind: SyntaxKind): boolean {
  return kind === SyntaxKind.RightAlignClose ||
    kind === SyntaxKind.LeftAlignClose ||
    kind === SyntaxKind.CenterAlignClose ||
    kind === SyntaxKind.JustifyAlignClose;
}

/**
 * Builds the inline children of one paragraph, heading, list item or table cell.
 * It may be fed several lines; finish() closes whatever is still open.
 */
export class InlineParser {
  private readonly root: InlineNode[] = [];
  private readonly open: OpenSpan[] = [];
  private stop: ((token: ExtractedToken) => boolean) | undefined;
  private forcedBreak = false;
  private lastEnd: number;

  constructor(private readonly context: InlineContext, private readonly startPos: number) {
    this.lastEnd = startPos;
  }

  /**
   * Consumes tokens up to the end of the line, a token matching `stop`, or the
   * closer of an open explicit block. The stopping token is not consumed.
   */
  parseLine(stop?: (token: ExtractedToken) => boolean): InlineLineResult {
    const cursor = this.context.cursor;
    this.stop = stop;
    this.forcedBreak = false;

    while (true) {
      const token = currentToken(cursor);
      if (isLineEnd(token)) return { stop: 'line-end', forcedBreak: this.forcedBreak };
      if (stop?.(token)) return { stop: 'delimiter', forcedBreak: false };
      if (this.context.isBlockBoundaryAt(cursor.index)) return { stop: 'boundary', forcedBreak: false };

      this.forcedBreak = false;
      const before = cursor.index;
      this.parseToken(token);
      if (cursor.index === before) {
        // Every handler consumes; this keeps the loop finite regardless
        cursor.index++;
        this.appendText(token.pos, token.end);
      }
    }
  }

  /** A line break between two lines of the same paragraph. */
  appendLineBreak(token: ExtractedToken): void {
    this.append(createLineBreakNode(token.pos, token.end));
  }

  /**
   * Auto-closes every open span and returns the finished children.
   */
  finish(): InlineContent {
    this.trimTrailingWhitespace();
    while (this.open.length) {
      const span = this.open.pop();
      if (span) this.autoClose(span);
    }

    const final = this.root[this.root.length - 1];
    return { children: this.root, end: final ? final.end : this.startPos };
  }

  /**
   * Trailing whitespace carries no content. The last text appended sits in
   * the innermost open span, so spans auto-closed after this end before it.
   */
  private trimTrailingWhitespace(): void {
    const children = this.children;
    const last = children[children.length - 1];
    if (last?.kind !== NodeKind.Text) return;
    if (trimTextEnd(last)) {
      this.lastEnd = last.end;
      return;
    }

    children.pop();
    const previous = children[children.length - 1];
    const top = this.open[this.open.length - 1];
    this.lastEnd = previous ? previous.end : top ? top.openerEnd : this.startPos;
  }

  private parseToken(token: ExtractedToken): void {
    const formatting = DELIMITER_KINDS.get(token.kind);
    if (formatting) {
      this.parseDelimiter(token, formatting);
      return;
    }

    switch (token.kind) {
      case SyntaxKind.Color:
        this.parseColor(token);
        return;

      case SyntaxKind.LeftMonospace:
        this.context.cursor.index++;
        this.openSpan(createFormattingNode(NodeKind.Monospace, token.pos, token.end), SyntaxKind.RightMonospace, '{{', token.pos, token.end, false);
        return;

      case SyntaxKind.RightMonospace:
        this.context.cursor.index++;
        this.closeOrLiteral(SyntaxKind.RightMonospace, token.pos, token.end, '}}');
        return;

      case SyntaxKind.Raw:
        this.parseRaw(token);
        return;

      case SyntaxKind.LeftRaw:
        this.parseAngleRaw(token);
        return;

      case SyntaxKind.LeftComment:
        this.parseComment(token);
        return;

      case SyntaxKind.LeftLink:
      case SyntaxKind.LeftLinkSpecial:
        this.parseTripleLink(token);
        return;

      case SyntaxKind.LeftBracket:
      case SyntaxKind.LeftBracketSpecial:
        this.parseSingleLink(token);
        return;

      case SyntaxKind.LeftBracketAnchor:
        this.parseAnchorLink(token);
        return;

      case SyntaxKind.LeftAnchor:
        this.parseAnchor(token);
        return;

      case SyntaxKind.LeftBlock:
      case SyntaxKind.LeftBlockEnd:
      case SyntaxKind.LeftBlockSpecial:
        this.parseBlock(token);
        return;

      case SyntaxKind.Url:
        this.context.cursor.index++;
        this.append(createLinkNode(token.pos, token.end, { linkType: 'url', target: token.text, url: token.text }));
        return;

      case SyntaxKind.Email:
        this.context.cursor.index++;
        this.append(createEmailNode(token.pos, token.end, token.text));
        return;

      case SyntaxKind.Underscore:
        this.parseUnderscore(token);
        return;
    }

    this.context.cursor.index++;
    if (isAlignCloser(token.kind)) {
      // Alignment blocks only open and close at block level
      this.context.report(ParseErrorCode.UnmatchedClosingMarker, token.pos, token.end, token.text);
    } else if (isAlignToken(token.kind) && !this.context.isBlockNestingFull()) {
      this.context.report(ParseErrorCode.MalformedConstruct, token.pos, token.end, token.text);
    }
    this.appendText(token.pos, token.end);
  }

  // ---------------------------------------------------------------------------
  // Spans
  // ---------------------------------------------------------------------------

  private get children(): InlineNode[] {
    const top = this.open[this.open.length - 1];
    return top ? top.node.children : this.root;
  }

  private append(node: InlineNode): void {
    this.children.push(node);
    this.lastEnd = node.end;
  }

  private appendText(pos: number, end: number): void {
    const children = this.children;
    const last = children[children.length - 1];
    if (last?.kind === NodeKind.Text && last.end === pos) {
      last.end = end;
      last.text = this.context.source.slice(last.pos, end);
    } else {
      children.push(createTextNode(pos, end, this.context.source.slice(pos, end)));
    }
    this.lastEnd = end;
  }

  /**
   * Pushes a span. Past the nesting limit the opener is kept as text instead.
   */
  private openSpan(
    node: SpanNode,
    closer: SyntaxKind | string,
    subject: string,
    openerPos: number,
    openerEnd: number,
    stripLineBreaks: boolean
  ): void {
    if (this.open.length >= this.context.maxNestingDepth) {
      this.appendText(openerPos, openerEnd);
      return;
    }
    this.children.push(node);
    this.open.push({ node, closer, subject, openerPos, openerEnd, stripLineBreaks });
    this.lastEnd = openerEnd;
  }

  private findOpen(closer: SyntaxKind | string): number {
    for (let i = this.open.length - 1; i >= 0; i--) {
      if (this.open[i]?.closer === closer) return i;
    }
    return -1;
  }

  /**
   * Closes the span at `index`; spans opened inside it are auto-closed first.
   */
  private closeSpan(index: number, closerEnd: number): void {
    while (this.open.length > index + 1) {
      const inner = this.open.pop();
      if (inner) this.autoClose(inner);
    }
    const span = this.open.pop();
    if (!span) return;
    span.node.end = closerEnd;
    if (span.stripLineBreaks) stripLineBreaks(span.node);
    this.lastEnd = closerEnd;
  }

  private autoClose(span: OpenSpan): void {
    this.context.report(ParseErrorCode.UnclosedBlockAutoClosed, span.openerPos, span.openerEnd, span.subject);
    span.node.end = Math.max(span.openerEnd, this.lastEnd);
    span.node.flags |= NodeFlags.AutoClosed | NodeFlags.ContainsError;
    if (span.stripLineBreaks) stripLineBreaks(span.node);
  }

  private closeOrLiteral(closer: SyntaxKind | string, pos: number, end: number, subject: string): void {
    const index = this.findOpen(closer);
    if (index >= 0) {
      this.closeSpan(index, end);
    } else {
      this.context.report(ParseErrorCode.UnmatchedClosingMarker, pos, end, subject);
      this.appendText(pos, end);
    }
  }

  /**
   * `**`, `//`, `__`, `^^`, `,,` and `--`. Closing an open span of the same kind
   * wins over opening a new one.
   */
  private parseDelimiter(token: ExtractedToken, kind: FormattingKind): void {
    this.context.cursor.index++;

    const index = this.findOpen(token.kind);
    if (index >= 0 && canClose(token)) {
      this.closeSpan(index, token.end);
    } else if (canOpen(token)) {
      this.openSpan(createFormattingNode(kind, token.pos, token.end), token.kind, token.text, token.pos, token.end, false);
    } else {
      if (canClose(token)) {
        this.context.report(ParseErrorCode.UnmatchedClosingMarker, token.pos, token.end, token.text);
      }
      this.appendText(token.pos, token.end);
    }
  }

  /**
   * `##color|text##`
   */
  private parseColor(token: ExtractedToken): void {
    const cursor = this.context.cursor;

    const index = this.findOpen(SyntaxKind.Color);
    if (index >= 0 && canClose(token)) {
      cursor.index++;
      this.closeSpan(index, token.end);
      return;
    }

    if (!canOpen(token)) {
      cursor.index++;
      if (canClose(token)) {
        this.context.report(ParseErrorCode.UnmatchedClosingMarker, token.pos, token.end, token.text);
      }
      this.appendText(token.pos, token.end);
      return;
    }

    const pipeIndex = this.findInWindow(cursor.index + 1, t => t.kind === SyntaxKind.Pipe || t.kind === SyntaxKind.Color);
    const pipe = tokenAt(cursor, pipeIndex);
    const color = pipeIndex < 0 ? '' : this.context.source.slice(token.end, pipe.pos).trim();
    if (pipe.kind !== SyntaxKind.Pipe || !color || /\s/.test(color)) {
      cursor.index++;
      this.context.report(ParseErrorCode.MalformedConstruct, token.pos, token.end, token.text);
      this.appendText(token.pos, token.end);
      return;
    }

    cursor.index = pipeIndex + 1;
    this.openSpan(createColorNode(token.pos, pipe.end, color), SyntaxKind.Color, token.text, token.pos, pipe.end, false);
  }

  // ---------------------------------------------------------------------------
  // Windows: constructs closed on the same line
  // ---------------------------------------------------------------------------

  /** Windows end with the line, the caller's delimiter, or an open block's closer. */
  private endsWindow(index: number): boolean {
    const token = tokenAt(this.context.cursor, index);
    return isLineEnd(token) || !!this.stop?.(token) || this.context.isBlockBoundaryAt(index);
  }

  /**
   * Index of the first token from `from` matching `predicate`, or -1 when the
   * window ends first.
   */
  private findInWindow(from: number, predicate: (token: ExtractedToken) => boolean): number {
    const cursor = this.context.cursor;
    for (let i = from; i < cursor.tokens.length; i++) {
      const token = tokenAt(cursor, i);
      if (predicate(token)) return i;
      if (this.endsWindow(i)) return -1;
    }
    return -1;
  }

  /**
   * A window that failed after its opener committed: everything from the
   * opener to the end of the window becomes one literal text run.
   */
  private degrade(startIndex: number, subject: string): void {
    const cursor = this.context.cursor;
    let limit = startIndex + 1;
    while (limit < cursor.tokens.length && !this.endsWindow(limit)) limit++;

    const first = tokenAt(cursor, startIndex);
    const last = tokenAt(cursor, limit - 1);
    this.context.report(ParseErrorCode.MalformedConstruct, first.pos, last.end, subject);
    this.appendText(first.pos, last.end);
    cursor.index = limit;
  }

  /**
   * `@@text@@`, with `@@@@@@` giving a literal `@@`
   */
  private parseRaw(token: ExtractedToken): void {
    const cursor = this.context.cursor;
    const start = cursor.index;

    const second = tokenAt(cursor, start + 1);
    const third = tokenAt(cursor, start + 2);
    if (second.kind === SyntaxKind.Raw && third.kind === SyntaxKind.Raw &&
      second.pos === token.end && third.pos === second.end) {
      cursor.index = start + 3;
      this.append(createRawNode(token.pos, third.end, '@@'));
      return;
    }

    const closeIndex = this.findInWindow(start + 1, t => t.kind === SyntaxKind.Raw);
    if (closeIndex < 0) {
      this.degrade(start, '@@');
      return;
    }
    const closer = tokenAt(cursor, closeIndex);
    cursor.index = closeIndex + 1;
    this.append(createRawNode(token.pos, closer.end, this.context.source.slice(token.end, closer.pos)));
  }

  /**
   * `@<text>@`
   */
  private parseAngleRaw(token: ExtractedToken): void {
    const cursor = this.context.cursor;
    const start = cursor.index;
    const closeIndex = this.findInWindow(start + 1, t => t.kind === SyntaxKind.RightRaw);
    if (closeIndex < 0) {
      this.degrade(start, '@<');
      return;
    }
    const closer = tokenAt(cursor, closeIndex);
    cursor.index = closeIndex + 1;
    this.append(createRawNode(token.pos, closer.end, this.context.source.slice(token.end, closer.pos)));
  }

  /**
   * `[!-- ... --]` produces nothing. Comments may run across lines.
   */
  private parseComment(token: ExtractedToken): void {
    const cursor = this.context.cursor;
    for (let i = cursor.index + 1; i < cursor.tokens.length; i++) {
      if (tokenAt(cursor, i).kind === SyntaxKind.RightComment) {
        cursor.index = i + 1;
        return;
      }
    }
    cursor.index++;
    this.context.report(ParseErrorCode.MalformedConstruct, token.pos, token.end, token.text);
    this.appendText(token.pos, token.end);
  }

  /**
   * `[[[target]]]`, `[[[target | label]]]`, `[[[target|]]]` and `[[[*target]]]`
   */
  private parseTripleLink(token: ExtractedToken): void {
    const cursor = this.context.cursor;
    const source = this.context.source;
    const start = cursor.index;
    const subject = token.text;

    const splitIndex = this.findInWindow(start + 1, t => t.kind === SyntaxKind.Pipe || t.kind === SyntaxKind.RightLink);
    if (splitIndex < 0) {
      this.degrade(start, subject);
      return;
    }
    const split = tokenAt(cursor, splitIndex);
    const target = source.slice(token.end, split.pos).trim();

    let closeIndex = splitIndex;
    let label: string | undefined;
    if (split.kind === SyntaxKind.Pipe) {
      closeIndex = this.findInWindow(splitIndex + 1, t => t.kind === SyntaxKind.RightLink);
      if (closeIndex < 0) {
        this.degrade(start, subject);
        return;
      }
      label = source.slice(split.end, tokenAt(cursor, closeIndex).pos).trim();
    }

    if (!target) {
      this.degrade(start, subject);
      return;
    }

    const closer = tokenAt(cursor, closeIndex);
    cursor.index = closeIndex + 1;
    const { linkType, url } = resolveLinkTarget(target);
    this.append(createLinkNode(token.pos, closer.end, {
      linkType,
      target,
      url,
      label: label || undefined,
      labelFromPage: label === '',
      newTab: token.kind === SyntaxKind.LeftLinkSpecial
    }));
  }

  /**
   * `[url label]` and `[*url label]`. Without a URL right after the bracket
   * it is plain text.
   */
  private parseSingleLink(token: ExtractedToken): void {
    const cursor = this.context.cursor;
    const start = cursor.index;
    const urlToken = tokenAt(cursor, start + 1);
    if (urlToken.kind !== SyntaxKind.Url || urlToken.pos !== token.end) {
      cursor.index++;
      this.appendText(token.pos, token.end);
      return;
    }

    const closeIndex = this.findInWindow(start + 2, t => t.kind === SyntaxKind.RightBracket);
    if (closeIndex < 0) {
      this.degrade(start, token.text);
      return;
    }
    const closer = tokenAt(cursor, closeIndex);
    const label = this.context.source.slice(urlToken.end, closer.pos).trim();
    cursor.index = closeIndex + 1;
    this.append(createLinkNode(token.pos, closer.end, {
      linkType: 'url',
      target: urlToken.text,
      url: urlToken.text,
      label: label || undefined,
      newTab: token.kind === SyntaxKind.LeftBracketSpecial
    }));
  }

  /**
   * `[#anchor label]`
   */
  private parseAnchorLink(token: ExtractedToken): void {
    const cursor = this.context.cursor;
    const start = cursor.index;
    const next = tokenAt(cursor, start + 1);
    if (next.kind === SyntaxKind.Whitespace || this.endsWindow(start + 1)) {
      cursor.index++;
      this.appendText(token.pos, token.end);
      return;
    }

    const closeIndex = this.findInWindow(start + 1, t => t.kind === SyntaxKind.RightBracket);
    if (closeIndex < 0) {
      this.degrade(start, token.text);
      return;
    }
    const closer = tokenAt(cursor, closeIndex);
    const inner = this.context.source.slice(token.end, closer.pos);
    const nameMatch = /^\S+/.exec(inner);
    const name = nameMatch ? nameMatch[0] : '';
    const label = inner.slice(name.length).trim();
    cursor.index = closeIndex + 1;
    this.append(createLinkNode(token.pos, closer.end, {
      linkType: 'anchor',
      target: name,
      url: '#' + name,
      label: label || undefined
    }));
  }

  /**
   * `[[# name]]`
   */
  private parseAnchor(token: ExtractedToken): void {
    const cursor = this.context.cursor;
    const start = cursor.index;
    const closeIndex = this.findInWindow(start + 1, t => t.kind === SyntaxKind.RightBlock);
    const closer = tokenAt(cursor, closeIndex);
    const name = closeIndex < 0 ? '' : this.context.source.slice(token.end, closer.pos).trim();
    if (!name || /\s/.test(name)) {
      this.degrade(start, token.text);
      return;
    }
    cursor.index = closeIndex + 1;
    this.append(createAnchorNode(token.pos, closer.end, name));
  }

  /**
   * ` _` at the end of a line
   */
  private parseUnderscore(token: ExtractedToken): void {
    const cursor = this.context.cursor;
    const previous = cursor.index > 0 ? tokenAt(cursor, cursor.index - 1) : undefined;
    const next = tokenAt(cursor, cursor.index + 1);
    cursor.index++;

    if (previous?.kind === SyntaxKind.Whitespace && previous.end === token.pos && isLineEnd(next)) {
      this.append(createLineBreakNode(token.pos, token.end));
      this.forcedBreak = true;
    } else {
      this.appendText(token.pos, token.end);
    }
  }

  // ---------------------------------------------------------------------------
  // Named blocks in inline position
  // ---------------------------------------------------------------------------

  private parseBlock(token: ExtractedToken): void {
    const cursor = this.context.cursor;
    const head = readBlockHead(cursor, cursor.index, this.context.source);
    if (!head) {
      this.degrade(cursor.index, token.text);
      return;
    }
    cursor.index = head.nextIndex;

    const match = head.flavor === 'special' ? undefined : findBlockRule(head.name, head.stripped);
    if (!match) {
      this.context.report(ParseErrorCode.MalformedConstruct, head.pos, head.end, head.name);
      this.append(createUnrecognizedFromHead(head, this.context.source));
      return;
    }

    if (match.deprecated) {
      this.context.report(ParseErrorCode.DeprecatedConstruct, head.pos, head.end, head.name, { replacement: match.name });
    }

    switch (match.rule.level) {
      case 'placeholder':
        if (head.flavor === 'open') {
          this.append(createPlaceholderFromHead(head, match.rule.kind));
        } else {
          this.context.report(ParseErrorCode.UnmatchedClosingMarker, head.pos, head.end, match.name);
          this.appendText(head.pos, head.end);
        }
        return;

      case 'inline':
        if (head.flavor === 'open') this.openInlineBlock(head, match);
        else this.closeOrLiteral(match.name, head.pos, head.end, match.name);
        return;

      case 'block':
      case 'raw':
        if (head.flavor === 'open' && match.rule.level === 'block' && this.context.isBlockNestingFull()) {
          // Past the nesting limit the opener is kept as text
          this.appendText(head.pos, head.end);
          return;
        }
        // Block-level names only open or close blocks at the start of a line
        this.context.report(
          head.flavor === 'close' ? ParseErrorCode.UnmatchedClosingMarker : ParseErrorCode.MalformedConstruct,
          head.pos, head.end, match.name);
        this.appendText(head.pos, head.end);
        return;
    }
  }

  private openInlineBlock(head: BlockHead, match: BlockRuleMatch): void {
    if (match.rule.kind === 'footnote') {
      this.openFootnote(head, match);
      return;
    }

    if (match.rule.kind === 'size') {
      const size = head.argumentText.trim();
      if (!size) {
        this.context.report(ParseErrorCode.MalformedConstruct, head.pos, head.end, match.name);
        this.appendText(head.pos, head.end);
        return;
      }
      this.openSpan(createSizeNode(head.pos, head.end, size), match.name, match.name, head.pos, head.end, false);
      return;
    }

    const element = match.rule.element ?? 'span';
    const node = createInlineContainerNode(head.pos, head.end, element, parseBlockArguments(head.argumentText));
    this.openSpan(node, match.name, match.name, head.pos, head.end, head.stripped);
  }

  /**
   * `[[footnote]]` takes the whitespace before it. Its body may run across
   * lines; footnotes do not nest.
   */
  private openFootnote(head: BlockHead, match: BlockRuleMatch): void {
    if (this.findOpen(match.name) >= 0) {
      this.context.report(ParseErrorCode.MalformedConstruct, head.pos, head.end, match.name);
      this.appendText(head.pos, head.end);
      return;
    }
    if (this.open.length >= this.context.maxNestingDepth) {
      this.appendText(head.pos, head.end);
      return;
    }

    const children = this.children;
    const last = children[children.length - 1];
    if (last?.kind === NodeKind.Text && last.end === head.pos && !trimTextEnd(last)) children.pop();

    this.openSpan(createFootnoteNode(head.pos, head.end, this.context.nextFootnoteIndex()), match.name, match.name, head.pos, head.end, true);
  }
}

/** Drops trailing whitespace. False when nothing is left. */
function trimTextEnd(node: TextNode): boolean {
  const trimmed = node.text.replace(/\s+$/, '');
  node.end = node.pos + trimmed.length;
  node.text = trimmed;
  return trimmed.length > 0;
}

/** `span_` and footnotes drop line breaks at the edges of their content. */
function stripLineBreaks(node: SpanNode): void {
  const children = node.children;
  while (children[0]?.kind === NodeKind.LineBreak) children.shift();
  while (children[children.length - 1]?.kind === NodeKind.LineBreak) children.pop();
}

/**
 * Classifies a link target: absolute URL, `#anchor`, or page name
 * (optionally with `#anchor`), which is normalized to its slug.
 */
export function resolveLinkTarget(target: string): { linkType: LinkType; url: string } {
  if (URL_TARGET.test(target)) return { linkType: 'url', url: target };
  if (target.startsWith('#')) return { linkType: 'anchor', url: target };

  const hash = target.indexOf('#');
  if (hash > 0) {
    return { linkType: 'page', url: normalizePageName(target.slice(0, hash)) + target.slice(hash) };
  }
  return { linkType: 'page', url: normalizePageName(target) };
}
