/**
 * Core Parser Implementation
 *
 * Builds the syntax tree from extracted tokens, one line at a time, over an
 * explicit stack of open blocks:
 * - line-driven records (lists, list items, tables, `>` quotes) close silently
 *   when a line stops continuing them;
 * - explicit records (`[[div]]`, `[[quote]]`, `[[collapsible]]`, alignment
 *   blocks) close only on their own closer, and report a diagnostic when they
 *   are closed any other way.
 * Inline content of each paragraph, heading, list item and cell is delegated
 * to InlineParser.
 */

import {
  createAlignNode,
  createBlockquoteNode,
  createClearFloatNode,
  createCodeBlockNode,
  createCollapsibleNode,
  createDivNode,
  createDocumentNode,
  createHeadingNode,
  createHorizontalRuleNode,
  createListItemNode,
  createListNode,
  createModuleNode,
  createParagraphNode,
  createTableCellNode,
  createTableNode,
  createTableRowNode,
  linkParents
} from './ast-factory.js';
import {
  type AlignNode,
  type Alignment,
  type BlockNode,
  type BlockquoteNode,
  type CollapsibleNode,
  type DivNode,
  type DocumentNode,
  type FloatClear,
  type HeadingNode,
  type ListItemNode,
  type ListNode,
  type ParagraphNode,
  type TableNode,
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
  parseBoolean,
  readBlockHead,
  readModuleHead
} from './block-rules.js';
import { debugLog, isDebugEnabled } from './debug-log.js';
import { createDiagnostic, sortDiagnostics } from './diagnostics.js';
import { type InlineContext, type InlineLineResult, InlineParser } from './inline-parser.js';
import {
  type DiagnosticContext,
  type ParseDiagnostic,
  type ParseOptions,
  type ParseOutcome,
  type Parser,
  type ParserOptions,
  ParseErrorCode
} from './parser-interfaces.js';
import {
  type TokenCursor,
  advance,
  computeLineStarts,
  createTokenCursor,
  currentToken,
  isAtLineStart,
  isLineEnd,
  parseOptional,
  peekToken,
  skipTrivia,
  tokenAt
} from './parser-utils.js';
import { SyntaxKind } from './scanner/token-types.js';
import type { ExtractedToken, TokenizationResult } from './scanner/tokenize.js';

export const DEFAULT_MAX_NESTING_DEPTH = 100;

type ResolvedParseOptions = Required<ParseOptions>;

type BlockContainerNode = DocumentNode | BlockquoteNode | DivNode | AlignNode | CollapsibleNode;

/**
 * An open block on the stack
 */
interface BlockRecord {
  node: BlockContainerNode | ListNode | ListItemNode | TableNode;
  mode: 'root' | 'line' | 'explicit';
  /** Closer key of an explicit record: block name, or `align:<alignment>` */
  closer?: string;
  /** Indentation depth of the line that opened a list */
  lineDepth?: number;
  openerPos: number;
  openerEnd: number;
  subject: string;
}

interface OpenParagraph {
  node: ParagraphNode;
  inline: InlineParser;
  record: BlockRecord;
}

const ALIGN_OPENERS: ReadonlyMap<SyntaxKind, Alignment> = new Map([
  [SyntaxKind.RightAlignOpen, 'right'],
  [SyntaxKind.LeftAlignOpen, 'left'],
  [SyntaxKind.CenterAlignOpen, 'center'],
  [SyntaxKind.JustifyAlignOpen, 'justify'],
]);

const ALIGN_CLOSERS: ReadonlyMap<SyntaxKind, Alignment> = new Map([
  [SyntaxKind.RightAlignClose, 'right'],
  [SyntaxKind.LeftAlignClose, 'left'],
  [SyntaxKind.CenterAlignClose, 'center'],
  [SyntaxKind.JustifyAlignClose, 'justify'],
]);

const CLEAR_FLOATS: ReadonlyMap<SyntaxKind, FloatClear> = new Map([
  [SyntaxKind.ClearFloatNeutral, 'both'],
  [SyntaxKind.ClearFloatLeft, 'left'],
  [SyntaxKind.ClearFloatRight, 'right'],
  [SyntaxKind.ClearFloatCenter, 'center'],
]);

const CODE_LEADING_NEWLINE = /[ \t]*\r?\n/y;

/** 'more' when the line goes on after a block opener or closer */
type LineStep = 'done' | 'more';

interface VerbatimBody {
  text: string;
  end: number;
  /** False when the input ended before the closer */
  closed: boolean;
}

function alignCloserKey(alignment: Alignment): string {
  return 'align:' + alignment;
}

function headingLevel(marker: string): HeadingNode['level'] {
  const count = marker.replace(/\*$/, '').length;
  switch (count) {
    case 1: return 1;
    case 2: return 2;
    case 3: return 3;
    case 4: return 4;
    case 5: return 5;
    default: return 6;
  }
}

function isTableMarker(token: ExtractedToken): boolean {
  return token.kind === SyntaxKind.TableColumn || token.kind === SyntaxKind.TableColumnTitle;
}

function isBlockContainer(node: BlockRecord['node']): node is BlockContainerNode {
  switch (node.kind) {
    case NodeKind.Document:
    case NodeKind.Blockquote:
    case NodeKind.Div:
    case NodeKind.Align:
    case NodeKind.Collapsible:
      return true;
    default:
      return false;
  }
}

function lastChildEnd(node: BlockRecord['node']): number {
  const children = node.children;
  const last = children[children.length - 1];
  return last ? last.end : node.end;
}

/**
 * State of one parse call
 */
class ParseSession implements InlineContext {
  readonly source: string;
  readonly cursor: TokenCursor;
  readonly maxNestingDepth: number;

  private readonly diagnostics: ParseDiagnostic[] = [];
  private readonly document: DocumentNode;
  private readonly stack: BlockRecord[];
  private paragraph: OpenParagraph | undefined;
  private pendingLineBreak: ExtractedToken | undefined;
  private footnoteCount = 0;
  private readonly debug: boolean;

  constructor(tokens: TokenizationResult, private readonly options: ResolvedParseOptions) {
    this.source = tokens.source;
    this.cursor = createTokenCursor(tokens.tokens);
    this.maxNestingDepth = options.maxNestingDepth;
    this.document = createDocumentNode(0, this.source.length, [], computeLineStarts(this.source));
    this.stack = [{ node: this.document, mode: 'root', openerPos: 0, openerEnd: 0, subject: 'document' }];
    this.debug = isDebugEnabled('parse');
  }

  run(): ParseOutcome {
    while (currentToken(this.cursor).kind !== SyntaxKind.InputEnd) {
      const before = this.cursor.index;
      this.parseLine();
      if (this.cursor.index === before) advance(this.cursor);
    }

    // Terminal state: drain the stack innermost first
    this.closeParagraph();
    while (this.stack.length > 1) this.popRecord();

    if (this.options.enableParentLinking) linkParents(this.document);

    return {
      document: this.document,
      diagnostics: sortDiagnostics(this.diagnostics)
    };
  }

  report(code: ParseErrorCode, pos: number, end: number, subject: string, context?: DiagnosticContext): void {
    const diagnostic = createDiagnostic(code, pos, end, subject, context);
    if (this.debug) debugLog('parse', diagnostic.message, { code, pos, end });
    this.diagnostics.push(diagnostic);
  }

  isBlockBoundaryAt(index: number): boolean {
    const token = tokenAt(this.cursor, index);
    const alignment = ALIGN_CLOSERS.get(token.kind);
    if (alignment) return this.findExplicit(alignCloserKey(alignment)) >= 0;
    if (token.kind !== SyntaxKind.LeftBlockEnd) return false;

    const head = readBlockHead(this.cursor, index, this.source);
    const match = head && findBlockRule(head.name, head.stripped);
    return !!match && match.rule.level === 'block' && this.findExplicit(match.name) >= 0;
  }

  nextFootnoteIndex(): number {
    return ++this.footnoteCount;
  }

  isBlockNestingFull(): boolean {
    let depth = 0;
    for (const record of this.stack) {
      if (record.mode === 'explicit') depth++;
    }
    return depth >= this.maxNestingDepth;
  }

  // ---------------------------------------------------------------------------
  // Lines
  // ---------------------------------------------------------------------------

  private parseLine(): void {
    const pendingLineBreak = this.pendingLineBreak;
    this.pendingLineBreak = undefined;

    // Quote prefix, possibly after indentation
    let quote: ExtractedToken | undefined;
    const first = currentToken(this.cursor);
    const second = peekToken(this.cursor);
    if (first.kind === SyntaxKind.Quote) {
      quote = first;
    } else if (first.kind === SyntaxKind.Whitespace && second.kind === SyntaxKind.Quote) {
      quote = second;
      advance(this.cursor);
    }
    if (quote) advance(this.cursor);

    this.adjustQuoteDepth(quote);

    // Openers and closers may share a line with what follows them
    let step = this.parseLineBody(quote !== undefined, pendingLineBreak);
    while (step === 'more') {
      const before = this.cursor.index;
      step = this.parseLineBody(false);
      if (this.cursor.index === before) break;
    }
    this.finishLine();
  }

  private finishLine(): void {
    const token = currentToken(this.cursor);
    switch (token.kind) {
      case SyntaxKind.LineBreak:
        advance(this.cursor);
        if (this.paragraph) this.pendingLineBreak = token;
        return;

      case SyntaxKind.ParagraphBreak:
        advance(this.cursor);
        this.closeParagraph();
        this.closeLineRecords();
        return;
    }
  }

  /**
   * Classifies the rest of the line (after any quote prefix) and parses it.
   * Returns 'more' when the line continues after a block opener or closer.
   */
  private parseLineBody(afterQuote: boolean, pendingLineBreak?: ExtractedToken): LineStep {
    const leading = currentToken(this.cursor);
    const indent = parseOptional(this.cursor, SyntaxKind.Whitespace) ? leading.text.length : 0;

    const token = currentToken(this.cursor);
    if (isLineEnd(token)) {
      // Empty line inside a quote ends its paragraph
      this.closeParagraph();
      if (afterQuote) this.closeListsAndTables();
      return 'done';
    }

    switch (token.kind) {
      case SyntaxKind.Heading:
        this.closeParagraph();
        this.closeListsAndTables();
        return this.parseHeading(token);

      case SyntaxKind.ListBullet:
      case SyntaxKind.ListNumbered: {
        this.closeParagraph();
        const depth = (afterQuote ? Math.max(0, indent - 1) : indent) + 1;
        return this.parseListItem(token, depth);
      }

      case SyntaxKind.HorizontalRule:
        this.closeParagraph();
        this.closeListsAndTables();
        advance(this.cursor);
        this.addBlock(createHorizontalRuleNode(token.pos, token.end));
        skipTrivia(this.cursor);
        return 'done';
    }

    if (isTableMarker(token) && isAtLineStart(token)) {
      this.closeParagraph();
      return this.parseTableRow(token);
    }

    const float = CLEAR_FLOATS.get(token.kind);
    if (float) {
      this.closeParagraph();
      this.closeListsAndTables();
      advance(this.cursor);
      this.addBlock(createClearFloatNode(token.pos, token.end, float));
      skipTrivia(this.cursor);
      return 'done';
    }

    const alignOpen = ALIGN_OPENERS.get(token.kind);
    if (alignOpen && !this.isBlockNestingFull()) {
      this.closeParagraph();
      this.closeListsAndTables();
      advance(this.cursor);
      this.openExplicit(createAlignNode(token.pos, token.end, alignOpen), alignCloserKey(alignOpen), token.pos, token.end, token.text);
      return this.lineRest();
    }

    const alignClose = ALIGN_CLOSERS.get(token.kind);
    if (alignClose && this.closeExplicit(alignCloserKey(alignClose), token.end)) {
      advance(this.cursor);
      return this.lineRest();
    }

    if (token.kind === SyntaxKind.LeftBlock || token.kind === SyntaxKind.LeftBlockEnd) {
      const step = this.tryParseBlockLine();
      if (step) return step;
    }

    return this.parseParagraphLine(token, pendingLineBreak);
  }

  /**
   * Whether anything follows an opener or closer on the same line
   */
  private lineRest(): LineStep {
    skipTrivia(this.cursor);
    return isLineEnd(currentToken(this.cursor)) ? 'done' : 'more';
  }

  /**
   * Named block heads that act at block level. Returns undefined when the
   * line is ordinary paragraph content.
   */
  private tryParseBlockLine(): LineStep | undefined {
    const head = readBlockHead(this.cursor, this.cursor.index, this.source);
    if (!head) return undefined;
    const match = findBlockRule(head.name, head.stripped);

    if (match && (match.rule.level === 'block' || match.rule.level === 'raw')) {
      if (head.flavor === 'open') {
        // Past the nesting limit the opener is left to the paragraph as text
        if (match.rule.level === 'block' && this.isBlockNestingFull()) return undefined;

        this.closeParagraph();
        this.closeListsAndTables();
        this.reportDeprecated(head, match);
        this.cursor.index = head.nextIndex;
        if (match.rule.kind === 'code') this.parseCodeBlock(head);
        else if (match.rule.kind === 'module') this.parseModule(head);
        else this.openExplicitBlock(head, match);
        return this.lineRest();
      }
      if (head.flavor === 'close' && this.closeExplicit(match.name, head.end)) {
        this.cursor.index = head.nextIndex;
        return this.lineRest();
      }
      return undefined;
    }

    // Placeholders and unknown blocks alone on their line stand as blocks
    let next = head.nextIndex;
    if (tokenAt(this.cursor, next).kind === SyntaxKind.Whitespace) next++;
    if (!isLineEnd(tokenAt(this.cursor, next)) || head.flavor === 'close') return undefined;

    if (match?.rule.level === 'placeholder') {
      this.closeParagraph();
      this.closeListsAndTables();
      this.addBlock(createPlaceholderFromHead(head, match.rule.kind));
    } else if (!match) {
      this.closeParagraph();
      this.closeListsAndTables();
      this.report(ParseErrorCode.MalformedConstruct, head.pos, head.end, head.name);
      this.addBlock(createUnrecognizedFromHead(head, this.source));
    } else {
      return undefined;
    }
    this.cursor.index = next;
    return 'done';
  }

  private reportDeprecated(head: BlockHead, match: BlockRuleMatch): void {
    if (match.deprecated) {
      this.report(ParseErrorCode.DeprecatedConstruct, head.pos, head.end, head.name, { replacement: match.name });
    }
  }

  // ---------------------------------------------------------------------------
  // Paragraphs, headings and inline runs
  // ---------------------------------------------------------------------------

  private parseParagraphLine(token: ExtractedToken, pendingLineBreak: ExtractedToken | undefined): LineStep {
    const open = this.paragraph;
    let inline: InlineParser;
    if (open && pendingLineBreak && open.record === this.top) {
      inline = open.inline;
      inline.appendLineBreak(pendingLineBreak);
    } else {
      this.closeParagraph();
      this.closeListsAndTables();
      const node = createParagraphNode(token.pos, token.pos);
      this.addBlock(node);
      inline = new InlineParser(this, token.pos);
      this.paragraph = { node, inline, record: this.top };
      if (this.debug) debugLog('parse', 'open paragraph', { pos: token.pos });
    }

    const result = this.parseInlineLines(inline);
    if (result.stop !== 'boundary') return 'done';
    this.closeParagraph();
    return 'more';
  }

  /**
   * Feeds lines to `inline`, continuing past line breaks forced with ` _`.
   */
  private parseInlineLines(inline: InlineParser, stop?: (token: ExtractedToken) => boolean): InlineLineResult {
    while (true) {
      const result = inline.parseLine(stop);
      if (!result.forcedBreak || currentToken(this.cursor).kind !== SyntaxKind.LineBreak) return result;

      advance(this.cursor);
      if (currentToken(this.cursor).kind === SyntaxKind.Quote) advance(this.cursor);
      skipTrivia(this.cursor);
    }
  }

  private closeParagraph(): void {
    const open = this.paragraph;
    if (!open) return;
    this.paragraph = undefined;
    this.pendingLineBreak = undefined;

    const { node, inline, record } = open;
    const content = inline.finish();
    node.children = content.children;
    node.end = Math.max(node.pos, content.end);

    // A paragraph left without content (only a comment, say) is dropped
    const siblings = record.node.children;
    if (!node.children.length && siblings[siblings.length - 1] === node) siblings.pop();
  }

  private parseHeading(token: ExtractedToken): LineStep {
    advance(this.cursor);
    skipTrivia(this.cursor);

    const inline = new InlineParser(this, token.end);
    const result = this.parseInlineLines(inline);
    const content = inline.finish();
    this.addBlock(createHeadingNode(
      token.pos,
      Math.max(token.end, content.end),
      headingLevel(token.text),
      token.text.endsWith('*'),
      content.children
    ));

    return result.stop === 'boundary' ? 'more' : 'done';
  }

  // ---------------------------------------------------------------------------
  // Lists
  // ---------------------------------------------------------------------------

  private parseListItem(token: ExtractedToken, depth: number): LineStep {
    const list = this.prepareList(depth, token.kind === SyntaxKind.ListNumbered, token.pos);
    advance(this.cursor);
    skipTrivia(this.cursor);

    const item = createListItemNode(token.pos, token.end);
    list.children.push(item);
    this.stack.push({ node: item, mode: 'line', openerPos: token.pos, openerEnd: token.end, subject: token.text });

    const inline = new InlineParser(this, token.end);
    const result = this.parseInlineLines(inline);
    const content = inline.finish();
    item.children.push(...content.children);
    item.end = Math.max(item.end, content.end);

    return result.stop === 'boundary' ? 'more' : 'done';
  }

  /**
   * Finds or opens the list an item at `depth` belongs to, closing deeper
   * lists and items on the way.
   */
  private prepareList(depth: number, ordered: boolean, pos: number): ListNode {
    while (true) {
      const record = this.top;
      const node = record.node;

      if (node.kind === NodeKind.ListItem) {
        const parent = this.stack[this.stack.length - 2];
        const parentDepth = parent?.lineDepth ?? 0;
        if (parent?.node.kind === NodeKind.List && parentDepth < depth) {
          const nested = createListNode(pos, pos, ordered, parent.node.depth + 1);
          node.children.push(nested);
          this.stack.push({ node: nested, mode: 'line', lineDepth: depth, openerPos: pos, openerEnd: pos, subject: 'list' });
          return nested;
        }
        this.popRecord();
        continue;
      }

      if (node.kind === NodeKind.List) {
        if ((record.lineDepth ?? 0) <= depth && node.ordered === ordered) return node;
        this.popRecord();
        continue;
      }

      if (node.kind === NodeKind.Table) {
        this.popRecord();
        continue;
      }

      const list = createListNode(pos, pos, ordered, 1);
      this.addBlock(list);
      this.stack.push({ node: list, mode: 'line', lineDepth: depth, openerPos: pos, openerEnd: pos, subject: 'list' });
      return list;
    }
  }

  // ---------------------------------------------------------------------------
  // Tables
  // ---------------------------------------------------------------------------

  private parseTableRow(first: ExtractedToken): LineStep {
    let table: TableNode;
    const top = this.top.node;
    if (top.kind === NodeKind.Table) {
      table = top;
    } else {
      this.closeListsAndTables();
      table = createTableNode(first.pos, first.pos);
      this.addBlock(table);
      this.stack.push({ node: table, mode: 'line', openerPos: first.pos, openerEnd: first.end, subject: 'table' });
    }

    const row = createTableRowNode(first.pos, first.end);
    table.children.push(row);

    while (true) {
      const marker = currentToken(this.cursor);
      let header = marker.kind === SyntaxKind.TableColumnTitle;
      let columnSpan = 1;
      let markerEnd = advance(this.cursor).end;

      // Empty cells widen the next one
      let next = currentToken(this.cursor);
      while (isTableMarker(next) && next.pos === markerEnd) {
        header = header || next.kind === SyntaxKind.TableColumnTitle;
        columnSpan++;
        markerEnd = advance(this.cursor).end;
        next = currentToken(this.cursor);
      }
      row.end = markerEnd;

      skipTrivia(this.cursor);
      if (isLineEnd(currentToken(this.cursor))) break;

      const inline = new InlineParser(this, markerEnd);
      const result = inline.parseLine(isTableMarker);
      const content = inline.finish();
      const cell = createTableCellNode(marker.pos, Math.max(markerEnd, content.end), header, columnSpan, content.children);
      row.children.push(cell);
      row.end = cell.end;

      if (result.stop !== 'delimiter') {
        // Row without its trailing ||
        this.report(ParseErrorCode.UnclosedBlockAutoClosed, first.pos, first.end, first.text, { construct: 'table-row' });
        row.flags |= NodeFlags.AutoClosed | NodeFlags.ContainsError;
        if (result.stop === 'boundary') {
          table.end = row.end;
          return 'more';
        }
        break;
      }
    }

    table.end = row.end;
    return 'done';
  }

  // ---------------------------------------------------------------------------
  // Explicit blocks
  // ---------------------------------------------------------------------------

  private openExplicitBlock(head: BlockHead, match: BlockRuleMatch): void {
    const attributes = parseBlockArguments(head.argumentText);
    switch (match.rule.kind) {
      case 'quote':
        this.openExplicit(createBlockquoteNode(head.pos, head.end, true, attributes), match.name, head.pos, head.end, match.name);
        return;

      case 'collapsible': {
        const folded = attributes['folded'];
        let startOpen = false;
        if (folded !== undefined) {
          const value = parseBoolean(folded);
          if (value === undefined) {
            this.report(ParseErrorCode.MalformedConstruct, head.pos, head.end, match.name, { argument: 'folded' });
          } else {
            startOpen = !value;
          }
        }
        const node = createCollapsibleNode(head.pos, head.end, startOpen, attributes['show'], attributes['hide']);
        this.openExplicit(node, match.name, head.pos, head.end, match.name);
        return;
      }

      default:
        this.openExplicit(createDivNode(head.pos, head.end, attributes), match.name, head.pos, head.end, match.name);
        return;
    }
  }

  private openExplicit(node: DivNode | BlockquoteNode | AlignNode | CollapsibleNode, closer: string, pos: number, end: number, subject: string): void {
    this.addBlock(node);
    this.stack.push({ node, mode: 'explicit', closer, openerPos: pos, openerEnd: end, subject });
    if (this.debug) debugLog('parse', 'open block', { kind: node.kind, pos });
  }

  private findExplicit(closer: string): number {
    for (let i = this.stack.length - 1; i > 0; i--) {
      const record = this.stack[i];
      if (record?.mode === 'explicit' && record.closer === closer) return i;
    }
    return -1;
  }

  /**
   * Closes the innermost explicit record with this closer key, auto-closing
   * everything opened inside it. Returns false when none is open.
   */
  private closeExplicit(closer: string, end: number): boolean {
    const index = this.findExplicit(closer);
    if (index < 0) return false;

    this.closeParagraph();
    while (this.stack.length - 1 > index) this.popRecord();
    const record = this.stack.pop();
    if (record) record.node.end = Math.max(end, lastChildEnd(record.node));
    if (this.debug) debugLog('parse', 'close block', { closer, end });
    return true;
  }

  /**
   * `[[code]]`: the body up to `[[/code]]` is kept verbatim.
   */
  private parseCodeBlock(head: BlockHead): void {
    const attributes = parseBlockArguments(head.argumentText);
    const language = (attributes['type'] ?? attributes['language'] ?? '').trim() || undefined;

    const body = this.readVerbatimBody(head, 'code');
    const node = createCodeBlockNode(head.pos, body.end, body.text, language);
    if (!body.closed) node.flags |= NodeFlags.AutoClosed | NodeFlags.ContainsError;
    this.addBlock(node);
  }

  /**
   * `[[module Name ...]]`. A module taking a body keeps it verbatim up to
   * `[[/module]]`; an unknown module stays as an unrecognized block.
   */
  private parseModule(head: BlockHead): void {
    const module = readModuleHead(head.argumentText);
    if (!module.rule) {
      this.report(ParseErrorCode.MalformedConstruct, head.pos, head.end, 'module', { module: module.name });
      this.addBlock(createUnrecognizedFromHead(head, this.source));
      return;
    }

    if (!module.rule.takesBody) {
      this.addBlock(createModuleNode(head.pos, head.end, module.rule.name, module.attributes));
      return;
    }

    const body = this.readVerbatimBody(head, 'module');
    const node = createModuleNode(head.pos, body.end, module.rule.name, module.attributes, body.text);
    if (!body.closed) node.flags |= NodeFlags.AutoClosed | NodeFlags.ContainsError;
    this.addBlock(node);
  }

  /**
   * Takes the source after `head` up to `[[/closer]]`, or to the end of input
   * (reported) when there is no closer. Moves the cursor past it.
   */
  private readVerbatimBody(head: BlockHead, closerName: string): VerbatimBody {
    CODE_LEADING_NEWLINE.lastIndex = head.end;
    const bodyStart = CODE_LEADING_NEWLINE.test(this.source) ? CODE_LEADING_NEWLINE.lastIndex : head.end;

    for (let i = head.nextIndex; i < this.cursor.tokens.length; i++) {
      if (tokenAt(this.cursor, i).kind !== SyntaxKind.LeftBlockEnd) continue;
      const closer = readBlockHead(this.cursor, i, this.source);
      if (!closer || closer.name.toLowerCase() !== closerName) continue;

      this.cursor.index = closer.nextIndex;
      return {
        text: this.source.slice(bodyStart, Math.max(bodyStart, closer.pos)).replace(/\r?\n$/, ''),
        end: closer.end,
        closed: true
      };
    }

    const end = this.source.length;
    this.report(ParseErrorCode.UnclosedBlockAutoClosed, head.pos, head.end, closerName);
    this.cursor.index = this.cursor.tokens.length - 1;
    return { text: this.source.slice(bodyStart, Math.max(bodyStart, end)), end, closed: false };
  }

  // ---------------------------------------------------------------------------
  // Stack
  // ---------------------------------------------------------------------------

  private get top(): BlockRecord {
    return this.stack[this.stack.length - 1] ?? this.stack[0] ?? {
      node: this.document, mode: 'root', openerPos: 0, openerEnd: 0, subject: 'document'
    };
  }

  /**
   * Appends a block to the innermost container, closing lists and tables
   * that cannot hold it.
   */
  private addBlock(block: BlockNode): void {
    while (true) {
      const node = this.top.node;
      if (isBlockContainer(node)) {
        node.children.push(block);
        return;
      }
      this.popRecord();
    }
  }

  /**
   * Closes the innermost record. Explicit records closed this way report
   * the opener they were missing a closer for.
   */
  private popRecord(): void {
    if (this.stack.length <= 1) return;
    const record = this.stack.pop();
    if (!record) return;
    if (this.paragraph?.record === record) this.closeParagraph();

    record.node.end = Math.max(record.node.end, lastChildEnd(record.node));
    if (record.mode === 'explicit') {
      this.report(ParseErrorCode.UnclosedBlockAutoClosed, record.openerPos, record.openerEnd, record.subject);
      record.node.flags |= NodeFlags.AutoClosed | NodeFlags.ContainsError;
    }
  }

  private closeListsAndTables(): void {
    while (true) {
      const kind = this.top.node.kind;
      if (kind !== NodeKind.List && kind !== NodeKind.ListItem && kind !== NodeKind.Table) return;
      this.popRecord();
    }
  }

  /** At a paragraph break every line-driven record ends. */
  private closeLineRecords(): void {
    while (this.top.mode === 'line') this.popRecord();
  }

  private quoteDepth(): number {
    let depth = 0;
    for (const record of this.stack) {
      if (record.mode === 'line' && record.node.kind === NodeKind.Blockquote) depth++;
    }
    return depth;
  }

  /**
   * Opens or closes line-driven blockquotes to match the `>` prefix of the line.
   */
  private adjustQuoteDepth(quote: ExtractedToken | undefined): void {
    const depth = quote ? quote.text.length : 0;
    let current = this.quoteDepth();
    if (depth === current) return;

    this.closeParagraph();
    while (current > depth) {
      const record = this.top;
      this.popRecord();
      if (record.mode === 'line' && record.node.kind === NodeKind.Blockquote) current--;
    }

    if (!quote || current >= depth) return;
    this.closeListsAndTables();
    for (; current < depth; current++) {
      const node = createBlockquoteNode(quote.pos, quote.end, false);
      this.addBlock(node);
      this.stack.push({ node, mode: 'line', openerPos: quote.pos, openerEnd: quote.end, subject: '>' });
    }
  }
}

/** Options left undefined keep their defaults. */
function resolveParseOptions(defaults: ResolvedParseOptions, options?: ParseOptions): ResolvedParseOptions {
  return {
    enableParentLinking: options?.enableParentLinking ?? defaults.enableParentLinking,
    maxNestingDepth: options?.maxNestingDepth ?? defaults.maxNestingDepth
  };
}

/**
 * Core parser implementation class
 */
class CoreParser implements Parser {
  private defaultOptions: ResolvedParseOptions;

  constructor(options?: ParserOptions) {
    this.defaultOptions = resolveParseOptions({
      enableParentLinking: false,
      maxNestingDepth: DEFAULT_MAX_NESTING_DEPTH
    }, options?.defaultParseOptions);
  }

  parse(tokens: TokenizationResult, options?: ParseOptions): ParseOutcome {
    return new ParseSession(tokens, resolveParseOptions(this.defaultOptions, options)).run();
  }
}

/**
 * Parser factory function
 */
export function createParser(options?: ParserOptions): Parser {
  return new CoreParser(options);
}

/**
 * Builds the syntax tree for a token stream with default options
 */
export function parse(tokens: TokenizationResult, options?: ParseOptions): ParseOutcome {
  return createParser().parse(tokens, options);
}
