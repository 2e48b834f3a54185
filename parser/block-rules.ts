/**
 * Named blocks: `[[name arguments]]` heads, `[[/name]]` closers and the
 * registry that says what each name means.
 */

import { createFootnoteBlockNode, createIncludePlaceholderNode, createUnrecognizedNode } from './ast-factory.js';
import type {
  BlockAttributes,
  FootnoteBlockNode,
  IncludePlaceholderNode,
  InlineContainerElement,
  UnrecognizedNode
} from './ast-types.js';
import { type TokenCursor, findOnLine } from './parser-utils.js';
import { SyntaxKind } from './scanner/token-types.js';

export type BlockRuleKind =
  | 'div'
  | 'quote'
  | 'collapsible'
  | 'code'
  | 'module'
  | 'inline-container'
  | 'size'
  | 'footnote'
  | 'footnote-block'
  | 'include'
  | 'include-failed';

/**
 * - block: opens an explicit record on the block stack
 * - raw: block whose body is taken verbatim up to its closer
 * - inline: explicit span inside inline content
 * - placeholder: stands alone, has no body and no closer
 */
export type BlockLevel = 'block' | 'raw' | 'inline' | 'placeholder';

export interface BlockRule {
  kind: BlockRuleKind;
  level: BlockLevel;
  names: readonly string[];
  /** Old spellings still accepted, with a deprecation warning */
  deprecatedNames?: readonly string[];
  /** Whether `name_` is accepted */
  acceptsStripped?: boolean;
  element?: InlineContainerElement;
}

const BLOCK_RULES: readonly BlockRule[] = [
  { kind: 'div', level: 'block', names: ['div'], acceptsStripped: true },
  { kind: 'quote', level: 'block', names: ['quote', 'blockquote'] },
  { kind: 'collapsible', level: 'block', names: ['collapsible'] },
  { kind: 'code', level: 'raw', names: ['code'] },
  { kind: 'module', level: 'raw', names: ['module'] },
  { kind: 'inline-container', level: 'inline', names: ['span'], acceptsStripped: true, element: 'span' },
  { kind: 'inline-container', level: 'inline', names: ['del'], deprecatedNames: ['deletion'], element: 'del' },
  { kind: 'inline-container', level: 'inline', names: ['ins'], deprecatedNames: ['insertion'], element: 'ins' },
  { kind: 'inline-container', level: 'inline', names: ['mark'], deprecatedNames: ['highlight'], element: 'mark' },
  { kind: 'size', level: 'inline', names: ['size'] },
  { kind: 'footnote', level: 'inline', names: ['footnote'] },
  { kind: 'footnote-block', level: 'placeholder', names: ['footnoteblock'] },
  { kind: 'include', level: 'placeholder', names: ['include'] },
  { kind: 'include-failed', level: 'placeholder', names: ['include-failed'] },
];

export interface BlockRuleMatch {
  rule: BlockRule;
  /** Canonical name, shared by every spelling of the rule */
  name: string;
  deprecated: boolean;
}

/**
 * Looks up a block name (case-insensitive). `stripped` is true when the
 * name was written with a trailing underscore.
 */
export function findBlockRule(name: string, stripped: boolean): BlockRuleMatch | undefined {
  const lower = name.toLowerCase();
  for (const rule of BLOCK_RULES) {
    if (stripped && !rule.acceptsStripped) continue;
    const canonical = rule.names[0] ?? lower;
    if (rule.names.includes(lower)) return { rule, name: canonical, deprecated: false };
    if (rule.deprecatedNames?.includes(lower)) return { rule, name: canonical, deprecated: true };
  }
  return undefined;
}

export type BlockHeadFlavor = 'open' | 'close' | 'special';

export interface BlockHead {
  flavor: BlockHeadFlavor;
  /** Name as written, without the trailing underscore */
  name: string;
  stripped: boolean;
  /** Everything after the name, untrimmed */
  argumentText: string;
  pos: number;
  end: number;
  /** Index of the first token after the closing `]]` */
  nextIndex: number;
}

const BLOCK_NAME = /^\s*([A-Za-z][A-Za-z0-9-]*)(_?)/;

/**
 * Reads a block head starting at `index` (a `[[`, `[[/` or `[[*` token) up to
 * its `]]`. Returns undefined when the line ends first or no name follows.
 */
export function readBlockHead(cursor: TokenCursor, index: number, source: string): BlockHead | undefined {
  const opener = cursor.tokens[index];
  if (!opener) return undefined;

  let flavor: BlockHeadFlavor;
  switch (opener.kind) {
    case SyntaxKind.LeftBlock: flavor = 'open'; break;
    case SyntaxKind.LeftBlockEnd: flavor = 'close'; break;
    case SyntaxKind.LeftBlockSpecial: flavor = 'special'; break;
    default: return undefined;
  }

  const closeIndex = findOnLine(cursor, index + 1, token => token.kind === SyntaxKind.RightBlock);
  const closer = cursor.tokens[closeIndex];
  if (closeIndex < 0 || !closer) return undefined;

  const body = source.slice(opener.end, closer.pos);
  const nameMatch = BLOCK_NAME.exec(body);
  if (!nameMatch) return undefined;

  return {
    flavor,
    name: nameMatch[1] ?? '',
    stripped: nameMatch[2] === '_',
    argumentText: body.slice(nameMatch[0].length),
    pos: opener.pos,
    end: closer.end,
    nextIndex: closeIndex + 1
  };
}

const ARGUMENT = /([A-Za-z_][A-Za-z0-9_-]*)\s*=\s*"([^"]*)"/g;

/**
 * Parses `key="value"` pairs. Keys are case-insensitive and stored lowercased;
 * a repeated key keeps its last value.
 */
export function parseBlockArguments(text: string): BlockAttributes {
  const attributes: BlockAttributes = {};
  for (const match of text.matchAll(ARGUMENT)) {
    const key = match[1];
    if (key) attributes[key.toLowerCase()] = match[2] ?? '';
  }
  return attributes;
}

/** `yes`/`no`/`true`/`false`/`on`/`off`/`1`/`0`, or undefined. */
export function parseBoolean(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case 'yes': case 'true': case 'on': case '1': return true;
    case 'no': case 'false': case 'off': case '0': return false;
    default: return undefined;
  }
}

export interface ModuleRule {
  /** Lowercase module name */
  name: string;
  /** Body up to `[[/module]]` is kept verbatim */
  takesBody: boolean;
}

const MODULE_RULES: readonly ModuleRule[] = [
  { name: 'css', takesBody: true },
  { name: 'backlinks', takesBody: false },
];

export interface ModuleHead {
  /** Name as written */
  name: string;
  /** Undefined when no module has this name */
  rule: ModuleRule | undefined;
  attributes: BlockAttributes;
}

/** Reads `Name key="value"` after `[[module`. */
export function readModuleHead(argumentText: string): ModuleHead {
  const match = BLOCK_NAME.exec(argumentText);
  const name = match?.[1] ?? '';
  return {
    name,
    rule: MODULE_RULES.find(rule => rule.name === name.toLowerCase()),
    attributes: parseBlockArguments(match ? argumentText.slice(match[0].length) : argumentText)
  };
}

/**
 * Node for a block that stands alone without a body. Includes the parser
 * sees unexpanded are either a failure marker left by include expansion,
 * or an include that never reached a resolver.
 */
export function createPlaceholderFromHead(head: BlockHead, kind: BlockRuleKind): IncludePlaceholderNode | FootnoteBlockNode {
  if (kind === 'footnote-block') {
    const attributes = parseBlockArguments(head.argumentText);
    const hide = parseBoolean(attributes['hide'] ?? '') ?? false;
    return createFootnoteBlockNode(head.pos, head.end, hide, attributes['title']);
  }
  if (kind === 'include-failed') {
    const attributes = parseBlockArguments(head.argumentText);
    return createIncludePlaceholderNode(head.pos, head.end, attributes['page'] ?? '', attributes['reason'] ?? 'unknown');
  }
  const target = /^[^\s|]*/.exec(head.argumentText.trim())?.[0] ?? '';
  return createIncludePlaceholderNode(head.pos, head.end, target, 'unresolved');
}

export function createUnrecognizedFromHead(head: BlockHead, source: string): UnrecognizedNode {
  return createUnrecognizedNode(head.pos, head.end, head.name.toLowerCase(), source.slice(head.pos, head.end));
}
