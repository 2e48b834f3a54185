/**
 * AST Node Types for the Wikitext parser
 *
 * Every node is a plain object tagged with a kebab-case `kind`, so a tree
 * serializes to a self-describing structure with JSON.stringify (as long as
 * parent linking is off).
 */

/**
 * Node kinds - each node type gets a unique, stable tag
 */
export enum NodeKind {
  // Root node
  Document = 'document',

  // Block-level nodes
  Paragraph = 'paragraph',
  Heading = 'heading',
  List = 'list',
  ListItem = 'list-item',
  Table = 'table',
  TableRow = 'table-row',
  TableCell = 'table-cell',
  Blockquote = 'blockquote',
  Div = 'div',
  Align = 'align',
  Collapsible = 'collapsible',
  CodeBlock = 'code-block',
  HorizontalRule = 'horizontal-rule',
  ClearFloat = 'clear-float',
  IncludePlaceholder = 'include-placeholder',
  FootnoteBlock = 'footnote-block',
  Module = 'module',

  // Inline-level nodes
  Text = 'text',
  Bold = 'bold',
  Italic = 'italic',
  Underline = 'underline',
  Strikethrough = 'strikethrough',
  Superscript = 'superscript',
  Subscript = 'subscript',
  Monospace = 'monospace',
  Color = 'color',
  InlineContainer = 'inline-container',
  Size = 'size',
  Link = 'link',
  Email = 'email',
  Anchor = 'anchor',
  Raw = 'raw',
  LineBreak = 'line-break',
  Footnote = 'footnote',

  // Constructs kept verbatim because nothing recognizes them
  Unrecognized = 'unrecognized',
}

export const ALL_NODE_KINDS: readonly NodeKind[] = Object.values(NodeKind);

/**
 * Node flags for additional metadata
 */
export enum NodeFlags {
  None = 0,
  ContainsError = 1 << 0,     // A diagnostic was reported inside this node
  AutoClosed = 1 << 1,        // Explicit closing marker was missing
}

/**
 * Base interface for all AST nodes
 */
export interface Node {
  kind: NodeKind;        // Node type identifier
  flags: NodeFlags;      // Node flags for metadata
  pos: number;           // Start offset, inclusive
  end: number;           // End offset, exclusive
  parent?: Node;         // Optional parent linking (gated by option)
}

/** Key/value arguments from a block head such as `[[div class="note"]]`. */
export type BlockAttributes = Record<string, string>;

// =============================================================================
// Specific Node Interfaces
// =============================================================================

/**
 * Document root node
 */
export interface DocumentNode extends Node {
  kind: NodeKind.Document;
  children: BlockNode[];
  lineStarts: number[];           // Precomputed line starts for position mapping
}

export interface ParagraphNode extends Node {
  kind: NodeKind.Paragraph;
  children: InlineNode[];
}

/**
 * Heading node (`+` through `++++++`; `+*` keeps it out of the table of contents)
 */
export interface HeadingNode extends Node {
  kind: NodeKind.Heading;
  level: 1 | 2 | 3 | 4 | 5 | 6;
  hideFromToc: boolean;
  children: InlineNode[];
}

/**
 * List node; nesting depth comes from leading spaces
 */
export interface ListNode extends Node {
  kind: NodeKind.List;
  ordered: boolean;
  depth: number;
  children: ListItemNode[];
}

export interface ListItemNode extends Node {
  kind: NodeKind.ListItem;
  children: (InlineNode | ListNode)[];
}

export interface TableNode extends Node {
  kind: NodeKind.Table;
  children: TableRowNode[];
}

export interface TableRowNode extends Node {
  kind: NodeKind.TableRow;
  children: TableCellNode[];
}

export interface TableCellNode extends Node {
  kind: NodeKind.TableCell;
  header: boolean;
  columnSpan: number;
  children: InlineNode[];
}

/**
 * Blockquote, from `>` line prefixes or an explicit `[[quote]]` block
 */
export interface BlockquoteNode extends Node {
  kind: NodeKind.Blockquote;
  explicit: boolean;
  attributes: BlockAttributes;
  children: BlockNode[];
}

export interface DivNode extends Node {
  kind: NodeKind.Div;
  attributes: BlockAttributes;
  children: BlockNode[];
}

export type Alignment = 'left' | 'right' | 'center' | 'justify';

export interface AlignNode extends Node {
  kind: NodeKind.Align;
  alignment: Alignment;
  children: BlockNode[];
}

export interface CollapsibleNode extends Node {
  kind: NodeKind.Collapsible;
  showText?: string;
  hideText?: string;
  startOpen: boolean;
  children: BlockNode[];
}

export interface CodeBlockNode extends Node {
  kind: NodeKind.CodeBlock;
  language?: string;
  text: string;
}

export interface HorizontalRuleNode extends Node {
  kind: NodeKind.HorizontalRule;
}

export type FloatClear = 'both' | 'left' | 'right' | 'center';

export interface ClearFloatNode extends Node {
  kind: NodeKind.ClearFloat;
  float: FloatClear;
}

/**
 * Marks an include that was not expanded: the target could not be resolved,
 * would have formed a cycle, or was never handed to a resolver.
 */
export interface IncludePlaceholderNode extends Node {
  kind: NodeKind.IncludePlaceholder;
  target: string;
  reason: string;
}

/**
 * `[[footnoteblock]]`: where the collected footnotes are listed
 */
export interface FootnoteBlockNode extends Node {
  kind: NodeKind.FootnoteBlock;
  title?: string;
  hide: boolean;
}

/**
 * `[[module Name ...]]`. Only body-taking modules (CSS) carry `body`.
 */
export interface ModuleNode extends Node {
  kind: NodeKind.Module;
  name: string;
  attributes: BlockAttributes;
  body?: string;
}

/**
 * Inline text content node
 */
export interface TextNode extends Node {
  kind: NodeKind.Text;
  text: string;
}

export type FormattingKind =
  | NodeKind.Bold
  | NodeKind.Italic
  | NodeKind.Underline
  | NodeKind.Strikethrough
  | NodeKind.Superscript
  | NodeKind.Subscript
  | NodeKind.Monospace;

/**
 * Formatting span opened and closed by delimiters (`**`, `//`, `{{ }}`, ...)
 */
export interface FormattingNode extends Node {
  kind: FormattingKind;
  children: InlineNode[];
}

export interface ColorNode extends Node {
  kind: NodeKind.Color;
  color: string;
  children: InlineNode[];
}

export type InlineContainerElement = 'span' | 'del' | 'ins' | 'mark';

/**
 * Inline block such as `[[span class="x"]]...[[/span]]`
 */
export interface InlineContainerNode extends Node {
  kind: NodeKind.InlineContainer;
  element: InlineContainerElement;
  attributes: BlockAttributes;
  children: InlineNode[];
}

export interface SizeNode extends Node {
  kind: NodeKind.Size;
  size: string;
  children: InlineNode[];
}

export type LinkType = 'page' | 'url' | 'anchor';

export interface LinkNode extends Node {
  kind: NodeKind.Link;
  linkType: LinkType;
  target: string;               // Target as written
  url: string;                  // Normalized page slug, URL or '#anchor'
  label?: string;
  labelFromPage: boolean;       // `[[[page|]]]`: label is the page title
  newTab: boolean;
}

export interface EmailNode extends Node {
  kind: NodeKind.Email;
  address: string;
}

export interface AnchorNode extends Node {
  kind: NodeKind.Anchor;
  name: string;
}

export interface RawNode extends Node {
  kind: NodeKind.Raw;
  text: string;
}

export interface LineBreakNode extends Node {
  kind: NodeKind.LineBreak;
}

/**
 * `[[footnote]]...[[/footnote]]`, numbered from 1 in document order
 */
export interface FootnoteNode extends Node {
  kind: NodeKind.Footnote;
  index: number;
  children: InlineNode[];
}

export interface UnrecognizedNode extends Node {
  kind: NodeKind.Unrecognized;
  name: string;
  text: string;
}

/**
 * Union types for convenience
 */
export type BlockNode =
  | ParagraphNode
  | HeadingNode
  | ListNode
  | TableNode
  | BlockquoteNode
  | DivNode
  | AlignNode
  | CollapsibleNode
  | CodeBlockNode
  | HorizontalRuleNode
  | ClearFloatNode
  | IncludePlaceholderNode
  | FootnoteBlockNode
  | ModuleNode
  | UnrecognizedNode;

export type InlineNode =
  | TextNode
  | FormattingNode
  | ColorNode
  | InlineContainerNode
  | SizeNode
  | LinkNode
  | EmailNode
  | AnchorNode
  | RawNode
  | LineBreakNode
  | FootnoteNode
  | IncludePlaceholderNode
  | FootnoteBlockNode
  | UnrecognizedNode;

export type AnyNode =
  | DocumentNode
  | BlockNode
  | InlineNode
  | ListItemNode
  | TableRowNode
  | TableCellNode;

/** Nodes that own children. */
export type ContainerNode = Extract<AnyNode, { children: unknown[] }>;

export function isContainerNode(node: AnyNode): node is ContainerNode {
  return 'children' in node;
}

export function hasNodeFlag(node: Node, flag: NodeFlags): boolean {
  return (node.flags & flag) === flag;
}
