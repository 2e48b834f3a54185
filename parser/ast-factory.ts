/**
 * AST Factory Utilities
 *
 * Helper functions for creating and manipulating AST nodes.
 */

import {
  type AlignNode,
  type Alignment,
  type AnchorNode,
  type AnyNode,
  type BlockAttributes,
  type BlockNode,
  type BlockquoteNode,
  type ClearFloatNode,
  type CodeBlockNode,
  type CollapsibleNode,
  type ColorNode,
  type DivNode,
  type DocumentNode,
  type EmailNode,
  type FloatClear,
  type FootnoteBlockNode,
  type FootnoteNode,
  type FormattingKind,
  type FormattingNode,
  type HeadingNode,
  type HorizontalRuleNode,
  type IncludePlaceholderNode,
  type InlineContainerElement,
  type InlineContainerNode,
  type InlineNode,
  type LineBreakNode,
  type LinkNode,
  type LinkType,
  type ListItemNode,
  type ListNode,
  type ModuleNode,
  type Node,
  type ParagraphNode,
  type RawNode,
  type SizeNode,
  type TableCellNode,
  type TableNode,
  type TableRowNode,
  type TextNode,
  type UnrecognizedNode,
  NodeFlags,
  NodeKind,
  isContainerNode
} from './ast-types.js';

/**
 * Creates a new node with the specified kind and position
 */
export function createNode<K extends NodeKind>(kind: K, pos: number, end: number): Node & { kind: K } {
  return {
    kind,
    flags: NodeFlags.None,
    pos,
    end
  };
}

/**
 * Sets parent pointers on the whole subtree
 */
export function linkParents(root: AnyNode): void {
  if (!isContainerNode(root)) return;
  for (const child of root.children) {
    child.parent = root;
    linkParents(child);
  }
}

/**
 * Validates that a node's position is within bounds
 */
export function validateNodePosition(node: Node, sourceLength: number): boolean {
  return node.pos >= 0 &&
    node.end >= node.pos &&
    node.end <= sourceLength;
}

/**
 * Validates that child positions are within parent bounds and that
 * siblings are ordered without overlapping
 */
export function validateChildPositions(parent: Node, children: readonly Node[]): boolean {
  let previousEnd = parent.pos;
  for (const child of children) {
    if (child.pos < previousEnd || child.end < child.pos || child.end > parent.end) return false;
    previousEnd = child.end;
  }
  return true;
}

// =============================================================================
// Specific Node Creation Functions
// =============================================================================

export function createDocumentNode(
  pos: number,
  end: number,
  children: BlockNode[] = [],
  lineStarts: number[] = []
): DocumentNode {
  return {
    ...createNode(NodeKind.Document, pos, end),
    children,
    lineStarts
  };
}

export function createParagraphNode(pos: number, end: number, children: InlineNode[] = []): ParagraphNode {
  return {
    ...createNode(NodeKind.Paragraph, pos, end),
    children
  };
}

export function createHeadingNode(
  pos: number,
  end: number,
  level: HeadingNode['level'],
  hideFromToc: boolean,
  children: InlineNode[] = []
): HeadingNode {
  return {
    ...createNode(NodeKind.Heading, pos, end),
    level,
    hideFromToc,
    children
  };
}

export function createListNode(pos: number, end: number, ordered: boolean, depth: number): ListNode {
  return {
    ...createNode(NodeKind.List, pos, end),
    ordered,
    depth,
    children: []
  };
}

export function createListItemNode(pos: number, end: number): ListItemNode {
  return {
    ...createNode(NodeKind.ListItem, pos, end),
    children: []
  };
}

export function createTableNode(pos: number, end: number): TableNode {
  return {
    ...createNode(NodeKind.Table, pos, end),
    children: []
  };
}

export function createTableRowNode(pos: number, end: number): TableRowNode {
  return {
    ...createNode(NodeKind.TableRow, pos, end),
    children: []
  };
}

export function createTableCellNode(
  pos: number,
  end: number,
  header: boolean,
  columnSpan: number,
  children: InlineNode[] = []
): TableCellNode {
  return {
    ...createNode(NodeKind.TableCell, pos, end),
    header,
    columnSpan,
    children
  };
}

export function createBlockquoteNode(
  pos: number,
  end: number,
  explicit: boolean,
  attributes: BlockAttributes = {}
): BlockquoteNode {
  return {
    ...createNode(NodeKind.Blockquote, pos, end),
    explicit,
    attributes,
    children: []
  };
}

export function createDivNode(pos: number, end: number, attributes: BlockAttributes): DivNode {
  return {
    ...createNode(NodeKind.Div, pos, end),
    attributes,
    children: []
  };
}

export function createAlignNode(pos: number, end: number, alignment: Alignment): AlignNode {
  return {
    ...createNode(NodeKind.Align, pos, end),
    alignment,
    children: []
  };
}

export function createCollapsibleNode(
  pos: number,
  end: number,
  startOpen: boolean,
  showText?: string,
  hideText?: string
): CollapsibleNode {
  const node: CollapsibleNode = {
    ...createNode(NodeKind.Collapsible, pos, end),
    startOpen,
    children: []
  };
  if (showText !== undefined) node.showText = showText;
  if (hideText !== undefined) node.hideText = hideText;
  return node;
}

export function createCodeBlockNode(pos: number, end: number, text: string, language?: string): CodeBlockNode {
  const node: CodeBlockNode = {
    ...createNode(NodeKind.CodeBlock, pos, end),
    text
  };
  if (language !== undefined) node.language = language;
  return node;
}

export function createHorizontalRuleNode(pos: number, end: number): HorizontalRuleNode {
  return createNode(NodeKind.HorizontalRule, pos, end);
}

export function createClearFloatNode(pos: number, end: number, float: FloatClear): ClearFloatNode {
  return {
    ...createNode(NodeKind.ClearFloat, pos, end),
    float
  };
}

export function createIncludePlaceholderNode(
  pos: number,
  end: number,
  target: string,
  reason: string
): IncludePlaceholderNode {
  return {
    ...createNode(NodeKind.IncludePlaceholder, pos, end),
    target,
    reason
  };
}

export function createFootnoteBlockNode(pos: number, end: number, hide: boolean, title?: string): FootnoteBlockNode {
  const node: FootnoteBlockNode = {
    ...createNode(NodeKind.FootnoteBlock, pos, end),
    hide
  };
  if (title !== undefined) node.title = title;
  return node;
}

export function createModuleNode(
  pos: number,
  end: number,
  name: string,
  attributes: BlockAttributes,
  body?: string
): ModuleNode {
  const node: ModuleNode = {
    ...createNode(NodeKind.Module, pos, end),
    name,
    attributes
  };
  if (body !== undefined) node.body = body;
  return node;
}

export function createTextNode(pos: number, end: number, text: string): TextNode {
  return {
    ...createNode(NodeKind.Text, pos, end),
    text
  };
}

export function createFormattingNode(kind: FormattingKind, pos: number, end: number): FormattingNode {
  return {
    ...createNode(kind, pos, end),
    children: []
  };
}

export function createColorNode(pos: number, end: number, color: string): ColorNode {
  return {
    ...createNode(NodeKind.Color, pos, end),
    color,
    children: []
  };
}

export function createInlineContainerNode(
  pos: number,
  end: number,
  element: InlineContainerElement,
  attributes: BlockAttributes
): InlineContainerNode {
  return {
    ...createNode(NodeKind.InlineContainer, pos, end),
    element,
    attributes,
    children: []
  };
}

export function createSizeNode(pos: number, end: number, size: string): SizeNode {
  return {
    ...createNode(NodeKind.Size, pos, end),
    size,
    children: []
  };
}

export interface LinkDetails {
  linkType: LinkType;
  target: string;
  url: string;
  label?: string;
  labelFromPage?: boolean;
  newTab?: boolean;
}

export function createLinkNode(pos: number, end: number, details: LinkDetails): LinkNode {
  const node: LinkNode = {
    ...createNode(NodeKind.Link, pos, end),
    linkType: details.linkType,
    target: details.target,
    url: details.url,
    labelFromPage: details.labelFromPage ?? false,
    newTab: details.newTab ?? false
  };
  if (details.label !== undefined) node.label = details.label;
  return node;
}

export function createFootnoteNode(pos: number, end: number, index: number): FootnoteNode {
  return {
    ...createNode(NodeKind.Footnote, pos, end),
    index,
    children: []
  };
}

export function createEmailNode(pos: number, end: number, address: string): EmailNode {
  return {
    ...createNode(NodeKind.Email, pos, end),
    address
  };
}

export function createAnchorNode(pos: number, end: number, name: string): AnchorNode {
  return {
    ...createNode(NodeKind.Anchor, pos, end),
    name
  };
}

export function createRawNode(pos: number, end: number, text: string): RawNode {
  return {
    ...createNode(NodeKind.Raw, pos, end),
    text
  };
}

export function createLineBreakNode(pos: number, end: number): LineBreakNode {
  return createNode(NodeKind.LineBreak, pos, end);
}

export function createUnrecognizedNode(pos: number, end: number, name: string, text: string): UnrecognizedNode {
  const node: UnrecognizedNode = {
    ...createNode(NodeKind.Unrecognized, pos, end),
    name,
    text
  };
  node.flags |= NodeFlags.ContainsError;
  return node;
}
