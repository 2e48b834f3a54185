/**
 * AST Traversal Infrastructure
 *
 * Visitor pattern and utility functions for walking and querying syntax trees.
 */

import {
  type AlignNode,
  type AnchorNode,
  type AnyNode,
  type BlockquoteNode,
  type ClearFloatNode,
  type CodeBlockNode,
  type CollapsibleNode,
  type ColorNode,
  type DivNode,
  type DocumentNode,
  type EmailNode,
  type FootnoteBlockNode,
  type FootnoteNode,
  type FormattingNode,
  type HeadingNode,
  type HorizontalRuleNode,
  type IncludePlaceholderNode,
  type InlineContainerNode,
  type LineBreakNode,
  type LinkNode,
  type ListItemNode,
  type ListNode,
  type ModuleNode,
  type ParagraphNode,
  type RawNode,
  type SizeNode,
  type TableCellNode,
  type TableNode,
  type TableRowNode,
  type TextNode,
  type UnrecognizedNode,
  NodeKind,
  isContainerNode
} from './ast-types.js';

/**
 * Visit result controls traversal flow
 */
export enum VisitResult {
  /** Continue normal traversal (visit children) */
  Continue,

  /** Skip children but continue with siblings */
  Skip,

  /** Stop traversal entirely */
  Stop
}

type VisitMethod<T> = (node: T, parent?: AnyNode) => VisitResult;

/**
 * Visitor with optional methods per node kind. A node whose specific method
 * is missing goes to visitNode; without either, traversal continues.
 */
export interface Visitor {
  /** Generic node visitor (called for all nodes if specific visitor not defined) */
  visitNode?: VisitMethod<AnyNode>;

  visitDocument?: VisitMethod<DocumentNode>;

  /** Block node visitors */
  visitParagraph?: VisitMethod<ParagraphNode>;
  visitHeading?: VisitMethod<HeadingNode>;
  visitList?: VisitMethod<ListNode>;
  visitListItem?: VisitMethod<ListItemNode>;
  visitTable?: VisitMethod<TableNode>;
  visitTableRow?: VisitMethod<TableRowNode>;
  visitTableCell?: VisitMethod<TableCellNode>;
  visitBlockquote?: VisitMethod<BlockquoteNode>;
  visitDiv?: VisitMethod<DivNode>;
  visitAlign?: VisitMethod<AlignNode>;
  visitCollapsible?: VisitMethod<CollapsibleNode>;
  visitCodeBlock?: VisitMethod<CodeBlockNode>;
  visitHorizontalRule?: VisitMethod<HorizontalRuleNode>;
  visitClearFloat?: VisitMethod<ClearFloatNode>;
  visitIncludePlaceholder?: VisitMethod<IncludePlaceholderNode>;
  visitFootnoteBlock?: VisitMethod<FootnoteBlockNode>;
  visitModule?: VisitMethod<ModuleNode>;

  /** Inline node visitors */
  visitText?: VisitMethod<TextNode>;
  /** bold, italic, underline, strikethrough, superscript, subscript and monospace */
  visitFormatting?: VisitMethod<FormattingNode>;
  visitColor?: VisitMethod<ColorNode>;
  visitInlineContainer?: VisitMethod<InlineContainerNode>;
  visitSize?: VisitMethod<SizeNode>;
  visitLink?: VisitMethod<LinkNode>;
  visitEmail?: VisitMethod<EmailNode>;
  visitAnchor?: VisitMethod<AnchorNode>;
  visitRaw?: VisitMethod<RawNode>;
  visitLineBreak?: VisitMethod<LineBreakNode>;
  visitFootnote?: VisitMethod<FootnoteNode>;

  visitUnrecognized?: VisitMethod<UnrecognizedNode>;
}

/**
 * Walk AST tree using visitor pattern (top-down)
 */
export function walkAST(root: AnyNode, visitor: Visitor): void {
  walkASTRecursive(root, visitor, undefined);
}

/**
 * Walk AST tree bottom-up (children first, then parent)
 */
export function walkASTBottomUp(root: AnyNode, visitor: Visitor): void {
  walkASTBottomUpRecursive(root, visitor, undefined);
}

function walkASTRecursive(node: AnyNode, visitor: Visitor, parent?: AnyNode): VisitResult {
  const result = callVisitorMethod(node, visitor, parent);

  if (result === VisitResult.Stop) {
    return VisitResult.Stop;
  }

  if (result === VisitResult.Skip) {
    return VisitResult.Continue;
  }

  for (const child of childrenOf(node)) {
    if (walkASTRecursive(child, visitor, node) === VisitResult.Stop) {
      return VisitResult.Stop;
    }
  }

  return VisitResult.Continue;
}

function walkASTBottomUpRecursive(node: AnyNode, visitor: Visitor, parent?: AnyNode): VisitResult {
  for (const child of childrenOf(node)) {
    if (walkASTBottomUpRecursive(child, visitor, node) === VisitResult.Stop) {
      return VisitResult.Stop;
    }
  }

  // Skip has no meaning once the children are done
  return callVisitorMethod(node, visitor, parent) === VisitResult.Stop ? VisitResult.Stop : VisitResult.Continue;
}

/**
 * Call the appropriate visitor method based on node kind
 */
function callVisitorMethod(node: AnyNode, visitor: Visitor, parent?: AnyNode): VisitResult {
  let result: VisitResult | undefined;

  switch (node.kind) {
    case NodeKind.Document: result = visitor.visitDocument?.(node, parent); break;
    case NodeKind.Paragraph: result = visitor.visitParagraph?.(node, parent); break;
    case NodeKind.Heading: result = visitor.visitHeading?.(node, parent); break;
    case NodeKind.List: result = visitor.visitList?.(node, parent); break;
    case NodeKind.ListItem: result = visitor.visitListItem?.(node, parent); break;
    case NodeKind.Table: result = visitor.visitTable?.(node, parent); break;
    case NodeKind.TableRow: result = visitor.visitTableRow?.(node, parent); break;
    case NodeKind.TableCell: result = visitor.visitTableCell?.(node, parent); break;
    case NodeKind.Blockquote: result = visitor.visitBlockquote?.(node, parent); break;
    case NodeKind.Div: result = visitor.visitDiv?.(node, parent); break;
    case NodeKind.Align: result = visitor.visitAlign?.(node, parent); break;
    case NodeKind.Collapsible: result = visitor.visitCollapsible?.(node, parent); break;
    case NodeKind.CodeBlock: result = visitor.visitCodeBlock?.(node, parent); break;
    case NodeKind.HorizontalRule: result = visitor.visitHorizontalRule?.(node, parent); break;
    case NodeKind.ClearFloat: result = visitor.visitClearFloat?.(node, parent); break;
    case NodeKind.IncludePlaceholder: result = visitor.visitIncludePlaceholder?.(node, parent); break;
    case NodeKind.FootnoteBlock: result = visitor.visitFootnoteBlock?.(node, parent); break;
    case NodeKind.Module: result = visitor.visitModule?.(node, parent); break;

    case NodeKind.Text: result = visitor.visitText?.(node, parent); break;
    case NodeKind.Bold:
    case NodeKind.Italic:
    case NodeKind.Underline:
    case NodeKind.Strikethrough:
    case NodeKind.Superscript:
    case NodeKind.Subscript:
    case NodeKind.Monospace:
      result = visitor.visitFormatting?.(node, parent);
      break;
    case NodeKind.Color: result = visitor.visitColor?.(node, parent); break;
    case NodeKind.InlineContainer: result = visitor.visitInlineContainer?.(node, parent); break;
    case NodeKind.Size: result = visitor.visitSize?.(node, parent); break;
    case NodeKind.Link: result = visitor.visitLink?.(node, parent); break;
    case NodeKind.Email: result = visitor.visitEmail?.(node, parent); break;
    case NodeKind.Anchor: result = visitor.visitAnchor?.(node, parent); break;
    case NodeKind.Raw: result = visitor.visitRaw?.(node, parent); break;
    case NodeKind.LineBreak: result = visitor.visitLineBreak?.(node, parent); break;
    case NodeKind.Footnote: result = visitor.visitFootnote?.(node, parent); break;

    case NodeKind.Unrecognized: result = visitor.visitUnrecognized?.(node, parent); break;
  }

  return result ?? visitor.visitNode?.(node, parent) ?? VisitResult.Continue;
}

/**
 * Children of a container, or an empty list for a leaf
 */
export function childrenOf(node: AnyNode): readonly AnyNode[] {
  return isContainerNode(node) ? node.children : [];
}

// =============================================================================
// Position-based Query Functions
// =============================================================================

/**
 * Find the deepest node whose span contains the given offset. Spans are
 * half-open, except that the root also answers for its own end offset.
 */
export function findNodeAt(root: AnyNode, offset: number): AnyNode | undefined {
  if (offset < root.pos || offset > root.end) {
    return undefined;
  }

  let result: AnyNode = root;

  walkAST(root, {
    visitNode(node) {
      if (node === root) return VisitResult.Continue;
      if (offset >= node.pos && offset < node.end) {
        result = node;
        return VisitResult.Continue;
      }
      return VisitResult.Skip;
    }
  });

  return result;
}

/**
 * Find all nodes that intersect with the given range, in document order
 */
export function findNodesInRange(root: AnyNode, start: number, end: number): AnyNode[] {
  const result: AnyNode[] = [];

  walkAST(root, {
    visitNode(node) {
      // Empty nodes count when they sit inside the range
      const intersects = node.pos === node.end
        ? node.pos >= start && node.pos <= end
        : node.pos < end && node.end > start;
      if (!intersects) {
        return VisitResult.Skip;
      }

      result.push(node);
      return VisitResult.Continue;
    }
  });

  return result;
}

/**
 * Get the path from root to a specific node, or an empty list when the
 * node is not in the tree
 */
export function getNodePath(root: AnyNode, target: AnyNode): AnyNode[] {
  const path: AnyNode[] = [];

  function findPath(node: AnyNode): boolean {
    path.push(node);
    if (node === target) return true;

    for (const child of childrenOf(node)) {
      if (findPath(child)) return true;
    }

    path.pop();
    return false;
  }

  return findPath(root) ? path : [];
}

/**
 * Get all ancestor nodes of a target node (excluding the target itself)
 */
export function getAncestors(root: AnyNode, target: AnyNode): AnyNode[] {
  return getNodePath(root, target).slice(0, -1);
}

export function getParent(root: AnyNode, target: AnyNode): AnyNode | undefined {
  const ancestors = getAncestors(root, target);
  return ancestors[ancestors.length - 1];
}

/**
 * Get all descendant nodes of a given node, in document order
 */
export function getDescendants(node: AnyNode): AnyNode[] {
  const descendants: AnyNode[] = [];

  walkAST(node, {
    visitNode(visited) {
      if (visited !== node) {
        descendants.push(visited);
      }
      return VisitResult.Continue;
    }
  });

  return descendants;
}

/**
 * Check if one node is an ancestor of another
 */
export function isAncestor(ancestor: AnyNode, descendant: AnyNode): boolean {
  return ancestor !== descendant && getNodePath(ancestor, descendant).length > 0;
}

export function isDescendant(descendant: AnyNode, ancestor: AnyNode): boolean {
  return isAncestor(ancestor, descendant);
}

/**
 * Get siblings of a node (requires walking from root)
 */
export function getSiblings(root: AnyNode, target: AnyNode): AnyNode[] {
  const parent = getParent(root, target);
  return parent ? childrenOf(parent).filter(child => child !== target) : [];
}

export function getNextSibling(root: AnyNode, target: AnyNode): AnyNode | undefined {
  const parent = getParent(root, target);
  if (!parent) return undefined;

  const children = childrenOf(parent);
  const index = children.indexOf(target);
  return index >= 0 ? children[index + 1] : undefined;
}

export function getPreviousSibling(root: AnyNode, target: AnyNode): AnyNode | undefined {
  const parent = getParent(root, target);
  if (!parent) return undefined;

  const children = childrenOf(parent);
  const index = children.indexOf(target);
  return index > 0 ? children[index - 1] : undefined;
}
