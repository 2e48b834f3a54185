import { describe, expect, test } from 'vitest';

import {
  VisitResult,
  findNodeAt,
  findNodesInRange,
  getAncestors,
  getDescendants,
  getNextSibling,
  getNodePath,
  getParent,
  getPreviousSibling,
  getSiblings,
  isAncestor,
  isDescendant,
  walkAST,
  walkASTBottomUp
} from '../ast-traversal.js';
import { type AnyNode, NodeKind } from '../ast-types.js';
import { parse } from '../core-parser.js';
import type { ParseOptions } from '../parser-interfaces.js';
import { tokenize } from '../scanner/tokenize.js';

const SOURCE = '**b** c\n\n+ T';

// document 0..12
//   paragraph 0..7
//     bold 0..5
//       text "b" 2..3
//     text " c" 5..7
//   heading 9..12
//     text "T" 11..12
function setup(options?: ParseOptions) {
  const document = parse(tokenize(SOURCE), options).document;
  const [paragraph, bold, textB, textC, heading, textT] = getDescendants(document);
  return { document, paragraph, bold, textB, textC, heading, textT };
}

function kinds(nodes: readonly AnyNode[]): string[] {
  return nodes.map(node => node.kind);
}

describe('walkAST', () => {
  test('visits nodes top-down in document order', () => {
    const { document } = setup();
    const seen: AnyNode[] = [];
    walkAST(document, {
      visitNode(node) {
        seen.push(node);
        return VisitResult.Continue;
      }
    });
    expect(kinds(seen)).toEqual([
      NodeKind.Document, NodeKind.Paragraph, NodeKind.Bold, NodeKind.Text, NodeKind.Text, NodeKind.Heading, NodeKind.Text
    ]);
  });

  test('kind-specific methods for footnotes and modules', () => {
    const document = parse(tokenize('[[module Backlinks]]\nx [[footnote]]y[[/footnote]]')).document;
    const seen: string[] = [];
    walkAST(document, {
      visitModule(node) {
        seen.push('module ' + node.name);
        return VisitResult.Continue;
      },
      visitFootnote(node) {
        seen.push('footnote ' + node.index);
        return VisitResult.Skip;
      }
    });
    expect(seen).toEqual(['module backlinks', 'footnote 1']);
  });

  test('Skip leaves out the children of a node', () => {
    const { document } = setup();
    const seen: AnyNode[] = [];
    walkAST(document, {
      visitParagraph: () => VisitResult.Skip,
      visitNode(node) {
        seen.push(node);
        return VisitResult.Continue;
      }
    });
    expect(kinds(seen)).toEqual([NodeKind.Document, NodeKind.Heading, NodeKind.Text]);
  });

  test('Stop ends the walk', () => {
    const { document } = setup();
    const seen: AnyNode[] = [];
    walkAST(document, {
      visitText: () => VisitResult.Stop,
      visitNode(node) {
        seen.push(node);
        return VisitResult.Continue;
      }
    });
    expect(kinds(seen)).toEqual([NodeKind.Document, NodeKind.Paragraph, NodeKind.Bold]);
  });

  test('specific visitors receive the parent', () => {
    const { document, heading } = setup();
    const parents: (AnyNode | undefined)[] = [];
    walkAST(document, {
      visitHeading(node, parent) {
        parents.push(parent);
        expect(node.level).toBe(1);
        return VisitResult.Continue;
      }
    });
    expect(parents).toEqual([document]);
    expect(heading?.kind).toBe(NodeKind.Heading);
  });

  test('bottom-up visits children before parents', () => {
    const { document } = setup();
    const seen: AnyNode[] = [];
    walkASTBottomUp(document, {
      visitNode(node) {
        seen.push(node);
        return VisitResult.Continue;
      }
    });
    expect(kinds(seen)).toEqual([
      NodeKind.Text, NodeKind.Bold, NodeKind.Text, NodeKind.Paragraph, NodeKind.Text, NodeKind.Heading, NodeKind.Document
    ]);
  });
});

describe('Position queries', () => {
  test('findNodeAt returns the deepest node', () => {
    const { document, textB } = setup();
    expect(findNodeAt(document, 2)).toBe(textB);
  });

  test('offsets between blocks belong to the document', () => {
    const { document } = setup();
    expect(findNodeAt(document, 8)).toBe(document);
    expect(findNodeAt(document, 12)).toBe(document);
    expect(findNodeAt(document, 13)).toBeUndefined();
  });

  test('findNodesInRange returns intersecting nodes in order', () => {
    const { document, paragraph, textC, heading } = setup();
    expect(findNodesInRange(document, 6, 10)).toEqual([document, paragraph, textC, heading]);
  });
});

describe('Tree relations', () => {
  test('paths and ancestors', () => {
    const { document, paragraph, bold, textB } = setup();
    expect(getNodePath(document, textB)).toEqual([document, paragraph, bold, textB]);
    expect(getAncestors(document, textB)).toEqual([document, paragraph, bold]);
    expect(getParent(document, textB)).toBe(bold);
    expect(getParent(document, document)).toBeUndefined();
  });

  test('a node from another tree has no path', () => {
    const { document } = setup();
    const other = setup().textB;
    expect(getNodePath(document, other)).toEqual([]);
  });

  test('siblings', () => {
    const { document, paragraph, bold, textC, heading } = setup();
    expect(getSiblings(document, bold)).toEqual([textC]);
    expect(getNextSibling(document, paragraph)).toBe(heading);
    expect(getNextSibling(document, heading)).toBeUndefined();
    expect(getPreviousSibling(document, textC)).toBe(bold);
    expect(getPreviousSibling(document, bold)).toBeUndefined();
  });

  test('descendants and ancestry checks', () => {
    const { document, paragraph, textB, heading } = setup();
    expect(getDescendants(paragraph)).toHaveLength(3);
    expect(isAncestor(paragraph, textB)).toBe(true);
    expect(isAncestor(heading, textB)).toBe(false);
    expect(isAncestor(document, document)).toBe(false);
    expect(isDescendant(textB, document)).toBe(true);
  });

  test('parent links are set on request', () => {
    const linked = setup({ enableParentLinking: true });
    expect(linked.textB?.parent).toBe(linked.bold);
    expect(linked.paragraph?.parent).toBe(linked.document);

    expect(setup().textB?.parent).toBeUndefined();
  });
});
