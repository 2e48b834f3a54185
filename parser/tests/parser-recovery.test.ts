import { describe, expect, test } from 'vitest';

import { validateChildPositions, validateNodePosition } from '../ast-factory.js';
import { VisitResult, childrenOf, walkAST } from '../ast-traversal.js';
import { type AnyNode, ALL_NODE_KINDS, NodeFlags, NodeKind, hasNodeFlag } from '../ast-types.js';
import { parse } from '../core-parser.js';
import { ParseErrorCode } from '../parser-interfaces.js';
import { parseWikitext } from '../pipeline.js';
import { tokenize } from '../scanner/tokenize.js';

function parseText(text: string) {
  return parse(tokenize(text));
}

const MESSY_INPUTS = [
  '',
  '   ',
  '\n\n\n',
  '**a //b** c//',
  '[[div]]\n> q\n[[/div]]\n[[/div]]',
  '|| a || b\n|| c ||',
  '* a\n  * b\n * c\n# d',
  '##red|x',
  '[[[a|b',
  '[[span_]]x _\ny[[/span]]',
  '+ head **x\n\ntext',
  '[[code]]\nx',
  '[[=]]\n[[<]]\na\n[[/=]]',
  '@@ x',
  '[!-- never closed',
  '[[[[x]]]]',
  ']]]] ]] ]',
  '[[*user x]]',
  '~~~~\n----\n',
  '> > a\n>> b\n> c\n\n> d',
  '[[collapsible]]\n* a\n|| b',
  '[[div]]\n[[[x [[/div]]',
  'a [[footnote]]b\n\nc',
  '[[module css]]\nx',
  '|| a **b || c** ||',
  '[[footnoteblock]]\n[[module Nope]]'
];

/** Nodes whose children break containment or ordering. */
function misplacedNodes(root: AnyNode, sourceLength: number): AnyNode[] {
  const misplaced: AnyNode[] = [];
  walkAST(root, {
    visitNode(node) {
      if (!validateNodePosition(node, sourceLength) || !validateChildPositions(node, childrenOf(node))) {
        misplaced.push(node);
      }
      return VisitResult.Continue;
    }
  });
  return misplaced;
}

describe('Recovery', () => {
  test('bold followed by text', () => {
    const { document, diagnostics } = parseText('**bold** text');
    expect(document.children).toEqual([
      {
        kind: NodeKind.Paragraph, flags: NodeFlags.None, pos: 0, end: 13,
        children: [
          {
            kind: NodeKind.Bold, flags: NodeFlags.None, pos: 0, end: 8,
            children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 2, end: 6, text: 'bold' }]
          },
          { kind: NodeKind.Text, flags: NodeFlags.None, pos: 8, end: 13, text: ' text' }
        ]
      }
    ]);
    expect(diagnostics).toEqual([]);
  });

  test('an unclosed bold span is closed at the end of the paragraph', () => {
    const { document, diagnostics } = parseText('**unclosed');
    expect(document.children).toEqual([
      {
        kind: NodeKind.Paragraph, flags: NodeFlags.None, pos: 0, end: 10,
        children: [
          {
            kind: NodeKind.Bold, flags: NodeFlags.AutoClosed | NodeFlags.ContainsError, pos: 0, end: 10,
            children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 2, end: 10, text: 'unclosed' }]
          }
        ]
      }
    ]);
    expect(diagnostics).toEqual([
      {
        severity: 'warning',
        category: 'structure',
        code: ParseErrorCode.UnclosedBlockAutoClosed,
        message: "'**' was never closed; closed automatically",
        subject: '**',
        pos: 0,
        end: 2
      }
    ]);
  });

  test('a closing marker without an opener stays in the text', () => {
    const { document, diagnostics } = parseText('text**');
    expect(document.children).toEqual([
      {
        kind: NodeKind.Paragraph, flags: NodeFlags.None, pos: 0, end: 6,
        children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 6, text: 'text**' }]
      }
    ]);
    expect(diagnostics).toMatchObject([
      { code: ParseErrorCode.UnmatchedClosingMarker, category: 'nesting', pos: 4, end: 6, subject: '**' }
    ]);
  });

  test('empty input', () => {
    const { document, diagnostics } = parseText('');
    expect(document.kind).toBe(NodeKind.Document);
    expect(document.children).toEqual([]);
    expect([document.pos, document.end]).toEqual([0, 0]);
    expect(diagnostics).toEqual([]);
  });

  test('diagnostics come out in document order', () => {
    const { diagnostics } = parseText('[[div]]\n**a}}');
    expect(diagnostics.map(diagnostic => [diagnostic.code, diagnostic.pos])).toEqual([
      [ParseErrorCode.UnclosedBlockAutoClosed, 0],
      [ParseErrorCode.UnclosedBlockAutoClosed, 8],
      [ParseErrorCode.UnmatchedClosingMarker, 11]
    ]);
  });
});

describe('Properties', () => {
  test('every input produces a tree', () => {
    for (const input of MESSY_INPUTS) {
      const outcome = parseText(input);
      expect(outcome.document.kind).toBe(NodeKind.Document);
      expect(outcome.document.end).toBe(input.length);
    }
  });

  test('children lie inside their parents, in order', () => {
    for (const input of MESSY_INPUTS) {
      expect(misplacedNodes(parseText(input).document, input.length)).toEqual([]);
    }
  });

  test('every auto-closed construct has its diagnostic', () => {
    for (const input of MESSY_INPUTS) {
      const { document, diagnostics } = parseText(input);
      walkAST(document, {
        visitNode(node) {
          if (hasNodeFlag(node, NodeFlags.AutoClosed)) {
            expect(diagnostics).toContainEqual(expect.objectContaining({
              code: ParseErrorCode.UnclosedBlockAutoClosed,
              pos: node.pos
            }));
          }
          return VisitResult.Continue;
        }
      });
    }
  });

  test('node kinds are distinct string tags', () => {
    expect(ALL_NODE_KINDS).toContain('list-item');
    expect(new Set(ALL_NODE_KINDS).size).toBe(ALL_NODE_KINDS.length);
  });

  test('the pipeline is deterministic', () => {
    for (const input of MESSY_INPUTS) {
      const first = parseWikitext(input);
      const second = parseWikitext(input);
      expect(JSON.stringify(second.document)).toBe(JSON.stringify(first.document));
      expect(second.diagnostics).toEqual(first.diagnostics);
    }
  });
});
