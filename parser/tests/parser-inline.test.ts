import { describe, expect, test } from 'vitest';

import { type InlineNode, NodeFlags, NodeKind } from '../ast-types.js';
import { parse } from '../core-parser.js';
import { resolveLinkTarget } from '../inline-parser.js';
import { type ParseOptions, ParseErrorCode } from '../parser-interfaces.js';
import { tokenize } from '../scanner/tokenize.js';

function parseText(text: string, options?: ParseOptions) {
  return parse(tokenize(text), options);
}

/** Children of the first paragraph. */
function inline(text: string, options?: ParseOptions): InlineNode[] {
  const first = parseText(text, options).document.children[0];
  return first?.kind === NodeKind.Paragraph ? first.children : [];
}

describe('Formatting', () => {
  test('italic', () => {
    expect(inline('//it//')).toEqual([
      {
        kind: NodeKind.Italic, flags: NodeFlags.None, pos: 0, end: 6,
        children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 2, end: 4, text: 'it' }]
      }
    ]);
  });

  test('monospace', () => {
    expect(inline('{{code}}')).toEqual([
      {
        kind: NodeKind.Monospace, flags: NodeFlags.None, pos: 0, end: 8,
        children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 2, end: 6, text: 'code' }]
      }
    ]);
  });

  test('a stray monospace closer is text', () => {
    const { document, diagnostics } = parseText('a}}');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 3, text: 'a}}' }
    ]);
    expect(diagnostics).toMatchObject([{ code: ParseErrorCode.UnmatchedClosingMarker, pos: 1, end: 3, subject: '}}' }]);
  });

  test('delimiters surrounded by spaces are plain text', () => {
    const { document, diagnostics } = parseText('a ** b');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 6, text: 'a ** b' }
    ]);
    expect(diagnostics).toEqual([]);
  });

  test('closing an outer span auto-closes the inner one', () => {
    const { document, diagnostics } = parseText('**a //b**');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      {
        kind: NodeKind.Bold, flags: NodeFlags.None, pos: 0, end: 9,
        children: [
          { kind: NodeKind.Text, flags: NodeFlags.None, pos: 2, end: 4, text: 'a ' },
          {
            kind: NodeKind.Italic, flags: NodeFlags.AutoClosed | NodeFlags.ContainsError, pos: 4, end: 7,
            children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 6, end: 7, text: 'b' }]
          }
        ]
      }
    ]);
    expect(diagnostics).toMatchObject([{ code: ParseErrorCode.UnclosedBlockAutoClosed, pos: 4, end: 6, subject: '//' }]);
  });

  test('openers past the nesting limit are text', () => {
    const { document, diagnostics } = parseText('**a //b//**', { maxNestingDepth: 1 });
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      {
        kind: NodeKind.Bold, flags: NodeFlags.None, pos: 0, end: 11,
        children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 2, end: 9, text: 'a //b//' }]
      }
    ]);
    expect(diagnostics).toEqual([]);
  });

  test('spans continue across line breaks of a paragraph', () => {
    expect(inline('**a\nb**')).toEqual([
      {
        kind: NodeKind.Bold, flags: NodeFlags.None, pos: 0, end: 7,
        children: [
          { kind: NodeKind.Text, flags: NodeFlags.None, pos: 2, end: 3, text: 'a' },
          { kind: NodeKind.LineBreak, flags: NodeFlags.None, pos: 3, end: 4 },
          { kind: NodeKind.Text, flags: NodeFlags.None, pos: 4, end: 5, text: 'b' }
        ]
      }
    ]);
  });
});

describe('Color', () => {
  test('color span', () => {
    expect(inline('##red|hot##')).toEqual([
      {
        kind: NodeKind.Color, flags: NodeFlags.None, pos: 0, end: 11, color: 'red',
        children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 6, end: 9, text: 'hot' }]
      }
    ]);
  });

  test('an opener without a color name is text', () => {
    const { document, diagnostics } = parseText('##red hot');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 9, text: '##red hot' }
    ]);
    expect(diagnostics).toMatchObject([{ code: ParseErrorCode.MalformedConstruct, pos: 0, end: 2, subject: '##' }]);
  });
});

describe('Raw text', () => {
  test('markup inside @@ is kept', () => {
    expect(inline('@@**x**@@')).toEqual([
      { kind: NodeKind.Raw, flags: NodeFlags.None, pos: 0, end: 9, text: '**x**' }
    ]);
  });

  test('six at-signs give a literal @@', () => {
    expect(inline('@@@@@@')).toEqual([
      { kind: NodeKind.Raw, flags: NodeFlags.None, pos: 0, end: 6, text: '@@' }
    ]);
  });

  test('angle raw', () => {
    expect(inline('@<a*b>@')).toEqual([
      { kind: NodeKind.Raw, flags: NodeFlags.None, pos: 0, end: 7, text: 'a*b' }
    ]);
  });

  test('an unclosed raw degrades to text', () => {
    const { document, diagnostics } = parseText('@@open');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 6, text: '@@open' }
    ]);
    expect(diagnostics).toMatchObject([{ code: ParseErrorCode.MalformedConstruct, pos: 0, end: 6, subject: '@@' }]);
  });
});

describe('Links', () => {
  test('page link', () => {
    expect(inline('[[[Some Page]]]')).toEqual([
      {
        kind: NodeKind.Link, flags: NodeFlags.None, pos: 0, end: 15,
        linkType: 'page', target: 'Some Page', url: 'some-page', labelFromPage: false, newTab: false
      }
    ]);
  });

  test('page link with a label', () => {
    const [link] = inline('[[[page | Label]]]');
    expect(link?.kind === NodeKind.Link && [link.label, link.labelFromPage]).toEqual(['Label', false]);
  });

  test('an empty label takes the page title', () => {
    const [link] = inline('[[[page|]]]');
    expect(link?.kind === NodeKind.Link && [link.label, link.labelFromPage]).toEqual([undefined, true]);
  });

  test('URL target opened in a new tab', () => {
    expect(inline('[[[*http://example.com/x | Ex]]]')).toEqual([
      {
        kind: NodeKind.Link, flags: NodeFlags.None, pos: 0, end: 32,
        linkType: 'url', target: 'http://example.com/x', url: 'http://example.com/x',
        label: 'Ex', labelFromPage: false, newTab: true
      }
    ]);
  });

  test('an unclosed link degrades to text', () => {
    const { document, diagnostics } = parseText('[[[broken');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 9, text: '[[[broken' }
    ]);
    expect(diagnostics).toMatchObject([{ code: ParseErrorCode.MalformedConstruct, pos: 0, end: 9, subject: '[[[' }]);
  });

  test('single bracket link', () => {
    expect(inline('[http://example.com site]')).toEqual([
      {
        kind: NodeKind.Link, flags: NodeFlags.None, pos: 0, end: 25,
        linkType: 'url', target: 'http://example.com', url: 'http://example.com',
        label: 'site', labelFromPage: false, newTab: false
      }
    ]);
  });

  test('a bracket without a URL is text', () => {
    expect(inline('[not a link]')).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 12, text: '[not a link]' }
    ]);
  });

  test('anchor link', () => {
    const [link] = inline('[#top Back]');
    expect(link?.kind === NodeKind.Link && [link.linkType, link.target, link.url, link.label])
      .toEqual(['anchor', 'top', '#top', 'Back']);
  });

  test('anchor', () => {
    expect(inline('[[# here]]')).toEqual([
      { kind: NodeKind.Anchor, flags: NodeFlags.None, pos: 0, end: 10, name: 'here' }
    ]);
  });

  test('bare URL and email', () => {
    expect(inline('see http://example.com')).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 4, text: 'see ' },
      {
        kind: NodeKind.Link, flags: NodeFlags.None, pos: 4, end: 22,
        linkType: 'url', target: 'http://example.com', url: 'http://example.com', labelFromPage: false, newTab: false
      }
    ]);
    expect(inline('write a@b.co')).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 6, text: 'write ' },
      { kind: NodeKind.Email, flags: NodeFlags.None, pos: 6, end: 12, address: 'a@b.co' }
    ]);
  });

  test('link targets', () => {
    expect(resolveLinkTarget('Some Page')).toEqual({ linkType: 'page', url: 'some-page' });
    expect(resolveLinkTarget('Page#Sec')).toEqual({ linkType: 'page', url: 'page#Sec' });
    expect(resolveLinkTarget('#top')).toEqual({ linkType: 'anchor', url: '#top' });
    expect(resolveLinkTarget('https://example.com')).toEqual({ linkType: 'url', url: 'https://example.com' });
  });
});

describe('Line breaks and comments', () => {
  test('forced line break', () => {
    expect(inline('one _\ntwo')).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 4, text: 'one ' },
      { kind: NodeKind.LineBreak, flags: NodeFlags.None, pos: 4, end: 5 },
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 6, end: 9, text: 'two' }
    ]);
  });

  test('a forced break keeps a list item going', () => {
    const list = parseText('* one _\ntwo').document.children;
    expect(list.map(node => node.kind)).toEqual([NodeKind.List]);
  });

  test('comments produce nothing', () => {
    expect(inline('a[!-- note --]b')).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 1, text: 'a' },
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 14, end: 15, text: 'b' }
    ]);
  });

  test('comments may span lines', () => {
    expect(inline('a[!-- x\ny --]b')).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 1, text: 'a' },
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 13, end: 14, text: 'b' }
    ]);
  });

  test('an unclosed comment opener is text', () => {
    const { document, diagnostics } = parseText('a[!-- b');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 7, text: 'a[!-- b' }
    ]);
    expect(diagnostics).toMatchObject([{ code: ParseErrorCode.MalformedConstruct, pos: 1, end: 5, subject: '[!--' }]);
  });
});

describe('Inline blocks', () => {
  test('span', () => {
    expect(inline('x [[span]]y[[/span]]')).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 2, text: 'x ' },
      {
        kind: NodeKind.InlineContainer, flags: NodeFlags.None, pos: 2, end: 20, element: 'span', attributes: {},
        children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 10, end: 11, text: 'y' }]
      }
    ]);
  });

  test('span_ drops line breaks at its edges', () => {
    const [span] = inline('[[span_]]\nx\n[[/span]]');
    expect(span?.kind === NodeKind.InlineContainer && span.children).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 10, end: 11, text: 'x' }
    ]);
  });

  test('size', () => {
    expect(inline('[[size 80%]]big[[/size]]')).toEqual([
      {
        kind: NodeKind.Size, flags: NodeFlags.None, pos: 0, end: 24, size: '80%',
        children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 12, end: 15, text: 'big' }]
      }
    ]);
  });

  test('deprecated names still work', () => {
    const { document, diagnostics } = parseText('x [[deletion]]y[[/deletion]]');
    const paragraph = document.children[0];
    const container = paragraph?.kind === NodeKind.Paragraph ? paragraph.children[1] : undefined;

    expect(container?.kind === NodeKind.InlineContainer && container.element).toBe('del');
    expect(diagnostics).toMatchObject([
      { code: ParseErrorCode.DeprecatedConstruct, pos: 2, end: 14, subject: 'deletion', context: { replacement: 'del' } },
      { code: ParseErrorCode.DeprecatedConstruct, pos: 15, end: 28, subject: 'deletion', context: { replacement: 'del' } }
    ]);
  });

  test('a block name in the middle of a line is text', () => {
    const { document, diagnostics } = parseText('a [[div]] b');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 11, text: 'a [[div]] b' }
    ]);
    expect(diagnostics).toMatchObject([{ code: ParseErrorCode.MalformedConstruct, pos: 2, end: 9, subject: 'div' }]);
  });

  test('an unknown block inside a line', () => {
    const nodes = inline('a [[foo]] b');
    expect(nodes.map(node => node.kind)).toEqual([NodeKind.Text, NodeKind.Unrecognized, NodeKind.Text]);
  });
});

describe('Footnotes', () => {
  test('a footnote takes the space before it and runs across lines', () => {
    const { document, diagnostics } = parseText('a  [[footnote]]b\nc[[/footnote]] d');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 1, text: 'a' },
      {
        kind: NodeKind.Footnote, flags: NodeFlags.None, pos: 3, end: 31, index: 1,
        children: [
          { kind: NodeKind.Text, flags: NodeFlags.None, pos: 15, end: 16, text: 'b' },
          { kind: NodeKind.LineBreak, flags: NodeFlags.None, pos: 16, end: 17 },
          { kind: NodeKind.Text, flags: NodeFlags.None, pos: 17, end: 18, text: 'c' }
        ]
      },
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 31, end: 33, text: ' d' }
    ]);
    expect(diagnostics).toEqual([]);
  });

  test('footnotes are numbered in document order', () => {
    const { document } = parseText('[[footnote]]a[[/footnote]] [[footnote]]b[[/footnote]]\n\n[[footnote]]c[[/footnote]]');
    const indexes: number[] = [];
    for (const block of document.children) {
      if (block.kind !== NodeKind.Paragraph) continue;
      for (const node of block.children) {
        if (node.kind === NodeKind.Footnote) indexes.push(node.index);
      }
    }
    expect(indexes).toEqual([1, 2, 3]);
  });

  test('a footnote inside a footnote is text', () => {
    const nodes = inline('[[footnote]]a [[footnote]]b[[/footnote]]');
    expect(nodes).toEqual([
      {
        kind: NodeKind.Footnote, flags: NodeFlags.None, pos: 0, end: 40, index: 1,
        children: [{ kind: NodeKind.Text, flags: NodeFlags.None, pos: 12, end: 27, text: 'a [[footnote]]b' }]
      }
    ]);
  });

  test('an unclosed footnote ends with its paragraph', () => {
    const { document, diagnostics } = parseText('x [[footnote]]note\n\ny');
    const paragraph = document.children[0];
    expect(paragraph?.kind === NodeKind.Paragraph && paragraph.children[1]).toMatchObject({
      kind: NodeKind.Footnote, flags: NodeFlags.AutoClosed | NodeFlags.ContainsError, pos: 2, end: 18
    });
    expect(diagnostics).toMatchObject([
      { code: ParseErrorCode.UnclosedBlockAutoClosed, pos: 2, end: 14, subject: 'footnote' }
    ]);
  });

  test('footnote block in a line', () => {
    expect(inline('x [[footnoteblock hide="yes"]]')).toEqual([
      { kind: NodeKind.Text, flags: NodeFlags.None, pos: 0, end: 2, text: 'x ' },
      { kind: NodeKind.FootnoteBlock, flags: NodeFlags.None, pos: 2, end: 30, hide: true }
    ]);
  });
});
