import { describe, expect, test } from 'vitest';
import { BlockKind, SpanKind } from '../ast-types.js';
import type { AstNode } from '../ast-nodes.js';
import {
  VisitResult,
  findNodes,
  getAncestors,
  getDescendants,
  getNextSibling,
  getNodePath,
  getPreviousSibling,
  getSiblings,
  getTextContent,
  isAncestor,
  walkTree,
  walkTreeBottomUp
} from '../ast-traversal.js';
import { DomParser } from '../dom-parser.js';

function parse(markdown: string): AstNode {
  return new DomParser().parse(markdown);
}

describe('Tree walking', () => {
  test('top-down walk with skipped children', () => {
    const root = parse('# Title\n\nSome *emph* text\n');
    const blocks: string[] = [];
    const texts: string[] = [];
    walkTree(root, {
      visitBlock(node) {
        blocks.push(node.kind);
        return node.kind === BlockKind.Heading ? VisitResult.Skip : VisitResult.Continue;
      },
      visitText(node) {
        texts.push(String(node.text));
      }
    });
    expect(blocks).toEqual(['document', 'heading', 'paragraph']);
    expect(texts).toEqual(['Some ', 'emph', ' text']);
  });

  test('stop ends the walk', () => {
    const root = parse('# Title\n\nSome text\n');
    const texts: string[] = [];
    walkTree(root, {
      visitText(node) {
        texts.push(String(node.text));
        return VisitResult.Stop;
      }
    });
    expect(texts).toEqual(['Title']);
  });

  test('bottom-up walk visits children first', () => {
    const kinds: string[] = [];
    walkTreeBottomUp(parse('# T\n'), {
      visitNode(node) {
        kinds.push(node.kind);
      }
    });
    expect(kinds).toEqual(['normal-text', 'heading', 'document']);
  });

  test('spans go to visitSpan', () => {
    const spans: string[] = [];
    walkTree(parse('**a** [b](c)'), {
      visitSpan(node) {
        spans.push(node.kind);
      }
    });
    expect(spans).toEqual(['strong', 'link']);
  });
});

describe('Queries', () => {
  const root = parse('# Title\n\nSome *emph* text\n');
  const [heading, paragraph] = getDescendants(root).filter(node => node.parent === root);
  const [emphasis] = findNodes(root, SpanKind.Emphasis);

  test('descendants and kind lookups', () => {
    expect(getDescendants(root)).toHaveLength(7);
    expect(findNodes(root, BlockKind.Paragraph)).toEqual([paragraph]);
  });

  test('ancestors and paths', () => {
    if (!emphasis) throw new Error('no emphasis');
    expect(getAncestors(emphasis).map(node => node.kind)).toEqual(['paragraph', 'document']);
    expect(getNodePath(emphasis).map(node => node.kind)).toEqual(['document', 'paragraph', 'emphasis']);
    expect(isAncestor(root, emphasis)).toBe(true);
    expect(isAncestor(emphasis, root)).toBe(false);
  });

  test('siblings', () => {
    if (!heading || !paragraph) throw new Error('missing blocks');
    expect(getSiblings(heading)).toEqual([paragraph]);
    expect(getNextSibling(heading)).toBe(paragraph);
    expect(getPreviousSibling(heading)).toBeUndefined();
    expect(getPreviousSibling(paragraph)).toBe(heading);
    expect(getNextSibling(root)).toBeUndefined();
  });

  test('text content', () => {
    expect(getTextContent(root)).toBe('TitleSome emph text');
  });

  test('text content decodes entities and replaces NUL', () => {
    expect(getTextContent(parse('a&copy;b\u0000c'))).toBe('a\u00A9b\uFFFDc');
    expect(getTextContent(parse('a&#0;b  \nc\nd'))).toBe('a\uFFFDb\nc\nd');
  });

  test('text content of a byte tree', () => {
    expect(getTextContent(new DomParser().parse(new TextEncoder().encode('caf\u00E9 &amp; co')))).toBe('caf\u00E9 & co');
  });
});
