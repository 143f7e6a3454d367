/**
 * Tests for the markdown-it event source: event order and details
 */

import { describe, expect, test } from 'vitest';
import { BlockKind, SpanKind, TextKind, type Payload } from '../ast-types.js';
import type { BlockDetailsMap, SpanDetailsMap } from '../ast-details.js';
import { renderAttribute, type TextNode } from '../ast-nodes.js';
import { CodeBlock, ListItem, OrderedList, Table, UnorderedList } from '../block-nodes.js';
import { Link } from '../span-nodes.js';
import { findNodes } from '../ast-traversal.js';
import { DomParser } from '../dom-parser.js';
import { StopParsing } from '../errors.js';
import { MarkdownItEngine } from '../markdown-it-engine.js';
import { ParserObject } from '../parser-object.js';
import { resolveParserFlags, type ParserFlags } from '../parser-interfaces.js';

/**
 * Records events as short strings
 */
class EventRecorder extends ParserObject {
  readonly events: string[] = [];

  constructor(flags: ParserFlags = {}) {
    super(new MarkdownItEngine(flags));
  }

  enterBlock<K extends BlockKind>(kind: K, details: BlockDetailsMap[K]): void {
    this.events.push(`+${kind}`);
  }

  leaveBlock(kind: BlockKind): void {
    this.events.push(`-${kind}`);
  }

  enterSpan<K extends SpanKind>(kind: K, details: SpanDetailsMap[K]): void {
    this.events.push(`+${kind}`);
  }

  leaveSpan(kind: SpanKind): void {
    this.events.push(`-${kind}`);
  }

  text(kind: TextKind, text: Payload): void {
    this.events.push(`${kind}:${typeof text === 'string' ? text : `${text.length} bytes`}`);
  }
}

/**
 * Stops at the end of the first paragraph
 */
class FirstParagraph extends ParserObject {
  paragraphs = 0;

  leaveBlock(kind: BlockKind): void {
    if (kind !== BlockKind.Paragraph) return;
    this.paragraphs++;
    throw new StopParsing();
  }
}

describe('Event stream', () => {
  test('a paragraph with emphasis', () => {
    const recorder = new EventRecorder();
    expect(recorder.parse('Hi *you*')).toBe(true);
    expect(recorder.events).toEqual([
      '+document',
      '+paragraph',
      'normal-text:Hi ',
      '+emphasis',
      'normal-text:you',
      '-emphasis',
      '-paragraph',
      '-document'
    ]);
  });

  test('entities, code spans and breaks keep their own kinds', () => {
    const recorder = new EventRecorder();
    recorder.parse('a&amp;`b`\nc');
    expect(recorder.events).toEqual([
      '+document',
      '+paragraph',
      'normal-text:a',
      'html-entity:&amp;',
      '+code-span',
      'code-text:b',
      '-code-span',
      'soft-line-break:\n',
      'normal-text:c',
      '-paragraph',
      '-document'
    ]);
  });

  test('backslash escapes become normal text', () => {
    const recorder = new EventRecorder();
    recorder.parse('\\*x');
    expect(recorder.events).toEqual(['+document', '+paragraph', 'normal-text:*', 'normal-text:x', '-paragraph', '-document']);
  });

  test('horizontal rules enter and leave', () => {
    const recorder = new EventRecorder();
    recorder.parse('---');
    expect(recorder.events).toEqual(['+document', '+horizontal-rule', '-horizontal-rule', '-document']);
  });

  test('byte input gives byte payloads', () => {
    const recorder = new EventRecorder();
    recorder.parse(new TextEncoder().encode('café'));
    expect(recorder.events).toEqual(['+document', '+paragraph', 'normal-text:5 bytes', '-paragraph', '-document']);
  });

  test('StopParsing ends the parse early', () => {
    const consumer = new FirstParagraph(new MarkdownItEngine());
    expect(consumer.parse('one\n\ntwo')).toBe(false);
    expect(consumer.paragraphs).toBe(1);
  });
});

describe('Block details', () => {
  test('list tightness and marks', () => {
    const root = new DomParser().parse('- a\n- b\n\n1) x\n\n2) y\n');
    const [bullets] = findNodes(root, BlockKind.UnorderedList);
    const [numbers] = findNodes(root, BlockKind.OrderedList);
    expect(bullets).toBeInstanceOf(UnorderedList);
    expect(numbers).toBeInstanceOf(OrderedList);
    if (!(bullets instanceof UnorderedList) || !(numbers instanceof OrderedList)) return;
    expect(bullets.isTight).toBe(true);
    expect(bullets.mark).toBe('-');
    expect(numbers.isTight).toBe(false);
    expect(numbers.start).toBe(1);
    expect(numbers.markDelimiter).toBe(')');
  });

  test('fenced code info and lang', () => {
    const root = new DomParser().parse('~~~ py extra\nx\n~~~\n');
    const [block] = findNodes(root, BlockKind.CodeBlock);
    expect(block).toBeInstanceOf(CodeBlock);
    if (!(block instanceof CodeBlock)) return;
    expect(block.fenceChar).toBe('~');
    expect(renderAttribute(block.info, block.mode)).toBe('py extra');
    expect(renderAttribute(block.lang, block.mode)).toBe('py');
  });

  test('indented code has no fence, info or lang', () => {
    const root = new DomParser().parse('    x\n');
    const [block] = findNodes(root, BlockKind.CodeBlock);
    expect(block).toBeInstanceOf(CodeBlock);
    if (!(block instanceof CodeBlock)) return;
    expect(block.fenceChar).toBeNull();
    expect(block.info).toBeNull();
    expect(block.lang).toBeNull();
  });

  test('table dimensions', () => {
    const root = new DomParser({ flags: { tables: true } }).parse('| a | b | c |\n|---|---|---|\n| 1 | 2 | 3 |\n| 4 | 5 | 6 |\n');
    const [table] = findNodes(root, BlockKind.Table);
    expect(table).toBeInstanceOf(Table);
    if (!(table instanceof Table)) return;
    expect([table.colCount, table.headRowCount, table.bodyRowCount]).toEqual([3, 1, 2]);
  });

  test('task marks and their offsets', () => {
    const source = '- [ ] todo\n- [X] done\n';
    const root = new DomParser({ flags: { tasklists: true } }).parse(source);
    const items = findNodes(root, BlockKind.ListItem);
    const details = items.map(item => item instanceof ListItem ? [item.isTask, item.taskMark, item.taskMarkOffset] : []);
    expect(details).toEqual([[true, ' ', 3], [true, 'X', 14]]);
    expect(source[14]).toBe('X');
  });

  test('task offsets count bytes for byte input', () => {
    const source = new TextEncoder().encode('é\n\n- [x] a\n');
    const root = new DomParser({ flags: { tasklists: true } }).parse(source);
    const [item] = findNodes(root, BlockKind.ListItem);
    expect(item).toBeInstanceOf(ListItem);
    if (!(item instanceof ListItem)) return;
    expect(item.taskMarkOffset).toBe(7);
    expect(source[7]).toBe(0x78);
  });

  test('items without a marker are not tasks', () => {
    const root = new DomParser({ flags: { tasklists: true } }).parse('- [y] no\n');
    const [item] = findNodes(root, BlockKind.ListItem);
    expect(item instanceof ListItem && item.isTask).toBe(false);
  });
});

function fragments(attribute: readonly TextNode[] | null): Array<[string, unknown]> | null {
  return attribute?.map((node): [string, unknown] => [node.kind, node.text]) ?? null;
}

function firstLink(markdown: string): Link {
  const [link] = findNodes(new DomParser().parse(markdown), SpanKind.Link);
  if (!(link instanceof Link)) throw new Error('no link');
  return link;
}

describe('Attributes', () => {
  test('known entities stay entity fragments', () => {
    const link = firstLink('[a](/u "x&copy;y")');
    expect(fragments(link.href)).toEqual([[TextKind.Normal, '/u']]);
    expect(fragments(link.title)).toEqual([
      [TextKind.Normal, 'x'],
      [TextKind.Entity, '&copy;'],
      [TextKind.Normal, 'y']
    ]);
  });

  test('backslash escapes are resolved to normal text', () => {
    const link = firstLink('[a](/a\\_b "\\&amp;")');
    expect(fragments(link.href)).toEqual([[TextKind.Normal, '/a_b']]);
    expect(fragments(link.title)).toEqual([[TextKind.Normal, '&amp;']]);
  });

  test('unknown references are normal text', () => {
    expect(fragments(firstLink('[a](/u "&bogus;")').title)).toEqual([[TextKind.Normal, '&bogus;']]);
  });

  test('autolinks keep backslashes', () => {
    expect(fragments(firstLink('<http://a.b/\\_?x&amp;y>').href)).toEqual([
      [TextKind.Normal, 'http://a.b/\\_?x'],
      [TextKind.Entity, '&amp;'],
      [TextKind.Normal, 'y']
    ]);
  });

  test('reference definitions', () => {
    const link = firstLink('[a][r]\n\n[r]: /x&amp;y "t"\n');
    expect(fragments(link.href)).toEqual([
      [TextKind.Normal, '/x'],
      [TextKind.Entity, '&amp;'],
      [TextKind.Normal, 'y']
    ]);
    expect(fragments(link.title)).toEqual([[TextKind.Normal, 't']]);
  });

  test('absent title and empty destination', () => {
    const link = firstLink('[a]()');
    expect(link.href).toEqual([]);
    expect(link.title).toBeNull();
  });

  test('fence info', () => {
    const [block] = findNodes(new DomParser().parse('```a&amp;b\\_c d\nx\n```\n'), BlockKind.CodeBlock);
    if (!(block instanceof CodeBlock)) throw new Error('no code block');
    expect(fragments(block.lang)).toEqual([
      [TextKind.Normal, 'a'],
      [TextKind.Entity, '&amp;'],
      [TextKind.Normal, 'b_c']
    ]);
  });
});

describe('Flags', () => {
  test('shorthands expand', () => {
    const flags = resolveParserFlags({ dialectGithub: true, noHtml: true });
    expect(flags.tables && flags.strikethrough && flags.tasklists && flags.permissiveAutolinks).toBe(true);
    expect(flags.noHtmlBlocks && flags.noHtmlSpans).toBe(true);
    expect(flags.wikilinks).toBe(false);
  });

  test('engines keep their resolved flags', () => {
    expect(new MarkdownItEngine({ underline: true }).flags.underline).toBe(true);
    expect(new MarkdownItEngine().flags.underline).toBe(false);
  });
});
