/**
 * HTML Renderer
 *
 * Writes HTML straight from the event stream, without building a tree.
 * Closing markup is decided on enter and kept on a stack until the matching
 * leave event. With default options the output is identical to building a
 * tree with DomParser and rendering it.
 */

import {
  BlockKind,
  SpanKind,
  TextKind,
  Align,
  modeOf,
  type Payload
} from './ast-types.js';
import type { AttributeSpec, BlockDetailsMap, SpanDetailsMap } from './ast-details.js';
import { decodeEntityPayload } from './entities.js';
import { ReentrantParseError } from './errors.js';
import { MarkdownItEngine } from './markdown-it-engine.js';
import { createOutputBuffer, Escape, TextOutputBuffer, type OutputBuffer } from './output-buffer.js';
import { ParserObject } from './parser-object.js';
import type { ParseEngine, ParserFlags } from './parser-interfaces.js';

export interface HtmlRendererOptions {
  /** Event source (default: markdown-it configured from `flags`) */
  engine?: ParseEngine;

  /** Options for the default engine */
  flags?: ParserFlags;

  /** Self-close void elements: <br />, <hr />, <img ... /> */
  xhtml?: boolean;

  /** Write entity references as they appear in the input */
  verbatimEntities?: boolean;

  /** Drop a leading byte order mark */
  skipUtf8Bom?: boolean;
}

type BlockHandlers = { [K in keyof BlockDetailsMap]: (details: BlockDetailsMap[K]) => void };
type SpanHandlers = { [K in keyof SpanDetailsMap]: (details: SpanDetailsMap[K]) => void };

const UTF8_BOM = [0xef, 0xbb, 0xbf];

function stripBom(markdown: Payload): Payload {
  if (typeof markdown === 'string') {
    return markdown.startsWith('\uFEFF') ? markdown.slice(1) : markdown;
  }
  return UTF8_BOM.every((byte, i) => markdown[i] === byte) ? markdown.subarray(3) : markdown;
}

export class HtmlRenderer extends ParserObject {
  private readonly xhtml: boolean;
  private readonly verbatimEntities: boolean;
  private readonly skipUtf8Bom: boolean;

  private out: OutputBuffer = new TextOutputBuffer();
  private readonly closers: Array<() => void> = [];
  private imageNesting = 0;
  private parsing = false;

  constructor(options: HtmlRendererOptions = {}) {
    super(options.engine ?? new MarkdownItEngine(options.flags));
    this.xhtml = options.xhtml ?? false;
    this.verbatimEntities = options.verbatimEntities ?? false;
    this.skipUtf8Bom = options.skipUtf8Bom ?? false;
  }

  /**
   * Render a document to HTML in the input's representation.
   * Output written before a StopParsing is returned as is.
   */
  parse(markdown: string): string;
  parse(markdown: Uint8Array): Uint8Array;
  parse(markdown: Payload): Payload;
  parse(markdown: Payload): Payload {
    if (this.parsing) throw new ReentrantParseError();
    this.parsing = true;
    try {
      const input = this.skipUtf8Bom ? stripBom(markdown) : markdown;
      this.out = createOutputBuffer(modeOf(input));
      this.closers.length = 0;
      this.imageNesting = 0;
      this.run(input);
      return this.out.finish();
    } finally {
      this.parsing = false;
    }
  }

  // ============================================================================
  // Event callbacks
  // ============================================================================

  enterBlock<K extends BlockKind>(kind: K, details: BlockDetailsMap[K]): void {
    this.blockHandlers[kind](details);
  }

  leaveBlock(): void {
    this.closers.pop()?.();
  }

  enterSpan<K extends SpanKind>(kind: K, details: SpanDetailsMap[K]): void {
    if (this.imageNesting > 0 && kind !== SpanKind.Image) {
      this.closers.push(() => {});
      return;
    }
    this.spanHandlers[kind](details);
  }

  leaveSpan(): void {
    this.closers.pop()?.();
  }

  text(kind: TextKind, text: Payload): void {
    this.writeFragment(kind, text, Escape.Html, this.imageNesting);
  }

  // ============================================================================
  // Markup
  // ============================================================================

  private readonly blockHandlers: BlockHandlers = {
    [BlockKind.Document]: () => this.enter('', ''),
    [BlockKind.Quote]: () => this.enter('<blockquote>\n', '</blockquote>\n'),
    [BlockKind.UnorderedList]: () => this.enter('<ul>\n', '</ul>\n'),
    [BlockKind.OrderedList]: details =>
      this.enter(details.start === 1 ? '<ol>\n' : `<ol start="${details.start}">\n`, '</ol>\n'),
    [BlockKind.ListItem]: details => {
      if (!details.isTask) {
        this.enter('<li>', '</li>\n');
        return;
      }
      const checked = details.taskMark === 'x' || details.taskMark === 'X';
      this.enter(
        '<li class="task-list-item"><input type="checkbox" class="task-list-item-checkbox" disabled' +
        (checked ? ' checked>' : '>'),
        '</li>\n'
      );
    },
    [BlockKind.HorizontalRule]: () => this.enter(this.xhtml ? '<hr />\n' : '<hr>\n', ''),
    [BlockKind.Heading]: details => this.enter(`<h${details.level}>`, `</h${details.level}>\n`),
    [BlockKind.CodeBlock]: details => {
      const lang = details.lang ?? null;
      if (lang === null) {
        this.out.markup('<pre><code>');
      } else {
        this.out.markup('<pre><code class="language-');
        this.writeAttribute(lang, Escape.Html);
        this.out.markup('">');
      }
      this.closers.push(() => this.out.markup('</code></pre>\n'));
    },
    [BlockKind.RawHtmlBlock]: () => this.enter('', ''),
    [BlockKind.Paragraph]: () => this.enter('<p>', '</p>\n'),
    [BlockKind.Table]: () => this.enter('<table>\n', '</table>\n'),
    [BlockKind.TableHead]: () => this.enter('<thead>\n', '</thead>\n'),
    [BlockKind.TableBody]: () => this.enter('<tbody>\n', '</tbody>\n'),
    [BlockKind.TableRow]: () => this.enter('<tr>\n', '</tr>\n'),
    [BlockKind.TableHeaderCell]: details => this.enterCell('th', details.align),
    [BlockKind.TableCell]: details => this.enterCell('td', details.align)
  };

  private readonly spanHandlers: SpanHandlers = {
    [SpanKind.Emphasis]: () => this.enter('<em>', '</em>'),
    [SpanKind.Strong]: () => this.enter('<strong>', '</strong>'),
    [SpanKind.Underline]: () => this.enter('<u>', '</u>'),
    [SpanKind.Link]: details => {
      this.out.markup('<a href="');
      this.writeAttribute(details.href, Escape.Url);
      const title = details.title ?? null;
      if (title !== null) {
        this.out.markup('" title="');
        this.writeAttribute(title, Escape.Html);
      }
      this.enter('">', '</a>');
    },
    [SpanKind.Image]: details => {
      if (this.imageNesting === 0) {
        this.out.markup('<img src="');
        this.writeAttribute(details.src, Escape.Url);
        this.out.markup('" alt="');
      }
      this.imageNesting++;
      const title = details.title ?? null;
      this.closers.push(() => {
        this.imageNesting--;
        if (this.imageNesting > 0) return;
        if (title !== null) {
          this.out.markup('" title="');
          this.writeAttribute(title, Escape.Html);
        }
        this.out.markup(this.xhtml ? '" />' : '">');
      });
    },
    [SpanKind.Code]: () => this.enter('<code>', '</code>'),
    [SpanKind.Strikethrough]: () => this.enter('<del>', '</del>'),
    [SpanKind.InlineMath]: () => this.enter('<x-equation>', '</x-equation>'),
    [SpanKind.DisplayMath]: () => this.enter('<x-equation type="display">', '</x-equation>'),
    [SpanKind.WikiLink]: details => {
      this.out.markup('<x-wikilink data-target="');
      this.writeAttribute(details.target, Escape.Html);
      this.enter('">', '</x-wikilink>');
    }
  };

  private enter(open: string, close: string): void {
    this.out.markup(open);
    this.closers.push(() => this.out.markup(close));
  }

  private enterCell(tag: 'th' | 'td', align: Align): void {
    this.enter(align === Align.Default ? `<${tag}>` : `<${tag} align="${align}">`, `</${tag}>\n`);
  }

  private writeAttribute(attribute: AttributeSpec, escape: Escape): void {
    if (attribute === null) return;
    for (const [kind, text] of attribute) {
      this.writeFragment(kind, text, escape, 0);
    }
  }

  private writeFragment(kind: TextKind, text: Payload, escape: Escape, imageNesting: number): void {
    switch (kind) {
      case TextKind.NullChar:
        this.out.markup('\uFFFD');
        break;
      case TextKind.LineBreak:
        this.out.markup(imageNesting > 0 ? ' ' : this.xhtml ? '<br />\n' : '<br>\n');
        break;
      case TextKind.SoftLineBreak:
        this.out.markup(imageNesting > 0 ? ' ' : '\n');
        break;
      case TextKind.Entity:
        if (this.verbatimEntities) {
          this.out.text(text, Escape.None);
        } else {
          this.out.text(decodeEntityPayload(text) ?? text, escape);
        }
        break;
      case TextKind.Html:
        this.out.text(text, Escape.None);
        break;
      default:
        this.out.text(text, escape);
    }
  }
}
