/**
 * markdown-it Engine
 *
 * Drives markdown-it and replays its token stream as parse events.
 * markdown-it works on strings: byte input is decoded as UTF-8 when it is
 * valid UTF-8 and one char per byte otherwise, and every payload is encoded
 * back the same way, so binary trees carry the input's own bytes.
 */

import { Buffer, isUtf8 } from 'node:buffer';
import MarkdownIt from 'markdown-it';
import type Token from 'markdown-it/lib/token.mjs';
import type StateInline from 'markdown-it/lib/rules_inline/state_inline.mjs';
import { Align, BlockKind, SpanKind, TextKind, type Payload } from './ast-types.js';
import { isHeadingLevel, type AttributeSpec } from './ast-details.js';
import { lookupEntity } from './entities.js';
import { ParseError, StopParsing } from './errors.js';
import {
  resolveParserFlags,
  type ParseCallbacks,
  type ParseEngine,
  type ParserFlags,
  type ResolvedParserFlags
} from './parser-interfaces.js';

// ============================================================================
// Source codecs
// ============================================================================

/**
 * Converts between the input's representation and the string markdown-it parses
 */
interface SourceCodec {
  readonly source: string;

  /** Payload for a piece of parsed text */
  payload(text: string): Payload;

  /** Input offset of a position in `source` */
  offset(index: number): number;
}

const utf8Encoder = new TextEncoder();

function textCodec(source: string): SourceCodec {
  return { source, payload: text => text, offset: index => index };
}

function utf8Codec(bytes: Uint8Array): SourceCodec {
  const source = new TextDecoder('utf-8', { ignoreBOM: true }).decode(bytes);
  return {
    source,
    payload: text => utf8Encoder.encode(text),
    offset: index => Buffer.byteLength(source.slice(0, index), 'utf8')
  };
}

function latin1Codec(bytes: Uint8Array): SourceCodec {
  const source = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
  return {
    source,
    payload: text => {
      const out: number[] = [];
      for (const char of text) {
        const code = char.charCodeAt(0);
        if (code <= 0xFF) out.push(code);
        else out.push(...utf8Encoder.encode(char));
      }
      return Uint8Array.from(out);
    },
    offset: index => index
  };
}

function codecFor(input: Payload): SourceCodec {
  if (typeof input === 'string') return textCodec(input);
  return isUtf8(input) ? utf8Codec(input) : latin1Codec(input);
}

// ============================================================================
// Inline extensions
// ============================================================================

type InlineRule = (state: StateInline, silent: boolean) => boolean;

const WIKILINK_TARGET_MAX = 100;

/** [[target]] and [[target|label]] */
const wikilinkRule: InlineRule = (state, silent) => {
  const start = state.pos;
  if (state.src.charCodeAt(start) !== 0x5B || state.src.charCodeAt(start + 1) !== 0x5B) return false;
  const end = state.src.indexOf(']]', start + 2);
  if (end < 0 || end + 2 > state.posMax) return false;

  const body = state.src.slice(start + 2, end);
  if (/[[\]\n]/.test(body)) return false;
  const pipe = body.indexOf('|');
  const target = pipe < 0 ? body : body.slice(0, pipe);
  if (target.length === 0 || target.length > WIKILINK_TARGET_MAX) return false;

  if (!silent) {
    const open = state.push('wikilink_open', 'x-wikilink', 1);
    open.attrSet('target', target);
    if (pipe < 0) {
      const text = state.push('text', '', 0);
      text.content = target;
    } else {
      const max = state.posMax;
      state.pos = start + 2 + pipe + 1;
      state.posMax = end;
      state.md.inline.tokenize(state);
      state.posMax = max;
    }
    state.push('wikilink_close', 'x-wikilink', -1);
  }
  state.pos = end + 2;
  return true;
};

/** $inline$ and $$display$$ */
const mathRule: InlineRule = (state, silent) => {
  const start = state.pos;
  const src = state.src;
  if (src.charCodeAt(start) !== 0x24) return false;

  let width = 1;
  while (src.charCodeAt(start + width) === 0x24) width++;
  if (width > 2) return false;

  const fence = '$'.repeat(width);
  let end = src.indexOf(fence, start + width);
  while (end >= 0 && end < state.posMax && src.charCodeAt(end + width) === 0x24) {
    end = src.indexOf(fence, end + width + 1);
  }
  if (end < 0 || end + width > state.posMax) return false;

  const content = src.slice(start + width, end);
  if (content.length === 0) return false;
  if (width === 1 && (/^\s/.test(content) || /\s$/.test(content))) return false;

  if (!silent) {
    const token = state.push(width === 1 ? 'math_inline' : 'math_display', 'x-equation', 0);
    token.content = content;
    token.markup = fence;
  }
  state.pos = end + width;
  return true;
};

// ============================================================================
// Raw link parts
// ============================================================================

type LinkHelpers = MarkdownIt['helpers'];

/**
 * Title text between its delimiters. `end` is just past the closing one;
 * the opener is the last unescaped delimiter before it.
 */
function rawTitle(source: string, end: number): string {
  const closer = source.charAt(end - 1);
  const opener = closer === ')' ? '(' : closer;
  for (let i = end - 2; i >= 0; i--) {
    if (source.charAt(i) !== opener) continue;
    let backslashes = 0;
    while (source.charAt(i - 1 - backslashes) === '\\') backslashes++;
    if (backslashes % 2 === 0) return source.slice(i + 1, end - 1);
  }
  return '';
}

/**
 * Link destinations and titles come out as written, escapes and entity
 * references included; attribute() splits them into fragments.
 */
function keepRawLinkParts(md: MarkdownIt): void {
  const { parseLinkDestination, parseLinkTitle } = md.helpers;
  Object.assign(md.helpers, {
    parseLinkDestination(...args: Parameters<LinkHelpers['parseLinkDestination']>) {
      const result = parseLinkDestination(...args);
      if (!result.ok) return result;
      const [source, start] = args;
      const raw = source.slice(start, result.pos);
      return { ...result, str: raw.startsWith('<') ? raw.slice(1, -1) : raw };
    },
    parseLinkTitle(...args: Parameters<LinkHelpers['parseLinkTitle']>) {
      const result = parseLinkTitle(...args);
      if (!result.ok) return result;
      return { ...result, str: rawTitle(args[0], result.pos) };
    }
  });
}

function createMarkdownIt(flags: ResolvedParserFlags): MarkdownIt {
  const md = new MarkdownIt('default', { html: true, linkify: flags.permissiveAutolinks });

  // Entities and escapes stay separate tokens
  md.disable('text_join');

  const disabled: string[] = [];
  if (!flags.tables) disabled.push('table');
  if (!flags.strikethrough) disabled.push('strikethrough');
  if (flags.noHtmlBlocks) disabled.push('html_block');
  if (flags.noHtmlSpans) disabled.push('html_inline');
  if (flags.noIndentedCodeBlocks) disabled.push('code');
  if (disabled.length > 0) md.disable(disabled);

  // Destinations are escaped by the renderers, not here
  md.normalizeLink = url => url;
  md.normalizeLinkText = text => text;
  md.validateLink = () => true;
  keepRawLinkParts(md);

  if (flags.wikilinks) md.inline.ruler.before('link', 'wikilink', wikilinkRule);
  if (flags.latexMathSpans) md.inline.ruler.after('escape', 'math', mathRule);
  return md;
}

// ============================================================================
// Engine
// ============================================================================

const TASK_MARK = /^\[([ xX])\](?:[ \t]+|(?=\n)|$)/;
const WHITESPACE_RUN = /[ \t\f\v\r\n]+/g;
const REPLACEMENT_CHAR = /\uFFFD/;
const ENTITY_REFERENCE = /&(?:#[xX][0-9A-Fa-f]{1,6}|#[0-9]{1,7}|[A-Za-z][A-Za-z0-9]{0,47});/g;
const ESCAPE_OR_ENTITY = /\\([!-\/:-@\[-`{-~])|&(?:#[xX][0-9A-Fa-f]{1,6}|#[0-9]{1,7}|[A-Za-z][A-Za-z0-9]{0,47});/g;

const ALIGN_BY_STYLE: Record<string, Align> = {
  'text-align:left': Align.Left,
  'text-align:center': Align.Center,
  'text-align:right': Align.Right
};

/**
 * Event source backed by markdown-it
 */
export class MarkdownItEngine implements ParseEngine {
  readonly flags: ResolvedParserFlags;
  private readonly md: MarkdownIt;

  constructor(flags: ParserFlags = {}) {
    this.flags = resolveParserFlags(flags);
    this.md = createMarkdownIt(this.flags);
  }

  parse(input: Payload, callbacks: ParseCallbacks): boolean {
    const codec = codecFor(input);
    const tokens = this.md.parse(codec.source, {});
    const emitter = new TokenEmitter(codec, callbacks, this.flags);
    try {
      emitter.emitDocument(tokens);
    } catch (error) {
      if (error instanceof StopParsing) return false;
      throw error;
    }
    return true;
  }
}

/**
 * One parse worth of token replay
 */
class TokenEmitter {
  private readonly lineStarts: number[];

  /** Inline tokens whose text starts with a task marker to drop */
  private readonly taskPrefixes = new Map<Token, number>();

  constructor(
    private readonly codec: SourceCodec,
    private readonly callbacks: ParseCallbacks,
    private readonly flags: ResolvedParserFlags
  ) {
    this.lineStarts = [0];
    const lineBreak = /\r\n|\r|\n/g;
    for (let match = lineBreak.exec(codec.source); match; match = lineBreak.exec(codec.source)) {
      this.lineStarts.push(match.index + match[0].length);
    }
  }

  emitDocument(tokens: Token[]): void {
    this.callbacks.enterBlock(BlockKind.Document, {});
    this.emitBlocks(tokens);
    this.callbacks.leaveBlock(BlockKind.Document);
  }

  // ============================================================================
  // Blocks
  // ============================================================================

  private emitBlocks(tokens: Token[]): void {
    const cb = this.callbacks;
    for (const [index, token] of tokens.entries()) {
      switch (token.type) {
        case 'paragraph_open':
          if (!token.hidden) cb.enterBlock(BlockKind.Paragraph, {});
          break;
        case 'paragraph_close':
          if (!token.hidden) cb.leaveBlock(BlockKind.Paragraph);
          break;
        case 'inline':
          this.emitInline(token.children ?? [], this.taskPrefixes.get(token) ?? 0);
          break;
        case 'heading_open': {
          const level = Number(token.tag.slice(1));
          if (!isHeadingLevel(level)) throw new ParseError(`Unexpected heading tag <${token.tag}>`);
          cb.enterBlock(BlockKind.Heading, { level });
          break;
        }
        case 'heading_close':
          cb.leaveBlock(BlockKind.Heading);
          break;
        case 'blockquote_open':
          cb.enterBlock(BlockKind.Quote, {});
          break;
        case 'blockquote_close':
          cb.leaveBlock(BlockKind.Quote);
          break;
        case 'bullet_list_open':
          cb.enterBlock(BlockKind.UnorderedList, {
            isTight: isTightList(tokens, index),
            mark: token.markup
          });
          break;
        case 'bullet_list_close':
          cb.leaveBlock(BlockKind.UnorderedList);
          break;
        case 'ordered_list_open':
          cb.enterBlock(BlockKind.OrderedList, {
            start: Number(token.attrGet('start') ?? 1),
            isTight: isTightList(tokens, index),
            markDelimiter: token.markup
          });
          break;
        case 'ordered_list_close':
          cb.leaveBlock(BlockKind.OrderedList);
          break;
        case 'list_item_open':
          this.enterListItem(tokens, index);
          break;
        case 'list_item_close':
          cb.leaveBlock(BlockKind.ListItem);
          break;
        case 'hr':
          cb.enterBlock(BlockKind.HorizontalRule, {});
          cb.leaveBlock(BlockKind.HorizontalRule);
          break;
        case 'fence': {
          const info = token.info.trim();
          const lang = info.split(/\s+/)[0] ?? '';
          cb.enterBlock(BlockKind.CodeBlock, {
            fenceChar: token.markup.charAt(0),
            info: info.length > 0 ? this.attribute(info) : null,
            lang: lang.length > 0 ? this.attribute(lang) : null
          });
          this.emitText(TextKind.Code, token.content);
          cb.leaveBlock(BlockKind.CodeBlock);
          break;
        }
        case 'code_block':
          cb.enterBlock(BlockKind.CodeBlock, { fenceChar: null, info: null, lang: null });
          this.emitText(TextKind.Code, token.content);
          cb.leaveBlock(BlockKind.CodeBlock);
          break;
        case 'html_block':
          cb.enterBlock(BlockKind.RawHtmlBlock, {});
          this.emitText(TextKind.Html, token.content);
          cb.leaveBlock(BlockKind.RawHtmlBlock);
          break;
        case 'table_open':
          cb.enterBlock(BlockKind.Table, measureTable(tokens, index));
          break;
        case 'table_close':
          cb.leaveBlock(BlockKind.Table);
          break;
        case 'thead_open':
          cb.enterBlock(BlockKind.TableHead, {});
          break;
        case 'thead_close':
          cb.leaveBlock(BlockKind.TableHead);
          break;
        case 'tbody_open':
          cb.enterBlock(BlockKind.TableBody, {});
          break;
        case 'tbody_close':
          cb.leaveBlock(BlockKind.TableBody);
          break;
        case 'tr_open':
          cb.enterBlock(BlockKind.TableRow, {});
          break;
        case 'tr_close':
          cb.leaveBlock(BlockKind.TableRow);
          break;
        case 'th_open':
          cb.enterBlock(BlockKind.TableHeaderCell, { align: cellAlign(token) });
          break;
        case 'th_close':
          cb.leaveBlock(BlockKind.TableHeaderCell);
          break;
        case 'td_open':
          cb.enterBlock(BlockKind.TableCell, { align: cellAlign(token) });
          break;
        case 'td_close':
          cb.leaveBlock(BlockKind.TableCell);
          break;
        default:
          throw new ParseError(`Unsupported block token ${token.type}`);
      }
    }
  }

  private enterListItem(tokens: Token[], index: number): void {
    const paragraph = tokens[index + 1];
    const inline = tokens[index + 2];
    const match = this.flags.tasklists && paragraph?.type === 'paragraph_open' && inline?.type === 'inline'
      ? TASK_MARK.exec(inline.content)
      : null;
    if (!match || !inline) {
      this.callbacks.enterBlock(BlockKind.ListItem, { isTask: false });
      return;
    }

    const taskMark = match[1] ?? ' ';
    this.taskPrefixes.set(inline, match[0].length);
    this.callbacks.enterBlock(BlockKind.ListItem, {
      isTask: true,
      taskMark,
      taskMarkOffset: this.codec.offset(this.taskMarkIndex(inline, taskMark))
    });
  }

  /** Position in the source of the char between the task brackets */
  private taskMarkIndex(inline: Token, taskMark: string): number {
    const line = inline.map?.[0] ?? 0;
    const lineStart = this.lineStarts[line] ?? 0;
    const lineEnd = this.lineStarts[line + 1] ?? this.codec.source.length;
    const text = this.codec.source.slice(lineStart, lineEnd);
    const firstLine = (inline.content.split('\n')[0] ?? '').trimEnd();
    let column = text.indexOf(firstLine);
    if (column < 0) column = text.indexOf(`[${taskMark}]`);
    return lineStart + Math.max(column, 0) + 1;
  }

  // ============================================================================
  // Inlines
  // ============================================================================

  private emitInline(children: Token[], taskPrefix: number): void {
    const cb = this.callbacks;
    let skip = taskPrefix;
    for (const token of children) {
      if (skip > 0 && token.type === 'text') {
        const dropped = Math.min(skip, token.content.length);
        skip -= dropped;
        const rest = token.content.slice(dropped);
        if (rest.length > 0) this.emitNormalText(rest);
        continue;
      }
      skip = 0;

      switch (token.type) {
        case 'text':
          this.emitNormalText(token.content);
          break;
        case 'text_special':
          if (token.info === 'entity') this.emitText(TextKind.Entity, token.markup);
          else this.emitNormalText(token.content);
          break;
        case 'softbreak':
          this.emitText(TextKind.SoftLineBreak, '\n');
          break;
        case 'hardbreak':
          this.emitText(TextKind.LineBreak, '\n');
          break;
        case 'code_inline':
          cb.enterSpan(SpanKind.Code, {});
          this.emitText(TextKind.Code, token.content);
          cb.leaveSpan(SpanKind.Code);
          break;
        case 'em_open':
          cb.enterSpan(this.emphasisKind(token), {});
          break;
        case 'em_close':
          cb.leaveSpan(this.emphasisKind(token));
          break;
        case 'strong_open':
          cb.enterSpan(SpanKind.Strong, {});
          break;
        case 'strong_close':
          cb.leaveSpan(SpanKind.Strong);
          break;
        case 's_open':
          cb.enterSpan(SpanKind.Strikethrough, {});
          break;
        case 's_close':
          cb.leaveSpan(SpanKind.Strikethrough);
          break;
        case 'link_open':
          cb.enterSpan(SpanKind.Link, {
            href: this.attribute(token.attrGet('href') ?? '', !isAutolink(token)),
            title: this.optionalAttribute(token.attrGet('title'))
          });
          break;
        case 'link_close':
          cb.leaveSpan(SpanKind.Link);
          break;
        case 'image':
          cb.enterSpan(SpanKind.Image, {
            src: this.attribute(token.attrGet('src') ?? ''),
            title: this.optionalAttribute(token.attrGet('title'))
          });
          this.emitInline(token.children ?? [], 0);
          cb.leaveSpan(SpanKind.Image);
          break;
        case 'html_inline':
          this.emitText(TextKind.Html, token.content);
          break;
        case 'wikilink_open':
          cb.enterSpan(SpanKind.WikiLink, { target: this.attribute(token.attrGet('target') ?? '', false) });
          break;
        case 'wikilink_close':
          cb.leaveSpan(SpanKind.WikiLink);
          break;
        case 'math_inline':
        case 'math_display': {
          const kind = token.type === 'math_inline' ? SpanKind.InlineMath : SpanKind.DisplayMath;
          cb.enterSpan(kind, {});
          this.emitText(TextKind.Math, token.content);
          cb.leaveSpan(kind);
          break;
        }
        default:
          throw new ParseError(`Unsupported inline token ${token.type}`);
      }
    }
  }

  private emphasisKind(token: Token): SpanKind.Emphasis | SpanKind.Underline {
    return this.flags.underline && token.markup === '_' ? SpanKind.Underline : SpanKind.Emphasis;
  }

  /** Normal text, with U+FFFD split out as null-char fragments */
  private emitNormalText(text: string): void {
    const parts = text.split(REPLACEMENT_CHAR);
    for (const [index, part] of parts.entries()) {
      if (index > 0) this.emitText(TextKind.NullChar, '\0');
      const value = this.flags.collapseWhitespace ? part.replace(WHITESPACE_RUN, ' ') : part;
      if (value.length > 0) this.emitText(TextKind.Normal, value);
    }
  }

  private emitText(kind: TextKind, text: string): void {
    this.callbacks.text(kind, this.codec.payload(text));
  }

  // ============================================================================
  // Attributes
  // ============================================================================

  /**
   * Present attribute from its source text: known entity references become
   * entity fragments and the rest normal text. Backslash escapes are resolved
   * unless `escapes` is false. An empty value gives an empty list.
   */
  private attribute(raw: string, escapes = true): AttributeSpec {
    const fragments: Array<[TextKind, Payload]> = [];
    let normal = '';
    let last = 0;
    for (const match of raw.matchAll(escapes ? ESCAPE_OR_ENTITY : ENTITY_REFERENCE)) {
      const index = match.index ?? 0;
      normal += raw.slice(last, index);
      last = index + match[0].length;
      const escaped = match[1];
      if (escaped !== undefined) {
        normal += escaped;
      } else if (lookupEntity(match[0]) === undefined) {
        normal += match[0];
      } else {
        if (normal.length > 0) fragments.push([TextKind.Normal, this.codec.payload(normal)]);
        normal = '';
        fragments.push([TextKind.Entity, this.codec.payload(match[0])]);
      }
    }
    normal += raw.slice(last);
    if (normal.length > 0) fragments.push([TextKind.Normal, this.codec.payload(normal)]);
    return fragments;
  }

  private optionalAttribute(value: string | null): AttributeSpec {
    return value === null ? null : this.attribute(value);
  }
}

// ============================================================================
// Token stream helpers
// ============================================================================

/** `<scheme:...>` and linkified URLs take no backslash escapes */
function isAutolink(token: Token): boolean {
  return token.markup === 'autolink' || token.markup === 'linkify';
}

/**
 * markdown-it hides the paragraphs of tight lists; the list's own first
 * paragraph tells which kind it is. A list without paragraphs is tight.
 */
function isTightList(tokens: Token[], openIndex: number): boolean {
  const open = tokens[openIndex];
  if (!open) return true;
  for (let i = openIndex + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) break;
    if (token.level === open.level && token.nesting === -1) break;
    if (token.type === 'paragraph_open' && token.level === open.level + 2) return token.hidden;
  }
  return true;
}

function measureTable(tokens: Token[], openIndex: number): { colCount: number; headRowCount: number; bodyRowCount: number } {
  let colCount = 0;
  let headRowCount = 0;
  let bodyRowCount = 0;
  let inHead = false;
  for (let i = openIndex + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token || token.type === 'table_close') break;
    if (token.type === 'thead_open') inHead = true;
    else if (token.type === 'thead_close') inHead = false;
    else if (token.type === 'tr_open') {
      if (inHead) headRowCount++;
      else bodyRowCount++;
    } else if (token.type === 'th_open' && inHead && headRowCount === 1) colCount++;
  }
  return { colCount, headRowCount, bodyRowCount };
}

function cellAlign(token: Token): Align {
  const style = token.attrGet('style');
  return style === null ? Align.Default : ALIGN_BY_STYLE[style] ?? Align.Default;
}
