/**
 * Parser Interfaces and Types
 *
 * The callback surface between a parse engine and its consumers,
 * the engine options, and the diagnostics consumers report.
 */

import type { BlockKind, NodeKind, Payload, SpanKind, TextKind } from './ast-types.js';
import type { BlockDetailsMap, SpanDetailsMap } from './ast-details.js';

// ============================================================================
// Events
// ============================================================================

/**
 * The five structural events, delivered synchronously in document order.
 * Leave events carry the kind only.
 */
export interface ParseCallbacks {
  enterBlock<K extends BlockKind>(kind: K, details: BlockDetailsMap[K]): void;
  leaveBlock(kind: BlockKind): void;
  enterSpan<K extends SpanKind>(kind: K, details: SpanDetailsMap[K]): void;
  leaveSpan(kind: SpanKind): void;
  text(kind: TextKind, text: Payload): void;
}

/**
 * Turns a Markdown document into events.
 */
export interface ParseEngine {
  /**
   * Emits the events for `input`. Payloads use the representation of the
   * input: strings for a string, byte arrays for bytes.
   *
   * @returns false when a callback stopped the parse with StopParsing
   */
  parse(input: Payload, callbacks: ParseCallbacks): boolean;
}

// ============================================================================
// Engine options
// ============================================================================

/**
 * Markdown extensions and restrictions understood by the engines
 */
export interface ParserFlags {
  /** Collapse runs of whitespace in normal text to a single space */
  collapseWhitespace?: boolean;

  /** Recognize URLs, www. links and e-mail addresses without angle brackets */
  permissiveAutolinks?: boolean;

  /** Disable indented code blocks (fenced code only) */
  noIndentedCodeBlocks?: boolean;

  /** Disable raw HTML blocks */
  noHtmlBlocks?: boolean;

  /** Disable inline raw HTML */
  noHtmlSpans?: boolean;

  /** Shorthand for noHtmlBlocks and noHtmlSpans */
  noHtml?: boolean;

  /** Pipe tables */
  tables?: boolean;

  /** ~~strikethrough~~ */
  strikethrough?: boolean;

  /** [ ] and [x] task list items */
  tasklists?: boolean;

  /** $inline$ and $$display$$ math */
  latexMathSpans?: boolean;

  /** [[target]] and [[target|label]] links */
  wikilinks?: boolean;

  /** _underscore_ emphasis renders as underline */
  underline?: boolean;

  /** Shorthand for tables, strikethrough, tasklists and permissiveAutolinks */
  dialectGithub?: boolean;
}

export type ResolvedParserFlags = Required<Omit<ParserFlags, 'noHtml' | 'dialectGithub'>>;

export const DEFAULT_PARSER_FLAGS: ResolvedParserFlags = {
  collapseWhitespace: false,
  permissiveAutolinks: false,
  noIndentedCodeBlocks: false,
  noHtmlBlocks: false,
  noHtmlSpans: false,
  tables: false,
  strikethrough: false,
  tasklists: false,
  latexMathSpans: false,
  wikilinks: false,
  underline: false
};

/**
 * Merge options over the defaults and expand the shorthand flags
 */
export function resolveParserFlags(options: ParserFlags = {}): ResolvedParserFlags {
  const { noHtml, dialectGithub, ...rest } = options;
  const flags: ResolvedParserFlags = { ...DEFAULT_PARSER_FLAGS };
  for (const key of Object.keys(flags)) {
    if (isFlagName(key) && rest[key] !== undefined) flags[key] = rest[key] === true;
  }
  if (noHtml) {
    flags.noHtmlBlocks = true;
    flags.noHtmlSpans = true;
  }
  if (dialectGithub) {
    flags.tables = true;
    flags.strikethrough = true;
    flags.tasklists = true;
    flags.permissiveAutolinks = true;
  }
  return flags;
}

function isFlagName(key: string): key is keyof ResolvedParserFlags {
  return key in DEFAULT_PARSER_FLAGS;
}

// ============================================================================
// Diagnostics
// ============================================================================

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info'
}

/**
 * Diagnostic categories for structured error reporting
 */
export enum DiagnosticCategory {
  Structure = 'structure',
  Nesting = 'nesting',
  Attribute = 'attribute',
  Encoding = 'encoding',
  Registry = 'registry'
}

/**
 * Machine-readable error codes shared by diagnostics and thrown errors
 */
export enum DomErrorCode {
  UNKNOWN_KIND = 'unknown-kind',
  MALFORMED_DETAILS = 'malformed-details',
  ENCODING_MISMATCH = 'encoding-mismatch',
  UNBALANCED_EVENTS = 'unbalanced-events',
  MISMATCHED_CLOSE = 'mismatched-close',
  UNCLOSED_NODE = 'unclosed-node',
  INVALID_NESTING = 'invalid-nesting',
  REENTRANT_PARSE = 'reentrant-parse',
  PARSE_FAILED = 'parse-failed'
}

/**
 * Non-fatal finding reported while consuming events
 */
export interface ParseDiagnostic {
  /** Diagnostic severity */
  severity: DiagnosticSeverity;

  /** Diagnostic category */
  category: DiagnosticCategory;

  /** Machine-readable error code */
  code: DomErrorCode;

  /** Human-readable message */
  message: string;

  /** Kind of the node the finding is about */
  kind?: NodeKind;
}
