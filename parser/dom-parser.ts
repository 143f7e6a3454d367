/**
 * DOM Parser
 *
 * Consumes the event stream and builds the node tree. Open nodes live on an
 * explicit stack: enter events push, leave events pop, text appends to the
 * innermost open node.
 */

import { EncodingMode, modeOf, type BlockKind, type NodeKind, type Payload, type SpanKind, type TextKind } from './ast-types.js';
import type { BlockDetailsMap, SpanDetailsMap } from './ast-details.js';
import { ContainerNode, type AstNode } from './ast-nodes.js';
import { defaultRegistry, type NodeRegistry } from './ast-factory.js';
import {
  InvalidNestingError,
  MismatchedCloseError,
  ReentrantParseError,
  UnbalancedEventError
} from './errors.js';
import { MarkdownItEngine } from './markdown-it-engine.js';
import { ParserObject } from './parser-object.js';
import {
  DiagnosticCategory,
  DiagnosticSeverity,
  DomErrorCode,
  type ParseDiagnostic,
  type ParseEngine,
  type ParserFlags
} from './parser-interfaces.js';

export interface DomParserOptions {
  /** Event source (default: markdown-it configured from `flags`) */
  engine?: ParseEngine;

  /** Options for the default engine */
  flags?: ParserFlags;

  /** Node classes to build with (default: the shared default registry) */
  registry?: NodeRegistry;

  /** Throw on a leave event whose kind differs from the innermost open node */
  strictNesting?: boolean;

  /** Called for each diagnostic as it is recorded */
  onDiagnostic?: (diagnostic: ParseDiagnostic) => void;
}

export interface DomParseResult {
  /** Root node, normally a Document */
  root: AstNode | null;

  /** Non-fatal findings, in the order they were recorded */
  diagnostics: ParseDiagnostic[];

  /** False when a callback stopped the parse early */
  completed: boolean;

  /** Milliseconds spent parsing and building */
  parseTime: number;
}

export class DomParser extends ParserObject {
  private readonly registry: NodeRegistry;
  private readonly strictNesting: boolean;
  private readonly onDiagnostic: ((diagnostic: ParseDiagnostic) => void) | undefined;

  private root: AstNode | null = null;
  private readonly stack: AstNode[] = [];
  private mode = EncodingMode.Text;
  private diagnostics: ParseDiagnostic[] = [];
  private parsing = false;

  constructor(options: DomParserOptions = {}) {
    super(options.engine ?? new MarkdownItEngine(options.flags));
    this.registry = options.registry ?? defaultRegistry;
    this.strictNesting = options.strictNesting ?? false;
    this.onDiagnostic = options.onDiagnostic;
  }

  /**
   * Build the tree for a document. String input gives a text-mode tree,
   * byte input a binary-mode tree.
   */
  parse(markdown: Payload): AstNode {
    const { root } = this.parseDocument(markdown);
    if (root === null) {
      throw new UnbalancedEventError('The engine produced no document');
    }
    return root;
  }

  parseDocument(markdown: Payload): DomParseResult {
    if (this.parsing) throw new ReentrantParseError();
    this.parsing = true;
    try {
      const startTime = performance.now();
      this.reset(modeOf(markdown));
      const completed = this.run(markdown);
      this.finish(completed);
      return {
        root: this.root,
        diagnostics: this.diagnostics,
        completed,
        parseTime: performance.now() - startTime
      };
    } finally {
      this.parsing = false;
    }
  }

  // ============================================================================
  // Event callbacks
  // ============================================================================

  enterBlock<K extends BlockKind>(kind: K, details: BlockDetailsMap[K]): void {
    this.push(this.registry.create(kind, details, this.mode));
  }

  leaveBlock(kind: BlockKind): void {
    this.pop(kind);
  }

  enterSpan<K extends SpanKind>(kind: K, details: SpanDetailsMap[K]): void {
    if (this.stack.length === 0) {
      throw new UnbalancedEventError(`Span ${kind} entered outside any block`);
    }
    this.push(this.registry.create(kind, details, this.mode));
  }

  leaveSpan(kind: SpanKind): void {
    this.pop(kind);
  }

  text(kind: TextKind, text: Payload): void {
    this.appendToCurrent(this.registry.createText(kind, text, this.mode));
  }

  // ============================================================================
  // Stack handling
  // ============================================================================

  private reset(mode: EncodingMode): void {
    this.root = null;
    this.stack.length = 0;
    this.mode = mode;
    this.diagnostics = [];
  }

  private push(node: AstNode): void {
    if (this.root === null) {
      this.root = node;
    } else {
      this.appendToCurrent(node);
    }
    this.stack.push(node);
  }

  private appendToCurrent(node: AstNode): void {
    const current = this.stack.at(-1);
    if (current === undefined) {
      throw new UnbalancedEventError(
        this.root === null ? `${node.kind} before the document was entered` : `${node.kind} after the document was closed`
      );
    }
    if (!(current instanceof ContainerNode)) {
      throw new InvalidNestingError(current.kind, node.kind);
    }
    current.append(node);
  }

  private pop(kind: NodeKind): void {
    const current = this.stack.at(-1);
    if (current === undefined) {
      throw new UnbalancedEventError(`Leave event for ${kind} with nothing open`);
    }
    if (current.kind !== kind) {
      if (this.strictNesting) throw new MismatchedCloseError(current.kind, kind);
      this.report({
        severity: DiagnosticSeverity.Warning,
        category: DiagnosticCategory.Nesting,
        code: DomErrorCode.MISMATCHED_CLOSE,
        message: `Leave event for ${kind} closed ${current.kind}`,
        kind: current.kind
      });
    }
    this.stack.pop();
  }

  private finish(completed: boolean): void {
    if (this.stack.length === 0) return;
    const open = this.stack.map(node => node.kind).join(' > ');
    if (completed) {
      throw new UnbalancedEventError(`Parse ended with nodes still open: ${open}`);
    }
    this.report({
      severity: DiagnosticSeverity.Info,
      category: DiagnosticCategory.Structure,
      code: DomErrorCode.UNCLOSED_NODE,
      message: `Parse stopped with nodes still open: ${open}`
    });
    this.stack.length = 0;
  }

  private report(diagnostic: ParseDiagnostic): void {
    this.diagnostics.push(diagnostic);
    this.onDiagnostic?.(diagnostic);
  }
}
