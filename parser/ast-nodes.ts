/**
 * AST Node Base Classes
 *
 * Every node renders by writing into an output buffer. A container writes its
 * opening markup, its children in order, then its closing markup; concrete
 * kinds only decide what the opening and closing markup are.
 */

import {
  modeOf,
  type EncodingMode,
  resolveRenderContext,
  type NodeKind,
  type Payload,
  type RenderContext,
  type TextKind
} from './ast-types.js';
import type { AttributeSpec, TextDetails } from './ast-details.js';
import { EncodingMismatchError, InvalidNestingError } from './errors.js';
import { createOutputBuffer, Escape, type OutputBuffer } from './output-buffer.js';

/**
 * Rich-text value of a node field (href, title, lang, target).
 * Fragments are detached: their parent stays null.
 * `null` is absent, `[]` is present but empty.
 */
export type Attribute = readonly TextNode[] | null;

/**
 * Builds the text fragments of attributes while a node is constructed
 */
export interface NodeFactory {
  createAttribute(spec: AttributeSpec | undefined, mode: EncodingMode): Attribute;
}

/**
 * Handed to every node constructor
 */
export interface NodeContext {
  readonly mode: EncodingMode;
  readonly factory: NodeFactory;
}

export abstract class AstNode {
  /** Enclosing container, or null for the root and attribute fragments */
  parent: ContainerNode | null = null;

  constructor(readonly kind: NodeKind, readonly mode: EncodingMode) {}

  /** Write this node and its subtree */
  abstract write(out: OutputBuffer, context: RenderContext): void;

  /** Render this node and its subtree in the tree's representation */
  render(context: Partial<RenderContext> = {}): Payload {
    const out = createOutputBuffer(this.mode);
    this.write(out, resolveRenderContext(context));
    return out.finish();
  }
}

/**
 * Node with an ordered list of children, all in the node's encoding mode
 */
export abstract class ContainerNode extends AstNode {
  private readonly childNodes: AstNode[] = [];

  constructor(kind: NodeKind, details: unknown, context: NodeContext) {
    super(kind, context.mode);
  }

  get children(): readonly AstNode[] {
    return this.childNodes;
  }

  append(node: AstNode): void {
    this.adopt(node);
    this.childNodes.push(node);
  }

  insert(index: number, node: AstNode): void {
    this.adopt(node);
    this.childNodes.splice(index, 0, node);
  }

  /** Opening markup on its own */
  open(context: Partial<RenderContext> = {}): Payload {
    const out = createOutputBuffer(this.mode);
    this.writeOpen(out, resolveRenderContext(context));
    return out.finish();
  }

  /** Closing markup on its own */
  close(context: Partial<RenderContext> = {}): Payload {
    const out = createOutputBuffer(this.mode);
    this.writeClose(out, resolveRenderContext(context));
    return out.finish();
  }

  write(out: OutputBuffer, context: RenderContext): void {
    this.writeOpen(out, context);
    for (const child of this.childNodes) {
      child.write(out, context);
    }
    this.writeClose(out, context);
  }

  protected writeOpen(out: OutputBuffer, context: RenderContext): void {}

  protected writeClose(out: OutputBuffer, context: RenderContext): void {}

  private adopt(node: AstNode): void {
    if (node.mode !== this.mode) {
      throw new EncodingMismatchError(`Cannot add a ${node.mode} ${node.kind} node to a ${this.mode} ${this.kind} node`);
    }
    if (node === this || (node instanceof ContainerNode && node.contains(this))) {
      throw new InvalidNestingError(this.kind, node.kind);
    }
    node.parent = this;
  }

  private contains(node: AstNode): boolean {
    for (let current = node.parent; current; current = current.parent) {
      if (current === this) return true;
    }
    return false;
  }
}

/**
 * Node that never has children but still renders markup (horizontal rule)
 */
export abstract class LeafNode extends AstNode {
  constructor(kind: NodeKind, details: unknown, context: NodeContext) {
    super(kind, context.mode);
  }
}

/**
 * Leaf holding raw text in the tree's representation.
 * By default the text is HTML-escaped, or URL-escaped inside href and src.
 */
export abstract class TextNode extends AstNode {
  readonly text: Payload;

  constructor(kind: TextKind, details: TextDetails, context: NodeContext) {
    super(kind, context.mode);
    if (modeOf(details.text) !== context.mode) {
      throw new EncodingMismatchError(`${kind} payload is ${modeOf(details.text)} but the node is ${context.mode}`);
    }
    this.text = details.text;
  }

  write(out: OutputBuffer, context: RenderContext): void {
    out.text(this.text, context.urlEscape ? Escape.Url : Escape.Html);
  }
}

// ============================================================================
// Attributes
// ============================================================================

export function writeAttribute(out: OutputBuffer, attribute: Attribute, urlEscape = false): void {
  if (attribute === null) return;
  const context = resolveRenderContext({ urlEscape });
  for (const fragment of attribute) {
    fragment.write(out, context);
  }
}

/**
 * Render an attribute on its own. Absent attributes render empty.
 */
export function renderAttribute(attribute: Attribute, mode: EncodingMode, urlEscape = false): Payload {
  const out = createOutputBuffer(mode);
  writeAttribute(out, attribute, urlEscape);
  return out.finish();
}

// ============================================================================
// Rendering helpers
// ============================================================================

/** Render a text-mode node to a string */
export function renderToString(node: AstNode, context: Partial<RenderContext> = {}): string {
  const output = node.render(context);
  if (typeof output !== 'string') {
    throw new EncodingMismatchError(`Expected a text-mode tree, got ${node.mode}`);
  }
  return output;
}

/** Render a binary-mode node to bytes */
export function renderToBytes(node: AstNode, context: Partial<RenderContext> = {}): Uint8Array {
  const output = node.render(context);
  if (typeof output === 'string') {
    throw new EncodingMismatchError(`Expected a binary-mode tree, got ${node.mode}`);
  }
  return output;
}
