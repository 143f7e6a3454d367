/**
 * AST Factory
 *
 * The node registry: one entry per kind, each pairing the kind's detail
 * schema with the class that renders it. Registering a class for a kind
 * replaces that kind only. Builders take a registry; the module-level
 * default registry backs {@link createNode}.
 */

import type { z } from 'zod';
import {
  BlockKind,
  EncodingMode,
  SpanKind,
  TextKind,
  isBlockKind,
  isSpanKind,
  isTextKind,
  modeOf,
  type NodeKind,
  type Payload
} from './ast-types.js';
import {
  blockDetailSchemas,
  spanDetailSchemas,
  textDetailsSchema,
  type AttributeSpec,
  type BlockDetailsMap,
  type SpanDetailsMap,
  type TextDetails
} from './ast-details.js';
import type { AstNode, Attribute, NodeContext, NodeFactory, TextNode } from './ast-nodes.js';
import {
  CodeBlock,
  Document,
  Heading,
  HorizontalRule,
  ListItem,
  OrderedList,
  Paragraph,
  Quote,
  RawHtmlBlock,
  Table,
  TableBody,
  TableCell,
  TableHead,
  TableHeaderCell,
  TableRow,
  UnorderedList
} from './block-nodes.js';
import {
  CodeSpan,
  DisplayMath,
  Emphasis,
  Image,
  InlineMath,
  Link,
  Strikethrough,
  Strong,
  Underline,
  WikiLink
} from './span-nodes.js';
import {
  CodeText,
  HtmlEntity,
  HtmlText,
  LineBreak,
  MathText,
  NormalText,
  NullChar,
  SoftLineBreak
} from './text-nodes.js';
import { MalformedDetailsError, UnknownKindError } from './errors.js';

// ============================================================================
// Class signatures
// ============================================================================

export type BlockNodeClass<K extends keyof BlockDetailsMap> =
  new (kind: BlockKind, details: BlockDetailsMap[K], context: NodeContext) => AstNode;

export type SpanNodeClass<K extends keyof SpanDetailsMap> =
  new (kind: SpanKind, details: SpanDetailsMap[K], context: NodeContext) => AstNode;

export type TextNodeClass =
  new (kind: TextKind, details: TextDetails, context: NodeContext) => TextNode;

/** Any registered class, for lookups */
export type AnyNodeClass = new (kind: never, details: never, context: never) => AstNode;

interface RegistryEntry {
  readonly nodeClass: AnyNodeClass;
  create(details: unknown, context: NodeContext): AstNode;
}

function validateDetails<T>(kind: NodeKind, schema: z.ZodType<T>, details: unknown): T {
  const parsed = schema.safeParse(details);
  if (!parsed.success) throw new MalformedDetailsError(kind, parsed.error.issues);
  return parsed.data;
}

// ============================================================================
// Registry
// ============================================================================

export class NodeRegistry implements NodeFactory {
  private readonly entries = new Map<BlockKind | SpanKind, RegistryEntry>();
  private readonly textClasses = new Map<TextKind, TextNodeClass>();

  /** A registry holding the reference HTML classes for every kind */
  static withDefaults(): NodeRegistry {
    const registry = new NodeRegistry();
    registerDefaults(registry);
    return registry;
  }

  /** Independent copy; changes to either side do not affect the other */
  clone(): NodeRegistry {
    const copy = new NodeRegistry();
    for (const [kind, entry] of this.entries) copy.entries.set(kind, entry);
    for (const [kind, nodeClass] of this.textClasses) copy.textClasses.set(kind, nodeClass);
    return copy;
  }

  registerBlock<K extends keyof BlockDetailsMap>(kind: K, nodeClass: BlockNodeClass<K>): void {
    const schema: z.ZodType<BlockDetailsMap[K]> = blockDetailSchemas[kind];
    this.entries.set(kind, {
      nodeClass,
      create: (details, context) => new nodeClass(kind, validateDetails(kind, schema, details), context)
    });
  }

  registerSpan<K extends keyof SpanDetailsMap>(kind: K, nodeClass: SpanNodeClass<K>): void {
    const schema: z.ZodType<SpanDetailsMap[K]> = spanDetailSchemas[kind];
    this.entries.set(kind, {
      nodeClass,
      create: (details, context) => new nodeClass(kind, validateDetails(kind, schema, details), context)
    });
  }

  registerText(kind: TextKind, nodeClass: TextNodeClass): void {
    this.textClasses.set(kind, nodeClass);
  }

  /** Class currently registered for a kind */
  classOf(kind: NodeKind): AnyNodeClass | undefined {
    return isTextKind(kind) ? this.textClasses.get(kind) : this.entries.get(kind)?.nodeClass;
  }

  has(kind: NodeKind): boolean {
    return this.classOf(kind) !== undefined;
  }

  /**
   * Build a block or span node. Details are validated against the kind's
   * schema before the class is constructed.
   */
  create(kind: BlockKind | SpanKind, details: unknown, mode: EncodingMode): AstNode {
    const entry = isBlockKind(kind) || isSpanKind(kind) ? this.entries.get(kind) : undefined;
    if (!entry) throw new UnknownKindError(kind);
    return entry.create(details, this.context(mode));
  }

  createText(kind: TextKind, text: Payload, mode: EncodingMode): TextNode {
    const nodeClass = isTextKind(kind) ? this.textClasses.get(kind) : undefined;
    if (!nodeClass) throw new UnknownKindError(kind);
    const details = validateDetails(kind, textDetailsSchema, { text });
    return new nodeClass(kind, details, this.context(mode));
  }

  createAttribute(spec: AttributeSpec | undefined, mode: EncodingMode): Attribute {
    if (spec === null || spec === undefined) return null;
    return spec.map(([kind, text]) => this.createText(kind, text, mode));
  }

  private context(mode: EncodingMode): NodeContext {
    return { mode, factory: this };
  }
}

function registerDefaults(registry: NodeRegistry): void {
  registry.registerBlock(BlockKind.Document, Document);
  registry.registerBlock(BlockKind.Quote, Quote);
  registry.registerBlock(BlockKind.UnorderedList, UnorderedList);
  registry.registerBlock(BlockKind.OrderedList, OrderedList);
  registry.registerBlock(BlockKind.ListItem, ListItem);
  registry.registerBlock(BlockKind.HorizontalRule, HorizontalRule);
  registry.registerBlock(BlockKind.Heading, Heading);
  registry.registerBlock(BlockKind.CodeBlock, CodeBlock);
  registry.registerBlock(BlockKind.RawHtmlBlock, RawHtmlBlock);
  registry.registerBlock(BlockKind.Paragraph, Paragraph);
  registry.registerBlock(BlockKind.Table, Table);
  registry.registerBlock(BlockKind.TableHead, TableHead);
  registry.registerBlock(BlockKind.TableBody, TableBody);
  registry.registerBlock(BlockKind.TableRow, TableRow);
  registry.registerBlock(BlockKind.TableHeaderCell, TableHeaderCell);
  registry.registerBlock(BlockKind.TableCell, TableCell);

  registry.registerSpan(SpanKind.Emphasis, Emphasis);
  registry.registerSpan(SpanKind.Strong, Strong);
  registry.registerSpan(SpanKind.Underline, Underline);
  registry.registerSpan(SpanKind.Link, Link);
  registry.registerSpan(SpanKind.Image, Image);
  registry.registerSpan(SpanKind.Code, CodeSpan);
  registry.registerSpan(SpanKind.Strikethrough, Strikethrough);
  registry.registerSpan(SpanKind.InlineMath, InlineMath);
  registry.registerSpan(SpanKind.DisplayMath, DisplayMath);
  registry.registerSpan(SpanKind.WikiLink, WikiLink);

  registry.registerText(TextKind.Normal, NormalText);
  registry.registerText(TextKind.NullChar, NullChar);
  registry.registerText(TextKind.LineBreak, LineBreak);
  registry.registerText(TextKind.SoftLineBreak, SoftLineBreak);
  registry.registerText(TextKind.Entity, HtmlEntity);
  registry.registerText(TextKind.Code, CodeText);
  registry.registerText(TextKind.Html, HtmlText);
  registry.registerText(TextKind.Math, MathText);
}

// ============================================================================
// Default registry
// ============================================================================

export const defaultRegistry: NodeRegistry = NodeRegistry.withDefaults();

export interface CreateNodeOptions {
  /** Defaults to the payload's representation for text kinds, Text otherwise */
  mode?: EncodingMode;
  registry?: NodeRegistry;
}

/**
 * Create a node by kind, the way the tree builder does
 */
export function createNode<K extends BlockKind>(kind: K, details: BlockDetailsMap[K], options?: CreateNodeOptions): AstNode;
export function createNode<K extends SpanKind>(kind: K, details: SpanDetailsMap[K], options?: CreateNodeOptions): AstNode;
export function createNode(kind: TextKind, details: TextDetails, options?: CreateNodeOptions): TextNode;
export function createNode(kind: NodeKind, details: unknown, options: CreateNodeOptions = {}): AstNode {
  const registry = options.registry ?? defaultRegistry;
  if (isTextKind(kind)) {
    const { text } = validateDetails(kind, textDetailsSchema, details);
    return registry.createText(kind, text, options.mode ?? modeOf(text));
  }
  return registry.create(kind, details, options.mode ?? EncodingMode.Text);
}
