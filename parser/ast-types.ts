/**
 * AST Type Definitions
 *
 * Node kinds, encoding modes and the rendering context shared by the
 * document tree, the tree builder and the direct renderer.
 */

/**
 * Block-level node kinds
 */
export enum BlockKind {
  Document = 'document',
  Quote = 'quote',
  UnorderedList = 'unordered-list',
  OrderedList = 'ordered-list',
  ListItem = 'list-item',
  HorizontalRule = 'horizontal-rule',
  Heading = 'heading',
  CodeBlock = 'code-block',
  RawHtmlBlock = 'raw-html-block',
  Paragraph = 'paragraph',
  Table = 'table',
  TableHead = 'table-head',
  TableBody = 'table-body',
  TableRow = 'table-row',
  TableHeaderCell = 'table-header-cell',
  TableCell = 'table-cell'
}

/**
 * Inline span node kinds
 */
export enum SpanKind {
  Emphasis = 'emphasis',
  Strong = 'strong',
  Underline = 'underline',
  Link = 'link',
  Image = 'image',
  Code = 'code-span',
  Strikethrough = 'strikethrough',
  InlineMath = 'inline-math',
  DisplayMath = 'display-math',
  WikiLink = 'wiki-link'
}

/**
 * Text leaf kinds
 */
export enum TextKind {
  Normal = 'normal-text',
  NullChar = 'null-char',
  LineBreak = 'line-break',
  SoftLineBreak = 'soft-line-break',
  Entity = 'html-entity',
  Code = 'code-text',
  Html = 'html-text',
  Math = 'math-text'
}

export type NodeKind = BlockKind | SpanKind | TextKind;

const blockKinds: ReadonlySet<string> = new Set<string>(Object.values(BlockKind));
const spanKinds: ReadonlySet<string> = new Set<string>(Object.values(SpanKind));
const textKinds: ReadonlySet<string> = new Set<string>(Object.values(TextKind));

export function isBlockKind(kind: unknown): kind is BlockKind {
  return typeof kind === 'string' && blockKinds.has(kind);
}

export function isSpanKind(kind: unknown): kind is SpanKind {
  return typeof kind === 'string' && spanKinds.has(kind);
}

export function isTextKind(kind: unknown): kind is TextKind {
  return typeof kind === 'string' && textKinds.has(kind);
}

/**
 * Table cell alignment
 */
export enum Align {
  Default = 'default',
  Left = 'left',
  Center = 'center',
  Right = 'right'
}

/**
 * Representation of every payload in a tree. Fixed when the tree is created.
 */
export enum EncodingMode {
  /** Payloads are strings */
  Text = 'text',

  /** Payloads are byte arrays */
  Binary = 'binary'
}

/** Raw text as handed over by a parse engine */
export type Payload = string | Uint8Array;

export function modeOf(payload: Payload): EncodingMode {
  return typeof payload === 'string' ? EncodingMode.Text : EncodingMode.Binary;
}

/**
 * Context inherited from the parent while rendering.
 * Never stored on nodes.
 */
export interface RenderContext {
  /** Percent-encode text instead of HTML-escaping it (href, src) */
  readonly urlEscape: boolean;

  /** Number of Image spans enclosing the node being rendered */
  readonly imageNestingLevel: number;
}

export const DEFAULT_RENDER_CONTEXT: RenderContext = {
  urlEscape: false,
  imageNestingLevel: 0
};

export function resolveRenderContext(context: Partial<RenderContext> = {}): RenderContext {
  return { ...DEFAULT_RENDER_CONTEXT, ...context };
}
