/**
 * Node Details
 *
 * The per-kind detail vocabulary a parse engine hands over with each
 * enter event, as zod schemas plus the matching static types.
 * Unknown keys are rejected.
 */

import { z } from 'zod';
import { Align, BlockKind, SpanKind, TextKind, type Payload } from './ast-types.js';

// ============================================================================
// Attribute specs
// ============================================================================

/**
 * Rich text as (text kind, raw text) pairs. `null` means absent,
 * which is not the same as an empty list.
 */
export type AttributeSpec = Array<[TextKind, Payload]> | null;

const payloadSchema: z.ZodType<Payload> = z.union([z.string(), z.instanceof(Uint8Array)]);

const attributeSpecSchema: z.ZodType<AttributeSpec> = z
  .array(z.tuple([z.nativeEnum(TextKind), payloadSchema]))
  .nullable();

const markSchema = z.string().length(1);
const countSchema = z.number().int().nonnegative();

// ============================================================================
// Detail types
// ============================================================================

/** Kinds that carry no details */
export type NoDetails = Record<never, never>;

export interface UnorderedListDetails {
  isTight: boolean;
  mark: string;               // '-', '+' or '*'
}

export interface OrderedListDetails {
  start: number;
  isTight: boolean;
  markDelimiter: string;      // '.' or ')'
}

export interface ListItemDetails {
  isTask: boolean;
  taskMark?: string;          // ' ', 'x' or 'X'
  taskMarkOffset?: number;    // input offset of the char between the brackets
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface HeadingDetails {
  level: HeadingLevel;
}

export interface CodeBlockDetails {
  fenceChar?: string | null;  // null for indented code
  info?: AttributeSpec;
  lang?: AttributeSpec;
}

export interface TableDetails {
  colCount: number;
  headRowCount: number;
  bodyRowCount: number;
}

export interface TableCellDetails {
  align: Align;
}

export interface LinkDetails {
  href: AttributeSpec;
  title?: AttributeSpec;
}

export interface ImageDetails {
  src: AttributeSpec;
  title?: AttributeSpec;
}

export interface WikiLinkDetails {
  target: AttributeSpec;
}

export interface TextDetails {
  text: Payload;
}

export function isHeadingLevel(level: number): level is HeadingLevel {
  return Number.isInteger(level) && level >= 1 && level <= 6;
}

// ============================================================================
// Kind → details maps
// ============================================================================

export interface BlockDetailsMap {
  [BlockKind.Document]: NoDetails;
  [BlockKind.Quote]: NoDetails;
  [BlockKind.UnorderedList]: UnorderedListDetails;
  [BlockKind.OrderedList]: OrderedListDetails;
  [BlockKind.ListItem]: ListItemDetails;
  [BlockKind.HorizontalRule]: NoDetails;
  [BlockKind.Heading]: HeadingDetails;
  [BlockKind.CodeBlock]: CodeBlockDetails;
  [BlockKind.RawHtmlBlock]: NoDetails;
  [BlockKind.Paragraph]: NoDetails;
  [BlockKind.Table]: TableDetails;
  [BlockKind.TableHead]: NoDetails;
  [BlockKind.TableBody]: NoDetails;
  [BlockKind.TableRow]: NoDetails;
  [BlockKind.TableHeaderCell]: TableCellDetails;
  [BlockKind.TableCell]: TableCellDetails;
}

export interface SpanDetailsMap {
  [SpanKind.Emphasis]: NoDetails;
  [SpanKind.Strong]: NoDetails;
  [SpanKind.Underline]: NoDetails;
  [SpanKind.Link]: LinkDetails;
  [SpanKind.Image]: ImageDetails;
  [SpanKind.Code]: NoDetails;
  [SpanKind.Strikethrough]: NoDetails;
  [SpanKind.InlineMath]: NoDetails;
  [SpanKind.DisplayMath]: NoDetails;
  [SpanKind.WikiLink]: WikiLinkDetails;
}

export type BlockSchemas = { [K in keyof BlockDetailsMap]: z.ZodType<BlockDetailsMap[K]> };
export type SpanSchemas = { [K in keyof SpanDetailsMap]: z.ZodType<SpanDetailsMap[K]> };

// ============================================================================
// Schemas
// ============================================================================

const noDetailsSchema: z.ZodType<NoDetails> = z.object({}).strict();

const unorderedListSchema: z.ZodType<UnorderedListDetails> = z.object({
  isTight: z.boolean(),
  mark: markSchema
}).strict();

const orderedListSchema: z.ZodType<OrderedListDetails> = z.object({
  start: countSchema,
  isTight: z.boolean(),
  markDelimiter: markSchema
}).strict();

const listItemSchema: z.ZodType<ListItemDetails> = z.object({
  isTask: z.boolean(),
  taskMark: markSchema.optional(),
  taskMarkOffset: countSchema.optional()
}).strict().refine(
  details => !details.isTask || (details.taskMark !== undefined && details.taskMarkOffset !== undefined),
  { message: 'task list items need taskMark and taskMarkOffset' }
);

const headingSchema: z.ZodType<HeadingDetails> = z.object({
  level: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5), z.literal(6)])
}).strict();

const codeBlockSchema: z.ZodType<CodeBlockDetails> = z.object({
  fenceChar: markSchema.nullable().optional(),
  info: attributeSpecSchema.optional(),
  lang: attributeSpecSchema.optional()
}).strict();

const tableSchema: z.ZodType<TableDetails> = z.object({
  colCount: countSchema,
  headRowCount: countSchema,
  bodyRowCount: countSchema
}).strict();

const tableCellSchema: z.ZodType<TableCellDetails> = z.object({
  align: z.nativeEnum(Align)
}).strict();

const linkSchema: z.ZodType<LinkDetails> = z.object({
  href: attributeSpecSchema,
  title: attributeSpecSchema.optional()
}).strict();

const imageSchema: z.ZodType<ImageDetails> = z.object({
  src: attributeSpecSchema,
  title: attributeSpecSchema.optional()
}).strict();

const wikiLinkSchema: z.ZodType<WikiLinkDetails> = z.object({
  target: attributeSpecSchema
}).strict();

export const textDetailsSchema: z.ZodType<TextDetails> = z.object({
  text: payloadSchema
}).strict();

export const blockDetailSchemas: BlockSchemas = {
  [BlockKind.Document]: noDetailsSchema,
  [BlockKind.Quote]: noDetailsSchema,
  [BlockKind.UnorderedList]: unorderedListSchema,
  [BlockKind.OrderedList]: orderedListSchema,
  [BlockKind.ListItem]: listItemSchema,
  [BlockKind.HorizontalRule]: noDetailsSchema,
  [BlockKind.Heading]: headingSchema,
  [BlockKind.CodeBlock]: codeBlockSchema,
  [BlockKind.RawHtmlBlock]: noDetailsSchema,
  [BlockKind.Paragraph]: noDetailsSchema,
  [BlockKind.Table]: tableSchema,
  [BlockKind.TableHead]: noDetailsSchema,
  [BlockKind.TableBody]: noDetailsSchema,
  [BlockKind.TableRow]: noDetailsSchema,
  [BlockKind.TableHeaderCell]: tableCellSchema,
  [BlockKind.TableCell]: tableCellSchema
};

export const spanDetailSchemas: SpanSchemas = {
  [SpanKind.Emphasis]: noDetailsSchema,
  [SpanKind.Strong]: noDetailsSchema,
  [SpanKind.Underline]: noDetailsSchema,
  [SpanKind.Link]: linkSchema,
  [SpanKind.Image]: imageSchema,
  [SpanKind.Code]: noDetailsSchema,
  [SpanKind.Strikethrough]: noDetailsSchema,
  [SpanKind.InlineMath]: noDetailsSchema,
  [SpanKind.DisplayMath]: noDetailsSchema,
  [SpanKind.WikiLink]: wikiLinkSchema
};
