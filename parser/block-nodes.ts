/**
 * Block Nodes
 *
 * One class per block kind. Each renders the reference HTML; subclass and
 * register a replacement to change a single kind.
 */

import { Align, type BlockKind } from './ast-types.js';
import type {
  CodeBlockDetails,
  HeadingDetails,
  HeadingLevel,
  ListItemDetails,
  OrderedListDetails,
  TableCellDetails,
  TableDetails,
  UnorderedListDetails
} from './ast-details.js';
import {
  ContainerNode,
  LeafNode,
  writeAttribute,
  type Attribute,
  type NodeContext
} from './ast-nodes.js';
import type { OutputBuffer } from './output-buffer.js';

/** Root of every parsed document. Renders no markup of its own. */
export class Document extends ContainerNode {}

export class Quote extends ContainerNode {
  protected writeOpen(out: OutputBuffer): void {
    out.markup('<blockquote>\n');
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</blockquote>\n');
  }
}

export class UnorderedList extends ContainerNode {
  /** True when the items are not separated by blank lines */
  readonly isTight: boolean;

  /** Bullet character */
  readonly mark: string;

  constructor(kind: BlockKind, details: UnorderedListDetails, context: NodeContext) {
    super(kind, details, context);
    this.isTight = details.isTight;
    this.mark = details.mark;
  }

  protected writeOpen(out: OutputBuffer): void {
    out.markup('<ul>\n');
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</ul>\n');
  }
}

export class OrderedList extends ContainerNode {
  readonly start: number;
  readonly isTight: boolean;

  /** Character after the number, '.' or ')' */
  readonly markDelimiter: string;

  constructor(kind: BlockKind, details: OrderedListDetails, context: NodeContext) {
    super(kind, details, context);
    this.start = details.start;
    this.isTight = details.isTight;
    this.markDelimiter = details.markDelimiter;
  }

  protected writeOpen(out: OutputBuffer): void {
    out.markup(this.start === 1 ? '<ol>\n' : `<ol start="${this.start}">\n`);
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</ol>\n');
  }
}

export class ListItem extends ContainerNode {
  readonly isTask: boolean;

  /** ' ', 'x' or 'X' for task items, undefined otherwise */
  readonly taskMark: string | undefined;

  /** Input offset of the task mark */
  readonly taskMarkOffset: number | undefined;

  constructor(kind: BlockKind, details: ListItemDetails, context: NodeContext) {
    super(kind, details, context);
    this.isTask = details.isTask;
    this.taskMark = details.taskMark;
    this.taskMarkOffset = details.taskMarkOffset;
  }

  get isChecked(): boolean {
    return this.isTask && (this.taskMark === 'x' || this.taskMark === 'X');
  }

  protected writeOpen(out: OutputBuffer): void {
    if (!this.isTask) {
      out.markup('<li>');
      return;
    }
    out.markup('<li class="task-list-item"><input type="checkbox" class="task-list-item-checkbox" disabled');
    out.markup(this.isChecked ? ' checked>' : '>');
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</li>\n');
  }
}

export class HorizontalRule extends LeafNode {
  write(out: OutputBuffer): void {
    out.markup('<hr>\n');
  }
}

export class Heading extends ContainerNode {
  readonly level: HeadingLevel;

  constructor(kind: BlockKind, details: HeadingDetails, context: NodeContext) {
    super(kind, details, context);
    this.level = details.level;
  }

  protected writeOpen(out: OutputBuffer): void {
    out.markup(`<h${this.level}>`);
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup(`</h${this.level}>\n`);
  }
}

export class CodeBlock extends ContainerNode {
  /** '`' or '~' for fenced code, null for indented code */
  readonly fenceChar: string | null;

  /** Full info string after the opening fence */
  readonly info: Attribute;

  /** First word of the info string */
  readonly lang: Attribute;

  constructor(kind: BlockKind, details: CodeBlockDetails, context: NodeContext) {
    super(kind, details, context);
    this.fenceChar = details.fenceChar ?? null;
    this.info = context.factory.createAttribute(details.info, context.mode);
    this.lang = context.factory.createAttribute(details.lang, context.mode);
  }

  protected writeOpen(out: OutputBuffer): void {
    if (this.lang === null) {
      out.markup('<pre><code>');
      return;
    }
    out.markup('<pre><code class="language-');
    writeAttribute(out, this.lang);
    out.markup('">');
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</code></pre>\n');
  }
}

/** Raw HTML block; its HTML text children are written verbatim */
export class RawHtmlBlock extends ContainerNode {}

export class Paragraph extends ContainerNode {
  protected writeOpen(out: OutputBuffer): void {
    out.markup('<p>');
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</p>\n');
  }
}

export class Table extends ContainerNode {
  readonly colCount: number;
  readonly headRowCount: number;
  readonly bodyRowCount: number;

  constructor(kind: BlockKind, details: TableDetails, context: NodeContext) {
    super(kind, details, context);
    this.colCount = details.colCount;
    this.headRowCount = details.headRowCount;
    this.bodyRowCount = details.bodyRowCount;
  }

  protected writeOpen(out: OutputBuffer): void {
    out.markup('<table>\n');
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</table>\n');
  }
}

export class TableHead extends ContainerNode {
  protected writeOpen(out: OutputBuffer): void {
    out.markup('<thead>\n');
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</thead>\n');
  }
}

export class TableBody extends ContainerNode {
  protected writeOpen(out: OutputBuffer): void {
    out.markup('<tbody>\n');
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</tbody>\n');
  }
}

export class TableRow extends ContainerNode {
  protected writeOpen(out: OutputBuffer): void {
    out.markup('<tr>\n');
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup('</tr>\n');
  }
}

/**
 * Shared by header and body cells; only the tag differs
 */
export abstract class AlignedCell extends ContainerNode {
  protected abstract readonly tag: 'th' | 'td';
  readonly align: Align;

  constructor(kind: BlockKind, details: TableCellDetails, context: NodeContext) {
    super(kind, details, context);
    this.align = details.align;
  }

  protected writeOpen(out: OutputBuffer): void {
    out.markup(this.align === Align.Default ? `<${this.tag}>` : `<${this.tag} align="${this.align}">`);
  }

  protected writeClose(out: OutputBuffer): void {
    out.markup(`</${this.tag}>\n`);
  }
}

export class TableHeaderCell extends AlignedCell {
  protected readonly tag = 'th';
}

export class TableCell extends AlignedCell {
  protected readonly tag = 'td';
}
