/**
 * Span Nodes
 *
 * Inline containers. Inside an image every span drops its own tags and only
 * its text reaches the output, since alt text cannot hold markup.
 */

import type { RenderContext, SpanKind } from './ast-types.js';
import type { ImageDetails, LinkDetails, WikiLinkDetails } from './ast-details.js';
import { ContainerNode, writeAttribute, type Attribute, type NodeContext } from './ast-nodes.js';
import type { OutputBuffer } from './output-buffer.js';

/**
 * Span whose tags are written only outside image alt text
 */
export abstract class InlineSpan extends ContainerNode {
  protected writeOpen(out: OutputBuffer, context: RenderContext): void {
    if (context.imageNestingLevel === 0) this.writeTagOpen(out);
  }

  protected writeClose(out: OutputBuffer, context: RenderContext): void {
    if (context.imageNestingLevel === 0) this.writeTagClose(out);
  }

  protected abstract writeTagOpen(out: OutputBuffer): void;
  protected abstract writeTagClose(out: OutputBuffer): void;
}

/**
 * Span rendered as a fixed pair of tags
 */
export abstract class TaggedSpan extends InlineSpan {
  protected abstract readonly openTag: string;
  protected abstract readonly closeTag: string;

  protected writeTagOpen(out: OutputBuffer): void {
    out.markup(this.openTag);
  }

  protected writeTagClose(out: OutputBuffer): void {
    out.markup(this.closeTag);
  }
}

export class Emphasis extends TaggedSpan {
  protected readonly openTag = '<em>';
  protected readonly closeTag = '</em>';
}

export class Strong extends TaggedSpan {
  protected readonly openTag = '<strong>';
  protected readonly closeTag = '</strong>';
}

export class Underline extends TaggedSpan {
  protected readonly openTag = '<u>';
  protected readonly closeTag = '</u>';
}

export class CodeSpan extends TaggedSpan {
  protected readonly openTag = '<code>';
  protected readonly closeTag = '</code>';
}

export class Strikethrough extends TaggedSpan {
  protected readonly openTag = '<del>';
  protected readonly closeTag = '</del>';
}

export class InlineMath extends TaggedSpan {
  protected readonly openTag = '<x-equation>';
  protected readonly closeTag = '</x-equation>';
}

export class DisplayMath extends TaggedSpan {
  protected readonly openTag = '<x-equation type="display">';
  protected readonly closeTag = '</x-equation>';
}

export class Link extends InlineSpan {
  readonly href: Attribute;
  readonly title: Attribute;

  constructor(kind: SpanKind, details: LinkDetails, context: NodeContext) {
    super(kind, details, context);
    this.href = context.factory.createAttribute(details.href, context.mode);
    this.title = context.factory.createAttribute(details.title, context.mode);
  }

  protected writeTagOpen(out: OutputBuffer): void {
    out.markup('<a href="');
    writeAttribute(out, this.href, true);
    if (this.title !== null) {
      out.markup('" title="');
      writeAttribute(out, this.title);
    }
    out.markup('">');
  }

  protected writeTagClose(out: OutputBuffer): void {
    out.markup('</a>');
  }
}

/**
 * Image. Its children are the alt text.
 *
 * Rendering raises the image nesting level by one for the whole subtree,
 * and only the outermost image (level 1 after raising) writes the <img> tag.
 */
export class Image extends ContainerNode {
  readonly src: Attribute;
  readonly title: Attribute;

  constructor(kind: SpanKind, details: ImageDetails, context: NodeContext) {
    super(kind, details, context);
    this.src = context.factory.createAttribute(details.src, context.mode);
    this.title = context.factory.createAttribute(details.title, context.mode);
  }

  write(out: OutputBuffer, context: RenderContext): void {
    super.write(out, { ...context, imageNestingLevel: context.imageNestingLevel + 1 });
  }

  protected writeOpen(out: OutputBuffer, context: RenderContext): void {
    if (context.imageNestingLevel !== 1) return;
    out.markup('<img src="');
    writeAttribute(out, this.src, true);
    out.markup('" alt="');
  }

  protected writeClose(out: OutputBuffer, context: RenderContext): void {
    if (context.imageNestingLevel !== 1) return;
    if (this.title !== null) {
      out.markup('" title="');
      writeAttribute(out, this.title);
    }
    out.markup('">');
  }
}

export class WikiLink extends InlineSpan {
  readonly target: Attribute;

  constructor(kind: SpanKind, details: WikiLinkDetails, context: NodeContext) {
    super(kind, details, context);
    this.target = context.factory.createAttribute(details.target, context.mode);
  }

  protected writeTagOpen(out: OutputBuffer): void {
    out.markup('<x-wikilink data-target="');
    writeAttribute(out, this.target);
    out.markup('">');
  }

  protected writeTagClose(out: OutputBuffer): void {
    out.markup('</x-wikilink>');
  }
}
