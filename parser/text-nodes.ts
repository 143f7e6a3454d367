/**
 * Text Nodes
 */

import type { RenderContext } from './ast-types.js';
import { TextNode } from './ast-nodes.js';
import { decodeEntityPayload } from './entities.js';
import { Escape, type OutputBuffer } from './output-buffer.js';

const REPLACEMENT_CHARACTER = '\uFFFD';

export class NormalText extends TextNode {}

/**
 * NUL in the input. The stored payload is ignored.
 */
export class NullChar extends TextNode {
  write(out: OutputBuffer): void {
    out.markup(REPLACEMENT_CHARACTER);
  }
}

/** Hard line break; a space inside alt text */
export class LineBreak extends TextNode {
  write(out: OutputBuffer, context: RenderContext): void {
    out.markup(context.imageNestingLevel === 0 ? '<br>\n' : ' ');
  }
}

/** Soft line break; a space inside alt text */
export class SoftLineBreak extends TextNode {
  write(out: OutputBuffer, context: RenderContext): void {
    out.markup(context.imageNestingLevel === 0 ? '\n' : ' ');
  }
}

/**
 * Entity reference as written, e.g. `&amp;`. Rendered decoded and escaped again;
 * a reference the lookup does not know is rendered as literal text.
 */
export class HtmlEntity extends TextNode {
  get decoded(): string | undefined {
    return decodeEntityPayload(this.text);
  }

  write(out: OutputBuffer, context: RenderContext): void {
    const escape = context.urlEscape ? Escape.Url : Escape.Html;
    out.text(this.decoded ?? this.text, escape);
  }
}

export class CodeText extends TextNode {}

/** Raw HTML, written without escaping */
export class HtmlText extends TextNode {
  write(out: OutputBuffer): void {
    out.text(this.text, Escape.None);
  }
}

export class MathText extends TextNode {}
