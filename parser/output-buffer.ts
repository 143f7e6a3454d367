/**
 * Output Buffers
 *
 * The sink every renderer writes into. Markup is always given as a string;
 * payload text arrives in the tree's representation and is escaped by the
 * buffer. The binary buffer writes markup as UTF-8.
 */

import { EncodingMode, type Payload } from './ast-types.js';
import { EncodingMismatchError } from './errors.js';
import { ByteWriter, htmlEscape, htmlEscapeBytes, urlEscape, urlEscapeBytes } from './escaping.js';

/**
 * How payload text is escaped on its way into the output
 */
export enum Escape {
  Html = 'html',
  Url = 'url',
  None = 'none'
}

export interface OutputBuffer<T extends Payload = Payload> {
  readonly mode: EncodingMode;

  /** Append literal markup */
  markup(text: string): void;

  /** Append payload text, escaped */
  text(payload: Payload, escape: Escape): void;

  /** Everything written so far */
  finish(): T;
}

export class TextOutputBuffer implements OutputBuffer<string> {
  readonly mode = EncodingMode.Text;
  private readonly parts: string[] = [];

  markup(text: string): void {
    this.parts.push(text);
  }

  text(payload: Payload, escape: Escape): void {
    if (typeof payload !== 'string') {
      throw new EncodingMismatchError('Binary payload written to a text output buffer');
    }
    switch (escape) {
      case Escape.Html: this.parts.push(htmlEscape(payload)); break;
      case Escape.Url: this.parts.push(urlEscape(payload)); break;
      case Escape.None: this.parts.push(payload); break;
    }
  }

  finish(): string {
    return this.parts.join('');
  }
}

export class BinaryOutputBuffer implements OutputBuffer<Uint8Array> {
  readonly mode = EncodingMode.Binary;
  private readonly writer = new ByteWriter(256);
  private readonly encoder = new TextEncoder();

  markup(text: string): void {
    this.writer.pushAll(this.encoder.encode(text));
  }

  /**
   * Strings are accepted for text computed during rendering (decoded
   * entities) and are written as UTF-8 before escaping.
   */
  text(payload: Payload, escape: Escape): void {
    const bytes = typeof payload === 'string' ? this.encoder.encode(payload) : payload;
    switch (escape) {
      case Escape.Html: this.writer.pushAll(htmlEscapeBytes(bytes)); break;
      case Escape.Url: this.writer.pushAll(urlEscapeBytes(bytes)); break;
      case Escape.None: this.writer.pushAll(bytes); break;
    }
  }

  finish(): Uint8Array {
    return this.writer.toBytes();
  }
}

export function createOutputBuffer(mode: EncodingMode): TextOutputBuffer | BinaryOutputBuffer {
  return mode === EncodingMode.Text ? new TextOutputBuffer() : new BinaryOutputBuffer();
}
