/**
 * Escaping Utilities
 *
 * HTML and URL escaping for text and binary payloads. Binary escaping maps
 * one byte at a time, so multi-byte sequences pass through intact.
 */

const utf8 = new TextEncoder();

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;'
};

const URL_UNRESERVED =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789' +
  '-_.+!*(),%#@?=;:/,+$';

const urlUnreservedBytes = new Uint8Array(128);
for (let i = 0; i < URL_UNRESERVED.length; i++) {
  urlUnreservedBytes[URL_UNRESERVED.charCodeAt(i)] = 1;
}

const AMP = 0x26;
const LT = 0x3c;
const GT = 0x3e;
const QUOT = 0x22;

const AMP_ENTITY = utf8.encode('&amp;');
const LT_ENTITY = utf8.encode('&lt;');
const GT_ENTITY = utf8.encode('&gt;');
const QUOT_ENTITY = utf8.encode('&quot;');

const HEX = '0123456789ABCDEF';

function isUnreservedByte(byte: number): boolean {
  return byte < 0x80 && urlUnreservedBytes[byte] === 1;
}

function percentEncode(byte: number): string {
  return '%' + HEX[byte >> 4] + HEX[byte & 0x0f];
}

/**
 * Replace `&`, `<`, `>` and `"` with their entities.
 */
export function htmlEscape(text: string): string {
  return text.replace(/[&<>"]/g, ch => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Percent-encode everything outside the unreserved set as UTF-8 `%XX`,
 * then turn every `&` into `&amp;`.
 */
export function urlEscape(text: string): string {
  let encoded = '';
  for (const ch of text) {
    const code = ch.charCodeAt(0);
    if (ch.length === 1 && (isUnreservedByte(code) || code === AMP)) {
      encoded += ch;
      continue;
    }
    for (const byte of utf8.encode(ch)) {
      encoded += percentEncode(byte);
    }
  }
  return encoded.replace(/&/g, '&amp;');
}

/**
 * Byte-wise {@link htmlEscape}.
 */
export function htmlEscapeBytes(bytes: Uint8Array): Uint8Array {
  const out = new ByteWriter(bytes.length);
  for (const byte of bytes) {
    switch (byte) {
      case AMP: out.pushAll(AMP_ENTITY); break;
      case LT: out.pushAll(LT_ENTITY); break;
      case GT: out.pushAll(GT_ENTITY); break;
      case QUOT: out.pushAll(QUOT_ENTITY); break;
      default: out.push(byte);
    }
  }
  return out.toBytes();
}

/**
 * Byte-wise {@link urlEscape}. Each byte outside the unreserved set
 * becomes one `%XX`.
 */
export function urlEscapeBytes(bytes: Uint8Array): Uint8Array {
  const out = new ByteWriter(bytes.length);
  for (const byte of bytes) {
    if (byte === AMP) {
      out.pushAll(AMP_ENTITY);
    } else if (isUnreservedByte(byte)) {
      out.push(byte);
    } else {
      out.push(0x25, HEX.charCodeAt(byte >> 4), HEX.charCodeAt(byte & 0x0f));
    }
  }
  return out.toBytes();
}

/**
 * Growable byte array
 */
export class ByteWriter {
  private buffer: Uint8Array;
  private length = 0;

  constructor(initialCapacity = 64) {
    this.buffer = new Uint8Array(Math.max(16, initialCapacity));
  }

  push(...bytes: number[]): void {
    this.reserve(bytes.length);
    for (const byte of bytes) this.buffer[this.length++] = byte;
  }

  pushAll(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private reserve(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < needed) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.length));
    this.buffer = grown;
  }
}
