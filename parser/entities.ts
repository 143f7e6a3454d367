/**
 * HTML entity lookup
 *
 * Takes the literal reference as written, ampersand and semicolon included.
 */

import { decodeHTMLStrict } from 'entities';

const NAMED_ENTITY = /^&[A-Za-z][A-Za-z0-9]*;$/;

/**
 * Decode a numeric reference like &#65; or &#x41;.
 * Out-of-range values and surrogate halves give U+FFFD; &#0; gives U+0000.
 */
export function decodeNumericEntity(text: string): string | undefined {
  if (!text.startsWith('&#') || !text.endsWith(';')) return undefined;
  const body = text.slice(2, -1);
  let codePoint: number;
  if (body[0] === 'x' || body[0] === 'X') {
    const hex = body.slice(1);
    if (!/^[0-9A-Fa-f]{1,6}$/.test(hex)) return undefined;
    codePoint = parseInt(hex, 16);
  } else {
    if (!/^[0-9]{1,7}$/.test(body)) return undefined;
    codePoint = parseInt(body, 10);
  }
  if (codePoint > 0x10FFFF) return '\uFFFD';
  if (codePoint >= 0xD800 && codePoint <= 0xDFFF) return '\uFFFD';
  return String.fromCodePoint(codePoint);
}

/**
 * Decode a named or numeric entity reference.
 * Returns undefined when the text is not a known reference.
 */
export function lookupEntity(text: string): string | undefined {
  if (text.startsWith('&#')) return decodeNumericEntity(text);
  if (!NAMED_ENTITY.test(text)) return undefined;
  const decoded = decodeHTMLStrict(text);
  return decoded === text ? undefined : decoded;
}

/**
 * Decode an entity payload for output: bytes are read one per char
 * (references are ASCII) and a decoded NUL becomes U+FFFD.
 */
export function decodeEntityPayload(payload: string | Uint8Array): string | undefined {
  let text = '';
  if (typeof payload === 'string') {
    text = payload;
  } else {
    for (const byte of payload) text += String.fromCharCode(byte);
  }
  return lookupEntity(text)?.replace(/\0/g, '\uFFFD');
}
