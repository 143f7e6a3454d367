import { describe, expect, test } from 'vitest';
import { htmlEscape, htmlEscapeBytes, urlEscape, urlEscapeBytes, ByteWriter } from '../escaping.js';

const bytes = (text: string) => new TextEncoder().encode(text);

describe('HTML escaping', () => {
  test('replaces the four special characters', () => {
    expect(htmlEscape('a < b & "c" > d')).toBe('a &lt; b &amp; &quot;c&quot; &gt; d');
  });

  test('leaves apostrophes and non-ASCII alone', () => {
    expect(htmlEscape("it's é")).toBe("it's é");
  });

  test('byte variant escapes the same characters', () => {
    expect(htmlEscapeBytes(bytes('<&>"'))).toEqual(bytes('&lt;&amp;&gt;&quot;'));
  });

  test('byte variant passes high bytes through', () => {
    const input = new Uint8Array([0x61, 0xed, 0xb2, 0x93]);
    expect(htmlEscapeBytes(input)).toEqual(input);
  });
});

describe('URL escaping', () => {
  test('keeps the safe set', () => {
    expect(urlEscape('/path?q=1#x')).toBe('/path?q=1#x');
  });

  test('percent-encodes spaces and tildes', () => {
    expect(urlEscape('a b~')).toBe('a%20b%7E');
  });

  test('encodes non-ASCII as UTF-8', () => {
    expect(urlEscape('é')).toBe('%C3%A9');
  });

  test('turns ampersands into entities', () => {
    expect(urlEscape('AT&T')).toBe('AT&amp;T');
  });

  test('byte variant encodes each byte', () => {
    expect(urlEscapeBytes(new Uint8Array([0x2f, 0xed, 0xb2, 0x93]))).toEqual(bytes('/%ED%B2%93'));
  });

  test('byte variant turns ampersands into entities', () => {
    expect(urlEscapeBytes(bytes('a&b'))).toEqual(bytes('a&amp;b'));
  });
});

describe('ByteWriter', () => {
  test('grows past its initial capacity', () => {
    const writer = new ByteWriter(16);
    for (let i = 0; i < 40; i++) writer.push(i);
    const out = writer.toBytes();
    expect(out.length).toBe(40);
    expect(out[39]).toBe(39);
  });
});
