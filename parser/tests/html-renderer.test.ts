/**
 * End-to-end rendering: markdown-it events through the direct renderer and
 * through the tree builder must give the same HTML.
 */

import { describe, expect, test } from 'vitest';
import { renderToBytes, renderToString } from '../ast-nodes.js';
import { DomParser } from '../dom-parser.js';
import { HtmlRenderer } from '../html-renderer.js';
import type { ParserFlags } from '../parser-interfaces.js';

const encode = (text: string) => new TextEncoder().encode(text);

function concat(...parts: Array<string | number[]>): Uint8Array {
  const bytes: number[] = [];
  for (const part of parts) bytes.push(...(typeof part === 'string' ? encode(part) : part));
  return Uint8Array.from(bytes);
}

function renderBoth(markdown: string, flags: ParserFlags = {}): string {
  const direct = new HtmlRenderer({ flags }).parse(markdown);
  const viaTree = renderToString(new DomParser({ flags }).parse(markdown));
  expect(viaTree).toBe(direct);
  return direct;
}

function renderBothBytes(markdown: Uint8Array): Uint8Array {
  const direct = new HtmlRenderer().parse(markdown);
  const viaTree = renderToBytes(new DomParser().parse(markdown));
  expect(viaTree).toEqual(direct);
  return direct;
}

const longDocument = `# Hello, world

Lorem \`ipsum\` *dolor **sit*** [amet](http://example.com/ "foo").

    int main(int argc, char ** argv) {
        return 0;
    }

Some lists:

* Cat
* Dog
* Fish

---

1. One
2. Two
3. Three

> It was the best of times, it was the worst of times

The end.
`;

const longExpected = `<h1>Hello, world</h1>
<p>Lorem <code>ipsum</code> <em>dolor <strong>sit</strong></em> <a href="http://example.com/" title="foo">amet</a>.</p>
<pre><code>int main(int argc, char ** argv) {
    return 0;
}
</code></pre>
<p>Some lists:</p>
<ul>
<li>Cat</li>
<li>Dog</li>
<li>Fish</li>
</ul>
<hr>
<ol>
<li>One</li>
<li>Two</li>
<li>Three</li>
</ol>
<blockquote>
<p>It was the best of times, it was the worst of times</p>
</blockquote>
<p>The end.</p>
`;

describe('Text input', () => {
  test('a single paragraph', () => {
    expect(renderBoth('Hello, world')).toBe('<p>Hello, world</p>\n');
  });

  test('a mixed document', () => {
    expect(renderBoth(longDocument)).toBe(longExpected);
  });

  test('entities are decoded then escaped', () => {
    expect(renderBoth('AT&amp;T &copy; 2024')).toBe('<p>AT&amp;T \u00A9 2024</p>\n');
  });

  test('hard breaks', () => {
    expect(renderBoth('a  \nb')).toBe('<p>a<br>\nb</p>\n');
  });

  test('ordered list start', () => {
    expect(renderBoth('3. x\n4. y\n')).toBe('<ol start="3">\n<li>x</li>\n<li>y</li>\n</ol>\n');
  });

  test('loose list items wrap paragraphs', () => {
    expect(renderBoth('- a\n\n- b\n')).toBe('<ul>\n<li><p>a</p>\n</li>\n<li><p>b</p>\n</li>\n</ul>\n');
  });

  test('fenced code with a language', () => {
    expect(renderBoth('```js title\nlet a = 1 < 2;\n```\n'))
      .toBe('<pre><code class="language-js">let a = 1 &lt; 2;\n</code></pre>\n');
  });

  test('images flatten their alt text', () => {
    expect(renderBoth('![alt *em*](a.png "T")')).toBe('<p><img src="a.png" alt="alt em" title="T"></p>\n');
  });

  test('links and code inside alt text give their text only', () => {
    expect(renderBoth('![a [l](/x "t") `c` b](i.png)')).toBe('<p><img src="i.png" alt="a l c b"></p>\n');
  });

  test('nested images flatten into the outer alt text', () => {
    expect(renderBoth('![a ![b *e*](c.png) d](o.png)')).toBe('<p><img src="o.png" alt="a b e d"></p>\n');
    expect(renderBoth('![a ![b](c.png "in") d](o.png "out")'))
      .toBe('<p><img src="o.png" alt="a b d" title="out"></p>\n');
  });

  test('entities and escapes in link attributes', () => {
    expect(renderBoth('[x](/u "a&quot;b")')).toBe('<p><a href="/u" title="a&quot;b">x</a></p>\n');
    expect(renderBoth('[x](/a\\_b)')).toBe('<p><a href="/a_b">x</a></p>\n');
  });

  test('link destinations are URL-escaped', () => {
    expect(renderBoth('[x](<a b>)')).toBe('<p><a href="a%20b">x</a></p>\n');
    expect(renderBoth('[x](a?b&amp;c)')).toBe('<p><a href="a?b&amp;c">x</a></p>\n');
  });

  test('raw HTML passes through', () => {
    expect(renderBoth('<div>\nhi\n</div>\n')).toBe('<div>\nhi\n</div>\n');
    expect(renderBoth('a <b>x</b>')).toBe('<p>a <b>x</b></p>\n');
  });
});

describe('Flags', () => {
  test('noHtml escapes tags', () => {
    expect(renderBoth('a <b>x</b>', { noHtml: true })).toBe('<p>a &lt;b&gt;x&lt;/b&gt;</p>\n');
  });

  test('tables', () => {
    expect(renderBoth('| a | b |\n|:-|-:|\n| 1 | 2 |\n', { tables: true })).toBe(
      '<table>\n<thead>\n<tr>\n<th align="left">a</th>\n<th align="right">b</th>\n</tr>\n</thead>\n' +
      '<tbody>\n<tr>\n<td align="left">1</td>\n<td align="right">2</td>\n</tr>\n</tbody>\n</table>\n'
    );
  });

  test('task lists', () => {
    expect(renderBoth('- [ ] todo\n- [x] done\n', { tasklists: true })).toBe(
      '<ul>\n' +
      '<li class="task-list-item"><input type="checkbox" class="task-list-item-checkbox" disabled>todo</li>\n' +
      '<li class="task-list-item"><input type="checkbox" class="task-list-item-checkbox" disabled checked>done</li>\n' +
      '</ul>\n'
    );
  });

  test('strikethrough', () => {
    expect(renderBoth('~~gone~~', { strikethrough: true })).toBe('<p><del>gone</del></p>\n');
  });

  test('underline', () => {
    expect(renderBoth('_a_ *b*', { underline: true })).toBe('<p><u>a</u> <em>b</em></p>\n');
  });

  test('wikilinks', () => {
    expect(renderBoth('[[Main Page|the *page*]] and [[Target]]', { wikilinks: true })).toBe(
      '<p><x-wikilink data-target="Main Page">the <em>page</em></x-wikilink> and ' +
      '<x-wikilink data-target="Target">Target</x-wikilink></p>\n'
    );
  });

  test('math spans', () => {
    expect(renderBoth('$x^2$ and $$y$$', { latexMathSpans: true }))
      .toBe('<p><x-equation>x^2</x-equation> and <x-equation type="display">y</x-equation></p>\n');
  });

  test('permissive autolinks', () => {
    expect(renderBoth('see www.example.com now', { permissiveAutolinks: true }))
      .toBe('<p>see <a href="http://www.example.com">www.example.com</a> now</p>\n');
  });

  test('collapse whitespace', () => {
    expect(renderBoth('a   b', { collapseWhitespace: true })).toBe('<p>a b</p>\n');
    expect(renderBoth('a   b')).toBe('<p>a   b</p>\n');
  });

  test('no indented code blocks', () => {
    expect(renderBoth('    code', { noIndentedCodeBlocks: true })).toBe('<p>code</p>\n');
  });
});

describe('Binary input', () => {
  test('a single paragraph', () => {
    expect(renderBothBytes(encode('Hello, world'))).toEqual(encode('<p>Hello, world</p>\n'));
  });

  test('invalid UTF-8 bytes pass through', () => {
    expect(renderBothBytes(concat('Hello, ', [0xed, 0xb2, 0x93], 'world')))
      .toEqual(concat('<p>Hello, ', [0xed, 0xb2, 0x93], 'world</p>\n'));
  });

  test('a NUL byte becomes U+FFFD', () => {
    expect(renderBothBytes(concat('Hello, ', [0x00], 'world')))
      .toEqual(concat('<p>Hello, ', [0xef, 0xbf, 0xbd], 'world</p>\n'));
  });

  test('high bytes in link text and titles', () => {
    expect(renderBothBytes(concat('[Hello, ', [0xed, 0xb2, 0x93], 'world](http://example.com/)')))
      .toEqual(concat('<p><a href="http://example.com/">Hello, ', [0xed, 0xb2, 0x93], 'world</a></p>\n'));
    expect(renderBothBytes(concat('[Hello, world](http://example.com/ "foo', [0xed, 0xb2, 0x93], 'bar")')))
      .toEqual(concat('<p><a href="http://example.com/" title="foo', [0xed, 0xb2, 0x93], 'bar">Hello, world</a></p>\n'));
  });

  test('high bytes in a destination are percent-encoded', () => {
    expect(renderBothBytes(concat('[Hello, world](http://example.com/', [0xed, 0xb2, 0x93], '/ "foo bar")')))
      .toEqual(encode('<p><a href="http://example.com/%ED%B2%93/" title="foo bar">Hello, world</a></p>\n'));
  });

  test('a mixed document', () => {
    expect(renderBothBytes(encode(longDocument))).toEqual(encode(longExpected));
  });

  test('valid UTF-8 matches the text rendering', () => {
    const markdown = 'Café *über* [é](/é)';
    expect(new TextDecoder().decode(renderBothBytes(encode(markdown)))).toBe(renderBoth(markdown));
  });
});

describe('Renderer options', () => {
  test('xhtml self-closes void elements', () => {
    const renderer = new HtmlRenderer({ xhtml: true });
    expect(renderer.parse('a  \nb\n\n***\n\n![i](x.png)'))
      .toBe('<p>a<br />\nb</p>\n<hr />\n<p><img src="x.png" alt="i" /></p>\n');
  });

  test('verbatim entities', () => {
    expect(new HtmlRenderer({ verbatimEntities: true }).parse('&copy; &#65;')).toBe('<p>&copy; &#65;</p>\n');
  });

  test('skip a UTF-8 byte order mark', () => {
    const renderer = new HtmlRenderer({ skipUtf8Bom: true });
    expect(renderer.parse(concat([0xef, 0xbb, 0xbf], '# Hi'))).toEqual(encode('<h1>Hi</h1>\n'));
    expect(renderer.parse('\uFEFF# Hi')).toBe('<h1>Hi</h1>\n');
  });
});
