import * as test from 'node:test';
import * as assert from 'node:assert';
import { escapeHtml, renderHtmlToc, renderMarkdownToc } from '../renderer.js';
import { TocEntry } from '../types.js';

const { describe, it } = test;

const readmeEntries: TocEntry[] = [
  { depth: 0, text: 'Description', anchor: 'description' },
  { depth: 1, text: 'Usage', anchor: 'usage' },
  { depth: 1, text: 'Examples', anchor: 'examples' },
  { depth: 2, text: 'Command Line', anchor: 'command-line' }
];

describe('renderMarkdownToc', () => {

  it('should render an indented bullet list of links', () => {
    const output = renderMarkdownToc(readmeEntries, { indent: 4 });
    assert.strictEqual(output, [
      '* [Description](#description)',
      '    * [Usage](#usage)',
      '    * [Examples](#examples)',
      '        * [Command Line](#command-line)',
      ''
    ].join('\n'));
  });

  it('should honor the indent width', () => {
    const output = renderMarkdownToc(readmeEntries.slice(0, 2), { indent: 2 });
    assert.strictEqual(output, '* [Description](#description)\n  * [Usage](#usage)\n');
  });

  it('should not indent at all with width 0', () => {
    const output = renderMarkdownToc(readmeEntries.slice(0, 2), { indent: 0 });
    assert.strictEqual(output, '* [Description](#description)\n* [Usage](#usage)\n');
  });

  it('should print a title above the list', () => {
    const output = renderMarkdownToc([{ depth: 0, text: 'A', anchor: 'a' }], { indent: 4, title: 'Table of Contents' });
    assert.strictEqual(output, '## Table of Contents\n\n* [A](#a)\n');
  });

  it('should escape brackets in link text', () => {
    const output = renderMarkdownToc([{ depth: 0, text: '[WIP] Draft', anchor: 'wip-draft' }], { indent: 4 });
    assert.strictEqual(output, '* [\\[WIP\\] Draft](#wip-draft)\n');
  });

  it('should percent-encode parentheses and spaces in anchors', () => {
    const output = renderMarkdownToc([{ depth: 0, text: 'a) b', anchor: 'x)y (z' }], { indent: 4 });
    assert.strictEqual(output, '* [a) b](#x%29y%20%28z)\n');
  });

  it('should keep other text verbatim', () => {
    const output = renderMarkdownToc([{ depth: 0, text: 'Fish & <Chips> `code`', anchor: 'fish' }], { indent: 4 });
    assert.strictEqual(output, '* [Fish & <Chips> `code`](#fish)\n');
  });

  it('should render nothing for no entries', () => {
    assert.strictEqual(renderMarkdownToc([], { indent: 4 }), '');
  });
});

describe('renderHtmlToc', () => {

  it('should nest lists by depth', () => {
    const entries: TocEntry[] = [
      { depth: 0, text: 'A', anchor: 'a' },
      { depth: 1, text: 'B', anchor: 'b' },
      { depth: 1, text: 'C', anchor: 'c' },
      { depth: 2, text: 'D', anchor: 'd' },
      { depth: 0, text: 'E', anchor: 'e' }
    ];
    assert.strictEqual(renderHtmlToc(entries, { indent: 2 }), [
      '<ul>',
      '  <li><a href="#a">A</a></li>',
      '  <ul>',
      '    <li><a href="#b">B</a></li>',
      '    <li><a href="#c">C</a></li>',
      '    <ul>',
      '      <li><a href="#d">D</a></li>',
      '    </ul>',
      '  </ul>',
      '  <li><a href="#e">E</a></li>',
      '</ul>',
      ''
    ].join('\n'));
  });

  it('should open one list per level on a jump', () => {
    const entries: TocEntry[] = [
      { depth: 0, text: 'A', anchor: 'a' },
      { depth: 2, text: 'B', anchor: 'b' }
    ];
    assert.strictEqual(renderHtmlToc(entries, { indent: 2 }), [
      '<ul>',
      '  <li><a href="#a">A</a></li>',
      '  <ul>',
      '    <ul>',
      '      <li><a href="#b">B</a></li>',
      '    </ul>',
      '  </ul>',
      '</ul>',
      ''
    ].join('\n'));
  });

  it('should escape heading text and anchors', () => {
    const output = renderHtmlToc([{ depth: 0, text: 'Fish & <Chips>', anchor: 'a"b' }], { indent: 4 });
    assert.strictEqual(output, '<ul>\n    <li><a href="#a&quot;b">Fish &amp; &lt;Chips&gt;</a></li>\n</ul>\n');
  });

  it('should print a title above the list', () => {
    const output = renderHtmlToc([], { indent: 4, title: 'Contents & Index' });
    assert.strictEqual(output, '<h2>Contents &amp; Index</h2>\n<ul>\n</ul>\n');
  });

  it('should render an empty wrapper for no entries', () => {
    assert.strictEqual(renderHtmlToc([], { indent: 4 }), '<ul>\n</ul>\n');
  });
});

describe('escapeHtml', () => {

  it('should escape only markup characters in text', () => {
    assert.strictEqual(escapeHtml(`<a & "b">`), '&lt;a &amp; "b"&gt;');
  });

  it('should not escape existing character references again', () => {
    assert.strictEqual(escapeHtml('A &amp; B &#169; &x; &'), 'A &amp; B &#169; &x; &amp;');
  });
});
