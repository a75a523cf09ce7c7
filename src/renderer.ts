import { TocEntry, WriteOptions } from './types.js';

// Brackets not already escaped would close the link text early
const LINK_TEXT_SPECIALS = /(?<!\\)([[\]])/g;

// Characters that would end or split a Markdown link target
const LINK_TARGET_SPECIALS = /[()\s]/g;

// An ampersand that does not already start a character reference
const HTML_TEXT_SPECIALS = /&(?!#\d{1,7};|#[xX][0-9a-fA-F]{1,6};|[a-zA-Z][a-zA-Z0-9]*;)|[<>]/g;
const HTML_ATTRIBUTE_SPECIALS = /[&<>"]/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;'
};

/**
 * Escape text for use as HTML element content. Character references already
 * in the text (Markdown source may carry them) are left intact.
 */
export function escapeHtml(text: string): string {
  return text.replace(HTML_TEXT_SPECIALS, ch => HTML_ESCAPES[ch]);
}

/**
 * Escape text for use inside a double-quoted HTML attribute
 */
export function escapeHtmlAttribute(text: string): string {
  return text.replace(HTML_ATTRIBUTE_SPECIALS, ch => HTML_ESCAPES[ch]);
}

function encodeLinkTarget(anchor: string): string {
  return anchor.replace(LINK_TARGET_SPECIALS, ch =>
    '%' + ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0'));
}

function padding(indent: number, level: number): string {
  return ' '.repeat(indent * level);
}

/**
 * Render entries as a Markdown bullet list of links.
 *
 *     * [Usage](#usage)
 *         * [Command Line](#command-line)
 */
export function renderMarkdownToc(entries: TocEntry[], options: WriteOptions): string {
  const lines: string[] = [];

  if (options.title) {
    lines.push(`## ${options.title}`, '');
  }

  for (const entry of entries) {
    const text = entry.text.replace(LINK_TEXT_SPECIALS, '\\$1');
    lines.push(`${padding(options.indent, entry.depth)}* [${text}](#${encodeLinkTarget(entry.anchor)})`);
  }

  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

/**
 * Render entries as nested HTML unordered lists.
 *
 * A deeper entry opens one <ul> per level it descends; the nested list sits
 * beside the preceding <li> rather than inside it. An empty entry list still
 * yields the outer <ul> wrapper.
 */
export function renderHtmlToc(entries: TocEntry[], options: WriteOptions): string {
  const lines: string[] = [];

  if (options.title) {
    lines.push(`<h2>${escapeHtml(options.title)}</h2>`);
  }
  lines.push('<ul>');

  let open = 0;
  for (const entry of entries) {
    while (open < entry.depth) {
      open++;
      lines.push(`${padding(options.indent, open)}<ul>`);
    }
    while (open > entry.depth) {
      lines.push(`${padding(options.indent, open)}</ul>`);
      open--;
    }
    const href = escapeHtmlAttribute(`#${entry.anchor}`);
    lines.push(`${padding(options.indent, open + 1)}<li><a href="${href}">${escapeHtml(entry.text)}</a></li>`);
  }
  while (open > 0) {
    lines.push(`${padding(options.indent, open)}</ul>`);
    open--;
  }

  lines.push('</ul>');
  return lines.join('\n') + '\n';
}
