import { decodeHTML } from 'entities';
import { Lexer, type Token, type Tokens } from 'marked';
import { HeadingRecord, ParseOptions } from './types.js';

/**
 * Regex patterns for recognizing headings
 */

// Comments are dropped before scanning so commented-out headings stay hidden
const HTML_COMMENT_PATTERN = /<!--[\s\S]*?-->/g;

// ATX heading as it appears in a token's raw source: up to three spaces,
// 1-6 hashes, then whitespace or end of input. Setext headings fail this.
const ATX_RAW_PATTERN = /^ {0,3}#{1,6}(?=\s|$)/;

// Trailing anchor marker: "Introduction {#intro}"
// Group 1: heading text
// Group 2: the anchor (no parentheses, which would end a Markdown link target)
const CUSTOM_ANCHOR_PATTERN = /^(.*?)\s*\{#([^\s{}()]+)\}$/;

// Raw-text elements whose contents never hold real headings
const RAW_TEXT_PATTERN = /<(script|style|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;

// Heading element
// Group 1: level numeral
// Group 2: attributes (with leading whitespace), if any
// Group 3: inner HTML
const HTML_HEADING_PATTERN = /<h([1-6])(\s[^>]*)?>([\s\S]*?)<\/h\1\s*>/gi;

const ID_ATTRIBUTE_PATTERN = /(?:^|\s)id\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/i;

const TAG_PATTERN = /<[^>]*>/g;

function isAtxHeading(token: Token): token is Tokens.Heading {
  return token.type === 'heading' && ATX_RAW_PATTERN.test(token.raw);
}

/**
 * Split a "{#anchor}" marker off the end of a heading, if there is one
 */
function splitCustomAnchor(text: string): { text: string; anchor?: string } {
  const match = text.match(CUSTOM_ANCHOR_PATTERN);
  if (!match) return { text };
  return { text: match[1], anchor: match[2] };
}

/**
 * Plain text of inline tokens, as a renderer would show it: link targets,
 * emphasis markers and tags are gone, escapes and entities are decoded.
 */
function inlinePlainText(tokens: Token[]): string {
  let text = '';
  for (const token of tokens) {
    if (token.type === 'html') continue;
    if (token.type === 'br') {
      text += ' ';
    } else if (token.type === 'link' || token.type === 'strong' || token.type === 'em' || token.type === 'del') {
      text += inlinePlainText(token.tokens ?? []);
    } else if ('text' in token && typeof token.text === 'string') {
      text += decodeHTML(token.text);
    }
  }
  return text;
}

/**
 * Extract ATX headings from a Markdown document.
 *
 * The text is kept as written; when its rendered form differs (links,
 * emphasis, entities) that form is recorded as slugText for the anchor.
 *
 * The marked lexer does the block-level work, so lines inside fenced or
 * indented code, HTML blocks and nested containers (lists, quotes) are never
 * mistaken for headings. Only top-level headings are reported.
 */
export function parseMarkdownHeadings(content: string, options: ParseOptions): HeadingRecord[] {
  const source = content.replace(HTML_COMMENT_PATTERN, '');
  const tokens = Lexer.lex(source, { gfm: true });
  const headings: HeadingRecord[] = [];

  for (const token of tokens) {
    if (!isAtxHeading(token)) continue;

    const { text, anchor } = options.customAnchors
      ? splitCustomAnchor(token.text)
      : { text: token.text, anchor: undefined };

    if (!text) continue;

    const record: HeadingRecord = { level: token.depth, text };
    if (anchor !== undefined) {
      record.explicitAnchor = anchor;
    } else {
      const slugText = inlinePlainText(token.tokens).replace(/\s+/g, ' ').trim();
      if (slugText !== text) {
        record.slugText = slugText;
      }
    }
    headings.push(record);
  }

  return headings;
}

function readIdAttribute(attributes: string | undefined): string | undefined {
  if (!attributes) return undefined;
  const match = attributes.match(ID_ATTRIBUTE_PATTERN);
  if (!match) return undefined;
  const value = decodeHTML(match[1] ?? match[2] ?? match[3] ?? '').trim();
  return value || undefined;
}

/**
 * Extract h1-h6 elements from an HTML document.
 *
 * Text content is the element's markup with tags removed. An id already on
 * the heading is what the page links to, so it is kept as the anchor.
 * There is no marker syntax for HTML; customAnchors has no effect here.
 */
export function parseHtmlHeadings(content: string, _options: ParseOptions): HeadingRecord[] {
  const source = content
    .replace(HTML_COMMENT_PATTERN, '')
    .replace(RAW_TEXT_PATTERN, '');
  const headings: HeadingRecord[] = [];

  for (const match of source.matchAll(HTML_HEADING_PATTERN)) {
    const level = parseInt(match[1], 10);
    const text = decodeHTML(match[3].replace(TAG_PATTERN, ''))
      .replace(/\s+/g, ' ')
      .trim();

    if (!text) continue;

    const record: HeadingRecord = { level, text };
    const id = readIdAttribute(match[2]);
    if (id !== undefined) {
      record.explicitAnchor = id;
    }
    headings.push(record);
  }

  return headings;
}
