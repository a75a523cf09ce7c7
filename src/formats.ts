import { HeadingParser, TocWriter } from './types.js';
import { UnsupportedFormatError } from './errors.js';
import { parseHtmlHeadings, parseMarkdownHeadings } from './parser.js';
import { renderHtmlToc, renderMarkdownToc } from './renderer.js';

const parsers = new Map<string, HeadingParser>();
const writers = new Map<string, TocWriter>();

/**
 * Make an input format available. Registering an existing name replaces it.
 */
export function registerParser(format: string, parser: HeadingParser): void {
  parsers.set(format.toLowerCase(), parser);
}

/**
 * Make an output format available. Registering an existing name replaces it.
 */
export function registerWriter(format: string, writer: TocWriter): void {
  writers.set(format.toLowerCase(), writer);
}

export function listInputFormats(): string[] {
  return Array.from(parsers.keys());
}

export function listOutputFormats(): string[] {
  return Array.from(writers.keys());
}

export function getParser(format: string): HeadingParser {
  const parser = parsers.get(format.toLowerCase());
  if (!parser) {
    throw new UnsupportedFormatError(format, listInputFormats());
  }
  return parser;
}

export function getWriter(format: string): TocWriter {
  const writer = writers.get(format.toLowerCase());
  if (!writer) {
    throw new UnsupportedFormatError(format, listOutputFormats());
  }
  return writer;
}

registerParser('markdown', parseMarkdownHeadings);
registerParser('html', parseHtmlHeadings);
registerWriter('markdown', renderMarkdownToc);
registerWriter('html', renderHtmlToc);
