import { GenerateOptions, TocEntry } from './types.js';
import { InvalidOptionError } from './errors.js';
import { getParser, getWriter } from './formats.js';
import { buildToc } from './builder.js';

export const DEFAULT_INDENT = 4;

/**
 * Parse a document and build its entries without rendering them
 */
export function extractToc(content: string, options: Pick<GenerateOptions, 'inputFormat' | 'customAnchors'>): TocEntry[] {
  const parse = getParser(options.inputFormat);
  return buildToc(parse(content, { customAnchors: options.customAnchors ?? false }));
}

/**
 * Run the whole pipeline: parse headings, build entries, render.
 *
 * Both formats and the indent are checked before anything is parsed, so an
 * unsupported selection fails without touching the document.
 */
export function generateToc(content: string, options: GenerateOptions): string {
  const parse = getParser(options.inputFormat);
  const write = getWriter(options.outputFormat);
  const indent = options.indent ?? DEFAULT_INDENT;

  if (!Number.isInteger(indent) || indent < 0) {
    throw new InvalidOptionError(`Indent must be a non-negative integer, got ${indent}`);
  }

  const records = parse(content, { customAnchors: options.customAnchors ?? false });
  const entries = buildToc(records);
  return write(entries, { indent, title: options.title });
}
