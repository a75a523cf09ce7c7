export type {
  HeadingRecord,
  TocEntry,
  ParseOptions,
  WriteOptions,
  HeadingParser,
  TocWriter,
  GenerateOptions
} from './types.js';
export { TocError, UnsupportedFormatError, InvalidOptionError, UsageError } from './errors.js';
export { SlugRegistry, slugify, normalizeSlug } from './slug.js';
export { parseMarkdownHeadings, parseHtmlHeadings } from './parser.js';
export { buildToc } from './builder.js';
export { renderMarkdownToc, renderHtmlToc, escapeHtml } from './renderer.js';
export {
  registerParser,
  registerWriter,
  getParser,
  getWriter,
  listInputFormats,
  listOutputFormats
} from './formats.js';
export { generateToc, extractToc, DEFAULT_INDENT } from './generate.js';
export { inferInputFormat, readDocument, writeToc } from './loader.js';
export type { LoadedDocument } from './loader.js';
