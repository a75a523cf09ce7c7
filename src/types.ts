/**
 * A heading found in a source document.
 */
export interface HeadingRecord {
  /** Heading level as written in the source (1-6) */
  level: number;

  /** Heading text, with any anchor marker removed */
  text: string;

  /** Anchor given by the document itself ({#id} marker or id attribute) */
  explicitAnchor?: string;

  /** Rendered plain text to derive the anchor from, when it differs from text */
  slugText?: string;
}

/**
 * One line of a table of contents.
 */
export interface TocEntry {
  /** Nesting depth relative to the shallowest heading (0-based) */
  depth: number;

  /** Heading text */
  text: string;

  /** Fragment identifier, without the leading # */
  anchor: string;
}

/**
 * Options passed to every heading parser.
 */
export interface ParseOptions {
  /** Recognize trailing {#anchor} markers on Markdown headings */
  customAnchors: boolean;
}

/**
 * Options passed to every ToC writer.
 */
export interface WriteOptions {
  /** Spaces per nesting level */
  indent: number;

  /** Optional heading printed above the list */
  title?: string;
}

export type HeadingParser = (content: string, options: ParseOptions) => HeadingRecord[];

export type TocWriter = (entries: TocEntry[], options: WriteOptions) => string;

/**
 * Everything a single generation run needs besides the document text.
 */
export interface GenerateOptions {
  inputFormat: string;
  outputFormat: string;
  indent?: number;
  customAnchors?: boolean;
  title?: string;
}
