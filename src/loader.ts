import * as fs from 'node:fs';
import * as path from 'node:path';
import { UnsupportedFormatError } from './errors.js';

/**
 * File extensions recognized for each input format
 */
const EXTENSION_FORMATS: Record<string, string> = {
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.rmd': 'markdown',
  '.html': 'html',
  '.htm': 'html',
  '.xhtml': 'html'
};

/**
 * A document read from disk, ready for the pipeline
 */
export interface LoadedDocument {
  /** Path the document was read from */
  filePath: string;
  /** Input format inferred from the extension */
  inputFormat: string;
  /** Raw document text */
  content: string;
}

/**
 * Infer the input format from a file name (case-insensitive)
 */
export function inferInputFormat(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  const format = EXTENSION_FORMATS[ext];
  if (!format) {
    throw new UnsupportedFormatError(ext || path.basename(filePath), Object.keys(EXTENSION_FORMATS));
  }
  return format;
}

/**
 * Read a document, inferring its format before touching the file
 */
export function readDocument(filePath: string): LoadedDocument {
  const inputFormat = inferInputFormat(filePath);
  const content = fs.readFileSync(filePath, 'utf-8');
  return { filePath, inputFormat, content };
}

/**
 * Write a rendered ToC to a file, or to stdout when no file is given
 */
export function writeToc(output: string, outfile?: string): void {
  const text = output.endsWith('\n') ? output : output + '\n';
  if (outfile) {
    fs.writeFileSync(outfile, text, 'utf-8');
  } else {
    process.stdout.write(text);
  }
}
