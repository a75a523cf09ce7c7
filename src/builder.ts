import { HeadingRecord, TocEntry } from './types.js';
import { SlugRegistry, slugify } from './slug.js';

/**
 * Turn a flat list of headings into ToC entries.
 *
 * Depth is measured from the shallowest heading in the document, so a file
 * that starts at h2 still produces a top level at depth 0. Level jumps of
 * more than one (h2 straight to h4) are kept as-is rather than repaired.
 */
export function buildToc(records: HeadingRecord[]): TocEntry[] {
  if (records.length === 0) {
    return [];
  }

  const minLevel = records.reduce((min, record) => Math.min(min, record.level), Infinity);
  const used = new SlugRegistry();

  return records.map(record => ({
    depth: record.level - minLevel,
    text: record.text,
    anchor: slugify(record.slugText ?? record.text, record.explicitAnchor, used)
  }));
}
