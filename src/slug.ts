import { slug } from 'github-slugger';

/** Used when a heading has no characters that survive normalization */
export const FALLBACK_SLUG = 'section';

/**
 * Tracks the anchors handed out during one ToC build.
 *
 * Collisions follow the GitHub convention: the first occurrence keeps the
 * bare slug, later ones get `-1`, `-2`, ... appended. A suffixed candidate
 * that is already taken (say a literal "Issues 1" heading) keeps counting.
 */
export class SlugRegistry {
  private readonly occurrences = new Map<string, number>();

  claim(base: string): string {
    let candidate = base;
    while (this.occurrences.has(candidate)) {
      const count = (this.occurrences.get(base) ?? 0) + 1;
      this.occurrences.set(base, count);
      candidate = `${base}-${count}`;
    }
    this.occurrences.set(candidate, 0);
    return candidate;
  }

  has(anchor: string): boolean {
    return this.occurrences.has(anchor);
  }

  get size(): number {
    return this.occurrences.size;
  }
}

/**
 * Normalize heading text the way GitHub-style renderers build heading ids,
 * with whitespace runs collapsed and stray separators trimmed.
 */
export function normalizeSlug(text: string): string {
  const normalized = text
    .split(/\s+/)
    .map(word => slug(word))
    .filter(word => word.length > 0)
    .join('-')
    .replace(/^-+|-+$/g, '');
  return normalized || FALLBACK_SLUG;
}

/**
 * Derive the anchor for a heading and register it.
 * An explicit anchor is kept verbatim but still made unique.
 */
export function slugify(text: string, explicit: string | undefined, used: SlugRegistry): string {
  const base = explicit !== undefined && explicit.length > 0 ? explicit : normalizeSlug(text);
  return used.claim(base);
}
