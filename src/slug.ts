/**
 * Heading slug generation.
 *
 * Slugs are ASCII-only: letters, digits and hyphens. Collisions within one
 * document are resolved by a per-render `SlugRegistry`.
 */

import GithubSlugger from "github-slugger"

/**
 * Slug used when heading text has no letters or digits left after normalizing.
 */
export const FALLBACK_SLUG = "section"

const DISALLOWED_CHARACTERS = /[^A-Za-z0-9\s-]/g
const WHITESPACE_RUN = /\s+/g

/**
 * Normalizes heading text into a slug candidate.
 *
 * @param text - Plain heading text
 * @returns Lowercase slug made of `[a-z0-9-]`, or `FALLBACK_SLUG`
 */
export function normalizeSlug(text: string): string {
  const slug = text
    .replace(DISALLOWED_CHARACTERS, "")
    .trim()
    .replace(WHITESPACE_RUN, "-")
    .toLowerCase()

  return slug || FALLBACK_SLUG
}

/**
 * Hands out unique slugs for one document.
 *
 * A new candidate is returned as is. A repeated one gets the next counter
 * suffix (`intro`, `intro-1`, `intro-2`). Suffixed slugs are registered too,
 * so a later heading literally titled "Intro 1" becomes `intro-1-1`.
 *
 * Create one registry per render; never share one between documents.
 */
export class SlugRegistry {
  // github-slugger keeps an occurrence counter per slug and leaves
  // `[a-z0-9-]` input untouched, so it only does the disambiguation here.
  private readonly slugger = new GithubSlugger()

  /**
   * Returns the next unique slug for the given heading text.
   *
   * @param text - Plain heading text
   * @returns Slug not returned before by this registry
   */
  slug(text: string): string {
    return this.slugger.slug(normalizeSlug(text))
  }

  /**
   * Claims an id the page already uses outside of headings, so no heading
   * slug can take it.
   *
   * @param id - Id to claim
   */
  reserve(id: string): void {
    this.slugger.slug(id)
  }
}
