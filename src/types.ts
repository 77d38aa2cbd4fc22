/**
 * Public types shared by the render pipeline, the converter and the CLI.
 */

/**
 * Heading depth, from `#` (1) to `######` (6).
 */
export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6

/**
 * One heading of a rendered document.
 *
 * `id` is also the `id` attribute of the matching heading element in the HTML,
 * so `#${id}` links resolve to it.
 */
export type OutlineEntry = Readonly<{
  level: HeadingLevel
  text: string
  id: string
}>

/**
 * Output of a single render call.
 */
export interface RenderResult {
  html: string
  outline: readonly OutlineEntry[]
}

/**
 * Options accepted by `render`.
 */
export interface RenderOptions {
  /**
   * Root path prepended to site-absolute link and image URLs, e.g. `/docs/v2`.
   * Defaults to `/`, which leaves those URLs as they are.
   */
  urlRoot?: string
  /**
   * Exact URL replacements. A matching rule wins over `urlRoot`.
   */
  linkRewriteRules?: Readonly<Record<string, string>>
}

/**
 * Render options with every default filled in.
 */
export interface ResolvedRenderOptions {
  urlRoot: string
  linkRewriteRules: ReadonlyMap<string, string>
}

export const DEFAULT_URL_ROOT = "/"

/**
 * Fills in defaults for missing render options.
 *
 * @param options - Caller-supplied options
 * @returns Options with defaults applied
 */
export function resolveRenderOptions(options: RenderOptions = {}): ResolvedRenderOptions {
  return {
    urlRoot: options.urlRoot || DEFAULT_URL_ROOT,
    linkRewriteRules: new Map(Object.entries(options.linkRewriteRules ?? {})),
  }
}
