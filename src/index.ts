/**
 * doctave-markdown - Markdown to HTML rendering
 *
 * Renders markdown to an HTML fragment, assigns unique ids to headings and
 * returns them as an outline, and turns ```mermaid fences into diagram
 * containers for client-side rendering.
 */

export { MarkdownConverter, parseMarkdown, render } from "./converter.js"
export type { ConversionResult } from "./converter.js"
export { compileHtml, parseEvents } from "./events.js"
export { annotateHeadings, FOOTNOTE_LABEL_ID, headingIdHtml } from "./headings.js"
export { LinkRewriter, parseRewriteRules, rewriteUrl } from "./links.js"
export { logger } from "./logger.js"
export { MERMAID_CLASS_NAME, MERMAID_LANGUAGE, MermaidRewriter } from "./mermaid.js"
export { FALLBACK_SLUG, normalizeSlug, SlugRegistry } from "./slug.js"
export { DEFAULT_URL_ROOT, resolveRenderOptions } from "./types.js"
export type {
  HeadingLevel,
  OutlineEntry,
  RenderOptions,
  RenderResult,
  ResolvedRenderOptions,
} from "./types.js"
