/**
 * Link and image URL rewriting.
 */

import type { Event, HtmlExtension, Token, TokenType } from "micromark-util-types"
import { DEFAULT_URL_ROOT, type ResolvedRenderOptions } from "./types.js"

const DESTINATION_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  "resourceDestinationString",
  "definitionDestinationString",
])

const TRAILING_SLASHES = /\/+$/

/**
 * Checks for a site-absolute path (`/foo`). Protocol-relative URLs (`//host/foo`)
 * point at another host and do not count.
 */
function isSiteAbsolute(url: string): boolean {
  return url.startsWith("/") && !url.startsWith("//")
}

/**
 * Rewrites a single URL.
 *
 * An explicit rule for the exact URL wins. Otherwise site-absolute paths are
 * moved under `urlRoot`, which may be a path (`/docs`) or an absolute URL
 * (`https://example.com/docs`). Everything else is returned unchanged.
 *
 * @param url - URL as written in the document
 * @param options - Resolved render options
 * @returns Rewritten URL
 */
export function rewriteUrl(url: string, options: ResolvedRenderOptions): string {
  const rule = options.linkRewriteRules.get(url)
  if (rule !== undefined) {
    return rule
  }

  if (isSiteAbsolute(url) && options.urlRoot !== DEFAULT_URL_ROOT) {
    return `${options.urlRoot.replace(TRAILING_SLASHES, "")}/${url.slice(1)}`
  }

  return url
}

/**
 * Rewrites the destinations of links, images and link reference definitions.
 *
 * `mark` tags every destination in the event stream; `htmlExtension` swaps the
 * destination micromark has collected for its rewritten form, just before
 * micromark stores it. Autolinks are left alone.
 */
export class LinkRewriter {
  private readonly options: ResolvedRenderOptions
  private count = 0

  constructor(options: ResolvedRenderOptions) {
    this.options = options
  }

  /**
   * Number of destinations that changed so far.
   */
  get rewritten(): number {
    return this.count
  }

  /**
   * Inserts a rewrite marker before the end of every destination.
   *
   * @param events - Events from `parseEvents`
   * @returns New event list with markers
   */
  mark(events: readonly Event[]): Event[] {
    const result: Event[] = []

    for (const event of events) {
      const [kind, token, context] = event
      if (kind === "exit" && DESTINATION_TYPES.has(token.type)) {
        const marker: Token = { type: "linkDestinationRewrite", start: token.end, end: token.end }
        result.push(["enter", marker, context], ["exit", marker, context])
      }
      result.push(event)
    }

    return result
  }

  /**
   * Compile handlers for the markers made by `mark`.
   */
  htmlExtension(): HtmlExtension {
    const rewriter = this

    return {
      exit: {
        linkDestinationRewrite() {
          // The destination is still buffered; replace the buffer's contents.
          const url = this.resume()
          const rewritten = rewriteUrl(url, rewriter.options)
          if (rewritten !== url) {
            rewriter.count++
          }
          this.buffer()
          this.raw(rewritten)
        },
      },
    }
  }
}

/**
 * Parses `from=to` pairs, as given on the command line, into a rule map.
 *
 * @param pairs - Raw option values
 * @returns Rewrite rules keyed by source URL
 * @throws {Error} If a pair has no `=` or an empty source
 */
export function parseRewriteRules(pairs: readonly string[]): Record<string, string> {
  const rules: Record<string, string> = {}

  for (const pair of pairs) {
    const separator = pair.indexOf("=")
    if (separator <= 0) {
      throw new Error(`Invalid rewrite rule "${pair}", expected <from>=<to>`)
    }
    rules[pair.slice(0, separator)] = pair.slice(separator + 1)
  }

  return rules
}
