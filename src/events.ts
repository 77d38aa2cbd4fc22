/**
 * Micromark event stream: parsing markdown into enter/exit token events and
 * compiling (possibly rewritten) events to HTML.
 */

import { compile, parse, postprocess, preprocess } from "micromark"
import { gfm, gfmHtml } from "micromark-extension-gfm"
import type { Event, HtmlExtension } from "micromark-util-types"

declare module "micromark-util-types" {
  interface TokenTypeMap {
    linkDestinationRewrite: "linkDestinationRewrite"
    mermaidDiagram: "mermaidDiagram"
  }
}

/**
 * Tokenizes markdown with GFM into a flat list of nested enter/exit events.
 *
 * @param documentText - Markdown source
 * @returns Postprocessed events, ready for `compileHtml`
 */
export function parseEvents(documentText: string): Event[] {
  const chunks = preprocess()(documentText, undefined, true)
  return postprocess(parse({ extensions: [gfm()] }).document().write(chunks))
}

/**
 * Compiles events to HTML. Raw HTML in the source passes through.
 *
 * @param events - Events from `parseEvents`, possibly rewritten
 * @param htmlExtensions - Extra handlers, applied after GFM's
 * @returns HTML fragment
 */
export function compileHtml(events: Event[], htmlExtensions: HtmlExtension[] = []): string {
  return compile({
    allowDangerousHtml: true,
    htmlExtensions: [gfmHtml(), ...htmlExtensions],
  })(events)
}

/**
 * Finds the exit event that closes the enter event at `index`.
 *
 * @returns Index of the matching exit, or -1 when the stream is unbalanced
 */
export function findExit(events: readonly Event[], index: number): number {
  const token = events[index][1]

  for (let cursor = index + 1; cursor < events.length; cursor++) {
    if (events[cursor][0] === "exit" && events[cursor][1] === token) {
      return cursor
    }
  }

  return -1
}
