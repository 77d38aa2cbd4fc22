/**
 * Heading annotation: assigns every heading an id and collects the outline.
 */

import type { Root } from "mdast"
import { toString as mdastToString } from "mdast-util-to-string"
import type { CompileContext, HtmlExtension } from "micromark-util-types"
import { EXIT, visit } from "unist-util-visit"
import type { SlugRegistry } from "./slug.js"
import type { OutlineEntry } from "./types.js"

/**
 * Id of the label heading in the generated GFM footnote section.
 */
export const FOOTNOTE_LABEL_ID = "footnote-label"

function callsFootnotes(tree: Root): boolean {
  let found = false
  visit(tree, "footnoteReference", () => {
    found = true
    return EXIT
  })
  return found
}

/**
 * Assigns an id to each heading in the tree and returns the outline.
 *
 * The walk is a full pre-order traversal, so headings inside block quotes,
 * list items and footnote definitions are found too. Headings written as raw
 * HTML are not heading nodes and are left alone. When the document calls a
 * footnote, the footnote section's own label id is claimed first.
 *
 * @param tree - Parsed document
 * @param registry - Slug registry owned by the current render
 * @returns One entry per heading, in document order
 */
export function annotateHeadings(tree: Root, registry: SlugRegistry): OutlineEntry[] {
  const outline: OutlineEntry[] = []

  if (callsFootnotes(tree)) {
    registry.reserve(FOOTNOTE_LABEL_ID)
  }

  visit(tree, "heading", (node) => {
    const text = mdastToString(node, { includeHtml: false })
    const id = registry.slug(text)

    outline.push({ level: node.depth, text, id })
  })

  return outline
}

function openingTag(context: CompileContext, rank: number, id: string | undefined): void {
  context.lineEndingIfNeeded()
  context.tag(id === undefined ? `<h${rank}>` : `<h${rank} id="${context.encode(id)}">`)
}

/**
 * Compile handlers that write the outline ids onto heading elements.
 *
 * Ids are handed out in the order heading elements open, which is document
 * order, the same order `annotateHeadings` walks. Both handlers otherwise
 * behave like micromark's own.
 *
 * @param outline - Outline of the document being compiled
 */
export function headingIdHtml(outline: readonly OutlineEntry[]): HtmlExtension {
  let next = 0
  const takeId = () => outline[next++]?.id

  return {
    exit: {
      atxHeadingSequence(token) {
        // The closing sequence of `## Title ##` also exits here.
        if (this.getData("headingRank")) {
          return
        }
        const rank = this.sliceSerialize(token).length
        this.setData("headingRank", rank)
        openingTag(this, rank, takeId())
      },
      setextHeading() {
        const content = this.resume()
        const rank = this.getData("headingRank") ?? 1
        openingTag(this, rank, takeId())
        this.raw(content)
        this.tag(`</h${rank}>`)
        this.setData("slurpAllLineEndings")
        this.setData("headingRank")
      },
    },
  }
}
