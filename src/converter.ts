/**
 * Markdown to HTML converter module.
 * Renders markdown to an HTML fragment, with heading ids, a heading outline and
 * Mermaid diagram containers. Parsing and serialization both use micromark with
 * GFM; the outline text comes from the mdast tree of the same document.
 */

import { readFile, writeFile } from "node:fs/promises"
import type { Root } from "mdast"
import { fromMarkdown } from "mdast-util-from-markdown"
import { gfmFromMarkdown } from "mdast-util-gfm"
import { gfm } from "micromark-extension-gfm"
import { compileHtml, parseEvents } from "./events.js"
import { annotateHeadings, headingIdHtml } from "./headings.js"
import { LinkRewriter } from "./links.js"
import { logger } from "./logger.js"
import { MermaidRewriter } from "./mermaid.js"
import { SlugRegistry } from "./slug.js"
import {
  type OutlineEntry,
  type RenderOptions,
  type RenderResult,
  resolveRenderOptions,
} from "./types.js"

/**
 * Parses markdown into an mdast tree with GFM (tables, strikethrough, task lists,
 * autolinks, footnotes).
 *
 * @param documentText - Markdown source
 * @returns Syntax tree
 */
export function parseMarkdown(documentText: string): Root {
  return fromMarkdown(documentText, {
    extensions: [gfm()],
    mdastExtensions: [gfmFromMarkdown()],
  })
}

/**
 * Renders markdown to an HTML fragment plus its heading outline.
 *
 * Every call gets its own slug registry, so output depends only on the input and
 * options. Without headings, Mermaid blocks or rewritten links the HTML is what
 * micromark produces for the same document with GFM.
 *
 * @param documentText - Markdown source
 * @param options - Link rewriting options
 * @returns Rendered HTML and outline
 */
export function render(documentText: string, options: RenderOptions = {}): RenderResult {
  const resolved = resolveRenderOptions(options)

  const outline = annotateHeadings(parseMarkdown(documentText), new SlugRegistry())
  const mermaid = new MermaidRewriter()
  const links = new LinkRewriter(resolved)

  const events = links.mark(mermaid.rewrite(parseEvents(documentText)))
  const html = compileHtml(events, [
    headingIdHtml(outline),
    mermaid.htmlExtension(),
    links.htmlExtension(),
  ])

  logger.debug(
    { headings: outline.length, diagrams: mermaid.diagrams, rewrittenLinks: links.rewritten },
    "Rendered markdown document",
  )

  return { html, outline }
}

/**
 * Result of converting a markdown file.
 */
export interface ConversionResult {
  output: string
  outline: readonly OutlineEntry[]
}

/**
 * Converts markdown files to HTML fragment files.
 */
export class MarkdownConverter {
  private readonly options: RenderOptions

  constructor(options: RenderOptions = {}) {
    this.options = options
  }

  /**
   * Converts a markdown file to HTML.
   *
   * @param markdownFile - Input markdown file path
   * @param outputFile - Output HTML file path (defaults to input with .html extension)
   * @param outlineFile - Optional path for the outline as JSON
   * @returns Path to generated HTML file and the outline
   * @throws {Error} If file operations fail
   */
  async convert(
    markdownFile: string,
    outputFile?: string,
    outlineFile?: string,
  ): Promise<ConversionResult> {
    const markdownContent = await readFile(markdownFile, "utf-8")
    const { html, outline } = render(markdownContent, this.options)

    // Determine output path
    const output = outputFile ?? markdownFile.replace(/\.md$/i, ".html")
    if (output === markdownFile) {
      throw new Error(`Refusing to overwrite input file: ${markdownFile}`)
    }
    await writeFile(output, html, "utf-8")

    if (outlineFile) {
      await writeFile(outlineFile, `${JSON.stringify(outline, null, 2)}\n`, "utf-8")
      logger.debug({ outlineFile, headings: outline.length }, "Wrote document outline")
    }

    logger.info(
      { input: markdownFile, output, headings: outline.length },
      "Successfully converted markdown to HTML",
    )

    return { output, outline }
  }
}
