import { describe, expect, it } from "vitest"
import { parseMarkdown } from "../../src/converter.js"
import { compileHtml, parseEvents } from "../../src/events.js"
import { annotateHeadings, headingIdHtml } from "../../src/headings.js"
import { SlugRegistry } from "../../src/slug.js"

function annotate(markdown: string) {
  const tree = parseMarkdown(markdown)
  const outline = annotateHeadings(tree, new SlugRegistry())
  return { tree, outline }
}

describe("annotateHeadings", () => {
  it("records one entry per heading in document order", () => {
    const { outline } = annotate("# My heading\n\nSome content\n\n## Some other heading\n")

    expect(outline).toEqual([
      { level: 1, text: "My heading", id: "my-heading" },
      { level: 2, text: "Some other heading", id: "some-other-heading" },
    ])
  })

  it("strips inline formatting from the outline text", () => {
    const { outline } = annotate("## Hello *world* and `code`")

    expect(outline).toEqual([
      { level: 2, text: "Hello world and code", id: "hello-world-and-code" },
    ])
  })

  it("leaves inline HTML tags out of the text", () => {
    const { outline } = annotate("# Hello <em>there</em>")

    expect(outline).toEqual([{ level: 1, text: "Hello there", id: "hello-there" }])
  })

  it("finds headings nested in block quotes and list items", () => {
    const { outline } = annotate("> # Quoted\n\n- ## In a list\n\n#### Top level\n")

    expect(outline).toEqual([
      { level: 1, text: "Quoted", id: "quoted" },
      { level: 2, text: "In a list", id: "in-a-list" },
      { level: 4, text: "Top level", id: "top-level" },
    ])
  })

  it("handles setext headings", () => {
    const { outline } = annotate("Title\n=====\n\nSubtitle\n--------\n")

    expect(outline).toEqual([
      { level: 1, text: "Title", id: "title" },
      { level: 2, text: "Subtitle", id: "subtitle" },
    ])
  })

  it("ignores heading tags inside raw HTML blocks", () => {
    const { outline } = annotate("<h2>Raw</h2>\n\n# Real\n")

    expect(outline).toEqual([{ level: 1, text: "Real", id: "real" }])
  })

  it("gives symbol-only headings a fallback id", () => {
    const { outline } = annotate("# !!!\n\n# 🎉\n")

    expect(outline.map((entry) => entry.id)).toEqual(["section", "section-1"])
  })

  it("keeps the footnote section label id free when footnotes are called", () => {
    const { outline } = annotate("# Footnote Label\n\nText[^1]\n\n[^1]: note\n")

    expect(outline).toEqual([{ level: 1, text: "Footnote Label", id: "footnote-label-1" }])
  })

  it("does not reserve the footnote label id without footnote calls", () => {
    const { outline } = annotate("# Footnote Label\n")

    expect(outline).toEqual([{ level: 1, text: "Footnote Label", id: "footnote-label" }])
  })
})

describe("headingIdHtml", () => {
  function compile(markdown: string) {
    const { outline } = annotate(markdown)
    return compileHtml(parseEvents(markdown), [headingIdHtml(outline)])
  }

  it("writes outline ids onto ATX and setext headings", () => {
    expect(compile("### Getting Started\n\nTitle\n=====\n")).toBe(
      '<h3 id="getting-started">Getting Started</h3>\n<h1 id="title">Title</h1>\n',
    )
  })

  it("ignores the closing sequence of an ATX heading", () => {
    expect(compile("## Closed ##\n")).toBe('<h2 id="closed">Closed</h2>\n')
  })

  it("hands out ids in document order, including nested headings", () => {
    expect(compile("> # Overview\n\n# Overview\n")).toBe(
      '<blockquote>\n<h1 id="overview">Overview</h1>\n</blockquote>\n<h1 id="overview-1">Overview</h1>\n',
    )
  })

  it("leaves headings without an outline entry bare", () => {
    const html = compileHtml(parseEvents("# One\n\n# Two\n"), [
      headingIdHtml([{ level: 1, text: "One", id: "one" }]),
    ])

    expect(html).toBe('<h1 id="one">One</h1>\n<h1>Two</h1>\n')
  })
})
