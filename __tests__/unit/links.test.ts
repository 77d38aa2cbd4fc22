import { describe, expect, it } from "vitest"
import { compileHtml, parseEvents } from "../../src/events.js"
import { LinkRewriter, parseRewriteRules, rewriteUrl } from "../../src/links.js"
import { resolveRenderOptions } from "../../src/types.js"

describe("rewriteUrl", () => {
  const options = resolveRenderOptions({
    urlRoot: "/other/root",
    linkRewriteRules: { "/assets/plans.pdf": "https://example.com/plans.pdf" },
  })

  it("moves site-absolute paths under the url root", () => {
    expect(rewriteUrl("/foo/bar", options)).toBe("/other/root/foo/bar")
    expect(rewriteUrl("/", options)).toBe("/other/root/")
  })

  it("keeps the scheme and host of an absolute url root", () => {
    const absolute = resolveRenderOptions({ urlRoot: "https://example.com/docs" })

    expect(rewriteUrl("/foo", absolute)).toBe("https://example.com/docs/foo")
  })

  it("joins without collapsing the path", () => {
    const trailing = resolveRenderOptions({ urlRoot: "/docs/" })

    expect(rewriteUrl("/foo//bar", trailing)).toBe("/docs/foo//bar")
  })

  it("prefers an explicit rewrite rule", () => {
    expect(rewriteUrl("/assets/plans.pdf", options)).toBe("https://example.com/plans.pdf")
  })

  it("does not touch relative, external or protocol-relative URLs", () => {
    expect(rewriteUrl("relative/link", options)).toBe("relative/link")
    expect(rewriteUrl("https://www.example.com", options)).toBe("https://www.example.com")
    expect(rewriteUrl("//cdn.example.com/lib.js", options)).toBe("//cdn.example.com/lib.js")
    expect(rewriteUrl("#anchor", options)).toBe("#anchor")
  })

  it("leaves site-absolute paths alone under the default root", () => {
    expect(rewriteUrl("/foo//bar", resolveRenderOptions())).toBe("/foo//bar")
  })
})

describe("LinkRewriter", () => {
  function rewrite(markdown: string, urlRoot: string) {
    const rewriter = new LinkRewriter(resolveRenderOptions({ urlRoot }))
    const html = compileHtml(rewriter.mark(parseEvents(markdown)), [rewriter.htmlExtension()])
    return { html, rewritten: rewriter.rewritten }
  }

  it("rewrites links, images and reference definitions", () => {
    const { html, rewritten } = rewrite(
      "[a](/one) ![b](/two.png) [c][ref] [d](https://example.com)\n\n[ref]: /three\n",
      "/v2",
    )

    expect(rewritten).toBe(3)
    expect(html).toBe(
      '<p><a href="/v2/one">a</a> <img src="/v2/two.png" alt="b" /> <a href="/v2/three">c</a> <a href="https://example.com">d</a></p>\n',
    )
  })

  it("rewrites a link that only uses a reference", () => {
    expect(rewrite("[docs][ref]\n\n[ref]: /three\n", "/v2").html).toBe(
      '<p><a href="/v2/three">docs</a></p>\n',
    )
  })

  it("keeps the link title", () => {
    expect(rewrite('[a](/one "Title")\n', "/v2").html).toBe(
      '<p><a href="/v2/one" title="Title">a</a></p>\n',
    )
  })
})

describe("parseRewriteRules", () => {
  it("splits each pair on the first equals sign", () => {
    expect(parseRewriteRules(["/a=/b", "x=y=z"])).toEqual({ "/a": "/b", x: "y=z" })
  })

  it("allows an empty target", () => {
    expect(parseRewriteRules(["/gone="])).toEqual({ "/gone": "" })
  })

  it("rejects pairs without a source", () => {
    expect(() => parseRewriteRules(["nope"])).toThrow(
      'Invalid rewrite rule "nope", expected <from>=<to>',
    )
    expect(() => parseRewriteRules(["=/b"])).toThrow("Invalid rewrite rule")
  })
})
