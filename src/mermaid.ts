/**
 * Mermaid code block rewriting.
 * Replaces ```mermaid fences with `<div class="mermaid">` containers that the
 * Mermaid browser script renders client-side.
 */

import type { Event, HtmlExtension, Token } from "micromark-util-types"
import { findExit } from "./events.js"

/**
 * Fence language that marks a Mermaid diagram. Matched case-sensitively.
 */
export const MERMAID_LANGUAGE = "mermaid"

/**
 * Class carried by diagram containers.
 */
export const MERMAID_CLASS_NAME = "mermaid"

/**
 * Reads the fence language of the code block spanning `events[start..end]`.
 */
function fenceLanguage(events: readonly Event[], start: number, end: number): string | undefined {
  for (let index = start; index < end; index++) {
    const [kind, token, context] = events[index]
    if (kind === "exit" && token.type === "codeFencedFenceInfo") {
      return context.sliceSerialize(token)
    }
  }

  return undefined
}

/**
 * Collects the body of the code block spanning `events[start..end]`, without
 * the line endings that follow the opening fence and precede the closing one.
 * Container prefixes (`> ` inside block quotes) are not part of the body.
 */
function fenceBody(events: readonly Event[], start: number, end: number): string {
  const parts: Array<{ lineEnding: boolean; value: string }> = []

  for (let index = start; index < end; index++) {
    const [kind, token, context] = events[index]
    if (kind === "exit" && (token.type === "codeFlowValue" || token.type === "lineEnding")) {
      parts.push({ lineEnding: token.type === "lineEnding", value: context.sliceSerialize(token) })
    }
  }

  if (parts[0]?.lineEnding) {
    parts.shift()
  }
  if (parts[parts.length - 1]?.lineEnding) {
    parts.pop()
  }

  return parts.map((part) => part.value).join("")
}

/**
 * Turns Mermaid fences into diagram containers.
 *
 * `rewrite` swaps each Mermaid `codeFenced` run in the event stream for a single
 * `mermaidDiagram` token; `htmlExtension` renders those tokens. Other code
 * blocks keep their events and render as `<pre><code class="language-…">`.
 */
export class MermaidRewriter {
  private readonly sources = new WeakMap<Token, string>()
  private count = 0

  /**
   * Number of diagram containers produced so far.
   */
  get diagrams(): number {
    return this.count
  }

  /**
   * Replaces Mermaid code blocks in an event stream.
   *
   * @param events - Events from `parseEvents`
   * @returns New event list with diagram tokens in place of Mermaid fences
   */
  rewrite(events: readonly Event[]): Event[] {
    const result: Event[] = []

    for (let index = 0; index < events.length; index++) {
      const event = events[index]
      const [kind, token, context] = event
      const end = kind === "enter" && token.type === "codeFenced" ? findExit(events, index) : -1

      if (end === -1 || fenceLanguage(events, index, end) !== MERMAID_LANGUAGE) {
        result.push(event)
        continue
      }

      const diagram: Token = { type: "mermaidDiagram", start: token.start, end: token.end }
      this.sources.set(diagram, fenceBody(events, index, end))
      this.count++

      result.push(["enter", diagram, context], ["exit", diagram, context])
      // Block quote and list exits can close inside an unterminated fence.
      for (let inner = index + 1; inner < end; inner++) {
        if (events[inner][1]._container) {
          result.push(events[inner])
        }
      }
      index = end
    }

    return result
  }

  /**
   * Compile handlers for the diagram tokens made by `rewrite`.
   * The body is HTML-escaped, so `<` and `&` in diagram syntax stay literal.
   */
  htmlExtension(): HtmlExtension {
    const sources = this.sources

    return {
      enter: {
        mermaidDiagram(token) {
          this.lineEndingIfNeeded()
          this.tag(`<div class="${MERMAID_CLASS_NAME}">`)
          this.raw(this.encode(sources.get(token) ?? ""))
          this.tag("</div>")
        },
      },
    }
  }
}
