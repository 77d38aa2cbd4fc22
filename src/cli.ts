#!/usr/bin/env node

/**
 * Command-line interface for doctave-markdown.
 */

import { existsSync } from "node:fs"
import yargs from "yargs"
import { hideBin } from "yargs/helpers"
import { MarkdownConverter } from "./converter.js"
import { parseRewriteRules } from "./links.js"
import { logger } from "./logger.js"
import type { RenderOptions } from "./types.js"

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .scriptName("doctave-md")
    .usage("$0 <input> [options]", "Render markdown to HTML with a heading outline")
    .command(
      "$0 <input>",
      "Convert markdown file to an HTML fragment",
      (yargs) => {
        return yargs
          .positional("input", {
            describe: "Input markdown file",
            type: "string",
            demandOption: true,
          })
          .option("output", {
            alias: "o",
            describe:
              "Output HTML file path (default: input filename with .html extension in same directory)",
            type: "string",
          })
          .option("outline", {
            describe: "Write the heading outline as JSON to this path",
            type: "string",
          })
          .option("url-root", {
            describe: "Root path for site-absolute links and images",
            type: "string",
            default: "/",
          })
          .option("rewrite", {
            describe: "Replace an exact link URL, as <from>=<to> (repeatable)",
            type: "string",
            array: true,
          })
          .check((argv) => {
            parseRewriteRules(argv.rewrite ?? [])
            return true
          })
      },
      async (argv) => {
        const input = String(argv.input)
        const output = argv.output ? String(argv.output) : undefined

        if (!existsSync(input)) {
          logger.error({ input }, "Input file not found")
          process.exit(1)
        }

        const options: RenderOptions = {
          urlRoot: argv["url-root"],
          linkRewriteRules: parseRewriteRules(argv.rewrite ?? []),
        }
        const converter = new MarkdownConverter(options)

        try {
          await converter.convert(input, output, argv.outline)
        } catch (error) {
          const errorMessage = error instanceof Error ? error.message : String(error)
          logger.error({ error: errorMessage }, "Error during conversion")
          process.exit(1)
        }
      },
    )
    .version("1.0.0")
    .help()
    .alias("help", "h")
    .alias("version", "v")
    .strict()
    .parseAsync()

  return argv
}

main().catch((error) => {
  logger.fatal({ error }, "Fatal error occurred")
  process.exit(1)
})
