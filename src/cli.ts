#!/usr/bin/env node

import * as fs from "fs";
import { z } from "zod";
import { parseArgs, type CliOptions } from "./cli/args";
import { parseWith } from "./config";
import { EnrichmentError } from "./errors";
import { annotateTerms, chunkContent, citeContent } from "./pipeline";
import { contentToMarkup, loadContent } from "./preprocessing/load";
import { extractBlocks } from "./preprocessing/segment";
import { informationDensity } from "./preprocessing/tokenize";
import { citationRecordsSchema } from "./citation/registry";
import { renderJsonLd } from "./schema/emitter";
import { truncateText } from "./utils/shared";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
geo-enrich - enrich HTML with chunks, term annotations, citations and JSON-LD

USAGE:
  geo-enrich <command> --file page.html [options]

COMMANDS:
  chunk       Group blocks into token-bounded chunks
    --max-tokens N     Token budget per chunk (default: 500)
    --overlap N        Blocks carried into the next chunk (default: 50)

  annotate    Wrap glossary terms in annotated spans
    --glossary file    JSON object mapping term to definition

  cite        Number citation markers and append a references section
    --citations file   JSON array of citation records

  density     Print the word entropy of every block

OPTIONS:
  --timing, -t         Show performance timing breakdown
  --debug              Show debug information
  --help, -h           Show this help message

EXAMPLES:
  geo-enrich chunk --file article.html --max-tokens 120 --overlap 2
  geo-enrich annotate --file article.html --glossary terms.json
  geo-enrich cite --file article.html --citations refs.json
`;

function readJson(path: string): unknown {
    const parsed: unknown = JSON.parse(fs.readFileSync(path, "utf8"));
    return parsed;
}

function run(options: CliOptions, html: string): string {
    const content = { kind: "html" as const, html };

    switch (options.command) {
        case "chunk": {
            const result = chunkContent(content, {
                ...(options.maxTokens !== undefined && { maxTokens: options.maxTokens }),
                ...(options.overlap !== undefined && { overlap: options.overlap }),
                debug: options.debug,
            });
            return contentToMarkup(result.content);
        }

        case "annotate": {
            const glossary = parseWith(z.record(z.string()), readJson(options.glossaryFile ?? ""), "glossary");
            const result = annotateTerms(content, glossary, { debug: options.debug });
            return contentToMarkup(result.content) + "\n" + renderJsonLd(result.schema);
        }

        case "cite": {
            const records = parseWith(citationRecordsSchema, readJson(options.citationsFile ?? ""), "citation records");
            const result = citeContent(content, records, { debug: options.debug });
            return contentToMarkup(result.content) + "\n" + renderJsonLd(result.schema);
        }

        case "density": {
            const { $ } = loadContent(content);
            return extractBlocks($)
                .map(block => `${informationDensity(block.text).toFixed(3)}  ${block.type.padEnd(10)} ${truncateText(block.text, 60)}`)
                .join("\n");
        }

        case "help":
            return HELP_TEXT;
    }
}

function main(): void {
    const options = parseArgs(process.argv.slice(2));

    if (options.command === "help") {
        console.log(HELP_TEXT);
        return;
    }

    if (options.timing) {
        logger.setTimingEnabled(true);
    }

    if (!fs.existsSync(options.file)) {
        logger.error(`File not found: ${options.file}`);
        process.exit(1);
    }

    const html = fs.readFileSync(options.file, "utf8");
    const output = run(options, html);

    if (options.timing) {
        logger.printTimings();
    }

    console.log(output);
}

try {
    main();
} catch (err) {
    if (err instanceof EnrichmentError) {
        logger.error(`${err.name}: ${err.message}`);
    } else {
        logger.error(`Unexpected error: ${err}`);
    }
    process.exit(1);
}
