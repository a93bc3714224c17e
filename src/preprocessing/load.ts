import * as cheerio from "cheerio";
import { cloneNode, isDocument, Node, type AnyNode } from "domhandler";
import { z } from "zod";
import type { ContentInput, ContentKind } from "../types";
import { InvalidContentError } from "../errors";
import { formatIssues } from "../config";

const DOCUMENT_SHELL_PATTERN = /<(html|body)[\s>]/i;
const COMMENT_PATTERN = /<!--[\s\S]*?(?:-->|$)/g;
const RAW_TEXT_PATTERN = /<(script|style|textarea|title|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;

/**
 * True when the markup opens its own html or body element. Tags inside
 * comments and raw-text elements do not count.
 */
export function hasDocumentShell(html: string): boolean {
    const markup = html.replace(COMMENT_PATTERN, "").replace(RAW_TEXT_PATTERN, "");
    return DOCUMENT_SHELL_PATTERN.test(markup);
}

const nodeSchema = z.custom<AnyNode>(value => value instanceof Node, {
    message: "expected a parsed DOM node",
});

const contentSchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("html"), html: z.string() }),
    z.object({ kind: z.literal("tree"), nodes: z.array(nodeSchema) }),
]);

/**
 * A private, per-call working copy of the caller's content
 */
export interface LoadedContent {
    $: cheerio.CheerioAPI;
    kind: ContentKind;
    /** True when the tree input was a single document root */
    rootIsDocument: boolean;
}

/**
 * Fail fast on anything that is not one of the two accepted shapes
 */
export function validateContent(input: unknown): ContentInput {
    const result = contentSchema.safeParse(input);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new InvalidContentError(`Malformed content: ${issues.join("; ")}`, issues);
    }
    return result.data;
}

/**
 * True when the content has nothing to enrich
 */
export function isEmptyContent(input: ContentInput): boolean {
    return input.kind === "html" ? input.html.trim().length === 0 : input.nodes.length === 0;
}

/**
 * Parse markup or clone a node tree into a fresh cheerio document.
 * The caller's nodes are never attached to the working copy.
 */
export function loadContent(input: ContentInput): LoadedContent {
    const content = validateContent(input);

    if (content.kind === "html") {
        const asDocument = hasDocumentShell(content.html);
        return {
            $: cheerio.load(content.html, null, asDocument),
            kind: "html",
            rootIsDocument: false,
        };
    }

    const clones = content.nodes.map(node => cloneNode(node, true));
    const [first] = clones;
    if (clones.length === 1 && first !== undefined && isDocument(first)) {
        return { $: cheerio.load(first), kind: "tree", rootIsDocument: true };
    }

    return { $: cheerio.load(clones), kind: "tree", rootIsDocument: false };
}

/**
 * Convert the working copy back into the caller's representation
 */
export function toContent(loaded: LoadedContent): ContentInput {
    const { $ } = loaded;
    if (loaded.kind === "html") {
        return { kind: "html", html: $.html() };
    }
    const root = $.root();
    return {
        kind: "tree",
        nodes: loaded.rootIsDocument ? root.toArray() : root.contents().toArray(),
    };
}

/**
 * Wrap freshly rendered markup in the requested representation
 */
export function contentFromMarkup(markup: string, kind: ContentKind): ContentInput {
    if (kind === "html") {
        return { kind: "html", html: markup };
    }
    const $ = cheerio.load(markup, null, false);
    return { kind: "tree", nodes: $.root().contents().toArray() };
}

/**
 * Serialize content to markup without touching the caller's nodes
 */
export function contentToMarkup(input: ContentInput): string {
    if (input.kind === "html") {
        validateContent(input);
        return input.html;
    }
    return loadContent(input).$.html();
}
