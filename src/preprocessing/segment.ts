import type * as cheerio from "cheerio";
import { isTag, isText, type AnyNode } from "domhandler";
import type { Block, BlockType } from "../types";
import { estimateTokens } from "./tokenize";
import { isHeadingTag, normalizeWhitespace } from "../utils/shared";

/** CSS selector matching every block-level tag, in allow-list order */
export const BLOCK_SELECTOR = "p, h1, h2, h3, h4, h5, h6, li, blockquote";

/**
 * Check if a tag name is a block-level element we care about
 */
export function isBlockTag(tagName: string): tagName is BlockType {
    return isHeadingTag(tagName) || tagName === "p" || tagName === "li" || tagName === "blockquote";
}

/** Elements whose content never renders as text */
const HIDDEN_TEXT_TAGS = new Set(["script", "style", "template", "noscript"]);

/** Elements that start a new line when rendered */
const LINE_BREAK_TAGS = new Set([
    "br", "hr", "p", "div", "li", "ul", "ol", "dl", "dt", "dd", "blockquote", "pre",
    "h1", "h2", "h3", "h4", "h5", "h6", "section", "article", "aside", "header", "footer",
    "figure", "figcaption", "table", "tr", "td", "th", "caption",
]);

function collectText(node: AnyNode, parts: string[]): void {
    if (isText(node)) {
        parts.push(node.data);
        return;
    }
    if (!isTag(node) || HIDDEN_TEXT_TAGS.has(node.name)) return;

    const breaks = LINE_BREAK_TAGS.has(node.name);
    if (breaks) parts.push(" ");
    for (const child of node.children) {
        collectText(child, parts);
    }
    if (breaks) parts.push(" ");
}

/**
 * Rendered text of an element: hidden content dropped, a space at every
 * line break or block boundary, whitespace collapsed
 */
export function renderedText(element: AnyNode): string {
    const parts: string[] = [];
    collectText(element, parts);
    return normalizeWhitespace(parts.join(""));
}

/**
 * Walk the DOM tree and collect blocks in document order.
 * A matched block is not descended into, so nested blocks are never emitted twice.
 */
function walk(
    $: cheerio.CheerioAPI,
    $node: cheerio.Cheerio<AnyNode>,
    blocks: Block[],
    indexRef: { current: number },
): void {
    const rawTag = $node.prop("tagName");
    const tagName = typeof rawTag === "string" ? rawTag.toLowerCase() : "";

    const [element] = $node.toArray();
    if (element !== undefined && tagName !== "" && isBlockTag(tagName)) {
        const text = renderedText(element);

        // Skip empty blocks
        if (text.length === 0) return;

        blocks.push({
            type: tagName,
            text,
            html: $.html($node),
            tokens: estimateTokens(text),
            index: indexRef.current++,
        });
        return;
    }

    $node.children().each((_, child) => {
        if (child.type === "tag") {
            walk($, $(child), blocks, indexRef);
        }
    });
}

/**
 * Extract blocks from a container element (the whole document by default).
 * Recomputed on every call.
 */
export function extractBlocks(
    $: cheerio.CheerioAPI,
    container?: cheerio.Cheerio<AnyNode>,
): Block[] {
    const blocks: Block[] = [];
    const indexRef = { current: 0 };
    walk($, container ?? $.root(), blocks, indexRef);
    return blocks;
}
