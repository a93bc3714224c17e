import type * as cheerio from "cheerio";
import { Element, Text, hasChildren, isTag, isText, type AnyNode } from "domhandler";
import { z } from "zod";
import type { Glossary, GlossaryEntry } from "../types";
import { parseWith } from "../config";
import { hasClass } from "../utils/shared";

export const TERM_CLASS = "technical-term";

/** Containers whose text is never annotated; title and textarea cannot hold markup */
const SKIP_CONTAINERS = new Set(["script", "style", "title", "textarea"]);

const glossaryEntriesSchema = z.array(z.tuple([z.string(), z.string()]));

/**
 * Glossary as ordered [term, definition] pairs, in iteration order
 */
export function glossaryEntries(glossary: Glossary): GlossaryEntry[] {
    const entries = glossary instanceof Map ? [...glossary.entries()] : Object.entries(glossary);
    return parseWith(glossaryEntriesSchema, entries, "glossary");
}

function isTermWrapper(node: Element): boolean {
    return node.name === "span" && hasClass(node.attribs["class"], TERM_CLASS);
}

/**
 * Build a wrapper span: the term as visible text, the definition as data
 */
export function createTermWrapper(term: string, definition: string): Element {
    const label = new Text(term);
    const wrapper = new Element("span", { class: TERM_CLASS, "data-definition": definition }, [label]);
    label.parent = wrapper;
    return wrapper;
}

/**
 * Split one text node's content around glossary terms.
 *
 * Terms are tried in glossary order against a shrinking remainder: each term
 * is wrapped at its first occurrence and scanning resumes after the match, so
 * text before a match is never rescanned and wrappers never overlap.
 * Returns fresh nodes, or null when no term occurs.
 */
export function splitTextNode(text: string, entries: readonly GlossaryEntry[]): AnyNode[] | null {
    const nodes: AnyNode[] = [];
    let remainder = text;

    for (const [term, definition] of entries) {
        if (term.length === 0) continue;
        const at = remainder.indexOf(term);
        if (at === -1) continue;

        const before = remainder.slice(0, at);
        if (before.length > 0) {
            nodes.push(new Text(before));
        }
        nodes.push(createTermWrapper(term, definition));
        remainder = remainder.slice(at + term.length);
    }

    if (nodes.length === 0) return null;
    if (remainder.length > 0) {
        nodes.push(new Text(remainder));
    }
    return nodes;
}

/**
 * Collect candidate text nodes, skipping raw-text containers and existing wrappers
 */
function collectTextNodes(node: AnyNode, out: Text[]): void {
    if (isText(node)) {
        out.push(node);
        return;
    }
    if (isTag(node) && (SKIP_CONTAINERS.has(node.name) || isTermWrapper(node))) {
        return;
    }
    if (hasChildren(node)) {
        for (const child of node.children) {
            collectTextNodes(child, out);
        }
    }
}

/**
 * Wrap glossary terms in every eligible text node of a working document.
 * Returns the number of wrappers inserted.
 */
export function annotateDocument($: cheerio.CheerioAPI, entries: readonly GlossaryEntry[]): number {
    const textNodes: Text[] = [];
    for (const root of $.root().toArray()) {
        collectTextNodes(root, textNodes);
    }

    let wrapped = 0;
    for (const node of textNodes) {
        const replacement = splitTextNode(node.data, entries);
        if (replacement === null) continue;
        wrapped += replacement.filter(isTag).length;
        $(node).replaceWith(replacement);
    }
    return wrapped;
}
