import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import { isTag, isText } from "domhandler";
import { annotateDocument, createTermWrapper, glossaryEntries, splitTextNode, TERM_CLASS } from "../terms";
import { ConfigurationError } from "../../errors";
import type { GlossaryEntry } from "../../types";

function annotate(html: string, entries: GlossaryEntry[]): { html: string; count: number } {
    const $ = cheerio.load(html, null, false);
    const count = annotateDocument($, entries);
    return { html: $.html(), count };
}

describe("glossaryEntries", () => {
    it("keeps Map insertion order", () => {
        const glossary = new Map([
            ["beta", "B"],
            ["alpha", "A"],
        ]);

        expect(glossaryEntries(glossary)).toEqual([
            ["beta", "B"],
            ["alpha", "A"],
        ]);
    });

    it("accepts a plain object", () => {
        expect(glossaryEntries({ API: "Interface" })).toEqual([["API", "Interface"]]);
    });

    it("rejects non-string definitions", () => {
        const glossary: Record<string, string> = JSON.parse('{"API": 1}');

        expect(() => glossaryEntries(glossary)).toThrow(ConfigurationError);
    });
});

describe("createTermWrapper", () => {
    it("builds a span with the term as text and the definition as data", () => {
        const wrapper = createTermWrapper("API", "Interface");

        expect(wrapper.name).toBe("span");
        expect(wrapper.attribs).toEqual({ class: TERM_CLASS, "data-definition": "Interface" });
        const [label] = wrapper.children;
        expect(label !== undefined && isText(label) ? label.data : null).toBe("API");
        expect(label?.parent).toBe(wrapper);
    });
});

describe("splitTextNode", () => {
    it("returns null when no term occurs", () => {
        expect(splitTextNode("nothing to see", [["API", "Interface"]])).toBeNull();
    });

    it("splits around the first occurrence only", () => {
        const nodes = splitTextNode("API and API", [["API", "Interface"]]) ?? [];

        expect(nodes).toHaveLength(2);
        expect(nodes[0] !== undefined && isTag(nodes[0])).toBe(true);
        expect(nodes[1] !== undefined && isText(nodes[1]) ? nodes[1].data : null).toBe(" and API");
    });

    it("skips empty terms", () => {
        expect(splitTextNode("text", [["", "Nothing"]])).toBeNull();
    });
});

describe("annotateDocument", () => {
    it("wraps a term in place", () => {
        const result = annotate("<p>Use the API here</p>", [["API", "Application programming interface"]]);

        expect(result.html).toBe(
            '<p>Use the <span class="technical-term" data-definition="Application programming interface">API</span> here</p>'
        );
        expect(result.count).toBe(1);
    });

    it("wraps only the first occurrence per text node", () => {
        const result = annotate("<p>API and API</p>", [["API", "Interface"]]);

        expect(result.html).toBe(
            '<p><span class="technical-term" data-definition="Interface">API</span> and API</p>'
        );
    });

    it("wraps each occurrence in separate text nodes", () => {
        const result = annotate("<p>API</p><p>More API</p>", [["API", "Interface"]]);

        const $ = cheerio.load(result.html, null, false);
        expect($(`span.${TERM_CLASS}`)).toHaveLength(2);
        expect(result.count).toBe(2);
    });

    it("applies terms left to right without rescanning earlier text", () => {
        const inOrder = annotate("<p>alpha then beta</p>", [
            ["alpha", "A"],
            ["beta", "B"],
        ]);
        const reversed = annotate("<p>alpha then beta</p>", [
            ["beta", "B"],
            ["alpha", "A"],
        ]);

        expect(inOrder.html).toBe(
            '<p><span class="technical-term" data-definition="A">alpha</span> then ' +
                '<span class="technical-term" data-definition="B">beta</span></p>'
        );
        expect(reversed.html).toBe('<p>alpha then <span class="technical-term" data-definition="B">beta</span></p>');
    });

    it("lets the earlier of two overlapping terms win", () => {
        const longFirst = annotate("<p>a neural network model</p>", [
            ["neural network", "NN"],
            ["network", "Net"],
        ]);
        const shortFirst = annotate("<p>a neural network model</p>", [
            ["network", "Net"],
            ["neural network", "NN"],
        ]);

        expect(longFirst.html).toBe(
            '<p>a <span class="technical-term" data-definition="NN">neural network</span> model</p>'
        );
        expect(shortFirst.html).toBe(
            '<p>a neural <span class="technical-term" data-definition="Net">network</span> model</p>'
        );
    });

    it("is case-sensitive", () => {
        const result = annotate("<p>the api</p>", [["API", "Interface"]]);

        expect(result.html).toBe("<p>the api</p>");
        expect(result.count).toBe(0);
    });

    it("leaves script and style content alone", () => {
        const result = annotate(
            "<div><script>var API = 1;</script><style>.API { color: red; }</style><p>API</p></div>",
            [["API", "Interface"]]
        );

        expect(result.html).toBe(
            "<div><script>var API = 1;</script><style>.API { color: red; }</style>" +
                '<p><span class="technical-term" data-definition="Interface">API</span></p></div>'
        );
        expect(result.count).toBe(1);
    });

    it("keeps the definition as an attribute value", () => {
        const result = annotate("<p>R&amp;D lab</p>", [["R&D", 'Research and "development"']]);

        const $ = cheerio.load(result.html, null, false);
        const $wrapper = $(`span.${TERM_CLASS}`);
        expect($wrapper.text()).toBe("R&D");
        expect($wrapper.attr("data-definition")).toBe('Research and "development"');
        expect($("p").text()).toBe("R&D lab");
    });

    it("never nests wrappers when run twice", () => {
        const entries: GlossaryEntry[] = [["API", "Interface"]];
        const once = annotate("<p>The API docs</p>", entries);
        const twice = annotate(once.html, entries);

        expect(twice.html).toBe(once.html);
        expect(twice.count).toBe(0);

        const repeated = annotate(annotate("<p>API and API</p>", entries).html, entries);
        const $ = cheerio.load(repeated.html, null, false);
        expect($(`span.${TERM_CLASS} span.${TERM_CLASS}`)).toHaveLength(0);
        expect($(`span.${TERM_CLASS}`)).toHaveLength(2);
    });
});
