import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import { CitationRegistry, findRecord, markerIds, validateRecords } from "../registry";
import { ConfigurationError, NotFoundError } from "../../errors";
import type { CitationRecord, ContentInput } from "../../types";

const records: CitationRecord[] = [
    { id: 3, title: "Third Paper", authors: ["C. Author"], date: "2013" },
    { id: 5, title: "Fifth Paper", authors: ["E. Author"], date: "2015" },
    { id: 7, title: "Seventh Paper", authors: ["G. Author"], date: "2017" },
];

function marker(id: string | number): string {
    return `<span class="citation-marker" data-citation-id="${id}"></span>`;
}

function htmlOf(content: ContentInput): string {
    if (content.kind !== "html") throw new Error("expected html content");
    return content.html;
}

function citeTexts(content: ContentInput): string[] {
    const $ = cheerio.load(htmlOf(content), null, false);
    return $("cite.citation-ref").map((_, el) => $(el).text()).get();
}

describe("CitationRegistry", () => {
    it("replaces a marker with a numbered reference", () => {
        const registry = new CitationRegistry();
        const content: ContentInput = { kind: "html", html: `<p>Deep learning${marker(5)}.</p>` };

        const result = registry.resolve(content, 5, records);

        expect(htmlOf(result)).toBe(
            '<p>Deep learning<cite class="citation-ref" data-citation-id="5">[1]</cite>.</p>'
        );
        expect(registry.numberFor(5)).toBe(1);
    });

    it("numbers ids by first resolution and reuses numbers", () => {
        const registry = new CitationRegistry();
        let content: ContentInput = { kind: "html", html: `<p>A${marker(5)} B${marker(3)}</p>` };

        for (const id of [5, 3, 5, 7]) {
            content = registry.resolve(content, id, records);
        }

        expect(registry.numberFor(5)).toBe(1);
        expect(registry.numberFor(3)).toBe(2);
        expect(registry.numberFor(7)).toBe(3);
        expect(registry.resolvedRecords().map(r => r.id)).toEqual([5, 3, 7]);
        expect(registry.bibliography().entries.map(e => [e.number, e.id])).toEqual([
            [1, 5],
            [2, 3],
            [3, 7],
        ]);
        expect(citeTexts(content)).toEqual(["[1]", "[2]", "[1]", "[3]"]);
    });

    it("replaces every marker for the same id", () => {
        const registry = new CitationRegistry();
        const content: ContentInput = { kind: "html", html: `<p>One${marker(7)}</p><p>Two${marker(7)}</p>` };

        const result = registry.resolve(content, 7, records);

        expect(citeTexts(result)).toEqual(["[1]", "[1]"]);
        expect(registry.size).toBe(1);
    });

    it("matches numeric ids against their string form in markup", () => {
        const registry = new CitationRegistry();

        const result = registry.resolve({ kind: "html", html: `<p>x${marker("3")}</p>` }, 3, records);

        expect(citeTexts(result)).toEqual(["[1]"]);
    });

    it("inserts a marker into the body when none exists", () => {
        const registry = new CitationRegistry();

        const result = registry.resolve({ kind: "html", html: "<html><body><p>x</p></body></html>" }, 3, records);

        const $ = cheerio.load(htmlOf(result));
        expect($("body > cite.citation-ref").text()).toBe("[1]");
        expect($("p").text()).toBe("x");
    });

    it("falls back to the first block without a body", () => {
        const registry = new CitationRegistry();

        const result = registry.resolve({ kind: "html", html: "<div><h2>T</h2><p>x</p></div>" }, 3, records);

        expect(htmlOf(result)).toBe(
            '<div><h2>T<cite class="citation-ref" data-citation-id="3">[1]</cite></h2><p>x</p></div>'
        );
    });

    it("falls back to the root when there is no block either", () => {
        const registry = new CitationRegistry();

        const result = registry.resolve({ kind: "html", html: "Just text" }, 3, records);

        expect(htmlOf(result)).toBe('Just text<cite class="citation-ref" data-citation-id="3">[1]</cite>');
    });

    it("fails on an unknown id without changing the session", () => {
        const registry = new CitationRegistry();
        registry.resolve({ kind: "html", html: "<p>x</p>" }, 3, records);

        expect(() => registry.resolve({ kind: "html", html: "<p>y</p>" }, 99, records)).toThrow(NotFoundError);
        expect(registry.size).toBe(1);
        expect(registry.numberFor(99)).toBeUndefined();
    });

    it("does not modify tree input", () => {
        const $source = cheerio.load(`<p>x${marker(3)}</p>`, null, false);
        const nodes = $source.root().contents().toArray();
        const registry = new CitationRegistry();

        const result = registry.resolve({ kind: "tree", nodes }, 3, records);

        expect($source.html()).toBe(`<p>x${marker(3)}</p>`);
        expect(result.kind).toBe("tree");
    });

    it("keeps sessions independent", () => {
        const first = new CitationRegistry();
        const second = new CitationRegistry();

        first.resolve({ kind: "html", html: "<p>x</p>" }, 3, records);
        second.resolve({ kind: "html", html: "<p>x</p>" }, 7, records);

        expect(first.numberFor(3)).toBe(1);
        expect(second.numberFor(7)).toBe(1);
        expect(second.numberFor(3)).toBeUndefined();
    });

    it("starts numbering again after reset", () => {
        const registry = new CitationRegistry();
        registry.resolve({ kind: "html", html: "<p>x</p>" }, 3, records);
        registry.resolve({ kind: "html", html: "<p>x</p>" }, 5, records);

        registry.reset();
        registry.resolve({ kind: "html", html: "<p>x</p>" }, 5, records);

        expect(registry.numberFor(5)).toBe(1);
        expect(registry.numberFor(3)).toBeUndefined();
        expect(registry.size).toBe(1);
    });

    it("returns a copy of the resolved records", () => {
        const registry = new CitationRegistry();
        registry.resolve({ kind: "html", html: "<p>x</p>" }, 3, records);

        registry.resolvedRecords().pop();

        expect(registry.size).toBe(1);
    });
});

describe("validateRecords", () => {
    it("rejects duplicate ids, comparing string forms", () => {
        expect(() =>
            validateRecords([
                { id: 1, title: "One" },
                { id: "1", title: "Also one" },
            ])
        ).toThrow(ConfigurationError);
    });

    it("rejects records without a title", () => {
        const malformed: CitationRecord[] = JSON.parse('[{"id": 1}]');

        expect(() => validateRecords(malformed)).toThrow(ConfigurationError);
    });
});

describe("findRecord", () => {
    it("throws NotFoundError carrying the id", () => {
        try {
            findRecord(records, "missing");
            expect.unreachable("expected NotFoundError");
        } catch (err) {
            expect(err).toBeInstanceOf(NotFoundError);
            if (err instanceof NotFoundError) {
                expect(err.citationId).toBe("missing");
                expect(err.code).toBe("NOT_FOUND");
                expect(err.message).toBe('No citation record with id "missing"');
            }
        }
    });
});

describe("markerIds", () => {
    it("lists distinct marker ids in document order", () => {
        const $ = cheerio.load(`<p>${marker("b")}${marker("a")}</p><p>${marker("b")}${marker("c")}</p>`, null, false);

        expect(markerIds($)).toEqual(["b", "a", "c"]);
    });
});
