import type * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { z } from "zod";
import type { CitationId, CitationRecord, ContentInput } from "../types";
import { ConfigurationError, NotFoundError } from "../errors";
import { parseWith } from "../config";
import { loadContent, toContent } from "../preprocessing/load";
import { BLOCK_SELECTOR } from "../preprocessing/segment";
import { renderBibliography, type Bibliography } from "./bibliography";

export const MARKER_CLASS = "citation-marker";
export const CITATION_REF_CLASS = "citation-ref";
const MARKER_ID_ATTR = "data-citation-id";

export const citationRecordsSchema = z.array(
    z.object({
        id: z.union([z.string(), z.number()]),
        title: z.string(),
        authors: z.array(z.string()).optional(),
        publisher: z.string().optional(),
        date: z.string().optional(),
        url: z.string().optional(),
    })
);

/**
 * Ids are compared by their string form, the way they appear in markup
 */
export function citationKey(id: CitationId): string {
    return String(id);
}

/**
 * Reject malformed records and duplicate ids
 */
export function validateRecords(records: readonly CitationRecord[]): void {
    parseWith(citationRecordsSchema, records, "citation records");

    const seen = new Set<string>();
    for (const record of records) {
        const key = citationKey(record.id);
        if (seen.has(key)) {
            throw new ConfigurationError(`Duplicate citation id "${key}"`, [`id: "${key}" appears more than once`]);
        }
        seen.add(key);
    }
}

/**
 * Look up a record by id, failing with NotFoundError
 */
export function findRecord(records: readonly CitationRecord[], citationId: CitationId): CitationRecord {
    const key = citationKey(citationId);
    const record = records.find(r => citationKey(r.id) === key);
    if (record === undefined) {
        throw new NotFoundError(citationId);
    }
    return record;
}

/**
 * Markers for one id, in document order
 */
function findMarkers($: cheerio.CheerioAPI, key: string): cheerio.Cheerio<AnyNode> {
    return $(`span.${MARKER_CLASS}`).filter((_, el) => $(el).attr(MARKER_ID_ATTR) === key);
}

/**
 * Distinct marker ids in document order
 */
export function markerIds($: cheerio.CheerioAPI): string[] {
    const ids: string[] = [];
    $(`span.${MARKER_CLASS}`).each((_, el) => {
        const id = $(el).attr(MARKER_ID_ATTR);
        if (id !== undefined && !ids.includes(id)) {
            ids.push(id);
        }
    });
    return ids;
}

/**
 * Where a missing marker goes: body, else the first block element, else the root
 */
export function markerTarget($: cheerio.CheerioAPI): cheerio.Cheerio<AnyNode> {
    const body = $("body").first();
    if (body.length > 0) return body;
    const block = $(BLOCK_SELECTOR).first();
    if (block.length > 0) return block;
    return $.root();
}

/**
 * Where the references section goes: body, else the root
 */
export function referencesTarget($: cheerio.CheerioAPI): cheerio.Cheerio<AnyNode> {
    const body = $("body").first();
    return body.length > 0 ? body : $.root();
}

/**
 * Session-scoped citation numbering.
 *
 * Each id gets the next number the first time it is resolved and keeps it
 * for the rest of the session. Create one registry per page render (or call
 * reset()); sharing one across unrelated sessions merges their numbering.
 */
export class CitationRegistry {
    private readonly numbers = new Map<string, number>();
    private readonly resolved: CitationRecord[] = [];

    /**
     * Replace the markers for `citationId` with a numbered reference,
     * inserting a marker first when the content has none
     */
    public resolve(content: ContentInput, citationId: CitationId, records: readonly CitationRecord[]): ContentInput {
        validateRecords(records);
        const record = findRecord(records, citationId);
        const loaded = loadContent(content);
        this.resolveIn(loaded.$, record);
        return toContent(loaded);
    }

    /**
     * Resolve one record inside an already loaded working document.
     * Returns the sequence number used.
     */
    public resolveIn($: cheerio.CheerioAPI, record: CitationRecord): number {
        const key = citationKey(record.id);

        let markers = findMarkers($, key);
        if (markers.length === 0) {
            const marker = $("<span></span>").attr("class", MARKER_CLASS).attr(MARKER_ID_ATTR, key);
            markerTarget($).append(marker);
            markers = findMarkers($, key);
        }

        const number = this.assign(record);
        markers.each((_, el) => {
            const ref = $("<cite></cite>")
                .attr("class", CITATION_REF_CLASS)
                .attr(MARKER_ID_ATTR, key)
                .text(`[${number}]`);
            $(el).replaceWith(ref);
        });
        return number;
    }

    public numberFor(citationId: CitationId): number | undefined {
        return this.numbers.get(citationKey(citationId));
    }

    /** Resolved records in first-seen order */
    public resolvedRecords(): CitationRecord[] {
        return [...this.resolved];
    }

    public get size(): number {
        return this.resolved.length;
    }

    public bibliography(): Bibliography {
        return renderBibliography(this.resolved);
    }

    public reset(): void {
        this.numbers.clear();
        this.resolved.length = 0;
    }

    private assign(record: CitationRecord): number {
        const key = citationKey(record.id);
        const existing = this.numbers.get(key);
        if (existing !== undefined) return existing;

        const next = this.resolved.length + 1;
        this.numbers.set(key, next);
        this.resolved.push(record);
        return next;
    }
}
