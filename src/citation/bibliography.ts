import type { BibliographyEntry, CitationRecord, SchemaDocument } from "../types";
import { schemaFor } from "../schema/emitter";

export interface Bibliography {
    entries: BibliographyEntry[];
    schema: SchemaDocument;
}

/**
 * "authors. title. publisher date", leaving out whatever the record lacks
 */
export function formatCitation(record: CitationRecord): string {
    const authors = (record.authors ?? []).join(", ");
    const imprint = [record.publisher ?? "", record.date ?? ""]
        .map(part => part.trim())
        .filter(part => part.length > 0)
        .join(" ");

    return [authors, record.title.trim(), imprint]
        .filter(part => part.length > 0)
        .join(". ");
}

/**
 * One numbered entry per record, in the order given, plus the matching
 * citation graph
 */
export function renderBibliography(records: readonly CitationRecord[]): Bibliography {
    const entries = records.map((record, i): BibliographyEntry => {
        const entry: BibliographyEntry = {
            number: i + 1,
            id: record.id,
            text: formatCitation(record),
        };
        if (record.url !== undefined && record.url.length > 0) {
            entry.url = record.url;
        }
        return entry;
    });

    return {
        entries,
        schema: schemaFor({ kind: "citations", records: [...records] }),
    };
}
