import type {
    ArticleSection,
    CitationRecord,
    Glossary,
    QaPair,
    SchemaDocument,
    SchemaFields,
} from "../types";
import { glossaryEntries } from "../annotation/terms";

export const SCHEMA_CONTEXT = "https://schema.org";

export type SchemaRequest =
    | { kind: "article"; title: string; sections: ArticleSection[]; metadata?: SchemaFields }
    | { kind: "faq"; pairs: QaPair[] }
    | { kind: "glossary"; glossary: Glossary }
    | { kind: "citations"; records: CitationRecord[] }
    | { kind: "context"; context: string; role: string; schemaType: string; dateCreated: string }
    | { kind: "generic"; schemaType: string; description?: string; properties?: SchemaFields };

function freezeDeep<T>(value: T): T {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            freezeDeep(child);
        }
    }
    return value;
}

/**
 * Assemble a document with the fixed context first. Fields may not override
 * "@context" or "@type". Values are copied, so freezing the document never
 * reaches objects the caller still holds.
 */
function buildDocument(type: string, fields: SchemaFields): SchemaDocument {
    const doc: SchemaDocument = { "@context": SCHEMA_CONTEXT, "@type": type };
    for (const [key, value] of Object.entries(fields)) {
        if (key === "@context" || key === "@type") continue;
        doc[key] = structuredClone(value);
    }
    return freezeDeep(doc);
}

/**
 * CreativeWork node for one citation, omitting absent fields
 */
export function creativeWork(record: CitationRecord): SchemaFields {
    const work: SchemaFields = {
        "@type": "CreativeWork",
        name: record.title,
        author: [...(record.authors ?? [])],
    };
    if (record.publisher !== undefined) work["publisher"] = record.publisher;
    if (record.date !== undefined) work["datePublished"] = record.date;
    if (record.url !== undefined) work["url"] = record.url;
    return work;
}

/**
 * Build the schema.org document describing one enrichment. Pure: the
 * output depends only on the request.
 */
export function schemaFor(request: SchemaRequest): SchemaDocument {
    switch (request.kind) {
        case "article":
            return buildDocument("Article", {
                headline: request.title,
                articleSection: request.sections.map(section => section.heading),
                ...request.metadata,
            });

        case "faq":
            return buildDocument("FAQPage", {
                mainEntity: request.pairs.map(({ question, answer }) => ({
                    "@type": "Question",
                    name: question,
                    acceptedAnswer: { "@type": "Answer", text: answer },
                })),
            });

        case "glossary":
            return buildDocument("DefinedTermSet", {
                definedTerm: glossaryEntries(request.glossary).map(([term, definition]) => ({
                    "@type": "DefinedTerm",
                    name: term,
                    description: definition,
                })),
            });

        case "citations":
            return buildDocument("ScholarlyArticle", {
                citation: request.records.map(creativeWork),
            });

        case "context":
            return buildDocument(request.schemaType, {
                role: request.role,
                dateCreated: request.dateCreated,
                llmContext: request.context.trim(),
            });

        case "generic": {
            const fields: SchemaFields = {};
            if (request.description !== undefined && request.description.length > 0) {
                fields["description"] = request.description;
            }
            return buildDocument(request.schemaType, { ...fields, ...request.properties });
        }
    }
}

/**
 * ISO-8601 timestamp at second precision, e.g. 2025-04-17T09:30:00Z
 */
export function isoSeconds(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Embed a document as a JSON-LD script element, with "<" written as \u003c
 */
export function renderJsonLd(doc: SchemaDocument): string {
    const json = JSON.stringify(doc).replace(/</g, "\\u003c");
    return `<script type="application/ld+json">${json}</script>`;
}

