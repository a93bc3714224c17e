import type {
    ArticleSection,
    BibliographyEntry,
    Chunk,
    CitationId,
    CitationRecord,
    ContentInput,
    Glossary,
    QaPair,
    SchemaDocument,
    SchemaFields,
} from "./types";
import { mergeConfig, type ChunkOptions, type ContextOptions } from "./config";
import { ConfigurationError } from "./errors";
import {
    contentFromMarkup,
    contentToMarkup,
    isEmptyContent,
    loadContent,
    toContent,
    validateContent,
} from "./preprocessing/load";
import { extractBlocks } from "./preprocessing/segment";
import { assembleChunks } from "./chunking/assemble";
import { annotateDocument, glossaryEntries } from "./annotation/terms";
import { CitationRegistry, findRecord, markerIds, referencesTarget, validateRecords } from "./citation/registry";
import { isoSeconds, schemaFor } from "./schema/emitter";
import { renderArticle, renderChunks, renderFaq, renderReferences } from "./output/render";
import Logger from "./utils/logger";

export interface EnrichmentResult {
    content: ContentInput;
    schema: SchemaDocument;
}

export interface ChunkResult {
    content: ContentInput;
    chunks: Chunk[];
    warnings: string[];
}

export interface AnnotationResult extends EnrichmentResult {
    annotatedCount: number;
}

export interface CitationResult extends EnrichmentResult {
    bibliography: BibliographyEntry[];
    registry: CitationRegistry;
}

export interface CiteOptions {
    /** Session registry; a fresh one is created when omitted */
    registry?: CitationRegistry;
    /** Resolve only this id and skip the references section */
    citationId?: CitationId;
    debug?: boolean;
}

export interface ContextBlockOptions extends Partial<ContextOptions> {
    context: string;
    /** Timestamp for dateCreated; defaults to the current time */
    now?: Date;
}

export interface ArticleInput {
    title: string;
    sections: ArticleSection[];
    metadata?: SchemaFields;
}

export interface DescribeOptions {
    schemaType: string;
    description?: string;
    properties?: SchemaFields;
}

/**
 * Group the content's blocks into token-bounded chunks with element overlap
 */
export function chunkContent(
    content: ContentInput,
    options: Partial<ChunkOptions> & { debug?: boolean } = {}
): ChunkResult {
    const { debug, ...chunking } = options;
    const cfg = mergeConfig({ chunking, ...(debug !== undefined && { debug }) });
    const logger = Logger.getInstance();

    const { $, kind } = logger.time("chunk: load", () => loadContent(content));
    const blocks = logger.time("chunk: segment blocks", () => extractBlocks($));
    const { chunks, warnings } = logger.time("chunk: assemble", () => assembleChunks(blocks, cfg.chunking));

    logger.debug(
        `Packed ${blocks.length} block(s) into ${chunks.length} chunk(s) (maxTokens=${cfg.chunking.maxTokens}, overlap=${cfg.chunking.overlap})`,
        cfg.debug
    );

    return {
        content: contentFromMarkup(renderChunks(chunks), kind),
        chunks,
        warnings,
    };
}

/**
 * Wrap the first occurrence of each glossary term per text node and
 * describe the glossary as a DefinedTermSet
 */
export function annotateTerms(
    content: ContentInput,
    glossary: Glossary,
    options: { debug?: boolean } = {}
): AnnotationResult {
    const logger = Logger.getInstance();
    const entries = glossaryEntries(glossary);
    const schema = schemaFor({ kind: "glossary", glossary });
    validateContent(content);

    if (entries.length === 0 || isEmptyContent(content)) {
        return { content, schema, annotatedCount: 0 };
    }

    const loaded = logger.time("annotate: load", () => loadContent(content));
    const annotatedCount = logger.time("annotate: wrap terms", () => annotateDocument(loaded.$, entries));
    logger.debug(`Wrapped ${annotatedCount} term occurrence(s)`, options.debug ?? false);

    return { content: toContent(loaded), schema, annotatedCount };
}

/**
 * Resolve citation markers to numbered references.
 *
 * Without `citationId`, every marker id is resolved in document order, then
 * every remaining record in list order (inserting its marker), and a
 * references section is appended. Unknown ids fail before anything changes.
 */
export function citeContent(
    content: ContentInput,
    records: CitationRecord[],
    options: CiteOptions = {}
): CitationResult {
    const logger = Logger.getInstance();
    const registry = options.registry ?? new CitationRegistry();
    validateRecords(records);
    validateContent(content);

    if (options.citationId !== undefined) {
        const resolvedContent = registry.resolve(content, options.citationId, records);
        const { entries, schema } = registry.bibliography();
        return { content: resolvedContent, schema, bibliography: entries, registry };
    }

    if (records.length === 0) {
        const { entries, schema } = registry.bibliography();
        return { content, schema, bibliography: entries, registry };
    }

    const loaded = logger.time("cite: load", () => loadContent(content));
    const { $ } = loaded;

    const inDocument = markerIds($);
    const order = [
        ...inDocument,
        ...records.map(r => String(r.id)).filter(id => !inDocument.includes(id)),
    ];
    // Every id must resolve before the registry is touched
    const resolved = order.map(id => findRecord(records, id));

    logger.time("cite: resolve markers", () => {
        for (const record of resolved) {
            registry.resolveIn($, record);
        }
    });

    const { entries, schema } = registry.bibliography();
    referencesTarget($).append(renderReferences(entries));
    logger.debug(`Resolved ${resolved.length} citation(s), bibliography has ${entries.length}`, options.debug ?? false);

    return { content: toContent(loaded), schema, bibliography: entries, registry };
}

/**
 * Attach hidden LLM context to an element. The visible content is unchanged.
 */
export function wrapWithContext(content: ContentInput, options: ContextBlockOptions): EnrichmentResult {
    const context = options.context.trim();
    if (context.length === 0) {
        throw new ConfigurationError("Invalid context options: context must not be empty", ["context: must not be empty"]);
    }
    const cfg = mergeConfig({
        context: {
            ...(options.role !== undefined && { role: options.role }),
            ...(options.schemaType !== undefined && { schemaType: options.schemaType }),
        },
    });
    validateContent(content);

    return {
        content,
        schema: schemaFor({
            kind: "context",
            context,
            role: cfg.context.role,
            schemaType: cfg.context.schemaType,
            dateCreated: isoSeconds(options.now ?? new Date()),
        }),
    };
}

/**
 * Render an article with microdata and its Article document
 */
export function buildArticle(article: ArticleInput): EnrichmentResult {
    const sections = article.sections.map(section => ({
        heading: section.heading,
        html: contentToMarkup(section.content),
        ...(section.level !== undefined && { level: section.level }),
    }));

    return {
        content: { kind: "html", html: renderArticle(article.title, sections) },
        schema: schemaFor({
            kind: "article",
            title: article.title,
            sections: article.sections,
            ...(article.metadata !== undefined && { metadata: article.metadata }),
        }),
    };
}

/**
 * Render question/answer pairs and their FAQPage document
 */
export function buildFaq(pairs: QaPair[]): EnrichmentResult {
    return {
        content: { kind: "html", html: renderFaq(pairs) },
        schema: schemaFor({ kind: "faq", pairs }),
    };
}

/**
 * Describe content with a free-form schema.org type; the content is unchanged
 */
export function describeContent(content: ContentInput, options: DescribeOptions): EnrichmentResult {
    validateContent(content);
    return {
        content,
        schema: schemaFor({
            kind: "generic",
            schemaType: options.schemaType,
            ...(options.description !== undefined && { description: options.description }),
            ...(options.properties !== undefined && { properties: options.properties }),
        }),
    };
}
