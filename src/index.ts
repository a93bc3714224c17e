export * from "./types";
export * from "./errors";
export { DEFAULT_CONFIG, mergeConfig, type ChunkOptions, type ContextOptions, type EnrichConfig, type ResolvedConfig } from "./config";
export {
    chunkContent,
    annotateTerms,
    citeContent,
    wrapWithContext,
    buildArticle,
    buildFaq,
    describeContent,
    type EnrichmentResult,
    type ChunkResult,
    type AnnotationResult,
    type CitationResult,
    type CiteOptions,
    type ContextBlockOptions,
    type ArticleInput,
    type DescribeOptions,
} from "./pipeline";
export { loadContent, toContent, contentToMarkup, validateContent, type LoadedContent } from "./preprocessing/load";
export { extractBlocks, BLOCK_SELECTOR } from "./preprocessing/segment";
export { estimateTokens, informationDensity } from "./preprocessing/tokenize";
export { assembleChunks, freshBlocks, type ChunkAssembly } from "./chunking/assemble";
export { annotateDocument, splitTextNode, glossaryEntries, TERM_CLASS } from "./annotation/terms";
export { CitationRegistry, MARKER_CLASS, CITATION_REF_CLASS } from "./citation/registry";
export { renderBibliography, formatCitation, type Bibliography } from "./citation/bibliography";
export { schemaFor, renderJsonLd, SCHEMA_CONTEXT, type SchemaRequest } from "./schema/emitter";
export { renderChunks, renderReferences } from "./output/render";
export { default as Logger } from "./utils/logger";
