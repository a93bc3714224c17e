import type { AnyNode } from "domhandler";

/**
 * Content handed to the engine. Markup is parsed once at the entry boundary;
 * a tree is deep-cloned before any pass touches it.
 */
export type ContentInput =
    | { kind: "html"; html: string }
    | { kind: "tree"; nodes: AnyNode[] };

export type ContentKind = ContentInput["kind"];

export type BlockType = "h1" | "h2" | "h3" | "h4" | "h5" | "h6" | "p" | "li" | "blockquote";

export interface Block {
    type: BlockType;
    text: string; // whitespace-collapsed rendered text
    html: string; // outer markup of the element
    tokens: number;
    index: number;
}

export interface Chunk {
    index: number;
    blocks: Block[];
    carried: number; // leading blocks copied from the previous chunk
    tokenCount: number;
}

/** Term to definition. A Map keeps insertion order for every key shape. */
export type Glossary = Map<string, string> | Record<string, string>;

export type GlossaryEntry = readonly [term: string, definition: string];

export type CitationId = string | number;

export interface CitationRecord {
    id: CitationId;
    title: string;
    authors?: string[];
    publisher?: string;
    date?: string;
    url?: string;
}

export interface BibliographyEntry {
    number: number;
    id: CitationId;
    text: string;
    url?: string;
}

export interface ArticleSection {
    heading: string;
    content: ContentInput;
    level?: number;
}

export interface QaPair {
    question: string;
    answer: string;
}

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export interface SchemaFields {
    [key: string]: JsonValue;
}

/**
 * schema.org JSON-LD document. Built fresh per call and frozen.
 */
export interface SchemaDocument extends SchemaFields {
    "@context": "https://schema.org";
    "@type": string;
}
