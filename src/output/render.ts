import * as cheerio from "cheerio";
import type { BibliographyEntry, Chunk, QaPair } from "../types";
import { sectionHeadingTag } from "../utils/shared";

export const CHUNK_CONTAINER_CLASS = "optimized-content chunked-view";
export const CHUNK_CLASS = "content-chunk";

export interface RenderedSection {
    heading: string;
    html: string;
    level?: number;
}

function fragment(): cheerio.CheerioAPI {
    return cheerio.load("", null, false);
}

/**
 * One container div holding a div per chunk, each chunk carrying its block markup
 */
export function renderChunks(chunks: Chunk[]): string {
    const $ = fragment();
    const $container = $("<div></div>").attr("class", CHUNK_CONTAINER_CLASS);

    for (const chunk of chunks) {
        const $chunk = $("<div></div>")
            .attr("class", CHUNK_CLASS)
            .attr("data-chunk-id", String(chunk.index));
        $chunk.html(chunk.blocks.map(block => block.html).join(""));
        $container.append($chunk);
    }

    $.root().append($container);
    return $.html();
}

/**
 * References section: heading plus an ordered list of formatted entries
 */
export function renderReferences(entries: BibliographyEntry[]): string {
    const $ = fragment();
    const $section = $("<section></section>").attr("id", "references").attr("class", "references");
    $section.append($("<h2></h2>").text("References"));

    const $list = $("<ol></ol>");
    for (const entry of entries) {
        const $item = $("<li></li>").attr("id", `ref-${entry.number}`);
        if (entry.url !== undefined) {
            $item.text(`${entry.text} `);
            $item.append($("<a></a>").attr("href", entry.url).text(entry.url));
        } else {
            $item.text(entry.text);
        }
        $list.append($item);
    }
    $section.append($list);

    $.root().append($section);
    return $.html();
}

/**
 * Article markup with microdata: page title, then a heading and body div per section
 */
export function renderArticle(title: string, sections: RenderedSection[]): string {
    const $ = fragment();
    const $article = $("<article></article>")
        .attr("itemscope", "")
        .attr("itemtype", "https://schema.org/Article");
    $article.append($("<h1></h1>").text(title));

    for (const section of sections) {
        const tag = sectionHeadingTag(section.level);
        $article.append($(`<${tag}></${tag}>`).text(section.heading));
        $article.append($("<div></div>").attr("itemprop", "articleBody").html(section.html));
    }

    $.root().append($article);
    return $.html();
}

/**
 * FAQ markup: one item per question with its answer below
 */
export function renderFaq(pairs: QaPair[]): string {
    const $ = fragment();
    const $section = $("<section></section>").attr("class", "faq");

    for (const { question, answer } of pairs) {
        const $item = $("<div></div>").attr("class", "faq-item");
        $item.append($("<h3></h3>").text(question));
        $item.append($("<div></div>").attr("class", "faq-answer").text(answer));
        $section.append($item);
    }

    $.root().append($section);
    return $.html();
}
