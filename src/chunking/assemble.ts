import type { Block, Chunk } from "../types";
import { chunkOptionsSchema, parseWith, type ChunkOptions } from "../config";
import Logger from "../utils/logger";

export interface ChunkAssembly {
    chunks: Chunk[];
    warnings: string[];
}

/**
 * Sum the estimated token cost of a run of blocks
 */
export function sumTokens(blocks: Block[]): number {
    return blocks.reduce((sum, block) => sum + block.tokens, 0);
}

function createChunk(index: number, blocks: Block[], carried: number): Chunk {
    return {
        index,
        blocks,
        carried,
        tokenCount: sumTokens(blocks),
    };
}

/**
 * Pack blocks into token-bounded chunks, greedy and in order.
 *
 * When the next block would push the running total past maxTokens, the
 * current chunk is closed and the next one is seeded with its last `overlap`
 * blocks. The incoming block is then appended even if it alone exceeds the
 * limit: blocks are never split or dropped, and no chunk is ever empty.
 */
export function assembleChunks(blocks: Block[], options: ChunkOptions): ChunkAssembly {
    const { maxTokens, overlap } = parseWith(chunkOptionsSchema, options, "chunking options");
    const logger = Logger.getInstance();

    const chunks: Chunk[] = [];
    const warnings: string[] = [];
    let current: Block[] = [];
    let carried = 0;
    let runningTokens = 0;

    for (const block of blocks) {
        if (current.length > 0 && runningTokens + block.tokens > maxTokens) {
            chunks.push(createChunk(chunks.length, current, carried));

            if (overlap > 0 && overlap >= current.length) {
                const warning = `Chunk ${chunks.length - 1} has ${current.length} block(s) and overlap is ${overlap}: the whole chunk is carried into the next one`;
                warnings.push(warning);
                logger.warn(warning);
            }

            const carry = overlap > 0 ? current.slice(-overlap) : [];
            current = [...carry];
            carried = carry.length;
            runningTokens = sumTokens(carry);
        }

        current.push(block);
        runningTokens += block.tokens;
    }

    if (current.length > 0) {
        chunks.push(createChunk(chunks.length, current, carried));
    }

    return { chunks, warnings };
}

/**
 * Blocks that first appear in a chunk, i.e. everything after the carried prefix
 */
export function freshBlocks(chunk: Chunk): Block[] {
    return chunk.blocks.slice(chunk.carried);
}
