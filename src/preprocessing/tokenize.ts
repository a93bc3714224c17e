/**
 * Token cost approximation.
 *
 * One policy everywhere: a token is a whitespace-separated word, and every
 * span costs at least 1 so the chunk packer always makes progress. This is
 * not aligned with any model tokenizer.
 */

/**
 * Split text on runs of whitespace, dropping the empty edges
 */
export function splitWords(text: string): string[] {
    const trimmed = text.trim();
    if (trimmed.length === 0) return [];
    return trimmed.split(/\s+/);
}

/**
 * Estimated token cost of a text span (always >= 1)
 */
export function estimateTokens(text: string): number {
    return Math.max(1, splitWords(text).length);
}

/**
 * Shannon entropy, in bits, of the word distribution of a text.
 * Repetitive text scores low; 0 for empty or single-word text.
 */
export function informationDensity(text: string): number {
    const words = splitWords(text);
    if (words.length === 0) return 0;

    const counts = new Map<string, number>();
    for (const word of words) {
        counts.set(word, (counts.get(word) ?? 0) + 1);
    }

    let entropy = 0;
    for (const count of counts.values()) {
        const p = count / words.length;
        entropy -= p * Math.log2(p);
    }
    return entropy;
}
