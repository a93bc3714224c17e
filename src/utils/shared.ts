/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// Tag utilities
// =============================================================================

/** Regex pattern to match heading tags (h1-h6) */
export const HEADING_PATTERN = /^h[1-6]$/;

/** Check if a tag name is a heading */
export function isHeadingTag(tag: string): boolean {
    return HEADING_PATTERN.test(tag);
}

/** Clamp a requested heading level into the h2-h6 range used below a page title */
export function sectionHeadingTag(level: number | undefined): string {
    const requested = level ?? 2;
    const clamped = Math.min(6, Math.max(2, Math.trunc(requested)));
    return `h${clamped}`;
}

/** Space-separated class list of an attribute value */
export function hasClass(classAttr: string | undefined, className: string): boolean {
    if (classAttr === undefined) return false;
    return classAttr.split(/\s+/).includes(className);
}

// =============================================================================
// String utilities
// =============================================================================

/**
 * Normalize whitespace in text: collapse multiple spaces to single, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}
