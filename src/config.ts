import { z } from "zod";
import { ConfigurationError } from "./errors";

export interface ChunkOptions {
    maxTokens: number;
    overlap: number; // measured in blocks, not tokens
}

export interface ContextOptions {
    role: string;
    schemaType: string;
}

export interface EnrichConfig {
    chunking?: Partial<ChunkOptions>;
    context?: Partial<ContextOptions>;
    debug?: boolean;
}

export interface ResolvedConfig {
    chunking: ChunkOptions;
    context: ContextOptions;
    debug: boolean;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
    chunking: {
        maxTokens: 500,
        overlap: 50,
    },
    context: {
        role: "summary",
        schemaType: "WebPageElement",
    },
    debug: false,
};

export const chunkOptionsSchema = z.object({
    maxTokens: z.number().int().positive(),
    overlap: z.number().int().nonnegative(),
});

export const contextOptionsSchema = z.object({
    role: z.string().min(1),
    schemaType: z.string().min(1),
});

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
}

/**
 * Validate a value against a schema, turning failures into ConfigurationError
 */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ConfigurationError(`Invalid ${label}: ${issues.join("; ")}`, issues);
    }
    return result.data;
}

/**
 * Merge caller overrides over the defaults and validate the result
 */
export function mergeConfig(overrides: EnrichConfig = {}): ResolvedConfig {
    return {
        chunking: parseWith(
            chunkOptionsSchema,
            { ...DEFAULT_CONFIG.chunking, ...overrides.chunking },
            "chunking options"
        ),
        context: parseWith(
            contextOptionsSchema,
            { ...DEFAULT_CONFIG.context, ...overrides.context },
            "context options"
        ),
        debug: overrides.debug ?? DEFAULT_CONFIG.debug,
    };
}
