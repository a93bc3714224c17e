import { ConfigurationError } from "../errors";

export const COMMANDS = ["chunk", "annotate", "cite", "density"] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliOptions {
    command: Command | "help";
    file: string;
    maxTokens?: number;
    overlap?: number;
    glossaryFile?: string;
    citationsFile?: string;
    timing: boolean;
    debug: boolean;
}

function isCommand(value: string): value is Command {
    return (COMMANDS as readonly string[]).includes(value);
}

function parseInteger(flag: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new ConfigurationError(`${flag} expects an integer, got "${value}"`, [`${flag}: not an integer`]);
    }
    return parsed;
}

/**
 * Parse CLI arguments (without the node and script entries)
 */
export function parseArgs(argv: string[]): CliOptions {
    // Filter out standalone "--" which npm passes through
    const args = argv.filter(a => a !== "--");
    const [first] = args;

    if (first === undefined || first === "help" || first === "--help" || first === "-h") {
        return { command: "help", file: "", timing: false, debug: false };
    }
    if (!isCommand(first)) {
        throw new ConfigurationError(`Unknown command "${first}"`, [`command: expected one of ${COMMANDS.join(", ")}`]);
    }

    const options: CliOptions = { command: first, file: "", timing: false, debug: false };

    for (let i = 1; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];

        if ((arg === "--file" || arg === "-f") && nextArg !== undefined) {
            options.file = nextArg;
            i++;
        } else if (arg === "--max-tokens" && nextArg !== undefined) {
            options.maxTokens = parseInteger(arg, nextArg);
            i++;
        } else if (arg === "--overlap" && nextArg !== undefined) {
            options.overlap = parseInteger(arg, nextArg);
            i++;
        } else if ((arg === "--glossary" || arg === "-g") && nextArg !== undefined) {
            options.glossaryFile = nextArg;
            i++;
        } else if ((arg === "--citations" || arg === "-c") && nextArg !== undefined) {
            options.citationsFile = nextArg;
            i++;
        } else if (arg === "--timing" || arg === "-t") {
            options.timing = true;
        } else if (arg === "--debug") {
            options.debug = true;
        } else if (arg === "--help" || arg === "-h") {
            return { ...options, command: "help" };
        }
    }

    if (options.file === "") {
        throw new ConfigurationError(`${first} requires --file`, ["file: missing"]);
    }
    if (first === "annotate" && options.glossaryFile === undefined) {
        throw new ConfigurationError("annotate requires --glossary", ["glossary: missing"]);
    }
    if (first === "cite" && options.citationsFile === undefined) {
        throw new ConfigurationError("cite requires --citations", ["citations: missing"]);
    }

    return options;
}
