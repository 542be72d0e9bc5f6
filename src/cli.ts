import { convert, translate } from "./index";
import { MalformedInputError } from "./tagged-tokenizer";
import { RecursionLimitExceededError } from "./mathcad-parser";

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
}

export const USAGE = 'Usage: mathcad2tex [--raw] [--strict] [--max-depth N] <expression...>';

interface CliArgs {
    raw: boolean;
    strict: boolean;
    maxDepth: number | undefined;
    help: boolean;
    expression: string;
}

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function parse_args(argv: string[]): CliArgs {
    const args: CliArgs = { raw: false, strict: false, maxDepth: undefined, help: false, expression: '' };
    const words: string[] = [];
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '--raw':
                args.raw = true;
                break;
            case '--strict':
                args.strict = true;
                break;
            case '-h':
            case '--help':
                args.help = true;
                break;
            case '--max-depth': {
                const value = argv[i + 1];
                const depth = value === undefined ? NaN : Number(value);
                if (!Number.isInteger(depth) || depth < 1) {
                    throw new UsageError(`--max-depth expects a positive integer, got ${value ?? 'nothing'}`);
                }
                args.maxDepth = depth;
                i++;
                break;
            }
            default:
                if (arg.startsWith('--')) {
                    throw new UsageError(`Unknown option ${arg}`);
                }
                words.push(arg);
        }
    }
    args.expression = words.join(' ');
    return args;
}

/**
 * Returns the process exit code: 0 on success, 1 when the input cannot be
 * translated, 2 on bad usage.
 */
export function run_cli(argv: string[], io: CliIO): number {
    let args: CliArgs;
    try {
        args = parse_args(argv);
    } catch (e) {
        if (e instanceof UsageError) {
            io.err(e.message);
            io.err(USAGE);
            return 2;
        }
        throw e;
    }
    if (args.help) {
        io.out(USAGE);
        return 0;
    }
    if (args.expression.trim() === '') {
        io.err(USAGE);
        return 2;
    }

    const options = { strict: args.strict, maxDepth: args.maxDepth };
    try {
        io.out(args.raw ? translate(args.expression, options) : convert(args.expression, options));
        return 0;
    } catch (e) {
        if (e instanceof MalformedInputError || e instanceof RecursionLimitExceededError) {
            io.err(`${e.name}: ${e.message}`);
            return 1;
        }
        throw e;
    }
}
