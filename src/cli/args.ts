import type { Flags } from '../config.js';

export interface ParsedArgs {
    command?: string;
    positionals: string[];
    flags: Flags;
}

/** Flags that never take a value */
const BOOLEAN_FLAGS = new Set(['help', 'version', 'verbose', 'no-seed', 'no-policy']);

const NEGATIVE_NUMBER = /^-\d/;

const SHORT_FLAGS = new Map<string, string>([
    ['-h', 'help'],
    ['-v', 'version'],
    ['-V', 'verbose'],
]);

/**
 * Split argv into a command, positionals and flags.
 * Accepts `--name=value`, `--name value` and the short aliases. A separate
 * value may be a negative number (`--seed -5`).
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const flags: Flags = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const short = SHORT_FLAGS.get(arg);
        if (short) {
            flags[short] = true;
        } else if (arg.startsWith('--')) {
            const eq = arg.indexOf('=');
            if (eq !== -1) {
                flags[arg.slice(2, eq)] = arg.slice(eq + 1);
                continue;
            }
            const name = arg.slice(2);
            const next = argv[i + 1];
            const takesNext = next !== undefined && (!next.startsWith('-') || NEGATIVE_NUMBER.test(next));
            if (!BOOLEAN_FLAGS.has(name) && takesNext) {
                flags[name] = next;
                i++;
            } else {
                flags[name] = true;
            }
        } else {
            positionals.push(arg);
        }
    }

    const [command, ...rest] = positionals;
    return { command, positionals: rest, flags };
}
