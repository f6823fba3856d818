#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import boxen from 'boxen';
import ora from 'ora';
import { parseCliArgs } from './cli/args.js';
import { resolveGenerateConfig, resolveNormalizeConfig } from './config.js';
import { createConsoleLogger } from './logger.js';
import { runGenerate, runNormalize, RunHooks } from './pipeline.js';
import { exitCodeFor, GraphException } from './types/errors.js';
import type { Verbosity } from './types/options.js';

const VERSION = '0.3.0';
const HELP = `
kgsynth v${VERSION}

Usage:
  kgsynth generate [options]            Expand a relation schema into a graph
  kgsynth normalize <graph.json>        Derive identifier tables and type index

Generate options:
  --schema=<path>       Relation schema, one (Subj,pred,Obj) per line
  --instances=<path>    Instance catalog JSON
  --output=<path>       Generated graph JSON
  --probability=<p>     Connection probability in [0, 1]
  --seed=<n>            Seed for reproducible draws (default 42)
  --no-seed             Non-reproducible draws
  --policy=<path>       Cardinality policy JSON {"uniqueObject": [...], "uniqueSubject": [...]}
                        (default input/policy.json)
  --no-policy           Treat every relation as many-to-many

Normalize options:
  --out-dir=<dir>       Directory for the five output files (default output)

Common options:
  --verbosity=<level>   minimal, standard or detailed
  --verbose, -V         Same as --verbosity=detailed; reports duplicate instances
  --help, -h            Show this help
  --version, -v         Show version

Environment variables (also read from .env):
  KGSYNTH_SCHEMA, KGSYNTH_INSTANCES, KGSYNTH_OUTPUT, KGSYNTH_PROBABILITY,
  KGSYNTH_SEED, KGSYNTH_POLICY, KGSYNTH_OUT_DIR, KGSYNTH_VERBOSITY
`;

function spinnerHooks(verbosity: Verbosity): RunHooks {
    if (verbosity === 'minimal') return {};
    return {
        writing: (label, write) => {
            const spinner = ora(label).start();
            try {
                const result = write();
                spinner.succeed();
                return result;
            } catch (e) {
                spinner.fail();
                throw e;
            }
        },
    };
}

function summary(title: string, rows: Array<[string, number]>): string {
    const body = rows.map(([name, value]) => `${name.padEnd(16)}${chalk.bold(String(value))}`).join('\n');
    return boxen(`${chalk.bold(title)}\n\n${body}`, { padding: 1, borderColor: 'green' });
}

function main(): number {
    const { command, positionals, flags } = parseCliArgs(process.argv.slice(2));

    if (flags.version === true) {
        console.log(VERSION);
        return 0;
    }
    if (flags.help === true || !command) {
        console.log(HELP);
        return 0;
    }

    switch (command) {
        case 'generate': {
            const config = resolveGenerateConfig(flags, process.env);
            const logger = createConsoleLogger(config.verbosity);
            const { stats } = runGenerate(config, logger, spinnerHooks(config.verbosity));
            if (config.verbosity !== 'minimal') {
                console.log(summary('Graph generated', [
                    ['Relations', stats.relations],
                    ['Generated', stats.generated],
                    ['Skipped', stats.skipped],
                    ['Edges', stats.edges],
                ]));
            }
            return 0;
        }
        case 'normalize': {
            const config = resolveNormalizeConfig(positionals[0], flags, process.env);
            const logger = createConsoleLogger(config.verbosity);
            const { stats } = runNormalize(config, logger, spinnerHooks(config.verbosity));
            if (config.verbosity !== 'minimal') {
                console.log(summary('Graph normalized', [
                    ['Relations', stats.relations],
                    ['Edges', stats.edges],
                    ['Skipped keys', stats.skippedKeys],
                    ['Skipped edges', stats.skippedEdges],
                    ['Duplicates', stats.duplicates],
                ]));
            }
            return 0;
        }
        default:
            console.error(chalk.red(`Unknown command: ${command}`));
            console.log(HELP);
            return 64;
    }
}

try {
    process.exitCode = main();
} catch (e) {
    if (e instanceof GraphException) {
        console.error(chalk.red(`Error: ${e.message}`));
        if (e.error.suggestion) console.error(chalk.dim(`  ${e.error.suggestion}`));
        process.exitCode = exitCodeFor(e.code);
    } else {
        console.error(chalk.red('Error:'), e instanceof Error ? e.message : e);
        process.exitCode = 1;
    }
}
