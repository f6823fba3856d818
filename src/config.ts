/**
 * Configuration resolution: DEFAULTS, then environment, then CLI flags.
 */
import { z } from 'zod';
import { DEFAULTS, GenerateConfig, NormalizeConfig } from './types/options.js';
import { createInvalidConfigError } from './types/errors.js';

export type Env = Record<string, string | undefined>;

/** Flag name -> raw value; `true` for bare flags */
export type Flags = Record<string, string | boolean>;

const verbositySchema = z.enum(['minimal', 'standard', 'detailed']);

const generateSchema = z.object({
    schemaPath: z.string().min(1),
    instancesPath: z.string().min(1),
    outputPath: z.string().min(1),
    probability: z.number().min(0).max(1),
    seed: z.number().int().min(-(2 ** 31)).max(2 ** 32 - 1).optional(),
    policyPath: z.string().min(1).optional(),
    verbosity: verbositySchema,
});

const normalizeSchema = z.object({
    inputPath: z.string().min(1),
    outDir: z.string().min(1),
    verbosity: verbositySchema,
});

function stringFlag(flags: Flags, name: string): string | undefined {
    const value = flags[name];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw createInvalidConfigError(`Option --${name} requires a value`, { option: name });
    }
    return value;
}

function toNumber(raw: string, name: string): number {
    const value = raw.trim() === '' ? NaN : Number(raw);
    if (Number.isNaN(value)) {
        throw createInvalidConfigError(`${name} must be a number, got '${raw}'`, { [name]: raw });
    }
    return value;
}

function resolveVerbosity(flags: Flags, env: Env): string {
    if (flags.verbose === true) return 'detailed';
    return stringFlag(flags, 'verbosity') ?? env.KGSYNTH_VERBOSITY ?? DEFAULTS.verbosity;
}

function resolveSeed(flags: Flags, env: Env): number | undefined {
    if (flags['no-seed'] === true) return undefined;
    const raw = stringFlag(flags, 'seed') ?? env.KGSYNTH_SEED;
    if (raw === undefined) return DEFAULTS.seed;
    if (raw.trim().toLowerCase() === 'none') return undefined;
    return toNumber(raw, 'seed');
}

function resolvePolicyPath(flags: Flags, env: Env): string | undefined {
    if (flags['no-policy'] === true) return undefined;
    const raw = stringFlag(flags, 'policy') ?? env.KGSYNTH_POLICY;
    if (raw === undefined) return DEFAULTS.policyPath;
    if (raw.trim().toLowerCase() === 'none') return undefined;
    return raw;
}

function validate<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw createInvalidConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
    }
    return result.data;
}

export function resolveGenerateConfig(flags: Flags = {}, env: Env = {}): GenerateConfig {
    const probability = stringFlag(flags, 'probability') ?? env.KGSYNTH_PROBABILITY;
    return validate(generateSchema, {
        schemaPath: stringFlag(flags, 'schema') ?? env.KGSYNTH_SCHEMA ?? DEFAULTS.schemaPath,
        instancesPath: stringFlag(flags, 'instances') ?? env.KGSYNTH_INSTANCES ?? DEFAULTS.instancesPath,
        outputPath: stringFlag(flags, 'output') ?? env.KGSYNTH_OUTPUT ?? DEFAULTS.outputPath,
        probability: probability === undefined ? DEFAULTS.probability : toNumber(probability, 'probability'),
        seed: resolveSeed(flags, env),
        policyPath: resolvePolicyPath(flags, env),
        verbosity: resolveVerbosity(flags, env),
    });
}

export function resolveNormalizeConfig(
    inputPath: string | undefined,
    flags: Flags = {},
    env: Env = {}
): NormalizeConfig {
    if (!inputPath) {
        throw createInvalidConfigError('normalize requires an input file argument');
    }
    return validate(normalizeSchema, {
        inputPath,
        outDir: stringFlag(flags, 'out-dir') ?? env.KGSYNTH_OUT_DIR ?? DEFAULTS.outDir,
        verbosity: resolveVerbosity(flags, env),
    });
}
