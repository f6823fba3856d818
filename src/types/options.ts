/**
 * Verbosity level for console output.
 * 'detailed' also reports duplicate instances during normalization.
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

export interface GenerateConfig {
    schemaPath: string;
    instancesPath: string;
    outputPath: string;
    probability: number;
    /** Omitted for non-reproducible draws */
    seed?: number;
    /** Omitted to treat every relation as many-to-many */
    policyPath?: string;
    verbosity: Verbosity;
}

export interface NormalizeConfig {
    inputPath: string;
    outDir: string;
    verbosity: Verbosity;
}

export const DEFAULTS = {
    schemaPath: 'input/schema.txt',
    instancesPath: 'input/instances.json',
    outputPath: 'generated_kg.json',
    probability: 0.5,
    seed: 42,
    policyPath: 'input/policy.json',
    outDir: 'output',
    verbosity: 'standard',
} as const;
