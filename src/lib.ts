/**
 * kgsynth - Library Entry Point
 *
 * Exports the generator, normalizer and their helpers for use in other
 * projects. This file does not touch the console or process state.
 */

// Generator
export { generateGraph, graphToJson } from './generator/generator.js';
export type { GenerateOptions, GenerationStats, GenerationResult } from './generator/generator.js';
export { createCardinalityPolicy } from './generator/policy.js';
export type { CardinalityConfig, CardinalityPolicy } from './generator/policy.js';

// Normalizer
export { normalizeGraph, normalizedToJson } from './normalizer/normalizer.js';
export type {
    NormalizeOptions,
    NormalizationStats,
    NormalizedGraph,
    NormalizedDocuments,
} from './normalizer/normalizer.js';

// Parsing
export * from './parser/index.js';

// Identifiers and randomness
export { contentHashId, IdentifierTable } from './utils/identifiers.js';
export { mulberry32, createRandomSource, pick } from './utils/random.js';
export type { RandomSource } from './utils/random.js';

// File pipelines
export { runGenerate, runNormalize } from './pipeline.js';
export type { GenerateRunResult, NormalizeRunResult, RunHooks } from './pipeline.js';
export { readJsonFile, writeJsonFile, readTextFile } from './io/files.js';
export { resolveGenerateConfig, resolveNormalizeConfig } from './config.js';
export { createConsoleLogger, createMemoryLogger } from './logger.js';
export type { Logger, MemoryLogger, LogEntry, LogLevel } from './logger.js';

// Types and Interfaces
export * from './types/index.js';

// Constants
export { DEFAULTS } from './types/options.js';
