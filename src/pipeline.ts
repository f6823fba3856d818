/**
 * File-to-file runs of the generator and the normalizer.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { GenerateConfig, NormalizeConfig } from './types/options.js';
import type { DiagnosticHandler } from './types/graph.js';
import { createEmptySchemaError, createFileNotFoundError } from './types/errors.js';
import type { Logger } from './logger.js';
import { readSchema } from './parser/schema.js';
import { createCardinalityPolicy } from './generator/policy.js';
import { generateGraph, graphToJson, GenerationStats } from './generator/generator.js';
import { normalizeGraph, normalizedToJson, NormalizationStats } from './normalizer/normalizer.js';
import {
    CardinalityConfigSchema,
    GraphDocumentSchema,
    InstanceCatalogSchema,
    readJsonFile,
    writeJsonFile,
} from './io/files.js';

export interface GenerateRunResult {
    outputPath: string;
    stats: GenerationStats;
}

export interface NormalizeRunResult {
    files: string[];
    stats: NormalizationStats;
}

export interface RunHooks {
    /** Wraps the output-writing phase, e.g. with a spinner */
    writing?: <T>(label: string, write: () => T) => T;
}

const direct = <T>(_label: string, write: () => T): T => write();

function diagnosticsTo(logger: Logger): DiagnosticHandler {
    return (diagnostic) => {
        if (diagnostic.code === 'DUPLICATE_INSTANCE') {
            logger.debug(diagnostic.message);
        } else {
            logger.warn(diagnostic.message);
        }
    };
}

export function runGenerate(config: GenerateConfig, logger: Logger, hooks: RunHooks = {}): GenerateRunResult {
    if (!fs.existsSync(config.schemaPath)) {
        throw createFileNotFoundError(config.schemaPath, 'Schema');
    }
    if (!fs.existsSync(config.instancesPath)) {
        throw createFileNotFoundError(config.instancesPath, 'Instances');
    }

    const onDiagnostic = diagnosticsTo(logger);
    const policy = createCardinalityPolicy(
        config.policyPath ? readJsonFile(config.policyPath, CardinalityConfigSchema, 'Policy') : {}
    );

    const schema = readSchema(config.schemaPath, { onDiagnostic });
    if (schema.length === 0) {
        throw createEmptySchemaError(config.schemaPath);
    }
    const catalog = readJsonFile(config.instancesPath, InstanceCatalogSchema, 'Instances');

    const { graph, stats } = generateGraph(schema, catalog, {
        probability: config.probability,
        seed: config.seed,
        policy,
        onDiagnostic,
    });
    const doc = graphToJson(graph);

    const writing = hooks.writing ?? direct;
    writing(`Writing ${config.outputPath}`, () => writeJsonFile(config.outputPath, doc));
    logger.success(`Successfully generated KG at ${config.outputPath} with probability ${config.probability}`);

    return { outputPath: config.outputPath, stats };
}

export function runNormalize(config: NormalizeConfig, logger: Logger, hooks: RunHooks = {}): NormalizeRunResult {
    const graph = readJsonFile(config.inputPath, GraphDocumentSchema, 'Graph');
    const normalized = normalizeGraph(graph, {
        reportDuplicates: config.verbosity === 'detailed',
        onDiagnostic: diagnosticsTo(logger),
    });
    const documents = normalizedToJson(normalized);

    const writing = hooks.writing ?? direct;
    const files = writing('Writing output files...', () => {
        const written: string[] = [];
        for (const [name, document] of Object.entries(documents)) {
            const filePath = path.join(config.outDir, name);
            writeJsonFile(filePath, document);
            logger.info(`Created ${filePath}`);
            written.push(filePath);
        }
        return written;
    });
    logger.success('Processing complete.');

    return { files, stats: normalized.stats };
}
