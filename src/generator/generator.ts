/**
 * Schema-driven graph generator
 *
 * Expands each relation of a schema into concrete edges, honoring the
 * relation's cardinality mode and a connection probability. Draws are
 * consumed in a fixed order (one per object, subject or pair, in catalog
 * order), so a fixed seed reproduces the same graph.
 */
import type {
    DiagnosticHandler,
    Edge,
    GeneratedGraph,
    GraphDocument,
    InstanceCatalog,
    Relation,
} from '../types/graph.js';
import { createInvalidConfigError, unknownType } from '../types/errors.js';
import { formatTriple, relationKey } from '../parser/triple.js';
import { createRandomSource, pick, RandomSource } from '../utils/random.js';
import { CardinalityPolicy, createCardinalityPolicy } from './policy.js';

export interface GenerateOptions {
    /** Probability in [0, 1] that an eligible object, subject or pair is connected */
    probability: number;
    /** 32-bit integer seed; omitted means non-reproducible draws */
    seed?: number;
    /** Overrides `seed` when given */
    random?: RandomSource;
    policy?: CardinalityPolicy;
    onDiagnostic?: DiagnosticHandler;
}

export interface GenerationStats {
    relations: number;
    generated: number;
    skipped: number;
    edges: number;
}

export interface GenerationResult {
    graph: GeneratedGraph;
    stats: GenerationStats;
}

function validateOptions(options: GenerateOptions): void {
    const { probability, seed } = options;
    if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
        throw createInvalidConfigError(`Probability must be within [0, 1], got ${probability}`, { probability });
    }
    if (seed !== undefined && (!Number.isInteger(seed) || seed < -(2 ** 31) || seed >= 2 ** 32)) {
        throw createInvalidConfigError(`Seed must be a 32-bit integer, got ${seed}`, { seed });
    }
}

function edge(subject: string, predicate: string, object: string): Edge {
    return { subject, predicate, object };
}

/**
 * Each object connects to at most one randomly chosen subject.
 */
function uniqueObjectEdges(
    predicate: string, subjects: string[], objects: string[], p: number, random: RandomSource
): Edge[] {
    const edges: Edge[] = [];
    for (const o of objects) {
        if (random() < p) {
            const s = pick(random, subjects);
            if (s !== undefined) edges.push(edge(s, predicate, o));
        }
    }
    return edges;
}

/**
 * Each subject connects to at most one randomly chosen object.
 */
function uniqueSubjectEdges(
    predicate: string, subjects: string[], objects: string[], p: number, random: RandomSource
): Edge[] {
    const edges: Edge[] = [];
    for (const s of subjects) {
        if (random() < p) {
            const o = pick(random, objects);
            if (o !== undefined) edges.push(edge(s, predicate, o));
        }
    }
    return edges;
}

/**
 * Every (subject, object) pair is drawn independently, subject-major.
 */
function manyToManyEdges(
    predicate: string, subjects: string[], objects: string[], p: number, random: RandomSource
): Edge[] {
    const edges: Edge[] = [];
    for (const s of subjects) {
        for (const o of objects) {
            if (random() < p) edges.push(edge(s, predicate, o));
        }
    }
    return edges;
}

/**
 * Expand a relation schema into a generated graph.
 */
export function generateGraph(
    schema: readonly Relation[],
    catalog: InstanceCatalog,
    options: GenerateOptions
): GenerationResult {
    validateOptions(options);
    const random = options.random ?? createRandomSource(options.seed);
    const policy = options.policy ?? createCardinalityPolicy();
    const p = options.probability;

    const graph: GeneratedGraph = new Map();
    const stats: GenerationStats = { relations: schema.length, generated: 0, skipped: 0, edges: 0 };

    for (const relation of schema) {
        const key = relationKey(relation);
        const subjects = Object.hasOwn(catalog, relation.subject) ? catalog[relation.subject] : undefined;
        const objects = Object.hasOwn(catalog, relation.object) ? catalog[relation.object] : undefined;

        if (!subjects) {
            options.onDiagnostic?.(unknownType('Subject', relation.subject, key));
            stats.skipped++;
            continue;
        }
        if (!objects) {
            options.onDiagnostic?.(unknownType('Object', relation.object, key));
            stats.skipped++;
            continue;
        }

        let edges: Edge[];
        switch (policy.modeOf(key)) {
            case 'unique-object':
                edges = uniqueObjectEdges(relation.predicate, subjects, objects, p, random);
                break;
            case 'unique-subject':
                edges = uniqueSubjectEdges(relation.predicate, subjects, objects, p, random);
                break;
            default:
                edges = manyToManyEdges(relation.predicate, subjects, objects, p, random);
        }

        const previous = graph.get(key);
        if (previous) stats.edges -= previous.edges.length;
        graph.set(key, { relation, edges });
        stats.generated++;
        stats.edges += edges.length;
    }

    return { graph, stats };
}

/**
 * JSON form of a generated graph. Throws INVALID_LABEL when a label
 * contains a triple delimiter.
 */
export function graphToJson(graph: GeneratedGraph): GraphDocument {
    const doc: GraphDocument = {};
    for (const [key, { edges }] of graph) {
        doc[key] = edges.map(formatTriple);
    }
    return doc;
}
