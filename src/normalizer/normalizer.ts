/**
 * Graph normalizer
 *
 * Re-derives content-hash identifiers for every node type, edge type and
 * instance in a generated graph, and indexes which instances were seen for
 * each node type. Instance labels share one namespace across all types.
 */
import type { DiagnosticHandler, GraphDocument } from '../types/graph.js';
import { duplicateInstance, malformedTriple } from '../types/errors.js';
import { parseTriple } from '../parser/triple.js';
import { IdentifierTable } from '../utils/identifiers.js';

export interface NormalizeOptions {
    /** Report instances already indexed for their type */
    reportDuplicates?: boolean;
    onDiagnostic?: DiagnosticHandler;
}

export interface NormalizationStats {
    relations: number;
    edges: number;
    skippedKeys: number;
    skippedEdges: number;
    duplicates: number;
}

export interface NormalizedGraph {
    nodeTypes: IdentifierTable;
    edgeTypes: IdentifierTable;
    instances: IdentifierTable;
    /** Node-type ID -> ascending instance IDs */
    typeInstanceIds: Map<bigint, bigint[]>;
    /** Node-type label -> instance labels in code-point order */
    typeInstanceLabels: Map<string, string[]>;
    stats: NormalizationStats;
}

/**
 * The five output documents, keyed by file name.
 */
export interface NormalizedDocuments {
    'map_node_types.json': Record<string, bigint>;
    'map_edge_types.json': Record<string, bigint>;
    'map_instances.json': Record<string, bigint>;
    /** Keyed by the decimal form of the node-type identifier */
    'node_type_instances.json': Record<string, bigint[]>;
    'node_type_instances_labels.json': Record<string, string[]>;
}

const compareBigInt = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Code-point order. Plain `<` compares UTF-16 code units, which puts astral
 * characters before U+E000..U+FFFF.
 */
function compareString(a: string, b: string): number {
    const left = Array.from(a);
    const right = Array.from(b);
    const length = Math.min(left.length, right.length);
    for (let i = 0; i < length; i++) {
        const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
        if (diff !== 0) return diff;
    }
    return left.length - right.length;
}

function sortedEntries<K, V>(sets: Map<K, Set<V>>, compare: (a: V, b: V) => number): Map<K, V[]> {
    const out = new Map<K, V[]>();
    for (const [key, values] of sets) {
        out.set(key, [...values].sort(compare));
    }
    return out;
}

function ensureSet<K, V>(sets: Map<K, Set<V>>, key: K): Set<V> {
    let set = sets.get(key);
    if (!set) {
        set = new Set<V>();
        sets.set(key, set);
    }
    return set;
}

/**
 * Build identifier tables and the type -> instance index from a graph document.
 */
export function normalizeGraph(graph: GraphDocument, options: NormalizeOptions = {}): NormalizedGraph {
    const nodeTypes = new IdentifierTable('node-types');
    const edgeTypes = new IdentifierTable('edge-types');
    const instances = new IdentifierTable('instances');

    const idSets = new Map<bigint, Set<bigint>>();
    const labelSets = new Map<string, Set<string>>();
    const stats: NormalizationStats = { relations: 0, edges: 0, skippedKeys: 0, skippedEdges: 0, duplicates: 0 };

    const record = (typeId: bigint, typeLabel: string, label: string) => {
        const id = instances.getId(label);
        const ids = ensureSet(idSets, typeId);
        if (ids.has(id)) {
            stats.duplicates++;
            if (options.reportDuplicates) {
                options.onDiagnostic?.(duplicateInstance(label, typeLabel));
            }
        }
        ids.add(id);
        ensureSet(labelSets, typeLabel).add(label);
    };

    for (const [key, edgeList] of Object.entries(graph)) {
        const relation = parseTriple(key);
        if (!relation) {
            options.onDiagnostic?.(malformedTriple('key', key));
            stats.skippedKeys++;
            continue;
        }
        stats.relations++;

        const subjTypeId = nodeTypes.getId(relation.subject);
        const objTypeId = nodeTypes.getId(relation.object);
        edgeTypes.getId(relation.predicate);

        ensureSet(idSets, subjTypeId);
        ensureSet(idSets, objTypeId);
        ensureSet(labelSets, relation.subject);
        ensureSet(labelSets, relation.object);

        for (const text of edgeList) {
            const edge = parseTriple(text);
            if (!edge) {
                options.onDiagnostic?.(malformedTriple('instance string', text, { key }));
                stats.skippedEdges++;
                continue;
            }
            stats.edges++;
            record(subjTypeId, relation.subject, edge.subject);
            record(objTypeId, relation.object, edge.object);
        }
    }

    return {
        nodeTypes,
        edgeTypes,
        instances,
        typeInstanceIds: sortedEntries(idSets, compareBigInt),
        typeInstanceLabels: sortedEntries(labelSets, compareString),
        stats,
    };
}

/**
 * Documents for writeJsonFile; identifiers stay bigints and are written as
 * bare integer literals.
 */
export function normalizedToJson(normalized: NormalizedGraph): NormalizedDocuments {
    const ids: Record<string, bigint[]> = {};
    for (const [typeId, instanceIds] of normalized.typeInstanceIds) {
        ids[typeId.toString()] = instanceIds;
    }
    return {
        'map_node_types.json': normalized.nodeTypes.toRecord(),
        'map_edge_types.json': normalized.edgeTypes.toRecord(),
        'map_instances.json': normalized.instances.toRecord(),
        'node_type_instances.json': ids,
        'node_type_instances_labels.json': Object.fromEntries(normalized.typeInstanceLabels),
    };
}
