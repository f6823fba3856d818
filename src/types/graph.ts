/**
 * Graph data model
 */

import type { GraphError } from './errors.js';

/**
 * A structured 3-tuple. Its string form "(a,b,c)" only exists at the JSON boundary.
 */
export interface Triple {
    subject: string;
    predicate: string;
    object: string;
}

/** Schema-level triple of type names */
export type Relation = Triple;

/** Instance-level triple of labels */
export type Edge = Triple;

/** Type name -> ordered instance labels */
export type InstanceCatalog = Record<string, string[]>;

export type CardinalityMode = 'unique-object' | 'unique-subject' | 'many-to-many';

export interface RelationEdges {
    relation: Relation;
    edges: Edge[];
}

/**
 * Relation key -> generated edges, in first-seen schema order.
 */
export type GeneratedGraph = Map<string, RelationEdges>;

/** JSON form of a generated graph: "(S,p,O)" -> ["(s,p,o)", ...] */
export type GraphDocument = Record<string, string[]>;

/**
 * Receives recoverable problems (skipped lines, unknown types, duplicates).
 */
export type DiagnosticHandler = (diagnostic: GraphError) => void;
