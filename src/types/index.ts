/**
 * Shared type definitions for kgsynth
 */

// Re-export error types
export {
    GraphException,
    isRecoverable,
    exitCodeFor,
    createFileNotFoundError,
    createReadError,
    createJsonDecodeError,
    createInvalidInputError,
    createEmptySchemaError,
    createInvalidConfigError,
    createInvalidLabelError,
    malformedTriple,
    unknownType,
    duplicateInstance,
    serializeGraphError,
} from './errors.js';

export type {
    GraphErrorCode,
    GraphError,
} from './errors.js';

// Re-export graph model types
export type {
    Triple,
    Relation,
    Edge,
    InstanceCatalog,
    CardinalityMode,
    RelationEdges,
    GeneratedGraph,
    GraphDocument,
    DiagnosticHandler,
} from './graph.js';

// Re-export configuration types
export type {
    Verbosity,
    GenerateConfig,
    NormalizeConfig,
} from './options.js';
