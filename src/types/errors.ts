/**
 * Structured Error System for kgsynth
 *
 * Provides machine-readable errors with codes, suggestions and exit codes.
 */

/**
 * Error codes for graph operations
 */
export type GraphErrorCode =
  | 'FILE_NOT_FOUND'        // Schema, catalog or graph file missing
  | 'READ_ERROR'            // File exists but could not be read
  | 'JSON_DECODE_ERROR'     // Malformed JSON document
  | 'INVALID_INPUT'         // JSON decoded but has the wrong shape
  | 'EMPTY_SCHEMA'          // Schema yielded no relations
  | 'INVALID_CONFIG'        // Bad probability, seed, policy or flag
  | 'INVALID_LABEL'         // Label contains a triple delimiter
  | 'MALFORMED_TRIPLE'      // Line, key or edge is not a 3-tuple
  | 'UNKNOWN_TYPE'          // Relation references a type missing from the catalog
  | 'DUPLICATE_INSTANCE';   // Instance seen again for the same type

/**
 * Structured error with code, message and suggestion
 */
export interface GraphError {
  code: GraphErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending line, key, edge or path
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping GraphError for throw/catch patterns
 */
export class GraphException extends Error {
  public readonly error: GraphError;

  constructor(error: GraphError) {
    super(error.message);
    this.name = 'GraphException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GraphException);
    }
  }

  get code(): GraphErrorCode {
    return this.error.code;
  }

  toJSON(): GraphError {
    return this.error;
  }
}

const RECOVERABLE: ReadonlySet<GraphErrorCode> = new Set<GraphErrorCode>([
  'MALFORMED_TRIPLE',
  'UNKNOWN_TYPE',
  'DUPLICATE_INSTANCE',
]);

/**
 * Recoverable codes are reported as diagnostics and never abort a run.
 */
export function isRecoverable(code: GraphErrorCode): boolean {
  return RECOVERABLE.has(code);
}

const EXIT_CODES: Partial<Record<GraphErrorCode, number>> = {
  FILE_NOT_FOUND: 2,
  JSON_DECODE_ERROR: 3,
  INVALID_INPUT: 4,
  EMPTY_SCHEMA: 5,
  INVALID_LABEL: 6,
  READ_ERROR: 7,
  INVALID_CONFIG: 64,
};

/**
 * Process exit code for a fatal error kind
 */
export function exitCodeFor(code: GraphErrorCode): number {
  return EXIT_CODES[code] ?? 1;
}

export function createFileNotFoundError(path: string, role: string = 'Input'): GraphException {
  return new GraphException({
    code: 'FILE_NOT_FOUND',
    message: `${role} file not found at ${path}`,
    suggestion: 'Check the path or pass it explicitly on the command line',
    context: path,
    details: { path, role },
  });
}

export function createReadError(path: string, cause: string): GraphException {
  return new GraphException({
    code: 'READ_ERROR',
    message: `Error reading ${path}: ${cause}`,
    context: path,
    details: { path },
  });
}

export function createJsonDecodeError(path: string, cause: string): GraphException {
  return new GraphException({
    code: 'JSON_DECODE_ERROR',
    message: `Error decoding JSON in ${path}: ${cause}`,
    suggestion: 'Validate the file with a JSON linter',
    context: path,
    details: { path },
  });
}

export function createInvalidInputError(
  path: string,
  expected: string,
  issues: string[]
): GraphException {
  return new GraphException({
    code: 'INVALID_INPUT',
    message: `${path} does not match the expected shape: ${expected}`,
    context: path,
    details: { path, issues },
  });
}

export function createEmptySchemaError(path: string): GraphException {
  return new GraphException({
    code: 'EMPTY_SCHEMA',
    message: 'No relations found in schema.',
    suggestion: "Each line must look like '(SubjectType,predicate,ObjectType)'",
    context: path,
    details: { path },
  });
}

export function createInvalidConfigError(
  message: string,
  details?: Record<string, unknown>
): GraphException {
  return new GraphException({
    code: 'INVALID_CONFIG',
    message,
    suggestion: 'Run with --help to see accepted options',
    details,
  });
}

export function createInvalidLabelError(label: string, position: string): GraphException {
  return new GraphException({
    code: 'INVALID_LABEL',
    message: `Label '${label}' cannot be encoded as a triple ${position}`,
    suggestion: "Labels must be non-empty and must not contain ',', '(' or ')'",
    context: label,
    details: { label, position },
  });
}

/**
 * Malformed triples are recoverable, so these are returned as plain
 * GraphError values for diagnostics instead of exceptions.
 */
export function malformedTriple(kind: string, text: string, details?: Record<string, unknown>): GraphError {
  return {
    code: 'MALFORMED_TRIPLE',
    message: `Skipping malformed ${kind} '${text}'`,
    context: text,
    details,
  };
}

export function unknownType(role: 'Subject' | 'Object', typeName: string, key: string): GraphError {
  return {
    code: 'UNKNOWN_TYPE',
    message: `${role} Type '${typeName}' for relation '${key}' not found in instances.`,
    context: key,
    details: { role, typeName },
  };
}

export function duplicateInstance(label: string, typeName: string): GraphError {
  return {
    code: 'DUPLICATE_INSTANCE',
    message: `Duplicate instance detected: '${label}' for node type '${typeName}'`,
    context: label,
    details: { typeName },
  };
}

/**
 * Serialize a GraphError for JSON output
 */
export function serializeGraphError(error: GraphError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
