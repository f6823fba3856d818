/**
 * Tests for structured error system
 */

import {
    GraphError,
    GraphErrorCode,
    GraphException,
    exitCodeFor,
    isRecoverable,
    createFileNotFoundError,
    createJsonDecodeError,
    createEmptySchemaError,
    createInvalidLabelError,
    malformedTriple,
    serializeGraphError,
} from '../src/types/errors.js';

describe('GraphException', () => {
    test('creates exception with error object', () => {
        const error: GraphError = {
            code: 'JSON_DECODE_ERROR',
            message: 'Unexpected token',
            context: 'graph.json',
        };

        const exception = new GraphException(error);

        expect(exception.name).toBe('GraphException');
        expect(exception.message).toBe('Unexpected token');
        expect(exception.code).toBe('JSON_DECODE_ERROR');
        expect(exception.toJSON()).toEqual(error);
        expect(exception).toBeInstanceOf(Error);
    });
});

describe('exitCodeFor', () => {
    test('fatal kinds map to distinct non-zero codes', () => {
        const fatal: GraphErrorCode[] = [
            'FILE_NOT_FOUND', 'READ_ERROR', 'JSON_DECODE_ERROR', 'INVALID_INPUT',
            'EMPTY_SCHEMA', 'INVALID_CONFIG', 'INVALID_LABEL',
        ];
        const codes = fatal.map(exitCodeFor);
        expect(new Set(codes).size).toBe(fatal.length);
        expect(codes.every(c => c > 1)).toBe(true);
        expect(exitCodeFor('FILE_NOT_FOUND')).toBe(2);
        expect(exitCodeFor('JSON_DECODE_ERROR')).toBe(3);
    });

    test('other kinds fall back to 1', () => {
        expect(exitCodeFor('MALFORMED_TRIPLE')).toBe(1);
    });
});

describe('isRecoverable', () => {
    test('skip-and-continue kinds are recoverable', () => {
        expect(isRecoverable('MALFORMED_TRIPLE')).toBe(true);
        expect(isRecoverable('UNKNOWN_TYPE')).toBe(true);
        expect(isRecoverable('DUPLICATE_INSTANCE')).toBe(true);
        expect(isRecoverable('FILE_NOT_FOUND')).toBe(false);
    });
});

describe('factories', () => {
    test('file not found names the role and path', () => {
        const e = createFileNotFoundError('input/schema.txt', 'Schema');
        expect(e.message).toBe('Schema file not found at input/schema.txt');
        expect(e.error.details).toEqual({ path: 'input/schema.txt', role: 'Schema' });
    });

    test('decode error carries the decoder message', () => {
        expect(createJsonDecodeError('g.json', 'Unexpected end of JSON input').message)
            .toBe('Error decoding JSON in g.json: Unexpected end of JSON input');
    });

    test('empty schema includes a suggestion', () => {
        expect(createEmptySchemaError('s.txt').error.suggestion).toContain('(SubjectType,predicate,ObjectType)');
    });

    test('invalid label records the position', () => {
        expect(createInvalidLabelError('a,b', 'object').error.details).toEqual({ label: 'a,b', position: 'object' });
    });
});

describe('serializeGraphError', () => {
    test('omits absent fields', () => {
        expect(serializeGraphError(malformedTriple('key', '(A,b)'))).toEqual({
            code: 'MALFORMED_TRIPLE',
            message: "Skipping malformed key '(A,b)'",
            context: '(A,b)',
        });
    });
});
