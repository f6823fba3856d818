import type { DiagnosticHandler, Relation } from '../types/graph.js';
import { malformedTriple } from '../types/errors.js';
import { readTextFile } from '../io/files.js';
import { isEncodableLabel, splitTriple } from './triple.js';

export interface SchemaParseOptions {
    onDiagnostic?: DiagnosticHandler;
}

/**
 * Parse schema text, one "(SubjectType,predicate,ObjectType)" per line.
 * Blank lines are ignored; malformed lines are skipped and reported.
 */
export function parseSchema(text: string, options: SchemaParseOptions = {}): Relation[] {
    const relations: Relation[] = [];
    const lines = text.split(/\r?\n/);

    lines.forEach((raw, index) => {
        const line = raw.trim();
        if (!line) return;

        const parts = line.startsWith('(') && line.endsWith(')') ? splitTriple(line) : [];
        if (parts.length !== 3 || !parts.every(isEncodableLabel)) {
            options.onDiagnostic?.(malformedTriple('schema line', line, { line: index + 1 }));
            return;
        }
        const [subject, predicate, object] = parts;
        relations.push({ subject, predicate, object });
    });

    return relations;
}

/**
 * Read and parse a schema file.
 */
export function readSchema(path: string, options: SchemaParseOptions = {}): Relation[] {
    return parseSchema(readTextFile(path, 'Schema'), options);
}
