import type { Triple } from '../types/graph.js';
import { createInvalidLabelError } from '../types/errors.js';

const DELIMITERS = /[,()]/;

/**
 * Split a "(a,b,c)" string into its trimmed parts.
 * Surrounding parentheses are optional; the part count is not checked.
 */
export function splitTriple(text: string): string[] {
    let body = text.trim();
    if (body.startsWith('(') && body.endsWith(')')) {
        body = body.slice(1, -1);
    }
    return body.split(',').map(p => p.trim());
}

/**
 * Parse a triple string, or return undefined when it does not have exactly 3 parts.
 */
export function parseTriple(text: string): Triple | undefined {
    const parts = splitTriple(text);
    if (parts.length !== 3) return undefined;
    const [subject, predicate, object] = parts;
    return { subject, predicate, object };
}

/**
 * True when the label survives a format/parse round trip: non-empty, no
 * delimiters, and nothing the parser would trim away.
 */
export function isEncodableLabel(label: string): boolean {
    return label !== '' && label === label.trim() && !DELIMITERS.test(label);
}

function checkLabel(label: string, position: string): string {
    if (!isEncodableLabel(label)) {
        throw createInvalidLabelError(label, position);
    }
    return label;
}

/**
 * Encode a triple as "(s,p,o)".
 * Throws INVALID_LABEL for parts that could not be parsed back.
 */
export function formatTriple(triple: Triple): string {
    const s = checkLabel(triple.subject, 'subject');
    const p = checkLabel(triple.predicate, 'predicate');
    const o = checkLabel(triple.object, 'object');
    return `(${s},${p},${o})`;
}

export const relationKey = formatTriple;
