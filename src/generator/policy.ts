import type { CardinalityMode } from '../types/graph.js';
import { createInvalidConfigError } from '../types/errors.js';
import { parseTriple, relationKey } from '../parser/triple.js';

/**
 * Relation keys constrained to a single edge per object or per subject.
 * Keys absent from both lists are many-to-many.
 */
export interface CardinalityConfig {
    uniqueObject?: string[];
    uniqueSubject?: string[];
}

export interface CardinalityPolicy {
    modeOf(key: string): CardinalityMode;
    entries(): Array<[string, CardinalityMode]>;
}

function normalizeKey(key: string): string {
    const triple = parseTriple(key);
    if (!triple) {
        throw createInvalidConfigError(`Cardinality policy key '${key}' is not a relation triple`, { key });
    }
    return relationKey(triple);
}

/**
 * Build a policy lookup. Keys are normalized, so "(City, stateOf, State)"
 * matches the generated key "(City,stateOf,State)".
 */
export function createCardinalityPolicy(config: CardinalityConfig = {}): CardinalityPolicy {
    const modes = new Map<string, CardinalityMode>();

    const add = (keys: string[] | undefined, mode: CardinalityMode) => {
        for (const raw of keys ?? []) {
            const key = normalizeKey(raw);
            const existing = modes.get(key);
            if (existing && existing !== mode) {
                throw createInvalidConfigError(
                    `Relation '${key}' cannot be both ${existing} and ${mode}`,
                    { key }
                );
            }
            modes.set(key, mode);
        }
    };

    add(config.uniqueObject, 'unique-object');
    add(config.uniqueSubject, 'unique-subject');

    return {
        modeOf: (key) => modes.get(key) ?? 'many-to-many',
        entries: () => [...modes.entries()],
    };
}
