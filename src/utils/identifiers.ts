/**
 * Content-hash identifiers.
 *
 * An identifier is the MD5 digest of the label's UTF-8 bytes read as an
 * unsigned big-endian 128-bit integer. Collisions are not handled.
 */
import { createHash } from 'crypto';

export function contentHashId(label: string): bigint {
    const hex = createHash('md5').update(label, 'utf8').digest('hex');
    return BigInt(`0x${hex}`);
}

/**
 * Label -> identifier table for one namespace (node types, edge types or instances).
 */
export class IdentifierTable {
    private readonly ids = new Map<string, bigint>();

    constructor(public readonly namespace: string) {}

    /**
     * Existing identifier for the label, or a freshly hashed one.
     */
    getId(label: string): bigint {
        let id = this.ids.get(label);
        if (id === undefined) {
            id = contentHashId(label);
            this.ids.set(label, id);
        }
        return id;
    }

    has(label: string): boolean {
        return this.ids.has(label);
    }

    get size(): number {
        return this.ids.size;
    }

    entries(): IterableIterator<[string, bigint]> {
        return this.ids.entries();
    }

    toRecord(): Record<string, bigint> {
        return Object.fromEntries(this.ids);
    }
}
