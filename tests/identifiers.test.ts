/**
 * Tests for content-hash identifiers
 */

import { createHash } from 'crypto';
import { contentHashId, IdentifierTable } from '../src/utils/identifiers.js';

describe('contentHashId', () => {
    test('reads the MD5 digest as a big-endian integer', () => {
        expect(contentHashId('abc')).toBe(BigInt('0x900150983cd24fb0d6963f7d28e17f72'));
        expect(contentHashId('')).toBe(BigInt('0xd41d8cd98f00b204e9800998ecf8427e'));
    });

    test('hashes UTF-8 bytes', () => {
        const hex = createHash('md5').update(Buffer.from('café', 'utf8')).digest('hex');
        expect(contentHashId('café')).toBe(BigInt(`0x${hex}`));
    });

    test('fits in 128 bits', () => {
        expect(contentHashId('anything')).toBeLessThan(BigInt(2) ** BigInt(128));
    });
});

describe('IdentifierTable', () => {
    test('memoizes identifiers per label', () => {
        const table = new IdentifierTable('instances');
        const first = table.getId('nyc');
        expect(table.getId('nyc')).toBe(first);
        expect(table.size).toBe(1);
        expect(table.has('nyc')).toBe(true);
        expect(table.has('la')).toBe(false);
    });

    test('separate namespaces agree on the same label', () => {
        const nodeTypes = new IdentifierTable('node-types');
        const edgeTypes = new IdentifierTable('edge-types');
        expect(nodeTypes.getId('link')).toBe(edgeTypes.getId('link'));
        expect(nodeTypes.namespace).not.toBe(edgeTypes.namespace);
    });

    test('keeps insertion order', () => {
        const table = new IdentifierTable('instances');
        table.getId('zed');
        table.getId('alice');
        expect([...table.entries()].map(([label]) => label)).toEqual(['zed', 'alice']);
    });

    test('exposes identifiers as a plain record of bigints', () => {
        const table = new IdentifierTable('instances');
        table.getId('abc');
        table.getId('');
        expect(table.toRecord()).toEqual({
            abc: BigInt('0x900150983cd24fb0d6963f7d28e17f72'),
            '': BigInt('0xd41d8cd98f00b204e9800998ecf8427e'),
        });
    });
});
