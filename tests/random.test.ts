/**
 * Tests for the seedable random source
 */

import { mulberry32, createRandomSource, pick } from '../src/utils/random.js';
import { scriptedRandom } from './helpers.js';

const take = (random: () => number, n: number) => Array.from({ length: n }, () => random());

describe('mulberry32', () => {
    test('same seed replays the same sequence', () => {
        expect(take(mulberry32(42), 10)).toEqual(take(mulberry32(42), 10));
    });

    test('different seeds give different sequences', () => {
        expect(take(mulberry32(1), 5)).not.toEqual(take(mulberry32(2), 5));
    });

    test('values fall in [0, 1)', () => {
        for (const value of take(mulberry32(7), 1000)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});

describe('createRandomSource', () => {
    test('falls back to Math.random without a seed', () => {
        expect(createRandomSource()).toBe(Math.random);
    });

    test('seeded source matches mulberry32', () => {
        expect(take(createRandomSource(9), 3)).toEqual(take(mulberry32(9), 3));
    });
});

describe('pick', () => {
    test('maps the draw onto an index', () => {
        const items = ['a', 'b', 'c'];
        expect(pick(scriptedRandom([0]), items)).toBe('a');
        expect(pick(scriptedRandom([0.5]), items)).toBe('b');
        expect(pick(scriptedRandom([0.99]), items)).toBe('c');
    });

    test('consumes one draw even when there is nothing to pick', () => {
        const random = scriptedRandom([0.3]);
        expect(pick(random, [])).toBeUndefined();
        expect(random.calls()).toBe(1);
    });
});
