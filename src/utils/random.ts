/**
 * Seedable random source.
 *
 * Every draw is one call, so a fixed seed and a fixed call order
 * reproduce the same graph.
 */

/** Returns a value in [0, 1) */
export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
    let s = seed | 0;
    return () => {
        s = (s + 0x6d2b79f5) | 0;
        let t = Math.imul(s ^ (s >>> 15), 1 | s);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Seeded source when a seed is given, otherwise Math.random (not reproducible).
 */
export function createRandomSource(seed?: number): RandomSource {
    return seed === undefined ? Math.random : mulberry32(seed);
}

/**
 * Uniform choice; consumes exactly one draw.
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T | undefined {
    if (items.length === 0) {
        random();
        return undefined;
    }
    return items[Math.floor(random() * items.length)];
}
