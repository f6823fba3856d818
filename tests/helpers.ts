/**
 * Shared test helpers.
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import JSONbig from 'json-bigint';
import type { RandomSource } from '../src/utils/random.js';
import { GraphError, GraphErrorCode, GraphException } from '../src/types/errors.js';

export interface ScriptedRandom extends RandomSource {
    calls: () => number;
}

/**
 * Random source that replays fixed values and fails when exhausted,
 * so tests pin down exactly how many draws were consumed.
 */
export function scriptedRandom(values: number[]): ScriptedRandom {
    let index = 0;
    const next = () => {
        if (index >= values.length) {
            throw new Error(`Random source exhausted after ${values.length} draws`);
        }
        return values[index++];
    };
    return Object.assign(next, { calls: () => index });
}

export function collectDiagnostics(): { diagnostics: GraphError[]; onDiagnostic: (d: GraphError) => void } {
    const diagnostics: GraphError[] = [];
    return { diagnostics, onDiagnostic: (d) => diagnostics.push(d) };
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'kgsynth-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

const BigJSON = JSONbig({ useNativeBigInt: true, alwaysParseAsBig: true });

/**
 * Read a JSON file with every integer as a bigint.
 */
export function readBigJson(filePath: string): unknown {
    return BigJSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

export const compareBigInt = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Run fn, assert it throws a GraphException with the given code, and return its error.
 */
export function expectGraphError(fn: () => unknown, code: GraphErrorCode): GraphError {
    let caught: unknown;
    try {
        fn();
    } catch (e) {
        caught = e;
    }
    if (!(caught instanceof GraphException)) {
        throw new Error(`expected a GraphException with code ${code}, got ${String(caught)}`);
    }
    expect(caught.code).toBe(code);
    return caught.error;
}
