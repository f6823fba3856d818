/**
 * Tests for command-line argument parsing
 */

import { parseCliArgs } from '../src/cli/args.js';

describe('parseCliArgs', () => {
    test('splits command, inline and separate flag values', () => {
        expect(parseCliArgs(['generate', '--seed=7', '--probability', '0.3', '-V'])).toEqual({
            command: 'generate',
            positionals: [],
            flags: { seed: '7', probability: '0.3', verbose: true },
        });
    });

    test('collects positionals after the command', () => {
        expect(parseCliArgs(['normalize', 'graph.json', '--out-dir', 'out'])).toEqual({
            command: 'normalize',
            positionals: ['graph.json'],
            flags: { 'out-dir': 'out' },
        });
    });

    test('boolean flags never consume the next argument', () => {
        const parsed = parseCliArgs(['--no-seed', 'generate']);
        expect(parsed.command).toBe('generate');
        expect(parsed.flags).toEqual({ 'no-seed': true });
    });

    test('a negative number is taken as the flag value', () => {
        expect(parseCliArgs(['generate', '--seed', '-5', '--probability', '0.2']).flags)
            .toEqual({ seed: '-5', probability: '0.2' });
    });

    test('a following flag is not taken as a value', () => {
        expect(parseCliArgs(['generate', '--policy', '--no-seed']).flags).toEqual({ policy: true, 'no-seed': true });
        expect(parseCliArgs(['generate', '--schema', '-V']).flags).toEqual({ schema: true, verbose: true });
    });

    test('--no-policy never consumes the next argument', () => {
        expect(parseCliArgs(['--no-policy', 'generate'])).toEqual({
            command: 'generate',
            positionals: [],
            flags: { 'no-policy': true },
        });
    });

    test('a trailing flag without a value is true', () => {
        expect(parseCliArgs(['generate', '--schema']).flags).toEqual({ schema: true });
    });

    test('short aliases', () => {
        expect(parseCliArgs(['-h']).flags).toEqual({ help: true });
        expect(parseCliArgs(['-v']).flags).toEqual({ version: true });
        expect(parseCliArgs([]).command).toBeUndefined();
    });
});
