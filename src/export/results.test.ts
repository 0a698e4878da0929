import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { formatResults, summarizeResults, writeResults } from './results.js';

describe('formatResults', () => {
    it('should pretty-print with two-space indentation and a trailing newline', () => {
        expect(formatResults({ Airbnb: ['Brian Chesky'], Kernel: [] })).toBe(
            '{\n  "Airbnb": [\n    "Brian Chesky"\n  ],\n  "Kernel": []\n}\n'
        );
    });

    it('should write an empty object when there are no companies', () => {
        expect(formatResults({})).toBe('{}\n');
    });
});

describe('summarizeResults', () => {
    it('should count companies with and without founders', () => {
        expect(summarizeResults({ A: ['x'], B: [], C: ['y', 'z'] })).toEqual({
            total: 3,
            withFounders: 2,
            withoutFounders: 1,
        });
    });
});

describe('writeResults', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await rm(dir, { recursive: true, force: true });
        dir = undefined;
    });

    it('should create missing directories and write the map', async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'founders-results-'));
        const output = path.join(dir, 'out', 'founders.json');

        await writeResults(output, { Dropbox: ['Drew Houston', 'Arash Ferdowsi'] });

        expect(JSON.parse(await readFile(output, 'utf8'))).toEqual({ Dropbox: ['Drew Houston', 'Arash Ferdowsi'] });
    });
});
