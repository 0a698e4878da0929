/**
 * Unit tests for founder extraction from agent output
 */

import { describe, it, expect } from 'vitest';
import {
    FounderExtractor,
    extractFounders,
    extractUntaggedArray,
    normalizeFounderNames,
    stripCodeFences,
} from './extractor.js';

function extractFromChunks(chunks: string[]) {
    const extractor = new FounderExtractor();
    chunks.forEach((chunk) => extractor.push(chunk));
    return extractor.result();
}

describe('FounderExtractor', () => {
    describe('tagged output', () => {
        it('should return the final array and ignore earlier progress', () => {
            const result = extractFromChunks([
                'Searching. <progress>["A"]</progress>',
                'Confirmed. <founders>["A","B"]</founders>',
            ]);
            expect(result).toEqual({ founders: ['A', 'B'], source: 'final' });
        });

        it('should let a final answer win over progress that arrives after it', () => {
            const result = extractFromChunks([
                '<founders>["A","B"]</founders>',
                '<progress>["C"]</progress>',
            ]);
            expect(result).toEqual({ founders: ['A', 'B'], source: 'final' });
        });

        it('should keep the latest final answer when several are given', () => {
            const result = extractFromChunks([
                '<founders>["A"]</founders>',
                '<founders>["A","B"]</founders>',
            ]);
            expect(result.founders).toEqual(['A', 'B']);
        });

        it('should treat an empty final array as authoritative', () => {
            const result = extractFromChunks([
                '<progress>["A"]</progress>',
                '<founders>[]</founders>',
            ]);
            expect(result).toEqual({ founders: [], source: 'final' });
        });

        it('should fall back to the latest progress when no final answer arrived', () => {
            const result = extractFromChunks([
                '<progress>[]</progress>',
                'still looking',
                '<progress>["A"]</progress>',
            ]);
            expect(result).toEqual({ founders: ['A'], source: 'progress' });
        });

        it('should pick up a tag split across chunks', () => {
            const result = extractFromChunks([
                'Checking... <foun',
                'ders>["Jane Roe"]</fou',
                'nders>',
            ]);
            expect(result).toEqual({ founders: ['Jane Roe'], source: 'final' });
        });

        it('should ignore a final tag whose body is not an array', () => {
            const result = extractFromChunks([
                '<progress>["A"]</progress>',
                '<founders>not sure yet</founders>',
            ]);
            expect(result).toEqual({ founders: ['A'], source: 'progress' });
        });

        it('should not let a tag named in prose hide the final answer', () => {
            const result = extractFounders(
                'I will answer in a <founders> tag. <founders>["A","B"]</founders> <progress>["C"]</progress>'
            );
            expect(result).toEqual({ founders: ['A', 'B'], source: 'final' });
        });

        it('should find a final answer after a tag mention in an earlier chunk', () => {
            const result = extractFromChunks([
                'Reporting progress in <progress> tags as I go. ',
                '<progress>["A"]</progress> Done: <founders>["A","B"]</founders>',
            ]);
            expect(result).toEqual({ founders: ['A', 'B'], source: 'final' });
        });

        it('should accept a code fence inside a tag', () => {
            const result = extractFounders('<founders>\n```json\n["A"]\n```\n</founders>');
            expect(result).toEqual({ founders: ['A'], source: 'final' });
        });

        it('should match tags case-insensitively', () => {
            expect(extractFounders('<FOUNDERS>["A"]</FOUNDERS>')).toEqual({ founders: ['A'], source: 'final' });
        });

        it('should filter non-string and empty entries', () => {
            const result = extractFounders('<founders>["Ann", 42, "", "  Bob  ", null]</founders>');
            expect(result.founders).toEqual(['Ann', 'Bob']);
        });

        it('should keep duplicates in the order given', () => {
            expect(extractFounders('<founders>["Ann","Bob","Ann"]</founders>').founders).toEqual(['Ann', 'Bob', 'Ann']);
        });
    });

    describe('untagged output', () => {
        it('should strip a json code fence and parse the array', () => {
            expect(extractFounders('```json\n["X","Y"]\n```')).toEqual({ founders: ['X', 'Y'], source: 'fallback' });
        });

        it('should parse a bare JSON array', () => {
            expect(extractFounders('["Brian Chesky", "Joe Gebbia", "Nathan Blecharczyk"]').founders).toEqual([
                'Brian Chesky',
                'Joe Gebbia',
                'Nathan Blecharczyk',
            ]);
        });

        it('should use the last flat array in free text', () => {
            const text = 'Early guess ["Wrong"]. After checking: ["Right One", "Right Two"] are the founders.';
            expect(extractFounders(text)).toEqual({ founders: ['Right One', 'Right Two'], source: 'fallback' });
        });

        it('should return an empty list when nothing parses', () => {
            expect(extractFounders('This is not JSON')).toEqual({ founders: [], source: 'none' });
        });

        it('should return an empty list for empty output', () => {
            expect(new FounderExtractor().result()).toEqual({ founders: [], source: 'none' });
        });

        it('should return an empty list when the last array is malformed', () => {
            expect(extractFounders('Founders: ["Ann", Bob]')).toEqual({ founders: [], source: 'none' });
        });
    });

    it('should return a copy of the stored list', () => {
        const extractor = new FounderExtractor();
        extractor.push('<founders>["A"]</founders>');
        extractor.result().founders.push('mutated');
        expect(extractor.result().founders).toEqual(['A']);
    });

    it('should expose the accumulated text and whether a final answer was seen', () => {
        const extractor = new FounderExtractor();
        extractor.push('one ');
        extractor.push('<founders>["A"]</founders>');
        expect(extractor.text).toBe('one <founders>["A"]</founders>');
        expect(extractor.hasFinal).toBe(true);
    });
});

describe('helpers', () => {
    it('normalizeFounderNames should drop non-strings rather than coerce them', () => {
        expect(normalizeFounderNames(['Ann', 7, true, { name: 'x' }, ' Cy '])).toEqual(['Ann', 'Cy']);
    });

    it('stripCodeFences should remove fences with and without a language', () => {
        expect(stripCodeFences('```\n["A"]\n```')).toBe('["A"]');
        expect(stripCodeFences('```json ["B"] ```')).toBe('["B"]');
    });

    it('extractUntaggedArray should return null when there is no array', () => {
        expect(extractUntaggedArray('no founders listed')).toBeNull();
    });
});
