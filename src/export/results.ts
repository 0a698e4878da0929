/**
 * Results output
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { ResultMap } from '../founders/finder.js';

export interface ResultSummary {
    total: number;
    withFounders: number;
    withoutFounders: number;
}

export function formatResults(results: ResultMap): string {
    return `${JSON.stringify(results, null, 2)}\n`;
}

export async function writeResults(outputPath: string, results: ResultMap): Promise<void> {
    const dir = path.dirname(outputPath);
    if (dir && dir !== '.') await mkdir(dir, { recursive: true });
    await writeFile(outputPath, formatResults(results), 'utf8');
}

export function summarizeResults(results: ResultMap): ResultSummary {
    const lists = Object.values(results);
    const withFounders = lists.filter((founders) => founders.length > 0).length;
    return {
        total: lists.length,
        withFounders,
        withoutFounders: lists.length - withFounders,
    };
}
