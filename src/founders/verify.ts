/**
 * Compare a founders.json against a file of expected answers
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { InputFileError } from '../errors.js';
import type { ResultMap } from './finder.js';

const FounderMapSchema = z.record(z.array(z.string()));

export type VerificationStatus = 'correct' | 'mismatch' | 'missing';

export interface CompanyVerification {
    company: string;
    status: VerificationStatus;
    expected: string[];
    actual?: string[];
    /** Expected names (lower-cased) that were not found. */
    missing: string[];
    /** Found names (lower-cased) that were not expected. */
    extra: string[];
}

export interface VerificationReport {
    passed: boolean;
    companies: CompanyVerification[];
}

export function normalizeForComparison(names: readonly string[]): string[] {
    return names.map((name) => name.trim().toLowerCase()).sort();
}

function difference(left: string[], right: string[]): string[] {
    const exclude = new Set(right);
    return Array.from(new Set(left.filter((name) => !exclude.has(name)))).sort();
}

function sameNames(left: string[], right: string[]): boolean {
    return left.length === right.length && left.every((name, i) => name === right[i]);
}

/**
 * Names are compared case-insensitively and in any order.
 */
export function verifyResults(actual: ResultMap, expected: ResultMap): VerificationReport {
    const companies = Object.entries(expected).map(([company, expectedNames]): CompanyVerification => {
        if (!Object.prototype.hasOwnProperty.call(actual, company)) {
            return { company, status: 'missing', expected: expectedNames, missing: [], extra: [] };
        }

        const actualNames = actual[company];
        const want = normalizeForComparison(expectedNames);
        const got = normalizeForComparison(actualNames);

        if (sameNames(want, got)) {
            return { company, status: 'correct', expected: expectedNames, actual: actualNames, missing: [], extra: [] };
        }

        return {
            company,
            status: 'mismatch',
            expected: expectedNames,
            actual: actualNames,
            missing: difference(want, got),
            extra: difference(got, want),
        };
    });

    return {
        passed: companies.every((c) => c.status === 'correct'),
        companies,
    };
}

export async function readFounderMap(filePath: string): Promise<ResultMap> {
    let text: string;
    try {
        text = await readFile(filePath, 'utf8');
    } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === 'ENOENT') throw new InputFileError(filePath);
        throw new InputFileError(filePath, `Could not read ${filePath}: ${err.message}`);
    }

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (error) {
        throw new InputFileError(filePath, `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = FounderMapSchema.safeParse(data);
    if (!parsed.success) {
        throw new InputFileError(filePath, `${filePath} must map company names to arrays of founder names`);
    }
    return parsed.data;
}
