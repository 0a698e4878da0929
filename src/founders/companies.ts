/**
 * Company list parsing
 */

import { readFile } from 'fs/promises';
import { InputFileError } from '../errors.js';

export interface Company {
    readonly name: string;
    /** Empty when the line carried no "(URL)" suffix. */
    readonly url: string;
}

const COMPANY_LINE = /^(.+?)\s*\((.+?)\)$/;

/**
 * Parse one "Name (URL)" line. Blank lines yield null; anything else without a
 * parenthesised suffix becomes a bare name.
 */
export function parseCompanyLine(line: string): Company | null {
    const trimmed = line.trim();
    if (!trimmed) return null;

    const match = trimmed.match(COMPANY_LINE);
    if (match) {
        return { name: match[1].trim(), url: match[2].trim() };
    }
    return { name: trimmed, url: '' };
}

export function parseCompanies(text: string): Company[] {
    const companies: Company[] = [];
    for (const line of text.split(/\r?\n/)) {
        const company = parseCompanyLine(line);
        if (company) companies.push(company);
    }
    return companies;
}

export async function readCompaniesFile(filePath: string): Promise<Company[]> {
    let text: string;
    try {
        text = await readFile(filePath, 'utf8');
    } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === 'ENOENT') throw new InputFileError(filePath);
        throw new InputFileError(filePath, `Could not read ${filePath}: ${err.message}`);
    }
    return parseCompanies(text);
}
