/**
 * Founder Extractor - pulls the founder list out of free-form agent output
 *
 * The agent is asked to wrap interim answers in <progress>[...]</progress> and its
 * conclusion in <founders>[...]</founders>. A final answer always beats progress,
 * whatever order they arrived in; with neither, the last JSON array in the
 * output is used.
 */

export type ExtractionSource = 'final' | 'progress' | 'fallback' | 'none';

export interface Extraction {
    founders: string[];
    source: ExtractionSource;
}

export const PROGRESS_TAG = 'progress';
export const FINAL_TAG = 'founders';

// The body may not contain another opening tag of the same kind, so a tag named in
// prose before the real one does not swallow it.
const TAG_PATTERN = /<(progress|founders)>((?:(?!<\1>)[\s\S])*?)<\/\1>/gi;
const CODE_FENCE_PATTERN = /```(?:json)?\s*|\s*```/gi;
const FLAT_ARRAY_PATTERN = /\[[^[\]]*\]/g;

/**
 * Keep string entries only, trimmed, dropping empties. Non-strings are discarded
 * rather than stringified so stray numbers or objects never become "names".
 */
export function normalizeFounderNames(values: readonly unknown[]): string[] {
    return values
        .filter((value): value is string => typeof value === 'string')
        .map((value) => value.trim())
        .filter((value) => value.length > 0);
}

export function stripCodeFences(text: string): string {
    return text.replace(CODE_FENCE_PATTERN, '').trim();
}

function parseJsonArray(raw: string): unknown[] | null {
    try {
        const parsed: unknown = JSON.parse(raw);
        return Array.isArray(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

function parseNameArray(raw: string): string[] | null {
    const values = parseJsonArray(stripCodeFences(raw));
    return values ? normalizeFounderNames(values) : null;
}

/**
 * Last-resort scan over untagged output: the whole text as JSON, otherwise the last
 * flat `[...]` in it.
 */
export function extractUntaggedArray(text: string): string[] | null {
    const cleaned = stripCodeFences(text);
    if (!cleaned) return null;

    const whole = parseNameArray(cleaned);
    if (whole) return whole;

    const candidates = cleaned.match(FLAT_ARRAY_PATTERN);
    if (!candidates || candidates.length === 0) return null;
    return parseNameArray(candidates[candidates.length - 1]);
}

export class FounderExtractor {
    private buffer = '';
    private cursor = 0;
    private latestProgress: string[] | null = null;
    private latestFinal: string[] | null = null;

    /**
     * Feed the next chunk of agent text. Tags split across chunks are picked up
     * once their closing tag arrives.
     */
    push(chunk: string): void {
        if (!chunk) return;
        this.buffer += chunk;

        const pattern = new RegExp(TAG_PATTERN.source, TAG_PATTERN.flags);
        pattern.lastIndex = this.cursor;

        let match: RegExpExecArray | null;
        while ((match = pattern.exec(this.buffer)) !== null) {
            this.cursor = pattern.lastIndex;
            const names = parseNameArray(match[2]);
            if (!names) continue;
            if (match[1].toLowerCase() === FINAL_TAG) {
                this.latestFinal = names;
            } else {
                this.latestProgress = names;
            }
        }
    }

    get text(): string {
        return this.buffer;
    }

    get hasFinal(): boolean {
        return this.latestFinal !== null;
    }

    result(): Extraction {
        if (this.latestFinal) return { founders: [...this.latestFinal], source: 'final' };
        if (this.latestProgress) return { founders: [...this.latestProgress], source: 'progress' };

        const fallback = extractUntaggedArray(this.buffer);
        if (fallback) return { founders: fallback, source: 'fallback' };
        return { founders: [], source: 'none' };
    }
}

export function extractFounders(text: string): Extraction {
    const extractor = new FounderExtractor();
    extractor.push(text);
    return extractor.result();
}
