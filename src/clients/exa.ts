/**
 * Exa Search API Client
 * Backs the agent's web search and page fetch tools
 */

import { z } from 'zod';
import { envTimeoutMs } from '../utils/env.js';

const EXA_API_BASE = 'https://api.exa.ai';
const MAX_RETRIES = 3;
const INITIAL_RETRY_DELAY_MS = 1000;
const DEFAULT_TIMEOUT_MS = 90_000;

function createTimeoutSignal(timeoutMs: number): { signal: AbortSignal; cleanup: () => void } {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    return {
        signal: controller.signal,
        cleanup: () => clearTimeout(timeoutId),
    };
}

function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

export interface ExaSearchOptions {
    type?: 'auto' | 'neural' | 'keyword' | 'fast';
    numResults?: number;
    includeDomains?: string[];
    category?: 'company' | 'news' | 'linkedin profile' | 'personal site';
    contents?: {
        text?: boolean | { maxCharacters?: number };
        highlights?: {
            numSentences?: number;
            highlightsPerUrl?: number;
            query?: string;
        };
        summary?: {
            query?: string;
        };
    };
}

const ExaSearchResultSchema = z.object({
    id: z.string().optional(),
    url: z.string(),
    title: z.string().nullish(),
    score: z.number().nullish(),
    publishedDate: z.string().nullish(),
    author: z.string().nullish(),
    text: z.string().nullish(),
    highlights: z.array(z.string()).nullish(),
    summary: z.string().nullish(),
});

const ExaSearchResponseSchema = z.object({
    requestId: z.string().optional(),
    resolvedSearchType: z.string().optional(),
    results: z.array(ExaSearchResultSchema).default([]),
});

export type ExaSearchResult = z.infer<typeof ExaSearchResultSchema>;
export type ExaSearchResponse = z.infer<typeof ExaSearchResponseSchema>;

export class ExaClient {
    private apiKey: string;

    constructor(apiKey: string) {
        if (!apiKey || apiKey.trim() === '') {
            throw new Error(
                'EXA_API_KEY is required.\n' +
                'Get your API key at: https://exa.ai\n' +
                'Then run: founders init'
            );
        }
        this.apiKey = apiKey.trim();
    }

    /**
     * Fetch with retry logic and exponential backoff
     */
    private async fetchWithRetry(
        url: string,
        options: RequestInit,
        retries = MAX_RETRIES,
        timeoutMs: number = DEFAULT_TIMEOUT_MS
    ): Promise<Response> {
        let lastError: Error | null = null;
        let lastResponse: Response | null = null;

        for (let attempt = 0; attempt < retries; attempt++) {
            const resolvedTimeoutMs = envTimeoutMs(process.env.EXA_TIMEOUT_MS, timeoutMs);
            const { signal, cleanup } = createTimeoutSignal(resolvedTimeoutMs);
            try {
                const response = await fetch(url, { ...options, signal });
                lastResponse = response;

                if (response.ok || (response.status >= 400 && response.status < 500 && response.status !== 429)) {
                    return response;
                }

                const delay = response.status === 429
                    ? INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt + 1)
                    : INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt);
                if (attempt < retries - 1) {
                    await new Promise(resolve => setTimeout(resolve, delay));
                }
            } catch (error) {
                const err = toError(error);
                lastError = err.name === 'AbortError'
                    ? new Error(`Request timed out after ${resolvedTimeoutMs}ms`)
                    : err;

                if (attempt < retries - 1) {
                    const delay = INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt);
                    await new Promise(resolve => setTimeout(resolve, delay));
                }
            } finally {
                cleanup();
            }
        }

        if (lastResponse) return lastResponse;
        throw lastError || new Error('Max retries exceeded');
    }

    private async parseError(response: Response): Promise<string> {
        try {
            const text = await response.text();
            try {
                const parsed = z.object({ message: z.string().optional(), error: z.string().optional() })
                    .safeParse(JSON.parse(text));
                return parsed.success ? parsed.data.message || parsed.data.error || text : text;
            } catch {
                return text;
            }
        } catch {
            return `HTTP ${response.status}`;
        }
    }

    private async post(endpoint: string, body: Record<string, unknown>): Promise<ExaSearchResponse> {
        const response = await this.fetchWithRetry(`${EXA_API_BASE}${endpoint}`, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'x-api-key': this.apiKey,
            },
            body: JSON.stringify(body),
        });

        if (!response.ok) {
            const errorMessage = await this.parseError(response);

            if (response.status === 401) {
                throw new Error(
                    'Exa API authentication failed.\n' +
                    'Please check your EXA_API_KEY is valid.\n' +
                    'Run: founders init'
                );
            }

            if (response.status === 429) {
                throw new Error(
                    'Exa API rate limit exceeded.\n' +
                    'Please wait a moment and try again.'
                );
            }

            throw new Error(`Exa API error: ${response.status} - ${errorMessage}`);
        }

        const parsed = ExaSearchResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new Error(`Exa API returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        }
        return parsed.data;
    }

    /**
     * Perform a web search
     */
    async search(query: string, options: ExaSearchOptions = {}): Promise<ExaSearchResponse> {
        return this.post('/search', {
            query,
            type: options.type || 'auto',
            numResults: options.numResults || 8,
            includeDomains: options.includeDomains,
            category: options.category,
            contents: options.contents || {
                highlights: {
                    numSentences: 3,
                    highlightsPerUrl: 2,
                    query,
                },
            },
        });
    }

    /**
     * Get page contents for given URLs
     */
    async getContents(urls: string[], options: { maxCharacters?: number } = {}): Promise<ExaSearchResult[]> {
        if (urls.length === 0) return [];
        const data = await this.post('/contents', {
            ids: urls,
            text: { maxCharacters: options.maxCharacters ?? 8000 },
        });
        return data.results;
    }
}
