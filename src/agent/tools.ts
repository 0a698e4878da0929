/**
 * Web tools offered to the research agent, backed by Exa
 */

import { z } from 'zod';
import type { ExaClient, ExaSearchResult } from '../clients/exa.js';
import type { ToolDefinition } from '../clients/openrouter.js';
import type { ToolName } from './types.js';

const SEARCH_RESULTS = 6;
const FETCH_MAX_CHARS = 6000;
const SNIPPET_CHARS = 400;

const WebSearchInput = z.object({ query: z.string().trim().min(1) });
const WebFetchInput = z.object({ url: z.string().trim().url() });

export const TOOL_DEFINITIONS: Record<ToolName, ToolDefinition> = {
    web_search: {
        name: 'web_search',
        description: 'Search the web. Returns titles, URLs and short excerpts of the best matching pages.',
        parameters: {
            type: 'object',
            properties: {
                query: { type: 'string', description: 'Search query' },
            },
            required: ['query'],
        },
    },
    web_fetch: {
        name: 'web_fetch',
        description: 'Fetch the readable text of a single web page.',
        parameters: {
            type: 'object',
            properties: {
                url: { type: 'string', description: 'Absolute URL of the page' },
            },
            required: ['url'],
        },
    },
};

export function isToolName(value: string): value is ToolName {
    return value === 'web_search' || value === 'web_fetch';
}

function parseInput<T>(schema: z.ZodType<T>, tool: ToolName, input: unknown): T {
    const parsed = schema.safeParse(input);
    if (parsed.success) return parsed.data;
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new Error(`Invalid arguments for ${tool}: ${where}${issue?.message ?? 'invalid input'}`);
}

function brief(input: string, maxLen: number): string {
    const text = input.replace(/\s+/g, ' ').trim();
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen - 1) + '…';
}

function formatSearchResults(results: ExaSearchResult[]): string {
    if (results.length === 0) return 'No results.';
    return results
        .map((r, i) => {
            const excerpt = r.highlights?.join(' ') || r.summary || r.text || '';
            const title = r.title || r.url;
            return `${i + 1}. ${title}\n   ${r.url}${excerpt ? `\n   ${brief(excerpt, SNIPPET_CHARS)}` : ''}`;
        })
        .join('\n');
}

/**
 * Runs tool calls on behalf of the agent. Invalid arguments and upstream failures
 * are thrown; the agent turns them into error results for the model.
 */
export class WebTools {
    private exaClient: Pick<ExaClient, 'search' | 'getContents'>;

    constructor(exaClient: Pick<ExaClient, 'search' | 'getContents'>) {
        this.exaClient = exaClient;
    }

    definitions(allowed: ToolName[]): ToolDefinition[] {
        return allowed.map((name) => TOOL_DEFINITIONS[name]);
    }

    async execute(name: ToolName, input: unknown): Promise<string> {
        switch (name) {
            case 'web_search': {
                const { query } = parseInput(WebSearchInput, name, input);
                const response = await this.exaClient.search(query, { numResults: SEARCH_RESULTS });
                return formatSearchResults(response.results);
            }
            case 'web_fetch': {
                const { url } = parseInput(WebFetchInput, name, input);
                const [page] = await this.exaClient.getContents([url], { maxCharacters: FETCH_MAX_CHARS });
                if (!page) return `No content could be retrieved from ${url}.`;
                const heading = page.title ? `${page.title}\n${page.url}` : page.url;
                return `${heading}\n\n${page.text || page.summary || '(empty page)'}`;
            }
        }
    }
}
