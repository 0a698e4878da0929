/**
 * Founder Finder - one independent agent run per company, fanned out in parallel
 */

import type { AgentEvent, AgentRequest, FounderAgent, ToolName } from '../agent/types.js';
import { errorMessage } from '../errors.js';
import type { Company } from './companies.js';
import { FounderExtractor, type ExtractionSource } from './extractor.js';
import { getFounderPrompt, getFounderSystemPrompt } from './prompts.js';
import { ConversationLog } from './transcript.js';

export const DEFAULT_ALLOWED_TOOLS: ToolName[] = ['web_search', 'web_fetch'];

export type FounderList = string[];
export type ResultMap = Record<string, FounderList>;

export interface FounderLookup {
    company: Company;
    founders: FounderList;
    source: ExtractionSource | 'error';
    error?: string;
    logFile?: string;
    logError?: string;
    /** First exception thrown by a reporter callback. */
    reporterError?: string;
}

export interface FinderReporter {
    onStart?(company: Company, index: number, total: number): void;
    onEvent?(company: Company, event: AgentEvent, index: number, total: number): void;
    onComplete?(lookup: FounderLookup, index: number, total: number): void;
}

export interface FinderOptions {
    maxTurns: number;
    allowedTools?: ToolName[];
    /** Directory for per-company transcripts; omit to skip them. */
    logDir?: string;
    reporter?: FinderReporter;
}

export interface FanOutOptions extends FinderOptions {
    /** Upper bound on simultaneous agent runs; defaults to all companies at once. */
    concurrency?: number;
}

export function buildFounderRequest(
    company: Company,
    maxTurns: number,
    allowedTools: ToolName[] = DEFAULT_ALLOWED_TOOLS
): AgentRequest {
    return {
        prompt: getFounderPrompt(company),
        systemPrompt: getFounderSystemPrompt(maxTurns),
        allowedTools,
        maxTurns,
    };
}

/**
 * Run the agent for one company. Never rejects: failures come back as an empty list
 * with `source: 'error'`.
 */
export async function lookupFounders(
    company: Company,
    agent: FounderAgent,
    options: FinderOptions,
    index: number = 1,
    total: number = 1
): Promise<FounderLookup> {
    const { reporter } = options;
    const request = buildFounderRequest(company, options.maxTurns, options.allowedTools);
    const extractor = new FounderExtractor();
    let log: ConversationLog | undefined;

    const finish = async (lookup: FounderLookup): Promise<FounderLookup> => {
        if (log) {
            await log.write(`[result] ${lookup.source}: ${JSON.stringify(lookup.founders)}${lookup.error ? `\n[error] ${lookup.error}` : ''}`);
            lookup.logFile = log.filePath;
            if (log.error) lookup.logError = log.error.message;
        }
        return lookup;
    };

    // Reporter failures are recorded but never change the result.
    const reporterFailures: string[] = [];
    const notify = (call: () => void): void => {
        try {
            call();
        } catch (error) {
            reporterFailures.push(errorMessage(error));
        }
    };

    notify(() => reporter?.onStart?.(company, index, total));

    let lookup: FounderLookup;
    try {
        if (options.logDir) {
            log = await ConversationLog.open(
                options.logDir,
                company.name,
                `Founder search: ${company.name}${company.url ? ` (${company.url})` : ''}\nStarted: ${new Date().toISOString()}`
            );
            await log.write(`[system]\n${request.systemPrompt}\n\n[prompt]\n${request.prompt}\n`);
        }

        for await (const event of agent.query(request)) {
            if (event.kind === 'text') extractor.push(event.text);
            if (log) await log.event(event);
            notify(() => reporter?.onEvent?.(company, event, index, total));
        }

        const { founders, source } = extractor.result();
        lookup = await finish({ company, founders, source });
    } catch (error) {
        lookup = await finish({ company, founders: [], source: 'error', error: errorMessage(error) });
    }

    notify(() => reporter?.onComplete?.(lookup, index, total));
    if (reporterFailures.length > 0) lookup.reporterError = reporterFailures[0];
    return lookup;
}

export async function resolveFounders(
    company: Company,
    agent: FounderAgent,
    options: FinderOptions
): Promise<FounderList> {
    const lookup = await lookupFounders(company, agent, options);
    return lookup.founders;
}

/**
 * Look up every company concurrently and wait for all of them. Results keep input order.
 */
export async function findAllFounders(
    companies: Company[],
    agent: FounderAgent,
    options: FanOutOptions
): Promise<FounderLookup[]> {
    const total = companies.length;
    if (total === 0) return [];

    const requested = typeof options.concurrency === 'number' && options.concurrency >= 1
        ? Math.trunc(options.concurrency)
        : total;
    const concurrency = Math.min(requested, total);

    const results: FounderLookup[] = new Array(total);
    let nextIndex = 0;

    const workers = Array.from({ length: concurrency }, async () => {
        while (true) {
            const index = nextIndex++;
            if (index >= total) break;
            results[index] = await lookupFounders(companies[index], agent, options, index + 1, total);
        }
    });

    await Promise.all(workers);
    return results;
}

export function toResultMap(lookups: FounderLookup[]): ResultMap {
    return Object.fromEntries(lookups.map((lookup) => [lookup.company.name, lookup.founders]));
}
