import { Command } from 'commander';
import { DEFAULTS, loadConfig, loadEnvironment, requireConfig, type Config, type UiMode } from '../config.js';
import { createResearchAgent } from '../agent/research-agent.js';
import type { FounderAgent } from '../agent/types.js';
import { readCompaniesFile } from '../founders/companies.js';
import { findAllFounders, toResultMap, type FinderReporter, type FounderLookup, type ResultMap } from '../founders/finder.js';
import { summarizeResults, writeResults, type ResultSummary } from '../export/results.js';
import { createConsoleReporter, showError, showHeader, showSummary } from '../ui/components.js';
import { colors } from '../ui/theme.js';
import { errorMessage } from '../errors.js';
import { parsePositiveInt } from '../utils/env.js';

export interface RunOptions {
    inputPath: string;
    outputPath: string;
    config: Config;
    /** Defaults to the OpenRouter + Exa research agent built from `config`. */
    agent?: FounderAgent;
    reporter?: FinderReporter;
    /** Called once the company list is loaded, before any agent runs. */
    onCompaniesLoaded?: (count: number) => void;
}

export interface RunResult {
    lookups: FounderLookup[];
    results: ResultMap;
    summary: ResultSummary;
}

/**
 * The whole pipeline: check credentials, read companies, fan out, write the JSON map.
 * Credentials and the input file are checked before any request is made.
 */
export async function runFounderSearch(options: RunOptions): Promise<RunResult> {
    const config = requireConfig(options.config);
    const companies = await readCompaniesFile(options.inputPath);
    options.onCompaniesLoaded?.(companies.length);

    const agent = options.agent ?? createResearchAgent(config);
    const lookups = await findAllFounders(companies, agent, {
        maxTurns: config.maxTurns,
        concurrency: config.concurrency,
        logDir: config.writeLogs ? config.logDir : undefined,
        reporter: options.reporter,
    });

    const results = toResultMap(lookups);
    await writeResults(options.outputPath, results);

    return { lookups, results, summary: summarizeResults(results) };
}

export interface RunCommandOptions {
    output: string;
    model?: string;
    maxTurns?: number;
    concurrency?: number;
    logDir?: string;
    logs: boolean;
    toolCalls: boolean;
    ui?: string;
}

export function applyRunOptions(config: Config, options: RunCommandOptions): Config {
    const uiMode: UiMode | undefined = options.ui === 'plain' || options.ui === 'fancy' || options.ui === 'minimal'
        ? options.ui
        : undefined;
    return {
        ...config,
        model: options.model ?? config.model,
        maxTurns: options.maxTurns ?? config.maxTurns,
        concurrency: options.concurrency ?? config.concurrency,
        logDir: options.logDir ?? config.logDir,
        writeLogs: config.writeLogs && options.logs,
        showToolCalls: config.showToolCalls && options.toolCalls,
        uiMode: uiMode ?? config.uiMode,
    };
}

export const runCommand = new Command('run')
    .description('Find founders for every company in the input file')
    .argument('[input]', 'Company list, one "Name (URL)" per line', DEFAULTS.inputFile)
    .option('-o, --output <file>', 'Where to write the JSON results', DEFAULTS.outputFile)
    .option('-m, --model <model>', 'OpenRouter model to use')
    .option('--max-turns <n>', 'Agent turn budget per company', parsePositiveInt)
    .option('-c, --concurrency <n>', 'Maximum companies researched at once', parsePositiveInt)
    .option('--log-dir <dir>', 'Directory for per-company conversation logs')
    .option('--no-logs', 'Do not write conversation logs')
    .option('--no-tool-calls', 'Hide agent search/fetch activity')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .action(async (input: string, options: RunCommandOptions) => {
        try {
            const env = await loadEnvironment();
            const config = applyRunOptions(loadConfig(env), options);
            process.env.UI_MODE = config.uiMode;

            const result = await runFounderSearch({
                inputPath: input,
                outputPath: options.output,
                config,
                reporter: createConsoleReporter({ showToolCalls: config.showToolCalls }),
                onCompaniesLoaded: (count) => {
                    showHeader({ model: config.model, detail: `${count} companies from ${input}` });
                    const mode = config.concurrency ? `up to ${config.concurrency} at a time` : 'all companies concurrently';
                    console.log(colors.muted(`Running in parallel mode - ${mode}`));
                    console.log();
                },
            });

            showSummary(result.summary, options.output);
        } catch (error) {
            showError(errorMessage(error));
            process.exit(1);
        }
    });
