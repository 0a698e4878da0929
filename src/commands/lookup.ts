import { Command } from 'commander';
import { loadConfig, loadEnvironment, requireConfig } from '../config.js';
import { createResearchAgent } from '../agent/research-agent.js';
import { parseCompanyLine } from '../founders/companies.js';
import { lookupFounders } from '../founders/finder.js';
import { createSpinner, describeAgentEvent, showError, showFounders, showHeader } from '../ui/components.js';
import { colors } from '../ui/theme.js';
import { errorMessage } from '../errors.js';
import { parsePositiveInt } from '../utils/env.js';

export const lookupCommand = new Command('lookup')
    .description('Find the founders of a single company')
    .argument('<name>', 'Company name, or a full "Name (URL)" line')
    .argument('[url]', 'Company website')
    .option('-m, --model <model>', 'OpenRouter model to use')
    .option('--max-turns <n>', 'Agent turn budget', parsePositiveInt)
    .option('--no-logs', 'Do not write a conversation log')
    .action(async (
        name: string,
        url: string | undefined,
        options: { model?: string; maxTurns?: number; logs: boolean }
    ) => {
        try {
            const env = await loadEnvironment();
            const base = loadConfig(env);
            const config = requireConfig({
                ...base,
                model: options.model ?? base.model,
                maxTurns: options.maxTurns ?? base.maxTurns,
            });
            process.env.UI_MODE = config.uiMode;

            const parsed = parseCompanyLine(name);
            if (!parsed) throw new Error('Company name must not be empty');
            const company = url ? { name: parsed.name, url: url.trim() } : parsed;

            showHeader({ model: config.model, detail: company.url ? `${company.name} (${company.url})` : company.name });

            const spinner = createSpinner(`Researching ${company.name}...`);
            spinner.start();

            const lookup = await lookupFounders(company, createResearchAgent(config), {
                maxTurns: config.maxTurns,
                logDir: config.writeLogs && options.logs ? config.logDir : undefined,
                reporter: {
                    onEvent: (_company, event) => {
                        const line = describeAgentEvent(event);
                        if (line) spinner.text = colors.muted(line);
                    },
                },
            });

            if (lookup.source === 'error') {
                spinner.fail(colors.error(`Lookup failed for ${company.name}`));
            } else {
                spinner.succeed(colors.success(`Found ${lookup.founders.length} founder(s)`));
            }
            showFounders(lookup);
        } catch (error) {
            showError(errorMessage(error));
            process.exit(1);
        }
    });
