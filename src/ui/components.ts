/**
 * UI Components - terminal output for founder runs
 */

import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import { colors, icons, createHeader, divider, getBoxOuterWidth, progressLabel } from './theme.js';
import type { AgentEvent } from '../agent/types.js';
import type { Company } from '../founders/companies.js';
import type { FinderReporter, FounderLookup } from '../founders/finder.js';
import type { ResultSummary } from '../export/results.js';
import type { VerificationReport } from '../founders/verify.js';

type UiMode = 'minimal' | 'fancy' | 'plain';

function getUiMode(): UiMode {
    if (process.env.NO_COLOR !== undefined) return 'plain';
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    if (ui === 'plain') return 'plain';
    if (ui === 'fancy') {
        const isInteractive = Boolean(process.stdout.isTTY && process.stderr.isTTY);
        return isInteractive ? 'fancy' : 'minimal';
    }
    return 'minimal';
}

function brief(input: string, maxLen: number): string {
    const text = input.replace(/\s+/g, ' ').trim();
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen - 1) + '…';
}

/**
 * Display the app header
 */
export function showHeader(options: { title?: string; model?: string; detail?: string } = {}): void {
    const { title = 'Founder Finder', model, detail } = options;
    const mode = getUiMode();

    console.log();

    if (mode === 'fancy') {
        const lines: string[] = [gradient(['#6D28D9', '#7C3AED', '#06B6D4'])(title)];
        if (model) lines.push(colors.muted(`Model: ${model}`));
        if (detail) lines.push(colors.muted(detail));
        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#7C3AED',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }

    console.log(createHeader(title, model ? `Model: ${model}` : undefined));
    if (detail) console.log(colors.muted(detail));
    console.log(colors.muted(divider()));
}

/**
 * Create a spinner with custom styling
 */
export function createSpinner(text: string): Ora {
    const mode = getUiMode();
    return ora({
        text: mode === 'fancy' ? colors.secondary(text) : colors.muted(text),
        spinner: mode === 'fancy' ? 'dots12' : 'dots',
        color: mode === 'fancy' ? 'cyan' : undefined,
        isEnabled: mode === 'plain' ? false : undefined,
    });
}

/**
 * One-line description of an agent event, or null when it is not worth showing.
 */
export function describeAgentEvent(event: AgentEvent): string | null {
    switch (event.kind) {
        case 'tool_use': {
            if (event.name === 'web_search' && typeof event.input.query === 'string') {
                return `${icons.search} Searching: "${brief(event.input.query, 80)}"`;
            }
            if (event.name === 'web_fetch' && typeof event.input.url === 'string') {
                return `${icons.fetch} Fetching: ${brief(event.input.url, 100)}`;
            }
            return `${icons.arrow} ${event.name}`;
        }
        case 'tool_result':
            return event.isError ? `${icons.warning} ${event.name} failed: ${brief(event.content, 100)}` : null;
        case 'text':
            return `${icons.bullet} Agent responded with text (${event.text.length} chars)`;
    }
}

function describeSource(lookup: FounderLookup): string {
    switch (lookup.source) {
        case 'progress':
            return colors.warning(' (partial: no final answer before turn limit)');
        case 'fallback':
            return colors.muted(' (untagged answer)');
        case 'none':
            return colors.warning(' (no answer found in agent output)');
        default:
            return '';
    }
}

/**
 * Line-per-event reporter for the parallel run. Lines are prefixed with the
 * company so interleaved output stays readable.
 */
export function createConsoleReporter(options: { showToolCalls: boolean }): FinderReporter {
    return {
        onStart(company: Company, index: number, total: number) {
            console.log(`${progressLabel(index, total)} Starting search for ${company.name}...`);
        },
        onEvent(company: Company, event: AgentEvent) {
            if (!options.showToolCalls) return;
            const line = describeAgentEvent(event);
            if (line) console.log(colors.muted(`    [${company.name}] ${line}`));
        },
        onComplete(lookup: FounderLookup, index: number, total: number) {
            const label = progressLabel(index, total);
            const name = lookup.company.name;
            if (lookup.source === 'error') {
                console.log(`${label} ${colors.error(icons.error)} ${name}: ${colors.error(lookup.error ?? 'failed')}`);
            } else {
                const count = lookup.founders.length;
                console.log(
                    `${label} ${colors.success(icons.complete)} ${name}: Found ${count} founder${count === 1 ? '' : 's'}${describeSource(lookup)}`
                );
            }
            if (lookup.logError) {
                showWarning(`Conversation log for ${name} stopped: ${lookup.logError}`);
            }
        },
    };
}

export function showFounders(lookup: FounderLookup): void {
    console.log();
    console.log(colors.primary(lookup.company.name));
    if (lookup.founders.length === 0) {
        console.log(colors.muted(lookup.error ? `No founders (${lookup.error})` : 'No founders found'));
    } else {
        lookup.founders.forEach((founder) => console.log(`${colors.success(icons.bullet)} ${founder}`));
    }
    if (lookup.logFile) console.log(colors.muted(`Conversation log: ${lookup.logFile}`));
}

/**
 * Show the end-of-run summary
 */
export function showSummary(summary: ResultSummary, outputPath: string): void {
    const lines = [
        `${colors.success(icons.complete)} Results saved to ${outputPath}`,
        '',
        `Total companies: ${summary.total}`,
        `Companies with founders: ${summary.withFounders}`,
        `Companies without founders: ${summary.withoutFounders}`,
    ];

    console.log();
    if (getUiMode() === 'fancy') {
        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#10B981',
                title: 'Summary',
                titleAlignment: 'left',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }

    console.log(colors.muted(divider()));
    lines.forEach((line) => console.log(line));
    console.log(colors.muted(divider()));
}

export function showVerification(report: VerificationReport): void {
    console.log();
    console.log(colors.primary('Verification'));
    console.log(colors.muted(divider()));

    for (const entry of report.companies) {
        if (entry.status === 'missing') {
            console.log(`${colors.error(icons.error)} ${entry.company}: missing from results`);
            continue;
        }
        if (entry.status === 'correct') {
            console.log(`${colors.success(icons.complete)} ${entry.company} (${entry.expected.length} founders)`);
            continue;
        }
        console.log(`${colors.error(icons.error)} ${entry.company}: mismatch`);
        console.log(colors.muted(`    Expected: ${entry.expected.join(', ') || '(none)'}`));
        console.log(colors.muted(`    Got:      ${(entry.actual ?? []).join(', ') || '(none)'}`));
        if (entry.missing.length > 0) console.log(colors.muted(`    Missing:  ${entry.missing.join(', ')}`));
        if (entry.extra.length > 0) console.log(colors.muted(`    Extra:    ${entry.extra.join(', ')}`));
    }

    console.log(colors.muted(divider()));
    console.log(report.passed
        ? colors.success('All results correct')
        : colors.warning('Some results incorrect - review above'));
}

export function showWarning(message: string): void {
    console.warn(`${colors.warning(icons.warning)} ${message}`);
}

/**
 * Show error message
 */
export function showError(message: string): void {
    const mode = getUiMode();
    if (mode === 'fancy') {
        console.error(
            boxen(`${colors.error('Error')}\n${message}`, {
                padding: 1,
                borderStyle: 'round',
                borderColor: 'red',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }
    console.error(`${colors.error(icons.error)} ${colors.error('Error:')} ${message}`);
}
