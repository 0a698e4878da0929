#!/usr/bin/env node
/**
 * Founder Finder CLI - Main Entry Point
 * Looks up company founders with a web-searching research agent
 */

import { checkNodeVersion } from './utils/node-version.js';

// Check Node.js version before anything else
checkNodeVersion();

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { runCommand } from './commands/run.js';
import { lookupCommand } from './commands/lookup.js';
import { verifyCommand } from './commands/verify.js';
import { initCommand } from './commands/init.js';
import { colors } from './ui/theme.js';

// Graceful shutdown handling
process.on('SIGINT', () => {
    console.log('\n' + colors.muted('Interrupted. Goodbye!'));
    process.exit(130);
});

process.on('SIGTERM', () => {
    console.log('\n' + colors.muted('Terminated. Goodbye!'));
    process.exit(143);
});

function readVersion(): string {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    const parsed = z.object({ version: z.string() }).safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
}

const program = new Command();

program
    .name('founders')
    .description('Find the original founders of a list of companies')
    .version(readVersion());

program.addCommand(runCommand, { isDefault: true });
program.addCommand(lookupCommand);
program.addCommand(verifyCommand);
program.addCommand(initCommand);

await program.parseAsync(process.argv);
