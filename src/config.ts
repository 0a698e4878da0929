/**
 * Configuration management for the Founder Finder CLI
 *
 * Settings come from `.env` (parsed, never loaded into `process.env`) overlaid by the
 * real environment, and are handed around as an explicit `Config` object.
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import dotenv from 'dotenv';
import { ApiKeyError } from './errors.js';
import { envBool, envOptionalInt, envOptionalNumber, envPositiveInt, envString, type EnvRecord } from './utils/env.js';

export type UiMode = 'minimal' | 'fancy' | 'plain';

/**
 * Centralized default values for the CLI configuration.
 */
export const DEFAULTS = {
    model: 'anthropic/claude-sonnet-4.5',
    maxTurns: 8,
    logDir: 'logs',
    writeLogs: true,
    uiMode: 'minimal',
    showToolCalls: true,
    inputFile: 'companies.txt',
    outputFile: 'founders.json',
} as const;

export interface Config {
    openrouterApiKey: string;
    exaApiKey: string;
    model: string;
    maxTurns: number;
    /** Undefined means every company runs at once. */
    concurrency?: number;
    temperature?: number;
    logDir: string;
    writeLogs: boolean;
    uiMode: UiMode;
    showToolCalls: boolean;
}

export interface RequiredKeys {
    openrouter?: boolean;
    exa?: boolean;
}

function envUiMode(value: string | undefined): UiMode {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'fancy') return 'fancy';
    if (normalized === 'plain') return 'plain';
    if (normalized === 'minimal') return 'minimal';
    return DEFAULTS.uiMode;
}

export function getDefaultEnvPath(env: EnvRecord = process.env): string {
    const explicit = env.FOUNDERS_ENV_PATH?.trim();
    if (explicit) return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit);
    return path.join(process.cwd(), '.env');
}

/**
 * Read `.env` (if present) and overlay the process environment on top of it.
 */
export async function loadEnvironment(
    envPath: string = getDefaultEnvPath(),
    base: EnvRecord = process.env
): Promise<EnvRecord> {
    let fileValues: EnvRecord = {};
    try {
        fileValues = dotenv.parse(await readFile(envPath, 'utf8'));
    } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code !== 'ENOENT') throw error;
    }
    return { ...fileValues, ...base };
}

export function loadConfig(env: EnvRecord = process.env): Config {
    const concurrency = envOptionalInt(env.FOUNDERS_CONCURRENCY);

    return {
        openrouterApiKey: env.OPENROUTER_API_KEY?.trim() || '',
        exaApiKey: env.EXA_API_KEY?.trim() || '',
        model: envString(env.FOUNDERS_MODEL, DEFAULTS.model),
        maxTurns: envPositiveInt(env.FOUNDERS_MAX_TURNS, DEFAULTS.maxTurns),
        concurrency: concurrency !== undefined && concurrency >= 1 ? concurrency : undefined,
        temperature: envOptionalNumber(env.FOUNDERS_TEMPERATURE),
        logDir: envString(env.FOUNDERS_LOG_DIR, DEFAULTS.logDir),
        writeLogs: envBool(env.FOUNDERS_WRITE_LOGS, DEFAULTS.writeLogs),
        uiMode: envUiMode(env.UI_MODE),
        showToolCalls: envBool(env.SHOW_TOOL_CALLS, DEFAULTS.showToolCalls),
    };
}

export function validateConfig(
    config: Config,
    required: RequiredKeys = { openrouter: true, exa: true }
): { valid: boolean; missing: string[] } {
    const missing: string[] = [];

    if (required.openrouter !== false && !config.openrouterApiKey) {
        missing.push('OPENROUTER_API_KEY');
    }

    if (required.exa !== false && !config.exaApiKey) {
        missing.push('EXA_API_KEY');
    }

    return {
        valid: missing.length === 0,
        missing,
    };
}

/**
 * Fail fast when a credential is missing. Called before any company is looked up.
 */
export function requireConfig(config: Config, required?: RequiredKeys): Config {
    const { valid, missing } = validateConfig(config, required);
    if (!valid) throw new ApiKeyError(missing);
    return config;
}

function escapeEnvValue(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '') return '""';
    const needsQuotes = /[\s#"'\\]/.test(trimmed);
    if (!needsQuotes) return trimmed;
    const escaped = trimmed
        .replace(/\\/g, '\\\\')
        .replace(/\n/g, '\\n')
        .replace(/"/g, '\\"');
    return `"${escaped}"`;
}

/**
 * Merge `updates` into an env file, keeping comments and unrelated keys.
 */
export async function writeEnvVars(envPath: string, updates: Record<string, string>): Promise<void> {
    let existing = '';
    try {
        existing = await readFile(envPath, 'utf8');
    } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code !== 'ENOENT') throw error;
    }

    const lines = existing === '' ? [] : existing.split(/\r?\n/);
    const touched = new Set<string>();

    const nextLines = lines.map((line) => {
        if (line.trim().startsWith('#')) return line;
        const match = line.match(/^\s*([A-Z0-9_]+)\s*=\s*(.*)\s*$/);
        if (!match) return line;

        const key = match[1];
        if (!(key in updates)) return line;

        touched.add(key);
        return `${key}=${escapeEnvValue(updates[key])}`;
    });

    if (nextLines.length > 0 && nextLines[nextLines.length - 1].trim() !== '') {
        nextLines.push('');
    }

    for (const [key, value] of Object.entries(updates)) {
        if (touched.has(key)) continue;
        nextLines.push(`${key}=${escapeEnvValue(value)}`);
    }

    const finalContents = nextLines.join('\n').replace(/\n*$/, '\n');
    const isNewFile = existing === '';
    const writeOptions: { encoding: BufferEncoding; mode?: number } = { encoding: 'utf8' };
    if (isNewFile) writeOptions.mode = 0o600;
    await writeFile(envPath, finalContents, writeOptions);
}

/**
 * Interactively ask for API keys and store them in the env file.
 */
export async function promptForKeys(
    current: Config,
    options: { envPath?: string; force?: boolean } = {}
): Promise<Config> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    const inquirer = (await import('inquirer')).default;

    const answers = await inquirer.prompt<{ openrouterApiKey?: string; exaApiKey?: string }>([
        {
            type: 'password',
            name: 'openrouterApiKey',
            message: 'Paste your OpenRouter API key',
            mask: '*',
            when: () => Boolean(options.force || !current.openrouterApiKey),
            validate: (input: string) => input.trim().length > 0 || 'OpenRouter API key is required',
        },
        {
            type: 'password',
            name: 'exaApiKey',
            message: 'Paste your Exa API key',
            mask: '*',
            when: () => Boolean(options.force || !current.exaApiKey),
            validate: (input: string) => input.trim().length > 0 || 'Exa API key is required',
        },
    ]);

    const next: Config = {
        ...current,
        openrouterApiKey: answers.openrouterApiKey?.trim() || current.openrouterApiKey,
        exaApiKey: answers.exaApiKey?.trim() || current.exaApiKey,
    };

    const updates: Record<string, string> = {};
    if (next.openrouterApiKey) updates.OPENROUTER_API_KEY = next.openrouterApiKey;
    if (next.exaApiKey) updates.EXA_API_KEY = next.exaApiKey;
    await writeEnvVars(envPath, updates);

    return next;
}
