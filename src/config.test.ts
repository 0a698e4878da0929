/**
 * Unit tests for configuration management
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
    DEFAULTS,
    getDefaultEnvPath,
    loadConfig,
    loadEnvironment,
    requireConfig,
    validateConfig,
    writeEnvVars,
} from './config.js';
import { ApiKeyError } from './errors.js';

const keys = { OPENROUTER_API_KEY: 'test-openrouter-key', EXA_API_KEY: 'test-exa-key' };

describe('Config utilities', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await rm(dir, { recursive: true, force: true });
        dir = undefined;
    });

    describe('loadConfig', () => {
        it('should load default values when env vars are not set', () => {
            const config = loadConfig({});

            expect(config).toEqual({
                openrouterApiKey: '',
                exaApiKey: '',
                model: DEFAULTS.model,
                maxTurns: 8,
                concurrency: undefined,
                temperature: undefined,
                logDir: 'logs',
                writeLogs: true,
                uiMode: 'minimal',
                showToolCalls: true,
            });
        });

        it('should load values from environment variables', () => {
            const config = loadConfig({
                ...keys,
                FOUNDERS_MODEL: 'openai/gpt-4o',
                FOUNDERS_MAX_TURNS: '3',
                FOUNDERS_CONCURRENCY: '2',
                FOUNDERS_TEMPERATURE: '0.2',
                FOUNDERS_LOG_DIR: 'transcripts',
                UI_MODE: 'Fancy',
            });

            expect(config.openrouterApiKey).toBe('test-openrouter-key');
            expect(config.exaApiKey).toBe('test-exa-key');
            expect(config.model).toBe('openai/gpt-4o');
            expect(config.maxTurns).toBe(3);
            expect(config.concurrency).toBe(2);
            expect(config.temperature).toBe(0.2);
            expect(config.logDir).toBe('transcripts');
            expect(config.uiMode).toBe('fancy');
        });

        it('should parse boolean env vars correctly', () => {
            const config = loadConfig({ FOUNDERS_WRITE_LOGS: '0', SHOW_TOOL_CALLS: 'no' });

            expect(config.writeLogs).toBe(false);
            expect(config.showToolCalls).toBe(false);
        });

        it('should fall back to defaults for invalid numbers', () => {
            const config = loadConfig({ FOUNDERS_MAX_TURNS: '0', FOUNDERS_CONCURRENCY: 'many', FOUNDERS_TEMPERATURE: 'warm' });

            expect(config.maxTurns).toBe(8);
            expect(config.concurrency).toBeUndefined();
            expect(config.temperature).toBeUndefined();
        });

        it('should trim API keys', () => {
            expect(loadConfig({ OPENROUTER_API_KEY: '  test-openrouter-key \n' }).openrouterApiKey).toBe('test-openrouter-key');
        });
    });

    describe('validateConfig', () => {
        it('should return valid when all required keys are present', () => {
            const result = validateConfig(loadConfig(keys));

            expect(result.valid).toBe(true);
            expect(result.missing).toHaveLength(0);
        });

        it('should report every missing key', () => {
            const result = validateConfig(loadConfig({}));

            expect(result.valid).toBe(false);
            expect(result.missing).toEqual(['OPENROUTER_API_KEY', 'EXA_API_KEY']);
        });

        it('should skip validation for unrequired keys', () => {
            const result = validateConfig(loadConfig({ OPENROUTER_API_KEY: 'test-key' }), { exa: false, openrouter: true });

            expect(result.valid).toBe(true);
        });
    });

    describe('requireConfig', () => {
        it('should throw ApiKeyError naming the missing key', () => {
            const config = loadConfig({ OPENROUTER_API_KEY: 'test-key' });

            expect(() => requireConfig(config)).toThrow(ApiKeyError);
            expect(() => requireConfig(config)).toThrow('Missing API key: EXA_API_KEY');
        });

        it('should return the config when complete', () => {
            const config = loadConfig(keys);
            expect(requireConfig(config)).toBe(config);
        });
    });

    describe('getDefaultEnvPath', () => {
        it('should honour FOUNDERS_ENV_PATH', () => {
            expect(getDefaultEnvPath({ FOUNDERS_ENV_PATH: '/tmp/custom.env' })).toBe('/tmp/custom.env');
        });

        it('should default to .env in the working directory', () => {
            expect(getDefaultEnvPath({})).toBe(path.join(process.cwd(), '.env'));
        });
    });

    describe('loadEnvironment', () => {
        it('should let the process environment override the env file', async () => {
            dir = await mkdtemp(path.join(os.tmpdir(), 'founders-config-'));
            const envPath = path.join(dir, '.env');
            await writeFile(envPath, 'OPENROUTER_API_KEY=from-file\nEXA_API_KEY=file-exa\n', 'utf8');

            const env = await loadEnvironment(envPath, { EXA_API_KEY: 'from-env' });

            expect(env).toEqual({ OPENROUTER_API_KEY: 'from-file', EXA_API_KEY: 'from-env' });
        });

        it('should tolerate a missing env file', async () => {
            dir = await mkdtemp(path.join(os.tmpdir(), 'founders-config-'));

            const env = await loadEnvironment(path.join(dir, 'absent.env'), { UI_MODE: 'plain' });

            expect(env).toEqual({ UI_MODE: 'plain' });
        });
    });

    describe('writeEnvVars', () => {
        it('should create a new env file', async () => {
            dir = await mkdtemp(path.join(os.tmpdir(), 'founders-config-'));
            const envPath = path.join(dir, '.env');

            await writeEnvVars(envPath, { OPENROUTER_API_KEY: 'test-key' });

            expect(await readFile(envPath, 'utf8')).toBe('OPENROUTER_API_KEY=test-key\n');
        });

        it('should replace existing keys and keep comments and other keys', async () => {
            dir = await mkdtemp(path.join(os.tmpdir(), 'founders-config-'));
            const envPath = path.join(dir, '.env');
            await writeFile(envPath, '# keys\nOPENROUTER_API_KEY=old\nUI_MODE=plain\n', 'utf8');

            await writeEnvVars(envPath, { OPENROUTER_API_KEY: 'test-new', EXA_API_KEY: 'test exa' });

            expect(await readFile(envPath, 'utf8')).toBe(
                '# keys\nOPENROUTER_API_KEY=test-new\nUI_MODE=plain\n\nEXA_API_KEY="test exa"\n'
            );
        });
    });
});
