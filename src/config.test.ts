/**
 * Unit tests for configuration management
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
    DEFAULTS,
    DEFAULT_MODELS,
    ensureConfig,
    isKbEnabled,
    loadConfig,
    validateConfig,
    writeEnvVars,
} from './config.js';

describe('Config utilities', () => {
    describe('loadConfig', () => {
        it('should load default values when env vars are not set', () => {
            const config = loadConfig({});

            expect(config.modelProvider).toBe('openrouter');
            expect(config.openrouterApiKey).toBe('');
            expect(config.awsRegion).toBe('us-west-2');
            expect(config.models).toEqual(DEFAULT_MODELS.openrouter);
            expect(config.kbId).toBe('');
            expect(config.kbSearchType).toBe('HYBRID');
            expect(config.modelTemperature).toBe(0.1);
            expect(config.modelMaxTokens).toBe(4000);
            expect(config.maxIterations).toBe(5);
            expect(config.maxErrors).toBe(3);
            expect(config.historyWindow).toBe(10);
            expect(config.network).toEqual({ requestTimeoutMs: 60_000, connectTimeoutMs: 30_000, maxRetries: 2 });
            expect(config.uiMode).toBe('fancy');
            expect(config.showTrace).toBe(false);
            expect(config.logLevel).toBe('warn');
        });

        it('should load values from environment variables', () => {
            const config = loadConfig({
                MODEL_PROVIDER: 'Bedrock',
                AWS_REGION: 'eu-central-1',
                KB_ID: ' KB12345 ',
                KB_DESCRIPTION: 'HR policies',
                KB_SEARCH_TYPE: 'semantic',
                ACTION_MODEL: 'us.amazon.nova-lite-v1:0',
                MAX_ITERATIONS: '7',
                UI_MODE: 'plain',
                SHOW_TRACE: 'yes',
            });

            expect(config.modelProvider).toBe('bedrock');
            expect(config.awsRegion).toBe('eu-central-1');
            expect(config.kbId).toBe('KB12345');
            expect(config.kbDescription).toBe('HR policies');
            expect(config.kbSearchType).toBe('SEMANTIC');
            expect(config.models).toEqual({
                orchestration: DEFAULT_MODELS.bedrock.orchestration,
                action: 'us.amazon.nova-lite-v1:0',
                observation: DEFAULT_MODELS.bedrock.observation,
            });
            expect(config.maxIterations).toBe(7);
            expect(config.uiMode).toBe('plain');
            expect(config.showTrace).toBe(true);
        });

        it('should fall back to defaults for invalid numbers and choices', () => {
            const config = loadConfig({
                MODEL_PROVIDER: 'somewhere-else',
                MAX_ITERATIONS: '0',
                MAX_ERRORS: '2.5',
                MAX_RETRIES: '-1',
                MODEL_TEMPERATURE: 'warm',
                BEDROCK_MODEL_FAMILY: 'llama',
            });

            expect(config.modelProvider).toBe(DEFAULTS.modelProvider);
            expect(config.maxIterations).toBe(DEFAULTS.maxIterations);
            expect(config.maxErrors).toBe(DEFAULTS.maxErrors);
            expect(config.network.maxRetries).toBe(DEFAULTS.maxRetries);
            expect(config.modelTemperature).toBe(DEFAULTS.modelTemperature);
            expect(config.bedrockModelFamily).toBeUndefined();
        });

        it('should accept zero retries', () => {
            expect(loadConfig({ MAX_RETRIES: '0' }).network.maxRetries).toBe(0);
        });

        it('should let DEBUG force the debug log level', () => {
            expect(loadConfig({ LOG_LEVEL: 'error', DEBUG: '1' }).logLevel).toBe('debug');
            expect(loadConfig({ LOG_LEVEL: 'info' }).logLevel).toBe('info');
        });
    });

    describe('isKbEnabled', () => {
        it('should treat a blank id as disabled', () => {
            expect(isKbEnabled({ kbId: '' })).toBe(false);
            expect(isKbEnabled({ kbId: '   ' })).toBe(false);
            expect(isKbEnabled({ kbId: 'KB1' })).toBe(true);
        });
    });

    describe('validateConfig', () => {
        it('should require an OpenRouter key for the openrouter provider', () => {
            const result = validateConfig(loadConfig({}));
            expect(result.valid).toBe(false);
            expect(result.errors).toEqual(['OPENROUTER_API_KEY is not set']);
        });

        it('should not require an OpenRouter key for bedrock', () => {
            const result = validateConfig(loadConfig({ MODEL_PROVIDER: 'bedrock' }));
            expect(result).toEqual({ valid: true, errors: [] });
        });

        it('should require KB_ID only when asked', () => {
            const config = loadConfig({ OPENROUTER_API_KEY: 'test-api-key' });
            expect(validateConfig(config).valid).toBe(true);
            expect(validateConfig(config, { model: false, kb: true }).errors).toEqual(['KB_ID is not set']);
        });

        it('should reject an error budget larger than the iteration budget', () => {
            const config = loadConfig({ OPENROUTER_API_KEY: 'test-api-key', MAX_ITERATIONS: '2', MAX_ERRORS: '3' });
            expect(validateConfig(config).errors).toEqual(['MAX_ERRORS must not exceed MAX_ITERATIONS']);
        });
    });

    describe('.env handling', () => {
        const originalEnv = process.env;
        let dir: string;

        beforeEach(async () => {
            process.env = { ...originalEnv };
            dir = await mkdtemp(path.join(tmpdir(), 'ragchat-config-'));
        });

        afterEach(async () => {
            process.env = originalEnv;
            await rm(dir, { recursive: true, force: true });
        });

        it('should create a new .env file readable only by the owner', async () => {
            const envPath = path.join(dir, '.env');
            await writeEnvVars({ KB_ID: 'KB1', KB_DESCRIPTION: 'HR handbook' }, { envPath });

            expect(await readFile(envPath, 'utf8')).toBe('KB_ID=KB1\nKB_DESCRIPTION="HR handbook"\n');
            expect((await stat(envPath)).mode & 0o777).toBe(0o600);
            expect(process.env.KB_ID).toBe('KB1');
        });

        it('should update existing keys in place and keep comments', async () => {
            const envPath = path.join(dir, '.env');
            await writeFile(envPath, '# settings\nKB_ID=OLD\nUI_MODE=plain\n', 'utf8');

            await writeEnvVars({ KB_ID: 'NEW', SHOW_TRACE: '1' }, { envPath });

            expect(await readFile(envPath, 'utf8')).toBe('# settings\nKB_ID=NEW\nUI_MODE=plain\nSHOW_TRACE=1\n');
        });

        it('should refuse to prompt without a terminal', async () => {
            delete process.env.OPENROUTER_API_KEY;
            delete process.env.MODEL_PROVIDER;
            const stdinTty = process.stdin.isTTY;
            process.stdin.isTTY = false;
            try {
                await expect(ensureConfig({ model: true }, { envPath: path.join(dir, '.env') }))
                    .rejects.toThrow('Missing configuration:\n  • OPENROUTER_API_KEY is not set');
            } finally {
                process.stdin.isTTY = stdinTty;
            }
        });

        it('should return the current config when nothing is missing', async () => {
            process.env.OPENROUTER_API_KEY = 'test-api-key';
            delete process.env.MODEL_PROVIDER;
            const config = await ensureConfig({ model: true }, { envPath: path.join(dir, '.env') });
            expect(config.openrouterApiKey).toBe('test-api-key');
        });
    });
});
