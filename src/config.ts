/**
 * Configuration management for ragchat
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import {
    envBool,
    envChoice,
    envNonNegativeInt,
    envNumber,
    envPositiveInt,
    envString,
} from './utils/env.js';

export type UiMode = 'minimal' | 'fancy' | 'plain';
export type ModelProvider = 'openrouter' | 'bedrock';
export type BedrockModelFamily = 'anthropic' | 'nova';
export type KbSearchType = 'HYBRID' | 'SEMANTIC';
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const MODEL_PROVIDERS: readonly ModelProvider[] = ['openrouter', 'bedrock'];
export const BEDROCK_MODEL_FAMILIES: readonly BedrockModelFamily[] = ['anthropic', 'nova'];
export const UI_MODES: readonly UiMode[] = ['minimal', 'fancy', 'plain'];
export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface StepModels {
    orchestration: string;
    action: string;
    observation: string;
}

/**
 * Timeouts and retries shared by every transport.
 * Built once here and handed to the clients; nothing else reads these from the environment.
 */
export interface NetworkPolicy {
    requestTimeoutMs: number;
    connectTimeoutMs: number;
    maxRetries: number;
}

export const DEFAULT_MODELS: Record<ModelProvider, StepModels> = {
    openrouter: {
        orchestration: 'anthropic/claude-3.5-haiku',
        action: 'amazon/nova-micro-v1',
        observation: 'anthropic/claude-3.5-haiku',
    },
    bedrock: {
        orchestration: 'us.anthropic.claude-3-5-haiku-20241022-v1:0',
        action: 'us.amazon.nova-micro-v1:0',
        observation: 'us.anthropic.claude-3-5-haiku-20241022-v1:0',
    },
};

/**
 * Centralized default values for the CLI configuration.
 * Use these instead of hardcoding defaults throughout the codebase.
 */
export const DEFAULTS = {
    modelProvider: 'openrouter',
    awsRegion: 'us-west-2',
    kbSearchType: 'HYBRID',
    modelTemperature: 0.1,
    modelMaxTokens: 4000,
    maxIterations: 5,
    maxErrors: 3,
    historyWindow: 10,
    requestTimeoutMs: 60_000,
    connectTimeoutMs: 30_000,
    maxRetries: 2,
    uiMode: 'fancy',
    renderMarkdown: true,
    showTrace: false,
    logLevel: 'warn',
} as const;

export interface Config {
    modelProvider: ModelProvider;
    openrouterApiKey: string;
    awsRegion: string;
    bedrockModelFamily?: BedrockModelFamily;
    models: StepModels;
    systemPrompt: string;
    kbId: string;
    kbDescription: string;
    kbSearchType: KbSearchType;
    modelTemperature: number;
    modelMaxTokens: number;
    maxIterations: number;
    maxErrors: number;
    historyWindow: number;
    network: NetworkPolicy;
    uiMode: UiMode;
    renderMarkdown: boolean;
    showTrace: boolean;
    logLevel: LogLevel;
}

function envSearchType(value: string | undefined): KbSearchType {
    return value?.trim().toUpperCase() === 'SEMANTIC' ? 'SEMANTIC' : DEFAULTS.kbSearchType;
}

function envModelFamily(value: string | undefined): BedrockModelFamily | undefined {
    const normalized = value?.trim().toLowerCase();
    return BEDROCK_MODEL_FAMILIES.find((family) => family === normalized);
}

function envLogLevel(env: NodeJS.ProcessEnv): LogLevel {
    if (envBool(env.DEBUG, false)) return 'debug';
    return envChoice(env.LOG_LEVEL, LOG_LEVELS, DEFAULTS.logLevel);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const modelProvider = envChoice(env.MODEL_PROVIDER, MODEL_PROVIDERS, DEFAULTS.modelProvider);
    const defaults = DEFAULT_MODELS[modelProvider];

    return {
        modelProvider,
        openrouterApiKey: envString(env.OPENROUTER_API_KEY),
        awsRegion: envString(env.AWS_REGION, DEFAULTS.awsRegion),
        bedrockModelFamily: envModelFamily(env.BEDROCK_MODEL_FAMILY),
        models: {
            orchestration: envString(env.ORCHESTRATION_MODEL, defaults.orchestration),
            action: envString(env.ACTION_MODEL, defaults.action),
            observation: envString(env.OBSERVATION_MODEL, defaults.observation),
        },
        systemPrompt: envString(env.SYSTEM_PROMPT),
        kbId: envString(env.KB_ID),
        kbDescription: envString(env.KB_DESCRIPTION),
        kbSearchType: envSearchType(env.KB_SEARCH_TYPE),
        modelTemperature: envNumber(env.MODEL_TEMPERATURE, DEFAULTS.modelTemperature),
        modelMaxTokens: envPositiveInt(env.MODEL_MAX_TOKENS, DEFAULTS.modelMaxTokens),
        maxIterations: envPositiveInt(env.MAX_ITERATIONS, DEFAULTS.maxIterations),
        maxErrors: envPositiveInt(env.MAX_ERRORS, DEFAULTS.maxErrors),
        historyWindow: envPositiveInt(env.HISTORY_WINDOW, DEFAULTS.historyWindow),
        network: {
            requestTimeoutMs: envPositiveInt(env.REQUEST_TIMEOUT_MS, DEFAULTS.requestTimeoutMs),
            connectTimeoutMs: envPositiveInt(env.CONNECT_TIMEOUT_MS, DEFAULTS.connectTimeoutMs),
            maxRetries: envNonNegativeInt(env.MAX_RETRIES, DEFAULTS.maxRetries),
        },
        uiMode: envChoice(env.UI_MODE, UI_MODES, DEFAULTS.uiMode),
        renderMarkdown: envBool(env.RENDER_MARKDOWN, DEFAULTS.renderMarkdown),
        showTrace: envBool(env.SHOW_TRACE, DEFAULTS.showTrace),
        logLevel: envLogLevel(env),
    };
}

export function isKbEnabled(config: Pick<Config, 'kbId'>): boolean {
    return config.kbId.trim() !== '';
}

export function validateConfig(
    config: Config,
    required: { model?: boolean; kb?: boolean } = { model: true }
): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (required.model !== false && config.modelProvider === 'openrouter' && !config.openrouterApiKey) {
        errors.push('OPENROUTER_API_KEY is not set');
    }

    if (required.model !== false && config.modelProvider === 'bedrock' && !config.awsRegion) {
        errors.push('AWS_REGION is not set');
    }

    if (required.kb && !isKbEnabled(config)) {
        errors.push('KB_ID is not set');
    }

    if (config.maxErrors > config.maxIterations) {
        errors.push('MAX_ERRORS must not exceed MAX_ITERATIONS');
    }

    return {
        valid: errors.length === 0,
        errors,
    };
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

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function updateEnvFile(envPath: string, updates: Record<string, string>): Promise<void> {
    let existing = '';
    try {
        existing = await readFile(envPath, 'utf8');
    } catch (error) {
        if (!isMissingFile(error)) throw error;
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

    while (nextLines.length > 0 && nextLines[nextLines.length - 1].trim() === '') {
        nextLines.pop();
    }

    for (const [key, value] of Object.entries(updates)) {
        if (touched.has(key)) continue;
        nextLines.push(`${key}=${escapeEnvValue(value)}`);
    }

    const finalContents = `${nextLines.join('\n')}\n`;
    const isNewFile = existing === '';
    const writeOptions: { encoding: BufferEncoding; mode?: number } = { encoding: 'utf8' };
    if (isNewFile) writeOptions.mode = 0o600;
    await writeFile(envPath, finalContents, writeOptions);
}

export function getDefaultEnvPath(): string {
    const explicit = process.env.RAGCHAT_ENV_PATH?.trim();
    if (explicit) return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit);
    return path.join(process.cwd(), '.env');
}

export async function writeEnvVars(
    updates: Record<string, string>,
    options: { envPath?: string } = {}
): Promise<void> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    await updateEnvFile(envPath, updates);
    for (const [key, value] of Object.entries(updates)) {
        process.env[key] = value;
    }
}

type SetupAnswers = {
    modelProvider: ModelProvider;
    openrouterApiKey?: string;
    awsRegion?: string;
    kbId: string;
    kbDescription?: string;
    uiMode: UiMode;
    showTrace: boolean;
};

export async function ensureConfig(
    required: { model?: boolean; kb?: boolean } = { model: true },
    options: { envPath?: string; force?: boolean } = {}
): Promise<Config> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    const current = loadConfig();
    const validation = validateConfig(current, required);

    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    const missingRequired = validation.errors.length > 0;

    if (!options.force && !missingRequired) return current;

    if (!canPrompt) {
        throw new Error(`Missing configuration:\n${validation.errors.map(e => `  • ${e}`).join('\n')}`);
    }

    const inquirer = (await import('inquirer')).default;
    const force = Boolean(options.force);

    const answers = await inquirer.prompt<SetupAnswers>([
        {
            type: 'list',
            name: 'modelProvider',
            message: 'Model provider',
            default: current.modelProvider,
            choices: [
                { name: 'OpenRouter (API key)', value: 'openrouter' },
                { name: 'Amazon Bedrock (AWS credentials)', value: 'bedrock' },
            ],
        },
        {
            type: 'password',
            name: 'openrouterApiKey',
            message: 'Paste your OpenRouter API key',
            mask: '*',
            when: (a: Partial<SetupAnswers>) => a.modelProvider === 'openrouter' && (force || !current.openrouterApiKey),
            validate: (input: string) => input.trim().length > 0 || 'OpenRouter API key is required',
        },
        {
            type: 'input',
            name: 'awsRegion',
            message: 'AWS region',
            default: current.awsRegion,
            when: (a: Partial<SetupAnswers>) => a.modelProvider === 'bedrock',
        },
        {
            type: 'input',
            name: 'kbId',
            message: 'Knowledge base id (blank = answer from general knowledge)',
            default: current.kbId,
        },
        {
            type: 'input',
            name: 'kbDescription',
            message: 'Short description of the knowledge base',
            default: current.kbDescription,
            when: (a: Partial<SetupAnswers>) => Boolean(a.kbId?.trim()),
        },
        {
            type: 'list',
            name: 'uiMode',
            message: 'UI style',
            default: current.uiMode,
            choices: [
                { name: 'Minimal (clean)', value: 'minimal' },
                { name: 'Fancy (boxed)', value: 'fancy' },
                { name: 'Plain (no color)', value: 'plain' },
            ],
        },
        {
            type: 'confirm',
            name: 'showTrace',
            message: 'Show the step trace after every answer?',
            default: current.showTrace,
        },
    ]);

    const updates: Record<string, string> = {
        MODEL_PROVIDER: answers.modelProvider,
        KB_ID: answers.kbId.trim(),
        KB_DESCRIPTION: answers.kbDescription?.trim() ?? '',
        UI_MODE: answers.uiMode,
        SHOW_TRACE: answers.showTrace ? '1' : '0',
    };

    if (answers.openrouterApiKey) updates.OPENROUTER_API_KEY = answers.openrouterApiKey.trim();
    if (answers.awsRegion) updates.AWS_REGION = answers.awsRegion.trim();
    if (answers.modelProvider !== current.modelProvider) {
        // Step models default per provider; drop stale ids from the other provider
        updates.ORCHESTRATION_MODEL = '';
        updates.ACTION_MODEL = '';
        updates.OBSERVATION_MODEL = '';
    }

    await writeEnvVars(updates, { envPath });

    return loadConfig();
}
