/**
 * Setup shared by the CLI commands
 */

import {
    ensureConfig,
    loadConfig,
    validateConfig,
    MODEL_PROVIDERS,
    UI_MODES,
    type Config,
} from '../config.js';
import { KnowledgeBaseClient } from '../clients/knowledge-base.js';
import { createModelClient } from '../clients/model.js';
import { ReactEngine } from '../agent/react-engine.js';
import { agentSettingsFromConfig } from '../agent/settings.js';
import { ConfigError } from '../errors.js';
import { setLogLevel } from '../utils/logger.js';
import { colors } from '../ui/theme.js';

export interface CommonOptions {
    kb?: string;
    provider?: string;
    model?: string;
    ui?: string;
}

export type Requirements = { model?: boolean; kb?: boolean };

export function maybeShowSetupIntro(errors: string[]): void {
    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt || errors.length === 0) return;

    console.log();
    console.log(colors.primary('Quick setup'));
    console.log(colors.muted('Answer a few questions (they will be saved to .env).'));
    console.log(colors.muted(`Missing: ${errors.map(e => e.replace(' is not set', '')).join(', ')}`));
    console.log(colors.muted('Tip: run `ragchat init` anytime to change defaults.'));
    console.log();
}

/**
 * Copy command-line overrides into the environment the config is read from
 */
export function applyEnvOverrides(options: CommonOptions, env: NodeJS.ProcessEnv = process.env): void {
    if (options.provider !== undefined) {
        const provider = options.provider.trim().toLowerCase();
        if (!MODEL_PROVIDERS.some((p) => p === provider)) {
            throw new ConfigError(
                `Unknown provider "${options.provider}". Use one of: ${MODEL_PROVIDERS.join(', ')}`,
                'MODEL_PROVIDER'
            );
        }
        env.MODEL_PROVIDER = provider;
    }

    if (options.kb !== undefined) env.KB_ID = options.kb.trim();

    if (options.ui !== undefined) {
        const ui = options.ui.trim().toLowerCase();
        if (!UI_MODES.some((m) => m === ui)) {
            throw new ConfigError(`Unknown UI mode "${options.ui}". Use one of: ${UI_MODES.join(', ')}`, 'UI_MODE');
        }
        env.UI_MODE = ui;
    }
}

/**
 * --model pins the same model for every step
 */
export function withModelOverride(config: Config, model?: string): Config {
    const pinned = model?.trim();
    if (!pinned) return config;
    return {
        ...config,
        models: { orchestration: pinned, action: pinned, observation: pinned },
    };
}

/**
 * Preflight, prompt for anything missing, then return the effective config
 */
export async function prepareConfig(options: CommonOptions, required: Requirements = { model: true }): Promise<Config> {
    applyEnvOverrides(options);

    const preflight = loadConfig();
    process.env.UI_MODE = preflight.uiMode;
    setLogLevel(preflight.logLevel);

    const validation = validateConfig(preflight, required);
    if (!validation.valid) maybeShowSetupIntro(validation.errors);
    const config = await ensureConfig(required);

    setLogLevel(config.logLevel);
    return withModelOverride(config, options.model);
}

export function createEngine(config: Config): ReactEngine {
    const modelClient = createModelClient(config);
    const searchClient = new KnowledgeBaseClient({
        region: config.awsRegion,
        network: config.network,
        searchType: config.kbSearchType,
    });
    return new ReactEngine(agentSettingsFromConfig(config), { modelClient, searchClient });
}
