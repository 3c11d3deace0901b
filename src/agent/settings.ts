import type { Config, StepModels } from '../config.js';

/**
 * The slice of configuration the loop itself reads
 */
export interface AgentSettings {
    indexId: string;
    kbDescription: string;
    systemPrompt: string;
    models: StepModels;
    temperature: number;
    maxTokens: number;
    maxIterations: number;
    maxErrors: number;
    historyWindow: number;
}

export function agentSettingsFromConfig(config: Config): AgentSettings {
    return {
        indexId: config.kbId.trim(),
        kbDescription: config.kbDescription,
        systemPrompt: config.systemPrompt,
        models: { ...config.models },
        temperature: config.modelTemperature,
        maxTokens: config.modelMaxTokens,
        maxIterations: config.maxIterations,
        maxErrors: config.maxErrors,
        historyWindow: config.historyWindow,
    };
}
