/**
 * Model client seam shared by the agent steps
 */

import type { Config, ModelProvider } from '../config.js';
import { ApiKeyError } from '../errors.js';
import { BedrockModelClient, type BedrockTransport } from './bedrock.js';
import { OpenRouterClient } from './openrouter.js';

export interface ModelRequest {
    modelId: string;
    prompt: string;
    systemPrompt?: string;
    temperature: number;
    maxOutputTokens: number;
}

/**
 * One request, one complete text response
 */
export interface ModelClient {
    readonly provider: ModelProvider;
    invoke(request: ModelRequest): Promise<string>;
}

export interface ModelClientDeps {
    bedrockTransport?: BedrockTransport;
}

export function createModelClient(config: Config, deps: ModelClientDeps = {}): ModelClient {
    switch (config.modelProvider) {
        case 'openrouter':
            if (!config.openrouterApiKey) {
                throw new ApiKeyError('OPENROUTER_API_KEY', undefined, 'https://openrouter.ai/keys');
            }
            return new OpenRouterClient(config.openrouterApiKey, config.network);
        case 'bedrock':
            return new BedrockModelClient({
                region: config.awsRegion,
                network: config.network,
                family: config.bedrockModelFamily,
                transport: deps.bedrockTransport,
            });
    }
}
