/**
 * Amazon Bedrock runtime client
 * Request bodies differ per model family; each family owns one formatter
 */

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import { DEFAULTS, type BedrockModelFamily, type NetworkPolicy } from '../config.js';
import { ConfigError, ModelInvocationError, RateLimitError, toError } from '../errors.js';
import type { ModelClient, ModelRequest } from './model.js';

/**
 * Raw InvokeModel call: JSON body in, JSON body out
 */
export interface BedrockTransport {
    invokeModel(modelId: string, body: string): Promise<string>;
}

export interface ModelFamilyFormatter {
    maxOutputTokens: number;
    buildBody(request: ModelRequest): Record<string, unknown>;
    parseBody(payload: unknown): string | undefined;
}

const AnthropicResponseSchema = z.object({
    content: z.array(z.object({ text: z.string().optional() })),
});

const NovaResponseSchema = z.object({
    output: z.object({
        message: z.object({
            content: z.array(z.object({ text: z.string().optional() })),
        }),
    }).optional(),
    results: z.array(z.object({ outputText: z.string().optional() })).optional(),
});

const ANTHROPIC_MAX_OUTPUT_TOKENS = 8000;
const NOVA_MAX_OUTPUT_TOKENS = 5000;

export const FORMATTERS: Record<BedrockModelFamily, ModelFamilyFormatter> = {
    anthropic: {
        maxOutputTokens: ANTHROPIC_MAX_OUTPUT_TOKENS,
        buildBody(request) {
            const body: Record<string, unknown> = {
                anthropic_version: 'bedrock-2023-05-31',
                max_tokens: Math.min(request.maxOutputTokens, ANTHROPIC_MAX_OUTPUT_TOKENS),
                temperature: request.temperature,
                messages: [{ role: 'user', content: request.prompt }],
            };
            if (request.systemPrompt) body.system = request.systemPrompt;
            return body;
        },
        parseBody(payload) {
            const parsed = AnthropicResponseSchema.safeParse(payload);
            if (!parsed.success) return undefined;
            return parsed.data.content.find((block) => block.text !== undefined)?.text;
        },
    },
    nova: {
        maxOutputTokens: NOVA_MAX_OUTPUT_TOKENS,
        buildBody(request) {
            const body: Record<string, unknown> = {
                messages: [{ role: 'user', content: [{ text: request.prompt }] }],
                inferenceConfig: {
                    temperature: request.temperature,
                    maxTokens: Math.min(request.maxOutputTokens, NOVA_MAX_OUTPUT_TOKENS),
                },
            };
            if (request.systemPrompt) body.system = [{ text: request.systemPrompt }];
            return body;
        },
        parseBody(payload) {
            const parsed = NovaResponseSchema.safeParse(payload);
            if (!parsed.success) return undefined;
            return parsed.data.output?.message.content[0]?.text ?? parsed.data.results?.[0]?.outputText;
        },
    },
};

// Cross-region inference profiles prefix the vendor with a geography
const INFERENCE_PROFILE_PREFIXES = new Set(['us', 'eu', 'apac', 'us-gov', 'global', 'jp', 'au', 'ca']);

const FAMILY_BY_VENDOR: Record<string, BedrockModelFamily> = {
    anthropic: 'anthropic',
    amazon: 'nova',
};

export function resolveModelFamily(modelId: string, override?: BedrockModelFamily): BedrockModelFamily {
    if (override) return override;

    const segments = modelId.trim().split('.');
    const vendor = segments.length > 2 && INFERENCE_PROFILE_PREFIXES.has(segments[0])
        ? segments[1]
        : segments[0];
    const family = FAMILY_BY_VENDOR[vendor];
    if (!family) {
        throw new ConfigError(
            `Cannot tell the request format for model "${modelId}". Set BEDROCK_MODEL_FAMILY to anthropic or nova.`,
            'BEDROCK_MODEL_FAMILY'
        );
    }
    return family;
}

function createSdkTransport(region: string, network: NetworkPolicy): BedrockTransport {
    const client = new BedrockRuntimeClient({
        region,
        maxAttempts: network.maxRetries + 1,
        requestHandler: {
            connectionTimeout: network.connectTimeoutMs,
            requestTimeout: network.requestTimeoutMs,
        },
    });
    const decoder = new TextDecoder();

    return {
        async invokeModel(modelId, body) {
            const response = await client.send(new InvokeModelCommand({
                modelId,
                body,
                contentType: 'application/json',
                accept: 'application/json',
            }));
            return response.body ? decoder.decode(response.body) : '';
        },
    };
}

export interface BedrockModelClientOptions {
    region?: string;
    network?: NetworkPolicy;
    family?: BedrockModelFamily;
    transport?: BedrockTransport;
}

export class BedrockModelClient implements ModelClient {
    readonly provider = 'bedrock' as const;
    private transport: BedrockTransport;
    private family?: BedrockModelFamily;

    constructor(options: BedrockModelClientOptions = {}) {
        this.family = options.family;
        this.transport = options.transport ?? createSdkTransport(
            options.region ?? DEFAULTS.awsRegion,
            options.network ?? {
                requestTimeoutMs: DEFAULTS.requestTimeoutMs,
                connectTimeoutMs: DEFAULTS.connectTimeoutMs,
                maxRetries: DEFAULTS.maxRetries,
            }
        );
    }

    async invoke(request: ModelRequest): Promise<string> {
        const formatter = FORMATTERS[resolveModelFamily(request.modelId, this.family)];
        const body = JSON.stringify(formatter.buildBody(request));

        let raw: string;
        try {
            raw = await this.transport.invokeModel(request.modelId, body);
        } catch (error) {
            const err = toError(error);
            if (err.name === 'ThrottlingException') {
                throw new RateLimitError('Bedrock');
            }
            throw new ModelInvocationError(request.modelId, `Bedrock invocation failed: ${err.name}: ${err.message}`);
        }

        let payload: unknown;
        try {
            payload = JSON.parse(raw);
        } catch {
            throw new ModelInvocationError(request.modelId, 'Bedrock returned a non-JSON body');
        }

        const text = formatter.parseBody(payload)?.trim();
        if (!text) {
            throw new ModelInvocationError(request.modelId, 'Model returned an empty response');
        }
        return text;
    }
}
