/**
 * OpenRouter API Client
 * Chat completions over HTTP, used as a ModelClient when MODEL_PROVIDER=openrouter
 */

import { z } from 'zod';
import { DEFAULTS, type NetworkPolicy } from '../config.js';
import { ApiKeyError, ModelInvocationError, RateLimitError, toError } from '../errors.js';
import type { ModelClient, ModelRequest } from './model.js';

const OPENROUTER_API_BASE = 'https://openrouter.ai/api/v1';
const INITIAL_RETRY_DELAY_MS = 1000;

const DEFAULT_NETWORK: NetworkPolicy = {
    requestTimeoutMs: DEFAULTS.requestTimeoutMs,
    connectTimeoutMs: DEFAULTS.connectTimeoutMs,
    maxRetries: DEFAULTS.maxRetries,
};

function createTimeoutSignal(timeoutMs: number, parentSignal?: AbortSignal): { signal: AbortSignal; cleanup: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort();

    if (parentSignal) {
        if (parentSignal.aborted) {
            controller.abort();
        } else {
            parentSignal.addEventListener('abort', onAbort, { once: true });
        }
    }

    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeoutId);
            if (parentSignal && !parentSignal.aborted) {
                parentSignal.removeEventListener('abort', onAbort);
            }
        },
    };
}

function isAbortError(error: Error): boolean {
    return error.name === 'AbortError';
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export interface Message {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface ChatOptions {
    temperature?: number;
    maxTokens?: number;
    topP?: number;
    stop?: string[];
}

const ChatCompletionSchema = z.object({
    id: z.string().optional(),
    choices: z.array(z.object({
        message: z.object({
            role: z.string(),
            content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable().optional(),
    })),
    usage: z.object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
    }).optional(),
});

const ErrorBodySchema = z.object({
    error: z.union([z.string(), z.object({ message: z.string().optional() })]).optional(),
    message: z.string().optional(),
});

export interface ChatResponse {
    id: string;
    choices: {
        message: {
            role: string;
            content: string;
        };
        finishReason: string;
    }[];
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

export class OpenRouterClient implements ModelClient {
    readonly provider = 'openrouter' as const;
    private apiKey: string;
    private network: NetworkPolicy;

    constructor(apiKey: string, network: NetworkPolicy = DEFAULT_NETWORK) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError('OPENROUTER_API_KEY', undefined, 'https://openrouter.ai/keys');
        }
        this.apiKey = apiKey.trim();
        this.network = network;
    }

    /**
     * Fetch with retry logic and exponential backoff
     */
    private async fetchWithRetry(url: string, options: RequestInit): Promise<Response> {
        const attempts = this.network.maxRetries + 1;
        const timeoutMs = this.network.requestTimeoutMs;
        let lastError: Error | null = null;
        let lastResponse: Response | null = null;

        for (let attempt = 0; attempt < attempts; attempt++) {
            const { signal, cleanup } = createTimeoutSignal(timeoutMs, options.signal ?? undefined);
            try {
                const response = await fetch(url, { ...options, signal });
                lastResponse = response;

                // Don't retry client errors (4xx except 429), only server errors (5xx) and rate limits
                if (response.ok || (response.status >= 400 && response.status < 500 && response.status !== 429)) {
                    return response;
                }

                const delay = response.status === 429
                    ? INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt + 1)
                    : INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt);
                if (attempt < attempts - 1) {
                    await sleep(delay);
                }
            } catch (error) {
                const err = toError(error);
                lastError = isAbortError(err)
                    ? new Error(`Request timed out after ${timeoutMs}ms`)
                    : err;

                if (attempt < attempts - 1) {
                    await sleep(INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt));
                }
            } finally {
                cleanup();
            }
        }

        if (lastResponse) return lastResponse;
        throw lastError || new Error('Max retries exceeded');
    }

    /**
     * Parse API error response for better error messages
     */
    private async parseError(response: Response): Promise<string> {
        let text: string;
        try {
            text = await response.text();
        } catch {
            return `HTTP ${response.status}`;
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch {
            return text;
        }

        const parsed = ErrorBodySchema.safeParse(json);
        if (!parsed.success) return text;
        const { error, message } = parsed.data;
        if (typeof error === 'string') return error;
        return error?.message || message || text;
    }

    private async throwForStatus(model: string, response: Response): Promise<never> {
        const message = await this.parseError(response);

        if (response.status === 401) {
            throw new ApiKeyError(
                'OPENROUTER_API_KEY',
                'OpenRouter API authentication failed.\n' +
                'Please check your OPENROUTER_API_KEY is valid.\n' +
                'Run: ragchat init'
            );
        }

        if (response.status === 429) {
            const retryAfter = Number(response.headers?.get('retry-after'));
            throw new RateLimitError('OpenRouter', Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : undefined);
        }

        throw new ModelInvocationError(model, `OpenRouter API error: ${response.status} - ${message}`, response.status);
    }

    /**
     * Send a chat completion request (non-streaming)
     */
    async chat(
        model: string,
        messages: Message[],
        options: ChatOptions = {}
    ): Promise<ChatResponse> {
        const body: Record<string, unknown> = {
            model,
            messages,
            stream: false,
        };
        if (typeof options.temperature === 'number') body.temperature = options.temperature;
        if (typeof options.maxTokens === 'number') body.max_tokens = options.maxTokens;
        if (typeof options.topP === 'number') body.top_p = options.topP;
        if (options.stop) body.stop = options.stop;

        let response: Response;
        try {
            response = await this.fetchWithRetry(`${OPENROUTER_API_BASE}/chat/completions`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.apiKey}`,
                    'X-Title': 'ragchat',
                },
                body: JSON.stringify(body),
            });
        } catch (error) {
            throw new ModelInvocationError(model, `OpenRouter request failed: ${toError(error).message}`);
        }

        if (!response.ok) {
            return this.throwForStatus(model, response);
        }

        const parsed = ChatCompletionSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new ModelInvocationError(model, 'OpenRouter returned an unexpected response shape');
        }

        const data = parsed.data;
        return {
            id: data.id ?? '',
            choices: data.choices.map((choice) => ({
                message: {
                    role: choice.message.role,
                    content: choice.message.content ?? '',
                },
                finishReason: choice.finish_reason ?? '',
            })),
            usage: {
                promptTokens: data.usage?.prompt_tokens || 0,
                completionTokens: data.usage?.completion_tokens || 0,
                totalTokens: data.usage?.total_tokens || 0,
            },
        };
    }

    async invoke(request: ModelRequest): Promise<string> {
        const messages: Message[] = [];
        if (request.systemPrompt) messages.push({ role: 'system', content: request.systemPrompt });
        messages.push({ role: 'user', content: request.prompt });

        const response = await this.chat(request.modelId, messages, {
            temperature: request.temperature,
            maxTokens: request.maxOutputTokens,
        });

        const content = response.choices[0]?.message.content.trim();
        if (!content) {
            throw new ModelInvocationError(request.modelId, 'Model returned an empty response');
        }
        return content;
    }
}
