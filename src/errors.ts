/**
 * Custom error types for ragchat
 * Clients throw these; the agent steps convert them into structured step results
 */

/**
 * Base error class for ragchat errors
 */
export class RagChatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RagChatError';
        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Error thrown when an API key is missing or invalid
 */
export class ApiKeyError extends RagChatError {
    public readonly keyName: string;
    public readonly helpUrl?: string;

    constructor(keyName: string, message?: string, helpUrl?: string) {
        const defaultMessage = `${keyName} is not set or invalid.\n` +
            `Run: ragchat init\n` +
            (helpUrl ? `Get your key at: ${helpUrl}` : '');
        super(message || defaultMessage);
        this.name = 'ApiKeyError';
        this.keyName = keyName;
        this.helpUrl = helpUrl;
    }
}

/**
 * Error thrown when API rate limits are exceeded
 */
export class RateLimitError extends RagChatError {
    public readonly retryAfterMs?: number;

    constructor(service: string, retryAfterMs?: number) {
        const retryMessage = retryAfterMs
            ? ` Please wait ${Math.ceil(retryAfterMs / 1000)} seconds and try again.`
            : ' Please wait a moment and try again.';
        super(`${service} rate limit exceeded.${retryMessage}`);
        this.name = 'RateLimitError';
        this.retryAfterMs = retryAfterMs;
    }
}

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigError extends RagChatError {
    public readonly configKey?: string;

    constructor(message: string, configKey?: string) {
        super(message);
        this.name = 'ConfigError';
        this.configKey = configKey;
    }
}

/**
 * Error thrown when a model call fails or returns nothing usable
 */
export class ModelInvocationError extends RagChatError {
    public readonly modelId: string;
    public readonly status?: number;

    constructor(modelId: string, message: string, status?: number) {
        super(message);
        this.name = 'ModelInvocationError';
        this.modelId = modelId;
        this.status = status;
    }
}

/**
 * Error thrown when a knowledge base query fails
 */
export class SearchError extends RagChatError {
    public readonly query?: string;
    public readonly code?: string;

    constructor(message: string, query?: string, code?: string) {
        super(message);
        this.name = 'SearchError';
        this.query = query;
        this.code = code;
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
    return toError(value).message;
}
