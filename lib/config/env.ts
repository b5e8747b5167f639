// ============================================================
// Server configuration — read lazily from process.env.
// ============================================================

export interface OpenAIEnv {
    apiKey: string;
    chatModel: string;
    embeddingModel: string;
}

export const DEFAULT_CHAT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

function readOptional(name: string): string | undefined {
    const value = process.env[name]?.trim();
    return value ? value : undefined;
}

export function getOpenAIEnv(context: string): OpenAIEnv {
    const apiKey = readOptional("OPENAI_API_KEY");

    if (!apiKey) {
        console.error(`[${context}] Missing required env var: OPENAI_API_KEY`);
        throw new ConfigError(
            "Language model is unavailable due to missing environment configuration."
        );
    }

    return {
        apiKey,
        chatModel: readOptional("OPENAI_CHAT_MODEL") ?? DEFAULT_CHAT_MODEL,
        embeddingModel: readOptional("OPENAI_EMBEDDING_MODEL") ?? DEFAULT_EMBEDDING_MODEL,
    };
}

export function getAnthropicApiKey(): string | undefined {
    return readOptional("ANTHROPIC_API_KEY");
}

/**
 * Upper bound for an uploaded PDF. Falls back to the default when the
 * variable is unset or not a positive integer.
 */
export function getMaxUploadBytes(): number {
    const raw = readOptional("MAX_UPLOAD_BYTES");
    if (!raw) {
        return DEFAULT_MAX_UPLOAD_BYTES;
    }
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        console.warn(`[config] Ignoring invalid MAX_UPLOAD_BYTES="${raw}"`);
        return DEFAULT_MAX_UPLOAD_BYTES;
    }
    return parsed;
}
