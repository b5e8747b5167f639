// ============================================================
// LLM Service Layer — Types
// ============================================================

export type LLMTask = "retrieval_qa";

export type LLMProvider = "openai" | "anthropic";

export interface ModelConfig {
    provider: LLMProvider;
    model: string;
    maxTokens?: number;
    temperature?: number;
}

export interface TaskRouting {
    primary: ModelConfig;
    fallback: ModelConfig;
}

// ============================================================
// callLLM() — unified input/output
// ============================================================

export interface CallLLMInput {
    task: LLMTask;
    promptVersion: string;
    messages: LLMMessage[];
    requestId?: string;
}

export interface CallLLMResult<T = string> {
    data: T;
    meta: LLMCallMeta;
}

export interface LLMCallMeta {
    model: string;
    provider: LLMProvider;
    inputTokens: number;
    outputTokens: number;
    latencyMs: number;
    promptVersion: string;
    attempts: number;
    usedFallback: boolean;
}

export interface LLMMessage {
    role: "system" | "user" | "assistant";
    content: string;
}

/** Raw response from a provider call */
export interface RawLLMResponse {
    content: string;
    model: string;
    provider: LLMProvider;
    inputTokens: number;
    outputTokens: number;
    latencyMs: number;
}

/** Resolved at call time from OPENAI_CHAT_MODEL. */
export const OPENAI_CHAT_MODEL_PLACEHOLDER = "__OPENAI_CHAT_MODEL__";

// ============================================================
// Model Routing Configuration
// Retrieval QA → configured OpenAI chat model (gpt-3.5-turbo by default)
// Fallback → Claude Sonnet
// ============================================================
export const MODEL_ROUTING: Record<LLMTask, TaskRouting> = {
    retrieval_qa: {
        primary: { provider: "openai", model: OPENAI_CHAT_MODEL_PLACEHOLDER, temperature: 0.7 },
        fallback: { provider: "anthropic", model: "claude-sonnet-4-20250514", temperature: 0.7 },
    },
};
