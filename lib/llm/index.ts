// ============================================================
// lib/llm barrel export
// ============================================================

export { callLLM, LLMError, logLLMCall } from "./client";
export { embedWithOpenAI } from "./providers";
export { checkRateLimit, resetInMemoryRateLimits, RATE_LIMIT_POLICIES } from "./rate-limit";
export type { RateLimitResult, RateLimitTier } from "./rate-limit";
export type {
    LLMTask,
    LLMProvider,
    CallLLMInput,
    CallLLMResult,
    LLMCallMeta,
    LLMMessage,
} from "./types";
export { MODEL_ROUTING } from "./types";
