// ============================================================
// callLLM() — Unified LLM interface
//
// Flow: primary (3 retries, exponential back-off) → fallback (1 try)
// Every attempt is logged through logLLMCall().
// ============================================================

import { callProvider } from "./providers";
import type {
    CallLLMInput,
    CallLLMResult,
    LLMCallMeta,
    RawLLMResponse,
    ModelConfig,
} from "./types";
import { MODEL_ROUTING } from "./types";

export const PRIMARY_RETRIES = 3;
const BACKOFF_BASE_MS = 500;

// ---- helpers -------------------------------------------------

function sleep(ms: number) {
    return new Promise((r) => setTimeout(r, ms));
}

// ---- call log ------------------------------------------------

export function logLLMCall(
    input: CallLLMInput,
    config: ModelConfig,
    raw: RawLLMResponse | null,
    status: "success" | "error",
    errorMessage?: string
): void {
    const entry = {
        task: input.task,
        model: raw?.model ?? config.model,
        provider: config.provider,
        promptVersion: input.promptVersion,
        inputTokens: raw?.inputTokens ?? 0,
        outputTokens: raw?.outputTokens ?? 0,
        latencyMs: raw?.latencyMs ?? 0,
        status,
        ...(input.requestId ? { requestId: input.requestId } : {}),
        ...(errorMessage ? { error: errorMessage.slice(0, 500) } : {}),
    };
    if (status === "success") {
        console.info("[LLM] call", entry);
    } else {
        console.error("[LLM] call", entry);
    }
}

// ---- build meta object ---------------------------------------

function buildMeta(
    raw: RawLLMResponse,
    promptVersion: string,
    attempts: number,
    usedFallback: boolean
): LLMCallMeta {
    return {
        model: raw.model,
        provider: raw.provider,
        inputTokens: raw.inputTokens,
        outputTokens: raw.outputTokens,
        latencyMs: raw.latencyMs,
        promptVersion,
        attempts,
        usedFallback,
    };
}

// ---- main function: plain string output ----------------------

export async function callLLM(
    input: CallLLMInput
): Promise<CallLLMResult<string>> {
    const routing = MODEL_ROUTING[input.task];
    let totalAttempts = 0;

    // 1. Primary model: up to PRIMARY_RETRIES attempts
    for (let attempt = 1; attempt <= PRIMARY_RETRIES; attempt++) {
        totalAttempts++;
        try {
            const raw = await callProvider(routing.primary, input.messages);
            logLLMCall(input, routing.primary, raw, "success");
            return {
                data: raw.content,
                meta: buildMeta(raw, input.promptVersion, totalAttempts, false),
            };
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            console.error(
                `[LLM] Primary ${routing.primary.model} attempt ${attempt}/${PRIMARY_RETRIES}:`,
                err.message
            );
            logLLMCall(input, routing.primary, null, "error", err.message);

            if (attempt < PRIMARY_RETRIES) {
                await sleep(Math.pow(2, attempt) * BACKOFF_BASE_MS);
            }
        }
    }

    // 2. Fallback model: 1 attempt
    totalAttempts++;
    console.warn(`[LLM] Falling back to ${routing.fallback.model}`);

    try {
        const raw = await callProvider(routing.fallback, input.messages);
        logLLMCall(input, routing.fallback, raw, "success");
        return {
            data: raw.content,
            meta: buildMeta(raw, input.promptVersion, totalAttempts, true),
        };
    } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        logLLMCall(input, routing.fallback, null, "error", err.message);

        throw new LLMError(
            `All LLM providers failed for "${input.task}" after ${totalAttempts} attempts. Last error: ${err.message}`,
            503,
            input.task
        );
    }
}

// ---- custom error class --------------------------------------

export class LLMError extends Error {
    constructor(
        message: string,
        public readonly httpStatus: number,
        public readonly task: string
    ) {
        super(message);
        this.name = "LLMError";
    }
}
