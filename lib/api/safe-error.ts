// ============================================================
// Shared safe-error helpers for API routes.
// Ensures no raw provider errors leak to clients.
// Every error response follows { error: string, code: string }.
// ============================================================

import { NextResponse } from "next/server";
import { z } from "zod/v4";
import { ConfigError } from "@/lib/config/env";
import { LLMError } from "@/lib/llm/client";
import { QuizError } from "@/lib/quiz/errors";

// Stable, machine-readable error codes. Add new codes here as needed.
export type ApiErrorCode =
    // Validation
    | "VALIDATION_ERROR"
    // Quiz pipeline
    | "UPLOAD_ERROR"
    | "INDEX_ERROR"
    | "ORACLE_ERROR"
    | "GENERATION_ERROR"
    | "INVALID_STATE"
    // LLM
    | "LLM_RATE_LIMIT"
    | "LLM_UNAVAILABLE"
    // General
    | "INTERNAL_ERROR"
    | "NOT_FOUND"
    | "SERVICE_UNAVAILABLE";

export function safeErrorResponse(
    status: number,
    code: ApiErrorCode,
    error: string
) {
    return NextResponse.json({ error, code }, { status });
}

/**
 * Maps an LLMError to a safe client-facing response.
 * Never exposes raw provider messages.
 */
export function safeLLMErrorResponse(err: { httpStatus: number }) {
    if (err.httpStatus === 429) {
        return safeErrorResponse(
            429,
            "LLM_RATE_LIMIT",
            "Rate limit exceeded. Please try again later."
        );
    }
    return safeErrorResponse(
        err.httpStatus >= 500 ? err.httpStatus : 502,
        "LLM_UNAVAILABLE",
        "LLM provider unavailable. Please try again later."
    );
}

// Oracle and generation messages can embed provider text; replace them.
const SAFE_QUIZ_MESSAGES: Partial<Record<ApiErrorCode, string>> = {
    ORACLE_ERROR: "The document assistant is unavailable. Please try again later.",
    GENERATION_ERROR: "Could not generate a complete quiz from this document. Please try again.",
};

/**
 * Maps any error thrown inside a quiz route to a safe response.
 */
export function safeRouteErrorResponse(err: unknown, context: string) {
    if (err instanceof QuizError) {
        if (err.httpStatus >= 500) {
            console.error(`[${context}] ${err.name}:`, err.message, err.cause ?? "");
        }
        return safeErrorResponse(
            err.httpStatus,
            err.code,
            SAFE_QUIZ_MESSAGES[err.code] ?? err.message
        );
    }
    if (err instanceof z.ZodError) {
        return safeErrorResponse(
            400,
            "VALIDATION_ERROR",
            `Validation error: ${err.issues.map((i) => i.message).join(", ")}`
        );
    }
    if (err instanceof LLMError) {
        return safeLLMErrorResponse(err);
    }
    if (err instanceof ConfigError) {
        return safeErrorResponse(503, "SERVICE_UNAVAILABLE", err.message);
    }
    console.error(`[${context}] unexpected error:`, err);
    return safeErrorResponse(500, "INTERNAL_ERROR", "Internal server error");
}
