// ============================================================
// trackEvent — server-side event tracking utility.
// Emits one structured log line per event. No document text,
// questions or answers in payload.
// ============================================================

import "server-only";

export type QuizEventType =
    | "document_indexed"
    | "document_rejected"
    | "quiz_generated"
    | "quiz_generation_failed"
    | "answer_submitted"
    | "quiz_completed"
    | "session_reset";

export interface TrackEventOptions {
    sessionId: string | null;
    eventType: QuizEventType;
    payload?: Record<string, string | number | boolean | null>;
    requestId?: string;
}

export function trackEvent(opts: TrackEventOptions): void {
    const { sessionId, eventType, payload = {}, requestId } = opts;

    console.info(`[event] ${eventType}`, {
        session_id: sessionId,
        ...payload,
        ...(requestId ? { request_id: requestId } : {}),
    });
}

/**
 * Generate a request ID (UUID v4) for correlating events and LLM call logs.
 */
export function generateRequestId(): string {
    return crypto.randomUUID();
}
