// ============================================================
// /api/quiz
//   GET    → current document + quiz view
//   POST   → synthesize the quiz from the uploaded document and start it
//   DELETE → tear down the session
// ============================================================

import { NextRequest, NextResponse } from "next/server";
import { checkRateLimit } from "@/lib/llm";
import { safeErrorResponse, safeRouteErrorResponse } from "@/lib/api/safe-error";
import {
    clearSessionCookie,
    getRequestSession,
    readSessionId,
} from "@/lib/api/session-cookie";
import { generateRequestId, trackEvent } from "@/lib/observability/track-event";
import { PROMPT_VERSION } from "@/lib/prompts/quiz-synthesis.v1";
import { GenerationError, InvalidStateError } from "@/lib/quiz/errors";
import { destroySession, withGenerationLock } from "@/lib/quiz/session-store";
import { synthesizeQuiz } from "@/lib/quiz/synthesizer";

const NO_SESSION_MESSAGE = "No active session. Upload a PDF first.";

export async function GET(request: NextRequest) {
    const context = getRequestSession(request);
    if (!context) {
        return safeErrorResponse(404, "NOT_FOUND", NO_SESSION_MESSAGE);
    }
    return NextResponse.json({ document: context.document, quiz: context.quiz.view() });
}

export async function POST(request: NextRequest) {
    const requestId = generateRequestId();
    const context = getRequestSession(request);
    if (!context) {
        return safeErrorResponse(404, "NOT_FOUND", NO_SESSION_MESSAGE);
    }

    try {
        const oracle = context.oracle;
        if (!oracle) {
            throw new InvalidStateError("The session has no indexed document.");
        }
        if (context.quiz.status !== "idle") {
            throw new InvalidStateError(
                "A quiz already exists for this document. Reset the session to start over."
            );
        }

        const rl = await checkRateLimit("quiz_generation", context.id);
        if (!rl.allowed) {
            const status = rl.statusCode ?? 429;
            return safeErrorResponse(
                status,
                status === 503 ? "SERVICE_UNAVAILABLE" : "LLM_RATE_LIMIT",
                rl.reason ?? "Rate limit exceeded. Try again later."
            );
        }

        const startedAt = Date.now();
        await withGenerationLock(context, async () => {
            // Another request may have started the quiz while this one waited.
            if (context.quiz.status !== "idle") {
                throw new InvalidStateError(
                    "A quiz already exists for this document. Reset the session to start over."
                );
            }
            const questions = await synthesizeQuiz(oracle, {
                requestId,
                onQuestion: (completed, total) =>
                    console.info(`[quiz] ${context.id}: question ${completed}/${total} ready`),
            });
            context.quiz.start(questions);
        });

        trackEvent({
            sessionId: context.id,
            eventType: "quiz_generated",
            payload: { latency_ms: Date.now() - startedAt, prompt_version: PROMPT_VERSION },
            requestId,
        });

        return NextResponse.json({ quiz: context.quiz.view() }, { status: 201 });
    } catch (err) {
        if (err instanceof GenerationError) {
            trackEvent({
                sessionId: context.id,
                eventType: "quiz_generation_failed",
                payload: { code: err.code },
                requestId,
            });
        }
        return safeRouteErrorResponse(err, "quiz");
    }
}

export async function DELETE(request: NextRequest) {
    const sessionId = readSessionId(request);
    const destroyed = sessionId ? destroySession(sessionId) : false;
    if (sessionId && destroyed) {
        trackEvent({ sessionId, eventType: "session_reset" });
    }

    const response = NextResponse.json({ reset: destroyed });
    clearSessionCookie(response);
    return response;
}
