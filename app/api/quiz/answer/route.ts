// ============================================================
// POST /api/quiz/answer
// Body: { option: string } — the selected option text.
// Only the first answer to a question is scored.
// ============================================================

import { NextRequest, NextResponse } from "next/server";
import { safeErrorResponse, safeRouteErrorResponse } from "@/lib/api/safe-error";
import { getRequestSession } from "@/lib/api/session-cookie";
import { trackEvent } from "@/lib/observability/track-event";
import { AnswerBodySchema } from "@/lib/schemas/quiz";

export async function POST(request: NextRequest) {
    const context = getRequestSession(request);
    if (!context) {
        return safeErrorResponse(404, "NOT_FOUND", "No active session. Upload a PDF first.");
    }

    try {
        let raw: unknown;
        try {
            raw = await request.json();
        } catch {
            return safeErrorResponse(400, "VALIDATION_ERROR", "Request body must be JSON.");
        }
        const body = AnswerBodySchema.parse(raw);

        const result = context.quiz.submitAnswer(body.option);
        if (result.counted) {
            trackEvent({
                sessionId: context.id,
                eventType: "answer_submitted",
                payload: { correct: result.correct },
            });
        }

        return NextResponse.json({ result, quiz: context.quiz.view() });
    } catch (err) {
        return safeRouteErrorResponse(err, "quiz/answer");
    }
}
