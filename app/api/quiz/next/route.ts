// ============================================================
// POST /api/quiz/next — move on to the following question.
// ============================================================

import { NextRequest, NextResponse } from "next/server";
import { safeErrorResponse, safeRouteErrorResponse } from "@/lib/api/safe-error";
import { getRequestSession } from "@/lib/api/session-cookie";
import { trackEvent } from "@/lib/observability/track-event";

export async function POST(request: NextRequest) {
    const context = getRequestSession(request);
    if (!context) {
        return safeErrorResponse(404, "NOT_FOUND", "No active session. Upload a PDF first.");
    }

    try {
        context.quiz.advance();
        const view = context.quiz.view();
        if (view.status === "completed") {
            trackEvent({
                sessionId: context.id,
                eventType: "quiz_completed",
                payload: { score: view.score, total: view.total },
            });
        }
        return NextResponse.json({ quiz: view });
    } catch (err) {
        return safeRouteErrorResponse(err, "quiz/next");
    }
}
