// ============================================================
// GET /api/quiz/summary — score and review once the quiz is completed.
// ============================================================

import { NextRequest, NextResponse } from "next/server";
import { safeErrorResponse, safeRouteErrorResponse } from "@/lib/api/safe-error";
import { getRequestSession } from "@/lib/api/session-cookie";

export async function GET(request: NextRequest) {
    const context = getRequestSession(request);
    if (!context) {
        return safeErrorResponse(404, "NOT_FOUND", "No active session. Upload a PDF first.");
    }

    try {
        return NextResponse.json({ summary: context.quiz.summary() });
    } catch (err) {
        return safeRouteErrorResponse(err, "quiz/summary");
    }
}
