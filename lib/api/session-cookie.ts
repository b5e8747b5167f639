// ============================================================
// Session cookie helpers. The cookie only carries an opaque id;
// all quiz state lives server-side in lib/quiz/session-store.
// ============================================================

import type { NextRequest, NextResponse } from "next/server";
import { getSession, SESSION_TTL_MS, type SessionContext } from "@/lib/quiz/session-store";

export const SESSION_COOKIE = "pdfquiz_session";
const SESSION_MAX_AGE_SECONDS = SESSION_TTL_MS / 1000;
const UUID_REGEX =
    /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function readSessionId(request: NextRequest): string | null {
    const value = request.cookies.get(SESSION_COOKIE)?.value;
    return value && UUID_REGEX.test(value) ? value : null;
}

export function readOrCreateSessionId(request: NextRequest): string {
    return readSessionId(request) ?? crypto.randomUUID();
}

export function getRequestSession(request: NextRequest): SessionContext | null {
    const id = readSessionId(request);
    return id ? getSession(id) : null;
}

/** First hop of x-forwarded-for, then x-real-ip. */
export function clientAddress(request: NextRequest): string {
    const forwarded = request.headers.get("x-forwarded-for")?.split(",")[0]?.trim();
    if (forwarded) return forwarded;
    return request.headers.get("x-real-ip")?.trim() || "unknown";
}

/**
 * Uploads from a live session are limited per session; anything else
 * (no cookie, stale or made-up id) is limited per client address.
 */
export function uploadRateLimitKey(request: NextRequest): string {
    return getRequestSession(request)?.id ?? `ip:${clientAddress(request)}`;
}

export function attachSessionCookie(response: NextResponse, sessionId: string): void {
    response.cookies.set(SESSION_COOKIE, sessionId, {
        httpOnly: true,
        sameSite: "lax",
        secure: process.env.NODE_ENV === "production",
        path: "/",
        maxAge: SESSION_MAX_AGE_SECONDS,
    });
}

export function clearSessionCookie(response: NextResponse): void {
    response.cookies.delete(SESSION_COOKIE);
}
