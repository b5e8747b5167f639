// ============================================================
// In-memory session contexts, keyed by the session cookie.
// A context owns one document's oracle and one QuizSession.
// Uploading a new document replaces the whole context. Contexts
// expire SESSION_TTL_MS after creation, together with their cookie.
// ============================================================

import type { AnsweringOracle } from "./synthesizer";
import { QuizSession } from "./session";
import { InvalidStateError } from "./errors";

export const SESSION_TTL_MS = 4 * 60 * 60 * 1000;

export interface DocumentInfo {
    fileName: string;
    pageCount: number;
    chunkCount: number;
}

export interface SessionContext {
    id: string;
    createdAt: number;
    document: DocumentInfo | null;
    oracle: AnsweringOracle | null;
    quiz: QuizSession;
    generating: boolean;
}

const globalForSessions = globalThis as unknown as {
    quizSessions: Map<string, SessionContext> | undefined;
};

function getStore(): Map<string, SessionContext> {
    if (!globalForSessions.quizSessions) {
        globalForSessions.quizSessions = new Map();
    }
    return globalForSessions.quizSessions;
}

function isExpired(context: SessionContext, now: number): boolean {
    return now - context.createdAt >= SESSION_TTL_MS;
}

export function getSession(id: string): SessionContext | null {
    const store = getStore();
    const context = store.get(id);
    if (!context) return null;
    if (isExpired(context, Date.now())) {
        store.delete(id);
        return null;
    }
    return context;
}

/** Drops every expired context; returns how many were removed. */
export function pruneExpiredSessions(now: number = Date.now()): number {
    const store = getStore();
    let removed = 0;
    for (const [id, context] of store) {
        if (isExpired(context, now)) {
            store.delete(id);
            removed++;
        }
    }
    if (removed > 0) {
        console.info(`[quiz] Evicted ${removed} expired session(s)`);
    }
    return removed;
}

/**
 * Tears down any context under `id` and stores a fresh one for the
 * given document.
 */
export function replaceSession(
    id: string,
    document: DocumentInfo,
    oracle: AnsweringOracle
): SessionContext {
    const now = Date.now();
    pruneExpiredSessions(now);
    const store = getStore();
    if (store.has(id)) {
        console.info(`[quiz] Replacing session ${id} with a new document`);
    }
    const context: SessionContext = {
        id,
        createdAt: now,
        document,
        oracle,
        quiz: new QuizSession(),
        generating: false,
    };
    store.set(id, context);
    return context;
}

export function destroySession(id: string): boolean {
    return getStore().delete(id);
}

/**
 * Runs quiz generation for a context, refusing a second concurrent run.
 * The generated questions are committed only if `generate` resolves.
 */
export async function withGenerationLock<T>(
    context: SessionContext,
    generate: () => Promise<T>
): Promise<T> {
    if (context.generating) {
        throw new InvalidStateError("Quiz generation is already running for this session.");
    }
    context.generating = true;
    try {
        return await generate();
    } finally {
        context.generating = false;
    }
}

export function clearSessions(): void {
    getStore().clear();
}
