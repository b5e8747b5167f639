import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidStateError } from "./errors";
import {
    clearSessions,
    getSession,
    pruneExpiredSessions,
    replaceSession,
    SESSION_TTL_MS,
    withGenerationLock,
} from "./session-store";
import type { AnsweringOracle } from "./synthesizer";

const DOCUMENT = { fileName: "doc.pdf", pageCount: 1, chunkCount: 1 };
const oracle: AnsweringOracle = { answer: async () => "ok" };

describe("session store", () => {
    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
        vi.spyOn(console, "info").mockImplementation(() => {});
    });

    afterEach(() => {
        clearSessions();
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it("keeps a session until it reaches its time to live", () => {
        replaceSession("a", DOCUMENT, oracle);

        vi.advanceTimersByTime(SESSION_TTL_MS - 1);
        expect(getSession("a")).not.toBeNull();

        vi.advanceTimersByTime(1);
        expect(getSession("a")).toBeNull();
    });

    it("prunes every expired session", () => {
        replaceSession("a", DOCUMENT, oracle);
        replaceSession("b", DOCUMENT, oracle);
        vi.advanceTimersByTime(SESSION_TTL_MS / 2);
        replaceSession("c", DOCUMENT, oracle);
        vi.advanceTimersByTime(SESSION_TTL_MS / 2);

        expect(pruneExpiredSessions()).toBe(2);
        expect(getSession("c")).not.toBeNull();
    });

    it("evicts expired sessions when a new one is stored", () => {
        replaceSession("a", DOCUMENT, oracle);
        vi.advanceTimersByTime(SESSION_TTL_MS);

        replaceSession("b", DOCUMENT, oracle);

        expect(pruneExpiredSessions()).toBe(0);
        expect(console.info).toHaveBeenCalledWith("[quiz] Evicted 1 expired session(s)");
    });

    it("releases the generation lock when generation fails", async () => {
        const context = replaceSession("a", DOCUMENT, oracle);

        await expect(
            withGenerationLock(context, async () => {
                throw new Error("boom");
            })
        ).rejects.toThrow("boom");

        expect(context.generating).toBe(false);
        await expect(withGenerationLock(context, async () => "done")).resolves.toBe("done");
    });

    it("refuses a nested generation", async () => {
        const context = replaceSession("a", DOCUMENT, oracle);

        await withGenerationLock(context, async () => {
            await expect(withGenerationLock(context, async () => "x")).rejects.toBeInstanceOf(
                InvalidStateError
            );
        });
    });
});
