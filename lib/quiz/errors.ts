// ============================================================
// Quiz error taxonomy. Each error carries the HTTP status and the
// stable code used by lib/api/safe-error.ts.
// ============================================================

import type { ApiErrorCode } from "@/lib/api/safe-error";

export abstract class QuizError extends Error {
    abstract readonly httpStatus: number;
    abstract readonly code: ApiErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The uploaded file is missing, not a PDF, too large, or could not be stored. */
export class UploadError extends QuizError {
    readonly httpStatus = 400;
    readonly code = "UPLOAD_ERROR";
}

/** The document could not be parsed, split or embedded. */
export class IndexError extends QuizError {
    readonly httpStatus = 422;
    readonly code = "INDEX_ERROR";
}

/** A single answering-oracle call failed. */
export class OracleError extends QuizError {
    readonly httpStatus = 502;
    readonly code = "ORACLE_ERROR";
}

/** Quiz synthesis ran out of attempts for a question slot. */
export class GenerationError extends QuizError {
    readonly httpStatus = 502;
    readonly code = "GENERATION_ERROR";
}

/** A session transition was invoked out of order. */
export class InvalidStateError extends QuizError {
    readonly httpStatus = 409;
    readonly code = "INVALID_STATE";
}
