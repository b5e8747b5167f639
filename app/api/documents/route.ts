// ============================================================
// POST /api/documents
// Stores the uploaded PDF, builds its retrieval index and opens a
// fresh quiz session for it. Any previous session is torn down.
// Body: multipart/form-data with a "file" field.
// ============================================================

import { NextRequest, NextResponse } from "next/server";
import { getMaxUploadBytes } from "@/lib/config/env";
import { checkRateLimit } from "@/lib/llm";
import { safeErrorResponse, safeRouteErrorResponse } from "@/lib/api/safe-error";
import {
    attachSessionCookie,
    readOrCreateSessionId,
    uploadRateLimitKey,
} from "@/lib/api/session-cookie";
import { generateRequestId, trackEvent } from "@/lib/observability/track-event";
import { QuizError, UploadError } from "@/lib/quiz/errors";
import { destroySession, replaceSession } from "@/lib/quiz/session-store";
import { buildDocumentIndex } from "@/lib/rag/indexer";
import { createRetrievalOracle } from "@/lib/rag/oracle";

const PDF_MIME_TYPE = "application/pdf";

async function readPdfUpload(request: NextRequest): Promise<{ fileName: string; bytes: Uint8Array }> {
    let form: FormData;
    try {
        form = await request.formData();
    } catch (error) {
        throw new UploadError("Expected a multipart/form-data upload.", { cause: error });
    }

    const file = form.get("file");
    if (!(file instanceof File)) {
        throw new UploadError('Attach a PDF in the "file" field.');
    }

    const isPdf = file.type === PDF_MIME_TYPE || file.name.toLowerCase().endsWith(".pdf");
    if (!isPdf) {
        throw new UploadError("Only PDF files are supported.");
    }

    const maxBytes = getMaxUploadBytes();
    if (file.size === 0) {
        throw new UploadError("The uploaded file is empty.");
    }
    if (file.size > maxBytes) {
        throw new UploadError(`The uploaded file exceeds the ${maxBytes}-byte limit.`);
    }

    try {
        return { fileName: file.name, bytes: new Uint8Array(await file.arrayBuffer()) };
    } catch (error) {
        throw new UploadError("Could not read the uploaded file.", { cause: error });
    }
}

export async function POST(request: NextRequest) {
    const requestId = generateRequestId();
    const sessionId = readOrCreateSessionId(request);

    try {
        const rl = await checkRateLimit("document_upload", uploadRateLimitKey(request));
        if (!rl.allowed) {
            const status = rl.statusCode ?? 429;
            return safeErrorResponse(
                status,
                status === 503 ? "SERVICE_UNAVAILABLE" : "LLM_RATE_LIMIT",
                rl.reason ?? "Rate limit exceeded. Try again later."
            );
        }

        const upload = await readPdfUpload(request);

        // A new document always ends the previous session.
        destroySession(sessionId);

        const index = await buildDocumentIndex(upload);
        const context = replaceSession(
            sessionId,
            { fileName: index.fileName, pageCount: index.pageCount, chunkCount: index.chunkCount },
            createRetrievalOracle(index)
        );

        trackEvent({
            sessionId,
            eventType: "document_indexed",
            payload: { pages: index.pageCount, chunks: index.chunkCount },
            requestId,
        });

        const response = NextResponse.json({ document: context.document }, { status: 201 });
        attachSessionCookie(response, sessionId);
        return response;
    } catch (err) {
        if (err instanceof QuizError) {
            trackEvent({
                sessionId,
                eventType: "document_rejected",
                payload: { code: err.code },
                requestId,
            });
        }
        return safeRouteErrorResponse(err, "documents");
    }
}
