// ============================================================
// Scoped temporary storage for an uploaded file. The directory is
// removed once `use` settles, whatever the outcome.
// ============================================================

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { UploadError } from "@/lib/quiz/errors";

const TEMP_PREFIX = "pdf-quiz-";

function toUploadError(error: unknown): UploadError {
    const message = error instanceof Error ? error.message : String(error);
    return new UploadError(`Could not save the uploaded file: ${message}`, { cause: error });
}

async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
        console.error(`[documents] Failed to remove temp dir ${dir}:`, error);
    });
}

export async function withTempFile<T>(
    fileName: string,
    bytes: Uint8Array,
    use: (filePath: string) => Promise<T>
): Promise<T> {
    const dir = await mkdtemp(path.join(tmpdir(), TEMP_PREFIX)).catch((error: unknown) => {
        throw toUploadError(error);
    });

    try {
        const filePath = path.join(dir, path.basename(fileName) || "upload.pdf");
        try {
            await writeFile(filePath, bytes);
        } catch (error) {
            throw toUploadError(error);
        }
        return await use(filePath);
    } finally {
        await removeDir(dir);
    }
}
