// ============================================================
// Document indexing: store upload → load pages → split → embed.
// ============================================================

import { withTempFile } from "@/lib/documents/temp-file";
import { loadPdfPages, type PageLoader } from "@/lib/documents/pdf-loader";
import { RecursiveCharacterTextSplitter } from "@/lib/documents/text-splitter";
import { embedWithOpenAI } from "@/lib/llm/providers";
import { IndexError } from "@/lib/quiz/errors";
import { DocumentIndex, type Embedder } from "./vector-index";

export interface DocumentUpload {
    fileName: string;
    bytes: Uint8Array;
}

export interface IndexerDeps {
    loadPages?: PageLoader;
    embed?: Embedder;
    splitter?: RecursiveCharacterTextSplitter;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export async function buildDocumentIndex(
    upload: DocumentUpload,
    deps: IndexerDeps = {}
): Promise<DocumentIndex> {
    const loadPages = deps.loadPages ?? loadPdfPages;
    const embed = deps.embed ?? embedWithOpenAI;
    const splitter = deps.splitter ?? new RecursiveCharacterTextSplitter();

    const pages = await withTempFile(upload.fileName, upload.bytes, async (filePath) => {
        try {
            return await loadPages(filePath);
        } catch (error) {
            throw new IndexError(`Could not read the PDF: ${describe(error)}`, { cause: error });
        }
    });

    if (pages.every((page) => page.text.trim() === "")) {
        throw new IndexError("The PDF contains no extractable text.");
    }

    const chunks = splitter.splitPages(pages);
    if (chunks.length === 0) {
        throw new IndexError("The PDF produced no text chunks to index.");
    }

    let embeddings: number[][];
    try {
        embeddings = await embed(chunks.map((chunk) => chunk.text));
    } catch (error) {
        throw new IndexError(`Could not embed the document: ${describe(error)}`, { cause: error });
    }
    if (embeddings.length !== chunks.length) {
        throw new IndexError(
            `Embedding count mismatch: ${embeddings.length} vectors for ${chunks.length} chunks.`
        );
    }

    console.info(
        `[documents] Indexed "${upload.fileName}": ${pages.length} pages, ${chunks.length} chunks`
    );

    return new DocumentIndex(
        upload.fileName,
        pages.length,
        chunks.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] }))
    );
}
