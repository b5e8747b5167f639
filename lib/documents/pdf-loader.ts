// ============================================================
// PDF page loader — pdfjs-dist legacy build (runs under Node.js).
// ============================================================

import "server-only";
import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { TextItem, TextMarkedContent } from "pdfjs-dist/types/src/display/api";

export interface DocumentPage {
    /** 1-based page number. */
    page: number;
    text: string;
}

export type PageLoader = (filePath: string) => Promise<DocumentPage[]>;

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
    return "str" in item;
}

export const loadPdfPages: PageLoader = async (filePath) => {
    const data = new Uint8Array(await readFile(filePath));
    const loadingTask = getDocument({ data, disableFontFace: true, isEvalSupported: false });

    try {
        const pdf = await loadingTask.promise;
        const pages: DocumentPage[] = [];
        for (let i = 1; i <= pdf.numPages; i++) {
            const page = await pdf.getPage(i);
            const content = await page.getTextContent();
            const text = content.items
                .filter(isTextItem)
                .map((item) => item.str + (item.hasEOL ? "\n" : ""))
                .join("");
            pages.push({ page: i, text });
            page.cleanup();
        }
        return pages;
    } finally {
        await loadingTask.destroy();
    }
};
