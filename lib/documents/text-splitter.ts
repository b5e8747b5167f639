// ============================================================
// Recursive character text splitter.
//
// Tries separators in order ("\n\n", "\n", " ", ""), splitting on the
// first one present and recursing into pieces that are still too long.
// Pieces are merged back into chunks of at most `chunkSize` characters,
// carrying up to `chunkOverlap` characters over between neighbours.
// The separator stays attached to the start of the piece after it.
// ============================================================

import type { DocumentPage } from "./pdf-loader";

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;
export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

export interface TextSplitterOptions {
    chunkSize?: number;
    chunkOverlap?: number;
    separators?: string[];
}

export interface TextChunk {
    text: string;
    page: number;
}

export class RecursiveCharacterTextSplitter {
    readonly chunkSize: number;
    readonly chunkOverlap: number;
    private readonly separators: string[];

    constructor(options: TextSplitterOptions = {}) {
        this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
        this.chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
        this.separators = options.separators ?? DEFAULT_SEPARATORS;

        if (this.chunkOverlap > this.chunkSize) {
            throw new Error(
                `Chunk overlap (${this.chunkOverlap}) must not exceed chunk size (${this.chunkSize})`
            );
        }
    }

    splitText(text: string): string[] {
        return this.split(text, this.separators);
    }

    splitPages(pages: DocumentPage[]): TextChunk[] {
        return pages.flatMap((page) =>
            this.splitText(page.text).map((text) => ({ text, page: page.page }))
        );
    }

    private split(text: string, separators: string[]): string[] {
        const finalChunks: string[] = [];

        let separator = separators[separators.length - 1] ?? "";
        let nextSeparators: string[] = [];
        for (let i = 0; i < separators.length; i++) {
            const candidate = separators[i];
            if (candidate === "") {
                separator = candidate;
                break;
            }
            if (text.includes(candidate)) {
                separator = candidate;
                nextSeparators = separators.slice(i + 1);
                break;
            }
        }

        let goodSplits: string[] = [];
        for (const piece of splitKeepingSeparator(text, separator)) {
            if (lengthOf(piece) < this.chunkSize) {
                goodSplits.push(piece);
                continue;
            }
            if (goodSplits.length > 0) {
                finalChunks.push(...this.merge(goodSplits));
                goodSplits = [];
            }
            if (nextSeparators.length === 0) {
                finalChunks.push(piece);
            } else {
                finalChunks.push(...this.split(piece, nextSeparators));
            }
        }
        if (goodSplits.length > 0) {
            finalChunks.push(...this.merge(goodSplits));
        }
        return finalChunks;
    }

    // Separators already sit inside the pieces, so they are joined with "".
    private merge(splits: string[]): string[] {
        const docs: string[] = [];
        let current: string[] = [];
        let total = 0;

        for (const piece of splits) {
            const pieceLength = lengthOf(piece);
            if (total + pieceLength > this.chunkSize) {
                if (total > this.chunkSize) {
                    console.warn(
                        `[documents] Created a chunk of size ${total}, which is longer than the specified ${this.chunkSize}`
                    );
                }
                if (current.length > 0) {
                    pushJoined(docs, current);
                    while (
                        total > this.chunkOverlap ||
                        (total + pieceLength > this.chunkSize && total > 0)
                    ) {
                        total -= lengthOf(current[0]);
                        current = current.slice(1);
                    }
                }
            }
            current.push(piece);
            total += pieceLength;
        }
        pushJoined(docs, current);
        return docs;
    }
}

// Lengths are in code points, so astral characters such as 𝑥 count once.
function lengthOf(text: string): number {
    return Array.from(text).length;
}

function splitKeepingSeparator(text: string, separator: string): string[] {
    if (separator === "") {
        return Array.from(text);
    }
    const [first, ...rest] = text.split(separator);
    return [first, ...rest.map((part) => separator + part)].filter((s) => s !== "");
}

function pushJoined(docs: string[], parts: string[]): void {
    const joined = parts.join("").trim();
    if (joined !== "") {
        docs.push(joined);
    }
}
