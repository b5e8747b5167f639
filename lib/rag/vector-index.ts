// ============================================================
// In-memory nearest-neighbour index over chunk embeddings.
// ============================================================

import type { TextChunk } from "@/lib/documents/text-splitter";

export type Embedder = (texts: string[]) => Promise<number[][]>;

export interface IndexedChunk extends TextChunk {
    embedding: number[];
}

export interface ScoredChunk extends TextChunk {
    score: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
    }
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class DocumentIndex {
    constructor(
        readonly fileName: string,
        readonly pageCount: number,
        private readonly chunks: readonly IndexedChunk[]
    ) {}

    get chunkCount(): number {
        return this.chunks.length;
    }

    /** Top-k chunks by cosine similarity, best first; ties keep document order. */
    search(query: number[], k: number): ScoredChunk[] {
        return this.chunks
            .map((chunk, position) => ({
                text: chunk.text,
                page: chunk.page,
                score: cosineSimilarity(query, chunk.embedding),
                position,
            }))
            .sort((a, b) => b.score - a.score || a.position - b.position)
            .slice(0, k)
            .map(({ text, page, score }) => ({ text, page, score }));
    }
}
