import { afterEach, describe, expect, it, vi } from "vitest";
import {
    DEFAULT_CHUNK_OVERLAP,
    DEFAULT_CHUNK_SIZE,
    RecursiveCharacterTextSplitter,
} from "./text-splitter";

describe("RecursiveCharacterTextSplitter", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("defaults to 1000-character chunks with 200 characters of overlap", () => {
        const splitter = new RecursiveCharacterTextSplitter();

        expect(splitter.chunkSize).toBe(DEFAULT_CHUNK_SIZE);
        expect(splitter.chunkOverlap).toBe(DEFAULT_CHUNK_OVERLAP);
        expect([DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP]).toEqual([1000, 200]);
    });

    it("returns short text as a single chunk", () => {
        const splitter = new RecursiveCharacterTextSplitter();

        expect(splitter.splitText("  Hello world  ")).toEqual(["Hello world"]);
    });

    it("splits on spaces and carries the overlap into the next chunk", () => {
        const splitter = new RecursiveCharacterTextSplitter({ chunkSize: 10, chunkOverlap: 4 });

        expect(splitter.splitText("aaa bbb ccc ddd eee")).toEqual([
            "aaa bbb",
            "bbb ccc",
            "ccc ddd",
            "ddd eee",
        ]);
    });

    it("prefers paragraph breaks over smaller separators", () => {
        const splitter = new RecursiveCharacterTextSplitter({ chunkSize: 15, chunkOverlap: 0 });

        expect(splitter.splitText("First para.\n\nSecond para.")).toEqual([
            "First para.",
            "Second para.",
        ]);
    });

    it("falls back to characters for text without separators", () => {
        const splitter = new RecursiveCharacterTextSplitter({ chunkSize: 10, chunkOverlap: 4 });

        expect(splitter.splitText("abcdefghijklmnop")).toEqual(["abcdefghij", "ghijklmnop"]);
    });

    it("never emits a chunk longer than the chunk size for ordinary prose", () => {
        const splitter = new RecursiveCharacterTextSplitter();
        const sentence = "The mitochondria is the powerhouse of the cell. ";
        const text = Array.from({ length: 120 }, (_, i) =>
            i % 10 === 9 ? `${sentence}\n\n` : sentence
        ).join("");

        const chunks = splitter.splitText(text);

        expect(chunks.length).toBeGreaterThan(1);
        for (const chunk of chunks) {
            expect(chunk.length).toBeLessThanOrEqual(1000);
        }
    });

    it("counts astral characters as one character each", () => {
        const splitter = new RecursiveCharacterTextSplitter({ chunkSize: 8, chunkOverlap: 0 });

        expect(splitter.splitText("𝑥𝑥𝑥 𝑦𝑦𝑦")).toEqual(["𝑥𝑥𝑥 𝑦𝑦𝑦"]);
    });

    it("splits astral text without separators on code point boundaries", () => {
        const splitter = new RecursiveCharacterTextSplitter({ chunkSize: 10, chunkOverlap: 4 });

        expect(splitter.splitText("😀".repeat(12))).toEqual(["😀".repeat(10), "😀".repeat(6)]);
    });

    it("drops empty pages and tags chunks with their page number", () => {
        const splitter = new RecursiveCharacterTextSplitter({ chunkSize: 10, chunkOverlap: 4 });

        expect(
            splitter.splitPages([
                { page: 1, text: "aaa bbb ccc" },
                { page: 2, text: "   " },
                { page: 3, text: "zzz" },
            ])
        ).toEqual([
            { text: "aaa bbb", page: 1 },
            { text: "bbb ccc", page: 1 },
            { text: "zzz", page: 3 },
        ]);
    });

    it("rejects an overlap larger than the chunk size", () => {
        expect(() => new RecursiveCharacterTextSplitter({ chunkSize: 10, chunkOverlap: 11 })).toThrow(
            "Chunk overlap (11) must not exceed chunk size (10)"
        );
    });
});
