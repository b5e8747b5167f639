import { describe, expect, it } from "vitest";
import { cosineSimilarity, DocumentIndex } from "./vector-index";

describe("cosineSimilarity", () => {
    it("is 1 for parallel vectors and 0 for orthogonal ones", () => {
        expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
        expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    });

    it("is 0 when either vector is all zeros", () => {
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it("rejects vectors of different length", () => {
        expect(() => cosineSimilarity([1], [1, 2])).toThrow("Vector length mismatch: 1 vs 2");
    });
});

describe("DocumentIndex.search", () => {
    const index = new DocumentIndex("doc.pdf", 1, [
        { text: "first", page: 1, embedding: [1, 0] },
        { text: "second", page: 1, embedding: [0, 1] },
        { text: "third", page: 1, embedding: [1, 0] },
    ]);

    it("orders by similarity and keeps document order on ties", () => {
        expect(index.search([1, 0], 3).map((c) => c.text)).toEqual(["first", "third", "second"]);
    });

    it("returns at most k chunks", () => {
        expect(index.search([0, 1], 1)).toEqual([{ text: "second", page: 1, score: 1 }]);
        expect(index.search([0, 1], 10)).toHaveLength(3);
    });
});
