import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { withTempFile } from "./temp-file";

describe("withTempFile", () => {
    const bytes = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

    it("exposes the bytes on disk and removes them afterwards", async () => {
        let seenPath = "";

        const result = await withTempFile("notes.pdf", bytes, async (filePath) => {
            seenPath = filePath;
            expect(new Uint8Array(await readFile(filePath))).toEqual(bytes);
            return "indexed";
        });

        expect(result).toBe("indexed");
        expect(path.basename(seenPath)).toBe("notes.pdf");
        expect(existsSync(path.dirname(seenPath))).toBe(false);
    });

    it("removes the directory when the callback fails", async () => {
        let seenPath = "";

        await expect(
            withTempFile("notes.pdf", bytes, async (filePath) => {
                seenPath = filePath;
                throw new Error("parse failed");
            })
        ).rejects.toThrow("parse failed");

        expect(seenPath).not.toBe("");
        expect(existsSync(path.dirname(seenPath))).toBe(false);
    });

    it("keeps only the base name of the uploaded file", async () => {
        const fileName = await withTempFile("../../etc/evil.pdf", bytes, async (filePath) =>
            path.basename(filePath)
        );

        expect(fileName).toBe("evil.pdf");
    });
});
