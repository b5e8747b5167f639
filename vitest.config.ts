import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: {
            "@": fileURLToPath(new URL("./", import.meta.url)),
        },
    },
    test: {
        environment: "node",
        include: ["**/*.test.ts"],
        exclude: ["node_modules", "dist", ".next"],
        setupFiles: ["./vitest.setup.ts"],
    },
});
