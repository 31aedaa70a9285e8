import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        // The source compiles to CommonJS and uses ws's CJS default export;
        // resolve ws the same way under vitest instead of its ESM wrapper.
        alias: [{ find: /^ws$/, replacement: require.resolve("ws") }]
    },
    test: {
        environment: "node",
        include: ["tests/**/*.test.ts"],
        exclude: ["node_modules", "dist"],
        setupFiles: ["tests/setup.ts"]
    }
});
