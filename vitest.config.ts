import {defineConfig} from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["test/**/*.test.ts"],
        // tsyringe のデコレーターより先に reflect-metadata を読み込む
        setupFiles: ["test/setup.ts"],
    },
});
