import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
    plugins: [tsconfigPaths()],
    test: {
        globals: true,
        include: ["core/src/**/*.test.ts", "cli/src/**/*.test.ts"],
    },
});
