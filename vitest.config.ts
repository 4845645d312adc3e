import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts", "__tests__/**/*.test.ts"],
		exclude: ["node_modules", "dist"],
		environment: "node",
		setupFiles: ["__tests__/setup.ts"],
		testTimeout: 30000,
		hookTimeout: 10000,
		pool: "threads",
	},
});
