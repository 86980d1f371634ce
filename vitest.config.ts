import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["src/__tests__/**/*.test.ts"],
		testTimeout: 10000,
		hookTimeout: 10000,
		env: {
			// Keep pino off the pretty transport and quiet under test
			NODE_ENV: "production",
			LOG_LEVEL: "silent",
			RELEASE_TRAIN_OUTPUT: "agent",
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "html", "json-summary"],
			include: ["src/**/*.ts"],
			exclude: ["src/__tests__/**", "src/index.ts", "src/cli.ts"],
			thresholds: {
				lines: 70,
				functions: 70,
				branches: 70,
				statements: 70,
			},
		},
	},
});
