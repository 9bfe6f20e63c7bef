import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		env: {
			// Keep test runs from writing into ~/.tubeplay/logs
			TUBEPLAY_LOG_FILE: "false",
		},
	},
});
