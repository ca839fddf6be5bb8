import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		env: {
			MPRIS_RELAY_LOG_LEVEL: "NONE",
			MPRIS_RELAY_LOG_FILE: "false",
		},
	},
});
