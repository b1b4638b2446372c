import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["tests/**/*.test.ts"],
	},
	resolve: {
		alias: {
			// Tests run against the workspace sources
			"@waymark/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
			"@waymark/middleware/logger": fileURLToPath(new URL("./packages/middleware/src/logger.ts", import.meta.url)),
			"@waymark/middleware/error-responder": fileURLToPath(new URL("./packages/middleware/src/error-responder.ts", import.meta.url)),
		},
	},
});
