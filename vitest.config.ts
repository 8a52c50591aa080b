import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
	resolve: {
		alias: {
			"@": fileURLToPath(new URL("./packages/anvil", import.meta.url)),
			"@anvil/core": fileURLToPath(new URL("./packages/core/index.ts", import.meta.url)),
		},
	},
	test: {
		coverage: {
			exclude: ["**/node_modules/**", "**/dist/**", "**/*.test.ts"],
			provider: "v8",
			reporter: ["text", "json", "html"],
		},
		environment: "node",
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: false,
		include: ["packages/**/*.test.ts"],
	},
})
