import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
	resolve: {
		alias: {
			"@": fileURLToPath(new URL(".", import.meta.url)),
			"@anvil/core": fileURLToPath(new URL("../core/index.ts", import.meta.url)),
		},
	},
	test: {
		coverage: {
			exclude: ["src/**/*.test.ts"],
			include: ["src/**/*.ts"],
		},
		include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
	},
})
