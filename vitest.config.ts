import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["mcp-server-sql-translator/**/*.test.ts"],
		environment: "node",
	},
})
