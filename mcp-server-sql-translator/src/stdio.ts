#!/usr/bin/env node
/**
 * Stdio entry point for the SQL Translator MCP Server
 *
 * Config priority:
 *   1. Environment variables (highest priority)
 *   2. config/config.local.yaml
 *   3. config/config.yaml (found by walking up from the working directory)
 *
 * Usage:
 *   node stdio.js
 *
 * Or with overrides:
 *   TARGET_DIALECT=postgres LLM_PROVIDER=gemini GEMINI_API_KEY=... node stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import createServer from "./index.js"
import { classifyError } from "./config.js"
import { loadConfig } from "./config/loadConfig.js"
import { createStderrLogger, parseLogLevel } from "./logger.js"

// Logger for start-up failures, before the configured level is known
let logger = createStderrLogger("info")

async function main() {
	const config = loadConfig()
	logger = createStderrLogger(parseLogLevel(config.logging.level))

	logger.info("Starting SQL Translator MCP Server with stdio transport")
	if (config.database.connection_string) {
		logger.info(`Database: ${config.database.connection_string.replace(/:[^:@]+@/, ":***@")}`)
	}

	const server = createServer({ config, logger })

	// Connect via stdio transport
	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("SQL Translator MCP Server running via stdio")

	// Handle graceful shutdown
	const shutdown = async () => {
		logger.info("Shutting down...")
		await server.close()
		process.exit(0)
	}
	process.on("SIGINT", () => void shutdown())
	process.on("SIGTERM", () => void shutdown())
}

main().catch((error: unknown) => {
	logger.error("Fatal error", { ...classifyError(error) })
	process.exit(1)
})
