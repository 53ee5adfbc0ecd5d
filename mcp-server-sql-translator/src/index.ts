/**
 * SQL Translator MCP Server
 *
 * Registers the translate_sql, validate_sql and normalize_schema tools. All
 * collaborators (text generator, translator, optional Postgres introspector)
 * are built once here from the loaded config and passed down as context.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import pg from "pg"
import { z } from "zod"
import { SQL_DIALECTS, classifyError, type Logger } from "./config.js"
import { toIntrospectOptions, toModelSettings, toTranslatorOptions, type TranslatorConfig } from "./config/loadConfig.js"
import { createTextGenerator } from "./llm_client.js"
import { SchemaIntrospector } from "./schema_introspector.js"
import { SqlTranslator } from "./sql_translator.js"
import {
	handleNormalizeSchema,
	handleTranslateSql,
	handleValidateSql,
	type ToolContext,
} from "./translate_tool.js"

export { configSchema } from "./config/loadConfig.js"

const { Pool } = pg

const SERVER_NAME = "sql-translator"
const SERVER_VERSION = "1.0.0"

// ============================================================================
// Tool Parameters
// ============================================================================

const dialectParam = z
	.string()
	.describe(`SQL dialect (${SQL_DIALECTS.join(", ")}; aliases such as postgresql or mssql are accepted)`)

const schemaParam = z
	.union([z.string(), z.record(z.unknown()), z.array(z.unknown())])
	.describe(
		"Database schema: CREATE TABLE statements, a nested {db: {table: {column: type}}} object, " +
			"a sample-dataset schema, or [table_name, [[column, type], ...]] entries",
	)

const schemaKindParam = z
	.enum(["ddl", "canonical", "sample_dataset", "table_entries"])
	.describe("Declared schema shape; detected from the value when omitted")

const translateSqlParams = {
	sql: z.string().min(1).describe("SQL query to translate"),
	source_dialect: dialectParam.optional(),
	target_dialect: dialectParam.optional(),
	schema: schemaParam.optional(),
	schema_kind: schemaKindParam.optional(),
	catalog: z.string().optional().describe("Catalog/project added to unqualified tables"),
	database: z.string().optional().describe("Database/dataset added to unqualified tables"),
	number_of_candidates: z.number().int().min(1).max(10).optional().describe("Correction candidates to request"),
}

const validateSqlParams = {
	sql: z.string().min(1).describe("SQL query to validate"),
	dialect: dialectParam.optional(),
	schema: schemaParam.optional(),
	schema_kind: schemaKindParam.optional(),
	catalog: z.string().optional(),
	database: z.string().optional(),
}

const normalizeSchemaParams = {
	schema: schemaParam,
	schema_kind: schemaKindParam.optional(),
}

// ============================================================================
// Server
// ============================================================================

export interface CreateServerOptions {
	config: TranslatorConfig
	logger: Logger
}

export default function createServer({ config, logger }: CreateServerOptions): McpServer {
	const translatorOptions = toTranslatorOptions(config)
	const generator = createTextGenerator(toModelSettings(config))
	const translator = new SqlTranslator({ generator, logger, options: translatorOptions })

	const pool = config.database.connection_string
		? new Pool({ connectionString: config.database.connection_string })
		: null

	const context: ToolContext = {
		translator,
		logger,
		defaultDialect: translatorOptions.validationDialect ?? translatorOptions.targetDialect,
		introspector: pool ? new SchemaIntrospector(pool, logger) : null,
		introspectOptions: toIntrospectOptions(config),
	}

	logger.info("Creating SQL translator server", {
		generator: generator.name,
		source_dialect: translatorOptions.sourceDialect,
		target_dialect: translatorOptions.targetDialect,
		introspection: pool !== null,
	})

	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	server.tool(
		"translate_sql",
		"Translate a SQL query between dialects. Invalid queries are corrected with a language model " +
			"before and after transpiling, using the schema when one is given.",
		translateSqlParams,
		async (args) => handleTranslateSql(args, context),
	)

	server.tool(
		"validate_sql",
		"Parse a SQL query under a dialect and resolve its tables and columns against a schema.",
		validateSqlParams,
		async (args) => handleValidateSql(args, context),
	)

	server.tool(
		"normalize_schema",
		"Convert a schema in any supported shape to the nested canonical form and CREATE TABLE statements.",
		normalizeSchemaParams,
		async (args) => handleNormalizeSchema(args, context),
	)

	if (pool) {
		server.server.onclose = () => {
			pool.end().catch((error: unknown) => {
				logger.error("Failed to close database pool", { ...classifyError(error) })
			})
		}
	}

	return server
}
