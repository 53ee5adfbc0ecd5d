import { describe, it, expect } from "vitest"
import {
	handleNormalizeSchema,
	handleTranslateSql,
	handleValidateSql,
	schemaInputFromTool,
	type ToolContext,
	type ToolResult,
} from "./translate_tool.js"
import { SqlTranslator, defaultTranslatorOptions } from "./sql_translator.js"
import { SchemaIntrospector, type ConnectionSource } from "./schema_introspector.js"
import { SchemaFormatError } from "./config.js"
import { silentLogger } from "./logger.js"
import type { GenerateOptions, TextGenerator } from "./llm_client.js"

// ============================================================================
// Helpers
// ============================================================================

class FixedGenerator implements TextGenerator {
	readonly name = "fixed"
	calls = 0

	constructor(private reply: string) {}

	async generate(_prompt: string, _options: GenerateOptions): Promise<string> {
		this.calls++
		return this.reply
	}
}

function makeContext(overrides: Partial<ToolContext> = {}): ToolContext {
	const translator = new SqlTranslator({
		generator: new FixedGenerator("```sql\nSELECT name FROM users\n```"),
		logger: silentLogger,
		options: {
			...defaultTranslatorOptions(),
			validationDialect: "sqlite",
			processToolOutputErrors: false,
			retry: { maxRetries: 0, baseDelayMs: 1, backoffFactor: 2, jitterRatio: 0 },
		},
	})
	return {
		translator,
		logger: silentLogger,
		defaultDialect: "sqlite",
		introspector: null,
		introspectOptions: {},
		...overrides,
	}
}

function payload(result: ToolResult): unknown {
	expect(result.content).toHaveLength(1)
	return JSON.parse(result.content[0]?.text ?? "null")
}

const ddl = "CREATE TABLE users (id INTEGER, name TEXT);"

// ============================================================================
// Tests
// ============================================================================

describe("schemaInputFromTool", () => {
	it("detects the shape when no kind is given", () => {
		expect(schemaInputFromTool(ddl)).toEqual({ kind: "ddl", ddl })
		expect(schemaInputFromTool({ users: { id: "INT" } })).toEqual({
			kind: "canonical",
			schema: { users: { id: "INT" } },
		})
	})

	it("rejects a schema that disagrees with its declared kind", () => {
		expect(() => schemaInputFromTool(ddl, "canonical")).toThrow(SchemaFormatError)
		expect(() => schemaInputFromTool(ddl, "canonical")).toThrow("Schema does not match schema_kind 'canonical'")
	})
})

describe("handleTranslateSql", () => {
	it("returns the translation result as JSON", async () => {
		const result = await handleTranslateSql({ sql: "SELECT nam FROM users", schema: ddl }, makeContext())

		expect(result.isError).toBeUndefined()
		expect(payload(result)).toMatchObject({
			sourceQuery: "SELECT nam FROM users",
			sourceDialect: "sqlite",
			targetDialect: "bigquery",
			inputCorrection: { errors: "Column 'nam' could not be resolved", errorCategory: "optimize" },
		})
	})

	it("accepts dialect aliases", async () => {
		const result = await handleTranslateSql(
			{ sql: "SELECT 1", source_dialect: "SQLite", target_dialect: "postgresql" },
			makeContext(),
		)
		expect(payload(result)).toMatchObject({ sourceDialect: "sqlite", targetDialect: "postgres" })
	})

	it("reports an unknown dialect as a tool error", async () => {
		const result = await handleTranslateSql({ sql: "SELECT 1", target_dialect: "cobol" }, makeContext())

		expect(result.isError).toBe(true)
		expect(payload(result)).toMatchObject({
			category: "transpile",
			recoverable: false,
			message: "Unsupported SQL dialect: cobol",
		})
	})

	it("reports an unsupported schema shape as a tool error", async () => {
		const result = await handleTranslateSql({ sql: "SELECT 1", schema: 42 }, makeContext())

		expect(result.isError).toBe(true)
		expect(payload(result)).toMatchObject({
			category: "schema_format",
			message: "Unsupported schema type: number",
		})
	})

	it("introspects the database when no schema is passed", async () => {
		const rows = [
			{ table_schema: "public", table_name: "users", column_name: "id", data_type: "integer" },
			{ table_schema: "public", table_name: "users", column_name: "name", data_type: "text" },
		]
		let connects = 0
		const pool: ConnectionSource = {
			connect: async () => {
				connects++
				return { query: async () => ({ rows }), release: () => {} }
			},
		}
		const context = makeContext({ introspector: new SchemaIntrospector(pool, silentLogger) })

		const result = await handleValidateSql({ sql: "SELECT nam FROM public.users" }, context)

		expect(connects).toBe(1)
		expect(payload(result)).toMatchObject({
			dialect: "sqlite",
			errors: "Column 'nam' could not be resolved",
			errorCategory: "optimize",
		})
	})
})

describe("handleValidateSql", () => {
	it("returns a valid outcome", async () => {
		const result = await handleValidateSql({ sql: "SELECT name FROM users", schema: ddl }, makeContext())

		expect(payload(result)).toMatchObject({
			dialect: "sqlite",
			errors: null,
			errorCategory: null,
			schemaDiagnostics: [],
		})
	})

	it("reports parse failures without an error flag", async () => {
		const result = await handleValidateSql({ sql: "SELEC name FROM users" }, makeContext())

		expect(result.isError).toBeUndefined()
		expect(payload(result)).toMatchObject({ errorCategory: "parse", rewrittenQuery: "SELEC name FROM users" })
	})
})

describe("handleNormalizeSchema", () => {
	it("returns the canonical schema, its DDL and diagnostics", async () => {
		const result = await handleNormalizeSchema(
			{ schema: `${ddl}\nCREATE VIEW v AS SELECT 1;` },
			makeContext(),
		)

		expect(payload(result)).toEqual({
			schema: { users: { id: "INTEGER", name: "TEXT" } },
			ddl: "CREATE TABLE `users` (\n  id INTEGER,\n  name TEXT\n);",
			diagnostics: [{ statement: "CREATE VIEW v AS SELECT 1;", reason: "Not a CREATE TABLE statement" }],
		})
	})

	it("reports mixed-depth table entries as a tool error", async () => {
		const result = await handleNormalizeSchema(
			{ schema: [["a.t", [["x", "INT"]]], ["u", [["y", "INT"]]]] },
			makeContext(),
		)

		expect(result.isError).toBe(true)
		expect(payload(result)).toMatchObject({ category: "schema_format" })
	})
})
