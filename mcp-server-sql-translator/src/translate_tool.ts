/**
 * Translate Tool - MCP tool handlers
 *
 * Handlers for translate_sql, validate_sql and normalize_schema. Each handler
 * returns an MCP tool result and never throws; failures are reported as
 * `isError: true` results carrying the classified error as JSON.
 */

import {
	SchemaFormatError,
	classifyError,
	parseDialect,
	type Logger,
	type SqlDialect,
} from "./config.js"
import type { IntrospectOptions, SchemaIntrospector } from "./schema_introspector.js"
import { detectSchemaInput, normalizeSchema, renderSchemaAsDdl } from "./schema_normalizer.js"
import type { CanonicalSchema, SchemaInput, SchemaInputKind } from "./schema_types.js"
import type { SqlTranslator } from "./sql_translator.js"
import { validateQuery } from "./sql_validator.js"

// ============================================================================
// Types
// ============================================================================

export interface ToolContext {
	translator: SqlTranslator
	logger: Logger
	/** Default dialect for validate_sql when the caller names none */
	defaultDialect: SqlDialect
	/** Set when a database connection is configured */
	introspector: SchemaIntrospector | null
	introspectOptions: IntrospectOptions
}

export interface ToolResult {
	[key: string]: unknown
	content: Array<{ type: "text"; text: string }>
	isError?: boolean
}

export interface TranslateSqlInput {
	sql: string
	source_dialect?: string
	target_dialect?: string
	schema?: unknown
	schema_kind?: SchemaInputKind
	catalog?: string
	database?: string
	number_of_candidates?: number
}

export interface ValidateSqlInput {
	sql: string
	dialect?: string
	schema?: unknown
	schema_kind?: SchemaInputKind
	catalog?: string
	database?: string
}

export interface NormalizeSchemaInput {
	schema: unknown
	schema_kind?: SchemaInputKind
}

// ============================================================================
// Helpers
// ============================================================================

function jsonResult(value: unknown): ToolResult {
	return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] }
}

function errorResult(error: unknown, logger: Logger, tool: string): ToolResult {
	const classified = classifyError(error)
	logger.error("Tool call failed", { tool, ...classified })
	return {
		content: [{ type: "text", text: JSON.stringify(classified, null, 2) }],
		isError: true,
	}
}

/**
 * Turn a raw tool argument into a tagged schema input. Without a kind the
 * shape is detected; with one, the detected shape must agree.
 */
export function schemaInputFromTool(value: unknown, kind?: SchemaInputKind): SchemaInput {
	const detected = detectSchemaInput(value)
	if (kind && detected.kind !== kind) {
		throw new SchemaFormatError(`Schema does not match schema_kind '${kind}'`, {
			detected: detected.kind,
		})
	}
	return detected
}

async function resolveSchemaInput(
	value: unknown,
	kind: SchemaInputKind | undefined,
	context: ToolContext,
): Promise<SchemaInput | null> {
	if (value !== undefined && value !== null) {
		return schemaInputFromTool(value, kind)
	}
	if (!context.introspector) return null

	const schema: CanonicalSchema = await context.introspector.introspect(context.introspectOptions)
	return { kind: "canonical", schema }
}

// ============================================================================
// Handlers
// ============================================================================

export async function handleTranslateSql(input: TranslateSqlInput, context: ToolContext): Promise<ToolResult> {
	try {
		const schema = await resolveSchemaInput(input.schema, input.schema_kind, context)
		const result = await context.translator.translate({
			sql: input.sql,
			sourceDialect: input.source_dialect ? parseDialect(input.source_dialect) : undefined,
			targetDialect: input.target_dialect ? parseDialect(input.target_dialect) : undefined,
			schema,
			catalog: input.catalog ?? null,
			database: input.database ?? null,
			numberOfCandidates: input.number_of_candidates,
		})
		return jsonResult(result)
	} catch (error) {
		return errorResult(error, context.logger, "translate_sql")
	}
}

export async function handleValidateSql(input: ValidateSqlInput, context: ToolContext): Promise<ToolResult> {
	try {
		const dialect = input.dialect ? parseDialect(input.dialect) : context.defaultDialect
		const schemaInput = await resolveSchemaInput(input.schema, input.schema_kind, context)
		const normalized = schemaInput ? normalizeSchema(schemaInput) : null

		const outcome = validateQuery(input.sql, dialect, {
			schema: normalized?.schema ?? null,
			catalog: input.catalog ?? null,
			database: input.database ?? null,
		})
		return jsonResult({
			dialect,
			...outcome,
			schemaDiagnostics: normalized?.diagnostics ?? [],
		})
	} catch (error) {
		return errorResult(error, context.logger, "validate_sql")
	}
}

export async function handleNormalizeSchema(input: NormalizeSchemaInput, context: ToolContext): Promise<ToolResult> {
	try {
		const normalized = normalizeSchema(schemaInputFromTool(input.schema, input.schema_kind))
		return jsonResult({
			schema: normalized.schema,
			ddl: renderSchemaAsDdl(normalized.schema),
			diagnostics: normalized.diagnostics,
		})
	} catch (error) {
		return errorResult(error, context.logger, "normalize_schema")
	}
}
