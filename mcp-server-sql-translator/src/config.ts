/**
 * Configuration for the SQL Translator MCP Server
 *
 * Includes types, constants, and configuration for:
 * - Supported dialects and pipeline defaults
 * - Error taxonomy shared by every pipeline stage
 * - Logger contract passed through context objects
 */

/**
 * SQL dialects the translator can read or write.
 */
export const SQL_DIALECTS = [
	"sqlite",
	"bigquery",
	"postgres",
	"mysql",
	"mariadb",
	"snowflake",
	"redshift",
	"tsql",
] as const

export type SqlDialect = (typeof SQL_DIALECTS)[number]

export function isSqlDialect(value: string): value is SqlDialect {
	return SQL_DIALECTS.some((d) => d === value)
}

/**
 * Parse a dialect name as it arrives from config or tool input.
 * Accepts a few common aliases ("postgresql", "mssql", "googlesql").
 */
export function parseDialect(value: string): SqlDialect {
	const lowered = value.trim().toLowerCase()
	const aliases: Record<string, SqlDialect> = {
		postgresql: "postgres",
		pg: "postgres",
		mssql: "tsql",
		sqlserver: "tsql",
		transactsql: "tsql",
		googlesql: "bigquery",
		sqlite3: "sqlite",
	}
	const resolved = aliases[lowered] ?? lowered
	if (!isSqlDialect(resolved)) {
		throw new SqlTranslatorError(
			"transpile",
			`Unsupported SQL dialect: ${value}`,
			false,
			{ supported: [...SQL_DIALECTS] },
		)
	}
	return resolved
}

/**
 * Pipeline defaults (used when config leaves a value out)
 */
export const DEFAULTS: {
	sourceDialect: SqlDialect
	targetDialect: SqlDialect
	processInputErrors: boolean
	processToolOutputErrors: boolean
	revalidateCorrections: boolean
	maxCorrectionRounds: number
	numberOfCandidates: number
	temperature: number
} = {
	sourceDialect: "sqlite",
	targetDialect: "bigquery",
	processInputErrors: true,
	processToolOutputErrors: true,
	revalidateCorrections: false,
	maxCorrectionRounds: 1,
	numberOfCandidates: 1,
	temperature: 0.5,
}

/**
 * Parallel generation defaults
 */
export const GENERATION_CONFIG = {
	batchTimeoutMs: 60000,
	maxRetries: 5,
	retryBaseDelayMs: 1000,
	backoffFactor: 2,
	jitterRatio: 0.1,
}

/**
 * Logger passed through every context object.
 * stdout is reserved for the MCP protocol, so implementations write to stderr.
 */
export interface Logger {
	info(message: string, meta?: Record<string, unknown>): void
	warn(message: string, meta?: Record<string, unknown>): void
	error(message: string, meta?: Record<string, unknown>): void
	debug(message: string, meta?: Record<string, unknown>): void
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Error categories:
 * - schema_format: schema input matches no known shape, or bad type token
 * - parse: query does not parse under the declared dialect
 * - optimize: query parses but fails schema-aware resolution
 * - transpile: target rendering failed (fatal, never retried)
 * - generation: text-generation collaborator failed after retries
 * - timeout: collaborator did not answer within the batch window
 * - config: configuration files or environment hold invalid values
 */
export type ErrorCategory =
	| "config"
	| "schema_format"
	| "parse"
	| "optimize"
	| "transpile"
	| "generation"
	| "timeout"

export class SqlTranslatorError extends Error {
	constructor(
		public category: ErrorCategory,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "SqlTranslatorError"
	}
}

export class SchemaFormatError extends SqlTranslatorError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("schema_format", message, false, context)
		this.name = "SchemaFormatError"
	}
}

export class SqlParseError extends SqlTranslatorError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("parse", message, true, context)
		this.name = "SqlParseError"
	}
}

export class SqlOptimizeError extends SqlTranslatorError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("optimize", message, true, context)
		this.name = "SqlOptimizeError"
	}
}

export class TranspileError extends SqlTranslatorError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("transpile", message, false, context)
		this.name = "TranspileError"
	}
}

export class GenerationError extends SqlTranslatorError {
	constructor(
		category: "generation" | "timeout",
		message: string,
		recoverable: boolean = true,
		context?: Record<string, unknown>,
	) {
		super(category, message, recoverable, context)
		this.name = "GenerationError"
	}
}

export interface ClassifiedError {
	category: ErrorCategory | "unknown"
	recoverable: boolean
	message: string
	context?: Record<string, unknown>
}

/**
 * Classify any thrown value for logging and tool responses
 */
export function classifyError(error: unknown): ClassifiedError {
	if (error instanceof SqlTranslatorError) {
		return {
			category: error.category,
			recoverable: error.recoverable,
			message: error.message,
			context: error.context,
		}
	}
	return {
		category: "unknown",
		recoverable: false,
		message: error instanceof Error ? error.message : String(error),
	}
}
