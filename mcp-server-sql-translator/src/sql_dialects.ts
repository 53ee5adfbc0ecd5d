/**
 * SQL Dialects
 *
 * Grammar-aware parsing and rendering on top of node-sql-parser, plus the
 * dialect-to-dialect transpiler used by the translation pipeline.
 */

import nodeSqlParser from "node-sql-parser"
import type { AST } from "node-sql-parser"
import { SqlParseError, TranspileError, type SqlDialect } from "./config.js"
import { isRecord } from "./guards.js"

const { Parser } = nodeSqlParser

const parser = new Parser()

/**
 * Dialect → node-sql-parser `database` option
 */
const PARSER_DATABASE: Record<SqlDialect, string> = {
	sqlite: "sqlite",
	bigquery: "bigquery",
	postgres: "postgresql",
	mysql: "mysql",
	mariadb: "mariadb",
	snowflake: "snowflake",
	redshift: "redshift",
	tsql: "transactsql",
}

/**
 * Function renames applied when writing a target dialect (keys upper-case).
 */
const FUNCTION_RENAMES: Partial<Record<SqlDialect, Record<string, string>>> = {
	bigquery: {
		GROUP_CONCAT: "STRING_AGG",
		RANDOM: "RAND",
		INSTR: "STRPOS",
		TOTAL: "SUM",
		NVL: "IFNULL",
	},
	postgres: {
		IFNULL: "COALESCE",
		NVL: "COALESCE",
		RAND: "RANDOM",
		GROUP_CONCAT: "STRING_AGG",
	},
	mysql: {
		NVL: "IFNULL",
		RANDOM: "RAND",
	},
	snowflake: {
		GROUP_CONCAT: "LISTAGG",
		RAND: "RANDOM",
	},
	tsql: {
		IFNULL: "ISNULL",
		NVL: "ISNULL",
		RANDOM: "RAND",
	},
}

// ============================================================================
// AST Walking
// ============================================================================

/**
 * Depth-first visit of every object node in a parsed tree.
 */
export function walkAst(node: unknown, visit: (node: Record<string, unknown>) => void): void {
	if (Array.isArray(node)) {
		for (const child of node) walkAst(child, visit)
		return
	}
	if (!isRecord(node)) return
	visit(node)
	for (const value of Object.values(node)) {
		if (typeof value === "object" && value !== null) walkAst(value, visit)
	}
}

// ============================================================================
// Parse / Render
// ============================================================================

/**
 * Parse exactly one statement under the dialect's grammar.
 * @throws SqlParseError on syntax errors or when the text holds 0 or 2+ statements
 */
export function parseStatement(sql: string, dialect: SqlDialect): AST {
	let parsed: AST | AST[]
	try {
		parsed = parser.astify(sql, { database: PARSER_DATABASE[dialect] })
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error)
		throw new SqlParseError(message, { dialect })
	}

	const statements = Array.isArray(parsed) ? parsed : [parsed]
	const [statement] = statements
	if (statements.length !== 1 || statement === undefined) {
		throw new SqlParseError(`Expected a single statement, found ${statements.length}`, { dialect })
	}
	return statement
}

export function renderStatement(ast: AST, dialect: SqlDialect): string {
	return parser.sqlify(ast, { database: PARSER_DATABASE[dialect] })
}

/**
 * Read a function node's name, whichever shape the parser produced.
 */
export function functionName(node: Record<string, unknown>): string | null {
	const name = node.name
	if (typeof name === "string") return name
	if (isRecord(name) && Array.isArray(name.name)) {
		const last = name.name[name.name.length - 1]
		if (isRecord(last) && typeof last.value === "string") return last.value
	}
	return null
}

function setFunctionName(node: Record<string, unknown>, value: string): void {
	const name = node.name
	if (typeof name === "string") {
		node.name = value
		return
	}
	if (isRecord(name) && Array.isArray(name.name)) {
		const last = name.name[name.name.length - 1]
		if (isRecord(last)) last.value = value
	}
}

/**
 * Rename dialect-specific functions for the target dialect, in place.
 * Returns the number of renamed call sites.
 */
export function renameFunctions(ast: AST, target: SqlDialect): number {
	const renames = FUNCTION_RENAMES[target]
	if (!renames) return 0

	let renamed = 0
	walkAst(ast, (node) => {
		if (node.type !== "function" && node.type !== "aggr_func") return
		const current = functionName(node)
		if (current === null) return
		const replacement = renames[current.toUpperCase()]
		if (replacement === undefined) return
		// MySQL-style GROUP_CONCAT(... SEPARATOR x) has no direct equivalent
		if (node.type === "aggr_func" && isRecord(node.args) && node.args.separator) return
		setFunctionName(node, replacement)
		renamed++
	})
	return renamed
}

// ============================================================================
// Transpile
// ============================================================================

/**
 * Translate one statement from the source grammar to the target grammar.
 * @throws TranspileError on any failure (never retried)
 */
export function transpileSql(sql: string, source: SqlDialect, target: SqlDialect): string {
	try {
		const ast = parseStatement(sql, source)
		renameFunctions(ast, target)
		return renderStatement(ast, target)
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error)
		throw new TranspileError(`Failed to transpile from ${source} to ${target}: ${message}`, {
			source,
			target,
		})
	}
}
