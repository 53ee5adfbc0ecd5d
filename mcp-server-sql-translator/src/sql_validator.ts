/**
 * SQL Validator
 *
 * Checks a query under a dialect's grammar and, when a schema is available,
 * against the schema:
 * - Strict parse (exactly one statement)
 * - Catalog/database injection on unqualified table references
 * - Table and column resolution (see schema_resolver.ts)
 * - Re-render in the same dialect
 *
 * Failures never escape as exceptions: they come back as an error message
 * plus category, with the query returned unchanged.
 */

import { SqlTranslatorError, type SqlDialect } from "./config.js"
import { injectTableQualifiers, resolveQuery } from "./schema_resolver.js"
import { flattenSchema } from "./schema_normalizer.js"
import { parseStatement, renderStatement } from "./sql_dialects.js"
import type { CanonicalSchema } from "./schema_types.js"

export interface ValidationOptions {
	schema?: CanonicalSchema | null
	catalog?: string | null
	database?: string | null
}

export type ValidationErrorCategory = "parse" | "optimize"

export interface ValidationOutcome {
	/** Error text, or null when the query is valid */
	errors: string | null
	errorCategory: ValidationErrorCategory | null
	/** Normalized query on success, the input query otherwise */
	rewrittenQuery: string
}

/**
 * Validate a query under a dialect, optionally against a schema.
 */
export function validateQuery(
	sql: string,
	dialect: SqlDialect,
	options: ValidationOptions = {},
): ValidationOutcome {
	try {
		const ast = parseStatement(sql, dialect)
		injectTableQualifiers(ast, { catalog: options.catalog, database: options.database })
		// An empty schema knows no tables, so it cannot reject any
		if (options.schema && flattenSchema(options.schema).length > 0) {
			resolveQuery(ast, options.schema)
		}
		return { errors: null, errorCategory: null, rewrittenQuery: renderStatement(ast, dialect) }
	} catch (error) {
		return {
			errors: error instanceof Error ? error.message : String(error),
			errorCategory: categoryOf(error),
			rewrittenQuery: sql,
		}
	}
}

// Resolution and render failures both happen after a successful parse
function categoryOf(error: unknown): ValidationErrorCategory {
	return error instanceof SqlTranslatorError && error.category === "parse" ? "parse" : "optimize"
}

export function isValid(outcome: ValidationOutcome): boolean {
	return outcome.errors === null
}
