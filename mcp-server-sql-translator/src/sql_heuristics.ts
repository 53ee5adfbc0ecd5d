/**
 * Post-processing applied to translated SQL before it is returned.
 */

import type { SqlDialect } from "./config.js"

// Dialects that quote identifiers with backticks and accept \' inside strings
const BACKTICK_DIALECTS: ReadonlySet<SqlDialect> = new Set<SqlDialect>(["bigquery", "mysql", "mariadb"])

export function usesBacktickIdentifiers(dialect: SqlDialect): boolean {
	return BACKTICK_DIALECTS.has(dialect)
}

export function acceptsBackslashEscapes(dialect: SqlDialect): boolean {
	return BACKTICK_DIALECTS.has(dialect)
}

/**
 * Rewrite doubled single quotes ('') as backslash escapes (\').
 * Pairs already preceded by a backslash are left alone, so the rewrite can
 * be applied repeatedly.
 */
export function applyQuoteHeuristics(sql: string): string {
	return sql.replace(/(?<!\\)''/g, "\\'")
}

/**
 * Quote fixups applied before validating under a dialect. Dialects where
 * '' is the only escape keep the text as is.
 */
export function prepareForDialect(sql: string, dialect: SqlDialect): string {
	return acceptsBackslashEscapes(dialect) ? applyQuoteHeuristics(sql) : sql
}

/**
 * Final cleanup: trim, then for backtick dialects double quotes become
 * backticks and the quote heuristics run.
 */
export function finalizeForTarget(sql: string, target: SqlDialect): string {
	const trimmed = sql.trim()
	if (!usesBacktickIdentifiers(target)) return trimmed
	return prepareForDialect(trimmed.replaceAll('"', "`"), target)
}
