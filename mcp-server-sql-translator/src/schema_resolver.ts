/**
 * Schema Resolver
 *
 * Schema-aware pass over a parsed statement: every table reference must
 * exist in the schema and every column reference must resolve to exactly one
 * source in scope. Unqualified columns that resolve are qualified in place.
 *
 * Scopes follow SELECT structure: CTEs, FROM/JOIN sources (tables and derived
 * tables), set-operation branches and nested subqueries, which also see the
 * enclosing scopes. Identifier comparison is case-insensitive.
 */

import type { AST } from "node-sql-parser"
import { SqlOptimizeError } from "./config.js"
import { isRecord } from "./guards.js"
import { flattenSchema } from "./schema_normalizer.js"
import { walkAst } from "./sql_dialects.js"
import type { CanonicalSchema, SchemaTable, TableAddress } from "./schema_types.js"

// ============================================================================
// Types
// ============================================================================

interface Source {
	/** Name the query uses to refer to this source (alias or table name) */
	key: string
	/** Underlying table name, when the source is a table */
	tableName: string | null
	/** Lower-cased column names, or null when they cannot be known */
	columns: Set<string> | null
}

interface Scope {
	sources: Source[]
	aliases: Set<string>
	/** Columns merged by JOIN ... USING, lower-cased */
	joinedColumns: Set<string>
}

type CteColumns = Map<string, Set<string> | null>

export interface TableQualifiers {
	catalog?: string | null
	database?: string | null
}

// ============================================================================
// Identifier Helpers
// ============================================================================

/**
 * Text of an identifier field, whichever shape the parser produced
 * ("name", { value: "name" } or { expr: { value: "name" } }).
 */
export function identifierText(value: unknown): string | null {
	if (typeof value === "string") return value
	if (!isRecord(value)) return null
	if (typeof value.value === "string") return value.value
	if (isRecord(value.expr) && typeof value.expr.value === "string") return value.expr.value
	return null
}

function sameName(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase()
}

function isSelectNode(value: unknown): value is Record<string, unknown> & { type: "select" } {
	return isRecord(value) && value.type === "select"
}

/**
 * A FROM item that names a table (as opposed to a derived table or function)
 */
function isTableItem(node: Record<string, unknown>): boolean {
	return typeof node.table === "string" && !("column" in node) && node.type !== "column_ref"
}

/**
 * Address parts a FROM item names, outermost first.
 */
function referenceParts(item: Record<string, unknown>): string[] {
	const parts: string[] = []
	for (const key of ["db", "schema", "table"]) {
		const text = identifierText(item[key])
		if (text) parts.push(...text.split("."))
	}
	return parts
}

function referenceAddress(item: Record<string, unknown>): TableAddress | null {
	const parts = referenceParts(item)
	const table = parts.pop()
	if (!table || parts.length > 2) return null
	const database = parts.pop() ?? null
	const catalog = parts.pop() ?? null
	return { catalog, database, table }
}

function findTable(tables: SchemaTable[], address: TableAddress): SchemaTable | undefined {
	return tables.find((candidate) => {
		if (!sameName(candidate.table, address.table)) return false
		if (candidate.database !== null && address.database !== null && !sameName(candidate.database, address.database)) {
			return false
		}
		if (candidate.catalog !== null && address.catalog !== null && !sameName(candidate.catalog, address.catalog)) {
			return false
		}
		return true
	})
}

function collectCteNames(ast: unknown): Set<string> {
	const names = new Set<string>()
	walkAst(ast, (node) => {
		if (!Array.isArray(node.with)) return
		for (const entry of node.with) {
			if (!isRecord(entry)) continue
			const name = identifierText(entry.name)
			if (name) names.add(name.toLowerCase())
		}
	})
	return names
}

// ============================================================================
// Qualifier Injection
// ============================================================================

/**
 * Set the catalog/database on every table reference that lacks them.
 * References to CTEs are left alone. Returns the number of rewritten
 * references.
 */
export function injectTableQualifiers(ast: AST, qualifiers: TableQualifiers): number {
	const catalog = qualifiers.catalog ?? null
	const database = qualifiers.database ?? null
	if (catalog === null && database === null) return 0

	const cteNames = collectCteNames(ast)
	let rewritten = 0

	walkAst(ast, (node) => {
		if (!isTableItem(node)) return
		const parts = referenceParts(node)
		const table = identifierText(node.table)
		if (!table) return
		if (parts.length === 1 && cteNames.has(table.toLowerCase())) return
		if (parts.length >= 3) return

		if (parts.length === 1 && database !== null) {
			node.db = catalog !== null ? `${catalog}.${database}` : database
			rewritten++
		} else if (parts.length === 2 && catalog !== null && typeof node.db === "string") {
			node.db = `${catalog}.${node.db}`
			rewritten++
		}
	})

	return rewritten
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Output column names of a SELECT, or null when they cannot be known (*).
 */
function outputColumns(select: Record<string, unknown>): Set<string> | null {
	const columns = select.columns
	if (!Array.isArray(columns)) return null

	const names = new Set<string>()
	for (const column of columns) {
		if (!isRecord(column)) continue
		const alias = identifierText(column.as)
		if (alias) {
			names.add(alias.toLowerCase())
			continue
		}
		const expr = column.expr
		if (isRecord(expr) && expr.type === "column_ref") {
			const name = identifierText(expr.column)
			if (name === "*") return null
			if (name) names.add(name.toLowerCase())
		}
	}
	return names
}

class Resolver {
	private readonly tables: SchemaTable[]

	constructor(schema: CanonicalSchema) {
		this.tables = flattenSchema(schema)
	}

	resolveSelect(select: Record<string, unknown>, outer: Scope[], inheritedCtes: CteColumns): void {
		const ctes: CteColumns = new Map(inheritedCtes)

		const withEntries = Array.isArray(select.with) ? select.with : []
		for (const entry of withEntries) {
			if (!isRecord(entry)) continue
			const name = identifierText(entry.name)
			const stmt = isRecord(entry.stmt) ? entry.stmt : null
			const body = stmt && isSelectNode(stmt.ast) ? stmt.ast : stmt
			if (!name || !isSelectNode(body)) continue
			this.resolveSelect(body, outer, ctes)

			const declared = Array.isArray(entry.columns)
				? entry.columns.map(identifierText).filter((c): c is string => c !== null)
				: []
			ctes.set(
				name.toLowerCase(),
				declared.length > 0 ? new Set(declared.map((c) => c.toLowerCase())) : outputColumns(body),
			)
		}

		const scope: Scope = { sources: [], aliases: new Set(), joinedColumns: new Set() }
		const fromItems = Array.isArray(select.from) ? select.from : []
		for (const item of fromItems) {
			if (!isRecord(item)) continue
			scope.sources.push(this.sourceFor(item, outer, ctes))
			if (!Array.isArray(item.using)) continue
			for (const column of item.using) {
				const name = identifierText(column)
				if (name) scope.joinedColumns.add(name.toLowerCase())
			}
		}

		if (Array.isArray(select.columns)) {
			for (const column of select.columns) {
				const alias = isRecord(column) ? identifierText(column.as) : null
				if (alias) scope.aliases.add(alias.toLowerCase())
			}
		}

		const chain = [scope, ...outer]
		for (const key of ["columns", "where", "groupby", "having", "orderby", "qualify", "window"]) {
			this.visitExpression(select[key], chain, ctes)
		}
		for (const item of fromItems) {
			if (isRecord(item)) this.visitExpression(item.on, chain, ctes)
		}

		if (isSelectNode(select._next)) {
			this.resolveSelect(select._next, outer, ctes)
		}
	}

	private sourceFor(item: Record<string, unknown>, outer: Scope[], ctes: CteColumns): Source {
		const alias = identifierText(item.as)

		if (isTableItem(item)) {
			const address = referenceAddress(item)
			const written = referenceParts(item).join(".")
			if (!address) {
				throw new SqlOptimizeError(`Unknown table: '${written}'`)
			}
			const key = alias ?? address.table

			if (address.database === null && ctes.has(address.table.toLowerCase())) {
				return { key, tableName: address.table, columns: ctes.get(address.table.toLowerCase()) ?? null }
			}

			const table = findTable(this.tables, address)
			if (!table) {
				throw new SqlOptimizeError(`Unknown table: '${written}'`)
			}
			const columns = new Set(Object.keys(table.columns).map((c) => c.toLowerCase()))
			return { key, tableName: address.table, columns }
		}

		const expr = item.expr
		if (isRecord(expr) && isSelectNode(expr.ast)) {
			this.resolveSelect(expr.ast, outer, ctes)
			return { key: alias ?? "", tableName: null, columns: outputColumns(expr.ast) }
		}

		// Table functions, UNNEST and anything else we cannot see into
		return { key: alias ?? "", tableName: null, columns: null }
	}

	private visitExpression(node: unknown, chain: Scope[], ctes: CteColumns): void {
		if (Array.isArray(node)) {
			for (const child of node) this.visitExpression(child, chain, ctes)
			return
		}
		if (!isRecord(node)) return

		if (node.type === "column_ref") {
			this.resolveColumn(node, chain)
			return
		}
		if (isSelectNode(node)) {
			this.resolveSelect(node, chain, ctes)
			return
		}
		if (isSelectNode(node.ast)) {
			this.resolveSelect(node.ast, chain, ctes)
			return
		}

		for (const value of Object.values(node)) {
			if (typeof value === "object" && value !== null) this.visitExpression(value, chain, ctes)
		}
	}

	private resolveColumn(ref: Record<string, unknown>, chain: Scope[]): void {
		const column = identifierText(ref.column)
		if (!column || column === "*") return
		const lowered = column.toLowerCase()
		const qualifier = identifierText(ref.table)

		if (qualifier) {
			for (const scope of chain) {
				const source = scope.sources.find(
					(s) => sameName(s.key, qualifier) || (s.tableName !== null && sameName(s.tableName, qualifier)),
				)
				if (!source) continue
				if (source.columns !== null && !source.columns.has(lowered)) {
					throw new SqlOptimizeError(`Column '${column}' could not be resolved for table '${qualifier}'`)
				}
				return
			}
			throw new SqlOptimizeError(`Unknown table alias: '${qualifier}'`)
		}

		for (const scope of chain) {
			const matches = scope.sources.filter((s) => s.columns !== null && s.columns.has(lowered))
			const opaque = scope.sources.some((s) => s.columns === null)

			if (matches.length > 1) {
				if (scope.joinedColumns.has(lowered)) return
				throw new SqlOptimizeError(`Ambiguous column '${column}'`)
			}
			const [match] = matches
			if (match) {
				if (!opaque && match.key) ref.table = match.key
				return
			}
			if (opaque || scope.aliases.has(lowered)) return
		}

		throw new SqlOptimizeError(`Column '${column}' could not be resolved`)
	}
}

/**
 * Resolve every table and column of a statement against the schema,
 * qualifying unique unqualified columns in place.
 * @throws SqlOptimizeError on the first reference that does not resolve
 */
export function resolveQuery(ast: AST, schema: CanonicalSchema): void {
	if (!isSelectNode(ast)) return
	new Resolver(schema).resolveSelect(ast, [], new Map())
}
