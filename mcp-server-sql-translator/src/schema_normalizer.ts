/**
 * Schema Normalizer
 *
 * Turns the schema shapes callers hand us into one canonical nested mapping
 * (catalog → database → table → column → type):
 * - DDL text with one or more CREATE TABLE statements
 * - An already canonical mapping
 * - A flat sample-dataset schema (positionally aligned id arrays)
 * - A list of (table_name, [(column, type), ...]) entries
 *
 * DDL parsing is resilient: a statement that does not parse is skipped and
 * reported in `diagnostics` instead of aborting the batch.
 */

import { z } from "zod"
import { SchemaFormatError } from "./config.js"
import { describeShape, isRecord } from "./guards.js"
import type {
	CanonicalSchema,
	ColumnDefinition,
	ColumnTypes,
	DdlSchemaEntry,
	NormalizedSchema,
	SampleDatasetSchema,
	SchemaDiagnostic,
	SchemaInput,
	SchemaNode,
	SchemaTable,
	TableAddress,
} from "./schema_types.js"

// ============================================================================
// Shapes
// ============================================================================

const sampleDatasetShape = z.object({
	db_table_names: z.array(z.string()),
	db_column_names: z.object({
		table_id: z.array(z.number().int()),
		column_name: z.array(z.string()),
	}),
	db_column_types: z.array(z.string()),
})

const tableEntriesShape = z.array(
	z.tuple([
		z.string(),
		z.array(z.tuple([z.string(), z.string()]).rest(z.unknown())),
	]).rest(z.unknown()),
)

/**
 * Declared type tokens of sample datasets → canonical type names
 */
const SAMPLE_COLUMN_TYPES = new Map<string, string>([
	["text", "TEXT"],
	["number", "FLOAT"],
	["date", "DATE"],
	["datetime", "DATETIME"],
	["time", "TIME"],
	["timestamp", "TIMESTAMP"],
	["bool", "BOOL"],
])

// ============================================================================
// Table Names
// ============================================================================

/**
 * Split a dotted table name into its address parts.
 *
 * "a.b.c" → catalog a, database b, table c; "b.c" → database b, table c;
 * "c" → table c. Anything else is rejected.
 */
export function splitTableName(tableName: string): TableAddress {
	return addressFromParts(tableName.split("."), tableName)
}

function addressFromParts(parts: string[], original: string): TableAddress {
	const [first, second, third] = parts
	if (parts.length === 3 && first && second && third) {
		return { catalog: first, database: second, table: third }
	}
	if (parts.length === 2 && first && second) {
		return { catalog: null, database: first, table: second }
	}
	if (parts.length === 1 && first) {
		return { catalog: null, database: null, table: first }
	}
	throw new SchemaFormatError(`Invalid table name: ${original}`, { parts: parts.length })
}

function addressDepth(address: TableAddress): number {
	if (address.catalog !== null) return 3
	if (address.database !== null) return 2
	return 1
}

export function qualifiedTableName(address: TableAddress): string {
	return [address.catalog, address.database, address.table]
		.filter((part): part is string => part !== null)
		.join(".")
}

// ============================================================================
// DDL Parsing
// ============================================================================

const CREATE_TABLE_PATTERN =
	/^\s*CREATE\s+(?:OR\s+REPLACE\s+)?TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?`?([\w.\-]+)`?\s*\(([\s\S]*)\);\s*$/i

const COLUMN_PATTERN = /^`?\s*(\w+)`?\s+(\w+)/

/**
 * Split a DDL body on commas that sit outside parentheses, angle brackets
 * and quotes.
 */
function splitTopLevel(body: string): string[] {
	const segments: string[] = []
	let depth = 0
	let quote: string | null = null
	let current = ""

	for (const char of body) {
		if (quote) {
			current += char
			if (char === quote) quote = null
			continue
		}
		if (char === "'" || char === '"') {
			quote = char
		} else if (char === "(" || char === "<") {
			depth++
		} else if ((char === ")" || char === ">") && depth > 0) {
			depth--
		} else if (char === "," && depth === 0) {
			segments.push(current)
			current = ""
			continue
		}
		current += char
	}
	segments.push(current)
	return segments
}

/** Drop a trailing `-- comment` that is not inside a quoted string. */
function stripInlineComment(line: string): string {
	let quote: string | null = null
	for (let i = 0; i < line.length; i++) {
		const char = line[i]
		if (quote) {
			if (char === quote) quote = null
			continue
		}
		if (char === "'" || char === '"') {
			quote = char
		} else if (char === "-" && line[i + 1] === "-") {
			return line.substring(0, i)
		}
	}
	return line
}

function isConstraintClause(first: string, second: string, segment: string): boolean {
	const a = first.toUpperCase()
	const b = second.toUpperCase()
	if (a === "CONSTRAINT" || a === "CHECK") return true
	if ((a === "PRIMARY" || a === "FOREIGN") && b === "KEY") return true
	if (a === "UNIQUE" && (b === "KEY" || b === "INDEX")) return true
	// MySQL index clause: KEY idx_name (col)
	return (a === "KEY" || a === "INDEX") && /^\S+\s+\w+\s+\(/.test(segment)
}

/**
 * Extract (name, type) pairs from the body of a CREATE TABLE statement.
 * Comment lines, INSERT INTO lines and lines led by "(" (sample values)
 * are ignored.
 */
export function extractColumns(body: string): ColumnDefinition[] {
	const kept: string[] = []
	for (const rawLine of body.split("\n")) {
		const line = rawLine.trim()
		if (!line) continue
		if (line.startsWith("--")) continue
		if (/^INSERT\s+INTO\b/i.test(line)) continue
		if (line.startsWith("(")) continue
		kept.push(stripInlineComment(line))
	}

	const columns: ColumnDefinition[] = []
	for (const segment of splitTopLevel(kept.join("\n"))) {
		const trimmed = segment.trim()
		const match = trimmed.match(COLUMN_PATTERN)
		if (!match) continue
		const [, name, type] = match
		if (!name || !type || isConstraintClause(name, type, trimmed)) continue
		columns.push([name, type])
	}
	return columns
}

/**
 * Parse a single CREATE TABLE statement (terminated by ";").
 */
export function parseDdlStatement(
	statement: string,
): { entry: DdlSchemaEntry } | { reason: string } {
	const match = statement.match(CREATE_TABLE_PATTERN)
	if (!match) {
		return { reason: "Not a CREATE TABLE statement" }
	}
	const tableName = match[1] ?? ""
	const body = (match[2] ?? "").trim()
	if (!tableName || !body) {
		return { reason: "CREATE TABLE statement has an empty name or body" }
	}
	const columns = extractColumns(body)
	if (columns.length === 0) {
		return { reason: `No columns found for table ${tableName}` }
	}
	return { entry: { tableName, columns } }
}

/**
 * Parse DDL text holding one or more statements separated by ";\n".
 */
export function parseDdl(ddl: string): { entries: DdlSchemaEntry[]; diagnostics: SchemaDiagnostic[] } {
	const entries: DdlSchemaEntry[] = []
	const diagnostics: SchemaDiagnostic[] = []

	const statements = ddl
		.split(";\n")
		.map((s) => s.trim().replace(/;+$/, ""))
		.filter((s) => s.length > 0)
		.map((s) => `${s};`)

	for (const statement of statements) {
		const result = parseDdlStatement(statement)
		if ("entry" in result) {
			entries.push(result.entry)
		} else {
			diagnostics.push({ statement, reason: result.reason })
		}
	}

	return { entries, diagnostics }
}

// ============================================================================
// Canonical Schema Helpers
// ============================================================================

/** Returns the node as column types when every value is a string. */
function asColumnTypes(node: SchemaNode): ColumnTypes | null {
	const columns: ColumnTypes = {}
	for (const [name, value] of Object.entries(node)) {
		if (typeof value !== "string") return null
		columns[name] = value
	}
	return columns
}

/**
 * Levels above the columns (1 = table, 2 = database, 3 = catalog), or null
 * when the nesting is inconsistent. An empty mapping has depth 1.
 */
export function schemaDepth(schema: SchemaNode): number | null {
	const children = Object.values(schema)
	if (children.length === 0) return 1

	let depth: number | null = null
	for (const child of children) {
		if (typeof child === "string") return null
		const childDepth = asColumnTypes(child) ? 0 : schemaDepth(child)
		if (childDepth === null) return null
		if (depth === null) depth = childDepth + 1
		else if (depth !== childDepth + 1) return null
	}
	return depth
}

/**
 * List every table of a canonical schema with its address.
 */
export function flattenSchema(schema: CanonicalSchema): SchemaTable[] {
	const depth = schemaDepth(schema)
	if (depth === null || depth > 3) {
		throw new SchemaFormatError("Canonical schema nesting is inconsistent")
	}

	const tables: SchemaTable[] = []
	const visit = (node: SchemaNode, path: string[]) => {
		for (const [name, value] of Object.entries(node)) {
			if (typeof value === "string") continue
			const nextPath = [...path, name]
			const columns = nextPath.length === depth ? asColumnTypes(value) : null
			if (columns) {
				tables.push({ ...addressFromParts(nextPath, nextPath.join(".")), columns })
			} else {
				visit(value, nextPath)
			}
		}
	}
	visit(schema, [])
	return tables
}

/** Child mapping of `parent`, created when missing. */
export function childNode(parent: SchemaNode, name: string): SchemaNode {
	const existing = parent[name]
	if (typeof existing === "object") return existing
	const created: SchemaNode = {}
	parent[name] = created
	return created
}

/**
 * Build a canonical schema from DDL entries, nesting each table under its
 * own catalog/database parts.
 */
export function entriesToCanonical(entries: DdlSchemaEntry[]): CanonicalSchema {
	const schema: SchemaNode = {}
	let depth: number | null = null

	for (const entry of entries) {
		const address = splitTableName(entry.tableName)
		const entryDepth = addressDepth(address)
		if (depth === null) depth = entryDepth
		else if (depth !== entryDepth) {
			throw new SchemaFormatError(
				`Table ${entry.tableName} uses ${entryDepth} name parts, other tables use ${depth}`,
			)
		}

		let parent = schema
		if (address.catalog !== null) parent = childNode(parent, address.catalog)
		if (address.database !== null) parent = childNode(parent, address.database)

		const table: SchemaNode = {}
		for (const [columnName, columnType] of entry.columns) {
			table[columnName] = columnType
		}
		parent[address.table] = table
	}

	return schema
}

/**
 * Build a canonical (single level) schema from a sample-dataset schema.
 */
export function schemaFromSampleDataset(sample: SampleDatasetSchema): CanonicalSchema {
	// Index 0 is the "*" placeholder column
	const tableIds = sample.db_column_names.table_id.slice(1)
	const columnNames = sample.db_column_names.column_name.slice(1)
	const columnTypes = sample.db_column_types.slice(1).map((token) => {
		const mapped = SAMPLE_COLUMN_TYPES.get(token)
		if (mapped === undefined) {
			throw new SchemaFormatError(`Unsupported sample dataset column type: ${token}`, {
				supported: [...SAMPLE_COLUMN_TYPES.keys()],
			})
		}
		return mapped
	})

	if (columnNames.length !== columnTypes.length || tableIds.length !== columnNames.length) {
		throw new SchemaFormatError("Sample dataset column arrays are not aligned", {
			table_ids: tableIds.length,
			column_names: columnNames.length,
			column_types: columnTypes.length,
		})
	}

	const schema: SchemaNode = {}
	tableIds.forEach((tableId, position) => {
		const tableName = sample.db_table_names[tableId]
		const columnName = columnNames[position]
		const columnType = columnTypes[position]
		if (tableName === undefined || columnName === undefined || columnType === undefined) {
			throw new SchemaFormatError(`Sample dataset references unknown table id ${tableId}`)
		}
		childNode(schema, tableName)[columnName] = columnType
	})
	return schema
}

// ============================================================================
// Dispatch
// ============================================================================

function isSchemaNode(value: unknown): value is SchemaNode {
	if (!isRecord(value)) return false
	return Object.values(value).every((v) => typeof v === "string" || isSchemaNode(v))
}

/**
 * Work out which schema shape an untyped value is. Callers that know the
 * shape should build a SchemaInput directly instead.
 */
export function detectSchemaInput(value: unknown): SchemaInput {
	if (typeof value === "string") {
		return { kind: "ddl", ddl: value }
	}

	const sample = sampleDatasetShape.safeParse(value)
	if (sample.success) {
		return { kind: "sample_dataset", sample: sample.data }
	}

	if (isSchemaNode(value)) {
		const depth = schemaDepth(value)
		if (depth !== null && depth <= 3) {
			return { kind: "canonical", schema: value }
		}
	}

	const entries = tableEntriesShape.safeParse(value)
	if (entries.success) {
		return {
			kind: "table_entries",
			entries: entries.data.map(([tableName, columns]) => ({
				tableName,
				columns: columns.map(([name, type]): ColumnDefinition => [name, type]),
			})),
		}
	}

	throw new SchemaFormatError(`Unsupported schema type: ${describeShape(value)}`)
}

/**
 * Normalize a declared schema input into the canonical mapping.
 */
export function normalizeSchema(input: SchemaInput): NormalizedSchema {
	switch (input.kind) {
		case "ddl": {
			const { entries, diagnostics } = parseDdl(input.ddl)
			return { schema: entriesToCanonical(entries), diagnostics }
		}
		case "canonical": {
			const depth = schemaDepth(input.schema)
			if (depth === null || depth > 3) {
				throw new SchemaFormatError("Canonical schema must nest 1 to 3 levels above the columns")
			}
			return { schema: input.schema, diagnostics: [] }
		}
		case "sample_dataset":
			return { schema: schemaFromSampleDataset(input.sample), diagnostics: [] }
		case "table_entries": {
			const diagnostics: SchemaDiagnostic[] = []
			const valid = input.entries.filter((entry) => {
				if (entry.tableName && entry.columns.length > 0) return true
				diagnostics.push({
					statement: entry.tableName,
					reason: "Table entry has an empty name or no columns",
				})
				return false
			})
			return { schema: entriesToCanonical(valid), diagnostics }
		}
	}
}

export function normalizeUnknownSchema(value: unknown): NormalizedSchema {
	return normalizeSchema(detectSchemaInput(value))
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render a canonical schema back to CREATE TABLE statements.
 */
export function renderSchemaAsDdl(schema: CanonicalSchema): string {
	return flattenSchema(schema)
		.map((table) => {
			const columns = Object.entries(table.columns).map(([name, type]) => `  ${name} ${type}`)
			return `CREATE TABLE \`${qualifiedTableName(table)}\` (\n${columns.join(",\n")}\n);`
		})
		.join("\n")
}

/**
 * Human-readable schema block for prompts.
 */
export function formatSchemaForPrompt(schema: CanonicalSchema): string {
	return flattenSchema(schema)
		.map((table) => {
			const columns = Object.entries(table.columns).map(([name, type]) => `  - ${name}: ${type}`)
			return [`Table ${qualifiedTableName(table)}:`, ...columns].join("\n")
		})
		.join("\n")
}
