/**
 * Schema Types for Dialect Validation
 *
 * Defines types for:
 * - Canonical schema (catalog → database → table → column → type)
 * - DDL schema entries
 * - Sample-dataset schemas (table/column id arrays)
 * - SchemaInput tagged union accepted at the translator boundary
 */

// ============================================================================
// Canonical Schema
// ============================================================================

/** column name → declared type */
export type ColumnTypes = Record<string, string>

/**
 * Nested schema mapping. Leaves are column types; the number of levels above
 * the columns is 1 (table), 2 (database.table) or 3 (catalog.database.table)
 * and is the same for every table in one schema.
 */
export interface SchemaNode {
	[name: string]: string | SchemaNode
}

export type CanonicalSchema = SchemaNode

/**
 * Address of a table inside a canonical schema
 */
export interface TableAddress {
	catalog: string | null
	database: string | null
	table: string
}

/**
 * One table of a canonical schema with its address resolved
 */
export interface SchemaTable extends TableAddress {
	columns: ColumnTypes
}

// ============================================================================
// DDL Schema
// ============================================================================

/** (column_name, column_type) */
export type ColumnDefinition = [string, string]

/**
 * Parsed form of one CREATE TABLE statement
 */
export interface DdlSchemaEntry {
	tableName: string
	columns: ColumnDefinition[]
}

/**
 * A DDL statement the parser skipped, with the reason
 */
export interface SchemaDiagnostic {
	statement: string
	reason: string
}

// ============================================================================
// Sample Dataset Schema
// ============================================================================

/**
 * Flat schema as shipped with text-to-SQL sample datasets. Column arrays are
 * positionally aligned; index 0 is the "*" placeholder column.
 */
export interface SampleDatasetSchema {
	db_table_names: string[]
	db_column_names: {
		table_id: number[]
		column_name: string[]
	}
	db_column_types: string[]
}

// ============================================================================
// Boundary Types
// ============================================================================

export type SchemaInput =
	| { kind: "ddl"; ddl: string }
	| { kind: "canonical"; schema: CanonicalSchema }
	| { kind: "sample_dataset"; sample: SampleDatasetSchema }
	| { kind: "table_entries"; entries: DdlSchemaEntry[] }

export type SchemaInputKind = SchemaInput["kind"]

export interface NormalizedSchema {
	schema: CanonicalSchema
	diagnostics: SchemaDiagnostic[]
}
