/**
 * Schema Introspector
 *
 * Reads table and column types of a connected Postgres database from
 * information_schema and returns them as a canonical schema
 * (schema → table → column → type, optionally under a catalog name).
 */

import { z } from "zod"
import type { Logger } from "./config.js"
import { childNode } from "./schema_normalizer.js"
import type { CanonicalSchema, SchemaNode } from "./schema_types.js"

// ============================================================================
// Types
// ============================================================================

/**
 * The part of a pg PoolClient the introspector uses
 */
export interface QueryClient {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
	release(): void
}

/**
 * The part of a pg Pool the introspector uses
 */
export interface ConnectionSource {
	connect(): Promise<QueryClient>
}

const columnRowSchema = z.object({
	table_schema: z.string(),
	table_name: z.string(),
	column_name: z.string(),
	data_type: z.string(),
})

export type ColumnRow = z.infer<typeof columnRowSchema>

export interface IntrospectOptions {
	/** Postgres schemas to read (default: ['public']) */
	schemas?: string[]
	/** Tables to leave out (e.g. migration tables) */
	excludeTables?: string[]
	/** When set, the result is nested under this catalog name */
	catalog?: string | null
}

const COLUMNS_QUERY = `
	SELECT
		c.table_schema,
		c.table_name,
		c.column_name,
		c.data_type
	FROM information_schema.columns c
	JOIN information_schema.tables t
		ON t.table_schema = c.table_schema
		AND t.table_name = c.table_name
	WHERE c.table_schema = ANY($1)
		AND t.table_type IN ('BASE TABLE', 'VIEW')
		AND c.table_name != ALL($2)
	ORDER BY c.table_schema, c.table_name, c.ordinal_position
`

// ============================================================================
// Conversion
// ============================================================================

/**
 * Nest column rows into a canonical schema. Types are upper-cased.
 */
export function columnsToCanonical(rows: ColumnRow[], catalog: string | null = null): CanonicalSchema {
	const root: SchemaNode = {}
	const base = catalog ? childNode(root, catalog) : root
	for (const row of rows) {
		const table = childNode(childNode(base, row.table_schema), row.table_name)
		table[row.column_name] = row.data_type.toUpperCase()
	}
	return root
}

// ============================================================================
// Introspector Class
// ============================================================================

export class SchemaIntrospector {
	private pool: ConnectionSource
	private logger: Logger

	constructor(pool: ConnectionSource, logger: Logger) {
		this.pool = pool
		this.logger = logger
	}

	async introspect(options: IntrospectOptions = {}): Promise<CanonicalSchema> {
		const startTime = Date.now()
		const schemas = options.schemas ?? ["public"]
		const excludeTables = options.excludeTables ?? []

		this.logger.info("Starting schema introspection", { schemas, exclude_tables: excludeTables })

		const client = await this.pool.connect()
		try {
			const result = await client.query(COLUMNS_QUERY, [schemas, excludeTables])
			const rows = z.array(columnRowSchema).parse(result.rows)
			const schema = columnsToCanonical(rows, options.catalog ?? null)

			this.logger.info("Schema introspection complete", {
				columns: rows.length,
				latency_ms: Date.now() - startTime,
			})
			return schema
		} finally {
			client.release()
		}
	}
}
