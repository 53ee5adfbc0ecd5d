/**
 * Correction Prompt
 *
 * Prompt sent to the text-generation collaborator when a query fails
 * validation, and extraction of the SQL block from its reply.
 */

import type { SqlDialect } from "./config.js"
import { formatSchemaForPrompt } from "./schema_normalizer.js"
import type { CanonicalSchema } from "./schema_types.js"

export interface CorrectionPromptInput {
	dialect: SqlDialect
	sql: string
	errors: string
	schema?: CanonicalSchema | null
}

function schemaInsert(schema: CanonicalSchema | null | undefined): string {
	if (!schema || Object.keys(schema).length === 0) return ""
	return `\nThe database schema is:\n${formatSchemaForPrompt(schema)}\n`
}

export function buildCorrectionPrompt(input: CorrectionPromptInput): string {
	const dialect = input.dialect.toLowerCase()
	return `
You are an expert in multiple databases and SQL dialects.
You are given a SQL query written for the SQL dialect:
${dialect}

The SQL query is:
${input.sql}
${schemaInsert(input.schema)}
The query has the following errors:
${input.errors}

Correct the SQL query so that it is valid for the SQL dialect:
${dialect}

Do not change any table or column names in the query. You may qualify column names with table names.
Do not change any literals in the query.
Only rewrite the query so that it is valid for the dialect above.
Return only the corrected SQL query, inside a \`\`\`sql code block.

Corrected SQL query:
`
}

const SQL_BLOCK = /```sql(.*?)```/s

/**
 * First ```sql fenced block of a reply, trimmed; null when there is none.
 */
export function extractSqlBlock(reply: string): string | null {
	const match = reply.match(SQL_BLOCK)
	if (!match || match[1] === undefined) return null
	return match[1].trim()
}
