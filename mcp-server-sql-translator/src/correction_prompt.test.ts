import { describe, it, expect } from "vitest"
import { buildCorrectionPrompt, extractSqlBlock } from "./correction_prompt.js"

describe("buildCorrectionPrompt", () => {
	it("includes dialect, query, errors and schema", () => {
		const prompt = buildCorrectionPrompt({
			dialect: "bigquery",
			sql: "SELECT nam FROM users",
			errors: "Column 'nam' could not be resolved",
			schema: { users: { name: "STRING" } },
		})

		expect(prompt).toContain("SQL dialect:\nbigquery\n")
		expect(prompt).toContain("The SQL query is:\nSELECT nam FROM users\n")
		expect(prompt).toContain("The database schema is:\nTable users:\n  - name: STRING\n")
		expect(prompt).toContain("following errors:\nColumn 'nam' could not be resolved\n")
		expect(prompt).toContain("Do not change any literals in the query.")
	})

	it("omits the schema block when there is no schema", () => {
		const prompt = buildCorrectionPrompt({ dialect: "sqlite", sql: "SELECT 1", errors: "boom" })
		expect(prompt).not.toContain("The database schema is")
		expect(prompt).toContain("The SQL query is:\nSELECT 1\n\nThe query has the following errors:")
	})
})

describe("extractSqlBlock", () => {
	it("returns the first sql block, trimmed", () => {
		const reply = "Here you go:\n```sql\nSELECT 1\n```\nor\n```sql\nSELECT 2\n```"
		expect(extractSqlBlock(reply)).toBe("SELECT 1")
	})

	it("returns null without a sql block", () => {
		expect(extractSqlBlock("SELECT 1")).toBeNull()
		expect(extractSqlBlock("```\nSELECT 1\n```")).toBeNull()
	})
})
