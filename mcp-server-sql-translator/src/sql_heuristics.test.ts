import { describe, it, expect } from "vitest"
import { applyQuoteHeuristics, finalizeForTarget, prepareForDialect } from "./sql_heuristics.js"

describe("applyQuoteHeuristics", () => {
	it("rewrites doubled quotes as backslash escapes", () => {
		expect(applyQuoteHeuristics("SELECT 'It''s here'")).toBe("SELECT 'It\\'s here'")
	})

	it("leaves text without doubled quotes untouched", () => {
		expect(applyQuoteHeuristics("SELECT 'plain'")).toBe("SELECT 'plain'")
	})

	it("is idempotent", () => {
		for (const sql of ["It''s", "a'''b", "x''''y", "already\\'s"]) {
			const once = applyQuoteHeuristics(sql)
			expect(applyQuoteHeuristics(once)).toBe(once)
		}
	})
})

describe("prepareForDialect", () => {
	it("escapes quotes only where backslash escapes are legal", () => {
		expect(prepareForDialect("SELECT 'It''s'", "bigquery")).toBe("SELECT 'It\\'s'")
		expect(prepareForDialect("SELECT 'It''s'", "mysql")).toBe("SELECT 'It\\'s'")
		expect(prepareForDialect("SELECT 'It''s'", "postgres")).toBe("SELECT 'It''s'")
		expect(prepareForDialect("SELECT 'It''s'", "sqlite")).toBe("SELECT 'It''s'")
	})
})

describe("finalizeForTarget", () => {
	it("trims, swaps double quotes for backticks and fixes quotes for BigQuery", () => {
		expect(finalizeForTarget('  SELECT "name" FROM "users" WHERE note = \'It\'\'s here\'  ', "bigquery")).toBe(
			"SELECT `name` FROM `users` WHERE note = 'It\\'s here'",
		)
	})

	it("only trims for dialects with double-quoted identifiers", () => {
		const sql = 'SELECT "name" FROM "users" WHERE note = \'It\'\'s here\''
		expect(finalizeForTarget(`  ${sql} `, "postgres")).toBe(sql)
		expect(finalizeForTarget(sql, "snowflake")).toBe(sql)
		expect(finalizeForTarget(sql, "tsql")).toBe(sql)
	})

	it("is idempotent", () => {
		for (const target of ["bigquery", "postgres"] as const) {
			const once = finalizeForTarget(' SELECT "a" FROM t WHERE b = \'x\'\'y\' ', target)
			expect(finalizeForTarget(once, target)).toBe(once)
		}
	})
})
