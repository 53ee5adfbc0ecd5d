import { describe, it, expect } from "vitest"
import { validateQuery, isValid } from "./sql_validator.js"
import { injectTableQualifiers, identifierText } from "./schema_resolver.js"
import { parseStatement, walkAst } from "./sql_dialects.js"
import type { CanonicalSchema } from "./schema_types.js"

// ============================================================================
// Fixtures
// ============================================================================

const schema: CanonicalSchema = {
	users: { id: "INTEGER", name: "TEXT" },
	orders: { id: "INTEGER", user_id: "INTEGER", total: "REAL" },
}

function expectError(sql: string, message: string) {
	const outcome = validateQuery(sql, "sqlite", { schema })
	expect(outcome).toEqual({ errors: message, errorCategory: "optimize", rewrittenQuery: sql })
}

// ============================================================================
// Success
// ============================================================================

describe("validateQuery - valid queries", () => {
	it("accepts and qualifies a single-table query", () => {
		const outcome = validateQuery("SELECT name FROM users WHERE id = 1", "sqlite", { schema })
		expect(isValid(outcome)).toBe(true)
		expect(outcome.errorCategory).toBeNull()
		expect(outcome.rewrittenQuery).toMatch(/users\W+name/i)
	})

	it("resolves columns case-insensitively", () => {
		expect(validateQuery("SELECT NAME FROM Users", "sqlite", { schema }).errors).toBeNull()
	})

	it("accepts CTEs and joins", () => {
		const sql =
			"WITH big AS (SELECT user_id, total FROM orders WHERE total > 100) " +
			"SELECT u.name, big.total FROM users u JOIN big ON big.user_id = u.id"
		expect(validateQuery(sql, "sqlite", { schema }).errors).toBeNull()
	})

	it("accepts derived tables and subqueries", () => {
		expect(
			validateQuery("SELECT s.n FROM (SELECT name AS n FROM users) s", "sqlite", { schema }).errors,
		).toBeNull()
		expect(
			validateQuery("SELECT name FROM users WHERE id IN (SELECT user_id FROM orders WHERE total > 10)", "sqlite", {
				schema,
			}).errors,
		).toBeNull()
	})

	it("accepts select-list aliases in ORDER BY", () => {
		expect(validateQuery("SELECT name AS n FROM users ORDER BY n", "sqlite", { schema }).errors).toBeNull()
	})

	it("merges columns joined with USING", () => {
		const outcome = validateQuery("SELECT id, name, total FROM users JOIN orders USING (id)", "sqlite", { schema })
		expect(outcome.errors).toBeNull()
		expect(outcome.errorCategory).toBeNull()
	})

	it("does not resolve against an empty schema", () => {
		expect(validateQuery("SELECT name FROM users", "sqlite", { schema: {} }).errors).toBeNull()
	})

	it("only parses when no schema is given", () => {
		expect(validateQuery("SELECT anything FROM whatever", "sqlite").errors).toBeNull()
	})

	it("matches injected qualifiers against a nested schema", () => {
		const nested: CanonicalSchema = { proj: { ds: { users: { id: "INTEGER", name: "TEXT" } } } }
		const outcome = validateQuery("SELECT name FROM users", "sqlite", {
			schema: nested,
			catalog: "proj",
			database: "ds",
		})
		expect(outcome.errors).toBeNull()
	})
})

// ============================================================================
// Failures
// ============================================================================

describe("validateQuery - failures", () => {
	it("reports unknown tables", () => {
		expectError("SELECT name FROM customers", "Unknown table: 'customers'")
	})

	it("reports unknown columns", () => {
		expectError("SELECT email FROM users", "Column 'email' could not be resolved")
	})

	it("reports ambiguous columns", () => {
		expectError("SELECT id FROM users JOIN orders ON users.id = orders.user_id", "Ambiguous column 'id'")
	})

	it("reports columns missing from their qualifier", () => {
		expectError("SELECT u.email FROM users u", "Column 'email' could not be resolved for table 'u'")
		expectError(
			"SELECT s.name FROM (SELECT name AS n FROM users) s",
			"Column 'name' could not be resolved for table 's'",
		)
	})

	it("reports unknown qualifiers", () => {
		expectError("SELECT x.name FROM users", "Unknown table alias: 'x'")
	})

	it("reports parse errors and returns the query unchanged", () => {
		const sql = "SELEC name FROM users"
		const outcome = validateQuery(sql, "sqlite", { schema })
		expect(outcome.errorCategory).toBe("parse")
		expect(typeof outcome.errors).toBe("string")
		expect(outcome.rewrittenQuery).toBe(sql)
	})
})

// ============================================================================
// Qualifier Injection
// ============================================================================

function tableDatabases(sql: string, catalog: string | null, database: string | null) {
	const ast = parseStatement(sql, "sqlite")
	const count = injectTableQualifiers(ast, { catalog, database })
	const dbs: Array<string | null> = []
	walkAst(ast, (node) => {
		if (typeof node.table === "string" && !("column" in node)) {
			dbs.push(identifierText(node.db))
		}
	})
	return { count, dbs }
}

describe("injectTableQualifiers", () => {
	it("sets catalog and database on bare tables", () => {
		expect(tableDatabases("SELECT name FROM users", "proj", "ds")).toEqual({ count: 1, dbs: ["proj.ds"] })
	})

	it("leaves CTE references alone", () => {
		const { count, dbs } = tableDatabases("WITH c AS (SELECT id FROM users) SELECT id FROM c", null, "ds")
		expect(count).toBe(1)
		expect([...dbs].sort()).toEqual(["ds", null])
	})

	it("does nothing without qualifiers", () => {
		expect(tableDatabases("SELECT name FROM users", null, null)).toEqual({ count: 0, dbs: [null] })
	})
})
