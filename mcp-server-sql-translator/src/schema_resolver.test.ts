import { describe, it, expect } from "vitest"
import { identifierText, resolveQuery } from "./schema_resolver.js"
import { parseStatement, walkAst } from "./sql_dialects.js"
import { SqlOptimizeError } from "./config.js"
import type { CanonicalSchema } from "./schema_types.js"

const schema: CanonicalSchema = {
	users: { id: "INTEGER", name: "TEXT" },
	orders: { id: "INTEGER", user_id: "INTEGER", total: "REAL" },
}

function resolve(sql: string) {
	const ast = parseStatement(sql, "sqlite")
	resolveQuery(ast, schema)
	return ast
}

function columnQualifiers(sql: string): Array<[string | null, string | null]> {
	const refs: Array<[string | null, string | null]> = []
	walkAst(resolve(sql), (node) => {
		if (node.type === "column_ref") refs.push([identifierText(node.table), identifierText(node.column)])
	})
	return refs
}

describe("identifierText", () => {
	it("reads every identifier shape", () => {
		expect(identifierText("t")).toBe("t")
		expect(identifierText({ value: "t" })).toBe("t")
		expect(identifierText({ expr: { type: "default", value: "t" } })).toBe("t")
		expect(identifierText(null)).toBeNull()
		expect(identifierText(3)).toBeNull()
	})
})

describe("resolveQuery", () => {
	it("qualifies unqualified columns with their source", () => {
		expect(columnQualifiers("SELECT name FROM users WHERE id = 1")).toEqual([
			["users", "name"],
			["users", "id"],
		])
	})

	it("qualifies with the alias when one is given", () => {
		expect(columnQualifiers("SELECT total FROM orders o")).toEqual([["o", "total"]])
	})

	it("lets correlated subqueries see the enclosing query", () => {
		expect(() =>
			resolve("SELECT name FROM users u WHERE EXISTS (SELECT 1 FROM orders o WHERE o.user_id = u.id)"),
		).not.toThrow()
	})

	it("resolves every branch of a set operation", () => {
		expect(() => resolve("SELECT id FROM users UNION SELECT user_id FROM orders")).not.toThrow()
		expect(() => resolve("SELECT id FROM users UNION SELECT nope FROM orders")).toThrow(
			"Column 'nope' could not be resolved",
		)
	})

	it("exposes only the output columns of a CTE", () => {
		expect(() => resolve("WITH t AS (SELECT id AS a FROM users) SELECT a FROM t")).not.toThrow()
		expect(() => resolve("WITH t AS (SELECT id AS a FROM users) SELECT id FROM t")).toThrow(SqlOptimizeError)
	})

	it("treats a USING column as one column of the join", () => {
		expect(() => resolve("SELECT id, total FROM users JOIN orders USING (id)")).not.toThrow()
		expect(() => resolve("SELECT id FROM users JOIN orders ON users.id = orders.user_id")).toThrow(
			"Ambiguous column 'id'",
		)
	})

	it("does not report columns of sources it cannot see into", () => {
		expect(() => resolve("SELECT anything FROM (SELECT * FROM users) s")).not.toThrow()
	})
})
