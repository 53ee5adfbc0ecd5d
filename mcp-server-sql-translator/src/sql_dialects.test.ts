import { describe, it, expect } from "vitest"
import { functionName, parseStatement, transpileSql, walkAst } from "./sql_dialects.js"
import { SqlParseError, TranspileError } from "./config.js"

describe("parseStatement", () => {
	it("parses a single statement", () => {
		const ast = parseStatement("SELECT name FROM users WHERE id = 1", "sqlite")
		expect(ast.type).toBe("select")
	})

	it("rejects several statements", () => {
		expect(() => parseStatement("SELECT 1; SELECT 2", "sqlite")).toThrow(
			"Expected a single statement, found 2",
		)
	})

	it("rejects invalid syntax as a parse error", () => {
		expect(() => parseStatement("SELEC name FROM users", "sqlite")).toThrow(SqlParseError)
	})
})

describe("functionName", () => {
	it("reads plain and path-shaped names", () => {
		expect(functionName({ type: "function", name: "nvl" })).toBe("nvl")
		expect(
			functionName({ type: "function", name: { name: [{ type: "default", value: "NVL" }] } }),
		).toBe("NVL")
		expect(functionName({ type: "function", name: 3 })).toBeNull()
	})
})

describe("walkAst", () => {
	it("visits nested objects and arrays", () => {
		const seen: unknown[] = []
		walkAst({ type: "a", args: [{ type: "b" }, { inner: { type: "c" } }] }, (node) => {
			if (typeof node.type === "string") seen.push(node.type)
		})
		expect(seen).toEqual(["a", "b", "c"])
	})
})

describe("transpileSql", () => {
	it("maps SQLite functions to BigQuery", () => {
		const out = transpileSql("SELECT RANDOM() FROM users", "sqlite", "bigquery")
		expect(out).toMatch(/\bRAND\(\)/i)
		expect(out).not.toMatch(/RANDOM/i)
	})

	it("maps GROUP_CONCAT to STRING_AGG", () => {
		expect(transpileSql("SELECT GROUP_CONCAT(name) FROM users", "sqlite", "bigquery")).toMatch(
			/STRING_AGG\(/i,
		)
	})

	it("maps IFNULL to COALESCE for Postgres", () => {
		expect(transpileSql("SELECT IFNULL(name, 'x') FROM users", "sqlite", "postgres")).toMatch(
			/COALESCE\(/i,
		)
	})

	it("raises a fatal TranspileError on bad input", () => {
		let caught: unknown
		try {
			transpileSql("SELEC 1", "sqlite", "bigquery")
		} catch (error) {
			caught = error
		}
		expect(caught).toBeInstanceOf(TranspileError)
		expect(caught).toMatchObject({ category: "transpile", recoverable: false })
		expect(String(caught)).toContain("Failed to transpile from sqlite to bigquery")
	})
})
