import { describe, it, expect } from "vitest"
import { correctQuery, selectCandidate, type CorrectionContext } from "./sql_correction.js"
import { silentLogger } from "./logger.js"
import type { GenerateOptions, TextGenerator } from "./llm_client.js"

// ============================================================================
// Helpers
// ============================================================================

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Replies are picked by call index; later calls may finish first.
 */
class ScriptedGenerator implements TextGenerator {
	readonly name = "scripted"
	prompts: string[] = []

	constructor(private replies: Array<{ text: string; delayMs?: number } | Error>) {}

	async generate(prompt: string, _options: GenerateOptions): Promise<string> {
		const call = this.prompts.length
		this.prompts.push(prompt)
		const reply = this.replies[Math.min(call, this.replies.length - 1)]
		if (reply === undefined) throw new Error("no scripted reply")
		if (reply instanceof Error) throw reply
		await delay(reply.delayMs ?? 0)
		return reply.text
	}
}

function makeContext(generator: TextGenerator, overrides: Partial<CorrectionContext> = {}): CorrectionContext {
	return {
		generator,
		logger: silentLogger,
		temperature: 0.5,
		timeoutMs: 1000,
		retry: { maxRetries: 0, baseDelayMs: 1, backoffFactor: 2, jitterRatio: 0 },
		revalidate: false,
		maxRounds: 1,
		...overrides,
	}
}

const fenced = (sql: string) => "```sql\n" + sql + "\n```"

// ============================================================================
// Tests
// ============================================================================

describe("selectCandidate", () => {
	it("picks the first non-null candidate", () => {
		expect(selectCandidate([null, "SELECT b", "SELECT c"])).toBe("SELECT b")
		expect(selectCandidate([null, null])).toBeNull()
	})
})

describe("correctQuery", () => {
	it("chooses the first valid candidate by index, not by completion order", async () => {
		const generator = new ScriptedGenerator([
			{ text: "I cannot help", delayMs: 1 },
			{ text: fenced("SELECT b"), delayMs: 30 },
			{ text: fenced("SELECT c"), delayMs: 1 },
		])

		const report = await correctQuery(
			{ sql: "SELECT a", errors: "bad", dialect: "bigquery", numberOfCandidates: 3 },
			makeContext(generator),
		)

		expect(report).toEqual({
			sql: "SELECT b",
			outcome: "corrected",
			candidates: [null, "SELECT b", "SELECT c"],
			rounds: 1,
		})
		expect(generator.prompts).toHaveLength(3)
		expect(new Set(generator.prompts).size).toBe(1)
	})

	it("falls back to the original query when no candidate has SQL", async () => {
		const generator = new ScriptedGenerator([{ text: "SELECT without fences" }])

		const report = await correctQuery(
			{ sql: "SELECT a", errors: "bad", dialect: "bigquery" },
			makeContext(generator),
		)

		expect(report).toEqual({ sql: "SELECT a", outcome: "no_candidate", candidates: [null], rounds: 1 })
	})

	it("treats generation failures as missing candidates", async () => {
		const generator = new ScriptedGenerator([new Error("unavailable")])

		const report = await correctQuery(
			{ sql: "SELECT a", errors: "bad", dialect: "bigquery", numberOfCandidates: 2 },
			makeContext(generator),
		)

		expect(report.outcome).toBe("no_candidate")
		expect(report.sql).toBe("SELECT a")
		expect(report.candidates).toEqual([null, null])
	})

	it("re-validates and runs another round with the new errors", async () => {
		const generator = new ScriptedGenerator([
			{ text: fenced("SELECT nme FROM users") },
			{ text: fenced("SELECT name FROM users") },
		])

		const report = await correctQuery(
			{
				sql: "SELECT nam FROM users",
				errors: "Column 'nam' could not be resolved",
				dialect: "sqlite",
				schema: { users: { id: "INTEGER", name: "TEXT" } },
			},
			makeContext(generator, { revalidate: true, maxRounds: 2 }),
		)

		expect(report).toEqual({
			sql: "SELECT name FROM users",
			outcome: "corrected",
			candidates: ["SELECT name FROM users"],
			rounds: 2,
		})
		expect(generator.prompts[1]).toContain("The SQL query is:\nSELECT nme FROM users\n")
		expect(generator.prompts[1]).toContain("Column 'nme' could not be resolved")
	})

	it("reports still_invalid when every round fails validation", async () => {
		const generator = new ScriptedGenerator([{ text: fenced("SELECT nme FROM users") }])

		const report = await correctQuery(
			{
				sql: "SELECT nam FROM users",
				errors: "Column 'nam' could not be resolved",
				dialect: "sqlite",
				schema: { users: { id: "INTEGER", name: "TEXT" } },
			},
			makeContext(generator, { revalidate: true, maxRounds: 2 }),
		)

		expect(report.outcome).toBe("still_invalid")
		expect(report.rounds).toBe(2)
		expect(report.sql).toBe("SELECT nme FROM users")
		expect(generator.prompts).toHaveLength(2)
	})
})
