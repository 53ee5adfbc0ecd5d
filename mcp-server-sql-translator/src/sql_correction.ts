/**
 * SQL Correction Loop
 *
 * Asks the text-generation collaborator to fix a query that failed
 * validation. `numberOfCandidates` identical prompts go out in parallel; the
 * first candidate (by submission index) that carries a ```sql block wins.
 *
 * With `revalidate` on, the winner is validated again and the loop repeats
 * with the new errors while rounds remain.
 */

import type { Logger, SqlDialect } from "./config.js"
import { buildCorrectionPrompt, extractSqlBlock } from "./correction_prompt.js"
import type { TextGenerator } from "./llm_client.js"
import { generateMany, type GenerationOutcome, type RetryPolicy } from "./parallel_generation.js"
import { validateQuery } from "./sql_validator.js"
import type { CanonicalSchema } from "./schema_types.js"

export interface CorrectionRequest {
	sql: string
	errors: string
	dialect: SqlDialect
	schema?: CanonicalSchema | null
	catalog?: string | null
	database?: string | null
	numberOfCandidates?: number
}

/**
 * - corrected: a candidate was chosen (and passed validation, when revalidating)
 * - no_candidate: no reply carried a SQL block; the input query is returned
 * - still_invalid: every round's candidate failed validation
 */
export type CorrectionOutcome = "corrected" | "no_candidate" | "still_invalid"

export interface CorrectionReport {
	sql: string
	outcome: CorrectionOutcome
	/** Extracted candidates of the last round, by submission index */
	candidates: Array<string | null>
	rounds: number
}

export interface CorrectionContext {
	generator: TextGenerator
	logger: Logger
	temperature: number
	timeoutMs: number
	retry: RetryPolicy
	revalidate: boolean
	maxRounds: number
}

export function extractCandidates(outcomes: GenerationOutcome[]): Array<string | null> {
	return outcomes.map((outcome) => (outcome.status === "ok" ? extractSqlBlock(outcome.text) : null))
}

/** First non-null candidate by index */
export function selectCandidate(candidates: Array<string | null>): string | null {
	return candidates.find((c): c is string => c !== null) ?? null
}

export async function correctQuery(
	request: CorrectionRequest,
	context: CorrectionContext,
): Promise<CorrectionReport> {
	const { logger } = context
	const numberOfCandidates = Math.max(1, request.numberOfCandidates ?? 1)
	const maxRounds = context.revalidate ? Math.max(1, context.maxRounds) : 1

	let sql = request.sql
	let errors = request.errors
	let candidates: Array<string | null> = []

	for (let round = 1; round <= maxRounds; round++) {
		const prompt = buildCorrectionPrompt({
			dialect: request.dialect,
			sql,
			errors,
			schema: request.schema,
		})

		logger.info("Requesting SQL correction", {
			dialect: request.dialect,
			round,
			candidates: numberOfCandidates,
		})

		const outcomes = await generateMany(context.generator, Array.from({ length: numberOfCandidates }, () => prompt), {
			temperature: context.temperature,
			timeoutMs: context.timeoutMs,
			retry: context.retry,
			logger,
		})
		candidates = extractCandidates(outcomes)

		logger.debug("Correction candidates", {
			round,
			statuses: outcomes.map((o) => o.status),
			with_sql: candidates.filter((c) => c !== null).length,
		})

		const chosen = selectCandidate(candidates)
		if (chosen === null) {
			logger.warn("No correction candidate produced", { round })
			return { sql, outcome: round === 1 ? "no_candidate" : "still_invalid", candidates, rounds: round }
		}
		sql = chosen

		if (!context.revalidate) {
			return { sql, outcome: "corrected", candidates, rounds: round }
		}

		const validation = validateQuery(chosen, request.dialect, {
			schema: request.schema,
			catalog: request.catalog,
			database: request.database,
		})
		if (validation.errors === null) {
			return { sql, outcome: "corrected", candidates, rounds: round }
		}

		logger.info("Corrected query still invalid", { round, errors: validation.errors })
		errors = validation.errors
	}

	return { sql, outcome: "still_invalid", candidates, rounds: maxRounds }
}
