/**
 * SQL Translator
 *
 * Full translation pipeline:
 * 1. Normalize the schema (any supported shape → canonical)
 * 2. Input correction: validate, ask for a fix when invalid
 * 3. Transpile source → target (fatal on failure)
 * 4. Output correction: validate the transpiled query, fix when invalid
 * 5. Final textual fixups
 *
 * Everything the pipeline needs arrives through TranslatorContext, built
 * once at start-up.
 */

import { v4 as uuidv4 } from "uuid"
import { DEFAULTS, GENERATION_CONFIG, type Logger, type SqlDialect } from "./config.js"
import type { TextGenerator } from "./llm_client.js"
import type { RetryPolicy } from "./parallel_generation.js"
import { normalizeSchema } from "./schema_normalizer.js"
import type { CanonicalSchema, SchemaDiagnostic, SchemaInput } from "./schema_types.js"
import { correctQuery, type CorrectionReport } from "./sql_correction.js"
import { transpileSql } from "./sql_dialects.js"
import { finalizeForTarget, prepareForDialect } from "./sql_heuristics.js"
import { validateQuery, type ValidationErrorCategory } from "./sql_validator.js"

// ============================================================================
// Types
// ============================================================================

export interface TranslatorOptions {
	sourceDialect: SqlDialect
	targetDialect: SqlDialect
	/** Dialect the input query is validated in; null means the target dialect. Transpiled output is validated in the target. */
	validationDialect: SqlDialect | null
	processInputErrors: boolean
	processToolOutputErrors: boolean
	revalidateCorrections: boolean
	maxCorrectionRounds: number
	numberOfCandidates: number
	temperature: number
	/** Batch-wide generation deadline (ms) */
	generationTimeoutMs: number
	retry: RetryPolicy
}

export interface TranslatorContext {
	generator: TextGenerator
	logger: Logger
	options: TranslatorOptions
}

export interface TranslationRequest {
	sql: string
	sourceDialect?: SqlDialect
	targetDialect?: SqlDialect
	schema?: SchemaInput | null
	catalog?: string | null
	database?: string | null
	numberOfCandidates?: number
}

/**
 * What one correction stage saw and did
 */
export interface StageCorrection {
	dialect: SqlDialect
	/** Validation errors, null when the query was already valid */
	errors: string | null
	errorCategory: ValidationErrorCategory | null
	correction: CorrectionReport | null
	/** Query leaving the stage */
	sql: string
	/** Dialect the query leaving the stage is written in */
	sqlDialect: SqlDialect
}

export interface TranslationResult {
	translationId: string
	sql: string
	sourceQuery: string
	sourceDialect: SqlDialect
	targetDialect: SqlDialect
	inputCorrection: StageCorrection | null
	outputCorrection: StageCorrection | null
	/** Transpiler output, before output correction and final fixups */
	transpiled: string
	schemaDiagnostics: SchemaDiagnostic[]
}

export function defaultTranslatorOptions(): TranslatorOptions {
	return {
		sourceDialect: DEFAULTS.sourceDialect,
		targetDialect: DEFAULTS.targetDialect,
		validationDialect: null,
		processInputErrors: DEFAULTS.processInputErrors,
		processToolOutputErrors: DEFAULTS.processToolOutputErrors,
		revalidateCorrections: DEFAULTS.revalidateCorrections,
		maxCorrectionRounds: DEFAULTS.maxCorrectionRounds,
		numberOfCandidates: DEFAULTS.numberOfCandidates,
		temperature: DEFAULTS.temperature,
		generationTimeoutMs: GENERATION_CONFIG.batchTimeoutMs,
		retry: {
			maxRetries: GENERATION_CONFIG.maxRetries,
			baseDelayMs: GENERATION_CONFIG.retryBaseDelayMs,
			backoffFactor: GENERATION_CONFIG.backoffFactor,
			jitterRatio: GENERATION_CONFIG.jitterRatio,
		},
	}
}

interface StageInput {
	schema: CanonicalSchema | null
	catalog: string | null
	database: string | null
	numberOfCandidates: number
	translationId: string
}

// ============================================================================
// Translator
// ============================================================================

export class SqlTranslator {
	constructor(private readonly context: TranslatorContext) {}

	async translate(request: TranslationRequest): Promise<TranslationResult> {
		const { logger, options } = this.context
		const translationId = uuidv4()
		const sourceDialect = request.sourceDialect ?? options.sourceDialect
		const targetDialect = request.targetDialect ?? options.targetDialect
		const validationDialect = options.validationDialect ?? targetDialect

		logger.info("Translation started", {
			translation_id: translationId,
			source_dialect: sourceDialect,
			target_dialect: targetDialect,
		})

		const normalized = request.schema ? normalizeSchema(request.schema) : null
		if (normalized && normalized.diagnostics.length > 0) {
			logger.warn("Skipped schema statements", {
				translation_id: translationId,
				skipped: normalized.diagnostics.length,
			})
		}

		const stage: StageInput = {
			schema: normalized?.schema ?? null,
			catalog: request.catalog ?? null,
			database: request.database ?? null,
			numberOfCandidates: request.numberOfCandidates ?? options.numberOfCandidates,
			translationId,
		}

		let sql = request.sql
		let inputCorrection: StageCorrection | null = null
		if (options.processInputErrors) {
			inputCorrection = await this.fixErrors(sql, validationDialect, stage, sourceDialect)
			sql = inputCorrection.sql
		}

		// A validated or corrected query is already written in the validation dialect
		const transpileFrom = inputCorrection?.sqlDialect ?? sourceDialect

		// TranspileError propagates: nothing downstream can use a failed transpile
		const transpiled = transpileSql(sql, transpileFrom, targetDialect)
		logger.info("Transpiled query", { translation_id: translationId, sql: transpiled })

		sql = transpiled
		let outputCorrection: StageCorrection | null = null
		if (options.processToolOutputErrors) {
			outputCorrection = await this.fixErrors(sql, targetDialect, stage)
			sql = outputCorrection.sql
		}

		const finalSql = finalizeForTarget(sql, targetDialect)
		logger.info("Translation finished", { translation_id: translationId })

		return {
			translationId,
			sql: finalSql,
			sourceQuery: request.sql,
			sourceDialect,
			targetDialect,
			inputCorrection,
			outputCorrection,
			transpiled,
			schemaDiagnostics: normalized?.diagnostics ?? [],
		}
	}

	/**
	 * Validate a query and, when it fails, run the correction loop.
	 * `writtenIn` is the dialect of the incoming text; it is still the
	 * dialect of the result when no candidate replaces the query.
	 */
	async fixErrors(
		sql: string,
		dialect: SqlDialect,
		stage: StageInput,
		writtenIn: SqlDialect = dialect,
	): Promise<StageCorrection> {
		const { logger, options } = this.context
		const prepared = prepareForDialect(sql, dialect)

		const validation = validateQuery(prepared, dialect, {
			schema: stage.schema,
			catalog: stage.catalog,
			database: stage.database,
		})
		if (validation.errors === null) {
			return {
				dialect,
				errors: null,
				errorCategory: null,
				correction: null,
				sql: validation.rewrittenQuery,
				sqlDialect: dialect,
			}
		}

		logger.info("Query failed validation, requesting correction", {
			translation_id: stage.translationId,
			dialect,
			category: validation.errorCategory,
			errors: validation.errors,
		})

		const correction = await correctQuery(
			{
				sql: validation.rewrittenQuery,
				errors: validation.errors,
				dialect,
				schema: stage.schema,
				catalog: stage.catalog,
				database: stage.database,
				numberOfCandidates: stage.numberOfCandidates,
			},
			{
				generator: this.context.generator,
				logger,
				temperature: options.temperature,
				timeoutMs: options.generationTimeoutMs,
				retry: options.retry,
				revalidate: options.revalidateCorrections,
				maxRounds: options.maxCorrectionRounds,
			},
		)

		logger.info("Correction finished", {
			translation_id: stage.translationId,
			outcome: correction.outcome,
			rounds: correction.rounds,
		})

		return {
			dialect,
			errors: validation.errors,
			errorCategory: validation.errorCategory,
			correction,
			...(correction.outcome === "no_candidate"
				? { sql, sqlDialect: writtenIn }
				: { sql: correction.sql, sqlDialect: dialect }),
		}
	}
}
