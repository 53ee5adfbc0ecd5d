/**
 * Batch Translator
 *
 * Translates every sample in a JSON file through the full pipeline and prints
 * a summary. Each sample is { id?, sql, schema?, schema_kind?, catalog?,
 * database?, source_dialect?, target_dialect? }; schema takes any shape the
 * tools accept.
 *
 * Usage:
 *   npx tsx scripts/translate_batch.ts scripts/samples.example.json [results.json]
 */

import fs from "fs"
import { z } from "zod"
import { classifyError, parseDialect } from "../src/config.js"
import { loadConfig, toModelSettings, toTranslatorOptions } from "../src/config/loadConfig.js"
import { createTextGenerator } from "../src/llm_client.js"
import { createStderrLogger, parseLogLevel } from "../src/logger.js"
import { SqlTranslator, type TranslationResult } from "../src/sql_translator.js"
import { schemaInputFromTool } from "../src/translate_tool.js"

const sampleSchema = z.object({
	id: z.union([z.string(), z.number()]).optional(),
	sql: z.string(),
	schema: z.unknown().optional(),
	schema_kind: z.enum(["ddl", "canonical", "sample_dataset", "table_entries"]).optional(),
	catalog: z.string().optional(),
	database: z.string().optional(),
	source_dialect: z.string().optional(),
	target_dialect: z.string().optional(),
})

interface BatchResult {
	id: string
	success: boolean
	sql?: string
	corrected_input: boolean
	corrected_output: boolean
	error?: string
	latency_ms: number
}

function wasCorrected(stage: TranslationResult["inputCorrection"]): boolean {
	return stage?.correction?.outcome === "corrected"
}

async function runBatch() {
	const [samplesPath, outputPath] = process.argv.slice(2)
	if (!samplesPath) {
		console.error("Usage: npx tsx scripts/translate_batch.ts <samples.json> [results.json]")
		process.exit(1)
	}

	const samples = z.array(sampleSchema).parse(JSON.parse(fs.readFileSync(samplesPath, "utf-8")))

	const config = loadConfig()
	const logger = createStderrLogger(parseLogLevel(config.logging.level))
	const options = toTranslatorOptions(config)
	const translator = new SqlTranslator({
		generator: createTextGenerator(toModelSettings(config)),
		logger,
		options,
	})

	console.log("\n" + "=".repeat(80))
	console.log("SQL TRANSLATION BATCH")
	console.log("=".repeat(80))
	console.log(`\nSamples: ${samples.length}`)
	console.log(`Dialects: ${options.sourceDialect} -> ${options.targetDialect}`)
	console.log("\n" + "-".repeat(80))

	const results: BatchResult[] = []

	for (const [index, sample] of samples.entries()) {
		const id = String(sample.id ?? index + 1)
		const start = Date.now()
		process.stdout.write(`[${id}] ${sample.sql.slice(0, 60)}...`)

		try {
			const result = await translator.translate({
				sql: sample.sql,
				sourceDialect: sample.source_dialect ? parseDialect(sample.source_dialect) : undefined,
				targetDialect: sample.target_dialect ? parseDialect(sample.target_dialect) : undefined,
				schema: sample.schema === undefined ? null : schemaInputFromTool(sample.schema, sample.schema_kind),
				catalog: sample.catalog ?? null,
				database: sample.database ?? null,
			})
			const latency = Date.now() - start
			results.push({
				id,
				success: true,
				sql: result.sql,
				corrected_input: wasCorrected(result.inputCorrection),
				corrected_output: wasCorrected(result.outputCorrection),
				latency_ms: latency,
			})
			console.log(` ✓ (${(latency / 1000).toFixed(1)}s)`)
		} catch (error) {
			const classified = classifyError(error)
			results.push({
				id,
				success: false,
				corrected_input: false,
				corrected_output: false,
				error: `${classified.category}: ${classified.message}`,
				latency_ms: Date.now() - start,
			})
			console.log(` ✗ ${classified.category}`)
		}
	}

	const passed = results.filter((r) => r.success).length
	const inputFixes = results.filter((r) => r.corrected_input).length
	const outputFixes = results.filter((r) => r.corrected_output).length
	const avgLatency = results.reduce((sum, r) => sum + r.latency_ms, 0) / Math.max(results.length, 1)

	console.log("\n" + "=".repeat(80))
	console.log("BATCH SUMMARY")
	console.log("=".repeat(80))
	console.log(`\nTranslated: ${passed}/${results.length}`)
	console.log(`Input corrections: ${inputFixes}`)
	console.log(`Output corrections: ${outputFixes}`)
	console.log(`Average latency: ${(avgLatency / 1000).toFixed(2)}s`)

	const failures = results.filter((r) => !r.success)
	if (failures.length > 0) {
		console.log("\nFailures:")
		for (const f of failures) console.log(`  [${f.id}] ${f.error}`)
	}

	if (outputPath) {
		fs.writeFileSync(outputPath, JSON.stringify(results, null, 2))
		console.log(`\nResults written to ${outputPath}`)
	}
}

runBatch().catch((error: unknown) => {
	console.error("Batch failed:", error)
	process.exit(1)
})
