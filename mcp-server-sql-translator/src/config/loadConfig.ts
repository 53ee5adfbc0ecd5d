/**
 * Config loader for the SQL translator.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The result is validated and defaulted with zod, then handed to the server
 * once at start-up. There is no module-level cache.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import {
	DEFAULTS,
	GENERATION_CONFIG,
	SqlTranslatorError,
	parseDialect,
} from "../config.js"
import { isRecord } from "../guards.js"
import type { ModelSettings } from "../llm_client.js"
import type { IntrospectOptions } from "../schema_introspector.js"
import type { TranslatorOptions } from "../sql_translator.js"

// ── Schema ───────────────────────────────────────────────────────────

const dialectField = z.string().transform((value, ctx) => {
	try {
		return parseDialect(value)
	} catch (error) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: error instanceof Error ? error.message : String(error),
		})
		return z.NEVER
	}
})

export const configSchema = z.object({
	translator: z
		.object({
			source_dialect: dialectField.default(DEFAULTS.sourceDialect),
			target_dialect: dialectField.default(DEFAULTS.targetDialect),
			validation_dialect: dialectField.nullable().default(null),
			process_input_errors: z.boolean().default(DEFAULTS.processInputErrors),
			process_tool_output_errors: z.boolean().default(DEFAULTS.processToolOutputErrors),
			revalidate_corrections: z.boolean().default(DEFAULTS.revalidateCorrections),
			max_correction_rounds: z.number().int().min(1).default(DEFAULTS.maxCorrectionRounds),
			number_of_candidates: z.number().int().min(1).default(DEFAULTS.numberOfCandidates),
		})
		.default({}),
	model: z
		.object({
			provider: z.enum(["ollama", "gemini"]).default("ollama"),
			llm: z.string().default("qwen2.5-coder:7b"),
			ollama_url: z.string().default("http://localhost:11434"),
			/** seconds */
			timeout: z.number().positive().default(60),
			gemini_model: z.string().default("gemini-2.0-flash"),
			gemini_api_key: z.string().optional(),
		})
		.default({}),
	generation: z
		.object({
			temperature: z.number().min(0).max(2).default(DEFAULTS.temperature),
			timeout_ms: z.number().int().positive().default(GENERATION_CONFIG.batchTimeoutMs),
			max_retries: z.number().int().min(0).default(GENERATION_CONFIG.maxRetries),
			retry_base_delay_ms: z.number().min(0).default(GENERATION_CONFIG.retryBaseDelayMs),
			backoff_factor: z.number().min(1).default(GENERATION_CONFIG.backoffFactor),
		})
		.default({}),
	database: z
		.object({
			connection_string: z.string().nullable().default(null),
			schemas: z.array(z.string()).default(["public"]),
			exclude_tables: z.array(z.string()).default([]),
			catalog: z.string().nullable().default(null),
		})
		.default({}),
	logging: z
		.object({
			level: z.string().default("info"),
		})
		.default({}),
})

export type TranslatorConfig = z.infer<typeof configSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

function findConfigDir(start: string): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = start
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): Record<string, unknown> {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed = yaml.load(raw)
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
	const result = { ...a }
	for (const [key, value] of Object.entries(b)) {
		const existing = result[key]
		result[key] = isRecord(value) && isRecord(existing) ? deepMerge(existing, value) : value
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

type Env = Record<string, string | undefined>

function envBool(env: Env, name: string): boolean | undefined {
	const v = env[name]
	if (v === undefined) return undefined
	if (v === "true" || v === "1") return true
	if (v === "false" || v === "0") return false
	return undefined
}
function envInt(env: Env, name: string): number | undefined {
	const v = env[name]
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(env: Env, name: string): number | undefined {
	const v = env[name]
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}
function envList(env: Env, name: string): string[] | undefined {
	const v = env[name]
	if (v === undefined) return undefined
	return v.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
}

function section(cfg: Record<string, unknown>, name: string): Record<string, unknown> {
	const existing = cfg[name]
	if (isRecord(existing)) return existing
	const created: Record<string, unknown> = {}
	cfg[name] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: Record<string, unknown>, env: Env): void {
	// translator
	const t = section(cfg, "translator")
	t.source_dialect = env.SOURCE_DIALECT ?? t.source_dialect
	t.target_dialect = env.TARGET_DIALECT ?? t.target_dialect
	t.validation_dialect = env.VALIDATION_DIALECT ?? t.validation_dialect
	t.process_input_errors = envBool(env, "PROCESS_INPUT_ERRORS") ?? t.process_input_errors
	t.process_tool_output_errors = envBool(env, "PROCESS_TOOL_OUTPUT_ERRORS") ?? t.process_tool_output_errors
	t.revalidate_corrections = envBool(env, "REVALIDATE_CORRECTIONS") ?? t.revalidate_corrections
	t.max_correction_rounds = envInt(env, "MAX_CORRECTION_ROUNDS") ?? t.max_correction_rounds
	t.number_of_candidates = envInt(env, "NUMBER_OF_CANDIDATES") ?? t.number_of_candidates

	// model
	const m = section(cfg, "model")
	m.provider = env.LLM_PROVIDER ?? m.provider
	m.llm = env.OLLAMA_MODEL ?? m.llm
	m.ollama_url = env.OLLAMA_BASE_URL ?? m.ollama_url
	m.timeout = envInt(env, "OLLAMA_TIMEOUT") ?? m.timeout
	m.gemini_model = env.GEMINI_MODEL ?? m.gemini_model
	m.gemini_api_key = env.GEMINI_API_KEY ?? m.gemini_api_key

	// generation
	const g = section(cfg, "generation")
	g.temperature = envFloat(env, "TEMPERATURE") ?? g.temperature
	g.timeout_ms = envInt(env, "GENERATION_TIMEOUT_MS") ?? g.timeout_ms
	g.max_retries = envInt(env, "GENERATION_MAX_RETRIES") ?? g.max_retries
	g.retry_base_delay_ms = envInt(env, "RETRY_BASE_DELAY_MS") ?? g.retry_base_delay_ms
	g.backoff_factor = envFloat(env, "RETRY_BACKOFF_FACTOR") ?? g.backoff_factor

	// database
	const d = section(cfg, "database")
	d.connection_string = env.POSTGRES_CONNECTION_STRING ?? d.connection_string
	d.schemas = envList(env, "POSTGRES_SCHEMAS") ?? d.schemas
	d.exclude_tables = envList(env, "POSTGRES_EXCLUDE_TABLES") ?? d.exclude_tables

	// logging
	const l = section(cfg, "logging")
	l.level = env.LOG_LEVEL ?? l.level
}

// ── Loading ──────────────────────────────────────────────────────────

export interface LoadConfigOptions {
	/** Directory the config/ lookup starts from (default: process.cwd()) */
	cwd?: string
	env?: Env
}

export function loadConfig(options: LoadConfigOptions = {}): TranslatorConfig {
	const env = options.env ?? process.env
	const configDir = findConfigDir(options.cwd ?? process.cwd())
	let merged: Record<string, unknown> = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged, env)

	const parsed = configSchema.safeParse(merged)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
		throw new SqlTranslatorError("config", `Invalid configuration: ${issues.join("; ")}`, false, {
			configDir,
			issues,
		})
	}
	return parsed.data
}

// ── Views ────────────────────────────────────────────────────────────

export function toTranslatorOptions(config: TranslatorConfig): TranslatorOptions {
	const t = config.translator
	const g = config.generation
	return {
		sourceDialect: t.source_dialect,
		targetDialect: t.target_dialect,
		validationDialect: t.validation_dialect,
		processInputErrors: t.process_input_errors,
		processToolOutputErrors: t.process_tool_output_errors,
		revalidateCorrections: t.revalidate_corrections,
		maxCorrectionRounds: t.max_correction_rounds,
		numberOfCandidates: t.number_of_candidates,
		temperature: g.temperature,
		generationTimeoutMs: g.timeout_ms,
		retry: {
			maxRetries: g.max_retries,
			baseDelayMs: g.retry_base_delay_ms,
			backoffFactor: g.backoff_factor,
			jitterRatio: GENERATION_CONFIG.jitterRatio,
		},
	}
}

export function toModelSettings(config: TranslatorConfig): ModelSettings {
	const m = config.model
	return {
		provider: m.provider,
		llm: m.llm,
		ollamaUrl: m.ollama_url,
		timeout: m.timeout * 1000,
		geminiModel: m.gemini_model,
		geminiApiKey: m.gemini_api_key,
	}
}

export function toIntrospectOptions(config: TranslatorConfig): IntrospectOptions {
	return {
		schemas: config.database.schemas,
		excludeTables: config.database.exclude_tables,
		catalog: config.database.catalog,
	}
}
