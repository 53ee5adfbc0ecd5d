/**
 * Text-Generation Clients
 *
 * The correction loop only needs "prompt in, text out". Two providers:
 * - Ollama over HTTP (POST /api/generate, non-streaming)
 * - Gemini through @google/genai
 */

import { GoogleGenAI } from "@google/genai"
import { z } from "zod"
import { GenerationError } from "./config.js"

export interface GenerateOptions {
	temperature: number
	/** Aborted when the batch gives up on this request */
	signal?: AbortSignal
}

export interface TextGenerator {
	readonly name: string
	generate(prompt: string, options: GenerateOptions): Promise<string>
}

// ============================================================================
// Ollama
// ============================================================================

export interface OllamaClientOptions {
	baseUrl: string
	model: string
	/** Per-request timeout (ms) */
	timeout: number
}

const ollamaResponseSchema = z.object({
	response: z.string(),
})

export class OllamaClient implements TextGenerator {
	readonly name = "ollama"
	private baseUrl: string
	private model: string
	private timeout: number

	constructor(options: OllamaClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.model = options.model
		this.timeout = options.timeout
	}

	async generate(prompt: string, options: GenerateOptions): Promise<string> {
		const url = `${this.baseUrl}/api/generate`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.timeout)
		const onAbort = () => controller.abort()
		options.signal?.addEventListener("abort", onAbort, { once: true })

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify({
					model: this.model,
					prompt,
					stream: false,
					options: { temperature: options.temperature },
				}),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new GenerationError(
					"generation",
					`Ollama returned error: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, responseBody: errorText },
				)
			}

			const parsed = ollamaResponseSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new GenerationError("generation", "Ollama response has no text", false, {
					issues: parsed.error.issues.map((i) => i.message),
				})
			}
			return parsed.data.response
		} catch (error) {
			// Batch cancelled us: do not retry
			if (options.signal?.aborted) {
				throw new GenerationError("timeout", "Generation request was cancelled", false, { url })
			}

			if (error instanceof Error && error.name === "AbortError") {
				throw new GenerationError(
					"timeout",
					`Ollama request timed out after ${this.timeout}ms`,
					true,
					{ timeout: this.timeout, url },
				)
			}

			// Network errors
			if (error instanceof TypeError) {
				throw new GenerationError(
					"generation",
					`Cannot connect to Ollama at ${this.baseUrl}. Is it running?`,
					true,
					{ baseUrl: this.baseUrl, originalError: error.message },
				)
			}

			if (error instanceof GenerationError) {
				throw error
			}

			throw new GenerationError(
				"generation",
				`Unexpected error communicating with Ollama: ${error}`,
				false,
				{ originalError: String(error) },
			)
		} finally {
			clearTimeout(timeoutId)
			options.signal?.removeEventListener("abort", onAbort)
		}
	}
}

// ============================================================================
// Gemini
// ============================================================================

/**
 * The slice of the @google/genai models API this client uses
 */
export interface GeminiModels {
	generateContent(params: {
		model: string
		contents: string
		config: { temperature: number }
	}): Promise<{ text?: string }>
}

export interface GeminiClientOptions {
	model: string
	apiKey?: string
	/** Injected models API (tests); defaults to a GoogleGenAI client */
	models?: GeminiModels
}

export class GeminiClient implements TextGenerator {
	readonly name = "gemini"
	private model: string
	private models: GeminiModels

	constructor(options: GeminiClientOptions) {
		this.model = options.model
		this.models = options.models ?? new GoogleGenAI({ apiKey: options.apiKey }).models
	}

	async generate(prompt: string, options: GenerateOptions): Promise<string> {
		if (options.signal?.aborted) {
			throw new GenerationError("timeout", "Generation request was cancelled", false)
		}

		try {
			const response = await this.models.generateContent({
				model: this.model,
				contents: prompt,
				config: { temperature: options.temperature },
			})
			return response.text ?? ""
		} catch (error) {
			throw new GenerationError(
				"generation",
				`Gemini request failed: ${error instanceof Error ? error.message : String(error)}`,
				true,
				{ model: this.model },
			)
		}
	}
}

// ============================================================================
// Factory
// ============================================================================

export type LlmProvider = "ollama" | "gemini"

export interface ModelSettings {
	provider: LlmProvider
	llm: string
	ollamaUrl: string
	timeout: number
	geminiModel: string
	geminiApiKey?: string
}

export function createTextGenerator(settings: ModelSettings): TextGenerator {
	switch (settings.provider) {
		case "ollama":
			return new OllamaClient({
				baseUrl: settings.ollamaUrl,
				model: settings.llm,
				timeout: settings.timeout,
			})
		case "gemini":
			return new GeminiClient({ model: settings.geminiModel, apiKey: settings.geminiApiKey })
	}
}
