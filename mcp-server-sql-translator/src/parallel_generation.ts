/**
 * Parallel Generation
 *
 * Issues a batch of prompts concurrently, one worker per prompt. Each worker
 * retries with exponential backoff plus jitter. A batch-wide timer marks
 * slots still pending as timed out and cancels them.
 *
 * Results always come back in submission order.
 */

import { GenerationError, SqlTranslatorError, type Logger } from "./config.js"
import type { TextGenerator } from "./llm_client.js"

export type GenerationOutcome =
	| { status: "ok"; text: string }
	| { status: "timeout" }
	| { status: "error"; message: string }

export interface RetryPolicy {
	maxRetries: number
	baseDelayMs: number
	backoffFactor: number
	/** Upper bound of the random extra delay, as a share of the delay */
	jitterRatio: number
}

export interface GenerateManyOptions {
	temperature: number
	/** Batch-wide deadline (ms) */
	timeoutMs: number
	retry: RetryPolicy
	logger?: Logger
	random?: () => number
}

// ============================================================================
// Retry
// ============================================================================

export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
	const delay = policy.baseDelayMs * policy.backoffFactor ** attempt
	return delay + random() * policy.jitterRatio * delay
}

function cancelled(): GenerationError {
	return new GenerationError("timeout", "Generation request was cancelled", false)
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(cancelled())
			return
		}
		const onAbort = () => {
			clearTimeout(timer)
			reject(cancelled())
		}
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort)
			resolve()
		}, ms)
		signal?.addEventListener("abort", onAbort, { once: true })
	})
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Run an operation up to `maxRetries + 1` times. Errors marked
 * non-recoverable are not retried.
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	policy: RetryPolicy,
	options: { signal?: AbortSignal; logger?: Logger; random?: () => number } = {},
): Promise<T> {
	let lastError: unknown = null

	for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
		if (options.signal?.aborted) throw cancelled()
		try {
			return await operation(attempt)
		} catch (error) {
			if (error instanceof SqlTranslatorError && !error.recoverable) throw error
			lastError = error
			if (attempt === policy.maxRetries) break

			const delay = backoffDelay(attempt, policy, options.random)
			options.logger?.debug("Generation failed, retrying", {
				attempt: attempt + 1,
				delay_ms: Math.round(delay),
				error: errorMessage(error),
			})
			await sleep(delay, options.signal)
		}
	}

	throw new GenerationError("generation", `Error after retries: ${errorMessage(lastError)}`, false, {
		attempts: policy.maxRetries + 1,
	})
}

// ============================================================================
// Batch
// ============================================================================

interface Slot {
	prompt: string
	controller: AbortController
	outcome: GenerationOutcome | null
}

/**
 * Generate one reply per prompt, concurrently, bounded by a batch timeout.
 */
export async function generateMany(
	generator: TextGenerator,
	prompts: string[],
	options: GenerateManyOptions,
): Promise<GenerationOutcome[]> {
	const slots: Slot[] = prompts.map((prompt) => ({
		prompt,
		controller: new AbortController(),
		outcome: null,
	}))

	const workers = slots.map(async (slot, index) => {
		try {
			const text = await withRetry(
				() => generator.generate(slot.prompt, { temperature: options.temperature, signal: slot.controller.signal }),
				options.retry,
				{ signal: slot.controller.signal, logger: options.logger, random: options.random },
			)
			slot.outcome ??= { status: "ok", text }
		} catch (error) {
			// Already marked timed out by the batch
			if (slot.outcome !== null) return
			slot.outcome = { status: "error", message: errorMessage(error) }
			options.logger?.warn("Generation failed", { index, error: errorMessage(error) })
		}
	})

	let timer: ReturnType<typeof setTimeout> | undefined
	const deadline = new Promise<"timeout">((resolve) => {
		timer = setTimeout(() => resolve("timeout"), options.timeoutMs)
	})

	try {
		const settled = await Promise.race([Promise.all(workers).then(() => "settled" as const), deadline])
		if (settled === "timeout") {
			const pending = slots.filter((slot) => slot.outcome === null)
			for (const slot of pending) {
				slot.outcome = { status: "timeout" }
				slot.controller.abort()
			}
			options.logger?.warn("Generation batch timed out", {
				timeout_ms: options.timeoutMs,
				pending: pending.length,
			})
		}
	} finally {
		clearTimeout(timer)
	}

	return slots.map((slot) => slot.outcome ?? { status: "timeout" })
}
