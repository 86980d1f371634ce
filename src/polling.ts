/**
 * Polling and Retry Primitives
 *
 * Two shapes of waiting on remote state:
 *
 * - **Deadline polling** (`pollUntil`): re-run a check on a fixed interval
 *   until it reports a terminal value or the overall deadline passes. Used
 *   for CI runs and pull-request merges, which are eventually consistent.
 *   The interval never drops below MIN_POLL_INTERVAL_MS.
 *
 * - **Transient retry** (`withRetry`): re-run a single read that failed on a
 *   network hiccup, with exponential backoff and jitter. Only for reads;
 *   push, merge and build failures are never retried.
 *
 * Clock and sleep are injectable so tests run without real delays.
 */

import { MIN_POLL_INTERVAL_MS } from "./constants.js";

/**
 * Asynchronous sleep utility.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Time source and delay used by polling loops
 */
export interface Clock {
	now: () => number;
	sleep: (ms: number) => Promise<void>;
}

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep,
};

// =============================================================================
// Deadline Polling
// =============================================================================

/**
 * What one poll observed: a terminal value, or "keep waiting" with an
 * optional note for progress logging
 */
export type PollStep<T> = { done: true; value: T } | { done: false; note?: string };

export type PollResult<T> = { status: "done"; value: T; attempts: number } | { status: "timedOut"; attempts: number };

export interface PollOptions {
	timeoutMs: number;
	intervalMs: number;
	clock?: Clock;
	/** Called after each non-terminal poll */
	onWait?: (attempt: number, note: string | undefined, remainingMs: number) => void;
}

/**
 * Effective interval: the requested one, floored at MIN_POLL_INTERVAL_MS
 */
export function effectiveInterval(intervalMs: number): number {
	return Math.max(MIN_POLL_INTERVAL_MS, Number.isFinite(intervalMs) ? intervalMs : MIN_POLL_INTERVAL_MS);
}

/**
 * Poll `check` until it is done or the deadline passes.
 *
 * The check always runs at least once. Errors thrown by `check` propagate;
 * wrap reads in `withRetry` when transient failures should be absorbed.
 *
 * @example
 * ```typescript
 * const result = await pollUntil(async () => {
 *   const pr = await viewPullRequest(repo, 42);
 *   return pr.state === "open" ? { done: false } : { done: true, value: pr.state };
 * }, { timeoutMs: 30 * 60_000, intervalMs: 15_000 });
 * ```
 */
export async function pollUntil<T>(
	check: () => Promise<PollStep<T>> | PollStep<T>,
	options: PollOptions,
): Promise<PollResult<T>> {
	const clock = options.clock ?? systemClock;
	const interval = effectiveInterval(options.intervalMs);
	const deadline = clock.now() + Math.max(0, options.timeoutMs);
	let attempts = 0;

	for (;;) {
		attempts++;
		const step = await check();
		if (step.done) {
			return { status: "done", value: step.value, attempts };
		}

		const remaining = deadline - clock.now();
		if (remaining <= 0) {
			return { status: "timedOut", attempts };
		}
		options.onWait?.(attempts, step.note, remaining);
		await clock.sleep(Math.min(interval, remaining));
	}
}

// =============================================================================
// Transient Retry
// =============================================================================

/**
 * Configuration options for retry behavior
 */
export interface RetryOptions {
	/** Maximum number of retry attempts (0 = no retries) */
	maxRetries: number;
	/** Minimum delay between retries in milliseconds */
	minDelayMs: number;
	/** Maximum delay between retries in milliseconds */
	maxDelayMs: number;
	/** Exponential backoff multiplier (e.g., 2 = double each attempt) */
	exponentialFactor: number;
	/** Jitter percentage (0-100) to add randomness to delays. Default: 10% */
	jitterPercent?: number;
	/** Optional predicate to determine if an error should be retried */
	shouldRetry?: (error: unknown) => boolean;
	clock?: Clock;
}

/** Retry settings for reads against GitHub and the package registry */
export const NETWORK_READ_RETRY: RetryOptions = {
	maxRetries: 2,
	minDelayMs: 500,
	maxDelayMs: 4_000,
	exponentialFactor: 2,
	jitterPercent: 10,
};

/**
 * Calculate exponential backoff delay with configurable jitter.
 *
 * Formula: `delay = min(minDelay * factor^attempt, maxDelay) * (1 + random * jitterPercent / 100)`
 */
export function calculateBackoffDelay(attempt: number, options: RetryOptions): number {
	const { minDelayMs, maxDelayMs, exponentialFactor, jitterPercent = 10 } = options;

	const exponentialDelay = minDelayMs * exponentialFactor ** attempt;
	const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
	const jitter = cappedDelay * (jitterPercent / 100) * Math.random();

	return Math.floor(cappedDelay + jitter);
}

/**
 * Check if an error is transient and should be retried.
 *
 * Detects timeouts, dropped connections and rate limiting.
 */
export function isTransientError(error: unknown): boolean {
	if (error instanceof Error) {
		const message = error.message.toLowerCase();

		if (message.includes("timeout") || message.includes("timed out") || message.includes("etimedout")) {
			return true;
		}

		if (message.includes("econnreset") || message.includes("econnrefused") || message.includes("enetunreach")) {
			return true;
		}

		if (message.includes("rate limit") || message.includes("too many requests") || message.includes("429")) {
			return true;
		}
	}

	return false;
}

/**
 * Execute an async operation, retrying transient failures with backoff.
 *
 * @throws the last error after exhausting all retry attempts, or the first non-transient one
 */
export async function withRetry<T>(operation: () => Promise<T> | T, options: RetryOptions): Promise<T> {
	const { maxRetries, shouldRetry = isTransientError } = options;
	const clock = options.clock ?? systemClock;
	let lastError: unknown;

	for (let attempt = 0; attempt <= maxRetries; attempt++) {
		try {
			return await operation();
		} catch (error: unknown) {
			lastError = error;

			if (!shouldRetry(error)) {
				throw error;
			}
			if (attempt >= maxRetries) {
				break;
			}

			await clock.sleep(calculateBackoffDelay(attempt, options));
		}
	}

	throw lastError;
}
