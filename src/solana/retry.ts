/**
 * Bounded retry for RPC reads
 *
 * Exponential backoff without jitter. Only transient failures (timeouts,
 * connection errors, HTTP 429/5xx) are retried; anything else is rethrown
 * on the first attempt.
 */

import {
	SOLANA_ERROR__RPC__TRANSPORT_HTTP_ERROR,
	isSolanaError,
} from "@solana/kit";
import { DEFAULT_RETRY_POLICY, DEFAULT_RPC_TIMEOUT_MS } from "../core/constants.js";
import { NetworkTransientError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";

export interface RetryPolicy {
	/** Total attempts including the first (>= 1) */
	maxAttempts: number;
	minDelayMs: number;
	maxDelayMs: number;
	exponent: number;
}

export interface RetryOptions {
	policy?: Partial<RetryPolicy>;
	/** Per-attempt timeout (default: 10s) */
	timeoutMs?: number;
	/** Caller cancellation; never retried */
	abortSignal?: AbortSignal;
	logger?: Logger;
}

/**
 * Delay before attempt `attempt + 1`: min(minDelay * exponent^(attempt-1), maxDelay)
 */
export function backoffDelay(
	attempt: number,
	policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): number {
	const delay = policy.minDelayMs * policy.exponent ** (attempt - 1);
	return Math.min(delay, policy.maxDelayMs);
}

export function resolveRetryPolicy(
	overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
	return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

/**
 * Promise-based sleep that rejects with the signal's reason on abort.
 */
export function sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (abortSignal?.aborted) {
			reject(abortSignal.reason);
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(abortSignal?.reason);
		};
		const timer = setTimeout(() => {
			abortSignal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		abortSignal?.addEventListener("abort", onAbort, { once: true });
	});
}

const TRANSIENT_MESSAGE =
	/ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|ENOTFOUND|socket hang up|fetch failed|network/i;

function errorName(e: unknown): string | undefined {
	if (typeof e === "object" && e !== null && "name" in e) {
		return typeof e.name === "string" ? e.name : undefined;
	}
	return undefined;
}

/**
 * True for failures worth another attempt.
 */
export function isTransientRpcError(e: unknown): boolean {
	if (isSolanaError(e, SOLANA_ERROR__RPC__TRANSPORT_HTTP_ERROR)) {
		const { statusCode } = e.context;
		return statusCode === 429 || statusCode >= 500;
	}
	if (errorName(e) === "TimeoutError") {
		return true;
	}
	if (e instanceof Error) {
		if (TRANSIENT_MESSAGE.test(e.message)) {
			return true;
		}
		return e.cause !== undefined && e.cause !== e && isTransientRpcError(e.cause);
	}
	return false;
}

/**
 * Signal for a single attempt: per-call timeout, combined with the caller's.
 */
export function attemptSignal(
	timeoutMs: number,
	abortSignal?: AbortSignal,
): AbortSignal {
	const timeout = AbortSignal.timeout(timeoutMs);
	return abortSignal ? AbortSignal.any([timeout, abortSignal]) : timeout;
}

/**
 * Run `fn` until it succeeds, fails non-transiently, or attempts run out.
 *
 * @throws NetworkTransientError when every attempt failed transiently
 */
export async function withRetry<T>(
	operation: string,
	fn: (abortSignal: AbortSignal) => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const policy = resolveRetryPolicy(options.policy);
	const timeoutMs = options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
	const logger = options.logger ?? silentLogger;
	const { abortSignal } = options;

	let lastError: unknown;
	for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
		try {
			return await fn(attemptSignal(timeoutMs, abortSignal));
		} catch (e) {
			if (abortSignal?.aborted || !isTransientRpcError(e)) {
				throw e;
			}
			lastError = e;
			logger.warn("Transient RPC failure", {
				operation,
				attempt,
				error: e instanceof Error ? e.message : String(e),
			});
		}
		if (attempt < policy.maxAttempts) {
			await sleep(backoffDelay(attempt, policy), abortSignal);
		}
	}

	throw new NetworkTransientError(operation, policy.maxAttempts, {
		cause: lastError,
	});
}
