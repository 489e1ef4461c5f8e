/**
 * Confirmation Poller
 *
 * Polls `getTransaction` for a signature until it lands, fails, or attempts
 * run out. One `ConfirmationTask` per signature; tasks share nothing.
 *
 * @example
 * ```typescript
 * const task = startConfirmation(rpc, sig);
 * const result = await task.result;
 *
 * switch (result.status) {
 *   case "confirmed":
 *     console.log(`Landed in slot ${result.detail.slot}`);
 *     break;
 *   case "failed":
 *     console.log(`Failed: ${result.error}`);
 *     break;
 *   case "timed_out":
 *     console.log("Not seen yet, check again later");
 *     break;
 * }
 * ```
 */

import type { Rpc, Signature, SolanaRpcApi } from "@solana/kit";
import { DEFAULT_RPC_TIMEOUT_MS } from "../core/constants.js";
import { type Logger, silentLogger } from "../logger.js";
import {
	type RetryPolicy,
	attemptSignal,
	backoffDelay,
	isTransientRpcError,
	resolveRetryPolicy,
	sleep,
} from "./retry.js";

// =============================================================================
// Types
// =============================================================================

export type ConfirmationStatus =
	| "pending"
	| "confirmed"
	| "failed"
	| "timed_out"
	| "cancelled";

export interface ConfirmationDetail {
	slot: bigint;
	/** Unix seconds, null when the node has no block time */
	blockTime: bigint | null;
	/** Fee paid in lamports */
	fee: bigint | null;
}

export type ConfirmationResult =
	| {
			signature: Signature;
			status: "confirmed";
			detail: ConfirmationDetail;
			attempts: number;
	  }
	| {
			signature: Signature;
			status: "failed";
			/** Ledger error or RPC failure description */
			error: string;
			detail?: ConfirmationDetail;
			attempts: number;
	  }
	| {
			signature: Signature;
			status: "timed_out" | "cancelled";
			attempts: number;
	  };

export interface ConfirmationOptions {
	policy?: Partial<RetryPolicy>;
	/** Per-call timeout (default: 10s) */
	timeoutMs?: number;
	abortSignal?: AbortSignal;
	logger?: Logger;
}

/** Handle to a running confirmation */
export interface ConfirmationTask {
	readonly signature: Signature;
	/** Current state; "pending" until the result settles */
	status(): ConfirmationStatus;
	/** Settles once; never rejects */
	readonly result: Promise<ConfirmationResult>;
	/** Stop polling; the result settles as "cancelled" */
	cancel(): void;
}

// =============================================================================
// Polling
// =============================================================================

function describe(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

/**
 * Poll until the transaction is confirmed, failed, or attempts run out.
 * Sleeps only between attempts. Never throws.
 */
export async function pollConfirmation(
	rpc: Rpc<SolanaRpcApi>,
	signature: Signature,
	options: ConfirmationOptions = {},
): Promise<ConfirmationResult> {
	const policy = resolveRetryPolicy(options.policy);
	const timeoutMs = options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
	const logger = options.logger ?? silentLogger;
	const { abortSignal } = options;

	let attempts = 0;
	while (attempts < policy.maxAttempts) {
		if (abortSignal?.aborted) {
			return { signature, status: "cancelled", attempts };
		}
		attempts++;

		try {
			const tx = await rpc
				.getTransaction(signature, {
					commitment: "confirmed",
					encoding: "jsonParsed",
					maxSupportedTransactionVersion: 0,
				})
				.send({ abortSignal: attemptSignal(timeoutMs, abortSignal) });

			if (tx) {
				const detail: ConfirmationDetail = {
					slot: tx.slot,
					blockTime: tx.blockTime,
					fee: tx.meta?.fee ?? null,
				};
				const err = tx.meta?.err ?? null;
				if (err === null) {
					logger.info("Transaction confirmed", { signature, slot: tx.slot, attempts });
					return { signature, status: "confirmed", detail, attempts };
				}
				logger.warn("Transaction failed on ledger", { signature, attempts });
				return {
					signature,
					status: "failed",
					error: JSON.stringify(err, (_key, value: unknown) =>
						typeof value === "bigint" ? value.toString() : value,
					),
					detail,
					attempts,
				};
			}
			logger.debug("Transaction not found yet", { signature, attempt: attempts });
		} catch (e) {
			if (abortSignal?.aborted) {
				return { signature, status: "cancelled", attempts };
			}
			if (!isTransientRpcError(e)) {
				logger.error("Confirmation lookup failed", {
					signature,
					error: describe(e),
				});
				return { signature, status: "failed", error: describe(e), attempts };
			}
			logger.warn("Transient confirmation failure", {
				signature,
				attempt: attempts,
				error: describe(e),
			});
		}

		if (attempts < policy.maxAttempts) {
			try {
				await sleep(backoffDelay(attempts, policy), abortSignal);
			} catch {
				return { signature, status: "cancelled", attempts };
			}
		}
	}

	logger.warn("Confirmation timed out", { signature, attempts });
	return { signature, status: "timed_out", attempts };
}

/**
 * Start polling in the background and return a handle to it.
 */
export function startConfirmation(
	rpc: Rpc<SolanaRpcApi>,
	signature: Signature,
	options: Omit<ConfirmationOptions, "abortSignal"> = {},
): ConfirmationTask {
	const controller = new AbortController();
	let state: ConfirmationStatus = "pending";

	const result = pollConfirmation(rpc, signature, {
		...options,
		abortSignal: controller.signal,
	}).then((r) => {
		state = r.status;
		return r;
	});

	return {
		signature,
		status: () => state,
		result,
		cancel: () => {
			if (state === "pending") {
				controller.abort();
			}
		},
	};
}
