/**
 * Terminal output helpers
 *
 * Routes library logs through @clack/prompts and prints client results.
 */

import { log } from "@clack/prompts";
import pc from "picocolors";
import { type Logger, formatLogLine } from "../../logger.js";
import type {
	FailedResult,
	RateLimitedResult,
	ReadyTransaction,
} from "../../solana/client/types.js";

/**
 * Logger backed by clack's `log`. Debug and info lines only show with --verbose.
 */
export function createClackLogger(verbose: boolean): Logger {
	return {
		debug(message, context) {
			if (verbose) log.message(pc.dim(formatLogLine(message, context)));
		},
		info(message, context) {
			if (verbose) log.info(formatLogLine(message, context));
		},
		warn(message, context) {
			log.warn(formatLogLine(message, context));
		},
		error(message, context) {
			log.error(formatLogLine(message, context));
		},
	};
}

/**
 * Abort the command with the result's user-facing message.
 */
export function fail(result: FailedResult | RateLimitedResult): never {
	const label =
		result.status === "RATE_LIMITED" ? "rate_limited" : result.reason;
	throw new Error(`${result.message} (${label})`);
}

/**
 * Print a transaction ready for the wallet.
 */
export function printReady(result: ReadyTransaction): void {
	log.success("Transaction ready");
	log.message(`${pc.dim("Size:")} ${result.byteLength} bytes`);
	log.message(
		`${pc.dim("Open in your wallet to sign and send:")}\n${pc.cyan(result.deepLink)}`,
	);
}
