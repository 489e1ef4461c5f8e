/**
 * User-facing messages for the token launch client
 *
 * Messages say what happened and what the user can do next. Security
 * rejections stay generic: the reason code goes to logs only.
 */

import { LAMPORTS_PER_SOL } from "../../core/constants.js";

// =============================================================================
// Failed Messages
// =============================================================================

/**
 * Generate message for insufficient_funds failure.
 */
export function insufficientFundsMessage(
	balance: bigint,
	required: bigint,
): string {
	return `Wallet holds ${formatSol(balance)} SOL but ${formatSol(required)} SOL is needed to cover rent and fees. Top up ${formatSol(required - balance)} SOL and try again.`;
}

/**
 * Generate message for security_rejected failure.
 */
export function securityRejectedMessage(): string {
	return "This transaction could not be prepared safely. Please try again or contact support.";
}

/**
 * Generate message for transaction_too_large failure.
 */
export function transactionTooLargeMessage(): string {
	return "Transaction is too large to open in a wallet. Disable some options and try again.";
}

/**
 * Generate message for network_error failure.
 */
export function networkErrorMessage(detail?: string): string {
	if (detail) {
		return `Network error: ${detail}. Check your connection and try again.`;
	}
	return "Network error. Check your connection and try again.";
}

/**
 * Generate message for not_found failure.
 */
export function mintNotFoundMessage(mint: string): string {
	return `Token ${truncateAddress(mint)} not found. Check the address and try again.`;
}

// =============================================================================
// Rate Limit Messages
// =============================================================================

/**
 * Generate message for a rate-limited request.
 */
export function rateLimitedMessage(retryAfterSeconds: number): string {
	const unit = retryAfterSeconds === 1 ? "second" : "seconds";
	return `Too many requests. Please wait ${retryAfterSeconds} ${unit} and try again.`;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Lamports as SOL with trailing zeros trimmed.
 * Example: formatSol(2_500_000n) => "0.0025"
 */
export function formatSol(lamports: bigint): string {
	const negative = lamports < 0n;
	const abs = negative ? -lamports : lamports;
	const whole = abs / LAMPORTS_PER_SOL;
	const fraction = (abs % LAMPORTS_PER_SOL)
		.toString()
		.padStart(9, "0")
		.replace(/0+$/, "");
	const value = fraction ? `${whole}.${fraction}` : `${whole}`;
	return negative ? `-${value}` : value;
}

/**
 * Truncate an address for display.
 * Example: truncateAddress("So11111...111111") => "So11...1111"
 */
export function truncateAddress(address: string): string {
	if (address.length <= 12) {
		return address;
	}
	return `${address.slice(0, 4)}...${address.slice(-4)}`;
}
