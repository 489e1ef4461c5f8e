/**
 * Mintlink Error Classes
 *
 * Every failure below the client boundary is one of these. The client turns
 * them into `FAILED` / `RATE_LIMITED` results; nothing else escapes.
 *
 * @example
 * ```typescript
 * import { InsufficientFundsError } from "mintlink";
 *
 * try {
 *   await composeTokenCreation(rpc, params);
 * } catch (e) {
 *   if (e instanceof InsufficientFundsError) {
 *     console.log(`Top up ${e.shortfall} lamports`);
 *   }
 * }
 * ```
 */

// =============================================================================
// Error Codes
// =============================================================================

/** Error codes for programmatic handling */
export type MintlinkErrorCode =
	| "VALIDATION_ERROR"
	| "INVALID_PARAMETER"
	| "INSUFFICIENT_FUNDS"
	| "SECURITY_REJECTION"
	| "NETWORK_TRANSIENT"
	| "ENCODING_OVERFLOW"
	| "RATE_LIMITED"
	| "CONFIG_ERROR";

// =============================================================================
// Errors
// =============================================================================

/** Base class for all Mintlink errors */
export class MintlinkError extends Error {
	readonly code: MintlinkErrorCode;

	constructor(
		code: MintlinkErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		Object.setPrototypeOf(this, new.target.prototype);
		this.name = this.constructor.name;
		this.code = code;
	}
}

/** User metadata failed a constraint; never reaches the ledger */
export class ValidationError extends MintlinkError {
	constructor(
		message: string,
		public readonly issues: readonly string[] = [message],
		options?: ErrorOptions,
	) {
		super("VALIDATION_ERROR", message, options);
	}
}

/** A builder received a malformed or out-of-range value */
export class InvalidParameterError extends MintlinkError {
	constructor(
		public readonly parameter: string,
		reason: string,
		options?: ErrorOptions,
	) {
		super("INVALID_PARAMETER", `Invalid ${parameter}: ${reason}`, options);
	}
}

/** Payer balance is below rent + fees + policy floor */
export class InsufficientFundsError extends MintlinkError {
	readonly shortfall: bigint;

	constructor(
		public readonly balance: bigint,
		public readonly required: bigint,
		options?: ErrorOptions,
	) {
		super(
			"INSUFFICIENT_FUNDS",
			`Insufficient funds: balance ${balance} lamports, required ${required} lamports`,
			options,
		);
		this.shortfall = required - balance;
	}
}

/** Transaction failed an allow-list or structural check */
export class SecurityRejectionError extends MintlinkError {
	constructor(
		public readonly reasonCode: string,
		options?: ErrorOptions,
	) {
		super(
			"SECURITY_REJECTION",
			`Transaction rejected by security policy: ${reasonCode}`,
			options,
		);
	}
}

/** RPC timeout or connection failure that outlived its retries */
export class NetworkTransientError extends MintlinkError {
	constructor(
		public readonly operation: string,
		public readonly attempts: number,
		options?: ErrorOptions,
	) {
		super(
			"NETWORK_TRANSIENT",
			`${operation} failed after ${attempts} attempt(s)`,
			options,
		);
	}
}

/** Serialized or base64 payload is over its ceiling */
export class EncodingOverflowError extends MintlinkError {
	constructor(
		public readonly size: number,
		public readonly limit: number,
		options?: ErrorOptions,
	) {
		super(
			"ENCODING_OVERFLOW",
			`Transaction too large: ${size} (limit ${limit})`,
			options,
		);
	}
}

/** Rate-limit window is full for this user */
export class RateLimitedError extends MintlinkError {
	constructor(
		public readonly userId: string,
		public readonly retryAfterSeconds: number,
		options?: ErrorOptions,
	) {
		super(
			"RATE_LIMITED",
			`Rate limited, retry after ${retryAfterSeconds} seconds`,
			options,
		);
	}
}

/** Process configuration is invalid */
export class ConfigError extends MintlinkError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONFIG_ERROR", message, options);
	}
}
