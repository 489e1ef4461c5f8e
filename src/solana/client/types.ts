/**
 * Client types for the token launch client
 *
 * Every operation resolves to one of these results; errors never escape.
 */

import type { Address, Rpc, SolanaRpcApi } from "@solana/kit";
import type { MintlinkConfig } from "../../config.js";
import type { TokenMetadataInput } from "../../core/schemas.js";
import type { Logger } from "../../logger.js";
import type { RateLimiter } from "../../rateLimit.js";
import type { ConfirmationTask } from "../confirm.js";
import type { ExplorerName, MintInfo } from "../mintInfo.js";
import type { UnsignedTransaction } from "../transaction.js";

// =============================================================================
// Client Options
// =============================================================================

export interface TokenLaunchClientOptions {
	/** Solana RPC client */
	rpc: Rpc<SolanaRpcApi>;
	/** Loaded configuration (default: all defaults) */
	config?: MintlinkConfig;
	/** Shared limiter (default: one built from config) */
	rateLimiter?: RateLimiter;
	logger?: Logger;
}

// =============================================================================
// Method Parameters
// =============================================================================

/** Optional steps appended to a launch */
export interface LaunchFeatures {
	revokeMintAuthority?: boolean;
	revokeFreezeAuthority?: boolean;
	/** Lock selling for 1-7 days */
	disableSellingDays?: number;
}

/**
 * Parameters for createToken()
 */
export interface CreateTokenParams extends LaunchFeatures {
	/** Wallet address as entered by the user */
	wallet: string;
	/** Unvalidated metadata */
	metadata: TokenMetadataInput;
}

/**
 * Parameters for cloneToken()
 *
 * Decimals and supply come from the source mint; name and symbol are new.
 */
export interface CloneTokenParams extends LaunchFeatures {
	wallet: string;
	sourceMint: string;
	name: string;
	symbol: string;
	image?: string;
	description?: string;
}

/**
 * Parameters for revokeAuthorities()
 */
export interface RevokeParams {
	wallet: string;
	mint: string;
	mintAuthority?: boolean;
	freezeAuthority?: boolean;
}

/**
 * Parameters for disableSelling()
 */
export interface DisableSellingRequest {
	wallet: string;
	mint: string;
	days: number;
}

// =============================================================================
// Result Types
// =============================================================================

/**
 * Reasons why an operation failed
 */
export type FailedReason =
	| "validation_error"
	| "insufficient_funds"
	| "security_rejected"
	| "network_error"
	| "transaction_too_large"
	| "invalid_parameter"
	| "not_found";

export interface FailedResult {
	status: "FAILED";
	reason: FailedReason;
	message: string;
	error?: Error;
}

export interface RateLimitedResult {
	status: "RATE_LIMITED";
	retryAfterSeconds: number;
	message: string;
}

/** A transaction ready to open in a wallet */
export interface ReadyTransaction {
	status: "READY";
	deepLink: string;
	/** Base64 wire transaction embedded in the link */
	base64: string;
	byteLength: number;
	transaction: UnsignedTransaction;
}

export interface LaunchReady extends ReadyTransaction {
	mint: Address;
	associatedAccount: Address;
	/** Mint seed; the mint is derived from wallet + seed */
	seed: string;
	rawAmount: bigint;
	requiredLamports: bigint;
}

/**
 * Result of createToken()
 */
export type CreateTokenResult = LaunchReady | RateLimitedResult | FailedResult;

/**
 * Result of cloneToken()
 */
export type CloneTokenResult =
	| (LaunchReady & { source: MintInfo })
	| RateLimitedResult
	| FailedResult;

/**
 * Result of revokeAuthorities() and disableSelling()
 */
export type FollowUpResult = ReadyTransaction | RateLimitedResult | FailedResult;

/**
 * Result of trackConfirmation()
 */
export type TrackResult =
	| { status: "TRACKING"; task: ConfirmationTask }
	| RateLimitedResult
	| FailedResult;

/**
 * Result of tokenInfo()
 */
export type TokenInfoResult =
	| {
			status: "FOUND";
			info: MintInfo;
			explorerLinks: Record<ExplorerName, string>;
	  }
	| RateLimitedResult
	| FailedResult;
