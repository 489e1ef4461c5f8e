/**
 * Core constants for Mintlink
 *
 * Internal files should import from here to avoid circular dependencies with index.ts.
 */

import type { Address } from "@solana/kit";
import { SYSTEM_PROGRAM_ADDRESS } from "@solana-program/system";
import {
	ASSOCIATED_TOKEN_PROGRAM_ADDRESS,
	TOKEN_PROGRAM_ADDRESS,
} from "@solana-program/token";

// =============================================================================
// Programs
// =============================================================================

export const SYSTEM_PROGRAM_ID: Address = SYSTEM_PROGRAM_ADDRESS;
export const TOKEN_PROGRAM_ID: Address = TOKEN_PROGRAM_ADDRESS;
export const ASSOCIATED_TOKEN_PROGRAM_ID: Address =
	ASSOCIATED_TOKEN_PROGRAM_ADDRESS;

/**
 * Accounts owned by the runtime that no program other than System may
 * write to or require a signature from.
 */
export const RESERVED_ACCOUNTS: readonly Address[] = [
	SYSTEM_PROGRAM_ID,
	"SysvarRent111111111111111111111111111111111" as Address,
	"SysvarC1ock11111111111111111111111111111111" as Address,
	"SysvarRecentB1ockHashes11111111111111111111" as Address,
	"SysvarStakeHistory1111111111111111111111111" as Address,
	"SysvarEpochSchedu1e111111111111111111111111" as Address,
	"SysvarFees111111111111111111111111111111111" as Address,
	"SysvarS1otHashes111111111111111111111111111" as Address,
	"Sysvar1nstructions1111111111111111111111111" as Address,
];

// =============================================================================
// Account sizes
// =============================================================================

/** SPL Token mint account size */
export const MINT_SIZE = 82;
/** SPL Token account size */
export const TOKEN_ACCOUNT_SIZE = 165;

export const MAX_U64 = 0xffff_ffff_ffff_ffffn;

/** Maximum seed length accepted by CreateAccountWithSeed */
export const MAX_SEED_LENGTH = 32;

// =============================================================================
// Token metadata limits
// =============================================================================

export const MAX_NAME_LENGTH = 30;
export const MAX_SYMBOL_LENGTH = 10;
export const MAX_DESCRIPTION_LENGTH = 200;
export const MAX_DECIMALS = 18;
export const MAX_INITIAL_SUPPLY = 10n ** 18n;

// =============================================================================
// Transaction limits
// =============================================================================

/** Ledger hard ceiling for a serialized transaction */
export const MAX_TRANSACTION_SIZE = 1232;
/** Wallet ceiling for the base64 `tx` payload of a deep link */
export const MAX_DEEP_LINK_PAYLOAD_LENGTH = 2000;

/** Base fee charged per signature */
export const LAMPORTS_PER_SIGNATURE = 5000n;
/** 0.002 SOL kept on top of rent and fees */
export const DEFAULT_MIN_BALANCE_FLOOR_LAMPORTS = 2_000_000n;
export const LAMPORTS_PER_SOL = 1_000_000_000n;

// =============================================================================
// Custom program
// =============================================================================

/** Instruction discriminator of the smart-contract "disable selling" call */
export const DISABLE_SELLING_DISCRIMINATOR = 0;
export const MIN_DISABLE_SELLING_DAYS = 1;
export const MAX_DISABLE_SELLING_DAYS = 7;

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_RPC_URL = "https://api.mainnet-beta.solana.com";
export const DEFAULT_WALLET_SCHEME = "phantom";
export const DEFAULT_RPC_TIMEOUT_MS = 10_000;

export const DEFAULT_RATE_LIMIT = { requests: 5, intervalSeconds: 60 } as const;

export const DEFAULT_RETRY_POLICY = {
	maxAttempts: 3,
	minDelayMs: 1_000,
	maxDelayMs: 30_000,
	exponent: 2,
} as const;

/** Block explorers linked from token info */
export const EXPLORER_URLS = {
	Solscan: "https://solscan.io/token/{}",
	SolanaFM: "https://solana.fm/address/{}",
	Dexlab: "https://dexlab.space/token/{}",
	Raydium: "https://raydium.io/swap/?inputCurrency={}",
} as const;
