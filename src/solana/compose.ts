/**
 * Transaction Composer
 *
 * Turns a validated launch request into one unsigned transaction whose only
 * signer is the user's wallet. Reads chain state (rent, balance, blockhash)
 * through the bounded retry policy; never broadcasts.
 */

import type { Address, Instruction, Rpc, SolanaRpcApi } from "@solana/kit";
import {
	DEFAULT_MIN_BALANCE_FLOOR_LAMPORTS,
	LAMPORTS_PER_SIGNATURE,
	MAX_U64,
	MINT_SIZE,
	TOKEN_ACCOUNT_SIZE,
	TOKEN_PROGRAM_ID,
} from "../core/constants.js";
import type { TokenMetadata } from "../core/schemas.js";
import {
	InsufficientFundsError,
	InvalidParameterError,
	ValidationError,
} from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import {
	createAccountWithSeed,
	createAssociatedTokenAccount,
	deriveAssociatedTokenAddress,
	deriveSeededAddress,
	disableSelling,
	generateMintSeed,
	initializeMint,
	mintTo,
	setAuthority,
} from "./instructions.js";
import { type RetryOptions, withRetry } from "./retry.js";
import { type UnsignedTransaction, createUnsignedTransaction } from "./transaction.js";

// =============================================================================
// Types
// =============================================================================

export interface ComposeOptions extends RetryOptions {
	/** Lamports kept on top of rent and fees (default: 0.002 SOL) */
	minimumBalanceFloorLamports?: bigint;
	/** Smart-contract program for disable-selling */
	smartContractProgramId?: Address;
}

export interface TokenCreationParams {
	/** Fee payer, mint authority and sole signer */
	wallet: Address;
	metadata: TokenMetadata;
	revokeMintAuthority?: boolean;
	revokeFreezeAuthority?: boolean;
	/** Lock selling for 1-7 days through the smart-contract program */
	disableSellingDays?: number;
	/** Mint seed (default: random) */
	seed?: string;
}

export interface TokenCreation {
	transaction: UnsignedTransaction;
	mint: Address;
	associatedAccount: Address;
	seed: string;
	/** Amount minted in base units */
	rawAmount: bigint;
	/** Rent for the mint and token account */
	rentLamports: bigint;
	/** Balance the wallet must hold for the launch to go through */
	requiredLamports: bigint;
}

export interface RevokeAuthoritiesParams {
	mint: Address;
	wallet: Address;
	/** Revoke the mint authority */
	mintAuthority?: boolean;
	/** Revoke the freeze authority */
	freezeAuthority?: boolean;
}

export interface ComposeDisableSellingParams {
	mint: Address;
	wallet: Address;
	days: number;
}

// =============================================================================
// Token creation
// =============================================================================

/**
 * Supply in whole tokens to base units, bounded by u64.
 */
export function toRawAmount(supply: bigint, decimals: number): bigint {
	const raw = supply * 10n ** BigInt(decimals);
	if (raw > MAX_U64) {
		throw new ValidationError(
			`Supply of ${supply} with ${decimals} decimals does not fit in a u64`,
			["initialSupply: Supply is too large for the chosen decimals"],
		);
	}
	return raw;
}

/**
 * Estimated fee: base fee per signature. The wallet is the only signer.
 */
export function estimateFee(signatures = 1): bigint {
	return LAMPORTS_PER_SIGNATURE * BigInt(signatures);
}

/**
 * Compose the full launch transaction.
 *
 * Order: create mint (seeded) → initialize mint → create associated account
 * → mint-to (skipped for zero supply) → revoke authorities → disable selling.
 *
 * @throws ValidationError when the supply overflows u64
 * @throws InsufficientFundsError when balance < rent + fee + floor
 * @throws NetworkTransientError when chain reads keep failing
 */
export async function composeTokenCreation(
	rpc: Rpc<SolanaRpcApi>,
	params: TokenCreationParams,
	options: ComposeOptions = {},
): Promise<TokenCreation> {
	const logger = options.logger ?? silentLogger;
	const { wallet, metadata } = params;
	const rawAmount = toRawAmount(metadata.initialSupply, metadata.decimals);

	if (params.disableSellingDays !== undefined && !options.smartContractProgramId) {
		throw new InvalidParameterError(
			"smartContractProgramId",
			"required to disable selling",
		);
	}

	const seed = params.seed ?? generateMintSeed();
	const mint = await deriveSeededAddress(wallet, seed, TOKEN_PROGRAM_ID);
	const associatedAccount = await deriveAssociatedTokenAddress(wallet, mint);

	const [mintRent, accountRent] = await Promise.all([
		withRetry(
			"getMinimumBalanceForRentExemption(mint)",
			(abortSignal) =>
				rpc
					.getMinimumBalanceForRentExemption(BigInt(MINT_SIZE))
					.send({ abortSignal }),
			options,
		),
		withRetry(
			"getMinimumBalanceForRentExemption(account)",
			(abortSignal) =>
				rpc
					.getMinimumBalanceForRentExemption(BigInt(TOKEN_ACCOUNT_SIZE))
					.send({ abortSignal }),
			options,
		),
	]);
	const rentLamports = mintRent + accountRent;
	const requiredLamports =
		rentLamports +
		estimateFee() +
		(options.minimumBalanceFloorLamports ?? DEFAULT_MIN_BALANCE_FLOOR_LAMPORTS);

	await assertBalance(rpc, wallet, requiredLamports, options);

	const instructions: Instruction[] = [
		createAccountWithSeed({
			payer: wallet,
			newAccount: mint,
			base: wallet,
			seed,
			lamports: mintRent,
			space: MINT_SIZE,
			programAddress: TOKEN_PROGRAM_ID,
		}),
		initializeMint({
			mint,
			decimals: metadata.decimals,
			mintAuthority: wallet,
			freezeAuthority: wallet,
		}),
		createAssociatedTokenAccount({
			payer: wallet,
			associatedAccount,
			owner: wallet,
			mint,
		}),
	];

	if (rawAmount > 0n) {
		instructions.push(
			mintTo({ mint, destination: associatedAccount, authority: wallet, amount: rawAmount }),
		);
	}

	instructions.push(
		...revokeInstructions({
			mint,
			wallet,
			mintAuthority: params.revokeMintAuthority,
			freezeAuthority: params.revokeFreezeAuthority,
		}),
	);

	if (params.disableSellingDays !== undefined && options.smartContractProgramId) {
		instructions.push(
			disableSelling({
				programAddress: options.smartContractProgramId,
				mint,
				owner: wallet,
				days: params.disableSellingDays,
			}),
		);
	}

	const transaction = await buildTransaction(rpc, wallet, instructions, options);

	logger.info("Composed token creation", {
		wallet,
		mint,
		instructions: instructions.length,
		requiredLamports,
	});

	return {
		transaction,
		mint,
		associatedAccount,
		seed,
		rawAmount,
		rentLamports,
		requiredLamports,
	};
}

// =============================================================================
// Follow-up transactions
// =============================================================================

/**
 * Revoke mint and/or freeze authority on an existing mint.
 */
export async function composeRevokeAuthorities(
	rpc: Rpc<SolanaRpcApi>,
	params: RevokeAuthoritiesParams,
	options: ComposeOptions = {},
): Promise<UnsignedTransaction> {
	const instructions = revokeInstructions(params);
	if (instructions.length === 0) {
		throw new InvalidParameterError(
			"authorities",
			"select at least one of mint or freeze",
		);
	}
	await assertBalance(rpc, params.wallet, estimateFee(), options);
	return buildTransaction(rpc, params.wallet, instructions, options);
}

/**
 * Disable selling of an existing mint for 1-7 days.
 */
export async function composeDisableSelling(
	rpc: Rpc<SolanaRpcApi>,
	params: ComposeDisableSellingParams,
	options: ComposeOptions = {},
): Promise<UnsignedTransaction> {
	if (!options.smartContractProgramId) {
		throw new InvalidParameterError(
			"smartContractProgramId",
			"required to disable selling",
		);
	}
	const instruction = disableSelling({
		programAddress: options.smartContractProgramId,
		mint: params.mint,
		owner: params.wallet,
		days: params.days,
	});
	await assertBalance(rpc, params.wallet, estimateFee(), options);
	return buildTransaction(rpc, params.wallet, [instruction], options);
}

// =============================================================================
// Helpers
// =============================================================================

function revokeInstructions(params: RevokeAuthoritiesParams): Instruction[] {
	const instructions: Instruction[] = [];
	if (params.mintAuthority) {
		instructions.push(
			setAuthority({
				account: params.mint,
				currentAuthority: params.wallet,
				authorityType: "mint",
				newAuthority: null,
			}),
		);
	}
	if (params.freezeAuthority) {
		instructions.push(
			setAuthority({
				account: params.mint,
				currentAuthority: params.wallet,
				authorityType: "freeze",
				newAuthority: null,
			}),
		);
	}
	return instructions;
}

async function assertBalance(
	rpc: Rpc<SolanaRpcApi>,
	wallet: Address,
	required: bigint,
	options: RetryOptions,
): Promise<void> {
	const { value: balance } = await withRetry(
		"getBalance",
		(abortSignal) => rpc.getBalance(wallet).send({ abortSignal }),
		options,
	);
	if (balance < required) {
		throw new InsufficientFundsError(balance, required);
	}
}

async function buildTransaction(
	rpc: Rpc<SolanaRpcApi>,
	feePayer: Address,
	instructions: Instruction[],
	options: RetryOptions,
): Promise<UnsignedTransaction> {
	const { value: latestBlockhash } = await withRetry(
		"getLatestBlockhash",
		(abortSignal) => rpc.getLatestBlockhash().send({ abortSignal }),
		options,
	);
	return createUnsignedTransaction(feePayer, instructions, latestBlockhash);
}
