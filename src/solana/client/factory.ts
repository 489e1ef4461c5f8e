/**
 * Token Launch Client Factory
 *
 * High-level client for preparing token launches. Each call passes the
 * per-user rate limit first, then validates, composes, checks and encodes
 * a transaction for the user's wallet to sign.
 *
 * @example
 * ```typescript
 * import { createSolanaRpc } from "@solana/kit";
 * import { createTokenLaunchClient, loadConfig } from "mintlink";
 *
 * const config = loadConfig();
 * const client = createTokenLaunchClient({
 *   rpc: createSolanaRpc(config.rpcUrl),
 *   config,
 * });
 *
 * const result = await client.createToken("user-42", {
 *   wallet: "9xQe...",
 *   metadata: { name: "Test Coin", symbol: "TST", decimals: 9, initialSupply: 1_000_000n },
 * });
 *
 * if (result.status === "READY") {
 *   console.log(`Open in wallet: ${result.deepLink}`);
 * }
 * ```
 */

import {
	type Address,
	address,
	isAddress,
	isSignature,
	signature as toSignature,
} from "@solana/kit";
import { defaultConfig } from "../../config.js";
import { validateTokenMetadata } from "../../core/schemas.js";
import {
	EncodingOverflowError,
	InvalidParameterError,
	SecurityRejectionError,
} from "../../errors.js";
import { createConsoleLogger } from "../../logger.js";
import { RateLimiter } from "../../rateLimit.js";
import {
	type ComposeOptions,
	composeDisableSelling,
	composeRevokeAuthorities,
	composeTokenCreation,
} from "../compose.js";
import { startConfirmation } from "../confirm.js";
import { encodeDeepLink } from "../deepLink.js";
import { explorerLinks, fetchMintInfo, toWholeTokens } from "../mintInfo.js";
import type { RetryOptions } from "../retry.js";
import { createSecurityPolicy } from "../security.js";
import type { UnsignedTransaction } from "../transaction.js";
import { handleClientError } from "./errors.js";
import { mintNotFoundMessage, rateLimitedMessage } from "./messages.js";
import type {
	CloneTokenParams,
	CloneTokenResult,
	CreateTokenParams,
	CreateTokenResult,
	DisableSellingRequest,
	FailedResult,
	FollowUpResult,
	RateLimitedResult,
	ReadyTransaction,
	RevokeParams,
	TokenInfoResult,
	TokenLaunchClientOptions,
	TrackResult,
} from "./types.js";

function parseAddress(label: string, value: string): Address {
	const trimmed = value.trim();
	if (!isAddress(trimmed)) {
		throw new InvalidParameterError(label, "not a valid address");
	}
	return address(trimmed);
}

/**
 * Create a token launch client.
 *
 * @param options - RPC, config, shared rate limiter and logger
 * @returns Client object; every method resolves, none rejects
 */
export function createTokenLaunchClient(options: TokenLaunchClientOptions) {
	const { rpc } = options;
	const config = options.config ?? defaultConfig();
	const logger = options.logger ?? createConsoleLogger();
	const rateLimiter =
		options.rateLimiter ??
		new RateLimiter({ rule: config.rateLimit, overrides: config.userRateLimits });

	const retry: RetryOptions = {
		policy: config.retry,
		timeoutMs: config.rpcTimeoutMs,
		logger,
	};
	const composeOptions: ComposeOptions = {
		...retry,
		minimumBalanceFloorLamports: config.minBalanceFloorLamports,
		smartContractProgramId: config.smartContractProgramId,
	};
	const policy = createSecurityPolicy({
		extraPrograms: config.allowedProgramIds,
		smartContractProgramId: config.smartContractProgramId,
		maxTransactionSize: config.maxTransactionSize,
		logger,
	});

	async function gated<T>(
		userId: string,
		operation: string,
		run: () => Promise<T>,
	): Promise<T | RateLimitedResult | FailedResult> {
		const decision = rateLimiter.check(userId);
		if (!decision.allowed) {
			logger.info("Rate limited", {
				userId,
				operation,
				retryAfterSeconds: decision.retryAfterSeconds,
			});
			return {
				status: "RATE_LIMITED",
				retryAfterSeconds: decision.retryAfterSeconds,
				message: rateLimitedMessage(decision.retryAfterSeconds),
			};
		}

		try {
			return await run();
		} catch (e) {
			const failed = handleClientError(e);
			logger.warn("Operation failed", {
				userId,
				operation,
				reason: failed.reason,
				error: failed.error?.message ?? failed.message,
			});
			return failed;
		}
	}

	function toReady(transaction: UnsignedTransaction): ReadyTransaction {
		const link = encodeDeepLink(transaction, {
			policy,
			scheme: config.walletScheme,
			payloadLimit: config.deepLinkPayloadLimit,
			logger,
		});
		if (link.status === "ENCODED") {
			return {
				status: "READY",
				deepLink: link.url,
				base64: link.base64,
				byteLength: link.byteLength,
				transaction,
			};
		}
		if (link.reason === "security_rejected") {
			throw new SecurityRejectionError(link.securityReason);
		}
		if (link.reason === "payload_too_large") {
			throw new EncodingOverflowError(link.payloadLength, link.limit);
		}
		throw new SecurityRejectionError("no_instructions");
	}

	return {
		/**
		 * Prepare a token launch: mint, associated account, initial supply and
		 * the selected follow-up steps in one transaction.
		 */
		createToken: (
			userId: string,
			params: CreateTokenParams,
		): Promise<CreateTokenResult> =>
			gated(userId, "createToken", async () => {
				const wallet = parseAddress("wallet", params.wallet);
				const metadata = validateTokenMetadata(params.metadata);
				const launch = await composeTokenCreation(
					rpc,
					{
						wallet,
						metadata,
						revokeMintAuthority: params.revokeMintAuthority,
						revokeFreezeAuthority: params.revokeFreezeAuthority,
						disableSellingDays: params.disableSellingDays,
					},
					composeOptions,
				);
				return {
					...toReady(launch.transaction),
					mint: launch.mint,
					associatedAccount: launch.associatedAccount,
					seed: launch.seed,
					rawAmount: launch.rawAmount,
					requiredLamports: launch.requiredLamports,
				};
			}),

		/**
		 * Launch a new token with the decimals and supply of an existing mint.
		 */
		cloneToken: (
			userId: string,
			params: CloneTokenParams,
		): Promise<CloneTokenResult> =>
			gated(userId, "cloneToken", async (): Promise<CloneTokenResult> => {
				const wallet = parseAddress("wallet", params.wallet);
				const sourceMint = parseAddress("mint", params.sourceMint);
				const source = await fetchMintInfo(rpc, sourceMint, retry);
				if (!source) {
					return {
						status: "FAILED",
						reason: "not_found",
						message: mintNotFoundMessage(sourceMint),
					};
				}
				const metadata = validateTokenMetadata(
					{
						name: params.name,
						symbol: params.symbol,
						decimals: source.decimals,
						initialSupply: toWholeTokens(source.supply, source.decimals),
						image: params.image,
						description: params.description,
					},
					{ allowZeroSupply: true },
				);
				const launch = await composeTokenCreation(
					rpc,
					{
						wallet,
						metadata,
						revokeMintAuthority: params.revokeMintAuthority,
						revokeFreezeAuthority: params.revokeFreezeAuthority,
						disableSellingDays: params.disableSellingDays,
					},
					composeOptions,
				);
				return {
					...toReady(launch.transaction),
					mint: launch.mint,
					associatedAccount: launch.associatedAccount,
					seed: launch.seed,
					rawAmount: launch.rawAmount,
					requiredLamports: launch.requiredLamports,
					source,
				};
			}),

		/**
		 * Permanently revoke mint and/or freeze authority.
		 */
		revokeAuthorities: (
			userId: string,
			params: RevokeParams,
		): Promise<FollowUpResult> =>
			gated(userId, "revokeAuthorities", async () => {
				const transaction = await composeRevokeAuthorities(
					rpc,
					{
						wallet: parseAddress("wallet", params.wallet),
						mint: parseAddress("mint", params.mint),
						mintAuthority: params.mintAuthority,
						freezeAuthority: params.freezeAuthority,
					},
					composeOptions,
				);
				return toReady(transaction);
			}),

		/**
		 * Disable selling for 1-7 days through the smart-contract program.
		 */
		disableSelling: (
			userId: string,
			params: DisableSellingRequest,
		): Promise<FollowUpResult> =>
			gated(userId, "disableSelling", async () => {
				const transaction = await composeDisableSelling(
					rpc,
					{
						wallet: parseAddress("wallet", params.wallet),
						mint: parseAddress("mint", params.mint),
						days: params.days,
					},
					composeOptions,
				);
				return toReady(transaction);
			}),

		/**
		 * Start polling for a signature the user's wallet broadcast.
		 */
		trackConfirmation: (userId: string, signature: string): Promise<TrackResult> =>
			gated(userId, "trackConfirmation", async () => {
				const trimmed = signature.trim();
				if (!isSignature(trimmed)) {
					throw new InvalidParameterError("signature", "not a valid transaction signature");
				}
				const task = startConfirmation(rpc, toSignature(trimmed), retry);
				return { status: "TRACKING" as const, task };
			}),

		/**
		 * Mint details with explorer links.
		 */
		tokenInfo: (userId: string, mint: string): Promise<TokenInfoResult> =>
			gated(userId, "tokenInfo", async (): Promise<TokenInfoResult> => {
				const mintAddress = parseAddress("mint", mint);
				const info = await fetchMintInfo(rpc, mintAddress, retry);
				if (!info) {
					return {
						status: "FAILED",
						reason: "not_found",
						message: mintNotFoundMessage(mintAddress),
					};
				}
				return { status: "FOUND", info, explorerLinks: explorerLinks(mintAddress) };
			}),
	};
}

export type TokenLaunchClient = ReturnType<typeof createTokenLaunchClient>;
