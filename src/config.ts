/**
 * Process configuration
 *
 * Read once from `MINTLINK_*` environment variables, validated with zod and
 * frozen. Every issue is reported at once in a single ConfigError.
 */

import { type Address, address, isAddress } from "@solana/kit";
import * as z from "zod";
import {
	DEFAULT_MIN_BALANCE_FLOOR_LAMPORTS,
	DEFAULT_RATE_LIMIT,
	DEFAULT_RETRY_POLICY,
	DEFAULT_RPC_TIMEOUT_MS,
	DEFAULT_RPC_URL,
	DEFAULT_WALLET_SCHEME,
	MAX_DEEP_LINK_PAYLOAD_LENGTH,
	MAX_TRANSACTION_SIZE,
} from "./core/constants.js";
import { formatZodError } from "./core/schemas.js";
import { ConfigError } from "./errors.js";
import type { RateLimitRule } from "./rateLimit.js";
import type { RetryPolicy } from "./solana/retry.js";

export interface MintlinkConfig {
	rpcUrl: string;
	/** Smart-contract program for disable-selling (optional) */
	smartContractProgramId: Address | undefined;
	/** Programs allowed on top of System, Token and Associated Token */
	allowedProgramIds: readonly Address[];
	retry: Readonly<RetryPolicy>;
	rpcTimeoutMs: number;
	rateLimit: Readonly<RateLimitRule>;
	userRateLimits: Readonly<Record<string, RateLimitRule>>;
	minBalanceFloorLamports: bigint;
	walletScheme: string;
	deepLinkPayloadLimit: number;
	maxTransactionSize: number;
}

const AddressString = z
	.string()
	.trim()
	.refine(isAddress, { message: "Invalid Solana address" })
	.transform((v) => address(v));

const PositiveInt = (fallback: number) =>
	z.coerce.number().int().positive().default(fallback);

const RuleSchema = z.object({
	requests: z.number().int().positive(),
	intervalSeconds: z.number().positive(),
});

const UserRateLimits = z
	.string()
	.transform((raw, ctx) => {
		try {
			const parsed: unknown = JSON.parse(raw);
			return parsed;
		} catch {
			ctx.addIssue({ code: "custom", message: "Must be valid JSON" });
			return z.NEVER;
		}
	})
	.pipe(z.record(z.string(), RuleSchema));

const EnvSchema = z.object({
	MINTLINK_RPC_URL: z.url().default(DEFAULT_RPC_URL),
	MINTLINK_SMART_CONTRACT_PROGRAM_ID: AddressString.optional(),
	MINTLINK_ALLOWED_PROGRAM_IDS: z
		.string()
		.default("")
		.transform((v) =>
			v
				.split(",")
				.map((s) => s.trim())
				.filter((s) => s.length > 0),
		)
		.pipe(z.array(AddressString)),
	MINTLINK_MAX_RETRIES: PositiveInt(DEFAULT_RETRY_POLICY.maxAttempts),
	MINTLINK_RETRY_MIN_DELAY_MS: PositiveInt(DEFAULT_RETRY_POLICY.minDelayMs),
	MINTLINK_RETRY_MAX_DELAY_MS: PositiveInt(DEFAULT_RETRY_POLICY.maxDelayMs),
	MINTLINK_RPC_TIMEOUT_MS: PositiveInt(DEFAULT_RPC_TIMEOUT_MS),
	MINTLINK_RATE_LIMIT_REQUESTS: PositiveInt(DEFAULT_RATE_LIMIT.requests),
	MINTLINK_RATE_LIMIT_INTERVAL_SECONDS: PositiveInt(
		DEFAULT_RATE_LIMIT.intervalSeconds,
	),
	MINTLINK_USER_RATE_LIMITS: UserRateLimits.optional(),
	MINTLINK_MIN_BALANCE_FLOOR_LAMPORTS: z
		.string()
		.regex(/^\d+$/, "Must be a whole number of lamports")
		.transform((v) => BigInt(v))
		.optional(),
	MINTLINK_WALLET_SCHEME: z
		.string()
		.regex(/^[a-z][a-z0-9+.-]*$/i, "Must be a URL scheme")
		.default(DEFAULT_WALLET_SCHEME),
	MINTLINK_DEEP_LINK_PAYLOAD_LIMIT: PositiveInt(MAX_DEEP_LINK_PAYLOAD_LENGTH),
	MINTLINK_MAX_TRANSACTION_SIZE: PositiveInt(MAX_TRANSACTION_SIZE),
});

type Env = Record<string, string | undefined>;

/**
 * Load configuration from the environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Env = process.env): MintlinkConfig {
	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		throw new ConfigError(`Invalid configuration: ${formatZodError(result.error)}`, {
			cause: result.error,
		});
	}
	const e = result.data;

	if (e.MINTLINK_RETRY_MIN_DELAY_MS > e.MINTLINK_RETRY_MAX_DELAY_MS) {
		throw new ConfigError(
			"Invalid configuration: MINTLINK_RETRY_MIN_DELAY_MS must not exceed MINTLINK_RETRY_MAX_DELAY_MS",
		);
	}

	return Object.freeze({
		rpcUrl: e.MINTLINK_RPC_URL,
		smartContractProgramId: e.MINTLINK_SMART_CONTRACT_PROGRAM_ID,
		allowedProgramIds: Object.freeze(e.MINTLINK_ALLOWED_PROGRAM_IDS),
		retry: Object.freeze({
			maxAttempts: e.MINTLINK_MAX_RETRIES,
			minDelayMs: e.MINTLINK_RETRY_MIN_DELAY_MS,
			maxDelayMs: e.MINTLINK_RETRY_MAX_DELAY_MS,
			exponent: DEFAULT_RETRY_POLICY.exponent,
		}),
		rpcTimeoutMs: e.MINTLINK_RPC_TIMEOUT_MS,
		rateLimit: Object.freeze({
			requests: e.MINTLINK_RATE_LIMIT_REQUESTS,
			intervalSeconds: e.MINTLINK_RATE_LIMIT_INTERVAL_SECONDS,
		}),
		userRateLimits: Object.freeze(e.MINTLINK_USER_RATE_LIMITS ?? {}),
		minBalanceFloorLamports:
			e.MINTLINK_MIN_BALANCE_FLOOR_LAMPORTS ?? DEFAULT_MIN_BALANCE_FLOOR_LAMPORTS,
		walletScheme: e.MINTLINK_WALLET_SCHEME,
		deepLinkPayloadLimit: e.MINTLINK_DEEP_LINK_PAYLOAD_LIMIT,
		maxTransactionSize: e.MINTLINK_MAX_TRANSACTION_SIZE,
	});
}

/** Configuration with every default applied */
export function defaultConfig(): MintlinkConfig {
	return loadConfig({});
}
