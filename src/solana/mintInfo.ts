/**
 * Mint account reads
 *
 * Used to clone an existing token's shape and to show token info with
 * explorer links.
 */

import {
	type Address,
	type Rpc,
	type SolanaRpcApi,
	address,
	isAddress,
} from "@solana/kit";
import * as z from "zod";
import { EXPLORER_URLS, TOKEN_PROGRAM_ID } from "../core/constants.js";
import { InvalidParameterError } from "../errors.js";
import { type RetryOptions, withRetry } from "./retry.js";

export interface MintInfo {
	address: Address;
	decimals: number;
	/** Raw supply in base units */
	supply: bigint;
	mintAuthority: Address | null;
	freezeAuthority: Address | null;
	isInitialized: boolean;
}

const OptionalAuthority = z
	.string()
	.refine(isAddress, "Invalid authority address")
	.nullish()
	.transform((v) => (v ? address(v) : null));

const ParsedMintSchema = z.object({
	parsed: z.object({
		type: z.literal("mint"),
		info: z.object({
			decimals: z.number().int().min(0),
			supply: z.string().regex(/^\d+$/),
			mintAuthority: OptionalAuthority,
			freezeAuthority: OptionalAuthority,
			isInitialized: z.boolean(),
		}),
	}),
});

/**
 * Fetch and decode a mint. Returns null when the account does not exist.
 *
 * @throws InvalidParameterError when the account is not an SPL Token mint
 */
export async function fetchMintInfo(
	rpc: Rpc<SolanaRpcApi>,
	mint: Address,
	options: RetryOptions = {},
): Promise<MintInfo | null> {
	const { value } = await withRetry(
		"getAccountInfo",
		(abortSignal) =>
			rpc.getAccountInfo(mint, { encoding: "jsonParsed" }).send({ abortSignal }),
		options,
	);
	if (!value) {
		return null;
	}
	if (value.owner !== TOKEN_PROGRAM_ID) {
		throw new InvalidParameterError("mint", `${mint} is not owned by the token program`);
	}

	const data: unknown = value.data;
	const parsed = ParsedMintSchema.safeParse(data);
	if (!parsed.success) {
		throw new InvalidParameterError("mint", `${mint} is not a token mint`);
	}

	const { info } = parsed.data.parsed;
	return {
		address: mint,
		decimals: info.decimals,
		supply: BigInt(info.supply),
		mintAuthority: info.mintAuthority,
		freezeAuthority: info.freezeAuthority,
		isInitialized: info.isInitialized,
	};
}

/**
 * Whole-token supply (rounded down) for a raw supply.
 */
export function toWholeTokens(raw: bigint, decimals: number): bigint {
	return raw / 10n ** BigInt(decimals);
}

export type ExplorerName = keyof typeof EXPLORER_URLS;

/**
 * Explorer links for a mint, in display order.
 */
export function explorerLinks(mint: Address): Record<ExplorerName, string> {
	return {
		Solscan: EXPLORER_URLS.Solscan.replace("{}", mint),
		SolanaFM: EXPLORER_URLS.SolanaFM.replace("{}", mint),
		Dexlab: EXPLORER_URLS.Dexlab.replace("{}", mint),
		Raydium: EXPLORER_URLS.Raydium.replace("{}", mint),
	};
}
