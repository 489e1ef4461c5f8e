import { describe, test, expect, vi } from "vitest";
import { type Rpc, type SolanaRpcApi, getAddressDecoder } from "@solana/kit";
import { SYSTEM_PROGRAM_ID, TOKEN_PROGRAM_ID } from "../core/constants.js";
import { InvalidParameterError } from "../errors.js";
import { explorerLinks, fetchMintInfo, toWholeTokens } from "./mintInfo.js";

const addr = (n: number) => getAddressDecoder().decode(new Uint8Array(32).fill(n));

const MINT = addr(2);
const AUTHORITY = addr(1);

function mintAccount(info: Record<string, unknown>, owner = TOKEN_PROGRAM_ID) {
	return {
		owner,
		lamports: 1_461_600n,
		executable: false,
		space: 82n,
		data: { program: "spl-token", space: 82n, parsed: { type: "mint", info } },
	};
}

function mockRpc(value: unknown) {
	const getAccountInfo = vi.fn(() => ({
		send: async () => ({ context: { slot: 1n }, value }),
	}));
	return { rpc: { getAccountInfo } as unknown as Rpc<SolanaRpcApi>, getAccountInfo };
}

describe("fetchMintInfo", () => {
	test("decodes a parsed mint", async () => {
		const { rpc, getAccountInfo } = mockRpc(
			mintAccount({
				decimals: 6,
				supply: "1000000000",
				mintAuthority: AUTHORITY,
				freezeAuthority: null,
				isInitialized: true,
			}),
		);

		await expect(fetchMintInfo(rpc, MINT)).resolves.toEqual({
			address: MINT,
			decimals: 6,
			supply: 1_000_000_000n,
			mintAuthority: AUTHORITY,
			freezeAuthority: null,
			isInitialized: true,
		});
		expect(getAccountInfo).toHaveBeenCalledWith(MINT, { encoding: "jsonParsed" });
	});

	test("treats missing authorities as revoked", async () => {
		const { rpc } = mockRpc(
			mintAccount({ decimals: 0, supply: "5", isInitialized: true }),
		);
		await expect(fetchMintInfo(rpc, MINT)).resolves.toMatchObject({
			mintAuthority: null,
			freezeAuthority: null,
		});
	});

	test("returns null when the account does not exist", async () => {
		const { rpc } = mockRpc(null);
		await expect(fetchMintInfo(rpc, MINT)).resolves.toBeNull();
	});

	test("rejects accounts not owned by the token program", async () => {
		const { rpc } = mockRpc(
			mintAccount({ decimals: 6, supply: "1", isInitialized: true }, SYSTEM_PROGRAM_ID),
		);
		await expect(fetchMintInfo(rpc, MINT)).rejects.toThrow(
			`Invalid mint: ${MINT} is not owned by the token program`,
		);
	});

	test("rejects token accounts that are not mints", async () => {
		const { rpc } = mockRpc({
			...mintAccount({}),
			data: { program: "spl-token", space: 165n, parsed: { type: "account", info: {} } },
		});
		const error = await fetchMintInfo(rpc, MINT).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(InvalidParameterError);
		expect(error).toMatchObject({ message: `Invalid mint: ${MINT} is not a token mint` });
	});
});

describe("toWholeTokens", () => {
	test("rounds down to whole tokens", () => {
		expect(toWholeTokens(1_000_000_000n, 6)).toBe(1000n);
		expect(toWholeTokens(1_999_999n, 6)).toBe(1n);
		expect(toWholeTokens(42n, 0)).toBe(42n);
	});
});

describe("explorerLinks", () => {
	test("fills the mint into every explorer", () => {
		expect(explorerLinks(MINT)).toEqual({
			Solscan: `https://solscan.io/token/${MINT}`,
			SolanaFM: `https://solana.fm/address/${MINT}`,
			Dexlab: `https://dexlab.space/token/${MINT}`,
			Raydium: `https://raydium.io/swap/?inputCurrency=${MINT}`,
		});
	});
});
