import { describe, test, expect, vi } from "vitest";
import {
	type Instruction,
	type Rpc,
	type SolanaRpcApi,
	blockhash,
	getAddressDecoder,
	getBase64Encoder,
	getCompiledTransactionMessageDecoder,
	getTransactionDecoder,
} from "@solana/kit";
import {
	ASSOCIATED_TOKEN_PROGRAM_ID,
	SYSTEM_PROGRAM_ID,
	TOKEN_PROGRAM_ID,
	composeTokenCreation,
	createSecurityPolicy,
	createUnsignedTransaction,
	encodeDeepLink,
	parseDeepLink,
	validateTokenMetadata,
} from "../src/index.js";

const addr = (n: number) => getAddressDecoder().decode(new Uint8Array(32).fill(n));

const WALLET = addr(1);
const SMART_CONTRACT = addr(4);
const LIFETIME = {
	blockhash: blockhash("11111111111111111111111111111111"),
	lastValidBlockHeight: 100n,
};

function mockRpc() {
	return {
		getMinimumBalanceForRentExemption: vi.fn((size: bigint) => ({
			send: async () => (size === 82n ? 1_461_600n : 2_039_280n),
		})),
		getBalance: vi.fn(() => ({
			send: async () => ({ context: { slot: 1n }, value: 10_000_000_000n }),
		})),
		getLatestBlockhash: vi.fn(() => ({
			send: async () => ({ context: { slot: 1n }, value: LIFETIME }),
		})),
	} as unknown as Rpc<SolanaRpcApi>;
}

function decodeLink(url: string) {
	const link = parseDeepLink(url);
	if (!link) throw new Error(`not a deep link: ${url}`);
	const tx = getTransactionDecoder().decode(getBase64Encoder().encode(link.base64));
	return { tx, message: getCompiledTransactionMessageDecoder().decode(tx.messageBytes) };
}

describe("launch pipeline", () => {
	test("metadata to deep link keeps instructions in order and the wallet as sole signer", async () => {
		const metadata = validateTokenMetadata({
			name: "Test Coin",
			symbol: "TST",
			decimals: 9,
			initialSupply: 1_000_000,
		});
		const launch = await composeTokenCreation(
			mockRpc(),
			{
				wallet: WALLET,
				metadata,
				revokeMintAuthority: true,
				disableSellingDays: 1,
			},
			{ smartContractProgramId: SMART_CONTRACT },
		);
		const policy = createSecurityPolicy({ smartContractProgramId: SMART_CONTRACT });

		const link = encodeDeepLink(launch.transaction, { policy });
		expect(link.status).toBe("ENCODED");
		if (link.status !== "ENCODED") return;

		const { tx, message } = decodeLink(link.url);

		expect(Object.keys(tx.signatures)).toEqual([WALLET]);
		expect(message.header.numSignerAccounts).toBe(1);
		expect(message.staticAccounts[0]).toBe(WALLET);
		expect(message.lifetimeToken).toBe(LIFETIME.blockhash);

		const programs = message.instructions.map(
			(ix) => message.staticAccounts[ix.programAddressIndex],
		);
		expect(programs).toEqual([
			SYSTEM_PROGRAM_ID,
			TOKEN_PROGRAM_ID,
			ASSOCIATED_TOKEN_PROGRAM_ID,
			TOKEN_PROGRAM_ID,
			TOKEN_PROGRAM_ID,
			SMART_CONTRACT,
		]);
		expect(message.instructions.map((ix) => Array.from(ix.data ?? []))).toEqual(
			launch.transaction.instructions.map((ix) => Array.from(ix.data ?? [])),
		);
	});

	test("a disallowed program stops the pipeline before encoding", () => {
		const rogue: Instruction = {
			programAddress: addr(9),
			accounts: [],
			data: new Uint8Array([1, 2, 3]),
		};
		const transaction = createUnsignedTransaction(WALLET, [rogue], LIFETIME);

		expect(encodeDeepLink(transaction, { policy: createSecurityPolicy() })).toEqual({
			status: "REJECTED",
			reason: "security_rejected",
			message: "Transaction failed security checks",
			securityReason: "program_not_allowed",
		});
	});
});
