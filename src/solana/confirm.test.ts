import { afterEach, describe, test, expect, vi } from "vitest";
import {
	type Rpc,
	type SolanaRpcApi,
	SOLANA_ERROR__RPC__TRANSPORT_HTTP_ERROR,
	SolanaError,
	getBase58Decoder,
	signature,
} from "@solana/kit";
import { pollConfirmation, startConfirmation } from "./confirm.js";

const sig = (n: number) => signature(getBase58Decoder().decode(new Uint8Array(64).fill(n)));

const SIG = sig(1);
const FAST = { minDelayMs: 1, maxDelayMs: 1 };

const landed = (err: unknown = null) => ({
	slot: 123n,
	blockTime: 1_700_000_000n,
	meta: { fee: 5000n, err },
});

type Lookup = () => Promise<unknown>;

function mockRpc(...lookups: Lookup[]) {
	const send = vi.fn<(config?: { abortSignal?: AbortSignal }) => Promise<unknown>>();
	for (const lookup of lookups) {
		send.mockImplementationOnce(lookup);
	}
	send.mockResolvedValue(null);
	const getTransaction = vi.fn(() => ({ send }));
	return {
		rpc: { getTransaction } as unknown as Rpc<SolanaRpcApi>,
		getTransaction,
		send,
	};
}

afterEach(() => {
	vi.useRealTimers();
});

describe("pollConfirmation", () => {
	test("confirms a transaction found without an error", async () => {
		const { rpc, getTransaction } = mockRpc(async () => landed());

		await expect(pollConfirmation(rpc, SIG)).resolves.toEqual({
			signature: SIG,
			status: "confirmed",
			detail: { slot: 123n, blockTime: 1_700_000_000n, fee: 5000n },
			attempts: 1,
		});
		expect(getTransaction).toHaveBeenCalledWith(SIG, {
			commitment: "confirmed",
			encoding: "jsonParsed",
			maxSupportedTransactionVersion: 0,
		});
	});

	test("reports a ledger error as failed", async () => {
		const { rpc } = mockRpc(async () => landed({ InstructionError: [0, { Custom: 1n }] }));

		const result = await pollConfirmation(rpc, SIG);

		expect(result).toEqual({
			signature: SIG,
			status: "failed",
			error: '{"InstructionError":[0,{"Custom":"1"}]}',
			detail: { slot: 123n, blockTime: 1_700_000_000n, fee: 5000n },
			attempts: 1,
		});
	});

	test("keeps polling while the transaction is not found", async () => {
		const { rpc, send } = mockRpc(
			async () => null,
			async () => null,
			async () => landed(),
		);

		const result = await pollConfirmation(rpc, SIG, { policy: FAST });

		expect(result.status).toBe("confirmed");
		expect(result.attempts).toBe(3);
		expect(send).toHaveBeenCalledTimes(3);
	});

	test("times out after maxAttempts with backoff between attempts", async () => {
		vi.useFakeTimers();
		const start = Date.now();
		const { rpc, send } = mockRpc();

		const pending = pollConfirmation(rpc, SIG);
		await vi.runAllTimersAsync();

		await expect(pending).resolves.toEqual({ signature: SIG, status: "timed_out", attempts: 3 });
		expect(send).toHaveBeenCalledTimes(3);
		expect(Date.now() - start).toBe(3000);
	});

	test("honours a larger attempt budget", async () => {
		vi.useFakeTimers();
		const start = Date.now();
		const { rpc } = mockRpc();

		const pending = pollConfirmation(rpc, SIG, { policy: { maxAttempts: 5 } });
		await vi.runAllTimersAsync();

		await expect(pending).resolves.toMatchObject({ status: "timed_out", attempts: 5 });
		expect(Date.now() - start).toBe(15_000);
	});

	test("retries transient lookup failures", async () => {
		const { rpc } = mockRpc(
			async () => {
				throw new SolanaError(SOLANA_ERROR__RPC__TRANSPORT_HTTP_ERROR, {
					headers: new Headers(),
					message: "Service Unavailable",
					statusCode: 503,
				});
			},
			async () => landed(),
		);

		await expect(pollConfirmation(rpc, SIG, { policy: FAST })).resolves.toMatchObject({
			status: "confirmed",
			attempts: 2,
		});
	});

	test("confirms after two transient failures, waiting out the backoff", async () => {
		vi.useFakeTimers();
		const start = Date.now();
		const unavailable = async () => {
			throw new TypeError("fetch failed");
		};
		const { rpc } = mockRpc(unavailable, unavailable, async () => landed());

		const pending = pollConfirmation(rpc, SIG);
		await vi.runAllTimersAsync();

		await expect(pending).resolves.toEqual({
			signature: SIG,
			status: "confirmed",
			detail: { slot: 123n, blockTime: 1_700_000_000n, fee: 5000n },
			attempts: 3,
		});
		expect(Date.now() - start).toBe(3000);
	});

	test("times out when every lookup fails transiently", async () => {
		const { rpc, send } = mockRpc();
		send.mockRejectedValue(new TypeError("fetch failed"));

		await expect(
			pollConfirmation(rpc, SIG, { policy: { ...FAST, maxAttempts: 4 } }),
		).resolves.toEqual({ signature: SIG, status: "timed_out", attempts: 4 });
		expect(send).toHaveBeenCalledTimes(4);
	});

	test("fails fast on non-transient lookup errors", async () => {
		const { rpc, send } = mockRpc(async () => {
			throw new Error("Invalid param: not a signature");
		});

		await expect(pollConfirmation(rpc, SIG, { policy: FAST })).resolves.toEqual({
			signature: SIG,
			status: "failed",
			error: "Invalid param: not a signature",
			attempts: 1,
		});
		expect(send).toHaveBeenCalledOnce();
	});

	test("returns cancelled without polling when already aborted", async () => {
		const { rpc, send } = mockRpc();
		const result = await pollConfirmation(rpc, SIG, { abortSignal: AbortSignal.abort() });

		expect(result).toEqual({ signature: SIG, status: "cancelled", attempts: 0 });
		expect(send).not.toHaveBeenCalled();
	});
});

describe("startConfirmation", () => {
	test("exposes status while pending and after settling", async () => {
		const { rpc } = mockRpc(async () => landed());
		const task = startConfirmation(rpc, SIG);

		expect(task.signature).toBe(SIG);
		expect(task.status()).toBe("pending");
		await task.result;
		expect(task.status()).toBe("confirmed");
	});

	test("cancel stops polling at the next wait", async () => {
		const { rpc, send } = mockRpc();
		const task = startConfirmation(rpc, SIG);
		task.cancel();

		await expect(task.result).resolves.toEqual({
			signature: SIG,
			status: "cancelled",
			attempts: 1,
		});
		expect(send).toHaveBeenCalledOnce();
		expect(task.status()).toBe("cancelled");
	});

	test("cancel after settling changes nothing", async () => {
		const { rpc } = mockRpc(async () => landed());
		const task = startConfirmation(rpc, SIG);
		await task.result;

		task.cancel();
		expect(task.status()).toBe("confirmed");
	});

	test("tasks for different signatures are independent", async () => {
		const first = mockRpc();
		const second = mockRpc(async () => landed());
		const a = startConfirmation(first.rpc, SIG);
		const b = startConfirmation(second.rpc, sig(2), { policy: FAST });

		a.cancel();

		await expect(a.result).resolves.toMatchObject({ status: "cancelled" });
		await expect(b.result).resolves.toMatchObject({ status: "confirmed", signature: sig(2) });
	});
});
