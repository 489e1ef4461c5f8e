import { describe, test, expect } from "vitest";
import {
	type Instruction,
	blockhash,
	getAddressDecoder,
	getBase64Encoder,
} from "@solana/kit";
import { InvalidParameterError } from "../errors.js";
import { mintTo } from "./instructions.js";
import { buildDeepLink, encodeDeepLink, parseDeepLink } from "./deepLink.js";
import { createSecurityPolicy } from "./security.js";
import { createUnsignedTransaction, encodeTransactionBase64 } from "./transaction.js";

const addr = (n: number) => getAddressDecoder().decode(new Uint8Array(32).fill(n));

const WALLET = addr(1);
const MINT = addr(2);
const DESTINATION = addr(3);
const UNKNOWN_PROGRAM = addr(6);

const LIFETIME = {
	blockhash: blockhash("11111111111111111111111111111111"),
	lastValidBlockHeight: 100n,
};

const policy = createSecurityPolicy();

function tx(...instructions: Instruction[]) {
	return createUnsignedTransaction(WALLET, instructions, LIFETIME);
}

const valid = tx(
	mintTo({ mint: MINT, destination: DESTINATION, authority: WALLET, amount: 5n }),
);

describe("encodeDeepLink", () => {
	test("wraps the base64 wire transaction in a phantom link", () => {
		const result = encodeDeepLink(valid, { policy });
		const base64 = encodeTransactionBase64(valid);

		expect(result).toEqual({
			status: "ENCODED",
			url: `phantom://ul/v1/?tx=${encodeURIComponent(base64)}&type=transaction`,
			base64,
			byteLength: 247,
		});
	});

	test("payload decodes back to the serialized size", () => {
		const result = encodeDeepLink(valid, { policy });
		expect(result.status).toBe("ENCODED");
		if (result.status === "ENCODED") {
			expect(getBase64Encoder().encode(result.base64).length).toBe(result.byteLength);
		}
	});

	test("uses the configured scheme", () => {
		const result = encodeDeepLink(valid, { policy, scheme: "solflare" });
		expect(result.status === "ENCODED" && result.url.startsWith("solflare://ul/v1/?tx=")).toBe(
			true,
		);
	});

	test("is stateless: same input, same link", () => {
		expect(encodeDeepLink(valid, { policy })).toEqual(encodeDeepLink(valid, { policy }));
	});

	test("rejects empty transactions before validation", () => {
		expect(encodeDeepLink(tx(), { policy })).toEqual({
			status: "REJECTED",
			reason: "empty_transaction",
			message: "Transaction has no instructions",
		});
	});

	test("rejects transactions that fail security checks with a generic message", () => {
		const ix: Instruction = { programAddress: UNKNOWN_PROGRAM, accounts: [], data: new Uint8Array([1]) };
		expect(encodeDeepLink(tx(ix), { policy })).toEqual({
			status: "REJECTED",
			reason: "security_rejected",
			message: "Transaction failed security checks",
			securityReason: "program_not_allowed",
		});
	});

	test("rejects payloads over the limit", () => {
		const length = encodeTransactionBase64(valid).length;
		expect(encodeDeepLink(valid, { policy, payloadLimit: 100 })).toEqual({
			status: "REJECTED",
			reason: "payload_too_large",
			message: `Transaction too large for a deep link: ${length} characters (limit 100)`,
			payloadLength: length,
			limit: 100,
		});
	});

	test("accepts a payload exactly at the limit", () => {
		const length = encodeTransactionBase64(valid).length;
		expect(encodeDeepLink(valid, { policy, payloadLimit: length }).status).toBe("ENCODED");
		expect(encodeDeepLink(valid, { policy, payloadLimit: length - 1 }).status).toBe(
			"REJECTED",
		);
	});
});

describe("buildDeepLink", () => {
	test("percent-encodes the payload", () => {
		expect(buildDeepLink("AQ+/=")).toBe(
			"phantom://ul/v1/?tx=AQ%2B%2F%3D&type=transaction",
		);
	});

	test("query parsers read back the exact payload", () => {
		const link = new URL(buildDeepLink("ab+c/d+=="));
		expect(link.searchParams.get("tx")).toBe("ab+c/d+==");
		expect(link.searchParams.get("type")).toBe("transaction");
	});

	test("rejects invalid schemes", () => {
		expect(() => buildDeepLink("AA==", "not a scheme")).toThrow(InvalidParameterError);
	});
});

describe("parseDeepLink", () => {
	test("recovers scheme, payload and type", () => {
		expect(parseDeepLink("phantom://ul/v1/?tx=AQ%2B%2F%3D&type=transaction")).toEqual({
			scheme: "phantom",
			base64: "AQ+/=",
			type: "transaction",
		});
	});

	test("round-trips a payload containing plus signs", () => {
		expect(parseDeepLink(buildDeepLink("+/+/AA==", "solflare"))).toEqual({
			scheme: "solflare",
			base64: "+/+/AA==",
			type: "transaction",
		});
	});

	test("rejects an unescaped plus, which decodes to a space", () => {
		expect(parseDeepLink("phantom://ul/v1/?tx=AQ+/=&type=transaction")).toBeNull();
	});

	test("returns null for other URLs", () => {
		expect(parseDeepLink("https://example.com/?tx=AA==")).toBeNull();
		expect(parseDeepLink("phantom://ul/v1/?tx=&type=transaction")).toBeNull();
		expect(parseDeepLink("not a url")).toBeNull();
	});
});
