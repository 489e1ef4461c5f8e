/**
 * Deep-Link Encoder
 *
 * Wraps a validated unsigned transaction into a wallet deep link:
 * `<scheme>://ul/v1/?tx=<base64>&type=transaction`. Stateless.
 */

import {
	DEFAULT_WALLET_SCHEME,
	MAX_DEEP_LINK_PAYLOAD_LENGTH,
} from "../core/constants.js";
import { InvalidParameterError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import {
	type SecurityPolicy,
	type SecurityReason,
	validateTransaction,
} from "./security.js";
import { type UnsignedTransaction, encodeTransactionBase64 } from "./transaction.js";

export type DeepLinkRejectReason =
	| "security_rejected"
	| "empty_transaction"
	| "payload_too_large";

export type DeepLinkResult =
	| {
			status: "ENCODED";
			url: string;
			/** Raw base64 payload, as embedded in the link */
			base64: string;
			/** Serialized transaction size */
			byteLength: number;
	  }
	| { status: "REJECTED"; reason: "empty_transaction"; message: string }
	| {
			status: "REJECTED";
			reason: "security_rejected";
			message: string;
			/** Reason code, for logs only */
			securityReason: SecurityReason;
	  }
	| {
			status: "REJECTED";
			reason: "payload_too_large";
			message: string;
			payloadLength: number;
			limit: number;
	  };

export interface DeepLinkOptions {
	policy: SecurityPolicy;
	/** Wallet URL scheme (default: "phantom") */
	scheme?: string;
	/** Maximum base64 payload length (default: 2000) */
	payloadLimit?: number;
	logger?: Logger;
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*$/i;

/**
 * Build the link for an already-encoded payload. The payload is
 * percent-encoded so `+` is not read back as a space by query parsers.
 */
export function buildDeepLink(
	base64: string,
	scheme: string = DEFAULT_WALLET_SCHEME,
): string {
	if (!SCHEME_PATTERN.test(scheme)) {
		throw new InvalidParameterError("scheme", `"${scheme}" is not a URL scheme`);
	}
	return `${scheme}://ul/v1/?tx=${encodeURIComponent(base64)}&type=transaction`;
}

/**
 * Validate, serialize and wrap a transaction.
 */
export function encodeDeepLink(
	tx: UnsignedTransaction,
	options: DeepLinkOptions,
): DeepLinkResult {
	const logger = options.logger ?? silentLogger;

	if (tx.instructions.length === 0) {
		return {
			status: "REJECTED",
			reason: "empty_transaction",
			message: "Transaction has no instructions",
		};
	}

	const validation = validateTransaction(tx, {
		...options.policy,
		logger: options.policy.logger ?? logger,
	});
	if (!validation.isValid) {
		return {
			status: "REJECTED",
			reason: "security_rejected",
			message: "Transaction failed security checks",
			securityReason: validation.invalidReason,
		};
	}

	const base64 = encodeTransactionBase64(tx);
	const limit = options.payloadLimit ?? MAX_DEEP_LINK_PAYLOAD_LENGTH;
	if (base64.length > limit) {
		logger.warn("Deep link payload too large", {
			length: base64.length,
			limit,
		});
		return {
			status: "REJECTED",
			reason: "payload_too_large",
			message: `Transaction too large for a deep link: ${base64.length} characters (limit ${limit})`,
			payloadLength: base64.length,
			limit,
		};
	}

	return {
		status: "ENCODED",
		url: buildDeepLink(base64, options.scheme),
		base64,
		byteLength: validation.byteLength,
	};
}

export interface ParsedDeepLink {
	scheme: string;
	base64: string;
	type: string;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Recover the payload from a link produced by `buildDeepLink`.
 * Returns null for anything else.
 */
export function parseDeepLink(url: string): ParsedDeepLink | null {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		return null;
	}
	if (parsed.host !== "ul" || parsed.pathname !== "/v1/") {
		return null;
	}

	const base64 = parsed.searchParams.get("tx");
	const type = parsed.searchParams.get("type");
	if (!base64 || !BASE64_PATTERN.test(base64) || !type) {
		return null;
	}
	return { scheme: parsed.protocol.slice(0, -1), base64, type };
}
