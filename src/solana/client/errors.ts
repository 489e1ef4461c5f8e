/**
 * Shared error handling for the token launch client
 */

import {
	EncodingOverflowError,
	InsufficientFundsError,
	InvalidParameterError,
	NetworkTransientError,
	SecurityRejectionError,
	ValidationError,
} from "../../errors.js";
import {
	insufficientFundsMessage,
	networkErrorMessage,
	securityRejectedMessage,
	transactionTooLargeMessage,
} from "./messages.js";
import type { FailedResult } from "./types.js";

/**
 * Convert any thrown value to a failed result with an actionable message.
 */
export function handleClientError(e: unknown): FailedResult {
	if (e instanceof ValidationError) {
		return { status: "FAILED", reason: "validation_error", message: e.message, error: e };
	}
	if (e instanceof InvalidParameterError) {
		return { status: "FAILED", reason: "invalid_parameter", message: e.message, error: e };
	}
	if (e instanceof InsufficientFundsError) {
		return {
			status: "FAILED",
			reason: "insufficient_funds",
			message: insufficientFundsMessage(e.balance, e.required),
			error: e,
		};
	}
	if (e instanceof SecurityRejectionError) {
		return {
			status: "FAILED",
			reason: "security_rejected",
			message: securityRejectedMessage(),
			error: e,
		};
	}
	if (e instanceof EncodingOverflowError) {
		return {
			status: "FAILED",
			reason: "transaction_too_large",
			message: transactionTooLargeMessage(),
			error: e,
		};
	}
	if (e instanceof NetworkTransientError) {
		return {
			status: "FAILED",
			reason: "network_error",
			message: networkErrorMessage(),
			error: e,
		};
	}
	if (e instanceof Error) {
		// RPC errors that were not worth retrying
		return {
			status: "FAILED",
			reason: "network_error",
			message: networkErrorMessage(e.message),
			error: e,
		};
	}
	return {
		status: "FAILED",
		reason: "network_error",
		message: networkErrorMessage(String(e)),
	};
}
