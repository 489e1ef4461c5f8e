/**
 * Security Validator
 *
 * Last gate before a transaction is handed to a wallet. Checks the program
 * allow-list, reserved-account roles, the signer set and the serialized
 * size. Signatures are never inspected; the transaction is unsigned.
 */

import {
	type Address,
	type Instruction,
	isSignerRole,
	isWritableRole,
} from "@solana/kit";
import {
	ASSOCIATED_TOKEN_PROGRAM_ID,
	DISABLE_SELLING_DISCRIMINATOR,
	MAX_DISABLE_SELLING_DAYS,
	MAX_TRANSACTION_SIZE,
	MIN_DISABLE_SELLING_DAYS,
	RESERVED_ACCOUNTS,
	SYSTEM_PROGRAM_ID,
	TOKEN_PROGRAM_ID,
} from "../core/constants.js";
import { disableSellingDataCodec } from "./instructions.js";
import { type Logger, silentLogger } from "../logger.js";
import { type UnsignedTransaction, serializeTransaction } from "./transaction.js";

// =============================================================================
// Types
// =============================================================================

/** Why a transaction was rejected */
export type SecurityReason =
	| "no_instructions"
	| "program_not_allowed"
	| "reserved_account_escalation"
	| "unexpected_signer"
	| "invalid_program_data"
	| "transaction_too_large"
	| "serialization_failed";

export type ValidationResult =
	| { isValid: true; invalidReason?: undefined; byteLength: number }
	| { isValid: false; invalidReason: SecurityReason };

export interface SecurityPolicy {
	/** Programs a transaction may invoke */
	allowedPrograms: readonly Address[];
	/** Smart-contract program whose instruction data is checked */
	smartContractProgramId?: Address;
	/** Serialized size ceiling (default: 1232) */
	maxTransactionSize?: number;
	logger?: Logger;
}

/** Programs every launch transaction needs */
export const BASE_ALLOWED_PROGRAMS: readonly Address[] = [
	SYSTEM_PROGRAM_ID,
	TOKEN_PROGRAM_ID,
	ASSOCIATED_TOKEN_PROGRAM_ID,
];

/**
 * Build a policy allowing the base programs plus any extras.
 */
export function createSecurityPolicy(
	options: Omit<SecurityPolicy, "allowedPrograms"> & {
		extraPrograms?: readonly Address[];
	} = {},
): SecurityPolicy {
	const { extraPrograms = [], ...rest } = options;
	const allowed = new Set<Address>([...BASE_ALLOWED_PROGRAMS, ...extraPrograms]);
	if (rest.smartContractProgramId) {
		allowed.add(rest.smartContractProgramId);
	}
	return { ...rest, allowedPrograms: [...allowed] };
}

// =============================================================================
// Validation
// =============================================================================

const reserved = new Set<Address>(RESERVED_ACCOUNTS);

function escalatesReservedAccount(ix: Instruction): boolean {
	if (ix.programAddress === SYSTEM_PROGRAM_ID) {
		return false;
	}
	return (ix.accounts ?? []).some(
		(meta) =>
			reserved.has(meta.address) &&
			(isWritableRole(meta.role) || isSignerRole(meta.role)),
	);
}

function hasForeignSigner(ix: Instruction, feePayer: Address): boolean {
	return (ix.accounts ?? []).some(
		(meta) => isSignerRole(meta.role) && meta.address !== feePayer,
	);
}

function isValidDisableSellingData(data: Instruction["data"]): boolean {
	if (!data || data.length !== disableSellingDataCodec.fixedSize) {
		return false;
	}
	const { discriminator, days } = disableSellingDataCodec.decode(data);
	if (discriminator !== DISABLE_SELLING_DISCRIMINATOR) {
		return false;
	}
	return days >= MIN_DISABLE_SELLING_DAYS && days <= MAX_DISABLE_SELLING_DAYS;
}

function check(
	tx: UnsignedTransaction,
	policy: SecurityPolicy,
): ValidationResult {
	if (tx.instructions.length === 0) {
		return { isValid: false, invalidReason: "no_instructions" };
	}

	const allowed = new Set(policy.allowedPrograms);
	for (const ix of tx.instructions) {
		if (!allowed.has(ix.programAddress)) {
			return { isValid: false, invalidReason: "program_not_allowed" };
		}
		if (escalatesReservedAccount(ix)) {
			return { isValid: false, invalidReason: "reserved_account_escalation" };
		}
		if (hasForeignSigner(ix, tx.feePayer)) {
			return { isValid: false, invalidReason: "unexpected_signer" };
		}
		if (
			policy.smartContractProgramId !== undefined &&
			ix.programAddress === policy.smartContractProgramId &&
			!isValidDisableSellingData(ix.data)
		) {
			return { isValid: false, invalidReason: "invalid_program_data" };
		}
	}

	let bytes: Uint8Array;
	try {
		bytes = serializeTransaction(tx);
	} catch {
		return { isValid: false, invalidReason: "serialization_failed" };
	}

	if (bytes.length > (policy.maxTransactionSize ?? MAX_TRANSACTION_SIZE)) {
		return { isValid: false, invalidReason: "transaction_too_large" };
	}

	return { isValid: true, byteLength: bytes.length };
}

/**
 * Validate an unsigned transaction against a policy.
 *
 * Rejections are logged at warn level with their reason code; callers show
 * the user a generic message only.
 */
export function validateTransaction(
	tx: UnsignedTransaction,
	policy: SecurityPolicy,
): ValidationResult {
	const result = check(tx, policy);
	if (!result.isValid) {
		(policy.logger ?? silentLogger).warn("Transaction rejected", {
			reason: result.invalidReason,
			feePayer: tx.feePayer,
			instructions: tx.instructions.length,
		});
	}
	return result;
}
