/**
 * Unsigned transaction model and wire encoding
 *
 * Kit-native builder using @solana/kit's pipe() pattern. Nothing here signs
 * or sends: the wallet that opens the deep link does both.
 */

import {
	type Address,
	type Blockhash,
	type Instruction,
	appendTransactionMessageInstructions,
	compileTransaction,
	createTransactionMessage,
	getBase64EncodedWireTransaction,
	getTransactionEncoder,
	pipe,
	setTransactionMessageFeePayer,
	setTransactionMessageLifetimeUsingBlockhash,
} from "@solana/kit";

/**
 * Unsigned transaction: fee payer, ordered instructions and a blockhash
 * lifetime. The kit message type is deeply nested generics, so this keeps
 * only the properties the builder and validator need.
 */
export interface UnsignedTransaction {
	/** Fee payer address (the user's wallet) */
	readonly feePayer: Address;
	/** Instructions in execution order */
	readonly instructions: readonly Instruction[];
	/** Blockhash lifetime constraint */
	readonly lifetimeConstraint: {
		readonly blockhash: Blockhash;
		readonly lastValidBlockHeight: bigint;
	};
}

/**
 * Freeze a transaction so neither it nor its instruction list can change.
 */
export function createUnsignedTransaction(
	feePayer: Address,
	instructions: readonly Instruction[],
	lifetimeConstraint: UnsignedTransaction["lifetimeConstraint"],
): UnsignedTransaction {
	return Object.freeze({
		feePayer,
		instructions: Object.freeze([...instructions]),
		lifetimeConstraint: Object.freeze({ ...lifetimeConstraint }),
	});
}

function compile(tx: UnsignedTransaction) {
	const message = pipe(
		createTransactionMessage({ version: 0 }),
		(m) => setTransactionMessageFeePayer(tx.feePayer, m),
		(m) => setTransactionMessageLifetimeUsingBlockhash(tx.lifetimeConstraint, m),
		(m) => appendTransactionMessageInstructions(tx.instructions, m),
	);
	return compileTransaction(message);
}

/**
 * Wire bytes of the unsigned transaction (empty signature slots included).
 * Throws when the message cannot be compiled.
 */
export function serializeTransaction(tx: UnsignedTransaction): Uint8Array {
	return Uint8Array.from(getTransactionEncoder().encode(compile(tx)));
}

/**
 * Standard base64 of the wire bytes.
 */
export function encodeTransactionBase64(tx: UnsignedTransaction): string {
	return getBase64EncodedWireTransaction(compile(tx));
}
