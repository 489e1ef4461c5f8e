/**
 * Instruction builders for token launches
 *
 * Pure functions: typed inputs in, kit `Instruction` out, no I/O.
 * System, SPL Token and Associated Token instructions come from the
 * program clients; only the smart-contract call is encoded here.
 */

import {
	type Address,
	type Instruction,
	AccountRole,
	createAddressWithSeed,
	createNoopSigner,
	getStructCodec,
	getU32Codec,
	getU8Codec,
	getUtf8Encoder,
} from "@solana/kit";
import {
	getCreateAccountInstruction,
	getCreateAccountWithSeedInstruction,
} from "@solana-program/system";
import {
	AuthorityType as TokenAuthorityType,
	findAssociatedTokenPda,
	getCreateAssociatedTokenIdempotentInstruction,
	getInitializeMint2Instruction,
	getMintToInstruction,
	getSetAuthorityInstruction,
} from "@solana-program/token";
import {
	DISABLE_SELLING_DISCRIMINATOR,
	MAX_DECIMALS,
	MAX_DISABLE_SELLING_DAYS,
	MAX_SEED_LENGTH,
	MAX_U64,
	MIN_DISABLE_SELLING_DAYS,
	TOKEN_PROGRAM_ID,
} from "../core/constants.js";
import { InvalidParameterError } from "../errors.js";

const utf8Encoder = getUtf8Encoder();

/** Authority kinds a mint can revoke */
export type AuthorityType = "mint" | "freeze";

const AUTHORITY_TYPES: Record<AuthorityType, TokenAuthorityType> = {
	mint: TokenAuthorityType.MintTokens,
	freeze: TokenAuthorityType.FreezeAccount,
};

/** Data of the smart-contract "disable selling" call: u8 discriminator, u32 days */
export const disableSellingDataCodec = getStructCodec([
	["discriminator", getU8Codec()],
	["days", getU32Codec()],
]);

// =============================================================================
// System Program
// =============================================================================

export interface CreateAccountParams {
	payer: Address;
	newAccount: Address;
	lamports: bigint;
	space: number;
	programAddress: Address;
}

/**
 * System CreateAccount. Both payer and new account sign.
 */
export function createAccount(params: CreateAccountParams): Instruction {
	assertU64(params.lamports, "lamports");
	return withoutSigners(
		getCreateAccountInstruction({
			payer: createNoopSigner(params.payer),
			newAccount: createNoopSigner(params.newAccount),
			lamports: params.lamports,
			space: toSpace(params.space),
			programAddress: params.programAddress,
		}),
	);
}

export interface CreateAccountWithSeedParams {
	payer: Address;
	newAccount: Address;
	base: Address;
	seed: string;
	lamports: bigint;
	space: number;
	programAddress: Address;
}

/**
 * System CreateAccountWithSeed. Only the base account signs, so a mint can be
 * created for a wallet without any keypair living in this process.
 */
export function createAccountWithSeed(
	params: CreateAccountWithSeedParams,
): Instruction {
	assertSeed(params.seed);
	assertU64(params.lamports, "lamports");

	return withoutSigners(
		getCreateAccountWithSeedInstruction({
			payer: createNoopSigner(params.payer),
			newAccount: params.newAccount,
			baseAccount: createNoopSigner(params.base),
			base: params.base,
			seed: params.seed,
			amount: params.lamports,
			space: toSpace(params.space),
			programAddress: params.programAddress,
		}),
	);
}

/**
 * Derive the address CreateAccountWithSeed will create.
 */
export async function deriveSeededAddress(
	base: Address,
	seed: string,
	programAddress: Address = TOKEN_PROGRAM_ID,
): Promise<Address> {
	assertSeed(seed);
	return createAddressWithSeed({
		baseAddress: base,
		programAddress,
		seed,
	});
}

/**
 * Generate a random mint seed (16 hex chars, well under the 32-byte limit)
 */
export function generateMintSeed(): string {
	const bytes = new Uint8Array(8);
	crypto.getRandomValues(bytes);
	return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
}

// =============================================================================
// SPL Token Program
// =============================================================================

export interface InitializeMintParams {
	mint: Address;
	decimals: number;
	mintAuthority: Address;
	/** null leaves the mint without a freeze authority */
	freezeAuthority: Address | null;
}

/**
 * InitializeMint2 (no rent sysvar account needed)
 */
export function initializeMint(params: InitializeMintParams): Instruction {
	assertInteger(params.decimals, 0, MAX_DECIMALS, "decimals");

	return withoutSigners(
		getInitializeMint2Instruction({
			mint: params.mint,
			decimals: params.decimals,
			mintAuthority: params.mintAuthority,
			freezeAuthority: params.freezeAuthority,
		}),
	);
}

export interface MintToParams {
	mint: Address;
	destination: Address;
	authority: Address;
	/** Raw amount in base units */
	amount: bigint;
}

export function mintTo(params: MintToParams): Instruction {
	if (params.amount <= 0n) {
		throw new InvalidParameterError("amount", "must be positive");
	}
	assertU64(params.amount, "amount");

	return withoutSigners(
		getMintToInstruction({
			mint: params.mint,
			token: params.destination,
			mintAuthority: createNoopSigner(params.authority),
			amount: params.amount,
		}),
	);
}

export interface SetAuthorityParams {
	/** Mint (or token account) whose authority changes */
	account: Address;
	currentAuthority: Address;
	authorityType: AuthorityType;
	/** null revokes the authority permanently */
	newAuthority: Address | null;
}

export function setAuthority(params: SetAuthorityParams): Instruction {
	const authorityType = AUTHORITY_TYPES[params.authorityType];
	if (authorityType === undefined) {
		throw new InvalidParameterError(
			"authorityType",
			`unsupported authority type ${String(params.authorityType)}`,
		);
	}

	return withoutSigners(
		getSetAuthorityInstruction({
			owned: params.account,
			owner: createNoopSigner(params.currentAuthority),
			authorityType,
			newAuthority: params.newAuthority,
		}),
	);
}

// =============================================================================
// Associated Token Program
// =============================================================================

/**
 * Derive an Associated Token Account address
 */
export async function deriveAssociatedTokenAddress(
	owner: Address,
	mint: Address,
	tokenProgram: Address = TOKEN_PROGRAM_ID,
): Promise<Address> {
	const [address] = await findAssociatedTokenPda({ owner, tokenProgram, mint });
	return address;
}

export interface CreateAssociatedTokenAccountParams {
	payer: Address;
	associatedAccount: Address;
	owner: Address;
	mint: Address;
}

/**
 * CreateIdempotent: succeeds when the account already exists.
 */
export function createAssociatedTokenAccount(
	params: CreateAssociatedTokenAccountParams,
): Instruction {
	return withoutSigners(
		getCreateAssociatedTokenIdempotentInstruction({
			payer: createNoopSigner(params.payer),
			ata: params.associatedAccount,
			owner: params.owner,
			mint: params.mint,
			tokenProgram: TOKEN_PROGRAM_ID,
		}),
	);
}

// =============================================================================
// Smart-contract program
// =============================================================================

export interface DisableSellingParams {
	programAddress: Address;
	mint: Address;
	owner: Address;
	/** Whole days, 1-7 */
	days: number;
}

/**
 * Disable transfers of a mint for N days.
 */
export function disableSelling(params: DisableSellingParams): Instruction {
	assertInteger(
		params.days,
		MIN_DISABLE_SELLING_DAYS,
		MAX_DISABLE_SELLING_DAYS,
		"days",
	);

	return {
		programAddress: params.programAddress,
		accounts: [
			{ address: params.mint, role: AccountRole.WRITABLE },
			{ address: params.owner, role: AccountRole.READONLY_SIGNER },
		],
		data: disableSellingDataCodec.encode({
			discriminator: DISABLE_SELLING_DISCRIMINATOR,
			days: params.days,
		}),
	};
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * The wallet signs later, so built instructions carry account roles only.
 * Noop signers give the program clients the signer roles without a keypair.
 */
function withoutSigners(ix: Instruction): Instruction {
	return {
		programAddress: ix.programAddress,
		accounts: (ix.accounts ?? []).map(({ address, role }) => ({ address, role })),
		data: ix.data,
	};
}

function toSpace(space: number): bigint {
	assertInteger(space, 0, Number.MAX_SAFE_INTEGER, "space");
	return BigInt(space);
}

function assertU64(value: bigint, name: string): void {
	if (value < 0n || value > MAX_U64) {
		throw new InvalidParameterError(name, `${value} is outside u64 range`);
	}
}

/** Seed limit counts UTF-8 bytes, not characters */
function assertSeed(seed: string): void {
	const length = utf8Encoder.getSizeFromValue(seed);
	if (length === 0 || length > MAX_SEED_LENGTH) {
		throw new InvalidParameterError(
			"seed",
			`must be 1-${MAX_SEED_LENGTH} bytes, got ${length}`,
		);
	}
}

function assertInteger(
	value: number,
	min: number,
	max: number,
	name: string,
): void {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new InvalidParameterError(
			name,
			`expected an integer in [${min}, ${max}], got ${value}`,
		);
	}
}
