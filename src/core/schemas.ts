/**
 * Zod schemas for token metadata
 * Uses Zod 4 features: .meta() for documentation, custom error messages
 */

import * as z from "zod";
import {
	MAX_DECIMALS,
	MAX_DESCRIPTION_LENGTH,
	MAX_INITIAL_SUPPLY,
	MAX_NAME_LENGTH,
	MAX_SYMBOL_LENGTH,
} from "./constants.js";
import { ValidationError } from "../errors.js";

const Name = z
	.string({ message: "Token name is required" })
	.min(1, "Token name is required")
	.max(MAX_NAME_LENGTH, `Name too long (max ${MAX_NAME_LENGTH} chars)`)
	.regex(/^[a-zA-Z0-9 ]+$/, "Name can only contain letters, numbers and spaces")
	.meta({
		description: "Human-readable token name",
		examples: ["Test Coin"],
	});

const Ticker = z
	.string({ message: "Token symbol is required" })
	.min(1, "Token symbol is required")
	.max(MAX_SYMBOL_LENGTH, `Symbol too long (max ${MAX_SYMBOL_LENGTH} chars)`)
	.regex(/^[a-zA-Z0-9]+$/, "Symbol can only contain letters and numbers")
	.meta({ description: "Ticker symbol", examples: ["TST"] });

const Decimals = z
	.number({ message: "Decimals must be a number" })
	.int({ message: "Decimals must be a whole number" })
	.min(0, `Decimals must be between 0 and ${MAX_DECIMALS}`)
	.max(MAX_DECIMALS, `Decimals must be between 0 and ${MAX_DECIMALS}`)
	.meta({ description: "Decimal places of the mint", examples: [9, 6, 0] });

/**
 * Whole-token supply. Accepts bigint, safe integers and digit strings
 * (user input arrives as text) and always yields a bigint.
 */
const Supply = z
	.union(
		[
			z.bigint(),
			z
				.number()
				.int({ message: "Supply must be a whole number" })
				.refine(Number.isSafeInteger, "Supply is too large for a number, pass a bigint or string")
				.transform((v) => BigInt(v)),
			z
				.string()
				.regex(/^\d+$/, "Supply must be a number")
				.transform((v) => BigInt(v)),
		],
		{ message: "Supply must be a number" },
	)
	.refine((v) => v >= 0n, "Supply must not be negative")
	.refine(
		(v) => v <= MAX_INITIAL_SUPPLY,
		`Supply must not exceed ${MAX_INITIAL_SUPPLY}`,
	);

/**
 * Schema for token metadata collected from the user
 */
export const TokenMetadataSchema = z
	.object({
		name: Name,
		symbol: Ticker,
		decimals: Decimals,
		initialSupply: Supply,
		image: z
			.string()
			.min(1)
			.optional()
			.meta({ description: "Image URL or content identifier (opaque)" }),
		description: z
			.string()
			.max(
				MAX_DESCRIPTION_LENGTH,
				`Description too long (max ${MAX_DESCRIPTION_LENGTH} chars)`,
			)
			.optional(),
	})
	.meta({ description: "Metadata of a token to create" });

export type TokenMetadataInput = z.input<typeof TokenMetadataSchema>;
export type TokenMetadata = Readonly<z.output<typeof TokenMetadataSchema>>;

export interface ValidateMetadataOptions {
	/** Accept an initial supply of zero (default: false) */
	allowZeroSupply?: boolean;
}

/**
 * Validate user metadata. Returns a frozen copy or throws ValidationError
 * carrying every violated constraint.
 */
export function validateTokenMetadata(
	input: unknown,
	options: ValidateMetadataOptions = {},
): TokenMetadata {
	const result = TokenMetadataSchema.safeParse(input);
	if (!result.success) {
		const issues = describeIssues(result.error);
		throw new ValidationError(issues.join("; "), issues);
	}
	if (result.data.initialSupply === 0n && !options.allowZeroSupply) {
		throw new ValidationError("Supply must be positive", [
			"initialSupply: Supply must be positive",
		]);
	}
	return Object.freeze({ ...result.data });
}

function describeIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
		return `${path}${issue.message}`;
	});
}

/**
 * Helper to format Zod errors in a user-friendly way
 */
export function formatZodError(error: z.ZodError): string {
	return describeIssues(error).join("; ");
}
