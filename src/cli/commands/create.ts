/**
 * Create Command
 *
 * Prepare a token launch transaction and print the wallet deep link.
 */

import { buildCommand, numberParser, type CommandContext } from "@stricli/core";
import { intro, outro, spinner } from "@clack/prompts";
import pc from "picocolors";
import { CLI_USER_ID, createCliClient, verboseFlag } from "../lib/client.js";
import { formatSol } from "../../solana/client/messages.js";
import { fail, printReady } from "../lib/output.js";
import { featureFlags, type FeatureFlags } from "./features.js";

interface CreateFlags extends FeatureFlags {
	name: string;
	symbol: string;
	decimals: number;
	supply: string;
	image?: string;
	description?: string;
	verbose?: boolean;
}

export const createCommand = buildCommand({
	docs: {
		brief: "Prepare a new token launch",
	},
	parameters: {
		flags: {
			name: { kind: "parsed", parse: String, brief: "Token name (max 30 chars)" },
			symbol: { kind: "parsed", parse: String, brief: "Ticker symbol (max 10 chars)" },
			decimals: {
				kind: "parsed",
				parse: numberParser,
				brief: "Decimal places (0-18)",
				default: "9",
			},
			supply: {
				kind: "parsed",
				parse: String,
				brief: "Initial supply in whole tokens",
			},
			image: {
				kind: "parsed",
				parse: String,
				brief: "Image URL or content id",
				optional: true,
			},
			description: {
				kind: "parsed",
				parse: String,
				brief: "Short description (max 200 chars)",
				optional: true,
			},
			...featureFlags,
			verbose: verboseFlag,
		},
		positional: {
			kind: "tuple",
			parameters: [{ brief: "Wallet address (fee payer and signer)", parse: String }],
		},
	},
	async func(this: CommandContext, flags: CreateFlags, wallet: string) {
		intro(pc.cyan("Mintlink - Create Token"));

		const client = createCliClient(flags);
		const s = spinner();
		s.start("Composing launch transaction");

		const result = await client.createToken(CLI_USER_ID, {
			wallet,
			metadata: {
				name: flags.name,
				symbol: flags.symbol,
				decimals: flags.decimals,
				initialSupply: flags.supply,
				image: flags.image,
				description: flags.description,
			},
			revokeMintAuthority: flags.revokeMint,
			revokeFreezeAuthority: flags.revokeFreeze,
			disableSellingDays: flags.disableSellingDays,
		});

		if (result.status !== "READY") {
			s.stop(pc.red("Failed"));
			fail(result);
		}
		s.stop(`Mint ${pc.bold(result.mint)}`);

		console.log(`  ${pc.dim("Token account:")} ${result.associatedAccount}`);
		console.log(`  ${pc.dim("Raw amount:")} ${result.rawAmount}`);
		console.log(`  ${pc.dim("Required balance:")} ${formatSol(result.requiredLamports)} SOL`);
		printReady(result);

		outro(pc.dim("Run 'mintlink confirm <signature>' after sending"));
	},
});
