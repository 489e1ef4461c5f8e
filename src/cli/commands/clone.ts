/**
 * Clone Command
 *
 * Launch a new token with the decimals and supply of an existing mint.
 */

import { buildCommand, type CommandContext } from "@stricli/core";
import { intro, outro, spinner } from "@clack/prompts";
import pc from "picocolors";
import { CLI_USER_ID, createCliClient, verboseFlag } from "../lib/client.js";
import { fail, printReady } from "../lib/output.js";
import { featureFlags, type FeatureFlags } from "./features.js";

interface CloneFlags extends FeatureFlags {
	name: string;
	symbol: string;
	verbose?: boolean;
}

export const cloneCommand = buildCommand({
	docs: {
		brief: "Clone an existing token's decimals and supply",
	},
	parameters: {
		flags: {
			name: { kind: "parsed", parse: String, brief: "New token name" },
			symbol: { kind: "parsed", parse: String, brief: "New ticker symbol" },
			...featureFlags,
			verbose: verboseFlag,
		},
		positional: {
			kind: "tuple",
			parameters: [
				{ brief: "Wallet address (fee payer and signer)", parse: String },
				{ brief: "Mint address to clone", parse: String },
			],
		},
	},
	async func(
		this: CommandContext,
		flags: CloneFlags,
		wallet: string,
		sourceMint: string,
	) {
		intro(pc.cyan("Mintlink - Clone Token"));

		const client = createCliClient(flags);
		const s = spinner();
		s.start(`Reading ${sourceMint}`);

		const result = await client.cloneToken(CLI_USER_ID, {
			wallet,
			sourceMint,
			name: flags.name,
			symbol: flags.symbol,
			revokeMintAuthority: flags.revokeMint,
			revokeFreezeAuthority: flags.revokeFreeze,
			disableSellingDays: flags.disableSellingDays,
		});

		if (result.status !== "READY") {
			s.stop(pc.red("Failed"));
			fail(result);
		}
		s.stop(`Mint ${pc.bold(result.mint)}`);

		console.log(
			`  ${pc.dim("Copied:")} ${result.source.decimals} decimals, ${result.rawAmount} raw supply`,
		);
		printReady(result);

		outro(pc.dim("Run 'mintlink confirm <signature>' after sending"));
	},
});
