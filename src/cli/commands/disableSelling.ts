/**
 * Disable Selling Command
 *
 * Prepare a smart-contract call that locks selling of a mint for 1-7 days.
 */

import { buildCommand, numberParser, type CommandContext } from "@stricli/core";
import { intro, outro, spinner } from "@clack/prompts";
import pc from "picocolors";
import { CLI_USER_ID, createCliClient, verboseFlag } from "../lib/client.js";
import { fail, printReady } from "../lib/output.js";

interface DisableSellingFlags {
	days: number;
	verbose?: boolean;
}

export const disableSellingCommand = buildCommand({
	docs: {
		brief: "Disable selling of a token for 1-7 days",
	},
	parameters: {
		flags: {
			days: { kind: "parsed", parse: numberParser, brief: "Days to disable selling (1-7)" },
			verbose: verboseFlag,
		},
		positional: {
			kind: "tuple",
			parameters: [
				{ brief: "Wallet address (mint owner)", parse: String },
				{ brief: "Mint address", parse: String },
			],
		},
	},
	async func(
		this: CommandContext,
		flags: DisableSellingFlags,
		wallet: string,
		mint: string,
	) {
		intro(pc.cyan("Mintlink - Disable Selling"));

		const client = createCliClient(flags);
		const s = spinner();
		s.start("Composing transaction");

		const result = await client.disableSelling(CLI_USER_ID, {
			wallet,
			mint,
			days: flags.days,
		});

		if (result.status !== "READY") {
			s.stop(pc.red("Failed"));
			fail(result);
		}
		s.stop("Composed");
		printReady(result);

		outro(pc.dim(`Selling disabled for ${flags.days} day(s) once confirmed`));
	},
});
