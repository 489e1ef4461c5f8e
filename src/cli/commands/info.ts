/**
 * Info Command
 *
 * Show mint details and explorer links.
 */

import { buildCommand, type CommandContext } from "@stricli/core";
import { intro, outro, spinner } from "@clack/prompts";
import pc from "picocolors";
import { CLI_USER_ID, createCliClient, verboseFlag } from "../lib/client.js";
import { fail } from "../lib/output.js";

interface InfoFlags {
	verbose?: boolean;
}

export const infoCommand = buildCommand({
	docs: {
		brief: "Show token details",
	},
	parameters: {
		flags: {
			verbose: verboseFlag,
		},
		positional: {
			kind: "tuple",
			parameters: [{ brief: "Mint address", parse: String }],
		},
	},
	async func(this: CommandContext, flags: InfoFlags, mint: string) {
		intro(pc.cyan("Mintlink - Token Info"));

		const client = createCliClient(flags);
		const s = spinner();
		s.start(`Reading ${mint}`);

		const result = await client.tokenInfo(CLI_USER_ID, mint);
		if (result.status !== "FOUND") {
			s.stop(pc.red("Failed"));
			fail(result);
		}
		s.stop("Found");

		const { info } = result;
		console.log();
		console.log(pc.bold("Mint"));
		console.log(`  ${pc.dim("Decimals:")} ${info.decimals}`);
		console.log(`  ${pc.dim("Supply (raw):")} ${info.supply}`);
		console.log(
			`  ${pc.dim("Mint authority:")} ${info.mintAuthority ?? pc.green("revoked")}`,
		);
		console.log(
			`  ${pc.dim("Freeze authority:")} ${info.freezeAuthority ?? pc.green("revoked")}`,
		);

		console.log();
		console.log(pc.bold("Explorers"));
		for (const [name, url] of Object.entries(result.explorerLinks)) {
			console.log(`  ${pc.dim(`${name}:`)} ${url}`);
		}

		outro(pc.dim("Run 'mintlink help' for more commands"));
	},
});
