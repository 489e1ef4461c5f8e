/**
 * Revoke Command
 *
 * Prepare a transaction that permanently revokes mint and/or freeze authority.
 */

import { buildCommand, type CommandContext } from "@stricli/core";
import { intro, outro, spinner } from "@clack/prompts";
import pc from "picocolors";
import { CLI_USER_ID, createCliClient, verboseFlag } from "../lib/client.js";
import { fail, printReady } from "../lib/output.js";

interface RevokeFlags {
	mint?: boolean;
	freeze?: boolean;
	verbose?: boolean;
}

export const revokeCommand = buildCommand({
	docs: {
		brief: "Revoke mint and/or freeze authority",
	},
	parameters: {
		flags: {
			mint: { kind: "boolean", brief: "Revoke the mint authority", optional: true },
			freeze: { kind: "boolean", brief: "Revoke the freeze authority", optional: true },
			verbose: verboseFlag,
		},
		positional: {
			kind: "tuple",
			parameters: [
				{ brief: "Wallet address (current authority)", parse: String },
				{ brief: "Mint address", parse: String },
			],
		},
	},
	async func(this: CommandContext, flags: RevokeFlags, wallet: string, mint: string) {
		intro(pc.cyan("Mintlink - Revoke Authorities"));

		const client = createCliClient(flags);
		const s = spinner();
		s.start("Composing transaction");

		const result = await client.revokeAuthorities(CLI_USER_ID, {
			wallet,
			mint,
			mintAuthority: flags.mint,
			freezeAuthority: flags.freeze,
		});

		if (result.status !== "READY") {
			s.stop(pc.red("Failed"));
			fail(result);
		}
		s.stop("Composed");
		printReady(result);

		outro(pc.yellow("Revoking is permanent"));
	},
});
