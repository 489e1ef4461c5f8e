/**
 * Confirm Command
 *
 * Poll for a broadcast transaction until it confirms, fails, or times out.
 */

import { buildCommand, type CommandContext } from "@stricli/core";
import { intro, outro, spinner } from "@clack/prompts";
import pc from "picocolors";
import { CLI_USER_ID, createCliClient, verboseFlag } from "../lib/client.js";
import { fail } from "../lib/output.js";

interface ConfirmFlags {
	verbose?: boolean;
}

export const confirmCommand = buildCommand({
	docs: {
		brief: "Wait for a transaction to confirm",
	},
	parameters: {
		flags: {
			verbose: verboseFlag,
		},
		positional: {
			kind: "tuple",
			parameters: [{ brief: "Transaction signature", parse: String }],
		},
	},
	async func(this: CommandContext, flags: ConfirmFlags, signature: string) {
		intro(pc.cyan("Mintlink - Confirm"));

		const client = createCliClient(flags);
		const tracking = await client.trackConfirmation(CLI_USER_ID, signature);
		if (tracking.status !== "TRACKING") {
			fail(tracking);
		}

		const s = spinner();
		s.start(`Waiting for ${signature.slice(0, 8)}...`);
		const result = await tracking.task.result;

		switch (result.status) {
			case "confirmed":
				s.stop(pc.green("Confirmed"));
				console.log(`  ${pc.dim("Slot:")} ${result.detail.slot}`);
				if (result.detail.fee !== null) {
					console.log(`  ${pc.dim("Fee:")} ${result.detail.fee} lamports`);
				}
				break;
			case "failed":
				s.stop(pc.red("Failed"));
				throw new Error(`Transaction failed: ${result.error}`);
			case "timed_out":
				s.stop(pc.yellow("Not confirmed yet"));
				console.log(`  ${pc.dim("Attempts:")} ${result.attempts}`);
				break;
			case "cancelled":
				s.stop(pc.yellow("Cancelled"));
				break;
		}

		outro(pc.dim(`Polled ${result.attempts} time(s)`));
	},
});
