/**
 * Client construction for CLI commands
 */

import { createSolanaRpc } from "@solana/kit";
import { loadConfig } from "../../config.js";
import { createTokenLaunchClient } from "../../solana/client/factory.js";
import { createClackLogger } from "./output.js";

/** Rate-limit key for the local operator */
export const CLI_USER_ID = "cli";

export interface GlobalFlags {
	verbose?: boolean;
}

/** Shared --verbose flag definition */
export const verboseFlag = {
	kind: "boolean",
	brief: "Show debug and info logs",
	optional: true,
} as const;

/**
 * Build a client from MINTLINK_* environment variables.
 */
export function createCliClient(flags: GlobalFlags) {
	const config = loadConfig();
	return createTokenLaunchClient({
		rpc: createSolanaRpc(config.rpcUrl),
		config,
		logger: createClackLogger(flags.verbose ?? false),
	});
}
