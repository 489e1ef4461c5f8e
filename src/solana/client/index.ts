/**
 * High-level token launch client.
 *
 * @example
 * ```typescript
 * import { createTokenLaunchClient } from "mintlink";
 * import { createSolanaRpc } from "@solana/kit";
 *
 * const client = createTokenLaunchClient({
 *   rpc: createSolanaRpc("https://api.mainnet-beta.solana.com"),
 * });
 * ```
 */

export {
	createTokenLaunchClient,
	type TokenLaunchClient,
} from "./factory.js";

export { handleClientError } from "./errors.js";

export type {
	TokenLaunchClientOptions,
	LaunchFeatures,
	CreateTokenParams,
	CloneTokenParams,
	RevokeParams,
	DisableSellingRequest,
	FailedReason,
	FailedResult,
	RateLimitedResult,
	ReadyTransaction,
	LaunchReady,
	CreateTokenResult,
	CloneTokenResult,
	FollowUpResult,
	TrackResult,
	TokenInfoResult,
} from "./types.js";

export { formatSol, truncateAddress } from "./messages.js";
