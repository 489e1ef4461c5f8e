/**
 * Flags shared by commands that compose a launch
 */

import { numberParser } from "@stricli/core";

export interface FeatureFlags {
	revokeMint?: boolean;
	revokeFreeze?: boolean;
	disableSellingDays?: number;
}

export const featureFlags = {
	revokeMint: {
		kind: "boolean",
		brief: "Revoke the mint authority after minting",
		optional: true,
	},
	revokeFreeze: {
		kind: "boolean",
		brief: "Revoke the freeze authority",
		optional: true,
	},
	disableSellingDays: {
		kind: "parsed",
		parse: numberParser,
		brief: "Disable selling for 1-7 days",
		optional: true,
	},
} as const;
