/**
 * Package metadata for the CLI (name, version, description)
 */

import { readFileSync } from "node:fs";
import * as z from "zod";

const PackageJsonSchema = z.object({
	name: z.string(),
	version: z.string(),
	description: z.string().optional(),
});

export type PackageInfo = z.infer<typeof PackageJsonSchema>;

// src/cli/lib and dist/cli/lib both sit three levels below the package root
const PACKAGE_JSON_URL = new URL("../../../package.json", import.meta.url);

export const pkg: PackageInfo = PackageJsonSchema.parse(
	JSON.parse(readFileSync(PACKAGE_JSON_URL, "utf-8")),
);
