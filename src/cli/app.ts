import { buildApplication, buildRouteMap } from "@stricli/core";
import { cloneCommand } from "./commands/clone.js";
import { confirmCommand } from "./commands/confirm.js";
import { createCommand } from "./commands/create.js";
import { disableSellingCommand } from "./commands/disableSelling.js";
import { infoCommand } from "./commands/info.js";
import { revokeCommand } from "./commands/revoke.js";
import { versionCommand } from "./commands/version.js";
import { pkg } from "./lib/pkg.js";

const routes = buildRouteMap({
	routes: {
		version: versionCommand,
		create: createCommand,
		clone: cloneCommand,
		revoke: revokeCommand,
		"disable-selling": disableSellingCommand,
		confirm: confirmCommand,
		info: infoCommand,
	},
	docs: {
		brief: pkg.description ?? "Mintlink CLI",
	},
});

export const app = buildApplication(routes, {
	name: pkg.name,
	versionInfo: {
		currentVersion: pkg.version,
	},
	scanner: {
		caseStyle: "allow-kebab-for-camel",
	},
});
