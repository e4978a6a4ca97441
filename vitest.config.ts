import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

const workspacePackage = (name: string): string =>
	path.join(root, "packages", name, "src", "index.ts");

export default defineConfig({
	resolve: {
		alias: {
			"@longwatch/core": workspacePackage("core"),
			"@longwatch/indicators": workspacePackage("indicators"),
			"@longwatch/strategy-engine": workspacePackage("strategy-engine"),
			"@longwatch/risk-engine": workspacePackage("risk-engine"),
			"@longwatch/lifecycle": workspacePackage("lifecycle"),
			"@longwatch/persistence": workspacePackage("persistence"),
			"@longwatch/data": workspacePackage("data"),
			"@longwatch/runtime": workspacePackage("runtime"),
		},
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
		testTimeout: 10_000,
	},
});
