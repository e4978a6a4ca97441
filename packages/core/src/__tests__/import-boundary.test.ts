import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

const packagesDir = path.resolve(fileURLToPath(import.meta.url), "../../../..");

/** Detection, sizing and lifecycle stay free of network, disk and transport code. */
const PURE_PACKAGES = ["indicators", "strategy-engine", "risk-engine", "lifecycle"];

const FORBIDDEN_IMPORT =
	/from\s+["'](ccxt|ws|dotenv|node:fs|node:net|node:http|@longwatch\/(data|persistence|runtime))["']/;
const FORBIDDEN_DEPENDENCY = /^(ccxt|ws|dotenv|@longwatch\/(data|persistence|runtime))$/;

const walkSources = (root: string): string[] => {
	const results: string[] = [];
	const stack = [root];
	while (stack.length) {
		const current = stack.pop();
		if (current === undefined) {
			break;
		}
		if (fs.statSync(current).isDirectory()) {
			for (const entry of fs.readdirSync(current)) {
				if (entry === "node_modules" || entry === "dist" || entry === "__tests__") continue;
				stack.push(path.join(current, entry));
			}
			continue;
		}
		if (current.endsWith(".ts") && !current.endsWith(".test.ts")) {
			results.push(current);
		}
	}
	return results;
};

const readDependencyNames = (pkgPath: string): string[] => {
	const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
	if (typeof pkg !== "object" || pkg === null || !("dependencies" in pkg)) {
		return [];
	}
	const deps = pkg.dependencies;
	return typeof deps === "object" && deps !== null ? Object.keys(deps) : [];
};

describe("pure package boundaries", () => {
	it("detection and lifecycle sources import no I/O modules", () => {
		const offenders: string[] = [];
		for (const name of PURE_PACKAGES) {
			const dir = path.join(packagesDir, name, "src");
			for (const file of walkSources(dir)) {
				if (FORBIDDEN_IMPORT.test(fs.readFileSync(file, "utf8"))) {
					offenders.push(`${name}:${path.relative(dir, file)}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});

	it("pure packages declare no I/O dependencies", () => {
		const offenders: string[] = [];
		for (const name of PURE_PACKAGES) {
			for (const dep of readDependencyNames(path.join(packagesDir, name, "package.json"))) {
				if (FORBIDDEN_DEPENDENCY.test(dep)) {
					offenders.push(`${name}:${dep}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});
});
