import { describe, expect, it } from "vitest";
import { ConfigError } from "@longwatch/core";
import { parseCliArgs, resolveCliOptions } from "./cliArgs";

describe("scanner CLI arg parsing", () => {
	it("captures flags with a space or equals syntax", () => {
		const args = parseCliArgs(["--risk", "conservative", "--policy=swing", "--once"]);
		expect(args).toEqual({ risk: "conservative", policy: "swing", once: true });
	});

	it("resolves pairs and the gateway port", () => {
		const options = resolveCliOptions(parseCliArgs(["--pairs", "eth/usdc, SOL/USDC", "--ws-port", "8787"]));
		expect(options).toEqual({
			riskProfile: undefined,
			policyProfile: undefined,
			pairs: ["ETH/USDC", "SOL/USDC"],
			wsPort: 8787,
			once: false,
		});
	});

	it("disables the gateway with --no-ws", () => {
		expect(resolveCliOptions(parseCliArgs(["--no-ws", "--ws-port", "8787"])).wsPort).toBeNull();
	});

	it("rejects an invalid port", () => {
		expect(() => resolveCliOptions(parseCliArgs(["--ws-port", "http"]))).toThrow(ConfigError);
	});
});
