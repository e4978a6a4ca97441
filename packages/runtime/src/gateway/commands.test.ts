import { describe, expect, it } from "vitest";
import { parseGatewayCommand } from "./commands";

describe("parseGatewayCommand", () => {
	it("parses lifecycle commands with a request id", () => {
		expect(parseGatewayCommand('{"type":"cancel","id":" ETH/USDC:15m:1 ","requestId":"r1"}')).toEqual({
			ok: true,
			command: { type: "cancel", id: "ETH/USDC:15m:1" },
			requestId: "r1",
		});
		expect(parseGatewayCommand('{"type":"mutePair","symbol":"SOL/USDC"}')).toEqual({
			ok: true,
			command: { type: "mutePair", symbol: "SOL/USDC" },
			requestId: null,
		});
	});

	it("parses pair and emission controls", () => {
		expect(parseGatewayCommand('{"type":"setPairEnabled","symbol":"BNB/USDC","enabled":false}')).toEqual({
			ok: true,
			command: { type: "setPairEnabled", symbol: "BNB/USDC", enabled: false },
			requestId: null,
		});
		expect(parseGatewayCommand('{"type":"setMuted","muted":true}')).toEqual({
			ok: true,
			command: { type: "setMuted", muted: true },
			requestId: null,
		});
		expect(parseGatewayCommand('{"type":"status"}')).toEqual({
			ok: true,
			command: { type: "status" },
			requestId: null,
		});
	});

	it("rejects malformed frames without throwing", () => {
		expect(parseGatewayCommand("not json")).toEqual({ ok: false, error: "invalid JSON", requestId: null });
		expect(parseGatewayCommand("[1,2]")).toEqual({
			ok: false,
			error: "command must be a JSON object",
			requestId: null,
		});
		expect(parseGatewayCommand('{"requestId":"r2"}')).toEqual({
			ok: false,
			error: "command type is missing",
			requestId: "r2",
		});
		expect(parseGatewayCommand('{"type":"sell"}')).toEqual({
			ok: false,
			error: "unknown command type: sell",
			requestId: null,
		});
		expect(parseGatewayCommand('{"type":"markActive"}')).toEqual({
			ok: false,
			error: "markActive needs an id",
			requestId: null,
		});
		expect(parseGatewayCommand('{"type":"setMuted","muted":"yes"}')).toEqual({
			ok: false,
			error: "setMuted needs a boolean muted",
			requestId: null,
		});
	});
});
