import {
	InvalidTransitionError,
	SignalNotFoundError,
	type EmissionSwitch,
	type LifecycleCommand,
	type PairWatchStore,
	type Signal,
} from "@longwatch/core";
import type { ScannerStatus, ScanReport } from "../scanner/Scanner";
import type { GatewayCommand } from "./commands";

export interface GatewayHandlers {
	lifecycle: {
		handleCommand(command: LifecycleCommand): Promise<Signal | null>;
		listOpen(): Promise<Signal[]>;
	};
	pairs: Pick<PairWatchStore, "addPair" | "setPairEnabled">;
	emission: EmissionSwitch;
	scanner?: {
		getStatus(): Promise<ScannerStatus>;
		forceScan(): Promise<ScanReport>;
	};
}

export type CommandResult =
	| { ok: true; result: unknown }
	| { ok: false; error: string };

export class GatewayCommandError extends Error {
	readonly name = "GatewayCommandError";
}

const requireScanner = (handlers: GatewayHandlers): NonNullable<GatewayHandlers["scanner"]> => {
	if (!handlers.scanner) {
		throw new GatewayCommandError("scanner is not attached");
	}
	return handlers.scanner;
};

const summarizeReport = (report: ScanReport) => ({
	startedAt: report.startedAt,
	finishedAt: report.finishedAt,
	expired: report.expired,
	archived: report.archived,
	pairs: report.pairs,
});

const run = async (command: GatewayCommand, handlers: GatewayHandlers): Promise<unknown> => {
	switch (command.type) {
		case "markActive":
		case "markTriggered":
		case "cancel":
		case "mutePair":
			return { signal: await handlers.lifecycle.handleCommand(command) };
		case "addPair":
			return { added: await handlers.pairs.addPair(command.symbol) };
		case "setPairEnabled":
			return { updated: await handlers.pairs.setPairEnabled(command.symbol, command.enabled) };
		case "setMuted":
			await handlers.emission.setMuted(command.muted);
			return { muted: command.muted };
		case "listOpen":
			return { signals: await handlers.lifecycle.listOpen() };
		case "status":
			return requireScanner(handlers).getStatus();
		case "forceScan":
			return summarizeReport(await requireScanner(handlers).forceScan());
	}
};

/**
 * Executes a parsed command. Domain rejections come back as `ok: false`;
 * anything else is rethrown for the transport to log.
 */
export const executeGatewayCommand = async (
	command: GatewayCommand,
	handlers: GatewayHandlers
): Promise<CommandResult> => {
	try {
		return { ok: true, result: await run(command, handlers) };
	} catch (err) {
		if (
			err instanceof SignalNotFoundError ||
			err instanceof InvalidTransitionError ||
			err instanceof GatewayCommandError
		) {
			return { ok: false, error: err.message };
		}
		throw err;
	}
};
