import {
	ConfigError,
	configureLogger,
	createLogger,
	describeError,
	loadScannerConfig,
} from "@longwatch/core";
import { CcxtMarketDataProvider, createCcxtExchange } from "@longwatch/data";
import { createPersistenceLayer } from "@longwatch/persistence";
import { createScannerRuntime } from "@longwatch/runtime";
import { parseCliArgs, resolveCliOptions } from "./cliArgs";

const logger = createLogger("scanner-cli");

const main = async (): Promise<void> => {
	const cli = resolveCliOptions(parseCliArgs(process.argv.slice(2)));
	const config = loadScannerConfig({
		riskProfile: cli.riskProfile,
		policyProfile: cli.policyProfile,
	});
	configureLogger();

	const pairs = cli.pairs ?? config.env.defaultPairs;
	logger.info("cli_starting", {
		exchange: config.exchange.id,
		sandbox: config.exchange.sandbox,
		pairs,
		scanIntervalMs: config.env.scanIntervalMs,
		persistence: config.env.persistenceDriver,
		timeframes: config.policy.timeframes,
	});

	const stores = createPersistenceLayer({
		driver: config.env.persistenceDriver,
		signalStorePath: config.env.signalStorePath,
		defaultPairs: pairs,
		riskProfile: config.risk,
	});
	const marketData = new CcxtMarketDataProvider(createCcxtExchange(config.exchange), {
		timeoutMs: config.env.fetchTimeoutMs,
	});
	const runtime = createScannerRuntime({
		config,
		marketData,
		stores,
		wsPort: cli.once ? null : cli.wsPort,
	});

	if (cli.once) {
		const report = await runtime.scanner.scanOnce();
		await runtime.lifecycle.flushNotifications();
		logger.info("scan_report", { ...report });
		return;
	}

	let stopping = false;
	const shutdown = (signal: NodeJS.Signals): void => {
		if (stopping) {
			return;
		}
		stopping = true;
		logger.info("cli_shutdown", { signal });
		runtime
			.stop()
			.then(() => process.exit(0))
			.catch((err: unknown) => {
				logger.error("cli_shutdown_failed", { error: describeError(err) });
				process.exit(1);
			});
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	await runtime.start();
};

main().catch((err: unknown) => {
	logger.error("cli_failed", {
		error: describeError(err),
		kind: err instanceof ConfigError ? "config" : "runtime",
	});
	process.exit(1);
});
