import type {
	EmissionSwitch,
	MarketDataProvider,
	Notifier,
	PairWatchStore,
	RiskProfileStore,
	ScannerConfig,
	SignalStore,
} from "@longwatch/core";
import { SignalLifecycleManager } from "@longwatch/lifecycle";
import { WsGateway } from "./gateway/WsGateway";
import { CompositeNotifier } from "./notify/CompositeNotifier";
import { LogNotifier } from "./notify/LogNotifier";
import { runtimeLogger } from "./runtimeShared";
import { Scanner } from "./scanner/Scanner";

export interface RuntimeStores {
	signals: SignalStore;
	pairs: PairWatchStore;
	riskProfiles: RiskProfileStore;
	emission: EmissionSwitch;
}

export interface CreateScannerRuntimeOptions {
	config: ScannerConfig;
	marketData: MarketDataProvider;
	stores: RuntimeStores;
	/** Overrides `config.env.wsPort`; null disables the gateway. */
	wsPort?: number | null;
	extraNotifiers?: Notifier[];
	now?: () => number;
}

export interface ScannerRuntime {
	scanner: Scanner;
	lifecycle: SignalLifecycleManager;
	gateway: WsGateway | null;
	start(): Promise<void>;
	stop(): Promise<void>;
}

/**
 * Wires stores, notifiers, the lifecycle manager, the scanner and the
 * optional WebSocket gateway from a loaded configuration.
 */
export const createScannerRuntime = (options: CreateScannerRuntimeOptions): ScannerRuntime => {
	const { config, stores } = options;
	const wsPort = options.wsPort === undefined ? config.env.wsPort : options.wsPort;
	const gateway = wsPort === null ? null : new WsGateway({ port: wsPort });

	const notifiers: Notifier[] = [
		new LogNotifier(undefined, config.risk.maxHoldDurationMs),
		...(gateway ? [gateway] : []),
		...(options.extraNotifiers ?? []),
	];

	const lifecycle = new SignalLifecycleManager({
		store: stores.signals,
		pairs: stores.pairs,
		emission: stores.emission,
		riskProfiles: stores.riskProfiles,
		notifier: new CompositeNotifier(notifiers),
		notifyAttempts: config.env.notifyAttempts,
		notifyTimeoutMs: config.env.fetchTimeoutMs,
		now: options.now,
	});

	const scanner = new Scanner(
		{
			marketData: options.marketData,
			pairs: stores.pairs,
			riskProfiles: stores.riskProfiles,
			lifecycle,
			policy: config.policy,
			now: options.now,
		},
		{
			scanIntervalMs: config.env.scanIntervalMs,
			maxConcurrentFetches: config.env.maxConcurrentFetches,
			fetchTimeoutMs: config.env.fetchTimeoutMs,
		}
	);

	gateway?.bind({ lifecycle, pairs: stores.pairs, emission: stores.emission, scanner });

	return {
		scanner,
		lifecycle,
		gateway,
		async start() {
			if (gateway) {
				await gateway.start();
			}
			scanner.start();
			runtimeLogger.info("runtime_started", {
				exchange: config.exchange.id,
				gateway: gateway !== null,
			});
		},
		async stop() {
			await scanner.stop();
			await lifecycle.flushNotifications();
			if (gateway) {
				await gateway.close();
			}
			runtimeLogger.info("runtime_stopped", {});
		},
	};
};
