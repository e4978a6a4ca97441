import ccxt from "ccxt";
import type { OHLCV } from "ccxt";
import { ConfigError, type ExchangeConfig } from "@longwatch/core";

/**
 * The slice of a ccxt exchange the provider calls.
 */
export interface OhlcvSource {
	readonly id: string;
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

interface ExchangeCredentials {
	apiKey?: string;
	secret?: string;
	enableRateLimit: boolean;
	options: Record<string, unknown>;
}

const EXCHANGE_FACTORIES = {
	binance: (credentials: ExchangeCredentials) => new ccxt.binance(credentials),
	bybit: (credentials: ExchangeCredentials) => new ccxt.bybit(credentials),
	mexc: (credentials: ExchangeCredentials) => new ccxt.mexc(credentials),
	okx: (credentials: ExchangeCredentials) => new ccxt.okx(credentials),
};

export type SupportedExchangeId = keyof typeof EXCHANGE_FACTORIES;

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGE_FACTORIES);

const isSupportedExchange = (id: string): id is SupportedExchangeId =>
	Object.prototype.hasOwnProperty.call(EXCHANGE_FACTORIES, id);

export const createCcxtExchange = (config: ExchangeConfig): OhlcvSource => {
	if (!isSupportedExchange(config.id)) {
		throw new ConfigError(
			`Unsupported exchange "${config.id}". Expected one of: ${SUPPORTED_EXCHANGES.join(", ")}`
		);
	}
	const exchange = EXCHANGE_FACTORIES[config.id]({
		apiKey: config.apiKey || undefined,
		secret: config.secret || undefined,
		enableRateLimit: true,
		options: {
			defaultType: "spot",
			...config.options,
		},
	});
	if (config.sandbox) {
		exchange.setSandboxMode(true);
	}
	return exchange;
};
