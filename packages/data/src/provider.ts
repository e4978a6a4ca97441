import { BadSymbol, DDoSProtection, RateLimitExceeded, RequestTimeout } from "ccxt";
import type { OHLCV } from "ccxt";
import {
	MarketDataError,
	TimeoutError,
	createLogger,
	describeError,
	isCandleClosed,
	withTimeout,
	type Candle,
	type MarketDataErrorKind,
	type MarketDataProvider,
} from "@longwatch/core";
import type { OhlcvSource } from "./exchange";
import { mapCcxtCandleToCandle, normalizeCandles } from "./utils/ccxtMapper";

const logger = createLogger("market-data");

export interface CcxtProviderOptions {
	timeoutMs?: number;
	/** Drop the still-forming last candle. */
	closedOnly?: boolean;
	now?: () => number;
}

export const classifyMarketDataError = (err: unknown): MarketDataErrorKind => {
	if (err instanceof RateLimitExceeded || err instanceof DDoSProtection) {
		return "RateLimited";
	}
	if (err instanceof BadSymbol) {
		return "NotFound";
	}
	if (err instanceof RequestTimeout || err instanceof TimeoutError) {
		return "Timeout";
	}
	return "Unavailable";
};

export class CcxtMarketDataProvider implements MarketDataProvider {
	private readonly timeoutMs: number;
	private readonly closedOnly: boolean;
	private readonly now: () => number;

	constructor(
		private readonly source: OhlcvSource,
		options: CcxtProviderOptions = {}
	) {
		this.timeoutMs = options.timeoutMs ?? 10_000;
		this.closedOnly = options.closedOnly ?? true;
		this.now = options.now ?? Date.now;
	}

	async getCandles(symbol: string, timeframe: string, count: number): Promise<Candle[]> {
		if (count <= 0) {
			return [];
		}
		const rows = await this.fetchRows(symbol, timeframe, this.closedOnly ? count + 1 : count);
		let candles = normalizeCandles(
			rows.map((row) => mapCcxtCandleToCandle(row, symbol, timeframe))
		);
		const last = candles[candles.length - 1];
		if (this.closedOnly && last && !isCandleClosed(last.timestamp, timeframe, this.now())) {
			candles = candles.slice(0, -1);
		}
		const result = candles.slice(-count);
		logger.debug("candles_fetched", {
			exchange: this.source.id,
			symbol,
			timeframe,
			requested: count,
			received: result.length,
		});
		return result;
	}

	private async fetchRows(symbol: string, timeframe: string, limit: number): Promise<OHLCV[]> {
		try {
			return await withTimeout(
				this.source.fetchOHLCV(symbol, timeframe, undefined, limit),
				this.timeoutMs,
				`fetchOHLCV ${symbol} ${timeframe}`
			);
		} catch (err) {
			const kind = classifyMarketDataError(err);
			logger.warn("candles_fetch_failed", {
				exchange: this.source.id,
				symbol,
				timeframe,
				kind,
				error: describeError(err),
			});
			throw new MarketDataError(kind, `${symbol} ${timeframe}: ${describeError(err)}`, err);
		}
	}
}
