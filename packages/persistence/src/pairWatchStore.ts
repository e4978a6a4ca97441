import { normalizeSymbol, type PairWatch, type PairWatchStore } from "@longwatch/core";

export class InMemoryPairWatchStore implements PairWatchStore {
	private readonly pairs = new Map<string, PairWatch>();

	constructor(
		initial: Array<string | PairWatch> = [],
		private readonly now: () => number = Date.now
	) {
		for (const entry of initial) {
			const pair: PairWatch =
				typeof entry === "string"
					? { symbol: normalizeSymbol(entry), enabled: true, addedAt: this.now() }
					: { ...entry, symbol: normalizeSymbol(entry.symbol) };
			this.pairs.set(pair.symbol, pair);
		}
	}

	async listEnabledPairs(): Promise<string[]> {
		return Array.from(this.pairs.values())
			.filter((pair) => pair.enabled)
			.map((pair) => pair.symbol);
	}

	async listPairs(): Promise<PairWatch[]> {
		return Array.from(this.pairs.values()).map((pair) => ({ ...pair }));
	}

	async isEnabled(symbol: string): Promise<boolean> {
		return this.pairs.get(normalizeSymbol(symbol))?.enabled ?? false;
	}

	/**
	 * @returns false when the pair was already watched
	 */
	async addPair(symbol: string): Promise<boolean> {
		const key = normalizeSymbol(symbol);
		if (!key || this.pairs.has(key)) {
			return false;
		}
		this.pairs.set(key, { symbol: key, enabled: true, addedAt: this.now() });
		return true;
	}

	/**
	 * @returns false for unknown pairs
	 */
	async setPairEnabled(symbol: string, enabled: boolean): Promise<boolean> {
		const pair = this.pairs.get(normalizeSymbol(symbol));
		if (!pair) {
			return false;
		}
		pair.enabled = enabled;
		return true;
	}
}
