import type { Signal } from "@longwatch/core";

export const buildSignal = (overrides: Partial<Signal> = {}): Signal => {
	const symbol = overrides.symbol ?? "ETH/USDC";
	const createdAt = overrides.createdAt ?? 1_700_000_000_000;
	return {
		id: `${symbol}:15m:${createdAt}`,
		symbol,
		timeframe: "15m",
		entryPrice: 2650,
		stopLoss: 2610,
		takeProfit1: 2690,
		takeProfit2: 2730,
		grade: "A",
		riskPct: 0.7,
		positionSize: 0.175,
		riskAmount: 7,
		riskRewardRatio: 1,
		triggers: ["breakout_retest", "ema_crossover"],
		rationale: "Good setup: Breakout & retest of resistance and EMA crossover above EMA50",
		status: "pending",
		outcome: null,
		expiresAt: createdAt + 8 * 3_600_000,
		activatedAt: null,
		triggeredAt: null,
		closedAt: null,
		createdAt,
		updatedAt: createdAt,
		...overrides,
	};
};
