import type { Candle, SignalPolicy, TriggerName } from "@longwatch/core";
import type { IndicatorSnapshot } from "@longwatch/indicators";

export interface TriggerInput {
	snapshot: IndicatorSnapshot;
	/** Entry-timeframe candles the snapshot was computed from. */
	candles: Candle[];
	/** Lower-timeframe candles for pattern confirmation, when configured. */
	confirmationCandles: Candle[] | null;
}

/**
 * One entry condition. Implementations are pure: same input and policy, same
 * answer.
 */
export interface EntryTrigger {
	readonly name: TriggerName;
	readonly label: string;
	evaluate(input: TriggerInput, policy: SignalPolicy): boolean;
}

export interface TriggerResult {
	flags: Record<TriggerName, boolean>;
	fired: TriggerName[];
	count: number;
	rationale: string[];
}
