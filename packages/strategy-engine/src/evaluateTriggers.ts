import {
	DEFAULT_SIGNAL_POLICY,
	type SignalPolicy,
	type TriggerName,
} from "@longwatch/core";
import { DEFAULT_TRIGGERS } from "./triggers";
import type { EntryTrigger, TriggerInput, TriggerResult } from "./types";

export function evaluateTriggers(
	input: TriggerInput,
	policy: SignalPolicy = DEFAULT_SIGNAL_POLICY,
	triggers: readonly EntryTrigger[] = DEFAULT_TRIGGERS
): TriggerResult {
	const flags: Record<TriggerName, boolean> = {
		breakout_retest: false,
		bb_squeeze_expansion: false,
		ema_crossover: false,
		bullish_candle: false,
	};
	const fired: TriggerName[] = [];
	const rationale: string[] = [];

	for (const trigger of triggers) {
		if (trigger.evaluate(input, policy)) {
			flags[trigger.name] = true;
			fired.push(trigger.name);
			rationale.push(trigger.label);
		}
	}

	return { flags, fired, count: fired.length, rationale };
}
