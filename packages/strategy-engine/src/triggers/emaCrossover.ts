import { TRIGGER_DESCRIPTIONS } from "@longwatch/core";
import type { EntryTrigger } from "../types";

export const emaCrossoverTrigger: EntryTrigger = {
	name: "ema_crossover",
	label: TRIGGER_DESCRIPTIONS.ema_crossover,
	evaluate({ snapshot }) {
		const { ema9, ema21, ema50, previousEma9, previousEma21 } = snapshot;
		if (
			ema9 === null ||
			ema21 === null ||
			ema50 === null ||
			previousEma9 === null ||
			previousEma21 === null
		) {
			return false;
		}
		const crossedUp = previousEma9 <= previousEma21 && ema9 > ema21;
		return crossedUp && ema9 > ema50 && ema21 > ema50;
	},
};
