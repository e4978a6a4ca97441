import type { EntryTrigger } from "../types";
import { bollingerSqueezeTrigger } from "./bollingerSqueeze";
import { breakoutRetestTrigger } from "./breakoutRetest";
import { bullishCandleTrigger } from "./bullishCandle";
import { emaCrossoverTrigger } from "./emaCrossover";

export { bollingerSqueezeTrigger } from "./bollingerSqueeze";
export { breakoutRetestTrigger } from "./breakoutRetest";
export { bullishCandleTrigger, hasLongLowerWick, isBullishEngulfing } from "./bullishCandle";
export { emaCrossoverTrigger } from "./emaCrossover";

export const DEFAULT_TRIGGERS: readonly EntryTrigger[] = [
	breakoutRetestTrigger,
	bollingerSqueezeTrigger,
	emaCrossoverTrigger,
	bullishCandleTrigger,
];
