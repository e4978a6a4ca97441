import { TRIGGER_DESCRIPTIONS } from "@longwatch/core";
import { bollingerSeries } from "@longwatch/indicators";
import type { EntryTrigger } from "../types";

export const bollingerSqueezeTrigger: EntryTrigger = {
	name: "bb_squeeze_expansion",
	label: TRIGGER_DESCRIPTIONS.bb_squeeze_expansion,
	evaluate({ snapshot, candles }, policy) {
		const { squeezeLookback, squeezeRatio, expansionRatio, squeezeVolumeMultiple } =
			policy.triggers;
		const { volumeAverage } = snapshot;
		if (volumeAverage === null || squeezeLookback <= 0) {
			return false;
		}

		const widths = bollingerSeries(
			candles.map((candle) => candle.close),
			policy.indicators.bollingerPeriod,
			policy.indicators.bollingerStdDev
		).map((band) => (band ? band.width : null));

		const n = widths.length;
		if (n < squeezeLookback + 2) {
			return false;
		}
		const current = widths[n - 1];
		const prior = widths[n - 2];
		const history = widths.slice(n - 2 - squeezeLookback, n - 2);
		if (current === null || prior === null) {
			return false;
		}

		let total = 0;
		for (const width of history) {
			if (width === null) {
				return false;
			}
			total += width;
		}
		const meanWidth = total / squeezeLookback;

		const squeezed = prior < meanWidth * squeezeRatio;
		const expanding = current > prior * expansionRatio;
		const volumeSurge = snapshot.volume > volumeAverage * squeezeVolumeMultiple;
		return squeezed && expanding && volumeSurge;
	},
};
