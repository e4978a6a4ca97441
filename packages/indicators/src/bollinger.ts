export interface BollingerBand {
	upper: number;
	middle: number;
	lower: number;
	/** (upper - lower) / middle */
	width: number;
}

/**
 * SMA(period) +/- stdDev * population standard deviation, aligned with
 * `values`. Entries before the first full window are null.
 */
export function bollingerSeries(
	values: number[],
	period = 20,
	stdDev = 2
): Array<BollingerBand | null> {
	const series: Array<BollingerBand | null> = new Array(values.length).fill(null);
	if (period <= 0) {
		return series;
	}

	for (let end = period; end <= values.length; end += 1) {
		const window = values.slice(end - period, end);
		const middle = window.reduce((acc, value) => acc + value, 0) / period;
		const variance =
			window.reduce((acc, value) => acc + (value - middle) ** 2, 0) / period;
		const deviation = Math.sqrt(variance) * stdDev;
		const upper = middle + deviation;
		const lower = middle - deviation;
		series[end - 1] = {
			upper,
			middle,
			lower,
			width: middle === 0 ? 0 : (upper - lower) / middle,
		};
	}

	return series;
}

export function bollinger(
	values: number[],
	period = 20,
	stdDev = 2
): BollingerBand | null {
	if (values.length < period) {
		return null;
	}
	return bollingerSeries(values.slice(values.length - period), period, stdDev)[period - 1];
}
