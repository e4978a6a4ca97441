/**
 * Latest EMA value, seeded with the simple mean of the first `length` values.
 */
export function ema(values: number[], length: number): number | null {
	const series = emaSeries(values, length);
	return series.length ? series[series.length - 1] : null;
}

/**
 * EMA aligned index-for-index with `values`; entries before the seed window
 * are null.
 */
export function emaSeries(values: number[], length: number): Array<number | null> {
	const series: Array<number | null> = new Array(values.length).fill(null);

	if (length <= 0 || values.length < length) {
		return series;
	}

	const multiplier = 2 / (length + 1);
	let emaValue = average(values.slice(0, length));
	series[length - 1] = emaValue;

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series[i] = emaValue;
	}

	return series;
}

const average = (nums: number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};
