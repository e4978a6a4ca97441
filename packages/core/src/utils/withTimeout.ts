export class TimeoutError extends Error {
	readonly name = "TimeoutError";

	constructor(
		readonly label: string,
		readonly timeoutMs: number
	) {
		super(`${label} timed out after ${timeoutMs}ms`);
	}
}

/**
 * Races `promise` against a timer. The underlying operation keeps running
 * after a timeout; only the caller stops waiting for it.
 */
export const withTimeout = <T>(
	promise: Promise<T>,
	timeoutMs: number,
	label = "operation"
): Promise<T> => {
	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
		return promise;
	}
	let timer: ReturnType<typeof setTimeout> | null = null;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
	});
	return Promise.race([promise, timeout]).finally(() => {
		if (timer) {
			clearTimeout(timer);
		}
	});
};
