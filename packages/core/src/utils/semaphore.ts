/**
 * Async semaphore for limiting concurrency. A single permit gives a FIFO mutex.
 * Usage: const sem = new Semaphore(5); await sem.run(async () => { ... });
 */
export class Semaphore {
	private readonly queue: Array<() => void> = [];
	private active = 0;

	constructor(private readonly maxConcurrency: number) {
		if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
			throw new Error(`Semaphore needs at least one permit, got ${maxConcurrency}`);
		}
	}

	get inFlight(): number {
		return this.active;
	}

	get waiting(): number {
		return this.queue.length;
	}

	async acquire(): Promise<void> {
		if (this.active < this.maxConcurrency) {
			this.active += 1;
			return;
		}
		return new Promise<void>((resolve) => {
			this.queue.push(() => {
				this.active += 1;
				resolve();
			});
		});
	}

	release(): void {
		if (this.active === 0) {
			throw new Error("Semaphore released more times than acquired");
		}
		this.active -= 1;
		const next = this.queue.shift();
		if (next) {
			next();
		}
	}

	/** Runs fn with automatic acquire/release. */
	async run<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
