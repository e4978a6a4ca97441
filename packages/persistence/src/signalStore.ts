import {
	PersistenceError,
	SignalNotFoundError,
	isOpenStatus,
	type Signal,
	type SignalStatus,
	type SignalStatusPatch,
	type SignalStore,
} from "@longwatch/core";

const cloneSignal = (signal: Signal): Signal => ({
	...signal,
	triggers: [...signal.triggers],
});

const byCreatedAt = (a: Signal, b: Signal): number =>
	a.createdAt - b.createdAt || a.id.localeCompare(b.id);

/**
 * Copy-on-write signal table. Each mutation builds the next table, hands it to
 * `persist` and only swaps it in once that resolves, so a failed write leaves
 * the visible state untouched. Writers are expected to be serialized by the
 * caller; the lifecycle ledger does that.
 */
export abstract class BaseSignalStore implements SignalStore {
	private table: Map<string, Signal> | null = null;
	private loading: Promise<Map<string, Signal>> | null = null;

	protected abstract load(): Promise<Map<string, Signal>>;
	protected abstract persist(next: Map<string, Signal>): Promise<void>;

	async create(signal: Signal): Promise<void> {
		const current = await this.snapshot();
		if (current.has(signal.id)) {
			throw new PersistenceError("create", new Error(`Signal ${signal.id} already exists`));
		}
		const next = new Map(current);
		next.set(signal.id, cloneSignal(signal));
		await this.commit("create", next);
	}

	async updateStatus(
		id: string,
		status: SignalStatus,
		patch: SignalStatusPatch
	): Promise<Signal> {
		const current = await this.snapshot();
		const existing = current.get(id);
		if (!existing) {
			throw new SignalNotFoundError(id);
		}
		const updated: Signal = { ...cloneSignal(existing), ...patch, status };
		const next = new Map(current);
		next.set(id, updated);
		await this.commit("updateStatus", next);
		return cloneSignal(updated);
	}

	async get(id: string): Promise<Signal | null> {
		const signal = (await this.snapshot()).get(id);
		return signal ? cloneSignal(signal) : null;
	}

	async listOpen(): Promise<Signal[]> {
		return (await this.list()).filter((signal) => isOpenStatus(signal.status));
	}

	async list(): Promise<Signal[]> {
		return Array.from((await this.snapshot()).values()).map(cloneSignal).sort(byCreatedAt);
	}

	async archiveOlderThan(maxAgeMs: number, now: number): Promise<number> {
		const current = await this.snapshot();
		const cutoff = now - maxAgeMs;
		const next = new Map(
			Array.from(current).filter(([, signal]) => signal.createdAt >= cutoff)
		);
		const archived = current.size - next.size;
		if (archived > 0) {
			await this.commit("archiveOlderThan", next);
		}
		return archived;
	}

	private async snapshot(): Promise<Map<string, Signal>> {
		if (this.table) {
			return this.table;
		}
		if (!this.loading) {
			this.loading = this.load().catch((err: unknown) => {
				this.loading = null;
				throw err instanceof PersistenceError ? err : new PersistenceError("load", err);
			});
		}
		const loaded = await this.loading;
		this.table ??= loaded;
		return this.table;
	}

	private async commit(operation: string, next: Map<string, Signal>): Promise<void> {
		try {
			await this.persist(next);
		} catch (err) {
			throw err instanceof PersistenceError ? err : new PersistenceError(operation, err);
		}
		this.table = next;
	}
}

export class InMemorySignalStore extends BaseSignalStore {
	constructor(private readonly initial: Signal[] = []) {
		super();
	}

	protected async load(): Promise<Map<string, Signal>> {
		return new Map(this.initial.map((signal) => [signal.id, cloneSignal(signal)]));
	}

	protected async persist(): Promise<void> {
		// nothing to write
	}
}
