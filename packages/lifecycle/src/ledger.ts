import {
	InvalidTransitionError,
	Semaphore,
	canTransition,
	isOpenStatus,
	normalizeSymbol,
	type Signal,
	type SignalEvent,
	type SignalStatus,
	type SignalStatusPatch,
	type SignalStore,
} from "@longwatch/core";

/**
 * View of the open set inside one transaction. Writes go straight to the
 * store; a write that resolves is committed.
 */
export class LedgerTransaction {
	readonly committed: SignalEvent[] = [];
	private readonly openSignals: Signal[];

	constructor(
		private readonly store: SignalStore,
		open: Signal[]
	) {
		this.openSignals = open;
	}

	get open(): readonly Signal[] {
		return this.openSignals;
	}

	openForPair(symbol: string): Signal | null {
		const key = normalizeSymbol(symbol);
		return this.openSignals.find((signal) => normalizeSymbol(signal.symbol) === key) ?? null;
	}

	async get(id: string): Promise<Signal | null> {
		return this.openSignals.find((signal) => signal.id === id) ?? this.store.get(id);
	}

	async create(signal: Signal): Promise<Signal> {
		await this.store.create(signal);
		this.openSignals.push(signal);
		this.committed.push({ type: "signal_created", signal });
		return signal;
	}

	/**
	 * @throws InvalidTransitionError when the state machine forbids the move
	 */
	async transition(
		signal: Signal,
		to: SignalStatus,
		patch: SignalStatusPatch
	): Promise<Signal> {
		if (!canTransition(signal.status, to)) {
			throw new InvalidTransitionError(signal.id, signal.status, to);
		}
		const updated = await this.store.updateStatus(signal.id, to, patch);
		const index = this.openSignals.findIndex((entry) => entry.id === signal.id);
		if (isOpenStatus(updated.status)) {
			if (index === -1) {
				this.openSignals.push(updated);
			} else {
				this.openSignals[index] = updated;
			}
		} else if (index !== -1) {
			this.openSignals.splice(index, 1);
		}
		this.committed.push({
			type: "signal_status_changed",
			signal: updated,
			previousStatus: signal.status,
		});
		return updated;
	}

	async archiveOlderThan(maxAgeMs: number, now: number): Promise<number> {
		return this.store.archiveOlderThan(maxAgeMs, now);
	}
}

export type CommitListener = (events: SignalEvent[]) => void;

/**
 * Serializes every read-decide-write over the open signal set behind one
 * permit. `onCommit` runs after the permit is released.
 */
export class SignalLedger {
	private readonly lock = new Semaphore(1);

	constructor(
		private readonly store: SignalStore,
		private readonly onCommit: CommitListener = () => undefined
	) {}

	get pendingTransactions(): number {
		return this.lock.waiting;
	}

	async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
		let committed: SignalEvent[] = [];
		try {
			return await this.lock.run(async () => {
				const tx = new LedgerTransaction(this.store, await this.store.listOpen());
				try {
					return await work(tx);
				} finally {
					committed = tx.committed;
				}
			});
		} finally {
			if (committed.length) {
				this.onCommit(committed);
			}
		}
	}
}
