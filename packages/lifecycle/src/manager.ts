import {
	SignalNotFoundError,
	buildSignalId,
	createLogger,
	describeError,
	hasLongOrdering,
	normalizeSymbol,
	withTimeout,
	type Candle,
	type EmissionSwitch,
	type LifecycleCommand,
	type Notifier,
	type PairWatchStore,
	type RiskProfile,
	type RiskProfileScope,
	type RiskProfileStore,
	type Signal,
	type SignalCandidate,
	type SignalEvent,
	type SignalOutcome,
	type SignalStore,
} from "@longwatch/core";
import { LedgerTransaction, SignalLedger } from "./ledger";

const logger = createLogger("lifecycle");

export type AdmissionRejection =
	| "invalid_levels"
	| "pair_disabled"
	| "emission_muted"
	| "duplicate_pair"
	| "capacity_reached";

export type AdmissionResult =
	| { admitted: true; signal: Signal }
	| { admitted: false; reason: AdmissionRejection };

export interface SignalLifecycleOptions {
	store: SignalStore;
	pairs: PairWatchStore;
	emission: EmissionSwitch;
	riskProfiles: RiskProfileStore;
	notifier?: Notifier;
	riskScope?: RiskProfileScope;
	now?: () => number;
	/** Publish attempts per event before giving up. */
	notifyAttempts?: number;
	notifyTimeoutMs?: number;
}

interface PriceExit {
	outcome: Extract<SignalOutcome, "stop_loss" | "take_profit_1" | "take_profit_2">;
}

/**
 * A pending signal whose candle sits wholly below the entry and reaches the
 * stop never filled; the setup is void.
 */
const invalidatesPending = (signal: Signal, candle: Candle): boolean =>
	candle.high < signal.entryPrice && candle.low <= signal.stopLoss;

const detectExit = (signal: Signal, candle: Candle): PriceExit | null => {
	if (candle.low <= signal.stopLoss) {
		return { outcome: "stop_loss" };
	}
	if (candle.high >= signal.takeProfit2) {
		return { outcome: "take_profit_2" };
	}
	if (candle.high >= signal.takeProfit1) {
		return { outcome: "take_profit_1" };
	}
	return null;
};

/**
 * Owner of every signal state change. Admission, sweeps, price updates and
 * external commands all run as ledger transactions; notifications go out
 * after the commit and never hold the ledger.
 */
export class SignalLifecycleManager {
	private readonly ledger: SignalLedger;
	private readonly now: () => number;
	private readonly riskScope: RiskProfileScope;
	private readonly notifyAttempts: number;
	private readonly notifyTimeoutMs: number;
	private readonly deliveries = new Set<Promise<void>>();

	constructor(private readonly options: SignalLifecycleOptions) {
		this.now = options.now ?? Date.now;
		this.riskScope = options.riskScope ?? "global";
		this.notifyAttempts = Math.max(1, options.notifyAttempts ?? 3);
		this.notifyTimeoutMs = options.notifyTimeoutMs ?? 10_000;
		this.ledger = new SignalLedger(options.store, (events) => this.dispatch(events));
	}

	async admit(candidate: SignalCandidate): Promise<AdmissionResult> {
		const result = await this.ledger.transaction((tx) => this.decideAdmission(tx, candidate));
		if (result.admitted) {
			logger.info("signal_admitted", {
				id: result.signal.id,
				symbol: result.signal.symbol,
				grade: result.signal.grade,
				entry: result.signal.entryPrice,
				expiresAt: result.signal.expiresAt,
			});
		} else {
			logger.info("admission_rejected", {
				symbol: candidate.symbol,
				grade: candidate.grade,
				reason: result.reason,
			});
		}
		return result;
	}

	/**
	 * Expires open signals past their TTL, and active ones held past the max
	 * hold duration. Running it twice at the same instant changes nothing the
	 * second time.
	 */
	async sweepExpired(now: number = this.now()): Promise<Signal[]> {
		const profile = await this.riskProfile();
		const expired = await this.ledger.transaction(async (tx) => {
			const changed: Signal[] = [];
			for (const signal of [...tx.open]) {
				const outcome = this.expiryOutcome(signal, profile, now);
				if (outcome) {
					changed.push(
						await tx.transition(signal, "expired", {
							outcome,
							closedAt: now,
							updatedAt: now,
						})
					);
				}
			}
			return changed;
		});
		for (const signal of expired) {
			logger.info("signal_expired", { id: signal.id, symbol: signal.symbol, outcome: signal.outcome });
		}
		return expired;
	}

	async sweepRetention(now: number = this.now()): Promise<number> {
		const profile = await this.riskProfile();
		const archived = await this.ledger.transaction((tx) =>
			tx.archiveOlderThan(profile.retentionMs, now)
		);
		if (archived > 0) {
			logger.info("signals_archived", { archived, retentionMs: profile.retentionMs });
		}
		return archived;
	}

	/**
	 * Walks candles opened at or after the signal's creation: touching the
	 * entry activates a pending signal, crossing the stop or a target
	 * triggers an active one. The stop is checked first.
	 */
	async applyPrice(symbol: string, candles: Candle[]): Promise<Signal | null> {
		const now = this.now();
		return this.ledger.transaction(async (tx) => {
			let signal = tx.openForPair(symbol);
			if (!signal) {
				return null;
			}
			const { createdAt, expiresAt } = signal;
			const fresh = candles.filter(
				(candle) => candle.timestamp >= createdAt && candle.timestamp <= expiresAt
			);
			for (const candle of fresh) {
				const touchesEntry =
					candle.low <= signal.entryPrice && candle.high >= signal.entryPrice;
				if (signal.status === "pending" && touchesEntry) {
					signal = await tx.transition(signal, "active", {
						activatedAt: candle.timestamp,
						updatedAt: now,
					});
					logger.info("signal_activated", { id: signal.id, symbol, price: signal.entryPrice });
				}
				if (signal.status === "pending") {
					if (invalidatesPending(signal, candle)) {
						signal = await tx.transition(signal, "cancelled", {
							outcome: "invalidated",
							closedAt: now,
							updatedAt: now,
						});
						logger.info("signal_invalidated", { id: signal.id, symbol, low: candle.low });
						break;
					}
					continue;
				}
				const exit = detectExit(signal, candle);
				if (exit) {
					signal = await tx.transition(signal, "triggered", {
						outcome: exit.outcome,
						triggeredAt: candle.timestamp,
						closedAt: now,
						updatedAt: now,
					});
					logger.info("signal_triggered", { id: signal.id, symbol, outcome: exit.outcome });
					break;
				}
			}
			return signal;
		});
	}

	async markActive(id: string): Promise<Signal> {
		const now = this.now();
		return this.applyCommand(id, (tx, signal) =>
			tx.transition(signal, "active", { activatedAt: now, updatedAt: now })
		);
	}

	async markTriggered(id: string): Promise<Signal> {
		const now = this.now();
		return this.applyCommand(id, (tx, signal) =>
			tx.transition(signal, "triggered", {
				outcome: "acknowledged",
				triggeredAt: now,
				closedAt: now,
				updatedAt: now,
			})
		);
	}

	async cancel(id: string): Promise<Signal> {
		const now = this.now();
		return this.applyCommand(id, (tx, signal) =>
			tx.transition(signal, "cancelled", {
				outcome: "manual_cancel",
				closedAt: now,
				updatedAt: now,
			})
		);
	}

	/**
	 * Disables the pair and cancels its open signal, if any.
	 */
	async mutePair(rawSymbol: string): Promise<Signal | null> {
		const symbol = normalizeSymbol(rawSymbol);
		const now = this.now();
		const cancelled = await this.ledger.transaction(async (tx) => {
			const open = tx.openForPair(symbol);
			const result = open
				? await tx.transition(open, "cancelled", {
						outcome: "pair_muted",
						closedAt: now,
						updatedAt: now,
					})
				: null;
			// only after the cancel is stored, so a failed write leaves the pair watched
			await this.options.pairs.setPairEnabled(symbol, false);
			return result;
		});
		logger.info("pair_muted", { symbol, cancelled: cancelled?.id ?? null });
		return cancelled;
	}

	async handleCommand(command: LifecycleCommand): Promise<Signal | null> {
		switch (command.type) {
			case "markActive":
				return this.markActive(command.id);
			case "markTriggered":
				return this.markTriggered(command.id);
			case "cancel":
				return this.cancel(command.id);
			case "mutePair":
				return this.mutePair(command.symbol);
		}
	}

	async listOpen(): Promise<Signal[]> {
		return this.options.store.listOpen();
	}

	/**
	 * Resolves once every notification started so far has settled.
	 */
	async flushNotifications(): Promise<void> {
		await Promise.all(Array.from(this.deliveries));
	}

	private async decideAdmission(
		tx: LedgerTransaction,
		candidate: SignalCandidate
	): Promise<AdmissionResult> {
		const symbol = normalizeSymbol(candidate.symbol);
		if (!hasLongOrdering(candidate)) {
			return { admitted: false, reason: "invalid_levels" };
		}
		if (!(await this.options.pairs.isEnabled(symbol))) {
			return { admitted: false, reason: "pair_disabled" };
		}
		if (await this.options.emission.isMuted()) {
			return { admitted: false, reason: "emission_muted" };
		}
		if (tx.openForPair(symbol)) {
			return { admitted: false, reason: "duplicate_pair" };
		}
		const profile = await this.riskProfile();
		if (tx.open.length >= profile.maxConcurrentSignals) {
			return { admitted: false, reason: "capacity_reached" };
		}

		const createdAt = this.now();
		const signal = await tx.create({
			id: buildSignalId(symbol, candidate.timeframe, createdAt),
			symbol,
			timeframe: candidate.timeframe,
			entryPrice: candidate.entryPrice,
			stopLoss: candidate.stopLoss,
			takeProfit1: candidate.takeProfit1,
			takeProfit2: candidate.takeProfit2,
			grade: candidate.grade,
			riskPct: candidate.riskPct,
			positionSize: candidate.positionSize,
			riskAmount: candidate.riskAmount,
			riskRewardRatio: candidate.riskRewardRatio,
			triggers: [...candidate.triggers],
			rationale: candidate.rationale,
			status: "pending",
			outcome: null,
			expiresAt: createdAt + profile.signalTtlMs,
			activatedAt: null,
			triggeredAt: null,
			closedAt: null,
			createdAt,
			updatedAt: createdAt,
		});
		return { admitted: true, signal };
	}

	private async applyCommand(
		id: string,
		apply: (tx: LedgerTransaction, signal: Signal) => Promise<Signal>
	): Promise<Signal> {
		return this.ledger.transaction(async (tx) => {
			const signal = await tx.get(id);
			if (!signal) {
				throw new SignalNotFoundError(id);
			}
			const updated = await apply(tx, signal);
			logger.info("signal_command_applied", {
				id,
				from: signal.status,
				to: updated.status,
			});
			return updated;
		});
	}

	private expiryOutcome(
		signal: Signal,
		profile: RiskProfile,
		now: number
	): SignalOutcome | null {
		if (now > signal.expiresAt) {
			return "ttl_elapsed";
		}
		if (
			signal.status === "active" &&
			signal.activatedAt !== null &&
			now - signal.activatedAt > profile.maxHoldDurationMs
		) {
			return "max_hold_elapsed";
		}
		return null;
	}

	private riskProfile(): Promise<RiskProfile> {
		return this.options.riskProfiles.getRiskProfile(this.riskScope);
	}

	private dispatch(events: SignalEvent[]): void {
		const notifier = this.options.notifier;
		if (!notifier) {
			return;
		}
		const delivery = this.deliver(notifier, events).finally(() => {
			this.deliveries.delete(delivery);
		});
		this.deliveries.add(delivery);
	}

	private async deliver(notifier: Notifier, events: SignalEvent[]): Promise<void> {
		for (const event of events) {
			for (let attempt = 1; attempt <= this.notifyAttempts; attempt += 1) {
				try {
					await withTimeout(notifier.publish(event), this.notifyTimeoutMs, "notifier.publish");
					break;
				} catch (err) {
					logger.warn("notify_failed", {
						id: event.signal.id,
						type: event.type,
						attempt,
						maxAttempts: this.notifyAttempts,
						error: describeError(err),
					});
				}
			}
		}
	}
}
