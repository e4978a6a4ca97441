import {
	createLogger,
	formatSignalMessage,
	type ModuleLogger,
	type Notifier,
	type SignalEvent,
} from "@longwatch/core";

/**
 * Writes signal events to the structured log. New signals carry the
 * formatted alert text; status changes only the transition.
 */
export class LogNotifier implements Notifier {
	constructor(
		private readonly logger: ModuleLogger = createLogger("notifier"),
		private readonly maxHoldDurationMs?: number
	) {}

	async publish(event: SignalEvent): Promise<void> {
		const { signal } = event;
		if (event.type === "signal_created") {
			this.logger.info("signal_alert", {
				id: signal.id,
				symbol: signal.symbol,
				grade: signal.grade,
				message: formatSignalMessage(signal, { maxHoldDurationMs: this.maxHoldDurationMs }),
			});
			return;
		}
		this.logger.info("signal_update", {
			id: signal.id,
			symbol: signal.symbol,
			from: event.previousStatus ?? null,
			to: signal.status,
			outcome: signal.outcome,
		});
	}
}
