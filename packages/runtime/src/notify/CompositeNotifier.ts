import { describeError, type Notifier, type SignalEvent } from "@longwatch/core";

/**
 * Fans an event out to every notifier. Rejects when any of them failed, after
 * all have been tried; the caller's retry may then repeat a delivery.
 */
export class CompositeNotifier implements Notifier {
	private readonly notifiers: Notifier[];

	constructor(notifiers: Notifier[]) {
		this.notifiers = [...notifiers];
	}

	get size(): number {
		return this.notifiers.length;
	}

	async publish(event: SignalEvent): Promise<void> {
		const results = await Promise.allSettled(this.notifiers.map((notifier) => notifier.publish(event)));
		const failures = results.flatMap((result) =>
			result.status === "rejected" ? [describeError(result.reason)] : []
		);
		if (failures.length > 0) {
			throw new Error(`${failures.length} of ${this.notifiers.length} notifiers failed: ${failures.join("; ")}`);
		}
	}
}
