import type { EmissionSwitch } from "@longwatch/core";

export class InMemoryEmissionSwitch implements EmissionSwitch {
	constructor(private muted = false) {}

	async isMuted(): Promise<boolean> {
		return this.muted;
	}

	async setMuted(muted: boolean): Promise<void> {
		this.muted = muted;
	}
}
