import type { RiskProfile, RiskProfileScope, RiskProfileStore } from "@longwatch/core";

/**
 * Scoped profiles fall back to the global one.
 */
export class InMemoryRiskProfileStore implements RiskProfileStore {
	private readonly profiles = new Map<RiskProfileScope, RiskProfile>();

	constructor(globalProfile: RiskProfile) {
		this.profiles.set("global", { ...globalProfile });
	}

	async getRiskProfile(scope: RiskProfileScope): Promise<RiskProfile> {
		const profile = this.profiles.get(scope) ?? this.profiles.get("global");
		if (!profile) {
			throw new Error(`No risk profile for ${scope}`);
		}
		return { ...profile };
	}

	async setRiskProfile(scope: RiskProfileScope, profile: RiskProfile): Promise<void> {
		this.profiles.set(scope, { ...profile });
	}
}
