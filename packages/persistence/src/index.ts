import type {
	EmissionSwitch,
	PairWatchStore,
	PersistenceDriver,
	RiskProfile,
	RiskProfileStore,
	SignalStore,
} from "@longwatch/core";
import { InMemoryEmissionSwitch } from "./emissionSwitch";
import { JsonFileSignalStore } from "./jsonFileSignalStore";
import { InMemoryPairWatchStore } from "./pairWatchStore";
import { InMemoryRiskProfileStore } from "./riskProfileStore";
import { InMemorySignalStore } from "./signalStore";

export * from "./signalStore";
export * from "./jsonFileSignalStore";
export * from "./signalCodec";
export * from "./pairWatchStore";
export * from "./riskProfileStore";
export * from "./emissionSwitch";

export interface PersistenceOptions {
	driver: PersistenceDriver;
	/** Signal file location for the `file` driver. */
	signalStorePath?: string;
	defaultPairs: string[];
	riskProfile: RiskProfile;
	now?: () => number;
}

export interface PersistenceLayer {
	signals: SignalStore;
	pairs: PairWatchStore;
	riskProfiles: RiskProfileStore;
	emission: EmissionSwitch;
}

export const createPersistenceLayer = (options: PersistenceOptions): PersistenceLayer => {
	if (options.driver === "file" && !options.signalStorePath) {
		throw new Error("The file persistence driver needs a signal store path");
	}
	return {
		signals:
			options.driver === "file" && options.signalStorePath
				? new JsonFileSignalStore(options.signalStorePath)
				: new InMemorySignalStore(),
		pairs: new InMemoryPairWatchStore(options.defaultPairs, options.now),
		riskProfiles: new InMemoryRiskProfileStore(options.riskProfile),
		emission: new InMemoryEmissionSwitch(),
	};
};
