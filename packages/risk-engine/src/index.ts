import {
	DEFAULT_SIGNAL_POLICY,
	DegenerateRiskError,
	type RiskProfile,
	type SizingPolicy,
} from "@longwatch/core";

export interface SizingInput {
	entryPrice: number;
	atr: number | null;
	swingLow: number | null;
}

export type SizingProfile = Pick<RiskProfile, "riskPerTradePct" | "accountEquity">;

export interface RiskPlan {
	stopLoss: number;
	takeProfit1: number;
	takeProfit2: number;
	positionSize: number;
	riskPerUnit: number;
	riskAmount: number;
	riskRewardRatio: number;
	stopDistancePct: number;
}

/**
 * Stop below the wider of the swing low and the ATR buffer, targets at fixed
 * R multiples, size so that a stop-out loses `riskPerTradePct` of equity.
 */
export class RiskSizer {
	constructor(private readonly policy: SizingPolicy = DEFAULT_SIGNAL_POLICY.sizing) {}

	/**
	 * @throws DegenerateRiskError when no valid plan exists for the inputs
	 */
	size(input: SizingInput, profile: SizingProfile): RiskPlan {
		this.validateProfile(profile);
		const { entryPrice } = input;

		const swingDistance =
			input.swingLow === null ? 0 : entryPrice - input.swingLow;
		const atrDistance =
			input.atr === null ? 0 : this.policy.atrStopMultiple * input.atr;
		const stopLoss = entryPrice - Math.max(swingDistance, atrDistance);
		const riskPerUnit = entryPrice - stopLoss;

		if (!Number.isFinite(riskPerUnit) || riskPerUnit <= 0) {
			throw new DegenerateRiskError(
				"non_positive_risk",
				`Risk per unit must be positive, got ${riskPerUnit}`
			);
		}
		if (stopLoss <= 0) {
			throw new DegenerateRiskError(
				"invalid_stop",
				`Stop loss ${stopLoss} is not above zero`
			);
		}

		const stopDistancePct = (riskPerUnit / entryPrice) * 100;
		if (stopDistancePct < this.policy.minStopDistancePct) {
			throw new DegenerateRiskError(
				"stop_too_close",
				`Stop distance ${stopDistancePct.toFixed(2)}% is below ${this.policy.minStopDistancePct}%`
			);
		}
		if (stopDistancePct > this.policy.maxStopDistancePct) {
			throw new DegenerateRiskError(
				"stop_too_far",
				`Stop distance ${stopDistancePct.toFixed(2)}% is above ${this.policy.maxStopDistancePct}%`
			);
		}

		const takeProfit1 = entryPrice + this.policy.takeProfit1R * riskPerUnit;
		const takeProfit2 = entryPrice + this.policy.takeProfit2R * riskPerUnit;
		const riskAmount = (profile.accountEquity * profile.riskPerTradePct) / 100;
		const positionSize = parseFloat((riskAmount / riskPerUnit).toFixed(6));

		return {
			stopLoss,
			takeProfit1,
			takeProfit2,
			positionSize,
			riskPerUnit,
			riskAmount,
			riskRewardRatio: (takeProfit1 - entryPrice) / riskPerUnit,
			stopDistancePct,
		};
	}

	private validateProfile(profile: SizingProfile): void {
		if (!Number.isFinite(profile.accountEquity) || profile.accountEquity <= 0) {
			throw new DegenerateRiskError(
				"invalid_equity",
				`Account equity must be positive, got ${profile.accountEquity}`
			);
		}
		const pct = profile.riskPerTradePct;
		if (!Number.isFinite(pct) || pct <= 0 || pct > this.policy.maxRiskPerTradePct) {
			throw new DegenerateRiskError(
				"invalid_risk_pct",
				`Risk per trade ${pct}% must be in (0, ${this.policy.maxRiskPerTradePct}]`
			);
		}
	}
}
