import {
	DEFAULT_SIGNAL_POLICY,
	type GradingPolicy,
	type SignalGrade,
} from "@longwatch/core";
import type { TrendMargins } from "./trendFilter";

export interface GradeInput {
	triggerCount: number;
	margins: TrendMargins;
	stopDistancePct: number;
}

export const isStrongAlignment = (
	margins: TrendMargins,
	policy: GradingPolicy = DEFAULT_SIGNAL_POLICY.grading
): boolean =>
	margins.trendEmaPct !== null &&
	margins.slowEmaPct !== null &&
	margins.rsiInset !== null &&
	margins.trendEmaPct >= policy.strongEma200MarginPct &&
	margins.slowEmaPct >= policy.strongEma50MarginPct &&
	margins.rsiInset >= policy.strongRsiInset;

/**
 * | triggers | strong, normal stop | strong, wide stop | weak |
 * | 4        | A                   | A                 | A    |
 * | 3        | A                   | B                 | B    |
 * | 2        | B                   | C                 | C    |
 */
export function gradeSignal(
	input: GradeInput,
	policy: GradingPolicy = DEFAULT_SIGNAL_POLICY.grading
): SignalGrade {
	if (input.triggerCount >= 4) {
		return "A";
	}
	const clean =
		isStrongAlignment(input.margins, policy) &&
		input.stopDistancePct <= policy.wideStopPct;
	if (input.triggerCount === 3) {
		return clean ? "A" : "B";
	}
	return clean ? "B" : "C";
}
