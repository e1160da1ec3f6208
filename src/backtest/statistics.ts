import { mean, populationStdDev, quantile } from "../indicators/window";
import type { BacktestResult } from "../types";

export type PerformanceGrade = "excellent" | "good" | "profitable" | "loss";

export const PERFORMANCE_GRADES: readonly PerformanceGrade[] = [
	"excellent",
	"good",
	"profitable",
	"loss",
];

export type RiskGrade = "low" | "medium" | "high";

export type DetailMode = "top3" | "top5" | "positive" | "all" | "none";

export const DETAIL_MODES: readonly DetailMode[] = ["top3", "top5", "positive", "all", "none"];

export type ResultsSummary = {
	instruments: number;
	profitable: number;
	avgReturn: number;
	medianReturn: number;
	avgWinRate: number;
	avgMaxDrawdown: number;
	best: { symbol: string; totalReturn: number };
	worst: { symbol: string; totalReturn: number };
};

export type RiskProfile = {
	meanReturn: number;
	stdReturn: number;
	sharpeRatio: number;
	percentile5: number;
	worstReturn: number;
	successRate: number;
	grade: RiskGrade;
};

export function gradePerformance(totalReturn: number): PerformanceGrade {
	if (totalReturn > 20) return "excellent";
	if (totalReturn > 10) return "good";
	if (totalReturn > 0) return "profitable";
	return "loss";
}

export function gradeDistribution(
	results: readonly BacktestResult[],
): Record<PerformanceGrade, number> {
	const counts: Record<PerformanceGrade, number> = { excellent: 0, good: 0, profitable: 0, loss: 0 };
	for (const result of results) {
		counts[gradePerformance(result.totalReturn)] += 1;
	}
	return counts;
}

function median(values: readonly number[]): number {
	return quantile(values, 0.5);
}

export function summarizeResults(results: readonly BacktestResult[]): ResultsSummary | null {
	if (!results.length) return null;

	const returns = results.map((result) => result.totalReturn);
	const best = results.reduce((acc, result) => (result.totalReturn > acc.totalReturn ? result : acc));
	const worst = results.reduce((acc, result) => (result.totalReturn < acc.totalReturn ? result : acc));

	return {
		instruments: results.length,
		profitable: returns.filter((value) => value > 0).length,
		avgReturn: mean(returns),
		medianReturn: median(returns),
		avgWinRate: mean(results.map((result) => result.winRate)),
		avgMaxDrawdown: mean(results.map((result) => result.maxDrawdown)),
		best: { symbol: best.symbol, totalReturn: best.totalReturn },
		worst: { symbol: worst.symbol, totalReturn: worst.totalReturn },
	};
}

export function analyzeRisk(results: readonly BacktestResult[]): RiskProfile | null {
	if (!results.length) return null;

	const returns = results.map((result) => result.totalReturn);
	const meanReturn = mean(returns);
	const stdReturn = populationStdDev(returns);

	let grade: RiskGrade = "high";
	if (stdReturn <= 10) grade = "low";
	else if (stdReturn <= 20) grade = "medium";

	return {
		meanReturn,
		stdReturn,
		sharpeRatio: stdReturn > 0 ? meanReturn / stdReturn : 0,
		percentile5: quantile(returns, 0.05),
		worstReturn: Math.min(...returns),
		successRate: (returns.filter((value) => value > 0).length / returns.length) * 100,
		grade,
	};
}

export function isDetailMode(value: string): value is DetailMode {
	return DETAIL_MODES.some((mode) => mode === value);
}

/** Expects results already sorted best first. */
export function selectForDetail(
	results: readonly BacktestResult[],
	mode: DetailMode,
): BacktestResult[] {
	switch (mode) {
		case "top3":
			return results.slice(0, 3);
		case "top5":
			return results.slice(0, 5);
		case "positive":
			return results.filter((result) => result.totalReturn > 0);
		case "all":
			return [...results];
		case "none":
			return [];
	}
}
