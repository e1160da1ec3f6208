import path from "node:path";
import { stringify } from "csv-stringify";
import { formatTimestamp } from "../services/messages";
import type { BacktestResult, StrategySettings } from "../types";
import { appendLines, writeJson, writeText } from "../utils/storage";
import type { BatchOutcome } from "./batch";
import {
	PERFORMANCE_GRADES,
	type PerformanceGrade,
	analyzeRisk,
	gradeDistribution,
	gradePerformance,
	summarizeResults,
} from "./statistics";

export const RESULT_COLUMNS = [
	"Symbol",
	"TotalReturnPct",
	"AnnualizedReturnPct",
	"WinRatePct",
	"TotalTrades",
	"WinningTrades",
	"AvgProfitPct",
	"AvgLossPct",
	"ProfitFactor",
	"MaxDrawdownPct",
	"FinalValue",
	"TestPeriodDays",
	"Grade",
] as const;

type ResultColumn = (typeof RESULT_COLUMNS)[number];

export type BacktestRun = {
	initialCapital: number;
	days: number;
};

export type ArtifactPaths = {
	resultsDir: string;
	reportsDir: string;
	tradeLog: string;
};

function fixed(value: number, digits = 2): string {
	if (value === Number.POSITIVE_INFINITY) return "inf";
	return value.toFixed(digits);
}

function toCsvRow(result: BacktestResult): Record<ResultColumn, string | number> {
	return {
		Symbol: result.symbol,
		TotalReturnPct: fixed(result.totalReturn),
		AnnualizedReturnPct: fixed(result.annualizedReturn),
		WinRatePct: fixed(result.winRate, 1),
		TotalTrades: result.totalTrades,
		WinningTrades: result.winningTrades,
		AvgProfitPct: fixed(result.avgProfit),
		AvgLossPct: fixed(result.avgLoss),
		ProfitFactor: fixed(result.profitFactor),
		MaxDrawdownPct: fixed(result.maxDrawdown),
		FinalValue: fixed(result.finalValue),
		TestPeriodDays: result.testPeriodDays,
		Grade: gradePerformance(result.totalReturn),
	};
}

export function renderResultsCsv(results: readonly BacktestResult[]): Promise<string> {
	return new Promise<string>((resolve, reject) => {
		stringify(
			results.map(toCsvRow),
			{ header: true, columns: [...RESULT_COLUMNS] },
			(err, output) => {
				if (err) reject(err);
				else resolve(output);
			},
		);
	});
}

function money(value: number): string {
	return value.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

export function renderInvestmentReport(
	result: BacktestResult,
	strategy: StrategySettings,
): string {
	const rule = "=".repeat(60);
	const profit = result.finalValue - result.initialCapital;
	const first = result.equityCurve[0];
	const last = result.equityCurve[result.equityCurve.length - 1];

	const lines = [
		rule,
		`Investment report: ${result.symbol}`,
		rule,
		`Strategy profile: ${strategy.profile} (buy rule: ${strategy.buyRule}, squeeze: ${strategy.indicators.squeezePolicy})`,
		first && last
			? `Period: ${formatTimestamp(first.timestamp)} → ${formatTimestamp(last.timestamp)} (${result.testPeriodDays} bars)`
			: `Period: ${result.testPeriodDays} bars`,
		"",
		`Initial capital:   ${money(result.initialCapital)}`,
		`Final value:       ${money(result.finalValue)}`,
		`Profit:            ${money(profit)}`,
		`Total return:      ${fixed(result.totalReturn)}%`,
		`Annualized return: ${fixed(result.annualizedReturn)}%`,
		`Max drawdown:      ${fixed(result.maxDrawdown)}%`,
		`Grade:             ${gradePerformance(result.totalReturn)}`,
		"",
		`Round trips: ${result.totalTrades} (won ${result.winningTrades}, win rate ${fixed(result.winRate, 1)}%)`,
		`Average win: ${fixed(result.avgProfit)}%  Average loss: ${fixed(result.avgLoss)}%  Profit factor: ${fixed(result.profitFactor)}`,
		"",
		"Trades:",
	];

	if (!result.trades.length) {
		lines.push("  (none)");
	}
	for (const trade of result.trades) {
		lines.push(
			`  ${formatTimestamp(trade.timestamp)}  ${trade.action.padEnd(8)} @ ${trade.price.toPrecision(6)}  value ${money(trade.cashValue)}${trade.forced ? "  (end of test)" : ""}`,
		);
	}

	return lines.join("\n");
}

function signed(value: number): string {
	return `${value > 0 ? "+" : ""}${fixed(value)}%`;
}

const GRADE_RANGES: Record<PerformanceGrade, string> = {
	excellent: "above 20%",
	good: "10% to 20%",
	profitable: "0% to 10%",
	loss: "0% or less",
};

/** Batch overview. Expects `outcome.results` ranked best first. */
export function renderBatchReport(
	outcome: BatchOutcome,
	strategy: StrategySettings,
	initialCapital: number,
	days: number,
): string {
	const rule = "=".repeat(60);
	const { thresholds, indicators } = strategy;
	const lines = [
		rule,
		"Backtest report",
		rule,
		`Strategy profile: ${strategy.profile} (buy rule: ${strategy.buyRule}, squeeze: ${indicators.squeezePolicy})`,
		`Initial capital: ${money(initialCapital)} per instrument`,
		`History: ${days} days`,
		"",
	];

	const summary = summarizeResults(outcome.results);
	const risk = analyzeRisk(outcome.results);
	if (!summary || !risk) {
		lines.push(`No instrument produced a result (${outcome.failures.length} excluded).`, "");
	} else {
		const grades = gradeDistribution(outcome.results);
		lines.push(
			`Instruments tested: ${summary.instruments} (excluded: ${outcome.failures.length})`,
			`Profitable: ${summary.profitable} of ${summary.instruments} (${fixed(risk.successRate, 1)}%)`,
			`Average return: ${signed(summary.avgReturn)}`,
			`Median return: ${signed(summary.medianReturn)}`,
			`Average win rate: ${fixed(summary.avgWinRate, 1)}%`,
			`Average max drawdown: ${fixed(summary.avgMaxDrawdown)}%`,
			`Risk: ${risk.grade} (return stddev ${fixed(risk.stdReturn)}%, sharpe ${fixed(risk.sharpeRatio)})`,
			"",
			"Grade distribution:",
			...PERFORMANCE_GRADES.map(
				(grade) => `  ${grade.padEnd(11)}${GRADE_RANGES[grade].padEnd(12)}${grades[grade]}`,
			),
			"",
			"Top performers:",
			...outcome.results
				.slice(0, 3)
				.map(
					(result, i) =>
						`  ${i + 1}. ${result.symbol}  ${signed(result.totalReturn)}  profit ${money(result.finalValue - result.initialCapital)}`,
				),
			"",
		);
	}

	lines.push(
		"Strategy parameters:",
		`  RSI overbought: ${thresholds.rsiOverbought}`,
		`  Sell half at band position: ${thresholds.sell50Position}`,
		`  Sell all at band position: ${thresholds.sellAllPosition}`,
		`  Bollinger bands: ${indicators.bbPeriod} bars, ${indicators.bbStdMultiplier} std`,
		`  RSI period: ${indicators.rsiPeriod}`,
	);
	return lines.join("\n");
}

function fileStamp(now: Date): string {
	return now.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "_");
}

/**
 * Writes the results table, the summary, the batch report, the trade log and
 * one report per detailed result.
 */
export async function writeBacktestArtifacts(
	outcome: BatchOutcome,
	detailed: readonly BacktestResult[],
	strategy: StrategySettings,
	run: BacktestRun,
	paths: ArtifactPaths,
	now: Date = new Date(),
): Promise<string[]> {
	const stamp = fileStamp(now);
	const written: string[] = [];

	const csvPath = path.join(paths.resultsDir, `backtest_results_${stamp}.csv`);
	await writeText(csvPath, await renderResultsCsv(outcome.results));
	written.push(csvPath);

	const summaryPath = path.join(paths.resultsDir, `backtest_summary_${stamp}.json`);
	await writeJson(summaryPath, {
		generatedAt: now.toISOString(),
		profile: strategy.profile,
		summary: summarizeResults(outcome.results),
		risk: analyzeRisk(outcome.results),
		failures: outcome.failures,
	});
	written.push(summaryPath);

	const batchReportPath = path.join(paths.reportsDir, `backtest_report_${stamp}.txt`);
	await writeText(
		batchReportPath,
		renderBatchReport(outcome, strategy, run.initialCapital, run.days),
	);
	written.push(batchReportPath);

	await appendLines(
		paths.tradeLog,
		outcome.results.flatMap((result) => result.trades.map((trade) => JSON.stringify(trade))),
	);

	for (const result of detailed) {
		const reportPath = path.join(paths.reportsDir, `${result.symbol}_report_${stamp}.txt`);
		await writeText(reportPath, renderInvestmentReport(result, strategy));
		written.push(reportPath);
	}

	return written;
}
