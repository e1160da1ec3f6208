import { getPriceSeries } from "../clients/binance";
import { config } from "../config";
import { warmupIndex } from "../indicators";
import type { PriceBar, StrategySettings } from "../types";
import { type Analyzer, analyzeSeries } from "./analysis";

/** Shortest series worth analysing: the volatility lookback, or the warm-up if longer. */
export function minimumBars(strategy: StrategySettings): number {
	return Math.max(
		strategy.indicators.volatilityLookback,
		warmupIndex(strategy.indicators) + 1,
	);
}

export function loadDailySeries(
	symbol: string,
	days: number,
	strategy: StrategySettings,
): Promise<PriceBar[]> {
	const minBars = minimumBars(strategy);
	return getPriceSeries(symbol, Math.max(days, minBars), minBars);
}

export function createAnalyzer(strategy: StrategySettings): Analyzer {
	return async (symbol) => {
		const bars = await loadDailySeries(symbol, config.monitor.barCount, strategy);
		return analyzeSeries(symbol, bars, strategy);
	};
}
