import { NEVER, fromEvent } from "rxjs";
import { computeIndicators } from "../indicators";
import { activeSignals, detectBreakout, evaluateSignals } from "../signals/rules";
import type { InstrumentAnalysis, PriceBar, StrategySettings } from "../types";
import { describeError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sleepUntil } from "../utils/retry";

export type Analyzer = (symbol: string) => Promise<InstrumentAnalysis | null>;

/** Latest-bar analysis, or null when no indicator row is defined yet. */
export function analyzeSeries(
	symbol: string,
	bars: readonly PriceBar[],
	strategy: StrategySettings,
): InstrumentAnalysis | null {
	const rows = computeIndicators(bars, strategy.indicators);
	const row = rows[rows.length - 1];
	if (!row) return null;
	const previous = rows.length > 1 ? rows[rows.length - 2] : null;

	return {
		symbol,
		timestamp: row.timestamp,
		price: row.close,
		row,
		signals: evaluateSignals(row, previous, strategy),
		breakout: detectBreakout(row, previous, strategy),
	};
}

export type OverviewRow = {
	symbol: string;
	price: number;
	rsi: number;
	bbPosition: number | null;
	squeeze: boolean;
	signals: string;
};

export type OverviewOptions = {
	/** delay between instruments */
	pacingMs?: number;
	signal?: AbortSignal;
};

/** Startup snapshot of the watchlist. Stops early once `signal` aborts. */
export async function buildMarketOverview(
	symbols: readonly string[],
	analyze: Analyzer,
	{ pacingMs = 0, signal }: OverviewOptions = {},
): Promise<OverviewRow[]> {
	const aborted$ = signal ? fromEvent(signal, "abort") : NEVER;
	const rows: OverviewRow[] = [];
	for (const [i, symbol] of symbols.entries()) {
		if (signal?.aborted) break;
		if (i > 0) await sleepUntil(pacingMs, aborted$);
		if (signal?.aborted) break;

		try {
			const analysis = await analyze(symbol);
			if (!analysis) continue;
			rows.push({
				symbol,
				price: analysis.price,
				rsi: analysis.row.rsi,
				bbPosition: analysis.row.bbPosition,
				squeeze: analysis.row.isSqueeze,
				signals: activeSignals(analysis.signals).join(",") || "-",
			});
		} catch (error) {
			logger.error(
				{ symbol, reason: describeError(error) },
				"Market overview skipped instrument",
			);
		}
	}
	return rows;
}
