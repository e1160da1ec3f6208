import { from, lastValueFrom } from "rxjs";
import { map, mergeMap, toArray } from "rxjs/operators";
import type {
	BacktestFailure,
	BacktestResult,
	PriceBar,
	StrategySettings,
} from "../types";
import { describeError } from "../utils/errors";
import { logger } from "../utils/logger";
import { runBacktest } from "./simulator";

export type BatchOptions = {
	loadSeries: (symbol: string) => Promise<PriceBar[]>;
	strategy: StrategySettings;
	initialCapital: number;
	concurrency?: number;
};

export type BatchOutcome = {
	results: BacktestResult[];
	failures: BacktestFailure[];
};

type InstrumentOutcome =
	| { order: number; ok: true; result: BacktestResult }
	| { order: number; ok: false; failure: BacktestFailure };

const log = logger.child({ component: "backtest" });

/**
 * Backtests each symbol independently. A symbol whose data cannot be loaded
 * or yields no indicator rows becomes a failure entry; the batch carries on.
 * Results come back sorted by total return, best first.
 */
export async function runMultiBacktest(
	symbols: readonly string[],
	options: BatchOptions,
): Promise<BatchOutcome> {
	log.info({ count: symbols.length }, "Starting multi-instrument backtest");

	const outcomes = await lastValueFrom(
		from(symbols.map((symbol, order) => ({ symbol, order }))).pipe(
			mergeMap(async ({ symbol, order }): Promise<InstrumentOutcome> => {
				try {
					const bars = await options.loadSeries(symbol);
					const result = runBacktest(
						symbol,
						bars,
						options.strategy,
						options.initialCapital,
					);
					if (result.insufficientData) {
						log.warn({ symbol, bars: bars.length }, "Not enough history to backtest");
						return { order, ok: false, failure: { symbol, reason: "insufficient_history" } };
					}
					log.info(
						{ symbol, totalReturn: result.totalReturn, trades: result.totalTrades },
						"Backtest finished",
					);
					return { order, ok: true, result };
				} catch (error) {
					const reason = describeError(error);
					log.error({ symbol, reason }, "Backtest failed");
					return { order, ok: false, failure: { symbol, reason } };
				}
			}, Math.max(1, options.concurrency ?? 1)),
			toArray(),
			map((list) => list.sort((a, b) => a.order - b.order)),
		),
		{ defaultValue: [] },
	);

	const results: BacktestResult[] = [];
	const failures: BacktestFailure[] = [];
	for (const outcome of outcomes) {
		if (outcome.ok) results.push(outcome.result);
		else failures.push(outcome.failure);
	}

	results.sort((a, b) => b.totalReturn - a.totalReturn);
	log.info(
		{ succeeded: results.length, failed: failures.length },
		"Multi-instrument backtest complete",
	);
	return { results, failures };
}
