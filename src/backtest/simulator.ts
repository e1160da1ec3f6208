import { computeIndicators } from "../indicators";
import { evaluateSignals } from "../signals/rules";
import type {
	BacktestMetrics,
	BacktestPosition,
	BacktestResult,
	CompletedTrade,
	EquityPoint,
	PriceBar,
	SignalKind,
	SignalSet,
	StrategySettings,
	TradeAction,
	TradeRecord,
} from "../types";

export type SimulationStep = {
	timestamp: number;
	close: number;
	signals: SignalSet;
};

export type SimulationOutcome = {
	trades: TradeRecord[];
	equityCurve: EquityPoint[];
	finalCash: number;
	finalPosition: BacktestPosition;
};

type TransitionRule = {
	action: TradeAction;
	signal: SignalKind;
	from: readonly BacktestPosition[];
};

// Evaluated top to bottom; at most one transition per bar.
const TRANSITION_RULES: readonly TransitionRule[] = [
	{ action: "SELL_ALL", signal: "sellAll", from: ["FULL", "HALF"] },
	{ action: "SELL_50", signal: "sell50", from: ["FULL"] },
	{ action: "BUY", signal: "buy", from: ["FLAT"] },
];

export function nextAction(
	position: BacktestPosition,
	signals: SignalSet,
): TradeAction | null {
	const rule = TRANSITION_RULES.find(
		(candidate) => signals[candidate.signal] && candidate.from.includes(position),
	);
	return rule?.action ?? null;
}

/**
 * Walks the steps in order with a FLAT/HALF/FULL position. A BUY spends all
 * cash at the bar close; whatever is still held after the last step is sold
 * at the final close and logged as a forced SELL_ALL.
 */
export function simulatePositions(
	symbol: string,
	steps: readonly SimulationStep[],
	initialCapital: number,
): SimulationOutcome {
	let position: BacktestPosition = "FLAT";
	let cash = initialCapital;
	let quantity = 0;
	const trades: TradeRecord[] = [];
	const equityCurve: EquityPoint[] = [];

	for (const step of steps) {
		const price = step.close;
		const action = price > 0 ? nextAction(position, step.signals) : null;

		if (action === "BUY") {
			quantity = cash / price;
			trades.push({ symbol, action, timestamp: step.timestamp, price, quantity, cashValue: cash });
			cash = 0;
			position = "FULL";
		} else if (action === "SELL_50") {
			const sold = quantity * 0.5;
			const value = sold * price;
			cash += value;
			quantity -= sold;
			position = "HALF";
			trades.push({ symbol, action, timestamp: step.timestamp, price, quantity: sold, cashValue: value });
		} else if (action === "SELL_ALL") {
			const value = quantity * price;
			cash += value;
			trades.push({ symbol, action, timestamp: step.timestamp, price, quantity, cashValue: value });
			quantity = 0;
			position = "FLAT";
		}

		const holdingsValue = quantity * price;
		equityCurve.push({
			timestamp: step.timestamp,
			portfolioValue: cash + holdingsValue,
			cash,
			holdingsValue,
		});
	}

	const last = steps[steps.length - 1];
	if (last && quantity > 0) {
		const value = quantity * last.close;
		cash += value;
		trades.push({
			symbol,
			action: "SELL_ALL",
			timestamp: last.timestamp,
			price: last.close,
			quantity,
			cashValue: value,
			forced: true,
		});
		quantity = 0;
		position = "FLAT";
	}

	return { trades, equityCurve, finalCash: cash, finalPosition: position };
}

/** Pairs every sell with the BUY that opened the position. */
export function completedRoundTrips(trades: readonly TradeRecord[]): CompletedTrade[] {
	const completed: CompletedTrade[] = [];
	let entry: TradeRecord | null = null;

	for (const trade of trades) {
		if (trade.action === "BUY") {
			entry = trade;
			continue;
		}
		if (!entry) continue;

		const profitPct = ((trade.price - entry.price) / entry.price) * 100;
		completed.push({
			entryTimestamp: entry.timestamp,
			exitTimestamp: trade.timestamp,
			entryPrice: entry.price,
			exitPrice: trade.price,
			profitPct,
			isWinning: profitPct > 0,
		});
		if (trade.action === "SELL_ALL") entry = null;
	}

	return completed;
}

/** Largest peak-to-trough fall of the equity curve, in percent. */
export function maxDrawdown(equityCurve: readonly EquityPoint[]): number {
	let peak = Number.NEGATIVE_INFINITY;
	let worst = 0;
	for (const point of equityCurve) {
		peak = Math.max(peak, point.portfolioValue);
		if (peak <= 0) continue;
		worst = Math.max(worst, ((peak - point.portfolioValue) / peak) * 100);
	}
	return worst;
}

function average(values: readonly number[]): number {
	return values.length ? values.reduce((acc, val) => acc + val, 0) / values.length : 0;
}

export function calculateMetrics(
	outcome: SimulationOutcome,
	initialCapital: number,
	testPeriodDays: number,
): BacktestMetrics {
	const completedTrades = completedRoundTrips(outcome.trades);
	const wins = completedTrades.filter((trade) => trade.isWinning);
	const losses = completedTrades.filter((trade) => !trade.isWinning);
	const avgProfit = average(wins.map((trade) => trade.profitPct));
	const avgLoss = average(losses.map((trade) => trade.profitPct));
	const finalValue = outcome.finalCash;
	const growth = initialCapital > 0 ? finalValue / initialCapital : 0;

	return {
		totalReturn: initialCapital > 0 ? (growth - 1) * 100 : 0,
		winRate: completedTrades.length ? (wins.length / completedTrades.length) * 100 : 0,
		totalTrades: completedTrades.length,
		winningTrades: wins.length,
		avgProfit,
		avgLoss,
		profitFactor: avgLoss !== 0 ? Math.abs(avgProfit / avgLoss) : Number.POSITIVE_INFINITY,
		maxDrawdown: maxDrawdown(outcome.equityCurve),
		finalValue,
		annualizedReturn:
			testPeriodDays > 0 && growth > 0 ? (growth ** (365 / testPeriodDays) - 1) * 100 : 0,
		testPeriodDays,
		completedTrades,
	};
}

/** Indicator engine + evaluator + position machine over one daily series. */
export function runBacktest(
	symbol: string,
	bars: readonly PriceBar[],
	strategy: StrategySettings,
	initialCapital: number,
): BacktestResult {
	const rows = computeIndicators(bars, strategy.indicators);
	const steps: SimulationStep[] = rows.map((row, i) => ({
		timestamp: row.timestamp,
		close: row.close,
		signals: evaluateSignals(row, i > 0 ? rows[i - 1] : null, strategy),
	}));

	const outcome = simulatePositions(symbol, steps, initialCapital);
	return {
		symbol,
		initialCapital,
		trades: outcome.trades,
		equityCurve: outcome.equityCurve,
		insufficientData: rows.length === 0,
		...calculateMetrics(outcome, initialCapital, bars.length),
	};
}
