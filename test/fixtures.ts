import type {
	BacktestResult,
	IndicatorRow,
	InstrumentAnalysis,
	MonitorStatus,
	PriceBar,
	SignalSet,
} from "../src/types";

export const DAY_MS = 86_400_000;

export function makeBars(closes: readonly number[], volumes?: readonly number[]): PriceBar[] {
	return closes.map((close, i) => ({
		timestamp: i * DAY_MS,
		open: close,
		high: close,
		low: close,
		close,
		volume: volumes?.[i] ?? 1000,
	}));
}

export function makeRow(overrides: Partial<IndicatorRow> = {}): IndicatorRow {
	return {
		index: 50,
		timestamp: 0,
		close: 100,
		sma: 100,
		stddev: 2.5,
		upperBand: 105,
		lowerBand: 95,
		bandWidth: 0.1,
		isSqueeze: false,
		bbPosition: 0.5,
		rsi: 50,
		volumeRatio: 1,
		...overrides,
	};
}

export function makeAnalysis(
	symbol: string,
	signals: Partial<SignalSet> = {},
	row: Partial<IndicatorRow> = {},
): InstrumentAnalysis {
	const current = makeRow(row);
	return {
		symbol,
		timestamp: current.timestamp,
		price: current.close,
		row: current,
		signals: { buy: false, sell50: false, sellAll: false, ...signals },
		breakout: null,
	};
}

export function makeResult(
	symbol: string,
	overrides: Partial<BacktestResult> = {},
): BacktestResult {
	return {
		symbol,
		initialCapital: 1_000_000,
		trades: [],
		equityCurve: [],
		insufficientData: false,
		totalReturn: 0,
		winRate: 0,
		totalTrades: 0,
		winningTrades: 0,
		avgProfit: 0,
		avgLoss: 0,
		profitFactor: Number.POSITIVE_INFINITY,
		maxDrawdown: 0,
		finalValue: 1_000_000,
		annualizedReturn: 0,
		testPeriodDays: 365,
		completedTrades: [],
		...overrides,
	};
}

export function makeStatus(overrides: Partial<MonitorStatus> = {}): MonitorStatus {
	return {
		running: true,
		startedAt: 0,
		scanCount: 0,
		signalsSent: 0,
		lastSignalAt: null,
		lastHeartbeatAt: null,
		intervalSec: 300,
		watchlistSize: 0,
		alertRecords: 0,
		...overrides,
	};
}
