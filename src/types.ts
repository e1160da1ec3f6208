export type PriceBar = {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
};

export type IndicatorRow = {
	index: number;
	timestamp: number;
	close: number;
	sma: number;
	stddev: number;
	upperBand: number;
	lowerBand: number;
	bandWidth: number;
	isSqueeze: boolean;
	/** null when the bands collapse to zero width */
	bbPosition: number | null;
	rsi: number;
	volumeRatio: number;
};

export type SignalKind = "buy" | "sell50" | "sellAll";

export type SignalSet = Record<SignalKind, boolean>;

export type BreakoutDirection = "up" | "down";

export type StrategyProfileName = "conservative" | "balanced" | "aggressive";

export type BuyRule = "breakout" | "threshold";

export type SqueezePolicy = "floor" | "quantile";

export type StrategyThresholds = {
	rsiOverbought: number;
	sell50Position: number;
	sellAllPosition: number;
};

export type IndicatorParams = {
	bbPeriod: number;
	bbStdMultiplier: number;
	rsiPeriod: number;
	volatilityLookback: number;
	volatilityThreshold: number;
	squeezePolicy: SqueezePolicy;
	squeezeFloorWindow: number;
	squeezeFloorFactor: number;
	volumeWindow: number;
};

export type StrategySettings = {
	profile: StrategyProfileName;
	thresholds: StrategyThresholds;
	indicators: IndicatorParams;
	buyRule: BuyRule;
	breakoutVolumeRatio: number;
	breakoutRsiMin: number;
	breakoutRsiMax: number;
	rsiOversold: number;
};

export type WatchedInstrument = {
	symbol: string;
	displayName?: string;
};

export type InstrumentAnalysis = {
	symbol: string;
	timestamp: number;
	price: number;
	row: IndicatorRow;
	signals: SignalSet;
	breakout: BreakoutDirection | null;
};

export type MonitorStatus = {
	running: boolean;
	startedAt: number | null;
	scanCount: number;
	signalsSent: number;
	lastSignalAt: number | null;
	lastHeartbeatAt: number | null;
	intervalSec: number;
	watchlistSize: number;
	alertRecords: number;
};

export type BacktestPosition = "FLAT" | "HALF" | "FULL";

export type TradeAction = "BUY" | "SELL_50" | "SELL_ALL";

export type TradeRecord = {
	symbol: string;
	action: TradeAction;
	timestamp: number;
	price: number;
	quantity: number;
	cashValue: number;
	forced?: boolean;
};

export type CompletedTrade = {
	entryTimestamp: number;
	exitTimestamp: number;
	entryPrice: number;
	exitPrice: number;
	profitPct: number;
	isWinning: boolean;
};

export type EquityPoint = {
	timestamp: number;
	portfolioValue: number;
	cash: number;
	holdingsValue: number;
};

export type BacktestMetrics = {
	totalReturn: number;
	winRate: number;
	totalTrades: number;
	winningTrades: number;
	avgProfit: number;
	avgLoss: number;
	profitFactor: number;
	maxDrawdown: number;
	finalValue: number;
	annualizedReturn: number;
	testPeriodDays: number;
	completedTrades: CompletedTrade[];
};

export type BacktestResult = BacktestMetrics & {
	symbol: string;
	initialCapital: number;
	trades: TradeRecord[];
	equityCurve: EquityPoint[];
	insufficientData: boolean;
};

export type BacktestFailure = {
	symbol: string;
	reason: string;
};
