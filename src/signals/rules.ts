import type {
	BreakoutDirection,
	IndicatorRow,
	SignalKind,
	SignalSet,
	StrategySettings,
} from "../types";

export const SIGNAL_KINDS: readonly SignalKind[] = ["buy", "sell50", "sellAll"];

// NaN and null never satisfy a rule
function isDefined(value: number | null): value is number {
	return value !== null && Number.isFinite(value);
}

/**
 * Close leaves the bands right after a squeeze bar on expanded volume.
 * Direction follows the band that was crossed.
 */
export function detectBreakout(
	current: IndicatorRow,
	previous: IndicatorRow | null,
	settings: StrategySettings,
): BreakoutDirection | null {
	if (!previous?.isSqueeze) return null;
	if (!(current.volumeRatio > settings.breakoutVolumeRatio)) return null;
	if (current.close > current.upperBand) return "up";
	if (current.close < current.lowerBand) return "down";
	return null;
}

function buyFires(
	current: IndicatorRow,
	previous: IndicatorRow | null,
	settings: StrategySettings,
): boolean {
	if (!isDefined(current.rsi)) return false;

	if (settings.buyRule === "threshold") {
		return current.rsi > settings.thresholds.rsiOverbought && current.isSqueeze;
	}

	return (
		detectBreakout(current, previous, settings) === "up" &&
		current.rsi > settings.breakoutRsiMin &&
		current.rsi < settings.breakoutRsiMax
	);
}

export function evaluateSignals(
	current: IndicatorRow,
	previous: IndicatorRow | null,
	settings: StrategySettings,
): SignalSet {
	const { bbPosition, rsi } = current;
	const { sell50Position, sellAllPosition } = settings.thresholds;

	return {
		buy: buyFires(current, previous, settings),
		sell50: isDefined(bbPosition) && bbPosition >= sell50Position,
		sellAll:
			(isDefined(bbPosition) && bbPosition <= sellAllPosition) ||
			(isDefined(rsi) && rsi < settings.rsiOversold),
	};
}

export function activeSignals(signals: SignalSet): SignalKind[] {
	return SIGNAL_KINDS.filter((kind) => signals[kind]);
}
