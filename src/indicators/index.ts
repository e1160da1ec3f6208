import type { IndicatorParams, IndicatorRow, PriceBar } from "../types";
import { type BandPoint, bandPosition, bollingerAt, isSqueezeAt } from "./bollinger";
import { rsiAt } from "./rsi";
import { volumeRatioAt } from "./volume";

export { bandPosition, bollingerAt, isSqueezeAt } from "./bollinger";
export { rsiAt } from "./rsi";
export { volumeRatioAt } from "./volume";

/** First bar index that gets an indicator row. */
export function warmupIndex(params: IndicatorParams): number {
	return Math.max(
		params.bbPeriod - 1,
		params.rsiPeriod,
		params.volatilityLookback - 1,
	);
}

/**
 * Indicator rows for every bar from the warm-up index on, in bar order.
 * Pure: the same bars and params always give the same rows.
 */
export function computeIndicators(
	bars: readonly PriceBar[],
	params: IndicatorParams,
): IndicatorRow[] {
	const first = warmupIndex(params);
	if (bars.length <= first) return [];

	const closes = bars.map((bar) => bar.close);
	const volumes = bars.map((bar) => bar.volume);
	const bands: (BandPoint | null)[] = closes.map((_, i) =>
		bollingerAt(closes, i, params.bbPeriod, params.bbStdMultiplier),
	);
	const bandWidths = bands.map((band) => band?.bandWidth);

	const rows: IndicatorRow[] = [];
	for (let i = first; i < bars.length; i++) {
		const band = bands[i];
		const rsi = rsiAt(closes, i, params.rsiPeriod);
		if (!band || rsi === null) continue;

		rows.push({
			index: i,
			timestamp: bars[i].timestamp,
			close: closes[i],
			...band,
			isSqueeze: isSqueezeAt(bandWidths, i, params),
			bbPosition: bandPosition(closes[i], band),
			rsi,
			volumeRatio: volumeRatioAt(volumes, i, params.volumeWindow),
		});
	}

	return rows;
}
