import type { IndicatorParams } from "../types";
import { mean, populationStdDev, quantile, trailingWindow } from "./window";

export type BandPoint = {
	sma: number;
	stddev: number;
	upperBand: number;
	lowerBand: number;
	bandWidth: number;
};

export function bollingerAt(
	closes: readonly number[],
	end: number,
	period: number,
	multiplier: number,
): BandPoint | null {
	const window = trailingWindow(closes, end, period);
	if (!window) return null;

	const sma = mean(window);
	const stddev = populationStdDev(window);
	const upperBand = sma + multiplier * stddev;
	const lowerBand = sma - multiplier * stddev;
	const bandWidth = sma === 0 ? 0 : (upperBand - lowerBand) / sma;

	return { sma, stddev, upperBand, lowerBand, bandWidth };
}

/** 0 at the lower band, 1 at the upper band; null when the bands have no width. */
export function bandPosition(close: number, band: BandPoint): number | null {
	const width = band.upperBand - band.lowerBand;
	if (!(width > 0)) return null;
	return (close - band.lowerBand) / width;
}

/**
 * floor: width sits within `squeezeFloorFactor` of the recent minimum.
 * quantile: width is below the `volatilityThreshold` quantile of the lookback.
 * A window that reaches back before the first defined width is never a squeeze.
 */
export function isSqueezeAt(
	bandWidths: readonly (number | undefined)[],
	end: number,
	params: IndicatorParams,
): boolean {
	const current = bandWidths[end];
	if (current === undefined) return false;

	const length =
		params.squeezePolicy === "floor"
			? params.squeezeFloorWindow
			: params.volatilityLookback;
	const window = trailingWindow(bandWidths, end, length);
	if (!window) return false;

	const widths: number[] = [];
	for (const width of window) {
		if (width === undefined) return false;
		widths.push(width);
	}

	if (params.squeezePolicy === "floor") {
		return current < Math.min(...widths) * params.squeezeFloorFactor;
	}
	return current < quantile(widths, params.volatilityThreshold);
}
