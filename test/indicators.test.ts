import { describe, expect, it } from "vitest";
import { DEFAULT_INDICATOR_PARAMS } from "../src/config/strategy";
import {
	bandPosition,
	bollingerAt,
	computeIndicators,
	isSqueezeAt,
	rsiAt,
	volumeRatioAt,
	warmupIndex,
} from "../src/indicators";
import { populationStdDev, quantile, trailingWindow } from "../src/indicators/window";
import type { IndicatorParams } from "../src/types";
import { makeBars } from "./fixtures";

const params: IndicatorParams = { ...DEFAULT_INDICATOR_PARAMS };

function wave(length: number): number[] {
	return Array.from({ length }, (_, i) => 100 + 10 * Math.sin(i / 3) + i * 0.1);
}

describe("window helpers", () => {
	it("returns null for windows that start before the series", () => {
		expect(trailingWindow([1, 2, 3], 1, 3)).toBeNull();
		expect(trailingWindow([1, 2, 3], 2, 3)).toEqual([1, 2, 3]);
	});

	it("gives exactly zero spread for a flat window", () => {
		expect(populationStdDev([0.1, 0.1, 0.1])).toBe(0);
		expect(populationStdDev([1, 2, 3, 4, 5])).toBeCloseTo(Math.SQRT2, 10);
	});

	it("interpolates quantiles linearly", () => {
		expect(quantile([5, 1, 4, 2, 3], 0.2)).toBeCloseTo(1.8, 10);
		expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
	});
});

describe("bollingerAt", () => {
	it("centres the bands on the simple average", () => {
		const band = bollingerAt([1, 2, 3, 4, 5], 4, 5, 2);
		expect(band).not.toBeNull();
		expect(band?.sma).toBe(3);
		expect(band?.upperBand).toBeCloseTo(3 + 2 * Math.SQRT2, 10);
		expect(band?.lowerBand).toBeCloseTo(3 - 2 * Math.SQRT2, 10);
		expect(band?.bandWidth).toBeCloseTo((4 * Math.SQRT2) / 3, 10);
	});

	it("is undefined before the period is filled", () => {
		expect(bollingerAt([1, 2, 3], 2, 5, 2)).toBeNull();
	});

	it("reports no band position when the bands collapse", () => {
		const band = bollingerAt([7, 7, 7, 7], 3, 4, 2);
		expect(band).not.toBeNull();
		if (band) expect(bandPosition(7, band)).toBeNull();
	});
});

describe("rsiAt", () => {
	it("reads 100 without losses and 0 without gains", () => {
		const rising = Array.from({ length: 20 }, (_, i) => 100 + i);
		const falling = Array.from({ length: 20 }, (_, i) => 100 - i);
		expect(rsiAt(rising, 19, 14)).toBe(100);
		expect(rsiAt(falling, 19, 14)).toBe(0);
	});

	it("balances equal gains and losses at 50", () => {
		expect(rsiAt([10, 11, 10], 2, 2)).toBe(50);
	});

	it("needs period + 1 closes", () => {
		expect(rsiAt([1, 2, 3], 2, 3)).toBeNull();
	});
});

describe("volumeRatioAt", () => {
	it("divides the current volume by the trailing mean", () => {
		expect(volumeRatioAt([1, 1, 1, 1, 4], 4, 5)).toBeCloseTo(2.5, 10);
	});

	it("falls back to 1 without enough history", () => {
		expect(volumeRatioAt([1, 4], 1, 5)).toBe(1);
		expect(volumeRatioAt([0, 0, 0], 2, 3)).toBe(1);
	});
});

describe("isSqueezeAt", () => {
	it("flags a width inside the recent floor", () => {
		const floorParams = { ...params, squeezeFloorWindow: 3 };
		expect(isSqueezeAt([0.2, 0.1, 0.105], 2, floorParams)).toBe(true);
		expect(isSqueezeAt([0.2, 0.1, 0.15], 2, floorParams)).toBe(false);
	});

	it("never flags a window reaching into undefined widths", () => {
		const floorParams = { ...params, squeezeFloorWindow: 3 };
		expect(isSqueezeAt([undefined, 0.1, 0.1], 2, floorParams)).toBe(false);
	});

	it("compares against the lookback quantile", () => {
		const quantileParams: IndicatorParams = {
			...params,
			squeezePolicy: "quantile",
			volatilityLookback: 5,
			volatilityThreshold: 0.5,
		};
		expect(isSqueezeAt([0.3, 0.4, 0.5, 0.6, 0.1], 4, quantileParams)).toBe(true);
		expect(isSqueezeAt([0.3, 0.4, 0.5, 0.6, 0.45], 4, quantileParams)).toBe(false);
		expect(isSqueezeAt([0.4, 0.5, 0.6, 0.1], 3, quantileParams)).toBe(false);
	});
});

describe("computeIndicators", () => {
	it("starts at the warm-up index", () => {
		expect(warmupIndex(params)).toBe(49);
		const rows = computeIndicators(makeBars(wave(60)), params);
		expect(rows).toHaveLength(11);
		expect(rows[0].index).toBe(49);
		expect(rows[rows.length - 1].index).toBe(59);
	});

	it("returns nothing for a series shorter than the warm-up", () => {
		expect(computeIndicators(makeBars(wave(30)), params)).toEqual([]);
	});

	it("keeps the bands ordered and RSI in range", () => {
		for (const row of computeIndicators(makeBars(wave(120)), params)) {
			expect(row.lowerBand).toBeLessThanOrEqual(row.sma);
			expect(row.sma).toBeLessThanOrEqual(row.upperBand);
			expect(row.rsi).toBeGreaterThanOrEqual(0);
			expect(row.rsi).toBeLessThanOrEqual(100);
		}
	});

	it("handles a constant price without dividing by zero", () => {
		const rows = computeIndicators(makeBars(Array.from({ length: 60 }, () => 100)), params);
		expect(rows).toHaveLength(11);
		for (const row of rows) {
			expect(row.stddev).toBe(0);
			expect(row.bandWidth).toBe(0);
			expect(row.bbPosition).toBeNull();
			expect(row.rsi).toBe(100);
			expect(row.isSqueeze).toBe(false);
			expect(row.volumeRatio).toBe(1);
		}
	});

	it("is deterministic", () => {
		const bars = makeBars(wave(80));
		expect(computeIndicators(bars, params)).toEqual(computeIndicators(bars, params));
	});
});
