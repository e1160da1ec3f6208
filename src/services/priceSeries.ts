import { z } from "zod";
import type { PriceBar } from "../types";
import { PriceSeriesValidationError } from "../utils/errors";

export type SeriesRequirements = {
	minBars: number;
	minAverageClose: number;
};

const FIELDS = ["timestamp", "open", "high", "low", "close", "volume"] as const;

// the exchange sends prices as decimal strings; blanks and null are not zero
const numericField = z
	.union([z.number(), z.string().trim().min(1)])
	.pipe(z.coerce.number().finite());

/** Open time and OHLCV lead the row; trailing exchange columns are ignored. */
const klineRowSchema = z
	.tuple([
		numericField,
		numericField,
		numericField,
		numericField,
		numericField,
		numericField,
	])
	.rest(z.unknown());

function describeIssue(issue: z.ZodIssue): string {
	const field = FIELDS[Number(issue.path[0])] ?? "row";
	return `${field}: ${issue.message}`;
}

function parseRow(symbol: string, row: unknown, index: number): PriceBar {
	const parsed = klineRowSchema.safeParse(row);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(describeIssue).join("; ");
		throw new PriceSeriesValidationError(
			symbol,
			"malformed",
			`row ${index}: ${issues}`,
		);
	}

	const [timestamp, open, high, low, close, volume] = parsed.data;
	return { timestamp, open, high, low, close, volume };
}

/**
 * Turns raw kline rows into an ascending PriceBar series, rejecting anything
 * the indicator engine cannot use.
 */
export function toPriceSeries(
	symbol: string,
	rows: readonly unknown[],
	requirements: SeriesRequirements,
): PriceBar[] {
	if (!rows.length) {
		throw new PriceSeriesValidationError(symbol, "empty", "no price data");
	}

	const bars = rows.map((row, index) => parseRow(symbol, row, index));

	for (let i = 1; i < bars.length; i++) {
		if (bars[i].timestamp <= bars[i - 1].timestamp) {
			throw new PriceSeriesValidationError(
				symbol,
				"misaligned",
				`bar ${i} is not after bar ${i - 1}`,
			);
		}
	}

	if (bars.length < requirements.minBars) {
		throw new PriceSeriesValidationError(
			symbol,
			"short",
			`${bars.length} bars, need ${requirements.minBars}`,
		);
	}

	const averageClose =
		bars.reduce((acc, bar) => acc + bar.close, 0) / bars.length;
	if (averageClose < requirements.minAverageClose) {
		throw new PriceSeriesValidationError(
			symbol,
			"below_price_floor",
			`average close ${averageClose} is below ${requirements.minAverageClose}`,
		);
	}

	return bars;
}
