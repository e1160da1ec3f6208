import { mean } from "./window";

/**
 * Simple rolling RSI: plain averages of gains and losses over the last
 * `period` close-to-close changes. A window with no losses reads 100.
 */
export function rsiAt(
	closes: readonly number[],
	end: number,
	period: number,
): number | null {
	if (end < period || end >= closes.length) return null;

	const gains: number[] = [];
	const losses: number[] = [];
	for (let i = end - period + 1; i <= end; i++) {
		const change = closes[i] - closes[i - 1];
		gains.push(Math.max(change, 0));
		losses.push(Math.max(-change, 0));
	}

	const avgGain = mean(gains);
	const avgLoss = mean(losses);
	if (avgLoss === 0) return 100;
	return 100 - 100 / (1 + avgGain / avgLoss);
}
