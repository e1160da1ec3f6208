/** Values of the window of `length` ending at `end` (inclusive), or null when it starts before 0. */
export function trailingWindow<T>(
	values: readonly T[],
	end: number,
	length: number,
): T[] | null {
	const start = end - length + 1;
	if (length <= 0 || start < 0 || end >= values.length) return null;
	return values.slice(start, end + 1);
}

export function mean(values: readonly number[]): number {
	if (!values.length) return Number.NaN;
	return values.reduce((acc, val) => acc + val, 0) / values.length;
}

export function populationStdDev(values: readonly number[]): number {
	if (!values.length) return Number.NaN;
	// a flat window has exactly zero spread even when the mean rounds
	if (Math.max(...values) === Math.min(...values)) return 0;
	const avg = mean(values);
	const variance =
		values.reduce((acc, val) => acc + (val - avg) ** 2, 0) / values.length;
	return Math.sqrt(variance);
}

/** Quantile with linear interpolation between closest ranks. */
export function quantile(values: readonly number[], q: number): number {
	if (!values.length) return Number.NaN;
	const sorted = [...values].sort((a, b) => a - b);
	const position = (sorted.length - 1) * Math.min(Math.max(q, 0), 1);
	const lower = Math.floor(position);
	const upper = Math.ceil(position);
	return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}
