import { mean, trailingWindow } from "./window";

/** Falls back to 1 when there is no usable volume history. */
export function volumeRatioAt(
	volumes: readonly number[],
	end: number,
	window: number,
): number {
	const slice = trailingWindow(volumes, end, window);
	if (!slice) return 1;
	const avg = mean(slice);
	if (!(avg > 0)) return 1;
	return volumes[end] / avg;
}
