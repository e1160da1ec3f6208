import { MainClient } from "binance";
import { config } from "../config";
import { toPriceSeries } from "../services/priceSeries";
import type { PriceBar } from "../types";
import { logger } from "../utils/logger";
import { withRetry } from "../utils/retry";

const MAX_KLINES_PER_REQUEST = 1000;

export const hasCredentials = Boolean(
	config.binance.apiKey && config.binance.apiSecret,
);

export const restClient = new MainClient(
	hasCredentials
		? {
				api_key: config.binance.apiKey,
				api_secret: config.binance.apiSecret,
				baseUrl: config.binance.baseUrl || undefined,
			}
		: { baseUrl: config.binance.baseUrl || undefined },
);

logger.info(
	{ mode: hasCredentials ? "authenticated" : "public" },
	"Binance market data client ready",
);

/** Latest `count` daily klines, oldest first, as the raw rows the API returned. */
export async function fetchKlineRows(
	symbol: string,
	count: number,
): Promise<unknown[]> {
	const collected: unknown[] = [];
	let endTime: number | undefined;

	while (collected.length < count) {
		const limit = Math.min(MAX_KLINES_PER_REQUEST, count - collected.length);
		const batch = await restClient.getKlines({
			symbol,
			interval: "1d",
			limit,
			...(endTime === undefined ? {} : { endTime }),
		});
		if (!batch.length) break;

		collected.unshift(...batch);
		if (batch.length < limit) break;
		endTime = Number(batch[0][0]) - 1;
	}

	return collected;
}

export async function getPriceSeries(
	symbol: string,
	count: number,
	minBars: number,
): Promise<PriceBar[]> {
	return withRetry(
		async () => {
			const rows = await fetchKlineRows(symbol, count);
			return toPriceSeries(symbol, rows, {
				minBars,
				minAverageClose: config.strategy.minAverageClose,
			});
		},
		{
			attempts: config.fetch.attempts,
			delayMs: config.fetch.retryDelayMs,
			label: symbol,
		},
	);
}
