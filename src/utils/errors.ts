export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export type PriceSeriesFailure =
	| "empty"
	| "short"
	| "malformed"
	| "misaligned"
	| "below_price_floor";

export class PriceSeriesValidationError extends Error {
	readonly symbol: string;
	readonly reason: PriceSeriesFailure;

	constructor(symbol: string, reason: PriceSeriesFailure, detail: string) {
		super(`${symbol}: ${detail}`);
		this.name = "PriceSeriesValidationError";
		this.symbol = symbol;
		this.reason = reason;
	}
}

export function describeError(error: unknown): string {
	if (error instanceof PriceSeriesValidationError) return error.reason;
	if (error instanceof Error) return error.message;
	return String(error);
}
