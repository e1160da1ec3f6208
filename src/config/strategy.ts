import type {
	BuyRule,
	IndicatorParams,
	SqueezePolicy,
	StrategyProfileName,
	StrategySettings,
	StrategyThresholds,
} from "../types";
import { ConfigError } from "../utils/errors";

export const STRATEGY_PROFILES: Readonly<
	Record<StrategyProfileName, StrategyThresholds>
> = {
	conservative: { rsiOverbought: 70, sell50Position: 0.8, sellAllPosition: 0.1 },
	balanced: { rsiOverbought: 65, sell50Position: 0.75, sellAllPosition: 0.15 },
	aggressive: { rsiOverbought: 60, sell50Position: 0.7, sellAllPosition: 0.2 },
};

export const DEFAULT_INDICATOR_PARAMS: Readonly<IndicatorParams> = {
	bbPeriod: 20,
	bbStdMultiplier: 2.0,
	rsiPeriod: 14,
	volatilityLookback: 50,
	volatilityThreshold: 0.2,
	squeezePolicy: "floor",
	squeezeFloorWindow: 20,
	squeezeFloorFactor: 1.1,
	volumeWindow: 20,
};

function isProfileName(value: string): value is StrategyProfileName {
	return Object.hasOwn(STRATEGY_PROFILES, value);
}

function parseBuyRule(value: string): BuyRule {
	if (value === "breakout" || value === "threshold") return value;
	throw new ConfigError(`Unknown buy rule "${value}"`);
}

function parseSqueezePolicy(value: string): SqueezePolicy {
	if (value === "floor" || value === "quantile") return value;
	throw new ConfigError(`Unknown squeeze policy "${value}"`);
}

export type StrategyOverrides = {
	buyRule?: string;
	squeezePolicy?: string;
	indicators?: Partial<Omit<IndicatorParams, "squeezePolicy">>;
};

/**
 * Builds the frozen settings shared by the live scanner and the backtester.
 * Threshold values come only from the profile table.
 */
export function resolveStrategy(
	profile: string,
	overrides: StrategyOverrides = {},
): StrategySettings {
	const name = profile.trim().toLowerCase();
	if (!isProfileName(name)) {
		throw new ConfigError(
			`Unknown strategy profile "${profile}" (expected ${Object.keys(STRATEGY_PROFILES).join(", ")})`,
		);
	}

	const indicators: IndicatorParams = {
		...DEFAULT_INDICATOR_PARAMS,
		...overrides.indicators,
		squeezePolicy: parseSqueezePolicy(
			overrides.squeezePolicy ?? DEFAULT_INDICATOR_PARAMS.squeezePolicy,
		),
	};

	return Object.freeze({
		profile: name,
		thresholds: Object.freeze({ ...STRATEGY_PROFILES[name] }),
		indicators: Object.freeze(indicators),
		buyRule: parseBuyRule(overrides.buyRule ?? "breakout"),
		breakoutVolumeRatio: 1.2,
		breakoutRsiMin: 50,
		breakoutRsiMax: 80,
		rsiOversold: 30,
	});
}
