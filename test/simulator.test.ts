import { describe, expect, it } from "vitest";
import { resolveStrategy } from "../src/config/strategy";
import {
	type SimulationStep,
	calculateMetrics,
	completedRoundTrips,
	maxDrawdown,
	nextAction,
	runBacktest,
	simulatePositions,
} from "../src/backtest/simulator";
import type { EquityPoint, SignalKind } from "../src/types";
import { DAY_MS, makeBars } from "./fixtures";

const CAPITAL = 1_000_000;

function steps(
	closes: readonly number[],
	signals: Record<number, SignalKind[]> = {},
): SimulationStep[] {
	return closes.map((close, i) => {
		const firing = signals[i] ?? [];
		return {
			timestamp: i * DAY_MS,
			close,
			signals: {
				buy: firing.includes("buy"),
				sell50: firing.includes("sell50"),
				sellAll: firing.includes("sellAll"),
			},
		};
	});
}

function curve(values: readonly number[]): EquityPoint[] {
	return values.map((portfolioValue, i) => ({
		timestamp: i,
		portfolioValue,
		cash: portfolioValue,
		holdingsValue: 0,
	}));
}

describe("nextAction", () => {
	const all = { buy: true, sell50: true, sellAll: true };

	it("prefers a full exit over a partial one", () => {
		expect(nextAction("FULL", all)).toBe("SELL_ALL");
		expect(nextAction("HALF", all)).toBe("SELL_ALL");
	});

	it("only buys from flat", () => {
		expect(nextAction("FLAT", all)).toBe("BUY");
		expect(nextAction("HALF", { buy: true, sell50: false, sellAll: false })).toBeNull();
	});

	it("takes half profit only from a full position", () => {
		expect(nextAction("FULL", { buy: false, sell50: true, sellAll: false })).toBe("SELL_50");
		expect(nextAction("HALF", { buy: false, sell50: true, sellAll: false })).toBeNull();
	});
});

describe("simulatePositions", () => {
	it("books one winning round trip", () => {
		const closes = Array.from({ length: 30 }, (_, i) => (i < 20 ? 100 : 150));
		const outcome = simulatePositions("BTCUSDT", steps(closes, { 10: ["buy"], 20: ["sellAll"] }), CAPITAL);

		expect(outcome.trades.map((trade) => trade.action)).toEqual(["BUY", "SELL_ALL"]);
		expect(outcome.trades[0]).toMatchObject({ price: 100, quantity: 10_000, cashValue: CAPITAL });
		expect(outcome.finalCash).toBe(1_500_000);
		expect(outcome.finalPosition).toBe("FLAT");

		const [trip] = completedRoundTrips(outcome.trades);
		expect(trip.profitPct).toBe(50);
		expect(trip.isWinning).toBe(true);
	});

	it("conserves capital without signals", () => {
		const outcome = simulatePositions("BTCUSDT", steps([100, 90, 120, 80]), CAPITAL);
		expect(outcome.trades).toEqual([]);
		expect(outcome.finalCash).toBe(CAPITAL);
		expect(outcome.equityCurve.every((point) => point.portfolioValue === CAPITAL)).toBe(true);
	});

	it("sells half, then liquidates the rest at the final close", () => {
		const outcome = simulatePositions(
			"ETHUSDT",
			steps([100, 120, 115, 110], { 0: ["buy"], 1: ["sell50"] }),
			CAPITAL,
		);

		expect(outcome.trades.map((trade) => trade.action)).toEqual(["BUY", "SELL_50", "SELL_ALL"]);
		expect(outcome.trades[1]).toMatchObject({ quantity: 5000, cashValue: 600_000 });
		expect(outcome.trades[2]).toMatchObject({ price: 110, quantity: 5000, forced: true });
		expect(outcome.finalCash).toBe(1_150_000);
		expect(outcome.equityCurve[2]).toMatchObject({
			cash: 600_000,
			holdingsValue: 575_000,
			portfolioValue: 1_175_000,
		});

		const trips = completedRoundTrips(outcome.trades);
		expect(trips.map((trip) => trip.profitPct)).toEqual([20, 10]);
	});

	it("applies only the exit when every signal fires on a held bar", () => {
		const outcome = simulatePositions(
			"BTCUSDT",
			steps([100, 100], { 0: ["buy"], 1: ["buy", "sell50", "sellAll"] }),
			CAPITAL,
		);
		expect(outcome.trades.map((trade) => trade.action)).toEqual(["BUY", "SELL_ALL"]);
		expect(outcome.trades[1].forced).toBeUndefined();
	});
});

describe("maxDrawdown", () => {
	it("is zero for a curve that never falls", () => {
		expect(maxDrawdown(curve([100, 110, 110, 130]))).toBe(0);
	});

	it("measures the deepest fall from a running peak", () => {
		expect(maxDrawdown(curve([100, 120, 90, 130, 117]))).toBe(25);
	});
});

describe("calculateMetrics", () => {
	it("aggregates wins and losses", () => {
		const outcome = simulatePositions(
			"SOLUSDT",
			steps([100, 120, 100, 90], { 0: ["buy"], 1: ["sellAll"], 2: ["buy"], 3: ["sellAll"] }),
			CAPITAL,
		);
		const metrics = calculateMetrics(outcome, CAPITAL, 365);

		expect(metrics.totalTrades).toBe(2);
		expect(metrics.winningTrades).toBe(1);
		expect(metrics.winRate).toBe(50);
		expect(metrics.avgProfit).toBeCloseTo(20, 10);
		expect(metrics.avgLoss).toBeCloseTo(-10, 10);
		expect(metrics.profitFactor).toBeCloseTo(2, 10);
		expect(metrics.finalValue).toBeCloseTo(1_080_000, 6);
		expect(metrics.totalReturn).toBeCloseTo(8, 10);
		expect(metrics.annualizedReturn).toBeCloseTo(8, 10);
		expect(metrics.maxDrawdown).toBeCloseTo(10, 10);
	});

	it("reports an unbounded profit factor without losers", () => {
		const outcome = simulatePositions("BTCUSDT", steps([100, 110], { 0: ["buy"], 1: ["sellAll"] }), CAPITAL);
		expect(calculateMetrics(outcome, CAPITAL, 2).profitFactor).toBe(Number.POSITIVE_INFINITY);
	});
});

describe("runBacktest", () => {
	const strategy = resolveStrategy("conservative");

	it("flags a series too short for any indicator row", () => {
		const result = runBacktest("BTCUSDT", makeBars(Array.from({ length: 30 }, () => 100)), strategy, CAPITAL);
		expect(result.insufficientData).toBe(true);
		expect(result.trades).toEqual([]);
		expect(result.finalValue).toBe(CAPITAL);
	});

	it("stays flat on a constant price", () => {
		const result = runBacktest("BTCUSDT", makeBars(Array.from({ length: 60 }, () => 100)), strategy, CAPITAL);
		expect(result.insufficientData).toBe(false);
		expect(result.trades).toEqual([]);
		expect(result.equityCurve).toHaveLength(11);
		expect(result.totalReturn).toBe(0);
		expect(result.testPeriodDays).toBe(60);
	});

	it("trades a squeeze breakout end to end", () => {
		// tight range, then a breakout on five times the usual volume
		const closes = [...Array.from({ length: 70 }, (_, i) => (i % 2 === 0 ? 100 : 100.5)), 104, 104.5, 98];
		const volumes = closes.map((_, i) => (i === 70 ? 5000 : 1000));

		const result = runBacktest("BTCUSDT", makeBars(closes, volumes), strategy, CAPITAL);

		expect(result.trades.map((trade) => [trade.action, trade.timestamp / DAY_MS, trade.price])).toEqual([
			["BUY", 70, 104],
			["SELL_50", 71, 104.5],
			["SELL_ALL", 72, 98],
		]);
		expect(result.trades.some((trade) => trade.forced)).toBe(false);
		expect(result.trades[0].quantity).toBeCloseTo(CAPITAL / 104, 9);
		expect(result.trades[1].cashValue).toBeCloseTo((CAPITAL / 208) * 104.5, 6);

		expect(result.completedTrades.map((trade) => trade.profitPct)).toEqual([
			expect.closeTo((0.5 / 104) * 100, 10),
			expect.closeTo((-6 / 104) * 100, 10),
		]);
		expect(result.totalTrades).toBe(2);
		expect(result.winningTrades).toBe(1);
		expect(result.winRate).toBe(50);
		expect(result.finalValue).toBeCloseTo((CAPITAL / 208) * 202.5, 6);
		expect(result.totalReturn).toBeCloseTo((202.5 / 208 - 1) * 100, 9);
		expect(result.equityCurve).toHaveLength(24);
	});
});
