import { describe, expect, it } from "vitest";
import { resolveStrategy } from "../src/config/strategy";
import {
	describeTimeSince,
	escapeHtml,
	formatAnalysis,
	formatDuration,
	formatHeartbeat,
	formatPrice,
	formatSignalAlert,
	formatStatus,
	formatTimestamp,
} from "../src/services/messages";
import { makeAnalysis, makeStatus } from "./fixtures";

describe("formatting helpers", () => {
	it("formats prices by magnitude", () => {
		expect(formatPrice(1234.5)).toBe("1,234.50");
		expect(formatPrice(0.00012345)).toBe("0.00012345");
	});

	it("formats UTC timestamps", () => {
		expect(formatTimestamp(0)).toBe("1970-01-01 00:00:00 UTC");
	});

	it("formats durations", () => {
		expect(formatDuration(93_784_000)).toBe("1d 2:03:04");
		expect(formatDuration(59_000)).toBe("0:00:59");
	});

	it("describes how long ago something happened", () => {
		const now = 10 * 86_400_000;
		expect(describeTimeSince(null, now)).toBe("none");
		expect(describeTimeSince(now - 30_000, now)).toBe("under a minute ago");
		expect(describeTimeSince(now - 5 * 60_000, now)).toBe("5m ago");
		expect(describeTimeSince(now - 2 * 3_600_000, now)).toBe("2h ago");
		expect(describeTimeSince(now - 3 * 86_400_000, now)).toBe("3d ago");
	});

	it("escapes HTML", () => {
		expect(escapeHtml("<b>A&B</b>")).toBe("&lt;b&gt;A&amp;B&lt;/b&gt;");
	});
});

describe("formatSignalAlert", () => {
	it("titles a breakout buy", () => {
		const analysis = { ...makeAnalysis("BTCUSDT", { buy: true }, { rsi: 62.34 }), breakout: "up" as const };
		const lines = formatSignalAlert(analysis, "buy", "Bitcoin").split("\n");
		expect(lines[0]).toBe("🚀 <b>Bollinger squeeze breakout!</b>");
		expect(lines).toContain("Instrument: <b>Bitcoin</b> (BTCUSDT)");
		expect(lines).toContain("Direction: <b>up</b>");
		expect(lines).toContain("RSI: <b>62.3</b>");
	});

	it("names the exit reason", () => {
		const oversold = makeAnalysis("ETHUSDT", { sellAll: true }, { rsi: 25 });
		expect(formatSignalAlert(oversold, "sellAll", "ETHUSDT").split("\n")).toContain("Reason: <b>RSI stop</b>");

		const lowBand = makeAnalysis("ETHUSDT", { sellAll: true }, { bbPosition: 0.05 });
		expect(formatSignalAlert(lowBand, "sellAll", "ETHUSDT").split("\n")).toContain(
			"Reason: <b>lower band exit</b>",
		);
	});
});

describe("formatAnalysis", () => {
	it("summarises indicators and the strategy", () => {
		const strategy = resolveStrategy("balanced");
		const analysis = makeAnalysis("SOLUSDT", { sell50: true }, { bbPosition: 0.9, rsi: 66, isSqueeze: true });
		const lines = formatAnalysis(analysis, "Solana", strategy).split("\n");

		expect(lines[0]).toBe("📈 <b>Analysis: Solana</b> (SOLUSDT)");
		expect(lines).toContain("RSI: <b>66.0</b> (overbought)");
		expect(lines).toContain("BB position: <b>0.90</b> (upper band)");
		expect(lines).toContain("Squeeze: ✅ active");
		expect(lines).toContain("Signals: 💡 Sell 50%");
		expect(lines).toContain("<b>Strategy (balanced):</b>");
	});
});

describe("formatStatus", () => {
	it("shows when the last heartbeat went out", () => {
		const status = makeStatus({ startedAt: 0, lastHeartbeatAt: 3_600_000, scanCount: 7 });
		const lines = formatStatus(status, 3 * 3_600_000).split("\n");
		expect(lines[2]).toBe("State: 🟢 running");
		expect(lines).toContain("Scans: 7");
		expect(lines[lines.length - 1]).toBe("Last heartbeat: 2h ago");
	});

	it("says none before the first heartbeat", () => {
		const lines = formatStatus(makeStatus(), 60_000).split("\n");
		expect(lines[lines.length - 1]).toBe("Last heartbeat: none");
	});
});

describe("formatHeartbeat", () => {
	it("reports the monitor counters", () => {
		const status = makeStatus({ startedAt: 0, scanCount: 12, signalsSent: 3, watchlistSize: 20, alertRecords: 4 });
		const lines = formatHeartbeat(status, 3_600_000).split("\n");
		expect(lines[0]).toBe("💓 <b>Heartbeat: monitor running</b>");
		expect(lines).toContain("Uptime: 1:00:00");
		expect(lines).toContain("Scans: 12");
		expect(lines).toContain("Alert records: 4");
	});
});
