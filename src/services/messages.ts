import { activeSignals } from "../signals/rules";
import type {
	InstrumentAnalysis,
	MonitorStatus,
	SignalKind,
	StrategySettings,
} from "../types";

const SIGNAL_LABELS: Record<SignalKind, string> = {
	buy: "🚀 Buy",
	sell50: "💡 Sell 50%",
	sellAll: "🔴 Sell all",
};

export function escapeHtml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;");
}

export function formatPrice(price: number): string {
	if (Math.abs(price) >= 1) {
		return price.toLocaleString("en-US", {
			minimumFractionDigits: 2,
			maximumFractionDigits: 2,
		});
	}
	return price.toLocaleString("en-US", { maximumSignificantDigits: 6 });
}

export function formatTimestamp(timestamp: number): string {
	return `${new Date(timestamp).toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

/** Like `1d 2:03:04`, or `2:03:04` under a day. */
export function formatDuration(ms: number): string {
	const totalSeconds = Math.max(0, Math.floor(ms / 1000));
	const days = Math.floor(totalSeconds / 86_400);
	const hours = Math.floor((totalSeconds % 86_400) / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	const seconds = totalSeconds % 60;
	const clock = `${hours}:${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
	return days > 0 ? `${days}d ${clock}` : clock;
}

export function describeTimeSince(since: number | null, now: number): string {
	if (since === null) return "none";
	const seconds = Math.floor((now - since) / 1000);
	if (seconds >= 86_400) return `${Math.floor(seconds / 86_400)}d ago`;
	if (seconds > 3600) return `${Math.floor(seconds / 3600)}h ago`;
	if (seconds > 60) return `${Math.floor(seconds / 60)}m ago`;
	return "under a minute ago";
}

function formatPosition(position: number | null): string {
	return position === null ? "n/a" : position.toFixed(2);
}

function instrumentLine(analysis: InstrumentAnalysis, name: string): string {
	const label =
		name === analysis.symbol
			? `<b>${escapeHtml(analysis.symbol)}</b>`
			: `<b>${escapeHtml(name)}</b> (${escapeHtml(analysis.symbol)})`;
	return `Instrument: ${label}`;
}

export function formatSignalAlert(
	analysis: InstrumentAnalysis,
	kind: SignalKind,
	name: string,
): string {
	const { row } = analysis;
	const header = instrumentLine(analysis, name);
	const price = `Price: <b>${formatPrice(analysis.price)}</b>`;
	const time = `Bar: ${formatTimestamp(analysis.timestamp)}`;

	if (kind === "buy") {
		return [
			analysis.breakout
				? "🚀 <b>Bollinger squeeze breakout!</b>"
				: "🚀 <b>Buy signal in squeeze</b>",
			"",
			header,
			price,
			...(analysis.breakout ? [`Direction: <b>${analysis.breakout}</b>`] : []),
			`RSI: <b>${row.rsi.toFixed(1)}</b>`,
			`BB position: <b>${formatPosition(row.bbPosition)}</b>`,
			`Volume ratio: <b>${row.volumeRatio.toFixed(1)}x</b>`,
			time,
		].join("\n");
	}

	if (kind === "sell50") {
		return [
			"💡 <b>Take 50% profit</b>",
			"",
			header,
			price,
			`BB position: <b>${formatPosition(row.bbPosition)}</b> (near upper band)`,
			time,
		].join("\n");
	}

	const reason = row.rsi < 30 ? "RSI stop" : "lower band exit";
	return [
		"🔴 <b>Sell everything</b>",
		"",
		header,
		price,
		`Reason: <b>${reason}</b>`,
		`BB position: <b>${formatPosition(row.bbPosition)}</b>`,
		`RSI: <b>${row.rsi.toFixed(1)}</b>`,
		time,
	].join("\n");
}

function rsiLabel(rsi: number, strategy: StrategySettings): string {
	if (rsi >= strategy.thresholds.rsiOverbought) return "overbought";
	if (rsi <= strategy.rsiOversold) return "oversold";
	return "neutral";
}

function bandLabel(position: number | null): string {
	if (position === null) return "flat bands";
	if (position >= 0.8) return "upper band";
	if (position <= 0.2) return "lower band";
	return "mid range";
}

export function formatAnalysis(
	analysis: InstrumentAnalysis,
	name: string,
	strategy: StrategySettings,
): string {
	const { row } = analysis;
	const labels = activeSignals(analysis.signals).map((kind) => SIGNAL_LABELS[kind]);
	const { sell50Position, sellAllPosition } = strategy.thresholds;

	return [
		`📈 <b>Analysis: ${escapeHtml(name)}</b> (${escapeHtml(analysis.symbol)})`,
		"",
		`Price: <b>${formatPrice(analysis.price)}</b>`,
		`RSI: <b>${row.rsi.toFixed(1)}</b> (${rsiLabel(row.rsi, strategy)})`,
		`BB position: <b>${formatPosition(row.bbPosition)}</b> (${bandLabel(row.bbPosition)})`,
		`Squeeze: ${row.isSqueeze ? "✅ active" : "❌ inactive"}`,
		`Breakout: ${analysis.breakout ? `✅ ${analysis.breakout}` : "❌ none"}`,
		`Volume ratio: <b>${row.volumeRatio.toFixed(1)}x</b>`,
		"",
		`Signals: ${labels.length ? labels.join(" | ") : "none"}`,
		`Bar: ${formatTimestamp(analysis.timestamp)}`,
		"",
		`<b>Strategy (${strategy.profile}):</b>`,
		strategy.buyRule === "breakout"
			? "• buy on an upper band breakout after a squeeze"
			: `• buy on RSI &gt; ${strategy.thresholds.rsiOverbought} during a squeeze`,
		`• take 50% at BB position ≥ ${sell50Position}`,
		`• exit at BB position ≤ ${sellAllPosition} or RSI &lt; ${strategy.rsiOversold}`,
	].join("\n");
}

function statsLines(status: MonitorStatus, now: number): string[] {
	return [
		`Uptime: ${formatDuration(status.startedAt === null ? 0 : now - status.startedAt)}`,
		`Scans: ${status.scanCount}`,
		`Alerts sent: ${status.signalsSent}`,
		`Watching: ${status.watchlistSize} instruments`,
		`Scan interval: ${status.intervalSec}s`,
		`Last signal: ${describeTimeSince(status.lastSignalAt, now)}`,
	];
}

export function formatHeartbeat(status: MonitorStatus, now: number): string {
	return [
		"💓 <b>Heartbeat: monitor running</b>",
		"",
		`Time: ${formatTimestamp(now)}`,
		...statsLines(status, now),
		`Alert records: ${status.alertRecords}`,
	].join("\n");
}

export function formatStatus(status: MonitorStatus, now: number): string {
	return [
		"📊 <b>Monitor status</b>",
		"",
		`State: ${status.running ? "🟢 running" : "🔴 stopped"}`,
		`Time: ${formatTimestamp(now)}`,
		...statsLines(status, now),
		`Last heartbeat: ${describeTimeSince(status.lastHeartbeatAt, now)}`,
	].join("\n");
}

export function formatScanSummary(status: MonitorStatus, now: number): string {
	return [
		"📊 <b>Scan summary</b>",
		"",
		`Scans: ${status.scanCount}`,
		`Time: ${formatTimestamp(now)}`,
		`Uptime: ${formatDuration(status.startedAt === null ? 0 : now - status.startedAt)}`,
		`Watching: ${status.watchlistSize} instruments`,
		`Alerts sent: ${status.signalsSent}`,
	].join("\n");
}

export function formatStartMessage(status: MonitorStatus, now: number): string {
	return [
		"🤖 <b>Monitor started</b>",
		"",
		`Watching: ${status.watchlistSize} instruments`,
		`Scan interval: ${status.intervalSec}s`,
		`Started: ${formatTimestamp(now)}`,
		"",
		"Commands: /ticker &lt;symbol&gt;, /status, /help",
	].join("\n");
}

export function formatShutdownMessage(status: MonitorStatus, now: number): string {
	return [
		"⏹️ <b>Monitor stopped</b>",
		"",
		`Stopped: ${formatTimestamp(now)}`,
		`Total uptime: ${formatDuration(status.startedAt === null ? 0 : now - status.startedAt)}`,
		`Total scans: ${status.scanCount}`,
		`Total alerts: ${status.signalsSent}`,
	].join("\n");
}

export function formatHelp(status: MonitorStatus): string {
	return [
		"🤖 <b>Squeeze signal monitor</b>",
		"",
		"Commands:",
		"• /ticker &lt;symbol&gt; - analyse one instrument (e.g. /ticker BTC)",
		"• /status - monitor statistics",
		"• /watch &lt;symbols&gt; - add instruments",
		"• /unwatch &lt;symbols&gt; - remove instruments",
		"• /help - this message",
		"",
		`State: ${status.running ? "🟢 running" : "🔴 stopped"}`,
		`Watching: ${status.watchlistSize} instruments`,
		`Alerts sent: ${status.signalsSent}`,
	].join("\n");
}

export function formatConnectionTest(now: number): string {
	return [
		"🧪 <b>Connection test</b>",
		"",
		"The bot can reach this chat.",
		`Time: ${formatTimestamp(now)}`,
	].join("\n");
}
