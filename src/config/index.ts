import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

const outputDir = path.resolve(process.env.OUTPUT_DIR || "output");

export const config = {
	binance: {
		apiKey: process.env.BINANCE_API_KEY || "",
		apiSecret: process.env.BINANCE_API_SECRET || "",
		baseUrl: process.env.BINANCE_BASE_URL || "",
	},
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
		pollTimeoutSec: 30,
	},
	strategy: {
		profile: process.env.STRATEGY_PROFILE || "conservative",
		buyRule: process.env.BUY_RULE || "breakout",
		squeezePolicy: process.env.SQUEEZE_POLICY || "floor",
		quoteAsset: process.env.QUOTE_ASSET || "USDT",
		minAverageClose: Number(process.env.MIN_AVERAGE_CLOSE || "0.000001"),
	},
	monitor: {
		scanIntervalSec: Number(process.env.SCAN_INTERVAL_SEC || "300"),
		alertCooldownSec: Number(process.env.ALERT_COOLDOWN_SEC || "3600"),
		barCount: 100,
		pacingMs: 200,
		errorBackoffMs: 30_000,
		summaryEveryScans: 5,
		shutdownTimeoutMs: 10_000,
	},
	scheduling: {
		heartbeatCron: process.env.HEARTBEAT_CRON || "0 * * * *", // hourly
		timezone: "UTC",
	},
	fetch: {
		attempts: 3,
		retryDelayMs: 1000,
	},
	backtest: {
		initialCapital: Number(process.env.INITIAL_CAPITAL || "1000000"),
		days: Number(process.env.BACKTEST_DAYS || "1095"),
		concurrency: Number(process.env.BACKTEST_CONCURRENCY || "4"),
		maxInstruments: 15,
	},
	logging: {
		level: process.env.LOG_LEVEL || "info",
	},
	paths: {
		instruments:
			process.env.INSTRUMENTS_FILE ||
			path.join(process.cwd(), "data/instruments.json"),
		results: path.join(outputDir, "results"),
		reports: path.join(outputDir, "reports"),
		tradeLog: path.join(outputDir, "results/trades.jsonl"),
	},
};
