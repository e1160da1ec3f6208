import { Command, InvalidArgumentError } from "commander";
import { runMultiBacktest } from "./backtest/batch";
import { writeBacktestArtifacts } from "./backtest/report";
import {
	type DetailMode,
	DETAIL_MODES,
	analyzeRisk,
	gradePerformance,
	isDetailMode,
	selectForDetail,
	summarizeResults,
} from "./backtest/statistics";
import {
	fetchTelegramUpdates,
	isTelegramConfigured,
	sendTelegramMessage,
} from "./clients/telegram";
import { config } from "./config";
import { resolveStrategy } from "./config/strategy";
import { AlertDeduplicator } from "./services/alertDeduplicator";
import { buildMarketOverview } from "./services/analysis";
import { CommandListener } from "./services/commandListener";
import { createAnalyzer, loadDailySeries } from "./services/marketData";
import { formatConnectionTest } from "./services/messages";
import { ScanScheduler } from "./services/scanScheduler";
import { Watchlist, loadInstrumentCatalog } from "./services/watchlist";
import type { StrategySettings } from "./types";
import { logger } from "./utils/logger";
import { settlesWithin } from "./utils/retry";

type MonitorOptions = {
	interval: number;
	profile: string;
};

type BacktestOptions = {
	days: number;
	capital: number;
	profile: string;
	max: number;
	detail: DetailMode;
};

function positiveNumber(value: string): number {
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Expected a positive number.");
	}
	return parsed;
}

function positiveInteger(value: string): number {
	const parsed = positiveNumber(value);
	if (!Number.isInteger(parsed)) {
		throw new InvalidArgumentError("Expected a whole number.");
	}
	return parsed;
}

function detailMode(value: string): DetailMode {
	if (!isDetailMode(value)) {
		throw new InvalidArgumentError(`Expected one of ${DETAIL_MODES.join(", ")}.`);
	}
	return value;
}

function strategyFor(profile: string): StrategySettings {
	return resolveStrategy(profile, {
		buyRule: config.strategy.buyRule,
		squeezePolicy: config.strategy.squeezePolicy,
	});
}

async function runMonitor(options: MonitorOptions): Promise<void> {
	const strategy = strategyFor(options.profile);
	const catalog = await loadInstrumentCatalog(
		config.paths.instruments,
		config.strategy.quoteAsset,
	);
	const watchlist = new Watchlist(catalog.quoteAsset, catalog.instruments);
	const analyze = createAnalyzer(strategy);

	logger.info(
		{
			profile: strategy.profile,
			buyRule: strategy.buyRule,
			squeezePolicy: strategy.indicators.squeezePolicy,
			instruments: watchlist.size,
		},
		"Starting squeeze signal monitor",
	);

	const scheduler = new ScanScheduler({
		watchlist,
		analyze,
		notify: (text) => sendTelegramMessage(text),
		deduplicator: new AlertDeduplicator(config.monitor.alertCooldownSec * 1000),
		heartbeatCron: config.scheduling.heartbeatCron,
		timezone: config.scheduling.timezone,
		pacingMs: config.monitor.pacingMs,
		errorBackoffMs: config.monitor.errorBackoffMs,
		summaryEveryScans: config.monitor.summaryEveryScans,
		shutdownTimeoutMs: config.monitor.shutdownTimeoutMs,
	});

	const shutdownRequested = new AbortController();
	let listener: CommandListener | null = null;
	const shutdown = async (signal: string) => {
		logger.info({ signal }, "Shutting down");
		shutdownRequested.abort();
		listener?.stop();
		if (scheduler.isRunning) await scheduler.stop();
	};
	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.once(signal, () => {
			shutdown(signal).catch((error) => logger.error({ error }, "Shutdown failed"));
		});
	}

	const overview = await buildMarketOverview(watchlist.symbols(), analyze, {
		pacingMs: config.monitor.pacingMs,
		signal: shutdownRequested.signal,
	});
	logger.info({ overview }, "Market overview");

	let listening: Promise<void> = Promise.resolve();
	if (isTelegramConfigured()) {
		await sendTelegramMessage(formatConnectionTest(Date.now()));
		listener = new CommandListener({
			chatId: config.telegram.chatId,
			fetchUpdates: fetchTelegramUpdates,
			reply: (text) => sendTelegramMessage(text),
			status: () => scheduler.getStatus(),
			analyze,
			watchlist,
			strategy,
			pollTimeoutSec: config.telegram.pollTimeoutSec,
			errorBackoffMs: config.monitor.errorBackoffMs,
		});
		if (!shutdownRequested.signal.aborted) listening = listener.run();
	} else {
		logger.warn("Telegram is not configured, alerts are only logged");
	}

	if (shutdownRequested.signal.aborted) return;
	await scheduler.start(options.interval);

	const timeoutMs = config.monitor.shutdownTimeoutMs;
	if (!(await settlesWithin(listening, timeoutMs))) {
		logger.warn({ timeoutMs }, "Command listener did not stop in time, abandoning it");
	}
}

async function runBacktestCommand(options: BacktestOptions): Promise<void> {
	const strategy = strategyFor(options.profile);
	const catalog = await loadInstrumentCatalog(
		config.paths.instruments,
		config.strategy.quoteAsset,
	);
	const symbols = catalog.instruments
		.slice(0, options.max)
		.map((instrument) => instrument.symbol);

	logger.info(
		{
			profile: strategy.profile,
			instruments: symbols.length,
			days: options.days,
			capital: options.capital,
		},
		"Running backtest",
	);

	const outcome = await runMultiBacktest(symbols, {
		loadSeries: (symbol) => loadDailySeries(symbol, options.days, strategy),
		strategy,
		initialCapital: options.capital,
		concurrency: config.backtest.concurrency,
	});

	for (const [rank, result] of outcome.results.entries()) {
		logger.info(
			{
				rank: rank + 1,
				symbol: result.symbol,
				totalReturn: Number(result.totalReturn.toFixed(2)),
				winRate: Number(result.winRate.toFixed(1)),
				trades: result.totalTrades,
				maxDrawdown: Number(result.maxDrawdown.toFixed(2)),
				grade: gradePerformance(result.totalReturn),
			},
			"Backtest result",
		);
	}
	if (outcome.failures.length) {
		logger.warn({ failures: outcome.failures }, "Instruments excluded from the results");
	}

	const summary = summarizeResults(outcome.results);
	if (!summary) {
		logger.warn("No instrument produced a backtest result");
		return;
	}
	logger.info({ summary }, "Backtest summary");
	logger.info({ risk: analyzeRisk(outcome.results) }, "Risk profile");

	const written = await writeBacktestArtifacts(
		outcome,
		selectForDetail(outcome.results, options.detail),
		strategy,
		{ initialCapital: options.capital, days: options.days },
		{
			resultsDir: config.paths.results,
			reportsDir: config.paths.reports,
			tradeLog: config.paths.tradeLog,
		},
	);
	logger.info({ files: written }, "Backtest artifacts written");
}

const program = new Command()
	.name("squeeze-monitor")
	.description("Bollinger squeeze signal monitor and backtester");

program
	.command("monitor", { isDefault: true })
	.description("scan the watchlist and send alerts")
	.option("-i, --interval <sec>", "seconds between scans", positiveInteger, config.monitor.scanIntervalSec)
	.option("-p, --profile <name>", "strategy profile", config.strategy.profile)
	.action((options: MonitorOptions) => runMonitor(options));

program
	.command("backtest")
	.description("replay the strategy over daily history")
	.option("-d, --days <n>", "days of history", positiveInteger, config.backtest.days)
	.option("-c, --capital <amount>", "initial capital", positiveNumber, config.backtest.initialCapital)
	.option("-p, --profile <name>", "strategy profile", config.strategy.profile)
	.option("-m, --max <n>", "instruments to test", positiveInteger, config.backtest.maxInstruments)
	.option("--detail <mode>", `detailed reports: ${DETAIL_MODES.join(", ")}`, detailMode, "top3")
	.action((options: BacktestOptions) => runBacktestCommand(options));

program.parseAsync(process.argv).catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
