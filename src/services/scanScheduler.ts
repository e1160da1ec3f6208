import cron, { type ScheduledTask } from "node-cron";
import { BehaviorSubject } from "rxjs";
import { filter } from "rxjs/operators";
import { activeSignals } from "../signals/rules";
import type { InstrumentAnalysis, MonitorStatus } from "../types";
import { describeError } from "../utils/errors";
import { logger } from "../utils/logger";
import { settlesWithin, sleep, sleepUntil } from "../utils/retry";
import type { AlertDeduplicator } from "./alertDeduplicator";
import type { Analyzer } from "./analysis";
import {
	formatHeartbeat,
	formatScanSummary,
	formatShutdownMessage,
	formatSignalAlert,
	formatStartMessage,
} from "./messages";
import type { Watchlist } from "./watchlist";

export type Notifier = (text: string) => Promise<boolean>;

export type ScanSchedulerOptions = {
	watchlist: Watchlist;
	analyze: Analyzer;
	notify: Notifier;
	deduplicator: AlertDeduplicator;
	/** null disables the heartbeat task */
	heartbeatCron?: string | null;
	timezone?: string;
	pacingMs?: number;
	errorBackoffMs?: number;
	summaryEveryScans?: number;
	progressEvery?: number;
	shutdownTimeoutMs?: number;
	now?: () => number;
};

type MonitorState = {
	startedAt: number | null;
	scanCount: number;
	signalsSent: number;
	lastSignalAt: number | null;
	lastHeartbeatAt: number | null;
	intervalSec: number;
};

const log = logger.child({ component: "scheduler" });

/**
 * Drives the periodic scan over the watchlist. All counters live in one
 * state object that only this class writes; other tasks read `getStatus()`.
 * Stopping is cooperative: loops notice it at instrument and sleep boundaries.
 */
export class ScanScheduler {
	private readonly running$ = new BehaviorSubject(false);
	private readonly stopped$ = this.running$.pipe(filter((running) => !running));
	private state: MonitorState = {
		startedAt: null,
		scanCount: 0,
		signalsSent: 0,
		lastSignalAt: null,
		lastHeartbeatAt: null,
		intervalSec: 0,
	};
	private heartbeatTask: ScheduledTask | null = null;
	private loop: Promise<void> | null = null;
	private readonly now: () => number;

	constructor(private readonly options: ScanSchedulerOptions) {
		this.now = options.now ?? Date.now;
	}

	get isRunning(): boolean {
		return this.running$.value;
	}

	getStatus(): MonitorStatus {
		return {
			running: this.isRunning,
			...this.state,
			watchlistSize: this.options.watchlist.size,
			alertRecords: this.options.deduplicator.size,
		};
	}

	/** Resolves once the scan loop has exited, i.e. after `stop()`. */
	async start(intervalSec: number): Promise<void> {
		if (this.isRunning) {
			log.warn("Scan scheduler is already running");
			return;
		}

		this.state = {
			startedAt: this.now(),
			scanCount: 0,
			signalsSent: 0,
			lastSignalAt: null,
			lastHeartbeatAt: null,
			intervalSec,
		};
		this.running$.next(true);
		this.startHeartbeat();

		log.info(
			{ intervalSec, instruments: this.options.watchlist.size },
			"Scan scheduler started",
		);
		await this.options.notify(formatStartMessage(this.getStatus(), this.now()));

		this.loop = this.scanLoop(intervalSec * 1000);
		try {
			await this.loop;
		} finally {
			this.loop = null;
		}
	}

	async stop(): Promise<void> {
		if (!this.isRunning) {
			log.warn("Scan scheduler is not running");
			return;
		}

		this.running$.next(false);
		this.heartbeatTask?.stop();
		this.heartbeatTask = null;

		if (this.loop) {
			const timeoutMs = this.options.shutdownTimeoutMs ?? 10_000;
			if (!(await settlesWithin(this.loop, timeoutMs))) {
				log.warn({ timeoutMs }, "Scan loop did not settle in time, abandoning it");
			}
		}

		await this.options.notify(formatShutdownMessage(this.getStatus(), this.now()));
		log.info(
			{
				scans: this.state.scanCount,
				signalsSent: this.state.signalsSent,
			},
			"Scan scheduler stopped",
		);
	}

	/**
	 * One pass over the watchlist. Per-instrument failures are logged and
	 * skipped. Returns the number of alerts delivered.
	 */
	async scanOnce(): Promise<number> {
		this.state.scanCount += 1;
		const instruments = this.options.watchlist.list();
		const progressEvery = this.options.progressEvery ?? 10;
		const failed: string[] = [];
		let delivered = 0;

		log.info(
			{ scan: this.state.scanCount, instruments: instruments.length },
			"Scan started",
		);

		for (const [i, instrument] of instruments.entries()) {
			if (this.loop && !this.isRunning) break;

			try {
				const analysis = await this.options.analyze(instrument.symbol);
				if (analysis) {
					delivered += await this.dispatchSignals(analysis);
				}
			} catch (error) {
				log.error(
					{ symbol: instrument.symbol, reason: describeError(error) },
					"Instrument scan failed",
				);
				failed.push(instrument.symbol);
			}

			if ((i + 1) % progressEvery === 0) {
				log.info(
					{ done: i + 1, total: instruments.length },
					"Scan progress",
				);
			}
			await this.sleep(this.options.pacingMs ?? 200);
		}

		if (failed.length) {
			log.warn({ symbols: failed }, "Instruments failed this scan");
		}
		log.info(
			{ scan: this.state.scanCount, delivered },
			delivered ? "Scan finished with alerts" : "Scan finished, no signals",
		);
		return delivered;
	}

	async sendHeartbeat(): Promise<void> {
		if (!this.isRunning) return;
		try {
			const now = this.now();
			const sent = await this.options.notify(formatHeartbeat(this.getStatus(), now));
			if (sent) {
				this.state.lastHeartbeatAt = now;
				log.info({ scans: this.state.scanCount }, "Heartbeat sent");
			} else {
				log.warn("Heartbeat not delivered");
			}
		} catch (error) {
			log.error({ error }, "Heartbeat failed");
		}
	}

	private async dispatchSignals(analysis: InstrumentAnalysis): Promise<number> {
		const { symbol } = analysis;
		let delivered = 0;

		for (const kind of activeSignals(analysis.signals)) {
			const now = this.now();
			if (!this.options.deduplicator.shouldFire(symbol, kind, now)) continue;

			const text = formatSignalAlert(
				analysis,
				kind,
				this.options.watchlist.displayName(symbol),
			);
			if (await this.options.notify(text)) {
				delivered += 1;
				this.state.signalsSent += 1;
				this.state.lastSignalAt = now;
				log.info({ symbol, kind, price: analysis.price }, "Signal alert sent");
			} else {
				log.warn({ symbol, kind }, "Signal alert not delivered");
			}
		}

		return delivered;
	}

	private async scanLoop(intervalMs: number): Promise<void> {
		const summaryEvery = this.options.summaryEveryScans ?? 5;

		while (this.isRunning) {
			const passStartedAt = this.now();
			try {
				await this.scanOnce();
				if (this.isRunning && this.state.scanCount % summaryEvery === 0) {
					await this.options.notify(formatScanSummary(this.getStatus(), this.now()));
				}
				const elapsed = this.now() - passStartedAt;
				await this.sleep(Math.max(0, intervalMs - elapsed));
			} catch (error) {
				log.error({ error }, "Scan loop failed, backing off");
				await this.sleep(this.options.errorBackoffMs ?? 30_000);
			}
		}
	}

	private startHeartbeat(): void {
		const expression = this.options.heartbeatCron;
		if (expression === null || expression === undefined) return;

		this.heartbeatTask = cron.schedule(expression, () => this.sendHeartbeat(), {
			timezone: this.options.timezone,
		});
		log.info({ cron: expression }, "Heartbeat scheduled");
	}

	/** Wakes early when the scheduler stops. */
	private sleep(ms: number): Promise<void> {
		if (ms <= 0) return Promise.resolve();
		if (!this.isRunning) return this.loop ? Promise.resolve() : sleep(ms);
		return sleepUntil(ms, this.stopped$);
	}
}
