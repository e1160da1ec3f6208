import { BehaviorSubject } from "rxjs";
import { filter } from "rxjs/operators";
import type { TelegramUpdate } from "../clients/telegram";
import type { MonitorStatus, StrategySettings } from "../types";
import { describeError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sleepUntil } from "../utils/retry";
import type { Analyzer } from "./analysis";
import { escapeHtml, formatAnalysis, formatHelp, formatStatus } from "./messages";
import type { Watchlist } from "./watchlist";

export type CommandListenerOptions = {
	chatId: string;
	fetchUpdates: (
		offset: number,
		timeoutSec: number,
		signal: AbortSignal,
	) => Promise<TelegramUpdate[]>;
	reply: (text: string) => Promise<boolean>;
	status: () => MonitorStatus;
	analyze: Analyzer;
	watchlist: Watchlist;
	strategy: StrategySettings;
	pollTimeoutSec?: number;
	errorBackoffMs?: number;
	now?: () => number;
};

export type ParsedCommand = { name: string; args: string[] };

const log = logger.child({ component: "commands" });

/** `/ticker@my_bot btc` → { name: "ticker", args: ["btc"] } */
export function parseCommand(text: string): ParsedCommand | null {
	const [head, ...args] = text.trim().split(/\s+/);
	if (!head?.startsWith("/")) return null;
	const name = head.slice(1).split("@")[0].toLowerCase();
	if (!name) return null;
	return { name, args: args.filter(Boolean) };
}

/**
 * Long-polls the bot API for chat commands. It reaches the scanner only
 * through the `status` snapshot and the shared analysis path.
 */
export class CommandListener {
	private readonly running$ = new BehaviorSubject(false);
	private readonly stopped$ = this.running$.pipe(filter((running) => !running));
	private offset = 0;
	private abort: AbortController | null = null;
	private readonly now: () => number;

	constructor(private readonly options: CommandListenerOptions) {
		this.now = options.now ?? Date.now;
	}

	async handleCommand(text: string): Promise<string | null> {
		const command = parseCommand(text);
		if (!command) return null;

		switch (command.name) {
			case "start":
			case "help":
				return formatHelp(this.options.status());
			case "status":
				return formatStatus(this.options.status(), this.now());
			case "ticker":
				return this.tickerReply(command.args[0]);
			case "watch":
				return this.watchReply(command.args, "add");
			case "unwatch":
				return this.watchReply(command.args, "remove");
			default:
				return null;
		}
	}

	async run(): Promise<void> {
		if (this.running$.value) return;
		this.running$.next(true);
		log.info("Command listener started");

		await this.dropPendingUpdates();
		while (this.running$.value) {
			try {
				await this.pollOnce();
			} catch (error) {
				if (!this.running$.value) break;
				log.error({ reason: describeError(error) }, "Command polling failed, backing off");
				await sleepUntil(this.options.errorBackoffMs ?? 30_000, this.stopped$);
			}
		}
		log.info("Command listener stopped");
	}

	/** Wakes a pending backoff and aborts the long poll in flight. */
	stop(): void {
		this.running$.next(false);
		this.abort?.abort();
	}

	async pollOnce(): Promise<void> {
		this.abort = new AbortController();
		const updates = await this.options.fetchUpdates(
			this.offset,
			this.options.pollTimeoutSec ?? 30,
			this.abort.signal,
		);

		for (const update of updates) {
			this.offset = Math.max(this.offset, update.update_id + 1);
			const message = update.message;
			if (!message?.text) continue;
			if (String(message.chat.id) !== this.options.chatId) {
				log.warn({ chatId: message.chat.id }, "Ignoring command from unknown chat");
				continue;
			}
			await this.respond(message.text);
		}
	}

	private async respond(text: string): Promise<void> {
		try {
			const reply = await this.handleCommand(text);
			if (reply) await this.options.reply(reply);
		} catch (error) {
			log.error({ text, error }, "Command handler failed");
			await this.options.reply(
				`❌ <b>Command failed</b>\n\n${escapeHtml(describeError(error))}`,
			);
		}
	}

	private async dropPendingUpdates(): Promise<void> {
		try {
			this.abort = new AbortController();
			const pending = await this.options.fetchUpdates(0, 0, this.abort.signal);
			const last = pending[pending.length - 1];
			if (last) this.offset = last.update_id + 1;
		} catch (error) {
			log.warn({ reason: describeError(error) }, "Could not drop pending updates");
		}
	}

	private async tickerReply(input: string | undefined): Promise<string> {
		if (!input) {
			return "❌ Give a symbol, e.g. <b>/ticker BTC</b>";
		}

		const { watchlist, strategy } = this.options;
		const symbol = watchlist.normalizeSymbol(input);
		const analysis = await this.options.analyze(symbol);
		if (!analysis) {
			return `❌ <b>Not enough data for ${escapeHtml(symbol)}</b>`;
		}

		log.info({ symbol }, "Sent analysis for ticker command");
		return formatAnalysis(analysis, watchlist.displayName(symbol), strategy);
	}

	private watchReply(args: string[], mode: "add" | "remove"): string {
		if (!args.length) {
			return `❌ Give one or more symbols, e.g. <b>/${mode === "add" ? "watch" : "unwatch"} BTC ETH</b>`;
		}

		const { watchlist } = this.options;
		const changed = mode === "add" ? watchlist.add(args) : watchlist.remove(args);
		const verb = mode === "add" ? "Added" : "Removed";
		if (!changed.length) {
			return `No change. Watching ${watchlist.size} instruments.`;
		}
		log.info({ symbols: changed, mode }, "Watchlist updated");
		return `${verb}: ${changed.map(escapeHtml).join(", ")}\nWatching ${watchlist.size} instruments.`;
	}
}
