import { z } from "zod";
import type { WatchedInstrument } from "../types";
import { ConfigError } from "../utils/errors";
import { logger } from "../utils/logger";
import { readJson } from "../utils/storage";

export type InstrumentCatalog = {
	quoteAsset: string;
	instruments: WatchedInstrument[];
};

const catalogEntrySchema = z.object({
	symbol: z.string().trim().min(1),
	name: z.string().optional(),
});

// entries are checked one by one so a bad line does not drop the catalog
const catalogSchema = z.object({
	quoteAsset: z.string().optional(),
	instruments: z.array(z.unknown()).default([]),
});

export async function loadInstrumentCatalog(
	filePath: string,
	fallbackQuoteAsset: string,
): Promise<InstrumentCatalog> {
	const parsed = catalogSchema.safeParse(await readJson<unknown>(filePath, {}));
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid instrument catalog ${filePath}: ${issues}`);
	}

	const instruments: WatchedInstrument[] = [];
	for (const [index, value] of parsed.data.instruments.entries()) {
		const entry = catalogEntrySchema.safeParse(value);
		if (!entry.success) {
			logger.warn({ filePath, index }, "Skipping invalid catalog entry");
			continue;
		}
		instruments.push({
			symbol: entry.data.symbol.toUpperCase(),
			displayName: entry.data.name,
		});
	}

	return {
		quoteAsset: parsed.data.quoteAsset ?? fallbackQuoteAsset,
		instruments,
	};
}

/**
 * Ordered set of instruments the scanner walks. Scans read `list()`, a copy,
 * so edits made while a pass is running apply from the next pass.
 */
export class Watchlist {
	private instruments: WatchedInstrument[] = [];
	private readonly names = new Map<string, string>();

	constructor(
		private readonly quoteAsset: string,
		initial: readonly WatchedInstrument[] = [],
		knownNames: readonly WatchedInstrument[] = initial,
	) {
		for (const instrument of knownNames) {
			if (instrument.displayName) {
				this.names.set(instrument.symbol, instrument.displayName);
			}
		}
		this.add(initial.map((instrument) => instrument.symbol));
	}

	normalizeSymbol(input: string): string {
		const symbol = input.trim().toUpperCase().replace(/[^A-Z0-9]/g, "");
		if (!symbol) return symbol;
		return symbol.endsWith(this.quoteAsset) && symbol !== this.quoteAsset
			? symbol
			: `${symbol}${this.quoteAsset}`;
	}

	add(symbols: readonly string[]): string[] {
		const added: string[] = [];
		for (const input of symbols) {
			const symbol = this.normalizeSymbol(input);
			if (!symbol || this.has(symbol)) continue;
			this.instruments.push({ symbol, displayName: this.names.get(symbol) });
			added.push(symbol);
		}
		return added;
	}

	remove(symbols: readonly string[]): string[] {
		const targets = new Set(symbols.map((s) => this.normalizeSymbol(s)));
		const removed = this.instruments
			.filter((instrument) => targets.has(instrument.symbol))
			.map((instrument) => instrument.symbol);
		if (removed.length) {
			this.instruments = this.instruments.filter(
				(instrument) => !targets.has(instrument.symbol),
			);
		}
		return removed;
	}

	has(symbol: string): boolean {
		return this.instruments.some((instrument) => instrument.symbol === symbol);
	}

	list(): WatchedInstrument[] {
		return this.instruments.map((instrument) => ({ ...instrument }));
	}

	symbols(): string[] {
		return this.instruments.map((instrument) => instrument.symbol);
	}

	displayName(symbol: string): string {
		return this.names.get(symbol) ?? symbol;
	}

	get size(): number {
		return this.instruments.length;
	}
}
