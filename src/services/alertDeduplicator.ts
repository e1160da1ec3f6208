import type { SignalKind } from "../types";

/**
 * Remembers when each (symbol, signal) alert last fired. The check is also
 * the commit: a `true` answer records `now`, whether or not the caller's
 * notification is later delivered.
 */
export class AlertDeduplicator {
	private readonly lastFired = new Map<string, number>();

	constructor(private readonly cooldownMs: number) {}

	shouldFire(symbol: string, kind: SignalKind, now: number = Date.now()): boolean {
		const key = `${symbol}:${kind}`;
		const last = this.lastFired.get(key);
		if (last !== undefined && now - last < this.cooldownMs) {
			return false;
		}
		this.lastFired.set(key, now);
		return true;
	}

	lastFiredAt(symbol: string, kind: SignalKind): number | undefined {
		return this.lastFired.get(`${symbol}:${kind}`);
	}

	get size(): number {
		return this.lastFired.size;
	}
}
