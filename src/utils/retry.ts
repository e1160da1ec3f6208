import { type Observable, firstValueFrom, from, race, timer } from "rxjs";
import { map, takeUntil } from "rxjs/operators";
import { logger } from "./logger";

export async function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Sleeps for `ms`, or less if `until$` emits first. */
export function sleepUntil(ms: number, until$: Observable<unknown>): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return firstValueFrom(
		timer(ms).pipe(
			takeUntil(until$),
			map(() => undefined),
		),
		{ defaultValue: undefined },
	);
}

/** true if `task` settles within `timeoutMs`, false if the timer wins. */
export function settlesWithin(
	task: Promise<unknown>,
	timeoutMs: number,
): Promise<boolean> {
	return firstValueFrom(
		race(
			from(task).pipe(map(() => true)),
			timer(timeoutMs).pipe(map(() => false)),
		),
	);
}

export type RetryOptions = {
	attempts: number;
	delayMs: number;
	label?: string;
	wait?: (ms: number) => Promise<void>;
};

/**
 * Runs `task` up to `attempts` times with a fixed delay between tries and
 * rethrows the last failure.
 */
export async function withRetry<T>(
	task: (attempt: number) => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const wait = options.wait ?? sleep;
	const attempts = Math.max(1, options.attempts);
	let lastError: unknown;

	for (let attempt = 1; attempt <= attempts; attempt++) {
		try {
			return await task(attempt);
		} catch (error) {
			lastError = error;
			if (attempt < attempts) {
				logger.warn(
					{ label: options.label, attempt, attempts, error },
					"Attempt failed, retrying",
				);
				await wait(options.delayMs);
			}
		}
	}

	throw lastError;
}
