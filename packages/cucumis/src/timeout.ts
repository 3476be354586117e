// ============================================================================
// Timeouts for steps and hooks.
// ============================================================================

export class TimeoutError extends Error {
	override readonly name = 'TimeoutError';

	constructor(
		message: string,
		readonly timeout: number,
	) {
		super(message);
	}
}

/**
 * Run `fn` and settle with its result, or reject with a TimeoutError once
 * `ms` have passed. The timer is always cleared.
 */
export async function withTimeout<T>(fn: () => T | Promise<T>, ms: number, message: string): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;

	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new TimeoutError(message, ms)), ms);
	});

	try {
		return await Promise.race([Promise.resolve().then(fn), timeout]);
	} finally {
		clearTimeout(timer);
	}
}
