/**
 * Spacing between outgoing requests.
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface RateLimiter {
	/** Resolves once the next request may be sent */
	wait(): Promise<void>;
}

export interface CooldownLimiterOptions {
	/** Minimum time between two requests */
	cooldownMs: number;
	/** Clock in milliseconds; defaults to Date.now */
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Lets the first request through immediately and holds every later one until
 * `cooldownMs` has passed since the previous request.
 */
export function createCooldownLimiter(options: CooldownLimiterOptions): RateLimiter {
	const { cooldownMs, now = Date.now, sleep = (ms: number) => delay(ms) } = options;
	let lastRequestAt: number | null = null;

	return {
		async wait() {
			if (lastRequestAt !== null) {
				const remaining = cooldownMs - (now() - lastRequestAt);
				if (remaining > 0) {
					await sleep(remaining);
				}
			}
			lastRequestAt = now();
		},
	};
}

export const noRateLimit: RateLimiter = {
	async wait() {},
};
