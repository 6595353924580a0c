/**
 * In-memory sliding-window limiter, one window per channel.
 *
 * A per-run soft guard layered under the engager's per-tick cap. It resets
 * on process restart; the durable limits are the daily cadence and the
 * conversation memory in state.
 */

import type { RateLimitConfig } from "../config/config.js";
import { type Clock, systemClock } from "../utils.js";

export type SlidingWindowOptions = {
	windowSeconds: number;
	maxPerWindow: number;
	now?: Clock;
};

export class SlidingWindowLimiter {
	private readonly windowMs: number;
	private readonly maxPerWindow: number;
	private readonly now: Clock;
	private readonly hits = new Map<string, number[]>();

	constructor(options: SlidingWindowOptions) {
		this.windowMs = options.windowSeconds * 1000;
		this.maxPerWindow = options.maxPerWindow;
		this.now = options.now ?? systemClock;
	}

	static fromConfig(config: RateLimitConfig, now?: Clock): SlidingWindowLimiter {
		return new SlidingWindowLimiter({
			windowSeconds: config.windowSeconds,
			maxPerWindow: config.maxPerWindow,
			now,
		});
	}

	/**
	 * Record and allow if the window has room; reject without recording
	 * otherwise.
	 */
	allow(key: string): boolean {
		const now = this.now();
		const recent = (this.hits.get(key) ?? []).filter((t) => now - t < this.windowMs);
		if (recent.length >= this.maxPerWindow) {
			this.hits.set(key, recent);
			return false;
		}
		recent.push(now);
		this.hits.set(key, recent);
		return true;
	}
}
