import { getChildLogger } from "../logging.js";
import { TickLockError } from "./errors.js";

const logger = getChildLogger({ module: "tick-scheduler" });

export const MIN_TICK_INTERVAL_MS = 10_000;

export type TickScheduler = {
	/** Cancel future ticks and wait for an in-flight one to finish. */
	stop: () => Promise<void>;
};

export function startTickScheduler(options: {
	intervalMs: number;
	onTick: () => Promise<void>;
}): TickScheduler {
	const intervalMs = Math.max(options.intervalMs, MIN_TICK_INTERVAL_MS);
	let inFlight: Promise<void> | null = null;

	const runTick = async () => {
		if (inFlight) {
			logger.warn("tick already running; skipping");
			return;
		}
		const current = (async () => {
			try {
				await options.onTick();
			} catch (err) {
				if (err instanceof TickLockError) {
					logger.warn({ error: err.message }, "tick lock held elsewhere; skipping");
				} else {
					logger.error({ error: String(err) }, "tick failed");
				}
			}
		})();
		inFlight = current;
		try {
			await current;
		} finally {
			inFlight = null;
		}
	};

	const timer = setInterval(() => void runTick(), intervalMs);

	void runTick();

	return {
		stop: async () => {
			clearInterval(timer);
			if (inFlight) {
				await inFlight;
			}
		},
	};
}
