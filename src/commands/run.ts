import type { Command } from "commander";

import { loadConfig } from "../config/config.js";
import { SlidingWindowLimiter } from "../engage/rate-limit.js";
import { startTickScheduler } from "../engage/scheduler.js";
import { runEngagementTick } from "../engage/tick.js";
import { getChildLogger } from "../logging.js";
import { buildTickDeps } from "./tick.js";

const logger = getChildLogger({ module: "cmd-run" });

function parseIntervalSeconds(value: string): number {
	const seconds = Number(value);
	if (!Number.isFinite(seconds) || seconds <= 0) {
		throw new Error(`--interval must be a positive number of seconds, got '${value}'`);
	}
	return seconds;
}

export function registerRunCommand(program: Command): void {
	program
		.command("run")
		.description("Run engagement ticks on an interval until interrupted")
		.option("-i, --interval <seconds>", "Seconds between ticks", parseIntervalSeconds, 300)
		.action(async (opts: { interval: number }) => {
			const config = loadConfig();
			// One limiter for the life of the process so windows span ticks.
			const limiter = SlidingWindowLimiter.fromConfig(config.rateLimit);

			const scheduler = startTickScheduler({
				intervalMs: opts.interval * 1000,
				onTick: async () => {
					const result = await runEngagementTick(buildTickDeps(config, { limiter }));
					logger.info(
						{
							runId: result.runId,
							planned: result.plan.actions.length,
							executed: result.execute.executed.length,
							skippedStale: result.execute.skippedStale,
						},
						"tick finished",
					);
				},
			});
			console.log(`herald running; tick every ${opts.interval}s (Ctrl+C to stop)`);

			await new Promise<void>((resolve) => {
				const shutdown = (signal: NodeJS.Signals) => {
					logger.info({ signal }, "shutting down");
					scheduler
						.stop()
						.catch((err: unknown) => {
							logger.error({ error: String(err) }, "error while stopping scheduler");
						})
						.finally(resolve);
				};
				process.once("SIGINT", shutdown);
				process.once("SIGTERM", shutdown);
			});
		});
}
