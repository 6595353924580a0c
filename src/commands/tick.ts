import type { Command } from "commander";

import {
	type HeraldConfig,
	loadConfig,
	resolveRuntimeDir,
	resolveStatusFile,
} from "../config/config.js";
import { FileStatusSource } from "../engage/status-source.js";
import { type TickDeps, type TickResult, runEngagementTick } from "../engage/tick.js";
import { getChildLogger } from "../logging.js";
import { createChannels } from "../social/index.js";

const logger = getChildLogger({ module: "cmd-tick" });

/**
 * Wire a tick from config: runtime paths, status file and channel clients.
 */
export function buildTickDeps(config: HeraldConfig, overrides: Partial<TickDeps> = {}): TickDeps {
	const runtimeDir = resolveRuntimeDir(config);
	const channels = createChannels(config);
	return {
		config,
		runtimeDir,
		statusSource: new FileStatusSource(resolveStatusFile(config, runtimeDir)),
		senders: channels.senders,
		userId: channels.userId,
		resolveUserId: channels.resolveUserId,
		mentionsFor: channels.mentionsFor,
		searches: channels.searches,
		...overrides,
	};
}

export function formatTickSummary(result: TickResult): string[] {
	const { freshness, enqueue, execute } = result;
	return [
		`Run ${result.runId}`,
		`  Freshness: ${freshness.reason} (${freshness.ok ? "ok" : "not ok"})`,
		`  Planned: ${result.plan.actions.length}, rate limited: ${result.rateLimited.length}`,
		`  Enqueued: ${enqueue.enqueued.length}, duplicates: ${enqueue.skipped.length}, blocked: ${enqueue.blocked.length}`,
		execute.skippedStale
			? "  Execution: suspended (stale status)"
			: `  Executed: ${execute.executed.length}, failed: ${execute.failed.length}, dead: ${execute.dead.length}`,
	];
}

export function registerTickCommand(program: Command): void {
	program
		.command("tick")
		.description("Run one engagement tick: plan, enqueue and execute")
		.option("--json", "Output as JSON")
		.action(async (opts: { json?: boolean }) => {
			const config = loadConfig();
			const result = await runEngagementTick(buildTickDeps(config));
			logger.info(
				{ runId: result.runId, executed: result.execute.executed.length },
				"tick command finished",
			);

			if (opts.json) {
				console.log(
					JSON.stringify(
						{
							runId: result.runId,
							freshness: result.freshness,
							actions: result.plan.actions.map((action) => action.actionId),
							rateLimited: result.rateLimited,
							enqueue: result.enqueue,
							execute: {
								skippedStale: result.execute.skippedStale,
								executed: result.execute.executed.map((job) => job.actionId),
								failed: result.execute.failed,
								dead: result.execute.dead,
							},
						},
						null,
						2,
					),
				);
				return;
			}
			for (const line of formatTickSummary(result)) {
				console.log(line);
			}
		});
}
