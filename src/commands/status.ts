import fs from "node:fs";
import path from "node:path";
import type { Command } from "commander";

import { loadConfig, resolveRuntimeDir, resolveStatusFile } from "../config/config.js";
import { resolveConfigPath } from "../config/path.js";
import { evaluateFreshness } from "../engage/freshness.js";
import { JobStore } from "../engage/job-store.js";
import { type LedgerEvent, readLedger } from "../engage/ledger.js";
import { StateStore } from "../engage/state-store.js";
import { FileStatusSource } from "../engage/status-source.js";
import { LEDGER_FILE, STATE_FILE } from "../engage/tick.js";
import { CHANNELS } from "../engage/types.js";

export type StatusOptions = {
	json?: boolean;
	events?: number;
};

function formatTimestamp(unixSeconds: number | undefined): string {
	return unixSeconds === undefined ? "-" : new Date(unixSeconds * 1000).toISOString();
}

function formatEvent(event: LedgerEvent): string {
	return `  ${event.timestamp} ${event.level.padEnd(5)} ${event.eventType}: ${event.message}`;
}

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Show freshness, queue, state and recent ledger events")
		.option("--json", "Output as JSON")
		.option("-n, --events <count>", "Number of ledger events to show", (v) => Number.parseInt(v, 10), 10)
		.action(async (opts: StatusOptions) => {
			const configPath = resolveConfigPath();
			const config = loadConfig();
			const runtimeDir = resolveRuntimeDir(config);
			const statusFile = resolveStatusFile(config, runtimeDir);

			const freshness = evaluateFreshness(await new FileStatusSource(statusFile).read(), {
				nowMs: Date.now(),
				staleAfterSeconds: config.freshness.staleAfterSeconds,
			});
			const queue = new JobStore({ rootDir: runtimeDir }).counts();
			const state = StateStore.fromConfig(path.join(runtimeDir, STATE_FILE), config.state, undefined, {
				quarantineCorrupt: false,
			}).load();
			const events = readLedger(path.join(runtimeDir, LEDGER_FILE), opts.events ?? 10);

			const status = {
				config: { path: configPath, exists: fs.existsSync(configPath) },
				runtimeDir,
				freshness: { statusFile, mode: config.freshness.mode, ...freshness },
				queue,
				state: {
					platformUserId: state.platformUserId ?? null,
					mentionsCursor: state.mentionsCursor ?? null,
					searchCursors: state.searchCursors,
					lastDailyPostAt: state.lastDailyPostAt,
					conversations: Object.keys(state.conversationMemory).length,
					repliedIds: Object.keys(state.repliedIds).length,
				},
				events,
			};

			if (opts.json) {
				console.log(JSON.stringify(status, null, 2));
				return;
			}

			console.log("Herald status:");
			console.log(`  Config: ${configPath}${status.config.exists ? "" : " (not found, using defaults)"}`);
			console.log(`  Runtime: ${runtimeDir}`);
			console.log(
				`  Freshness: ${freshness.reason} (${freshness.ok ? "ok" : "not ok"}, mode ${config.freshness.mode})`,
			);
			console.log(`  Queue: outbox=${queue.outbox}, sent=${queue.sent}, dead=${queue.dead}`);
			console.log(`  Mentions cursor: ${state.mentionsCursor ?? "-"}`);
			for (const channel of CHANNELS) {
				console.log(`  Last daily post (${channel}): ${formatTimestamp(state.lastDailyPostAt[channel])}`);
			}
			console.log(`  Tracked conversations: ${status.state.conversations}`);
			if (events.length > 0) {
				console.log("Recent ledger events:");
				for (const event of events) {
					console.log(formatEvent(event));
				}
			}
		});
}
