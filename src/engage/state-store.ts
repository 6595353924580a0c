/**
 * Persistent cross-run state (state.json in the runtime directory).
 *
 * Loading never throws: a missing file starts from empty defaults, and a
 * corrupted one is moved aside to `state.json.corrupted.<ms>` before
 * starting fresh. Saving prunes conversation memory and replied ids, then
 * writes atomically; a failed save is a StorageError.
 */

import fs from "node:fs";

import { z } from "zod";

import type { StateConfig } from "../config/config.js";
import { writeJsonAtomic } from "../infra/atomic-file.js";
import { getChildLogger } from "../logging.js";
import { type Clock, systemClock, unixSeconds } from "../utils.js";
import { StorageError } from "./errors.js";
import { type ConversationMemory, type EngageState, emptyState } from "./types.js";

const logger = getChildLogger({ module: "state-store" });

const STATE_VERSION = 1;

const ConversationEntrySchema = z.object({
	reply_count_24h: z.number().int().min(0),
	last_reply_at: z.number(),
});

// Older files wrote explicit nulls for unset cursors and channels.
const StateFileSchema = z.object({
	version: z.number().int().optional(),
	ts_unix: z.number().optional(),
	platform_user_id: z.string().nullish(),
	mentions_cursor: z.string().nullish(),
	search_cursors: z.record(z.string(), z.string()).default({}),
	last_daily_post_at: z
		.object({
			x: z.number().nullish(),
			moltbook: z.number().nullish(),
		})
		.default({}),
	conversation_memory: z.record(z.string(), ConversationEntrySchema).default({}),
	replied_ids: z.record(z.string(), z.number()).default({}),
});

type StateFile = z.infer<typeof StateFileSchema>;

function decodeState(file: StateFile): EngageState {
	const state = emptyState();
	if (file.platform_user_id) state.platformUserId = file.platform_user_id;
	if (file.mentions_cursor) state.mentionsCursor = file.mentions_cursor;
	state.searchCursors = { ...file.search_cursors };
	if (typeof file.last_daily_post_at.x === "number") {
		state.lastDailyPostAt.x = file.last_daily_post_at.x;
	}
	if (typeof file.last_daily_post_at.moltbook === "number") {
		state.lastDailyPostAt.moltbook = file.last_daily_post_at.moltbook;
	}
	for (const [id, entry] of Object.entries(file.conversation_memory)) {
		state.conversationMemory[id] = {
			replyCount24h: entry.reply_count_24h,
			lastReplyAt: entry.last_reply_at,
		};
	}
	state.repliedIds = { ...file.replied_ids };
	return state;
}

function encodeState(state: EngageState, nowSeconds: number) {
	const conversationMemory: Record<string, { reply_count_24h: number; last_reply_at: number }> = {};
	for (const [id, entry] of Object.entries(state.conversationMemory)) {
		conversationMemory[id] = {
			reply_count_24h: entry.replyCount24h,
			last_reply_at: entry.lastReplyAt,
		};
	}
	return {
		version: STATE_VERSION,
		ts_unix: nowSeconds,
		platform_user_id: state.platformUserId ?? null,
		mentions_cursor: state.mentionsCursor ?? null,
		search_cursors: state.searchCursors,
		last_daily_post_at: {
			x: state.lastDailyPostAt.x ?? null,
			moltbook: state.lastDailyPostAt.moltbook ?? null,
		},
		conversation_memory: conversationMemory,
		replied_ids: state.repliedIds,
	};
}

export type PruneOptions = {
	conversationTtlSeconds: number;
	repliedIdTtlSeconds: number;
};

/**
 * Drop conversation memory and replied ids older than their TTLs.
 */
export function pruneState(state: EngageState, nowSeconds: number, options: PruneOptions): EngageState {
	const conversationMemory: Record<string, ConversationMemory> = {};
	for (const [id, entry] of Object.entries(state.conversationMemory)) {
		if (nowSeconds - entry.lastReplyAt < options.conversationTtlSeconds) {
			conversationMemory[id] = { ...entry };
		}
	}
	const repliedIds: Record<string, number> = {};
	for (const [id, at] of Object.entries(state.repliedIds)) {
		if (nowSeconds - at < options.repliedIdTtlSeconds) {
			repliedIds[id] = at;
		}
	}
	return { ...state, conversationMemory, repliedIds };
}

export type StateStoreOptions = Partial<PruneOptions> & {
	filePath: string;
	now?: Clock;
	/** Move a corrupted file aside on load. Off for read-only callers. */
	quarantineCorrupt?: boolean;
};

export class StateStore {
	readonly filePath: string;
	private readonly now: Clock;
	private readonly prune: PruneOptions;
	private readonly quarantineCorrupt: boolean;

	constructor(options: StateStoreOptions) {
		this.filePath = options.filePath;
		this.now = options.now ?? systemClock;
		this.quarantineCorrupt = options.quarantineCorrupt ?? true;
		this.prune = {
			conversationTtlSeconds: options.conversationTtlSeconds ?? 48 * 3600,
			repliedIdTtlSeconds: options.repliedIdTtlSeconds ?? 7 * 24 * 3600,
		};
	}

	static fromConfig(
		filePath: string,
		config: StateConfig,
		now?: Clock,
		options: Pick<StateStoreOptions, "quarantineCorrupt"> = {},
	): StateStore {
		return new StateStore({
			...options,
			filePath,
			now,
			conversationTtlSeconds: Math.round(config.conversationTtlHours * 3600),
			repliedIdTtlSeconds: Math.round(config.repliedIdTtlDays * 24 * 3600),
		});
	}

	load(): EngageState {
		let raw: string;
		try {
			raw = fs.readFileSync(this.filePath, "utf-8");
		} catch (err) {
			if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
				logger.error({ file: this.filePath, error: String(err) }, "state file unreadable; using defaults");
			}
			return emptyState();
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err) {
			this.quarantine(`invalid JSON: ${String(err)}`);
			return emptyState();
		}

		const result = StateFileSchema.safeParse(parsed);
		if (!result.success) {
			this.quarantine(`schema mismatch: ${result.error.issues[0]?.message ?? "unknown"}`);
			return emptyState();
		}
		return decodeState(result.data);
	}

	/**
	 * Prune and persist. Returns the state as written.
	 */
	save(state: EngageState): EngageState {
		const nowSeconds = unixSeconds(this.now);
		const pruned = pruneState(state, nowSeconds, this.prune);
		try {
			writeJsonAtomic(this.filePath, encodeState(pruned, nowSeconds));
		} catch (err) {
			throw new StorageError(this.filePath, "failed to write state", { cause: err });
		}
		return pruned;
	}

	private quarantine(reason: string): void {
		if (!this.quarantineCorrupt) {
			logger.warn({ file: this.filePath, reason }, "state file corrupted; using defaults");
			return;
		}
		const backupPath = `${this.filePath}.corrupted.${this.now()}`;
		try {
			fs.renameSync(this.filePath, backupPath);
			logger.error({ file: this.filePath, backupPath, reason }, "state file corrupted; moved aside");
		} catch (err) {
			logger.error(
				{ file: this.filePath, reason, error: String(err) },
				"state file corrupted and could not be moved aside",
			);
		}
	}
}
