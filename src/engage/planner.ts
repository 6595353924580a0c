/**
 * Engagement planner.
 *
 * Pure function of (state, now, inbound batches) -> candidate actions plus the
 * cursor and memory updates the caller should persist. Nothing here performs
 * I/O, and the input state is never mutated: conversation memory and replied
 * ids are copied and updated in a working copy so two replies can't be
 * planned into the same conversation within one pass.
 */

import type { PlannerConfig } from "../config/config.js";
import {
	DAILY_TEMPLATES,
	INITIATION_TEMPLATES,
	REPLY_TEMPLATES,
	classifyIntent,
	dailyTemplateIndex,
} from "./templates.js";
import {
	type Action,
	CHANNELS,
	type Channel,
	type ConversationMemory,
	type EngageState,
	type FetchError,
	type FetchResult,
	type InboundBatch,
	emptyBatch,
} from "./types.js";

const DAY_SECONDS = 24 * 3600;

const CHANNEL_OFFSETS: Record<Channel, number> = {
	x: 0,
	moltbook: 1,
};

export type PlanInput = {
	state: EngageState;
	nowMs: number;
	freshnessSnippet?: string;
	mentions?: FetchResult;
	/** Search results keyed by label. */
	searches?: Record<string, FetchResult>;
	/** Channels that get a daily post. Defaults to all. */
	channels?: readonly Channel[];
};

export type PlanResult = {
	actions: Action[];
	mentionsCursor?: string;
	searchCursors: Record<string, string>;
	conversationMemory: Record<string, ConversationMemory>;
	repliedIds: Record<string, number>;
	/** Fetches that failed and were planned as empty batches. */
	fetchErrors: FetchError[];
};

const NUMERIC_ID = /^\d+$/;

/**
 * Order ids numerically when both are digit strings (snowflake ids outgrow
 * Number precision), lexicographically otherwise.
 */
export function compareIds(a: string, b: string): number {
	if (NUMERIC_ID.test(a) && NUMERIC_ID.test(b)) {
		const x = a.replace(/^0+(?=\d)/, "");
		const y = b.replace(/^0+(?=\d)/, "");
		if (x.length !== y.length) {
			return x.length - y.length;
		}
		return x < y ? -1 : x > y ? 1 : 0;
	}
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * High-water mark over a batch. Never returns less than `current`.
 */
export function advanceCursor(current: string | undefined, batch: InboundBatch): string | undefined {
	let cursor = current;
	for (const item of batch.items) {
		if (!item.id) continue;
		if (cursor === undefined || compareIds(item.id, cursor) > 0) {
			cursor = item.id;
		}
	}
	return cursor;
}

function batchOf(result: FetchResult | undefined, errors: FetchError[]): InboundBatch {
	if (!result) {
		return emptyBatch();
	}
	if (!result.ok) {
		errors.push(result.error);
		return emptyBatch();
	}
	return result.batch;
}

function effectiveCount(entry: ConversationMemory, now: number): number {
	return now - entry.lastReplyAt >= DAY_SECONDS ? 0 : entry.replyCount24h;
}

function conversationAllows(
	memory: Record<string, ConversationMemory>,
	conversationId: string,
	now: number,
	config: PlannerConfig["conversation"],
): boolean {
	const entry = memory[conversationId];
	if (!entry) {
		return true;
	}
	if (effectiveCount(entry, now) >= config.maxRepliesPer24h) {
		return false;
	}
	return now - entry.lastReplyAt > config.cooldownSeconds;
}

function reserveConversation(
	memory: Record<string, ConversationMemory>,
	conversationId: string,
	now: number,
): void {
	const entry = memory[conversationId];
	const count = entry ? effectiveCount(entry, now) : 0;
	memory[conversationId] = { replyCount24h: count + 1, lastReplyAt: now };
}

function planDailyPosts(
	state: EngageState,
	now: number,
	channels: readonly Channel[],
	snippet: string,
	config: PlannerConfig,
): Action[] {
	const cooldown = config.dailyPostCooldownSeconds;
	const dayIndex = Math.floor(now / cooldown);
	const actions: Action[] = [];

	for (const channel of channels) {
		const last = state.lastDailyPostAt[channel];
		if (last !== undefined && now - last < cooldown) {
			continue;
		}
		const templateIndex = dailyTemplateIndex(dayIndex, CHANNEL_OFFSETS[channel]);
		const base = DAILY_TEMPLATES[templateIndex] ?? DAILY_TEMPLATES[0];
		actions.push({
			actionId: `daily-${channel}-${dayIndex}`,
			channel,
			type: "post",
			text: snippet ? `${base} ${snippet}` : base,
			metadata: { kind: "daily_status", templateIndex },
		});
	}
	return actions;
}

export function planEngagement(input: PlanInput, config: PlannerConfig): PlanResult {
	const { state } = input;
	const now = Math.floor(input.nowMs / 1000);
	const selfId = state.platformUserId;
	const fetchErrors: FetchError[] = [];

	const conversationMemory: Record<string, ConversationMemory> = {};
	for (const [id, entry] of Object.entries(state.conversationMemory)) {
		conversationMemory[id] = { ...entry };
	}
	const repliedIds: Record<string, number> = { ...state.repliedIds };

	const actions = planDailyPosts(
		state,
		now,
		input.channels ?? CHANNELS,
		input.freshnessSnippet?.trim() ?? "",
		config,
	);

	// Reactive replies. At-most-once comes from the cursor, not a dedupe set.
	const mentions = batchOf(input.mentions, fetchErrors);
	const mentionsCursor = advanceCursor(state.mentionsCursor, mentions);
	let replies = 0;
	for (const mention of mentions.items) {
		if (replies >= config.maxRepliesPerRun) {
			break;
		}
		if (!mention.id) continue;
		if (selfId && mention.authorId === selfId) continue;

		const conversationId = mention.conversationId || mention.id;
		if (!conversationAllows(conversationMemory, conversationId, now, config.conversation)) {
			continue;
		}
		reserveConversation(conversationMemory, conversationId, now);
		repliedIds[mention.id] = now;

		const intent = classifyIntent(mention.text);
		actions.push({
			actionId: `reply-x-${mention.id}`,
			channel: "x",
			type: "reply",
			inReplyTo: mention.id,
			text: REPLY_TEMPLATES[intent],
			metadata: {
				kind: "mention_reply",
				intent,
				conversationId,
				...(mention.authorId ? { authorId: mention.authorId } : {}),
			},
		});
		replies++;
	}

	// Search-driven initiation. Each label keeps its own cursor.
	const searchCursors: Record<string, string> = { ...state.searchCursors };
	const engagedAuthors = new Set<string>();
	let initiated = 0;
	const labels = Object.keys(input.searches ?? {}).sort();
	for (const label of labels) {
		const batch = batchOf(input.searches?.[label], fetchErrors);
		const cursor = advanceCursor(state.searchCursors[label], batch);
		if (cursor !== undefined) {
			searchCursors[label] = cursor;
		}
		if (!config.initiation.enabled) continue;

		for (const tweet of batch.items) {
			if (initiated >= config.initiation.maxPerRun) break;
			if (!tweet.id || !tweet.authorId) continue;
			if (repliedIds[tweet.id] !== undefined) continue;
			if (selfId && tweet.authorId === selfId) continue;
			if (engagedAuthors.has(tweet.authorId)) continue;

			const author = batch.authors[tweet.authorId];
			if (!author || author.followerCount < config.initiation.minFollowers) continue;

			const conversationId = tweet.conversationId || tweet.id;
			if (!conversationAllows(conversationMemory, conversationId, now, config.conversation)) {
				continue;
			}
			reserveConversation(conversationMemory, conversationId, now);
			repliedIds[tweet.id] = now;
			engagedAuthors.add(tweet.authorId);

			const intent = classifyIntent(tweet.text);
			actions.push({
				actionId: `init-x-${tweet.id}`,
				channel: "x",
				type: "reply",
				inReplyTo: tweet.id,
				text: INITIATION_TEMPLATES[intent],
				metadata: {
					kind: "initiation_reply",
					intent,
					conversationId,
					searchLabel: label,
					authorId: tweet.authorId,
				},
			});
			initiated++;
		}
	}

	return {
		actions,
		...(mentionsCursor !== undefined ? { mentionsCursor } : {}),
		searchCursors,
		conversationMemory,
		repliedIds,
		fetchErrors,
	};
}
