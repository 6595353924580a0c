/**
 * Core types for the engagement pipeline.
 *
 * Field names here are camelCase; the on-disk job and state formats use
 * snake_case and are converted at the store boundary.
 */

export const CHANNELS = ["x", "moltbook"] as const;
export type Channel = (typeof CHANNELS)[number];

export const ACTION_TYPES = ["post", "reply"] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

export const INTENT_LABELS = [
	"agents",
	"construction",
	"dev",
	"ops",
	"security",
	"trading",
] as const;
export type IntentLabel = (typeof INTENT_LABELS)[number] | "general";

export type ActionKind = "daily_status" | "mention_reply" | "initiation_reply";

/**
 * Known tags carried alongside an action. Consumers read these for logging
 * and state updates; nothing else is allowed in.
 */
export type ActionMetadata = {
	kind: ActionKind;
	intent?: IntentLabel;
	conversationId?: string;
	searchLabel?: string;
	authorId?: string;
	templateIndex?: number;
};

export type Action = {
	/** Idempotency key and job filename. */
	actionId: string;
	channel: Channel;
	type: ActionType;
	text: string;
	/** Required iff type is "reply". */
	inReplyTo?: string;
	metadata: ActionMetadata;
	/** Unix seconds. Stamped on enqueue when absent. */
	createdAt?: number;
};

export type Receipt = {
	ok: true;
	status: number;
	postId?: string;
};

export type Job = Action & {
	receipt?: Receipt;
	/** Unix seconds. */
	executedAt?: number;
};

export type ConversationMemory = {
	replyCount24h: number;
	/** Unix seconds. */
	lastReplyAt: number;
};

export type EngageState = {
	platformUserId?: string;
	mentionsCursor?: string;
	searchCursors: Record<string, string>;
	/** Unix seconds per channel. */
	lastDailyPostAt: Partial<Record<Channel, number>>;
	conversationMemory: Record<string, ConversationMemory>;
	/** Tweet id -> unix seconds when a reply was planned. */
	repliedIds: Record<string, number>;
};

export function emptyState(): EngageState {
	return {
		searchCursors: {},
		lastDailyPostAt: {},
		conversationMemory: {},
		repliedIds: {},
	};
}

export type InboundItem = {
	id?: string;
	authorId?: string;
	text: string;
	conversationId?: string;
};

export type InboundAuthor = {
	username: string;
	followerCount: number;
};

export type InboundBatch = {
	items: InboundItem[];
	authors: Record<string, InboundAuthor>;
};

export type FetchError = {
	source: string;
	message: string;
};

/**
 * Outcome of a best-effort inbound fetch. The planner treats a failure as
 * an empty batch.
 */
export type FetchResult = { ok: true; batch: InboundBatch } | { ok: false; error: FetchError };

export function emptyBatch(): InboundBatch {
	return { items: [], authors: {} };
}

export function isChannel(value: string): value is Channel {
	return CHANNELS.some((channel) => channel === value);
}

export function isActionType(value: string): value is ActionType {
	return ACTION_TYPES.some((type) => type === value);
}
