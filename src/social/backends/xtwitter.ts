import { z } from "zod";

import {
	ChannelSendError,
	ContractViolationError,
	InboundFetchError,
} from "../../engage/errors.js";
import type { InboundAuthor, InboundBatch, InboundItem, Receipt } from "../../engage/types.js";
import { getChildLogger } from "../../logging.js";
import type { ChannelSender, InboundSource } from "../client.js";
import { type ApiResult, DEFAULT_REQUEST_TIMEOUT_MS, requestJson, trimBaseUrl } from "../http.js";

const logger = getChildLogger({ module: "xtwitter-backend" });

export const DEFAULT_X_API_BASE = "https://api.x.com";

const X_TWEET_MAX_LENGTH = 280;

/**
 * Truncate text to fit within X's character limit.
 * Uses code-point-safe slicing (Array.from) to avoid splitting surrogate pairs.
 * Prefers word boundaries to avoid cutting mid-word.
 */
export function truncateForX(text: string): string {
	const codePoints = Array.from(text);
	if (codePoints.length <= X_TWEET_MAX_LENGTH) return text;
	logger.warn(
		{ length: codePoints.length, max: X_TWEET_MAX_LENGTH },
		"tweet exceeded char limit, truncating",
	);
	const cut = codePoints.slice(0, X_TWEET_MAX_LENGTH - 1).join(""); // leave room for ellipsis
	const lastSpace = cut.lastIndexOf(" ");
	const breakpoint = lastSpace > X_TWEET_MAX_LENGTH * 0.6 ? lastSpace : cut.length;
	return `${cut.slice(0, breakpoint)}…`;
}

/**
 * X API v2 response shapes. Only the fields the planner reads are declared;
 * anything else passes through unchecked.
 */
const XTweetSchema = z.object({
	id: z.string().optional(),
	text: z.string().default(""),
	author_id: z.string().optional(),
	conversation_id: z.string().optional(),
});

const XUserSchema = z.object({
	id: z.string(),
	username: z.string().default(""),
	public_metrics: z.object({ followers_count: z.number().optional() }).optional(),
});

const XTweetListSchema = z.object({
	data: z.array(XTweetSchema).optional(),
	includes: z.object({ users: z.array(XUserSchema).optional() }).optional(),
	meta: z.object({ newest_id: z.string().optional(), result_count: z.number().optional() }).optional(),
});

const XCreatedTweetSchema = z.object({
	data: z.object({ id: z.string() }).optional(),
});

const XMeSchema = z.object({
	data: z.object({ id: z.string(), username: z.string().optional() }),
});

function clamp(value: number, min: number, max: number): number {
	return Math.min(Math.max(Math.floor(value), min), max);
}

function toBatch(payload: unknown, source: string): InboundBatch {
	if (payload === null) {
		return { items: [], authors: {} };
	}
	const parsed = XTweetListSchema.safeParse(payload);
	if (!parsed.success) {
		throw new ContractViolationError(`${source}: unexpected response shape`, {
			cause: parsed.error,
		});
	}

	const items: InboundItem[] = (parsed.data.data ?? []).map((tweet) => ({
		id: tweet.id,
		authorId: tweet.author_id,
		text: tweet.text,
		conversationId: tweet.conversation_id,
	}));

	// Author lookup from the includes.users expansion
	const authors: Record<string, InboundAuthor> = {};
	for (const user of parsed.data.includes?.users ?? []) {
		authors[user.id] = {
			username: user.username,
			followerCount: user.public_metrics?.followers_count ?? 0,
		};
	}
	return { items, authors };
}

export type XClientOptions = {
	bearerToken?: string;
	baseUrl?: string;
	fetchImpl?: typeof fetch;
	timeoutMs?: number;
};

/**
 * X API v2 client: outbound posts and replies, plus the mentions and
 * recent-search reads the planner consumes.
 */
export class XClient implements ChannelSender {
	readonly channel = "x" as const;
	private readonly baseUrl: string;
	private readonly bearerToken?: string;
	private readonly fetchImpl: typeof fetch;
	private readonly timeoutMs: number;

	constructor(options: XClientOptions = {}) {
		this.baseUrl = trimBaseUrl(options.baseUrl ?? DEFAULT_X_API_BASE);
		this.bearerToken = options.bearerToken;
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
	}

	private request(path: string, init: RequestInit): Promise<ApiResult> {
		return requestJson({
			fetchImpl: this.fetchImpl,
			url: `${this.baseUrl}${path}`,
			init,
			bearerToken: this.bearerToken,
			timeoutMs: this.timeoutMs,
		});
	}

	/** Resolve the authenticated account's user id. */
	async me(): Promise<string> {
		const result = await this.request("/2/users/me", { method: "GET" });
		if (!result.ok) {
			throw new InboundFetchError("x:users/me", result.status, result.error);
		}
		const parsed = XMeSchema.safeParse(result.data);
		if (!parsed.success) {
			throw new ContractViolationError("x:users/me: response has no user id", {
				cause: parsed.error,
			});
		}
		return parsed.data.data.id;
	}

	async fetchMentions(
		userId: string,
		sinceId: string | undefined,
		maxResults: number,
	): Promise<InboundBatch> {
		const params = new URLSearchParams({
			max_results: String(clamp(maxResults, 5, 100)),
			"tweet.fields": "author_id,created_at,conversation_id",
			expansions: "author_id",
			"user.fields": "username,public_metrics",
		});
		if (sinceId) {
			params.set("since_id", sinceId);
		}

		const result = await this.request(`/2/users/${encodeURIComponent(userId)}/mentions?${params}`, {
			method: "GET",
		});
		if (!result.ok) {
			throw new InboundFetchError("x:mentions", result.status, result.error);
		}
		return toBatch(result.data, "x:mentions");
	}

	async searchRecent(
		query: string,
		sinceId: string | undefined,
		maxResults: number,
	): Promise<InboundBatch> {
		const params = new URLSearchParams({
			query,
			max_results: String(clamp(maxResults, 10, 100)),
			"tweet.fields": "author_id,created_at,conversation_id",
			expansions: "author_id",
			"user.fields": "username,public_metrics",
		});
		if (sinceId) {
			params.set("since_id", sinceId);
		}

		const result = await this.request(`/2/tweets/search/recent?${params}`, { method: "GET" });
		if (!result.ok) {
			throw new InboundFetchError("x:search", result.status, result.error);
		}
		return toBatch(result.data, "x:search");
	}

	mentions(userId: string): InboundSource {
		return {
			label: "x:mentions",
			fetch: (sinceCursor, maxResults) => this.fetchMentions(userId, sinceCursor, maxResults),
		};
	}

	search(label: string, query: string): InboundSource {
		return {
			label,
			fetch: (sinceCursor, maxResults) => this.searchRecent(query, sinceCursor, maxResults),
		};
	}

	async post(text: string): Promise<Receipt> {
		return this.createTweet({ text: truncateForX(text) }, "post");
	}

	async reply(targetId: string, text: string): Promise<Receipt> {
		return this.createTweet(
			{ text: truncateForX(text), reply: { in_reply_to_tweet_id: targetId } },
			"reply",
		);
	}

	private async createTweet(body: Record<string, unknown>, op: "post" | "reply"): Promise<Receipt> {
		let result: ApiResult;
		try {
			result = await this.request("/2/tweets", { method: "POST", body: JSON.stringify(body) });
		} catch (err) {
			throw new ChannelSendError(`X ${op} failed: network error`, { kind: "network", cause: err });
		}

		if (!result.ok) {
			if (result.status === 429) {
				logger.warn(`X ${op} rate limited`);
			}
			throw new ChannelSendError(`X ${op} failed (${result.status}): ${result.error}`, {
				kind: "api",
				status: result.status,
				rateLimited: result.status === 429,
			});
		}

		const parsed = XCreatedTweetSchema.safeParse(result.data);
		const postId = parsed.success ? parsed.data.data?.id : undefined;
		return { ok: true, status: result.status, ...(postId ? { postId } : {}) };
	}
}
