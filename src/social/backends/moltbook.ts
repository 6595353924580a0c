import { ChannelSendError } from "../../engage/errors.js";
import type { Receipt } from "../../engage/types.js";
import { getChildLogger } from "../../logging.js";
import type { ChannelSender } from "../client.js";
import { type ApiResult, DEFAULT_REQUEST_TIMEOUT_MS, requestJson, trimBaseUrl } from "../http.js";

const logger = getChildLogger({ module: "moltbook-backend" });

export const DEFAULT_MOLTBOOK_API_BASE = "https://moltbook.com/api/v1";

/**
 * Created-post ids arrive as `id` or `post_id`, string or number.
 */
function extractPostId(payload: unknown): string | undefined {
	if (typeof payload !== "object" || payload === null) return undefined;
	for (const key of ["id", "post_id"]) {
		const value: unknown = key in payload ? Reflect.get(payload, key) : undefined;
		if (typeof value === "string" && value) return value;
		if (typeof value === "number") return String(value);
	}
	return undefined;
}

export type MoltbookClientOptions = {
	apiKey: string;
	baseUrl?: string;
	fetchImpl?: typeof fetch;
	timeoutMs?: number;
};

/**
 * Moltbook API client. Outbound only: the planner reads nothing from
 * Moltbook.
 */
export class MoltbookClient implements ChannelSender {
	readonly channel = "moltbook" as const;
	private readonly apiKey: string;
	private readonly baseUrl: string;
	private readonly fetchImpl: typeof fetch;
	private readonly timeoutMs: number;

	constructor(options: MoltbookClientOptions) {
		this.apiKey = options.apiKey;
		this.baseUrl = trimBaseUrl(options.baseUrl ?? DEFAULT_MOLTBOOK_API_BASE);
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
	}

	private async send(path: string, payload: Record<string, unknown>, op: string): Promise<Receipt> {
		let result: ApiResult;
		try {
			result = await requestJson({
				fetchImpl: this.fetchImpl,
				url: `${this.baseUrl}${path}`,
				init: { method: "POST", body: JSON.stringify(payload) },
				bearerToken: this.apiKey,
				timeoutMs: this.timeoutMs,
			});
		} catch (err) {
			throw new ChannelSendError(`Moltbook ${op} failed: network error`, {
				kind: "network",
				cause: err,
			});
		}

		if (!result.ok) {
			if (result.status === 429) {
				logger.warn(`moltbook ${op} rate limited`);
			}
			throw new ChannelSendError(`Moltbook ${op} failed (${result.status}): ${result.error}`, {
				kind: "api",
				status: result.status,
				rateLimited: result.status === 429,
			});
		}

		const postId = extractPostId(result.data);
		return { ok: true, status: result.status, ...(postId ? { postId } : {}) };
	}

	post(text: string): Promise<Receipt> {
		return this.send("/posts", { content: text }, "post");
	}

	reply(targetId: string, text: string): Promise<Receipt> {
		return this.send(`/posts/${encodeURIComponent(targetId)}/comments`, { body: text }, "reply");
	}
}
