import { fetchTextWithTimeout } from "../infra/timeout.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 20_000;

export type ApiResult =
	| { ok: true; status: number; data: unknown }
	| { ok: false; status: number; error: string };

export type JsonRequest = {
	fetchImpl: typeof fetch;
	url: string;
	init: RequestInit;
	bearerToken?: string;
	timeoutMs: number;
};

function safeJsonParse(input: string): unknown {
	try {
		return JSON.parse(input);
	} catch {
		return null;
	}
}

/**
 * Pull a short error description out of an API error body. X reports
 * `errors[]` or `detail`, Moltbook a plain `error` string.
 */
function describeErrorBody(payload: unknown): string | null {
	if (typeof payload !== "object" || payload === null) return null;
	if ("errors" in payload && Array.isArray(payload.errors)) {
		return JSON.stringify(payload.errors.slice(0, 2));
	}
	if ("detail" in payload && typeof payload.detail === "string") {
		return payload.detail;
	}
	if ("error" in payload && payload.error != null) {
		return String(payload.error);
	}
	return null;
}

/**
 * JSON request with bearer auth and a timeout covering both headers and
 * body. Network failures (including the timeout) throw; HTTP errors come
 * back as `{ ok: false }`.
 */
export async function requestJson(request: JsonRequest): Promise<ApiResult> {
	const headers = new Headers(request.init.headers ?? {});
	if (request.bearerToken) {
		headers.set("Authorization", `Bearer ${request.bearerToken}`);
	}
	if (!headers.has("Content-Type")) {
		headers.set("Content-Type", "application/json");
	}

	const { response, body: raw } = await fetchTextWithTimeout(
		request.fetchImpl,
		request.url,
		{ ...request.init, headers },
		request.timeoutMs,
	);
	const status = response.status;
	const payload = raw ? safeJsonParse(raw) : null;

	if (!response.ok) {
		return { ok: false, status, error: describeErrorBody(payload) ?? (raw || response.statusText) };
	}
	return { ok: true, status, data: payload };
}

export function trimBaseUrl(url: string): string {
	return url.replace(/\/+$/, "");
}
