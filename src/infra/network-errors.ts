/**
 * Error classification for channel sends.
 *
 * Walks error cause chains to tell transient network failures apart from
 * everything else, and formats errors for the ledger without leaking URLs.
 */

/** Error codes that indicate a transient network issue. */
const TRANSIENT_NETWORK_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

/** Error messages (substrings) that indicate a transient network issue. */
const TRANSIENT_MESSAGE_PATTERNS = [
	"fetch failed",
	"network error",
	"socket hang up",
	"other side closed",
	"client network socket disconnected",
	"timed out after",
];

/**
 * Collect all error candidates from a (potentially nested) error.
 * BFS through `.cause` and `.errors`.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null || typeof val !== "object") {
			if (val != null) candidates.push(val);
			continue;
		}

		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		if ("cause" in val && val.cause != null) {
			queue.push({ value: val.cause, depth: nextDepth });
		}
		if ("errors" in val && Array.isArray(val.errors)) {
			for (const e of val.errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

/**
 * Check if an error (or any error in its cause chain) is a transient network error.
 * TimeoutError counts as transient.
 */
export function isTransientNetworkError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (typeof candidate === "object" && candidate !== null) {
			if (
				"code" in candidate &&
				typeof candidate.code === "string" &&
				TRANSIENT_NETWORK_CODES.has(candidate.code)
			) {
				return true;
			}
			if ("name" in candidate && candidate.name === "TimeoutError") {
				return true;
			}
		}

		const message = extractMessage(candidate);
		if (message && matchesTransientPattern(message)) {
			return true;
		}
	}

	return false;
}

/**
 * Safely format an error to a string, redacting URLs that might carry tokens.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	if (err instanceof Error) {
		let msg = `${err.name}: ${err.message}`;
		if (err.cause) {
			msg += ` [cause: ${formatErrorSafe(err.cause, Math.floor(maxLength / 2))}]`;
		}
		return truncate(redactUrls(msg), maxLength);
	}
	return truncate(redactUrls(String(err)), maxLength);
}

function extractMessage(val: unknown): string | null {
	if (typeof val === "string") return val;
	if (val instanceof Error) return val.message;
	if (typeof val === "object" && val !== null && "message" in val) {
		return typeof val.message === "string" ? val.message : null;
	}
	return null;
}

function matchesTransientPattern(message: string): boolean {
	const lower = message.toLowerCase();
	return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern));
}

function redactUrls(str: string): string {
	return str.replace(/https?:\/\/[^\s]+/g, "[URL]");
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
