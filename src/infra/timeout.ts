/**
 * Timeout utilities for outbound HTTP calls.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

type TimedRequest<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Run `request` under an AbortController that fires after `timeoutMs` or when
 * the caller's own signal aborts. The returned promise also rejects on abort,
 * so a body read that ignores the signal cannot outlive the timeout.
 */
async function runWithTimeout<T>(
	external: AbortSignal | undefined,
	timeoutMs: number,
	request: TimedRequest<T>,
): Promise<T> {
	const controller = new AbortController();
	const relayAbort = () => controller.abort(external?.reason);
	if (external?.aborted) {
		relayAbort();
	} else {
		external?.addEventListener("abort", relayAbort, { once: true });
	}

	const timer = setTimeout(() => {
		controller.abort(new TimeoutError(`fetch timed out after ${timeoutMs}ms`, timeoutMs));
	}, timeoutMs);
	timer.unref();

	const aborted = new Promise<never>((_resolve, reject) => {
		const { signal } = controller;
		if (signal.aborted) {
			reject(signal.reason);
			return;
		}
		signal.addEventListener("abort", () => reject(signal.reason), { once: true });
	});

	try {
		return await Promise.race([request(controller.signal), aborted]);
	} finally {
		clearTimeout(timer);
		external?.removeEventListener("abort", relayAbort);
	}
}

export type TextResponse = {
	response: Response;
	body: string;
};

/**
 * fetch() plus the response body under one AbortController-based timeout.
 *
 * The underlying request is aborted when the timeout fires, so sockets are
 * released instead of lingering behind a lost race. A body that stalls after
 * the headers arrive is bounded by the same window.
 */
export async function fetchTextWithTimeout(
	fetchImpl: typeof fetch,
	url: string | URL,
	init: RequestInit | undefined,
	timeoutMs: number,
): Promise<TextResponse> {
	const read = async (requestInit: RequestInit | undefined): Promise<TextResponse> => {
		const response = await fetchImpl(url, requestInit);
		return { response, body: await response.text() };
	};
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return read(init);
	}
	return runWithTimeout(init?.signal ?? undefined, timeoutMs, (signal) => read({ ...init, signal }));
}
