/**
 * Freshness gate over the external status record.
 *
 * An absent record lets the pipeline run (the monitor is optional); a record
 * that is present but broken or old suspends execution.
 */

import type { StatusRead } from "./status-source.js";

export const DEFAULT_STALE_AFTER_SECONDS = 180;

export type FreshnessReason =
	| "no external status"
	| "invalid status"
	| "missing fields"
	| "stale tick"
	| "stale freshness"
	| "fresh";

export type FreshnessResult = {
	present: boolean;
	ok: boolean;
	reason: FreshnessReason;
	/** Seconds since the monitor's last tick, when known. */
	tickAgeSeconds?: number;
	/** The monitor's reported data freshness, when known. */
	freshnessSeconds?: number;
};

export function evaluateFreshness(
	status: StatusRead,
	options: { nowMs: number; staleAfterSeconds?: number },
): FreshnessResult {
	const limit = options.staleAfterSeconds ?? DEFAULT_STALE_AFTER_SECONDS;

	if (status.kind === "absent") {
		return { present: false, ok: true, reason: "no external status" };
	}
	if (status.kind === "unreadable") {
		return { present: true, ok: false, reason: "invalid status" };
	}

	const record = status.value;
	if (typeof record !== "object" || record === null || Array.isArray(record)) {
		return { present: true, ok: false, reason: "invalid status" };
	}

	const lastTick = "last_tick_utc" in record ? record.last_tick_utc : undefined;
	const freshness = "data_freshness_sec" in record ? record.data_freshness_sec : undefined;
	if (typeof lastTick !== "string" || typeof freshness !== "number" || !Number.isFinite(freshness)) {
		return { present: true, ok: false, reason: "missing fields" };
	}

	const lastTickMs = Date.parse(lastTick);
	if (Number.isNaN(lastTickMs)) {
		return { present: true, ok: false, reason: "invalid status" };
	}

	const tickAgeSeconds = (options.nowMs - lastTickMs) / 1000;
	if (tickAgeSeconds > limit) {
		return {
			present: true,
			ok: false,
			reason: "stale tick",
			tickAgeSeconds,
			freshnessSeconds: freshness,
		};
	}
	if (freshness > limit) {
		return {
			present: true,
			ok: false,
			reason: "stale freshness",
			tickAgeSeconds,
			freshnessSeconds: freshness,
		};
	}

	return { present: true, ok: true, reason: "fresh", tickAgeSeconds, freshnessSeconds: freshness };
}

/**
 * One-line status for daily posts. Empty when there is no monitor.
 */
export function formatFreshnessSnippet(result: FreshnessResult): string {
	if (!result.present) {
		return "";
	}
	if (result.ok && result.freshnessSeconds !== undefined) {
		return `Monitor: data ${Math.round(result.freshnessSeconds)}s fresh.`;
	}
	return `Monitor: ${result.reason}.`;
}
