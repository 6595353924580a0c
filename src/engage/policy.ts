/**
 * Engagement policy: hard gates on outbound content.
 *
 * Pure and deterministic. Every check runs and every violation is reported,
 * so the ledger shows the full reason set for a blocked action. Sanitization
 * only touches whitespace and length, never meaning.
 */

import {
	type Action,
	type ActionMetadata,
	isActionType,
	isChannel,
} from "./types.js";

export const MAX_TEXT_LENGTH = 2000;

/** Action ids double as filenames; a leading dot would hide the job file. */
export const ACTION_ID_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]{0,127}$/;

export type PatternFamily = "financial_promise" | "personal_data" | "harassment";

export type PolicyReason =
	| "invalid_type"
	| "invalid_channel"
	| "empty"
	| "missing_in_reply_to"
	| "missing_metadata"
	| "invalid_action_id"
	| `${PatternFamily}:${string}`;

type ContentPattern = {
	family: PatternFamily;
	name: string;
	pattern: RegExp;
	/** Match against lower-cased text (phrases) or the original (digit shapes). */
	caseFold: boolean;
};

const CONTENT_PATTERNS: readonly ContentPattern[] = [
	{ family: "financial_promise", name: "guarantee", pattern: /\bguarantee(d|s)?\b/, caseFold: true },
	{ family: "financial_promise", name: "free_money", pattern: /\bfree money\b/, caseFold: true },
	{ family: "financial_promise", name: "cant_lose", pattern: /\bcan[’']?t lose\b/, caseFold: true },
	{ family: "financial_promise", name: "absolute_percent", pattern: /\b100\s?%/, caseFold: true },
	{ family: "financial_promise", name: "double_your", pattern: /\bdouble your\b/, caseFold: true },
	{ family: "financial_promise", name: "to_the_moon", pattern: /\bto the moon\b/, caseFold: true },
	{ family: "personal_data", name: "ssn", pattern: /\b\d{3}-\d{2}-\d{4}\b/, caseFold: false },
	{ family: "personal_data", name: "phone_digits", pattern: /\b\d{10}\b/, caseFold: false },
	{
		family: "personal_data",
		name: "phone_grouped",
		pattern: /\b\d{3}[-.\s]\d{3}[-.\s]\d{4}\b/,
		caseFold: false,
	},
	{ family: "harassment", name: "kill_yourself", pattern: /\bkill yourself\b/, caseFold: true },
	{ family: "harassment", name: "go_die", pattern: /\bgo die\b/, caseFold: true },
	{ family: "harassment", name: "insult", pattern: /\bstupid (idiot|moron)\b/, caseFold: true },
];

/**
 * Loosely-typed action as read from the planner or a job file. Fields are
 * optional so the validator can report what is missing.
 */
export type ActionInput = {
	actionId?: string;
	channel?: string;
	type?: string;
	text?: string;
	inReplyTo?: string;
	metadata?: ActionMetadata;
	createdAt?: number;
};

export type NormalizedAction = {
	actionId: string;
	channel: string;
	type: string;
	text: string;
	inReplyTo?: string;
	metadata?: ActionMetadata;
	createdAt?: number;
};

export type PolicyDecision =
	| { allowed: true; reasons: []; action: Action }
	| { allowed: false; reasons: PolicyReason[]; action: NormalizedAction };

/**
 * Normalize line endings, trim, and cap length on code points so a
 * surrogate pair is never split.
 */
export function sanitizeText(text: string): string {
	const normalized = text.replace(/\r\n?/g, "\n").trim();
	const codePoints = Array.from(normalized);
	if (codePoints.length <= MAX_TEXT_LENGTH) return normalized;
	return codePoints.slice(0, MAX_TEXT_LENGTH).join("");
}

/**
 * Content checks only. Returns one reason per matching pattern.
 */
export function evaluateText(text: string): PolicyReason[] {
	const trimmed = text.trim();
	if (!trimmed) {
		return ["empty"];
	}

	const lowered = trimmed.toLowerCase();
	const reasons: PolicyReason[] = [];
	for (const { family, name, pattern, caseFold } of CONTENT_PATTERNS) {
		if (pattern.test(caseFold ? lowered : trimmed)) {
			reasons.push(`${family}:${name}`);
		}
	}
	return reasons;
}

export function validateAction(input: ActionInput): PolicyDecision {
	const reasons: PolicyReason[] = [];

	const type = (input.type ?? "").trim().toLowerCase();
	const channel = (input.channel ?? "").trim().toLowerCase();
	const text = input.text ?? "";
	const inReplyTo = input.inReplyTo?.trim() || undefined;

	if (!isActionType(type)) {
		reasons.push("invalid_type");
	}
	if (!isChannel(channel)) {
		reasons.push("invalid_channel");
	}

	reasons.push(...evaluateText(text));

	if (type === "reply" && !inReplyTo) {
		reasons.push("missing_in_reply_to");
	}
	if (!input.metadata) {
		reasons.push("missing_metadata");
	}
	if (input.actionId && !ACTION_ID_PATTERN.test(input.actionId)) {
		reasons.push("invalid_action_id");
	}

	const sanitized = sanitizeText(text);
	const actionId = input.actionId ?? "";

	if (reasons.length === 0 && isActionType(type) && isChannel(channel) && input.metadata) {
		return {
			allowed: true,
			reasons: [],
			action: {
				actionId,
				channel,
				type,
				text: sanitized,
				...(inReplyTo ? { inReplyTo } : {}),
				metadata: input.metadata,
				...(input.createdAt !== undefined ? { createdAt: input.createdAt } : {}),
			},
		};
	}

	return {
		allowed: false,
		reasons,
		action: {
			actionId,
			channel,
			type,
			text: sanitized,
			...(inReplyTo ? { inReplyTo } : {}),
			...(input.metadata ? { metadata: input.metadata } : {}),
			...(input.createdAt !== undefined ? { createdAt: input.createdAt } : {}),
		},
	};
}
