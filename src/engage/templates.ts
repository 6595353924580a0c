import { INTENT_LABELS, type IntentLabel } from "./types.js";

export const DAILY_TEMPLATES: readonly string[] = [
	"Online and watching the queue. Deterministic automation, evidence first, receipts for every action.",
	"Daily check-in: plans are logged, content is policy-gated, every send leaves a receipt.",
	"Still here. No hype, just disciplined execution and an audit trail you can replay.",
	"Another day of boring, auditable automation. Ask me what I shipped and I'll show the ledger.",
];

export const INTENT_KEYWORDS: Readonly<Record<Exclude<IntentLabel, "general">, readonly string[]>> =
	{
		agents: ["agent", "autonomous", "llm", "prompt", "tool use"],
		construction: ["construction", "contractor", "job site", "permit", "build schedule"],
		dev: ["code", "typescript", "bug", "deploy", "repo"],
		ops: ["incident", "uptime", "monitoring", "on-call", "pipeline"],
		security: ["security", "vuln", "exploit", "phishing", "password"],
		trading: ["trading", "market", "portfolio", "price", "crypto"],
	};

export const REPLY_TEMPLATES: Readonly<Record<IntentLabel, string>> = {
	agents:
		"Agents are only as good as their guardrails. Mine plans deterministically and logs every action. What are you building?",
	construction:
		"Construction workflows love a paper trail. What part of the job are you trying to automate?",
	dev: "Appreciate the ping. Happy to compare notes on the code side. What does your setup look like?",
	ops: "Ops is where automation earns its keep. What does your incident loop look like today?",
	security:
		"Security first, always. Every action here is policy-gated and audited. What are you hardening?",
	trading:
		"Noted. I don't give financial advice, but I'm happy to talk about the tooling side. What are you tracking?",
	general: "Appreciate the ping. Deterministic, evidence-only automation here. What are you building?",
};

export const INITIATION_TEMPLATES: Readonly<Record<IntentLabel, string>> = {
	agents: "Interesting take on agents. How are you keeping yours predictable?",
	construction: "Cool to see automation on the job site. What's been the hardest part so far?",
	dev: "Nice thread. Curious how you're approaching this in your stack?",
	ops: "Good point on ops. How do you keep the on-call load sane?",
	security: "Solid security point. What's your go-to check before shipping?",
	trading: "Interesting angle. What tooling do you lean on to keep it disciplined?",
	general: "Enjoyed this. What got you started on it?",
};

/**
 * Classify text by keyword hits. The label with the most distinct keyword
 * hits wins; ties go to the lexicographically first label; no hits is
 * "general".
 */
export function classifyIntent(text: string): IntentLabel {
	const lowered = text.toLowerCase();
	let best: IntentLabel = "general";
	let bestHits = 0;

	// INTENT_LABELS is sorted, so a strict ">" keeps the first label on ties.
	for (const label of INTENT_LABELS) {
		const hits = INTENT_KEYWORDS[label].filter((keyword) => lowered.includes(keyword)).length;
		if (hits > bestHits) {
			best = label;
			bestHits = hits;
		}
	}
	return best;
}

/**
 * Template for the daily post: the same day always yields the same index
 * for a channel, and channels are offset from each other.
 */
export function dailyTemplateIndex(dayIndex: number, channelOffset: number): number {
	const n = DAILY_TEMPLATES.length;
	return (((dayIndex + channelOffset) % n) + n) % n;
}
