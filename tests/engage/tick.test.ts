import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { parseConfig } from "../../src/config/config.js";
import { TickLockError } from "../../src/engage/errors.js";
import { JobStore } from "../../src/engage/job-store.js";
import { readLedger } from "../../src/engage/ledger.js";
import type { StatusRead, StatusSource } from "../../src/engage/status-source.js";
import { LEDGER_FILE, type TickDeps, runEngagementTick } from "../../src/engage/tick.js";
import { TICK_LOCK_FILE } from "../../src/engage/tick-lock.js";
import type { Channel, InboundBatch, Receipt } from "../../src/engage/types.js";
import type { ChannelSender, InboundSource } from "../../src/social/client.js";

const nowMs = 1_700_000_000_000;
const now = 1_700_000_000;
// floor(now / 86400)
const dayIndex = 19675;

function fakeSender(channel: Channel) {
	return {
		channel,
		post: vi.fn(async (_text: string): Promise<Receipt> => ({ ok: true, status: 201 })),
		reply: vi.fn(async (_targetId: string, _text: string): Promise<Receipt> => ({ ok: true, status: 201 })),
	} satisfies ChannelSender;
}

function staticStatus(read: StatusRead): StatusSource {
	return { read: async () => read };
}

const mentionBatch: InboundBatch = {
	items: [{ id: "100", authorId: "u1", text: "how do I deploy this?", conversationId: "100" }],
	authors: { u1: { username: "someone", followerCount: 10 } },
};

/** Mentions source that honours since_id the way the API does. */
function mentionsSource(): InboundSource {
	return {
		label: "x:mentions",
		fetch: async (sinceCursor) => (sinceCursor === "100" ? { items: [], authors: {} } : mentionBatch),
	};
}

describe("engagement tick", () => {
	let tempDir: string;
	let x: ReturnType<typeof fakeSender>;
	let moltbook: ReturnType<typeof fakeSender>;

	function deps(overrides: Partial<TickDeps> = {}): TickDeps {
		return {
			config: parseConfig({ engager: { cooldownSeconds: 0 } }),
			runtimeDir: tempDir,
			statusSource: staticStatus({ kind: "absent" }),
			senders: { x, moltbook },
			userId: "self",
			mentionsFor: () => mentionsSource(),
			runId: "run-1",
			now: () => nowMs,
			...overrides,
		};
	}

	function eventTypes(): string[] {
		return readLedger(path.join(tempDir, LEDGER_FILE), 1000).map((event) => event.eventType);
	}

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "herald-tick-"));
		x = fakeSender("x");
		moltbook = fakeSender("moltbook");
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("plans, sends and records a full tick", async () => {
		const result = await runEngagementTick(deps());

		expect(result.runId).toBe("run-1");
		expect(result.freshness).toEqual({ present: false, ok: true, reason: "no external status" });
		expect(result.plan.actions.map((action) => action.actionId)).toEqual([
			`daily-x-${dayIndex}`,
			`daily-moltbook-${dayIndex}`,
			"reply-x-100",
		]);
		expect(result.execute.executed.map((job) => job.actionId)).toEqual([
			`daily-moltbook-${dayIndex}`,
			`daily-x-${dayIndex}`,
			"reply-x-100",
		]);
		expect(x.post).toHaveBeenCalledTimes(1);
		expect(moltbook.post).toHaveBeenCalledTimes(1);
		expect(x.reply).toHaveBeenCalledWith("100", expect.any(String));

		expect(new JobStore({ rootDir: tempDir }).counts()).toEqual({ outbox: 0, sent: 3, dead: 0 });
		expect(result.state.lastDailyPostAt).toEqual({ x: now, moltbook: now });
		expect(result.state.mentionsCursor).toBe("100");
		expect(result.state.repliedIds).toEqual({ "100": now });
		expect(result.state.conversationMemory).toEqual({ "100": { replyCount24h: 1, lastReplyAt: now } });
		expect(fs.existsSync(path.join(tempDir, TICK_LOCK_FILE))).toBe(false);

		expect(eventTypes()).toEqual([
			"TICK_START",
			"FRESHNESS_CHECKED",
			"PLAN_CREATED",
			"ENGAGE_ENQUEUED",
			"ENGAGE_EXECUTED",
			"ENGAGE_EXECUTED",
			"ENGAGE_EXECUTED",
			"TICK_DONE",
		]);
	});

	it("does nothing new on a second tick at the same time", async () => {
		await runEngagementTick(deps());
		const second = await runEngagementTick(deps());

		expect(second.plan.actions).toEqual([]);
		expect(second.execute.executed).toEqual([]);
		expect(x.post).toHaveBeenCalledTimes(1);
		expect(x.reply).toHaveBeenCalledTimes(1);
		expect(new JobStore({ rootDir: tempDir }).counts()).toEqual({ outbox: 0, sent: 3, dead: 0 });
	});

	it("queues but does not send while the monitor is stale", async () => {
		const lastTick = new Date(nowMs - 600_000).toISOString();
		const result = await runEngagementTick(
			deps({
				statusSource: staticStatus({
					kind: "present",
					value: { last_tick_utc: lastTick, data_freshness_sec: 5 },
				}),
			}),
		);

		expect(result.freshness).toMatchObject({ ok: false, reason: "stale tick", tickAgeSeconds: 600 });
		expect(result.execute.skippedStale).toBe(true);
		expect(x.post).not.toHaveBeenCalled();
		expect(x.reply).not.toHaveBeenCalled();
		expect(new JobStore({ rootDir: tempDir }).counts()).toEqual({ outbox: 3, sent: 0, dead: 0 });
		expect(result.state.lastDailyPostAt).toEqual({});
		expect(eventTypes()).toContain("ENGAGE_SKIPPED_STALE");
	});

	it("sends while stale when freshness is advisory", async () => {
		const result = await runEngagementTick(
			deps({
				config: parseConfig({ engager: { cooldownSeconds: 0 }, freshness: { mode: "advisory" } }),
				statusSource: staticStatus({ kind: "unreadable", error: "EACCES" }),
			}),
		);

		expect(result.freshness.ok).toBe(false);
		expect(result.execute.executed).toHaveLength(3);
	});

	it("plans daily posts when the mentions fetch fails", async () => {
		const result = await runEngagementTick(
			deps({
				mentionsFor: () => ({
					label: "x:mentions",
					fetch: async () => {
						throw new Error("socket hang up");
					},
				}),
			}),
		);

		expect(result.plan.actions.map((action) => action.metadata.kind)).toEqual([
			"daily_status",
			"daily_status",
		]);
		expect(result.plan.fetchErrors).toEqual([{ source: "x:mentions", message: "Error: socket hang up" }]);
		expect(result.state.mentionsCursor).toBeUndefined();
		expect(eventTypes()).toContain("INBOUND_FETCH_FAILED");
	});

	it("holds back actions over the per-channel rate limit", async () => {
		const result = await runEngagementTick(
			deps({ config: parseConfig({ engager: { cooldownSeconds: 0 }, rateLimit: { maxPerWindow: 1 } }) }),
		);

		expect(result.rateLimited).toEqual(["reply-x-100"]);
		expect(result.enqueue.enqueued).toEqual([`daily-x-${dayIndex}`, `daily-moltbook-${dayIndex}`]);
		expect(x.reply).not.toHaveBeenCalled();
		expect(eventTypes()).toContain("ACTION_RATE_LIMITED");
	});

	it("refuses to run while another live process holds the lock", async () => {
		fs.writeFileSync(path.join(tempDir, TICK_LOCK_FILE), `${process.ppid}\n`);

		await expect(runEngagementTick(deps())).rejects.toBeInstanceOf(TickLockError);
		expect(x.post).not.toHaveBeenCalled();
	});
});
