import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { Engager, type EngagerConfig } from "../../src/engage/engager.js";
import { ChannelSendError } from "../../src/engage/errors.js";
import { JobStore } from "../../src/engage/job-store.js";
import { Ledger, readLedger } from "../../src/engage/ledger.js";
import type { Action, Channel, Receipt } from "../../src/engage/types.js";
import type { ChannelSender } from "../../src/social/client.js";

const nowMs = 1_700_000_000_000;

function fakeSender(channel: Channel) {
	return {
		channel,
		post: vi.fn(async (_text: string): Promise<Receipt> => ({ ok: true, status: 201, postId: "p1" })),
		reply: vi.fn(
			async (_targetId: string, _text: string): Promise<Receipt> => ({ ok: true, status: 201 }),
		),
	} satisfies ChannelSender;
}

function daily(actionId: string, text = "status: all green"): Action {
	return {
		actionId,
		channel: "x",
		type: "post",
		text,
		metadata: { kind: "daily_status", templateIndex: 0 },
	};
}

describe("engager", () => {
	let tempDir: string;
	let store: JobStore;
	let ledger: Ledger;
	let sender: ReturnType<typeof fakeSender>;
	let sleep: Mock<(ms: number) => Promise<void>>;

	const config: EngagerConfig = { maxPerRun: 5, cooldownSeconds: 0, requireFreshnessOk: true };

	function engager(
		overrides: Partial<EngagerConfig> = {},
		senders: Partial<Record<Channel, ChannelSender>> = { x: sender },
	) {
		return new Engager({
			store,
			ledger,
			senders,
			config: { ...config, ...overrides },
			sleep,
			now: () => nowMs,
		});
	}

	function eventTypes(): string[] {
		return readLedger(ledger.filePath).map((event) => event.eventType);
	}

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "herald-engager-"));
		store = new JobStore({ rootDir: tempDir, now: () => nowMs });
		ledger = new Ledger({ filePath: path.join(tempDir, "ledger.jsonl"), runId: "run-1", now: () => nowMs });
		sender = fakeSender("x");
		sleep = vi.fn(async (_ms: number) => {});
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	describe("enqueue", () => {
		it("queues allowed candidates and reports blocked ones", () => {
			const summary = engager().enqueue([
				daily("daily-x-1"),
				{ actionId: "bad-1", channel: "x", type: "post", text: "  ", metadata: { kind: "daily_status" } },
				{ actionId: "bad-2", channel: "fax", type: "post", text: "hi", metadata: { kind: "daily_status" } },
			]);

			expect(summary).toEqual({
				enqueued: ["daily-x-1"],
				skipped: [],
				blocked: [
					{ actionId: "bad-1", reasons: ["empty"] },
					{ actionId: "bad-2", reasons: ["invalid_channel"] },
				],
			});
			expect(store.counts()).toEqual({ outbox: 1, sent: 0, dead: 0 });
			expect(eventTypes()).toEqual([
				"ENGAGE_ACTION_BLOCKED",
				"ENGAGE_ACTION_BLOCKED",
				"ENGAGE_ENQUEUED",
			]);
		});

		it("blocks a hidden-file id instead of queueing it out of sight", async () => {
			const summary = engager().enqueue([
				{ actionId: ".hidden", channel: "x", type: "post", text: "hello", metadata: { kind: "daily_status" } },
			]);

			expect(summary).toEqual({
				enqueued: [],
				skipped: [],
				blocked: [{ actionId: ".hidden", reasons: ["invalid_action_id"] }],
			});
			expect(fs.existsSync(path.join(tempDir, "outbox", ".hidden.json"))).toBe(false);
			expect((await engager().execute(true)).executed).toEqual([]);
		});

		it("skips ids that are already known", () => {
			engager().enqueue([daily("daily-x-1")]);
			const summary = engager().enqueue([daily("daily-x-1")]);

			expect(summary.enqueued).toEqual([]);
			expect(summary.skipped).toEqual(["daily-x-1"]);
		});
	});

	describe("execute", () => {
		it("sends nothing while freshness fails in enforce mode", async () => {
			engager().enqueue([daily("daily-x-1")]);

			const summary = await engager().execute(false);

			expect(summary).toEqual({ skippedStale: true, executed: [], failed: [], dead: [] });
			expect(sender.post).not.toHaveBeenCalled();
			expect(store.counts().outbox).toBe(1);
			const last = readLedger(ledger.filePath, 1)[0];
			expect(last).toMatchObject({
				eventType: "ENGAGE_SKIPPED_STALE",
				level: "WARN",
				evidence: { outbox: 1 },
			});
		});

		it("sends anyway when freshness is advisory", async () => {
			engager().enqueue([daily("daily-x-1")]);

			const summary = await engager({ requireFreshnessOk: false }).execute(false);

			expect(summary.executed.map((job) => job.actionId)).toEqual(["daily-x-1"]);
		});

		it("records a receipt and moves the job to sent", async () => {
			engager().enqueue([
				daily("daily-x-1"),
				{
					actionId: "reply-x-42",
					channel: "x",
					type: "reply",
					text: "thanks for the mention",
					inReplyTo: "42",
					metadata: { kind: "mention_reply", intent: "general" },
				},
			]);

			const summary = await engager().execute(true);

			expect(sender.post).toHaveBeenCalledWith("status: all green");
			expect(sender.reply).toHaveBeenCalledWith("42", "thanks for the mention");
			expect(summary.executed.map((job) => job.actionId)).toEqual(["daily-x-1", "reply-x-42"]);
			expect(summary.executed[0]).toMatchObject({
				receipt: { ok: true, status: 201, postId: "p1" },
				executedAt: 1_700_000_000,
			});
			expect(store.counts()).toEqual({ outbox: 0, sent: 2, dead: 0 });

			const sent = JSON.parse(fs.readFileSync(path.join(tempDir, "sent", "daily-x-1.json"), "utf-8"));
			expect(sent.receipt).toEqual({ ok: true, status: 201, post_id: "p1" });
			expect(sent.executed_at).toBe(1_700_000_000);
			expect(eventTypes().filter((type) => type === "ENGAGE_EXECUTED")).toHaveLength(2);
		});

		it("leaves the job file untouched after a send failure", async () => {
			engager().enqueue([daily("daily-x-1")]);
			const jobPath = path.join(tempDir, "outbox", "daily-x-1.json");
			const before = fs.readFileSync(jobPath, "utf-8");
			sender.post.mockRejectedValueOnce(
				new ChannelSendError("X post failed (503): unavailable", { kind: "api", status: 503 }),
			);

			const summary = await engager().execute(true);

			expect(summary).toEqual({ skippedStale: false, executed: [], failed: ["daily-x-1"], dead: [] });
			expect(fs.readFileSync(jobPath, "utf-8")).toBe(before);
			const last = readLedger(ledger.filePath, 1)[0];
			expect(last).toMatchObject({
				level: "ERROR",
				eventType: "ENGAGE_EXEC_FAIL",
				evidence: { actionId: "daily-x-1", kind: "api", status: 503, rateLimited: false },
			});

			// next run retries and succeeds
			const retry = await engager().execute(true);
			expect(retry.executed.map((job) => job.actionId)).toEqual(["daily-x-1"]);
		});

		it("keeps jobs queued for a channel with no sender", async () => {
			engager().enqueue([daily("daily-x-1")]);

			const summary = await engager({}, {}).execute(true);

			expect(summary.failed).toEqual(["daily-x-1"]);
			expect(store.counts()).toEqual({ outbox: 1, sent: 0, dead: 0 });
			expect(readLedger(ledger.filePath, 1)[0]?.evidence).toMatchObject({ kind: "unconfigured" });
		});

		it("dead-letters a queued job that fails policy", async () => {
			fs.mkdirSync(path.join(tempDir, "outbox"), { recursive: true });
			fs.writeFileSync(
				path.join(tempDir, "outbox", "edited.json"),
				JSON.stringify({
					action_id: "edited",
					channel: "x",
					type: "post",
					text: "returns guaranteed",
					metadata: { kind: "daily_status" },
				}),
			);

			const summary = await engager().execute(true);

			expect(summary.dead).toEqual(["edited"]);
			expect(sender.post).not.toHaveBeenCalled();
			expect(fs.existsSync(path.join(tempDir, "dead", "edited.json"))).toBe(true);
			expect(readLedger(ledger.filePath, 1)[0]).toMatchObject({
				eventType: "ENGAGE_JOB_BLOCKED",
				evidence: { actionId: "edited", reasons: ["financial_promise:guarantee"] },
			});
		});

		it("dead-letters a job file that cannot be decoded", async () => {
			fs.mkdirSync(path.join(tempDir, "outbox"), { recursive: true });
			fs.writeFileSync(path.join(tempDir, "outbox", "broken.json"), "{not json");

			const summary = await engager().execute(true);

			expect(summary.dead).toEqual(["broken"]);
			expect(fs.readFileSync(path.join(tempDir, "dead", "broken.json"), "utf-8")).toBe("{not json");
			expect(readLedger(ledger.filePath, 1)[0]?.eventType).toBe("ENGAGE_JOB_DEAD");
		});

		it("waits the cooldown between sends and honours maxPerRun", async () => {
			engager().enqueue([daily("a-1"), daily("a-2"), daily("a-3")]);

			const summary = await engager({ cooldownSeconds: 2, maxPerRun: 2 }).execute(true);

			expect(summary.executed.map((job) => job.actionId)).toEqual(["a-1", "a-2"]);
			expect(sleep).toHaveBeenCalledTimes(1);
			expect(sleep).toHaveBeenCalledWith(2000);
			expect(store.counts()).toEqual({ outbox: 1, sent: 2, dead: 0 });
		});
	});
});
