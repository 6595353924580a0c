/**
 * Durable file job queue.
 *
 * Layout under the runtime directory:
 *   outbox/<actionId>.json   accepted, not yet executed
 *   sent/<actionId>.json     executed, with receipt
 *   dead/<actionId>.json     rejected at execution time or undecodable
 *
 * The action id is the idempotency key: enqueue skips any id already present
 * in any of the three areas. Writes go through temp-file + rename, and
 * directories are created on first write. The store assumes a single writer
 * per runtime directory (see tick-lock.ts).
 */

import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { writeJsonAtomic } from "../infra/atomic-file.js";
import { getChildLogger } from "../logging.js";
import { type Clock, systemClock, unixSeconds } from "../utils.js";
import { ContractViolationError, JobDecodeError, StorageError } from "./errors.js";
import { ACTION_ID_PATTERN, type ActionInput } from "./policy.js";
import { type Action, type ActionMetadata, INTENT_LABELS, type Job, type Receipt } from "./types.js";

const logger = getChildLogger({ module: "job-store" });

export const JOB_AREAS = ["outbox", "sent", "dead"] as const;
export type JobArea = (typeof JOB_AREAS)[number];

export type JobHandle = {
	id: string;
	area: JobArea;
	path: string;
};

/**
 * A job as read back from disk. Channel and type stay strings so the
 * execution-time policy check can report what is wrong with them.
 */
export type JobRecord = ActionInput & {
	actionId: string;
	channel: string;
	type: string;
	text: string;
	receipt?: Receipt;
	executedAt?: number;
};

export type EnqueueResult = {
	enqueued: JobHandle[];
	/** Ids already present in outbox, sent or dead. */
	skipped: string[];
};

const MetadataSchema = z.object({
	kind: z.enum(["daily_status", "mention_reply", "initiation_reply"]),
	intent: z.union([z.enum(INTENT_LABELS), z.literal("general")]).nullish(),
	conversation_id: z.string().nullish(),
	search_label: z.string().nullish(),
	author_id: z.string().nullish(),
	template_index: z.number().int().nullish(),
});

const ReceiptSchema = z.object({
	ok: z.literal(true),
	status: z.number().int(),
	post_id: z.string().nullish(),
});

const JobFileSchema = z.object({
	action_id: z.string().min(1),
	channel: z.string(),
	type: z.string(),
	text: z.string(),
	in_reply_to: z.string().nullish(),
	metadata: MetadataSchema.nullish(),
	created_at: z.number().nullish(),
	receipt: ReceiptSchema.nullish(),
	executed_at: z.number().nullish(),
});

type JobFile = z.infer<typeof JobFileSchema>;

function decodeMetadata(raw: NonNullable<JobFile["metadata"]>): ActionMetadata {
	const metadata: ActionMetadata = { kind: raw.kind };
	if (raw.intent) metadata.intent = raw.intent;
	if (raw.conversation_id) metadata.conversationId = raw.conversation_id;
	if (raw.search_label) metadata.searchLabel = raw.search_label;
	if (raw.author_id) metadata.authorId = raw.author_id;
	if (typeof raw.template_index === "number") metadata.templateIndex = raw.template_index;
	return metadata;
}

function fileToRecord(file: JobFile): JobRecord {
	const record: JobRecord = {
		actionId: file.action_id,
		channel: file.channel,
		type: file.type,
		text: file.text,
	};
	if (file.in_reply_to) record.inReplyTo = file.in_reply_to;
	if (file.metadata) record.metadata = decodeMetadata(file.metadata);
	if (typeof file.created_at === "number") record.createdAt = file.created_at;
	if (file.receipt) {
		record.receipt = {
			ok: true,
			status: file.receipt.status,
			...(file.receipt.post_id ? { postId: file.receipt.post_id } : {}),
		};
	}
	if (typeof file.executed_at === "number") record.executedAt = file.executed_at;
	return record;
}

function encodeJob(job: Job) {
	const { metadata, receipt } = job;
	return {
		action_id: job.actionId,
		channel: job.channel,
		type: job.type,
		text: job.text,
		in_reply_to: job.inReplyTo ?? null,
		metadata: {
			kind: metadata.kind,
			intent: metadata.intent,
			conversation_id: metadata.conversationId,
			search_label: metadata.searchLabel,
			author_id: metadata.authorId,
			template_index: metadata.templateIndex,
		},
		created_at: job.createdAt ?? null,
		...(receipt
			? { receipt: { ok: receipt.ok, status: receipt.status, post_id: receipt.postId ?? null } }
			: {}),
		...(job.executedAt !== undefined ? { executed_at: job.executedAt } : {}),
	};
}

export type JobStoreOptions = {
	rootDir: string;
	now?: Clock;
};

export class JobStore {
	readonly rootDir: string;
	private readonly now: Clock;

	constructor(options: JobStoreOptions) {
		this.rootDir = options.rootDir;
		this.now = options.now ?? systemClock;
	}

	areaDir(area: JobArea): string {
		return path.join(this.rootDir, area);
	}

	private handle(id: string, area: JobArea): JobHandle {
		return { id, area, path: path.join(this.areaDir(area), `${id}.json`) };
	}

	/** True if the id is present in outbox, sent or dead. */
	has(id: string): boolean {
		return JOB_AREAS.some((area) => fs.existsSync(this.handle(id, area).path));
	}

	/**
	 * Write each new action to the outbox. Actions without an id get a
	 * generated one; `createdAt` is stamped when absent. An id that is not a
	 * listable filename throws ContractViolationError.
	 */
	enqueue(actions: readonly Action[]): EnqueueResult {
		const enqueued: JobHandle[] = [];
		const skipped: string[] = [];

		for (const action of actions) {
			const id = action.actionId || `job-${crypto.randomUUID()}`;
			if (!ACTION_ID_PATTERN.test(id)) {
				throw new ContractViolationError(`action id '${id}' is not a valid job filename`);
			}
			if (this.has(id)) {
				skipped.push(id);
				continue;
			}
			const job: Job = {
				...action,
				actionId: id,
				createdAt: action.createdAt ?? unixSeconds(this.now),
			};
			const handle = this.handle(id, "outbox");
			try {
				writeJsonAtomic(handle.path, encodeJob(job));
			} catch (err) {
				throw new StorageError(handle.path, "failed to enqueue job", { cause: err });
			}
			enqueued.push(handle);
		}

		if (skipped.length > 0) {
			logger.debug({ skipped }, "skipped already-known jobs");
		}
		return { enqueued, skipped };
	}

	/**
	 * Outbox jobs in lexicographic id order. A limit below 1 is treated as 1.
	 */
	listReady(limit: number): JobHandle[] {
		return this.listArea("outbox").slice(0, Math.max(1, Math.floor(limit)));
	}

	listArea(area: JobArea): JobHandle[] {
		let names: string[];
		try {
			names = fs.readdirSync(this.areaDir(area));
		} catch (err) {
			if ((err as NodeJS.ErrnoException).code === "ENOENT") {
				return [];
			}
			throw new StorageError(this.areaDir(area), "failed to list jobs", { cause: err });
		}
		return names
			.filter((name) => name.endsWith(".json") && !name.startsWith("."))
			.sort()
			.map((name) => this.handle(name.slice(0, -".json".length), area));
	}

	/**
	 * Read and decode a job file. Throws JobDecodeError when the file is
	 * missing, not JSON, or not shaped like a job.
	 */
	read(handle: JobHandle): JobRecord {
		let parsed: unknown;
		try {
			parsed = JSON.parse(fs.readFileSync(handle.path, "utf-8"));
		} catch (err) {
			throw new JobDecodeError(handle.path, "unreadable job file", { cause: err });
		}
		const result = JobFileSchema.safeParse(parsed);
		if (!result.success) {
			const issue = result.error.issues[0];
			const where = issue?.path.join(".") || "(root)";
			throw new JobDecodeError(handle.path, `${where}: ${issue?.message ?? "invalid job"}`);
		}
		return fileToRecord(result.data);
	}

	/**
	 * Rename a job into another area. Rename is atomic within one filesystem.
	 */
	move(handle: JobHandle, area: Exclude<JobArea, "outbox">): JobHandle {
		const target = this.handle(handle.id, area);
		try {
			fs.mkdirSync(this.areaDir(area), { recursive: true });
			fs.renameSync(handle.path, target.path);
		} catch (err) {
			throw new StorageError(handle.path, `failed to move job to ${area}`, { cause: err });
		}
		return target;
	}

	/**
	 * Record a successful execution: write the sent record (with receipt),
	 * then drop the outbox file. A crash between the two leaves the job in
	 * both places; enqueue still sees it as known.
	 */
	complete(handle: JobHandle, job: Job): JobHandle {
		const target = this.handle(handle.id, "sent");
		try {
			writeJsonAtomic(target.path, encodeJob(job));
			fs.rmSync(handle.path, { force: true });
		} catch (err) {
			throw new StorageError(handle.path, "failed to complete job", { cause: err });
		}
		return target;
	}

	counts(): Record<JobArea, number> {
		return {
			outbox: this.listArea("outbox").length,
			sent: this.listArea("sent").length,
			dead: this.listArea("dead").length,
		};
	}
}
