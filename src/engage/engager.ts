/**
 * Engager: moves actions through the job queue.
 *
 *   enqueue:  candidate -> policy gate #1 -> outbox
 *   execute:  outbox -> decode -> policy gate #2 -> sender -> sent
 *
 * Terminal failures (undecodable file, policy failure at execution,
 * unroutable channel) dead-letter the job. Send failures leave the outbox
 * file untouched so the next tick retries it. Storage errors propagate.
 */

import { formatErrorSafe, isTransientNetworkError } from "../infra/network-errors.js";
import type { ChannelSender } from "../social/client.js";
import { type Clock, sleep as defaultSleep, systemClock, unixSeconds } from "../utils.js";
import {
	ChannelSendError,
	ContractViolationError,
	JobDecodeError,
	UnroutableChannelError,
} from "./errors.js";
import type { JobHandle, JobStore } from "./job-store.js";
import type { Ledger } from "./ledger.js";
import { type ActionInput, type PolicyReason, validateAction } from "./policy.js";
import type { Action, Channel, Job, Receipt } from "./types.js";

export type EngagerConfig = {
	maxPerRun: number;
	cooldownSeconds: number;
	/** When false the freshness result is advisory only. */
	requireFreshnessOk: boolean;
};

export type EngagerDeps = {
	store: JobStore;
	ledger: Ledger;
	senders: Partial<Record<Channel, ChannelSender>>;
	config: EngagerConfig;
	sleep?: (ms: number) => Promise<void>;
	now?: Clock;
};

export type BlockedAction = {
	actionId: string;
	reasons: PolicyReason[];
};

export type EnqueueSummary = {
	enqueued: string[];
	skipped: string[];
	blocked: BlockedAction[];
};

export type ExecuteSummary = {
	skippedStale: boolean;
	executed: Job[];
	/** Ids left in the outbox after a send failure. */
	failed: string[];
	/** Ids moved to dead/. */
	dead: string[];
};

export class Engager {
	private readonly store: JobStore;
	private readonly ledger: Ledger;
	private readonly senders: Partial<Record<Channel, ChannelSender>>;
	private readonly config: EngagerConfig;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly now: Clock;

	constructor(deps: EngagerDeps) {
		this.store = deps.store;
		this.ledger = deps.ledger;
		this.senders = deps.senders;
		this.config = deps.config;
		this.sleep = deps.sleep ?? defaultSleep;
		this.now = deps.now ?? systemClock;
	}

	enqueue(candidates: readonly ActionInput[]): EnqueueSummary {
		const allowed: Action[] = [];
		const blocked: BlockedAction[] = [];

		for (const candidate of candidates) {
			const decision = validateAction(candidate);
			if (decision.allowed) {
				allowed.push(decision.action);
				continue;
			}
			blocked.push({ actionId: decision.action.actionId, reasons: decision.reasons });
			this.ledger.warn("ENGAGE_ACTION_BLOCKED", "action blocked by policy", {
				actionId: decision.action.actionId,
				channel: decision.action.channel,
				type: decision.action.type,
				reasons: decision.reasons,
			});
		}

		const result = this.store.enqueue(allowed);
		const enqueued = result.enqueued.map((handle) => handle.id);
		this.ledger.info("ENGAGE_ENQUEUED", `enqueued ${enqueued.length} action(s)`, {
			enqueued,
			skipped: result.skipped,
			blocked: blocked.length,
		});
		return { enqueued, skipped: result.skipped, blocked };
	}

	async execute(freshnessOk: boolean): Promise<ExecuteSummary> {
		const summary: ExecuteSummary = { skippedStale: false, executed: [], failed: [], dead: [] };

		if (this.config.requireFreshnessOk && !freshnessOk) {
			this.ledger.warn("ENGAGE_SKIPPED_STALE", "execution suspended: freshness check failed", {
				outbox: this.store.counts().outbox,
			});
			summary.skippedStale = true;
			return summary;
		}

		const cooldownMs = Math.max(0, this.config.cooldownSeconds) * 1000;
		let dispatched = 0;

		for (const handle of this.store.listReady(this.config.maxPerRun)) {
			const action = this.admit(handle, summary);
			if (!action) continue;

			if (dispatched > 0 && cooldownMs > 0) {
				await this.sleep(cooldownMs);
			}
			dispatched++;

			let receipt: Receipt;
			try {
				receipt = await this.dispatch(action);
			} catch (err) {
				if (err instanceof UnroutableChannelError) {
					this.store.move(handle, "dead");
					summary.dead.push(handle.id);
					this.ledger.error("ENGAGE_EXEC_FAIL", "no route for channel; job dead-lettered", {
						actionId: action.actionId,
						channel: err.channel,
					});
					continue;
				}
				summary.failed.push(handle.id);
				this.ledger.error("ENGAGE_EXEC_FAIL", "send failed; job left in outbox", {
					actionId: action.actionId,
					channel: action.channel,
					type: action.type,
					error: formatErrorSafe(err),
					transient: isTransientNetworkError(err),
					...(err instanceof ChannelSendError
						? {
								kind: err.kind,
								rateLimited: err.rateLimited,
								...(err.status !== undefined ? { status: err.status } : {}),
							}
						: {}),
				});
				continue;
			}

			const job: Job = { ...action, receipt, executedAt: unixSeconds(this.now) };
			this.store.complete(handle, job);
			summary.executed.push(job);
			this.ledger.info("ENGAGE_EXECUTED", `${action.type} sent on ${action.channel}`, {
				actionId: action.actionId,
				channel: action.channel,
				type: action.type,
				status: receipt.status,
				...(receipt.postId ? { postId: receipt.postId } : {}),
			});
		}

		return summary;
	}

	/**
	 * Decode and re-validate a queued job. Returns null when the job was
	 * dead-lettered.
	 */
	private admit(handle: JobHandle, summary: ExecuteSummary): Action | null {
		let record: ActionInput;
		try {
			record = this.store.read(handle);
		} catch (err) {
			if (!(err instanceof JobDecodeError)) throw err;
			this.store.move(handle, "dead");
			summary.dead.push(handle.id);
			this.ledger.error("ENGAGE_JOB_DEAD", "job file could not be decoded; dead-lettered", {
				actionId: handle.id,
				error: err.message,
			});
			return null;
		}

		const decision = validateAction(record);
		if (!decision.allowed) {
			this.store.move(handle, "dead");
			summary.dead.push(handle.id);
			this.ledger.warn("ENGAGE_JOB_BLOCKED", "queued job failed policy; dead-lettered", {
				actionId: handle.id,
				reasons: decision.reasons,
			});
			return null;
		}
		return decision.action;
	}

	private dispatch(action: Action): Promise<Receipt> {
		const sender = this.senderFor(action.channel);
		switch (action.type) {
			case "post":
				return sender.post(action.text);
			case "reply":
				if (!action.inReplyTo) {
					throw new ContractViolationError(`reply ${action.actionId} has no target`);
				}
				return sender.reply(action.inReplyTo, action.text);
		}
	}

	private senderFor(channel: Channel): ChannelSender {
		switch (channel) {
			case "x":
			case "moltbook": {
				const sender = this.senders[channel];
				if (!sender) {
					throw new ChannelSendError(`no sender configured for ${channel}`, {
						kind: "unconfigured",
					});
				}
				return sender;
			}
			default: {
				const unknown: never = channel;
				throw new UnroutableChannelError(String(unknown));
			}
		}
	}
}
