/**
 * One engagement tick: the whole pipeline, start to finish.
 *
 * lock -> freshness -> state -> inbound -> plan -> rate limit -> enqueue
 * -> execute -> state update -> save -> unlock
 *
 * Every step leaves a ledger event. Inbound fetch failures degrade to empty
 * batches; storage failures abort the tick.
 */

import path from "node:path";

import type { HeraldConfig } from "../config/config.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import type { ChannelSender, InboundSource } from "../social/client.js";
import { type Clock, systemClock } from "../utils.js";
import { type ExecuteSummary, Engager, type EnqueueSummary } from "./engager.js";
import { type FreshnessResult, evaluateFreshness, formatFreshnessSnippet } from "./freshness.js";
import { JobStore } from "./job-store.js";
import { Ledger } from "./ledger.js";
import { type PlanResult, planEngagement } from "./planner.js";
import { SlidingWindowLimiter } from "./rate-limit.js";
import { StateStore } from "./state-store.js";
import type { StatusSource } from "./status-source.js";
import { acquireTickLock } from "./tick-lock.js";
import { type Action, CHANNELS, type Channel, type EngageState, type FetchResult } from "./types.js";

export const STATE_FILE = "state.json";
export const LEDGER_FILE = "ledger.jsonl";

export type TickDeps = {
	config: HeraldConfig;
	runtimeDir: string;
	statusSource: StatusSource;
	senders: Partial<Record<Channel, ChannelSender>>;
	/** Known account id; skips resolution when set. */
	userId?: string;
	resolveUserId?: () => Promise<string>;
	mentionsFor?: (userId: string) => InboundSource;
	searches?: readonly InboundSource[];
	/** Shared across ticks by the scheduler; a fresh one per tick otherwise. */
	limiter?: SlidingWindowLimiter;
	runId?: string;
	now?: Clock;
	sleep?: (ms: number) => Promise<void>;
};

export type TickResult = {
	runId: string;
	freshness: FreshnessResult;
	plan: PlanResult;
	rateLimited: string[];
	enqueue: EnqueueSummary;
	execute: ExecuteSummary;
	state: EngageState;
};

async function fetchInbound(
	source: InboundSource,
	cursor: string | undefined,
	maxResults: number,
	ledger: Ledger,
): Promise<FetchResult> {
	try {
		return { ok: true, batch: await source.fetch(cursor, maxResults) };
	} catch (err) {
		const message = formatErrorSafe(err);
		ledger.warn("INBOUND_FETCH_FAILED", `fetch failed for ${source.label}`, {
			source: source.label,
			error: message,
		});
		return { ok: false, error: { source: source.label, message } };
	}
}

async function resolveAccount(
	deps: TickDeps,
	state: EngageState,
	ledger: Ledger,
): Promise<string | undefined> {
	const known = deps.userId ?? state.platformUserId;
	if (known || !deps.resolveUserId) {
		return known;
	}
	try {
		return await deps.resolveUserId();
	} catch (err) {
		ledger.warn("INBOUND_FETCH_FAILED", "could not resolve platform user id", {
			source: "users/me",
			error: formatErrorSafe(err),
		});
		return undefined;
	}
}

function applyExecuted(
	lastDailyPostAt: EngageState["lastDailyPostAt"],
	execute: ExecuteSummary,
): EngageState["lastDailyPostAt"] {
	const next = { ...lastDailyPostAt };
	for (const job of execute.executed) {
		if (job.type === "post" && job.metadata.kind === "daily_status" && job.executedAt !== undefined) {
			next[job.channel] = job.executedAt;
		}
	}
	return next;
}

export async function runEngagementTick(deps: TickDeps): Promise<TickResult> {
	const { config, runtimeDir } = deps;
	const now = deps.now ?? systemClock;
	const lock = acquireTickLock(runtimeDir);

	try {
		const ledger = new Ledger({
			filePath: path.join(runtimeDir, LEDGER_FILE),
			runId: deps.runId,
			now,
		});
		const channels = CHANNELS.filter((channel) => config.channels[channel].enabled);
		ledger.info("TICK_START", "tick started", { runtimeDir, channels });

		// Freshness
		const nowMs = now();
		const status = await deps.statusSource.read();
		const freshness = evaluateFreshness(status, {
			nowMs,
			staleAfterSeconds: config.freshness.staleAfterSeconds,
		});
		const freshnessEvidence = { ...freshness, mode: config.freshness.mode };
		if (freshness.ok) {
			ledger.info("FRESHNESS_CHECKED", `freshness: ${freshness.reason}`, freshnessEvidence);
		} else {
			ledger.warn("FRESHNESS_CHECKED", `freshness: ${freshness.reason}`, freshnessEvidence);
		}

		// State and inbound
		const stateStore = StateStore.fromConfig(path.join(runtimeDir, STATE_FILE), config.state, now);
		const state = stateStore.load();
		const userId = await resolveAccount(deps, state, ledger);
		const planState: EngageState = userId ? { ...state, platformUserId: userId } : state;

		let mentions: FetchResult | undefined;
		if (userId && deps.mentionsFor) {
			mentions = await fetchInbound(
				deps.mentionsFor(userId),
				state.mentionsCursor,
				config.planner.mentionsMaxResults,
				ledger,
			);
		}

		const searches: Record<string, FetchResult> = {};
		if (config.planner.initiation.enabled) {
			for (const source of deps.searches ?? []) {
				searches[source.label] = await fetchInbound(
					source,
					state.searchCursors[source.label],
					config.planner.initiation.maxResults,
					ledger,
				);
			}
		}

		// Plan
		const plan = planEngagement(
			{
				state: planState,
				nowMs,
				freshnessSnippet: formatFreshnessSnippet(freshness),
				mentions,
				searches,
				channels,
			},
			config.planner,
		);
		ledger.info("PLAN_CREATED", `planned ${plan.actions.length} action(s)`, {
			actionIds: plan.actions.map((action) => action.actionId),
			mentionsCursor: plan.mentionsCursor ?? null,
			fetchErrors: plan.fetchErrors.length,
		});

		// Rate limit
		const limiter = deps.limiter ?? SlidingWindowLimiter.fromConfig(config.rateLimit, now);
		const candidates: Action[] = [];
		const rateLimited: string[] = [];
		for (const action of plan.actions) {
			if (limiter.allow(action.channel)) {
				candidates.push(action);
				continue;
			}
			rateLimited.push(action.actionId);
			ledger.warn("ACTION_RATE_LIMITED", `rate limit reached on ${action.channel}`, {
				actionId: action.actionId,
				channel: action.channel,
			});
		}

		// Enqueue and execute
		const engager = new Engager({
			store: new JobStore({ rootDir: runtimeDir, now }),
			ledger,
			senders: deps.senders,
			config: {
				maxPerRun: config.engager.maxPerRun,
				cooldownSeconds: config.engager.cooldownSeconds,
				requireFreshnessOk: config.freshness.mode === "enforce",
			},
			sleep: deps.sleep,
			now,
		});
		const enqueue = engager.enqueue(candidates);
		const execute = await engager.execute(freshness.ok);

		// Persist
		const saved = stateStore.save({
			...planState,
			...(plan.mentionsCursor !== undefined ? { mentionsCursor: plan.mentionsCursor } : {}),
			searchCursors: plan.searchCursors,
			conversationMemory: plan.conversationMemory,
			repliedIds: plan.repliedIds,
			lastDailyPostAt: applyExecuted(planState.lastDailyPostAt, execute),
		});

		ledger.info("TICK_DONE", "tick finished", {
			planned: plan.actions.length,
			rateLimited: rateLimited.length,
			enqueued: enqueue.enqueued.length,
			blocked: enqueue.blocked.length,
			executed: execute.executed.length,
			failed: execute.failed.length,
			dead: execute.dead.length,
			skippedStale: execute.skippedStale,
		});

		return {
			runId: ledger.runId,
			freshness,
			plan,
			rateLimited,
			enqueue,
			execute,
			state: saved,
		};
	} finally {
		lock.release();
	}
}
