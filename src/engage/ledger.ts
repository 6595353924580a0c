import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { getChildLogger } from "../logging.js";
import { type Clock, systemClock } from "../utils.js";
import { StorageError } from "./errors.js";

const logger = getChildLogger({ module: "ledger" });

export const LEDGER_LEVELS = ["INFO", "WARN", "ERROR"] as const;
export type LedgerLevel = (typeof LEDGER_LEVELS)[number];

export type Evidence = Record<string, unknown>;

export type LedgerEvent = {
	timestamp: string;
	runId: string;
	level: LedgerLevel;
	eventType: string;
	message: string;
	evidence: Evidence;
};

const LedgerLineSchema = z.object({
	timestamp: z.string(),
	run_id: z.string(),
	level: z.enum(LEDGER_LEVELS),
	event_type: z.string(),
	message: z.string(),
	evidence: z.record(z.string(), z.unknown()).default({}),
});

export type LedgerOptions = {
	filePath: string;
	runId?: string;
	now?: Clock;
};

export function newRunId(): string {
	return crypto.randomUUID();
}

/**
 * Append-only JSONL audit ledger (`ledger.jsonl`).
 *
 * A failed append throws StorageError. No action is sent without its
 * ledger entry.
 */
export class Ledger {
	readonly filePath: string;
	readonly runId: string;
	private readonly now: Clock;

	constructor(options: LedgerOptions) {
		this.filePath = options.filePath;
		this.runId = options.runId ?? newRunId();
		this.now = options.now ?? systemClock;
	}

	info(eventType: string, message: string, evidence: Evidence = {}): LedgerEvent {
		return this.append("INFO", eventType, message, evidence);
	}

	warn(eventType: string, message: string, evidence: Evidence = {}): LedgerEvent {
		return this.append("WARN", eventType, message, evidence);
	}

	error(eventType: string, message: string, evidence: Evidence = {}): LedgerEvent {
		return this.append("ERROR", eventType, message, evidence);
	}

	private append(
		level: LedgerLevel,
		eventType: string,
		message: string,
		evidence: Evidence,
	): LedgerEvent {
		const event: LedgerEvent = {
			timestamp: new Date(this.now()).toISOString(),
			runId: this.runId,
			level,
			eventType,
			message,
			evidence,
		};
		const line = JSON.stringify({
			timestamp: event.timestamp,
			run_id: event.runId,
			level,
			event_type: eventType,
			message,
			evidence,
		});

		try {
			fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
			fs.appendFileSync(this.filePath, `${line}\n`, { encoding: "utf-8", mode: 0o600 });
		} catch (err) {
			logger.error({ error: String(err), file: this.filePath, eventType }, "ledger append failed");
			throw new StorageError(this.filePath, "failed to append ledger event", { cause: err });
		}

		const fields = { runId: this.runId, eventType, ...evidence };
		if (level === "ERROR") {
			logger.error(fields, message);
		} else if (level === "WARN") {
			logger.warn(fields, message);
		} else {
			logger.info(fields, message);
		}
		return event;
	}
}

/**
 * Read the last `limit` well-formed events. Malformed lines are skipped.
 */
export function readLedger(filePath: string, limit = 100): LedgerEvent[] {
	let content: string;
	try {
		content = fs.readFileSync(filePath, "utf-8");
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") {
			return [];
		}
		throw new StorageError(filePath, "failed to read ledger", { cause: err });
	}

	const events: LedgerEvent[] = [];
	for (const line of content.split("\n")) {
		if (!line.trim()) continue;
		let parsed: unknown;
		try {
			parsed = JSON.parse(line);
		} catch {
			continue;
		}
		const result = LedgerLineSchema.safeParse(parsed);
		if (!result.success) continue;
		events.push({
			timestamp: result.data.timestamp,
			runId: result.data.run_id,
			level: result.data.level,
			eventType: result.data.event_type,
			message: result.data.message,
			evidence: result.data.evidence,
		});
	}
	return limit > 0 ? events.slice(-limit) : [];
}
