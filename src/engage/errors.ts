/**
 * Error taxonomy for the engagement pipeline.
 *
 * - ContractViolationError: malformed external input; degrades a check.
 * - ChannelSendError: send failure; the job stays queued.
 * - UnroutableChannelError / JobDecodeError: job is dead-lettered.
 * - InboundFetchError: mentions or search read failed; planned as empty.
 * - StorageError: ledger or state write failed; aborts the tick.
 */

export class ContractViolationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ContractViolationError";
	}
}

export type ChannelErrorKind = "network" | "api" | "unconfigured";

export class ChannelSendError extends Error {
	readonly kind: ChannelErrorKind;
	readonly status?: number;
	readonly rateLimited: boolean;

	constructor(
		message: string,
		options: { kind: ChannelErrorKind; status?: number; rateLimited?: boolean; cause?: unknown },
	) {
		super(message, { cause: options.cause });
		this.name = "ChannelSendError";
		this.kind = options.kind;
		this.status = options.status;
		this.rateLimited = options.rateLimited ?? false;
	}
}

export class UnroutableChannelError extends Error {
	constructor(readonly channel: string) {
		super(`no route for channel '${channel}'`);
		this.name = "UnroutableChannelError";
	}
}

export class JobDecodeError extends Error {
	constructor(
		readonly jobPath: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`${jobPath}: ${message}`, options);
		this.name = "JobDecodeError";
	}
}

export class StorageError extends Error {
	constructor(
		readonly target: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`${target}: ${message}`, options);
		this.name = "StorageError";
	}
}

export class TickLockError extends Error {
	constructor(
		readonly lockPath: string,
		readonly holderPid: number | null,
	) {
		super(
			holderPid === null
				? `tick lock ${lockPath} is held`
				: `tick lock ${lockPath} is held by pid ${holderPid}`,
		);
		this.name = "TickLockError";
	}
}

export class InboundFetchError extends Error {
	readonly rateLimited: boolean;

	constructor(
		readonly source: string,
		readonly status: number,
		detail: string,
	) {
		super(`${source} fetch failed (${status}): ${detail}`);
		this.name = "InboundFetchError";
		this.rateLimited = status === 429;
	}
}
