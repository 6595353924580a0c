import fs from "node:fs";
import path from "node:path";

import { getChildLogger } from "../logging.js";
import { TickLockError } from "./errors.js";

const logger = getChildLogger({ module: "tick-lock" });

export const TICK_LOCK_FILE = "tick.lock";

export type TickLock = {
	path: string;
	release(): void;
};

function isPidAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		// EPERM means the process exists but belongs to someone else.
		return (err as NodeJS.ErrnoException).code === "EPERM";
	}
}

function readHolderPid(lockPath: string): number | null {
	try {
		const pid = Number.parseInt(fs.readFileSync(lockPath, "utf-8").trim(), 10);
		return Number.isInteger(pid) && pid > 0 ? pid : null;
	} catch {
		return null;
	}
}

function tryCreate(lockPath: string): boolean {
	try {
		const fd = fs.openSync(lockPath, "wx", 0o600);
		try {
			fs.writeSync(fd, `${process.pid}\n`);
		} finally {
			fs.closeSync(fd);
		}
		return true;
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "EEXIST") {
			return false;
		}
		throw err;
	}
}

/**
 * Take the per-runtime-directory tick lock. A lock left behind by a dead
 * process is reclaimed once; a live holder raises TickLockError.
 *
 * A lock carrying our own pid is stale: no lock outlives the tick that took
 * it, and containers reuse the same pid on every start.
 */
export function acquireTickLock(runtimeDir: string): TickLock {
	fs.mkdirSync(runtimeDir, { recursive: true });
	const lockPath = path.join(runtimeDir, TICK_LOCK_FILE);

	if (!tryCreate(lockPath)) {
		const holder = readHolderPid(lockPath);
		if (holder !== null && holder !== process.pid && isPidAlive(holder)) {
			throw new TickLockError(lockPath, holder);
		}
		logger.warn({ lockPath, holder }, "reclaiming stale tick lock");
		fs.rmSync(lockPath, { force: true });
		if (!tryCreate(lockPath)) {
			throw new TickLockError(lockPath, readHolderPid(lockPath));
		}
	}

	let released = false;
	return {
		path: lockPath,
		release() {
			if (released) return;
			released = true;
			if (readHolderPid(lockPath) === process.pid) {
				fs.rmSync(lockPath, { force: true });
			}
		},
	};
}
