import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { TickLockError } from "../../src/engage/errors.js";
import { TICK_LOCK_FILE, acquireTickLock } from "../../src/engage/tick-lock.js";

describe("tick lock", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "herald-lock-"));
	});

	afterEach(() => {
		vi.restoreAllMocks();
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("writes the pid and removes the file on release", () => {
		const lock = acquireTickLock(tempDir);
		expect(fs.readFileSync(lock.path, "utf-8")).toBe(`${process.pid}\n`);

		lock.release();
		expect(fs.existsSync(lock.path)).toBe(false);
		// second release is a no-op
		lock.release();
	});

	it("refuses a lock held by another live process", () => {
		const lockPath = path.join(tempDir, TICK_LOCK_FILE);
		// the runner that spawned this worker is alive for the whole test
		fs.writeFileSync(lockPath, `${process.ppid}\n`);

		expect(() => acquireTickLock(tempDir)).toThrow(TickLockError);
		expect(fs.readFileSync(lockPath, "utf-8")).toBe(`${process.ppid}\n`);
	});

	it("reclaims a leftover lock carrying its own pid", () => {
		const lockPath = path.join(tempDir, TICK_LOCK_FILE);
		fs.writeFileSync(lockPath, `${process.pid}\n`);

		const lock = acquireTickLock(tempDir);
		expect(fs.readFileSync(lockPath, "utf-8")).toBe(`${process.pid}\n`);
		lock.release();
		expect(fs.existsSync(lockPath)).toBe(false);
	});

	it("reclaims a lock left by a dead process", () => {
		const lockPath = path.join(tempDir, TICK_LOCK_FILE);
		fs.writeFileSync(lockPath, "999999\n");
		vi.spyOn(process, "kill").mockImplementation(() => {
			throw Object.assign(new Error("no such process"), { code: "ESRCH" });
		});

		const lock = acquireTickLock(tempDir);
		expect(fs.readFileSync(lockPath, "utf-8")).toBe(`${process.pid}\n`);
		lock.release();
	});

	it("reclaims a lock file with no readable pid", () => {
		fs.writeFileSync(path.join(tempDir, TICK_LOCK_FILE), "");
		const lock = acquireTickLock(tempDir);
		expect(fs.existsSync(lock.path)).toBe(true);
		lock.release();
	});
});
