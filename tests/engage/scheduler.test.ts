import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { TickLockError } from "../../src/engage/errors.js";
import { startTickScheduler } from "../../src/engage/scheduler.js";

describe("tick scheduler", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("runs immediately and on interval", async () => {
		vi.useFakeTimers();
		const onTick = vi.fn().mockResolvedValue(undefined);

		const scheduler = startTickScheduler({ intervalMs: 60000, onTick });

		await vi.runAllTicks();
		expect(onTick).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(60000);
		expect(onTick).toHaveBeenCalledTimes(2);
		await scheduler.stop();
	});

	it("prevents overlap while a tick is running", async () => {
		vi.useFakeTimers();
		const pending: { resolve?: () => void } = {};
		const onTick = vi.fn(
			() =>
				new Promise<void>((resolve) => {
					pending.resolve = resolve;
				}),
		);

		const scheduler = startTickScheduler({ intervalMs: 60000, onTick });
		await vi.runAllTicks();
		expect(onTick).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(60000);
		expect(onTick).toHaveBeenCalledTimes(1);

		pending.resolve?.();
		await vi.runAllTicks();

		await vi.advanceTimersByTimeAsync(60000);
		expect(onTick).toHaveBeenCalledTimes(2);

		pending.resolve?.();
		await scheduler.stop();
	});

	it("keeps ticking after a failed tick", async () => {
		vi.useFakeTimers();
		const onTick = vi
			.fn()
			.mockRejectedValueOnce(new TickLockError("/tmp/tick.lock", 4242))
			.mockRejectedValueOnce(new Error("boom"))
			.mockResolvedValue(undefined);

		const scheduler = startTickScheduler({ intervalMs: 60000, onTick });
		await vi.runAllTicks();
		await vi.advanceTimersByTimeAsync(60000);
		await vi.advanceTimersByTimeAsync(60000);
		expect(onTick).toHaveBeenCalledTimes(3);
		await scheduler.stop();
	});

	it("clamps the interval to the minimum", async () => {
		vi.useFakeTimers();
		const onTick = vi.fn().mockResolvedValue(undefined);

		const scheduler = startTickScheduler({ intervalMs: 1000, onTick });
		await vi.runAllTicks();
		await vi.advanceTimersByTimeAsync(5000);
		expect(onTick).toHaveBeenCalledTimes(1);

		await vi.advanceTimersByTimeAsync(5000);
		expect(onTick).toHaveBeenCalledTimes(2);
		await scheduler.stop();
	});

	it("stop cancels future ticks", async () => {
		vi.useFakeTimers();
		const onTick = vi.fn().mockResolvedValue(undefined);

		const scheduler = startTickScheduler({ intervalMs: 60000, onTick });
		await vi.runAllTicks();
		expect(onTick).toHaveBeenCalledTimes(1);

		await scheduler.stop();
		await vi.advanceTimersByTimeAsync(120000);
		expect(onTick).toHaveBeenCalledTimes(1);
	});
});
