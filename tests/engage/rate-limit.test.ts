import { describe, expect, it } from "vitest";

import { SlidingWindowLimiter } from "../../src/engage/rate-limit.js";

function fakeClock(startMs: number) {
	let nowMs = startMs;
	return {
		now: () => nowMs,
		advance: (ms: number) => {
			nowMs += ms;
		},
	};
}

describe("sliding window limiter", () => {
	it("allows up to the cap within a window", () => {
		const clock = fakeClock(1_000_000);
		const limiter = new SlidingWindowLimiter({ windowSeconds: 300, maxPerWindow: 2, now: clock.now });

		expect(limiter.allow("x")).toBe(true);
		expect(limiter.allow("x")).toBe(true);
		expect(limiter.allow("x")).toBe(false);
	});

	it("keeps a separate window per key", () => {
		const clock = fakeClock(1_000_000);
		const limiter = new SlidingWindowLimiter({ windowSeconds: 300, maxPerWindow: 1, now: clock.now });

		expect(limiter.allow("x")).toBe(true);
		expect(limiter.allow("moltbook")).toBe(true);
		expect(limiter.allow("x")).toBe(false);
	});

	it("frees slots as old hits leave the window", () => {
		const clock = fakeClock(1_000_000);
		const limiter = new SlidingWindowLimiter({ windowSeconds: 300, maxPerWindow: 2, now: clock.now });

		limiter.allow("x");
		clock.advance(100_000);
		limiter.allow("x");
		expect(limiter.allow("x")).toBe(false);

		clock.advance(200_000);
		// first hit is now exactly 300s old and has left the window
		expect(limiter.allow("x")).toBe(true);
		expect(limiter.allow("x")).toBe(false);
	});

	it("does not record rejected calls", () => {
		const clock = fakeClock(1_000_000);
		const limiter = new SlidingWindowLimiter({ windowSeconds: 60, maxPerWindow: 1, now: clock.now });

		expect(limiter.allow("x")).toBe(true);
		clock.advance(30_000);
		expect(limiter.allow("x")).toBe(false);
		clock.advance(30_000);
		// a recorded rejection at +30s would still block here
		expect(limiter.allow("x")).toBe(true);
	});

	it("builds from config", () => {
		const limiter = SlidingWindowLimiter.fromConfig({ windowSeconds: 300, maxPerWindow: 5 });
		const results = Array.from({ length: 6 }, () => limiter.allow("x"));
		expect(results).toEqual([true, true, true, true, true, false]);
	});
});
