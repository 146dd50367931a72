import { describe, expect, it } from "vitest";

import { BackoffPolicy } from "./backoff";

describe("BackoffPolicy", () => {
	const opts = { initialDelayMs: 1000, maxDelayMs: 8000, factor: 2, jitterMs: 0 };

	it("doubles the delay up to the cap", () => {
		const backoff = new BackoffPolicy(opts);
		const delays = [1, 2, 3, 4, 5, 6].map(() => backoff.nextDelay());
		expect(delays).toEqual([1000, 2000, 4000, 8000, 8000, 8000]);
		expect(backoff.attempts).toBe(6);
	});

	it("adds jitter on top of the base delay", () => {
		const backoff = new BackoffPolicy({ ...opts, jitterMs: 200, random: () => 0.5 });
		expect(backoff.nextDelay()).toBe(1100);
		expect(backoff.nextDelay()).toBe(2100);
	});

	it("starts over after reset", () => {
		const backoff = new BackoffPolicy(opts);
		backoff.nextDelay();
		backoff.nextDelay();
		backoff.reset();
		expect(backoff.attempts).toBe(0);
		expect(backoff.nextDelay()).toBe(1000);
	});
});
