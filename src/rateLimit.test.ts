import { describe, test, expect } from "vitest";
import { loadConfig } from "./config.js";
import { InvalidParameterError, RateLimitedError } from "./errors.js";
import { RateLimiter } from "./rateLimit.js";

function clock(start = 0) {
	let now = start;
	return {
		now: () => now,
		set: (ms: number) => {
			now = ms;
		},
	};
}

describe("RateLimiter", () => {
	test("allows five requests per minute by default", () => {
		const time = clock();
		const limiter = new RateLimiter({ now: time.now });

		const remaining = [1, 2, 3, 4, 5].map(() => limiter.check("alice"));
		expect(remaining).toEqual([
			{ allowed: true, remaining: 4 },
			{ allowed: true, remaining: 3 },
			{ allowed: true, remaining: 2 },
			{ allowed: true, remaining: 1 },
			{ allowed: true, remaining: 0 },
		]);

		time.set(10_000);
		expect(limiter.check("alice")).toEqual({ allowed: false, retryAfterSeconds: 50 });
	});

	test("does not record rejected requests", () => {
		const time = clock();
		const limiter = new RateLimiter({ now: time.now });
		for (let i = 0; i < 5; i++) limiter.check("alice");

		time.set(30_000);
		limiter.check("alice");
		expect(limiter.inspect("alice")?.timestamps).toEqual([0, 0, 0, 0, 0]);
	});

	test("a request exactly one interval old still counts", () => {
		const time = clock();
		const limiter = new RateLimiter({ now: time.now });
		for (let i = 0; i < 5; i++) limiter.check("alice");

		time.set(60_000);
		expect(limiter.check("alice")).toEqual({ allowed: false, retryAfterSeconds: 1 });

		time.set(60_001);
		expect(limiter.check("alice")).toEqual({ allowed: true, remaining: 4 });
	});

	test("windows are per user", () => {
		const limiter = new RateLimiter({ rule: { requests: 1, intervalSeconds: 60 } });
		expect(limiter.check("alice").allowed).toBe(true);
		expect(limiter.check("alice").allowed).toBe(false);
		expect(limiter.check("bob").allowed).toBe(true);
	});

	test("applies per-user overrides", () => {
		const time = clock();
		const limiter = new RateLimiter({
			now: time.now,
			overrides: { vip: { requests: 10, intervalSeconds: 60 } },
		});

		const results = Array.from({ length: 11 }, () => limiter.check("vip"));
		expect(results.filter((r) => r.allowed)).toHaveLength(10);
		expect(results[10]).toEqual({ allowed: false, retryAfterSeconds: 60 });
		expect(limiter.inspect("vip")).toMatchObject({ requests: 10, intervalSeconds: 60 });
	});

	test.each(["constructor", "toString", "__proto__", "hasOwnProperty"])(
		"user id %s gets the default rule",
		(userId) => {
			const limiter = new RateLimiter({
				overrides: { vip: { requests: 10, intervalSeconds: 60 } },
			});
			const results = Array.from({ length: 20 }, () => limiter.check(userId));
			expect(results.filter((r) => r.allowed)).toHaveLength(5);
		},
	);

	test("overrides loaded from the environment do not match inherited names", () => {
		const config = loadConfig({
			MINTLINK_USER_RATE_LIMITS: '{"vip":{"requests":10,"intervalSeconds":60}}',
		});
		const limiter = new RateLimiter({
			rule: config.rateLimit,
			overrides: config.userRateLimits,
		});

		const results = Array.from({ length: 20 }, () => limiter.check("constructor"));
		expect(results.filter((r) => r.allowed)).toHaveLength(5);
		expect(limiter.inspect("vip")).toBeUndefined();
	});

	test("drops windows whose requests have all expired", () => {
		const time = clock();
		const limiter = new RateLimiter({ now: time.now });
		limiter.check("alice");
		limiter.check("bob");
		expect(limiter.size).toBe(2);

		time.set(60_001);
		expect(limiter.inspect("alice")).toBeUndefined();

		limiter.check("carol");
		expect(limiter.size).toBe(1);
		expect(limiter.inspect("carol")?.timestamps).toEqual([60_001]);
	});

	test("keeps windows that still hold a live request", () => {
		const time = clock();
		const limiter = new RateLimiter({ now: time.now });
		limiter.check("alice");
		time.set(30_000);
		limiter.check("bob");

		time.set(70_000);
		limiter.check("carol");
		expect(limiter.size).toBe(2);
		expect(limiter.inspect("alice")).toBeUndefined();
		expect(limiter.inspect("bob")?.timestamps).toEqual([30_000]);
	});

	test("retry hint rounds a partial second up", () => {
		const time = clock();
		const limiter = new RateLimiter({
			now: time.now,
			rule: { requests: 1, intervalSeconds: 10 },
		});
		limiter.check("alice");

		time.set(8_500);
		expect(limiter.check("alice")).toEqual({ allowed: false, retryAfterSeconds: 2 });
	});

	test("reset forgets a user", () => {
		const limiter = new RateLimiter({ rule: { requests: 1, intervalSeconds: 60 } });
		limiter.check("alice");
		limiter.reset("alice");

		expect(limiter.inspect("alice")).toBeUndefined();
		expect(limiter.check("alice").allowed).toBe(true);
	});

	test("inspect returns a copy", () => {
		const limiter = new RateLimiter();
		limiter.check("alice");
		limiter.inspect("alice")?.timestamps.push(1);

		expect(limiter.inspect("alice")?.timestamps).toHaveLength(1);
	});

	test("consume throws RateLimitedError when the window is full", () => {
		const time = clock();
		const limiter = new RateLimiter({ now: time.now, rule: { requests: 1, intervalSeconds: 30 } });
		limiter.consume("alice");

		time.set(5_000);
		expect(() => limiter.consume("alice")).toThrow(RateLimitedError);
		expect(() => limiter.consume("alice")).toThrow("Rate limited, retry after 25 seconds");
	});

	test("concurrent requests cannot exceed the limit", async () => {
		const limiter = new RateLimiter();
		const results = await Promise.all(
			Array.from({ length: 20 }, async () => limiter.check("alice")),
		);
		expect(results.filter((r) => r.allowed)).toHaveLength(5);
	});

	test.each([
		[{ requests: 0, intervalSeconds: 60 }],
		[{ requests: 1.5, intervalSeconds: 60 }],
		[{ requests: 5, intervalSeconds: 0 }],
	])("rejects invalid rule %o", (rule) => {
		expect(() => new RateLimiter({ rule })).toThrow(InvalidParameterError);
	});

	test("rejects invalid overrides by user", () => {
		expect(
			() => new RateLimiter({ overrides: { bob: { requests: -1, intervalSeconds: 60 } } }),
		).toThrow("Invalid overrides.bob: requests must be a positive integer");
	});
});
