/**
 * Per-user sliding-window rate limiter
 *
 * `check` is synchronous: the prune, count and record for one call finish
 * before any other call runs on the event loop, so concurrent requests for
 * the same user cannot both slip past a full window.
 *
 * Windows whose every request has aged out are dropped, at most once a
 * minute, so the map only holds users seen within their interval.
 */

import { DEFAULT_RATE_LIMIT } from "./core/constants.js";
import { InvalidParameterError, RateLimitedError } from "./errors.js";

export interface RateLimitRule {
	/** Requests allowed per window */
	requests: number;
	intervalSeconds: number;
}

export interface RateLimitWindow extends RateLimitRule {
	userId: string;
	/** Request times in ms, oldest first */
	timestamps: number[];
}

export type RateLimitDecision =
	| { allowed: true; remaining: number }
	| { allowed: false; retryAfterSeconds: number };

export interface RateLimiterOptions {
	/** Default rule (5 requests / 60s) */
	rule?: RateLimitRule;
	/** Per-user rule overrides */
	overrides?: Readonly<Record<string, RateLimitRule>>;
	/** Clock in ms (default: Date.now) */
	now?: () => number;
}

const SWEEP_INTERVAL_MS = 60_000;

function assertRule(rule: RateLimitRule, name: string): void {
	if (!Number.isInteger(rule.requests) || rule.requests < 1) {
		throw new InvalidParameterError(name, "requests must be a positive integer");
	}
	if (!(rule.intervalSeconds > 0)) {
		throw new InvalidParameterError(name, "intervalSeconds must be positive");
	}
}

export class RateLimiter {
	private readonly windows = new Map<string, RateLimitWindow>();
	private readonly rule: RateLimitRule;
	// Map, not the options object: user ids such as "constructor" must not
	// resolve to inherited properties
	private readonly overrides: ReadonlyMap<string, RateLimitRule>;
	private readonly now: () => number;
	private lastSweepAt: number;

	constructor(options: RateLimiterOptions = {}) {
		this.rule = options.rule ?? DEFAULT_RATE_LIMIT;
		this.overrides = new Map(Object.entries(options.overrides ?? {}));
		this.now = options.now ?? Date.now;
		assertRule(this.rule, "rule");
		for (const [userId, rule] of this.overrides) {
			assertRule(rule, `overrides.${userId}`);
		}
		this.lastSweepAt = this.now();
	}

	/**
	 * Record a request for `userId` if the window has room.
	 * Rejected requests are not recorded.
	 *
	 * `retryAfterSeconds` is rounded up to whole seconds and is never below 1,
	 * so waiting that long always frees a slot.
	 */
	check(userId: string): RateLimitDecision {
		const now = this.now();
		this.sweep(now);

		const window = this.windowFor(userId);
		window.timestamps = liveTimestamps(window, now);
		const intervalMs = window.intervalSeconds * 1000;

		const oldest = window.timestamps[0];
		if (window.timestamps.length >= window.requests && oldest !== undefined) {
			return {
				allowed: false,
				retryAfterSeconds: Math.max(
					1,
					Math.ceil((intervalMs - (now - oldest)) / 1000),
				),
			};
		}

		window.timestamps.push(now);
		return { allowed: true, remaining: window.requests - window.timestamps.length };
	}

	/**
	 * Like `check`, for callers that propagate errors instead of results.
	 *
	 * @throws RateLimitedError when the window is full
	 */
	consume(userId: string): void {
		const decision = this.check(userId);
		if (!decision.allowed) {
			throw new RateLimitedError(userId, decision.retryAfterSeconds);
		}
	}

	/** Forget all requests for a user */
	reset(userId: string): void {
		this.windows.delete(userId);
	}

	/** Snapshot of a user's live requests, or undefined if none remain */
	inspect(userId: string): Readonly<RateLimitWindow> | undefined {
		const window = this.windows.get(userId);
		if (!window) {
			return undefined;
		}
		const timestamps = liveTimestamps(window, this.now());
		return timestamps.length > 0 ? { ...window, timestamps } : undefined;
	}

	/** Number of users currently holding a window */
	get size(): number {
		return this.windows.size;
	}

	private sweep(now: number): void {
		if (now - this.lastSweepAt < SWEEP_INTERVAL_MS) {
			return;
		}
		this.lastSweepAt = now;
		for (const [userId, window] of this.windows) {
			if (liveTimestamps(window, now).length === 0) {
				this.windows.delete(userId);
			}
		}
	}

	private windowFor(userId: string): RateLimitWindow {
		const existing = this.windows.get(userId);
		if (existing) {
			return existing;
		}
		const rule = this.overrides.get(userId) ?? this.rule;
		const window: RateLimitWindow = {
			userId,
			requests: rule.requests,
			intervalSeconds: rule.intervalSeconds,
			timestamps: [],
		};
		this.windows.set(userId, window);
		return window;
	}
}

function liveTimestamps(window: RateLimitWindow, now: number): number[] {
	const intervalMs = window.intervalSeconds * 1000;
	return window.timestamps.filter((ts) => now - ts <= intervalMs);
}
