import type { RateLimitConfig } from '../providers/types.js'

const MINUTE_MS = 60_000

function sanitize(n: number): number {
	return Number.isFinite(n) && n > 0 ? n : 0
}

/**
 * Token bucket. Starts full; refills continuously at `requestsPerMinute` up to
 * `burst`. A rate of 0 never refills past the initial burst.
 */
export class RateLimiter {
	readonly requestsPerMinute: number
	readonly burst: number
	private tokens: number
	private lastRefill: number

	constructor(config: RateLimitConfig) {
		this.requestsPerMinute = sanitize(config.requestsPerMinute)
		this.burst = sanitize(config.burst)
		this.tokens = this.burst
		this.lastRefill = Date.now()
	}

	private refill(): void {
		const now = Date.now()
		const elapsed = now - this.lastRefill
		if (elapsed > 0 && this.requestsPerMinute > 0) {
			const refillAmount = (elapsed / MINUTE_MS) * this.requestsPerMinute
			this.tokens = Math.min(this.burst, this.tokens + refillAmount)
		}
		this.lastRefill = now
	}

	/** Takes one token if available. Never waits. */
	allow(): boolean {
		this.refill()
		if (this.tokens < 1) return false
		this.tokens -= 1
		return true
	}

	canRequest(): boolean {
		this.refill()
		return this.tokens >= 1
	}

	remaining(): number {
		this.refill()
		return Math.floor(this.tokens)
	}
}
