import type { RateLimitConfig } from '../providers/types.js'

interface Bucket {
	tokens: number
	lastRefill: number
	config: RateLimitConfig
}

export interface RateLimitHeadroom {
	remaining: number
	capacity: number
}

/**
 * Token bucket per provider. Capacity is `maxRequests`; the bucket refills
 * continuously at `maxRequests` per `windowMs`. Buckets are created on first
 * use and follow config changes made by a hot swap.
 */
export class RateLimiter {
	private readonly buckets = new Map<string, Bucket>()
	private readonly now: () => number

	constructor(now: () => number = () => Date.now()) {
		this.now = now
	}

	tryAcquire(provider: string, config: RateLimitConfig): boolean {
		const bucket = this.refill(provider, config)
		if (bucket.tokens < 1) return false
		bucket.tokens -= 1
		return true
	}

	peek(provider: string, config: RateLimitConfig): boolean {
		return this.refill(provider, config).tokens >= 1
	}

	remaining(provider: string, config: RateLimitConfig): number {
		return Math.floor(this.refill(provider, config).tokens)
	}

	headroom(provider: string, config: RateLimitConfig): RateLimitHeadroom {
		return { remaining: this.remaining(provider, config), capacity: config.maxRequests }
	}

	reset(provider?: string): void {
		if (provider === undefined) this.buckets.clear()
		else this.buckets.delete(provider)
	}

	private refill(provider: string, config: RateLimitConfig): Bucket {
		const now = this.now()
		let bucket = this.buckets.get(provider)
		if (!bucket) {
			bucket = { tokens: config.maxRequests, lastRefill: now, config }
			this.buckets.set(provider, bucket)
			return bucket
		}
		if (bucket.config.maxRequests !== config.maxRequests || bucket.config.windowMs !== config.windowMs) {
			bucket.tokens = Math.min(bucket.tokens, config.maxRequests)
			bucket.config = config
		}
		const elapsed = Math.max(0, now - bucket.lastRefill)
		const refillAmount = (elapsed / bucket.config.windowMs) * bucket.config.maxRequests
		bucket.tokens = Math.min(bucket.config.maxRequests, bucket.tokens + refillAmount)
		bucket.lastRefill = now
		return bucket
	}
}
