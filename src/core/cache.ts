export interface CacheEntry<T = unknown> {
	key: string
	value: T
	fetchedAt: number
	ttlMs: number
	expiresAt: number
	/** Which provider produced the value. Informational; not part of the key. */
	provider: string
}

export interface CacheStats {
	size: number
	hits: number
	misses: number
	sets: number
	evictions: number
	hitRate: number
}

export interface ResponseCacheOptions {
	maxEntries?: number
	now?: () => number
}

const DEFAULT_MAX_ENTRIES = 500

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
	return a < b ? -1 : a > b ? 1 : 0
}

function canonicalize(value: unknown): unknown {
	if (Array.isArray(value)) return value.map(canonicalize)
	if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
		const out: Record<string, unknown> = {}
		for (const [k, v] of Object.entries(value).sort(byKey)) {
			if (v !== undefined) out[k] = canonicalize(v)
		}
		return out
	}
	return value
}

// Cached values are handed to every later reader, so none of them may change it.
function deepFreeze(value: unknown): void {
	if (value === null || typeof value !== 'object' || Object.isFrozen(value)) return
	Object.freeze(value)
	for (const member of Object.values(value)) deepFreeze(member)
}

/**
 * Deterministic key for an operation and its parameters. Parameter order and
 * undefined members do not affect the key; the serving provider is never
 * part of it, so a failover does not split the cache.
 */
export function cacheKey(operation: string, params: object): string {
	const sorted = Object.entries(params)
		.filter(([, v]) => v !== undefined)
		.sort(byKey)
		.map(([k, v]) => `${k}=${JSON.stringify(canonicalize(v))}`)
		.join('&')
	return `${operation}:${sorted}`
}

export class ResponseCache {
	private readonly store = new Map<string, CacheEntry>()
	private readonly maxEntries: number
	private readonly now: () => number
	private hits = 0
	private misses = 0
	private sets = 0
	private evictions = 0

	constructor(options: ResponseCacheOptions = {}) {
		this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES
		this.now = options.now ?? (() => Date.now())
	}

	get<T>(key: string): CacheEntry<T> | undefined {
		const entry = this.store.get(key)
		if (!entry) {
			this.misses++
			return undefined
		}
		if (entry.expiresAt <= this.now()) {
			this.store.delete(key)
			this.misses++
			return undefined
		}
		this.hits++
		return entry as CacheEntry<T>
	}

	put<T>(key: string, value: T, ttlMs: number, provider: string): void {
		if (ttlMs <= 0) return
		deepFreeze(value)
		const fetchedAt = this.now()
		// Replace the whole entry in one step; readers never see a half-built one.
		this.store.set(key, { key, value, fetchedAt, ttlMs, expiresAt: fetchedAt + ttlMs, provider })
		this.sets++
		this.evictIfNeeded()
	}

	invalidate(key: string): boolean {
		return this.store.delete(key)
	}

	invalidatePrefix(prefix: string): number {
		let removed = 0
		for (const key of [...this.store.keys()]) {
			if (key.startsWith(prefix)) {
				this.store.delete(key)
				removed++
			}
		}
		return removed
	}

	clear(): void {
		this.store.clear()
	}

	size(): number {
		return this.store.size
	}

	stats(): CacheStats {
		const lookups = this.hits + this.misses
		return {
			size: this.store.size,
			hits: this.hits,
			misses: this.misses,
			sets: this.sets,
			evictions: this.evictions,
			hitRate: lookups === 0 ? 0 : this.hits / lookups,
		}
	}

	resetStats(): void {
		this.hits = 0
		this.misses = 0
		this.sets = 0
		this.evictions = 0
	}

	private evictIfNeeded(): void {
		if (this.store.size <= this.maxEntries) return
		const now = this.now()
		for (const [key, entry] of this.store) {
			if (entry.expiresAt <= now) {
				this.store.delete(key)
				this.evictions++
			}
		}
		if (this.store.size <= this.maxEntries) return
		// Drop whatever expires soonest
		const entries = [...this.store.entries()].sort((a, b) => a[1].expiresAt - b[1].expiresAt)
		for (const [key] of entries.slice(0, entries.length - this.maxEntries)) {
			this.store.delete(key)
			this.evictions++
		}
	}
}
