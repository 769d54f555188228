interface CacheEntry<V> {
	value: V
	insertedAt: number
	ttlMs: number
}

export interface CacheOptions {
	maxEntries: number
	defaultTtlMs: number
}

/**
 * TTL cache with a hard entry cap. Expiry is checked on every read; when a new
 * key would exceed the cap, the entry with the oldest insertion time goes.
 * Finding it is a linear scan, so eviction is O(n) in the number of entries.
 */
export class TtlCache<V> {
	private readonly store = new Map<string, CacheEntry<V>>()
	readonly maxEntries: number
	readonly defaultTtlMs: number

	constructor(options: CacheOptions) {
		this.maxEntries = options.maxEntries
		this.defaultTtlMs = options.defaultTtlMs
	}

	private isExpired(entry: CacheEntry<V>, now: number): boolean {
		return now - entry.insertedAt > entry.ttlMs
	}

	get(key: string): V | undefined {
		const entry = this.store.get(key)
		if (!entry) return undefined
		if (this.isExpired(entry, Date.now())) {
			this.store.delete(key)
			return undefined
		}
		return entry.value
	}

	set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
		if (this.maxEntries <= 0) return
		// Re-inserting moves the key to the back so Map order tracks insertion time
		if (!this.store.delete(key) && this.store.size >= this.maxEntries) {
			this.evictOldest()
		}
		this.store.set(key, { value, insertedAt: Date.now(), ttlMs })
	}

	delete(key: string): void {
		this.store.delete(key)
	}

	/** Drops every expired entry. Returns how many were removed. */
	prune(): number {
		const now = Date.now()
		let removed = 0
		for (const [key, entry] of this.store) {
			if (this.isExpired(entry, now)) {
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

	private evictOldest(): void {
		let oldestKey: string | undefined
		let oldestAt = Number.POSITIVE_INFINITY
		for (const [key, entry] of this.store) {
			if (entry.insertedAt < oldestAt) {
				oldestAt = entry.insertedAt
				oldestKey = key
			}
		}
		if (oldestKey !== undefined) this.store.delete(oldestKey)
	}
}

function serialize(value: unknown): string {
	if (value === null || typeof value !== 'object') return JSON.stringify(value) ?? 'undefined'
	if (Array.isArray(value)) return `[${value.map(serialize).join(',')}]`
	const entries = Object.entries(value)
		.filter(([, v]) => v !== undefined)
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(([k, v]) => `${JSON.stringify(k)}:${serialize(v)}`)
	return `{${entries.join(',')}}`
}

/**
 * Builds a deterministic key from an operation name and its arguments.
 * Scalars are URI-encoded so a `:` inside an argument cannot shift the
 * separators; objects are serialized with sorted keys.
 */
export function cacheKey(operation: string, ...args: unknown[]): string {
	const parts = args.map((arg) =>
		typeof arg === 'string' || typeof arg === 'number' || typeof arg === 'boolean'
			? encodeURIComponent(String(arg))
			: serialize(arg),
	)
	return [operation, ...parts].join(':')
}
