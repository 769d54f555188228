import type { BusinessDataProvider, Capability, RateLimitConfig } from '../providers/types.js'
import { RateLimiter } from './rate-limiter.js'

/** Snapshot of a provider's selection metadata, frozen at registration. */
export interface ProviderDescriptor {
	readonly name: string
	readonly type: string
	readonly capabilities: ReadonlySet<Capability>
	readonly dataQuality: number
	readonly coverage: Readonly<Record<string, number>>
	readonly rateLimit: Readonly<RateLimitConfig>
}

export interface RegisteredProvider {
	readonly provider: BusinessDataProvider
	readonly descriptor: ProviderDescriptor
	readonly limiter: RateLimiter
}

export class ProviderRegistry {
	private readonly entries = new Map<string, RegisteredProvider>()

	constructor(private readonly defaultRateLimit: RateLimitConfig) {}

	/** Replaces any provider registered under the same name, limiter included. */
	register(provider: BusinessDataProvider): RegisteredProvider {
		const rateLimit = Object.freeze({ ...(provider.rateLimit ?? this.defaultRateLimit) })
		const descriptor: ProviderDescriptor = Object.freeze({
			name: provider.name,
			type: provider.type,
			capabilities: new Set(provider.capabilities),
			dataQuality: provider.dataQuality,
			coverage: Object.freeze({ ...provider.coverage }),
			rateLimit,
		})
		const entry: RegisteredProvider = Object.freeze({
			provider,
			descriptor,
			limiter: new RateLimiter(rateLimit),
		})
		this.entries.delete(provider.name)
		this.entries.set(provider.name, entry)
		return entry
	}

	unregister(name: string): boolean {
		return this.entries.delete(name)
	}

	lookup(name: string): RegisteredProvider | undefined {
		return this.entries.get(name)
	}

	has(name: string): boolean {
		return this.entries.has(name)
	}

	/** False for names that were never registered. */
	allow(name: string): boolean {
		return this.entries.get(name)?.limiter.allow() ?? false
	}

	remaining(name: string): number {
		return this.entries.get(name)?.limiter.remaining() ?? 0
	}

	/** Registration order. */
	list(): RegisteredProvider[] {
		return [...this.entries.values()]
	}

	healthy(): RegisteredProvider[] {
		return this.list().filter((entry) => entry.provider.isHealthy())
	}

	get size(): number {
		return this.entries.size
	}
}
