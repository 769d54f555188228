import type { BusinessDataProvider, Capability } from '../providers/types.js'
import type {
	BusinessRecord,
	BusinessSearchQuery,
	ComplianceData,
	FinancialData,
	NewsItem,
	QuotaSnapshot,
} from '../types.js'
import { TtlCache, cacheKey } from './cache.js'
import type { GatewayConfig } from './config.js'
import { CostLedger, type CostSink } from './cost-tracker.js'
import {
	NoProviderAvailableError,
	ProviderCallFailedError,
	ProviderNotFoundError,
	QualityBelowThresholdError,
	RateLimitedError,
	errorMessage,
} from './errors.js'
import { type Logger, silentLogger } from './logger.js'
import { RateLimiter } from './rate-limiter.js'
import { ProviderRegistry, type RegisteredProvider } from './registry.js'
import { type ScoreBreakdown, scoreProvider, selectBest } from './selector.js'

export type CachedValue =
	| { kind: 'search' | 'details'; value: BusinessRecord }
	| { kind: 'financial'; value: FinancialData }
	| { kind: 'compliance'; value: ComplianceData }
	| { kind: 'news'; value: readonly NewsItem[] }

export interface GatewayDeps {
	registry?: ProviderRegistry
	cache?: TtlCache<CachedValue>
	costSink?: CostSink
	logger?: Logger
}

export interface CallOptions {
	/** Forwarded to the provider call; aborting it rejects the request. */
	signal?: AbortSignal
	/** Skip both cache read and cache write. */
	noCache?: boolean
}

interface Operation<T> {
	kind: Capability
	invoke(provider: BusinessDataProvider, signal?: AbortSignal): Promise<T>
	fromCache(entry: CachedValue): T | undefined
	toCache(value: T): CachedValue
}

interface Served<T> {
	value: T
	served: RegisteredProvider
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
		for (const child of Object.values(value)) deepFreeze(child)
		Object.freeze(value)
	}
	return value
}

/**
 * Routes business lookups across registered providers: cache, selection,
 * rate limiting, a single fallback hop, quality gating and cost reporting.
 */
export class BusinessDataGateway {
	readonly registry: ProviderRegistry
	readonly cache: TtlCache<CachedValue>
	readonly costSink: CostSink
	private readonly globalLimiter: RateLimiter | undefined
	private readonly log: Logger

	constructor(
		readonly config: GatewayConfig,
		deps: GatewayDeps = {},
	) {
		this.log = (deps.logger ?? silentLogger).child({ component: 'gateway' })
		this.registry =
			deps.registry ??
			new ProviderRegistry({
				requestsPerMinute: config.providerRateLimit,
				burst: config.providerBurst,
			})
		this.cache =
			deps.cache ?? new TtlCache({ maxEntries: config.cacheSize, defaultTtlMs: config.cacheTtlMs })
		this.costSink =
			deps.costSink ??
			new CostLedger({
				budgetLimit: config.budgetLimit,
				alertThreshold: config.alertThreshold,
				logger: this.log,
			})
		// 0 disables the gateway-wide bucket
		this.globalLimiter =
			config.globalRateLimit > 0
				? new RateLimiter({
						requestsPerMinute: config.globalRateLimit,
						burst: config.globalRateLimit,
					})
				: undefined
	}

	registerProvider(provider: BusinessDataProvider): void {
		const { descriptor } = this.registry.register(provider)
		this.log.debug(
			{ provider: descriptor.name, rateLimit: descriptor.rateLimit },
			'provider registered',
		)
	}

	getProviders(): RegisteredProvider[] {
		return this.registry.list()
	}

	quota(providerName: string): QuotaSnapshot {
		return this.requireProvider(providerName).provider.quota()
	}

	/** Scores for every healthy provider against a query, best first. */
	rankProviders(query: BusinessSearchQuery): { name: string; score: ScoreBreakdown }[] {
		return this.registry
			.healthy()
			.filter((entry) => entry.descriptor.capabilities.has('search'))
			.map((entry) => ({
				name: entry.descriptor.name,
				score: scoreProvider(entry, query, this.config),
			}))
			.sort((a, b) => b.score.total - a.score.total)
	}

	async searchBusiness(
		query: BusinessSearchQuery,
		options: CallOptions = {},
	): Promise<BusinessRecord> {
		return this.run<BusinessRecord>(
			{
				kind: 'search',
				invoke: (provider, signal) => provider.searchBusiness(query, signal),
				fromCache: (entry) => (entry.kind === 'search' ? entry.value : undefined),
				toCache: (value) => ({ kind: 'search', value }),
			},
			cacheKey('search', query),
			() => this.selectProvider(query),
			options,
			(record, selected) => this.checkQuality(record, selected),
		)
	}

	async getBusinessDetails(
		id: string,
		providerName: string,
		options: CallOptions = {},
	): Promise<BusinessRecord> {
		return this.run<BusinessRecord>(
			{
				kind: 'details',
				invoke: (provider, signal) => provider.getBusinessDetails(id, signal),
				fromCache: (entry) => (entry.kind === 'details' ? entry.value : undefined),
				toCache: (value) => ({ kind: 'details', value }),
			},
			cacheKey('details', id, providerName),
			() => this.requireProvider(providerName),
			options,
		)
	}

	async getFinancialData(
		id: string,
		providerName: string,
		options: CallOptions = {},
	): Promise<FinancialData> {
		return this.run<FinancialData>(
			{
				kind: 'financial',
				invoke: (provider, signal) => provider.getFinancialData(id, signal),
				fromCache: (entry) => (entry.kind === 'financial' ? entry.value : undefined),
				toCache: (value) => ({ kind: 'financial', value }),
			},
			cacheKey('financial', id, providerName),
			() => this.requireProvider(providerName),
			options,
		)
	}

	async getComplianceData(
		id: string,
		providerName: string,
		options: CallOptions = {},
	): Promise<ComplianceData> {
		return this.run<ComplianceData>(
			{
				kind: 'compliance',
				invoke: (provider, signal) => provider.getComplianceData(id, signal),
				fromCache: (entry) => (entry.kind === 'compliance' ? entry.value : undefined),
				toCache: (value) => ({ kind: 'compliance', value }),
			},
			cacheKey('compliance', id, providerName),
			() => this.requireProvider(providerName),
			options,
		)
	}

	async getNewsData(
		id: string,
		providerName: string,
		options: CallOptions = {},
	): Promise<readonly NewsItem[]> {
		return this.run<readonly NewsItem[]>(
			{
				kind: 'news',
				invoke: (provider, signal) => provider.getNewsData(id, signal),
				fromCache: (entry) => (entry.kind === 'news' ? entry.value : undefined),
				toCache: (value) => ({ kind: 'news', value }),
			},
			cacheKey('news', id, providerName),
			() => this.requireProvider(providerName),
			options,
		)
	}

	/** Best healthy search-capable provider for the query. */
	selectProvider(query: BusinessSearchQuery): RegisteredProvider {
		const best = selectBest(this.registry, query, this.config)
		if (!best) throw new NoProviderAvailableError()
		this.log.debug({ provider: best.descriptor.name }, 'provider selected')
		return best
	}

	private requireProvider(name: string): RegisteredProvider {
		const entry = this.registry.lookup(name)
		if (!entry) throw new ProviderNotFoundError(name)
		return entry
	}

	private async run<T>(
		op: Operation<T>,
		key: string,
		resolve: () => RegisteredProvider,
		options: CallOptions,
		validate?: (value: T, selected: RegisteredProvider) => void,
	): Promise<T> {
		const useCache = this.config.cachingEnabled && !options.noCache

		if (useCache) {
			const entry = this.cache.get(key)
			const hit = entry && op.fromCache(entry)
			if (hit !== undefined) {
				this.log.debug({ key }, 'cache hit')
				return hit
			}
		}

		const selected = resolve()
		this.checkRateLimit(selected)

		const { value, served } = await this.invokeWithFallback(op, selected, options.signal)
		validate?.(value, selected)

		const result = deepFreeze(value)
		if (useCache) this.cache.set(key, op.toCache(result), this.config.cacheTtlMs)
		this.trackCost(served, op.kind)
		return result
	}

	private checkRateLimit(entry: RegisteredProvider): void {
		if (!this.config.rateLimiting) return
		if (!entry.limiter.allow()) throw new RateLimitedError(entry.descriptor.name)
		if (this.globalLimiter && !this.globalLimiter.allow()) {
			throw new RateLimitedError(entry.descriptor.name, 'global')
		}
	}

	private fallbackFor(primary: RegisteredProvider): RegisteredProvider | undefined {
		const name = this.config.fallbackProvider
		if (!name || name === primary.descriptor.name) return undefined
		return this.registry.lookup(name)
	}

	/**
	 * Only rejections reach the fallback. An adapter that throws synchronously
	 * has a bug, and its error goes straight to the caller.
	 */
	private async invokeWithFallback<T>(
		op: Operation<T>,
		selected: RegisteredProvider,
		signal: AbortSignal | undefined,
	): Promise<Served<T>> {
		const pending = op.invoke(selected.provider, signal)
		try {
			return { value: await pending, served: selected }
		} catch (primaryError) {
			const fallback = this.fallbackFor(selected)
			if (!fallback || signal?.aborted) throw primaryError

			const attempted = [selected.descriptor.name, fallback.descriptor.name]
			const failed = (fallbackError: unknown) =>
				new ProviderCallFailedError(op.kind, attempted, primaryError, fallbackError)
			this.log.warn(
				{ provider: selected.descriptor.name, fallback: fallback.descriptor.name, op: op.kind },
				`primary call failed, trying fallback: ${errorMessage(primaryError)}`,
			)

			try {
				this.checkRateLimit(fallback)
			} catch (denied) {
				throw failed(denied)
			}
			const retry = op.invoke(fallback.provider, signal)
			try {
				return { value: await retry, served: fallback }
			} catch (fallbackError) {
				throw failed(fallbackError)
			}
		}
	}

	private checkQuality(record: BusinessRecord, selected: RegisteredProvider): void {
		if (!this.config.dataValidation) return
		const validation = selected.provider.validateData(record)
		if (validation.qualityScore < this.config.qualityThreshold) {
			this.log.info(
				{ provider: selected.descriptor.name, score: validation.qualityScore },
				'record rejected by quality gate',
			)
			throw new QualityBelowThresholdError(
				selected.descriptor.name,
				validation.qualityScore,
				this.config.qualityThreshold,
				validation.issues,
			)
		}
	}

	private trackCost(served: RegisteredProvider, operation: Capability): void {
		if (!this.config.costTracking) return
		const provider = served.descriptor.name
		try {
			this.costSink.record({ provider, operation, cost: served.provider.costPerOperation(operation) })
		} catch (err) {
			this.log.warn({ provider, err }, 'cost sink rejected event')
		}
	}
}
