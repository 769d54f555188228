import { pino } from 'pino'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CostLedger, type CostEvent } from '../src/core/cost-tracker.js'
import {
	NoProviderAvailableError,
	ProviderCallFailedError,
	ProviderNotFoundError,
	QualityBelowThresholdError,
	RateLimitedError,
} from '../src/core/errors.js'
import { BusinessDataGateway } from '../src/core/gateway.js'
import type { BusinessRecord, NewsItem } from '../src/types.js'
import { fakeProvider, makeRecord, testConfig } from './fixtures.js'

beforeEach(() => {
	vi.useFakeTimers()
	vi.setSystemTime(new Date('2024-03-01T00:00:00Z'))
})

afterEach(() => {
	vi.useRealTimers()
})

// ─── Cache ───────────────────────────────────────────────────────────────────

describe('gateway: caching', () => {
	it('serves identical searches from cache without calling the provider again', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		const provider = fakeProvider('alpha')
		gateway.registerProvider(provider)

		const first = await gateway.searchBusiness({ companyName: 'Acme', country: 'US' })
		const second = await gateway.searchBusiness({ country: 'US', companyName: 'Acme' })

		expect(second).toBe(first)
		expect(provider.searchBusiness).toHaveBeenCalledTimes(1)
	})

	it('misses once the TTL has elapsed', async () => {
		const gateway = new BusinessDataGateway(testConfig({ cacheTtlMs: 1000 }))
		const provider = fakeProvider('alpha')
		gateway.registerProvider(provider)

		await gateway.searchBusiness({ companyName: 'Acme' })
		vi.advanceTimersByTime(1001)
		await gateway.searchBusiness({ companyName: 'Acme' })

		expect(provider.searchBusiness).toHaveBeenCalledTimes(2)
	})

	it('keys lookups by id and provider', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		const alpha = fakeProvider('alpha')
		const beta = fakeProvider('beta')
		gateway.registerProvider(alpha)
		gateway.registerProvider(beta)

		await gateway.getBusinessDetails('acme-1', 'alpha')
		await gateway.getBusinessDetails('acme-1', 'alpha')
		await gateway.getBusinessDetails('acme-1', 'beta')
		await gateway.getBusinessDetails('acme-2', 'alpha')

		expect(alpha.getBusinessDetails).toHaveBeenCalledTimes(2)
		expect(beta.getBusinessDetails).toHaveBeenCalledTimes(1)
	})

	it('does not charge the rate limit on a cache hit', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		gateway.registerProvider(fakeProvider('alpha', { rateLimit: { requestsPerMinute: 0, burst: 1 } }))

		await gateway.getFinancialData('acme-1', 'alpha')
		await expect(gateway.getFinancialData('acme-1', 'alpha')).resolves.toMatchObject({
			revenue: 1_000_000,
		})
	})

	it('freezes cached records', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		gateway.registerProvider(fakeProvider('alpha'))

		const record = await gateway.searchBusiness({ companyName: 'Acme' })
		expect(Object.isFrozen(record)).toBe(true)
		expect(Object.isFrozen(record.address)).toBe(true)
	})

	it('bypasses the cache when disabled or per call', async () => {
		const disabled = new BusinessDataGateway(testConfig({ cachingEnabled: false }))
		const a = fakeProvider('alpha')
		disabled.registerProvider(a)
		await disabled.getNewsData('acme-1', 'alpha')
		await disabled.getNewsData('acme-1', 'alpha')
		expect(a.getNewsData).toHaveBeenCalledTimes(2)
		expect(disabled.cache.size()).toBe(0)

		const enabled = new BusinessDataGateway(testConfig())
		const b = fakeProvider('alpha')
		enabled.registerProvider(b)
		await enabled.getNewsData('acme-1', 'alpha', { noCache: true })
		await enabled.getNewsData('acme-1', 'alpha')
		expect(b.getNewsData).toHaveBeenCalledTimes(2)
	})
})

// ─── Selection & lookup ──────────────────────────────────────────────────────

describe('gateway: provider resolution', () => {
	it('fails search when no provider is healthy', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		gateway.registerProvider(fakeProvider('down', { isHealthy: () => false }))

		await expect(gateway.searchBusiness({ companyName: 'Acme' })).rejects.toThrow(
			new NoProviderAvailableError(),
		)
	})

	it('fails lookups for unregistered providers', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		const err = await gateway.getComplianceData('acme-1', 'ghost').catch((e: unknown) => e)

		expect(err).toBeInstanceOf(ProviderNotFoundError)
		expect(err).toHaveProperty('message', 'provider ghost not found')
		expect(err).toHaveProperty('code', 'PROVIDER_NOT_FOUND')
	})

	it('routes a search to the best-scoring provider', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		gateway.registerProvider(fakeProvider('uk', { coverage: { GB: 0.9 } }))
		gateway.registerProvider(fakeProvider('us', { coverage: { US: 0.9 } }))

		const record = await gateway.searchBusiness({ companyName: 'Acme', country: 'US' })
		expect(record.providerName).toBe('us')
		expect(gateway.rankProviders({ country: 'US' }).map((r) => r.name)).toEqual(['us', 'uk'])
	})
})

// ─── Rate limiting ───────────────────────────────────────────────────────────

describe('gateway: rate limiting', () => {
	it('rejects once the provider bucket is empty', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		const provider = fakeProvider('alpha', { rateLimit: { requestsPerMinute: 1, burst: 1 } })
		gateway.registerProvider(provider)

		await gateway.getBusinessDetails('acme-1', 'alpha')
		const err = await gateway.getBusinessDetails('acme-2', 'alpha').catch((e: unknown) => e)

		expect(err).toBeInstanceOf(RateLimitedError)
		expect(err).toHaveProperty('message', 'rate limit exceeded for provider alpha')
		expect(provider.getBusinessDetails).toHaveBeenCalledTimes(1)
	})

	it('does not fall back when the primary is rate limited', async () => {
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'beta' }))
		gateway.registerProvider(fakeProvider('alpha', { rateLimit: { requestsPerMinute: 0, burst: 0 } }))
		const beta = fakeProvider('beta')
		gateway.registerProvider(beta)

		await expect(gateway.getBusinessDetails('acme-1', 'alpha')).rejects.toBeInstanceOf(
			RateLimitedError,
		)
		expect(beta.getBusinessDetails).not.toHaveBeenCalled()
	})

	it('applies the global bucket across providers', async () => {
		const gateway = new BusinessDataGateway(testConfig({ globalRateLimit: 2 }))
		gateway.registerProvider(fakeProvider('alpha'))
		gateway.registerProvider(fakeProvider('beta'))

		await gateway.getBusinessDetails('acme-1', 'alpha')
		await gateway.getBusinessDetails('acme-1', 'beta')
		const err = await gateway.getBusinessDetails('acme-2', 'alpha').catch((e: unknown) => e)

		expect(err).toBeInstanceOf(RateLimitedError)
		expect(err).toHaveProperty('scope', 'global')
	})

	it('skips every bucket when rate limiting is off', async () => {
		const gateway = new BusinessDataGateway(testConfig({ rateLimiting: false }))
		gateway.registerProvider(fakeProvider('alpha', { rateLimit: { requestsPerMinute: 0, burst: 0 } }))

		await expect(
			gateway.getBusinessDetails('acme-1', 'alpha', { noCache: true }),
		).resolves.toMatchObject({ nativeId: 'acme-1' })
	})
})

// ─── Fallback ────────────────────────────────────────────────────────────────

describe('gateway: fallback', () => {
	it('returns the fallback result when the primary fails', async () => {
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'beta' }))
		gateway.registerProvider(
			fakeProvider('alpha', {
				dataQuality: 0.99,
				searchBusiness: vi.fn(async () => {
					throw new Error('upstream timeout')
				}),
			}),
		)
		gateway.registerProvider(fakeProvider('beta', { dataQuality: 0.5 }))

		const record = await gateway.searchBusiness({ companyName: 'Acme' })
		expect(record.providerName).toBe('beta')
	})

	it('propagates the primary error unchanged without a fallback', async () => {
		const failure = new Error('upstream timeout')
		const gateway = new BusinessDataGateway(testConfig())
		gateway.registerProvider(
			fakeProvider('alpha', {
				getFinancialData: vi.fn(async () => {
					throw failure
				}),
			}),
		)

		await expect(gateway.getFinancialData('acme-1', 'alpha')).rejects.toBe(failure)
	})

	it('does not fall back to the primary itself', async () => {
		const failure = new Error('upstream timeout')
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'alpha' }))
		const alpha = fakeProvider('alpha', {
			getNewsData: vi.fn(async () => {
				throw failure
			}),
		})
		gateway.registerProvider(alpha)

		await expect(gateway.getNewsData('acme-1', 'alpha')).rejects.toBe(failure)
		expect(alpha.getNewsData).toHaveBeenCalledTimes(1)
	})

	it('propagates the primary error when the fallback is not registered', async () => {
		const failure = new Error('upstream timeout')
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'ghost' }))
		gateway.registerProvider(
			fakeProvider('alpha', {
				getComplianceData: vi.fn(async () => {
					throw failure
				}),
			}),
		)

		await expect(gateway.getComplianceData('acme-1', 'alpha')).rejects.toBe(failure)
	})

	it('wraps both causes when the fallback fails too', async () => {
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'beta' }))
		const primary = new Error('primary down')
		const secondary = new Error('fallback down')
		gateway.registerProvider(
			fakeProvider('alpha', {
				getBusinessDetails: vi.fn(async () => {
					throw primary
				}),
			}),
		)
		gateway.registerProvider(
			fakeProvider('beta', {
				getBusinessDetails: vi.fn(async () => {
					throw secondary
				}),
			}),
		)

		const err = await gateway.getBusinessDetails('acme-1', 'alpha').catch((e: unknown) => e)
		expect(err).toBeInstanceOf(ProviderCallFailedError)
		expect(err).toHaveProperty(
			'message',
			'All providers failed for details (tried: alpha, beta): fallback down',
		)
		expect(err).toHaveProperty('primaryError', primary)
		expect(err).toHaveProperty('cause', secondary)
		expect(err).toHaveProperty('attempted', ['alpha', 'beta'])
	})

	it('lets a synchronous adapter throw reach the caller without a fallback', async () => {
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'beta' }))
		const bug = new TypeError('adapter bug')
		gateway.registerProvider(
			fakeProvider('alpha', {
				getBusinessDetails: vi.fn((): Promise<BusinessRecord> => {
					throw bug
				}),
			}),
		)
		const beta = fakeProvider('beta')
		gateway.registerProvider(beta)

		await expect(gateway.getBusinessDetails('acme-1', 'alpha')).rejects.toBe(bug)
		expect(beta.getBusinessDetails).not.toHaveBeenCalled()
	})

	it('does not wrap a synchronous throw from the fallback', async () => {
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'beta' }))
		const bug = new TypeError('fallback bug')
		gateway.registerProvider(
			fakeProvider('alpha', {
				getNewsData: vi.fn(async (): Promise<NewsItem[]> => {
					throw new Error('upstream timeout')
				}),
			}),
		)
		gateway.registerProvider(
			fakeProvider('beta', {
				getNewsData: vi.fn((): Promise<NewsItem[]> => {
					throw bug
				}),
			}),
		)

		await expect(gateway.getNewsData('acme-1', 'alpha')).rejects.toBe(bug)
	})

	it('does not fall back after the caller aborts', async () => {
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'beta' }))
		const controller = new AbortController()
		const aborted = new Error('aborted')
		gateway.registerProvider(
			fakeProvider('alpha', {
				getNewsData: vi.fn(async () => {
					controller.abort()
					throw aborted
				}),
			}),
		)
		const beta = fakeProvider('beta')
		gateway.registerProvider(beta)

		await expect(
			gateway.getNewsData('acme-1', 'alpha', { signal: controller.signal }),
		).rejects.toBe(aborted)
		expect(beta.getNewsData).not.toHaveBeenCalled()
	})

	it('forwards the caller signal to the provider', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		const provider = fakeProvider('alpha')
		gateway.registerProvider(provider)
		const { signal } = new AbortController()

		await gateway.getBusinessDetails('acme-1', 'alpha', { signal })
		expect(provider.getBusinessDetails).toHaveBeenCalledWith('acme-1', signal)
	})
})

// ─── Quality gate ────────────────────────────────────────────────────────────

describe('gateway: quality gate', () => {
	const sparse = makeRecord('alpha', { address: undefined })

	it('rejects a search result below the threshold', async () => {
		const gateway = new BusinessDataGateway(testConfig({ qualityThreshold: 0.8 }))
		gateway.registerProvider(
			fakeProvider('alpha', { searchBusiness: vi.fn(async () => sparse) }),
		)

		const err = await gateway.searchBusiness({ companyName: 'Acme' }).catch((e: unknown) => e)
		expect(err).toBeInstanceOf(QualityBelowThresholdError)
		// 0.9 with the missing-address penalty
		expect(err).toHaveProperty('qualityScore', expect.closeTo(0.72, 5))
		expect(err).toHaveProperty(
			'message',
			'data quality 0.72 from provider alpha is below threshold 0.80',
		)
		expect(gateway.cache.size()).toBe(0)
	})

	it('accepts the same record with validation disabled', async () => {
		const gateway = new BusinessDataGateway(testConfig({ dataValidation: false }))
		gateway.registerProvider(
			fakeProvider('alpha', { searchBusiness: vi.fn(async () => sparse) }),
		)

		await expect(gateway.searchBusiness({ companyName: 'Acme' })).resolves.toMatchObject({
			companyName: 'Acme Corp',
		})
	})

	it('does not validate direct lookups', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		gateway.registerProvider(
			fakeProvider('alpha', { getBusinessDetails: vi.fn(async () => sparse) }),
		)

		await expect(gateway.getBusinessDetails('acme-1', 'alpha')).resolves.toBe(sparse)
	})

	it('validates with the selected provider even when the fallback served', async () => {
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'beta' }))
		const validateData = vi.fn(() => ({ isValid: true, qualityScore: 1, issues: [] }))
		gateway.registerProvider(
			fakeProvider('alpha', {
				dataQuality: 0.99,
				searchBusiness: vi.fn(async () => {
					throw new Error('down')
				}),
				validateData,
			}),
		)
		gateway.registerProvider(
			fakeProvider('beta', { dataQuality: 0.5, searchBusiness: vi.fn(async () => sparse) }),
		)

		await expect(gateway.searchBusiness({ companyName: 'Acme' })).resolves.toBe(sparse)
		expect(validateData).toHaveBeenCalledWith(sparse)
	})
})

// ─── Cost tracking ───────────────────────────────────────────────────────────

describe('gateway: cost tracking', () => {
	it('charges the provider that served the call', async () => {
		const events: CostEvent[] = []
		const gateway = new BusinessDataGateway(testConfig({ fallbackProvider: 'beta' }), {
			costSink: { record: (e) => events.push(e) },
		})
		gateway.registerProvider(
			fakeProvider('alpha', {
				costPerOperation: () => 5,
				getFinancialData: vi.fn(async () => {
					throw new Error('down')
				}),
			}),
		)
		gateway.registerProvider(fakeProvider('beta', { costPerOperation: () => 2 }))

		await gateway.getFinancialData('acme-1', 'alpha')
		expect(events).toEqual([{ provider: 'beta', operation: 'financial', cost: 2 }])
	})

	it('records nothing for cache hits or when tracking is off', async () => {
		const record = vi.fn()
		const gateway = new BusinessDataGateway(testConfig(), { costSink: { record } })
		gateway.registerProvider(fakeProvider('alpha', { costPerOperation: () => 1 }))
		await gateway.getBusinessDetails('acme-1', 'alpha')
		await gateway.getBusinessDetails('acme-1', 'alpha')
		expect(record).toHaveBeenCalledTimes(1)

		const untracked = new BusinessDataGateway(testConfig({ costTracking: false }), {
			costSink: { record },
		})
		untracked.registerProvider(fakeProvider('alpha', { costPerOperation: () => 1 }))
		await untracked.getBusinessDetails('acme-1', 'alpha')
		expect(record).toHaveBeenCalledTimes(1)
	})

	it('keeps the result when the sink throws', async () => {
		const logger = pino({ level: 'silent' })
		const gateway = new BusinessDataGateway(testConfig(), {
			logger,
			costSink: {
				record: () => {
					throw new Error('sink offline')
				},
			},
		})
		gateway.registerProvider(fakeProvider('alpha'))

		await expect(gateway.getBusinessDetails('acme-1', 'alpha')).resolves.toMatchObject({
			nativeId: 'acme-1',
		})
	})

	it('feeds the default ledger', async () => {
		const gateway = new BusinessDataGateway(testConfig())
		gateway.registerProvider(fakeProvider('alpha', { costPerOperation: () => 0.25 }))
		await gateway.getBusinessDetails('acme-1', 'alpha')
		await gateway.getComplianceData('acme-1', 'alpha')

		expect(gateway.costSink).toBeInstanceOf(CostLedger)
		if (gateway.costSink instanceof CostLedger) {
			expect(gateway.costSink.byProvider()).toEqual({ alpha: { details: 0.25, compliance: 0.25 } })
		}
	})
})

describe('gateway: quota', () => {
	it('reads the provider quota by name', () => {
		const gateway = new BusinessDataGateway(testConfig())
		gateway.registerProvider(fakeProvider('alpha'))
		expect(gateway.quota('alpha').dailyLimit).toBe(100)
		expect(() => gateway.quota('ghost')).toThrow(ProviderNotFoundError)
	})
})
