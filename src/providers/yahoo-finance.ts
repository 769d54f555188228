import YahooFinance from 'yahoo-finance2'
import { z } from 'zod'
import { ProviderError, UnsupportedOperationError, errorMessage } from '../core/errors.js'
import type {
	BusinessRecord,
	BusinessSearchQuery,
	ComplianceData,
	FinancialData,
	NewsItem,
	QuotaSnapshot,
	ValidationResult,
} from '../types.js'
import countries from './countries.json' with { type: 'json' }
import { HealthTracker, UsageMeter } from './http.js'
import type { Capability, CostTable, ManagedProvider } from './types.js'
import { DEFAULT_RULES, validateRecord } from './validation.js'

const SOURCE = 'yahoo'
const COUNTRY_CODES: Readonly<Record<string, string>> = countries

export interface YahooOptions {
	costs?: CostTable
	newsCount?: number
}

// The library's result types are wide unions; only the fields read here are checked.

const searchSchema = z.object({
	quotes: z
		.array(
			z.object({
				symbol: z.string().optional(),
				isYahooFinance: z.boolean().optional(),
				quoteType: z.string().optional(),
				shortname: z.string().optional(),
				longname: z.string().optional(),
			}),
		)
		.default([]),
	news: z
		.array(
			z.object({
				title: z.string(),
				publisher: z.string().optional(),
				link: z.string().optional(),
				providerPublishTime: z.coerce.date(),
				relatedTickers: z.array(z.string()).optional(),
			}),
		)
		.default([]),
})

const summarySchema = z.object({
	assetProfile: z
		.object({
			address1: z.string().optional(),
			address2: z.string().optional(),
			city: z.string().optional(),
			state: z.string().optional(),
			zip: z.string().optional(),
			country: z.string().optional(),
			website: z.string().optional(),
			industry: z.string().optional(),
			sector: z.string().optional(),
			fullTimeEmployees: z.number().optional(),
		})
		.optional(),
	price: z
		.object({
			longName: z.string().nullish(),
			shortName: z.string().nullish(),
			currency: z.string().optional(),
		})
		.optional(),
	financialData: z
		.object({
			totalRevenue: z.number().optional(),
			financialCurrency: z.string().nullish(),
		})
		.optional(),
	defaultKeyStatistics: z
		.object({
			netIncomeToCommon: z.number().optional(),
			lastFiscalYearEnd: z.coerce.date().optional(),
		})
		.optional(),
})

type Summary = z.infer<typeof summarySchema>

export function countryCode(name: string | undefined): string | undefined {
	if (!name) return undefined
	if (/^[A-Z]{2}$/.test(name)) return name
	return COUNTRY_CODES[name]
}

function toSymbol(id: string): string {
	const raw = id.startsWith(`${SOURCE}:`) ? id.slice(SOURCE.length + 1) : id
	if (!raw.trim()) throw new ProviderError(SOURCE, 'a ticker symbol is required', 400)
	return raw.trim().toUpperCase()
}

export function toFinancial(summary: Summary, now = new Date()): FinancialData | undefined {
	const { financialData, defaultKeyStatistics, assetProfile, price } = summary
	const revenue = financialData?.totalRevenue
	const netIncome = defaultKeyStatistics?.netIncomeToCommon
	const employees = assetProfile?.fullTimeEmployees
	if (revenue == null && netIncome == null && employees == null) return undefined

	const fiscalEnd = defaultKeyStatistics?.lastFiscalYearEnd
	return {
		fiscalYear: (fiscalEnd ?? now).getUTCFullYear(),
		periodEnd: fiscalEnd?.toISOString().slice(0, 10),
		currency: financialData?.financialCurrency ?? price?.currency ?? 'USD',
		...(revenue != null && { revenue }),
		...(netIncome != null && { netIncome }),
		...(employees != null && { employees }),
		source: SOURCE,
	}
}

/**
 * Library calls are made without a per-request signal: an abort stops the
 * wait, and the HTTP request itself runs to completion in the background.
 */
function abortable<T>(pending: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
	if (!signal) return pending
	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(signal.reason)
		signal.addEventListener('abort', onAbort, { once: true })
		void pending
			.then(resolve, reject)
			.finally(() => signal.removeEventListener('abort', onAbort))
	})
}

export function createYahooProvider(options: YahooOptions = {}): ManagedProvider {
	const costs: CostTable = { search: 0, details: 0, financial: 0, news: 0, ...options.costs }
	const newsCount = options.newsCount ?? 10
	const yf = new YahooFinance({ suppressNotices: ['yahooSurvey'] })
	// Yahoo publishes no quota; the meter only counts
	const meter = new UsageMeter(2_000, 48_000)
	const health = new HealthTracker()

	/** Counts the call, feeds health, and wraps library failures. */
	async function call<T>(what: string, signal: AbortSignal | undefined, fn: () => Promise<T>) {
		signal?.throwIfAborted()
		meter.record()
		try {
			const result = await abortable(fn(), signal)
			health.success()
			return result
		} catch (err) {
			if (err instanceof ProviderError || signal?.aborted) throw err
			health.failure()
			throw new ProviderError(SOURCE, `${what} failed: ${errorMessage(err)}`)
		}
	}

	async function summary(symbol: string, withFinancials: boolean, signal?: AbortSignal) {
		const raw = await call(`quoteSummary ${symbol}`, signal, () =>
			yf.quoteSummary(symbol, {
				modules: withFinancials
					? ['assetProfile', 'price', 'financialData', 'defaultKeyStatistics']
					: ['assetProfile', 'price'],
			}),
		)
		const parsed = summarySchema.safeParse(raw)
		if (!parsed.success) {
			throw new ProviderError(SOURCE, `unexpected quoteSummary shape for ${symbol}`)
		}
		return parsed.data
	}

	async function search(term: string, news: number, signal?: AbortSignal) {
		const raw = await call(`search "${term}"`, signal, () =>
			yf.search(term, { quotesCount: news > 0 ? 1 : 5, newsCount: news }),
		)
		const parsed = searchSchema.safeParse(raw)
		if (!parsed.success) throw new ProviderError(SOURCE, `unexpected search shape for "${term}"`)
		return parsed.data
	}

	function toNews(items: z.infer<typeof searchSchema>['news']): NewsItem[] {
		return items.map((n) => ({
			title: n.title,
			url: n.link,
			source: n.publisher ?? SOURCE,
			publishedDate: n.providerPublishTime.toISOString(),
			relatedIds: n.relatedTickers,
		}))
	}

	function toRecord(symbol: string, data: Summary, confidence: number): BusinessRecord {
		const profile = data.assetProfile
		const name = data.price?.longName ?? data.price?.shortName ?? symbol
		return {
			id: `${SOURCE}:${symbol}`,
			nativeId: symbol,
			providerName: SOURCE,
			companyName: name,
			legalName: data.price?.longName ?? undefined,
			address: profile && {
				street1: profile.address1,
				street2: profile.address2,
				city: profile.city,
				state: profile.state,
				postalCode: profile.zip,
				country: countryCode(profile.country) ?? profile.country,
			},
			industryCodes: profile?.industry
				? [{ system: 'OTHER', code: profile.industry, description: profile.sector }]
				: [],
			website: profile?.website,
			dataQuality: provider.dataQuality,
			confidence,
			lastUpdated: new Date().toISOString(),
		}
	}

	const provider: ManagedProvider = {
		name: SOURCE,
		type: 'market',
		capabilities: ['search', 'details', 'financial', 'news'],
		dataQuality: 0.8,
		coverage: { US: 0.9, CA: 0.75, GB: 0.7, DE: 0.6, JP: 0.6, HK: 0.6, AU: 0.6 },
		rateLimit: { requestsPerMinute: 60, burst: 5 },

		isHealthy(): boolean {
			return health.isHealthy()
		},

		setHealthy(healthy: boolean | undefined): void {
			health.setHealthy(healthy)
		},

		costPerOperation(kind: Capability): number {
			return costs[kind] ?? 0
		},

		quota(): QuotaSnapshot {
			return meter.snapshot()
		},

		async searchBusiness(
			query: BusinessSearchQuery,
			signal?: AbortSignal,
		): Promise<BusinessRecord> {
			const term = query.companyName?.trim()
			if (!term) throw new ProviderError(SOURCE, 'search requires a company name', 400)

			const found = await search(term, 0, signal)
			const quote = found.quotes.find((q) => q.isYahooFinance && q.quoteType === 'EQUITY')
			if (!quote?.symbol) throw new ProviderError(SOURCE, `no listed company matching "${term}"`, 404)

			const symbol = quote.symbol
			const data = await summary(symbol, query.includeFinancial === true, signal)
			const exact =
				term.toUpperCase() === symbol ||
				term.toUpperCase() === (quote.longname ?? quote.shortname)?.toUpperCase()
			const record = toRecord(symbol, data, exact ? 0.9 : 0.75)

			const financial = query.includeFinancial ? toFinancial(data) : undefined
			const news = query.includeNews
				? toNews((await search(symbol, newsCount, signal)).news)
				: undefined
			return {
				...record,
				...(financial && { financial }),
				...(news && { news }),
			}
		},

		async getBusinessDetails(id: string, signal?: AbortSignal): Promise<BusinessRecord> {
			const symbol = toSymbol(id)
			return toRecord(symbol, await summary(symbol, false, signal), 1)
		},

		async getFinancialData(id: string, signal?: AbortSignal): Promise<FinancialData> {
			const symbol = toSymbol(id)
			const financial = toFinancial(await summary(symbol, true, signal))
			if (!financial) throw new ProviderError(SOURCE, `no financial data for ${symbol}`, 404)
			return financial
		},

		async getComplianceData(): Promise<ComplianceData> {
			throw new UnsupportedOperationError(SOURCE, 'compliance')
		},

		async getNewsData(id: string, signal?: AbortSignal): Promise<NewsItem[]> {
			const symbol = toSymbol(id)
			return toNews((await search(symbol, newsCount, signal)).news)
		},

		validateData(record: BusinessRecord): ValidationResult {
			// Listings are identified by ticker, not by a registry number
			return validateRecord(record, { ...DEFAULT_RULES, requireIdentifier: false })
		},
	}

	return provider
}
