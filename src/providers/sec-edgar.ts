import { z } from 'zod'
import { ProviderError, UnsupportedOperationError } from '../core/errors.js'
import type {
	Address,
	BusinessRecord,
	BusinessSearchQuery,
	ComplianceData,
	FinancialData,
	NewsItem,
	QuotaSnapshot,
	ValidationResult,
} from '../types.js'
import { HealthTracker, UsageMeter, createJsonClient } from './http.js'
import type { Capability, CostTable, ManagedProvider } from './types.js'
import { validateRecord } from './validation.js'

const SOURCE = 'sec-edgar'
const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json'
const DATA_BASE = 'https://data.sec.gov'
const DEFAULT_USER_AGENT = 'business-data-gateway/0.1.0 (admin@example.com)'

const DAY_MS = 86_400_000
const ANNUAL_FORMS = new Set(['10-K', '20-F', '40-F'])

export interface SecEdgarOptions {
	/** SEC asks for a contact in the User-Agent of every request. */
	userAgent?: string
	costs?: CostTable
}

// --- Wire shapes ---

const tickerFileSchema = z.record(
	z.object({
		cik_str: z.number(),
		ticker: z.string(),
		title: z.string(),
	}),
)

const edgarAddressSchema = z.object({
	street1: z.string().nullish(),
	street2: z.string().nullish(),
	city: z.string().nullish(),
	stateOrCountry: z.string().nullish(),
	zipCode: z.string().nullish(),
	isForeignLocation: z.number().nullish(),
})

const submissionsSchema = z.object({
	cik: z.coerce.string(),
	name: z.string(),
	entityType: z.string().nullish(),
	sic: z.string().nullish(),
	sicDescription: z.string().nullish(),
	ein: z.string().nullish(),
	website: z.string().nullish(),
	tickers: z.array(z.string()).default([]),
	addresses: z
		.object({ business: edgarAddressSchema.nullish(), mailing: edgarAddressSchema.nullish() })
		.default({}),
	filings: z.object({
		recent: z.object({
			form: z.array(z.string()),
			filingDate: z.array(z.string()),
		}),
	}),
})

type Submissions = z.infer<typeof submissionsSchema>

const factUnitSchema = z.object({
	end: z.string(),
	val: z.number(),
	form: z.string(),
	fp: z.string().nullish(),
	filed: z.string(),
})

const companyFactsSchema = z.object({
	facts: z.object({
		'us-gaap': z.record(z.object({ units: z.record(z.array(factUnitSchema)) })).optional(),
	}),
})

type FactUnit = z.infer<typeof factUnitSchema>

// --- Helpers ---

interface TickerEntry {
	cik: number
	ticker: string
	name: string
}

interface CompanyMatch {
	cik: number
	confidence: number
}

export function padCik(cik: number | string): string {
	return String(cik).padStart(10, '0')
}

function toAddress(raw: Submissions['addresses']['business']): Address | undefined {
	if (!raw) return undefined
	const domestic = raw.isForeignLocation !== 1
	return {
		street1: raw.street1 ?? undefined,
		street2: raw.street2 ?? undefined,
		city: raw.city ?? undefined,
		state: domestic ? (raw.stateOrCountry ?? undefined) : undefined,
		postalCode: raw.zipCode ?? undefined,
		country: domestic ? 'US' : undefined,
	}
}

/** Most recent filing date, or undefined when nothing is on file. */
function latestFiling(subs: Submissions, forms?: Set<string>): string | undefined {
	const { form, filingDate } = subs.filings.recent
	let latest: string | undefined
	for (let i = 0; i < form.length; i++) {
		if (forms && !forms.has(form[i])) continue
		const date = filingDate[i]
		if (date && (!latest || date > latest)) latest = date
	}
	return latest
}

export function matchCompany(
	entries: readonly TickerEntry[],
	query: BusinessSearchQuery,
): CompanyMatch | undefined {
	const reg = query.registrationNumber?.trim()
	if (reg && /^\d{1,10}$/.test(reg)) {
		return { cik: Number(reg), confidence: 1 }
	}

	const name = query.companyName?.trim().toUpperCase()
	if (!name) return undefined

	const exact = entries.find((e) => e.name.toUpperCase() === name)
	if (exact) return { cik: exact.cik, confidence: 0.95 }

	const byTicker = entries.find((e) => e.ticker === name)
	if (byTicker) return { cik: byTicker.cik, confidence: 0.9 }

	const partial = entries.find((e) => e.name.toUpperCase().includes(name))
	if (partial) return { cik: partial.cik, confidence: 0.7 }

	return undefined
}

const FINANCIAL_TAGS = {
	revenue: ['Revenues', 'RevenueFromContractWithCustomerExcludingAssessedTax', 'SalesRevenueNet'],
	netIncome: ['NetIncomeLoss'],
	totalAssets: ['Assets'],
	totalLiabilities: ['Liabilities'],
	stockholdersEquity: ['StockholdersEquity'],
} as const

type FinancialField = keyof typeof FINANCIAL_TAGS

const FINANCIAL_FIELDS: FinancialField[] = [
	'revenue',
	'netIncome',
	'totalAssets',
	'totalLiabilities',
	'stockholdersEquity',
]

function annualUnits(facts: Record<string, { units: Record<string, FactUnit[]> }>, tag: string) {
	return (facts[tag]?.units.USD ?? []).filter((u) => u.form === '10-K' && u.fp === 'FY')
}

/**
 * Picks the latest annual period across the tracked concepts and reads each
 * concept at that period end. Restated values win by filing date.
 */
export function buildFinancials(
	facts: Record<string, { units: Record<string, FactUnit[]> }> | undefined,
): FinancialData | undefined {
	if (!facts) return undefined

	let periodEnd = ''
	for (const tags of Object.values(FINANCIAL_TAGS)) {
		for (const tag of tags) {
			for (const unit of annualUnits(facts, tag)) {
				if (unit.end > periodEnd) periodEnd = unit.end
			}
		}
	}
	if (!periodEnd) return undefined

	const values: Partial<Record<FinancialField, number>> = {}
	for (const field of FINANCIAL_FIELDS) {
		for (const tag of FINANCIAL_TAGS[field]) {
			const atEnd = annualUnits(facts, tag)
				.filter((u) => u.end === periodEnd)
				.sort((a, b) => a.filed.localeCompare(b.filed))
			const latest = atEnd[atEnd.length - 1]
			if (latest) {
				values[field] = latest.val
				break
			}
		}
	}

	return {
		fiscalYear: Number(periodEnd.slice(0, 4)),
		periodEnd,
		currency: 'USD',
		...values,
		source: SOURCE,
	}
}

/** Filing-discipline view: annual report recency and late-filing notices. */
export function assessCompliance(subs: Submissions, now = Date.now()): ComplianceData {
	const findings: string[] = []
	let score = 1

	const latestAnnual = latestFiling(subs, ANNUAL_FORMS)
	if (!latestAnnual) {
		findings.push('no annual report on file')
		score -= 0.5
	} else if (now - Date.parse(latestAnnual) > 457 * DAY_MS) {
		findings.push(`latest annual report filed ${latestAnnual}`)
		score -= 0.4
	}

	const { form, filingDate } = subs.filings.recent
	let lateNotices = 0
	for (let i = 0; i < form.length; i++) {
		if (form[i].startsWith('NT ') && now - Date.parse(filingDate[i]) <= 730 * DAY_MS) lateNotices++
	}
	if (lateNotices > 0) {
		findings.push(`${lateNotices} late filing notice(s) in the last two years`)
		score -= 0.2 * lateNotices
	}

	score = Math.max(0, Math.min(1, score))
	return {
		regulatoryStatus: score >= 0.8 ? 'compliant' : score >= 0.5 ? 'attention' : 'non_compliant',
		complianceScore: score,
		riskLevel: score >= 0.8 ? 'low' : score >= 0.5 ? 'medium' : 'high',
		findings,
		lastChecked: new Date(now).toISOString(),
		source: SOURCE,
	}
}

// --- Provider ---

/** Accepts a bare CIK or a gateway record id (`sec-edgar:<cik>`). */
function toCik(id: string): string {
	const raw = id.startsWith(`${SOURCE}:`) ? id.slice(SOURCE.length + 1) : id
	if (!/^\d{1,10}$/.test(raw)) throw new ProviderError(SOURCE, `"${id}" is not a CIK`, 400)
	return padCik(raw)
}

export function createSecEdgarProvider(options: SecEdgarOptions = {}): ManagedProvider {
	const costs: CostTable = { search: 0, details: 0, financial: 0, compliance: 0, ...options.costs }
	const meter = new UsageMeter(50_000, 1_500_000)
	const health = new HealthTracker()
	const http = createJsonClient(SOURCE, meter, health, () => ({
		'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
	}))

	let tickers: TickerEntry[] | null = null

	async function loadTickers(signal?: AbortSignal): Promise<TickerEntry[]> {
		if (tickers) return tickers
		const data = await http.get(TICKERS_URL, tickerFileSchema, { signal })
		tickers = Object.values(data).map((e) => ({
			cik: e.cik_str,
			ticker: e.ticker.toUpperCase(),
			name: e.title,
		}))
		return tickers
	}

	async function loadSubmissions(cik: string, signal?: AbortSignal): Promise<Submissions> {
		const data = await http.find(`${DATA_BASE}/submissions/CIK${cik}.json`, submissionsSchema, {
			signal,
		})
		if (!data) throw new ProviderError(SOURCE, `no registrant with CIK ${cik}`, 404)
		return data
	}

	async function loadFinancials(cik: string, signal?: AbortSignal) {
		const data = await http.find(
			`${DATA_BASE}/api/xbrl/companyfacts/CIK${cik}.json`,
			companyFactsSchema,
			{ signal },
		)
		return buildFinancials(data?.facts['us-gaap'])
	}

	function toRecord(subs: Submissions, confidence: number): BusinessRecord {
		const cik = padCik(subs.cik)
		const ein = subs.ein && !/^0+$/.test(subs.ein) ? subs.ein : undefined
		const filed = latestFiling(subs)
		return {
			id: `${SOURCE}:${cik}`,
			nativeId: cik,
			providerName: SOURCE,
			companyName: subs.name,
			legalName: subs.name,
			registrationNumber: cik,
			taxId: ein,
			address: toAddress(subs.addresses.business ?? subs.addresses.mailing),
			industryCodes: subs.sic
				? [{ system: 'SIC', code: subs.sic, description: subs.sicDescription ?? undefined }]
				: [],
			website: subs.website || undefined,
			dataQuality: provider.dataQuality,
			confidence,
			lastUpdated: filed ? new Date(filed).toISOString() : new Date().toISOString(),
		}
	}

	const provider: ManagedProvider = {
		name: SOURCE,
		type: 'registry',
		capabilities: ['search', 'details', 'financial', 'compliance'],
		dataQuality: 0.95,
		coverage: { US: 0.95 },
		rateLimit: { requestsPerMinute: 600, burst: 10 },

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
			const match = matchCompany(await loadTickers(signal), query)
			if (!match) {
				const wanted = query.companyName ?? query.registrationNumber ?? '(empty query)'
				throw new ProviderError(SOURCE, `no registrant matching "${wanted}"`, 404)
			}

			const cik = padCik(match.cik)
			const subs = await loadSubmissions(cik, signal)
			const record = toRecord(subs, match.confidence)

			const financial = query.includeFinancial ? await loadFinancials(cik, signal) : undefined
			return {
				...record,
				...(financial && { financial }),
				...(query.includeCompliance && { compliance: assessCompliance(subs) }),
			}
		},

		async getBusinessDetails(id: string, signal?: AbortSignal): Promise<BusinessRecord> {
			return toRecord(await loadSubmissions(toCik(id), signal), 1)
		},

		async getFinancialData(id: string, signal?: AbortSignal): Promise<FinancialData> {
			const financial = await loadFinancials(toCik(id), signal)
			if (!financial) throw new ProviderError(SOURCE, `no annual XBRL financials for CIK ${id}`, 404)
			return financial
		},

		async getComplianceData(id: string, signal?: AbortSignal): Promise<ComplianceData> {
			return assessCompliance(await loadSubmissions(toCik(id), signal))
		},

		async getNewsData(): Promise<NewsItem[]> {
			throw new UnsupportedOperationError(SOURCE, 'news')
		},

		validateData(record: BusinessRecord): ValidationResult {
			return validateRecord(record)
		},
	}

	return provider
}
