import { z } from 'zod'
import { ProviderError, UnsupportedOperationError } from '../core/errors.js'
import type {
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

const SOURCE = 'gleif'
const BASE_URL = 'https://api.gleif.org/api/v1'
const LEI_PATTERN = /^[A-Z0-9]{18}[0-9]{2}$/

export interface GleifOptions {
	costs?: CostTable
}

// --- Wire shapes (JSON:API) ---

const gleifAddressSchema = z.object({
	addressLines: z.array(z.string()).default([]),
	city: z.string().nullish(),
	region: z.string().nullish(),
	country: z.string().nullish(),
	postalCode: z.string().nullish(),
})

const leiRecordSchema = z.object({
	id: z.string(),
	attributes: z.object({
		lei: z.string(),
		entity: z.object({
			legalName: z.object({ name: z.string() }),
			legalAddress: gleifAddressSchema,
			registeredAs: z.string().nullish(),
			jurisdiction: z.string().nullish(),
			status: z.string().nullish(),
		}),
		registration: z.object({
			lastUpdateDate: z.string().nullish(),
			status: z.string(),
			nextRenewalDate: z.string().nullish(),
		}),
	}),
})

export type LeiRecord = z.infer<typeof leiRecordSchema>

const listSchema = z.object({ data: z.array(leiRecordSchema) })
const singleSchema = z.object({ data: leiRecordSchema })

// --- Mapping ---

export function isLei(value: string): boolean {
	return LEI_PATTERN.test(value)
}

/** Accepts a bare LEI or a gateway record id (`gleif:<lei>`). */
function toLei(id: string): string {
	const raw = (id.startsWith(`${SOURCE}:`) ? id.slice(SOURCE.length + 1) : id).toUpperCase()
	if (!isLei(raw)) throw new ProviderError(SOURCE, `"${id}" is not an LEI`, 400)
	return raw
}

/**
 * Registration standing as recorded by the LEI system. An entity whose LEI
 * lapsed has stopped renewing its reference data.
 */
export function assessRegistration(record: LeiRecord, now = Date.now()): ComplianceData {
	const { entity, registration } = record.attributes
	const findings: string[] = []
	const lastChecked = new Date(now).toISOString()
	const base = { findings, lastChecked, source: SOURCE }

	if (entity.status && entity.status !== 'ACTIVE') {
		findings.push(`entity status ${entity.status}`)
		return { ...base, regulatoryStatus: 'non_compliant', complianceScore: 0.2, riskLevel: 'high' }
	}

	switch (registration.status) {
		case 'ISSUED': {
			const renewal = registration.nextRenewalDate
			if (renewal && Date.parse(renewal) < now) {
				findings.push(`renewal overdue since ${renewal.slice(0, 10)}`)
				return {
					...base,
					regulatoryStatus: 'attention',
					complianceScore: 0.7,
					riskLevel: 'medium',
				}
			}
			return { ...base, regulatoryStatus: 'compliant', complianceScore: 1, riskLevel: 'low' }
		}
		case 'LAPSED':
			findings.push('LEI registration lapsed')
			return { ...base, regulatoryStatus: 'attention', complianceScore: 0.6, riskLevel: 'medium' }
		case 'RETIRED':
		case 'ANNULLED':
		case 'DUPLICATE':
		case 'MERGED':
			findings.push(`LEI registration ${registration.status.toLowerCase()}`)
			return {
				...base,
				regulatoryStatus: 'non_compliant',
				complianceScore: 0.2,
				riskLevel: 'high',
			}
		default:
			findings.push(`registration status ${registration.status}`)
			return { ...base, regulatoryStatus: 'unknown', complianceScore: 0.5, riskLevel: 'medium' }
	}
}

// --- Provider ---

export function createGleifProvider(options: GleifOptions = {}): ManagedProvider {
	const costs: CostTable = { search: 0, details: 0, compliance: 0, ...options.costs }
	// GLEIF publishes no quota; the meter only counts
	const meter = new UsageMeter(86_400, 2_678_400)
	const health = new HealthTracker()
	const http = createJsonClient(SOURCE, meter, health, () => ({
		Accept: 'application/vnd.api+json',
	}))

	async function fetchRecord(lei: string, signal?: AbortSignal): Promise<LeiRecord> {
		const data = await http.find(`${BASE_URL}/lei-records/${lei}`, singleSchema, { signal })
		if (!data) throw new ProviderError(SOURCE, `no LEI record ${lei}`, 404)
		return data.data
	}

	async function findByName(
		query: BusinessSearchQuery,
		signal?: AbortSignal,
	): Promise<LeiRecord | undefined> {
		const params = new URLSearchParams({ 'page[size]': '1' })
		if (query.companyName) params.set('filter[entity.legalName]', query.companyName.trim())
		if (query.registrationNumber) {
			params.set('filter[entity.registeredAs]', query.registrationNumber.trim())
		}
		if (query.country) params.set('filter[entity.legalAddress.country]', query.country)
		const { data } = await http.get(`${BASE_URL}/lei-records?${params}`, listSchema, { signal })
		return data[0]
	}

	function toRecord(record: LeiRecord, confidence: number): BusinessRecord {
		const { lei, entity, registration } = record.attributes
		const address = entity.legalAddress
		return {
			id: `${SOURCE}:${lei}`,
			nativeId: lei,
			providerName: SOURCE,
			companyName: entity.legalName.name,
			legalName: entity.legalName.name,
			registrationNumber: entity.registeredAs ?? lei,
			status: entity.status ?? undefined,
			address: {
				street1: address.addressLines[0],
				street2: address.addressLines[1],
				city: address.city ?? undefined,
				state: address.region ?? undefined,
				postalCode: address.postalCode ?? undefined,
				country: address.country ?? undefined,
			},
			industryCodes: [],
			dataQuality: provider.dataQuality,
			confidence,
			lastUpdated: registration.lastUpdateDate
				? new Date(registration.lastUpdateDate).toISOString()
				: new Date().toISOString(),
		}
	}

	const provider: ManagedProvider = {
		name: SOURCE,
		type: 'registry',
		capabilities: ['search', 'details', 'compliance'],
		dataQuality: 0.9,
		coverage: {
			GB: 0.9,
			DE: 0.9,
			FR: 0.9,
			NL: 0.9,
			IT: 0.85,
			ES: 0.85,
			IE: 0.85,
			LU: 0.85,
			US: 0.7,
			CA: 0.6,
			JP: 0.5,
		},
		rateLimit: { requestsPerMinute: 60, burst: 10 },

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
			const reg = query.registrationNumber?.trim().toUpperCase()
			if (reg && isLei(reg)) {
				const record = await fetchRecord(reg, signal)
				return withCompliance(toRecord(record, 1), record, query)
			}

			if (!query.companyName && !query.registrationNumber) {
				throw new ProviderError(SOURCE, 'a company name or registration number is required', 400)
			}

			const found = await findByName(query, signal)
			if (!found) {
				const wanted = query.companyName ?? query.registrationNumber
				throw new ProviderError(SOURCE, `no LEI record matching "${wanted}"`, 404)
			}
			const exact =
				query.companyName?.trim().toUpperCase() ===
				found.attributes.entity.legalName.name.toUpperCase()
			return withCompliance(toRecord(found, exact ? 0.95 : 0.8), found, query)
		},

		async getBusinessDetails(id: string, signal?: AbortSignal): Promise<BusinessRecord> {
			return toRecord(await fetchRecord(toLei(id), signal), 1)
		},

		async getFinancialData(): Promise<FinancialData> {
			throw new UnsupportedOperationError(SOURCE, 'financial')
		},

		async getComplianceData(id: string, signal?: AbortSignal): Promise<ComplianceData> {
			return assessRegistration(await fetchRecord(toLei(id), signal))
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

function withCompliance(
	record: BusinessRecord,
	raw: LeiRecord,
	query: BusinessSearchQuery,
): BusinessRecord {
	return query.includeCompliance ? { ...record, compliance: assessRegistration(raw) } : record
}
