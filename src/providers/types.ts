import type {
	BusinessRecord,
	BusinessSearchQuery,
	ComplianceData,
	FinancialData,
	NewsItem,
	QuotaSnapshot,
	ValidationResult,
} from '../types.js'

export type Capability = 'search' | 'details' | 'financial' | 'compliance' | 'news'

export const CAPABILITIES: readonly Capability[] = [
	'search',
	'details',
	'financial',
	'compliance',
	'news',
]

export interface RateLimitConfig {
	requestsPerMinute: number
	burst: number
}

export type CostTable = Partial<Record<Capability, number>>

/**
 * Contract every data source adapter satisfies. The gateway depends only on
 * this interface; wire formats and credentials stay inside the adapter.
 */
export interface BusinessDataProvider {
	readonly name: string
	readonly type: string
	readonly capabilities: readonly Capability[]
	/** Base quality score in [0, 1]. */
	readonly dataQuality: number
	/** Country code to coverage confidence in [0, 1]. */
	readonly coverage: Readonly<Record<string, number>>
	/** Falls back to the gateway's per-provider default when absent. */
	readonly rateLimit?: RateLimitConfig
	isHealthy(): boolean
	costPerOperation(kind: Capability): number
	quota(): QuotaSnapshot
	searchBusiness(query: BusinessSearchQuery, signal?: AbortSignal): Promise<BusinessRecord>
	getBusinessDetails(id: string, signal?: AbortSignal): Promise<BusinessRecord>
	getFinancialData(id: string, signal?: AbortSignal): Promise<FinancialData>
	getComplianceData(id: string, signal?: AbortSignal): Promise<ComplianceData>
	getNewsData(id: string, signal?: AbortSignal): Promise<NewsItem[]>
	validateData(record: BusinessRecord): ValidationResult
}

/** Adapters shipped with the gateway also let operators pin their health flag. */
export interface ManagedProvider extends BusinessDataProvider {
	setHealthy(healthy: boolean | undefined): void
}
