export type OutputFormat = 'markdown' | 'json' | 'plain'

export interface GlobalOptions {
	format: OutputFormat
	verbose: boolean
	cache: boolean
}

export type SortField = 'relevance' | 'name' | 'quality' | 'updated'

export interface BusinessSearchQuery {
	companyName?: string
	registrationNumber?: string
	taxId?: string
	country?: string
	state?: string
	city?: string
	industry?: string
	includeFinancial?: boolean
	includeCompliance?: boolean
	includeNews?: boolean
	maxResults?: number
	sortBy?: SortField
}

export interface Address {
	readonly street1?: string
	readonly street2?: string
	readonly city?: string
	readonly state?: string
	readonly postalCode?: string
	readonly country?: string
}

export interface IndustryCode {
	readonly system: 'SIC' | 'NAICS' | 'NACE' | 'OTHER'
	readonly code: string
	readonly description?: string
}

export interface FinancialData {
	readonly fiscalYear: number
	readonly periodEnd?: string
	readonly currency: string
	readonly revenue?: number
	readonly netIncome?: number
	readonly totalAssets?: number
	readonly totalLiabilities?: number
	readonly stockholdersEquity?: number
	readonly employees?: number
	readonly source: string
}

export type RiskLevel = 'low' | 'medium' | 'high'

export interface ComplianceData {
	readonly regulatoryStatus: 'compliant' | 'attention' | 'non_compliant' | 'unknown'
	readonly complianceScore: number
	readonly riskLevel: RiskLevel
	readonly findings: readonly string[]
	readonly lastChecked: string
	readonly source: string
}

export interface NewsItem {
	readonly title: string
	readonly url?: string
	readonly source: string
	readonly publishedDate: string
	readonly relatedIds?: readonly string[]
}

export interface BusinessRecord {
	/** `<provider>:<native id>` */
	readonly id: string
	readonly nativeId: string
	readonly providerName: string
	readonly companyName: string
	readonly legalName?: string
	readonly registrationNumber?: string
	readonly taxId?: string
	readonly status?: string
	readonly address?: Address
	readonly industryCodes: readonly IndustryCode[]
	readonly website?: string
	readonly financial?: FinancialData
	readonly compliance?: ComplianceData
	readonly news?: readonly NewsItem[]
	readonly dataQuality: number
	readonly confidence: number
	readonly lastUpdated: string
}

export type IssueType = 'missing' | 'invalid' | 'stale'

export interface ValidationIssue {
	field: string
	type: IssueType
	message: string
}

export interface ValidationResult {
	isValid: boolean
	qualityScore: number
	issues: ValidationIssue[]
}

export interface QuotaSnapshot {
	dailyUsed: number
	dailyLimit: number
	monthlyUsed: number
	monthlyLimit: number
	resetTime: string
	remaining: number
}

export interface SourceInfo {
	name: string
	type: string
	healthy: boolean
	capabilities: string[]
	quality: number
	rateLimit: string
	remaining: number
	spent: number
}
