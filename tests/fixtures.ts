import { vi } from 'vitest'
import { type GatewayConfig, parseConfig } from '../src/core/config.js'
import type { BusinessDataProvider } from '../src/providers/types.js'
import { validateRecord } from '../src/providers/validation.js'
import type {
	BusinessRecord,
	ComplianceData,
	FinancialData,
	NewsItem,
	QuotaSnapshot,
} from '../src/types.js'

export function makeRecord(provider: string, overrides: Partial<BusinessRecord> = {}): BusinessRecord {
	return {
		id: `${provider}:acme-1`,
		nativeId: 'acme-1',
		providerName: provider,
		companyName: 'Acme Corp',
		registrationNumber: 'R-1001',
		address: { street1: '1 Main St', city: 'Springfield', country: 'US' },
		industryCodes: [],
		dataQuality: 0.9,
		confidence: 1,
		lastUpdated: new Date().toISOString(),
		...overrides,
	}
}

const QUOTA: QuotaSnapshot = {
	dailyUsed: 0,
	dailyLimit: 100,
	monthlyUsed: 0,
	monthlyLimit: 1000,
	resetTime: '2024-01-02T00:00:00.000Z',
	remaining: 100,
}

/** In-process provider with vi.fn operations; every capability by default. */
export function fakeProvider(
	name: string,
	overrides: Partial<BusinessDataProvider> = {},
): BusinessDataProvider {
	return {
		name,
		type: 'test',
		capabilities: ['search', 'details', 'financial', 'compliance', 'news'],
		dataQuality: 0.9,
		coverage: {},
		isHealthy: () => true,
		costPerOperation: () => 0,
		quota: () => QUOTA,
		searchBusiness: vi.fn(async (): Promise<BusinessRecord> => makeRecord(name)),
		getBusinessDetails: vi.fn(
			async (id: string): Promise<BusinessRecord> =>
				makeRecord(name, { id: `${name}:${id}`, nativeId: id }),
		),
		getFinancialData: vi.fn(
			async (): Promise<FinancialData> => ({
				fiscalYear: 2023,
				currency: 'USD',
				revenue: 1_000_000,
				source: name,
			}),
		),
		getComplianceData: vi.fn(
			async (): Promise<ComplianceData> => ({
				regulatoryStatus: 'compliant',
				complianceScore: 1,
				riskLevel: 'low',
				findings: [],
				lastChecked: '2024-01-01T00:00:00.000Z',
				source: name,
			}),
		),
		getNewsData: vi.fn(
			async (): Promise<NewsItem[]> => [
				{ title: 'Acme opens new plant', source: name, publishedDate: '2024-01-01T00:00:00.000Z' },
			],
		),
		validateData: (record) => validateRecord(record),
		...overrides,
	}
}

export function testConfig(overrides: Record<string, unknown> = {}): GatewayConfig {
	return parseConfig(overrides)
}
