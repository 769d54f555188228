import { formatCurrency, formatKeyValue, formatNumber, formatTable } from '../core/formatter.js'
import type {
	Address,
	BusinessRecord,
	ComplianceData,
	FinancialData,
	NewsItem,
	OutputFormat,
} from '../types.js'

export function formatAddress(address: Address | undefined): string | undefined {
	if (!address) return undefined
	const locality = [address.city, address.state, address.postalCode].filter(Boolean).join(' ')
	const parts = [address.street1, address.street2, locality, address.country].filter(Boolean)
	return parts.length > 0 ? parts.join(', ') : undefined
}

function money(n: number | undefined, currency: string): string | undefined {
	if (n == null) return undefined
	return Math.abs(n) >= 1e6 ? `${formatNumber(n)} ${currency}` : formatCurrency(n, currency)
}

export function renderRecord(record: BusinessRecord, format: OutputFormat): string {
	if (format === 'json') return JSON.stringify(record, null, 2)

	const sections = [
		formatKeyValue(
			{
				ID: record.id,
				Name: record.companyName,
				'Legal Name': record.legalName !== record.companyName ? record.legalName : undefined,
				'Registration #': record.registrationNumber,
				'Tax ID': record.taxId,
				Status: record.status,
				Address: formatAddress(record.address),
				Industry: record.industryCodes
					.map((c) => `${c.system} ${c.code}${c.description ? ` (${c.description})` : ''}`)
					.join('; ') || undefined,
				Website: record.website,
				Quality: record.dataQuality.toFixed(2),
				Confidence: record.confidence.toFixed(2),
				Updated: record.lastUpdated.slice(0, 10),
			},
			format,
		),
	]
	if (record.financial) sections.push(renderFinancial(record.financial, format))
	if (record.compliance) sections.push(renderCompliance(record.compliance, format))
	if (record.news && record.news.length > 0) sections.push(renderNews(record.news, format))
	return sections.join('\n\n')
}

export function renderFinancial(data: FinancialData, format: OutputFormat): string {
	if (format === 'json') return JSON.stringify(data, null, 2)
	return formatKeyValue(
		{
			'Fiscal Year': data.fiscalYear,
			'Period End': data.periodEnd,
			Revenue: money(data.revenue, data.currency),
			'Net Income': money(data.netIncome, data.currency),
			'Total Assets': money(data.totalAssets, data.currency),
			'Total Liabilities': money(data.totalLiabilities, data.currency),
			Equity: money(data.stockholdersEquity, data.currency),
			Employees: data.employees,
			Source: data.source,
		},
		format,
	)
}

export function renderCompliance(data: ComplianceData, format: OutputFormat): string {
	if (format === 'json') return JSON.stringify(data, null, 2)
	return formatKeyValue(
		{
			Status: data.regulatoryStatus,
			Score: data.complianceScore.toFixed(2),
			Risk: data.riskLevel,
			Findings: data.findings.length > 0 ? data.findings.join('; ') : 'none',
			Checked: data.lastChecked,
			Source: data.source,
		},
		format,
	)
}

export function renderNews(items: readonly NewsItem[], format: OutputFormat): string {
	return formatTable(
		['Date', 'Title', 'Source', 'URL'],
		items.map((n) => [n.publishedDate.slice(0, 10), n.title, n.source, n.url]),
		format,
	)
}
