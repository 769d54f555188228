import type { BusinessRecord, ValidationIssue, ValidationResult } from '../types.js'

const DAY_MS = 86_400_000

export interface ValidationRules {
	/** Records older than this are flagged stale. */
	staleAfterDays: number
	/** Market-data sources identify companies by ticker and carry no registry id. */
	requireIdentifier: boolean
}

export const DEFAULT_RULES: ValidationRules = { staleAfterDays: 365, requireIdentifier: true }

const PENALTIES = {
	company_name: 0.5,
	address: 0.2,
	identifier: 0.15,
	stale: 0.15,
	country: 0.1,
} as const

/**
 * Shared record checks for adapters. The quality score starts from the
 * record's own data quality and loses a fixed share per issue.
 */
export function validateRecord(
	record: BusinessRecord,
	rules: ValidationRules = DEFAULT_RULES,
): ValidationResult {
	const issues: ValidationIssue[] = []
	let penalty = 0

	if (!record.companyName.trim()) {
		issues.push({ field: 'company_name', type: 'missing', message: 'company name is required' })
		penalty += PENALTIES.company_name
	}

	const address = record.address
	if (!address || (!address.street1 && !address.city && !address.country)) {
		issues.push({ field: 'address', type: 'missing', message: 'no address on record' })
		penalty += PENALTIES.address
	} else if (address.country && !/^[A-Z]{2}$/.test(address.country)) {
		issues.push({
			field: 'address.country',
			type: 'invalid',
			message: `country "${address.country}" is not an ISO 3166 alpha-2 code`,
		})
		penalty += PENALTIES.country
	}

	if (rules.requireIdentifier && !record.registrationNumber && !record.taxId) {
		issues.push({
			field: 'registration_number',
			type: 'missing',
			message: 'neither a registration number nor a tax id is present',
		})
		penalty += PENALTIES.identifier
	}

	const updated = Date.parse(record.lastUpdated)
	if (Number.isNaN(updated)) {
		issues.push({ field: 'last_updated', type: 'invalid', message: 'unparseable timestamp' })
		penalty += PENALTIES.stale
	} else if (Date.now() - updated > rules.staleAfterDays * DAY_MS) {
		issues.push({
			field: 'last_updated',
			type: 'stale',
			message: `older than ${rules.staleAfterDays} days`,
		})
		penalty += PENALTIES.stale
	}

	const qualityScore = Math.max(0, Math.min(1, record.dataQuality * (1 - penalty)))
	const isValid = !issues.some((i) => i.field === 'company_name' || i.type === 'invalid')

	return { isValid, qualityScore, issues }
}
