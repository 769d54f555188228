import type { BusinessSearchQuery } from '../types.js'
import type { ProviderRegistry, RegisteredProvider } from './registry.js'

export const SCORE_WEIGHTS = {
	quality: 0.3,
	coverage: 0.2,
	cost: 0.2,
	features: 0.3,
} as const

/** Cost per search at which the cost term reaches zero. */
const COST_CEILING = 10

export interface SelectionOptions {
	costOptimization: boolean
}

export interface ScoreBreakdown {
	quality: number
	coverage: number
	cost: number
	features: number
	total: number
}

function clamp01(n: number): number {
	if (!Number.isFinite(n)) return 0
	return Math.min(1, Math.max(0, n))
}

// Own keys only: a country such as "constructor" must not read Object.prototype
function countryCoverage(coverage: Readonly<Record<string, number>>, country?: string): number {
	if (!country || !Object.hasOwn(coverage, country)) return 0
	return coverage[country] ?? 0
}

export function scoreProvider(
	entry: RegisteredProvider,
	query: BusinessSearchQuery,
	options: SelectionOptions,
): ScoreBreakdown {
	const { descriptor, provider } = entry

	const quality = clamp01(descriptor.dataQuality) * SCORE_WEIGHTS.quality

	const covered = countryCoverage(descriptor.coverage, query.country)
	const coverage = clamp01(covered) * SCORE_WEIGHTS.coverage

	const cost = options.costOptimization
		? clamp01(1 - provider.costPerOperation('search') / COST_CEILING) * SCORE_WEIGHTS.cost
		: 0

	const requested = [
		query.includeFinancial && 'financial',
		query.includeCompliance && 'compliance',
		query.includeNews && 'news',
	].filter((f): f is 'financial' | 'compliance' | 'news' => typeof f === 'string')
	const supported = requested.filter((f) => descriptor.capabilities.has(f)).length
	const features =
		requested.length > 0 ? (supported / requested.length) * SCORE_WEIGHTS.features : 0

	return { quality, coverage, cost, features, total: quality + coverage + cost + features }
}

/**
 * Highest-scoring healthy provider that can search. Exact ties keep the
 * earlier-registered provider.
 */
export function selectBest(
	registry: ProviderRegistry,
	query: BusinessSearchQuery,
	options: SelectionOptions,
): RegisteredProvider | undefined {
	let best: RegisteredProvider | undefined
	let bestScore = Number.NEGATIVE_INFINITY

	for (const entry of registry.healthy()) {
		if (!entry.descriptor.capabilities.has('search')) continue
		const { total } = scoreProvider(entry, query, options)
		if (total > bestScore) {
			best = entry
			bestScore = total
		}
	}

	return best
}
