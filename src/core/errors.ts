import type { Capability } from '../providers/types.js'
import type { ValidationIssue } from '../types.js'

export type GatewayErrorCode =
	| 'NO_PROVIDER_AVAILABLE'
	| 'RATE_LIMITED'
	| 'PROVIDER_CALL_FAILED'
	| 'QUALITY_BELOW_THRESHOLD'
	| 'PROVIDER_NOT_FOUND'

export class GatewayError extends Error {
	readonly code: GatewayErrorCode

	constructor(code: GatewayErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
		this.code = code
	}
}

export class NoProviderAvailableError extends GatewayError {
	constructor() {
		super('NO_PROVIDER_AVAILABLE', 'no suitable provider found for query')
	}
}

export class ProviderNotFoundError extends GatewayError {
	readonly provider: string

	constructor(provider: string) {
		super('PROVIDER_NOT_FOUND', `provider ${provider} not found`)
		this.provider = provider
	}
}

export class RateLimitedError extends GatewayError {
	readonly provider: string
	readonly scope: 'provider' | 'global'

	constructor(provider: string, scope: 'provider' | 'global' = 'provider') {
		super(
			'RATE_LIMITED',
			scope === 'global'
				? `global rate limit exceeded (provider ${provider} not called)`
				: `rate limit exceeded for provider ${provider}`,
		)
		this.provider = provider
		this.scope = scope
	}
}

export class ProviderCallFailedError extends GatewayError {
	readonly operation: Capability
	readonly attempted: string[]
	readonly primaryError: unknown

	constructor(operation: Capability, attempted: string[], primaryError: unknown, cause: unknown) {
		super(
			'PROVIDER_CALL_FAILED',
			`All providers failed for ${operation} (tried: ${attempted.join(', ')}): ${errorMessage(cause)}`,
			{ cause },
		)
		this.operation = operation
		this.attempted = attempted
		this.primaryError = primaryError
	}
}

export class QualityBelowThresholdError extends GatewayError {
	readonly provider: string
	readonly qualityScore: number
	readonly threshold: number
	readonly issues: ValidationIssue[]

	constructor(provider: string, qualityScore: number, threshold: number, issues: ValidationIssue[]) {
		super(
			'QUALITY_BELOW_THRESHOLD',
			`data quality ${qualityScore.toFixed(2)} from provider ${provider} is below threshold ${threshold.toFixed(2)}`,
		)
		this.provider = provider
		this.qualityScore = qualityScore
		this.threshold = threshold
		this.issues = issues
	}
}

/** Thrown by adapters; the message carries the source prefix. */
export class ProviderError extends Error {
	readonly source: string
	readonly status?: number

	constructor(source: string, message: string, status?: number) {
		super(`[${source}] ${message}`)
		this.name = 'ProviderError'
		this.source = source
		this.status = status
	}
}

export class UnsupportedOperationError extends ProviderError {
	constructor(source: string, operation: Capability) {
		super(source, `${operation} data not available`)
		this.name = 'UnsupportedOperationError'
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
