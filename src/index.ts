export type {
	Address,
	BusinessRecord,
	BusinessSearchQuery,
	ComplianceData,
	FinancialData,
	GlobalOptions,
	IndustryCode,
	NewsItem,
	OutputFormat,
	QuotaSnapshot,
	SourceInfo,
	ValidationIssue,
	ValidationResult,
} from './types.js'

export type {
	BusinessDataProvider,
	Capability,
	CostTable,
	ManagedProvider,
	RateLimitConfig,
} from './providers/types.js'

export {
	BusinessDataGateway,
	type CachedValue,
	type CallOptions,
	type GatewayDeps,
} from './core/gateway.js'
export { ProviderRegistry, type ProviderDescriptor, type RegisteredProvider } from './core/registry.js'
export { selectBest, scoreProvider, SCORE_WEIGHTS, type ScoreBreakdown } from './core/selector.js'
export { RateLimiter } from './core/rate-limiter.js'
export { TtlCache, cacheKey } from './core/cache.js'
export { CostLedger, type CostEvent, type CostSink } from './core/cost-tracker.js'
export {
	GatewayError,
	NoProviderAvailableError,
	ProviderCallFailedError,
	ProviderError,
	ProviderNotFoundError,
	QualityBelowThresholdError,
	RateLimitedError,
	UnsupportedOperationError,
} from './core/errors.js'
export {
	loadConfig,
	parseConfig,
	saveConfig,
	getConfigPath,
	type GatewayConfig,
	type GatewayConfigInput,
} from './core/config.js'
export { validateRecord, DEFAULT_RULES, type ValidationRules } from './providers/validation.js'
export { createSecEdgarProvider } from './providers/sec-edgar.js'
export { createGleifProvider } from './providers/gleif.js'
export { createYahooProvider } from './providers/yahoo-finance.js'
export { createGateway, registerAllProviders } from './providers/registry.js'
export * as formatter from './core/formatter.js'
