import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { z } from 'zod'

// Reads ./.env into process.env without overriding variables already set
function loadEnvFile(): void {
	const envPath = resolve(process.cwd(), '.env')
	if (!existsSync(envPath)) return
	let content: string
	try {
		content = readFileSync(envPath, 'utf-8')
	} catch {
		// Unreadable .env is treated as absent
		return
	}
	for (const line of content.split('\n')) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith('#')) continue
		const eqIdx = trimmed.indexOf('=')
		if (eqIdx === -1) continue
		const key = trimmed.slice(0, eqIdx).trim()
		let val = trimmed.slice(eqIdx + 1).trim()
		if (
			(val.startsWith('"') && val.endsWith('"')) ||
			(val.startsWith("'") && val.endsWith("'"))
		) {
			val = val.slice(1, -1)
		}
		// Don't override existing env vars
		if (process.env[key] === undefined) {
			process.env[key] = val
		}
	}
}

loadEnvFile()

const fraction = z.coerce.number().min(0).max(1)
const count = z.coerce.number().int().min(0)
const flag = z.preprocess(
	(v) => (typeof v === 'string' ? !['false', '0', 'no', 'off', ''].includes(v.toLowerCase()) : v),
	z.boolean(),
)

export const gatewayConfigSchema = z.object({
	defaultProvider: z.string().min(1).optional(),
	fallbackProvider: z.string().min(1).optional(),

	rateLimiting: flag.default(true),
	/** Requests per minute across all providers. */
	globalRateLimit: count.default(1000),
	/** Requests per minute for providers that declare no limit of their own. */
	providerRateLimit: count.default(100),
	providerBurst: count.default(10),

	cachingEnabled: flag.default(true),
	cacheTtlMs: count.default(3_600_000),
	cacheSize: count.default(10_000),

	costTracking: flag.default(true),
	costOptimization: flag.default(false),
	budgetLimit: z.coerce.number().min(0).default(1000),
	alertThreshold: fraction.default(0.9),

	dataValidation: flag.default(true),
	qualityThreshold: fraction.default(0.8),

	disabledSources: z.array(z.string()).default([]),
	/** Registered but held unhealthy, so selection skips them. */
	unhealthySources: z.array(z.string()).default([]),
	edgarUserAgent: z.string().min(1).optional(),
	defaultFormat: z.enum(['markdown', 'json', 'plain']).optional(),
})

export type GatewayConfig = z.infer<typeof gatewayConfigSchema>
export type GatewayConfigInput = z.input<typeof gatewayConfigSchema>

/** Keys accepted by `bdg config set`. */
export const CONFIG_KEYS = gatewayConfigSchema.keyof().options

const ENV_KEYS: Record<string, keyof GatewayConfig> = {
	BDG_DEFAULT_PROVIDER: 'defaultProvider',
	BDG_FALLBACK_PROVIDER: 'fallbackProvider',
	BDG_RATE_LIMITING: 'rateLimiting',
	BDG_GLOBAL_RATE_LIMIT: 'globalRateLimit',
	BDG_PROVIDER_RATE_LIMIT: 'providerRateLimit',
	BDG_PROVIDER_BURST: 'providerBurst',
	BDG_CACHING: 'cachingEnabled',
	BDG_CACHE_TTL_MS: 'cacheTtlMs',
	BDG_CACHE_SIZE: 'cacheSize',
	BDG_COST_TRACKING: 'costTracking',
	BDG_COST_OPTIMIZATION: 'costOptimization',
	BDG_BUDGET_LIMIT: 'budgetLimit',
	BDG_QUALITY_THRESHOLD: 'qualityThreshold',
	EDGAR_USER_AGENT: 'edgarUserAgent',
}

const CONFIG_DIR = join(homedir(), '.bdg')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export class ConfigError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ConfigError'
	}
}

/** Validates and fills defaults; throws a ConfigError naming each bad field. */
export function parseConfig(input: unknown): GatewayConfig {
	const parsed = gatewayConfigSchema.safeParse(input)
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ')
		throw new ConfigError(`Invalid configuration: ${details}`)
	}
	return parsed.data
}

function readConfigFile(): Record<string, unknown> {
	if (!existsSync(CONFIG_FILE)) return {}
	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(CONFIG_FILE, 'utf-8'))
	} catch (err) {
		throw new ConfigError(
			`Malformed config file ${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`,
		)
	}
	if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
		throw new ConfigError(`Config file ${CONFIG_FILE} must contain a JSON object`)
	}
	return Object.fromEntries(Object.entries(raw))
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
	const out: Record<string, string> = {}
	for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
		const value = env[envKey]
		if (value !== undefined && value !== '') out[configKey] = value
	}
	return out
}

let cached: GatewayConfig | null = null

export function loadConfig(): GatewayConfig {
	if (cached) return cached
	// Env vars override file
	cached = parseConfig({ ...readConfigFile(), ...readEnv(process.env) })
	return cached
}

export function saveConfig(update: Record<string, unknown>): void {
	const merged = { ...readConfigFile(), ...update }
	parseConfig(merged)

	if (!existsSync(CONFIG_DIR)) {
		mkdirSync(CONFIG_DIR, { recursive: true })
	}
	writeFileSync(CONFIG_FILE, JSON.stringify(merged, null, 2), { mode: 0o600 })
	cached = null
}

export function getConfigPath(): string {
	return CONFIG_FILE
}
