import type { z } from 'zod'
import { ProviderError } from '../core/errors.js'
import type { QuotaSnapshot } from '../types.js'

const COOLDOWN_MS = 60_000
const FAILURE_LIMIT = 3

/** Call counters behind `quota()`. Advisory; nothing here refuses a call. */
export class UsageMeter {
	private dailyUsed = 0
	private monthlyUsed = 0
	private day = ''
	private month = ''

	constructor(
		readonly dailyLimit: number,
		readonly monthlyLimit: number,
	) {}

	private roll(now: Date): void {
		const day = now.toISOString().slice(0, 10)
		const month = day.slice(0, 7)
		if (day !== this.day) {
			this.day = day
			this.dailyUsed = 0
		}
		if (month !== this.month) {
			this.month = month
			this.monthlyUsed = 0
		}
	}

	record(): void {
		this.roll(new Date())
		this.dailyUsed++
		this.monthlyUsed++
	}

	snapshot(): QuotaSnapshot {
		const now = new Date()
		this.roll(now)
		const reset = new Date(
			Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1),
		)
		return {
			dailyUsed: this.dailyUsed,
			dailyLimit: this.dailyLimit,
			monthlyUsed: this.monthlyUsed,
			monthlyLimit: this.monthlyLimit,
			resetTime: reset.toISOString(),
			remaining: Math.max(0, this.dailyLimit - this.dailyUsed),
		}
	}
}

/**
 * Marks a source unhealthy after consecutive failures; it becomes eligible
 * again once the cooldown passes. `override` pins the flag either way.
 */
export class HealthTracker {
	private failures = 0
	private downSince: number | undefined
	private override: boolean | undefined

	isHealthy(): boolean {
		if (this.override !== undefined) return this.override
		if (this.downSince === undefined) return true
		if (Date.now() - this.downSince >= COOLDOWN_MS) {
			this.downSince = undefined
			this.failures = 0
			return true
		}
		return false
	}

	setHealthy(healthy: boolean | undefined): void {
		this.override = healthy
	}

	success(): void {
		this.failures = 0
		this.downSince = undefined
	}

	failure(): void {
		this.failures++
		if (this.failures >= FAILURE_LIMIT && this.downSince === undefined) {
			this.downSince = Date.now()
		}
	}
}

export interface RequestOptions {
	headers?: Record<string, string>
	signal?: AbortSignal
}

export interface JsonClient {
	/** GET and validate; any non-2xx status is an error. */
	get<S extends z.ZodTypeAny>(url: string, schema: S, options?: RequestOptions): Promise<z.output<S>>
	/** Like `get`, but a 404 resolves to `undefined`. */
	find<S extends z.ZodTypeAny>(
		url: string,
		schema: S,
		options?: RequestOptions,
	): Promise<z.output<S> | undefined>
}

/**
 * JSON GET helper shared by the HTTP adapters: counts usage, feeds the health
 * tracker, and validates the body against a schema.
 */
export function createJsonClient(
	source: string,
	meter: UsageMeter,
	health: HealthTracker,
	defaultHeaders: () => Record<string, string> = () => ({}),
): JsonClient {
	async function request(url: string, options: RequestOptions): Promise<Response> {
		meter.record()
		try {
			return await fetch(url, {
				headers: { Accept: 'application/json', ...defaultHeaders(), ...options.headers },
				signal: options.signal,
			})
		} catch (err) {
			if (!options.signal?.aborted) health.failure()
			throw err
		}
	}

	async function parse<S extends z.ZodTypeAny>(res: Response, schema: S): Promise<z.output<S>> {
		if (!res.ok) {
			// 4xx other than throttling means the request was wrong, not the source
			if (res.status >= 500 || res.status === 429) health.failure()
			const body = await res.text()
			throw new ProviderError(source, `API error ${res.status}: ${body.slice(0, 200)}`, res.status)
		}

		let body: unknown
		try {
			body = await res.json()
		} catch {
			health.failure()
			throw new ProviderError(source, 'response body is not valid JSON', res.status)
		}

		const parsed = schema.safeParse(body)
		if (!parsed.success) {
			health.failure()
			const issue = parsed.error.issues[0]
			throw new ProviderError(
				source,
				`unexpected response shape at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
			)
		}
		health.success()
		return parsed.data
	}

	return {
		async get<S extends z.ZodTypeAny>(url: string, schema: S, options: RequestOptions = {}) {
			return parse(await request(url, options), schema)
		},
		async find<S extends z.ZodTypeAny>(url: string, schema: S, options: RequestOptions = {}) {
			const res = await request(url, options)
			if (res.status === 404) {
				health.success()
				return undefined
			}
			return parse(res, schema)
		},
	}
}
