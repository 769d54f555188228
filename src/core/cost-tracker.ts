import type { Capability } from '../providers/types.js'
import type { Logger } from './logger.js'

export interface CostEvent {
	provider: string
	operation: Capability
	cost: number
}

/** Observability hook the gateway reports every paid call to. */
export interface CostSink {
	record(event: CostEvent): void
}

export interface CostLedgerOptions {
	budgetLimit: number
	/** Fraction of the budget at which a warning is logged. */
	alertThreshold: number
	logger?: Logger
}

/**
 * In-memory spend tally. Crossing the alert level or the budget logs a warning
 * once; nothing here refuses a call.
 */
export class CostLedger implements CostSink {
	private readonly totals = new Map<string, Map<Capability, number>>()
	private spent = 0
	private alerted = false
	private exceeded = false

	constructor(private readonly options: CostLedgerOptions) {}

	record(event: CostEvent): void {
		if (!(event.cost > 0)) return

		let ops = this.totals.get(event.provider)
		if (!ops) {
			ops = new Map()
			this.totals.set(event.provider, ops)
		}
		ops.set(event.operation, (ops.get(event.operation) ?? 0) + event.cost)
		this.spent += event.cost

		const { budgetLimit, alertThreshold, logger } = this.options
		if (budgetLimit <= 0) return
		if (!this.alerted && this.spent >= budgetLimit * alertThreshold) {
			this.alerted = true
			logger?.warn(
				{ spent: this.spent, budgetLimit },
				`spend reached ${Math.round((this.spent / budgetLimit) * 100)}% of budget`,
			)
		}
		if (!this.exceeded && this.spent > budgetLimit) {
			this.exceeded = true
			logger?.warn({ spent: this.spent, budgetLimit }, 'budget exceeded')
		}
	}

	total(): number {
		return this.spent
	}

	forProvider(provider: string): number {
		let sum = 0
		for (const cost of this.totals.get(provider)?.values() ?? []) sum += cost
		return sum
	}

	byProvider(): Record<string, Partial<Record<Capability, number>>> {
		const out: Record<string, Partial<Record<Capability, number>>> = {}
		for (const [provider, ops] of this.totals) {
			out[provider] = Object.fromEntries(ops)
		}
		return out
	}

	reset(): void {
		this.totals.clear()
		this.spent = 0
		this.alerted = false
		this.exceeded = false
	}
}
