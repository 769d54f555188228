import type { Command } from 'commander'
import { CostLedger } from '../core/cost-tracker.js'
import type { BusinessDataGateway } from '../core/gateway.js'
import { formatTable } from '../core/formatter.js'
import type { GlobalOptions, SourceInfo } from '../types.js'
import type { CommandContext } from './context.js'
import { buildQuery } from './search.js'

export function describeSources(gateway: BusinessDataGateway): SourceInfo[] {
	const ledger = gateway.costSink instanceof CostLedger ? gateway.costSink : undefined
	return gateway.getProviders().map(({ provider, descriptor, limiter }) => ({
		name: descriptor.name,
		type: descriptor.type,
		healthy: provider.isHealthy(),
		capabilities: [...descriptor.capabilities],
		quality: descriptor.dataQuality,
		rateLimit: `${descriptor.rateLimit.requestsPerMinute}/min (burst ${descriptor.rateLimit.burst})`,
		remaining: limiter.remaining(),
		spent: ledger?.forProvider(descriptor.name) ?? 0,
	}))
}

interface RankFlags {
	country?: string
	financial?: boolean
	compliance?: boolean
	news?: boolean
}

export function registerSourcesCommand(program: Command, ctx: CommandContext): void {
	program
		.command('sources')
		.description('List data sources, capabilities, and status')
		.action(() => {
			const opts = program.opts<GlobalOptions>()
			const rows = describeSources(ctx.gateway()).map((s) => [
				s.name,
				s.type,
				s.healthy ? 'healthy' : 'down',
				s.capabilities.join(', '),
				s.quality.toFixed(2),
				s.rateLimit,
				s.remaining,
				s.spent.toFixed(2),
			])
			console.log(
				formatTable(
					['Source', 'Type', 'Health', 'Capabilities', 'Quality', 'Rate Limit', 'Remaining', 'Spent'],
					rows,
					opts.format,
				),
			)
		})

	program
		.command('rank')
		.description('Show how each healthy source scores for a search')
		.option('-c, --country <code>', 'ISO 3166 country code')
		.option('-f, --financial', 'request financial data')
		.option('--compliance', 'request compliance data')
		.option('-n, --news', 'request news')
		.action((flags: RankFlags) => {
			const opts = program.opts<GlobalOptions>()
			const ranked = ctx.gateway().rankProviders(buildQuery(undefined, flags))
			const rows = ranked.map(({ name, score }) => [
				name,
				score.quality.toFixed(3),
				score.coverage.toFixed(3),
				score.cost.toFixed(3),
				score.features.toFixed(3),
				score.total.toFixed(3),
			])
			console.log(
				formatTable(['Source', 'Quality', 'Coverage', 'Cost', 'Features', 'Total'], rows, opts.format),
			)
		})
}
