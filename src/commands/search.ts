import type { Command } from 'commander'
import type { BusinessSearchQuery, GlobalOptions } from '../types.js'
import { type CommandContext, callOptions } from './context.js'
import { renderRecord } from './render.js'

interface SearchFlags {
	country?: string
	state?: string
	city?: string
	reg?: string
	taxId?: string
	industry?: string
	financial?: boolean
	compliance?: boolean
	news?: boolean
}

export function buildQuery(name: string | undefined, flags: SearchFlags): BusinessSearchQuery {
	return {
		companyName: name,
		registrationNumber: flags.reg,
		taxId: flags.taxId,
		country: flags.country?.toUpperCase(),
		state: flags.state,
		city: flags.city,
		industry: flags.industry,
		includeFinancial: flags.financial,
		includeCompliance: flags.compliance,
		includeNews: flags.news,
	}
}

export function registerSearchCommand(program: Command, ctx: CommandContext): void {
	program
		.command('search [name]')
		.description('Find a business through the best-scoring source')
		.option('-c, --country <code>', 'ISO 3166 country code')
		.option('--state <state>', 'state or region')
		.option('--city <city>', 'city')
		.option('-r, --reg <number>', 'registration number (CIK, LEI, company number)')
		.option('--tax-id <id>', 'tax identifier')
		.option('--industry <code>', 'industry code')
		.option('-f, --financial', 'include financial data')
		.option('--compliance', 'include compliance data')
		.option('-n, --news', 'include news')
		.action(async (name: string | undefined, flags: SearchFlags) => {
			const opts = program.opts<GlobalOptions>()
			// An empty query goes to the best-scoring source, which decides what it needs
			const query = buildQuery(name, flags)
			const record = await ctx.gateway().searchBusiness(query, callOptions(program, ctx))
			console.log(renderRecord(record, opts.format))
			if (opts.format !== 'json') console.log(`\nSource: ${record.providerName}`)
		})
}
