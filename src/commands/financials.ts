import type { Command } from 'commander'
import type { GlobalOptions } from '../types.js'
import { type CommandContext, callOptions, resolveSource } from './context.js'
import { renderFinancial } from './render.js'

export function registerFinancialsCommand(program: Command, ctx: CommandContext): void {
	program
		.command('financials <id>')
		.description('Latest annual financials for a business')
		.option('-s, --source <source>', 'data source (defaults to the id prefix or defaultProvider)')
		.action(async (id: string, cmdOpts: { source?: string }) => {
			const opts = program.opts<GlobalOptions>()
			const source = resolveSource(ctx, id, cmdOpts.source)
			const data = await ctx.gateway().getFinancialData(id, source, callOptions(program, ctx))
			console.log(renderFinancial(data, opts.format))
		})
}
