import type { Command } from 'commander'
import type { GlobalOptions } from '../types.js'
import { type CommandContext, callOptions, resolveSource } from './context.js'
import { renderRecord } from './render.js'

export function registerDetailsCommand(program: Command, ctx: CommandContext): void {
	program
		.command('details <id>')
		.description('Look up a business record by id at one source')
		.option('-s, --source <source>', 'data source (defaults to the id prefix or defaultProvider)')
		.action(async (id: string, cmdOpts: { source?: string }) => {
			const opts = program.opts<GlobalOptions>()
			const source = resolveSource(ctx, id, cmdOpts.source)
			const record = await ctx.gateway().getBusinessDetails(id, source, callOptions(program, ctx))
			console.log(renderRecord(record, opts.format))
		})
}
