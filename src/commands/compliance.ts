import type { Command } from 'commander'
import type { GlobalOptions } from '../types.js'
import { type CommandContext, callOptions, resolveSource } from './context.js'
import { renderCompliance } from './render.js'

export function registerComplianceCommand(program: Command, ctx: CommandContext): void {
	program
		.command('compliance <id>')
		.description('Regulatory standing of a business')
		.option('-s, --source <source>', 'data source (defaults to the id prefix or defaultProvider)')
		.action(async (id: string, cmdOpts: { source?: string }) => {
			const opts = program.opts<GlobalOptions>()
			const source = resolveSource(ctx, id, cmdOpts.source)
			const data = await ctx.gateway().getComplianceData(id, source, callOptions(program, ctx))
			console.log(renderCompliance(data, opts.format))
		})
}
