import type { Command } from 'commander'
import type { GlobalOptions } from '../types.js'
import { type CommandContext, callOptions, resolveSource } from './context.js'
import { renderNews } from './render.js'

export function registerNewsCommand(program: Command, ctx: CommandContext): void {
	program
		.command('news <id>')
		.description('Recent news mentioning a business')
		.option('-s, --source <source>', 'data source (defaults to the id prefix or defaultProvider)')
		.option('-l, --limit <n>', 'number of items', '10')
		.action(async (id: string, cmdOpts: { source?: string; limit: string }) => {
			const opts = program.opts<GlobalOptions>()
			const source = resolveSource(ctx, id, cmdOpts.source)
			const items = await ctx.gateway().getNewsData(id, source, callOptions(program, ctx))
			const limit = Number.parseInt(cmdOpts.limit, 10)
			console.log(renderNews(items.slice(0, limit > 0 ? limit : items.length), opts.format))
		})
}
