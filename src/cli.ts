#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { registerComplianceCommand } from './commands/compliance.js'
import { registerConfigCommand } from './commands/config.js'
import type { CommandContext } from './commands/context.js'
import { registerDetailsCommand } from './commands/details.js'
import { registerFinancialsCommand } from './commands/financials.js'
import { registerNewsCommand } from './commands/news.js'
import { registerSearchCommand } from './commands/search.js'
import { registerSourcesCommand } from './commands/sources.js'
import { type GatewayConfig, loadConfig } from './core/config.js'
import { errorMessage } from './core/errors.js'
import type { BusinessDataGateway } from './core/gateway.js'
import { logger } from './core/logger.js'
import { createGateway } from './providers/registry.js'
import type { OutputFormat } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'))
const version =
	pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string'
		? pkg.version
		: '0.0.0'

const controller = new AbortController()
process.once('SIGINT', () => controller.abort())

let gateway: BusinessDataGateway | undefined
const ctx: CommandContext = {
	config: (): GatewayConfig => loadConfig(),
	gateway: () => {
		gateway ??= createGateway(loadConfig(), { logger })
		return gateway
	},
	signal: controller.signal,
}

const program = new Command()

program
	.name('bdg')
	.description('Business data gateway: one query interface over registry and market sources')
	.version(version)
	.option('--json', 'output as JSON')
	.option('--plain', 'output as tab-separated values')
	.option('-v, --verbose', 'log gateway decisions to stderr')
	.option('--no-cache', 'bypass cache')
	.hook('preAction', () => {
		const rawOpts = program.opts<{ json?: boolean; plain?: boolean; verbose?: boolean }>()
		let format: OutputFormat = ctx.config().defaultFormat ?? 'markdown'
		if (rawOpts.json) format = 'json'
		else if (rawOpts.plain) format = 'plain'
		program.setOptionValue('format', format)
		if (rawOpts.verbose) logger.level = 'debug'
	})

registerSearchCommand(program, ctx)
registerDetailsCommand(program, ctx)
registerFinancialsCommand(program, ctx)
registerComplianceCommand(program, ctx)
registerNewsCommand(program, ctx)
registerSourcesCommand(program, ctx)
registerConfigCommand(program)

program.parseAsync(process.argv).catch((err: unknown) => {
	console.error(`Error: ${errorMessage(err)}`)
	process.exit(1)
})
