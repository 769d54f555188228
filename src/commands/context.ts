import type { Command } from 'commander'
import type { GatewayConfig } from '../core/config.js'
import type { CallOptions, BusinessDataGateway } from '../core/gateway.js'
import type { GlobalOptions } from '../types.js'

/** What every command needs from the CLI shell. Built lazily on first use. */
export interface CommandContext {
	config(): GatewayConfig
	gateway(): BusinessDataGateway
	/** Aborted on SIGINT. */
	signal: AbortSignal
}

export function callOptions(program: Command, ctx: CommandContext): CallOptions {
	const opts = program.opts<GlobalOptions>()
	return { signal: ctx.signal, noCache: !opts.cache }
}

/**
 * Source for a direct lookup: an explicit `-s`, else the prefix of a
 * `<provider>:<id>` record id, else the configured default provider.
 */
export function resolveSource(ctx: CommandContext, id: string, explicit?: string): string {
	if (explicit) return explicit
	const sep = id.indexOf(':')
	if (sep > 0) {
		const prefix = id.slice(0, sep)
		if (ctx.gateway().registry.has(prefix)) return prefix
	}
	const fallback = ctx.config().defaultProvider
	if (fallback) return fallback
	throw new Error('No source given: pass -s <source> or set defaultProvider')
}
