import type { GatewayConfig } from '../core/config.js'
import { BusinessDataGateway, type GatewayDeps } from '../core/gateway.js'
import { createGleifProvider } from './gleif.js'
import { createSecEdgarProvider } from './sec-edgar.js'
import type { ManagedProvider } from './types.js'
import { createYahooProvider } from './yahoo-finance.js'

/** Bundled adapters in registration order, which also breaks selection ties. */
export function builtinProviders(config: GatewayConfig): ManagedProvider[] {
	return [
		createSecEdgarProvider({ userAgent: config.edgarUserAgent }),
		createGleifProvider(),
		createYahooProvider(),
	]
}

/** Skips `disabledSources`; `unhealthySources` stay listed but are never selected. */
export function registerAllProviders(gateway: BusinessDataGateway): void {
	const disabled = new Set(gateway.config.disabledSources)
	const unhealthy = new Set(gateway.config.unhealthySources)
	for (const provider of builtinProviders(gateway.config)) {
		if (disabled.has(provider.name)) continue
		if (unhealthy.has(provider.name)) provider.setHealthy(false)
		gateway.registerProvider(provider)
	}
}

export function createGateway(config: GatewayConfig, deps: GatewayDeps = {}): BusinessDataGateway {
	const gateway = new BusinessDataGateway(config, deps)
	registerAllProviders(gateway)
	return gateway
}
