import type { Command } from 'commander'
import { CONFIG_KEYS, getConfigPath, loadConfig, saveConfig } from '../core/config.js'

/** Turns a CLI string into the value stored for `key`; zod coerces the rest. */
export function parseConfigValue(key: string, value: string): unknown {
	if (key === 'disabledSources' || key === 'unhealthySources') {
		return value
			.split(',')
			.map((s) => s.trim())
			.filter(Boolean)
	}
	return value
}

export function registerConfigCommand(program: Command): void {
	const config = program.command('config').description('Manage configuration')

	config
		.command('show')
		.description('Show current configuration')
		.action(() => {
			console.log(`Config file: ${getConfigPath()}\n`)
			console.log(JSON.stringify(loadConfig(), null, 2))
		})

	config
		.command('set <key> <value>')
		.description('Set a configuration value')
		.action((key: string, value: string) => {
			if (!CONFIG_KEYS.some((k) => k === key)) {
				throw new Error(`Invalid key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`)
			}
			saveConfig({ [key]: parseConfigValue(key, value) })
			console.log(`Set ${key} = ${value}`)
		})

	config
		.command('path')
		.description('Show config file path')
		.action(() => {
			console.log(getConfigPath())
		})
}
