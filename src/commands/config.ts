import type { Command } from 'commander'
import {
	type FinrelayConfig,
	SETTABLE_KEYS,
	getConfigPath,
	isSettableKey,
	loadConfig,
	parseSettableValue,
	saveConfig,
} from '../core/config.js'
import { ConfigError } from '../core/errors.js'
import { maskSecret } from '../core/formatter.js'

const SECRET_KEYS = ['finnhubApiKey', 'alphaVantageApiKey', 'openaiApiKey', 'anthropicApiKey'] as const

export function maskConfig(config: FinrelayConfig): FinrelayConfig {
	const masked = { ...config }
	for (const key of SECRET_KEYS) {
		masked[key] = maskSecret(config[key])
	}
	return masked
}

export function registerConfigCommand(program: Command): void {
	const config = program.command('config').description('Manage configuration')

	config
		.command('show')
		.description('Show the effective configuration (file plus environment)')
		.action(() => {
			console.log(`Config file: ${getConfigPath()}\n`)
			console.log(JSON.stringify(maskConfig(loadConfig()), null, 2))
		})

	config
		.command('set <key> <value>')
		.description(`Set a configuration value (${Object.keys(SETTABLE_KEYS).join(', ')})`)
		.action((key: string, value: string) => {
			if (!isSettableKey(key)) {
				throw new ConfigError(`Invalid key: ${key}. Valid keys: ${Object.keys(SETTABLE_KEYS).join(', ')}`)
			}
			saveConfig({ [key]: parseSettableValue(key, value) })
			const shown = SECRET_KEYS.some((k) => k === key) ? maskSecret(value) : value
			console.log(`Set ${key} = ${shown}`)
		})

	config
		.command('path')
		.description('Show config file path')
		.action(() => {
			console.log(getConfigPath())
		})
}
