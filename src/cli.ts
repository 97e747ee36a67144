#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { z } from 'zod'
import { registerConfigCommand } from './commands/config.js'
import { createCommandContext, parsePositiveInt } from './commands/context.js'
import { registerHistoryCommand } from './commands/history.js'
import { registerInsightCommand } from './commands/insight.js'
import { registerProfileCommand } from './commands/profile.js'
import { registerQuoteCommand } from './commands/quote.js'
import { registerSearchCommand } from './commands/search.js'
import { registerStatusCommand } from './commands/status.js'
import { AllProvidersExhaustedError, DeadlineExceededError, errorMessage } from './core/errors.js'
import type { OutputFormat } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const pkg = z
	.object({ version: z.string() })
	.parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')))

const program = new Command()

program
	.name('finrelay')
	.description('Market data from several providers with failover, caching and circuit breaking')
	.version(pkg.version)
	.option('--json', 'output as JSON')
	.option('--plain', 'output as tab-separated values')
	.option('-v, --verbose', 'verbose output and debug logging')
	.option('-s, --source <source>', 'only try this provider')
	.option('--no-cache', 'bypass the response cache')
	.option('--deadline <ms>', 'overall time budget per request', parsePositiveInt)
	.hook('preAction', () => {
		const raw = program.opts<{ json?: boolean; plain?: boolean }>()
		let format: OutputFormat = 'markdown'
		if (raw.json) format = 'json'
		else if (raw.plain) format = 'plain'
		program.setOptionValue('format', format)
	})

const ctx = createCommandContext(program)

registerQuoteCommand(program, ctx)
registerProfileCommand(program, ctx)
registerHistoryCommand(program, ctx)
registerSearchCommand(program, ctx)
registerInsightCommand(program, ctx)
registerStatusCommand(program, ctx)
registerConfigCommand(program)

program.parseAsync(process.argv).catch((err: unknown) => {
	console.error(`Error: ${errorMessage(err)}`)
	if (
		program.opts<{ verbose?: boolean }>().verbose &&
		(err instanceof AllProvidersExhaustedError || err instanceof DeadlineExceededError)
	) {
		for (const failure of err.failures) {
			console.error(`  ${failure.provider} (${failure.kind}): ${failure.message}`)
		}
	}
	process.exit(1)
})
