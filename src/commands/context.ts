import { type Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../core/config.js'
import type { DispatchOptions } from '../core/dispatcher.js'
import { createLogger } from '../core/logger.js'
import { type Runtime, createRuntime } from '../core/runtime.js'
import type { GlobalOptions } from '../types.js'

/** What every command gets: global options and a lazily built runtime. */
export interface CommandContext {
	options(): GlobalOptions
	runtime(): Runtime
}

export function createCommandContext(program: Command): CommandContext {
	let runtime: Runtime | undefined
	const options = (): GlobalOptions => program.opts<GlobalOptions>()

	return {
		options,
		runtime() {
			if (!runtime) {
				const config = loadConfig()
				const logger = createLogger({ level: options().verbose ? 'debug' : config.logLevel })
				runtime = createRuntime(config, { logger })
			}
			return runtime
		},
	}
}

export function dispatchOptions(opts: GlobalOptions): DispatchOptions {
	return { source: opts.source, noCache: !opts.cache, deadlineMs: opts.deadline }
}

/** commander argument parser for counts and millisecond values. */
export function parsePositiveInt(value: string): number {
	const n = Number(value)
	if (!Number.isInteger(n) || n <= 0) {
		throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`)
	}
	return n
}
