import {
	type ProviderDeps,
	type ReloadSummary,
	buildDescriptors,
	registerProviders,
	reloadProviders,
} from '../providers/registry.js'
import { ResponseCache } from './cache.js'
import { HealthMonitor } from './circuit-breaker.js'
import type { FinrelayConfig } from './config.js'
import { FailoverDispatcher } from './dispatcher.js'
import { type Logger, childLogger, createLogger } from './logger.js'
import { RateLimiter } from './rate-limiter.js'
import { ProviderRegistry } from './registry.js'

export interface Runtime {
	logger: Logger
	registry: ProviderRegistry
	health: HealthMonitor
	rateLimiter: RateLimiter
	cache: ResponseCache
	dispatcher: FailoverDispatcher
	/** Apply a changed configuration to providers and dispatch settings. */
	reload(config: FinrelayConfig): ReloadSummary
}

export interface RuntimeOptions {
	logger?: Logger
	now?: () => number
	deps?: ProviderDeps
}

/** Wire the orchestration layer from a loaded configuration. */
export function createRuntime(config: FinrelayConfig, options: RuntimeOptions = {}): Runtime {
	const logger = options.logger ?? createLogger({ level: config.logLevel })
	const { now, deps } = options

	const registry = new ProviderRegistry()
	const health = new HealthMonitor(config.breaker, { now, logger: childLogger(logger, 'health') })
	const rateLimiter = new RateLimiter(now)
	const cache = new ResponseCache({ now })
	const dispatcher = new FailoverDispatcher({
		registry,
		health,
		rateLimiter,
		cache,
		ttlMs: config.cacheTtlMs,
		defaultDeadlineMs: config.deadlineMs,
		disabledSources: config.disabledSources,
		logger: childLogger(logger, 'dispatcher'),
		now,
	})

	registerProviders(registry, buildDescriptors(config, deps))

	const registryLogger = childLogger(logger, 'registry')

	return {
		logger,
		registry,
		health,
		rateLimiter,
		cache,
		dispatcher,
		reload(next) {
			const summary = reloadProviders(registry, next, deps)
			dispatcher.setDisabledSources(next.disabledSources ?? [])
			registryLogger.info('Providers reloaded', { ...summary })
			return summary
		},
	}
}
