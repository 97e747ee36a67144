import { ResponseCache } from '../src/core/cache.js'
import { type CircuitBreakerPolicy, HealthMonitor } from '../src/core/circuit-breaker.js'
import { FailoverDispatcher } from '../src/core/dispatcher.js'
import { createLogger } from '../src/core/logger.js'
import { RateLimiter } from '../src/core/rate-limiter.js'
import { ProviderRegistry } from '../src/core/registry.js'
import { defineProvider } from '../src/providers/base.js'
import type {
	Capability,
	CapabilityHandler,
	CapabilityHandlers,
	Provider,
	ProviderDescriptor,
} from '../src/providers/types.js'
import type { QuoteResult } from '../src/types.js'

export const silentLogger = createLogger({ silent: true })

export function quoteOf(symbol: string, source: string, price = 100): QuoteResult {
	return { symbol, price, change: 0, changePercent: 0, source }
}

export function fakeProvider(
	name: string,
	handlers: CapabilityHandlers,
	options: { enabled?: boolean; keyEnvVar?: string } = {},
): Provider {
	return defineProvider({
		name,
		vendor: `${name} vendor`,
		requiresKey: options.keyEnvVar !== undefined,
		keyEnvVar: options.keyEnvVar,
		isEnabled: () => options.enabled ?? true,
		handlers,
	})
}

export function quoteProvider(
	name: string,
	handler: CapabilityHandler<'quote'>,
	options: { enabled?: boolean; keyEnvVar?: string } = {},
): Provider {
	return fakeProvider(name, { quote: handler }, options)
}

/** Resolves after `ms` of (fake) time. */
export function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}

export function describeFake(
	provider: Provider,
	overrides: Partial<Pick<ProviderDescriptor, 'priority' | 'timeoutMs' | 'rateLimit'>> = {},
): ProviderDescriptor {
	const { name, capabilities } = provider.describe()
	return {
		name,
		capabilities,
		priority: {},
		timeoutMs: 1_000,
		rateLimit: { maxRequests: 100, windowMs: 60_000 },
		provider,
		...overrides,
	}
}

export interface HarnessOptions {
	policy?: Partial<CircuitBreakerPolicy>
	ttlMs?: Partial<Record<Capability, number>>
	deadlineMs?: number
	disabledSources?: string[]
}

export function createHarness(descriptors: ProviderDescriptor[], options: HarnessOptions = {}) {
	const registry = new ProviderRegistry()
	for (const descriptor of descriptors) registry.registerAll(descriptor)
	const health = new HealthMonitor(options.policy, { logger: silentLogger })
	const rateLimiter = new RateLimiter()
	const cache = new ResponseCache()
	const dispatcher = new FailoverDispatcher({
		registry,
		health,
		rateLimiter,
		cache,
		ttlMs: options.ttlMs,
		defaultDeadlineMs: options.deadlineMs,
		disabledSources: options.disabledSources,
		logger: silentLogger,
	})
	return { registry, health, rateLimiter, cache, dispatcher }
}
