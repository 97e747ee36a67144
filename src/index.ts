export type {
	OutputFormat,
	GlobalOptions,
	QuoteResult,
	CompanyProfile,
	HistoricalQuote,
	SearchResult,
	Sentiment,
	MarketInsight,
} from './types.js'

export type {
	Capability,
	CapabilityParams,
	CapabilityResult,
	InvokeOptions,
	Provider,
	ProviderDescriptor,
	ProviderInfo,
	ProviderResult,
	RateLimitConfig,
} from './providers/types.js'
export { CAPABILITIES, isCapability } from './providers/types.js'
export { defineProvider, type ProviderDefinition } from './providers/base.js'
export {
	PROVIDER_DEFAULTS,
	buildDescriptors,
	createProviders,
	describeProvider,
	registerProviders,
	reloadProviders,
	type ProviderDeps,
	type ReloadSummary,
} from './providers/registry.js'

export { ProviderRegistry } from './core/registry.js'
export {
	HealthMonitor,
	DEFAULT_BREAKER_POLICY,
	type CircuitBreakerPolicy,
	type CircuitPermit,
	type CircuitPhase,
	type HealthSnapshot,
} from './core/circuit-breaker.js'
export { RateLimiter } from './core/rate-limiter.js'
export { ResponseCache, cacheKey, type CacheEntry, type CacheStats } from './core/cache.js'
export {
	FailoverDispatcher,
	DEFAULT_DEADLINE_MS,
	DEFAULT_TTL_MS,
	type DispatchOptions,
	type DispatchResult,
	type DispatcherStats,
	type ProviderStatus,
} from './core/dispatcher.js'
export { createRuntime, type Runtime, type RuntimeOptions } from './core/runtime.js'
export { loadConfig, saveConfig, getConfigPath, parseConfig, type FinrelayConfig } from './core/config.js'
export { createLogger, childLogger, type Logger, type LoggerOptions } from './core/logger.js'
export * from './core/errors.js'
export * as formatter from './core/formatter.js'
