import type { FinrelayConfig } from '../core/config.js'
import type { ProviderRegistry } from '../core/registry.js'
import { createAlphaVantageProvider } from './alpha-vantage.js'
import { createAnthropicProvider } from './anthropic.js'
import { createFinnhubProvider } from './finnhub.js'
import type { FetchFn } from './http.js'
import type { CompletionFn } from './insight.js'
import { createOpenAIProvider } from './openai.js'
import type { Capability, Provider, ProviderDescriptor, RateLimitConfig } from './types.js'
import { type YahooClient, createYahooProvider } from './yahoo-finance.js'

interface ProviderDefaults {
	priority: number
	timeoutMs: number
	rateLimit: RateLimitConfig
}

const MINUTE = 60_000

// Lower priority is tried first. Free sources lead, strict free tiers trail.
export const PROVIDER_DEFAULTS: Record<string, ProviderDefaults> = {
	yahoo: { priority: 10, timeoutMs: 10_000, rateLimit: { maxRequests: 100, windowMs: MINUTE } },
	finnhub: { priority: 20, timeoutMs: 10_000, rateLimit: { maxRequests: 60, windowMs: MINUTE } },
	alphavantage: { priority: 30, timeoutMs: 15_000, rateLimit: { maxRequests: 5, windowMs: MINUTE } },
	anthropic: { priority: 10, timeoutMs: 30_000, rateLimit: { maxRequests: 20, windowMs: MINUTE } },
	openai: { priority: 20, timeoutMs: 30_000, rateLimit: { maxRequests: 20, windowMs: MINUTE } },
}

const FALLBACK_DEFAULTS: ProviderDefaults = {
	priority: 50,
	timeoutMs: 10_000,
	rateLimit: { maxRequests: 60, windowMs: MINUTE },
}

/** Injection points for vendor transports. */
export interface ProviderDeps {
	fetch?: FetchFn
	yahooClient?: YahooClient
	openaiComplete?: CompletionFn
	anthropicComplete?: CompletionFn
}

export function createProviders(config: FinrelayConfig, deps: ProviderDeps = {}): Provider[] {
	return [
		createYahooProvider({ client: deps.yahooClient }),
		createFinnhubProvider({ apiKey: config.finnhubApiKey, fetch: deps.fetch }),
		createAlphaVantageProvider({ apiKey: config.alphaVantageApiKey, fetch: deps.fetch }),
		createAnthropicProvider({
			apiKey: config.anthropicApiKey,
			model: config.anthropicModel,
			complete: deps.anthropicComplete,
		}),
		createOpenAIProvider({
			apiKey: config.openaiApiKey,
			model: config.openaiModel,
			complete: deps.openaiComplete,
		}),
	]
}

export function describeProvider(provider: Provider, config: FinrelayConfig): ProviderDescriptor {
	const { name, capabilities } = provider.describe()
	const defaults = PROVIDER_DEFAULTS[name] ?? FALLBACK_DEFAULTS
	const override = config.providers?.[name]

	const priority: Partial<Record<Capability, number>> = {}
	for (const capability of capabilities) {
		priority[capability] = override?.priority?.[capability] ?? defaults.priority
	}

	return {
		name,
		capabilities,
		priority,
		timeoutMs: override?.timeoutMs ?? defaults.timeoutMs,
		rateLimit: override?.rateLimit ?? defaults.rateLimit,
		provider,
	}
}

export function buildDescriptors(config: FinrelayConfig, deps: ProviderDeps = {}): ProviderDescriptor[] {
	return createProviders(config, deps).map((p) => describeProvider(p, config))
}

export function registerProviders(registry: ProviderRegistry, descriptors: ProviderDescriptor[]): void {
	for (const descriptor of descriptors) {
		registry.registerAll(descriptor)
	}
}

export interface ReloadSummary {
	added: string[]
	replaced: string[]
	removed: string[]
}

/**
 * Swap in descriptors built from `config`. Providers keep their registration
 * order; ones no longer produced are removed. In-flight dispatches finish on
 * the candidate list they started with.
 */
export function reloadProviders(
	registry: ProviderRegistry,
	config: FinrelayConfig,
	deps: ProviderDeps = {},
): ReloadSummary {
	const next = buildDescriptors(config, deps)
	const nextNames = new Set(next.map((d) => d.name))
	const summary: ReloadSummary = { added: [], replaced: [], removed: [] }

	for (const current of registry.providers()) {
		if (nextNames.has(current.name)) continue
		registry.remove(current.name)
		summary.removed.push(current.name)
	}

	for (const descriptor of next) {
		const previous = registry.get(descriptor.name)
		if (previous) {
			// Capabilities the new descriptor dropped
			for (const capability of previous.capabilities) {
				if (!descriptor.capabilities.includes(capability)) registry.unregister(capability, descriptor.name)
			}
			summary.replaced.push(descriptor.name)
		} else {
			summary.added.push(descriptor.name)
		}
		registry.registerAll(descriptor)
	}

	return summary
}
