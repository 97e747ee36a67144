import type {
	CompanyProfile,
	HistoricalQuote,
	MarketInsight,
	QuoteResult,
	SearchResult,
} from '../types.js'

export const CAPABILITIES = ['quote', 'profile', 'history', 'search', 'market-insight'] as const

export type Capability = (typeof CAPABILITIES)[number]

export interface CapabilityParams {
	quote: { symbol: string }
	profile: { symbol: string }
	history: { symbol: string; days?: number }
	search: { query: string; limit?: number }
	'market-insight': { symbols: string[]; question?: string; horizon?: 'intraday' | 'swing' | 'long-term' }
}

export interface CapabilityResult {
	quote: QuoteResult
	profile: CompanyProfile
	history: HistoricalQuote[]
	search: SearchResult[]
	'market-insight': MarketInsight
}

export interface RateLimitConfig {
	maxRequests: number
	windowMs: number
}

export interface InvokeOptions {
	/** Budget for this call; already bounded by the request deadline. */
	timeoutMs: number
	signal: AbortSignal
}

export type CapabilityHandler<C extends Capability> = (
	params: CapabilityParams[C],
	options: InvokeOptions,
) => Promise<CapabilityResult[C]>

export type CapabilityHandlers = { [C in Capability]?: CapabilityHandler<C> }

export interface ProviderInfo {
	name: string
	vendor: string
	capabilities: readonly Capability[]
	requiresKey: boolean
	keyEnvVar?: string
}

/**
 * A vendor client wrapped behind one calling convention. Implementations
 * throw `ProviderError` subclasses; anything else is normalized by the
 * dispatcher.
 */
export interface Provider {
	describe(): ProviderInfo
	isEnabled(): boolean
	invoke<C extends Capability>(
		capability: C,
		params: CapabilityParams[C],
		options: InvokeOptions,
	): Promise<CapabilityResult[C]>
}

export interface ProviderDescriptor {
	name: string
	capabilities: readonly Capability[]
	priority: Partial<Record<Capability, number>>
	timeoutMs: number
	rateLimit: RateLimitConfig
	provider: Provider
}

export interface ProviderResult<T> {
	data: T
	source: string
	cached: boolean
}

export function isCapability(value: string): value is Capability {
	return CAPABILITIES.some((c) => c === value)
}
