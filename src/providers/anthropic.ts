import Anthropic from '@anthropic-ai/sdk'
import {
	InvalidResponseError,
	type ProviderError,
	ProviderTimeoutError,
	ProviderUnavailableError,
	RateLimitedError,
	errorMessage,
} from '../core/errors.js'
import type { MarketInsight } from '../types.js'
import { defineProvider } from './base.js'
import {
	type CompletionFn,
	INSIGHT_MAX_TOKENS,
	INSIGHT_SYSTEM_PROMPT,
	buildInsightPrompt,
	parseInsight,
} from './insight.js'
import type { InvokeOptions, Provider } from './types.js'

const SOURCE = 'anthropic'
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5'

export interface AnthropicProviderOptions {
	apiKey?: string
	model?: string
	complete?: CompletionFn
}

function toProviderError(err: unknown, options: InvokeOptions): ProviderError {
	if (err instanceof Anthropic.APIConnectionTimeoutError || err instanceof Anthropic.APIUserAbortError) {
		return new ProviderTimeoutError(SOURCE, options.timeoutMs, err)
	}
	// Anthropic signals overload with 529 as well as 429
	if (err instanceof Anthropic.RateLimitError || (err instanceof Anthropic.APIError && err.status === 529)) {
		return new RateLimitedError(SOURCE, 'provider', undefined, err)
	}
	if (err instanceof Anthropic.APIError) {
		return new ProviderUnavailableError(SOURCE, `API error ${err.status ?? '?'}: ${err.message}`, err.status, err)
	}
	return new ProviderUnavailableError(SOURCE, `Request failed: ${errorMessage(err)}`, undefined, err)
}

function sdkCompletion(apiKey: string): CompletionFn {
	let client: Anthropic | undefined
	return async (request, options) => {
		client ??= new Anthropic({ apiKey, maxRetries: 0 })
		try {
			const res = await client.messages.create(
				{
					model: request.model,
					max_tokens: request.maxTokens,
					system: request.system,
					messages: [{ role: 'user', content: request.prompt }],
				},
				{ signal: options.signal, timeout: options.timeoutMs },
			)
			const text = res.content
				.filter((block): block is Anthropic.TextBlock => block.type === 'text')
				.map((block) => block.text)
				.join('\n')
			if (!text) throw new InvalidResponseError(SOURCE, 'Empty completion')
			return text
		} catch (err) {
			if (err instanceof InvalidResponseError) throw err
			throw toProviderError(err, options)
		}
	}
}

export function createAnthropicProvider(options: AnthropicProviderOptions = {}): Provider {
	const { apiKey } = options
	const model = options.model ?? DEFAULT_ANTHROPIC_MODEL
	const complete = options.complete ?? sdkCompletion(apiKey ?? '')

	return defineProvider({
		name: SOURCE,
		vendor: 'Anthropic',
		requiresKey: true,
		keyEnvVar: 'ANTHROPIC_API_KEY',
		isEnabled: () => !!apiKey,
		handlers: {
			async 'market-insight'(params, invoke): Promise<MarketInsight> {
				const text = await complete(
					{
						model,
						system: INSIGHT_SYSTEM_PROMPT,
						prompt: buildInsightPrompt(params),
						maxTokens: INSIGHT_MAX_TOKENS,
					},
					invoke,
				)
				return parseInsight(SOURCE, model, params, text)
			},
		},
	})
}
