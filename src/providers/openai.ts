import OpenAI from 'openai'
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

const SOURCE = 'openai'
export const DEFAULT_OPENAI_MODEL = 'gpt-4o'

export interface OpenAIProviderOptions {
	apiKey?: string
	model?: string
	/** Replaces the SDK call; used by tests. */
	complete?: CompletionFn
}

function toProviderError(err: unknown, options: InvokeOptions): ProviderError {
	// Subclasses before OpenAI.APIError, which they all extend
	if (err instanceof OpenAI.APIConnectionTimeoutError || err instanceof OpenAI.APIUserAbortError) {
		return new ProviderTimeoutError(SOURCE, options.timeoutMs, err)
	}
	if (err instanceof OpenAI.RateLimitError) {
		return new RateLimitedError(SOURCE, 'provider', undefined, err)
	}
	if (err instanceof OpenAI.APIError) {
		return new ProviderUnavailableError(SOURCE, `API error ${err.status ?? '?'}: ${err.message}`, err.status, err)
	}
	return new ProviderUnavailableError(SOURCE, `Request failed: ${errorMessage(err)}`, undefined, err)
}

function sdkCompletion(apiKey: string): CompletionFn {
	let client: OpenAI | undefined
	return async (request, options) => {
		// Retries are the dispatcher's job
		client ??= new OpenAI({ apiKey, maxRetries: 0 })
		try {
			const res = await client.chat.completions.create(
				{
					model: request.model,
					max_tokens: request.maxTokens,
					response_format: { type: 'json_object' },
					messages: [
						{ role: 'system', content: request.system },
						{ role: 'user', content: request.prompt },
					],
				},
				{ signal: options.signal, timeout: options.timeoutMs },
			)
			const content = res.choices[0]?.message.content
			if (!content) throw new InvalidResponseError(SOURCE, 'Empty completion')
			return content
		} catch (err) {
			if (err instanceof InvalidResponseError) throw err
			throw toProviderError(err, options)
		}
	}
}

export function createOpenAIProvider(options: OpenAIProviderOptions = {}): Provider {
	const { apiKey } = options
	const model = options.model ?? DEFAULT_OPENAI_MODEL
	const complete = options.complete ?? sdkCompletion(apiKey ?? '')

	return defineProvider({
		name: SOURCE,
		vendor: 'OpenAI',
		requiresKey: true,
		keyEnvVar: 'OPENAI_API_KEY',
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
