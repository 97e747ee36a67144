import { z } from 'zod'
import { InvalidResponseError } from '../core/errors.js'
import type { MarketInsight } from '../types.js'
import { parseWith } from './http.js'
import type { CapabilityParams, InvokeOptions } from './types.js'

export interface CompletionRequest {
	model: string
	system: string
	prompt: string
	maxTokens: number
}

/** Sends one prompt and resolves with the model's raw text. */
export type CompletionFn = (request: CompletionRequest, options: InvokeOptions) => Promise<string>

export const INSIGHT_MAX_TOKENS = 1024

export const INSIGHT_SYSTEM_PROMPT = [
	'You are a market analyst. Answer only with one JSON object and no prose.',
	'Fields: "summary" (string), "sentiment" ("bullish" | "bearish" | "neutral"),',
	'"confidence" (number from 0 to 1), "keyPoints" (array of strings), "risks" (array of strings).',
	'Do not give personalized investment advice.',
].join('\n')

const HORIZON_TEXT = {
	intraday: 'the current trading session',
	swing: 'the next few days to weeks',
	'long-term': 'the next year or more',
} as const

export function buildInsightPrompt(params: CapabilityParams['market-insight']): string {
	const symbols = params.symbols.map((s) => s.toUpperCase()).join(', ')
	const lines = [`Symbols: ${symbols}`, `Horizon: ${HORIZON_TEXT[params.horizon ?? 'swing']}`]
	lines.push(params.question ? `Question: ${params.question}` : 'Give a short outlook for these symbols.')
	return lines.join('\n')
}

const insightSchema = z.object({
	summary: z.string().min(1),
	sentiment: z.enum(['bullish', 'bearish', 'neutral']),
	confidence: z.number().min(0).max(1),
	keyPoints: z.array(z.string()).default([]),
	risks: z.array(z.string()).default([]),
})

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/

export function parseInsight(
	source: string,
	model: string,
	params: CapabilityParams['market-insight'],
	text: string,
): MarketInsight {
	const trimmed = text.trim()
	const body = FENCE.exec(trimmed)?.[1] ?? trimmed
	let json: unknown
	try {
		json = JSON.parse(body)
	} catch (err) {
		throw new InvalidResponseError(source, 'Model did not answer with JSON', [], err)
	}
	const insight = parseWith(source, insightSchema, json, 'insight')
	return {
		symbols: params.symbols.map((s) => s.toUpperCase()),
		...insight,
		model,
		source,
	}
}
