import { z } from 'zod'
import { InvalidResponseError } from '../core/errors.js'
import type { CompanyProfile, QuoteResult, SearchResult } from '../types.js'
import { defineProvider } from './base.js'
import { type FetchFn, fetchJson, parseWith } from './http.js'
import type { InvokeOptions, Provider } from './types.js'

const SOURCE = 'finnhub'
const BASE_URL = 'https://finnhub.io/api/v1'

const quoteSchema = z.object({
	c: z.number(),
	d: z.number().nullable(),
	dp: z.number().nullable(),
	h: z.number(),
	l: z.number(),
	o: z.number(),
	pc: z.number(),
	t: z.number().optional(),
})

const profileSchema = z.object({
	ticker: z.string().optional(),
	name: z.string().optional(),
	exchange: z.string().optional(),
	currency: z.string().optional(),
	country: z.string().optional(),
	finnhubIndustry: z.string().optional(),
	weburl: z.string().optional(),
	// Finnhub reports market cap in millions
	marketCapitalization: z.number().optional(),
})

const searchSchema = z.object({
	count: z.number().optional(),
	result: z
		.array(
			z.object({
				description: z.string(),
				displaySymbol: z.string().optional(),
				symbol: z.string(),
				type: z.string().optional(),
			}),
		)
		.default([]),
})

export interface FinnhubOptions {
	apiKey?: string
	fetch?: FetchFn
}

export function createFinnhubProvider(options: FinnhubOptions = {}): Provider {
	const { apiKey } = options

	function request(path: string, invoke: InvokeOptions): Promise<unknown> {
		const separator = path.includes('?') ? '&' : '?'
		const url = `${BASE_URL}${path}${separator}token=${encodeURIComponent(apiKey ?? '')}`
		return fetchJson(SOURCE, url, invoke, options.fetch)
	}

	return defineProvider({
		name: SOURCE,
		vendor: 'Finnhub',
		requiresKey: true,
		keyEnvVar: 'FINNHUB_API_KEY',
		isEnabled: () => !!apiKey,
		handlers: {
			async quote({ symbol }, invoke): Promise<QuoteResult> {
				const sym = symbol.toUpperCase()
				const data = parseWith(
					SOURCE,
					quoteSchema,
					await request(`/quote?symbol=${encodeURIComponent(sym)}`, invoke),
					'quote',
				)
				if (data.c === 0 && data.h === 0 && data.l === 0 && data.o === 0 && data.pc === 0) {
					throw new InvalidResponseError(SOURCE, `No quote data for "${sym}", ticker may be invalid`)
				}
				return {
					symbol: sym,
					price: data.c,
					change: data.d ?? 0,
					changePercent: data.dp ?? 0,
					open: data.o,
					previousClose: data.pc,
					dayHigh: data.h,
					dayLow: data.l,
					source: SOURCE,
				}
			},

			async profile({ symbol }, invoke): Promise<CompanyProfile> {
				const sym = symbol.toUpperCase()
				const data = parseWith(
					SOURCE,
					profileSchema,
					await request(`/stock/profile2?symbol=${encodeURIComponent(sym)}`, invoke),
					'profile',
				)
				if (!data.name) {
					throw new InvalidResponseError(SOURCE, `No profile for "${sym}"`)
				}
				return {
					symbol: data.ticker ?? sym,
					name: data.name,
					exchange: data.exchange,
					currency: data.currency,
					country: data.country,
					industry: data.finnhubIndustry,
					website: data.weburl,
					marketCap:
						data.marketCapitalization === undefined ? undefined : data.marketCapitalization * 1e6,
					source: SOURCE,
				}
			},

			async search({ query, limit }, invoke): Promise<SearchResult[]> {
				const data = parseWith(
					SOURCE,
					searchSchema,
					await request(`/search?q=${encodeURIComponent(query)}`, invoke),
					'search',
				)
				return data.result.slice(0, limit ?? 10).map((r) => ({
					symbol: r.symbol,
					name: r.description,
					type: r.type,
					source: SOURCE,
				}))
			},
		},
	})
}
