import { z } from 'zod'
import { InvalidResponseError, RateLimitedError } from '../core/errors.js'
import type { CompanyProfile, HistoricalQuote, QuoteResult } from '../types.js'
import { defineProvider } from './base.js'
import { type FetchFn, fetchJson, parseWith, toNum } from './http.js'
import type { InvokeOptions, Provider } from './types.js'

const SOURCE = 'alphavantage'
const BASE_URL = 'https://www.alphavantage.co/query'

const globalQuoteSchema = z.object({
	'Global Quote': z.object({
		'01. symbol': z.string(),
		'02. open': z.string(),
		'03. high': z.string(),
		'04. low': z.string(),
		'05. price': z.string(),
		'06. volume': z.string(),
		'08. previous close': z.string(),
		'09. change': z.string(),
		'10. change percent': z.string(),
	}),
})

const overviewSchema = z.object({
	Symbol: z.string(),
	Name: z.string(),
	Description: z.string().optional(),
	Exchange: z.string().optional(),
	Currency: z.string().optional(),
	Country: z.string().optional(),
	Sector: z.string().optional(),
	Industry: z.string().optional(),
	MarketCapitalization: z.string().optional(),
	FullTimeEmployees: z.string().optional(),
	OfficialSite: z.string().optional(),
})

const timeSeriesSchema = z.object({
	'Time Series (Daily)': z.record(
		z.string(),
		z.object({
			'1. open': z.string(),
			'2. high': z.string(),
			'3. low': z.string(),
			'4. close': z.string(),
			'5. volume': z.string(),
		}),
	),
})

export interface AlphaVantageOptions {
	apiKey?: string
	fetch?: FetchFn
}

function num(v: string): number {
	return toNum(v) ?? 0
}

export function createAlphaVantageProvider(options: AlphaVantageOptions = {}): Provider {
	const { apiKey } = options

	async function avFetch(params: Record<string, string>, invoke: InvokeOptions): Promise<unknown> {
		const url = new URL(BASE_URL)
		for (const [key, value] of Object.entries(params)) {
			url.searchParams.set(key, value)
		}
		url.searchParams.set('apikey', apiKey ?? '')

		const data = await fetchJson(SOURCE, url.toString(), invoke, options.fetch)

		// Alpha Vantage answers errors and throttling with a 200
		const envelope = z
			.object({ 'Error Message': z.string(), Note: z.string(), Information: z.string() })
			.partial()
			.safeParse(data)
		if (envelope.success) {
			const { 'Error Message': error, Note: note, Information: info } = envelope.data
			if (error) throw new InvalidResponseError(SOURCE, error)
			// Note / Information carry the free-tier quota message
			if (note || info) throw new RateLimitedError(SOURCE, 'provider')
		}
		return data
	}

	return defineProvider({
		name: SOURCE,
		vendor: 'Alpha Vantage',
		requiresKey: true,
		keyEnvVar: 'ALPHA_VANTAGE_API_KEY',
		isEnabled: () => !!apiKey,
		handlers: {
			async quote({ symbol }, invoke): Promise<QuoteResult> {
				const raw = await avFetch({ function: 'GLOBAL_QUOTE', symbol: symbol.toUpperCase() }, invoke)
				const q = parseWith(SOURCE, globalQuoteSchema, raw, 'quote')['Global Quote']
				return {
					symbol: q['01. symbol'],
					price: num(q['05. price']),
					change: num(q['09. change']),
					changePercent: num(q['10. change percent'].replace('%', '')),
					volume: toNum(q['06. volume']),
					open: toNum(q['02. open']),
					previousClose: toNum(q['08. previous close']),
					dayHigh: toNum(q['03. high']),
					dayLow: toNum(q['04. low']),
					source: SOURCE,
				}
			},

			async profile({ symbol }, invoke): Promise<CompanyProfile> {
				const raw = await avFetch({ function: 'OVERVIEW', symbol: symbol.toUpperCase() }, invoke)
				const o = parseWith(SOURCE, overviewSchema, raw, 'overview')
				return {
					symbol: o.Symbol,
					name: o.Name,
					exchange: o.Exchange,
					currency: o.Currency,
					country: o.Country,
					sector: o.Sector,
					industry: o.Industry,
					website: o.OfficialSite,
					employees: toNum(o.FullTimeEmployees),
					marketCap: toNum(o.MarketCapitalization),
					description: o.Description,
					source: SOURCE,
				}
			},

			async history({ symbol, days = 30 }, invoke): Promise<HistoricalQuote[]> {
				const raw = await avFetch(
					{
						function: 'TIME_SERIES_DAILY',
						symbol: symbol.toUpperCase(),
						outputsize: days > 100 ? 'full' : 'compact',
					},
					invoke,
				)
				const series = parseWith(SOURCE, timeSeriesSchema, raw, 'time series')['Time Series (Daily)']
				return Object.entries(series)
					.map(([date, v]) => ({
						date,
						open: num(v['1. open']),
						high: num(v['2. high']),
						low: num(v['3. low']),
						close: num(v['4. close']),
						volume: num(v['5. volume']),
					}))
					.sort((a, b) => b.date.localeCompare(a.date))
					.slice(0, days)
			},
		},
	})
}
