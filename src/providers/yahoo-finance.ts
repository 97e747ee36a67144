import YahooFinance from 'yahoo-finance2'
import { z } from 'zod'
import { InvalidResponseError, ProviderUnavailableError, errorMessage } from '../core/errors.js'
import type { CompanyProfile, HistoricalQuote, QuoteResult, SearchResult } from '../types.js'
import { defineProvider } from './base.js'
import { parseWith, toDateString } from './http.js'
import type { Provider } from './types.js'

const SOURCE = 'yahoo'

/** The slice of yahoo-finance2 this provider uses. Results are validated, not trusted. */
export interface YahooClient {
	quote(symbol: string): Promise<unknown>
	profile(symbol: string): Promise<unknown>
	chart(symbol: string, period1: Date): Promise<unknown>
	search(query: string): Promise<unknown>
}

function createYahooClient(): YahooClient {
	const yf = new YahooFinance({ suppressNotices: ['yahooSurvey', 'ripHistorical'] })
	return {
		quote: (symbol) => yf.quote(symbol),
		profile: (symbol) => yf.quoteSummary(symbol, { modules: ['assetProfile', 'price'] }),
		chart: (symbol, period1) => yf.chart(symbol, { period1 }),
		search: (query) => yf.search(query),
	}
}

const num = z.number().nullish()
const str = z.string().nullish()

const quoteSchema = z.object({
	symbol: z.string(),
	regularMarketPrice: z.number(),
	regularMarketChange: num,
	regularMarketChangePercent: num,
	regularMarketVolume: num,
	regularMarketOpen: num,
	regularMarketPreviousClose: num,
	regularMarketDayHigh: num,
	regularMarketDayLow: num,
	marketCap: num,
	fiftyTwoWeekHigh: num,
	fiftyTwoWeekLow: num,
})

const summarySchema = z.object({
	assetProfile: z
		.object({
			sector: str,
			industry: str,
			country: str,
			website: str,
			fullTimeEmployees: num,
			longBusinessSummary: str,
		})
		.nullish(),
	price: z.object({
		symbol: z.string(),
		longName: str,
		shortName: str,
		currency: str,
		exchangeName: str,
		marketCap: num,
	}),
})

const chartSchema = z.object({
	quotes: z.array(
		z.object({
			date: z.coerce.date(),
			open: num,
			high: num,
			low: num,
			close: num,
			adjclose: num,
			volume: num,
		}),
	),
})

const searchSchema = z.object({
	quotes: z.array(
		z.object({
			symbol: z.string().optional(),
			isYahooFinance: z.boolean(),
			exchange: str,
			exchDisp: str,
			shortname: str,
			longname: str,
			quoteType: str,
		}),
	),
})

export interface YahooOptions {
	client?: YahooClient
}

export function createYahooProvider(options: YahooOptions = {}): Provider {
	let client = options.client

	// The library client is created on first use so that merely registering
	// the provider does no I/O.
	async function call(what: string, fn: (c: YahooClient) => Promise<unknown>): Promise<unknown> {
		client ??= createYahooClient()
		try {
			return await fn(client)
		} catch (err) {
			if (err instanceof Error && err.name === 'FailedYahooValidationError') {
				throw new InvalidResponseError(SOURCE, `${what}: ${err.message}`, [], err)
			}
			throw new ProviderUnavailableError(SOURCE, `${what} failed: ${errorMessage(err)}`, undefined, err)
		}
	}

	return defineProvider({
		name: SOURCE,
		vendor: 'Yahoo Finance',
		requiresKey: false,
		isEnabled: () => true,
		handlers: {
			async quote({ symbol }): Promise<QuoteResult> {
				const raw = await call('quote', (c) => c.quote(symbol))
				if (raw == null) throw new InvalidResponseError(SOURCE, `Symbol "${symbol}" not found`)
				const q = parseWith(SOURCE, quoteSchema, raw, 'quote')
				return {
					symbol: q.symbol,
					price: q.regularMarketPrice,
					change: q.regularMarketChange ?? 0,
					changePercent: q.regularMarketChangePercent ?? 0,
					volume: q.regularMarketVolume ?? undefined,
					marketCap: q.marketCap ?? undefined,
					high52w: q.fiftyTwoWeekHigh ?? undefined,
					low52w: q.fiftyTwoWeekLow ?? undefined,
					open: q.regularMarketOpen ?? undefined,
					previousClose: q.regularMarketPreviousClose ?? undefined,
					dayHigh: q.regularMarketDayHigh ?? undefined,
					dayLow: q.regularMarketDayLow ?? undefined,
					source: SOURCE,
				}
			},

			async profile({ symbol }): Promise<CompanyProfile> {
				const raw = await call('profile', (c) => c.profile(symbol))
				const { assetProfile: p, price } = parseWith(SOURCE, summarySchema, raw, 'profile')
				return {
					symbol: price.symbol,
					name: price.longName ?? price.shortName ?? price.symbol,
					exchange: price.exchangeName ?? undefined,
					currency: price.currency ?? undefined,
					sector: p?.sector ?? undefined,
					industry: p?.industry ?? undefined,
					country: p?.country ?? undefined,
					website: p?.website ?? undefined,
					employees: p?.fullTimeEmployees ?? undefined,
					marketCap: price.marketCap ?? undefined,
					description: p?.longBusinessSummary ?? undefined,
					source: SOURCE,
				}
			},

			async history({ symbol, days = 30 }): Promise<HistoricalQuote[]> {
				const period1 = new Date()
				period1.setDate(period1.getDate() - days)
				const raw = await call('history', (c) => c.chart(symbol, period1))
				const { quotes } = parseWith(SOURCE, chartSchema, raw, 'chart')
				const rows: HistoricalQuote[] = []
				for (const r of quotes) {
					// Yahoo pads non-trading intervals with nulls
					if (r.open == null || r.high == null || r.low == null || r.close == null) continue
					rows.push({
						date: toDateString(r.date),
						open: r.open,
						high: r.high,
						low: r.low,
						close: r.close,
						adjClose: r.adjclose ?? undefined,
						volume: r.volume ?? 0,
					})
				}
				return rows
			},

			async search({ query, limit }): Promise<SearchResult[]> {
				const raw = await call('search', (c) => c.search(query))
				const { quotes } = parseWith(SOURCE, searchSchema, raw, 'search')
				const results: SearchResult[] = []
				for (const q of quotes) {
					if (!q.isYahooFinance || !q.symbol) continue
					results.push({
						symbol: q.symbol,
						name: q.longname ?? q.shortname ?? q.symbol,
						exchange: q.exchDisp ?? q.exchange ?? undefined,
						type: q.quoteType ?? undefined,
						source: SOURCE,
					})
				}
				return results.slice(0, limit ?? 10)
			},
		},
	})
}
