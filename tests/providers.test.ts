import { describe, expect, it, vi } from 'vitest'
import { InvalidResponseError, ProviderUnavailableError, RateLimitedError } from '../src/core/errors.js'
import { createAlphaVantageProvider } from '../src/providers/alpha-vantage.js'
import { createAnthropicProvider } from '../src/providers/anthropic.js'
import { createFinnhubProvider } from '../src/providers/finnhub.js'
import type { FetchFn } from '../src/providers/http.js'
import {
	type CompletionFn,
	INSIGHT_SYSTEM_PROMPT,
	buildInsightPrompt,
	parseInsight,
} from '../src/providers/insight.js'
import { createOpenAIProvider } from '../src/providers/openai.js'
import { type YahooClient, createYahooProvider } from '../src/providers/yahoo-finance.js'

const invoke = { timeoutMs: 1000, signal: new AbortController().signal }

function jsonFetch(body: unknown, status = 200) {
	return vi.fn<FetchFn>(async () => new Response(JSON.stringify(body), { status }))
}

function fakeYahoo(overrides: Partial<YahooClient>): YahooClient {
	const unused = async (): Promise<unknown> => {
		throw new Error('not stubbed')
	}
	return { quote: unused, profile: unused, chart: unused, search: unused, ...overrides }
}

describe('finnhub provider', () => {
	const quotePayload = { c: 150, d: 1.5, dp: 1, h: 151, l: 149, o: 149.5, pc: 148.5, t: 1 }

	it('is enabled only with a key', () => {
		expect(createFinnhubProvider().isEnabled()).toBe(false)
		const provider = createFinnhubProvider({ apiKey: 'test-secret' })
		expect(provider.isEnabled()).toBe(true)
		expect(provider.describe()).toEqual({
			name: 'finnhub',
			vendor: 'Finnhub',
			capabilities: ['quote', 'profile', 'search'],
			requiresKey: true,
			keyEnvVar: 'FINNHUB_API_KEY',
		})
	})

	it('maps a quote', async () => {
		const fetch = jsonFetch(quotePayload)
		const provider = createFinnhubProvider({ apiKey: 'test-secret', fetch })

		const quote = await provider.invoke('quote', { symbol: 'aapl' }, invoke)
		expect(quote).toEqual({
			symbol: 'AAPL',
			price: 150,
			change: 1.5,
			changePercent: 1,
			open: 149.5,
			previousClose: 148.5,
			dayHigh: 151,
			dayLow: 149,
			source: 'finnhub',
		})
		expect(fetch.mock.calls[0][0]).toBe('https://finnhub.io/api/v1/quote?symbol=AAPL&token=test-secret')
	})

	it('treats an all-zero quote as an unknown ticker', async () => {
		const provider = createFinnhubProvider({
			apiKey: 'test-secret',
			fetch: jsonFetch({ c: 0, d: null, dp: null, h: 0, l: 0, o: 0, pc: 0 }),
		})
		await expect(provider.invoke('quote', { symbol: 'ZZZZ' }, invoke)).rejects.toThrow(
			'[finnhub] No quote data for "ZZZZ", ticker may be invalid',
		)
	})

	it('scales market cap from millions', async () => {
		const provider = createFinnhubProvider({
			apiKey: 'test-secret',
			fetch: jsonFetch({ ticker: 'AAPL', name: 'Apple Inc', marketCapitalization: 3000 }),
		})
		const profile = await provider.invoke('profile', { symbol: 'AAPL' }, invoke)
		expect(profile.name).toBe('Apple Inc')
		expect(profile.marketCap).toBe(3e9)
	})

	it('limits search results', async () => {
		const provider = createFinnhubProvider({
			apiKey: 'test-secret',
			fetch: jsonFetch({
				count: 2,
				result: [
					{ description: 'APPLE INC', symbol: 'AAPL', type: 'Common Stock' },
					{ description: 'APPLE HOSPITALITY', symbol: 'APLE', type: 'REIT' },
				],
			}),
		})
		const results = await provider.invoke('search', { query: 'apple', limit: 1 }, invoke)
		expect(results).toEqual([{ symbol: 'AAPL', name: 'APPLE INC', type: 'Common Stock', source: 'finnhub' }])
	})

	it('refuses a capability it does not implement', async () => {
		const provider = createFinnhubProvider({ apiKey: 'test-secret', fetch: jsonFetch({}) })
		await expect(provider.invoke('history', { symbol: 'AAPL' }, invoke)).rejects.toThrow(
			ProviderUnavailableError,
		)
	})
})

describe('alpha vantage provider', () => {
	const bar = (close: string) => ({
		'1. open': '10',
		'2. high': '12',
		'3. low': '9',
		'4. close': close,
		'5. volume': '1000',
	})

	it('maps a global quote', async () => {
		const fetch = jsonFetch({
			'Global Quote': {
				'01. symbol': 'IBM',
				'02. open': '180.00',
				'03. high': '182.50',
				'04. low': '179.10',
				'05. price': '181.25',
				'06. volume': '3000000',
				'08. previous close': '180.35',
				'09. change': '0.90',
				'10. change percent': '0.4990%',
			},
		})
		const provider = createAlphaVantageProvider({ apiKey: 'test-secret', fetch })

		const quote = await provider.invoke('quote', { symbol: 'ibm' }, invoke)
		expect(quote).toEqual({
			symbol: 'IBM',
			price: 181.25,
			change: 0.9,
			changePercent: 0.499,
			volume: 3000000,
			open: 180,
			previousClose: 180.35,
			dayHigh: 182.5,
			dayLow: 179.1,
			source: 'alphavantage',
		})
		expect(fetch.mock.calls[0][0]).toBe(
			'https://www.alphavantage.co/query?function=GLOBAL_QUOTE&symbol=IBM&apikey=test-secret',
		)
	})

	it('reads the quota note as upstream throttling', async () => {
		const provider = createAlphaVantageProvider({
			apiKey: 'test-secret',
			fetch: jsonFetch({ Note: 'Thank you for using Alpha Vantage! Our standard API rate limit is...' }),
		})
		await expect(provider.invoke('quote', { symbol: 'IBM' }, invoke)).rejects.toThrow(RateLimitedError)
	})

	it('reads an error envelope as an invalid response', async () => {
		const provider = createAlphaVantageProvider({
			apiKey: 'test-secret',
			fetch: jsonFetch({ 'Error Message': 'Invalid API call.' }),
		})
		await expect(provider.invoke('profile', { symbol: 'IBM' }, invoke)).rejects.toThrow(
			'[alphavantage] Invalid API call.',
		)
	})

	it('returns the newest bars first, trimmed to the requested days', async () => {
		const provider = createAlphaVantageProvider({
			apiKey: 'test-secret',
			fetch: jsonFetch({
				'Time Series (Daily)': {
					'2024-01-02': bar('10.5'),
					'2024-01-04': bar('11.5'),
					'2024-01-03': bar('11'),
				},
			}),
		})
		const rows = await provider.invoke('history', { symbol: 'IBM', days: 2 }, invoke)
		expect(rows.map((r) => [r.date, r.close])).toEqual([
			['2024-01-04', 11.5],
			['2024-01-03', 11],
		])
	})
})

describe('yahoo provider', () => {
	it('needs no key', () => {
		const provider = createYahooProvider({ client: fakeYahoo({}) })
		expect(provider.isEnabled()).toBe(true)
		expect(provider.describe().capabilities).toEqual(['quote', 'profile', 'history', 'search'])
	})

	it('maps a quote', async () => {
		const provider = createYahooProvider({
			client: fakeYahoo({
				quote: async () => ({
					symbol: 'AAPL',
					regularMarketPrice: 190,
					regularMarketChange: -1,
					regularMarketChangePercent: -0.5,
					regularMarketVolume: 1000,
					marketCap: 3e12,
					fiftyTwoWeekHigh: 200,
					fiftyTwoWeekLow: 150,
					quoteType: 'EQUITY',
				}),
			}),
		})
		expect(await provider.invoke('quote', { symbol: 'AAPL' }, invoke)).toEqual({
			symbol: 'AAPL',
			price: 190,
			change: -1,
			changePercent: -0.5,
			volume: 1000,
			marketCap: 3e12,
			high52w: 200,
			low52w: 150,
			source: 'yahoo',
		})
	})

	it('rejects a quote without a price', async () => {
		const provider = createYahooProvider({ client: fakeYahoo({ quote: async () => ({ symbol: 'AAPL' }) }) })
		await expect(provider.invoke('quote', { symbol: 'AAPL' }, invoke)).rejects.toThrow(InvalidResponseError)
	})

	it('wraps client failures as unavailability', async () => {
		const provider = createYahooProvider({
			client: fakeYahoo({
				quote: async () => {
					throw new Error('boom')
				},
			}),
		})
		await expect(provider.invoke('quote', { symbol: 'AAPL' }, invoke)).rejects.toThrow(
			'[yahoo] quote failed: boom',
		)
	})

	it('maps a profile from asset profile and price modules', async () => {
		const provider = createYahooProvider({
			client: fakeYahoo({
				profile: async () => ({
					price: { symbol: 'AAPL', longName: 'Apple Inc.', currency: 'USD', exchangeName: 'NasdaqGS', marketCap: 3e12 },
					assetProfile: { sector: 'Technology', industry: 'Consumer Electronics', fullTimeEmployees: 150000 },
				}),
			}),
		})
		expect(await provider.invoke('profile', { symbol: 'AAPL' }, invoke)).toEqual({
			symbol: 'AAPL',
			name: 'Apple Inc.',
			exchange: 'NasdaqGS',
			currency: 'USD',
			sector: 'Technology',
			industry: 'Consumer Electronics',
			employees: 150000,
			marketCap: 3e12,
			source: 'yahoo',
		})
	})

	it('drops empty history rows', async () => {
		const chart = vi.fn<YahooClient['chart']>(async () => ({
			quotes: [
				{ date: new Date('2024-01-02T14:30:00Z'), open: 1, high: 2, low: 0.5, close: 1.5, adjclose: 1.4, volume: 100 },
				{ date: new Date('2024-01-03T14:30:00Z'), open: null, high: null, low: null, close: null, volume: null },
			],
		}))
		const provider = createYahooProvider({ client: fakeYahoo({ chart }) })

		const rows = await provider.invoke('history', { symbol: 'AAPL', days: 5 }, invoke)
		expect(rows).toEqual([{ date: '2024-01-02', open: 1, high: 2, low: 0.5, close: 1.5, adjClose: 1.4, volume: 100 }])
		expect(chart.mock.calls[0][0]).toBe('AAPL')
	})

	it('keeps only Yahoo Finance search hits', async () => {
		const provider = createYahooProvider({
			client: fakeYahoo({
				search: async () => ({
					quotes: [
						{ symbol: 'AAPL', isYahooFinance: true, shortname: 'Apple Inc.', exchDisp: 'NASDAQ', quoteType: 'EQUITY' },
						{ isYahooFinance: false },
					],
				}),
			}),
		})
		expect(await provider.invoke('search', { query: 'apple' }, invoke)).toEqual([
			{ symbol: 'AAPL', name: 'Apple Inc.', exchange: 'NASDAQ', type: 'EQUITY', source: 'yahoo' },
		])
	})
})

describe('market insight', () => {
	const answer = {
		summary: 'Momentum is positive.',
		sentiment: 'bullish',
		confidence: 0.7,
		keyPoints: ['Earnings beat'],
	}

	it('builds the prompt from symbols, horizon and question', () => {
		expect(buildInsightPrompt({ symbols: ['aapl', 'msft'], question: 'Is it overbought?' })).toBe(
			'Symbols: AAPL, MSFT\nHorizon: the next few days to weeks\nQuestion: Is it overbought?',
		)
		expect(buildInsightPrompt({ symbols: ['nvda'], horizon: 'intraday' })).toBe(
			'Symbols: NVDA\nHorizon: the current trading session\nGive a short outlook for these symbols.',
		)
	})

	it('accepts JSON wrapped in a code fence', () => {
		const text = `\`\`\`json\n${JSON.stringify(answer)}\n\`\`\``
		expect(parseInsight('anthropic', 'm', { symbols: ['aapl'] }, text)).toEqual({
			symbols: ['AAPL'],
			summary: 'Momentum is positive.',
			sentiment: 'bullish',
			confidence: 0.7,
			keyPoints: ['Earnings beat'],
			risks: [],
			model: 'm',
			source: 'anthropic',
		})
	})

	it('rejects out-of-range confidence', () => {
		const text = JSON.stringify({ ...answer, confidence: 1.5 })
		expect(() => parseInsight('openai', 'm', { symbols: ['aapl'] }, text)).toThrow(InvalidResponseError)
	})

	it('asks the OpenAI model with the shared prompt', async () => {
		const complete = vi.fn<CompletionFn>(async () => JSON.stringify(answer))
		const provider = createOpenAIProvider({ apiKey: 'test-secret', complete })

		const insight = await provider.invoke('market-insight', { symbols: ['aapl'] }, invoke)
		expect(insight.model).toBe('gpt-4o')
		expect(insight.source).toBe('openai')
		expect(complete).toHaveBeenCalledWith(
			{
				model: 'gpt-4o',
				system: INSIGHT_SYSTEM_PROMPT,
				prompt: 'Symbols: AAPL\nHorizon: the next few days to weeks\nGive a short outlook for these symbols.',
				maxTokens: 1024,
			},
			invoke,
		)
	})

	it('reports prose from the Anthropic model as an invalid response', async () => {
		const provider = createAnthropicProvider({
			apiKey: 'test-secret',
			model: 'claude-test',
			complete: async () => 'I think the stock looks good.',
		})
		await expect(provider.invoke('market-insight', { symbols: ['aapl'] }, invoke)).rejects.toThrow(
			'[anthropic] Model did not answer with JSON',
		)
	})

	it('is disabled without a key', () => {
		expect(createOpenAIProvider().isEnabled()).toBe(false)
		expect(createAnthropicProvider().describe().keyEnvVar).toBe('ANTHROPIC_API_KEY')
	})
})
