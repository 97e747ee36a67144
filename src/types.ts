export type OutputFormat = 'markdown' | 'json' | 'plain'

export interface GlobalOptions {
	format: OutputFormat
	verbose: boolean
	source?: string
	/** `false` under `--no-cache` */
	cache: boolean
	/** Milliseconds */
	deadline?: number
}

export interface QuoteResult {
	symbol: string
	price: number
	change: number
	changePercent: number
	volume?: number
	marketCap?: number
	high52w?: number
	low52w?: number
	open?: number
	previousClose?: number
	dayHigh?: number
	dayLow?: number
	source: string
}

export interface CompanyProfile {
	symbol: string
	name: string
	exchange?: string
	currency?: string
	sector?: string
	industry?: string
	country?: string
	website?: string
	employees?: number
	marketCap?: number
	description?: string
	source: string
}

export interface HistoricalQuote {
	date: string
	open: number
	high: number
	low: number
	close: number
	adjClose?: number
	volume: number
}

export interface SearchResult {
	symbol: string
	name: string
	exchange?: string
	type?: string
	source: string
}

export type Sentiment = 'bullish' | 'bearish' | 'neutral'

export interface MarketInsight {
	symbols: string[]
	summary: string
	sentiment: Sentiment
	confidence: number
	keyPoints: string[]
	risks: string[]
	model: string
	source: string
}
