import type { Command } from 'commander'
import type { DispatchResult } from '../core/dispatcher.js'
import { errorMessage } from '../core/errors.js'
import {
	type Cell,
	formatCurrency,
	formatKeyValue,
	formatNumber,
	formatPercent,
	formatSource,
	formatTable,
} from '../core/formatter.js'
import type { QuoteResult } from '../types.js'
import { type CommandContext, dispatchOptions } from './context.js'

type QuoteOutcome = PromiseSettledResult<DispatchResult<QuoteResult>>

/** One row per requested symbol; a symbol no source could answer says why. */
export function quoteRows(symbols: string[], outcomes: QuoteOutcome[]): Cell[][] {
	return outcomes.map((outcome, i) => {
		if (outcome.status === 'rejected') {
			return [symbols[i], '', '', '', '', `failed: ${errorMessage(outcome.reason)}`]
		}
		const { data: q } = outcome.value
		return [
			q.symbol,
			formatCurrency(q.price),
			formatPercent(q.changePercent),
			q.volume ? formatNumber(q.volume, 0) : '',
			q.marketCap ? formatNumber(q.marketCap) : '',
			formatSource(outcome.value),
		]
	})
}

export function registerQuoteCommand(program: Command, ctx: CommandContext): void {
	program
		.command('quote <symbols...>')
		.description('Get stock quotes, failing over between sources')
		.action(async (symbols: string[]) => {
			const opts = ctx.options()
			const { dispatcher } = ctx.runtime()
			const outcomes = await Promise.allSettled(
				symbols.map((symbol) => dispatcher.dispatch('quote', { symbol }, dispatchOptions(opts))),
			)

			if (outcomes.length === 1) {
				const [outcome] = outcomes
				if (outcome.status === 'rejected') throw outcome.reason
				const result = outcome.value
				const q = result.data
				console.log(
					formatKeyValue(
						{
							Symbol: q.symbol,
							Price: formatCurrency(q.price),
							Change: `${formatCurrency(q.change)} (${formatPercent(q.changePercent)})`,
							Volume: q.volume ? formatNumber(q.volume, 0) : undefined,
							'Market Cap': q.marketCap ? formatNumber(q.marketCap) : undefined,
							'Day Range':
								q.dayLow && q.dayHigh
									? `${formatCurrency(q.dayLow)} to ${formatCurrency(q.dayHigh)}`
									: undefined,
							'52w Range':
								q.low52w && q.high52w
									? `${formatCurrency(q.low52w)} to ${formatCurrency(q.high52w)}`
									: undefined,
							Open: q.open ? formatCurrency(q.open) : undefined,
							'Prev Close': q.previousClose ? formatCurrency(q.previousClose) : undefined,
							Source: formatSource(result),
						},
						opts.format,
					),
				)
				return
			}

			const rows = quoteRows(symbols, outcomes)
			console.log(
				formatTable(['Symbol', 'Price', 'Change', 'Volume', 'Mkt Cap', 'Source'], rows, opts.format),
			)
			if (outcomes.some((o) => o.status === 'rejected')) process.exitCode = 1
		})
}
