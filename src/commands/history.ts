import type { Command } from 'commander'
import { formatCurrency, formatNumber, formatSource, formatTable } from '../core/formatter.js'
import { type CommandContext, dispatchOptions, parsePositiveInt } from './context.js'

export function registerHistoryCommand(program: Command, ctx: CommandContext): void {
	program
		.command('history <symbol>')
		.description('Get daily price history (OHLCV)')
		.option('-d, --days <n>', 'number of days', parsePositiveInt, 30)
		.action(async (symbol: string, cmdOpts: { days: number }) => {
			const opts = ctx.options()
			const result = await ctx
				.runtime()
				.dispatcher.dispatch('history', { symbol, days: cmdOpts.days }, dispatchOptions(opts))

			const rows = result.data.map((h) => [
				h.date,
				formatCurrency(h.open),
				formatCurrency(h.high),
				formatCurrency(h.low),
				formatCurrency(h.close),
				formatNumber(h.volume, 0),
			])

			console.log(formatTable(['Date', 'Open', 'High', 'Low', 'Close', 'Volume'], rows, opts.format))
			if (opts.format !== 'json') console.log(`\nSource: ${formatSource(result)}`)
		})
}
