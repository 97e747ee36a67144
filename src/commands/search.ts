import type { Command } from 'commander'
import { formatTable } from '../core/formatter.js'
import { type CommandContext, dispatchOptions, parsePositiveInt } from './context.js'

export function registerSearchCommand(program: Command, ctx: CommandContext): void {
	program
		.command('search <query>')
		.description('Search for companies and tickers')
		.option('-l, --limit <n>', 'maximum results', parsePositiveInt, 10)
		.action(async (query: string, cmdOpts: { limit: number }) => {
			const opts = ctx.options()
			const result = await ctx
				.runtime()
				.dispatcher.dispatch('search', { query, limit: cmdOpts.limit }, dispatchOptions(opts))

			const rows = result.data.map((r) => [r.symbol, r.name, r.exchange, r.type, r.source])
			console.log(formatTable(['Symbol', 'Name', 'Exchange', 'Type', 'Source'], rows, opts.format))
		})
}
