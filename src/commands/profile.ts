import type { Command } from 'commander'
import { formatKeyValue, formatNumber, formatSource } from '../core/formatter.js'
import { type CommandContext, dispatchOptions } from './context.js'

export function registerProfileCommand(program: Command, ctx: CommandContext): void {
	program
		.command('profile <symbol>')
		.description('Get a company profile')
		.action(async (symbol: string) => {
			const opts = ctx.options()
			const result = await ctx.runtime().dispatcher.dispatch('profile', { symbol }, dispatchOptions(opts))
			const p = result.data

			console.log(
				formatKeyValue(
					{
						Symbol: p.symbol,
						Name: p.name,
						Exchange: p.exchange,
						Sector: p.sector,
						Industry: p.industry,
						Country: p.country,
						Employees: p.employees ? formatNumber(p.employees, 0) : undefined,
						'Market Cap': p.marketCap ? formatNumber(p.marketCap) : undefined,
						Website: p.website,
						Source: formatSource(result),
					},
					opts.format,
				),
			)
			if (p.description && opts.format === 'markdown') {
				console.log(`\n${p.description}`)
			}
		})
}
