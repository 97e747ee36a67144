import type { Command } from 'commander'
import { formatDuration, formatKeyValue, formatTable } from '../core/formatter.js'
import type { CommandContext } from './context.js'

export function registerStatusCommand(program: Command, ctx: CommandContext): void {
	program
		.command('status')
		.description('Show providers, circuit state and rate-limit headroom')
		.action(() => {
			const opts = ctx.options()
			const { dispatcher, registry } = ctx.runtime()
			const statuses = dispatcher.status()

			if (opts.format === 'json') {
				console.log(JSON.stringify({ providers: statuses, stats: dispatcher.stats() }, null, 2))
				return
			}

			const rows = statuses.map((s) => [
				s.name,
				s.enabled ? 'enabled' : 'disabled',
				s.phase,
				s.capabilities.map((c) => `${c}:${registry.priorityOf(c, s.name) ?? '-'}`).join(', '),
				`${s.rateLimitRemaining}/${s.rateLimitCapacity}`,
				`${s.successRate.toFixed(0)}%`,
				s.averageResponseMs > 0 ? formatDuration(s.averageResponseMs) : '',
			])
			console.log(
				formatTable(
					['Source', 'Status', 'Circuit', 'Capabilities', 'Remaining', 'Success', 'Avg'],
					rows,
					opts.format,
				),
			)

			if (opts.verbose) {
				const stats = dispatcher.stats()
				console.log('')
				console.log(
					formatKeyValue(
						{
							Dispatches: stats.dispatches,
							'Cache hits': stats.cacheHits,
							Failovers: stats.failovers,
							Exhausted: stats.exhausted,
							'Deadline exceeded': stats.deadlineExceeded,
						},
						opts.format,
					),
				)
			}
		})
}
