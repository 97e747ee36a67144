import { type Command, Option } from 'commander'
import { formatKeyValue, formatList, formatSource } from '../core/formatter.js'
import type { CapabilityParams } from '../providers/types.js'
import { type CommandContext, dispatchOptions } from './context.js'

type Horizon = NonNullable<CapabilityParams['market-insight']['horizon']>

export function registerInsightCommand(program: Command, ctx: CommandContext): void {
	program
		.command('insight <symbols...>')
		.description('Ask an LLM provider for a short market outlook')
		.option('-q, --question <text>', 'specific question to answer')
		.addOption(
			new Option('--horizon <horizon>', 'outlook horizon')
				.choices(['intraday', 'swing', 'long-term'])
				.default('swing'),
		)
		.action(async (symbols: string[], cmdOpts: { question?: string; horizon: Horizon }) => {
			const opts = ctx.options()
			const result = await ctx
				.runtime()
				.dispatcher.dispatch(
					'market-insight',
					{ symbols, question: cmdOpts.question, horizon: cmdOpts.horizon },
					dispatchOptions(opts),
				)
			const insight = result.data

			if (opts.format === 'json') {
				console.log(JSON.stringify({ ...insight, cached: result.cached }, null, 2))
				return
			}

			console.log(
				formatKeyValue(
					{
						Symbols: insight.symbols.join(', '),
						Sentiment: insight.sentiment,
						Confidence: `${Math.round(insight.confidence * 100)}%`,
						Model: insight.model,
						Source: formatSource(result),
					},
					opts.format,
				),
			)
			console.log(`\n${insight.summary}\n`)
			if (insight.keyPoints.length > 0) console.log(formatList('Key points', insight.keyPoints, opts.format))
			if (insight.risks.length > 0) console.log(formatList('Risks', insight.risks, opts.format))
		})
}
