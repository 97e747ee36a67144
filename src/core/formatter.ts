import type { OutputFormat } from '../types.js'

export type Cell = string | number | undefined | null

export function formatTable(headers: string[], rows: Cell[][], format: OutputFormat): string {
	if (format === 'json') {
		const records = rows.map((row) =>
			Object.fromEntries(headers.map((header, i) => [header, row[i] ?? null])),
		)
		return JSON.stringify(records, null, 2)
	}

	const text = (v: Cell): string => (v == null ? '' : String(v))

	if (format === 'plain') {
		return [headers, ...rows].map((row) => row.map(text).join('\t')).join('\n')
	}

	const widths = headers.map((header, i) =>
		rows.reduce((max, row) => Math.max(max, text(row[i]).length), header.length),
	)
	const line = (cells: Cell[]): string =>
		`| ${widths.map((w, i) => text(cells[i]).padEnd(w)).join(' | ')} |`

	return [line(headers), `| ${widths.map((w) => '-'.repeat(w)).join(' | ')} |`, ...rows.map(line)].join(
		'\n',
	)
}

export function formatKeyValue(data: Record<string, Cell>, format: OutputFormat): string {
	if (format === 'json') return JSON.stringify(data, null, 2)

	const entries = Object.entries(data).filter(([, v]) => v != null)
	if (format === 'plain') {
		return entries.map(([k, v]) => `${k}\t${String(v)}`).join('\n')
	}

	const keyWidth = entries.reduce((max, [k]) => Math.max(max, k.length), 0)
	return entries.map(([k, v]) => `**${k.padEnd(keyWidth)}**: ${String(v)}`).join('\n')
}

export function formatList(title: string, items: string[], format: OutputFormat): string {
	if (format === 'json') return JSON.stringify({ [title]: items }, null, 2)
	if (format === 'plain') return items.map((item) => `${title}\t${item}`).join('\n')
	return [`**${title}**`, ...items.map((item) => `- ${item}`)].join('\n')
}

export function formatNumber(n: number, decimals = 2): string {
	const abs = Math.abs(n)
	if (abs >= 1e12) return `${(n / 1e12).toFixed(decimals)}T`
	if (abs >= 1e9) return `${(n / 1e9).toFixed(decimals)}B`
	if (abs >= 1e6) return `${(n / 1e6).toFixed(decimals)}M`
	if (abs >= 1e3) return `${(n / 1e3).toFixed(decimals)}K`
	return n.toFixed(decimals)
}

export function formatCurrency(n: number, currency = 'USD'): string {
	return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(n)
}

export function formatPercent(n: number): string {
	return `${n >= 0 ? '+' : ''}${n.toFixed(2)}%`
}

/** `850ms`, `1.5s`, `2m 5s` */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`
	if (ms < 60_000) return `${Number((ms / 1000).toFixed(1))}s`
	const minutes = Math.floor(ms / 60_000)
	const seconds = Math.round((ms % 60_000) / 1000)
	return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`
}

export function formatTimestamp(epochMs: number | undefined): string | undefined {
	return epochMs === undefined ? undefined : new Date(epochMs).toISOString()
}

export function formatSource(result: { source: string; cached: boolean }): string {
	return result.cached ? `${result.source} (cached)` : result.source
}

/** Keep the last four characters of a secret. */
export function maskSecret(value: string | undefined): string | undefined {
	if (!value) return undefined
	return value.length <= 4 ? '****' : `****${value.slice(-4)}`
}
