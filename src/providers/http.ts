import type { z } from 'zod'
import {
	InvalidResponseError,
	ProviderTimeoutError,
	ProviderUnavailableError,
	RateLimitedError,
	errorMessage,
} from '../core/errors.js'
import type { InvokeOptions } from './types.js'

export type FetchFn = typeof fetch

export function parseRetryAfter(header: string | null): number | undefined {
	if (!header) return undefined
	const seconds = Number(header)
	return Number.isFinite(seconds) ? seconds * 1000 : undefined
}

/**
 * GET a JSON document and map transport problems onto provider error kinds:
 * 429 is throttling, any other non-2xx or network failure is unavailability,
 * an unparseable body is an invalid response.
 */
export async function fetchJson(
	source: string,
	url: string,
	options: InvokeOptions,
	fetchImpl: FetchFn = fetch,
): Promise<unknown> {
	let res: Response
	try {
		res = await fetchImpl(url, { signal: options.signal, headers: { accept: 'application/json' } })
	} catch (err) {
		if (err instanceof Error && err.name === 'AbortError') {
			throw new ProviderTimeoutError(source, options.timeoutMs, err)
		}
		throw new ProviderUnavailableError(source, `Request failed: ${errorMessage(err)}`, undefined, err)
	}

	if (res.status === 429) {
		throw new RateLimitedError(source, 'provider', parseRetryAfter(res.headers.get('retry-after')))
	}
	if (!res.ok) {
		const body = await res.text()
		throw new ProviderUnavailableError(source, `API error ${res.status}: ${body.slice(0, 200)}`, res.status)
	}

	const text = await res.text()
	try {
		return JSON.parse(text)
	} catch (err) {
		throw new InvalidResponseError(source, 'Response body is not JSON', [], err)
	}
}

export function parseWith<S extends z.ZodTypeAny>(
	source: string,
	schema: S,
	data: unknown,
	what: string,
): z.output<S> {
	const result = schema.safeParse(data)
	if (!result.success) {
		const issues = result.error.issues.map(
			(i: z.ZodIssue) => `${i.path.join('.') || '(root)'}: ${i.message}`,
		)
		throw new InvalidResponseError(source, `Unexpected ${what} payload`, issues)
	}
	return result.data
}

export function toNum(v: unknown): number | undefined {
	if (v == null || v === '' || v === 'None') return undefined
	const n = typeof v === 'number' ? v : Number(v)
	return Number.isNaN(n) ? undefined : n
}

export function toDateString(v: Date | number | string): string {
	if (v instanceof Date) return v.toISOString().split('T')[0]
	if (typeof v === 'number') return new Date(v * 1000).toISOString().split('T')[0]
	return v.includes('T') ? v.split('T')[0] : v
}
