/**
 * Error taxonomy for the orchestration layer.
 *
 * Every error carries a machine-readable `code`, a structured `data` payload
 * and the time it was raised. Provider-scoped failures additionally carry the
 * provider name and a normalized `kind`, which is what the dispatcher uses to
 * decide whether a failure counts against the provider's health.
 */

export type FailureKind =
	| 'rate-limited'
	| 'circuit-open'
	| 'timeout'
	| 'unavailable'
	| 'invalid-response'

export class FinrelayError extends Error {
	readonly code: string
	readonly data: Record<string, unknown>
	readonly timestamp: string

	constructor(code: string, message: string, data: Record<string, unknown> = {}, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause })
		this.name = 'FinrelayError'
		this.code = code
		this.data = data
		this.timestamp = new Date().toISOString()
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			data: this.data,
			timestamp: this.timestamp,
		}
	}
}

export abstract class ProviderError extends FinrelayError {
	abstract readonly kind: FailureKind
	readonly provider: string

	constructor(
		code: string,
		provider: string,
		message: string,
		data: Record<string, unknown> = {},
		cause?: unknown,
	) {
		super(code, `[${provider}] ${message}`, { provider, ...data }, cause)
		this.provider = provider
	}
}

export class RateLimitedError extends ProviderError {
	readonly kind = 'rate-limited'
	/** `local` when our own token bucket refused, `provider` when the vendor throttled us. */
	readonly origin: 'local' | 'provider'
	readonly retryAfterMs?: number

	constructor(
		provider: string,
		origin: 'local' | 'provider',
		retryAfterMs?: number,
		cause?: unknown,
	) {
		super(
			'RATE_LIMITED',
			provider,
			origin === 'local' ? 'Rate limit exceeded' : 'Rate limited by upstream',
			{ origin, retryAfterMs },
			cause,
		)
		this.name = 'RateLimitedError'
		this.origin = origin
		this.retryAfterMs = retryAfterMs
	}
}

export class CircuitOpenError extends ProviderError {
	readonly kind = 'circuit-open'
	readonly openUntil: number

	constructor(provider: string, openUntil: number) {
		super('CIRCUIT_OPEN', provider, `Circuit open until ${new Date(openUntil).toISOString()}`, {
			openUntil,
		})
		this.name = 'CircuitOpenError'
		this.openUntil = openUntil
	}
}

export class ProviderTimeoutError extends ProviderError {
	readonly kind = 'timeout'
	readonly timeoutMs: number

	constructor(provider: string, timeoutMs: number, cause?: unknown) {
		super('PROVIDER_TIMEOUT', provider, `Timed out after ${timeoutMs}ms`, { timeoutMs }, cause)
		this.name = 'ProviderTimeoutError'
		this.timeoutMs = timeoutMs
	}
}

export class ProviderUnavailableError extends ProviderError {
	readonly kind = 'unavailable'
	readonly statusCode?: number

	constructor(provider: string, message: string, statusCode?: number, cause?: unknown) {
		super('PROVIDER_UNAVAILABLE', provider, message, { statusCode }, cause)
		this.name = 'ProviderUnavailableError'
		this.statusCode = statusCode
	}
}

export class InvalidResponseError extends ProviderError {
	readonly kind = 'invalid-response'

	constructor(provider: string, message: string, issues: string[] = [], cause?: unknown) {
		super('INVALID_RESPONSE', provider, message, { issues }, cause)
		this.name = 'InvalidResponseError'
	}
}

export interface CandidateFailure {
	provider: string
	kind: FailureKind
	message: string
	error: ProviderError
}

function describeFailures(failures: readonly CandidateFailure[]): string {
	return failures.map((f) => `${f.provider}: ${f.kind} (${f.message})`).join('; ')
}

export class AllProvidersExhaustedError extends FinrelayError {
	readonly capability: string
	readonly failures: readonly CandidateFailure[]

	constructor(capability: string, failures: readonly CandidateFailure[]) {
		const tried = failures.map((f) => f.provider).join(', ')
		super(
			'ALL_PROVIDERS_EXHAUSTED',
			`All providers failed for ${capability} (tried: ${tried}): ${describeFailures(failures)}`,
			{ capability, failures: failures.map(({ provider, kind, message }) => ({ provider, kind, message })) },
		)
		this.name = 'AllProvidersExhaustedError'
		this.capability = capability
		this.failures = failures
	}
}

export class DeadlineExceededError extends FinrelayError {
	readonly capability: string
	readonly deadlineMs: number
	readonly failures: readonly CandidateFailure[]

	constructor(capability: string, deadlineMs: number, failures: readonly CandidateFailure[]) {
		super('DEADLINE_EXCEEDED', `Deadline of ${deadlineMs}ms exceeded for ${capability}`, {
			capability,
			deadlineMs,
			failures: failures.map(({ provider, kind, message }) => ({ provider, kind, message })),
		})
		this.name = 'DeadlineExceededError'
		this.capability = capability
		this.deadlineMs = deadlineMs
		this.failures = failures
	}
}

export class InvalidDeadlineError extends FinrelayError {
	constructor(deadlineMs: number) {
		super('INVALID_DEADLINE', `Deadline must be a finite number of milliseconds, got ${deadlineMs}`, {
			deadlineMs,
		})
		this.name = 'InvalidDeadlineError'
	}
}

export class UnknownCapabilityError extends FinrelayError {
	constructor(capability: string) {
		super('UNKNOWN_CAPABILITY', `No providers registered for capability "${capability}"`, {
			capability,
		})
		this.name = 'UnknownCapabilityError'
	}
}

export class UnknownProviderError extends FinrelayError {
	constructor(source: string, capability: string) {
		super('UNKNOWN_PROVIDER', `Source "${source}" not available for capability "${capability}"`, {
			source,
			capability,
		})
		this.name = 'UnknownProviderError'
	}
}

export class RegistryError extends FinrelayError {
	constructor(message: string, data: Record<string, unknown> = {}) {
		super('REGISTRY_ERROR', message, data)
		this.name = 'RegistryError'
	}
}

export class ConfigError extends FinrelayError {
	constructor(message: string, issues: string[] = []) {
		super('CONFIG_ERROR', message, { issues })
		this.name = 'ConfigError'
	}
}

export function toCandidateFailure(error: ProviderError): CandidateFailure {
	return { provider: error.provider, kind: error.kind, message: error.message, error }
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
