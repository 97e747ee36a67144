import type {
	Capability,
	CapabilityParams,
	CapabilityResult,
	ProviderDescriptor,
	ProviderResult,
} from '../providers/types.js'
import { cacheKey, type ResponseCache } from './cache.js'
import type { CircuitPermit, CircuitPhase, HealthMonitor } from './circuit-breaker.js'
import {
	AllProvidersExhaustedError,
	type CandidateFailure,
	CircuitOpenError,
	DeadlineExceededError,
	InvalidDeadlineError,
	ProviderError,
	ProviderTimeoutError,
	ProviderUnavailableError,
	RateLimitedError,
	UnknownProviderError,
	errorMessage,
	toCandidateFailure,
} from './errors.js'
import type { Logger } from './logger.js'
import type { RateLimiter } from './rate-limiter.js'
import type { ProviderRegistry } from './registry.js'

export const DEFAULT_TTL_MS: Record<Capability, number> = {
	quote: 60_000, // 1 min
	profile: 3_600_000, // 1h
	history: 14_400_000, // 4h
	search: 900_000, // 15 min
	'market-insight': 1_800_000, // 30 min
}

export const DEFAULT_DEADLINE_MS = 30_000

export interface DispatchOptions {
	/** Budget for the whole dispatch, all candidates included. */
	deadlineMs?: number
	/** Caller cancellation; treated like a deadline that has passed. */
	signal?: AbortSignal
	noCache?: boolean
	/** Only try this provider. */
	source?: string
}

/** `data` is shared with the cache and frozen once cached. */
export interface DispatchResult<T> extends ProviderResult<T> {
	/** Candidates skipped or failed before the answer was obtained. */
	failures: CandidateFailure[]
}

export interface DispatcherStats {
	dispatches: number
	cacheHits: number
	failovers: number
	exhausted: number
	deadlineExceeded: number
}

export interface ProviderStatus {
	name: string
	vendor: string
	enabled: boolean
	capabilities: Capability[]
	phase: CircuitPhase
	consecutiveFailures: number
	lastSuccessAt?: number
	lastFailureAt?: number
	openUntil?: number
	rateLimitRemaining: number
	rateLimitCapacity: number
	successRate: number
	averageResponseMs: number
}

export interface DispatcherOptions {
	registry: ProviderRegistry
	health: HealthMonitor
	rateLimiter: RateLimiter
	cache: ResponseCache
	ttlMs?: Partial<Record<Capability, number>>
	defaultDeadlineMs?: number
	disabledSources?: Iterable<string>
	logger: Logger
	now?: () => number
}

type CallOutcome<T> =
	| { status: 'ok'; value: T }
	| { status: 'error'; error: unknown }
	| { status: 'timeout' }
	| { status: 'aborted' }

export class FailoverDispatcher {
	private readonly registry: ProviderRegistry
	private readonly health: HealthMonitor
	private readonly rateLimiter: RateLimiter
	private readonly cache: ResponseCache
	private readonly ttlMs: Record<Capability, number>
	private readonly defaultDeadlineMs: number
	private disabled: ReadonlySet<string>
	private readonly logger: Logger
	private readonly now: () => number
	private counters: DispatcherStats = emptyStats()

	constructor(options: DispatcherOptions) {
		this.registry = options.registry
		this.health = options.health
		this.rateLimiter = options.rateLimiter
		this.cache = options.cache
		this.ttlMs = { ...DEFAULT_TTL_MS, ...options.ttlMs }
		this.defaultDeadlineMs = options.defaultDeadlineMs ?? DEFAULT_DEADLINE_MS
		this.disabled = new Set(options.disabledSources ?? [])
		this.logger = options.logger
		this.now = options.now ?? (() => Date.now())
	}

	async dispatch<C extends Capability>(
		capability: C,
		params: CapabilityParams[C],
		options: DispatchOptions = {},
	): Promise<DispatchResult<CapabilityResult[C]>> {
		const deadlineMs = options.deadlineMs ?? this.defaultDeadlineMs
		if (!Number.isFinite(deadlineMs)) throw new InvalidDeadlineError(deadlineMs)

		this.counters.dispatches++
		const key = cacheKey(capability, params)

		if (!options.noCache) {
			const hit = this.cache.get<CapabilityResult[C]>(key)
			if (hit) {
				this.counters.cacheHits++
				this.logger.debug('Cache hit', { capability, key, provider: hit.provider })
				return { data: hit.value, source: hit.provider, cached: true, failures: [] }
			}
		}

		// Snapshot: a hot swap from here on affects the next dispatch only.
		let candidates = this.registry.candidates(capability)
		if (options.source !== undefined) {
			candidates = candidates.filter((d) => d.name === options.source)
			if (candidates.length === 0) throw new UnknownProviderError(options.source, capability)
		}

		const deadlineAt = this.now() + deadlineMs
		const failures: CandidateFailure[] = []

		for (const descriptor of candidates) {
			const { name } = descriptor
			if (options.signal?.aborted || this.now() >= deadlineAt) {
				throw this.deadlineExceeded(capability, deadlineMs, failures)
			}

			if (!descriptor.provider.isEnabled() || this.disabled.has(name)) {
				failures.push(toCandidateFailure(new ProviderUnavailableError(name, this.disabledReason(descriptor))))
				continue
			}

			const permit = this.health.tryAcquire(name)
			if (!permit) {
				const { openUntil } = this.health.snapshot(name)
				this.skip(failures, new CircuitOpenError(name, openUntil ?? this.now()))
				continue
			}

			if (!this.rateLimiter.tryAcquire(name, descriptor.rateLimit)) {
				this.health.release(permit)
				this.skip(failures, new RateLimitedError(name, 'local'))
				continue
			}

			const remaining = deadlineAt - this.now()
			const boundByDeadline = remaining <= descriptor.timeoutMs
			const budgetMs = Math.max(0, Math.min(descriptor.timeoutMs, remaining))
			const startedAt = this.now()
			const outcome = await this.invoke(descriptor, capability, params, budgetMs, options.signal)

			if (outcome.status === 'ok') {
				this.health.recordSuccess(permit, this.now() - startedAt)
				if (!options.noCache) this.cache.put(key, outcome.value, this.ttlMs[capability], name)
				if (failures.length > 0) {
					this.counters.failovers++
					this.logger.info('Failover succeeded', {
						capability,
						provider: name,
						skipped: failures.map((f) => f.provider),
					})
				}
				return { data: outcome.value, source: name, cached: false, failures }
			}

			if (outcome.status === 'aborted' || (outcome.status === 'timeout' && boundByDeadline)) {
				// The call was cut short by the caller, not by the provider misbehaving.
				this.health.release(permit)
				throw this.deadlineExceeded(capability, deadlineMs, failures)
			}

			const error =
				outcome.status === 'timeout'
					? new ProviderTimeoutError(name, budgetMs)
					: this.normalize(name, budgetMs, outcome.error)
			this.fail(capability, failures, error, permit)
		}

		this.counters.exhausted++
		this.logger.warn('All providers exhausted', {
			capability,
			failures: failures.map(({ provider, kind }) => `${provider}:${kind}`),
		})
		throw new AllProvidersExhaustedError(capability, failures)
	}

	/** Replace the set of sources skipped as disabled in config. */
	setDisabledSources(names: Iterable<string>): void {
		this.disabled = new Set(names)
	}

	invalidate<C extends Capability>(capability: C, params: CapabilityParams[C]): boolean {
		return this.cache.invalidate(cacheKey(capability, params))
	}

	status(): ProviderStatus[] {
		return this.registry.providers().map((descriptor) => {
			const health = this.health.snapshot(descriptor.name)
			const headroom = this.rateLimiter.headroom(descriptor.name, descriptor.rateLimit)
			return {
				name: descriptor.name,
				vendor: descriptor.provider.describe().vendor,
				enabled: descriptor.provider.isEnabled() && !this.disabled.has(descriptor.name),
				capabilities: [...descriptor.capabilities],
				phase: health.phase,
				consecutiveFailures: health.consecutiveFailures,
				lastSuccessAt: health.lastSuccessAt,
				lastFailureAt: health.lastFailureAt,
				openUntil: health.phase === 'open' ? health.openUntil : undefined,
				rateLimitRemaining: headroom.remaining,
				rateLimitCapacity: headroom.capacity,
				successRate: health.successRate,
				averageResponseMs: health.averageResponseMs,
			}
		})
	}

	stats(): DispatcherStats {
		return { ...this.counters }
	}

	resetStats(): void {
		this.counters = emptyStats()
		this.cache.resetStats()
	}

	private invoke<C extends Capability>(
		descriptor: ProviderDescriptor,
		capability: C,
		params: CapabilityParams[C],
		budgetMs: number,
		external?: AbortSignal,
	): Promise<CallOutcome<CapabilityResult[C]>> {
		const controller = new AbortController()
		const { name } = descriptor

		return new Promise((resolve) => {
			let settled = false
			const settle = (outcome: CallOutcome<CapabilityResult[C]>): void => {
				if (settled) return
				settled = true
				clearTimeout(timer)
				external?.removeEventListener('abort', onAbort)
				if (outcome.status === 'timeout' || outcome.status === 'aborted') controller.abort()
				resolve(outcome)
			}
			const onAbort = (): void => settle({ status: 'aborted' })
			const timer = setTimeout(() => settle({ status: 'timeout' }), budgetMs)
			external?.addEventListener('abort', onAbort, { once: true })

			let pending: Promise<CapabilityResult[C]>
			try {
				pending = descriptor.provider.invoke(capability, params, {
					timeoutMs: budgetMs,
					signal: controller.signal,
				})
			} catch (error) {
				settle({ status: 'error', error })
				return
			}

			void pending.then(
				(value) => {
					if (settled) this.logger.debug('Discarding late result', { provider: name, capability })
					settle({ status: 'ok', value })
				},
				(error: unknown) => {
					if (settled) {
						this.logger.debug('Discarding late failure', {
							provider: name,
							capability,
							error: errorMessage(error),
						})
					}
					settle({ status: 'error', error })
				},
			)
		})
	}

	private normalize(provider: string, budgetMs: number, error: unknown): ProviderError {
		if (error instanceof ProviderError) return error
		if (error instanceof Error && error.name === 'AbortError') {
			return new ProviderTimeoutError(provider, budgetMs, error)
		}
		return new ProviderUnavailableError(provider, errorMessage(error), undefined, error)
	}

	private skip(failures: CandidateFailure[], error: ProviderError): void {
		this.logger.debug('Skipping provider', { provider: error.provider, reason: error.kind })
		failures.push(toCandidateFailure(error))
	}

	private fail(
		capability: Capability,
		failures: CandidateFailure[],
		error: ProviderError,
		permit: CircuitPermit,
	): void {
		if (error instanceof RateLimitedError) {
			// Upstream throttling is not a health problem.
			this.health.release(permit)
		} else {
			this.health.recordFailure(permit)
		}

		const meta = { capability, provider: error.provider, kind: error.kind, error: error.message }
		if (error.kind === 'invalid-response') this.logger.warn('Provider returned an invalid response', meta)
		else this.logger.info('Provider call failed', meta)
		failures.push(toCandidateFailure(error))
	}

	private deadlineExceeded(
		capability: Capability,
		deadlineMs: number,
		failures: CandidateFailure[],
	): DeadlineExceededError {
		this.counters.deadlineExceeded++
		this.logger.warn('Deadline exceeded', { capability, deadlineMs, tried: failures.length })
		return new DeadlineExceededError(capability, deadlineMs, failures)
	}

	private disabledReason(descriptor: ProviderDescriptor): string {
		if (this.disabled.has(descriptor.name)) return 'Disabled in config'
		const { keyEnvVar } = descriptor.provider.describe()
		return keyEnvVar ? `Requires ${keyEnvVar}` : 'Disabled'
	}
}

function emptyStats(): DispatcherStats {
	return { dispatches: 0, cacheHits: 0, failovers: 0, exhausted: 0, deadlineExceeded: 0 }
}
