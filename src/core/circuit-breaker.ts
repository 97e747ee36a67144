import type { Logger } from './logger.js'

/**
 * Per-provider health bookkeeping and circuit breaker.
 *
 *   closed:    calls flow; failures are counted
 *   open:      calls rejected locally until `openUntil`
 *   half-open: a single trial call decides between closed and open
 *
 * The backoff grows with every consecutive opening and is reset only by a
 * successful half-open trial. Outcomes are reported with the permit that
 * `tryAcquire` handed out: calls admitted before the circuit half-opened
 * still update the statistics but never decide the trial.
 */

export type CircuitPhase = 'closed' | 'open' | 'half-open'

export interface CircuitBreakerPolicy {
	/** Consecutive failures that open the circuit. */
	failureThreshold: number
	/** A failure further than this from the previous one restarts the count. */
	windowMs: number
	baseBackoffMs: number
	backoffMultiplier: number
	maxBackoffMs: number
}

export const DEFAULT_BREAKER_POLICY: CircuitBreakerPolicy = {
	failureThreshold: 3,
	windowMs: 10_000,
	baseBackoffMs: 1_000,
	backoffMultiplier: 2,
	maxBackoffMs: 60_000,
}

/** Admission to call a provider, as handed out by `tryAcquire`. */
export interface CircuitPermit {
	readonly provider: string
	/** Set only on the half-open trial call. */
	readonly trial?: number
}

interface HealthState {
	phase: CircuitPhase
	consecutiveFailures: number
	consecutiveOpens: number
	lastSuccessAt?: number
	lastFailureAt?: number
	openUntil?: number
	/** Id of the half-open trial in flight. */
	trial?: number
	totalRequests: number
	successfulRequests: number
	failedRequests: number
	averageResponseMs: number
}

export interface HealthSnapshot {
	provider: string
	phase: CircuitPhase
	consecutiveFailures: number
	consecutiveOpens: number
	lastSuccessAt?: number
	lastFailureAt?: number
	openUntil?: number
	trialInFlight: boolean
	totalRequests: number
	successfulRequests: number
	failedRequests: number
	averageResponseMs: number
	successRate: number
}

export class HealthMonitor {
	private readonly states = new Map<string, HealthState>()
	private readonly policy: CircuitBreakerPolicy
	private readonly now: () => number
	private readonly logger?: Logger
	private trials = 0

	constructor(
		policy: Partial<CircuitBreakerPolicy> = {},
		options: { now?: () => number; logger?: Logger } = {},
	) {
		this.policy = { ...DEFAULT_BREAKER_POLICY, ...policy }
		this.policy.failureThreshold = Math.max(1, this.policy.failureThreshold)
		this.now = options.now ?? (() => Date.now())
		this.logger = options.logger
	}

	/** Current phase, promoting an expired `open` circuit to `half-open`. */
	phase(provider: string): CircuitPhase {
		return this.advance(this.state(provider)).phase
	}

	/** Read-only check: would a call be admitted right now? */
	canAttempt(provider: string): boolean {
		const state = this.advance(this.state(provider))
		if (state.phase === 'closed') return true
		if (state.phase === 'half-open') return state.trial === undefined
		return false
	}

	/**
	 * Claim permission for one call. In `half-open` only the first caller
	 * gets the trial permit; everyone else is refused until it reports back.
	 */
	tryAcquire(provider: string): CircuitPermit | undefined {
		const state = this.advance(this.state(provider))
		if (state.phase === 'closed') return { provider }
		if (state.phase === 'open' || state.trial !== undefined) return undefined
		state.trial = ++this.trials
		this.logger?.debug('Half-open trial admitted', { provider, trial: state.trial })
		return { provider, trial: state.trial }
	}

	/** Give back a permit without a verdict. Frees the trial slot if it held it. */
	release(permit: CircuitPermit): void {
		const state = this.states.get(permit.provider)
		if (state && this.holdsTrial(state, permit)) state.trial = undefined
	}

	/** A bare provider name reports an outcome that holds no trial. */
	recordSuccess(outcome: string | CircuitPermit, latencyMs?: number): void {
		const permit = toPermit(outcome)
		const state = this.advance(this.state(permit.provider))
		state.totalRequests++
		state.successfulRequests++
		if (latencyMs !== undefined) {
			state.averageResponseMs += (latencyMs - state.averageResponseMs) / state.successfulRequests
		}
		state.lastSuccessAt = this.now()

		if (state.phase === 'closed') {
			state.consecutiveFailures = 0
			return
		}
		// Only the trial closes the circuit; the clock alone moves an open one.
		if (!this.holdsTrial(state, permit)) return
		state.phase = 'closed'
		state.trial = undefined
		state.consecutiveFailures = 0
		state.consecutiveOpens = 0
		state.openUntil = undefined
		this.logger?.info('Circuit closed', { provider: permit.provider })
	}

	recordFailure(outcome: string | CircuitPermit): void {
		const permit = toPermit(outcome)
		const state = this.advance(this.state(permit.provider))
		const now = this.now()
		state.totalRequests++
		state.failedRequests++

		if (this.holdsTrial(state, permit)) {
			state.trial = undefined
			state.lastFailureAt = now
			state.consecutiveFailures++
			this.open(permit.provider, state, now)
			return
		}

		if (state.phase !== 'closed') {
			// A late result from a call admitted before the circuit opened.
			state.lastFailureAt = now
			return
		}

		const stale = state.lastFailureAt !== undefined && now - state.lastFailureAt > this.policy.windowMs
		state.consecutiveFailures = stale ? 1 : state.consecutiveFailures + 1
		state.lastFailureAt = now
		if (state.consecutiveFailures >= this.policy.failureThreshold) {
			this.open(permit.provider, state, now)
		}
	}

	backoffMs(consecutiveOpens: number): number {
		const { baseBackoffMs, backoffMultiplier, maxBackoffMs } = this.policy
		return Math.min(maxBackoffMs, baseBackoffMs * backoffMultiplier ** consecutiveOpens)
	}

	snapshot(provider: string): HealthSnapshot {
		const state = this.advance(this.state(provider))
		return {
			provider,
			phase: state.phase,
			consecutiveFailures: state.consecutiveFailures,
			consecutiveOpens: state.consecutiveOpens,
			lastSuccessAt: state.lastSuccessAt,
			lastFailureAt: state.lastFailureAt,
			openUntil: state.openUntil,
			trialInFlight: state.trial !== undefined,
			totalRequests: state.totalRequests,
			successfulRequests: state.successfulRequests,
			failedRequests: state.failedRequests,
			averageResponseMs: state.averageResponseMs,
			successRate:
				state.totalRequests === 0 ? 100 : (state.successfulRequests / state.totalRequests) * 100,
		}
	}

	reset(provider?: string): void {
		if (provider === undefined) this.states.clear()
		else this.states.delete(provider)
	}

	private open(provider: string, state: HealthState, now: number): void {
		const waitMs = this.backoffMs(state.consecutiveOpens)
		state.phase = 'open'
		state.openUntil = now + waitMs
		state.consecutiveOpens++
		this.logger?.info('Circuit opened', {
			provider,
			consecutiveFailures: state.consecutiveFailures,
			backoffMs: waitMs,
		})
	}

	private holdsTrial(state: HealthState, permit: CircuitPermit): boolean {
		return state.phase === 'half-open' && permit.trial !== undefined && permit.trial === state.trial
	}

	private advance(state: HealthState): HealthState {
		if (state.phase === 'open' && state.openUntil !== undefined && this.now() >= state.openUntil) {
			state.phase = 'half-open'
			state.trial = undefined
		}
		return state
	}

	private state(provider: string): HealthState {
		let state = this.states.get(provider)
		if (!state) {
			state = {
				phase: 'closed',
				consecutiveFailures: 0,
				consecutiveOpens: 0,
				totalRequests: 0,
				successfulRequests: 0,
				failedRequests: 0,
				averageResponseMs: 0,
			}
			this.states.set(provider, state)
		}
		return state
	}
}

function toPermit(outcome: string | CircuitPermit): CircuitPermit {
	return typeof outcome === 'string' ? { provider: outcome } : outcome
}
