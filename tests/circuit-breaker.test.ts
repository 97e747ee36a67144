import { beforeEach, describe, expect, it } from 'vitest'
import { type CircuitPermit, HealthMonitor } from '../src/core/circuit-breaker.js'
import { silentLogger } from './helpers.js'

describe('health monitor', () => {
	let t: number
	let health: HealthMonitor

	beforeEach(() => {
		t = 0
		health = new HealthMonitor({}, { now: () => t, logger: silentLogger })
	})

	function failTimes(provider: string, n: number): void {
		for (let i = 0; i < n; i++) health.recordFailure(provider)
	}

	function acquire(provider: string): CircuitPermit {
		const permit = health.tryAcquire(provider)
		if (!permit) throw new Error(`${provider} refused`)
		return permit
	}

	it('opens after the failure threshold', () => {
		failTimes('a', 2)
		expect(health.phase('a')).toBe('closed')
		expect(health.snapshot('a').consecutiveFailures).toBe(2)

		health.recordFailure('a')
		const snap = health.snapshot('a')
		expect(snap.phase).toBe('open')
		expect(snap.openUntil).toBe(1000)
		expect(health.canAttempt('a')).toBe(false)
		expect(health.tryAcquire('a')).toBeUndefined()
	})

	it('restarts the count when failures are further apart than the window', () => {
		health.recordFailure('a')
		t = 5_000
		health.recordFailure('a')
		expect(health.snapshot('a').consecutiveFailures).toBe(2)
		t = 16_000
		health.recordFailure('a')
		expect(health.phase('a')).toBe('closed')
		expect(health.snapshot('a').consecutiveFailures).toBe(1)
	})

	it('a success resets the failure count', () => {
		failTimes('a', 2)
		health.recordSuccess('a')
		health.recordFailure('a')
		expect(health.phase('a')).toBe('closed')
		expect(health.snapshot('a').consecutiveFailures).toBe(1)
	})

	it('admits exactly one trial once the backoff elapses', () => {
		failTimes('a', 3)
		t = 999
		expect(health.phase('a')).toBe('open')
		t = 1000
		expect(health.phase('a')).toBe('half-open')
		const trial = acquire('a')
		expect(trial).toEqual({ provider: 'a', trial: 1 })
		expect(health.tryAcquire('a')).toBeUndefined()
		expect(health.canAttempt('a')).toBe(false)

		health.release(trial)
		expect(health.tryAcquire('a')).toEqual({ provider: 'a', trial: 2 })
	})

	it('hands out plain permits while closed', () => {
		expect(health.tryAcquire('a')).toEqual({ provider: 'a' })
		expect(health.tryAcquire('a')).toEqual({ provider: 'a' })
	})

	it('closes after a successful trial', () => {
		failTimes('a', 3)
		t = 1000
		health.recordSuccess(acquire('a'), 50)

		const snap = health.snapshot('a')
		expect(snap.phase).toBe('closed')
		expect(snap.consecutiveFailures).toBe(0)
		expect(snap.consecutiveOpens).toBe(0)
		expect(snap.openUntil).toBeUndefined()
		expect(snap.trialInFlight).toBe(false)
	})

	it('reopens with a longer backoff after a failed trial', () => {
		failTimes('a', 3)
		t = 1000
		health.recordFailure(acquire('a'))
		expect(health.phase('a')).toBe('open')
		expect(health.snapshot('a').openUntil).toBe(3000)

		t = 3000
		health.recordFailure(acquire('a'))
		expect(health.snapshot('a').openUntil).toBe(7000)
		expect(health.snapshot('a').consecutiveOpens).toBe(3)
	})

	it('caps the backoff', () => {
		expect(health.backoffMs(0)).toBe(1000)
		expect(health.backoffMs(3)).toBe(8000)
		expect(health.backoffMs(10)).toBe(60_000)
	})

	it('ignores a late success while open', () => {
		failTimes('a', 3)
		health.recordSuccess('a')
		expect(health.phase('a')).toBe('open')
		expect(health.snapshot('a').openUntil).toBe(1000)
	})

	it('lets only the trial decide a half-open circuit', () => {
		const early = acquire('a')
		failTimes('a', 3)
		t = 1000
		const trial = acquire('a')

		health.release(early)
		expect(health.snapshot('a').trialInFlight).toBe(true)
		expect(health.tryAcquire('a')).toBeUndefined()

		health.recordSuccess(early, 10)
		expect(health.phase('a')).toBe('half-open')
		health.recordFailure(early)
		expect(health.phase('a')).toBe('half-open')
		expect(health.tryAcquire('a')).toBeUndefined()

		const snap = health.snapshot('a')
		expect(snap.successfulRequests).toBe(1)
		expect(snap.failedRequests).toBe(4)

		health.recordSuccess(trial)
		expect(health.phase('a')).toBe('closed')
	})

	it('ignores a trial permit from an earlier half-open period', () => {
		failTimes('a', 3)
		t = 1000
		const first = acquire('a')
		health.recordFailure(first)
		expect(health.snapshot('a').openUntil).toBe(3000)

		t = 3000
		const second = acquire('a')
		health.release(first)
		health.recordSuccess(first)
		expect(health.phase('a')).toBe('half-open')
		expect(health.snapshot('a').trialInFlight).toBe(true)

		health.recordFailure(second)
		expect(health.phase('a')).toBe('open')
		expect(health.snapshot('a').openUntil).toBe(7000)
	})

	it('reports success rate and average latency', () => {
		expect(health.snapshot('a').successRate).toBe(100)
		health.recordSuccess('a', 100)
		health.recordFailure('a')
		expect(health.snapshot('a').successRate).toBe(50)
		expect(health.snapshot('a').averageResponseMs).toBe(100)
		health.recordSuccess('a', 200)
		expect(health.snapshot('a').averageResponseMs).toBe(150)
	})

	it('honors a custom policy', () => {
		const strict = new HealthMonitor(
			{ failureThreshold: 1, baseBackoffMs: 500 },
			{ now: () => t, logger: silentLogger },
		)
		strict.recordFailure('a')
		expect(strict.phase('a')).toBe('open')
		expect(strict.snapshot('a').openUntil).toBe(500)
	})

	it('keeps providers independent and can reset one', () => {
		failTimes('a', 3)
		expect(health.phase('b')).toBe('closed')
		health.reset('a')
		expect(health.phase('a')).toBe('closed')
		expect(health.snapshot('a').failedRequests).toBe(0)
	})
})
