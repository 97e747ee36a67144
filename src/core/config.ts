import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'
import { CAPABILITIES } from '../providers/types.js'
import { ConfigError } from './errors.js'
import { LOG_LEVELS } from './logger.js'

const rateLimitSchema = z.object({
	maxRequests: z.number().int().positive(),
	windowMs: z.number().int().positive(),
})

const providerOverrideSchema = z.object({
	priority: z.record(z.enum(CAPABILITIES), z.number().int()).optional(),
	timeoutMs: z.number().int().positive().optional(),
	rateLimit: rateLimitSchema.optional(),
})

const breakerSchema = z.object({
	failureThreshold: z.number().int().positive().optional(),
	windowMs: z.number().int().positive().optional(),
	baseBackoffMs: z.number().int().positive().optional(),
	backoffMultiplier: z.number().min(1).optional(),
	maxBackoffMs: z.number().int().positive().optional(),
})

export const configSchema = z.object({
	finnhubApiKey: z.string().min(1).optional(),
	alphaVantageApiKey: z.string().min(1).optional(),
	openaiApiKey: z.string().min(1).optional(),
	anthropicApiKey: z.string().min(1).optional(),
	openaiModel: z.string().min(1).optional(),
	anthropicModel: z.string().min(1).optional(),
	defaultFormat: z.enum(['markdown', 'json', 'plain']).optional(),
	logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
	deadlineMs: z.number().int().positive().optional(),
	disabledSources: z.array(z.string()).optional(),
	breaker: breakerSchema.optional(),
	cacheTtlMs: z.record(z.enum(CAPABILITIES), z.number().int().nonnegative()).optional(),
	providers: z.record(z.string(), providerOverrideSchema).optional(),
})

export type FinrelayConfig = z.infer<typeof configSchema>
export type ProviderOverride = z.infer<typeof providerOverrideSchema>

/** Keys `config set` accepts, with how to read the string given on the command line. */
export const SETTABLE_KEYS = {
	finnhubApiKey: 'string',
	alphaVantageApiKey: 'string',
	openaiApiKey: 'string',
	anthropicApiKey: 'string',
	openaiModel: 'string',
	anthropicModel: 'string',
	defaultFormat: 'string',
	logLevel: 'string',
	deadlineMs: 'number',
	disabledSources: 'list',
} as const

export type SettableKey = keyof typeof SETTABLE_KEYS

let cached: FinrelayConfig | null = null
let envLoaded = false

export function getConfigPath(): string {
	return process.env.FINRELAY_CONFIG ?? join(homedir(), '.finrelay', 'config.json')
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
}

export function parseConfig(raw: unknown, origin = 'config'): FinrelayConfig {
	const result = configSchema.safeParse(raw)
	if (!result.success) {
		const issues = formatIssues(result.error)
		throw new ConfigError(`Invalid ${origin}: ${issues.join('; ')}`, issues)
	}
	return result.data
}

function readConfigFile(): FinrelayConfig {
	const path = getConfigPath()
	if (!existsSync(path)) return {}
	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(path, 'utf-8'))
	} catch (err) {
		throw new ConfigError(`Could not read ${path}: ${err instanceof Error ? err.message : String(err)}`)
	}
	return parseConfig(raw, path)
}

function fromEnv(): FinrelayConfig {
	const { FINNHUB_API_KEY, ALPHA_VANTAGE_API_KEY, OPENAI_API_KEY, ANTHROPIC_API_KEY } = process.env
	const logLevel = LOG_LEVELS.find((l) => l === process.env.FINRELAY_LOG_LEVEL)
	return {
		...(FINNHUB_API_KEY ? { finnhubApiKey: FINNHUB_API_KEY } : {}),
		...(ALPHA_VANTAGE_API_KEY ? { alphaVantageApiKey: ALPHA_VANTAGE_API_KEY } : {}),
		...(OPENAI_API_KEY ? { openaiApiKey: OPENAI_API_KEY } : {}),
		...(ANTHROPIC_API_KEY ? { anthropicApiKey: ANTHROPIC_API_KEY } : {}),
		...(logLevel ? { logLevel } : {}),
	}
}

export function loadConfig(): FinrelayConfig {
	if (cached) return cached
	if (!envLoaded) {
		loadDotenv()
		envLoaded = true
	}
	// Env vars override file
	cached = { ...readConfigFile(), ...fromEnv() }
	return cached
}

export function saveConfig(patch: Record<string, unknown>): FinrelayConfig {
	const path = getConfigPath()
	const merged = parseConfig({ ...readConfigFile(), ...patch }, path)
	if (!existsSync(dirname(path))) {
		mkdirSync(dirname(path), { recursive: true })
	}
	writeFileSync(path, JSON.stringify(merged, null, 2), { mode: 0o600 })
	cached = null
	return merged
}

export function parseSettableValue(key: SettableKey, value: string): unknown {
	switch (SETTABLE_KEYS[key]) {
		case 'number': {
			const n = Number(value)
			if (!Number.isFinite(n)) throw new ConfigError(`${key} must be a number, got "${value}"`)
			return n
		}
		case 'list':
			return value
				.split(',')
				.map((v) => v.trim())
				.filter(Boolean)
		default:
			return value
	}
}

export function isSettableKey(key: string): key is SettableKey {
	return Object.hasOwn(SETTABLE_KEYS, key)
}

export function resetConfigCache(): void {
	cached = null
}
