import winston, { format } from 'winston'

export type Logger = winston.Logger

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug']

export interface LoggerOptions {
	level?: LogLevel
	/** JSON lines instead of the human-readable format. */
	json?: boolean
	/** Drop everything; used by tests and `--quiet` runs. */
	silent?: boolean
}

const SENSITIVE_KEYS = [/api[_-]?key/i, /token/i, /secret/i, /authorization/i]
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'component'])

const redactSecrets = format((info) => {
	for (const key of Object.keys(info)) {
		if (!CORE_FIELDS.has(key) && SENSITIVE_KEYS.some((pattern) => pattern.test(key))) {
			info[key] = '[REDACTED]'
		}
	}
	return info
})

const pretty = format.printf((info) => {
	const { timestamp, level, message, component, stack, ...rest } = info
	const context = Object.entries(rest)
		.filter(([, v]) => v !== undefined)
		.map(([k, v]) => `${k}=${JSON.stringify(v)}`)
	const scope = typeof component === 'string' ? ` [${component}]` : ''
	const line = `${String(timestamp)} ${level}${scope}: ${String(message)}${context.length > 0 ? ` ${context.join(' ')}` : ''}`
	return typeof stack === 'string' ? `${line}\n${stack}` : line
})

export function createLogger(options: LoggerOptions = {}): Logger {
	const { level = 'warn', json = process.env.NODE_ENV === 'production', silent = false } = options

	return winston.createLogger({
		level,
		silent,
		format: format.combine(
			redactSecrets(),
			format.timestamp(),
			format.errors({ stack: true }),
			json ? format.json() : format.combine(format.colorize(), pretty),
		),
		// Everything to stderr so command output on stdout stays machine-readable
		transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
		exitOnError: false,
	})
}

export function childLogger(logger: Logger, component: string): Logger {
	return logger.child({ component })
}
