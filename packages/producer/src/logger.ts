/**
 * Console logging for the producer
 *
 * Two formats share one level filter. `text` prints each message as a plain
 * line for operators, the way the producer reports progress and broker
 * conditions. `json` prints one object per line for collectors. Errors always
 * go to stderr, everything else to stdout.
 */

/**
 * 'silent' disables all logging
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

export type LogFormat = 'text' | 'json'

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[]
export const LOG_FORMATS = ['text', 'json'] as const satisfies readonly LogFormat[]

const LEVEL_RANK: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

export interface Logger {
	error(message: string, context?: Record<string, unknown>): void
	warn(message: string, context?: Record<string, unknown>): void
	info(message: string, context?: Record<string, unknown>): void
	debug(message: string, context?: Record<string, unknown>): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: Record<string, unknown>): Logger
}

export interface LogRecord {
	level: Exclude<LogLevel, 'silent'>
	message: string
	timestamp: string
	context: Record<string, unknown>
}

export interface LoggerOptions {
	/** Minimum level written (default: 'info') */
	level?: LogLevel

	/** Line format (default: 'text') */
	format?: LogFormat

	/** Fields attached to every record */
	context?: Record<string, unknown>

	/** Clock for record timestamps */
	now?: () => Date
}

function jsonValue(_key: string, value: unknown): unknown {
	return typeof value === 'bigint' ? value.toString() : value
}

function textValue(value: unknown): string {
	if (typeof value === 'string') {
		return value
	}
	return JSON.stringify(value, jsonValue) ?? String(value)
}

/**
 * One line per record. Text keeps info and error lines bare so condition
 * reports read exactly as emitted; debug lines carry their fields.
 */
export function formatRecord(record: LogRecord, format: LogFormat): string {
	if (format === 'json') {
		return JSON.stringify(
			{ level: record.level, message: record.message, timestamp: record.timestamp, ...record.context },
			jsonValue
		)
	}

	switch (record.level) {
		case 'error':
		case 'info':
			return record.message
		case 'warn':
			return `warning: ${record.message}`
		case 'debug': {
			const fields = Object.entries(record.context).map(([key, value]) => `${key}=${textValue(value)}`)
			return [`debug: ${record.message}`, ...fields].join(' ')
		}
	}
}

class ConsoleLogger implements Logger {
	constructor(
		private readonly level: LogLevel,
		private readonly format: LogFormat,
		private readonly defaultContext: Record<string, unknown>,
		private readonly now: () => Date
	) {}

	error(message: string, context?: Record<string, unknown>): void {
		this.write('error', message, context)
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.write('warn', message, context)
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.write('info', message, context)
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.write('debug', message, context)
	}

	child(defaultContext: Record<string, unknown>): Logger {
		return new ConsoleLogger(this.level, this.format, { ...this.defaultContext, ...defaultContext }, this.now)
	}

	private write(level: LogRecord['level'], message: string, context?: Record<string, unknown>): void {
		if (LEVEL_RANK[level] > LEVEL_RANK[this.level]) {
			return
		}

		const line = formatRecord(
			{ level, message, timestamp: this.now().toISOString(), context: { ...this.defaultContext, ...context } },
			this.format
		)
		if (level === 'error') {
			console.error(line)
		} else {
			console.log(line)
		}
	}
}

class NoopLogger implements Logger {
	error(): void {}
	warn(): void {}
	info(): void {}
	debug(): void {}

	child(): Logger {
		return this
	}
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({ format: 'json', context: { containerId: 'producer:42' } })
 * logger.info("setting amqp topic: 'topic://my_topic'", { address: 'topic://my_topic' })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	return new ConsoleLogger(
		options.level ?? 'info',
		options.format ?? 'text',
		options.context ?? {},
		options.now ?? (() => new Date())
	)
}

export const noopLogger: Logger = new NoopLogger()
