import { afterEach, describe, expect, it, vi } from 'vitest'

import { createLogger, formatRecord, noopLogger, type LogRecord } from '@/logger.js'

const clock = () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5))

function record(overrides: Partial<LogRecord> = {}): LogRecord {
	return {
		level: 'info',
		message: "setting amqp topic: 'topic://my_topic'",
		timestamp: '2024-01-02T03:04:05.000Z',
		context: { address: 'topic://my_topic' },
		...overrides,
	}
}

describe('formatRecord', () => {
	it('prints info and error lines bare as text', () => {
		expect(formatRecord(record(), 'text')).toBe("setting amqp topic: 'topic://my_topic'")
		expect(
			formatRecord(record({ level: 'error', message: 'delivery: amqp:rejected: full', context: {} }), 'text')
		).toBe('delivery: amqp:rejected: full')
	})

	it('marks warnings in text', () => {
		expect(formatRecord(record({ level: 'warn', message: 'broker advertised an unusable topic prefix' }), 'text')).toBe(
			'warning: broker advertised an unusable topic prefix'
		)
	})

	it('appends fields to debug lines', () => {
		const line = formatRecord(
			record({ level: 'debug', message: 'connecting', context: { host: 'localhost', port: 5672, size: 3n } }),
			'text'
		)
		expect(line).toBe('debug: connecting host=localhost port=5672 size="3"')
	})

	it('writes one JSON object with the fields inlined', () => {
		expect(JSON.parse(formatRecord(record({ context: { address: 'topic://my_topic', bytes: 12n } }), 'json'))).toEqual({
			level: 'info',
			message: "setting amqp topic: 'topic://my_topic'",
			timestamp: '2024-01-02T03:04:05.000Z',
			address: 'topic://my_topic',
			bytes: '12',
		})
	})
})

describe('createLogger', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('writes plain lines to stdout by default', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		createLogger().info('3 messages sent and acknowledged', { acknowledged: 3 })
		expect(log).toHaveBeenCalledWith('3 messages sent and acknowledged')
	})

	it('writes errors to stderr', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		const error = vi.spyOn(console, 'error').mockImplementation(() => {})
		createLogger().error('Err info: {"address"="topic://my_topic"}')
		expect(error).toHaveBeenCalledWith('Err info: {"address"="topic://my_topic"}')
		expect(log).not.toHaveBeenCalled()
	})

	it('carries default and child context into JSON records', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		const logger = createLogger({ format: 'json', context: { containerId: 'producer:1' }, now: clock })

		logger.child({ component: 'producer' }).info('link attached')

		expect(log).toHaveBeenCalledWith(
			'{"level":"info","message":"link attached","timestamp":"2024-01-02T03:04:05.000Z","containerId":"producer:1","component":"producer"}'
		)
	})

	it('filters below the configured level', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		const logger = createLogger({ level: 'warn' })
		logger.info('hidden')
		logger.debug('hidden')
		logger.warn('shown')
		expect(log.mock.calls).toEqual([['warning: shown']])
	})

	it('writes nothing when silent', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		const error = vi.spyOn(console, 'error').mockImplementation(() => {})
		const logger = createLogger({ level: 'silent' })
		logger.info('hidden')
		logger.error('hidden')
		expect(log).not.toHaveBeenCalled()
		expect(error).not.toHaveBeenCalled()
	})

	it('noopLogger never logs', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		noopLogger.info('nope')
		noopLogger.child({ component: 'producer' }).debug('nope')
		expect(log).not.toHaveBeenCalled()
	})
})
