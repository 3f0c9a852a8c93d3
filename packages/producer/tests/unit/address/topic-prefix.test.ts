import { describe, expect, it } from 'vitest'

import { lookupTopicPrefix, negotiateTopicPrefix } from '@/address/topic-prefix.js'
import { ProducerContext } from '@/producer/context.js'
import { createRecordingLogger, messages } from '../helpers/recording-logger.js'

function createContext(): ProducerContext {
	return new ProducerContext({
		host: 'localhost',
		port: 5672,
		topicName: 'my_topic',
		topicPrefix: 'topic://',
		containerId: 'producer:1',
		messageCount: 1,
	})
}

describe('lookupTopicPrefix', () => {
	it('is absent without properties or without the key', () => {
		expect(lookupTopicPrefix(undefined)).toEqual({ kind: 'absent' })
		expect(lookupTopicPrefix(null)).toEqual({ kind: 'absent' })
		expect(lookupTopicPrefix({})).toEqual({ kind: 'absent' })
		expect(lookupTopicPrefix({ product: 'broker' })).toEqual({ kind: 'absent' })
		expect(lookupTopicPrefix(['topic-prefix'])).toEqual({ kind: 'absent' })
	})

	it('finds a string value', () => {
		expect(lookupTopicPrefix({ 'topic-prefix': 'acme/' })).toEqual({ kind: 'found', prefix: 'acme/' })
	})

	it('finds an empty prefix', () => {
		expect(lookupTopicPrefix({ 'topic-prefix': '' })).toEqual({ kind: 'found', prefix: '' })
	})

	it('rejects a value that is not a string', () => {
		expect(lookupTopicPrefix({ 'topic-prefix': 5 })).toEqual({ kind: 'unusable', reason: 'value is number, not a string' })
		expect(lookupTopicPrefix({ 'topic-prefix': Buffer.from('acme/') })).toEqual({
			kind: 'unusable',
			reason: 'value is binary, not a string',
		})
	})

	it('accepts at most 254 bytes', () => {
		expect(lookupTopicPrefix({ 'topic-prefix': 'a'.repeat(254) }).kind).toBe('found')
		expect(lookupTopicPrefix({ 'topic-prefix': 'a'.repeat(255) })).toEqual({
			kind: 'unusable',
			reason: 'value of 255 bytes does not fit in 255 bytes',
		})
	})
})

describe('negotiateTopicPrefix', () => {
	it('replaces the configured prefix with the advertised one', () => {
		const context = createContext()
		const logger = createRecordingLogger()

		negotiateTopicPrefix(context, { 'topic-prefix': 'acme/' }, logger)

		expect(context.topicPrefix).toBe('acme/')
		expect(logger.entries).toEqual([
			{ level: 'info', message: 'using broker topic prefix', context: { prefix: 'acme/', previous: 'topic://' } },
		])
	})

	it('keeps the configured prefix and warns about an unusable value', () => {
		const context = createContext()
		const logger = createRecordingLogger()

		const lookup = negotiateTopicPrefix(context, { 'topic-prefix': true }, logger)

		expect(lookup.kind).toBe('unusable')
		expect(context.topicPrefix).toBe('topic://')
		expect(messages(logger.entries, 'warn')).toEqual(['broker advertised an unusable topic prefix'])
	})

	it('keeps the configured prefix quietly when nothing is advertised', () => {
		const context = createContext()
		const logger = createRecordingLogger()

		negotiateTopicPrefix(context, { product: 'broker' }, logger)

		expect(context.topicPrefix).toBe('topic://')
		expect(messages(logger.entries, 'debug')).toEqual(['broker advertised no topic prefix'])
		expect(messages(logger.entries, 'warn')).toEqual([])
	})

	it('ignores an advertised prefix once the address is fixed', () => {
		const context = createContext()
		const logger = createRecordingLogger()
		context.fixTopicPrefix()

		negotiateTopicPrefix(context, { 'topic-prefix': 'acme/' }, logger)

		expect(context.topicPrefix).toBe('topic://')
		expect(messages(logger.entries, 'warn')).toEqual(['topic prefix already fixed, ignoring broker value'])
	})
})
