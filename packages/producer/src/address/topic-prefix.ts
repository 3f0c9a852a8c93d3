/**
 * Topic prefix discovery from the broker's open frame
 *
 * Some brokers advertise the address prefix for topics under the
 * `topic-prefix` connection property. When present and usable it replaces
 * the configured prefix; otherwise the configured prefix stays.
 */

import type { Logger } from '../logger.js'

export const TOPIC_PREFIX_KEY = 'topic-prefix'

/** Scratch space for the advertised value, terminator included */
export const TOPIC_PREFIX_SCRATCH_SIZE = 255

export type PrefixLookup = { kind: 'absent' } | { kind: 'unusable'; reason: string } | { kind: 'found'; prefix: string }

/**
 * Anything whose topic prefix can be replaced
 */
export interface TopicPrefixTarget {
	readonly topicPrefix: string
	replaceTopicPrefix(prefix: string): boolean
}

function isPropertyMap(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value)
}

function describeValue(value: unknown): string {
	if (value === null) return 'null'
	if (Array.isArray(value)) return 'list'
	if (Buffer.isBuffer(value)) return 'binary'
	return typeof value
}

export function lookupTopicPrefix(properties: unknown): PrefixLookup {
	if (!isPropertyMap(properties) || !Object.hasOwn(properties, TOPIC_PREFIX_KEY)) {
		return { kind: 'absent' }
	}

	const value = properties[TOPIC_PREFIX_KEY]
	if (typeof value !== 'string') {
		return { kind: 'unusable', reason: `value is ${describeValue(value)}, not a string` }
	}

	const size = Buffer.byteLength(value, 'utf-8')
	if (size >= TOPIC_PREFIX_SCRATCH_SIZE) {
		return { kind: 'unusable', reason: `value of ${size} bytes does not fit in ${TOPIC_PREFIX_SCRATCH_SIZE} bytes` }
	}

	return { kind: 'found', prefix: value }
}

/**
 * Apply the broker's advertised prefix to `target`, if there is a usable one.
 * Never fails the connection.
 */
export function negotiateTopicPrefix(target: TopicPrefixTarget, properties: unknown, logger: Logger): PrefixLookup {
	const lookup = lookupTopicPrefix(properties)
	switch (lookup.kind) {
		case 'found': {
			const previous = target.topicPrefix
			if (target.replaceTopicPrefix(lookup.prefix)) {
				logger.info('using broker topic prefix', { prefix: lookup.prefix, previous })
			} else {
				logger.warn('topic prefix already fixed, ignoring broker value', {
					prefix: target.topicPrefix,
					advertised: lookup.prefix,
				})
			}
			break
		}
		case 'unusable':
			logger.warn('broker advertised an unusable topic prefix', {
				key: TOPIC_PREFIX_KEY,
				reason: lookup.reason,
				prefix: target.topicPrefix,
			})
			break
		case 'absent':
			logger.debug('broker advertised no topic prefix', { prefix: target.topicPrefix })
			break
	}
	return lookup
}
