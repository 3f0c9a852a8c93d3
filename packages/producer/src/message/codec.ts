/**
 * AMQP message codec backed by rhea
 */

import rhea from 'rhea'

import type { AttemptResult } from '../utils/grow-retry.js'

/**
 * The logical message the producer sends: an AMQP value body plus the
 * header's durable flag
 */
export interface ProducerMessage {
	body: string
	durable: boolean
}

export interface MessageCodec {
	/**
	 * Encode `message` into the start of `target`, returning the number of
	 * bytes written, or overflow when `target` is too small
	 */
	encodeInto(message: ProducerMessage, target: Buffer): AttemptResult<number>

	decode(bytes: Buffer): ProducerMessage
}

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error))
}

export const rheaMessageCodec: MessageCodec = {
	encodeInto(message, target) {
		let encoded: Buffer
		try {
			encoded = rhea.message.encode({ body: message.body, durable: message.durable })
		} catch (error) {
			return { status: 'error', error: toError(error) }
		}

		if (encoded.length > target.length) {
			return { status: 'overflow' }
		}
		encoded.copy(target, 0)
		return { status: 'ok', value: encoded.length }
	},

	decode(bytes) {
		const decoded = rhea.message.decode(bytes)
		const body: unknown = decoded.body
		if (typeof body !== 'string') {
			throw new TypeError(`Expected a string body, got ${typeof body}`)
		}
		return { body, durable: decoded.durable === true }
	},
}
