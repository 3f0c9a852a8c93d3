import type { EncodeBuffer } from '../buffer/encode-buffer.js'
import { FatalProducerError, MessageEncodeError } from '../errors.js'
import { withGrowingBuffer } from '../utils/grow-retry.js'
import { rheaMessageCodec, type MessageCodec, type ProducerMessage } from './codec.js'

const BODY_PREFIX = 'sequence_'

export function sequenceBody(sequence: number): string {
	return `${BODY_PREFIX}${sequence}`
}

/**
 * Inverse of sequenceBody; undefined when `body` is not a sequence body
 */
export function parseSequenceBody(body: string): number | undefined {
	if (!body.startsWith(BODY_PREFIX)) {
		return undefined
	}
	const digits = body.slice(BODY_PREFIX.length)
	if (!/^-?\d+$/.test(digits)) {
		return undefined
	}
	return Number(digits)
}

export function sequenceMessage(sequence: number): ProducerMessage {
	return { body: sequenceBody(sequence), durable: true }
}

/**
 * Encodes sequence messages into the session's shared encode buffer
 */
export class MessageEncoder {
	private readonly buffer: EncodeBuffer
	private readonly codec: MessageCodec

	constructor(buffer: EncodeBuffer, codec: MessageCodec = rheaMessageCodec) {
		this.buffer = buffer
		this.codec = codec
	}

	/**
	 * Encode message `sequence` and return the written range.
	 *
	 * The range is a view into the shared buffer and is overwritten by the next
	 * call.
	 */
	encode(sequence: number): Buffer {
		const message = sequenceMessage(sequence)
		let size: number
		try {
			size = withGrowingBuffer(this.buffer, target => this.codec.encodeInto(message, target))
		} catch (error) {
			if (error instanceof FatalProducerError) {
				throw error
			}
			throw new MessageEncodeError(sequence, error instanceof Error ? error : undefined)
		}
		return this.buffer.bytes.subarray(0, size)
	}
}
