/**
 * Producer error hierarchy
 *
 * FatalProducerError and its subclasses abort the event loop immediately.
 * Protocol conditions reported by the broker are not errors here: they are
 * logged by the condition reporter and drive an orderly close instead.
 */

/**
 * Base class for all producer errors
 */
export class ProducerError extends Error {
	override readonly cause?: Error

	constructor(message: string, cause?: Error) {
		super(message)
		this.name = 'ProducerError'
		this.cause = cause

		// Maintains proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * Invalid producer configuration or command line input
 */
export class ConfigError extends ProducerError {
	readonly issues: string[]

	constructor(issues: string[]) {
		super(`Invalid producer configuration: ${issues.join('; ')}`)
		this.name = 'ConfigError'
		this.issues = issues
	}
}

/**
 * Errors that leave no valid protocol state to continue from
 */
export class FatalProducerError extends ProducerError {
	constructor(message: string, cause?: Error) {
		super(message, cause)
		this.name = 'FatalProducerError'
	}
}

/**
 * Prefix + topic does not fit in an AMQP address
 */
export class AddressTooLongError extends FatalProducerError {
	readonly address: string
	readonly length: number
	readonly maxLength: number

	constructor(address: string, length: number, maxLength: number) {
		super(`Address of ${length} bytes exceeds the ${maxLength} byte limit`)
		this.name = 'AddressTooLongError'
		this.address = address
		this.length = length
		this.maxLength = maxLength
	}
}

/**
 * The codec failed for a reason other than running out of buffer space
 */
export class MessageEncodeError extends FatalProducerError {
	readonly sequence: number

	constructor(sequence: number, cause?: Error) {
		const detail = cause ? `: ${cause.message}` : ''
		super(`Failed to encode message sequence_${sequence}${detail}`, cause)
		this.name = 'MessageEncodeError'
		this.sequence = sequence
	}
}

/**
 * A growable buffer would have to exceed its hard limit
 */
export class BufferCapacityError extends FatalProducerError {
	readonly requested: number
	readonly maxCapacity: number

	constructor(requested: number, maxCapacity: number) {
		super(`Cannot grow buffer to ${requested} bytes (limit ${maxCapacity})`)
		this.name = 'BufferCapacityError'
		this.requested = requested
		this.maxCapacity = maxCapacity
	}
}
