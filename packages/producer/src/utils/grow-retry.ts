import type { EncodeBuffer } from '../buffer/encode-buffer.js'
import { BufferCapacityError } from '../errors.js'

/**
 * Outcome of writing into a fixed amount of space
 */
export type AttemptResult<T> = { status: 'ok'; value: T } | { status: 'overflow' } | { status: 'error'; error: Error }

/**
 * Run `attempt` against the buffer, doubling it on every overflow
 *
 * Overflow is the only retried outcome. An `error` result is thrown as is, and
 * growth past the buffer's limit throws BufferCapacityError.
 */
export function withGrowingBuffer<T>(buffer: EncodeBuffer, attempt: (target: Buffer) => AttemptResult<T>): T {
	for (;;) {
		const result = attempt(buffer.bytes)
		switch (result.status) {
			case 'ok':
				return result.value
			case 'error':
				throw result.error
			case 'overflow':
				buffer.grow()
				break
		}
	}
}

/**
 * Same loop over a bare byte budget, for output that is not kept between calls
 */
export function withGrowingCapacity<T>(
	initialCapacity: number,
	attempt: (capacity: number) => AttemptResult<T>,
	maxCapacity: number = Number.MAX_SAFE_INTEGER
): T {
	let capacity = initialCapacity
	for (;;) {
		const result = attempt(capacity)
		switch (result.status) {
			case 'ok':
				return result.value
			case 'error':
				throw result.error
			case 'overflow':
				if (capacity * 2 > maxCapacity) {
					throw new BufferCapacityError(capacity * 2, maxCapacity)
				}
				capacity *= 2
				break
		}
	}
}
