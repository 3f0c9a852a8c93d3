import { BufferCapacityError, ProducerError } from '../errors.js'

export const INITIAL_ENCODE_CAPACITY = 128
export const MAX_ENCODE_CAPACITY = 64 * 1024 * 1024

/**
 * Reusable scratch space for the message currently being encoded
 *
 * Capacity doubles on every grow and never shrinks. Growing swaps the backing
 * buffer without copying: whatever was written before is discarded, and any
 * slice handed out earlier no longer aliases the live buffer.
 */
export class EncodeBuffer {
	private buffer: Buffer
	private released = false

	readonly maxCapacity: number

	constructor(initialCapacity: number = INITIAL_ENCODE_CAPACITY, maxCapacity: number = MAX_ENCODE_CAPACITY) {
		if (!Number.isInteger(initialCapacity) || initialCapacity <= 0) {
			throw new RangeError(`Initial capacity must be a positive integer, got ${initialCapacity}`)
		}
		if (initialCapacity > maxCapacity) {
			throw new BufferCapacityError(initialCapacity, maxCapacity)
		}
		this.buffer = Buffer.allocUnsafe(initialCapacity)
		this.maxCapacity = maxCapacity
	}

	get capacity(): number {
		return this.buffer.length
	}

	get isReleased(): boolean {
		return this.released
	}

	/**
	 * The live backing buffer. Only valid until the next grow.
	 */
	get bytes(): Buffer {
		this.assertLive()
		return this.buffer
	}

	/**
	 * Double the capacity
	 */
	grow(): Buffer {
		this.assertLive()
		const next = this.buffer.length * 2
		if (next > this.maxCapacity) {
			throw new BufferCapacityError(next, this.maxCapacity)
		}
		this.buffer = Buffer.allocUnsafe(next)
		return this.buffer
	}

	/**
	 * Grow until at least `size` bytes are available
	 */
	ensureCapacity(size: number): Buffer {
		while (this.capacity < size) {
			this.grow()
		}
		return this.bytes
	}

	release(): void {
		this.buffer = Buffer.alloc(0)
		this.released = true
	}

	private assertLive(): void {
		if (this.released) {
			throw new ProducerError('Encode buffer has been released')
		}
	}
}
