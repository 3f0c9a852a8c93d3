import { EncodeBuffer } from '../buffer/encode-buffer.js'
import { ProducerError } from '../errors.js'
import type { TopicPrefixTarget } from '../address/topic-prefix.js'

export type ProducerState = 'init' | 'opening' | 'link-pending' | 'sending' | 'closing' | 'done'

export type ExitCode = 0 | 1

/** Sequences become signed 32-bit delivery tags */
export const MAX_MESSAGE_COUNT = 0x7fffffff

export interface ProducerContextOptions {
	host: string
	port: number
	username?: string
	password?: string
	topicName: string
	topicPrefix: string
	containerId: string
	messageCount: number
	encodeBuffer?: EncodeBuffer
}

/**
 * All mutable state of one producer run
 *
 * Owned by the state machine; handlers run to completion one at a time, so
 * nothing here is synchronized.
 */
export class ProducerContext implements TopicPrefixTarget {
	readonly host: string
	readonly port: number
	readonly username?: string
	readonly password?: string
	readonly topicName: string
	readonly containerId: string
	readonly messageCount: number
	readonly encodeBuffer: EncodeBuffer

	state: ProducerState = 'init'

	private _topicPrefix: string
	private topicPrefixFixed = false
	private _sent = 0
	private _acknowledged = 0
	private _exitCode: ExitCode = 0
	private _closeRequested = false

	constructor(options: ProducerContextOptions) {
		const { messageCount } = options
		if (!Number.isInteger(messageCount) || messageCount < 0 || messageCount > MAX_MESSAGE_COUNT) {
			throw new RangeError(`Message count must be an integer from 0 to ${MAX_MESSAGE_COUNT}, got ${messageCount}`)
		}
		this.host = options.host
		this.port = options.port
		this.username = options.username
		this.password = options.password
		this.topicName = options.topicName
		this._topicPrefix = options.topicPrefix
		this.containerId = options.containerId
		this.messageCount = options.messageCount
		this.encodeBuffer = options.encodeBuffer ?? new EncodeBuffer()
	}

	get topicPrefix(): string {
		return this._topicPrefix
	}

	get sent(): number {
		return this._sent
	}

	get acknowledged(): number {
		return this._acknowledged
	}

	get exitCode(): ExitCode {
		return this._exitCode
	}

	get closeRequested(): boolean {
		return this._closeRequested
	}

	get isComplete(): boolean {
		return this._acknowledged === this.messageCount
	}

	get canSend(): boolean {
		return this._sent < this.messageCount
	}

	/**
	 * Replace the prefix unless the target address has already been resolved
	 */
	replaceTopicPrefix(prefix: string): boolean {
		if (this.topicPrefixFixed) {
			return false
		}
		this._topicPrefix = prefix
		return true
	}

	fixTopicPrefix(): void {
		this.topicPrefixFixed = true
	}

	/**
	 * Count one more send and return its sequence number (1-based)
	 */
	recordSend(): number {
		if (!this.canSend) {
			throw new ProducerError(`All ${this.messageCount} messages have already been sent`)
		}
		return ++this._sent
	}

	recordAcknowledgement(): number {
		if (this._acknowledged >= this._sent) {
			throw new ProducerError(`Acknowledgement without an outstanding delivery (${this._acknowledged} of ${this._sent})`)
		}
		return ++this._acknowledged
	}

	/**
	 * Returns false if a close was already requested
	 */
	markCloseRequested(): boolean {
		if (this._closeRequested) {
			return false
		}
		this._closeRequested = true
		if (this.state !== 'done') {
			this.state = 'closing'
		}
		return true
	}

	markFailed(): void {
		this._exitCode = 1
	}

	release(): void {
		this.encodeBuffer.release()
	}
}
