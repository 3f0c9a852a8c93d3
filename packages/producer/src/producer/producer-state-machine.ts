/**
 * Event-driven producer: one connection, one session, one sending link
 *
 * Events are handled strictly in delivery order and each handler runs to
 * completion. After a close is requested the loop keeps draining events until
 * the transport reports the connection gone, so close frames and late
 * dispositions are still processed.
 */

import { resolveAddress } from '../address/address-resolver.js'
import { negotiateTopicPrefix } from '../address/topic-prefix.js'
import { ConditionReporter } from '../condition/condition-reporter.js'
import { AddressTooLongError, FatalProducerError } from '../errors.js'
import { noopLogger, type Logger } from '../logger.js'
import type { MessageCodec } from '../message/codec.js'
import { MessageEncoder } from '../message/message-encoder.js'
import type { ExitCode, ProducerContext } from './context.js'
import type {
	DeliveryUpdate,
	EventSource,
	ProducerEvent,
	ProtocolConnection,
	ProtocolLink,
	RemoteEndpointCloseEvent,
} from './types.js'

export const DEFAULT_SENDER_NAME = 'producer-link'

const DELIVERY_TAG_SIZE = 4

/**
 * Tag for delivery `sequence`: the sequence as a 32-bit big-endian integer
 */
export function deliveryTag(sequence: number): Buffer {
	const tag = Buffer.alloc(DELIVERY_TAG_SIZE)
	tag.writeInt32BE(sequence, 0)
	return tag
}

export function readDeliveryTag(tag: Buffer): number | undefined {
	if (tag.length !== DELIVERY_TAG_SIZE) {
		return undefined
	}
	return tag.readInt32BE(0)
}

export interface ProducerStateMachineOptions {
	logger?: Logger
	codec?: MessageCodec
	senderName?: string
}

export class ProducerStateMachine {
	private readonly context: ProducerContext
	private readonly logger: Logger
	private readonly encoder: MessageEncoder
	private readonly reporter: ConditionReporter
	private readonly senderName: string

	/** Sequences sent and not yet settled by the peer */
	private readonly outstanding = new Set<number>()

	private connection: ProtocolConnection | null = null

	constructor(context: ProducerContext, options: ProducerStateMachineOptions = {}) {
		this.context = context
		this.logger = options.logger?.child({ component: 'producer' }) ?? noopLogger
		this.encoder = new MessageEncoder(context.encodeBuffer, options.codec)
		this.senderName = options.senderName ?? DEFAULT_SENDER_NAME
		this.reporter = new ConditionReporter({
			logger: this.logger,
			markFailed: () => this.context.markFailed(),
			requestClose: () => this.requestClose(),
		})
	}

	get outstandingDeliveries(): number {
		return this.outstanding.size
	}

	/**
	 * Drive the producer until the source reports no further work.
	 *
	 * Resolves with the run's exit code. The source is disposed and the encode
	 * buffer released on the way out.
	 */
	async run(source: EventSource): Promise<ExitCode> {
		try {
			for (;;) {
				const batch = await source.wait()
				for (const event of batch) {
					if (!this.dispatch(event)) {
						return this.context.exitCode
					}
				}
			}
		} finally {
			source.dispose()
			this.context.release()
		}
	}

	/**
	 * Handle one event. Returns false once the loop should stop.
	 */
	handle(event: ProducerEvent): boolean {
		if (event.type !== 'proactor-inactive') {
			this.connection = event.connection
		}

		switch (event.type) {
			case 'connection-init':
				return this.onConnectionInit(event.connection)
			case 'connection-remote-open':
				return this.onConnectionRemoteOpen(event.connection)
			case 'link-flow':
				return this.onLinkFlow(event.link)
			case 'delivery':
				return this.onDelivery(event.delivery)
			case 'transport-closed':
				this.reporter.report(event.type, event.condition)
				return true
			case 'connection-remote-close':
				return this.onRemoteEndpointClose(event)
			case 'session-remote-close':
				return this.onRemoteEndpointClose(event)
			case 'link-remote-close':
				return this.onRemoteEndpointClose(event)
			case 'link-remote-detach':
				return this.onRemoteEndpointClose(event)
			case 'proactor-inactive':
				this.context.state = 'done'
				return false
		}
	}

	private dispatch(event: ProducerEvent): boolean {
		try {
			return this.handle(event)
		} catch (error) {
			if (!(error instanceof FatalProducerError)) {
				throw error
			}
			this.logger.error(error.message, { event: event.type, error: error.name })
			this.context.markFailed()
			this.context.state = 'done'
			return false
		}
	}

	private onConnectionInit(connection: ProtocolConnection): boolean {
		const { context } = this
		if (context.username !== undefined) {
			connection.setCredentials(context.username, context.password)
		}
		connection.setContainerId(context.containerId)
		connection.open()
		context.state = 'opening'
		this.logger.debug('opening connection', { host: context.host, port: context.port })
		return true
	}

	private onConnectionRemoteOpen(connection: ProtocolConnection): boolean {
		const { context } = this
		negotiateTopicPrefix(context, connection.remoteProperties, this.logger)

		const session = connection.createSession()
		session.open()
		const link = session.createSender(this.senderName)

		const resolved = resolveAddress(context.topicPrefix, context.topicName)
		context.fixTopicPrefix()
		if (!resolved.ok) {
			throw new AddressTooLongError(resolved.address, resolved.length, resolved.maxLength)
		}

		this.logger.info(`setting amqp topic: '${resolved.address}'`, { address: resolved.address })
		link.setTarget(resolved.address)
		link.open()
		context.state = 'link-pending'
		return true
	}

	private onLinkFlow(link: ProtocolLink): boolean {
		const { context } = this
		if (context.closeRequested) {
			return true
		}
		if (context.isComplete) {
			// Nothing to send at all
			this.finish()
			return true
		}

		context.state = 'sending'
		while (link.hasCredit() && context.canSend) {
			const sequence = context.recordSend()
			const payload = this.encoder.encode(sequence)
			link.send(deliveryTag(sequence), payload)
			this.outstanding.add(sequence)
		}
		this.logger.debug('credit exhausted or all messages sent', { sent: context.sent })
		return true
	}

	private onDelivery(delivery: DeliveryUpdate): boolean {
		const sequence = readDeliveryTag(delivery.tag)
		if (sequence === undefined || !this.outstanding.delete(sequence)) {
			this.logger.debug('ignoring update for unknown delivery', { tag: delivery.tag.toString('hex') })
			return true
		}

		if (delivery.outcome === 'accepted') {
			const acknowledged = this.context.recordAcknowledgement()
			if (acknowledged === this.context.messageCount) {
				this.finish()
			}
			return true
		}

		this.logger.error(`unexpected delivery state ${delivery.outcome}`, {
			sequence,
			outcome: delivery.outcome,
		})
		this.reporter.report('delivery', delivery.condition)
		this.requestClose()
		this.context.markFailed()
		return true
	}

	private onRemoteEndpointClose(event: RemoteEndpointCloseEvent): boolean {
		this.reporter.report(event.type, event.condition)
		this.requestClose()
		return true
	}

	private finish(): void {
		const { acknowledged } = this.context
		this.logger.info(`${acknowledged} messages sent and acknowledged`, { acknowledged })
		this.requestClose()
	}

	private requestClose(): void {
		if (!this.connection || !this.context.markCloseRequested()) {
			return
		}
		this.logger.debug('closing connection', { sent: this.context.sent, acknowledged: this.context.acknowledged })
		this.connection.close()
	}
}
