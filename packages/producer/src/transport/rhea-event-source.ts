/**
 * rhea-backed event source
 *
 * Translates rhea's callback events into ProducerEvent batches and exposes the
 * rhea connection, session and sender through the producer's protocol
 * interfaces. rhea does the framing, SASL and socket work.
 */

import rhea from 'rhea'
import type { ConnectionOptions, SenderOptions } from 'rhea'

import { toCondition, type Condition } from '../condition/condition.js'
import { ProducerError } from '../errors.js'
import { noopLogger, type Logger } from '../logger.js'
import type {
	DeliveryOutcome,
	EventSource,
	ProducerEvent,
	ProtocolConnection,
	ProtocolLink,
	ProtocolSession,
} from '../producer/types.js'

export interface RheaSenderHandle {
	sendable(): boolean
	send(payload: Buffer, tag: Buffer, format: number): unknown
}

export interface RheaSessionHandle {
	begin(): void
	open_sender(options: SenderOptions): RheaSenderHandle
}

export interface RheaConnectionHandle {
	/** Most events pass an event context; `protocol_error` passes the error itself */
	on(event: string, listener: (arg: unknown) => void): unknown
	close(): void
	create_session(): RheaSessionHandle
}

export interface RheaContainerHandle {
	connect(options: ConnectionOptions): RheaConnectionHandle
}

export interface RheaEventSourceOptions {
	host: string
	port: number
	logger?: Logger
	createContainer?: (containerId: string) => RheaContainerHandle
}

type EmitEvent = (event: ProducerEvent) => void

const DELIVERY_OUTCOMES: readonly DeliveryOutcome[] = ['accepted', 'rejected', 'released', 'modified']

/** Pre-encoded payloads are sent with message format 0 */
const MESSAGE_FORMAT = 0

/**
 * Read a nested field of an untyped event argument
 */
function field(value: unknown, ...path: string[]): unknown {
	let current = value
	for (const key of path) {
		if (typeof current !== 'object' || current === null) {
			return undefined
		}
		current = Reflect.get(current, key)
	}
	return current
}

function toTag(tag: unknown): Buffer {
	if (Buffer.isBuffer(tag)) {
		return tag
	}
	if (typeof tag === 'string') {
		return Buffer.from(tag, 'utf-8')
	}
	return Buffer.alloc(0)
}

function defaultContainer(containerId: string): RheaContainerHandle {
	return rhea.create_container({ id: containerId })
}

class RheaLink implements ProtocolLink {
	private sender: RheaSenderHandle | null = null
	private address: string | null = null

	constructor(
		private readonly session: RheaSessionHandle,
		readonly name: string
	) {}

	setTarget(address: string): void {
		this.address = address
	}

	open(): void {
		if (this.sender) {
			return
		}
		if (this.address === null) {
			throw new ProducerError(`Link ${this.name} has no target address`)
		}
		this.sender = this.session.open_sender({ name: this.name, target: { address: this.address } })
	}

	hasCredit(): boolean {
		return this.sender?.sendable() ?? false
	}

	send(tag: Buffer, payload: Buffer): void {
		if (!this.sender) {
			throw new ProducerError(`Link ${this.name} is not open`)
		}
		// payload aliases the shared encode buffer; rhea writes it out later
		this.sender.send(Buffer.from(payload), Buffer.from(tag), MESSAGE_FORMAT)
	}
}

class RheaSession implements ProtocolSession {
	constructor(
		private readonly handle: RheaSessionHandle,
		private readonly onSender: (link: RheaLink) => void
	) {}

	open(): void {
		this.handle.begin()
	}

	createSender(name: string): ProtocolLink {
		const link = new RheaLink(this.handle, name)
		this.onSender(link)
		return link
	}
}

class RheaConnection implements ProtocolConnection {
	remoteProperties: unknown = undefined

	private containerId = ''
	private username?: string
	private password?: string
	private handle: RheaConnectionHandle | null = null
	private link: RheaLink | null = null
	private closeRequested = false
	private remoteClosed = false
	private finished = false

	constructor(
		private readonly options: RheaEventSourceOptions,
		private readonly logger: Logger,
		private readonly emit: EmitEvent
	) {}

	setCredentials(username: string, password: string | undefined): void {
		this.username = username
		this.password = password
	}

	setContainerId(containerId: string): void {
		this.containerId = containerId
	}

	open(): void {
		if (this.handle) {
			return
		}
		const createContainer = this.options.createContainer ?? defaultContainer
		const container = createContainer(this.containerId)
		const handle = container.connect({
			host: this.options.host,
			port: this.options.port,
			username: this.username,
			password: this.password,
			reconnect: false,
		})
		this.bind(handle)
		this.handle = handle
		this.logger.debug('connecting', { host: this.options.host, port: this.options.port })
	}

	close(): void {
		if (this.closeRequested) {
			return
		}
		this.closeRequested = true
		if (!this.handle) {
			this.finish(undefined)
			return
		}
		this.handle.close()
		if (this.remoteClosed) {
			this.finish(undefined)
		}
	}

	createSession(): ProtocolSession {
		if (!this.handle) {
			throw new ProducerError('Connection is not open')
		}
		return new RheaSession(this.handle.create_session(), link => {
			this.link = link
		})
	}

	private bind(handle: RheaConnectionHandle): void {
		handle.on('connection_open', context => {
			this.remoteProperties = field(context, 'connection', 'properties')
			this.emit({ type: 'connection-remote-open', connection: this })
		})

		handle.on('sendable', () => {
			if (this.link) {
				this.emit({ type: 'link-flow', connection: this, link: this.link })
			}
		})

		for (const outcome of DELIVERY_OUTCOMES) {
			handle.on(outcome, context => {
				const delivery = field(context, 'delivery')
				if (delivery === undefined || delivery === null) {
					return
				}
				this.emit({
					type: 'delivery',
					connection: this,
					delivery: {
						tag: toTag(field(delivery, 'tag')),
						outcome,
						condition: toCondition(field(delivery, 'remote_state', 'error')),
					},
				})
			})
		}

		handle.on('session_close', context => {
			this.emit({
				type: 'session-remote-close',
				connection: this,
				condition: toCondition(field(context, 'session', 'error')),
			})
		})

		handle.on('sender_close', context => {
			this.emit({
				type: 'link-remote-close',
				connection: this,
				condition: toCondition(field(context, 'sender', 'error')),
			})
		})

		handle.on('sender_detached', context => {
			this.emit({
				type: 'link-remote-detach',
				connection: this,
				condition: toCondition(field(context, 'sender', 'error')),
			})
		})

		handle.on('connection_close', context => {
			this.remoteClosed = true
			// A close frame carries its error on the connection; local failures
			// such as a refused SASL exchange put it on the context
			const error = field(context, 'connection', 'error') ?? field(context, 'error')
			this.emit({ type: 'connection-remote-close', connection: this, condition: toCondition(error) })
			if (this.closeRequested) {
				this.finish(undefined)
			}
		})

		handle.on('protocol_error', error => {
			this.emit({ type: 'transport-closed', connection: this, condition: toCondition(error) })
		})

		handle.on('disconnected', context => {
			this.finish(toCondition(field(context, 'error')))
		})

		// Each of these is followed by the matching *_close event, which reports it
		for (const name of ['connection_error', 'session_error', 'sender_error']) {
			handle.on(name, context => {
				const error =
					field(context, 'sender', 'error') ??
					field(context, 'session', 'error') ??
					field(context, 'connection', 'error') ??
					field(context, 'error')
				this.logger.debug(name, { condition: toCondition(error)?.name })
			})
		}
	}

	private finish(condition: Condition | undefined): void {
		if (this.finished) {
			return
		}
		this.finished = true
		this.emit({ type: 'transport-closed', connection: this, condition })
		this.emit({ type: 'proactor-inactive' })
	}
}

/**
 * Event source for one rhea connection. The first batch holds the
 * connection-init event; the connection is dialled when the producer opens it.
 */
export class RheaEventSource implements EventSource {
	readonly connection: ProtocolConnection

	private readonly queue: ProducerEvent[] = []
	private readonly logger: Logger
	private waiter: ((batch: ProducerEvent[]) => void) | null = null
	private flushScheduled = false

	constructor(options: RheaEventSourceOptions) {
		this.logger = options.logger?.child({ component: 'transport' }) ?? noopLogger
		this.connection = new RheaConnection(options, this.logger, event => this.push(event))
		this.push({ type: 'connection-init', connection: this.connection })
	}

	get pendingEvents(): number {
		return this.queue.length
	}

	wait(): Promise<ProducerEvent[]> {
		if (this.queue.length > 0) {
			return Promise.resolve(this.drain())
		}
		return new Promise(resolve => {
			this.waiter = resolve
		})
	}

	dispose(): void {
		this.connection.close()
	}

	private push(event: ProducerEvent): void {
		this.logger.debug('event', { type: event.type })
		this.queue.push(event)
		if (this.waiter && !this.flushScheduled) {
			this.flushScheduled = true
			// Everything emitted in the current tick joins the same batch
			queueMicrotask(() => this.flush())
		}
	}

	private flush(): void {
		this.flushScheduled = false
		const waiter = this.waiter
		if (!waiter || this.queue.length === 0) {
			return
		}
		this.waiter = null
		waiter(this.drain())
	}

	private drain(): ProducerEvent[] {
		return this.queue.splice(0, this.queue.length)
	}
}
