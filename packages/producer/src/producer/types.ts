/**
 * The protocol surface the producer drives, and the events it reacts to
 */

import type { Condition } from '../condition/condition.js'

export interface ProtocolConnection {
	setCredentials(username: string, password: string | undefined): void
	setContainerId(containerId: string): void
	open(): void

	/** Idempotent; the close handshake completes asynchronously */
	close(): void

	/** Properties from the peer's open frame, once it has arrived */
	readonly remoteProperties: unknown

	createSession(): ProtocolSession
}

export interface ProtocolSession {
	open(): void
	createSender(name: string): ProtocolLink
}

export interface ProtocolLink {
	setTarget(address: string): void
	open(): void

	/** Whether the peer has granted credit for at least one more delivery */
	hasCredit(): boolean

	/** Create a delivery with `tag`, write `payload` and advance past it */
	send(tag: Buffer, payload: Buffer): void
}

export type DeliveryOutcome = 'accepted' | 'rejected' | 'released' | 'modified'

export interface DeliveryUpdate {
	tag: Buffer
	outcome: DeliveryOutcome
	condition?: Condition
}

/**
 * Protocol events, delivered one batch at a time in connection order
 */
export type ProducerEvent =
	| { type: 'connection-init'; connection: ProtocolConnection }
	| { type: 'connection-remote-open'; connection: ProtocolConnection }
	| { type: 'link-flow'; connection: ProtocolConnection; link: ProtocolLink }
	| { type: 'delivery'; connection: ProtocolConnection; delivery: DeliveryUpdate }
	| { type: 'transport-closed'; connection: ProtocolConnection; condition?: Condition }
	| { type: 'connection-remote-close'; connection: ProtocolConnection; condition?: Condition }
	| { type: 'session-remote-close'; connection: ProtocolConnection; condition?: Condition }
	| { type: 'link-remote-close'; connection: ProtocolConnection; condition?: Condition }
	| { type: 'link-remote-detach'; connection: ProtocolConnection; condition?: Condition }
	| { type: 'proactor-inactive' }

export type ProducerEventType = ProducerEvent['type']

export type RemoteEndpointCloseEvent = Extract<
	ProducerEvent,
	{ type: 'connection-remote-close' | 'session-remote-close' | 'link-remote-close' | 'link-remote-detach' }
>

/**
 * Source of event batches for a single connection
 */
export interface EventSource {
	/** Resolve with the next non-empty batch */
	wait(): Promise<ProducerEvent[]>

	/** Tear down whatever the source still holds once the loop has ended */
	dispose(): void
}
