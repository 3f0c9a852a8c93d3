// Producer
export { ProducerStateMachine, DEFAULT_SENDER_NAME, deliveryTag, readDeliveryTag } from './producer/producer-state-machine.js'
export type { ProducerStateMachineOptions } from './producer/producer-state-machine.js'
export { ProducerContext, MAX_MESSAGE_COUNT } from './producer/context.js'
export type { ProducerContextOptions, ProducerState, ExitCode } from './producer/context.js'
export type {
	ProtocolConnection,
	ProtocolSession,
	ProtocolLink,
	DeliveryOutcome,
	DeliveryUpdate,
	ProducerEvent,
	ProducerEventType,
	EventSource,
} from './producer/types.js'

// Transport
export { RheaEventSource } from './transport/rhea-event-source.js'
export type { RheaEventSourceOptions } from './transport/rhea-event-source.js'

// Encoding
export { EncodeBuffer, INITIAL_ENCODE_CAPACITY, MAX_ENCODE_CAPACITY } from './buffer/encode-buffer.js'
export { MessageEncoder, sequenceBody, parseSequenceBody, sequenceMessage } from './message/message-encoder.js'
export { rheaMessageCodec } from './message/codec.js'
export type { MessageCodec, ProducerMessage } from './message/codec.js'
export { withGrowingBuffer, withGrowingCapacity } from './utils/grow-retry.js'
export type { AttemptResult } from './utils/grow-retry.js'

// Addressing
export { resolveAddress, MAX_ADDRESS_LENGTH } from './address/address-resolver.js'
export type { ResolvedAddress } from './address/address-resolver.js'
export { lookupTopicPrefix, negotiateTopicPrefix, TOPIC_PREFIX_KEY } from './address/topic-prefix.js'
export type { PrefixLookup } from './address/topic-prefix.js'

// Conditions
export { ConditionReporter } from './condition/condition-reporter.js'
export { toCondition } from './condition/condition.js'
export type { Condition } from './condition/condition.js'
export { formatInfo, renderData } from './condition/format-info.js'

// Configuration
export { resolveConfig, formatContainerId, DEFAULT_TOPIC_PREFIX } from './config.js'
export type { ProducerConfig, ProducerConfigInput } from './config.js'
export { main, parseArgs, usage } from './cli.js'

// Errors
export {
	ProducerError,
	ConfigError,
	FatalProducerError,
	AddressTooLongError,
	MessageEncodeError,
	BufferCapacityError,
} from './errors.js'

// Logger
export { createLogger, formatRecord, noopLogger } from './logger.js'
export type { Logger, LogFormat, LogLevel, LogRecord, LoggerOptions } from './logger.js'
