/**
 * Producer configuration
 */

import { basename } from 'node:path'
import { z } from 'zod'

import { MAX_ADDRESS_LENGTH } from './address/address-resolver.js'
import { ConfigError } from './errors.js'
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from './logger.js'
import { MAX_MESSAGE_COUNT } from './producer/context.js'

export const DEFAULT_HOST = 'localhost'
export const DEFAULT_PORT = 5672
export const DEFAULT_MESSAGE_COUNT = 10
export const DEFAULT_TOPIC = 'my_topic'

/** Address prefix for topics when the broker does not advertise one */
export const DEFAULT_TOPIC_PREFIX = 'topic://'

const SERVICE_PORTS = new Map<string, number>([
	['amqp', 5672],
	['amqps', 5671],
])

function toPort(value: number | string): number {
	if (typeof value === 'number') {
		return value
	}
	return SERVICE_PORTS.get(value) ?? (/^\d+$/.test(value) ? Number(value) : Number.NaN)
}

const integerInput = z.union([
	z.number(),
	z.string().regex(/^-?\d+$/, 'must be an integer').transform(Number),
])

const configSchema = z.object({
	host: z.string().min(1).default(DEFAULT_HOST),
	port: z
		.union([z.number(), z.string().min(1)])
		.default(DEFAULT_PORT)
		.transform(toPort)
		.pipe(z.number({ invalid_type_error: 'must be a port number or service name' }).int().min(1).max(65535)),
	messageCount: integerInput
		.default(DEFAULT_MESSAGE_COUNT)
		.pipe(z.number().int().nonnegative().max(MAX_MESSAGE_COUNT)),
	topic: z.string().min(1).default(DEFAULT_TOPIC),
	topicPrefix: z.string().default(DEFAULT_TOPIC_PREFIX),
	containerId: z
		.string()
		.min(1)
		.refine(id => Buffer.byteLength(id, 'utf-8') <= MAX_ADDRESS_LENGTH, {
			message: `must be at most ${MAX_ADDRESS_LENGTH} bytes`,
		})
		.optional(),
	username: z.string().min(1).optional(),
	password: z.string().optional(),
	logLevel: z
		.string()
		.default('info')
		.pipe(z.enum(LOG_LEVELS)),
	logFormat: z.string().default('text').pipe(z.enum(LOG_FORMATS)),
})

/**
 * Producer configuration as accepted from the CLI or the environment
 */
export type ProducerConfigInput = z.input<typeof configSchema>

/**
 * Fully resolved configuration
 */
export interface ProducerConfig {
	/** Broker host (default: 'localhost') */
	host: string

	/** Broker port (default: 5672) */
	port: number

	/** Number of messages to send (default: 10) */
	messageCount: number

	/** Topic name without prefix (default: 'my_topic') */
	topic: string

	/** Prefix used unless the broker advertises one (default: 'topic://') */
	topicPrefix: string

	/** Container id sent in the open frame (default: 'producer:<pid>') */
	containerId: string

	username?: string
	password?: string

	/** Log level for the default logger (default: 'info') */
	logLevel: LogLevel

	/** Plain lines or JSON records (default: 'text') */
	logFormat: LogFormat
}

/**
 * Container id in the `<name>:<pid>` form, named after the program path
 */
export function formatContainerId(source: string, pid: number): string {
	const name = basename(source).replace(/\.[cm]?[jt]s$/, '')
	if (name.length === 0) {
		throw new ConfigError([`cannot derive a container id from "${source}"`])
	}
	const id = `${name}:${pid}`
	if (Buffer.byteLength(id, 'utf-8') > MAX_ADDRESS_LENGTH) {
		throw new ConfigError([`container id derived from "${source}" is longer than ${MAX_ADDRESS_LENGTH} bytes`])
	}
	return id
}

/**
 * Merge `input` over the environment and apply defaults.
 *
 * Environment variables: AMQP_HOST, AMQP_PORT, AMQP_USERNAME, AMQP_PASSWORD,
 * AMQP_TOPIC_PREFIX, PRODUCER_LOG_LEVEL and PRODUCER_LOG_FORMAT.
 */
export function resolveConfig(
	input: ProducerConfigInput = {},
	env: NodeJS.ProcessEnv = process.env,
	pid: number = process.pid
): ProducerConfig {
	const merged: ProducerConfigInput = {
		...input,
		host: input.host ?? env.AMQP_HOST,
		port: input.port ?? env.AMQP_PORT,
		username: input.username ?? env.AMQP_USERNAME,
		password: input.password ?? env.AMQP_PASSWORD,
		topicPrefix: input.topicPrefix ?? env.AMQP_TOPIC_PREFIX,
		logLevel: input.logLevel ?? env.PRODUCER_LOG_LEVEL,
		logFormat: input.logFormat ?? env.PRODUCER_LOG_FORMAT,
	}

	const result = configSchema.safeParse(merged)
	if (!result.success) {
		throw new ConfigError(
			result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
		)
	}

	const { containerId, ...config } = result.data
	return { ...config, containerId: containerId ?? formatContainerId('producer', pid) }
}
