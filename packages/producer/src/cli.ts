import { resolveConfig, type ProducerConfig, type ProducerConfigInput } from './config.js'
import { ConfigError } from './errors.js'
import { createLogger } from './logger.js'
import { ProducerContext, type ExitCode } from './producer/context.js'
import { ProducerStateMachine } from './producer/producer-state-machine.js'
import type { EventSource } from './producer/types.js'
import { RheaEventSource } from './transport/rhea-event-source.js'

export type ParsedArgs = { kind: 'run'; input: ProducerConfigInput } | { kind: 'help' } | { kind: 'invalid'; reason: string }

type OptionKey =
	| 'host'
	| 'port'
	| 'messageCount'
	| 'topic'
	| 'topicPrefix'
	| 'containerId'
	| 'username'
	| 'password'
	| 'logLevel'
	| 'logFormat'

const OPTIONS = new Map<string, OptionKey>([
	['-a', 'host'],
	['--host', 'host'],
	['-p', 'port'],
	['--port', 'port'],
	['-c', 'messageCount'],
	['--count', 'messageCount'],
	['-t', 'topic'],
	['--topic', 'topic'],
	['-i', 'containerId'],
	['--container-id', 'containerId'],
	['-u', 'username'],
	['--username', 'username'],
	['-P', 'password'],
	['--password', 'password'],
	['--prefix', 'topicPrefix'],
	['--log-level', 'logLevel'],
	['--log-format', 'logFormat'],
])

export function usage(): string {
	return [
		'Usage: amqp-topic-producer [options]',
		'\t-a, --host          The host address [localhost]',
		'\t-p, --port          The host port [5672]',
		'\t-c, --count         # of messages to send [10]',
		'\t-t, --topic         Target address topic [my_topic]',
		'\t-i, --container-id  AMQP container id [producer:<pid>]',
		'\t-u, --username      Client authentication username []',
		'\t-P, --password      Client authentication password []',
		'\t    --prefix        Topic prefix when the broker advertises none [topic://]',
		'\t    --log-level     silent, error, warn, info or debug [info]',
		'\t    --log-format    text or json [text]',
		'\t-h, --help          Displays this message',
	].join('\n')
}

function assign(input: ProducerConfigInput, key: OptionKey, value: string): void {
	switch (key) {
		case 'host':
			input.host = value
			break
		case 'port':
			input.port = value
			break
		case 'messageCount':
			input.messageCount = value
			break
		case 'topic':
			input.topic = value
			break
		case 'topicPrefix':
			input.topicPrefix = value
			break
		case 'containerId':
			input.containerId = value
			break
		case 'username':
			input.username = value
			break
		case 'password':
			input.password = value
			break
		case 'logLevel':
			input.logLevel = value
			break
		case 'logFormat':
			input.logFormat = value
			break
	}
}

export function parseArgs(argv: string[]): ParsedArgs {
	const input: ProducerConfigInput = {}

	for (let i = 0; i < argv.length; i++) {
		const raw = argv[i]
		if (raw === undefined || raw === '--') continue
		if (raw === '-h' || raw === '--help') {
			return { kind: 'help' }
		}

		const [flag, inlineValue] = raw.startsWith('--') ? raw.split('=', 2) : [raw, undefined]
		const key = flag === undefined ? undefined : OPTIONS.get(flag)
		if (key === undefined) {
			return { kind: 'invalid', reason: `unknown option: ${raw}` }
		}

		const value = inlineValue ?? argv[++i]
		if (value === undefined) {
			return { kind: 'invalid', reason: `missing value for ${flag}` }
		}
		assign(input, key, value)
	}

	return { kind: 'run', input }
}

export interface MainOptions {
	env?: NodeJS.ProcessEnv
	createEventSource?: (config: ProducerConfig) => EventSource
}

/**
 * Run the producer for `argv` (without node and script) and resolve with the
 * process exit code
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<ExitCode> {
	const parsed = parseArgs(argv)
	if (parsed.kind === 'help') {
		console.log(usage())
		return 0
	}
	if (parsed.kind === 'invalid') {
		console.error(parsed.reason)
		console.log(usage())
		return 1
	}

	let config: ProducerConfig
	try {
		config = resolveConfig(parsed.input, options.env)
	} catch (error) {
		if (error instanceof ConfigError) {
			console.error(error.message)
			console.log(usage())
			return 1
		}
		throw error
	}

	const logger = createLogger({
		level: config.logLevel,
		format: config.logFormat,
		context: { containerId: config.containerId },
	})
	const context = new ProducerContext({
		host: config.host,
		port: config.port,
		username: config.username,
		password: config.password,
		topicName: config.topic,
		topicPrefix: config.topicPrefix,
		containerId: config.containerId,
		messageCount: config.messageCount,
	})
	const source: EventSource =
		options.createEventSource?.(config) ?? new RheaEventSource({ host: config.host, port: config.port, logger })

	return new ProducerStateMachine(context, { logger }).run(source)
}
