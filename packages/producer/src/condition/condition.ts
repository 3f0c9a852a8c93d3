/**
 * An error or status carried by a close, detach or disposition
 */
export interface Condition {
	name: string
	description?: string
	info?: unknown
}

function readString(value: object, key: string): string | undefined {
	const field: unknown = Reflect.get(value, key)
	return typeof field === 'string' && field.length > 0 ? field : undefined
}

/**
 * Narrow whatever the transport attached to an event into a Condition.
 *
 * Accepts AMQP errors (`condition`/`description`/`info`), socket errors and
 * plain Errors. Returns undefined when no condition is set.
 */
export function toCondition(value: unknown): Condition | undefined {
	if (value === undefined || value === null || typeof value !== 'object') {
		return undefined
	}

	const info: unknown = Reflect.get(value, 'info')
	if (value instanceof Error) {
		return {
			name: readString(value, 'condition') ?? readString(value, 'code') ?? value.name,
			description: readString(value, 'description') ?? value.message,
			info,
		}
	}

	const name = readString(value, 'condition') ?? readString(value, 'name')
	if (name === undefined) {
		return undefined
	}
	return { name, description: readString(value, 'description'), info }
}
