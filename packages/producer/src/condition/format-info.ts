import type { AttemptResult } from '../utils/grow-retry.js'

function escapeBinary(bytes: Buffer): string {
	let out = ''
	for (const byte of bytes) {
		if (byte >= 0x20 && byte < 0x7f && byte !== 0x22 && byte !== 0x5c) {
			out += String.fromCharCode(byte)
		} else {
			out += `\\x${byte.toString(16).padStart(2, '0')}`
		}
	}
	return out
}

/**
 * Render decoded AMQP data in the usual `{"key"="value"}` notation
 */
export function renderData(value: unknown): string {
	if (value === null || value === undefined) {
		return 'null'
	}
	if (typeof value === 'string') {
		return JSON.stringify(value)
	}
	if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
		return String(value)
	}
	if (Buffer.isBuffer(value)) {
		return `b"${escapeBinary(value)}"`
	}
	if (value instanceof Date) {
		return String(value.getTime())
	}
	if (Array.isArray(value)) {
		return `[${value.map(renderData).join(', ')}]`
	}
	if (typeof value === 'object') {
		const entries = Object.entries(value).map(([key, item]) => `${renderData(key)}=${renderData(item)}`)
		return `{${entries.join(', ')}}`
	}
	return String(value)
}

/**
 * Format `info` into at most `capacity` bytes, terminator included
 */
export function formatInfo(info: unknown, capacity: number): AttemptResult<string> {
	const text = renderData(info)
	if (Buffer.byteLength(text, 'utf-8') >= capacity) {
		return { status: 'overflow' }
	}
	return { status: 'ok', value: text }
}
