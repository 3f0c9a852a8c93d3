/**
 * Largest target address in bytes: a 1060 byte address field, less its
 * terminator
 */
export const MAX_ADDRESS_LENGTH = 1059

export type ResolvedAddress =
	| { ok: true; address: string }
	| { ok: false; reason: string; address: string; length: number; maxLength: number }

/**
 * Join `prefix` and `topic` into a target address.
 *
 * No separator is inserted; a prefix like `topic://` already carries one.
 */
export function resolveAddress(prefix: string, topic: string, maxLength: number = MAX_ADDRESS_LENGTH): ResolvedAddress {
	const address = `${prefix}${topic}`
	const length = Buffer.byteLength(address, 'utf-8')
	if (length > maxLength) {
		return {
			ok: false,
			reason: `address of ${length} bytes exceeds the ${maxLength} byte limit`,
			address,
			length,
			maxLength,
		}
	}
	return { ok: true, address }
}
