import { describe, expect, it } from 'vitest'

import { MAX_ADDRESS_LENGTH, resolveAddress } from '@/address/address-resolver.js'

describe('resolveAddress', () => {
	it('joins prefix and topic without a separator', () => {
		expect(resolveAddress('topic://', 'my_topic')).toEqual({ ok: true, address: 'topic://my_topic' })
		expect(resolveAddress('acme/', 'orders')).toEqual({ ok: true, address: 'acme/orders' })
		expect(resolveAddress('', 'orders')).toEqual({ ok: true, address: 'orders' })
	})

	it('gives the same result for the same inputs', () => {
		expect(resolveAddress('topic://', 'a')).toEqual(resolveAddress('topic://', 'a'))
	})

	it('accepts an address of exactly the limit', () => {
		const result = resolveAddress('topic://', 'x'.repeat(MAX_ADDRESS_LENGTH - 8))
		expect(result.ok).toBe(true)
	})

	it('refuses an address one byte over the limit', () => {
		const result = resolveAddress('topic://', 'x'.repeat(MAX_ADDRESS_LENGTH - 7))
		expect(result).toMatchObject({ ok: false, length: 1060, maxLength: 1059 })
		expect(result.ok ? '' : result.reason).toBe('address of 1060 bytes exceeds the 1059 byte limit')
	})

	it('measures the limit in UTF-8 bytes', () => {
		expect(resolveAddress('', 'é'.repeat(529)).ok).toBe(true)
		expect(resolveAddress('', 'é'.repeat(530))).toMatchObject({ ok: false, length: 1060 })
	})

	it('honours a custom limit', () => {
		expect(resolveAddress('q/', 'abc', 5)).toEqual({ ok: true, address: 'q/abc' })
		expect(resolveAddress('q/', 'abcd', 5).ok).toBe(false)
	})
})
