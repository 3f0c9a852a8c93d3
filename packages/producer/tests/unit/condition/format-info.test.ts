import { describe, expect, it } from 'vitest'

import { formatInfo, renderData } from '@/condition/format-info.js'

describe('renderData', () => {
	it('renders scalars', () => {
		expect(renderData('x')).toBe('"x"')
		expect(renderData(12)).toBe('12')
		expect(renderData(12n)).toBe('12')
		expect(renderData(false)).toBe('false')
		expect(renderData(null)).toBe('null')
		expect(renderData(undefined)).toBe('null')
		expect(renderData(new Date(1000))).toBe('1000')
	})

	it('renders binary with escapes', () => {
		expect(renderData(Buffer.from([0x41, 0x00, 0x22]))).toBe('b"A\\x00\\x22"')
	})

	it('renders maps and lists', () => {
		const info = { a: 'x', n: 1, l: [true, null], b: Buffer.from([0x41, 0x00]) }

		expect(renderData(info)).toBe('{"a"="x", "n"=1, "l"=[true, null], "b"=b"A\\x00"}')
		expect(renderData([])).toBe('[]')
		expect(renderData({})).toBe('{}')
	})
})

describe('formatInfo', () => {
	it('fits when the text is shorter than the capacity', () => {
		expect(formatInfo('abc', 6)).toEqual({ status: 'ok', value: '"abc"' })
	})

	it('overflows when the text leaves no room for a terminator', () => {
		expect(formatInfo('abc', 5)).toEqual({ status: 'overflow' })
		expect(formatInfo('abc', 4)).toEqual({ status: 'overflow' })
	})
})
